import 'dotenv/config';
import { createApp, createServices } from './app';
import { config } from './config';
import { logger } from './logger';

async function main(): Promise<void> {
  const app = createApp(createServices(config));

  const server = app.listen(config.port, () => {
    logger.info(`Listening on http://localhost:${config.port}`, { env: config.env, output: config.outputDir });
  });

  const shutdown = (signal: string) => () => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 10000).unref();
  };

  process.on('SIGTERM', shutdown('SIGTERM'));
  process.on('SIGINT', shutdown('SIGINT'));
}

main().catch((err) => {
  logger.error('Server failed to start', err);
  process.exit(1);
});

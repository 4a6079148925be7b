import express from 'express';
import cors from 'cors';
import type { Config } from './config';
import { errorHandler } from './middleware';
import { createPipelineDeps, pipelineSettings, runPipeline } from './pipeline';
import { RunStore } from './pipeline/runStore';
import { createRoutes, type RouteServices } from './routes';

export function createApp(services: RouteServices) {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  app.use(createRoutes(services));

  // Rendered videos, images and audio
  app.use('/media', express.static(services.outputDir));

  app.use(errorHandler);

  return app;
}

export function createServices(cfg: Config): RouteServices {
  const deps = createPipelineDeps(cfg);
  const settings = pipelineSettings(cfg);
  return {
    runs: new RunStore((opts) => runPipeline(deps, settings, opts)),
    scripts: deps.scripts,
    characterNames: cfg.script.cast,
    statusTail: cfg.pipeline.statusTail,
    outputDir: cfg.outputDir
  };
}

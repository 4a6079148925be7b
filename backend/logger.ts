import { config } from './config';

const prefix = '[shorts]';

type Meta = Record<string, unknown>;

function format(msg: string, meta?: Meta): string {
  const payload = meta ? ` ${JSON.stringify(meta)}` : '';
  return `${prefix} ${msg}${payload}`;
}

export const logger = {
  info: (msg: string, meta?: Meta) => {
    // eslint-disable-next-line no-console
    console.log(format(msg, meta));
  },
  warn: (msg: string, meta?: Meta) => {
    // eslint-disable-next-line no-console
    console.warn(format(msg, meta));
  },
  error: (msg: string, err?: unknown, meta?: Meta) => {
    const errMsg = err instanceof Error ? err.message : String(err);
    const payload = meta ? { ...meta, error: errMsg } : { error: errMsg };
    // eslint-disable-next-line no-console
    console.error(`${prefix} ${msg}`, payload);
    if (err instanceof Error && !config.isProd) {
      // eslint-disable-next-line no-console
      console.error(err.stack);
    }
  },
  /** Stage-tagged progress line, e.g. `[shorts] [IMAGE] scene 2 ready` */
  step: (stage: string, msg: string, meta?: Meta) => {
    // eslint-disable-next-line no-console
    console.log(format(`[${stage}] ${msg}`, meta));
  }
};

export type Logger = typeof logger;

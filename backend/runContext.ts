import { logger as defaultLogger, type Logger } from './logger';
import { truncateMessage } from './textCleaner';

export type StatusLevel = 'info' | 'warn' | 'error';

export type StatusEvent = Readonly<{
  at: string;
  stage: string;
  level: StatusLevel;
  message: string;
}>;

export const MAX_STATUS_MESSAGE = 100;

/**
 * Status log for a single pipeline run. Created at run start and handed to
 * every stage; nothing outside the run appends to it.
 */
export class RunContext {
  private readonly events: StatusEvent[] = [];

  constructor(
    readonly runId: string,
    private readonly logger: Logger = defaultLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  info(stage: string, message: string): void {
    this.push(stage, 'info', message);
  }

  warn(stage: string, message: string): void {
    this.push(stage, 'warn', message);
  }

  /** Error text is cut to MAX_STATUS_MESSAGE characters. */
  fail(stage: string, message: string, err?: unknown): void {
    const detail = err instanceof Error ? `${message}: ${err.message}` : message;
    this.push(stage, 'error', truncateMessage(detail, MAX_STATUS_MESSAGE));
  }

  /** Most recent `n` events, oldest first. */
  recent(n = 20): StatusEvent[] {
    if (n <= 0) return [];
    return this.events.slice(-n);
  }

  all(): StatusEvent[] {
    return [...this.events];
  }

  private push(stage: string, level: StatusLevel, message: string): void {
    const event: StatusEvent = Object.freeze({ at: this.now().toISOString(), stage, level, message });
    this.events.push(event);
    const line = `${this.runId} ${message}`;
    if (level === 'error') this.logger.error(`[${stage}] ${line}`);
    else if (level === 'warn') this.logger.warn(`[${stage}] ${line}`);
    else this.logger.step(stage, line);
  }
}

import { errorMessage } from '../errors';
import { logger } from '../logger';
import { RunContext } from '../runContext';
import { createRunId, type RunOptions, type RunResult } from './index';

export type RunStatus = 'running' | 'done' | 'error';

export type RunRecord = {
  id: string;
  status: RunStatus;
  startedAt: string;
  finishedAt?: string;
  ctx: RunContext;
  result?: RunResult;
  errorMessage?: string;
  /** Settles when the run does; never rejects */
  finished: Promise<void>;
};

export type RunExecutor = (opts: RunOptions) => Promise<RunResult>;

export const MAX_KEPT_RUNS = 50;

/**
 * In-memory registry of pipeline runs. At most one run or script job holds the
 * store at a time, which is what keeps topic history single-writer. Finished
 * runs beyond `maxRuns` are evicted oldest first.
 */
export class RunStore {
  private readonly runs = new Map<string, RunRecord>();
  private latestId: string | null = null;
  private jobs = 0;

  constructor(
    private readonly execute: RunExecutor,
    private readonly now: () => Date = () => new Date(),
    private readonly maxRuns: number = MAX_KEPT_RUNS
  ) {}

  get active(): RunRecord | undefined {
    return [...this.runs.values()].find((r) => r.status === 'running');
  }

  get busy(): boolean {
    return this.jobs > 0 || this.active !== undefined;
  }

  /**
   * Runs other history-writing work (a script request) under the same gate as
   * pipeline runs. null when the store is busy.
   */
  exclusive<T>(work: () => Promise<T>): Promise<T> | null {
    if (this.busy) return null;
    this.jobs++;
    return new Promise<T>((resolve) => resolve(work())).finally(() => {
      this.jobs--;
    });
  }

  /** null when another run or job is still going. */
  start(opts: Omit<RunOptions, 'ctx'> = {}): RunRecord | null {
    if (this.busy) return null;
    const id = createRunId();
    const ctx = new RunContext(id);
    const record: RunRecord = {
      id,
      status: 'running',
      startedAt: this.now().toISOString(),
      ctx,
      finished: Promise.resolve()
    };
    record.finished = this.track(record, { ...opts, ctx });
    this.runs.set(id, record);
    this.latestId = id;
    this.evict();
    return record;
  }

  get(id: string): RunRecord | undefined {
    return this.runs.get(id);
  }

  latest(): RunRecord | undefined {
    return this.latestId ? this.runs.get(this.latestId) : undefined;
  }

  list(limit = 20): RunRecord[] {
    return [...this.runs.values()].sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1)).slice(0, limit);
  }

  private evict(): void {
    for (const [id, run] of this.runs) {
      if (this.runs.size <= this.maxRuns) return;
      if (run.status !== 'running' && id !== this.latestId) this.runs.delete(id);
    }
  }

  private async track(record: RunRecord, opts: RunOptions): Promise<void> {
    try {
      record.result = await this.execute(opts);
      record.status = 'done';
    } catch (err) {
      record.status = 'error';
      record.errorMessage = errorMessage(err);
      logger.error('Run failed', err, { runId: record.id });
    } finally {
      record.finishedAt = this.now().toISOString();
    }
  }
}

export class Semaphore {
  private current = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) throw new Error(`Semaphore size must be a positive integer, got ${max}`);
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    this.current--;
    const next = this.queue.shift();
    if (next) {
      this.current++;
      next();
    }
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Run `fn` over every item with at most `width` in flight. Results land in
 * input order regardless of completion order. The first rejection rejects the whole call.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  width: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const gate = new Semaphore(Math.max(1, Math.floor(width)));
  return Promise.all(items.map((item, i) => gate.use(() => fn(item, i))));
}

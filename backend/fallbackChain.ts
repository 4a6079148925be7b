import { ProviderExhaustedError, errorMessage } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { truncateMessage } from './textCleaner';

export type AttemptResult<T> =
  | { kind: 'success'; value: T }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string };

export type Provider<I, O> = {
  name: string;
  attempt(input: I): Promise<AttemptResult<O>>;
};

/** Deterministic last resort; expected to succeed. */
export type LocalFallback<I, O> = {
  name: string;
  produce(input: I): Promise<O>;
};

export type ProviderAttempt = {
  provider: string;
  /** 1-based, per provider */
  attempt: number;
  outcome: 'success' | 'retryable_failure' | 'fatal_failure';
  errorDetail?: string;
};

export type ChainOutcome<O> = {
  value: O;
  source: string;
  usedFallback: boolean;
  attempts: ProviderAttempt[];
};

export type FallbackChainOptions<I, O> = {
  name: string;
  providers: Provider<I, O>[];
  fallback: LocalFallback<I, O>;
  /** Extra attempts per provider after the first */
  retries?: number;
  retryDelayMs?: number;
  backoffFactor?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export const success = <T>(value: T): AttemptResult<T> => ({ kind: 'success', value });
export const retryable = <T>(reason: string): AttemptResult<T> => ({ kind: 'retryable', reason });
export const fatal = <T>(reason: string): AttemptResult<T> => ({ kind: 'fatal', reason });

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('response' in err && typeof err.response === 'object' && err.response !== null) {
    const response = err.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}

/**
 * Auth, billing and quota problems will not fix themselves on retry.
 * Everything else (timeouts, 5xx, rate limits, malformed output) is worth another try.
 */
export function classifyProviderError(err: unknown): 'retryable' | 'fatal' {
  const status = statusOf(err);
  if (status === 401 || status === 402 || status === 403) return 'fatal';
  const msg = errorMessage(err).toLowerCase();
  if (/billing|insufficient_quota|quota exceeded|permission|unauthorized|invalid api key/.test(msg)) return 'fatal';
  return 'retryable';
}

/** Wrap a throwing call as a provider. */
export function fromThrowing<I, O>(
  name: string,
  fn: (input: I) => Promise<O>,
  classify: (err: unknown) => 'retryable' | 'fatal' = classifyProviderError
): Provider<I, O> {
  return {
    name,
    async attempt(input) {
      try {
        return success(await fn(input));
      } catch (err) {
        const reason = errorMessage(err);
        return classify(err) === 'fatal' ? fatal<O>(reason) : retryable<O>(reason);
      }
    }
  };
}

/**
 * Ordered providers, each retried with backoff, then a local fallback.
 * Holds no state between runs; concurrent runs do not share waits.
 */
export class FallbackChain<I, O> {
  readonly name: string;
  private readonly providers: Provider<I, O>[];
  private readonly fallback: LocalFallback<I, O>;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly backoffFactor: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(opts: FallbackChainOptions<I, O>) {
    this.name = opts.name;
    this.providers = opts.providers;
    this.fallback = opts.fallback;
    this.retries = Math.max(0, opts.retries ?? 2);
    this.retryDelayMs = Math.max(0, opts.retryDelayMs ?? 2000);
    this.backoffFactor = opts.backoffFactor ?? 1;
    this.sleep = opts.sleep ?? sleep;
    this.logger = opts.logger ?? defaultLogger;
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  async run(input: I): Promise<ChainOutcome<O>> {
    const attempts: ProviderAttempt[] = [];
    const maxAttempts = this.retries + 1;

    for (const provider of this.providers) {
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        let result: AttemptResult<O>;
        try {
          result = await provider.attempt(input);
        } catch (err) {
          result = retryable<O>(errorMessage(err));
        }

        if (result.kind === 'success') {
          attempts.push({ provider: provider.name, attempt, outcome: 'success' });
          return { value: result.value, source: provider.name, usedFallback: false, attempts };
        }

        const errorDetail = truncateMessage(result.reason, 200);
        if (result.kind === 'fatal') {
          attempts.push({ provider: provider.name, attempt, outcome: 'fatal_failure', errorDetail });
          this.logger.warn(`${this.name}: ${provider.name} failed permanently`, { reason: errorDetail });
          break;
        }

        attempts.push({ provider: provider.name, attempt, outcome: 'retryable_failure', errorDetail });
        if (attempt < maxAttempts) {
          const delay = this.retryDelayMs * Math.pow(this.backoffFactor, attempt - 1);
          this.logger.warn(`${this.name}: ${provider.name} attempt ${attempt}/${maxAttempts} failed, retry in ${delay}ms`, {
            reason: errorDetail
          });
          await this.sleep(delay);
        } else {
          this.logger.warn(`${this.name}: ${provider.name} gave up after ${maxAttempts} attempts`, { reason: errorDetail });
        }
      }
    }

    try {
      const value = await this.fallback.produce(input);
      this.logger.info(`${this.name}: using local fallback ${this.fallback.name}`, { attempts: attempts.length });
      return { value, source: this.fallback.name, usedFallback: true, attempts };
    } catch (err) {
      const exhausted = new ProviderExhaustedError(this.name, attempts, err);
      this.logger.error(`${this.name}: local fallback failed`, err, { attempts });
      throw exhausted;
    }
  }
}

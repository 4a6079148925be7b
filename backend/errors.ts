import type { ProviderAttempt } from './fallbackChain';

export type PipelineErrorCode =
  | 'PARSE_FAILED'
  | 'RECOVERY_FAILED'
  | 'PROVIDERS_EXHAUSTED'
  | 'ASSEMBLY_FAILED'
  | 'UPLOAD_FAILED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No scene could be extracted from the script text. */
export class ParseError extends PipelineError {
  constructor(readonly rawLength: number) {
    super('PARSE_FAILED', `No scenes found in script (${rawLength} chars)`);
  }
}

export class RecoveryError extends PipelineError {
  constructor(readonly rawLength: number, readonly strategies: string[]) {
    super(
      'RECOVERY_FAILED',
      `Could not recover JSON from ${rawLength} chars (tried: ${strategies.join(', ') || 'none'})`
    );
  }
}

export class ProviderExhaustedError extends PipelineError {
  constructor(
    readonly chain: string,
    readonly attempts: ProviderAttempt[],
    cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super('PROVIDERS_EXHAUSTED', `All providers for ${chain} failed, fallback too${detail}`, { cause });
  }
}

export class AssemblyError extends PipelineError {
  constructor(readonly inputCount: number) {
    super('ASSEMBLY_FAILED', `Timeline is empty after assembling ${inputCount} scene(s)`);
  }
}

export class UploadError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('UPLOAD_FAILED', message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

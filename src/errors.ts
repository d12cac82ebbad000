export type CompletionErrorKind =
  | 'rate_limit'
  | 'auth'
  | 'quota'
  | 'bad_request'
  | 'unavailable'
  | 'timeout'
  | 'network'
  | 'invalid_response';

/**
 * A completion-service call failed. Stages turn this into a fallback
 * artifact or a deterministic rejection; it never ends a run.
 */
export class CompletionError extends Error {
  constructor(
    message: string,
    readonly kind: CompletionErrorKind,
    readonly status?: number
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * A local resource could not be acquired (no port, output not writable).
 * Fatal for the run.
 */
export class ResourceError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'ResourceError';
  }
}

/** Nothing publishable at finalization. Fatal for the run. */
export class FinalizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FinalizationError';
  }
}

export function isFatalRunError(error: unknown): error is ResourceError | FinalizationError {
  return error instanceof ResourceError || error instanceof FinalizationError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Pipeline error taxonomy
 *
 * StructuralChangeError aborts the current stage; everything else is
 * isolated to the match or market it happened on and aggregated into the
 * run summary.
 */

export type ErrorClass =
  | 'StructuralChangeError'
  | 'TransientNetworkError'
  | 'HttpStatusError'
  | 'DataQualityError'
  | 'ClockSkewWarning'
  | 'UnexpectedError';

export abstract class PipelineError extends Error {
  abstract readonly errorClass: ErrorClass;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Page or payload no longer has the shape the selectors expect */
export class StructuralChangeError extends PipelineError {
  readonly errorClass = 'StructuralChangeError';

  constructor(
    message: string,
    readonly url?: string,
  ) {
    super(url ? `${message} (${url})` : message);
  }
}

/** Timeout, connection failure, 429 or 5xx after all retries */
export class TransientNetworkError extends PipelineError {
  readonly errorClass = 'TransientNetworkError';

  constructor(
    message: string,
    readonly url: string,
    readonly attempts: number,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Non-retryable HTTP status (404, 403, ...) */
export class HttpStatusError extends PipelineError {
  readonly errorClass = 'HttpStatusError';

  constructor(
    readonly status: number,
    readonly url: string,
    readonly bodyPreview: string,
  ) {
    super(`HTTP ${status} for ${url}`);
  }
}

export class DataQualityError extends PipelineError {
  readonly errorClass = 'DataQualityError';

  constructor(
    message: string,
    readonly path: string,
  ) {
    super(`${message} at ${path}`);
  }
}

export class ClockSkewWarning extends PipelineError {
  readonly errorClass = 'ClockSkewWarning';

  constructor(
    readonly matchId: string,
    readonly latestObservedAt: Date,
    readonly referenceTime: Date,
  ) {
    super(
      `History for ${matchId} reaches ${latestObservedAt.toISOString()} ` +
        `past ${referenceTime.toISOString()} while the match is not started`,
    );
  }
}

export function errorClassOf(error: unknown): ErrorClass {
  return error instanceof PipelineError ? error.errorClass : 'UnexpectedError';
}

// Safe error message helper
export const errMsg = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export type PipelineErrorKind =
  | 'FetchFailed'
  | 'ExtractionFailed'
  | 'NormalizationFailed'
  | 'PersistenceFailed'
  | 'DuplicateInvoice';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

export class FetchFailedError extends PipelineError {
  readonly kind = 'FetchFailed' as const;
  readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'FetchFailedError';
    this.url = url;
  }
}

export class FetchTimeoutError extends FetchFailedError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, cause?: unknown) {
    super(url, `Request timed out after ${timeoutMs}ms`, cause);
    this.name = 'FetchTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ExtractionFailedError extends PipelineError {
  readonly kind = 'ExtractionFailed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ExtractionFailedError';
  }
}

export class NormalizationFailedError extends PipelineError {
  readonly kind = 'NormalizationFailed' as const;
  /** Name of the mandatory or malformed field, e.g. `total` or `details[0].unit_price`. */
  readonly field: string;

  constructor(field: string, detail?: string) {
    super(detail ? `missing or invalid field '${field}': ${detail}` : `missing or invalid field '${field}'`);
    this.name = 'NormalizationFailedError';
    this.field = field;
  }
}

export class PersistenceFailedError extends PipelineError {
  readonly kind = 'PersistenceFailed' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceFailedError';
  }
}

/** Raised by the store when the fiscal identifier is already taken. Not a failure. */
export class DuplicateInvoiceError extends PipelineError {
  readonly kind = 'DuplicateInvoice' as const;
  readonly cufe: string;

  constructor(cufe: string) {
    super(`Invoice ${cufe} is already on file`);
    this.name = 'DuplicateInvoiceError';
    this.cufe = cufe;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/**
 * Typed pipeline errors and their HTTP mapping.
 */

export type PipelineErrorCode =
  | "InvalidSource"
  | "MalformedInput"
  | "ForbiddenDestination"
  | "PayloadTooLarge"
  | "UnsupportedFormat"
  | "EncodingFailed"
  | "StorageUnavailable"
  | "StorageWriteFailed"
  | "BatchItemFailed"
  | "InvalidRequest"
  | "Cancelled";

const STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  InvalidSource: 400,
  MalformedInput: 400,
  UnsupportedFormat: 400,
  InvalidRequest: 400,
  BatchItemFailed: 400,
  ForbiddenDestination: 403,
  PayloadTooLarge: 413,
  EncodingFailed: 422,
  Cancelled: 499,
  StorageUnavailable: 502,
  StorageWriteFailed: 502,
};

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }

  get status(): number {
    return STATUS_BY_CODE[this.code];
  }
}

/** A batch stopped at `index`; `cause` is what the item failed with. */
export class BatchItemFailedError extends PipelineError {
  readonly index: number;

  constructor(index: number, cause: unknown) {
    super("BatchItemFailed", `failed to process item ${index}: ${errorMessage(cause)}`, { cause });
    this.name = "BatchItemFailedError";
    this.index = index;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Turn an AbortSignal reason into a PipelineError. A timeout from our own
 * deadline is a slow upstream; anything else is the caller giving up.
 */
export function abortedError(signal: AbortSignal | undefined, what: string): PipelineError {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error && reason.name === "TimeoutError") {
    return new PipelineError("InvalidSource", `${what} timed out`, { cause: reason });
  }
  return new PipelineError("Cancelled", `${what} was cancelled`, { cause: reason });
}

/** Wrap an unknown failure so callers only ever see PipelineError. */
export function toPipelineError(err: unknown, fallback: PipelineErrorCode, context: string): PipelineError {
  if (err instanceof PipelineError) return err;
  return new PipelineError(fallback, `${context}: ${errorMessage(err)}`, { cause: err });
}

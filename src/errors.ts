/**
 * Failure kinds a single file can end with. None of them aborts a run; each
 * is counted in the statistics and kept for the optional error listing.
 */
export enum DurationErrorCode {
  UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
  FORMAT_NOT_IMPLEMENTED = "FORMAT_NOT_IMPLEMENTED",
  FILE_READ_FAILED = "FILE_READ_FAILED",
  INVALID_WAV = "INVALID_WAV",
  UNDERIVABLE_DURATION = "UNDERIVABLE_DURATION",
  M4A_PARSE_FAILED = "M4A_PARSE_FAILED",
  PARSE_TIMEOUT = "PARSE_TIMEOUT"
}

/**
 * Error raised when the duration of one audio file cannot be determined.
 */
export class DurationError extends Error {
  constructor(
    public readonly code: DurationErrorCode,
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = "DurationError";
    Object.setPrototypeOf(this, DurationError.prototype);
  }
}

/**
 * Normalizes anything thrown while reading a file into a DurationError.
 * DurationErrors pass through untouched; everything else (fs errors mostly)
 * becomes FILE_READ_FAILED.
 */
export function toDurationError(err: unknown, path?: string): DurationError {
  if (err instanceof DurationError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new DurationError(DurationErrorCode.FILE_READ_FAILED, message, path);
}

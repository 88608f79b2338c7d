/**
 * Typed errors raised by the retrieval pipeline
 */

export type RetrieveErrorCode =
  | 'RETRIEVE_NOT_FOUND'
  | 'RETRIEVE_NOT_EXECUTABLE'
  | 'RETRIEVE_FAILED'
  | 'RETRIEVE_TIMEOUT'
  | 'UNSUPPORTED_PLATFORM'
  | 'DATA_FILE_NOT_FOUND'
  | 'DATA_READ_FAILED'
  | 'MISSING_CALIBRATION'
  | 'INVALID_CALIBRATION'
  | 'INVALID_DTYPE'
  | 'INVALID_ARGUMENT';

export class RetrieveError extends Error {
  readonly code: RetrieveErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: RetrieveErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RetrieveError';
    this.code = code;
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      this.details = details;
    }
  }
}

export function isRetrieveError(error: unknown, code?: RetrieveErrorCode): error is RetrieveError {
  if (!(error instanceof RetrieveError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type EngineErrorCode =
  | 'MALFORMED_REPORT'
  | 'UNKNOWN_STATION'
  | 'INVALID_QUERY'
  | 'QUERY_TIMEOUT'
  | 'BACKING_STORE_UNAVAILABLE'
  | 'INVALID_RULE_DEFINITION'
  | 'RULE_NOT_FOUND'
  | 'PUBLISH_FAILURE';

export const ERROR_STATUS_CODES: Record<EngineErrorCode, number> = {
  MALFORMED_REPORT: 422,
  UNKNOWN_STATION: 404,
  INVALID_QUERY: 400,
  QUERY_TIMEOUT: 503,
  BACKING_STORE_UNAVAILABLE: 503,
  INVALID_RULE_DEFINITION: 400,
  RULE_NOT_FOUND: 404,
  PUBLISH_FAILURE: 502,
};

/**
 * Structured error handed to the HTTP layer, which renders `code`, `message`
 * and `details` into the error envelope.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: EngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
  }

  get statusCode(): number {
    return ERROR_STATUS_CODES[this.code];
  }

  toJSON(): { code: EngineErrorCode; message: string; details?: Record<string, unknown> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export const isEngineError = (error: unknown): error is EngineError => error instanceof EngineError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

export const malformedReport = (message: string, details?: Record<string, unknown>): EngineError =>
  new EngineError('MALFORMED_REPORT', message, details);

export const invalidQuery = (message: string, details?: Record<string, unknown>): EngineError =>
  new EngineError('INVALID_QUERY', message, details);

export const invalidRule = (message: string, details?: Record<string, unknown>): EngineError =>
  new EngineError('INVALID_RULE_DEFINITION', message, details);

// Anything the backing store throws that is not already classified
export const toStoreError = (error: unknown): EngineError =>
  isEngineError(error)
    ? error
    : new EngineError('BACKING_STORE_UNAVAILABLE', `Backing store unavailable: ${errorMessage(error)}`);

/**
 * Base application error class.
 * Extends Error with status code and error code for CLI and report output.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Validation error (400 Bad Request).
 * Use when input data is invalid or missing.
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Raised by the reader factory when no reader handles the file.
 */
export class UnsupportedFileError extends ValidationError {
  constructor(public filename: string) {
    super(`Unsupported file type: ${filename}. Use a .docx reference and a .pptx presentation.`);
    this.code = 'UNSUPPORTED_FILE';
    this.name = 'UnsupportedFileError';
  }
}

/**
 * Document could not be opened or its main part could not be parsed (422).
 * Recoverable: the comparison continues with empty results for that document.
 */
export class DocumentParseError extends AppError {
  constructor(
    public filename: string,
    message: string,
    public cause?: unknown
  ) {
    super(`Could not read ${filename}: ${message}`, 422, 'DOCUMENT_PARSE_ERROR');
    this.name = 'DocumentParseError';
  }
}

/**
 * The grid model could not map a table row to its cells (horizontal merges).
 * Recovered by the raw-markup read of the row.
 */
export class RowStructureError extends AppError {
  constructor(message: string, public rowIndex: number) {
    super(message, 500, 'ROW_STRUCTURE_ERROR');
    this.name = 'RowStructureError';
  }
}

/**
 * The raw-markup read of a row failed as well. The row is skipped.
 */
export class CellFallbackError extends AppError {
  constructor(message: string, public rowIndex: number) {
    super(message, 500, 'CELL_FALLBACK_ERROR');
    this.name = 'CellFallbackError';
  }
}

/**
 * A table is unreadable as a whole. The table is skipped.
 */
export class TableStructureError extends AppError {
  constructor(message: string, public tableIndex: number) {
    super(message, 500, 'TABLE_STRUCTURE_ERROR');
    this.name = 'TableStructureError';
  }
}

/**
 * External service error (502).
 * Use when the review model API fails.
 */
export class ExternalServiceError extends AppError {
  constructor(
    service: string,
    message: string,
    public status?: number,
    public providerMessage?: string
  ) {
    super(`${service}: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.name = 'ExternalServiceError';
  }
}

/**
 * Error response structure for CLI JSON output.
 */
export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
  details?: string;
}

/**
 * Map any error to a standardized error response.
 * Logs the error with its context prefix.
 */
export function handleError(error: unknown, context?: string): {
  response: ErrorResponse;
  statusCode: number;
} {
  const prefix = context ? `[${context}]` : '[CLI]';
  console.error(`${prefix} Error:`, error instanceof Error ? error.message : error);

  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: error.message,
        code: error.code,
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: error.message,
        code: 'INTERNAL_ERROR',
        details: process.env.NODE_ENV === 'development' ? error.stack : undefined,
      },
      statusCode: 500,
    };
  }

  return {
    response: {
      success: false,
      error: 'An unexpected error occurred',
      code: 'UNKNOWN_ERROR',
    },
    statusCode: 500,
  };
}

/**
 * Assert a condition and throw ValidationError if false.
 */
export function assertValid(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message);
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

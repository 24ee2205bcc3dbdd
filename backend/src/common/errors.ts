/**
 * APP ERRORS
 *
 * Mapped to `{ ok: false, error: code, message }` by the global error handler.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('VALIDATION_ERROR', message, 400);
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class MissingFileError extends AppError {
  readonly filePath: string;

  constructor(filePath: string) {
    super('MISSING_FILE', `File not found: ${filePath}`, 404);
    this.filePath = filePath;
  }
}

/**
 * No row of a source file could be parsed.
 */
export class EmptyDatasetError extends AppError {
  readonly filePath: string;
  readonly skippedRows: number;

  constructor(filePath: string, skippedRows: number) {
    super(
      'EMPTY_DATASET',
      `No parseable rows in ${filePath} (${skippedRows} malformed rows skipped)`,
      422,
    );
    this.filePath = filePath;
    this.skippedRows = skippedRows;
  }
}

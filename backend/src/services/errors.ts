/**
 * Error conditions raised by the receipt and table services.
 * Each carries a stable `code` and the HTTP status the API answers with.
 */
export abstract class ServiceError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A date matched a receipt pattern but is not a real calendar date/time. */
export class InvalidDateError extends ServiceError {
  readonly code = 'INVALID_DATE';
  readonly statusCode = 422;

  constructor(readonly matched: string, reason: string) {
    super(`Invalid receipt date "${matched}": ${reason}`);
  }
}

export class SchemaMismatchError extends ServiceError {
  readonly code = 'SCHEMA_MISMATCH';
  readonly statusCode = 422;

  constructor(readonly source: string, readonly found: string[], readonly expected: string[]) {
    super(
      `Columns of '${source}' differ from the first file.\n` +
      `Found: ${found.join(', ')}\nExpected: ${expected.join(', ')}`
    );
  }
}

export class MissingColumnError extends ServiceError {
  readonly code = 'MISSING_COLUMN';
  readonly statusCode = 400;

  constructor(readonly column: string, readonly available: string[]) {
    super(`Column '${column}' does not exist in the data: ${available.join(', ')}`);
  }
}

export class InputNotFoundError extends ServiceError {
  readonly code = 'INPUT_NOT_FOUND';
  readonly statusCode = 404;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

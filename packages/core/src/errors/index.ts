/**
 * @fileoverview Error types for daybook
 *
 * Storage failures are fatal to the operation that triggered them and are
 * surfaced to the caller. Parse failures stay inside the codec, and logical
 * invariant violations are reported as `false` return values, not errors.
 */

export const ErrorCodes = {
  STORAGE_ERROR: 'STORAGE_ERROR',
  DATA_DIR_ERROR: 'DATA_DIR_ERROR',
  RECORD_PARSE_ERROR: 'RECORD_PARSE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class DaybookError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DaybookError';
    this.code = code;
  }
}

/**
 * A read or write against the data directory failed.
 */
export class StorageError extends DaybookError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(ErrorCodes.STORAGE_ERROR, message, { cause });
    this.name = 'StorageError';
    this.path = path;
  }
}

/**
 * The data directory could not be resolved or initialized.
 */
export class DataDirError extends DaybookError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.DATA_DIR_ERROR, message, { cause });
    this.name = 'DataDirError';
  }
}

/**
 * One record of a daily file could not be parsed. Raised and caught inside
 * the parser; the record is skipped.
 */
export class RecordParseError extends DaybookError {
  readonly line: number;

  constructor(message: string, line: number) {
    super(ErrorCodes.RECORD_PARSE_ERROR, message);
    this.name = 'RecordParseError';
    this.line = line;
  }
}

export function isDaybookError(error: unknown): error is DaybookError {
  return error instanceof DaybookError;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read the errno code (ENOENT, EACCES, ...) off a Node.js fs error
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

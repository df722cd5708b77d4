export enum ErrorCode {
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  SCHEMA_FORMAT = 'SCHEMA_FORMAT',
  VALIDATION = 'VALIDATION',
  COLLECTION_NOT_FOUND = 'COLLECTION_NOT_FOUND',
  COLLECTION_EXISTS = 'COLLECTION_EXISTS',
  INGESTION_FAILED = 'INGESTION_FAILED',
  GENERATION_FAILED = 'GENERATION_FAILED'
}

export type ErrorContext = {
  operation?: string;
  path?: string;
  elementType?: string;
  collection?: string;
  [key: string]: unknown;
};

export type SerializedError = {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
};

/**
 * Base class for every error the analysis and retrieval pipeline raises on purpose.
 * Anything else reaching the HTTP or CLI layer is treated as an internal failure.
 */
export class BimInsightError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BimInsightError';
    this.code = code;
    this.context = context;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined
    };
  }
}

export class InputNotFoundError extends BimInsightError {
  constructor(path: string, what = 'Input file') {
    super(`${what} not found: ${path}`, ErrorCode.INPUT_NOT_FOUND, { path });
    this.name = 'InputNotFoundError';
  }
}

export class SchemaFormatError extends BimInsightError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.SCHEMA_FORMAT, context);
    this.name = 'SchemaFormatError';
  }
}

export class ValidationError extends BimInsightError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, ErrorCode.VALIDATION, context, options);
    this.name = 'ValidationError';
  }
}

export class CollectionNotFoundError extends BimInsightError {
  constructor(collection: string) {
    super(
      `Collection '${collection}' does not exist. Run the 'convert' command first to create and populate it.`,
      ErrorCode.COLLECTION_NOT_FOUND,
      { collection }
    );
    this.name = 'CollectionNotFoundError';
  }
}

export class CollectionExistsError extends BimInsightError {
  constructor(collection: string) {
    super(
      `Collection '${collection}' already exists. Choose 'reuse' to keep it or 'replace' to rebuild it.`,
      ErrorCode.COLLECTION_EXISTS,
      { collection }
    );
    this.name = 'CollectionExistsError';
  }
}

export class IngestionError extends BimInsightError {
  readonly committedCount: number;

  constructor(collection: string, committedCount: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Ingestion into '${collection}' failed after ${committedCount} documents: ${reason}`,
      ErrorCode.INGESTION_FAILED,
      { collection, committedCount },
      { cause }
    );
    this.name = 'IngestionError';
    this.committedCount = committedCount;
  }
}

export class GenerationFailure extends BimInsightError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.GENERATION_FAILED, { operation: 'generate' }, options);
    this.name = 'GenerationFailure';
  }
}

export const isBimInsightError = (err: unknown): err is BimInsightError => err instanceof BimInsightError;

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Error taxonomy for catalog operations.
 *
 * Every failure surfaces to the caller; nothing here is retried or
 * downgraded to a warning. The `code` is stable and is what the HTTP
 * and MCP layers switch on.
 */

export type CatalogErrorCode =
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'IO_ERROR'
  | 'INVALID_VALUE'
  | 'INVALID_ARGUMENT'
  | 'QUERY_EXECUTION';

/**
 * Base class for all catalog errors.
 */
export class CatalogError extends Error {
  readonly code: CatalogErrorCode;

  constructor(code: CatalogErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.code = code;
    this.name = 'CatalogError';
  }
}

/** Missing file, folder, model or results location. */
export class NotFoundError extends CatalogError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('NOT_FOUND', message, options);
    this.name = 'NotFoundError';
  }
}

/** Malformed ontology or metadata content. */
export class ParseError extends CatalogError {
  readonly filePath: string;

  constructor(message: string, filePath: string, options: { cause?: unknown } = {}) {
    super('PARSE_ERROR', message, options);
    this.name = 'ParseError';
    this.filePath = filePath;
  }
}

/** Read or write failure other than a missing file. */
export class IOError extends CatalogError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('IO_ERROR', message, options);
    this.name = 'IOError';
  }
}

/**
 * A metadata value outside its vocabulary, or several values where only
 * one is allowed. `issues` holds one entry per offending field.
 */
export class InvalidValueError extends CatalogError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_VALUE', message);
    this.name = 'InvalidValueError';
    this.issues = issues;
  }
}

/** A caller-supplied argument the operation cannot work with. */
export class InvalidArgumentError extends CatalogError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

/** The SPARQL engine rejected or failed to evaluate a query. */
export class QueryExecutionError extends CatalogError {
  readonly queryName: string;

  constructor(queryName: string, message: string, options: { cause?: unknown } = {}) {
    super('QUERY_EXECUTION', message, options);
    this.name = 'QueryExecutionError';
    this.queryName = queryName;
  }
}

/**
 * Narrow a Node.js filesystem error to its errno code.
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

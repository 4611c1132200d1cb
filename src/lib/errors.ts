import { Data } from 'effect';

/**
 * The page carries the provider's "not enough data" marker: no statistics
 * exist for the domain. This is a legitimate outcome, not a markup problem.
 */
export class InsufficientDataError extends Data.TaggedError(
  'InsufficientDataError'
)<{
  readonly selector: string;
  readonly message: string;
}> {
  static create(selector: string): InsufficientDataError {
    return new InsufficientDataError({
      selector,
      message: 'Not enough data for this domain',
    });
  }
}

/**
 * A scalar selector matched nothing, or matched only whitespace.
 */
export class FieldNotFoundError extends Data.TaggedError('FieldNotFoundError')<{
  readonly field: string;
  readonly selector: string;
  readonly message: string;
}> {
  static create(field: string, selector: string): FieldNotFoundError {
    return new FieldNotFoundError({
      field,
      selector,
      message: `No ${field} found`,
    });
  }
}

/**
 * Numeric text that is not an unsigned integer once grouping separators are removed.
 */
export class MalformedNumberError extends Data.TaggedError(
  'MalformedNumberError'
)<{
  readonly field: string;
  readonly text: string;
  readonly message: string;
}> {
  static create(field: string, text: string): MalformedNumberError {
    return new MalformedNumberError({
      field,
      text,
      message: `Malformed ${field}: '${text}' is not an unsigned integer`,
    });
  }
}

/**
 * A tabular section's container is missing or has no rows.
 */
export class TableAbsentError extends Data.TaggedError('TableAbsentError')<{
  readonly field: string;
  readonly selector: string;
  readonly message: string;
}> {
  static create(field: string, selector: string): TableAbsentError {
    return new TableAbsentError({
      field,
      selector,
      message: `No ${field} found`,
    });
  }
}

/**
 * Fetch failures, timeouts and non-success statuses
 */
export class TransportError extends Data.TaggedError('TransportError')<{
  readonly url: string;
  readonly statusCode?: number;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromStatus(url: string, statusCode: number): TransportError {
    return new TransportError({
      url,
      statusCode,
      message: `Request to ${url} returned status ${statusCode}`,
    });
  }

  static fromCause(url: string, cause: unknown): TransportError {
    return new TransportError({
      url,
      cause,
      message: `Failed to fetch ${url}: ${cause}`,
    });
  }

  static timeout(url: string, timeoutMs: number): TransportError {
    return new TransportError({
      url,
      message: `Request to ${url} aborted after ${timeoutMs}ms due to timeout`,
    });
  }
}

/**
 * Input bytes that cannot be turned into a document tree
 */
export class DocumentParseError extends Data.TaggedError('DocumentParseError')<{
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(cause: unknown): DocumentParseError {
    return new DocumentParseError({
      cause,
      message: `Failed to parse document: ${cause}`,
    });
  }
}

/**
 * Reading a saved page from disk failed
 */
export class FileReadError extends Data.TaggedError('FileReadError')<{
  readonly path: string;
  readonly code?: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(path: string, cause: unknown): FileReadError {
    const code =
      cause instanceof Error && 'code' in cause && typeof cause.code === 'string'
        ? cause.code
        : undefined;
    return new FileReadError({
      path,
      code,
      cause,
      message:
        code === 'ENOENT'
          ? `File not found: ${path}`
          : `Failed to read file ${path}: ${cause}`,
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  readonly message: string;
  readonly details?: unknown;
}> {}

export type FieldExtractionError =
  | FieldNotFoundError
  | MalformedNumberError
  | TableAbsentError;

export type DocumentError = DocumentParseError | InsufficientDataError;

export type SiteInfoError =
  | FieldExtractionError
  | DocumentError
  | TransportError
  | FileReadError
  | ConfigurationError;

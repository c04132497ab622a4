/**
 * Error taxonomy for the collection pipeline.
 *
 * Everything except ConfigurationError is recoverable: the component that
 * catches it logs and carries on with an empty result for that source or
 * security.
 */

export type FetchUnavailableReason = 'network' | 'http-status' | 'timeout' | 'undersized';

/** The publisher could not be reached, or returned nothing worth parsing. */
export class FetchUnavailableError extends Error {
  readonly reason: FetchUnavailableReason;
  readonly httpStatus: number | null;

  constructor(label: string, reason: FetchUnavailableReason, detail?: string, httpStatus: number | null = null) {
    super(`${label} unavailable (${reason})${detail ? `: ${detail}` : ''}`);
    this.name = 'FetchUnavailableError';
    this.reason = reason;
    this.httpStatus = httpStatus;
  }
}

/** None of the candidate encodings decoded the payload. */
export class DecodeError extends Error {
  readonly attempted: readonly string[];

  constructor(attempted: readonly string[]) {
    super(`Payload could not be decoded as any of: ${attempted.join(', ')}`);
    this.name = 'DecodeError';
    this.attempted = attempted;
  }
}

export class ParseError extends Error {
  readonly sourceKey: string;

  constructor(sourceKey: string, cause: unknown) {
    super(`Failed to parse ${sourceKey}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'ParseError';
    this.sourceKey = sourceKey;
  }
}

/** Writing a snapshot or history file failed. */
export class PersistenceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to persist ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.filePath = filePath;
  }
}

/** The tracked-security list is missing or malformed. Fatal for the whole run. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isFetchUnavailableError(err: unknown): err is FetchUnavailableError {
  return err instanceof FetchUnavailableError;
}

export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError;
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError;
}

/**
 * Returns true for Node filesystem errors carrying the given code
 * (e.g. `ENOENT`, `EEXIST`).
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Returns true if `err` is an abort signal raised by an AbortController
 * (`AbortError` by name, or a message mentioning "aborted").
 */
export function isAbortError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  const name = 'name' in err ? String(err.name || '') : '';
  const message = 'message' in err ? String(err.message || '') : '';
  return name === 'AbortError' || name === 'TimeoutError' || /aborted|aborterror/i.test(message);
}

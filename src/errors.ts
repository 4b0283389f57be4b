/**
 * Error hierarchy for archive access.
 *
 * Fatal conditions (integrity, decryption) are thrown. Per-record decode
 * failures are not: they surface as a failed {@link ParseResult}.
 */

/** Base error for everything this package throws. */
export class ArchiveError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = 'ArchiveError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when a query is made but the store or key file could not be located. */
export class ArchiveUnavailableError extends ArchiveError {
  constructor(message?: string) {
    super(message);
    this.name = 'ArchiveUnavailableError';
  }
}

/** Raised when the unwrapped key fails its murmur hash check. */
export class IntegrityError extends ArchiveError {
  constructor(message?: string) {
    super(message);
    this.name = 'IntegrityError';
  }
}

/** Raised when the external engine fails to export a plaintext copy. */
export class DecryptionError extends ArchiveError {
  constructor(message?: string) {
    super(message);
    this.name = 'DecryptionError';
  }
}

/** Raised by byte readers that run past the end of their buffer. */
export class TruncatedDataError extends ArchiveError {
  constructor(message = 'Unexpected end of data') {
    super(message);
    this.name = 'TruncatedDataError';
  }
}

/** Raised when a tagged stream carries a type tag this decoder does not know. */
export class UnknownValueTypeError extends ArchiveError {
  constructor(public readonly tag: number) {
    super(`Unknown value type: ${tag}`);
    this.name = 'UnknownValueTypeError';
  }
}

/**
 * Outcome of decoding a single record.
 */
export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function parsed<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function unparsable<T>(reason: string): ParseResult<T> {
  return { ok: false, reason };
}

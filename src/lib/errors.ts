/**
 * Typed error hierarchy for the IWSLT corpus toolkit
 *
 * Every error carries a `kind` discriminator so that callers (and the CLI)
 * can branch on the failure without string matching.
 *
 * Usage:
 * ```ts
 * import { UnsupportedDatasetError, isTypedError } from './lib/errors.js';
 *
 * try {
 *   await loadIwslt('./data', { year: '2099', langpair: 'xx-yy' });
 * } catch (error) {
 *   if (error instanceof UnsupportedDatasetError) { ... }
 *   if (isTypedError(error) && error.kind === 'UNSUPPORTED_DATASET') { ... }
 * }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'INVALID_ARGUMENT'
  | 'UNSUPPORTED_DATASET'
  | 'MISALIGNED_CORPUS'
  | 'UNSAFE_ARCHIVE'
  | 'DOWNLOAD';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * Error thrown when an argument is outside its accepted values
 * (unknown split name, malformed language pair)
 */
export class InvalidArgumentError extends Error implements TypedError {
  readonly kind = 'INVALID_ARGUMENT' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Error thrown when a year/language pair is not in the dataset registry
 */
export class UnsupportedDatasetError extends Error implements TypedError {
  readonly kind = 'UNSUPPORTED_DATASET' as const;

  constructor(
    readonly dataset: string,
    readonly supported: readonly string[]
  ) {
    super(`${dataset} not supported. Supported datasets are ${supported.join(', ')}`);
    this.name = 'UnsupportedDatasetError';
    Object.setPrototypeOf(this, UnsupportedDatasetError.prototype);
  }
}

/**
 * Error thrown by strict reads when source and target files disagree
 */
export class MisalignedCorpusError extends Error implements TypedError {
  readonly kind = 'MISALIGNED_CORPUS' as const;

  constructor(
    message: string,
    readonly line: number
  ) {
    super(message);
    this.name = 'MisalignedCorpusError';
    Object.setPrototypeOf(this, MisalignedCorpusError.prototype);
  }
}

/**
 * Error thrown when an archive member would be written outside the
 * extraction directory, or is a link pointing outside it
 */
export class UnsafeArchiveError extends Error implements TypedError {
  readonly kind = 'UNSAFE_ARCHIVE' as const;

  constructor(
    readonly member: string,
    readonly linkpath?: string
  ) {
    super(
      linkpath === undefined
        ? `Archive member escapes extraction directory: ${member}`
        : `Archive member escapes extraction directory: ${member} -> ${linkpath}`
    );
    this.name = 'UnsafeArchiveError';
    Object.setPrototypeOf(this, UnsafeArchiveError.prototype);
  }
}

/**
 * Error thrown when the archive server answers with a failure status
 *
 * 4xx responses are not retryable, 5xx responses are.
 */
export class DownloadError extends Error implements TypedError {
  readonly kind = 'DOWNLOAD' as const;
  readonly retryable: boolean;

  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string
  ) {
    const label = status >= 400 && status < 500 ? 'Client error' : 'Server error';
    super(`${label}: ${status} ${statusText} (${url})`);
    this.name = 'DownloadError';
    this.retryable = status >= 500;
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}

/**
 * Type guard to check if an error is one of the typed corpus errors
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string'
  );
}

/**
 * Map error kind to CLI exit code
 */
export function getExitCodeForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'INVALID_ARGUMENT':
      return 2;
    case 'UNSUPPORTED_DATASET':
      return 3;
    case 'MISALIGNED_CORPUS':
      return 4;
    case 'UNSAFE_ARCHIVE':
      return 5;
    case 'DOWNLOAD':
      return 6;
    default:
      return 1;
  }
}

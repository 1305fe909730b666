/**
 * iwslt-corpus - Main Library Entry Point
 *
 * Re-exports the corpus API and the typed errors it throws.
 */

// ============================================================================
// CORPUS - download, extract, read and load IWSLT releases
// ============================================================================
export * from './corpus/index.js';

// ============================================================================
// ERRORS
// ============================================================================
export {
  InvalidArgumentError,
  UnsupportedDatasetError,
  MisalignedCorpusError,
  UnsafeArchiveError,
  DownloadError,
  isTypedError,
  getExitCodeForKind,
} from './lib/errors.js';
export type { ErrorKind, TypedError } from './lib/errors.js';

// ============================================================================
// LOGGING
// ============================================================================
export {
  Logger,
  createLogger,
  setLoggerProvider,
  resetLoggerProvider,
} from './lib/logger.js';
export type { LogLevel, LoggerProvider } from './lib/logger.js';

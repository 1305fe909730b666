/**
 * Centralized constants for the IWSLT corpus toolkit
 *
 * Defaults shared between the library, the CLI and the config schema.
 */

// ============================================================================
// Dataset defaults
// ============================================================================

/** Base URL of the WIT3 archive hosting the IWSLT releases */
export const DEFAULT_ARCHIVE_BASE_URL = 'https://wit3.fbk.eu/archive';

/** Default IWSLT release year */
export const DEFAULT_YEAR = '2016';

/** Default source-target language pair */
export const DEFAULT_LANGPAIR = 'de-en';

/** Default local directory for archives and extracted corpora */
export const DEFAULT_DATA_DIR = '.';

// ============================================================================
// Retry Configuration
// ============================================================================

/** Downloads are attempted once unless retries are requested */
export const DEFAULT_MAX_RETRIES = 0;

/** Default delay before the first retry in milliseconds (doubles each retry) */
export const DEFAULT_RETRY_DELAY_MS = 1000;

// ============================================================================
// Progress
// ============================================================================

/** Minimum interval between download progress callbacks */
export const PROGRESS_INTERVAL_MS = 100;

/**
 * Type definitions for the IWSLT corpus toolkit
 */

/** The three corpus splits, in load order */
export const SPLITS = ['train', 'dev', 'test'] as const;

/** Corpus split identifier */
export type Split = (typeof SPLITS)[number];

/** Dataset registry key, e.g. "2016.de-en" */
export type DatasetKey = `${string}.${string}`;

/** Per-split filename prefixes of one dataset */
export type DatasetFiles = Readonly<Record<Split, string>>;

/** Source and target language codes of a language pair */
export interface LanguagePair {
  /** Source language code, e.g. "de" */
  source: string;
  /** Target language code, e.g. "en" */
  target: string;
}

/** One aligned sentence pair: source tokens, target tokens */
export type SentencePair = [source: string[], target: string[]];

/** A materialized split: index-aligned source and target sentences */
export type SplitResult = [sources: string[][], targets: string[][]];

/** All three splits in load order */
export type IwsltCorpus = [train: SplitResult, dev: SplitResult, test: SplitResult];

/** Dataset selection shared by the fetcher, reader and loader */
export interface DatasetOptions {
  /** IWSLT release year (default: "2016") */
  year?: string;
  /** Language pair (default: "de-en") */
  langpair?: string;
}

/** Progress information for downloads */
export interface DownloadProgress {
  /** Bytes downloaded so far */
  bytesDownloaded: number;
  /** Total bytes if known from Content-Length */
  totalBytes?: number;
  /** Download speed in bytes per second */
  bytesPerSecond: number;
  /** Elapsed time in milliseconds */
  elapsedMs: number;
}

/** Options for streaming download */
export interface DownloadOptions {
  /** Progress callback */
  onProgress?: (progress: DownloadProgress) => void;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
  /** Retries on network and server errors (default: 0) */
  maxRetries?: number;
  /** Initial retry delay in ms (doubles each retry) */
  retryDelayMs?: number;
}

/** Options for {@link downloadIwslt} */
export interface FetchOptions extends DatasetOptions, DownloadOptions {
  /** Download and extract again even if the archive is present */
  force?: boolean;
  /** Base URL of the archive server */
  archiveBaseUrl?: string;
}

/** Outcome of a fetch */
export interface FetchResult {
  /** Remote archive URL */
  url: string;
  /** Absolute path of the local archive */
  archivePath: string;
  /** Absolute path of the extraction directory */
  extractDir: string;
  /** False when the archive was already present and nothing was done */
  downloaded: boolean;
}

/** Options for reading one split */
export interface ReadOptions extends DatasetOptions {
  /** Token appended to both sides of every sentence */
  eos?: string;
  /**
   * Fail with MisalignedCorpusError instead of truncating at the shorter
   * file, and on train lines where only one side looks like metadata
   */
  strict?: boolean;
}

/** Options for loading all splits */
export type LoadOptions = ReadOptions;

/** Counts for one split */
export interface SplitSummary {
  split: Split;
  pairs: number;
  sourceTokens: number;
  targetTokens: number;
}

/** Counts for a loaded corpus, in load order */
export type CorpusSummary = SplitSummary[];

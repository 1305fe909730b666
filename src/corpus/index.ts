/**
 * IWSLT corpus acquisition and parsing
 *
 * Download a release archive, extract it, and read its splits as aligned,
 * whitespace-tokenized sentence pairs.
 *
 * @example
 * ```typescript
 * import { downloadIwslt, loadIwslt } from 'iwslt-corpus/corpus';
 *
 * await downloadIwslt('./data', { year: '2016', langpair: 'de-en' });
 * const [train, dev, test] = await loadIwslt('./data', { eos: '<eos>' });
 * ```
 */

// Type exports
export type {
  Split,
  DatasetKey,
  DatasetFiles,
  LanguagePair,
  SentencePair,
  SplitResult,
  IwsltCorpus,
  DatasetOptions,
  DownloadProgress,
  DownloadOptions,
  FetchOptions,
  FetchResult,
  ReadOptions,
  LoadOptions,
  SplitSummary,
  CorpusSummary,
} from './types.js';
export { SPLITS } from './types.js';

// Registry
export {
  SUPPORTED_DATASETS,
  datasetKey,
  listSupportedDatasets,
  isSupportedDataset,
  getDatasetFiles,
  parseLangpair,
  isSplit,
  assertSplit,
} from './registry.js';

// Naming
export {
  archiveUrl,
  localArchiveName,
  localDirName,
  splitFilePaths,
} from './paths.js';

// Download
export {
  streamDownload,
  downloadToFile,
  downloadIfNotThere,
  fileExists,
} from './download.js';

// Extraction
export {
  extractArchive,
  listArchive,
  listArchiveMembers,
  isContainedMember,
  isContainedLink,
} from './extract.js';
export type { ArchiveMember } from './extract.js';

// Fetch
export { downloadIwslt } from './fetch.js';

// Line filters
export {
  isMetadataLine,
  extractSegment,
  tokenize,
} from './filters.js';

// Reading and loading
export { readIwslt } from './reader.js';
export { loadIwslt, collectSplit, summarizeCorpus } from './loader.js';

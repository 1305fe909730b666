/**
 * Fetch an IWSLT release: download the archive if needed, then extract it
 */

import { join, resolve } from 'node:path';
import { DEFAULT_ARCHIVE_BASE_URL, DEFAULT_LANGPAIR, DEFAULT_YEAR } from '../lib/constants.js';
import { createLogger } from '../lib/logger.js';
import { downloadIfNotThere } from './download.js';
import { extractArchive } from './extract.js';
import { archiveUrl, localArchiveName, localDirName } from './paths.js';
import type { DownloadOptions, FetchOptions, FetchResult } from './types.js';

/**
 * Ensure the IWSLT archive for a year and language pair is present under
 * `path` and extracted into `iwslt{year}.{langpair}/`.
 *
 * When the archive already exists and `force` is not set, nothing is
 * downloaded or extracted.
 *
 * @example
 * ```typescript
 * const result = await downloadIwslt('./data', { year: '2016', langpair: 'fr-en' });
 * if (result.downloaded) console.log(`Extracted to ${result.extractDir}`);
 * ```
 */
export async function downloadIwslt(
  path: string = '.',
  options: FetchOptions = {}
): Promise<FetchResult> {
  const {
    year = DEFAULT_YEAR,
    langpair = DEFAULT_LANGPAIR,
    force = false,
    archiveBaseUrl = DEFAULT_ARCHIVE_BASE_URL,
    onProgress,
    signal,
    maxRetries,
    retryDelayMs,
  } = options;

  const root = resolve(path);
  const url = archiveUrl(year, langpair, archiveBaseUrl);
  const archivePath = join(root, localArchiveName(year, langpair));
  const extractDir = join(root, localDirName(year, langpair));
  const log = createLogger('corpus').withFields({ dataset: `${year}.${langpair}` });

  const downloadOptions: DownloadOptions = {};
  if (onProgress) downloadOptions.onProgress = onProgress;
  if (signal) downloadOptions.signal = signal;
  if (maxRetries !== undefined) downloadOptions.maxRetries = maxRetries;
  if (retryDelayMs !== undefined) downloadOptions.retryDelayMs = retryDelayMs;

  const downloaded = await downloadIfNotThere(url, archivePath, { ...downloadOptions, force });

  if (downloaded) {
    await extractArchive(archivePath, extractDir);
  } else {
    log.info('Archive present, nothing to do', { archive: archivePath });
  }

  return { url, archivePath, extractDir, downloaded };
}

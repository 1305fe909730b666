/**
 * Download Command
 *
 * Fetch an IWSLT release archive and extract it into the data directory.
 */

import { Command } from 'commander';
import { downloadIwslt } from '../corpus/fetch.js';
import type { DownloadProgress, FetchResult } from '../corpus/types.js';
import {
  color,
  createProgressBar,
  formatBytes,
  loadConfig,
  parseCount,
  fail,
} from './utils.js';
import { resolveDataset, withDatasetOptions, type DatasetCommandOptions } from './options.js';

/** Download command options */
export interface DownloadCommandOptions extends DatasetCommandOptions {
  force: boolean;
  retries?: string;
  progress: boolean;
}

/**
 * Run the download with configuration applied
 */
export async function runDownload(options: DownloadCommandOptions): Promise<FetchResult> {
  const config = await loadConfig();
  const { dataDir, year, langpair } = resolveDataset(options, config);
  const maxRetries = options.retries !== undefined
    ? parseCount(options.retries, 'retries')
    : config.maxRetries;

  let bar: ReturnType<typeof createProgressBar> | null = null;
  const onProgress = (progress: DownloadProgress): void => {
    if (progress.totalBytes === undefined) {
      process.stderr.write(`\r  ${formatBytes(progress.bytesDownloaded)}\x1b[K`);
      return;
    }
    bar ??= createProgressBar({
      total: progress.totalBytes,
      format: '  :bar :percent | :size',
    });
    bar.update(progress.bytesDownloaded, { size: formatBytes(progress.bytesDownloaded) });
  };

  const result = await downloadIwslt(dataDir, {
    year,
    langpair,
    force: options.force,
    ...(config.archiveBaseUrl !== undefined && { archiveBaseUrl: config.archiveBaseUrl }),
    ...(maxRetries !== undefined && { maxRetries }),
    ...(options.progress && { onProgress }),
  });

  if (result.downloaded) {
    process.stderr.write('\n');
    console.log(`${color.success('✓')} Extracted ${color.cyan(`${year}.${langpair}`)} to ${result.extractDir}`);
  } else {
    console.log(`${color.gray('•')} ${result.archivePath} already present (use --force to download again)`);
  }

  return result;
}

export const downloadCommand = withDatasetOptions(
  new Command('download').description('Download and extract an IWSLT release')
)
  .option('-f, --force', 'Download and extract again even if the archive exists', false)
  .option('--retries <count>', 'Retries on network and server errors')
  .option('--no-progress', 'Do not show download progress')
  .action(async (options: DownloadCommandOptions) => {
    try {
      await runDownload(options);
    } catch (error) {
      fail(error);
    }
  });

/**
 * Dataset options shared by the corpus commands
 */

import type { Command } from 'commander';
import { DEFAULT_DATA_DIR, DEFAULT_LANGPAIR, DEFAULT_YEAR } from '../lib/constants.js';
import { resolvePath, type CliConfig } from './utils.js';

/** Options every corpus command accepts */
export interface DatasetCommandOptions {
  dataDir?: string;
  year?: string;
  langpair?: string;
}

/** Dataset selection after flags, configuration and defaults are merged */
export interface ResolvedDataset {
  dataDir: string;
  year: string;
  langpair: string;
}

/**
 * Register --data-dir, --year and --langpair on a command
 */
export function withDatasetOptions(command: Command): Command {
  return command
    .option('-d, --data-dir <dir>', `Directory for archives and extracted corpora (default: ${DEFAULT_DATA_DIR})`)
    .option('-y, --year <year>', `IWSLT release year (default: ${DEFAULT_YEAR})`)
    .option('-l, --langpair <pair>', `Language pair (default: ${DEFAULT_LANGPAIR})`);
}

/**
 * Merge flags over configuration over defaults
 */
export function resolveDataset(options: DatasetCommandOptions, config: CliConfig): ResolvedDataset {
  return {
    dataDir: resolvePath(options.dataDir ?? config.dataDir ?? DEFAULT_DATA_DIR),
    year: options.year ?? config.year ?? DEFAULT_YEAR,
    langpair: options.langpair ?? config.langpair ?? DEFAULT_LANGPAIR,
  };
}

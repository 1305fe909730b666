/**
 * Datasets Command
 *
 * List the releases and language pairs the toolkit knows how to read.
 */

import { Command } from 'commander';
import { SUPPORTED_DATASETS } from '../corpus/registry.js';
import { formatTable } from './utils.js';

interface DatasetsCommandOptions {
  json: boolean;
}

/**
 * Registry rows: dataset key and split file prefixes
 */
export function datasetRows(): Record<string, string>[] {
  return Object.entries(SUPPORTED_DATASETS).map(([dataset, files]) => ({
    dataset,
    train: files.train,
    dev: files.dev,
    test: files.test,
  }));
}

export const datasetsCommand = new Command('datasets')
  .description('List supported IWSLT datasets')
  .option('--json', 'Output as JSON', false)
  .action((options: DatasetsCommandOptions) => {
    if (options.json) {
      console.log(JSON.stringify(SUPPORTED_DATASETS, null, 2));
      return;
    }
    console.log(`\n${formatTable(datasetRows())}\n`);
  });

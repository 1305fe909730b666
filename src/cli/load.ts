/**
 * Load Command
 *
 * Load every split of an extracted release and print pair and token counts.
 */

import { Command } from 'commander';
import { loadIwslt, summarizeCorpus } from '../corpus/loader.js';
import type { CorpusSummary } from '../corpus/types.js';
import {
  color,
  createSpinner,
  formatNumber,
  formatTable,
  loadConfig,
  fail,
} from './utils.js';
import { resolveDataset, withDatasetOptions, type DatasetCommandOptions } from './options.js';

/** Load command options */
export interface LoadCommandOptions extends DatasetCommandOptions {
  eos?: string;
  strict: boolean;
  json: boolean;
}

/**
 * Render a corpus summary as a table
 */
export function formatSummary(summary: CorpusSummary): string {
  return formatTable(
    summary.map((s) => ({
      split: s.split,
      pairs: formatNumber(s.pairs),
      'source tokens': formatNumber(s.sourceTokens),
      'target tokens': formatNumber(s.targetTokens),
    }))
  );
}

export async function runLoad(options: LoadCommandOptions): Promise<CorpusSummary> {
  const config = await loadConfig();
  const { dataDir, year, langpair } = resolveDataset(options, config);

  const spinner = process.stderr.isTTY && !options.json
    ? createSpinner(`Loading ${year}.${langpair} from ${dataDir}...`)
    : null;

  let summary: CorpusSummary;
  try {
    const corpus = await loadIwslt(dataDir, {
      year,
      langpair,
      strict: options.strict,
      ...(options.eos !== undefined && { eos: options.eos }),
    });
    summary = summarizeCorpus(corpus);
  } catch (error) {
    spinner?.fail(`Failed to load ${year}.${langpair}`);
    throw error;
  }
  spinner?.success(`Loaded ${year}.${langpair}`);

  if (options.json) {
    console.log(JSON.stringify({ dataset: `${year}.${langpair}`, splits: summary }, null, 2));
  } else {
    console.log(`\n  ${color.bold('IWSLT')} ${color.cyan(`${year}.${langpair}`)}\n`);
    console.log(formatSummary(summary));
    console.log('');
  }

  return summary;
}

export const loadCommand = withDatasetOptions(
  new Command('load').description('Load train, dev and test splits and summarize them')
)
  .option('--eos <token>', 'Append an end-of-sequence token to every sentence')
  .option('--strict', 'Fail on misaligned source and target files', false)
  .option('--json', 'Output as JSON', false)
  .action(async (options: LoadCommandOptions) => {
    try {
      await runLoad(options);
    } catch (error) {
      fail(error);
    }
  });

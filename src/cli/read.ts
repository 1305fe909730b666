/**
 * Read Command
 *
 * Print the tokenized sentence pairs of one split, one pair per line.
 */

import { Command } from 'commander';
import { readIwslt } from '../corpus/reader.js';
import type { SentencePair } from '../corpus/types.js';
import { loadConfig, parseCount, fail } from './utils.js';
import { resolveDataset, withDatasetOptions, type DatasetCommandOptions } from './options.js';

/** Read command options */
export interface ReadCommandOptions extends DatasetCommandOptions {
  eos?: string;
  limit?: string;
  strict: boolean;
  json: boolean;
}

/**
 * Render one pair as `source<TAB>target`, or a JSON line
 */
export function formatPair([source, target]: SentencePair, json: boolean): string {
  if (json) {
    return JSON.stringify({ source, target });
  }
  return `${source.join(' ')}\t${target.join(' ')}`;
}

/**
 * Print pairs of a split
 *
 * @returns Number of pairs printed
 */
export async function runRead(split: string, options: ReadCommandOptions): Promise<number> {
  const config = await loadConfig();
  const { dataDir, year, langpair } = resolveDataset(options, config);
  const limit = options.limit !== undefined ? parseCount(options.limit, 'limit') : Infinity;

  const pairs = readIwslt(split, dataDir, {
    year,
    langpair,
    strict: options.strict,
    ...(options.eos !== undefined && { eos: options.eos }),
  });

  let printed = 0;
  if (limit === 0) {
    await pairs.return();
    return printed;
  }

  for await (const pair of pairs) {
    console.log(formatPair(pair, options.json));
    printed++;
    if (printed >= limit) {
      break;
    }
  }

  return printed;
}

export const readCommand = withDatasetOptions(
  new Command('read')
    .description('Print the tokenized sentence pairs of a split')
    .argument('<split>', 'Split to read: train, dev or test')
)
  .option('--eos <token>', 'Append an end-of-sequence token to every sentence')
  .option('-n, --limit <count>', 'Maximum number of pairs to print')
  .option('--strict', 'Fail on misaligned source and target files', false)
  .option('--json', 'Output JSON lines', false)
  .action(async (split: string, options: ReadCommandOptions) => {
    try {
      await runRead(split, options);
    } catch (error) {
      fail(error);
    }
  });

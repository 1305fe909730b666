/**
 * Load all three splits of an IWSLT release into memory
 */

import { DEFAULT_LANGPAIR, DEFAULT_YEAR } from '../lib/constants.js';
import { createLogger } from '../lib/logger.js';
import { readIwslt } from './reader.js';
import { getDatasetFiles } from './registry.js';
import type {
  CorpusSummary,
  IwsltCorpus,
  LoadOptions,
  SentencePair,
  SplitResult,
} from './types.js';
import { SPLITS } from './types.js';

/**
 * Materialize a sequence of sentence pairs into aligned source and target lists
 */
export async function collectSplit(pairs: AsyncIterable<SentencePair>): Promise<SplitResult> {
  const sources: string[][] = [];
  const targets: string[][] = [];
  for await (const [source, target] of pairs) {
    sources.push(source);
    targets.push(target);
  }
  return [sources, targets];
}

/**
 * Load the train, dev and test splits of an extracted release.
 *
 * @param path - Folder holding the extracted `iwslt{year}.{langpair}` directory
 * @returns `[train, dev, test]`, each as `[sources, targets]`
 * @throws {UnsupportedDatasetError} Before reading anything, for an unregistered year/language pair
 *
 * @example
 * ```typescript
 * const [train, dev, test] = await loadIwslt('./data', { langpair: 'fr-en', eos: '<eos>' });
 * const [trainSrc, trainTgt] = train;
 * ```
 */
export async function loadIwslt(path: string, options: LoadOptions = {}): Promise<IwsltCorpus> {
  const { year = DEFAULT_YEAR, langpair = DEFAULT_LANGPAIR } = options;
  getDatasetFiles(year, langpair);

  const readOptions: LoadOptions = { ...options, year, langpair };

  const train = await collectSplit(readIwslt('train', path, readOptions));
  const dev = await collectSplit(readIwslt('dev', path, readOptions));
  const test = await collectSplit(readIwslt('test', path, readOptions));

  createLogger('corpus').info(
    'Loaded corpus',
    {
      dataset: `${year}.${langpair}`,
      train: train[0].length,
      dev: dev[0].length,
      test: test[0].length,
    },
    'load'
  );

  return [train, dev, test];
}

/**
 * Count pairs and tokens per split
 */
export function summarizeCorpus(corpus: IwsltCorpus): CorpusSummary {
  return SPLITS.map((split, index) => {
    const [sources, targets] = corpus[index];
    return {
      split,
      pairs: sources.length,
      sourceTokens: countTokens(sources),
      targetTokens: countTokens(targets),
    };
  });
}

function countTokens(sentences: string[][]): number {
  let total = 0;
  for (const sentence of sentences) {
    total += sentence.length;
  }
  return total;
}

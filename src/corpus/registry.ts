/**
 * Registry of supported IWSLT datasets
 *
 * Each entry maps a `{year}.{langpair}` key to the filename prefixes of its
 * train, dev and test files inside the release archive. The table is frozen;
 * new releases are added here.
 */

import { InvalidArgumentError, UnsupportedDatasetError } from '../lib/errors.js';
import type { DatasetFiles, DatasetKey, LanguagePair, Split } from './types.js';
import { SPLITS } from './types.js';

export const SUPPORTED_DATASETS: Readonly<Record<DatasetKey, DatasetFiles>> = Object.freeze({
  '2016.de-en': Object.freeze({
    train: 'train.tags.de-en',
    dev: 'IWSLT16.TED.tst2013.de-en',
    test: 'IWSLT16.TED.tst2014.de-en',
  }),
  '2016.fr-en': Object.freeze({
    train: 'train.tags.fr-en',
    dev: 'IWSLT16.TED.tst2013.fr-en',
    test: 'IWSLT16.TED.tst2014.fr-en',
  }),
});

/**
 * Build the registry key for a year and language pair
 */
export function datasetKey(year: string, langpair: string): DatasetKey {
  return `${year}.${langpair}`;
}

/**
 * List supported dataset keys in registry order
 */
export function listSupportedDatasets(): string[] {
  return Object.keys(SUPPORTED_DATASETS);
}

export function isSupportedDataset(year: string, langpair: string): boolean {
  return Object.hasOwn(SUPPORTED_DATASETS, datasetKey(year, langpair));
}

/**
 * Look up the split filename prefixes of a dataset
 *
 * @throws {UnsupportedDatasetError} If the combination is not registered
 */
export function getDatasetFiles(year: string, langpair: string): DatasetFiles {
  const key = datasetKey(year, langpair);
  const files = Object.hasOwn(SUPPORTED_DATASETS, key) ? SUPPORTED_DATASETS[key] : undefined;
  if (!files) {
    throw new UnsupportedDatasetError(key, listSupportedDatasets());
  }
  return files;
}

/**
 * Split "de-en" into its source and target codes
 *
 * @throws {InvalidArgumentError} Unless the pair is two non-empty codes joined by "-"
 */
export function parseLangpair(langpair: string): LanguagePair {
  const parts = langpair.split('-');
  const [source, target] = parts;
  if (parts.length !== 2 || !source || !target) {
    throw new InvalidArgumentError(`langpair must look like "src-tgt", got "${langpair}"`);
  }
  return { source, target };
}

/**
 * Type guard for split names, compared by value
 */
export function isSplit(value: string): value is Split {
  return SPLITS.some((split) => split === value);
}

/**
 * Narrow a user-supplied split name
 *
 * @throws {InvalidArgumentError} If the name is not train, dev or test
 */
export function assertSplit(value: string): Split {
  if (!isSplit(value)) {
    throw new InvalidArgumentError(`split must be "train", "dev" or "test", got "${value}"`);
  }
  return value;
}

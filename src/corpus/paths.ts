/**
 * Remote and local naming of IWSLT archives and split files
 */

import { join, resolve } from 'node:path';
import { DEFAULT_ARCHIVE_BASE_URL } from '../lib/constants.js';
import { getDatasetFiles, parseLangpair } from './registry.js';
import type { Split } from './types.js';

/**
 * Remote archive URL for a release and language pair
 *
 * The double slash after `{year}-01` is part of the archive's published
 * layout and is kept as-is.
 *
 * @example
 * ```typescript
 * archiveUrl('2016', 'de-en');
 * // => 'https://wit3.fbk.eu/archive/2016-01//texts/de/en/de-en.tgz'
 * ```
 */
export function archiveUrl(
  year: string,
  langpair: string,
  baseUrl: string = DEFAULT_ARCHIVE_BASE_URL
): string {
  const { source, target } = parseLangpair(langpair);
  return `${baseUrl}/${year}-01//texts/${source}/${target}/${langpair}.tgz`;
}

/** Local archive filename, e.g. `iwslt2016.de-en.tgz` */
export function localArchiveName(year: string, langpair: string): string {
  return `iwslt${year}.${langpair}.tgz`;
}

/** Local extraction directory name, e.g. `iwslt2016.de-en` */
export function localDirName(year: string, langpair: string): string {
  return `iwslt${year}.${langpair}`;
}

/**
 * Absolute source and target file paths of one split
 *
 * Train files are raw text; dev and test files carry an `.xml` suffix.
 */
export function splitFilePaths(
  split: Split,
  path: string,
  year: string,
  langpair: string
): { source: string; target: string } {
  const { source, target } = parseLangpair(langpair);
  const prefix = getDatasetFiles(year, langpair)[split];
  const root = join(resolve(path), localDirName(year, langpair), langpair);
  const suffix = split === 'train' ? '' : '.xml';
  return {
    source: join(root, `${prefix}.${source}${suffix}`),
    target: join(root, `${prefix}.${target}${suffix}`),
  };
}

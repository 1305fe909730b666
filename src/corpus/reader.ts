/**
 * Lazy reader over one split of an extracted IWSLT release
 *
 * Source and target files are read in lockstep, one line pair at a time.
 * Train files drop talk metadata; dev and test files keep only `<seg>`
 * content. Each kept pair is tokenized on whitespace.
 */

import { once } from 'node:events';
import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { DEFAULT_LANGPAIR, DEFAULT_YEAR } from '../lib/constants.js';
import { MisalignedCorpusError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { extractSegment, isMetadataLine, tokenize } from './filters.js';
import { splitFilePaths } from './paths.js';
import { assertSplit } from './registry.js';
import type { ReadOptions, SentencePair, Split } from './types.js';

/** An open text file read line by line */
interface LineSource {
  readonly path: string;
  next(): Promise<IteratorResult<string>>;
  close(): Promise<void>;
}

/**
 * Open a UTF-8 file as a line iterator.
 *
 * The file is opened eagerly so a missing file fails here rather than on
 * the first read. `close()` resolves once the descriptor is released.
 */
async function openLines(path: string): Promise<LineSource> {
  const handle = await open(path, 'r');
  const input = handle.createReadStream({ encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });
  const iterator = lines[Symbol.asyncIterator]();

  return {
    path,
    next: () => iterator.next(),
    close: async () => {
      lines.close();
      if (!input.closed) {
        const closed = once(input, 'close');
        input.destroy();
        await closed;
      }
    },
  };
}

/** Per-read settings after defaults are applied */
interface PairSettings {
  split: Split;
  dataset: string;
  eos: string | undefined;
  strict: boolean;
}

/**
 * Apply the split's line policy to one raw line pair
 *
 * @returns The two texts to tokenize, or null when the pair is skipped
 */
function selectPair(
  settings: PairSettings,
  sourceLine: string,
  targetLine: string,
  lineNumber: number
): [string, string] | null {
  if (settings.split === 'train') {
    const sourceMeta = isMetadataLine(sourceLine);
    const targetMeta = isMetadataLine(targetLine);
    if (sourceMeta && targetMeta) {
      return null;
    }
    if (settings.strict && sourceMeta !== targetMeta) {
      const side = sourceMeta ? 'source' : 'target';
      throw new MisalignedCorpusError(
        `Line ${lineNumber} of ${settings.dataset} ${settings.split}: only the ${side} line is metadata`,
        lineNumber
      );
    }
    return [sourceLine, targetLine];
  }

  const sourceSegment = extractSegment(sourceLine);
  const targetSegment = extractSegment(targetLine);
  if (sourceSegment === null || targetSegment === null) {
    return null;
  }
  return [sourceSegment, targetSegment];
}

async function* readPairs(
  settings: PairSettings,
  files: { source: string; target: string }
): AsyncGenerator<SentencePair, void, undefined> {
  const log = createLogger('corpus').withFields({
    dataset: settings.dataset,
    split: settings.split,
  });

  const source = await openLines(files.source);
  let target: LineSource;
  try {
    target = await openLines(files.target);
  } catch (error) {
    await source.close();
    throw error;
  }

  let lineNumber = 0;
  let yielded = 0;
  let skipped = 0;

  try {
    while (true) {
      const [sourceNext, targetNext] = await Promise.all([source.next(), target.next()]);

      if (sourceNext.done || targetNext.done) {
        if (settings.strict && sourceNext.done !== targetNext.done) {
          const shorter = sourceNext.done ? source.path : target.path;
          throw new MisalignedCorpusError(
            `${shorter} ends after ${lineNumber} lines but its counterpart continues`,
            lineNumber + 1
          );
        }
        break;
      }

      lineNumber++;
      const texts = selectPair(settings, sourceNext.value, targetNext.value, lineNumber);
      if (!texts) {
        skipped++;
        continue;
      }

      const sourceTokens = tokenize(texts[0]);
      const targetTokens = tokenize(texts[1]);
      if (settings.eos !== undefined) {
        sourceTokens.push(settings.eos);
        targetTokens.push(settings.eos);
      }

      yielded++;
      yield [sourceTokens, targetTokens];
    }

    log.debug('Finished reading split', { lines: lineNumber, pairs: yielded, skipped });
  } finally {
    await Promise.all([source.close(), target.close()]);
  }
}

/**
 * Iterate over the sentence pairs of one split.
 *
 * The split name and dataset are validated when this function is called,
 * before any file is opened. The returned generator is single-use and
 * closes both files when iteration ends, fails, or is stopped early.
 *
 * @param split - "train", "dev" or "test"
 * @param path - Folder holding the extracted `iwslt{year}.{langpair}` directory
 * @throws {InvalidArgumentError} For an unknown split or malformed language pair
 * @throws {UnsupportedDatasetError} For an unregistered year/language pair
 *
 * @example
 * ```typescript
 * for await (const [src, tgt] of readIwslt('train', './data', { eos: '<eos>' })) {
 *   train(src, tgt);
 * }
 * ```
 */
export function readIwslt(
  split: string,
  path: string,
  options: ReadOptions = {}
): AsyncGenerator<SentencePair, void, undefined> {
  const checkedSplit = assertSplit(split);
  const { year = DEFAULT_YEAR, langpair = DEFAULT_LANGPAIR, eos, strict = false } = options;
  const files = splitFilePaths(checkedSplit, path, year, langpair);

  return readPairs(
    { split: checkedSplit, dataset: `${year}.${langpair}`, eos, strict },
    files
  );
}

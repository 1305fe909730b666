/**
 * Test helpers: temporary corpora, archives and fetch responses
 */

import { mkdtemp, mkdir, readdir, readlink, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, sep } from 'node:path';
import { gzipSync } from 'node:zlib';
import { create } from 'tar';

/** Source and target lines of one split file pair */
export interface SplitLines {
  source: string[];
  target: string[];
}

/** Lines for every split of a fixture corpus */
export interface FixtureCorpus {
  train: SplitLines;
  dev: SplitLines;
  test: SplitLines;
}

/**
 * Create an empty temporary directory
 */
export async function makeTempDir(prefix = 'iwslt-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Wrap sentences the way IWSLT dev/test files do
 */
export function xmlSplit(sentences: string[], setTag: 'srcset' | 'refset', lang: string): string[] {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<mteval>',
    `<${setTag} setid="iwslt2016-fixture" srclang="${lang}">`,
    '<doc docid="1" genre="lectures">',
    '<talkid>1</talkid>',
    ...sentences.map((s, i) => `<seg id="${i + 1}"> ${s} </seg>`),
    '</doc>',
    `</${setTag}>`,
    '</mteval>',
  ];
}

/**
 * A small de-en corpus: 3 train pairs, 2 dev pairs, 1 test pair
 */
export function sampleCorpus(): FixtureCorpus {
  return {
    train: {
      source: [
        '<url>http://www.ted.com/talks/fixture</url>',
        '<keywords>talks, fixture</keywords>',
        'Hallo Welt .',
        '  Wie geht es   dir ?',
        '<description>Eine Beschreibung</description>',
        'Danke .',
      ],
      target: [
        '<url>http://www.ted.com/talks/fixture</url>',
        '<keywords>talks, fixture</keywords>',
        'Hello world .',
        'How are you ?',
        '<description>A description</description>',
        'Thanks .',
      ],
    },
    dev: {
      source: xmlSplit(['Guten Morgen .', 'Gute Nacht .'], 'srcset', 'german'),
      target: xmlSplit(['Good morning .', 'Good night .'], 'refset', 'english'),
    },
    test: {
      source: xmlSplit(['Bis bald .'], 'srcset', 'german'),
      target: xmlSplit(['See you soon .'], 'refset', 'english'),
    },
  };
}

/** Split file prefixes of the 2016 releases */
function prefixes(langpair: string): Record<keyof FixtureCorpus, string> {
  return {
    train: `train.tags.${langpair}`,
    dev: `IWSLT16.TED.tst2013.${langpair}`,
    test: `IWSLT16.TED.tst2014.${langpair}`,
  };
}

/**
 * Relative paths and contents of a corpus as laid out inside the release
 * archive (`{langpair}/{prefix}.{lang}[.xml]`)
 */
export function corpusFiles(corpus: FixtureCorpus, langpair = 'de-en'): Record<string, string> {
  const [src, tgt] = langpair.split('-');
  const names = prefixes(langpair);
  const files: Record<string, string> = {};
  for (const split of ['train', 'dev', 'test'] as const) {
    const suffix = split === 'train' ? '' : '.xml';
    files[`${langpair}/${names[split]}.${src}${suffix}`] = corpus[split].source.join('\n') + '\n';
    files[`${langpair}/${names[split]}.${tgt}${suffix}`] = corpus[split].target.join('\n') + '\n';
  }
  return files;
}

/**
 * Write files below a root directory, creating parents
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = join(root, relPath);
    await mkdir(join(fullPath, '..'), { recursive: true });
    await writeFile(fullPath, content, 'utf-8');
  }
}

/**
 * Write an extracted corpus under `{root}/iwslt{year}.{langpair}/`
 */
export async function writeExtractedCorpus(
  root: string,
  corpus: FixtureCorpus = sampleCorpus(),
  year = '2016',
  langpair = 'de-en'
): Promise<void> {
  await writeFiles(join(root, `iwslt${year}.${langpair}`), corpusFiles(corpus, langpair));
}

/**
 * Build a gzipped tar archive of the given files
 */
export async function createArchive(archivePath: string, files: Record<string, string>): Promise<void> {
  const staging = await makeTempDir('iwslt-stage-');
  try {
    await writeFiles(staging, files);
    const topLevel = [...new Set(Object.keys(files).map((p) => p.split('/')[0] ?? p))];
    await create({ gzip: true, file: archivePath, cwd: staging, portable: true }, topLevel);
  } finally {
    await removeDir(staging);
  }
}

/** One member of a hand-built archive */
export interface RawEntry {
  path: string;
  content?: string;
  /** Regular file by default */
  type?: 'file' | 'symlink' | 'hardlink';
  linkpath?: string;
}

const TYPE_FLAGS: Record<NonNullable<RawEntry['type']>, string> = {
  file: '0',
  hardlink: '1',
  symlink: '2',
};

/**
 * Encode a single ustar header block
 */
function ustarHeader(entry: RawEntry, size: number): Buffer {
  const header = Buffer.alloc(512, 0);
  header.write(entry.path, 0, 100, 'utf8');
  header.write('0000644\0', 100, 8, 'ascii');
  header.write('0000000\0', 108, 8, 'ascii');
  header.write('0000000\0', 116, 8, 'ascii');
  header.write(`${size.toString(8).padStart(11, '0')}\0`, 124, 12, 'ascii');
  header.write('00000000000\0', 136, 12, 'ascii');
  header.write('        ', 148, 8, 'ascii');
  header.write(TYPE_FLAGS[entry.type ?? 'file'], 156, 1, 'ascii');
  if (entry.linkpath !== undefined) {
    header.write(entry.linkpath, 157, 100, 'utf8');
  }
  header.write('ustar\0', 257, 6, 'ascii');
  header.write('00', 263, 2, 'ascii');

  let checksum = 0;
  for (const byte of header) {
    checksum += byte;
  }
  header.write(`${checksum.toString(8).padStart(6, '0')}\0 `, 148, 8, 'ascii');
  return header;
}

/**
 * Build a gzipped tar archive byte-for-byte, keeping member paths and link
 * targets exactly as given (including `..` segments and absolute paths)
 */
export function rawTarGz(entries: RawEntry[]): Buffer {
  const blocks: Buffer[] = [];
  for (const entry of entries) {
    const body = Buffer.from(entry.content ?? '', 'utf8');
    blocks.push(ustarHeader(entry, body.length));
    const padded = Buffer.alloc(Math.ceil(body.length / 512) * 512, 0);
    body.copy(padded);
    blocks.push(padded);
  }
  blocks.push(Buffer.alloc(1024, 0));
  return gzipSync(Buffer.concat(blocks));
}

/**
 * A fetch Response stand-in that streams the given bytes
 */
export function mockResponse(
  bytes: Uint8Array,
  init: { status?: number; statusText?: string; contentLength?: boolean } = {}
): {
  ok: boolean;
  status: number;
  statusText: string;
  body: ReadableStream<Uint8Array> | null;
  headers: Headers;
} {
  const { status = 200, statusText = 'OK', contentLength = true } = init;
  const ok = status >= 200 && status < 300;
  return {
    ok,
    status,
    statusText,
    body: ok
      ? new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(bytes);
            controller.close();
          },
        })
      : null,
    headers: new Headers(contentLength ? { 'Content-Length': String(bytes.byteLength) } : {}),
  };
}

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Paths below `root` that this process holds open (Linux only)
 */
export async function openFilesUnder(root: string): Promise<string[]> {
  const prefix = `${await realpath(root)}${sep}`;
  const fds = await readdir('/proc/self/fd');
  // A descriptor can close between the listing and the readlink
  const targets = await Promise.all(
    fds.map((fd) => readlink(`/proc/self/fd/${fd}`).catch(() => null))
  );
  return targets.filter((t): t is string => t !== null && t.startsWith(prefix)).sort();
}

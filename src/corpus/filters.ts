/**
 * Line filters and tokenization for IWSLT files
 *
 * Train files interleave talk metadata (`<url>`, `<keywords>`, ...) with
 * transcript lines. Dev and test files wrap each sentence in a
 * `<seg id="N">` element on its own line.
 */

/** A line starting with `<` is talk metadata */
const METADATA_LINE = /^</;

/** Captures the content of a `<seg ...>...</seg>` line, line separators included */
const SEGMENT_LINE = /^<seg[^>]*>(.*)<\/seg>/s;

/**
 * Unicode whitespace as treated by corpus tokenizers: the ASCII separators
 * U+001C to U+001F and U+0085 count, the byte order mark U+FEFF does not.
 */
const WHITESPACE =
  '\\t\\n\\v\\f\\r\\x1c-\\x20\\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000';
const WHITESPACE_RUN = new RegExp(`[${WHITESPACE}]+`);
const EDGE_WHITESPACE = new RegExp(`^[${WHITESPACE}]+|[${WHITESPACE}]+$`, 'g');

/**
 * Check whether a train line is metadata rather than transcript text
 */
export function isMetadataLine(line: string): boolean {
  return METADATA_LINE.test(line);
}

/**
 * Extract the content of a `<seg>` line
 *
 * @returns The raw content between the tags, or null when the line is not a segment
 *
 * @example
 * ```typescript
 * extractSegment('<seg id="1"> Hello world </seg>'); // => ' Hello world '
 * extractSegment('<doc docid="535">');               // => null
 * ```
 */
export function extractSegment(line: string): string | null {
  const match = SEGMENT_LINE.exec(line);
  return match?.[1] ?? null;
}

/**
 * Trim and split on runs of whitespace
 *
 * @example
 * ```typescript
 * tokenize('  Wie geht es   dir ?'); // => ['Wie', 'geht', 'es', 'dir', '?']
 * ```
 */
export function tokenize(text: string): string[] {
  const trimmed = text.replace(EDGE_WHITESPACE, '');
  return trimmed === '' ? [] : trimmed.split(WHITESPACE_RUN);
}

/**
 * Text offset utilities
 *
 * Canonical tag offsets count Unicode code points. Sources report offsets
 * in other units (UTF-16 code units, UTF-8 bytes, or positions in an
 * HTML-escaped string); these helpers translate between them.
 */

/**
 * Number of Unicode code points in a string
 */
export function codepointLength(text: string): number {
  let length = 0;
  for (const _ of text) {
    length++;
  }
  return length;
}

/**
 * Slice a string by code point positions
 */
export function sliceCodepoints(text: string, start: number, end?: number): string {
  return Array.from(text).slice(start, end).join('');
}

/**
 * Number of UTF-8 bytes needed to encode a code point
 */
function utf8Width(codepoint: number): number {
  if (codepoint < 0x80) return 1;
  if (codepoint < 0x800) return 2;
  if (codepoint < 0x10000) return 3;
  return 4;
}

/**
 * Convert a UTF-16 code unit index into a code point index.
 *
 * @returns null when the index is out of range or splits a surrogate pair
 */
export function utf16ToCodepointIndex(text: string, index: number): number | null {
  if (!Number.isInteger(index) || index < 0 || index > text.length) {
    return null;
  }

  let units = 0;
  let codepoints = 0;
  for (const char of text) {
    if (units === index) {
      return codepoints;
    }
    units += char.length;
    codepoints++;
    if (units > index) {
      return null;
    }
  }

  return units === index ? codepoints : null;
}

/**
 * Convert a UTF-8 byte offset into a code point index.
 *
 * @returns null when the offset is out of range or falls inside a multi-byte code point
 */
export function utf8ByteToCodepointIndex(text: string, byteOffset: number): number | null {
  if (!Number.isInteger(byteOffset) || byteOffset < 0) {
    return null;
  }

  let bytes = 0;
  let codepoints = 0;
  for (const char of text) {
    if (bytes === byteOffset) {
      return codepoints;
    }
    bytes += utf8Width(char.codePointAt(0) ?? 0);
    codepoints++;
    if (bytes > byteOffset) {
      return null;
    }
  }

  return bytes === byteOffset ? codepoints : null;
}

/**
 * Convert a code point index into a UTF-8 byte offset
 */
export function codepointToUtf8ByteOffset(text: string, index: number): number {
  let bytes = 0;
  let codepoints = 0;
  for (const char of text) {
    if (codepoints >= index) break;
    bytes += utf8Width(char.codePointAt(0) ?? 0);
    codepoints++;
  }
  return bytes;
}

const ESCAPED_ENTITIES: ReadonlyArray<[string, string]> = [
  ['&amp;', '&'],
  ['&lt;', '<'],
  ['&gt;', '>'],
  ['&quot;', '"'],
];

/**
 * Result of unescaping text whose offsets were computed against the escaped form
 */
export interface UnescapedText {
  text: string;
  /** Map a code point index in the escaped text to one in the unescaped text */
  mapIndex(index: number): number;
}

/**
 * Unescape the basic HTML entities and keep an index map so offsets computed
 * against the escaped string can be re-based onto the unescaped one.
 * An index inside an entity maps to the start of the character it encodes.
 */
export function unescapeEntities(escaped: string): UnescapedText {
  const chars = Array.from(escaped);
  const map: number[] = [];
  let output = '';
  let outLength = 0;

  let i = 0;
  while (i < chars.length) {
    const entity = chars[i] === '&'
      ? ESCAPED_ENTITIES.find(([from]) => chars.slice(i, i + from.length).join('') === from)
      : undefined;

    if (entity) {
      const [from, to] = entity;
      for (let j = 0; j < from.length; j++) {
        map[i + j] = outLength;
      }
      output += to;
      outLength++;
      i += from.length;
    } else {
      map[i] = outLength;
      output += chars[i];
      outLength++;
      i++;
    }
  }
  map[chars.length] = outLength;

  return {
    text: output,
    mapIndex: (index: number) => {
      if (index <= 0) return 0;
      if (index >= chars.length) return outLength;
      return map[index] ?? outLength;
    },
  };
}

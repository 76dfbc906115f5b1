const utf8Decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `String.prototype.replace` for async replacers. Matches are resolved one
 * after the other, in document order.
 */
export async function replaceAsync(
  text: string,
  pattern: RegExp,
  replacer: (match: RegExpMatchArray) => Promise<string>
): Promise<string> {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  const globalPattern = new RegExp(pattern.source, flags);

  let result = '';
  let last = 0;
  for (const match of text.matchAll(globalPattern)) {
    const start = match.index ?? 0;
    result += text.slice(last, start);
    result += await replacer(match);
    last = start + match[0].length;
  }
  return result + text.slice(last);
}

// U+FFFD as it is stored in UTF-8 text.
const REPLACEMENT_CHARACTER_BYTES = Uint8Array.of(0xef, 0xbf, 0xbd);

/**
 * Decode UTF-8 bytes, dropping invalid sequences instead of failing. A U+FFFD
 * written in the source itself is kept: the bytes are split around it, and
 * only replacement characters the decoder produced are removed.
 */
export function decodeText(buffer: Uint8Array): string {
  const bytes = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const pieces: string[] = [];

  let start = 0;
  let at = bytes.indexOf(REPLACEMENT_CHARACTER_BYTES);
  while (at !== -1) {
    pieces.push(decodeDroppingInvalid(bytes.subarray(start, at)));
    start = at + REPLACEMENT_CHARACTER_BYTES.length;
    at = bytes.indexOf(REPLACEMENT_CHARACTER_BYTES, start);
  }
  pieces.push(decodeDroppingInvalid(bytes.subarray(start)));

  return pieces.join('\uFFFD');
}

function decodeDroppingInvalid(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes).replace(/\uFFFD/g, '');
}

export function leadingWhitespace(text: string): string {
  return text.slice(0, text.length - text.trimStart().length);
}

export function trailingWhitespace(text: string): string {
  return text.slice(text.trimEnd().length);
}

/**
 * Sniffer Utility Functions Module
 *
 * Text helpers shared by the scanner, the parser and the input layer.
 */

/**
 * Remove Byte Order Mark (BOM) from text
 *
 * @param text - Text potentially containing BOM
 * @returns Text without BOM
 */
export function removeBOM(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

/**
 * Join byte chunks into one array
 */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/**
 * Text up to and including the terminator of its `maxLines`th non-blank
 * line; shorter text is returned whole
 *
 * A quoted value spanning lines counts once per line, so a parse of the
 * result has at most `maxLines` rows.
 */
export function headLines(text: string, maxLines: number): string {
  let lines = 0;
  let lineHasContent = false;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code !== 0x0a && code !== 0x0d) {
      lineHasContent = true;
      continue;
    }
    if (!lineHasContent) continue;
    lines++;
    lineHasContent = false;
    if (lines >= maxLines) {
      const end = code === 0x0d && text.charCodeAt(i + 1) === 0x0a ? i + 2 : i + 1;
      return text.slice(0, end);
    }
  }
  return text;
}

/**
 * True when `value` is exactly one Unicode code point
 */
export function isSingleCodePoint(value: string): boolean {
  if (value.length === 0 || value.length > 2) return false;
  const codePoint = value.codePointAt(0);
  if (codePoint === undefined) return false;
  return String.fromCodePoint(codePoint) === value && !isLoneSurrogate(codePoint);
}

function isLoneSurrogate(codeUnit: number): boolean {
  return codeUnit >= 0xd800 && codeUnit <= 0xdfff;
}

/**
 * Offset of the first lone surrogate, or -1 for well-formed text
 */
export function findLoneSurrogate(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      return i;
    }
    if (unit >= 0xdc00 && unit <= 0xdfff) {
      return i;
    }
  }
  return -1;
}

/**
 * Code point of a single-code-point string, -1 for `null`
 *
 * Used to order dialect members; `null` sorts first.
 */
export function codePointOrder(value: string | null): number {
  if (value === null) return -1;
  return value.codePointAt(0) ?? -1;
}

/**
 * Render a dialect member for messages: control characters by name
 */
export function describeChar(value: string | null): string {
  if (value === null) return "none";
  switch (value) {
    case "\t":
      return "\\t";
    case " ":
      return "space";
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    default:
      return JSON.stringify(value);
  }
}

/**
 * Alphabet Scanner Module
 *
 * One pass over the text collects the handful of code points that could
 * plausibly act as delimiter, quote or escape, so the search never has to
 * consider every printable character.
 */

import { DEFAULT_CONFIG, DEFAULT_QUOTES, ESCAPE_BLOCKLIST } from "./constants";
import type { Alphabet, ScanOptions } from "./types";
import { codePointOrder, describeChar } from "./utils";

const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;
const OTHER_PUNCTUATION = /\p{Po}/u;
const WHITESPACE = /\s/u;

const DEFAULT_QUOTE_SET: ReadonlySet<string> = new Set(DEFAULT_QUOTES);

/**
 * Per code point facts gathered during the scan
 */
interface CharStats {
  total: number;
  outsideQuotes: number;
  opensToken: number;
  closesToken: number;
  /** Appears an odd number of times on some line */
  asymmetric: boolean;
}

/**
 * Scan text for candidate dialect characters
 *
 * @param text - Decoded text
 * @param options - Candidate cap, optional delimiter restriction, config
 * @returns Frequency-ordered candidate sets, each ending in `null`, and the
 * raw frequencies; all sets are empty for empty text
 *
 * @example
 * ```typescript
 * const { delimiters, quotes } = scanAlphabet('a;b\n1;"x, y"\n');
 * // delimiters: [";", null]   (the comma only occurs inside quotes)
 * // quotes:     ['"', null]
 * ```
 */
export function scanAlphabet(text: string, options: ScanOptions = {}): Alphabet {
  const config = options.config ?? DEFAULT_CONFIG;
  const maxCandidates = options.maxCandidates ?? config.maxDelimiterCandidates;

  if (text.length === 0) {
    return { delimiters: [], quotes: [], escapes: [], frequencies: new Map() };
  }

  const stats = new Map<string, CharStats>();
  // prev -> following char -> count, only for escape-like prev chars
  const followers = new Map<string, Map<string, number>>();
  let lineCounts = new Map<string, number>();
  let insideQuotes = false;
  let prev: string | null = null;

  const endLine = (): void => {
    for (const [char, count] of lineCounts) {
      const entry = stats.get(char);
      if (entry !== undefined && count % 2 === 1) entry.asymmetric = true;
    }
    lineCounts = new Map();
  };

  const chars = Array.from(text);
  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];
    if (char === undefined) break;

    if (char === "\n" || char === "\r") {
      endLine();
      prev = null;
      continue;
    }

    let entry = stats.get(char);
    if (entry === undefined) {
      entry = { total: 0, outsideQuotes: 0, opensToken: 0, closesToken: 0, asymmetric: false };
      stats.set(char, entry);
    }
    entry.total++;
    lineCounts.set(char, (lineCounts.get(char) ?? 0) + 1);

    if (char === '"') {
      insideQuotes = !insideQuotes;
    } else if (!insideQuotes) {
      entry.outsideQuotes++;
    }

    const next = chars[i + 1];
    if (isBoundary(prev, char) && next !== undefined && next !== "\n" && next !== "\r") {
      entry.opensToken++;
    }
    if (prev !== null && isBoundary(next ?? null, char)) {
      entry.closesToken++;
    }

    if (prev !== null && isEscapeLike(prev)) {
      let following = followers.get(prev);
      if (following === undefined) {
        following = new Map();
        followers.set(prev, following);
      }
      following.set(char, (following.get(char) ?? 0) + 1);
    }

    prev = char;
  }
  endLine();

  const frequencies = new Map<string, number>();
  for (const [char, entry] of stats) frequencies.set(char, entry.total);

  const delimiters =
    options.delimiters !== undefined
      ? restrictDelimiters(options.delimiters, frequencies, options.onWarning)
      : rankByFrequency(
          Array.from(stats.entries())
            .filter(([char, entry]) => isDelimiterLike(char) && entry.outsideQuotes > 0)
            .map(([char]) => char),
          frequencies
        ).slice(0, maxCandidates);

  const defaultQuotes = DEFAULT_QUOTES.filter((quote) => frequencies.has(quote));
  const symmetricQuotes = rankByFrequency(
    Array.from(stats.entries())
      .filter(([char, entry]) => isSymmetricQuote(char, entry))
      .map(([char]) => char),
    frequencies
  );
  const quotes = [...defaultQuotes, ...symmetricQuotes].slice(0, config.maxQuoteCandidates);

  const escapeCounts = new Map<string, number>();
  for (const [char, following] of followers) {
    if (quotes.includes(char)) continue;
    let count = 0;
    for (const quote of quotes) count += following.get(quote) ?? 0;
    if (count > 0) escapeCounts.set(char, count);
  }
  const escapes = rankByFrequency(Array.from(escapeCounts.keys()), escapeCounts).slice(
    0,
    config.maxEscapeCandidates
  );

  return {
    delimiters: [...delimiters, null],
    quotes: [...quotes, null],
    escapes: [...escapes, null],
    frequencies,
  };
}

/**
 * Sort by frequency descending, then code point ascending
 */
function rankByFrequency(chars: string[], frequencies: ReadonlyMap<string, number>): string[] {
  return chars.sort(
    (a, b) =>
      (frequencies.get(b) ?? 0) - (frequencies.get(a) ?? 0) || codePointOrder(a) - codePointOrder(b)
  );
}

function restrictDelimiters(
  restriction: readonly string[],
  frequencies: ReadonlyMap<string, number>,
  onWarning: ((warning: string) => void) | undefined
): string[] {
  const present: string[] = [];
  for (const char of new Set(restriction)) {
    if (frequencies.has(char)) {
      present.push(char);
    } else {
      onWarning?.(`delimiter ${describeChar(char)} does not occur in the text and was ignored`);
    }
  }
  return rankByFrequency(present, frequencies);
}

function isDelimiterLike(char: string): boolean {
  return !LETTER_OR_DIGIT.test(char) && !DEFAULT_QUOTE_SET.has(char);
}

function isEscapeLike(char: string): boolean {
  return OTHER_PUNCTUATION.test(char) && !ESCAPE_BLOCKLIST.has(char);
}

function isSymmetricQuote(char: string, entry: CharStats): boolean {
  return (
    !DEFAULT_QUOTE_SET.has(char) &&
    !LETTER_OR_DIGIT.test(char) &&
    !WHITESPACE.test(char) &&
    entry.total >= 2 &&
    !entry.asymmetric &&
    entry.opensToken > 0 &&
    entry.closesToken > 0
  );
}

/**
 * True when `neighbour` separates a token from `char`: a line edge,
 * whitespace, or a different non-alphanumeric character
 */
function isBoundary(neighbour: string | null, char: string): boolean {
  if (neighbour === null || neighbour === "\n" || neighbour === "\r") return true;
  if (neighbour === char) return false;
  return !LETTER_OR_DIGIT.test(neighbour);
}

/**
 * High-level sniffing
 *
 * Decodes raw input, runs the dialect search and describes the winning
 * parse: header, row and column counts, and how clearly it won.
 */

import { Effect, Either } from "effect";
import { Gunzip, gunzipSync } from "fflate";
import { CompressionError, InvalidInputError } from "../errors";
import {
  CONFIDENCE_MARGIN,
  DEFAULT_CONFIG,
  DEFAULT_MAX_ROW_SAMPLE,
  GZIP_MAGIC,
  LINE_TERMINATORS,
} from "./constants";
import { searchDialect } from "./detection";
import { detectHeader } from "./header";
import { modeRowLength, rowLengthHistogram } from "./scoring";
import { trialParse } from "./state-machine";
import { createClassifier } from "./type-detection";
import type { CandidateEvaluation, SniffOptions, SniffResult } from "./types";
import { concatBytes, removeBOM } from "./utils";

export interface DecodeOptions {
  /**
   * The bytes are a prefix of a longer input. A cut gzip stream or UTF-8
   * sequence at the end is tolerated and the last, possibly partial, line
   * is dropped.
   */
  truncated?: boolean;
}

// =============================================================================
// DECODING
// =============================================================================

/**
 * True when the bytes start with the gzip magic number
 */
export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}

function inflate(bytes: Uint8Array, truncated: boolean): Uint8Array {
  try {
    if (!truncated) return gunzipSync(bytes);

    const chunks: Uint8Array[] = [];
    const gunzip = new Gunzip((chunk) => {
      chunks.push(chunk);
    });
    gunzip.push(bytes, false);
    return concatBytes(chunks);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", error, bytes.length);
  }
}

/**
 * Cut after the last line terminator; text without one is kept whole
 */
function dropPartialLine(text: string): string {
  const end = Math.max(...LINE_TERMINATORS.map((terminator) => text.lastIndexOf(terminator)));
  return end < 0 ? text : text.slice(0, end + 1);
}

/**
 * Turn raw input into text for detection
 *
 * Strings pass through. Bytes starting with the gzip magic are inflated,
 * then decoded as strict UTF-8. A leading BOM is removed either way.
 *
 * @throws {CompressionError} When gzip data is corrupt
 * @throws {InvalidInputError} When the bytes are not valid UTF-8
 *
 * @example
 * ```typescript
 * decodeInput(new TextEncoder().encode("\uFEFFa,b\n1,2\n")); // "a,b\n1,2\n"
 * ```
 */
export function decodeInput(input: string | Uint8Array, options: DecodeOptions = {}): string {
  const truncated = options.truncated ?? false;
  if (typeof input === "string") {
    return removeBOM(truncated ? dropPartialLine(input) : input);
  }

  const bytes = isGzip(input) ? inflate(input, truncated) : input;

  let text: string;
  try {
    // stream mode holds back an incomplete sequence at the end instead of failing
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes, { stream: truncated });
  } catch (error) {
    throw new InvalidInputError(
      "Input is not valid UTF-8",
      undefined,
      error instanceof Error ? error.message : String(error)
    );
  }

  return removeBOM(truncated ? dropPartialLine(text) : text);
}

// =============================================================================
// SNIFFING
// =============================================================================

/**
 * Winning margin over the best candidate with a different delimiter,
 * scaled into [0, 1]
 */
function confidence(winner: CandidateEvaluation, ranked: readonly CandidateEvaluation[]): number {
  const runnerUp = ranked.find(
    (evaluation) => evaluation.score.dialect.delimiter !== winner.score.dialect.delimiter
  );
  if (runnerUp === undefined) return 1;

  const margin = winner.score.combinedScore - runnerUp.score.combinedScore;
  return Math.min(1, Math.max(0, margin / CONFIDENCE_MARGIN));
}

/**
 * Detect the dialect of raw input and describe the winning parse
 *
 * @param input - Text, UTF-8 bytes or gzip-compressed UTF-8 bytes
 * @param options - Same options as detectDialect
 * @returns Dialect, header flag, data row count, column count, score and
 * confidence
 * @throws {NoDialectFoundError} When nothing plausible was found, the input
 * was empty or the timeout elapsed
 * @throws {InvalidInputError} When the input is not well-formed text
 * @throws {ValidationError} When options are invalid
 *
 * @example
 * ```typescript
 * const result = sniff("name;price\nlamp;12,50\nchair;40\n");
 * // result.dialect.delimiter === ";", result.hasHeader === true, result.rows === 2
 * ```
 */
export function sniff(input: string | Uint8Array, options: SniffOptions = {}): SniffResult {
  const text = decodeInput(input);

  const search = Effect.runSync(Effect.either(searchDialect(text, options)));
  if (Either.isLeft(search)) {
    throw search.left;
  }

  const { winner, ranked, sample } = search.right;
  const config = options.config ?? DEFAULT_CONFIG;
  const table = trialParse(sample, winner.score.dialect, {
    maxRows: options.maxRowSample ?? DEFAULT_MAX_ROW_SAMPLE,
    classify: createClassifier(config.typePatterns),
  });
  const hasHeader = detectHeader(table);

  return {
    dialect: winner.score.dialect,
    hasHeader,
    rows: hasHeader ? table.rows.length - 1 : table.rows.length,
    columns: modeRowLength(rowLengthHistogram(table)),
    score: winner.score,
    confidence: confidence(winner, ranked),
  };
}

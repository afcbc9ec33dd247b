/**
 * @module sniffer
 * @description Dialect detection for delimited text
 *
 * Finds the delimiter, quote and escape character of CSV-like text by
 * trial-parsing every plausible candidate and keeping the one whose parse
 * looks most like a table.
 *
 * Features:
 * - Candidate alphabets collected in one pass over the text
 * - Total trial parser that never rejects a dialect
 * - Cell typing through an ordered, versioned rule table
 * - Deterministic ranking with an explicit tie-break
 * - Sequential and Effect-based concurrent search with identical results
 *
 * @example Detecting a dialect
 * ```typescript
 * import { Either } from 'effect';
 * import { detectDialect, formatDialect } from './sniffer';
 *
 * const result = detectDialect('id;name\n1;"Smith; J."\n2;Jones\n');
 * if (Either.isRight(result)) console.log(formatDialect(result.right));
 * ```
 *
 * @example Sniffing raw bytes
 * ```typescript
 * import { sniff } from './sniffer';
 *
 * const { dialect, hasHeader, columns } = sniff(bytes);
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type {
  Alphabet,
  CandidateEvaluation,
  CandidateScore,
  Cell,
  CellClassifier,
  CellType,
  ColumnTypeProfile,
  DetectOptions,
  DetectorConfig,
  Dialect,
  EffectDetectOptions,
  Row,
  RowLengthHistogram,
  ScanOptions,
  SniffOptions,
  SniffResult,
  SplitProfile,
  Table,
  TrialParseOptions,
  TypePattern,
} from "./types";

export { TrialParseState } from "./types";

export type { DecodeOptions } from "./sniff";
export type { SearchResult } from "./detection";

// =============================================================================
// RE-EXPORTS - DIALECTS AND CONFIGURATION
// =============================================================================

export {
  compareDialects,
  createDialect,
  dialectEquals,
  formatDialect,
  NO_DELIMITER,
} from "./dialect";

export {
  COMMON_DELIMITERS,
  CONFIDENCE_MARGIN,
  DEFAULT_CONFIG,
  DEFAULT_MAX_ROW_SAMPLE,
  DEFAULT_QUOTES,
  DEFAULT_TYPE_PATTERNS,
  DEGENERATE_SCORE,
  MAX_DETECTION_BYTES,
  TYPE_PATTERNS_VERSION,
} from "./constants";

export { createConfig, validateConfig, validateDetectOptions } from "./validation";

// =============================================================================
// RE-EXPORTS - PIPELINE STAGES
// =============================================================================

export { scanAlphabet } from "./alphabet";

export { countCells, trialParse } from "./state-machine";

export { classifyCell, createClassifier } from "./type-detection";

export {
  columnScore,
  columnTypeProfile,
  modeRowLength,
  patternScore,
  rowLengthHistogram,
  scoreTable,
  splitProfile,
  typeScore,
} from "./scoring";

export { detectHeader } from "./header";

// =============================================================================
// RE-EXPORTS - DETECTION
// =============================================================================

export {
  compareTiedCandidates,
  defaultOnWarning,
  detectDialect,
  detectDialectEffect,
  enumerateCandidates,
  evaluateCandidate,
  rankCandidates,
  searchDialect,
  selectBest,
} from "./detection";

export { decodeInput, isGzip, sniff } from "./sniff";

/**
 * Dialect Detection Constants
 *
 * Alphabets, scoring constants and the versioned cell type rule table.
 */

import type { DetectorConfig, TypePattern } from "./types";

// =============================================================================
// ALPHABETS
// =============================================================================

/**
 * Quote characters considered whenever they occur in the text
 */
export const DEFAULT_QUOTES = ['"', "'"] as const;

/**
 * Delimiters that only appear inside a value when it is quoted
 */
export const COMMON_DELIMITERS = [",", ";", "\t", "|"] as const;

/**
 * Record separators recognised by the trial parser
 */
export const LINE_TERMINATORS = ["\n", "\r"] as const;

/**
 * Sentence punctuation that is never an escape character even when it
 * precedes a quote
 */
export const ESCAPE_BLOCKLIST = new Set(["!", "?", '"', "'", ",", ";", ":", ".", "%", "*", "&", "#"]);

/**
 * Gzip magic bytes
 */
export const GZIP_MAGIC = [0x1f, 0x8b] as const;

// =============================================================================
// LIMITS
// =============================================================================

/**
 * Rows parsed per candidate unless the caller says otherwise
 */
export const DEFAULT_MAX_ROW_SAMPLE = 1000;

/**
 * Widest run of neighbouring cells rejoined when looking for a cut value
 */
export const MAX_JOINED_CELLS = 4;

/**
 * Bytes read from a file for detection (1 MiB)
 */
export const MAX_DETECTION_BYTES = 1_048_576;

// =============================================================================
// SCORING
// =============================================================================

/**
 * Score of a parse with no rows or no cells; below anything else the
 * scorer can produce
 */
export const DEGENERATE_SCORE = -1;

/**
 * Score margin over the runner-up that counts as full confidence
 */
export const CONFIDENCE_MARGIN = 0.25;

/**
 * Bumped whenever a rule is added, removed or widened
 */
export const TYPE_PATTERNS_VERSION = 1;

/**
 * Ordered cell type rules, first match wins. Empty and text are handled by
 * the classifier itself.
 */
export const DEFAULT_TYPE_PATTERNS: readonly TypePattern[] = Object.freeze([
  {
    name: "integer",
    type: "number",
    pattern: /^[+-]?(?:\d+|\d{1,3}(?:,\d{3})+|\d{1,3}(?:\.\d{3})+)$/,
  },
  {
    name: "float",
    type: "number",
    pattern: /^[+-]?(?:\d+(?:\.\d*|,\d+)?|[.,]\d+)(?:[eE][+-]?\d+)?%?$/,
  },
  {
    name: "grouped-float",
    type: "number",
    pattern: /^[+-]?\d{1,3}(?:,\d{3})+\.\d+$/,
  },
  {
    name: "iso-date",
    type: "date",
    pattern: /^\d{4}([-/.])\d{1,2}\1\d{1,2}$/,
  },
  {
    name: "day-month-year",
    type: "date",
    pattern: /^\d{1,2}([-/.])\d{1,2}\1\d{2,4}$/,
  },
  {
    name: "iso-datetime",
    type: "date",
    pattern: /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/,
  },
  {
    name: "clock-time",
    type: "date",
    pattern: /^\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s?[AaPp][Mm])?$/,
  },
  {
    name: "month-name-date",
    type: "date",
    pattern: /^\d{1,2}[ -](?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?[ -]\d{2,4}$/i,
  },
  {
    name: "url",
    type: "structured",
    pattern: /^(?:https?|ftp):\/\/[^\s/$.?#][^\s]*$/i,
  },
  {
    name: "www-host",
    type: "structured",
    pattern: /^www\.[^\s.]+\.\S+$/i,
  },
  {
    name: "email",
    type: "structured",
    pattern: /^[\w.+-]+@[\w-]+(?:\.[\w-]+)+$/,
  },
] satisfies TypePattern[]);

/**
 * Default detector configuration
 *
 * Pattern and type sub-scores are weighted equally. See DESIGN.md for how
 * the remaining constants were calibrated.
 */
export const DEFAULT_CONFIG: DetectorConfig = Object.freeze({
  maxDelimiterCandidates: 8,
  maxQuoteCandidates: 3,
  maxEscapeCandidates: 2,
  patternWeight: 0.5,
  typeWeight: 0.5,
  lengthPenalty: 0.1,
  mixPenalty: 0.5,
  cutPenalty: 1,
  fragmentPenalty: 0.5,
  textWeight: 0.5,
  neutralPatternScore: 0.5,
  tieEpsilon: 1e-9,
  minimumScore: DEGENERATE_SCORE,
  typePatterns: DEFAULT_TYPE_PATTERNS,
});

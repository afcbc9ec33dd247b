/**
 * Dialect Detection Type Definitions
 *
 * All types and interfaces for the sniffer module: dialects, trial parse
 * tables, type profiles, scores and detection options.
 */

// =============================================================================
// DIALECT
// =============================================================================

/**
 * Structural dialect of delimited text
 *
 * Every non-null member is a single Unicode code point. `null` means the
 * dialect does not use that feature.
 */
export interface Dialect {
  readonly delimiter: string | null;
  readonly quote: string | null;
  readonly escape: string | null;
}

// =============================================================================
// TRIAL PARSE
// =============================================================================

/**
 * Semantic type of a single cell
 */
export type CellType = "empty" | "number" | "date" | "structured" | "text";

/**
 * Classifier signature shared by the parser, scorer and header detector
 */
export type CellClassifier = (text: string) => CellType;

/**
 * One parsed cell; `type` is computed on first access
 */
export interface Cell {
  readonly text: string;
  /** Opened by the quote character */
  readonly quoted: boolean;
  readonly type: CellType;
}

export type Row = readonly Cell[];

/**
 * Result of a trial parse under one dialect
 */
export interface Table {
  readonly dialect: Dialect;
  readonly rows: readonly Row[];
  /** Fields opened by the quote character */
  readonly quotedFields: number;
  /** Code points taken literally because of the escape character */
  readonly escapedChars: number;
  /** True when the row cap stopped the parse early */
  readonly truncated: boolean;
}

/**
 * Parser state for the trial parse state machine
 */
export enum TrialParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

export interface TrialParseOptions {
  /** Stop after this many rows */
  maxRows?: number;
  /** Classifier bound into every cell */
  classify?: CellClassifier;
}

// =============================================================================
// SCORING
// =============================================================================

/**
 * Row length → number of rows with that length
 */
export type RowLengthHistogram = Map<number, number>;

/**
 * Per-column type distribution over the rows of the mode length
 */
export interface ColumnTypeProfile {
  readonly rowLength: number;
  /** Rows that contributed to the profile */
  readonly rows: number;
  readonly headerExcluded: boolean;
  readonly columns: readonly ReadonlyMap<CellType, number>[];
}

/**
 * How a parse split the values of its profiled rows
 */
export interface SplitProfile {
  /** Delimiter positions between cells */
  readonly boundaries: number;
  /** Boundaries falling inside a number, date or structured value */
  readonly cuts: number;
  readonly cells: number;
  /** Unquoted text cells that still contain a common delimiter */
  readonly fragments: number;
}

export interface CandidateScore {
  readonly dialect: Dialect;
  readonly patternScore: number;
  readonly typeScore: number;
  readonly combinedScore: number;
}

/**
 * One ordered rule of the cell classifier
 */
export interface TypePattern {
  readonly name: string;
  readonly type: Exclude<CellType, "empty" | "text">;
  readonly pattern: RegExp;
}

/**
 * Immutable detector configuration
 */
export interface DetectorConfig {
  readonly maxDelimiterCandidates: number;
  readonly maxQuoteCandidates: number;
  readonly maxEscapeCandidates: number;
  readonly patternWeight: number;
  readonly typeWeight: number;
  readonly lengthPenalty: number;
  readonly mixPenalty: number;
  /** Subtracted for the share of field boundaries that cut a typed value */
  readonly cutPenalty: number;
  /** Subtracted for the share of cells still holding a common delimiter */
  readonly fragmentPenalty: number;
  readonly textWeight: number;
  readonly neutralPatternScore: number;
  readonly tieEpsilon: number;
  readonly minimumScore: number;
  readonly typePatterns: readonly TypePattern[];
}

// =============================================================================
// ALPHABET
// =============================================================================

export interface Alphabet {
  readonly delimiters: readonly (string | null)[];
  readonly quotes: readonly (string | null)[];
  readonly escapes: readonly (string | null)[];
  /** Total count of every scanned code point except line terminators */
  readonly frequencies: ReadonlyMap<string, number>;
}

export interface ScanOptions {
  maxCandidates?: number;
  /** Replaces the delimiter alphabet */
  delimiters?: readonly string[];
  config?: DetectorConfig;
  onWarning?: (warning: string) => void;
}

// =============================================================================
// DETECTION
// =============================================================================

export interface DetectOptions {
  /** Restrict delimiter candidates to these characters */
  delimiters?: readonly string[];
  /** Row cap for each trial parse */
  maxRowSample?: number;
  /** Overall budget in milliseconds, checked between candidates */
  timeout?: number;
  /** Prefer dialects without (unnecessary) quoting on ties */
  preferNoQuote?: boolean;
  config?: DetectorConfig;
  onWarning?: (warning: string) => void;
}

export interface EffectDetectOptions extends DetectOptions {
  /** Candidates evaluated at once */
  concurrency?: number | "unbounded";
}

/**
 * Score of one candidate plus the facts the tie-break needs
 */
export interface CandidateEvaluation {
  readonly score: CandidateScore;
  readonly quotedFields: number;
  readonly escapedChars: number;
  readonly delimiterFrequency: number;
  readonly rows: number;
}

export type SniffOptions = DetectOptions;

export interface SniffResult {
  dialect: Dialect;
  hasHeader: boolean;
  /** Data rows in the sample, header excluded */
  rows: number;
  /** Mode row length of the winning parse */
  columns: number;
  score: CandidateScore;
  /** Winning margin over the runner-up mapped into [0, 1] */
  confidence: number;
}

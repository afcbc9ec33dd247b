/**
 * Consistency Scoring Module
 *
 * Ranks trial parses by how much they look like real tabular data:
 * - pattern score: how concentrated the row lengths are
 * - type score: how uniform each column's cell types are, less penalties
 *   for delimiters that cut typed values apart or left fields unsplit
 *
 * Both are combined with the configured weights into one finite number.
 * Parses with no rows or no cells get DEGENERATE_SCORE, the minimum.
 */

import {
  COMMON_DELIMITERS,
  DEFAULT_CONFIG,
  DEGENERATE_SCORE,
  MAX_JOINED_CELLS,
} from "./constants";
import { detectHeader } from "./header";
import { countCells } from "./state-machine";
import { createClassifier } from "./type-detection";
import type {
  CandidateScore,
  CellClassifier,
  CellType,
  ColumnTypeProfile,
  DetectorConfig,
  Row,
  RowLengthHistogram,
  SplitProfile,
  Table,
} from "./types";

/**
 * Order in which equally frequent types compete for dominance
 */
const DOMINANCE_ORDER: readonly CellType[] = ["number", "date", "structured", "text"];

const STOPS: ReadonlySet<string> = new Set<string>(COMMON_DELIMITERS);
const WHITESPACE = /\s/u;

/**
 * Count rows by length
 */
export function rowLengthHistogram(table: Table): RowLengthHistogram {
  const histogram: RowLengthHistogram = new Map();
  for (const row of table.rows) {
    histogram.set(row.length, (histogram.get(row.length) ?? 0) + 1);
  }
  return histogram;
}

/**
 * Most frequent row length; the larger length wins a tie. 0 when empty.
 */
export function modeRowLength(histogram: RowLengthHistogram): number {
  let mode = 0;
  let best = 0;
  for (const [length, count] of histogram) {
    if (count > best || (count === best && length > mode)) {
      mode = length;
      best = count;
    }
  }
  return mode;
}

/**
 * Rows of the mode length, without a detected header
 */
interface ProfiledRows {
  readonly rowLength: number;
  readonly headerExcluded: boolean;
  readonly rows: readonly Row[];
}

function profiledRows(table: Table): ProfiledRows {
  const rowLength = modeRowLength(rowLengthHistogram(table));
  const first = table.rows[0];
  const headerExcluded = first !== undefined && first.length === rowLength && detectHeader(table);
  const rows = table.rows.filter(
    (row, index) => row.length === rowLength && !(index === 0 && headerExcluded)
  );
  return { rowLength, headerExcluded, rows };
}

/**
 * Type distribution per column over the rows of the mode length
 *
 * The first row is left out when it is a detected header.
 */
export function columnTypeProfile(table: Table): ColumnTypeProfile {
  const { rowLength, headerExcluded, rows } = profiledRows(table);
  const columns = Array.from({ length: rowLength }, () => new Map<CellType, number>());

  for (const row of rows) {
    row.forEach((cell, column) => {
      const counts = columns[column];
      if (counts === undefined) return;
      counts.set(cell.type, (counts.get(cell.type) ?? 0) + 1);
    });
  }

  return { rowLength, rows: rows.length, headerExcluded, columns };
}

/**
 * Count the boundaries and cells of the profiled rows that show the
 * delimiter splitting values apart
 *
 * A boundary is a cut when rejoining the value pieces on either side of it
 * (up to MAX_JOINED_CELLS cells, each cell trimmed at whitespace and at the
 * other delimiters) yields a number, date or structured value. A comma that
 * rejoins into a number is not a cut: `3,12` is two integers as often as it
 * is a decimal. A fragment is an unquoted text cell still holding one of the
 * COMMON_DELIMITERS.
 *
 * @param separators - Other candidate delimiters of the text
 */
export function splitProfile(
  table: Table,
  config: DetectorConfig = DEFAULT_CONFIG,
  separators: readonly string[] = []
): SplitProfile {
  const { rowLength, rows } = profiledRows(table);
  const { delimiter } = table.dialect;

  const isStop = (char: string): boolean =>
    char !== delimiter && (STOPS.has(char) || separators.includes(char) || WHITESPACE.test(char));
  const classify = createClassifier(config.typePatterns);

  let cuts = 0;
  let fragments = 0;
  for (const row of rows) {
    if (delimiter !== null) {
      cuts += countCuts(row, delimiter, isStop, classify);
    }
    for (const cell of row) {
      if (!cell.quoted && cell.type === "text" && holdsCommonDelimiter(cell.text, delimiter)) {
        fragments++;
      }
    }
  }

  return {
    boundaries: rows.length * Math.max(0, rowLength - 1),
    cuts,
    cells: rows.length * rowLength,
    fragments,
  };
}

/**
 * Row-length regularity
 *
 * `maxBucket / rows - (distinctLengths - 1) * lengthPenalty`, floored at -1.
 * Fewer than two rows cannot show regularity and get the neutral score.
 */
export function patternScore(table: Table, config: DetectorConfig = DEFAULT_CONFIG): number {
  const total = table.rows.length;
  if (total === 0) return DEGENERATE_SCORE;
  if (total < 2) return config.neutralPatternScore;

  const histogram = rowLengthHistogram(table);
  let maxBucket = 0;
  for (const count of histogram.values()) {
    maxBucket = Math.max(maxBucket, count);
  }

  const score = maxBucket / total - (histogram.size - 1) * config.lengthPenalty;
  return Math.max(DEGENERATE_SCORE, score);
}

/**
 * Score one column of a profile
 *
 * Dominance of the most frequent non-empty type, discounted for text, minus
 * the mix penalty when numbers and text share the column.
 */
export function columnScore(
  counts: ReadonlyMap<CellType, number>,
  config: DetectorConfig = DEFAULT_CONFIG
): number {
  let nonEmpty = 0;
  let dominantCount = 0;
  let dominant: CellType | undefined;

  for (const type of DOMINANCE_ORDER) {
    const count = counts.get(type) ?? 0;
    nonEmpty += count;
    if (count > dominantCount) {
      dominantCount = count;
      dominant = type;
    }
  }

  if (nonEmpty === 0 || dominant === undefined) return 0;

  const weight = dominant === "text" ? config.textWeight : 1;
  const mixed = (counts.get("number") ?? 0) > 0 && (counts.get("text") ?? 0) > 0;
  return (dominantCount / nonEmpty) * weight - (mixed ? config.mixPenalty : 0);
}

/**
 * Per-column type regularity
 *
 * Mean column score, so a wider table of the same per-column quality ranks
 * level with a narrower one, less `cutPenalty` times the share of cut
 * boundaries and `fragmentPenalty` times the share of fragment cells.
 * Floored at DEGENERATE_SCORE.
 */
export function typeScore(
  table: Table,
  config: DetectorConfig = DEFAULT_CONFIG,
  separators: readonly string[] = []
): number {
  if (table.rows.length === 0 || countCells(table) === 0) return DEGENERATE_SCORE;

  const profile = columnTypeProfile(table);
  const width = profile.rowLength;
  if (width === 0) return 0;

  let sum = 0;
  for (const counts of profile.columns) {
    sum += columnScore(counts, config);
  }

  const split = splitProfile(table, config, separators);
  const cutShare = split.boundaries === 0 ? 0 : split.cuts / split.boundaries;
  const fragmentShare = split.cells === 0 ? 0 : split.fragments / split.cells;
  const score =
    sum / width - config.cutPenalty * cutShare - config.fragmentPenalty * fragmentShare;
  return Math.max(DEGENERATE_SCORE, score);
}

/**
 * Score a trial parse
 *
 * @param table - Result of trialParse
 * @param config - Weights and penalties (defaults to DEFAULT_CONFIG)
 * @param separators - Other candidate delimiters, which end a value at a
 * cell edge when looking for cuts
 * @returns Sub-scores and the combined score, always finite and never below
 * DEGENERATE_SCORE
 */
export function scoreTable(
  table: Table,
  config: DetectorConfig = DEFAULT_CONFIG,
  separators: readonly string[] = []
): CandidateScore {
  if (table.rows.length === 0 || countCells(table) === 0) {
    return {
      dialect: table.dialect,
      patternScore: DEGENERATE_SCORE,
      typeScore: DEGENERATE_SCORE,
      combinedScore: DEGENERATE_SCORE,
    };
  }

  const pattern = patternScore(table, config);
  const types = typeScore(table, config, separators);
  const weightSum = config.patternWeight + config.typeWeight;
  const combined = (config.patternWeight * pattern + config.typeWeight * types) / weightSum;

  return {
    dialect: table.dialect,
    patternScore: pattern,
    typeScore: types,
    combinedScore: combined,
  };
}

// =============================================================================
// CUTS
// =============================================================================

/**
 * Number of boundaries in a row that fall inside a typed value
 */
function countCuts(
  row: Row,
  delimiter: string,
  isStop: (char: string) => boolean,
  classify: CellClassifier
): number {
  const cut = new Array<boolean>(Math.max(0, row.length - 1)).fill(false);

  for (let start = 0; start < row.length - 1; start++) {
    const first = row[start];
    if (first === undefined || first.quoted) continue;
    const head = trailingValue(first.text, isStop);
    if (head.length === 0) continue;

    let joined = head;
    for (let end = start + 1; end < row.length && end - start < MAX_JOINED_CELLS; end++) {
      const cell = row[end];
      if (cell === undefined || cell.quoted) break;
      const tail = leadingValue(cell.text, isStop);
      if (tail.length === 0) break;

      joined = `${joined}${delimiter}${tail}`;
      // two trimmed edges alone tend to rejoin into a number by accident
      const holdsWholeCell =
        end - start > 1 || head.length === first.text.length || tail.length === cell.text.length;
      if (holdsWholeCell && isCutValue(joined, delimiter, classify)) {
        cut.fill(true, start, end);
      }
      if (tail.length < cell.text.length) break;
    }
  }

  return cut.filter(Boolean).length;
}

function isCutValue(value: string, delimiter: string, classify: CellClassifier): boolean {
  const type = classify(value);
  if (type === "text" || type === "empty") return false;
  return !(delimiter === "," && type === "number");
}

/**
 * The part of a cell after its last stop character
 */
function trailingValue(text: string, isStop: (char: string) => boolean): string {
  let start = 0;
  for (let i = 0; i < text.length; ) {
    const char = codePointAt(text, i);
    i += char.length;
    if (isStop(char)) start = i;
  }
  return text.slice(start);
}

/**
 * The part of a cell before its first stop character
 */
function leadingValue(text: string, isStop: (char: string) => boolean): string {
  for (let i = 0; i < text.length; ) {
    const char = codePointAt(text, i);
    if (isStop(char)) return text.slice(0, i);
    i += char.length;
  }
  return text;
}

function holdsCommonDelimiter(text: string, delimiter: string | null): boolean {
  for (const common of COMMON_DELIMITERS) {
    if (common !== delimiter && text.includes(common)) return true;
  }
  return false;
}

function codePointAt(text: string, index: number): string {
  const codePoint = text.codePointAt(index);
  return codePoint === undefined ? "" : String.fromCodePoint(codePoint);
}

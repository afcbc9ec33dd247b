/**
 * Trial Parse State Machine Module
 *
 * Tokenizes whole text into rows of cells under any candidate dialect.
 * The parse is total: malformed quoting never raises, it falls back to the
 * recovery rules below so that every dialect yields a table to score.
 *
 * - a quote only opens a field at the start of that field
 * - a doubled quote inside a quoted field is one literal quote
 * - characters after a closing quote continue the field unquoted
 * - the escape character makes the next code point literal in any state
 * - an unterminated quote at end of input closes the field and row
 * - blank lines produce no row
 */

import { classifyCell } from "./type-detection";
import {
  type Cell,
  type CellClassifier,
  type CellType,
  type Dialect,
  type Row,
  type Table,
  type TrialParseOptions,
  TrialParseState,
} from "./types";

/**
 * Cell whose type is classified on first access
 */
class LazyCell implements Cell {
  private cachedType: CellType | undefined;

  constructor(
    readonly text: string,
    readonly quoted: boolean,
    private readonly classify: CellClassifier
  ) {}

  get type(): CellType {
    if (this.cachedType === undefined) {
      this.cachedType = this.classify(this.text);
    }
    return this.cachedType;
  }
}

/**
 * Parse text under a dialect without ever failing
 *
 * @param text - Decoded text
 * @param dialect - Candidate dialect
 * @param options - Row cap and cell classifier
 * @returns Rows of cells plus quote/escape usage counters
 *
 * @example
 * ```typescript
 * const table = trialParse('id;name\n1;"Smith, John"\n', createDialect(";", '"'));
 * table.rows[1]?.map((cell) => cell.text); // ["1", "Smith, John"]
 * ```
 */
export function trialParse(text: string, dialect: Dialect, options: TrialParseOptions = {}): Table {
  const classify = options.classify ?? ((value: string) => classifyCell(value));
  const maxRows = options.maxRows ?? Number.POSITIVE_INFINITY;

  if (dialect.delimiter === null) {
    return parseLines(text, dialect, classify, maxRows);
  }

  const { delimiter, quote, escape } = dialect;
  const rows: Row[] = [];
  let fields: Cell[] = [];
  let field = "";
  let fieldQuoted = false;
  let state = TrialParseState.FIELD_START;
  let rowHasContent = false;
  let quotedFields = 0;
  let escapedChars = 0;
  let truncated = false;
  let i = 0;

  const endField = (): void => {
    fields.push(new LazyCell(field, fieldQuoted, classify));
    field = "";
    fieldQuoted = false;
    state = TrialParseState.FIELD_START;
  };

  const endRow = (): void => {
    if (rowHasContent) {
      fields.push(new LazyCell(field, fieldQuoted, classify));
      rows.push(fields);
    }
    fields = [];
    field = "";
    fieldQuoted = false;
    state = TrialParseState.FIELD_START;
    rowHasContent = false;
  };

  while (i < text.length) {
    if (rows.length >= maxRows) {
      truncated = true;
      break;
    }

    const char = codePointAt(text, i);

    if (escape !== null && char === escape) {
      const next = codePointAt(text, i + char.length);
      rowHasContent = true;
      if (next === "") {
        // Nothing left to escape
        field += char;
        i += char.length;
        continue;
      }
      field += next;
      escapedChars++;
      i += char.length + next.length;
      if (state !== TrialParseState.QUOTED_FIELD) {
        state = TrialParseState.UNQUOTED_FIELD;
      }
      continue;
    }

    switch (state) {
      case TrialParseState.FIELD_START:
      case TrialParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          rowHasContent = true;
          endField();
        } else if (char === "\n" || char === "\r") {
          endRow();
          if (char === "\r" && text.charCodeAt(i + 1) === 0x0a) i++;
        } else if (state === TrialParseState.FIELD_START && char === quote) {
          rowHasContent = true;
          quotedFields++;
          fieldQuoted = true;
          state = TrialParseState.QUOTED_FIELD;
        } else {
          rowHasContent = true;
          field += char;
          state = TrialParseState.UNQUOTED_FIELD;
        }
        break;

      case TrialParseState.QUOTED_FIELD:
        if (char === quote) {
          state = TrialParseState.QUOTE_IN_QUOTED;
        } else {
          field += char;
        }
        break;

      case TrialParseState.QUOTE_IN_QUOTED:
        if (char === quote) {
          // Doubled quote
          field += char;
          state = TrialParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          endField();
        } else if (char === "\n" || char === "\r") {
          endRow();
          if (char === "\r" && text.charCodeAt(i + 1) === 0x0a) i++;
        } else {
          // Stray characters after the closing quote
          field += char;
          state = TrialParseState.UNQUOTED_FIELD;
        }
        break;
    }

    i += char.length;
  }

  if (!truncated) {
    // Also closes an unterminated quoted field with what it accumulated
    endRow();
  }

  return { dialect, rows, quotedFields, escapedChars, truncated };
}

/**
 * Total number of cells in a table
 */
export function countCells(table: Table): number {
  let total = 0;
  for (const row of table.rows) total += row.length;
  return total;
}

/**
 * "No delimiter" parse: each non-empty line is a one-cell row
 */
function parseLines(
  text: string,
  dialect: Dialect,
  classify: CellClassifier,
  maxRows: number
): Table {
  const rows: Row[] = [];
  let truncated = false;
  let start = 0;

  while (start < text.length) {
    let end = start;
    while (end < text.length) {
      const code = text.charCodeAt(end);
      if (code === 0x0a || code === 0x0d) break;
      end++;
    }

    if (end > start) {
      if (rows.length >= maxRows) {
        truncated = true;
        break;
      }
      rows.push([new LazyCell(text.slice(start, end), false, classify)]);
    }

    start = end + 1;
    if (text.charCodeAt(end) === 0x0d && text.charCodeAt(end + 1) === 0x0a) start++;
  }

  return { dialect, rows, quotedFields: 0, escapedChars: 0, truncated };
}

/**
 * The code point starting at `index` as a string; "" past the end
 */
function codePointAt(text: string, index: number): string {
  const unit = text.charCodeAt(index);
  if (unit >= 0xd800 && unit <= 0xdbff) {
    const next = text.charCodeAt(index + 1);
    if (next >= 0xdc00 && next <= 0xdfff) {
      return text.slice(index, index + 2);
    }
  }
  return text.slice(index, index + 1);
}

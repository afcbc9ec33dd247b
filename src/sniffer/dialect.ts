/**
 * Dialect values
 *
 * Dialects are frozen plain objects compared structurally.
 */

import { ValidationError } from "../errors";
import type { Dialect } from "./types";
import { codePointOrder, describeChar, isSingleCodePoint } from "./utils";

/**
 * Create a validated, frozen dialect
 *
 * @throws {ValidationError} when a member is not a single code point, is a
 * line terminator, or collides with another member
 *
 * @example
 * ```typescript
 * const csv = createDialect(",", '"');
 * const tsv = createDialect("\t");
 * ```
 */
export function createDialect(
  delimiter: string | null,
  quote: string | null = null,
  escape: string | null = null
): Dialect {
  const members = { delimiter, quote, escape };

  for (const [name, value] of Object.entries(members)) {
    if (value === null) continue;
    if (!isSingleCodePoint(value)) {
      throw new ValidationError(
        `Dialect ${name} must be a single code point`,
        `${name}: ${JSON.stringify(value)}`
      );
    }
    if (value === "\n" || value === "\r") {
      throw new ValidationError(`Dialect ${name} cannot be a line terminator`);
    }
  }

  if (delimiter !== null && (delimiter === quote || delimiter === escape)) {
    throw new ValidationError(
      "Dialect delimiter must differ from quote and escape",
      formatDialect(members)
    );
  }
  if (quote !== null && quote === escape) {
    throw new ValidationError(
      "Dialect quote and escape must differ; doubled quotes are always recognised",
      formatDialect(members)
    );
  }

  return Object.freeze(members);
}

/**
 * The "no delimiter" dialect: every line is a single-column row
 */
export const NO_DELIMITER: Dialect = Object.freeze({ delimiter: null, quote: null, escape: null });

/**
 * Structural equality
 */
export function dialectEquals(a: Dialect, b: Dialect): boolean {
  return a.delimiter === b.delimiter && a.quote === b.quote && a.escape === b.escape;
}

/**
 * Canonical ordering: delimiter, then quote, then escape; `null` first
 */
export function compareDialects(a: Dialect, b: Dialect): number {
  return (
    codePointOrder(a.delimiter) - codePointOrder(b.delimiter) ||
    codePointOrder(a.quote) - codePointOrder(b.quote) ||
    codePointOrder(a.escape) - codePointOrder(b.escape)
  );
}

/**
 * Human-readable form, e.g. `delimiter=";" quote="\"" escape=none`
 */
export function formatDialect(dialect: Dialect): string {
  return `delimiter=${describeChar(dialect.delimiter)} quote=${describeChar(dialect.quote)} escape=${describeChar(dialect.escape)}`;
}

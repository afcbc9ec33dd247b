/**
 * Header row detection
 *
 * A first row of plain text sitting on top of columns that hold numbers,
 * dates or structured values is a header.
 */

import type { CellType, Table } from "./types";

/**
 * Detect if the first row of a trial parse is a header row
 *
 * Requires at least two further rows with the same length as the first row,
 * every cell of the first row to be non-empty text, and at least one column
 * whose remaining non-empty cells are mostly not text.
 *
 * @example
 * ```typescript
 * detectHeader(trialParse("name,price\nlamp,12\nchair,40\n", createDialect(","))); // true
 * detectHeader(trialParse("1,2\n3,4\n5,6\n", createDialect(","))); // false
 * ```
 */
export function detectHeader(table: Table): boolean {
  const [first, ...rest] = table.rows;
  if (first === undefined || first.length === 0) return false;

  const body = rest.filter((row) => row.length === first.length);
  if (body.length < 2) return false;

  if (!first.every((cell) => cell.type === "text")) return false;

  for (let column = 0; column < first.length; column++) {
    let nonEmpty = 0;
    let typed = 0;
    for (const row of body) {
      const type: CellType | undefined = row[column]?.type;
      if (type === undefined || type === "empty") continue;
      nonEmpty++;
      if (type !== "text") typed++;
    }
    if (nonEmpty > 0 && typed * 2 > nonEmpty) return true;
  }

  return false;
}

/**
 * Cell Type Detection Module
 *
 * Ordered, first-match-wins classification of a cell's text. Total and
 * side-effect free: every string maps to exactly one CellType.
 */

import { DEFAULT_TYPE_PATTERNS } from "./constants";
import type { CellClassifier, CellType, TypePattern } from "./types";

/**
 * Classify a cell's text
 *
 * Surrounding spaces and tabs are ignored, so `" 42"` is a number.
 *
 * @param text - Raw cell text
 * @param patterns - Rule table (defaults to DEFAULT_TYPE_PATTERNS)
 *
 * @example
 * ```typescript
 * classifyCell("1,234");                // "number"
 * classifyCell("2024-03-01");           // "date"
 * classifyCell("mailto@example.org");   // "structured"
 * classifyCell("Smith, John");          // "text"
 * ```
 */
export function classifyCell(
  text: string,
  patterns: readonly TypePattern[] = DEFAULT_TYPE_PATTERNS
): CellType {
  const value = trimCell(text);
  if (value.length === 0) return "empty";

  for (const rule of patterns) {
    if (rule.pattern.test(value)) {
      return rule.type;
    }
  }
  return "text";
}

/**
 * Bind a rule table into a classifier
 */
export function createClassifier(patterns: readonly TypePattern[]): CellClassifier {
  if (patterns === DEFAULT_TYPE_PATTERNS) return defaultClassifier;
  return (text) => classifyCell(text, patterns);
}

const defaultClassifier: CellClassifier = (text) => classifyCell(text);

function trimCell(text: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && isBlank(text.charCodeAt(start))) start++;
  while (end > start && isBlank(text.charCodeAt(end - 1))) end--;
  return start === 0 && end === text.length ? text : text.slice(start, end);
}

function isBlank(code: number): boolean {
  return code === 0x20 || code === 0x09;
}

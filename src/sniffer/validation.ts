/**
 * @module sniffer/validation
 * @description Validation for detection options and detector configuration
 *
 * This module contains:
 * - ArkType schemas for detection options and configuration
 * - createConfig for building frozen configurations from overrides
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { DEFAULT_CONFIG } from "./constants";
import type { DetectOptions, DetectorConfig, EffectDetectOptions } from "./types";
import { isSingleCodePoint } from "./utils";

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

/**
 * ArkType validation schema for detection options
 */
export const DetectOptionsSchema = type({
  "delimiters?": "string[]",
  "maxRowSample?": "number>0",
  "timeout?": "number>=0",
  "preferNoQuote?": "boolean",
  "config?": "object", // DetectorConfig, checked by DetectorConfigSchema
  "onWarning?": "unknown", // (warning: string) => void
  "concurrency?": '"unbounded"|number>0',
}).narrow((options, ctx) => {
  for (const delimiter of options.delimiters ?? []) {
    if (!isSingleCodePoint(delimiter) || delimiter === "\n" || delimiter === "\r") {
      return ctx.reject({
        path: ["delimiters"],
        expected: "single code point delimiters other than line terminators",
        actual: JSON.stringify(delimiter),
      });
    }
  }

  if (options.maxRowSample !== undefined && !Number.isInteger(options.maxRowSample)) {
    return ctx.reject({
      path: ["maxRowSample"],
      expected: "an integer row count",
      actual: `${options.maxRowSample}`,
    });
  }

  if (typeof options.concurrency === "number" && !Number.isInteger(options.concurrency)) {
    return ctx.reject({
      path: ["concurrency"],
      expected: "an integer or \"unbounded\"",
      actual: `${options.concurrency}`,
    });
  }

  if (options.onWarning !== undefined && typeof options.onWarning !== "function") {
    return ctx.reject({
      path: ["onWarning"],
      expected: "a function",
      actual: typeof options.onWarning,
    });
  }

  return true;
});

/**
 * ArkType validation schema for a complete detector configuration
 */
export const DetectorConfigSchema = type({
  maxDelimiterCandidates: "number>0",
  maxQuoteCandidates: "number>0",
  maxEscapeCandidates: "number>0",
  patternWeight: "number>=0",
  typeWeight: "number>=0",
  lengthPenalty: "number>=0",
  mixPenalty: "number>=0",
  cutPenalty: "number>=0",
  fragmentPenalty: "number>=0",
  textWeight: "0<=number<=1",
  neutralPatternScore: "number",
  tieEpsilon: "number>=0",
  minimumScore: "number",
  typePatterns: "object[]",
}).narrow((config, ctx) => {
  for (const key of ["maxDelimiterCandidates", "maxQuoteCandidates", "maxEscapeCandidates"] as const) {
    if (!Number.isInteger(config[key])) {
      return ctx.reject({ path: [key], expected: "an integer", actual: `${config[key]}` });
    }
  }

  if (config.patternWeight + config.typeWeight <= 0) {
    return ctx.reject({
      path: ["patternWeight", "typeWeight"],
      expected: "weights summing to a positive value",
      actual: `${config.patternWeight} + ${config.typeWeight}`,
    });
  }

  if (config.neutralPatternScore < -1 || config.neutralPatternScore > 1) {
    return ctx.reject({
      path: ["neutralPatternScore"],
      expected: "a score between -1 and 1",
      actual: `${config.neutralPatternScore}`,
    });
  }

  for (const [index, rule] of config.typePatterns.entries()) {
    const pattern = "pattern" in rule ? rule.pattern : undefined;
    if (!(pattern instanceof RegExp)) {
      return ctx.reject({
        path: ["typePatterns", index],
        expected: "a rule with a RegExp pattern",
        actual: JSON.stringify(rule),
      });
    }
    // test() on a global or sticky RegExp keeps lastIndex between calls
    if (pattern.global || pattern.sticky) {
      return ctx.reject({
        path: ["typePatterns", index],
        expected: "a pattern without the g or y flag",
        actual: `${pattern}`,
      });
    }
  }

  return true;
});

// =============================================================================
// VALIDATORS
// =============================================================================

/**
 * Validate detection options
 *
 * @throws {ValidationError} with the ArkType summary
 */
export function validateDetectOptions(options: DetectOptions | EffectDetectOptions): void {
  const result = DetectOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid detection options: ${result.summary}`);
  }
  if (options.config !== undefined) {
    validateConfig(options.config);
  }
}

/**
 * Validate a complete configuration
 *
 * @throws {ValidationError} with the ArkType summary
 */
export function validateConfig(config: DetectorConfig): void {
  const result = DetectorConfigSchema(config);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid detector configuration: ${result.summary}`);
  }
}

/**
 * Build a frozen configuration from overrides
 *
 * @example
 * ```typescript
 * const config = createConfig({ patternWeight: 0.7, typeWeight: 0.3 });
 * ```
 */
export function createConfig(overrides: Partial<DetectorConfig> = {}): DetectorConfig {
  const merged: DetectorConfig = { ...DEFAULT_CONFIG, ...overrides };
  validateConfig(merged);
  return Object.freeze({
    ...merged,
    typePatterns: Object.freeze([...merged.typePatterns]),
  });
}

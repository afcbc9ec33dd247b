/**
 * Dialect Detection Module
 *
 * Enumerates candidate dialects from the scanned alphabet, trial-parses and
 * scores each one independently, then reduces to the best candidate under a
 * deterministic tie-break. Evaluation is a map over the canonical candidate
 * list followed by a single reduction, so the winner does not depend on the
 * order in which candidates happen to finish.
 */

import { Effect, Either } from "effect";
import {
  type DetectionFailure,
  DetectionTimedOutError,
  InvalidInputError,
  NoDialectFoundError,
} from "../errors";
import { scanAlphabet } from "./alphabet";
import { DEFAULT_CONFIG, DEFAULT_MAX_ROW_SAMPLE } from "./constants";
import { compareDialects, createDialect, formatDialect, NO_DELIMITER } from "./dialect";
import { scoreTable } from "./scoring";
import { trialParse } from "./state-machine";
import { createClassifier } from "./type-detection";
import type {
  Alphabet,
  CandidateEvaluation,
  CellClassifier,
  DetectOptions,
  Dialect,
  DetectorConfig,
  EffectDetectOptions,
} from "./types";
import { findLoneSurrogate, headLines } from "./utils";
import { validateDetectOptions } from "./validation";

/**
 * Everything a search needs, resolved once per call
 */
interface SearchPlan {
  /** The first `maxRows` lines of the input */
  readonly text: string;
  readonly config: DetectorConfig;
  readonly classify: CellClassifier;
  readonly maxRows: number;
  readonly alphabet: Alphabet;
  readonly candidates: readonly Dialect[];
  readonly separators: readonly string[];
  readonly preferNoQuote: boolean;
  readonly timeout: number | undefined;
}

/**
 * Winner of a search plus every evaluation, best first
 */
export interface SearchResult {
  readonly winner: CandidateEvaluation;
  readonly ranked: readonly CandidateEvaluation[];
  /** The part of the input the search looked at */
  readonly sample: string;
}

/**
 * Default warning sink
 */
export const defaultOnWarning = (warning: string): void => {
  console.warn(`tabsniff: ${warning}`);
};

// =============================================================================
// CANDIDATES
// =============================================================================

/**
 * Build the canonical candidate list from an alphabet
 *
 * The "no delimiter" dialect is always included for non-empty alphabets.
 * Dialects whose members collide are skipped, and quoting or escaping is
 * never combined with the "no delimiter" dialect since it would not change
 * the parse.
 */
export function enumerateCandidates(alphabet: Alphabet): Dialect[] {
  if (alphabet.delimiters.length === 0) return [];

  const candidates: Dialect[] = [NO_DELIMITER];
  for (const delimiter of alphabet.delimiters) {
    if (delimiter === null) continue;
    for (const quote of alphabet.quotes) {
      if (quote === delimiter) continue;
      for (const escape of alphabet.escapes) {
        if (escape !== null && (escape === delimiter || escape === quote)) continue;
        candidates.push(createDialect(delimiter, quote, escape));
      }
    }
  }

  return candidates.sort(compareDialects);
}

/**
 * Trial-parse and score one candidate
 */
export function evaluateCandidate(
  text: string,
  dialect: Dialect,
  options: {
    config?: DetectorConfig;
    maxRows?: number;
    frequencies?: ReadonlyMap<string, number>;
    classify?: CellClassifier;
    /** Other candidate delimiters, see scoreTable */
    separators?: readonly string[];
  } = {}
): CandidateEvaluation {
  const config = options.config ?? DEFAULT_CONFIG;
  const table = trialParse(text, dialect, {
    maxRows: options.maxRows,
    classify: options.classify ?? createClassifier(config.typePatterns),
  });

  return {
    score: scoreTable(table, config, options.separators),
    quotedFields: table.quotedFields,
    escapedChars: table.escapedChars,
    delimiterFrequency:
      dialect.delimiter === null ? 0 : (options.frequencies?.get(dialect.delimiter) ?? 0),
    rows: table.rows.length,
  };
}

// =============================================================================
// TIE-BREAK AND REDUCTION
// =============================================================================

/**
 * Rank of a quote or escape member: lower is better
 *
 * A member that never took effect leaves the parse identical to the dialect
 * without it, so it is the least preferred. A member that did take effect
 * changed the parse and beats "none" unless the caller prefers quoting to
 * be absent outright.
 */
function usageRank(member: string | null, used: boolean, preferNone: boolean): number {
  if (member === null) return 1;
  if (!used) return preferNone ? 2 : 0.5;
  return 0;
}

/**
 * Order tied candidates; negative when `a` should win
 *
 * 1. quote usage (see usageRank), then escape usage
 * 2. higher raw delimiter frequency
 * 3. smaller delimiter code point, then quote, then escape (`null` first)
 */
export function compareTiedCandidates(
  a: CandidateEvaluation,
  b: CandidateEvaluation,
  preferNoQuote: boolean = true
): number {
  const quoteA = usageRank(a.score.dialect.quote, a.quotedFields > 0, preferNoQuote);
  const quoteB = usageRank(b.score.dialect.quote, b.quotedFields > 0, preferNoQuote);
  if (quoteA !== quoteB) return quoteA - quoteB;

  const escapeA = usageRank(a.score.dialect.escape, a.escapedChars > 0, true);
  const escapeB = usageRank(b.score.dialect.escape, b.escapedChars > 0, true);
  if (escapeA !== escapeB) return escapeA - escapeB;

  if (a.delimiterFrequency !== b.delimiterFrequency) {
    return b.delimiterFrequency - a.delimiterFrequency;
  }

  return compareDialects(a.score.dialect, b.score.dialect);
}

/**
 * Reduce evaluations to the winner
 *
 * Every candidate within `tieEpsilon` of the maximum score is tied and
 * ordered by compareTiedCandidates. Returns undefined when nothing scores
 * above `minimumScore`.
 */
export function selectBest(
  evaluations: readonly CandidateEvaluation[],
  config: DetectorConfig = DEFAULT_CONFIG,
  preferNoQuote: boolean = true
): CandidateEvaluation | undefined {
  const best = evaluations.reduce(
    (max, evaluation) => Math.max(max, evaluation.score.combinedScore),
    Number.NEGATIVE_INFINITY
  );
  if (best <= config.minimumScore) return undefined;

  const tied = evaluations.filter(
    (evaluation) => evaluation.score.combinedScore >= best - config.tieEpsilon
  );
  return [...tied].sort((a, b) => compareTiedCandidates(a, b, preferNoQuote))[0];
}

/**
 * All evaluations best first; the first entry is the selectBest winner when
 * there is one
 */
function rankEvaluations(
  evaluations: readonly CandidateEvaluation[],
  config: DetectorConfig,
  preferNoQuote: boolean
): CandidateEvaluation[] {
  const ranked = [...evaluations].sort(
    (a, b) =>
      b.score.combinedScore - a.score.combinedScore || compareTiedCandidates(a, b, preferNoQuote)
  );
  const winner = selectBest(evaluations, config, preferNoQuote);
  if (winner === undefined) return ranked;
  return [winner, ...ranked.filter((evaluation) => evaluation !== winner)];
}

// =============================================================================
// SEARCH
// =============================================================================

function planSearch(
  input: string,
  options: DetectOptions
): Either.Either<SearchPlan, DetectionFailure> {
  validateDetectOptions(options);

  // every later step, validity check included, only sees the sampled rows
  const maxRows = options.maxRowSample ?? DEFAULT_MAX_ROW_SAMPLE;
  const text = headLines(input, maxRows);

  const offset = findLoneSurrogate(text);
  if (offset >= 0) {
    return Either.left(
      new InvalidInputError(
        "Text is not well-formed Unicode",
        offset,
        `lone surrogate at offset ${offset}`
      )
    );
  }

  const config = options.config ?? DEFAULT_CONFIG;
  const alphabet = scanAlphabet(text, {
    config,
    delimiters: options.delimiters,
    onWarning: options.onWarning ?? defaultOnWarning,
  });
  const candidates = enumerateCandidates(alphabet);

  if (candidates.length === 0) {
    return Either.left(new NoDialectFoundError("Input is empty", "empty-input", 0));
  }

  return Either.right({
    text,
    config,
    classify: createClassifier(config.typePatterns),
    maxRows,
    alphabet,
    candidates,
    separators: alphabet.delimiters.filter((delimiter): delimiter is string => delimiter !== null),
    preferNoQuote: options.preferNoQuote ?? true,
    timeout: options.timeout,
  });
}

/**
 * Map step: evaluate every candidate, checking the deadline before each
 *
 * The deadline is taken when the effect starts running, not when it is
 * built.
 */
function evaluateAll(
  plan: SearchPlan,
  concurrency: number | "unbounded"
): Effect.Effect<CandidateEvaluation[], DetectionFailure> {
  const { timeout } = plan;

  return Effect.suspend(() => {
    const deadline = timeout === undefined ? undefined : Date.now() + timeout;
    let evaluated = 0;

    return Effect.forEach(
      plan.candidates,
      (dialect) =>
        Effect.suspend((): Effect.Effect<CandidateEvaluation, DetectionTimedOutError> => {
          if (timeout !== undefined && deadline !== undefined && Date.now() >= deadline) {
            return Effect.fail(
              new DetectionTimedOutError(timeout, evaluated, plan.candidates.length)
            );
          }
          const evaluation = evaluateCandidate(plan.text, dialect, {
            config: plan.config,
            maxRows: plan.maxRows,
            frequencies: plan.alphabet.frequencies,
            classify: plan.classify,
            separators: plan.separators,
          });
          evaluated++;
          return Effect.succeed(evaluation);
        }),
      { concurrency }
    );
  });
}

/**
 * Reduce step
 */
function reduceEvaluations(
  plan: SearchPlan,
  evaluations: readonly CandidateEvaluation[]
): Either.Either<SearchResult, DetectionFailure> {
  const ranked = rankEvaluations(evaluations, plan.config, plan.preferNoQuote);
  const winner = selectBest(evaluations, plan.config, plan.preferNoQuote);

  if (winner === undefined) {
    const top = ranked[0];
    return Either.left(
      new NoDialectFoundError(
        "No candidate dialect produced a plausible table",
        "below-floor",
        evaluations.length,
        top === undefined
          ? undefined
          : `best candidate ${formatDialect(top.score.dialect)} scored ${top.score.combinedScore}`
      )
    );
  }

  return Either.right({ winner, ranked, sample: plan.text });
}

/**
 * Run a full search as an Effect
 *
 * @throws {ValidationError} synchronously when options are invalid
 */
export function searchDialect(
  text: string,
  options: EffectDetectOptions = {}
): Effect.Effect<SearchResult, DetectionFailure> {
  const plan = planSearch(text, options);
  if (Either.isLeft(plan)) return Effect.fail(plan.left);

  return evaluateAll(plan.right, options.concurrency ?? 1).pipe(
    Effect.flatMap((evaluations) => {
      const result = reduceEvaluations(plan.right, evaluations);
      return Either.isLeft(result) ? Effect.fail(result.left) : Effect.succeed(result.right);
    })
  );
}

/**
 * Detect the dialect of delimited text, evaluating candidates concurrently
 *
 * The result equals detectDialect's for the same text and options.
 *
 * @example
 * ```typescript
 * const dialect = await Effect.runPromise(
 *   detectDialectEffect(text, { concurrency: 4 })
 * );
 * ```
 */
export function detectDialectEffect(
  text: string,
  options: EffectDetectOptions = {}
): Effect.Effect<Dialect, DetectionFailure> {
  return searchDialect(text, options).pipe(Effect.map((result) => result.winner.score.dialect));
}

/**
 * Detect the dialect of delimited text
 *
 * @param text - Decoded text
 * @param options - Delimiter restriction, row cap, timeout, tie-break and
 * configuration
 * @returns Either.right with the dialect, or Either.left with
 * NoDialectFoundError (empty input, nothing above the floor),
 * DetectionTimedOutError or InvalidInputError
 * @throws {ValidationError} when options are invalid
 *
 * @example
 * ```typescript
 * const result = detectDialect("a,b,c\n1,2,3\n4,5,6\n");
 * if (Either.isRight(result)) {
 *   console.log(formatDialect(result.right)); // delimiter="," quote=none escape=none
 * }
 * ```
 */
export function detectDialect(
  text: string,
  options: DetectOptions = {}
): Either.Either<Dialect, DetectionFailure> {
  return Effect.runSync(Effect.either(detectDialectEffect(text, { ...options, concurrency: 1 })));
}

/**
 * Every candidate's evaluation, best first
 *
 * Unlike detectDialect this does not fail when all candidates are at or
 * below the floor; only empty input, timeouts and invalid text fail.
 */
export function rankCandidates(
  text: string,
  options: DetectOptions = {}
): Either.Either<readonly CandidateEvaluation[], DetectionFailure> {
  const plan = planSearch(text, options);
  if (Either.isLeft(plan)) return Either.left(plan.left);

  const { config, preferNoQuote } = plan.right;
  return Effect.runSync(
    Effect.either(
      evaluateAll(plan.right, 1).pipe(
        Effect.map((evaluations) => rankEvaluations(evaluations, config, preferNoQuote))
      )
    )
  );
}

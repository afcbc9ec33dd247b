/**
 * Dialect selector tests
 *
 * Covers the reference scenarios, recoverability of serialized tables,
 * the tie-break, determinism, timeouts and failure reporting.
 */

import { Effect, Either } from "effect";
import { describe, expect, test, vi } from "vitest";
import {
  DetectionTimedOutError,
  InvalidInputError,
  NoDialectFoundError,
  ValidationError,
} from "../../src/errors";
import {
  type CandidateEvaluation,
  compareTiedCandidates,
  createDialect,
  DEFAULT_CONFIG,
  type Dialect,
  detectDialect,
  detectDialectEffect,
  enumerateCandidates,
  evaluateCandidate,
  formatDialect,
  NO_DELIMITER,
  rankCandidates,
  selectBest,
} from "../../src/sniffer";

const SCENARIO_A = "a,b,c\n1,2,3\n4,5,6\n";
const SCENARIO_B = 'id;name\n1;"Smith, John"\n2;"Doe, Jane"\n';
const SCENARIO_C = [
  "Hello, world",
  "This line has more words in it",
  "Short one",
  "And a final, longer sentence here",
  "",
].join("\n");

function detected(text: string, options: Parameters<typeof detectDialect>[1] = {}): Dialect {
  const result = detectDialect(text, options);
  if (Either.isLeft(result)) {
    throw new Error(`expected a dialect, got ${result.left.toString()}`);
  }
  return result.right;
}

function failure(text: string, options: Parameters<typeof detectDialect>[1] = {}) {
  const result = detectDialect(text, options);
  if (Either.isRight(result)) {
    throw new Error(`expected a failure, got ${formatDialect(result.right)}`);
  }
  return result.left;
}

describe("detectDialect", () => {
  describe("reference scenarios", () => {
    test("detects a plain comma-separated table", () => {
      expect(detected(SCENARIO_A)).toEqual(createDialect(","));
    });

    test("does not let a quoted comma win over the real delimiter", () => {
      expect(detected(SCENARIO_B)).toEqual(createDialect(";", '"'));
    });

    test("keeps single-column prose undelimited", () => {
      expect(detected(SCENARIO_C)).toEqual(NO_DELIMITER);
    });

    test("detects an unusual quote character", () => {
      expect(detected("id|name\n1|~Smith|J~\n2|~Doe~\n")).toEqual(createDialect("|", "~"));
    });
  });

  describe("recoverability", () => {
    const header = ["id", "name", "amount", "date"];
    const records = [
      ["1", "Alice", "3.5", "2024-01-02"],
      ["2", "Bob", "12", "2024-02-03"],
      ["3", "Carol", "7.25", "2024-03-04"],
      ["4", "Dan", "0.5", "2024-04-05"],
      ["5", "Eve", "100", "2024-05-06"],
    ];

    test.each([",", ";", "|", "\t"])("recovers delimiter %j without quoting", (delimiter) => {
      const text = [header, ...records].map((row) => row.join(delimiter)).join("\n") + "\n";

      expect(detected(text)).toEqual(createDialect(delimiter));
    });

    test.each([",", ";", "|", "\t"])("recovers delimiter %j with quoting", (delimiter) => {
      const rows = records.map(([id, name, amount, date]) =>
        [id, `"Lee${delimiter} ${name}"`, amount, date].join(delimiter)
      );
      const text = [header.join(delimiter), ...rows].join("\n") + "\n";

      expect(detected(text)).toEqual(createDialect(delimiter, '"'));
    });

    describe("headerless two-column tables", () => {
      const NAMES = ["Ann Lee", "Bo Chen", "Cy Diaz", "Di Evans", "Ed Fox"];
      const DATES = ["2024-01-02", "2024-02-11", "2023-12-30", "2024-03-05", "2024-04-17"];
      const DECIMALS = ["1.5", "12.25", "0.75", "3.5", "40.1"];
      const TABLES: Record<string, [string[], string[]]> = {
        "names and dates": [NAMES, DATES],
        "names and decimals": [NAMES, DECIMALS],
        "dates and decimals": [DATES, DECIMALS],
      };

      const serialize = (table: string, delimiter: string, quote: string | null): string => {
        const [left, right] = TABLES[table] ?? [[], []];
        const field = (value: string): string => (quote === null ? value : `${quote}${value}${quote}`);
        return left.map((value, i) => `${field(value)}${delimiter}${field(right[i] ?? "")}\n`).join("");
      };

      const cases = Object.keys(TABLES).flatMap((table) =>
        [",", ";", "|", "\t"].flatMap((delimiter) =>
          ['"', null].map((quote) => ({ table, delimiter, quote }))
        )
      );

      test.each(cases)("recovers $table with $delimiter and quote $quote", ({ table, delimiter, quote }) => {
        expect(detected(serialize(table, delimiter, quote))).toEqual(createDialect(delimiter, quote));
      });
    });

    test("does not split values the type detector recognises", () => {
      const rows = (build: (i: number) => string): string =>
        [1, 2, 3, 4, 5].map((i) => `${build(i)}\n`).join("");

      expect(detected(rows((i) => `user${i},2024-01-0${i}`))).toEqual(createDialect(","));
      expect(detected(rows((i) => `x${i};${i}.5;2024-0${i}-02`))).toEqual(createDialect(";"));
    });

    test("keeps multi-word text together", () => {
      const text = "John Smith,London\nAnn Lee,Paris\nBo Chen,Rome\nCy Diaz,Oslo\nDi Evans,Bern\n";

      expect(detected(text)).toEqual(createDialect(","));
    });

    test("recovers a CRLF table", () => {
      const text = [header, ...records].map((row) => row.join(";")).join("\r\n");

      expect(detected(text)).toEqual(createDialect(";"));
    });
  });

  describe("single-column stability", () => {
    test("keeps a column of dates whole", () => {
      expect(detected("2024-01-02\n2024-02-03\n2024-03-04\n2024-04-05\n2024-05-06\n")).toEqual(
        NO_DELIMITER
      );
    });

    test("keeps a column of decimals whole", () => {
      expect(detected("1.5\n2.5\n3.25\n4.75\n5.5\n")).toEqual(NO_DELIMITER);
    });
  });

  describe("tie-break", () => {
    const text = "name;note\nx;it's\ny;ok\nz;fine\n";

    test("prefers no quote over a quote that never opened a field", () => {
      expect(detected(text)).toEqual(createDialect(";"));
    });

    test("prefers the quote when preferNoQuote is off", () => {
      expect(detected(text, { preferNoQuote: false })).toEqual(createDialect(";", "'"));
    });
  });

  describe("failures", () => {
    test("reports empty input", () => {
      const error = failure("");

      expect(error).toBeInstanceOf(NoDialectFoundError);
      expect(error).toMatchObject({ reason: "empty-input", candidatesEvaluated: 0 });
    });

    test("reports input with nothing tabular in it", () => {
      const error = failure("\n\r\n\n");

      expect(error).toBeInstanceOf(NoDialectFoundError);
      expect(error).toMatchObject({ reason: "below-floor", candidatesEvaluated: 1 });
    });

    test("reports lone surrogates as invalid input", () => {
      const error = failure("a,b\n\uD800,c\n");

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({ code: "INVALID_INPUT", offset: 4 });
    });

    test("times out between candidates", () => {
      const error = failure(SCENARIO_A, { timeout: 0 });

      expect(error).toBeInstanceOf(DetectionTimedOutError);
      expect(error).toMatchObject({
        reason: "timed-out",
        candidatesEvaluated: 0,
        candidatesTotal: 2,
        timeoutMs: 0,
      });
      expect(error.message).toBe("Dialect detection exceeded 0ms after 0 of 2 candidates");
    });

    test("starts the timeout when the search runs, not when it is built", () => {
      vi.useFakeTimers();
      try {
        vi.setSystemTime(0);
        const search = detectDialectEffect(SCENARIO_A, { timeout: 1_000 });
        vi.setSystemTime(5_000);

        expect(Effect.runSync(search)).toEqual(createDialect(","));
      } finally {
        vi.useRealTimers();
      }
    });

    test("completes within a generous timeout", () => {
      expect(detected(SCENARIO_A, { timeout: 60_000 })).toEqual(createDialect(","));
    });

    test("throws for invalid options", () => {
      expect(() => detectDialect(SCENARIO_A, { maxRowSample: 0 })).toThrow(ValidationError);
      expect(() => detectDialect(SCENARIO_A, { maxRowSample: 2.5 })).toThrow(ValidationError);
      expect(() => detectDialect(SCENARIO_A, { timeout: -1 })).toThrow(ValidationError);
      expect(() => detectDialect(SCENARIO_A, { delimiters: [",;"] })).toThrow(ValidationError);
      expect(() => detectDialect(SCENARIO_A, { delimiters: ["\n"] })).toThrow(ValidationError);
    });
  });

  describe("options", () => {
    test("restricts the delimiters and warns about absent ones", () => {
      const onWarning = vi.fn();

      expect(detected(SCENARIO_A, { delimiters: [",", "|"], onWarning })).toEqual(
        createDialect(",")
      );
      expect(onWarning).toHaveBeenCalledWith(
        'delimiter "|" does not occur in the text and was ignored'
      );
    });

    test("detects from the first maxRowSample rows", () => {
      const text = Array.from({ length: 2000 }, (_, i) => `${i};${i * 2}`).join("\n");

      expect(detected(text, { maxRowSample: 10 })).toEqual(createDialect(";"));
      expect(evaluateCandidate(text, createDialect(";"), { maxRows: 10 }).rows).toBe(10);
    });

    test("never scans past the first maxRowSample lines", () => {
      const head = Array.from({ length: 50 }, (_, i) => `${i};${i * 2}\n`).join("");
      const text = head + "a|b~c|d~e\n".repeat(5_000);

      const ranked = rankCandidates(text, { maxRowSample: 50 });
      if (Either.isLeft(ranked)) throw ranked.left;

      expect(ranked.right.map((evaluation) => evaluation.score.dialect)).toEqual([
        createDialect(";"),
        NO_DELIMITER,
      ]);
    });
  });

  describe("determinism", () => {
    test("returns the same dialect on repeated calls", () => {
      for (const text of [SCENARIO_A, SCENARIO_B, SCENARIO_C]) {
        expect(detected(text)).toEqual(detected(text));
      }
    });

    test("matches the concurrent search", async () => {
      for (const text of [SCENARIO_A, SCENARIO_B, SCENARIO_C]) {
        const concurrent = await Effect.runPromise(detectDialectEffect(text, { concurrency: 4 }));
        const unbounded = await Effect.runPromise(
          detectDialectEffect(text, { concurrency: "unbounded" })
        );

        expect(concurrent).toEqual(detected(text));
        expect(unbounded).toEqual(detected(text));
      }
    });

    test("fails the concurrent search the same way", async () => {
      const result = await Effect.runPromise(
        Effect.either(detectDialectEffect("", { concurrency: 2 }))
      );

      expect(Either.isLeft(result) && result.left).toBeInstanceOf(NoDialectFoundError);
    });
  });
});

describe("rankCandidates", () => {
  test("lists every candidate, winner first", () => {
    const ranked = rankCandidates(SCENARIO_A);
    if (Either.isLeft(ranked)) throw ranked.left;

    expect(ranked.right.map((evaluation) => evaluation.score.dialect)).toEqual([
      createDialect(","),
      NO_DELIMITER,
    ]);
    expect(ranked.right.map((evaluation) => evaluation.score.combinedScore)).toEqual([1, 0.5]);
  });

  test("does not fail when everything is at the floor", () => {
    const ranked = rankCandidates("\n\n");

    expect(Either.isRight(ranked) && ranked.right.length).toBe(1);
  });
});

describe("enumerateCandidates", () => {
  test("takes the product of the sets plus no delimiter", () => {
    const candidates = enumerateCandidates({
      delimiters: [",", ";", null],
      quotes: ['"', null],
      escapes: ["\\", null],
      frequencies: new Map(),
    });

    expect(candidates).toHaveLength(9);
    expect(candidates[0]).toEqual(NO_DELIMITER);
    expect(candidates[1]).toEqual(createDialect(","));
  });

  test("skips colliding members", () => {
    const candidates = enumerateCandidates({
      delimiters: ["|", null],
      quotes: ["|", null],
      escapes: [null],
      frequencies: new Map(),
    });

    expect(candidates).toEqual([NO_DELIMITER, createDialect("|")]);
  });

  test("is empty for an empty alphabet", () => {
    expect(
      enumerateCandidates({ delimiters: [], quotes: [], escapes: [], frequencies: new Map() })
    ).toEqual([]);
  });
});

describe("tie ordering", () => {
  const evaluation = (
    dialect: Dialect,
    facts: Partial<Omit<CandidateEvaluation, "score">> = {},
    combinedScore = 0.5
  ): CandidateEvaluation => ({
    score: { dialect, patternScore: 0.5, typeScore: 0.5, combinedScore },
    quotedFields: 0,
    escapedChars: 0,
    delimiterFrequency: 0,
    rows: 3,
    ...facts,
  });

  test("prefers a quote that was used over no quote", () => {
    const quoted = evaluation(createDialect(",", '"'), { quotedFields: 2 });
    const plain = evaluation(createDialect(","));

    expect(compareTiedCandidates(quoted, plain)).toBeLessThan(0);
  });

  test("prefers no quote over an unused quote", () => {
    const unused = evaluation(createDialect(",", '"'));
    const plain = evaluation(createDialect(","));

    expect(compareTiedCandidates(plain, unused)).toBeLessThan(0);
    expect(compareTiedCandidates(unused, plain, false)).toBeLessThan(0);
  });

  test("prefers the more frequent delimiter", () => {
    const semicolon = evaluation(createDialect(";"), { delimiterFrequency: 9 });
    const comma = evaluation(createDialect(","), { delimiterFrequency: 3 });

    expect(compareTiedCandidates(semicolon, comma)).toBeLessThan(0);
  });

  test("falls back to the smaller code point", () => {
    const semicolon = evaluation(createDialect(";"), { delimiterFrequency: 3 });
    const comma = evaluation(createDialect(","), { delimiterFrequency: 3 });

    expect(compareTiedCandidates(comma, semicolon)).toBeLessThan(0);
  });

  test("selectBest only breaks ties within epsilon", () => {
    const better = evaluation(createDialect(";"), {}, 0.6);
    const frequent = evaluation(createDialect(","), { delimiterFrequency: 50 }, 0.5);

    expect(selectBest([frequent, better])).toBe(better);
  });

  test("selectBest finds nothing at the floor", () => {
    const degenerate = evaluation(NO_DELIMITER, {}, DEFAULT_CONFIG.minimumScore);

    expect(selectBest([degenerate])).toBeUndefined();
    expect(selectBest([])).toBeUndefined();
  });
});

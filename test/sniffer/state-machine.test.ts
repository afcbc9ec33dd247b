/**
 * Trial parser tests
 *
 * The parser must accept any text under any dialect; malformed quoting is
 * recovered from, never reported.
 */

import { describe, expect, test } from "vitest";
import {
  countCells,
  createDialect,
  NO_DELIMITER,
  type Table,
  trialParse,
} from "../../src/sniffer";

const texts = (table: Table): string[][] => table.rows.map((row) => row.map((cell) => cell.text));

const CSV = createDialect(",", '"');

describe("trialParse", () => {
  describe("basic splitting", () => {
    test("splits rows and fields", () => {
      const table = trialParse("a,b\n1,2\n", createDialect(","));

      expect(texts(table)).toEqual([
        ["a", "b"],
        ["1", "2"],
      ]);
      expect(table.quotedFields).toBe(0);
      expect(table.truncated).toBe(false);
    });

    test("accepts LF, CRLF and CR line endings", () => {
      const table = trialParse("a,b\r\nc,d\re,f\n", CSV);

      expect(texts(table)).toEqual([
        ["a", "b"],
        ["c", "d"],
        ["e", "f"],
      ]);
    });

    test("skips blank lines", () => {
      const table = trialParse("a,b\n\n\nc,d\n", CSV);

      expect(texts(table)).toEqual([
        ["a", "b"],
        ["c", "d"],
      ]);
    });

    test("keeps empty fields", () => {
      const table = trialParse(",\na,,b,\n", CSV);

      expect(texts(table)).toEqual([
        ["", ""],
        ["a", "", "b", ""],
      ]);
    });

    test("parses a last line without terminator", () => {
      expect(texts(trialParse("a,b\nc,d", CSV))).toEqual([
        ["a", "b"],
        ["c", "d"],
      ]);
    });

    test("returns no rows for empty text", () => {
      const table = trialParse("", CSV);

      expect(table.rows).toEqual([]);
      expect(countCells(table)).toBe(0);
    });
  });

  describe("quoting", () => {
    test("keeps delimiters inside quoted fields", () => {
      const table = trialParse('x,"a,b"\n', CSV);

      expect(texts(table)).toEqual([["x", "a,b"]]);
      expect(table.quotedFields).toBe(1);
    });

    test("marks the cells that were quoted", () => {
      const table = trialParse('"a",b,"c"d\n"e"\n', CSV);

      expect(table.rows.map((row) => row.map((cell) => cell.quoted))).toEqual([
        [true, false, true],
        [true],
      ]);
    });

    test("keeps line terminators inside quoted fields", () => {
      expect(texts(trialParse('1,"two\nlines"\n2,x\n', CSV))).toEqual([
        ["1", "two\nlines"],
        ["2", "x"],
      ]);
    });

    test("reads a doubled quote as one literal quote", () => {
      expect(texts(trialParse('"say ""hi""",2\n', CSV))).toEqual([['say "hi"', "2"]]);
    });

    test("continues the field after a closing quote", () => {
      expect(texts(trialParse('"ab"cd,e\n', CSV))).toEqual([["abcd", "e"]]);
    });

    test("treats a quote inside an unquoted field as literal", () => {
      const table = trialParse('ab"cd,e\n', CSV);

      expect(texts(table)).toEqual([['ab"cd', "e"]]);
      expect(table.quotedFields).toBe(0);
    });

    test("closes an unterminated quote at end of input", () => {
      const table = trialParse('a,"bc\nde', CSV);

      expect(texts(table)).toEqual([["a", "bc\nde"]]);
      expect(table.quotedFields).toBe(1);
    });

    test("counts each opened field once", () => {
      expect(trialParse('"a","b"\n"c",d\n', CSV).quotedFields).toBe(3);
    });
  });

  describe("escaping", () => {
    const ESCAPED = createDialect(",", '"', "\\");

    test("takes the next code point literally in an unquoted field", () => {
      const table = trialParse("a\\,b,c\n", ESCAPED);

      expect(texts(table)).toEqual([["a,b", "c"]]);
      expect(table.escapedChars).toBe(1);
    });

    test("takes the next code point literally in a quoted field", () => {
      const table = trialParse('"a\\"b",c\n', ESCAPED);

      expect(texts(table)).toEqual([['a"b', "c"]]);
      expect(table.escapedChars).toBe(1);
    });

    test("keeps an escape at end of input", () => {
      const table = trialParse("a\\", ESCAPED);

      expect(texts(table)).toEqual([["a\\"]]);
      expect(table.escapedChars).toBe(0);
    });

    test("escapes a line terminator", () => {
      expect(texts(trialParse("a\\\nb,c\n", ESCAPED))).toEqual([["a\nb", "c"]]);
    });
  });

  describe("no delimiter", () => {
    test("makes each non-empty line a one-cell row", () => {
      const table = trialParse("x, y\n\nz\r\n", NO_DELIMITER);

      expect(texts(table)).toEqual([["x, y"], ["z"]]);
      expect(table.dialect).toBe(NO_DELIMITER);
    });

    test("honours the row cap", () => {
      const table = trialParse("a\nb\nc\n", NO_DELIMITER, { maxRows: 2 });

      expect(texts(table)).toEqual([["a"], ["b"]]);
      expect(table.truncated).toBe(true);
    });
  });

  describe("row cap", () => {
    test("stops after maxRows rows", () => {
      const table = trialParse("1\n2\n3\n", CSV, { maxRows: 2 });

      expect(texts(table)).toEqual([["1"], ["2"]]);
      expect(table.truncated).toBe(true);
    });

    test("is not truncated when the text has exactly maxRows rows", () => {
      const table = trialParse("1\n2\n", CSV, { maxRows: 2 });

      expect(table.rows).toHaveLength(2);
      expect(table.truncated).toBe(false);
    });
  });

  describe("cells", () => {
    test("classifies cells on access", () => {
      const table = trialParse("name,2024-01-02,42,\n", CSV);

      expect(table.rows[0]?.map((cell) => cell.type)).toEqual(["text", "date", "number", "empty"]);
    });

    test("uses a custom classifier", () => {
      const table = trialParse("a,b\n", CSV, { classify: () => "structured" });

      expect(table.rows[0]?.map((cell) => cell.type)).toEqual(["structured", "structured"]);
    });
  });

  test("never throws on malformed input", () => {
    const samples = ['"', '""', '"""', '\\', 'a"b"c"', '",",",\n"', "\r\r\n\n", "\u{1F600},\u{1F600}"];
    const dialects = [
      NO_DELIMITER,
      createDialect(","),
      CSV,
      createDialect(",", '"', "\\"),
      createDialect("\u{1F600}", "'"),
    ];

    for (const sample of samples) {
      for (const dialect of dialects) {
        expect(() => trialParse(sample, dialect)).not.toThrow();
      }
    }
  });

  test("splits on an astral delimiter", () => {
    expect(texts(trialParse("a\u{1F600}b\n", createDialect("\u{1F600}")))).toEqual([["a", "b"]]);
  });
});

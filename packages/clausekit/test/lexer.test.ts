/**
 * Lexer Tests
 */

import { describe, test, expect } from "vitest";
import { tokenize, isKeyword, SyntaxOptions } from "../src/index.ts";

const texts = (sql: string, options?: SyntaxOptions): string[] => tokenize(sql, options).map((t) => t.text);

describe("Lexer", () => {
  test("splits words, brackets and operators", () => {
    expect(texts("select Name from [Order Details] where x >= 10 -- note")).toEqual([
      "select",
      "Name",
      "from",
      "[Order Details]",
      "where",
      "x",
      ">=",
      "10",
    ]);
  });

  test("normalizes keywords to uppercase and flags identifiers", () => {
    const [select, name, , bracket] = tokenize("select Name from [Order Details]");

    expect(select).toMatchObject({ text: "select", normalizedText: "SELECT", isKeyword: true, isIdentifier: false });
    expect(name).toMatchObject({ text: "Name", normalizedText: "Name", isKeyword: false, isIdentifier: true });
    expect(bracket).toMatchObject({ isKeyword: false, isIdentifier: true });
  });

  test("records source offsets", () => {
    const tokens = tokenize("SELECT a\nFROM t");
    expect(tokens.map((t) => t.offset)).toEqual([0, 7, 9, 14]);
  });

  test("records start and end line and column", () => {
    const [select, literal, from] = tokenize("SELECT 'x\ny'\nFROM t");
    expect(select).toMatchObject({ line: 1, column: 1, endLine: 1, endColumn: 6 });
    expect(literal).toMatchObject({ line: 1, column: 8, endLine: 2, endColumn: 2 });
    expect(from).toMatchObject({ offset: 13, line: 3, column: 1 });
  });

  test("drops block and line comments", () => {
    expect(texts("SELECT /* hint */ 1 -- trailing\nFROM t")).toEqual(["SELECT", "1", "FROM", "t"]);
  });

  test("unterminated block comment runs to end of input", () => {
    expect(texts("SELECT 1 /* open")).toEqual(["SELECT", "1"]);
  });

  test("keeps escaped quotes inside string literals", () => {
    expect(texts("WHERE a = 'it''s'")).toEqual(["WHERE", "a", "=", "'it''s'"]);
  });

  test("unterminated literals consume the rest of the input", () => {
    expect(texts("SELECT 'abc")).toEqual(["SELECT", "'abc"]);
    expect(texts('SELECT "abc')).toEqual(["SELECT", '"abc']);
  });

  test("reads double-quoted identifiers as single tokens", () => {
    expect(texts('SELECT "first name" FROM t')).toEqual(["SELECT", '"first name"', "FROM", "t"]);
  });

  test("reads two-character operators as one token", () => {
    expect(texts("a <> b != c <= d")).toEqual(["a", "<>", "b", "!=", "c", "<=", "d"]);
  });

  test("reads the cast operator as one token", () => {
    expect(texts("a::int")).toEqual(["a", "::", "int"]);
  });

  test("accepts letters outside ASCII in identifiers", () => {
    expect(texts("SELECT café FROM t")).toEqual(["SELECT", "café", "FROM", "t"]);
  });

  test("numbers keep their decimal point", () => {
    expect(texts("VALUES (9.99)")).toEqual(["VALUES", "(", "9.99", ")"]);
  });

  describe("dialect prefixes", () => {
    test("SQL Server variables and temp tables are single identifiers", () => {
      expect(texts("SELECT * FROM #temp WHERE Id = @id")).toEqual([
        "SELECT",
        "*",
        "FROM",
        "#temp",
        "WHERE",
        "Id",
        "=",
        "@id",
      ]);
    });

    test("a prefix the dialect does not declare is punctuation", () => {
      expect(texts("@id", SyntaxOptions.postgreSql)).toEqual(["@", "id"]);
      expect(texts(":name", SyntaxOptions.sqlServer)).toEqual([":", "name"]);
    });

    test("Oracle bind variables are single identifiers", () => {
      expect(texts(":account_id", SyntaxOptions.oracle)).toEqual([":account_id"]);
    });

    test("a colon prefix leaves the cast operator intact", () => {
      expect(texts("a::int", SyntaxOptions.sqlite)).toEqual(["a", "::", "int"]);
      expect(texts(":a::text", SyntaxOptions.oracle)).toEqual([":a", "::", "text"]);
      expect(texts("x = :id", SyntaxOptions.sqlite)).toEqual(["x", "=", ":id"]);
    });
  });

  test("isKeyword ignores case", () => {
    expect(isKeyword("returning")).toBe(true);
    expect(isKeyword("customers")).toBe(false);
  });
});

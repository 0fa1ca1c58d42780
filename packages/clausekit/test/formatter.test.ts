/**
 * Pretty Printer Tests
 */

import { describe, test, expect } from "vitest";
import { parseQuery, formatSql, resolveFormattingOptions, DEFAULT_FORMATTING } from "../src/index.ts";

const JOIN_QUERY =
  "SELECT table1.champ1, table2.champ2, table2.champ3 FROM table1 INNER JOIN table2 ON table1.champ1 = table2.champ1";

describe("Formatting", () => {
  test("inline mode returns canonical SQL", () => {
    expect(parseQuery(JOIN_QUERY).toSql({ mode: "inline" })).toBe(JOIN_QUERY);
    expect(formatSql(JOIN_QUERY)).toBe(JOIN_QUERY);
  });

  test("prefixed commas", () => {
    expect(parseQuery(JOIN_QUERY).toSql({ mode: "prefixed" })).toBe(
      [
        "SELECT",
        "    table1.champ1",
        "   ,table2.champ2",
        "   ,table2.champ3",
        "FROM table1",
        "INNER JOIN table2 ON table1.champ1 = table2.champ1",
      ].join("\n")
    );
  });

  test("suffixed commas", () => {
    expect(parseQuery(JOIN_QUERY).toSql({ mode: "suffixed" })).toBe(
      [
        "SELECT",
        "    table1.champ1,",
        "    table2.champ2,",
        "    table2.champ3",
        "FROM table1",
        "INNER JOIN table2 ON table1.champ1 = table2.champ1",
      ].join("\n")
    );
  });

  test("custom indent size", () => {
    expect(parseQuery(JOIN_QUERY).toSql({ mode: "prefixed", indentSize: 2 })).toBe(
      [
        "SELECT",
        "  table1.champ1",
        " ,table2.champ2",
        " ,table2.champ3",
        "FROM table1",
        "INNER JOIN table2 ON table1.champ1 = table2.champ1",
      ].join("\n")
    );
  });

  test("parentheses holding a statement are expanded and indented", () => {
    expect(parseQuery("SELECT a FROM t WHERE EXISTS (SELECT 1 FROM u)").toSql({ mode: "prefixed" })).toBe(
      ["SELECT", "    a", "FROM t", "WHERE EXISTS (", "    SELECT", "        1", "    FROM u", ")"].join("\n")
    );
  });

  test("groups outside list clauses indent their content by depth", () => {
    expect(parseQuery("SELECT a FROM t WHERE id IN (1, 2)").toSql({ mode: "suffixed" })).toBe(
      ["SELECT", "    a", "FROM t", "WHERE id IN (", "    1, 2", ")"].join("\n")
    );
  });

  test("function calls inside a list item stay on the item's line", () => {
    expect(parseQuery("SELECT COUNT(*), MAX(a) FROM t").toSql({ mode: "prefixed" })).toBe(
      ["SELECT", "    COUNT(*)", "   ,MAX(a)", "FROM t"].join("\n")
    );
  });

  test("GROUP BY and ORDER BY are list clauses", () => {
    expect(parseQuery("SELECT a, b FROM t GROUP BY a, b ORDER BY a").toSql({ mode: "suffixed" })).toBe(
      ["SELECT", "    a,", "    b", "FROM t", "GROUP BY", "    a,", "    b", "ORDER BY", "    a"].join("\n")
    );
  });

  test("formatted output parses back to the same canonical SQL", () => {
    const query = parseQuery(JOIN_QUERY);
    for (const mode of ["prefixed", "suffixed"] as const) {
      expect(parseQuery(query.toSql({ mode })).toSql()).toBe(JOIN_QUERY);
    }
  });
});

describe("resolveFormattingOptions", () => {
  test("fills in defaults", () => {
    expect(resolveFormattingOptions()).toEqual(DEFAULT_FORMATTING);
    expect(resolveFormattingOptions({ mode: "suffixed" })).toEqual({ mode: "suffixed", indentSize: 4 });
  });

  test("rejects negative or fractional indents", () => {
    expect(() => resolveFormattingOptions({ indentSize: -1 })).toThrow("Indent size must be a non-negative integer.");
    expect(() => parseQuery("SELECT 1").toSql({ mode: "prefixed", indentSize: 1.5 })).toThrow(RangeError);
  });
});

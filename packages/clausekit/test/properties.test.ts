/**
 * Structural Property Tests
 */

import { describe, test, expect } from "vitest";
import { parse, parseQuery, formatSql, SelectStatement, SyntaxOptions } from "../src/index.ts";

function selectOf(sql: string): SelectStatement {
  const root = parseQuery(sql).rootStatement;
  if (!(root instanceof SelectStatement)) throw new Error(`Expected SELECT, got ${root.kind}`);
  return root;
}

describe("Properties", () => {
  test("clauses are optional and can be added later", () => {
    const select = selectOf("SELECT 1");
    expect(select.where).toBeUndefined();

    select.ensureWhereSegment().addRaw("x = 1");
    expect(select.toSql()).toBe("SELECT 1 WHERE x = 1");
  });

  test("derived tables are owned by the outer statement", () => {
    const query = parseQuery("SELECT * FROM (SELECT 1) t");
    expect(query.allStatements).toHaveLength(2);
    expect(query.toSql()).toBe("SELECT * FROM (SELECT 1) t");
  });

  test("JOIN/ON consistency", () => {
    expect(parse("SELECT * FROM a JOIN b").success).toBe(false);
    expect(parse("SELECT * FROM a JOIN b ON a.id = b.id").success).toBe(true);
    expect(parse("SELECT * FROM a CROSS JOIN b").success).toBe(true);
    expect(parse("SELECT * FROM a JOIN b ON a.id = b.id, c").success).toBe(true);
  });

  test("alias inference", () => {
    expect(selectOf("SELECT a.x AS y FROM a").columns).toEqual([{ expression: "a.x", alias: "y" }]);
    expect(selectOf("SELECT a.x y FROM a").columns).toEqual([{ expression: "a.x", alias: "y" }]);
    expect(selectOf("SELECT a.x FROM a").columns).toEqual([{ expression: "a.x" }]);
  });

  test("keywords are never inferred as aliases", () => {
    expect(selectOf("SELECT a IS NULL FROM t").columns).toEqual([{ expression: "a IS NULL" }]);
  });

  test("recursive CTE", () => {
    const select = selectOf("WITH RECURSIVE t(n) AS (SELECT 1) SELECT * FROM t");
    expect(select.withClause?.isRecursive).toBe(true);
    expect(select.withClause?.definitions[0]?.columns).toEqual(["n"]);
  });

  test("pretty printing is idempotent", () => {
    const query = parseQuery("SELECT a, b FROM t WHERE EXISTS (SELECT 1 FROM u WHERE u.id = t.id) ORDER BY a, b");
    for (const mode of ["prefixed", "suffixed"] as const) {
      const once = query.toSql({ mode });
      expect(formatSql(once, { mode, indentSize: 4 })).toBe(once);
    }
  });

  const DIALECT_QUERIES = [
    { name: "oracle", syntaxOptions: SyntaxOptions.oracle, sql: "SELECT a, b FROM t WHERE id = :id ORDER BY a" },
    {
      name: "sqlite",
      syntaxOptions: SyntaxOptions.sqlite,
      sql: "SELECT a::int, b FROM t WHERE c = :c AND d = $d ORDER BY a",
    },
  ];

  for (const { name, syntaxOptions, sql } of DIALECT_QUERIES) {
    test(`round trip and reformatting are idempotent under ${name}`, () => {
      const query = parseQuery(sql, { syntaxOptions });
      expect(query.toSql()).toBe(sql);
      expect(parseQuery(query.toSql(), { syntaxOptions }).toSql()).toBe(sql);

      for (const mode of ["prefixed", "suffixed"] as const) {
        const once = query.toSql({ mode });
        expect(formatSql(once, { mode, indentSize: 4 }, syntaxOptions)).toBe(once);
        expect(parseQuery(once, { syntaxOptions }).toSql()).toBe(sql);
      }
    });
  }

  test("both comma styles reduce to the same canonical SQL", () => {
    const query = parseQuery("SELECT a, b, c FROM t");
    const prefixed = query.toSql({ mode: "prefixed" });
    const suffixed = query.toSql({ mode: "suffixed" });

    expect(prefixed).toBe("SELECT\n    a\n   ,b\n   ,c\nFROM t");
    expect(suffixed).toBe("SELECT\n    a,\n    b,\n    c\nFROM t");
    expect(parseQuery(prefixed).toSql()).toBe(parseQuery(suffixed).toSql());
  });
});

/**
 * Segment Mutation Tests
 */

import { describe, test, expect } from "vitest";
import { parseQuery, SelectStatement, UpdateStatement, DeleteStatement, SyntaxOptions } from "../src/index.ts";

function selectOf(sql: string, options?: SyntaxOptions): SelectStatement {
  const root = parseQuery(sql, { syntaxOptions: options }).rootStatement;
  if (!(root instanceof SelectStatement)) throw new Error(`Expected SELECT, got ${root.kind}`);
  return root;
}

describe("Segment mutation", () => {
  test("adds columns, a predicate and an ordering", () => {
    const select = selectOf("SELECT table1.champ1 FROM table1");

    select.select.addCommaSeparatedElement("table1.champ2");
    select.ensureWhereSegment().addConjunction("AND", "table1.champ1 IS NOT NULL");
    select.ensureOrderBySegment().addCommaSeparatedElement("table1.champ1");

    expect(select.toSql()).toBe(
      "SELECT table1.champ1, table1.champ2 FROM table1 WHERE table1.champ1 IS NOT NULL ORDER BY table1.champ1"
    );
  });

  test("conjunction joins existing predicates", () => {
    const select = selectOf("SELECT * FROM t WHERE a = 1");
    select.ensureWhereSegment().addConjunction("OR", "b = 2");
    expect(select.where?.toSql()).toBe("a = 1 OR b = 2");
  });

  test("ensure returns the existing segment", () => {
    const select = selectOf("SELECT * FROM t WHERE a = 1");
    expect(select.ensureWhereSegment()).toBe(select.where);
  });

  test("ensured segments are appended to the segment list", () => {
    const select = selectOf("SELECT * FROM t");
    select.ensureLimitSegment();
    expect(select.segments.map((segment) => segment.name)).toEqual(["Select", "From", "Limit"]);
  });

  test("an ensured but empty segment is left out of the SQL", () => {
    const select = selectOf("SELECT * FROM t");
    select.ensureWhereSegment();
    expect(select.toSql()).toBe("SELECT * FROM t");
  });

  test("FROM can be added to a SELECT without one", () => {
    const select = selectOf("SELECT 1");
    select.ensureFromSegment().addRaw("dual");
    expect(select.toSql()).toBe("SELECT 1 FROM dual");
  });

  test("appended subqueries become nested statements", () => {
    const query = parseQuery("SELECT name FROM users");
    const root = query.rootStatement;
    if (!(root instanceof SelectStatement)) throw new Error("Expected SELECT");

    root.ensureWhereSegment().addConjunction("AND", "id IN (SELECT user_id FROM admins)");

    expect(root.where?.toSql()).toBe("id IN (SELECT user_id FROM admins)");
    expect(query.allStatements.map((statement) => statement.toSql())).toEqual([
      "SELECT name FROM users WHERE id IN (SELECT user_id FROM admins)",
      "SELECT user_id FROM admins",
    ]);
  });

  test("appended fragments are tokenized with the statement's dialect", () => {
    const select = selectOf("SELECT * FROM accounts", SyntaxOptions.oracle);
    const where = select.ensureWhereSegment();
    where.addRaw("id = :account_id");

    expect(where.parts.map((part) => (part.kind === "token" ? part.token.text : "(subquery)"))).toEqual([
      "id",
      "=",
      ":account_id",
    ]);
  });

  test("UPDATE and DELETE gain optional clauses", () => {
    const update = parseQuery("UPDATE t SET a = 1").rootStatement;
    if (!(update instanceof UpdateStatement)) throw new Error("Expected UPDATE");
    update.ensureWhereSegment().addRaw("id = @id");
    update.ensureOutputSegment().addCommaSeparatedElement("inserted.a");
    expect(update.toSql()).toBe("UPDATE t SET a = 1 OUTPUT inserted.a WHERE id = @id");

    const remove = parseQuery("DELETE FROM t").rootStatement;
    if (!(remove instanceof DeleteStatement)) throw new Error("Expected DELETE");
    remove.ensureReturningSegment().addRaw("id");
    expect(remove.toSql()).toBe("DELETE FROM t RETURNING id");
  });

  describe("argument checks", () => {
    test("rejects blank fragments", () => {
      const select = selectOf("SELECT a FROM t");
      expect(() => select.select.addRaw(" ")).toThrow("SQL text cannot be empty.");
      expect(() => select.select.addCommaSeparatedElement("")).toThrow(TypeError);
      expect(() => select.ensureWhereSegment().addConjunction("AND", "")).toThrow(
        "Expression text cannot be empty."
      );
    });

    test("conjunction is only required once the segment has content", () => {
      const where = selectOf("SELECT a FROM t").ensureWhereSegment();
      where.addConjunction("", "a = 1");
      expect(where.toSql()).toBe("a = 1");
      expect(() => where.addConjunction("", "b = 2")).toThrow("Conjunction cannot be empty.");
    });
  });
});

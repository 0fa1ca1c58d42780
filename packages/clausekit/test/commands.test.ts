/**
 * CLI Command Tests
 */

import { describe, test, expect } from "vitest";
import { describeError, formatCommand, inspectCommand, isCommandName } from "../src/commands.ts";
import { SyntaxOptions } from "../src/index.ts";

describe("CLI commands", () => {
  test("format prints canonical SQL", () => {
    const result = formatCommand("select a\nfrom t", SyntaxOptions.default, { mode: "inline", indentSize: 4 });
    expect(result).toEqual({ success: true, output: "SELECT a FROM t" });
  });

  test("format applies the layout", () => {
    const result = formatCommand("SELECT a, b FROM t", SyntaxOptions.default, { mode: "suffixed", indentSize: 2 });
    expect(result).toEqual({ success: true, output: "SELECT\n  a,\n  b\nFROM t" });
  });

  test("inspect lists nested statements", () => {
    const result = inspectCommand("SELECT a FROM t WHERE id IN (SELECT id FROM u)", SyntaxOptions.default);
    expect(result).toEqual({
      success: true,
      output: "0: SELECT SELECT a FROM t WHERE id IN (SELECT id FROM u)\n1: SELECT SELECT id FROM u",
    });
  });

  test("errors are passed through", () => {
    const result = inspectCommand("SELECT a FROM", SyntaxOptions.default);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors[0]?.message).toBe("Expected table but none was found.");
    expect(result.errors[0]?.location).toEqual({ line: 1, column: 10, offset: 9 });
  });

  test("dialect decides how prefixes are read", () => {
    const result = inspectCommand("UPDATE t SET a = $1", SyntaxOptions.postgreSql);
    expect(result).toEqual({ success: true, output: "0: UPDATE UPDATE t SET a = $1" });
  });

  test("errors are described as file, line and column", () => {
    const result = inspectCommand("SELECT a\nFROM t\nWHERE", SyntaxOptions.default);
    if (result.success) throw new Error("Expected inspect to fail");
    expect(result.errors.map((error) => describeError(error, "report.sql"))).toEqual([
      "report.sql:3:1: error: Expected expression after WHERE.",
    ]);
    expect(describeError({ message: "SQL text cannot be empty.", severity: "error" }, "empty.sql")).toBe(
      "empty.sql: error: SQL text cannot be empty."
    );
  });

  test("isCommandName", () => {
    expect(isCommandName("format")).toBe(true);
    expect(isCommandName("compile")).toBe(false);
  });
});

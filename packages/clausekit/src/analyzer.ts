/**
 * SQL Analyzer
 *
 * Main entry point: parses SQL text into a SqlQuery. Provides a
 * result-object API and a throwing convenience wrapper.
 */

import { SqlParseError, toParseError } from "./errors.ts";
import { tokenize } from "./lexer.ts";
import { DEFAULT_MAX_DEPTH, parseStatement } from "./parser.ts";
import { SqlQuery } from "./statements.ts";
import { SyntaxOptions } from "./syntax-options.ts";
import type { ParseOptions, ParseResult } from "./types.ts";

function resolveMaxDepth(maxDepth: number | undefined): number {
  const value = maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError("maxDepth must be a non-negative integer.");
  }
  return value;
}

/**
 * Parse SQL text into a structural query.
 *
 * @param sql - A single SELECT, INSERT, UPDATE or DELETE statement, optionally preceded by WITH
 * @returns ParseResult with the query on success, or the parse error
 */
export function parse(sql: string, options: ParseOptions = {}): ParseResult {
  const syntaxOptions = options.syntaxOptions ?? SyntaxOptions.default;
  const maxDepth = resolveMaxDepth(options.maxDepth);

  if (sql.trim().length === 0) {
    return {
      success: false,
      errors: [{ message: "SQL text cannot be empty.", severity: "error" }],
    };
  }

  try {
    const statement = parseStatement(tokenize(sql, syntaxOptions), syntaxOptions, maxDepth);
    return { success: true, query: new SqlQuery(statement, syntaxOptions), errors: [] };
  } catch (error) {
    if (error instanceof SqlParseError) {
      return { success: false, errors: [toParseError(error)] };
    }
    throw error;
  }
}

/**
 * Convenience function that returns the query or throws on error.
 *
 * @throws SqlParseError if the text cannot be parsed
 */
export function parseQuery(sql: string, options: ParseOptions = {}): SqlQuery {
  const result = parse(sql, options);

  if (!result.success) {
    const [error] = result.errors;
    throw new SqlParseError(error?.message ?? "Parse failed.", error?.location);
  }

  return result.query;
}

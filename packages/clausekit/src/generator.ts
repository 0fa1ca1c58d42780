/**
 * SQL Text Generator
 *
 * Joins token texts back into a single line of SQL. Every segment,
 * statement and formatted line goes through the same spacing rule so
 * regenerated text is stable.
 */

import type { Part } from "./types.ts";

// ============================================================================
// Spacing Rules
// ============================================================================

/** Keywords that keep a space before a following "(" */
const SPACE_BEFORE_PAREN_KEYWORDS = new Set([
  "SELECT",
  "FROM",
  "WHERE",
  "GROUP",
  "HAVING",
  "ORDER",
  "LIMIT",
  "OFFSET",
  "VALUES",
  "IN",
  "EXISTS",
  "JOIN",
  "INNER",
  "LEFT",
  "RIGHT",
  "FULL",
  "OUTER",
  "ON",
  "USING",
  "RETURNING",
  "UPDATE",
  "INSERT",
  "DELETE",
  "SET",
  "AS",
  "DISTINCT",
  "WITH",
  "UNION",
  "INTERSECT",
  "EXCEPT",
  "CASE",
  "WHEN",
  "THEN",
  "ELSE",
]);

const NO_SPACE_BEFORE = new Set([",", ")", ".", ";", ":", "]", "::"]);

function isLetterOrDigit(char: string): boolean {
  return /[\p{L}\p{N}]/u.test(char);
}

function shouldInsertSpace(previous: string, current: string): boolean {
  if (current.length === 0 || previous.length === 0) return false;
  if (NO_SPACE_BEFORE.has(current)) return false;
  if (previous === "::") return false;

  const last = previous[previous.length - 1] ?? "";

  if (current === "(") {
    if (SPACE_BEFORE_PAREN_KEYWORDS.has(previous.toUpperCase())) return true;
    if (last === "(" || last === "[" || last === ".") return false;
    return !isLetterOrDigit(last);
  }

  return last !== "(" && last !== "[" && last !== ".";
}

/**
 * Join token texts with single spaces where the spacing rule asks for one.
 */
export function joinTokens(tokens: readonly string[]): string {
  let result = "";
  let previous: string | null = null;

  for (const token of tokens) {
    if (previous !== null && result.length > 0 && shouldInsertSpace(previous, token)) {
      result += " ";
    }
    result += token;
    previous = token;
  }

  return result;
}

// ============================================================================
// Segment Parts
// ============================================================================

function partTexts(part: Part): string[] {
  switch (part.kind) {
    case "token":
      return [part.token.text];
    case "subquery":
      return ["(", part.statement.toSql(), ")"];
  }
}

/**
 * Render segment parts as one line; subqueries are wrapped in parentheses.
 */
export function renderParts(parts: readonly Part[]): string {
  return joinTokens(parts.flatMap(partTexts));
}

/**
 * Shared Type Definitions
 *
 * Tokens, segment parts, options and result shapes used across the
 * lexer, parser, statement model and formatter.
 */

import type { Statement, SqlQuery } from "./statements.ts";
import type { SyntaxOptions } from "./syntax-options.ts";

// ============================================================================
// Tokens
// ============================================================================

export interface Token {
  /** Source text, verbatim */
  text: string;
  /** Uppercase for keywords, otherwise identical to text */
  normalizedText: string;
  isIdentifier: boolean;
  isKeyword: boolean;
  /** Zero-based offset in the text the token was lexed from; -1 for synthetic tokens */
  offset: number;
  /** One-based line and column of the first character */
  line: number;
  column: number;
  /** One-based line and column of the last character */
  endLine: number;
  endColumn: number;
}

// ============================================================================
// Segment Parts
// ============================================================================

export interface TokenPart {
  kind: "token";
  token: Token;
}

export interface SubqueryPart {
  kind: "subquery";
  statement: Statement;
}

export type Part = TokenPart | SubqueryPart;

/** A select-list or output-list item split into its expression and alias. */
export interface ColumnExpression {
  expression: string;
  alias?: string;
}

// ============================================================================
// Clause Slots
// ============================================================================

export type ClauseStart =
  | "Select"
  | "From"
  | "Where"
  | "GroupBy"
  | "Having"
  | "OrderBy"
  | "Limit"
  | "Offset"
  | "Into"
  | "Values"
  | "Output"
  | "Returning"
  | "Using"
  | "Set"
  | "Update"
  | "Delete"
  | "SetOperator"
  | "StatementEnd";

// ============================================================================
// Options
// ============================================================================

export type FormattingMode = "inline" | "prefixed" | "suffixed";

export interface FormattingOptions {
  mode: FormattingMode;
  indentSize: number;
}

export interface ParseOptions {
  syntaxOptions?: SyntaxOptions;
  /** Maximum nesting of statements (CTE bodies, subqueries, INSERT sources) */
  maxDepth?: number;
}

// ============================================================================
// Results
// ============================================================================

export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface ParseError {
  message: string;
  location?: Position;
  severity: "error";
}

export type ParseResult =
  | { success: true; query: SqlQuery; errors: [] }
  | { success: false; errors: ParseError[] };

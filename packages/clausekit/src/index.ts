/**
 * clausekit - SQL Statement Analyzer
 *
 * Parses SELECT, INSERT, UPDATE and DELETE statements into clause
 * segments and nested statements, lets callers append to those segments,
 * and prints the result back as canonical or pretty-printed SQL.
 */

export { parse, parseQuery } from "./analyzer.ts";
export {
  SqlQuery,
  Statement,
  SelectStatement,
  InsertStatement,
  UpdateStatement,
  DeleteStatement,
  WithClause,
  CteDefinition,
  outputColumns,
} from "./statements.ts";
export { Segment } from "./segment.ts";
export { SyntaxOptions, DIALECT_NAMES, isDialectName } from "./syntax-options.ts";
export { tokenize, isKeyword } from "./lexer.ts";
export { CLAUSE_KEYWORDS, isClauseStart, matchClause } from "./clauses.ts";
export { joinTokens } from "./generator.ts";
export { formatSql, resolveFormattingOptions, DEFAULT_FORMATTING } from "./formatter.ts";
export { DEFAULT_MAX_DEPTH } from "./parser.ts";
export { SqlParseError } from "./errors.ts";
export { createSqlBuilder, parseParameterized } from "./parameters.ts";
export type { ParameterizedSql, SqlBuilder } from "./parameters.ts";
export type { DialectName } from "./syntax-options.ts";
export type { StatementKind, SelectSegments, InsertSegments, UpdateSegments, DeleteSegments } from "./statements.ts";
export type {
  Token,
  Part,
  TokenPart,
  SubqueryPart,
  ColumnExpression,
  ClauseStart,
  FormattingMode,
  FormattingOptions,
  ParseOptions,
  ParseResult,
  ParseError,
  Position,
} from "./types.ts";

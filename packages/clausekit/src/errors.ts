/**
 * Parse Errors
 */

import type { ParseError, Position, Token } from "./types.ts";

export class SqlParseError extends Error {
  /** Where the offending token starts, when one exists */
  readonly location: Position | undefined;

  constructor(message: string, location?: Position) {
    super(message);
    this.name = "SqlParseError";
    this.location = location;
  }
}

/**
 * Start position of a token lexed from source. Synthetic tokens have none.
 */
export function positionOf(token: Token | undefined): Position | undefined {
  if (!token || token.offset < 0) return undefined;
  return { line: token.line, column: token.column, offset: token.offset };
}

/**
 * Position just past the last character of a token.
 */
export function positionAfter(token: Token | undefined): Position | undefined {
  if (!token || token.offset < 0) return undefined;
  return { line: token.endLine, column: token.endColumn + 1, offset: token.offset + token.text.length };
}

export function toParseError(error: SqlParseError): ParseError {
  return {
    message: error.message,
    location: error.location,
    severity: "error",
  };
}

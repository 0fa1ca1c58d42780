/**
 * Clause Body Readers
 *
 * Split and check the parts of a clause body: comma-separated expression
 * lists (with alias detection) and table lists (with JOIN/ON matching).
 * The parser runs them while building segments; statements run them again
 * on demand to expose columns.
 */

import { SqlParseError, positionOf } from "./errors.ts";
import { renderParts } from "./generator.ts";
import type { ColumnExpression, Part, Token } from "./types.ts";

// ============================================================================
// Part Helpers
// ============================================================================

function tokenOf(part: Part | undefined): Token | undefined {
  return part?.kind === "token" ? part.token : undefined;
}

function isText(part: Part | undefined, text: string): boolean {
  return tokenOf(part)?.text === text;
}

function isKeyword(part: Part | undefined, keyword: string): boolean {
  const token = tokenOf(part);
  return token !== undefined && token.isKeyword && token.normalizedText === keyword;
}

/** First source token in `parts`, for error reporting. */
export function firstToken(parts: readonly Part[]): Token | undefined {
  for (const part of parts) {
    const token = tokenOf(part);
    if (token && token.offset >= 0) return token;
  }
  return undefined;
}

// ============================================================================
// Expression Lists
// ============================================================================

interface ListItem {
  parts: Part[];
  /** Separator or clause keyword before the item */
  anchor: Token | undefined;
}

/**
 * Split on commas outside parentheses and outside CASE ... END.
 */
export function splitTopLevel(parts: readonly Part[], anchor?: Token): ListItem[] {
  const items: ListItem[] = [];
  let current: ListItem = { parts: [], anchor };
  let parenthesisDepth = 0;
  let caseDepth = 0;

  for (const part of parts) {
    const token = tokenOf(part);

    if (token?.text === "," && parenthesisDepth === 0 && caseDepth === 0) {
      items.push(current);
      current = { parts: [], anchor: token };
      continue;
    }

    current.parts.push(part);

    if (!token) continue;
    if (token.text === "(") {
      parenthesisDepth++;
    } else if (token.text === ")" && parenthesisDepth > 0) {
      parenthesisDepth--;
    }
    if (token.normalizedText === "CASE") {
      caseDepth++;
    } else if (token.normalizedText === "END" && caseDepth > 0) {
      caseDepth--;
    }
  }

  items.push(current);
  return items;
}

function isAliasSeparator(part: Part | undefined): boolean {
  return isText(part, ".") || isText(part, "::");
}

/**
 * Remove a trailing alias from `parts` and return it.
 *
 * `expr AS name` is explicit. A lone trailing identifier that is not a
 * keyword and does not follow "." or "::" is taken as an implicit alias;
 * expressions that happen to end in a bare identifier are misread.
 */
function extractAlias(parts: Part[]): string | undefined {
  if (parts.length < 2) return undefined;

  const last = parts[parts.length - 1];
  const beforeLast = parts[parts.length - 2];
  const lastToken = tokenOf(last);

  if (isKeyword(beforeLast, "AS")) {
    if (!lastToken?.isIdentifier) {
      const found = lastToken?.text ?? "(";
      throw new SqlParseError(`Expected identifier after AS but found '${found}'.`, positionOf(lastToken));
    }
    parts.splice(parts.length - 2, 2);
    return lastToken.text;
  }

  if (lastToken?.isIdentifier && !lastToken.isKeyword && !isAliasSeparator(beforeLast)) {
    parts.pop();
    return lastToken.text;
  }

  return undefined;
}

/**
 * Read a comma-separated expression list. Every item must be non-empty.
 */
export function readExpressionList(
  parts: readonly Part[],
  allowAlias: boolean,
  anchor?: Token
): ColumnExpression[] {
  return splitTopLevel(parts, anchor).map((item) => {
    if (item.parts.length === 0) {
      throw new SqlParseError("Expected expression but none was found.", positionOf(item.anchor));
    }

    const expressionParts = [...item.parts];
    const alias = allowAlias ? extractAlias(expressionParts) : undefined;

    if (expressionParts.length === 0) {
      throw new SqlParseError(
        "Expression cannot be reduced to an alias only.",
        positionOf(firstToken(item.parts) ?? item.anchor)
      );
    }

    const expression = renderParts(expressionParts);
    return alias === undefined ? { expression } : { expression, alias };
  });
}

// ============================================================================
// Table Lists
// ============================================================================

/**
 * Split a FROM/USING body into table sources. Each JOIN not preceded by
 * CROSS must be matched by an ON at the same depth; commas only separate
 * sources once every JOIN has its ON.
 */
export function readTableList(parts: readonly Part[], anchor?: Token): string[] {
  const sources: string[] = [];
  let current: Part[] = [];
  let currentAnchor = anchor;
  let depth = 0;
  let joinCount = 0;
  let onCount = 0;

  const finish = (): void => {
    if (current.length === 0) {
      throw new SqlParseError("Expected table but none was found.", positionOf(currentAnchor));
    }
    if (onCount < joinCount) {
      throw new SqlParseError(
        "Missing ON clause for one or more JOIN operations.",
        positionOf(firstToken(current) ?? currentAnchor)
      );
    }
    sources.push(renderParts(current));
  };

  for (const part of parts) {
    const token = tokenOf(part);

    if (depth === 0 && onCount >= joinCount && token?.text === ",") {
      finish();
      current = [];
      currentAnchor = token;
      joinCount = 0;
      onCount = 0;
      continue;
    }

    const previous = current[current.length - 1];
    current.push(part);

    if (!token) continue;
    if (token.text === "(") {
      depth++;
    } else if (token.text === ")" && depth > 0) {
      depth--;
    } else if (depth === 0 && token.isKeyword && token.normalizedText === "JOIN") {
      if (!isKeyword(previous, "CROSS")) joinCount++;
    } else if (depth === 0 && token.isKeyword && token.normalizedText === "ON") {
      onCount++;
    }
  }

  finish();
  return sources;
}

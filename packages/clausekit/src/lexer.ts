/**
 * SQL Lexer
 *
 * Defines the SQL token categories using Chevrotain. The identifier
 * pattern depends on the dialect's prefix characters, so one lexer is
 * built per SyntaxOptions instance and cached.
 */

import { createToken, Lexer } from "chevrotain";
import type { ICustomPattern, IToken, TokenType } from "chevrotain";
import keywordList from "./keywords.json";
import { SqlParseError } from "./errors.ts";
import { SyntaxOptions } from "./syntax-options.ts";
import type { Token } from "./types.ts";

const KEYWORDS: ReadonlySet<string> = new Set(keywordList.map((keyword) => keyword.toUpperCase()));

export function isKeyword(word: string): boolean {
  return KEYWORDS.has(word.toUpperCase());
}

/**
 * Wrap a sticky RegExp as a custom pattern. Chevrotain rebuilds plain
 * RegExp patterns without their unicode flag and rejects `$` anchors.
 */
function stickyPattern(regex: RegExp): ICustomPattern {
  return {
    exec: (text: string, offset: number) => {
      regex.lastIndex = offset;
      return regex.exec(text);
    },
  };
}

// ============================================================================
// Whitespace & Comments
// ============================================================================

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

export const LineComment = createToken({
  name: "LineComment",
  pattern: /--[^\r\n]*/,
  group: Lexer.SKIPPED,
});

// Unterminated comments run to the end of input
export const BlockComment = createToken({
  name: "BlockComment",
  pattern: stickyPattern(/\/\*[\s\S]*?(?:\*\/|$)/y),
  group: Lexer.SKIPPED,
  line_breaks: true,
});

// ============================================================================
// Literals & Quoted Identifiers
// ============================================================================

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /'(?:[^']|'')*'?/,
  line_breaks: true,
});

export const QuotedLiteral = createToken({
  name: "QuotedLiteral",
  pattern: /"(?:[^"]|"")*"?/,
  line_breaks: true,
});

export const BracketIdentifier = createToken({
  name: "BracketIdentifier",
  pattern: /\[[^\]]*\]?/,
  line_breaks: true,
});

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /[0-9][0-9.]*/,
});

// ============================================================================
// Operators & Punctuation
// ============================================================================

export const DoubleColon = createToken({
  name: "DoubleColon",
  pattern: /::/,
});

export const ComparisonOperator = createToken({
  name: "ComparisonOperator",
  pattern: /[><]=|<>|!=/,
});

export const Punctuation = createToken({
  name: "Punctuation",
  pattern: stickyPattern(/[^\s]/uy),
  line_breaks: false,
});

// ============================================================================
// Identifiers (dialect dependent)
// ============================================================================

function escapeForCharClass(char: string): string {
  return char.replace(/[\\\]\[^-]/g, "\\$&");
}

/**
 * A word starts with a letter, `_`, `$` or a prefix character and
 * continues with those or digits. When `:` is a prefix it never
 * continues a word into `::`, so `a::int` stays a cast.
 */
function createWordToken(options: SyntaxOptions): TokenType {
  const prefixes = [...options.identifierPrefixes];
  const start = prefixes.map(escapeForCharClass).join("");
  const part = prefixes
    .filter((prefix) => prefix !== ":")
    .map(escapeForCharClass)
    .join("");
  const colon = prefixes.includes(":") ? "|:(?!:)" : "";
  const word = new RegExp(`[\\p{L}_$${start}](?:[\\p{L}\\p{N}_$${part}]${colon})*`, "uy");

  return createToken({
    name: "Word",
    pattern: stickyPattern(word),
    line_breaks: false,
  });
}

// ============================================================================
// Lexer Assembly
// ============================================================================

interface DialectLexer {
  lexer: Lexer;
  word: TokenType;
}

const lexerCache = new WeakMap<SyntaxOptions, DialectLexer>();

function lexerFor(options: SyntaxOptions): DialectLexer {
  const cached = lexerCache.get(options);
  if (cached) return cached;

  const word = createWordToken(options);
  // Order matters: the first matching pattern wins. DoubleColon goes
  // ahead of words so `::` is never read as a `:`-prefixed name.
  const allTokens = [
    WhiteSpace,
    LineComment,
    BlockComment,
    StringLiteral,
    QuotedLiteral,
    BracketIdentifier,
    DoubleColon,
    word,
    NumberLiteral,
    ComparisonOperator,
    Punctuation,
  ];

  const lexer = new Lexer(allTokens, {
    positionTracking: "full",
    safeMode: true,
  });
  const entry = { lexer, word };
  lexerCache.set(options, entry);
  return entry;
}

function toToken(raw: IToken, word: TokenType): Token {
  const text = raw.image;
  const position = {
    offset: raw.startOffset,
    line: raw.startLine ?? 0,
    column: raw.startColumn ?? 0,
    endLine: raw.endLine ?? 0,
    endColumn: raw.endColumn ?? 0,
  };

  if (raw.tokenType === word) {
    const keyword = isKeyword(text);
    return {
      text,
      normalizedText: keyword ? text.toUpperCase() : text,
      isIdentifier: !keyword,
      isKeyword: keyword,
      ...position,
    };
  }

  return {
    text,
    normalizedText: text,
    isIdentifier: raw.tokenType === BracketIdentifier,
    isKeyword: false,
    ...position,
  };
}

/**
 * Convert SQL text into tokens. Whitespace and comments are dropped.
 */
export function tokenize(input: string, options: SyntaxOptions = SyntaxOptions.default): Token[] {
  const { lexer, word } = lexerFor(options);
  const result = lexer.tokenize(input);

  const [error] = result.errors;
  if (error) {
    throw new SqlParseError(error.message, {
      line: error.line ?? 0,
      column: error.column ?? 0,
      offset: error.offset,
    });
  }

  return result.tokens.map((raw) => toToken(raw, word));
}

/**
 * Build a standalone punctuation token that does not come from source text.
 */
export function symbolToken(text: string): Token {
  return {
    text,
    normalizedText: text,
    isIdentifier: false,
    isKeyword: false,
    offset: -1,
    line: 0,
    column: 0,
    endLine: 0,
    endColumn: 0,
  };
}

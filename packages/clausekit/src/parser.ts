/**
 * SQL Statement Parser
 *
 * Recursive-descent parser over a token cursor. The leading keyword picks
 * a statement grammar; each clause body is read up to the next clause
 * boundary, then lowered to segment parts. Parenthesized spans that start
 * a statement are parsed recursively into subqueries.
 */

import { isClauseStart, matchClause } from "./clauses.ts";
import { SqlParseError, positionAfter, positionOf } from "./errors.ts";
import { tokenize } from "./lexer.ts";
import { readExpressionList, readTableList } from "./readers.ts";
import { Segment } from "./segment.ts";
import {
  CteDefinition,
  DeleteStatement,
  InsertStatement,
  SelectStatement,
  UpdateStatement,
  WithClause,
} from "./statements.ts";
import type { SelectSegments, Statement } from "./statements.ts";
import type { SyntaxOptions } from "./syntax-options.ts";
import type { ClauseStart, Part, Position, Token } from "./types.ts";

export const DEFAULT_MAX_DEPTH = 64;

const STATEMENT_KEYWORDS = new Set(["SELECT", "INSERT", "UPDATE", "DELETE", "WITH"]);

// ============================================================================
// Statement Dispatch
// ============================================================================

type StatementParser = (parser: SqlParser, withClause: WithClause | undefined) => Statement;

const STATEMENT_PARSERS: ReadonlyMap<string, StatementParser> = new Map<string, StatementParser>([
  ["SELECT", (parser, withClause) => parser.parseSelect(withClause)],
  ["INSERT", (parser, withClause) => parser.parseInsert(withClause)],
  ["UPDATE", (parser, withClause) => parser.parseUpdate(withClause)],
  ["DELETE", (parser, withClause) => parser.parseDelete(withClause)],
]);

// ============================================================================
// SELECT Clause Table
// ============================================================================

type BodyKind = "tables" | "list" | "aliasedList" | "predicate" | "tail";

interface SelectClause {
  clause: ClauseStart;
  slot: Exclude<keyof SelectSegments, "select">;
  name: string;
  body: BodyKind;
}

const SELECT_CLAUSES: readonly SelectClause[] = [
  { clause: "From", slot: "from", name: "From", body: "tables" },
  { clause: "Where", slot: "where", name: "Where", body: "predicate" },
  { clause: "GroupBy", slot: "groupBy", name: "GroupBy", body: "list" },
  { clause: "Having", slot: "having", name: "Having", body: "predicate" },
  { clause: "OrderBy", slot: "orderBy", name: "OrderBy", body: "list" },
  { clause: "Limit", slot: "limit", name: "Limit", body: "predicate" },
  { clause: "Offset", slot: "offset", name: "Offset", body: "predicate" },
  { clause: "SetOperator", slot: "tail", name: "Tail", body: "tail" },
];

const SELECT_LIST_TERMINATORS: readonly ClauseStart[] = [
  ...SELECT_CLAUSES.map((entry) => entry.clause),
  "StatementEnd",
];

// ============================================================================
// Parser
// ============================================================================

export class SqlParser {
  private position = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly syntaxOptions: SyntaxOptions,
    private readonly depth: number = 0,
    private readonly maxDepth: number = DEFAULT_MAX_DEPTH
  ) {}

  // --------------------------------------------------------------------------
  // Entry Points
  // --------------------------------------------------------------------------

  parseStatementWithOptionalCte(): Statement {
    let withClause: WithClause | undefined;
    if (this.tryConsumeKeyword("WITH")) {
      withClause = this.parseWithClause();
    }

    const next = this.peek();
    if (!next) {
      throw this.errorAtEnd("Unexpected end of input while expecting a statement.");
    }

    const parse = STATEMENT_PARSERS.get(next.normalizedText);
    if (!parse) {
      throw new SqlParseError(`Unsupported statement starting with '${next.text}'.`, positionOf(next));
    }
    return parse(this, withClause);
  }

  consumeOptionalTerminator(): void {
    while (this.peek()?.text === ";") {
      this.position++;
    }
  }

  ensureEndOfInput(): void {
    const next = this.peek();
    if (next) {
      throw new SqlParseError(`Unexpected token '${next.text}' after end of statement.`, positionOf(next));
    }
  }

  /** Parse one complete statement: optional CTEs, the statement, trailing semicolons. */
  parseComplete(): Statement {
    const statement = this.parseStatementWithOptionalCte();
    this.consumeOptionalTerminator();
    this.ensureEndOfInput();
    return statement;
  }

  /**
   * Turn a token span into segment parts, parsing parenthesized
   * statements into subquery parts.
   */
  lowerTokens(tokens: readonly Token[]): Part[] {
    const parts: Part[] = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      if (!token) continue;

      if (token.text === "(") {
        const closing = findMatchingParenthesis(tokens, i);
        const first = tokens[i + 1];
        if (closing > i + 1 && first && STATEMENT_KEYWORDS.has(first.normalizedText)) {
          const statement = this.parseNested(tokens.slice(i + 1, closing), token);
          parts.push({ kind: "subquery", statement });
          i = closing;
          continue;
        }
      }

      parts.push({ kind: "token", token });
    }

    return parts;
  }

  // --------------------------------------------------------------------------
  // WITH
  // --------------------------------------------------------------------------

  private parseWithClause(): WithClause {
    const isRecursive = this.tryConsumeKeyword("RECURSIVE");
    const definitions: CteDefinition[] = [];

    do {
      const name = this.expectIdentifier();
      let columns: string[] | undefined;
      if (this.tryConsumeSymbol("(")) {
        columns = this.parseColumnList();
        this.expectSymbol(")");
      }
      this.expectKeyword("AS");
      const open = this.expectSymbol("(");
      const body = this.readTokensUntilMatchingParenthesis(open);
      definitions.push(new CteDefinition(name, columns, this.parseNested(body, open)));
    } while (this.tryConsumeSymbol(","));

    return new WithClause(isRecursive, definitions);
  }

  private parseColumnList(): string[] {
    const columns: string[] = [];
    do {
      columns.push(this.expectIdentifier());
    } while (this.tryConsumeSymbol(","));
    return columns;
  }

  // --------------------------------------------------------------------------
  // SELECT
  // --------------------------------------------------------------------------

  parseSelect(withClause: WithClause | undefined): SelectStatement {
    const keyword = this.expectKeyword("SELECT");
    const isDistinct = this.tryConsumeKeyword("DISTINCT");

    const select = this.buildSegment("Select", this.readSectionTokens(SELECT_LIST_TERMINATORS));
    readExpressionList(select.parts, true, keyword);

    const segments: SelectSegments = { select };
    SELECT_CLAUSES.forEach((entry, index) => {
      const start = this.peek();
      const length = matchClause(this.tokens, this.position, entry.clause);
      if (!start || length === 0) return;

      const keywordTokens = this.tokens.slice(this.position, this.position + length);
      this.position += length;

      const terminators: ClauseStart[] = [
        ...SELECT_CLAUSES.slice(index + 1).map((later) => later.clause),
        "StatementEnd",
      ];
      const bodyTokens = this.readSectionTokens(terminators);
      const keywordText = keywordTokens.map((token) => token.normalizedText).join(" ");

      if (entry.body === "tail") {
        const operands = bodyTokens.filter((token) => token.normalizedText !== "ALL");
        if (operands.length === 0) {
          throw new SqlParseError(`Expected expression after ${keywordText}.`, positionOf(start));
        }
        segments[entry.slot] = this.buildSegment(entry.name, [...keywordTokens, ...bodyTokens]);
        return;
      }

      const segment = this.buildSegment(entry.name, bodyTokens);
      this.checkBody(segment, entry.body, keywordText, start);
      segments[entry.slot] = segment;
    });

    return new SelectStatement(segments, isDistinct, withClause, this.syntaxOptions);
  }

  // --------------------------------------------------------------------------
  // INSERT
  // --------------------------------------------------------------------------

  parseInsert(withClause: WithClause | undefined): InsertStatement {
    this.expectKeyword("INSERT");
    const into = this.expectKeyword("INTO");

    const targetTokens: Token[] = [];
    for (let next = this.peek(); next && next.text !== ";"; next = this.peek()) {
      if (["VALUES", "SELECT", "WITH", "RETURNING", "OUTPUT"].some((k) => this.checkKeyword(k))) break;
      targetTokens.push(next);
      this.position++;
    }
    if (targetTokens.length === 0) {
      throw new SqlParseError("Expected table after INSERT INTO.", positionOf(into));
    }
    const target = this.buildSegment("Target", targetTokens);

    const output = this.readOptionalList("OUTPUT", "Output", ["Values", "Select", "Returning", "StatementEnd"]);

    let values: Segment | undefined;
    let sourceQuery: Statement | undefined;
    const next = this.peek();
    if (this.checkKeyword("VALUES") && next) {
      this.position++;
      values = this.buildSegment("Values", this.readSectionTokens(["Returning", "StatementEnd"]));
      this.checkBody(values, "predicate", "VALUES", next);
    } else if ((this.checkKeyword("SELECT") || this.checkKeyword("WITH")) && next) {
      sourceQuery = this.parseNested(this.readSectionTokens(["Returning", "StatementEnd"]), next);
    } else {
      throw new SqlParseError(
        "Expected VALUES or SELECT clause in INSERT statement.",
        positionOf(next) ?? this.endPosition()
      );
    }

    const returning = this.readOptionalList("RETURNING", "Returning", ["StatementEnd"]);

    return new InsertStatement({ target, output, values, returning }, sourceQuery, withClause, this.syntaxOptions);
  }

  // --------------------------------------------------------------------------
  // UPDATE
  // --------------------------------------------------------------------------

  parseUpdate(withClause: WithClause | undefined): UpdateStatement {
    const update = this.expectKeyword("UPDATE");

    const targetTokens = this.readUntilKeyword("SET");
    if (targetTokens.length === 0) {
      throw new SqlParseError("Expected table after UPDATE.", positionOf(update));
    }
    const target = this.buildSegment("Target", targetTokens);

    const setKeyword = this.expectKeyword("SET");
    const set = this.buildSegment(
      "Set",
      this.readSectionTokens(["Output", "From", "Where", "Returning", "StatementEnd"])
    );
    this.checkBody(set, "predicate", "SET", setKeyword);

    const output = this.readOptionalList("OUTPUT", "Output", ["From", "Where", "Returning", "StatementEnd"]);
    const from = this.readOptionalTables("FROM", "From", ["Where", "Returning", "StatementEnd"]);
    const where = this.readOptionalPredicate("WHERE", "Where", ["Returning", "StatementEnd"]);
    const returning = this.readOptionalList("RETURNING", "Returning", ["StatementEnd"]);

    return new UpdateStatement({ target, set, output, from, where, returning }, withClause, this.syntaxOptions);
  }

  // --------------------------------------------------------------------------
  // DELETE
  // --------------------------------------------------------------------------

  parseDelete(withClause: WithClause | undefined): DeleteStatement {
    this.expectKeyword("DELETE");

    let target: Segment | undefined;
    if (!this.checkKeyword("FROM")) {
      const targetTokens = this.readUntilKeyword("FROM");
      if (targetTokens.length > 0) {
        target = this.buildSegment("Target", targetTokens);
      }
    }

    const fromKeyword = this.expectKeyword("FROM");
    const from = this.buildSegment(
      "From",
      this.readSectionTokens(["Output", "Using", "Where", "Returning", "StatementEnd"])
    );
    this.checkBody(from, "tables", "FROM", fromKeyword);

    const output = this.readOptionalList("OUTPUT", "Output", ["Using", "Where", "Returning", "StatementEnd"]);
    const using = this.readOptionalTables("USING", "Using", ["Where", "Returning", "StatementEnd"]);
    const where = this.readOptionalPredicate("WHERE", "Where", ["Returning", "StatementEnd"]);
    const returning = this.readOptionalList("RETURNING", "Returning", ["StatementEnd"]);

    return new DeleteStatement({ target, from, output, using, where, returning }, withClause, this.syntaxOptions);
  }

  // --------------------------------------------------------------------------
  // Clause Bodies
  // --------------------------------------------------------------------------

  private readOptional(
    keyword: string,
    name: string,
    terminators: readonly ClauseStart[],
    body: BodyKind
  ): Segment | undefined {
    const start = this.peek();
    if (!start || !this.tryConsumeKeyword(keyword)) return undefined;

    const segment = this.buildSegment(name, this.readSectionTokens(terminators));
    this.checkBody(segment, body, keyword, start);
    return segment;
  }

  private readOptionalList(keyword: string, name: string, terminators: readonly ClauseStart[]): Segment | undefined {
    return this.readOptional(keyword, name, terminators, "aliasedList");
  }

  private readOptionalTables(keyword: string, name: string, terminators: readonly ClauseStart[]): Segment | undefined {
    return this.readOptional(keyword, name, terminators, "tables");
  }

  private readOptionalPredicate(
    keyword: string,
    name: string,
    terminators: readonly ClauseStart[]
  ): Segment | undefined {
    return this.readOptional(keyword, name, terminators, "predicate");
  }

  private checkBody(segment: Segment, body: BodyKind, keyword: string, anchor: Token): void {
    switch (body) {
      case "tables":
        readTableList(segment.parts, anchor);
        return;
      case "list":
      case "aliasedList":
        readExpressionList(segment.parts, body === "aliasedList", anchor);
        return;
      case "predicate":
      case "tail":
        if (segment.isEmpty) {
          throw new SqlParseError(`Expected expression after ${keyword}.`, positionOf(anchor));
        }
        return;
    }
  }

  /**
   * Collect tokens until a depth-0 ";", an unmatched ")" or the start of
   * one of `terminators`.
   */
  private readSectionTokens(terminators: readonly ClauseStart[]): Token[] {
    const collected: Token[] = [];
    let depth = 0;

    for (let next = this.peek(); next; next = this.peek()) {
      if (depth === 0 && next.text === ";") break;
      if (next.text === "(") {
        depth++;
      } else if (next.text === ")") {
        if (depth === 0) break;
        depth--;
      }
      if (depth === 0 && isClauseStart(this.tokens, this.position, terminators)) break;

      collected.push(next);
      this.position++;
    }

    return collected;
  }

  private readUntilKeyword(keyword: string): Token[] {
    const collected: Token[] = [];
    for (let next = this.peek(); next && next.text !== ";" && !this.checkKeyword(keyword); next = this.peek()) {
      collected.push(next);
      this.position++;
    }
    return collected;
  }

  private readTokensUntilMatchingParenthesis(open: Token): Token[] {
    const collected: Token[] = [];
    let depth = 1;

    for (let next = this.peek(); next; next = this.peek()) {
      this.position++;
      if (next.text === "(") {
        depth++;
      } else if (next.text === ")") {
        depth--;
        if (depth === 0) return collected;
      }
      collected.push(next);
    }

    throw new SqlParseError("Unterminated parenthesis in WITH clause definition.", positionOf(open));
  }

  private buildSegment(name: string, tokens: readonly Token[]): Segment {
    return new Segment(name, this.lowerTokens(tokens), this.syntaxOptions);
  }

  private parseNested(tokens: readonly Token[], anchor: Token): Statement {
    if (this.depth + 1 > this.maxDepth) {
      throw new SqlParseError(`Maximum nesting depth of ${this.maxDepth} exceeded.`, positionOf(anchor));
    }
    if (tokens.length === 0) {
      throw new SqlParseError("Unexpected end of input while expecting a statement.", positionOf(anchor));
    }
    return new SqlParser(tokens, this.syntaxOptions, this.depth + 1, this.maxDepth).parseComplete();
  }

  // --------------------------------------------------------------------------
  // Token Cursor
  // --------------------------------------------------------------------------

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.position + offset];
  }

  private checkKeyword(keyword: string): boolean {
    return this.peek()?.normalizedText === keyword;
  }

  private tryConsumeKeyword(keyword: string): boolean {
    if (!this.checkKeyword(keyword)) return false;
    this.position++;
    return true;
  }

  private tryConsumeSymbol(symbol: string): boolean {
    if (this.peek()?.text !== symbol) return false;
    this.position++;
    return true;
  }

  private expectKeyword(keyword: string): Token {
    const next = this.peek();
    if (!next || next.normalizedText !== keyword) {
      throw new SqlParseError(`Expected keyword '${keyword}'.`, positionOf(next) ?? this.endPosition());
    }
    this.position++;
    return next;
  }

  private expectSymbol(symbol: string): Token {
    const next = this.peek();
    if (!next || next.text !== symbol) {
      throw new SqlParseError(`Expected symbol '${symbol}'.`, positionOf(next) ?? this.endPosition());
    }
    this.position++;
    return next;
  }

  private expectIdentifier(): string {
    const next = this.peek();
    if (!next) {
      throw this.errorAtEnd("Expected identifier but reached end of statement.");
    }
    if (!next.isIdentifier) {
      throw new SqlParseError(`Expected identifier but found '${next.text}'.`, positionOf(next));
    }
    this.position++;
    return next.text;
  }

  /** Just past the last token; used when input runs out. */
  private endPosition(): Position | undefined {
    return positionAfter(this.tokens[this.tokens.length - 1]);
  }

  private errorAtEnd(message: string): SqlParseError {
    return new SqlParseError(message, this.endPosition());
  }
}

// ============================================================================
// Helpers
// ============================================================================

function findMatchingParenthesis(tokens: readonly Token[], start: number): number {
  let depth = 0;
  for (let i = start; i < tokens.length; i++) {
    const text = tokens[i]?.text;
    if (text === "(") {
      depth++;
    } else if (text === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Parse a complete statement from tokens.
 */
export function parseStatement(
  tokens: readonly Token[],
  syntaxOptions: SyntaxOptions,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Statement {
  return new SqlParser(tokens, syntaxOptions, 0, maxDepth).parseComplete();
}

/**
 * Tokenize and lower a standalone SQL fragment for appending to a segment.
 */
export function lowerFragment(sql: string, syntaxOptions: SyntaxOptions): Part[] {
  return new SqlParser([], syntaxOptions).lowerTokens(tokenize(sql, syntaxOptions));
}


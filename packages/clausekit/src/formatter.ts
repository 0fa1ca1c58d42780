/**
 * SQL Pretty Printer
 *
 * Lays canonical single-line SQL out over several lines. Clause keywords
 * start new lines, list clauses put one item per line, and parentheses
 * that hold a whole clause are broken out and indented.
 */

import { joinTokens } from "./generator.ts";
import { tokenize } from "./lexer.ts";
import { SyntaxOptions } from "./syntax-options.ts";
import type { FormattingMode, FormattingOptions, Token } from "./types.ts";

export const DEFAULT_FORMATTING: Readonly<FormattingOptions> = {
  mode: "inline",
  indentSize: 4,
};

const FORMATTING_MODES: readonly FormattingMode[] = ["inline", "prefixed", "suffixed"];

export function isFormattingMode(value: string): value is FormattingMode {
  return FORMATTING_MODES.some((mode) => mode === value);
}

/**
 * Fill in defaults and validate formatting options.
 */
export function resolveFormattingOptions(options?: Partial<FormattingOptions>): FormattingOptions {
  const mode = options?.mode ?? DEFAULT_FORMATTING.mode;
  const indentSize = options?.indentSize ?? DEFAULT_FORMATTING.indentSize;

  if (!isFormattingMode(mode)) {
    throw new RangeError(`Unknown formatting mode '${String(mode)}'.`);
  }
  if (!Number.isInteger(indentSize) || indentSize < 0) {
    throw new RangeError("Indent size must be a non-negative integer.");
  }
  return { mode, indentSize };
}

// ============================================================================
// Keyword Sets
// ============================================================================

/** Keywords that make a parenthesized group span several lines */
const CLAUSE_KEYWORDS = new Set([
  "SELECT",
  "FROM",
  "WHERE",
  "GROUP",
  "HAVING",
  "ORDER",
  "LIMIT",
  "OFFSET",
  "VALUES",
  "RETURNING",
  "SET",
  "INSERT",
  "UPDATE",
  "DELETE",
  "UNION",
  "INTERSECT",
  "EXCEPT",
]);

const JOIN_MODIFIERS = new Set(["INNER", "LEFT", "RIGHT", "FULL", "CROSS"]);

/** Keywords that start a plain line and end any list clause */
const LINE_KEYWORDS = new Set(["FROM", "WHERE", "HAVING", "LIMIT", "OFFSET", "USING", "INSERT", "UPDATE", "DELETE"]);

const STANDALONE_KEYWORDS = new Set(["WITH", "UNION", "INTERSECT", "EXCEPT"]);

const LIST_KEYWORDS = new Set(["SELECT", "VALUES", "RETURNING", "SET"]);

// ============================================================================
// Line Builder
// ============================================================================

interface FormattedLine {
  indent: number;
  tokens: string[];
  /** Render a leading "," without the space that would normally follow */
  tightLeadingComma: boolean;
}

function newLine(indent: number): FormattedLine {
  return { indent, tokens: [], tightLeadingComma: false };
}

function renderLine(line: FormattedLine): string {
  let text = joinTokens(line.tokens);
  if (line.tightLeadingComma && text.startsWith(", ")) {
    text = "," + text.slice(2);
  }
  return " ".repeat(line.indent) + text;
}

/** Whether the group opened at `start - 1` contains a clause keyword at its own level. */
function shouldExpandParenthesis(tokens: readonly Token[], start: number): boolean {
  let depth = 1;
  for (let i = start; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) break;
    if (token.text === "(") {
      depth++;
    } else if (token.text === ")") {
      depth--;
      if (depth === 0) return false;
    } else if (depth === 1 && CLAUSE_KEYWORDS.has(token.normalizedText.toUpperCase())) {
      return true;
    }
  }
  return false;
}

class PrettyPrinter {
  private readonly lines: FormattedLine[] = [];
  private current: FormattedLine | null = null;
  private readonly parentheses: boolean[] = [];
  private indentLevel = 0;
  private inList = false;
  private firstItem = false;
  private pendingComma = false;
  private clauseIndent = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly indentSize: number,
    private readonly commaAtLineStart: boolean
  ) {}

  format(): string {
    for (let i = 0; i < this.tokens.length; i++) {
      const token = this.tokens[i];
      if (!token) continue;

      const consumed = this.handleClauseStart(i, token);
      if (consumed !== null) {
        i += consumed;
        continue;
      }

      const text = token.text;

      if (this.inList && text !== ",") {
        this.prepareClauseLine();
      }

      if (text === "," && this.inList) {
        if (this.commaAtLineStart) {
          this.pendingComma = true;
        } else {
          this.append(this.clauseIndent + this.indentSize, text);
          this.commit();
          this.firstItem = true;
        }
        continue;
      }

      if (text === "(") {
        if (this.inList && this.firstItem) {
          this.prepareClauseLine();
        }
        this.append(this.effectiveIndent(), text);
        const multiline = shouldExpandParenthesis(this.tokens, i + 1);
        this.parentheses.push(multiline);
        this.indentLevel++;
        if (multiline) this.commit();
        continue;
      }

      if (text === ")") {
        const multiline = this.parentheses.pop() ?? false;
        this.indentLevel = Math.max(0, this.indentLevel - 1);
        if (multiline) this.commit();
        this.append(this.effectiveIndent(), text);
        continue;
      }

      this.append(this.effectiveIndent(), text);
    }

    this.commit();
    return this.lines.map(renderLine).join("\n");
  }

  /**
   * Lay out a clause keyword. Returns how many extra tokens were consumed,
   * or null when `token` does not start a clause.
   */
  private handleClauseStart(index: number, token: Token): number | null {
    const upper = token.normalizedText.toUpperCase();
    const baseIndent = this.indentLevel * this.indentSize;

    if (STANDALONE_KEYWORDS.has(upper)) {
      this.resetClause(false, baseIndent);
      this.startLine(baseIndent);
      this.append(baseIndent, token.text);
      this.commit();
      return 0;
    }

    if (LIST_KEYWORDS.has(upper)) {
      this.openList(baseIndent, [token.text]);
      return 0;
    }

    if (upper === "GROUP" || upper === "ORDER") {
      const next = this.tokens[index + 1];
      if (next && next.normalizedText.toUpperCase() === "BY") {
        this.openList(baseIndent, [token.text, next.text]);
        return 1;
      }
      return null;
    }

    if (LINE_KEYWORDS.has(upper) || JOIN_MODIFIERS.has(upper)) {
      this.resetClause(false, baseIndent);
      this.startLine(baseIndent);
      this.append(baseIndent, token.text);
      return 0;
    }

    if (upper === "OUTER") {
      this.resetClause(false, baseIndent);
      this.ensureLine(baseIndent);
      this.append(baseIndent, token.text);
      return 0;
    }

    if (upper === "JOIN") {
      this.resetClause(false, baseIndent);
      const last = this.current?.tokens[this.current.tokens.length - 1]?.toUpperCase();
      if (last === undefined || (!JOIN_MODIFIERS.has(last) && last !== "OUTER")) {
        this.startLine(baseIndent);
      }
      this.append(baseIndent, token.text);
      return 0;
    }

    return null;
  }

  private openList(baseIndent: number, keywordTexts: readonly string[]): void {
    this.resetClause(true, baseIndent);
    this.startLine(baseIndent);
    for (const text of keywordTexts) {
      this.append(baseIndent, text);
    }
    this.commit();
  }

  private resetClause(inList: boolean, baseIndent: number): void {
    this.inList = inList;
    this.firstItem = inList;
    this.pendingComma = false;
    this.clauseIndent = baseIndent;
  }

  private prepareClauseLine(): void {
    if (this.firstItem) {
      this.startLine(this.clauseIndent + this.indentSize);
      this.firstItem = false;
      return;
    }

    if (this.commaAtLineStart && this.pendingComma) {
      const indent = this.clauseIndent + Math.max(this.indentSize - 1, 0);
      this.startLine(indent);
      this.append(indent, ",");
      if (this.current) this.current.tightLeadingComma = true;
      this.pendingComma = false;
      return;
    }

    if (!this.current) {
      this.startLine(this.clauseIndent + this.indentSize);
    }
  }

  private effectiveIndent(): number {
    if (this.inList) {
      return this.current?.indent ?? this.clauseIndent + this.indentSize;
    }
    return this.indentLevel * this.indentSize;
  }

  private append(indent: number, text: string): void {
    this.ensureLine(indent).tokens.push(text);
  }

  private startLine(indent: number): FormattedLine {
    this.commit();
    this.current = newLine(indent);
    return this.current;
  }

  private ensureLine(indent: number): FormattedLine {
    if (!this.current) {
      this.current = newLine(indent);
      return this.current;
    }
    if (this.current.indent !== indent) {
      if (this.current.tokens.length === 0) {
        this.current = newLine(indent);
        return this.current;
      }
      return this.startLine(indent);
    }
    return this.current;
  }

  private commit(): void {
    if (this.current && this.current.tokens.length > 0) {
      this.lines.push(this.current);
    }
    this.current = null;
  }
}

/**
 * Format single-line SQL according to `options`. Inline mode returns the
 * text unchanged.
 */
export function formatSql(
  sql: string,
  options: FormattingOptions = DEFAULT_FORMATTING,
  syntaxOptions: SyntaxOptions = SyntaxOptions.default
): string {
  if (options.mode === "inline") return sql;

  const tokens = tokenize(sql, syntaxOptions);
  return new PrettyPrinter(tokens, options.indentSize, options.mode === "prefixed").format();
}

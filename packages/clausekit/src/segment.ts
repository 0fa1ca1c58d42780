/**
 * SQL Segment
 *
 * A named clause body made of ordered parts. Segments are the only
 * mutable pieces of a parsed statement: fragments can be appended as raw
 * SQL and are tokenized with the dialect the segment was parsed with.
 */

import { renderParts } from "./generator.ts";
import { symbolToken } from "./lexer.ts";
import { lowerFragment } from "./parser.ts";
import type { Statement } from "./statements.ts";
import type { SyntaxOptions } from "./syntax-options.ts";
import type { Part } from "./types.ts";

function assertNotBlank(value: string, what: string): void {
  if (value.trim().length === 0) {
    throw new TypeError(`${what} cannot be empty.`);
  }
}

export class Segment {
  readonly name: string;
  readonly syntaxOptions: SyntaxOptions;
  private readonly partList: Part[];

  constructor(name: string, parts: readonly Part[], syntaxOptions: SyntaxOptions) {
    this.name = name;
    this.partList = [...parts];
    this.syntaxOptions = syntaxOptions;
  }

  static empty(name: string, syntaxOptions: SyntaxOptions): Segment {
    return new Segment(name, [], syntaxOptions);
  }

  get parts(): readonly Part[] {
    return this.partList;
  }

  get isEmpty(): boolean {
    return this.partList.length === 0;
  }

  get subqueries(): Statement[] {
    const statements: Statement[] = [];
    for (const part of this.partList) {
      if (part.kind === "subquery") statements.push(part.statement);
    }
    return statements;
  }

  /** Append a SQL fragment as-is. */
  addRaw(sql: string): void {
    assertNotBlank(sql, "SQL text");
    this.append(sql);
  }

  /** Append a list element, preceded by a comma when the segment already has content. */
  addCommaSeparatedElement(sql: string): void {
    assertNotBlank(sql, "SQL text");
    if (!this.isEmpty) {
      this.partList.push({ kind: "token", token: symbolToken(",") });
    }
    this.append(sql);
  }

  /**
   * Append a predicate, joined to existing content with `conjunction`
   * (typically AND or OR).
   */
  addConjunction(conjunction: string, expression: string): void {
    assertNotBlank(expression, "Expression text");
    if (!this.isEmpty) {
      assertNotBlank(conjunction, "Conjunction");
      this.append(conjunction);
    }
    this.append(expression);
  }

  toSql(): string {
    return renderParts(this.partList);
  }

  private append(sql: string): void {
    this.partList.push(...lowerFragment(sql, this.syntaxOptions));
  }
}

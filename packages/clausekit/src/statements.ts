/**
 * Statement Model
 *
 * Parsed statements own their clause segments, their CTE definitions and
 * every nested statement inside those segments. Optional clauses can be
 * created after parsing through the ensure* methods.
 */

import { formatSql, resolveFormattingOptions } from "./formatter.ts";
import { readExpressionList } from "./readers.ts";
import { Segment } from "./segment.ts";
import type { SyntaxOptions } from "./syntax-options.ts";
import type { ColumnExpression, FormattingOptions } from "./types.ts";

export type StatementKind = "select" | "insert" | "update" | "delete";

// ============================================================================
// WITH Clause
// ============================================================================

export class CteDefinition {
  constructor(
    readonly name: string,
    readonly columns: readonly string[] | undefined,
    readonly statement: Statement
  ) {}

  toSql(): string {
    const columns = this.columns && this.columns.length > 0 ? `(${this.columns.join(", ")})` : "";
    return `${this.name}${columns} AS (${this.statement.toSql()})`;
  }
}

export class WithClause {
  constructor(
    readonly isRecursive: boolean,
    readonly definitions: readonly CteDefinition[]
  ) {}

  toSql(): string {
    const keyword = this.isRecursive ? "WITH RECURSIVE" : "WITH";
    return `${keyword} ${this.definitions.map((definition) => definition.toSql()).join(", ")}`;
  }
}

// ============================================================================
// Base Statement
// ============================================================================

function hasContent(segment: Segment | undefined): segment is Segment {
  return segment !== undefined && !segment.isEmpty;
}

export abstract class Statement {
  abstract readonly kind: StatementKind;
  readonly withClause: WithClause | undefined;
  readonly syntaxOptions: SyntaxOptions;
  private readonly segmentList: Segment[] = [];

  protected constructor(withClause: WithClause | undefined, syntaxOptions: SyntaxOptions) {
    this.withClause = withClause;
    this.syntaxOptions = syntaxOptions;
  }

  /** Segments in attachment order: parsed clauses first, ensured ones after. */
  get segments(): readonly Segment[] {
    return this.segmentList;
  }

  /** This statement followed by every nested statement, depth first. */
  *enumerateStatements(): Generator<Statement> {
    yield this;
    for (const child of this.childStatements()) {
      yield* child.enumerateStatements();
    }
  }

  toSql(options?: Partial<FormattingOptions>): string {
    return formatSql(this.buildSql(), resolveFormattingOptions(options), this.syntaxOptions);
  }

  protected abstract buildSql(): string;

  protected childStatements(): Statement[] {
    const children: Statement[] = [];
    for (const definition of this.withClause?.definitions ?? []) {
      children.push(definition.statement);
    }
    for (const segment of this.segmentList) {
      children.push(...segment.subqueries);
    }
    return children;
  }

  protected attach<T extends Segment | undefined>(segment: T): T {
    if (segment) this.segmentList.push(segment);
    return segment;
  }

  protected createSegment(name: string): Segment {
    return this.attach(Segment.empty(name, this.syntaxOptions));
  }

  protected withPrefix(sql: string): string {
    return this.withClause ? `${this.withClause.toSql()} ${sql}` : sql;
  }
}

/**
 * Append ` KEYWORD body` for each present, non-empty clause.
 */
function clauses(entries: readonly [string, Segment | undefined][]): string {
  let sql = "";
  for (const [keyword, segment] of entries) {
    if (hasContent(segment)) sql += ` ${keyword} ${segment.toSql()}`;
  }
  return sql;
}

// ============================================================================
// SELECT
// ============================================================================

export interface SelectSegments {
  select: Segment;
  from?: Segment;
  where?: Segment;
  groupBy?: Segment;
  having?: Segment;
  orderBy?: Segment;
  limit?: Segment;
  offset?: Segment;
  tail?: Segment;
}

export class SelectStatement extends Statement {
  readonly kind = "select";
  readonly isDistinct: boolean;
  readonly select: Segment;
  private fromSegment: Segment | undefined;
  private whereSegment: Segment | undefined;
  private groupBySegment: Segment | undefined;
  private havingSegment: Segment | undefined;
  private orderBySegment: Segment | undefined;
  private limitSegment: Segment | undefined;
  private offsetSegment: Segment | undefined;
  private tailSegment: Segment | undefined;

  constructor(
    segments: SelectSegments,
    isDistinct: boolean,
    withClause: WithClause | undefined,
    syntaxOptions: SyntaxOptions
  ) {
    super(withClause, syntaxOptions);
    this.isDistinct = isDistinct;
    this.select = this.attach(segments.select);
    this.fromSegment = this.attach(segments.from);
    this.whereSegment = this.attach(segments.where);
    this.groupBySegment = this.attach(segments.groupBy);
    this.havingSegment = this.attach(segments.having);
    this.orderBySegment = this.attach(segments.orderBy);
    this.limitSegment = this.attach(segments.limit);
    this.offsetSegment = this.attach(segments.offset);
    this.tailSegment = this.attach(segments.tail);
  }

  get from(): Segment | undefined {
    return this.fromSegment;
  }

  get where(): Segment | undefined {
    return this.whereSegment;
  }

  get groupBy(): Segment | undefined {
    return this.groupBySegment;
  }

  get having(): Segment | undefined {
    return this.havingSegment;
  }

  get orderBy(): Segment | undefined {
    return this.orderBySegment;
  }

  get limit(): Segment | undefined {
    return this.limitSegment;
  }

  get offset(): Segment | undefined {
    return this.offsetSegment;
  }

  /** Set operator and everything after it, e.g. `UNION ALL SELECT ...` */
  get tail(): Segment | undefined {
    return this.tailSegment;
  }

  /** Select-list items with their aliases. */
  get columns(): ColumnExpression[] {
    return readExpressionList(this.select.parts, true);
  }

  ensureFromSegment(): Segment {
    if (!this.fromSegment) this.fromSegment = this.createSegment("From");
    return this.fromSegment;
  }

  ensureWhereSegment(): Segment {
    if (!this.whereSegment) this.whereSegment = this.createSegment("Where");
    return this.whereSegment;
  }

  ensureGroupBySegment(): Segment {
    if (!this.groupBySegment) this.groupBySegment = this.createSegment("GroupBy");
    return this.groupBySegment;
  }

  ensureHavingSegment(): Segment {
    if (!this.havingSegment) this.havingSegment = this.createSegment("Having");
    return this.havingSegment;
  }

  ensureOrderBySegment(): Segment {
    if (!this.orderBySegment) this.orderBySegment = this.createSegment("OrderBy");
    return this.orderBySegment;
  }

  ensureLimitSegment(): Segment {
    if (!this.limitSegment) this.limitSegment = this.createSegment("Limit");
    return this.limitSegment;
  }

  ensureOffsetSegment(): Segment {
    if (!this.offsetSegment) this.offsetSegment = this.createSegment("Offset");
    return this.offsetSegment;
  }

  ensureTailSegment(): Segment {
    if (!this.tailSegment) this.tailSegment = this.createSegment("Tail");
    return this.tailSegment;
  }

  protected buildSql(): string {
    let sql = this.isDistinct ? "SELECT DISTINCT " : "SELECT ";
    sql += this.select.toSql();
    sql += clauses([
      ["FROM", this.fromSegment],
      ["WHERE", this.whereSegment],
      ["GROUP BY", this.groupBySegment],
      ["HAVING", this.havingSegment],
      ["ORDER BY", this.orderBySegment],
      ["LIMIT", this.limitSegment],
      ["OFFSET", this.offsetSegment],
    ]);
    if (hasContent(this.tailSegment)) sql += ` ${this.tailSegment.toSql()}`;
    return this.withPrefix(sql);
  }
}

// ============================================================================
// INSERT
// ============================================================================

export interface InsertSegments {
  target: Segment;
  output?: Segment;
  values?: Segment;
  returning?: Segment;
}

export class InsertStatement extends Statement {
  readonly kind = "insert";
  readonly target: Segment;
  /** Data source when the statement is `INSERT INTO ... SELECT ...` */
  readonly sourceQuery: Statement | undefined;
  private outputSegment: Segment | undefined;
  private valuesSegment: Segment | undefined;
  private returningSegment: Segment | undefined;

  constructor(
    segments: InsertSegments,
    sourceQuery: Statement | undefined,
    withClause: WithClause | undefined,
    syntaxOptions: SyntaxOptions
  ) {
    super(withClause, syntaxOptions);
    this.target = this.attach(segments.target);
    this.outputSegment = this.attach(segments.output);
    this.valuesSegment = this.attach(segments.values);
    this.returningSegment = this.attach(segments.returning);
    this.sourceQuery = sourceQuery;
  }

  get output(): Segment | undefined {
    return this.outputSegment;
  }

  get values(): Segment | undefined {
    return this.valuesSegment;
  }

  get returning(): Segment | undefined {
    return this.returningSegment;
  }

  ensureOutputSegment(): Segment {
    if (!this.outputSegment) this.outputSegment = this.createSegment("Output");
    return this.outputSegment;
  }

  ensureValuesSegment(): Segment {
    if (this.sourceQuery) {
      throw new Error("Cannot add VALUES to an INSERT statement that already has a source query.");
    }
    if (!this.valuesSegment) this.valuesSegment = this.createSegment("Values");
    return this.valuesSegment;
  }

  ensureReturningSegment(): Segment {
    if (!this.returningSegment) this.returningSegment = this.createSegment("Returning");
    return this.returningSegment;
  }

  protected override childStatements(): Statement[] {
    const children = super.childStatements();
    if (this.sourceQuery) children.push(this.sourceQuery);
    return children;
  }

  protected buildSql(): string {
    let sql = `INSERT INTO ${this.target.toSql()}`;
    sql += clauses([["OUTPUT", this.outputSegment]]);
    if (hasContent(this.valuesSegment)) {
      sql += ` VALUES ${this.valuesSegment.toSql()}`;
    } else if (this.sourceQuery) {
      sql += ` ${this.sourceQuery.toSql()}`;
    }
    sql += clauses([["RETURNING", this.returningSegment]]);
    return this.withPrefix(sql);
  }
}

// ============================================================================
// UPDATE
// ============================================================================

export interface UpdateSegments {
  target: Segment;
  set: Segment;
  output?: Segment;
  from?: Segment;
  where?: Segment;
  returning?: Segment;
}

export class UpdateStatement extends Statement {
  readonly kind = "update";
  readonly target: Segment;
  readonly set: Segment;
  private outputSegment: Segment | undefined;
  private fromSegment: Segment | undefined;
  private whereSegment: Segment | undefined;
  private returningSegment: Segment | undefined;

  constructor(segments: UpdateSegments, withClause: WithClause | undefined, syntaxOptions: SyntaxOptions) {
    super(withClause, syntaxOptions);
    this.target = this.attach(segments.target);
    this.set = this.attach(segments.set);
    this.outputSegment = this.attach(segments.output);
    this.fromSegment = this.attach(segments.from);
    this.whereSegment = this.attach(segments.where);
    this.returningSegment = this.attach(segments.returning);
  }

  get output(): Segment | undefined {
    return this.outputSegment;
  }

  get from(): Segment | undefined {
    return this.fromSegment;
  }

  get where(): Segment | undefined {
    return this.whereSegment;
  }

  get returning(): Segment | undefined {
    return this.returningSegment;
  }

  ensureOutputSegment(): Segment {
    if (!this.outputSegment) this.outputSegment = this.createSegment("Output");
    return this.outputSegment;
  }

  ensureFromSegment(): Segment {
    if (!this.fromSegment) this.fromSegment = this.createSegment("From");
    return this.fromSegment;
  }

  ensureWhereSegment(): Segment {
    if (!this.whereSegment) this.whereSegment = this.createSegment("Where");
    return this.whereSegment;
  }

  ensureReturningSegment(): Segment {
    if (!this.returningSegment) this.returningSegment = this.createSegment("Returning");
    return this.returningSegment;
  }

  protected buildSql(): string {
    let sql = `UPDATE ${this.target.toSql()} SET ${this.set.toSql()}`;
    sql += clauses([
      ["OUTPUT", this.outputSegment],
      ["FROM", this.fromSegment],
      ["WHERE", this.whereSegment],
      ["RETURNING", this.returningSegment],
    ]);
    return this.withPrefix(sql);
  }
}

// ============================================================================
// DELETE
// ============================================================================

export interface DeleteSegments {
  target?: Segment;
  from: Segment;
  output?: Segment;
  using?: Segment;
  where?: Segment;
  returning?: Segment;
}

export class DeleteStatement extends Statement {
  readonly kind = "delete";
  readonly from: Segment;
  private targetSegment: Segment | undefined;
  private outputSegment: Segment | undefined;
  private usingSegment: Segment | undefined;
  private whereSegment: Segment | undefined;
  private returningSegment: Segment | undefined;

  constructor(segments: DeleteSegments, withClause: WithClause | undefined, syntaxOptions: SyntaxOptions) {
    super(withClause, syntaxOptions);
    this.targetSegment = this.attach(segments.target);
    this.from = this.attach(segments.from);
    this.outputSegment = this.attach(segments.output);
    this.usingSegment = this.attach(segments.using);
    this.whereSegment = this.attach(segments.where);
    this.returningSegment = this.attach(segments.returning);
  }

  /** Explicit target between DELETE and FROM (`DELETE t FROM ...`) */
  get target(): Segment | undefined {
    return this.targetSegment;
  }

  get output(): Segment | undefined {
    return this.outputSegment;
  }

  get using(): Segment | undefined {
    return this.usingSegment;
  }

  get where(): Segment | undefined {
    return this.whereSegment;
  }

  get returning(): Segment | undefined {
    return this.returningSegment;
  }

  ensureTargetSegment(): Segment {
    if (!this.targetSegment) this.targetSegment = this.createSegment("Target");
    return this.targetSegment;
  }

  ensureOutputSegment(): Segment {
    if (!this.outputSegment) this.outputSegment = this.createSegment("Output");
    return this.outputSegment;
  }

  ensureUsingSegment(): Segment {
    if (!this.usingSegment) this.usingSegment = this.createSegment("Using");
    return this.usingSegment;
  }

  ensureWhereSegment(): Segment {
    if (!this.whereSegment) this.whereSegment = this.createSegment("Where");
    return this.whereSegment;
  }

  ensureReturningSegment(): Segment {
    if (!this.returningSegment) this.returningSegment = this.createSegment("Returning");
    return this.returningSegment;
  }

  protected buildSql(): string {
    let sql = "DELETE";
    if (hasContent(this.targetSegment)) sql += ` ${this.targetSegment.toSql()}`;
    sql += ` FROM ${this.from.toSql()}`;
    sql += clauses([
      ["OUTPUT", this.outputSegment],
      ["USING", this.usingSegment],
      ["WHERE", this.whereSegment],
      ["RETURNING", this.returningSegment],
    ]);
    return this.withPrefix(sql);
  }
}

// ============================================================================
// Query Root
// ============================================================================

export class SqlQuery {
  constructor(
    readonly rootStatement: Statement,
    readonly syntaxOptions: SyntaxOptions
  ) {}

  /** Root statement plus every nested statement, recomputed on each access. */
  get allStatements(): Statement[] {
    return [...this.rootStatement.enumerateStatements()];
  }

  toSql(options?: Partial<FormattingOptions>): string {
    return this.rootStatement.toSql(options);
  }
}

/** Columns of an OUTPUT or RETURNING list, with aliases. */
export function outputColumns(segment: Segment | undefined): ColumnExpression[] {
  return segment && !segment.isEmpty ? readExpressionList(segment.parts, true) : [];
}

/**
 * CLI Commands
 *
 * The work behind `clausekit format` and `clausekit inspect`, kept free of
 * process and file handling.
 */

import { parse } from "./analyzer.ts";
import type { SyntaxOptions } from "./syntax-options.ts";
import type { FormattingOptions, ParseError } from "./types.ts";

export type CommandName = "format" | "inspect";

export type CommandResult = { success: true; output: string } | { success: false; errors: ParseError[] };

export function isCommandName(value: string): value is CommandName {
  return value === "format" || value === "inspect";
}

/**
 * Parse `source` and print it back in the requested layout.
 */
export function formatCommand(
  source: string,
  syntaxOptions: SyntaxOptions,
  formatting: FormattingOptions
): CommandResult {
  const result = parse(source, { syntaxOptions });
  if (!result.success) return { success: false, errors: result.errors };

  return { success: true, output: result.query.toSql(formatting) };
}

/**
 * List every statement in the query, root first, one per line.
 */
export function inspectCommand(source: string, syntaxOptions: SyntaxOptions): CommandResult {
  const result = parse(source, { syntaxOptions });
  if (!result.success) return { success: false, errors: result.errors };

  const lines = result.query.allStatements.map(
    (statement, index) => `${index}: ${statement.kind.toUpperCase()} ${statement.toSql()}`
  );
  return { success: true, output: lines.join("\n") };
}

/**
 * Render a parse error the way compilers do: `file:line:column: error: message`.
 */
export function describeError(error: ParseError, fileName: string): string {
  const where = error.location ? `${fileName}:${error.location.line}:${error.location.column}` : fileName;
  return `${where}: ${error.severity}: ${error.message}`;
}

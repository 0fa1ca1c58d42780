/**
 * Parameterized SQL Builder
 *
 * Tagged template that turns interpolated values into named parameters
 * using the dialect's auto-parameter prefix:
 *
 *   const sql = createSqlBuilder(SyntaxOptions.postgreSql);
 *   sql`SELECT * FROM users WHERE id = ${id}`
 *   // { text: "SELECT * FROM users WHERE id = $p0", parameters: { $p0: id } }
 */

import { parseQuery } from "./analyzer.ts";
import { SyntaxOptions } from "./syntax-options.ts";
import type { SqlQuery } from "./statements.ts";

export interface ParameterizedSql {
  text: string;
  parameters: Record<string, unknown>;
  syntaxOptions: SyntaxOptions;
}

export type SqlBuilder = (strings: TemplateStringsArray, ...values: unknown[]) => ParameterizedSql;

export function createSqlBuilder(syntaxOptions: SyntaxOptions = SyntaxOptions.default): SqlBuilder {
  return (strings, ...values) => {
    const parameters: Record<string, unknown> = {};
    // A value interpolated more than once shares one name
    const names = new Map<unknown, string>();
    let text = strings[0] ?? "";

    values.forEach((value, index) => {
      let name = names.get(value);
      if (name === undefined) {
        name = `${syntaxOptions.autoParameterPrefix}p${names.size}`;
        names.set(value, name);
        parameters[name] = value;
      }
      text += name + (strings[index + 1] ?? "");
    });

    return { text, parameters, syntaxOptions };
  };
}

/**
 * Parse the text of a built statement with the builder's dialect.
 */
export function parseParameterized(built: ParameterizedSql): SqlQuery {
  return parseQuery(built.text, { syntaxOptions: built.syntaxOptions });
}

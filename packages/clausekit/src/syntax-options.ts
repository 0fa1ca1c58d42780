/**
 * Dialect Syntax Options
 *
 * Immutable presets describing which extra characters may start an
 * identifier (parameters, temp tables, bind variables) and which prefix
 * is used for generated parameter names.
 */

export type DialectName = "sqlserver" | "oracle" | "mysql" | "sqlite" | "postgresql";

export const DIALECT_NAMES: readonly DialectName[] = [
  "sqlserver",
  "oracle",
  "mysql",
  "sqlite",
  "postgresql",
];

function assertPrefixChar(value: string): void {
  if ([...value].length !== 1 || /[\p{L}\p{N}\s]/u.test(value)) {
    throw new RangeError(`Invalid identifier prefix '${value}'.`);
  }
}

export class SyntaxOptions {
  readonly identifierPrefixes: ReadonlySet<string>;
  readonly autoParameterPrefix: string;

  constructor(identifierPrefixes: Iterable<string>, autoParameterPrefix: string) {
    const prefixes = new Set<string>(identifierPrefixes);
    if (prefixes.size === 0) {
      throw new RangeError("At least one identifier prefix must be specified.");
    }
    assertPrefixChar(autoParameterPrefix);
    prefixes.add(autoParameterPrefix);
    for (const prefix of prefixes) {
      assertPrefixChar(prefix);
    }

    this.identifierPrefixes = prefixes;
    this.autoParameterPrefix = autoParameterPrefix;
    Object.freeze(this);
  }

  static readonly sqlServer = new SyntaxOptions(["@", "#", "$"], "@");
  static readonly oracle = new SyntaxOptions([":"], ":");
  static readonly mySql = new SyntaxOptions(["@"], "@");
  static readonly sqlite = new SyntaxOptions(["@", ":", "$", "?"], "@");
  static readonly postgreSql = new SyntaxOptions(["$"], "$");
  static readonly default = SyntaxOptions.sqlServer;

  static forDialect(name: DialectName): SyntaxOptions {
    switch (name) {
      case "sqlserver":
        return SyntaxOptions.sqlServer;
      case "oracle":
        return SyntaxOptions.oracle;
      case "mysql":
        return SyntaxOptions.mySql;
      case "sqlite":
        return SyntaxOptions.sqlite;
      case "postgresql":
        return SyntaxOptions.postgreSql;
    }
  }

  isIdentifierPrefix(char: string): boolean {
    return this.identifierPrefixes.has(char);
  }
}

export function isDialectName(value: string): value is DialectName {
  return DIALECT_NAMES.some((name) => name === value);
}

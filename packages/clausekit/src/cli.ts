#!/usr/bin/env -S node --import tsx
/**
 * clausekit CLI
 *
 * Command-line interface for the SQL analyzer.
 * Usage: clausekit <format|inspect> <file.sql> [options]
 */

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { resolve, basename, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { describeError, formatCommand, inspectCommand, isCommandName } from "./commands.ts";
import { isFormattingMode, resolveFormattingOptions } from "./formatter.ts";
import { DIALECT_NAMES, SyntaxOptions, isDialectName } from "./syntax-options.ts";
import type { DialectName } from "./syntax-options.ts";
import type { FormattingMode } from "./types.ts";

interface CLIOptions {
  command: string;
  inputFile: string;
  outputFile: string | null;
  mode: FormattingMode;
  indentSize: number;
  dialect: DialectName;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8")) as {
  version: string;
};
const VERSION = packageJson.version;

const HELP_TEXT = `
clausekit - SQL statement analyzer and formatter

Usage:
  clausekit format <file.sql> [-o output.sql] [--mode <mode>] [--indent <n>] [--dialect <name>]
  clausekit inspect <file.sql> [--dialect <name>]
  clausekit --help
  clausekit --version

Commands:
  format     Parse a statement and print it in canonical or pretty-printed form
  inspect    List the statement and every nested statement it contains

Options:
  -o, --output <file>   Write output to file (default: stdout)
  -m, --mode <mode>     inline, prefixed or suffixed (default: inline)
  -i, --indent <n>      Indent size for pretty-printed output (default: 4)
  -d, --dialect <name>  ${DIALECT_NAMES.join(", ")} (default: sqlserver)
  -v, --verbose         Show verbose output
  -h, --help            Show this help message
  --version             Show version number

Examples:
  clausekit format query.sql --mode prefixed
  clausekit format query.sql --dialect postgresql -o query.formatted.sql
  clausekit inspect report.sql
`;

class UsageError extends Error {}

function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: "",
    inputFile: "",
    outputFile: null,
    mode: "inline",
    indentSize: 4,
    dialect: "sqlserver",
    verbose: false,
    help: false,
    version: false,
  };

  const pending = [...args];
  const valueFor = (flag: string): string => {
    const value = pending.shift();
    if (value === undefined) throw new UsageError(`Missing value for ${flag}`);
    return value;
  };

  for (let arg = pending.shift(); arg !== undefined; arg = pending.shift()) {
    switch (arg) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "--version":
        options.version = true;
        break;
      case "-v":
      case "--verbose":
        options.verbose = true;
        break;
      case "-o":
      case "--output":
        options.outputFile = valueFor(arg);
        break;
      case "-m":
      case "--mode": {
        const mode = valueFor(arg);
        if (!isFormattingMode(mode)) throw new UsageError(`Unknown formatting mode '${mode}'`);
        options.mode = mode;
        break;
      }
      case "-i":
      case "--indent": {
        const value = valueFor(arg);
        const indentSize = Number(value);
        if (value === "" || !Number.isInteger(indentSize) || indentSize < 0) {
          throw new UsageError(`Invalid indent size '${value}'`);
        }
        options.indentSize = indentSize;
        break;
      }
      case "-d":
      case "--dialect": {
        const dialect = valueFor(arg);
        if (!isDialectName(dialect)) throw new UsageError(`Unknown dialect '${dialect}'`);
        options.dialect = dialect;
        break;
      }
      default:
        if (arg.startsWith("-")) throw new UsageError(`Unknown option '${arg}'`);
        if (!options.command) {
          options.command = arg;
        } else if (!options.inputFile) {
          options.inputFile = arg;
        } else {
          throw new UsageError(`Unexpected argument '${arg}'`);
        }
    }
  }

  return options;
}

function main(): void {
  const args = process.argv.slice(2);

  let options: CLIOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`clausekit: ${err.message}`);
    process.exit(1);
  }

  if (options.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (options.version) {
    console.log(`clausekit version ${VERSION}`);
    process.exit(0);
  }

  if (!options.command) {
    console.error("Error: No command specified");
    console.log(HELP_TEXT);
    process.exit(1);
  }

  if (!isCommandName(options.command)) {
    console.error(`Error: Unknown command '${options.command}'`);
    console.log(HELP_TEXT);
    process.exit(1);
  }

  if (!options.inputFile) {
    console.error("Error: No input file specified");
    console.log(HELP_TEXT);
    process.exit(1);
  }

  const inputPath = resolve(process.cwd(), options.inputFile);

  if (!existsSync(inputPath)) {
    console.error(`Error: File not found: ${options.inputFile}`);
    process.exit(1);
  }

  let source: string;
  try {
    source = readFileSync(inputPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error reading file: ${message}`);
    process.exit(1);
  }

  const syntaxOptions = SyntaxOptions.forDialect(options.dialect);

  if (options.verbose) {
    console.error(`Parsing ${basename(inputPath)} (${options.dialect})...`);
  }

  const result =
    options.command === "format"
      ? formatCommand(
          source,
          syntaxOptions,
          resolveFormattingOptions({ mode: options.mode, indentSize: options.indentSize })
        )
      : inspectCommand(source, syntaxOptions);

  if (!result.success) {
    for (const error of result.errors) {
      console.error(describeError(error, options.inputFile));
    }
    process.exit(1);
  }

  if (options.outputFile) {
    const outputPath = resolve(process.cwd(), options.outputFile);
    try {
      writeFileSync(outputPath, result.output + "\n");
      if (options.verbose) {
        console.error(`Output written to ${options.outputFile}`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Error writing file: ${message}`);
      process.exit(1);
    }
  } else {
    console.log(result.output);
  }
}

main();

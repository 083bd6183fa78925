#!/usr/bin/env node
// sqlterm command line: lint or fix statement terminators in SQL files.

import { readFile, writeFile } from "node:fs/promises";
import Table from "cli-table3";
import { Command } from "commander";
import { findConfig, type LinterOptions, loadConfig } from "./config";
import { Linter, type LintDiagnostic } from "./linter";
import { logger, setLogLevel } from "./logger";
import { getDialect } from "./parser/dialects";
import { VERSION } from "./version";

type CliOptions = {
  dialect?: string;
  multilineNewline?: boolean;
  requireFinalSemicolon?: boolean;
  rules?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
};

const EXIT_VIOLATIONS = 1;
const EXIT_ERROR = 2;

function withCommonOptions(command: Command): Command {
  return command
    .argument("<files...>", "SQL files to check")
    .option("-d, --dialect <name>", "SQL dialect (ansi, oracle)")
    .option("--multiline-newline", "put the terminator of a multi-line statement on its own line")
    .option("--require-final-semicolon", "require a terminator after the last statement")
    .option("-r, --rules <names>", "comma-separated rules to run")
    .option("-c, --config <path>", "config file (default: .sqltermrc.json)")
    .option("-v, --verbose", "log debug output")
    .option("-q, --quiet", "only log warnings and errors");
}

/**
 * Combine the config file with command line flags. Flags win.
 */
function buildOptions(cli: CliOptions): LinterOptions {
  const base = cli.config !== undefined ? loadConfig(cli.config) : (findConfig(process.cwd()) ?? {});
  const options: LinterOptions = { ...base };
  if (cli.dialect !== undefined) {
    options.dialect = getDialect(cli.dialect).name;
  }
  if (cli.multilineNewline) options.multilineNewline = true;
  if (cli.requireFinalSemicolon) options.requireFinalSemicolon = true;
  if (cli.rules !== undefined) {
    options.rules = cli.rules
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name !== "");
  }
  return options;
}

function configureLogging(cli: CliOptions): void {
  if (cli.verbose) {
    setLogLevel("debug");
  } else if (cli.quiet) {
    setLogLevel("warn");
  }
}

function printDiagnostics(file: string, diagnostics: readonly LintDiagnostic[]): void {
  const table = new Table({
    head: ["File", "Line", "Column", "Rule", "Message"],
    colAligns: ["left", "right", "right", "left", "left"],
    style: { head: ["cyan"] },
  });
  for (const diagnostic of diagnostics) {
    table.push([
      file,
      diagnostic.location?.line ?? "",
      diagnostic.location?.column ?? "",
      diagnostic.rule,
      diagnostic.message,
    ]);
  }
  console.log(table.toString());
}

async function lintCommand(files: string[], cli: CliOptions): Promise<void> {
  configureLogging(cli);
  const linter = new Linter(buildOptions(cli));
  let violations = 0;
  for (const file of files) {
    logger.debug(`Linting ${file}`);
    const diagnostics = linter.lint(await readFile(file, "utf8"));
    violations += diagnostics.length;
    if (diagnostics.length > 0) {
      printDiagnostics(file, diagnostics);
    }
  }
  if (violations > 0) {
    logger.warn(`${violations} issue(s) in ${files.length} file(s)`);
    process.exitCode = EXIT_VIOLATIONS;
  } else {
    logger.success(`${files.length} file(s) clean`);
  }
}

async function fixCommand(files: string[], cli: CliOptions): Promise<void> {
  configureLogging(cli);
  const linter = new Linter(buildOptions(cli));
  let remaining = 0;
  for (const file of files) {
    const result = linter.fix(await readFile(file, "utf8"));
    logger.debug(`${file}: ${result.loops} fix pass(es)`);
    if (cli.dryRun) {
      process.stdout.write(result.source);
    } else if (result.fixed) {
      await writeFile(file, result.source, "utf8");
      logger.info(`Fixed ${file}`);
    }
    remaining += result.remaining.length;
    if (result.remaining.length > 0) {
      printDiagnostics(file, result.remaining);
    }
  }
  if (remaining > 0) {
    process.exitCode = EXIT_VIOLATIONS;
  }
}

const program = new Command();

program.name("sqlterm").description("Check and fix SQL statement terminators").version(VERSION);

withCommonOptions(program.command("lint").description("report terminator issues")).action(
  lintCommand
);

withCommonOptions(program.command("fix").description("fix terminator issues in place"))
  .option("--dry-run", "print fixed SQL instead of writing files")
  .action(fixCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_ERROR;
});

// Linter configuration: option types, defaults and config file loading.

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { ruleNames } from "./linter/rules";
import { dialectNames, type DialectName } from "./parser/dialects";

/** Config file looked up in the working directory by the CLI. */
export const DEFAULT_CONFIG_FILE = ".sqltermrc.json";

/**
 * Options controlling which rules run and how they behave.
 */
export interface LinterOptions {
  /** Dialect used to parse the input. */
  dialect?: DialectName;
  /** Put the terminator of a multi-line statement on its own line. */
  multilineNewline?: boolean;
  /** Require a terminator after the last statement of a file. */
  requireFinalSemicolon?: boolean;
  /** Names of the rules to run; all rules when omitted. */
  rules?: readonly string[];
  /** Maximum number of parse/fix passes `Linter.fix` runs. */
  fixLoopLimit?: number;
}

export const defaultLinterOptions: Required<LinterOptions> = {
  dialect: "ansi",
  multilineNewline: false,
  requireFinalSemicolon: false,
  rules: ruleNames,
  fixLoopLimit: 10,
};

const configSchema = z
  .object({
    dialect: z.enum(["ansi", "oracle"]),
    multilineNewline: z.boolean(),
    requireFinalSemicolon: z.boolean(),
    rules: z.array(z.string()),
    fixLoopLimit: z.number().int().positive(),
  })
  .partial()
  .strict();

/**
 * Merge options over the defaults and check rule names.
 */
export function resolveOptions(options: LinterOptions = {}): Required<LinterOptions> {
  const resolved = { ...defaultLinterOptions, ...options };
  const unknown = resolved.rules.filter((name) => !ruleNames.includes(name));
  if (unknown.length > 0) {
    throw new ConfigError(
      "Unknown rule",
      unknown.map((name) => `'${name}' is not one of: ${ruleNames.join(", ")}`)
    );
  }
  if (!dialectNames.includes(resolved.dialect)) {
    throw new ConfigError(`Unknown dialect '${resolved.dialect}'`);
  }
  return resolved;
}

/**
 * Validate a parsed config object.
 */
export function parseConfig(value: unknown, source = "<config>"): LinterOptions {
  const result = configSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}`,
      result.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return key === "" ? issue.message : `${key}: ${issue.message}`;
      })
    );
  }
  return result.data;
}

/**
 * Read and validate a JSON config file.
 */
export function loadConfig(file: string): LinterOptions {
  let text: string;
  try {
    text = readFileSync(file, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${file}`, [errorMessage(error)]);
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${file} is not valid JSON`, [errorMessage(error)]);
  }
  return parseConfig(value, file);
}

/**
 * Load the default config file from `cwd` when one exists.
 */
export function findConfig(cwd: string): LinterOptions | undefined {
  const file = path.join(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(file) ? loadConfig(file) : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// SQL dialects known to the parser.

import { ConfigError } from "../errors";

export type DialectName = "ansi" | "oracle";

/**
 * Dialect settings that affect how statements are delimited.
 */
export interface Dialect {
  readonly name: DialectName;
  /** Symbols recognised as statement terminators. */
  readonly terminators: readonly string[];
  /** Whether PL/SQL style blocks keep their inner `;` inside one statement. */
  readonly procedural: boolean;
}

export const ANSI: Dialect = {
  name: "ansi",
  terminators: [";"],
  procedural: false,
};

export const ORACLE: Dialect = {
  name: "oracle",
  terminators: [";", "/"],
  procedural: true,
};

const dialects: Record<DialectName, Dialect> = {
  ansi: ANSI,
  oracle: ORACLE,
};

export const dialectNames: readonly DialectName[] = ["ansi", "oracle"];

export function isDialectName(name: string): name is DialectName {
  return dialectNames.some((dialect) => dialect === name);
}

/**
 * Look up a dialect by name.
 */
export function getDialect(name: string): Dialect {
  if (!isDialectName(name)) {
    throw new ConfigError(`Unknown dialect '${name}'`, [
      `expected one of: ${dialectNames.join(", ")}`,
    ]);
  }
  return dialects[name];
}

/**
 * Stream options and CLI configuration.
 *
 * CLI settings come from argv first, then environment:
 *   BACKTRACK_DEBUG=1   debug logging (same as --debug)
 *   NO_COLOR            disable ANSI colors (same as --no-color)
 */

import type { Logger } from "./log.js";

export interface StreamTokensOptions {
  /** Label used in log lines. Defaults to "stream". */
  name?: string;
  /** Receives eviction and exhaustion events at debug level. */
  logger?: Logger;
}

// ─── CLI ───

export const CLI_COMMANDS = ["fizzbuzz", "help"] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

export interface CliConfig {
  command: CliCommand;
  debug: boolean;
  color: boolean;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config?: CliConfig;
}

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["", "0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

export function resolveCliConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let command: CliCommand = "fizzbuzz";
  let commandSeen = false;
  let debug = envFlag(env.BACKTRACK_DEBUG);
  let color = env.NO_COLOR === undefined || env.NO_COLOR === "";

  if (env.BACKTRACK_DEBUG !== undefined && debug === undefined) {
    warnings.push(`BACKTRACK_DEBUG: unrecognized value "${env.BACKTRACK_DEBUG}", ignoring`);
  }

  for (const arg of argv) {
    if (arg === "--debug") {
      debug = true;
    } else if (arg === "--no-color") {
      color = false;
    } else if (arg === "--help" || arg === "-h") {
      command = "help";
      commandSeen = true;
    } else if (arg.startsWith("-")) {
      errors.push(`unknown option: ${arg}`);
    } else if (commandSeen) {
      errors.push(`unexpected argument: ${arg}`);
    } else if (isCliCommand(arg)) {
      command = arg;
      commandSeen = true;
    } else {
      errors.push(`unknown command: ${arg}`);
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  return {
    valid: true,
    errors,
    warnings,
    config: { command, debug: debug ?? false, color },
  };
}

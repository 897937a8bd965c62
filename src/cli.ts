#!/usr/bin/env node
/**
 * backtrack CLI
 *
 * Commands:
 *   fizzbuzz        Classify numbers read from stdin as they are parsed (default)
 *   help            Show usage
 *
 * Flags:
 *   --debug         Log window evictions (or BACKTRACK_DEBUG=1)
 *   --no-color      Plain output (or NO_COLOR)
 */

import { palette, type Palette } from "./ansi.js";
import { resolveCliConfig } from "./config.js";
import { runFizzBuzz } from "./fizzbuzz.js";
import { createLogger } from "./log.js";
import { fdChars } from "./sources.js";

const STDIN_FD = 0;

function cmdHelp(c: Palette): void {
  console.log("");
  console.log("  " + c.bold("backtrack") + c.dim("  parse one-shot input with rewind points"));
  console.log("");
  console.log("  " + c.bold("Commands:"));
  console.log("");
  console.log(`    ${c.cyan("fizzbuzz")}       Classify numbers from stdin as they are parsed (default)`);
  console.log(`    ${c.cyan("help")}           Show this message`);
  console.log("");
  console.log("  " + c.bold("Flags:"));
  console.log("");
  console.log(`    ${c.cyan("--debug")}        Log window evictions (or BACKTRACK_DEBUG=1)`);
  console.log(`    ${c.cyan("--no-color")}     Plain output (or NO_COLOR)`);
  console.log("");
  console.log("  " + c.bold("Example:"));
  console.log("");
  console.log(`    ${c.dim("printf '3\\n5\\n15\\n' | backtrack fizzbuzz")}`);
  console.log("");
}

function cmdFizzBuzz(c: Palette, debug: boolean): void {
  console.log(
    c.magenta(
      "Enter numbers, one per line. Multiples of 3 are Fizz, multiples of 5 are Buzz, multiples of both are FizzBuzz.",
    ),
  );
  runFizzBuzz(fdChars(STDIN_FD), (line) => console.log(line), {
    colors: c,
    logger: createLogger("fizzbuzz", { debug }),
  });
}

// ─── Main ───

function main(): number {
  const result = resolveCliConfig(process.argv.slice(2), process.env);
  const c = palette(result.config?.color ?? process.env.NO_COLOR === undefined);

  for (const warning of result.warnings) {
    console.warn(c.yellow(`warning: ${warning}`));
  }

  if (!result.config) {
    for (const error of result.errors) {
      console.error(c.red(error));
    }
    console.error(c.dim("Run 'backtrack help' for usage."));
    return 2;
  }

  if (result.config.command === "help") {
    cmdHelp(c);
    return 0;
  }

  cmdFizzBuzz(c, result.config.debug);
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  console.error("Fatal error:", err);
  process.exitCode = 1;
}

/**
 * Incremental FizzBuzz over a character stream.
 *
 * Numbers are separated by "\n" or "\r\n". Each number is classified as
 * soon as it has been parsed, then the whole consumed input is replayed
 * from a checkpoint held since the first character.
 *
 * An item that is not a number is reported and parsing carries on with the
 * next line. The empty item after a trailing line ending is not reported.
 * Parsing stops where an item is not followed by a line ending.
 */

import { palette, type Palette } from "./ansi.js";
import { silentLogger, type Logger } from "./log.js";
import { integer } from "./parsers.js";
import type { Source } from "./sources.js";
import { TextStreamTokens } from "./text-stream-tokens.js";
import { token, tokens, type Tokens } from "./tokens.js";

export type FizzBuzz = "Fizz" | "Buzz" | "FizzBuzz" | "Neither";

export type Writer = (line: string) => void;

export interface FizzBuzzOptions {
  logger?: Logger;
  colors?: Palette;
}

export interface FizzBuzzRun {
  results: FizzBuzz[];
  /** Everything consumed, replayed from the start checkpoint. */
  consumed: string;
  /** Items that did not parse as a number. */
  invalid: number;
  /** False when parsing stopped before end-of-stream. */
  complete: boolean;
}

export function classify(n: number): FizzBuzz {
  if (n % 15 === 0) return "FizzBuzz";
  if (n % 3 === 0) return "Fizz";
  if (n % 5 === 0) return "Buzz";
  return "Neither";
}

/** "\r\n" or "\n". */
export function lineEnding(t: Tokens<string>): string | undefined {
  if (tokens(t, "\r\n")) return "\r\n";
  if (token(t, "\n")) return "\n";
  return undefined;
}

const isAsciiDigit = (ch: string) => ch >= "0" && ch <= "9";

function atEnd(t: TextStreamTokens): boolean {
  return t.withCheckpoint((here) => {
    const end = t.readNext() === undefined;
    t.rewind(here);
    return end;
  });
}

export function runFizzBuzz(
  source: Source<string>,
  write: Writer,
  options: FizzBuzzOptions = {},
): FizzBuzzRun {
  const c = options.colors ?? palette(false);
  const stream = new TextStreamTokens(source, { name: "fizzbuzz", logger: options.logger ?? silentLogger });
  const results: FizzBuzz[] = [];

  const emit = (n: number) => {
    const kind = classify(n);
    results.push(kind);
    write(kind === "Neither" ? c.dim(kind) : c.green(kind));
  };

  const start = stream.checkpoint();
  try {
    let invalid = 0;
    do {
      const parsed = stream.parsePrefix(isAsciiDigit, integer);
      if (parsed.ok) {
        emit(parsed.value);
      } else if (!atEnd(stream)) {
        invalid += 1;
        write(c.yellow("Invalid number"));
      }
    } while (lineEnding(stream) !== undefined);

    const complete = atEnd(stream);
    if (!complete) {
      write(c.yellow("Stopped at unexpected input"));
    }

    const end = stream.checkpoint();
    const consumed = stream.sliceText(start, end);
    end.release();

    write("You entered:");
    write(consumed);
    write(`This parsed as: [${results.join(", ")}]`);
    return { results, consumed, invalid, complete };
  } finally {
    start.release();
  }
}

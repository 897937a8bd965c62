/**
 * Character stream over a contiguous text window.
 *
 * Same engine as StreamTokens, but retained characters live in one string
 * so that a range can be parsed in a single pass. Failed parses restore the
 * cursor; the characters read during the attempt stay buffered until the
 * next eviction at the live edge.
 */

import type { Checkpoint } from "./checkpoint.js";
import type { StreamTokensOptions } from "./config.js";
import { errorMessage, ParseError } from "./errors.js";
import type { ValueParser } from "./parsers.js";
import { toIterator, type Source } from "./sources.js";
import { StreamTokens } from "./stream-tokens.js";
import { takeWhile, type Predicate } from "./tokens.js";
import { assertCharacter, TextWindow } from "./window.js";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: ParseError };

export class TextStreamTokens extends StreamTokens<string> {
  private readonly text: TextWindow;

  constructor(source: Source<string>, options: StreamTokensOptions = {}) {
    const text = new TextWindow();
    super(characters(source), options, text);
    this.text = text;
  }

  /** Characters in `[from, to)` as one string. */
  sliceText(from: Checkpoint, to: Checkpoint): string {
    this.assertReachable(from, from.cursor, to.cursor);
    this.assertReachable(to, from.cursor, to.cursor);
    return this.rangeText(from.cursor, to.cursor);
  }

  /** Drain the source and parse everything from the cursor to the end. */
  parseRemaining<T>(parser: ValueParser<T>): ParseResult<T> {
    return this.parseAttempt(parser, () => {
      while (this.readNext() !== undefined) {
        // buffered by the attempt's checkpoint
      }
    });
  }

  /**
   * Parse the next `count` characters, or the characters for which
   * `predicate` holds. Fewer than `count` are taken at end-of-stream.
   */
  parsePrefix<T>(countOrPredicate: number | Predicate<string>, parser: ValueParser<T>): ParseResult<T> {
    if (typeof countOrPredicate === "number") {
      const count = countOrPredicate;
      if (!Number.isInteger(count) || count < 0) {
        throw new RangeError(`prefix count must be a non-negative integer (received ${count})`);
      }
      return this.parseAttempt(parser, () => {
        for (let i = 0; i < count && this.readNext() !== undefined; i++) {
          // buffered by the attempt's checkpoint
        }
      });
    }

    const predicate = countOrPredicate;
    return this.parseAttempt(parser, () => {
      takeWhile(this, predicate);
    });
  }

  /** Parse `[from, to)` without moving the cursor. */
  parseSlice<T>(from: Checkpoint, to: Checkpoint, parser: ValueParser<T>): ParseResult<T> {
    return runParser(parser, this.sliceText(from, to));
  }

  private parseAttempt<T>(parser: ValueParser<T>, consume: () => void): ParseResult<T> {
    return this.withCheckpoint((from) => {
      try {
        consume();
      } catch (err) {
        this.rewind(from);
        throw err;
      }
      const result = runParser(parser, this.rangeText(from.cursor, this.cursor));
      if (!result.ok) this.rewind(from);
      return result;
    });
  }

  private rangeText(start: number, end: number): string {
    return this.text.text(this.indexOf(start), this.indexOf(end));
  }
}

function* characters(source: Source<string>): Generator<string> {
  const iterator = toIterator(source);
  for (;;) {
    const next = iterator.next();
    if (next.done) return;
    assertCharacter(next.value);
    yield next.value;
  }
}

function runParser<T>(parser: ValueParser<T>, input: string): ParseResult<T> {
  try {
    return { ok: true, value: parser(input) };
  } catch (err) {
    return {
      ok: false,
      error: new ParseError(`could not parse "${input}": ${errorMessage(err)}`, input, { cause: err }),
    };
  }
}

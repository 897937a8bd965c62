/**
 * Token-source contract plus the few helpers the package itself needs.
 *
 * Every helper that can fail restores the cursor before returning, so a
 * failed match never consumes input.
 */

import type { Checkpoint } from "./checkpoint.js";

export interface Tokens<T> {
  readNext(): T | undefined;
  checkpoint(): Checkpoint;
  rewind(to: Checkpoint): void;
  isAt(checkpoint: Checkpoint): boolean;
  slice(from: Checkpoint, to: Checkpoint): T[];
}

export type Predicate<T> = (item: T) => boolean;

/**
 * Run `fn` at a checkpoint; rewind when it yields undefined or throws.
 * The checkpoint is released on every path.
 */
export function optional<T, R>(
  tokens: Tokens<T>,
  fn: (tokens: Tokens<T>) => R | undefined,
): R | undefined {
  const start = tokens.checkpoint();
  try {
    const result = fn(tokens);
    if (result === undefined) tokens.rewind(start);
    return result;
  } catch (err) {
    tokens.rewind(start);
    throw err;
  } finally {
    start.release();
  }
}

/** Consume one item equal to `expected`. */
export function token<T>(tokens: Tokens<T>, expected: T): boolean {
  return optional(tokens, (t) => (t.readNext() === expected ? true : undefined)) ?? false;
}

/** Consume the whole sequence, or nothing. */
export function tokens<T>(t: Tokens<T>, expected: Iterable<T>): boolean {
  const matched = optional(t, (inner) => {
    for (const want of expected) {
      if (inner.readNext() !== want) return undefined;
    }
    return true;
  });
  return matched ?? false;
}

/** Consume items while `predicate` holds; returns them. */
export function takeWhile<T>(tokens: Tokens<T>, predicate: Predicate<T>): T[] {
  const taken: T[] = [];
  for (;;) {
    const before = tokens.checkpoint();
    try {
      const item = tokens.readNext();
      if (item === undefined || !predicate(item)) {
        tokens.rewind(before);
        return taken;
      }
      taken.push(item);
    } catch (err) {
      tokens.rewind(before);
      throw err;
    } finally {
      before.release();
    }
  }
}

/** Consume items while `predicate` holds; returns how many. */
export function skipWhile<T>(tokens: Tokens<T>, predicate: Predicate<T>): number {
  return takeWhile(tokens, predicate).length;
}

/**
 * Items produced by `item`, separated by `separator`. Stops (without
 * consuming the trailing separator) when either parser declines.
 */
export function sepBy<T, R>(
  tokens: Tokens<T>,
  item: (tokens: Tokens<T>) => R | undefined,
  separator: (tokens: Tokens<T>) => boolean,
): R[] {
  const results: R[] = [];
  const first = optional(tokens, item);
  if (first === undefined) return results;
  results.push(first);

  for (;;) {
    const next = optional(tokens, (t) => (separator(t) ? item(t) : undefined));
    if (next === undefined) return results;
    results.push(next);
  }
}

/** Drain everything left. */
export function collect<T>(tokens: Tokens<T>): T[] {
  const out: T[] = [];
  for (let item = tokens.readNext(); item !== undefined; item = tokens.readNext()) {
    out.push(item);
  }
  return out;
}

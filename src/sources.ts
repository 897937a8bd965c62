/**
 * One-shot item sources.
 *
 * Anything with a `next()` (or `[Symbol.iterator]`) is a source. The
 * engine wraps it in a FusedSource so that end-of-stream is observed once
 * and the underlying iterator is never pulled again afterwards.
 */

import { readSync } from "node:fs";

export type Source<T> = Iterator<T> | Iterable<T>;

export function toIterator<T>(source: Source<T>): Iterator<T> {
  if (isIterable(source)) return source[Symbol.iterator]();
  return source;
}

function isIterable<T>(source: Source<T>): source is Iterable<T> {
  return Symbol.iterator in source && typeof source[Symbol.iterator] === "function";
}

// ─── Fused Source ───

export class FusedSource<T> {
  private readonly iterator: Iterator<T>;
  private finished = false;
  private pulled = 0;

  constructor(source: Source<T>) {
    this.iterator = toIterator(source);
  }

  get done(): boolean {
    return this.finished;
  }

  /** Items produced so far. */
  get pulls(): number {
    return this.pulled;
  }

  /** Next item, or undefined forever once the source has ended. */
  next(): { value: T } | undefined {
    if (this.finished) return undefined;
    const result = this.iterator.next();
    if (result.done) {
      this.finished = true;
      return undefined;
    }
    this.pulled += 1;
    return { value: result.value };
  }
}

// ─── Adapters ───

/** Code points of a string, one per item. */
export function* chars(input: string): Generator<string, void, undefined> {
  for (const ch of input) {
    yield ch;
  }
}

const DEFAULT_CHUNK_SIZE = 4096;

function readChunk(fd: number, buf: Buffer): number {
  for (;;) {
    try {
      return readSync(fd, buf, 0, buf.length, null);
    } catch (err: unknown) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      // Non-blocking stdin on some platforms; EOF is how Windows ends a pipe.
      if (code === "EAGAIN") continue;
      if (code === "EOF") return 0;
      throw err;
    }
  }
}

/** Bytes read synchronously from a file descriptor until EOF. */
export function* fdBytes(
  fd: number,
  chunkSize = DEFAULT_CHUNK_SIZE,
): Generator<number, void, undefined> {
  const buf = Buffer.alloc(chunkSize);
  for (;;) {
    const n = readChunk(fd, buf);
    if (n === 0) return;
    for (let i = 0; i < n; i++) {
      yield buf[i];
    }
  }
}

/** UTF-8 characters read synchronously from a file descriptor until EOF. */
export function* fdChars(
  fd: number,
  chunkSize = DEFAULT_CHUNK_SIZE,
): Generator<string, void, undefined> {
  const decoder = new TextDecoder("utf-8");
  const buf = Buffer.alloc(chunkSize);
  for (;;) {
    const n = readChunk(fd, buf);
    if (n === 0) break;
    yield* chars(decoder.decode(buf.subarray(0, n), { stream: true }));
  }
  yield* chars(decoder.decode());
}

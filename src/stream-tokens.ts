/**
 * Rewindable cursor buffer over a one-shot source.
 *
 * The source is pulled at most once per item. Items are retained in a
 * window only while some live checkpoint can still rewind to them:
 *
 *   oldest ≤ min(live checkpoints ∪ {cursor}) ≤ cursor ≤ oldest + length
 *
 * Eviction is lazy. It runs right before each source pull, never on
 * checkpoint release, so a released checkpoint's items are reclaimed by
 * the next read at the live edge.
 */

import { Checkpoint, CheckpointRegistry } from "./checkpoint.js";
import type { StreamTokensOptions } from "./config.js";
import { OutOfWindowError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { FusedSource, type Source } from "./sources.js";
import type { Tokens } from "./tokens.js";
import { ArrayWindow, type WindowBuffer } from "./window.js";

export class StreamTokens<T> implements Tokens<T> {
  protected readonly source: FusedSource<T>;
  protected readonly window: WindowBuffer<T>;
  protected readonly registry = new CheckpointRegistry();
  protected readonly log: Logger;
  protected readonly name: string;

  private position = 0;
  private oldest = 0;

  constructor(source: Source<T>, options: StreamTokensOptions = {}, window?: WindowBuffer<T>) {
    this.source = new FusedSource(source);
    this.window = window ?? new ArrayWindow<T>();
    this.log = options.logger ?? silentLogger;
    this.name = options.name ?? "stream";
  }

  // ─── Introspection ───

  /** Items returned to the caller so far, net of rewinds. */
  get cursor(): number {
    return this.position;
  }

  /** Oldest position still replayable. */
  get windowStart(): number {
    return this.oldest;
  }

  get windowLength(): number {
    return this.window.length;
  }

  get liveCheckpoints(): number {
    return this.registry.size;
  }

  /** True once the source has signalled end-of-stream. */
  get exhausted(): boolean {
    return this.source.done;
  }

  // ─── Reading ───

  readNext(): T | undefined {
    const offset = this.position - this.oldest;

    // Replaying buffered history after a rewind.
    if (offset < this.window.length) {
      const item = this.window.get(offset);
      this.position += 1;
      return item;
    }

    // Live edge.
    this.evict();
    if (this.source.done) return undefined;

    const pulled = this.source.next();
    if (pulled === undefined) {
      this.log.debug(`${this.name}: source exhausted at cursor ${this.position}`);
      return undefined;
    }

    if (this.registry.isEmpty) {
      this.position += 1;
      this.oldest = this.position;
      return pulled.value;
    }

    this.window.push(pulled.value);
    this.position += 1;
    return pulled.value;
  }

  private evict(): void {
    const first = this.registry.first();
    const floor = first === undefined ? this.position : Math.min(first, this.position);
    const dropped = floor - this.oldest;
    if (dropped <= 0) return;

    this.window.drainFront(dropped);
    this.oldest = floor;
    this.log.debug(
      `${this.name}: evicted ${dropped} item(s), window now [${this.oldest}, ${this.oldest + this.window.length})`,
    );
  }

  // ─── Checkpoints ───

  checkpoint(): Checkpoint {
    return new Checkpoint(this.position, this.registry);
  }

  rewind(to: Checkpoint): void {
    this.assertReachable(to, to.cursor, to.cursor);
    this.position = to.cursor;
  }

  isAt(checkpoint: Checkpoint): boolean {
    return this.position === checkpoint.cursor;
  }

  slice(from: Checkpoint, to: Checkpoint): T[] {
    this.assertReachable(from, from.cursor, to.cursor);
    this.assertReachable(to, from.cursor, to.cursor);
    return this.window.range(from.cursor - this.oldest, to.cursor - this.oldest);
  }

  /** Take a checkpoint for the duration of `fn`; always released. */
  withCheckpoint<R>(fn: (checkpoint: Checkpoint) => R): R {
    const checkpoint = this.checkpoint();
    try {
      return fn(checkpoint);
    } finally {
      checkpoint.release();
    }
  }

  /**
   * Run `fn`; rewind to the starting position when it returns undefined
   * or throws.
   */
  attempt<R>(fn: (tokens: this) => R | undefined): R | undefined {
    return this.withCheckpoint((start) => {
      try {
        const result = fn(this);
        if (result === undefined) this.rewind(start);
        return result;
      } catch (err) {
        this.rewind(start);
        throw err;
      }
    });
  }

  // ─── Window Access ───

  /** Relative window index of a position already validated by the caller. */
  protected indexOf(cursor: number): number {
    return cursor - this.oldest;
  }

  protected assertReachable(checkpoint: Checkpoint, start: number, end: number): void {
    const window = { start: this.oldest, end: this.oldest + this.window.length };
    const requested = { start, end };

    if (checkpoint.registry !== this.registry) {
      throw new OutOfWindowError(
        "checkpoint was issued by a different stream",
        "FOREIGN_CHECKPOINT",
        requested,
        window,
      );
    }
    if (checkpoint.isReleased) {
      throw new OutOfWindowError(
        `checkpoint at ${checkpoint.cursor} has been released`,
        "RELEASED_CHECKPOINT",
        requested,
        window,
      );
    }
    if (start > end || start < window.start || end > window.end) {
      throw new OutOfWindowError(
        `range [${start}, ${end}) is outside the retained window [${window.start}, ${window.end})`,
        "OUT_OF_WINDOW",
        requested,
        window,
      );
    }
  }
}

/**
 * Checkpoint registry and handles.
 *
 * The registry is an ascending multiset of cursors, one entry per live
 * checkpoint. Its first entry is the lowest position any checkpoint can
 * still rewind to, which bounds what the owning buffer must retain.
 *
 * Handle lifecycle:
 *   buffer.checkpoint() → register(cursor)
 *   handle.clone()      → register(cursor) again
 *   handle.release()    → unregister(cursor), once per handle
 */

import { CheckpointRegistryError } from "./errors.js";

export class CheckpointRegistry {
  private cursors: number[] = [];

  register(cursor: number): void {
    this.cursors.splice(this.search(cursor), 0, cursor);
  }

  unregister(cursor: number): void {
    const idx = this.search(cursor);
    if (this.cursors[idx] !== cursor) {
      throw new CheckpointRegistryError(cursor);
    }
    this.cursors.splice(idx, 1);
  }

  /** Lowest live cursor, or undefined when nothing is registered. */
  first(): number | undefined {
    return this.cursors[0];
  }

  get size(): number {
    return this.cursors.length;
  }

  get isEmpty(): boolean {
    return this.cursors.length === 0;
  }

  /** Snapshot of live cursors, ascending. */
  entries(): number[] {
    return [...this.cursors];
  }

  /** Leftmost index whose cursor is >= the given one. */
  private search(cursor: number): number {
    let lo = 0;
    let hi = this.cursors.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.cursors[mid] < cursor) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}

/**
 * A pinned position in a rewindable stream. Items at or after the pinned
 * cursor stay buffered until every handle at or before it is released.
 *
 * Call `release()` when done; there is no finalizer fallback.
 */
export class Checkpoint {
  private released = false;

  /** @internal created by `StreamTokens.checkpoint()` */
  constructor(
    readonly cursor: number,
    readonly registry: CheckpointRegistry,
  ) {
    registry.register(cursor);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** A second live handle at the same cursor. */
  clone(): Checkpoint {
    return new Checkpoint(this.cursor, this.registry);
  }

  /** Handles are equal when they pin the same cursor. */
  equals(other: Checkpoint): boolean {
    return this.cursor === other.cursor;
  }

  /** Unpin this handle's cursor. Idempotent per handle. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.registry.unregister(this.cursor);
  }
}

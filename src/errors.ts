/**
 * Error taxonomy for rewindable streams.
 *
 * End-of-stream is not an error: `readNext()` returns `undefined`.
 */

// ─── Window Errors ───

export type OutOfWindowCode = "OUT_OF_WINDOW" | "FOREIGN_CHECKPOINT" | "RELEASED_CHECKPOINT";

export interface WindowBounds {
  start: number;
  end: number;
}

/**
 * A rewind or slice asked for positions that are no longer retained
 * (or never belonged to this buffer). Recoverable: hold a checkpoint at the
 * earliest position still needed.
 */
export class OutOfWindowError extends Error {
  constructor(
    message: string,
    public readonly code: OutOfWindowCode,
    public readonly requested: WindowBounds,
    public readonly window: WindowBounds,
  ) {
    super(message);
    this.name = "OutOfWindowError";
  }
}

// ─── Parse Errors ───

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly input: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ParseError";
  }
}

// ─── Invariant Violations ───

/**
 * The checkpoint registry lost track of a live cursor. Signals a
 * clone/release pairing defect; never recoverable.
 */
export class CheckpointRegistryError extends Error {
  constructor(public readonly cursor: number) {
    super(`missing registry entry for checkpoint at cursor ${cursor}`);
    this.name = "CheckpointRegistryError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Window storage for retained items.
 *
 * A window only ever grows at the back (live edge) and shrinks at the
 * front (eviction). Indexes are relative to the oldest retained item.
 */

export interface WindowBuffer<T> {
  readonly length: number;
  push(item: T): void;
  get(index: number): T | undefined;
  /** Items in `[start, end)`. */
  range(start: number, end: number): T[];
  /** Drop `n` items from the front; clears the buffer when `n >= length`. */
  drainFront(n: number): void;
}

// ─── Generic Deque ───

/**
 * Array-backed deque. Drained slots are reclaimed in batches so that
 * eviction stays amortized O(1) per item.
 */
export class ArrayWindow<T> implements WindowBuffer<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  push(item: T): void {
    this.items.push(item);
  }

  get(index: number): T | undefined {
    if (index < 0 || index >= this.length) return undefined;
    return this.items[this.head + index];
  }

  drainFront(n: number): void {
    if (n <= 0) return;
    if (n >= this.length) {
      this.items = [];
      this.head = 0;
      return;
    }
    this.head += n;
    if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }

  range(start: number, end: number): T[] {
    return this.items.slice(this.head + start, this.head + end);
  }
}

// ─── Contiguous Text ───

/** Throws unless `item` is exactly one code point. */
export function assertCharacter(item: string): void {
  const cp = item.codePointAt(0);
  const width = cp !== undefined && cp > 0xffff ? 2 : 1;
  if (cp === undefined || item.length !== width) {
    throw new RangeError(`expected a single character, received ${JSON.stringify(item)}`);
  }
}

/**
 * Characters held in one string so that ranges can be handed to a parser
 * without rebuilding them. Each pushed item is one character (code point).
 *
 * While every item is a single UTF-16 unit, item index == string index.
 * Astral characters switch on a per-item offset index, dropped again once
 * a drain leaves only narrow characters.
 */
export class TextWindow implements WindowBuffer<string> {
  private buffer = "";
  private count = 0;
  /** UTF-16 start of each item; null while every item is one unit wide. */
  private starts: number[] | null = null;

  get length(): number {
    return this.count;
  }

  push(item: string): void {
    assertCharacter(item);
    if (this.starts) {
      this.starts.push(this.buffer.length);
    } else if (item.length !== 1) {
      this.starts = Array.from({ length: this.count + 1 }, (_, i) => i);
    }
    this.buffer += item;
    this.count += 1;
  }

  get(index: number): string | undefined {
    if (index < 0 || index >= this.count) return undefined;
    return this.buffer.slice(this.offsetOf(index), this.offsetOf(index + 1));
  }

  drainFront(n: number): void {
    if (n <= 0) return;
    if (n >= this.count) {
      this.buffer = "";
      this.count = 0;
      this.starts = null;
      return;
    }
    const cut = this.offsetOf(n);
    this.buffer = this.buffer.slice(cut);
    this.count -= n;
    if (this.starts) {
      this.starts = this.buffer.length === this.count ? null : this.starts.slice(n).map((s) => s - cut);
    }
  }

  range(start: number, end: number): string[] {
    return Array.from(this.text(start, end));
  }

  /** Retained text for items `[start, end)`, relative indexes. */
  text(start: number, end = this.count): string {
    return this.buffer.slice(this.offsetOf(start), this.offsetOf(end));
  }

  private offsetOf(index: number): number {
    if (index >= this.count) return this.buffer.length;
    return this.starts ? this.starts[index] : index;
  }
}

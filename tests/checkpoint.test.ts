import { describe, expect, it } from "vitest";
import { Checkpoint, CheckpointRegistry } from "../src/checkpoint.js";
import { CheckpointRegistryError } from "../src/errors.js";

describe("CheckpointRegistry", () => {
  it("keeps cursors ascending with duplicates", () => {
    const registry = new CheckpointRegistry();
    for (const cursor of [5, 1, 3, 3, 0]) registry.register(cursor);

    expect(registry.entries()).toEqual([0, 1, 3, 3, 5]);
    expect(registry.first()).toBe(0);
    expect(registry.size).toBe(5);
  });

  it("removes exactly one matching entry", () => {
    const registry = new CheckpointRegistry();
    registry.register(3);
    registry.register(3);
    registry.register(7);

    registry.unregister(3);
    expect(registry.entries()).toEqual([3, 7]);
    registry.unregister(3);
    expect(registry.entries()).toEqual([7]);
  });

  it("treats removal of an unregistered cursor as an invariant violation", () => {
    const registry = new CheckpointRegistry();
    registry.register(2);

    expect(() => registry.unregister(4)).toThrow(CheckpointRegistryError);
    expect(() => registry.unregister(1)).toThrow("missing registry entry for checkpoint at cursor 1");
    expect(registry.entries()).toEqual([2]);
  });

  it("reports empty state", () => {
    const registry = new CheckpointRegistry();
    expect(registry.isEmpty).toBe(true);
    expect(registry.first()).toBeUndefined();
  });
});

describe("Checkpoint", () => {
  it("registers on creation and on clone", () => {
    const registry = new CheckpointRegistry();
    const cp = new Checkpoint(4, registry);
    const copy = cp.clone();

    expect(registry.entries()).toEqual([4, 4]);
    expect(copy.cursor).toBe(4);
    expect(copy.equals(cp)).toBe(true);
    expect(copy).not.toBe(cp);
  });

  it("releases once per handle", () => {
    const registry = new CheckpointRegistry();
    const cp = new Checkpoint(1, registry);
    const copy = cp.clone();

    cp.release();
    cp.release();
    expect(cp.isReleased).toBe(true);
    expect(registry.entries()).toEqual([1]);

    copy.release();
    expect(registry.isEmpty).toBe(true);
  });
});

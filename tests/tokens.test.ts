import { describe, expect, it } from "vitest";
import { chars } from "../src/sources.js";
import { StreamTokens } from "../src/stream-tokens.js";
import { collect, optional, sepBy, skipWhile, takeWhile, token, tokens, type Tokens } from "../src/tokens.js";

const isDigit = (c: string) => c >= "0" && c <= "9";

function digits(t: Tokens<string>): number | undefined {
  const taken = takeWhile(t, isDigit);
  return taken.length === 0 ? undefined : Number(taken.join(""));
}

describe("token helpers", () => {
  it("matches a sequence or consumes nothing", () => {
    const stream = new StreamTokens(chars("hello"));

    expect(tokens(stream, "help")).toBe(false);
    expect(stream.cursor).toBe(0);
    expect(tokens(stream, "hel")).toBe(true);
    expect(stream.cursor).toBe(3);
    expect(token(stream, "x")).toBe(false);
    expect(token(stream, "l")).toBe(true);
    expect(collect(stream)).toEqual(["o"]);
  });

  it("stops takeWhile before the first rejected item", () => {
    const stream = new StreamTokens(chars("  \tab"));

    expect(skipWhile(stream, (c) => /\s/.test(c))).toBe(3);
    expect(takeWhile(stream, (c) => c === "a")).toEqual(["a"]);
    expect(stream.readNext()).toBe("b");
    expect(takeWhile(stream, () => true)).toEqual([]);
  });

  it("collects separated items and leaves a dangling separator", () => {
    const stream = new StreamTokens(chars("1,22,333,;"));

    expect(sepBy(stream, digits, (t) => token(t, ","))).toEqual([1, 22, 333]);
    expect(collect(stream).join("")).toBe(",;");
  });

  it("returns nothing when the first item is missing", () => {
    const stream = new StreamTokens(chars(",1"));

    expect(sepBy(stream, digits, (t) => token(t, ","))).toEqual([]);
    expect(stream.cursor).toBe(0);
  });

  it("optional restores the cursor and rethrows", () => {
    const stream = new StreamTokens(chars("abc"));

    expect(() =>
      optional(stream, (t) => {
        t.readNext();
        throw new Error("bad input");
      }),
    ).toThrow("bad input");
    expect(stream.cursor).toBe(0);
    expect(stream.liveCheckpoints).toBe(0);

    expect(optional(stream, (t) => t.readNext())).toBe("a");
    expect(stream.cursor).toBe(1);
  });

  it("restores the cursor and releases its checkpoint when the predicate throws", () => {
    const stream = new StreamTokens(chars("abcd"));
    const failing = (c: string) => {
      if (c === "b") throw new Error("unexpected b");
      return true;
    };

    expect(() => takeWhile(stream, failing)).toThrow("unexpected b");
    expect(stream.cursor).toBe(1);
    expect(stream.liveCheckpoints).toBe(0);

    expect(collect(stream)).toEqual(["b", "c", "d"]);
    expect(stream.windowLength).toBe(0);
  });
});

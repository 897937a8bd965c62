import { describe, expect, it } from "vitest";
import { palette } from "../src/ansi.js";
import { classify, runFizzBuzz } from "../src/fizzbuzz.js";
import { chars } from "../src/sources.js";
import { oneShot } from "./harness/one-shot.js";

function run(input: string) {
  const lines: string[] = [];
  const outcome = runFizzBuzz(oneShot(chars(input)).iterator, (line) => lines.push(line));
  return { lines, ...outcome };
}

describe("classify", () => {
  it("maps multiples of 3 and 5", () => {
    expect([3, 5, 15, 7, 0].map(classify)).toEqual(["Fizz", "Buzz", "FizzBuzz", "Neither", "FizzBuzz"]);
  });
});

describe("runFizzBuzz", () => {
  it("classifies each line and replays the consumed input", () => {
    const { lines, results, consumed, invalid, complete } = run("3\n5\n15\n7\n");

    expect(results).toEqual(["Fizz", "Buzz", "FizzBuzz", "Neither"]);
    expect(invalid).toBe(0);
    expect(consumed).toBe("3\n5\n15\n7\n");
    expect(complete).toBe(true);
    expect(lines).toEqual([
      "Fizz",
      "Buzz",
      "FizzBuzz",
      "Neither",
      "You entered:",
      "3\n5\n15\n7\n",
      "This parsed as: [Fizz, Buzz, FizzBuzz, Neither]",
    ]);
  });

  it("accepts CRLF line endings", () => {
    const { results, consumed, complete } = run("9\r\n10");

    expect(results).toEqual(["Fizz", "Buzz"]);
    expect(consumed).toBe("9\r\n10");
    expect(complete).toBe(true);
  });

  it("reports an invalid item and carries on with the next line", () => {
    const { lines, results, consumed, invalid, complete } = run("3\n\n5\n");

    expect(results).toEqual(["Fizz", "Buzz"]);
    expect(invalid).toBe(1);
    expect(consumed).toBe("3\n\n5\n");
    expect(complete).toBe(true);
    expect(lines).toEqual([
      "Fizz",
      "Invalid number",
      "Buzz",
      "You entered:",
      "3\n\n5\n",
      "This parsed as: [Fizz, Buzz]",
    ]);
  });

  it("stops where an item runs into something other than a line ending", () => {
    const { lines, results, consumed, invalid, complete } = run("12\nabc\n5\n");

    expect(results).toEqual(["Fizz"]);
    expect(invalid).toBe(1);
    expect(consumed).toBe("12\n");
    expect(complete).toBe(false);
    expect(lines).toEqual([
      "Fizz",
      "Invalid number",
      "Stopped at unexpected input",
      "You entered:",
      "12\n",
      "This parsed as: [Fizz]",
    ]);
  });

  it("handles empty input", () => {
    const { lines, results, complete } = run("");

    expect(results).toEqual([]);
    expect(complete).toBe(true);
    expect(lines).toEqual(["You entered:", "", "This parsed as: []"]);
  });

  it("colors results when a palette is given", () => {
    const lines: string[] = [];
    runFizzBuzz(chars("3"), (line) => lines.push(line), { colors: palette(true) });

    expect(lines[0]).toBe("\x1b[32mFizz\x1b[0m");
  });
});

import { describe, expect, test } from "vitest";
import { charLength, padChars, stripWhitespace, truncateChars } from "../src/core/text";

describe("truncateChars", () => {
  test("counts an astral character once", () => {
    expect(truncateChars("ab😀cd", 3)).toBe("ab😀");
    expect(charLength("ab😀cd")).toBe(5);
  });

  test("short strings come back unchanged", () => {
    expect(truncateChars("abc", 10)).toBe("abc");
  });
});

describe("padChars", () => {
  test("pads by code points", () => {
    expect(padChars("😀", 3)).toBe("😀  ");
    expect(padChars("abcd", 2)).toBe("abcd");
  });
});

describe("stripWhitespace", () => {
  test("trims ordinary whitespace but keeps a byte-order mark", () => {
    expect(stripWhitespace(" \n x \t")).toBe("x");
    expect(stripWhitespace("\uFEFF{} ")).toBe("\uFEFF{}");
    expect(stripWhitespace("  \uFEFF# a")).toBe("\uFEFF# a");
  });
});

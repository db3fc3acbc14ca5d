import { describe, test, expect } from "vitest";

import { contentHash, stableHash, stableSerialize } from "../../src/pipeline/hash.js";

describe("hash utilities", () => {
  test("stableSerialize sorts object keys deterministically", () => {
    expect(stableHash({ a: 1, b: 2 })).toBe(stableHash({ b: 2, a: 1 }));
  });

  test("stableSerialize normalizes Map/Set ordering", () => {
    const mapA = new Map<string, number>([["a", 1], ["b", 2]]);
    const mapB = new Map<string, number>([["b", 2], ["a", 1]]);
    expect(stableHash(mapA)).toBe(stableHash(mapB));
    expect(stableHash(new Set([3, 1, 2]))).toBe(stableHash(new Set([2, 3, 1])));
  });

  test("array order is significant", () => {
    expect(stableHash([1, 2])).not.toBe(stableHash([2, 1]));
  });

  test("stableSerialize handles undefined and function values", () => {
    expect(stableSerialize({ a: undefined, fn: () => null })).toBe('{"a":null,"fn":"<fn>"}');
  });

  test("contentHash is a 32 character hex digest of the text", () => {
    expect(contentHash("= Title\n")).toMatch(/^[0-9a-f]{32}$/);
    expect(contentHash("= Title\n")).toBe(contentHash("= Title\n"));
    expect(contentHash("= Title\n")).not.toBe(contentHash("= Title \n"));
  });
});

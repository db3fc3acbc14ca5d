import { describe, test, expect } from "vitest";

import { computeTextEdit } from "../../src/format/diff.js";
import { formatQuill } from "../../src/format/format.js";

describe("formatQuill", () => {
  test("normalizes headings, directives and whitespace", () => {
    expect(formatQuill('==Title  \n\n\n\nText   \n#let   x=1\n#include   "a.quill"\n')).toBe(
      '== Title\n\nText\n#let x = 1\n#include "a.quill"\n',
    );
  });

  test("drops leading and trailing blank lines", () => {
    expect(formatQuill("\n\n= A\n\n\n")).toBe("= A\n");
    expect(formatQuill("")).toBe("");
  });

  test("keeps CRLF line breaks", () => {
    expect(formatQuill("= A\r\nText  \r\n")).toBe("= A\r\nText\r\n");
  });

  test("reflows long paragraph lines at word boundaries", () => {
    const formatted = formatQuill("alpha beta gamma delta epsilon\n", { printWidth: 20 });
    expect(formatted).toBe("alpha beta gamma\ndelta epsilon\n");
    expect(formatQuill(formatted, { printWidth: 20 })).toBe(formatted);
  });

  test("never starts a reflowed line with a heading marker", () => {
    expect(formatQuill("aaaa bbbb = cccc\n", { printWidth: 10 })).toBe("aaaa bbbb =\ncccc\n");
  });

  test("leaves comment lines alone", () => {
    expect(formatQuill("//   spaced   comment\n")).toBe("//   spaced   comment\n");
  });
});

describe("computeTextEdit", () => {
  test("returns null for equal texts", () => {
    expect(computeTextEdit("abc", "abc")).toBeNull();
  });

  test("replaces only the changed middle", () => {
    expect(computeTextEdit("hello world", "hello brave world")).toEqual({
      span: { start: 6, end: 6 },
      newText: "brave ",
    });
    expect(computeTextEdit("abcdef", "abef")).toEqual({ span: { start: 2, end: 4 }, newText: "" });
    expect(computeTextEdit("aaa", "aa")).toEqual({ span: { start: 2, end: 3 }, newText: "" });
  });

  test("does not split surrogate pairs", () => {
    expect(computeTextEdit("a\u{1F600}b", "a\u{1F603}b")).toEqual({
      span: { start: 1, end: 3 },
      newText: "\u{1F603}",
    });
  });
});

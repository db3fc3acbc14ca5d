import { describe, test, expect } from "vitest";

import { asDocumentUri } from "@quill-ls/compiler";
import { EditConflictError } from "../../src/errors.js";
import { validateEditList, verifyEditVersions } from "../../src/features/edits.js";
import type { DocumentEdit } from "../../src/types.js";

const A = asDocumentUri("/ws/a.quill");
const B = asDocumentUri("/ws/b.quill");

function edit(uri: typeof A, version: number | null, line: number, start: number, end: number, newText = "x"): DocumentEdit {
  return { uri, version, range: { start: { line, character: start }, end: { line, character: end } }, newText };
}

describe("validateEditList", () => {
  test("sorts by document then position", () => {
    const list = validateEditList([edit(B, 1, 0, 0, 1), edit(A, 2, 3, 0, 1), edit(A, 2, 0, 4, 5)]);
    expect(list.map((e) => [e.uri, e.range.start.line])).toEqual([
      [A, 0],
      [A, 3],
      [B, 0],
    ]);
  });

  test("adjacent edits are fine, overlapping ones conflict", () => {
    expect(validateEditList([edit(A, 1, 0, 0, 2), edit(A, 1, 0, 2, 4)])).toHaveLength(2);
    expect(() => validateEditList([edit(A, 1, 0, 0, 3), edit(A, 1, 0, 2, 4)])).toThrow(EditConflictError);
  });

  test("a document must be bound to a single version", () => {
    expect(() => validateEditList([edit(A, 1, 0, 0, 1), edit(A, 2, 1, 0, 1)])).toThrow(
      "edits for /ws/a.quill no longer apply: edits computed against versions 1 and 2",
    );
  });
});

describe("verifyEditVersions", () => {
  const versions = new Map([[A, 3]]);
  const versionOf = (uri: typeof A) => versions.get(uri);

  test("accepts edits that still match the store", () => {
    expect(() => verifyEditVersions([edit(A, 3, 0, 0, 1), edit(B, null, 0, 0, 1)], versionOf)).not.toThrow();
  });

  test("rejects edits for documents that moved on, closed or opened", () => {
    expect(() => verifyEditVersions([edit(A, 2, 0, 0, 1)], versionOf)).toThrow("now at version 3, edits target 2");
    expect(() => verifyEditVersions([edit(B, 1, 0, 0, 1)], versionOf)).toThrow("closed after the edits were computed");
    expect(() => verifyEditVersions([edit(A, null, 0, 0, 1)], versionOf)).toThrow("opened at version 3");
  });
});

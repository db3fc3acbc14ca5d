import { describe, test, expect, vi } from "vitest";

import { compileDocument, EntryNotFoundError } from "../../src/engine/one-shot.js";
import type { DocumentUri } from "../../src/model/primitives.js";

function loaderOf(files: Record<string, string>) {
  return vi.fn(async (uri: DocumentUri) => files[uri] ?? null);
}

describe("compileDocument", () => {
  test("loads the include closure once per file", async () => {
    const load = loaderOf({
      "/ws/main.quill": '#include "a.quill"\n#include "b.quill"\n@a\n',
      "/ws/a.quill": '<a>\n#include "b.quill"\n',
      "/ws/b.quill": "text\n",
    });
    const result = await compileDocument("file:///ws/main.quill", load);

    expect(result.artifact.files).toEqual(["/ws/main.quill", "/ws/a.quill", "/ws/b.quill"]);
    expect(load).toHaveBeenCalledTimes(3);
    expect([...result.diagnostics.values()].flat()).toEqual([]);
  });

  test("missing includes become diagnostics", async () => {
    const load = loaderOf({ "/ws/main.quill": '#include "gone.quill"\n' });
    const result = await compileDocument("/ws/main.quill", load);
    expect(result.diagnostics.get(result.artifact.entry)?.map((d) => d.code)).toEqual(["file-not-found"]);
  });

  test("a missing entry rejects", async () => {
    await expect(compileDocument("/ws/none.quill", loaderOf({}))).rejects.toBeInstanceOf(EntryNotFoundError);
  });
});

import { describe, test, expect } from "vitest";

import { asDocumentUri } from "../../src/model/primitives.js";
import {
  canonicalDocumentUri,
  normalizeDocumentUri,
  relativeDocumentPath,
  resolveIncludeTarget,
  toProtocolUri,
} from "../../src/program/paths.js";

describe("document paths", () => {
  test("file URIs and Windows paths share one canonical form", () => {
    expect(normalizeDocumentUri("file:///ws/a.quill")).toBe("/ws/a.quill");
    expect(normalizeDocumentUri("C:\\ws\\a.quill")).toBe("c:/ws/a.quill");
    expect(normalizeDocumentUri("/ws/./sub/../a.quill")).toBe("/ws/a.quill");
  });

  test("non-file schemes are kept and have no path", () => {
    expect(canonicalDocumentUri("untitled:Untitled-1")).toEqual({ uri: "untitled:Untitled-1", path: null });
  });

  test("includes resolve against the including directory", () => {
    expect(resolveIncludeTarget(asDocumentUri("/ws/main.quill"), "../lib/x.quill")).toBe("/lib/x.quill");
    expect(resolveIncludeTarget(asDocumentUri("/ws/main.quill"), "/abs/y.quill")).toBe("/abs/y.quill");
    expect(resolveIncludeTarget(asDocumentUri("untitled:Untitled-1"), "a.quill")).toBe("untitled:a.quill");
  });

  test("converts back to protocol URIs and relative display paths", () => {
    expect(toProtocolUri(asDocumentUri("/ws/a.quill"))).toBe("file:///ws/a.quill");
    expect(toProtocolUri(asDocumentUri("untitled:Untitled-1"))).toBe("untitled:Untitled-1");
    expect(relativeDocumentPath(asDocumentUri("/ws/main.quill"), asDocumentUri("/ws/sub/a.quill"))).toBe("sub/a.quill");
  });
});

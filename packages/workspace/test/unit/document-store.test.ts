import { describe, test, expect } from "vitest";

import { asDocumentUri, SILENT_LOGGER, type Logger } from "@quill-ls/compiler";
import { DocumentStore, type InvalidationEvent } from "../../src/document-store.js";
import { StaleEditError, UnknownDocumentError } from "../../src/errors.js";

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return { ...SILENT_LOGGER, warn: (message: string) => warnings.push(message), warnings };
}

describe("DocumentStore", () => {
  test("canonicalizes URIs and emits an event per mutation", () => {
    const store = new DocumentStore(SILENT_LOGGER);
    const events: InvalidationEvent[] = [];
    store.onDidInvalidate((event) => events.push(event));

    const uri = store.open("file:///ws/a.quill", "one\n", 1);
    store.edit(uri, [{ text: "two\n" }], 2);
    store.close("file:///ws/a.quill");

    expect(uri).toBe("/ws/a.quill");
    expect(events).toEqual([
      { kind: "open", uri: "/ws/a.quill", version: 1 },
      { kind: "edit", uri: "/ws/a.quill", version: 2 },
      { kind: "close", uri: "/ws/a.quill", version: null },
    ]);
    expect(store.has(uri)).toBe(false);
  });

  test("applies ranged changes in order", () => {
    const store = new DocumentStore(SILENT_LOGGER);
    const uri = store.open("/ws/a.quill", "= Title\nbody\n", 1);
    store.edit(
      uri,
      [
        { range: { start: { line: 1, character: 0 }, end: { line: 1, character: 4 } }, text: "text" },
        { range: { start: { line: 0, character: 2 }, end: { line: 0, character: 7 } }, text: "Heading" },
      ],
      2,
    );
    expect(store.snapshotOf(uri)).toEqual({ text: "= Heading\ntext\n", version: 2 });
  });

  test("rejects stale edits without applying them", () => {
    const logger = recordingLogger();
    const store = new DocumentStore(logger);
    const events: InvalidationEvent[] = [];
    const uri = store.open("/ws/a.quill", "one", 3);
    store.onDidInvalidate((event) => events.push(event));

    expect(() => store.edit(uri, [{ text: "two" }], 3)).toThrow(StaleEditError);
    expect(() => store.edit(uri, [{ text: "two" }], 2)).toThrow(StaleEditError);
    expect(store.snapshotOf(uri)).toEqual({ text: "one", version: 3 });
    expect(events).toEqual([]);
    expect(logger.warnings).toEqual([
      "[store] dropped stale edit for /ws/a.quill: version 3 <= 3",
      "[store] dropped stale edit for /ws/a.quill: version 2 <= 3",
    ]);
  });

  test("reopening replaces the document unless the version goes back", () => {
    const logger = recordingLogger();
    const store = new DocumentStore(logger);
    const uri = store.open("/ws/a.quill", "one", 2);
    store.open(uri, "two", 2);
    expect(store.snapshotOf(uri).text).toBe("two");
    expect(logger.warnings).toEqual(["[store] /ws/a.quill opened twice; replacing version 2 with 2"]);
    expect(() => store.open(uri, "three", 1)).toThrow(StaleEditError);
  });

  test("operations on documents that are not open fail", () => {
    const store = new DocumentStore(SILENT_LOGGER);
    expect(() => store.edit("/ws/missing.quill", [{ text: "" }], 1)).toThrow(UnknownDocumentError);
    expect(() => store.close("/ws/missing.quill")).toThrow(UnknownDocumentError);
    expect(store.versionOf(asDocumentUri("/ws/missing.quill"))).toBeUndefined();
  });
});

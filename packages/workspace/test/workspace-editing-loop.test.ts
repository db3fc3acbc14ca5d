import { afterEach, describe, expect, test } from "vitest";

import { asDocumentUri, EntryNotFoundError } from "@quill-ls/compiler";
import type { AnalysisEngine } from "../src/engine.js";
import { CancelledError, SupersededError, UnknownDocumentError } from "../src/errors.js";
import { CancellationSource } from "../src/cancellation.js";
import { countingEngine, createTestEngine, MAIN, memoryLoader, recordingSink } from "./test-utils.js";

let engines: AnalysisEngine[] = [];

afterEach(() => {
  for (const engine of engines) engine.dispose();
  engines = [];
});

function track(engine: AnalysisEngine): AnalysisEngine {
  engines.push(engine);
  return engine;
}

describe("workspace editing loop", () => {
  test("open, fix, complete and close a document", async () => {
    const counting = countingEngine();
    const sink = recordingSink();
    const engine = track(createTestEngine({ engine: counting, sink }));

    engine.open("file:///ws/main.quill", "= Title <top>\n\nSome *bold text, see @\n", 1);
    await engine.settle();
    expect(sink.published).toEqual([
      {
        uri: MAIN,
        version: 1,
        diagnostics: [
          {
            code: "unclosed-delimiter",
            message: "unclosed strong delimiter `*`",
            severity: "error",
            range: { start: { line: 2, character: 5 }, end: { line: 2, character: 6 } },
            source: "quill",
          },
        ],
      },
    ]);

    engine.edit(MAIN, [{ text: "= Title <top>\n\nSome *bold* text, see @ and #\n" }], 2);
    await engine.settle();
    expect(sink.published.at(-1)).toEqual({ uri: MAIN, version: 2, diagnostics: [] });

    engine.clearCache();
    const compilesBefore = counting.calls.compile;
    const [labels, keywords] = await Promise.all([
      engine.request({ kind: "completion", uri: MAIN, position: { line: 2, character: 23 } }),
      engine.request({ kind: "completion", uri: MAIN, position: { line: 2, character: 29 } }),
    ]);
    expect(counting.calls.compile - compilesBefore).toBe(1);

    const atSign = { start: { line: 2, character: 23 }, end: { line: 2, character: 23 } };
    expect(labels).toEqual([{ label: "top", kind: "label", detail: "Title", range: atSign }]);
    const hash = { start: { line: 2, character: 29 }, end: { line: 2, character: 29 } };
    expect(keywords).toEqual([
      { label: "include", kind: "keyword", range: hash },
      { label: "let", kind: "keyword", range: hash },
    ]);

    const pending = engine.request({ kind: "hover", uri: MAIN, position: { line: 0, character: 3 } });
    engine.close(MAIN);
    await expect(pending).rejects.toMatchObject({ kind: "cancelled", reason: "closed" });
    expect(sink.published.at(-1)).toEqual({ uri: MAIN, version: null, diagnostics: [] });

    await engine.settle();
    expect(engine.stats().scheduler.running).toBe(0);
    expect(engine.stats().leasedSnapshots).toBe(0);
  });

  test("requests for documents that are not open are rejected", async () => {
    const engine = track(createTestEngine());
    await expect(
      engine.request({ kind: "hover", uri: MAIN, position: { line: 0, character: 0 } }),
    ).rejects.toBeInstanceOf(UnknownDocumentError);
  });

  test("a request cancelled by its caller rejects with the client reason", async () => {
    const engine = track(createTestEngine());
    engine.open(MAIN, "= Title\n", 1);
    const source = new CancellationSource();
    source.cancel();

    const pending = engine.request({ kind: "hover", uri: MAIN, position: { line: 0, character: 3 } }, { token: source.token });
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    await expect(pending).rejects.toMatchObject({ reason: "client" });
  });

  // ==========================================================================
  // Staleness
  // ==========================================================================

  test("an edit during a request restarts it against the new text", async () => {
    const engine = track(createTestEngine());
    engine.open(MAIN, "#let x = one\n#x\n", 1);

    const pending = engine.request({ kind: "hover", uri: MAIN, position: { line: 1, character: 1 } });
    engine.edit(MAIN, [{ text: "#let x = two\n#x\n" }], 2);

    expect(await pending).toEqual({
      contents: "```quill\n#let x = two\n```",
      range: { start: { line: 1, character: 0 }, end: { line: 1, character: 2 } },
    });
    expect(engine.stats().scheduler.restarts).toBe(1);
  });

  test("without restarts left a superseded request fails", async () => {
    const engine = track(createTestEngine({ config: { maxRestarts: 0 } }));
    engine.open(MAIN, "#let x = one\n#x\n", 1);

    const pending = engine.request({ kind: "hover", uri: MAIN, position: { line: 1, character: 1 } });
    engine.edit(MAIN, [{ text: "#let x = two\n#x\n" }], 2);

    await expect(pending).rejects.toBeInstanceOf(SupersededError);
  });

  test("an edit to another document does not disturb a request", async () => {
    const engine = track(createTestEngine());
    const other = engine.open("/ws/other.quill", "= Other\n", 1);
    engine.open(MAIN, "#let x = one\n#x\n", 1);

    const pending = engine.request({ kind: "hover", uri: MAIN, position: { line: 1, character: 1 } });
    engine.edit(other, [{ text: "= Changed\n" }], 2);

    expect((await pending)?.contents).toBe("```quill\n#let x = one\n```");
    expect(engine.stats().scheduler.restarts).toBe(0);
  });

  // ==========================================================================
  // Determinism
  // ==========================================================================

  test("the same state gives the same answers, cached or not", async () => {
    const text = '#include "part.quill"\n= Doc <doc>\n#let v = 1\nSee @doc, @part and #v.\n';
    const files = { "/ws/part.quill": "= Part <part>\n" };
    const first = track(createTestEngine({ loader: memoryLoader(files) }));
    const second = track(createTestEngine({ loader: memoryLoader(files) }));
    first.open(MAIN, text, 4);
    second.open(MAIN, text, 4);

    const query = { kind: "diagnostics", uri: MAIN } as const;
    const a = await first.request(query);
    const b = await second.request(query);
    const again = await first.request(query);

    expect(a.fingerprint).toBe(b.fingerprint);
    expect([...a.entries]).toEqual([...b.entries]);
    expect(again).toEqual(a);
  });

  test("compileDocument reads open documents from the store and the rest from the loader", async () => {
    const loader = memoryLoader({ "/ws/main.quill": "stale disk copy\n", "/ws/part.quill": "= Part <part>\n" });
    const engine = track(createTestEngine({ loader }));
    engine.open(MAIN, '#include "part.quill"\nSee @part.\n', 1);

    const result = await engine.compileDocument("file:///ws/main.quill");
    expect(result.artifact.files).toEqual([MAIN, asDocumentUri("/ws/part.quill")]);
    expect(result.diagnostics.get(MAIN)).toEqual([]);
    expect(loader.reads).not.toContain(MAIN);

    await expect(engine.compileDocument("/ws/absent.quill")).rejects.toBeInstanceOf(EntryNotFoundError);
  });
});

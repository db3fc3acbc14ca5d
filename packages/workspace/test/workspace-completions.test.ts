import { afterEach, describe, expect, test } from "vitest";

import { quillEngine, type CompilerEngine } from "@quill-ls/compiler";
import type { AnalysisEngine } from "../src/engine.js";
import { countingEngine, createTestEngine, findPosition, MAIN, memoryLoader } from "./test-utils.js";

const TEXT = [
  '#include "parts.quill"',
  "= Guide <guide>",
  "#let color = red",
  "#let count = 3",
  "See @ and #c",
  "Try # now.",
  "",
].join("\n");

const FILES = { "/ws/parts.quill": "= Parts <parts>\nSee <anchor> here.\n" };

const AT_SIGN = { start: { line: 4, character: 5 }, end: { line: 4, character: 5 } };
const HASH_C = { start: { line: 4, character: 11 }, end: { line: 4, character: 12 } };

let engine: AnalysisEngine | null = null;

afterEach(() => {
  engine?.dispose();
  engine = null;
});

function open(options: Parameters<typeof createTestEngine>[0] = {}) {
  engine = createTestEngine({ loader: memoryLoader(FILES), ...options });
  const current = engine;
  const uri = current.open(MAIN, TEXT, 1);
  const completeAt = (needle: string, delta: number) =>
    current.request({ kind: "completion", uri, position: findPosition(TEXT, needle, delta) });
  return { engine: current, completeAt };
}

describe("workspace completions", () => {
  test("labels after `@` come from the whole closure", async () => {
    const { completeAt } = open();
    expect(await completeAt("@ and", 1)).toEqual([
      { label: "anchor", kind: "label", detail: "parts.quill", range: AT_SIGN },
      { label: "guide", kind: "label", detail: "Guide", range: AT_SIGN },
      { label: "parts", kind: "label", detail: "Parts", range: AT_SIGN },
    ]);
  });

  test("variables after `#` are filtered by the typed prefix", async () => {
    const { completeAt } = open();
    expect(await completeAt("#c\n", 2)).toEqual([
      { label: "color", kind: "variable", detail: "red", range: HASH_C },
      { label: "count", kind: "variable", detail: "3", range: HASH_C },
    ]);
  });

  test("a bare `#` offers keywords before variables", async () => {
    const { completeAt } = open();
    const range = { start: { line: 5, character: 5 }, end: { line: 5, character: 5 } };
    expect(await completeAt("# now", 1)).toEqual([
      { label: "include", kind: "keyword", range },
      { label: "let", kind: "keyword", range },
      { label: "color", kind: "variable", detail: "red", range },
      { label: "count", kind: "variable", detail: "3", range },
    ]);
  });

  test("compile inputs are offered unless a binding shadows them", async () => {
    const { completeAt } = open({ config: { compile: { inputs: { cover: "yes", color: "blue" } } } });
    expect(await completeAt("#c\n", 2)).toEqual([
      { label: "color", kind: "variable", detail: "red", range: HASH_C },
      { label: "count", kind: "variable", detail: "3", range: HASH_C },
      { label: "cover", kind: "input", detail: "yes", range: HASH_C },
    ]);
  });

  test("no sigil, no completions", async () => {
    const { completeAt } = open();
    expect(await completeAt("See", 2)).toEqual([]);
  });

  test("a failing compile falls back to what the entry declares", async () => {
    const failing: CompilerEngine = {
      ...quillEngine,
      id: "failing",
      compile: () => {
        throw new Error("engine exploded");
      },
    };
    const { completeAt } = open({ engine: failing });

    expect(await completeAt("@ and", 1)).toEqual([{ label: "guide", kind: "label", range: AT_SIGN }]);
    expect(await completeAt("#c\n", 2)).toEqual([
      { label: "color", kind: "variable", detail: "red", range: HASH_C },
      { label: "count", kind: "variable", detail: "3", range: HASH_C },
    ]);
  });

  test("completions at different positions share one compile", async () => {
    const counting = countingEngine();
    const { completeAt } = open({ engine: counting });

    await Promise.all([completeAt("@ and", 1), completeAt("#c\n", 2), completeAt("# now", 1)]);
    expect(counting.calls.compile).toBe(1);
  });
});

import { afterEach, describe, expect, test } from "vitest";

import type { AnalysisEngine } from "../src/engine.js";
import { countingEngine, createTestEngine, MAIN } from "./test-utils.js";

let engine: AnalysisEngine | null = null;

afterEach(() => {
  engine?.dispose();
  engine = null;
});

function setup(options: Parameters<typeof createTestEngine>[0] = {}): AnalysisEngine {
  engine = createTestEngine(options);
  return engine;
}

describe("workspace formatting", () => {
  test("returns the smallest single edit that formats the document", async () => {
    const engine = setup();
    const uri = engine.open(MAIN, "=Title  \n\n\n#let   x=1\nUse #x.\n", 1);

    const edits = await engine.request({ kind: "formatting", uri });
    expect(edits).toEqual([
      {
        uri: MAIN,
        version: 1,
        range: { start: { line: 0, character: 1 }, end: { line: 3, character: 9 } },
        newText: " Title\n\n#let x = ",
      },
    ]);
  });

  test("already formatted text yields no edits", async () => {
    const engine = setup();
    const uri = engine.open(MAIN, "= Title\n\n#let x = 1\nUse #x.\n", 1);
    expect(await engine.request({ kind: "formatting", uri })).toEqual([]);
  });

  test("print width comes from the configuration", async () => {
    const engine = setup({ config: { formatter: { printWidth: 20 } } });
    const uri = engine.open(MAIN, "alpha beta gamma delta epsilon\n", 2);

    expect(await engine.request({ kind: "formatting", uri })).toEqual([
      {
        uri: MAIN,
        version: 2,
        range: { start: { line: 0, character: 16 }, end: { line: 0, character: 17 } },
        newText: "\n",
      },
    ]);
  });

  test("disabled formatter never calls the engine", async () => {
    const counting = countingEngine();
    const engine = setup({ engine: counting, config: { formatter: { mode: "disable" } } });
    const uri = engine.open(MAIN, "=Messy   \n\n\n", 1);

    expect(await engine.request({ kind: "formatting", uri })).toEqual([]);
    expect(counting.calls.format).toBe(0);
  });

  test("formatting the same version twice formats once", async () => {
    const counting = countingEngine();
    const engine = setup({ engine: counting });
    const uri = engine.open(MAIN, "=Title\n", 1);

    const first = await engine.request({ kind: "formatting", uri });
    const second = await engine.request({ kind: "formatting", uri });
    expect(second).toEqual(first);
    expect(counting.calls.format).toBe(1);
  });

  test("formatting is computed against the text at the current version", async () => {
    const engine = setup();
    const uri = engine.open(MAIN, "=One\n", 1);
    const pending = engine.request({ kind: "formatting", uri });
    engine.edit(uri, [{ text: "==Two\n" }], 2);

    expect(await pending).toEqual([
      {
        uri: MAIN,
        version: 2,
        range: { start: { line: 0, character: 2 }, end: { line: 0, character: 2 } },
        newText: " ",
      },
    ]);
  });

  test("a new version is formatted afresh", async () => {
    const engine = setup();
    const uri = engine.open(MAIN, "=One\n", 1);
    expect(await engine.request({ kind: "formatting", uri })).toHaveLength(1);

    engine.edit(uri, [{ text: "= One\n" }], 2);
    expect(await engine.request({ kind: "formatting", uri })).toEqual([]);
  });
});

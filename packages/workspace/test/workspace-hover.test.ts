import { afterEach, describe, expect, test } from "vitest";

import { quillEngine, type CompilerEngine } from "@quill-ls/compiler";
import type { AnalysisEngine } from "../src/engine.js";
import { createTestEngine, findPosition, memoryLoader } from "./test-utils.js";

const TEXT = [
  '#include "chapter.quill"',
  "= Overview <top>",
  "",
  "#let name = Quill",
  "Hello #name, see @intro and @top.",
  "Missing @nowhere and #ghost.",
  "",
].join("\n");

const FILES = { "/ws/chapter.quill": "== Introduction <intro>\n" };

let engine: AnalysisEngine | null = null;

afterEach(() => {
  engine?.dispose();
  engine = null;
});

function open(options: Parameters<typeof createTestEngine>[0] = {}) {
  engine = createTestEngine({ loader: memoryLoader(FILES), ...options });
  const uri = engine.open("file:///ws/main.quill", TEXT, 1);
  const current = engine;
  const hoverAt = (needle: string, delta = 1) =>
    current.request({ kind: "hover", uri, position: findPosition(TEXT, needle, delta) });
  return { engine: current, uri, hoverAt };
}

describe("workspace hover", () => {
  test("variable use shows its binding", async () => {
    const { hoverAt } = open();
    const info = await hoverAt("#name,");
    expect(info).toEqual({
      contents: "```quill\n#let name = Quill\n```",
      range: { start: { line: 4, character: 6 }, end: { line: 4, character: 11 } },
    });
  });

  test("binding name shows the definition itself", async () => {
    const { hoverAt } = open();
    const info = await hoverAt("name =");
    expect(info).toEqual({
      contents: "```quill\n#let name = Quill\n```",
      range: { start: { line: 3, character: 5 }, end: { line: 3, character: 9 } },
    });
  });

  test("reference to a label in an included file names the heading and the file", async () => {
    const { hoverAt } = open();
    const info = await hoverAt("@intro");
    expect(info).toEqual({
      contents: "Label `intro` on **Introduction** in `chapter.quill`",
      range: { start: { line: 4, character: 17 }, end: { line: 4, character: 23 } },
    });
  });

  test("label counts its references", async () => {
    const { hoverAt } = open();
    const info = await hoverAt("<top>");
    expect(info?.contents).toBe("Label `top`, 1 reference");
    expect(info?.range).toEqual({ start: { line: 1, character: 11 }, end: { line: 1, character: 16 } });
  });

  test("heading shows its level and label", async () => {
    const { hoverAt } = open();
    const info = await hoverAt("Overview");
    expect(info).toEqual({
      contents: "**Overview**\n\nHeading level 1, label `top`",
      range: { start: { line: 1, character: 2 }, end: { line: 1, character: 16 } },
    });
  });

  test("unresolved names say so", async () => {
    const { hoverAt } = open();
    expect((await hoverAt("@nowhere"))?.contents).toBe("Unknown label `nowhere`");
    expect((await hoverAt("#ghost"))?.contents).toBe("Unknown variable `ghost`");
  });

  test("include shows the relative path", async () => {
    const { hoverAt } = open();
    const info = await hoverAt("#include", 3);
    expect(info).toEqual({
      contents: "Includes `chapter.quill`",
      range: { start: { line: 0, character: 0 }, end: { line: 0, character: 24 } },
    });
  });

  test("include of a missing file is flagged", async () => {
    const { hoverAt } = open({ loader: memoryLoader() });
    expect((await hoverAt("#include", 3))?.contents).toBe("Includes `chapter.quill` (file not found)");
  });

  test("plain text has no hover", async () => {
    const { hoverAt } = open();
    expect(await hoverAt("Hello", 1)).toBeNull();
  });

  test("compile inputs answer uses no binding defines", async () => {
    const { hoverAt } = open({ config: { compile: { inputs: { ghost: "boo" } } } });
    expect((await hoverAt("#ghost"))?.contents).toBe("`ghost` = `boo` (compile input)");
  });

  // ==========================================================================
  // Degraded analysis
  // ==========================================================================

  test("a failing compile degrades to syntax-only answers", async () => {
    const failing: CompilerEngine = {
      ...quillEngine,
      id: "failing",
      compile: () => {
        throw new Error("engine exploded");
      },
    };
    const { hoverAt } = open({ engine: failing });

    expect(await hoverAt("#name,")).toBeNull();
    expect(await hoverAt("@intro")).toBeNull();
    expect((await hoverAt("<top>"))?.contents).toBe("Label `top`");
    expect((await hoverAt("Overview"))?.contents).toBe("**Overview**\n\nHeading level 1, label `top`");
  });

  test("repeated hovers are answered from the cache", async () => {
    const { engine, hoverAt } = open();
    await hoverAt("@intro");
    const before = engine.cache.stats().hits;
    await hoverAt("@intro");
    expect(engine.cache.stats().hits).toBeGreaterThan(before);
  });
});

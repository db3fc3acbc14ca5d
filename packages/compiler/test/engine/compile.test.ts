import { describe, test, expect } from "vitest";

import { compile, MissingEntryError } from "../../src/engine/compile.js";
import { createWorld, type WorldOptions } from "../../src/engine/world.js";
import { asDocumentUri } from "../../src/model/primitives.js";
import { stableHash } from "../../src/pipeline/hash.js";
import { parseModule } from "../../src/syntax/parser.js";

const MAIN = "/ws/main.quill";

function worldOf(files: Record<string, string>, options?: WorldOptions) {
  const sources = Object.entries(files).map(([path, text]) => {
    const uri = asDocumentUri(path);
    return { uri, text, module: parseModule(uri, text) };
  });
  return createWorld(asDocumentUri(MAIN), sources, options);
}

function diagnosticsOf(files: Record<string, string>, uri: string = MAIN, options?: WorldOptions) {
  return compile(worldOf(files, options)).diagnostics.get(asDocumentUri(uri));
}

describe("compile", () => {
  test("expands includes and resolves labels across files", () => {
    const { artifact, diagnostics } = compile(
      worldOf({
        [MAIN]: '#include "intro.quill"\nSee @intro.\n',
        "/ws/intro.quill": "= Introduction <intro>\n",
      }),
    );
    expect(artifact.files).toEqual([MAIN, "/ws/intro.quill"]);
    expect([...diagnostics.entries()]).toEqual([
      [MAIN, []],
      ["/ws/intro.quill", []],
    ]);
    expect(artifact.references[0]?.target).toEqual({ uri: "/ws/intro.quill", span: { start: 16, end: 21 } });
    expect(artifact.labels.get("intro")?.heading).toBe("Introduction");
    expect(artifact.outline.map((entry) => entry.title)).toEqual(["Introduction"]);
    expect(artifact.includes.map((edge) => edge.status)).toEqual(["ok"]);
  });

  test("reports include cycles on the closing include", () => {
    const files = { [MAIN]: '#include "a.quill"\n', "/ws/a.quill": '#include "main.quill"\n' };
    expect(diagnosticsOf(files)).toEqual([]);
    expect(diagnosticsOf(files, "/ws/a.quill")).toEqual([
      {
        code: "include-cycle",
        message: "include cycle: main.quill -> a.quill -> main.quill",
        severity: "error",
        range: { start: { line: 0, character: 0 }, end: { line: 0, character: 21 } },
        source: "quill",
      },
    ]);
  });

  test("reports missing include targets on the path", () => {
    const [diagnostic] = diagnosticsOf({ [MAIN]: '#include "missing.quill"\n' }) ?? [];
    expect(diagnostic?.code).toBe("file-not-found");
    expect(diagnostic?.range).toEqual({ start: { line: 0, character: 10 }, end: { line: 0, character: 23 } });
  });

  test("duplicate labels point back at the first definition", () => {
    expect(diagnosticsOf({ [MAIN]: "<a>\n<a>\n" })).toEqual([
      {
        code: "duplicate-label",
        message: "label `a` is defined more than once",
        severity: "error",
        range: { start: { line: 1, character: 0 }, end: { line: 1, character: 3 } },
        related: [
          {
            uri: MAIN,
            range: { start: { line: 0, character: 0 }, end: { line: 0, character: 3 } },
            message: "first defined here",
          },
        ],
        source: "quill",
      },
    ]);
  });

  test("unresolved references are errors", () => {
    const [diagnostic] = diagnosticsOf({ [MAIN]: "@nope\n" }) ?? [];
    expect(diagnostic?.code).toBe("unknown-label");
    expect(diagnostic?.message).toBe("label `nope` does not exist");
  });

  test("uses resolve to bindings, then to inputs", () => {
    const { artifact, diagnostics } = compile(
      worldOf({ [MAIN]: "#let x = 1\n#x #y #title\n" }, { inputs: { title: "Doc" } }),
    );
    expect(artifact.uses.map((use) => use.target?.kind ?? null)).toEqual(["binding", null, "input"]);
    expect(diagnostics.get(asDocumentUri(MAIN))).toEqual([
      {
        code: "unknown-variable",
        message: "unknown variable `y`",
        severity: "error",
        range: { start: { line: 1, character: 3 }, end: { line: 1, character: 5 } },
        source: "quill",
      },
    ]);
  });

  test("a binding's own value sees the definition it shadows", () => {
    const { artifact, diagnostics } = compile(worldOf({ [MAIN]: "#let x = 1\n#let x = #x\n#x\n" }));
    const targets = artifact.uses.map((use) => (use.target?.kind === "binding" ? use.target.binding.nameSpan : null));
    expect(targets).toEqual([
      { start: 5, end: 6 },
      { start: 16, end: 17 },
    ]);
    expect(diagnostics.get(asDocumentUri(MAIN))).toEqual([]);
  });

  test("unused bindings are unnecessary hints", () => {
    expect(diagnosticsOf({ [MAIN]: "#let unused = 1\n" })).toEqual([
      {
        code: "unused-binding",
        message: "`unused` is never used",
        severity: "hint",
        range: { start: { line: 0, character: 5 }, end: { line: 0, character: 11 } },
        tags: ["unnecessary"],
        source: "quill",
      },
    ]);
  });

  test("syntax errors surface as error diagnostics", () => {
    const [diagnostic] = diagnosticsOf({ [MAIN]: "Some *bold\n" }) ?? [];
    expect(diagnostic?.code).toBe("unclosed-delimiter");
    expect(diagnostic?.severity).toBe("error");
    expect(diagnostic?.range).toEqual({ start: { line: 0, character: 5 }, end: { line: 0, character: 6 } });
  });

  test("is deterministic for a fixed world", () => {
    const files = { [MAIN]: '= Title <t>\n#include "b.quill"\n@t #v\n', "/ws/b.quill": "#let v = 2\n" };
    expect(stableHash(compile(worldOf(files)))).toBe(stableHash(compile(worldOf(files))));
  });

  test("throws when the entry is not in the world", () => {
    expect(() => compile(worldOf({ "/ws/other.quill": "text\n" }))).toThrow(MissingEntryError);
  });
});

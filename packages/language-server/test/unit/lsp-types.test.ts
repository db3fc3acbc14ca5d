import { describe, expect, test } from "vitest";
import {
  CompletionItemKind,
  DiagnosticSeverity,
  DiagnosticTag,
  MarkupKind,
  SymbolKind,
} from "vscode-languageserver/node.js";
import { asDocumentUri, type QuillDiagnostic } from "@quill-ls/compiler";
import {
  fromLspUri,
  mapCompletions,
  mapDiagnostics,
  mapDocumentSymbols,
  mapHover,
  mapLocations,
  mapPrepareRename,
  mapTextEdits,
  mapWorkspaceEdit,
  toLspUri,
} from "@quill-ls/language-server/api";

const MAIN = asDocumentUri("/ws/main.quill");
const PART = asDocumentUri("/ws/part.quill");

const range = (line: number, start: number, end: number) => ({
  start: { line, character: start },
  end: { line, character: end },
});

describe("uri mapping", () => {
  test("canonical paths become file URIs and back", () => {
    expect(toLspUri(MAIN)).toBe("file:///ws/main.quill");
    expect(fromLspUri("file:///ws/main.quill")).toBe(MAIN);
  });

  test("non-file schemes pass through", () => {
    const untitled = asDocumentUri("untitled:Untitled-1");
    expect(toLspUri(untitled)).toBe("untitled:Untitled-1");
    expect(fromLspUri("untitled:Untitled-1")).toBe(untitled);
  });
});

describe("mapDiagnostics", () => {
  test("maps severity, code, tags and related locations", () => {
    const diagnostics: QuillDiagnostic[] = [
      {
        code: "duplicate-label",
        message: "label `top` is defined more than once",
        severity: "error",
        range: range(2, 1, 4),
        related: [{ uri: PART, range: range(0, 1, 4), message: "first definition" }],
        source: "quill",
      },
      {
        code: "unused-binding",
        message: "binding `x` is never used",
        severity: "hint",
        range: range(0, 5, 6),
        tags: ["unnecessary"],
        source: "quill",
      },
    ];

    expect(mapDiagnostics(diagnostics)).toEqual([
      {
        range: range(2, 1, 4),
        message: "label `top` is defined more than once",
        severity: DiagnosticSeverity.Error,
        code: "duplicate-label",
        source: "quill",
        relatedInformation: [
          { message: "first definition", location: { uri: "file:///ws/part.quill", range: range(0, 1, 4) } },
        ],
      },
      {
        range: range(0, 5, 6),
        message: "binding `x` is never used",
        severity: DiagnosticSeverity.Hint,
        code: "unused-binding",
        source: "quill",
        tags: [DiagnosticTag.Unnecessary],
      },
    ]);
  });

  test("warnings and infos keep their severity", () => {
    const base = { code: "unknown-label", message: "m", range: range(0, 0, 1), source: "quill" } as const;
    const mapped = mapDiagnostics([
      { ...base, severity: "warning" },
      { ...base, severity: "info" },
    ]);
    expect(mapped.map((d) => d.severity)).toEqual([DiagnosticSeverity.Warning, DiagnosticSeverity.Information]);
  });
});

describe("mapCompletions", () => {
  test("every entry replaces its prefix range", () => {
    const items = mapCompletions([
      { label: "intro", kind: "label", detail: "Introduction", range: range(3, 5, 7) },
      { label: "color", kind: "variable", range: range(3, 9, 10) },
      { label: "cover", kind: "input", range: range(3, 9, 10) },
      { label: "let", kind: "keyword", range: range(3, 9, 10) },
    ]);

    expect(items).toEqual([
      {
        label: "intro",
        kind: CompletionItemKind.Reference,
        detail: "Introduction",
        textEdit: { range: range(3, 5, 7), newText: "intro" },
      },
      { label: "color", kind: CompletionItemKind.Variable, textEdit: { range: range(3, 9, 10), newText: "color" } },
      { label: "cover", kind: CompletionItemKind.Constant, textEdit: { range: range(3, 9, 10), newText: "cover" } },
      { label: "let", kind: CompletionItemKind.Keyword, textEdit: { range: range(3, 9, 10), newText: "let" } },
    ]);
  });
});

describe("mapHover / mapLocations / mapPrepareRename", () => {
  test("hover contents are markdown", () => {
    expect(mapHover({ contents: "**Intro**", range: range(0, 2, 7) })).toEqual({
      contents: { kind: MarkupKind.Markdown, value: "**Intro**" },
      range: range(0, 2, 7),
    });
    expect(mapHover(null)).toBeNull();
  });

  test("locations carry protocol URIs", () => {
    expect(mapLocations([{ uri: PART, range: range(0, 8, 12) }])).toEqual([
      { uri: "file:///ws/part.quill", range: range(0, 8, 12) },
    ]);
  });

  test("prepareRename keeps range and placeholder", () => {
    expect(mapPrepareRename({ range: range(1, 5, 8), placeholder: "top" })).toEqual({
      range: range(1, 5, 8),
      placeholder: "top",
    });
    expect(mapPrepareRename(null)).toBeNull();
  });
});

describe("mapWorkspaceEdit", () => {
  test("one versioned document edit per file, disk files unversioned", () => {
    const edit = mapWorkspaceEdit([
      { uri: MAIN, version: 4, range: range(0, 1, 4), newText: "head" },
      { uri: MAIN, version: 4, range: range(1, 5, 8), newText: "head" },
      { uri: PART, version: null, range: range(0, 9, 12), newText: "head" },
    ]);

    expect(edit).toEqual({
      documentChanges: [
        {
          textDocument: { uri: "file:///ws/main.quill", version: 4 },
          edits: [
            { range: range(0, 1, 4), newText: "head" },
            { range: range(1, 5, 8), newText: "head" },
          ],
        },
        {
          textDocument: { uri: "file:///ws/part.quill", version: null },
          edits: [{ range: range(0, 9, 12), newText: "head" }],
        },
      ],
    });
  });

  test("no rename target gives no edit", () => {
    expect(mapWorkspaceEdit(null)).toBeNull();
  });

  test("formatting edits drop uri and version", () => {
    expect(mapTextEdits([{ uri: MAIN, version: 2, range: range(0, 1, 1), newText: " " }])).toEqual([
      { range: range(0, 1, 1), newText: " " },
    ]);
  });
});

describe("mapDocumentSymbols", () => {
  test("nests children and omits missing details", () => {
    const symbols = mapDocumentSymbols([
      {
        name: "Intro",
        detail: "<intro>",
        kind: "heading",
        range: range(0, 0, 15),
        selectionRange: range(0, 2, 15),
        children: [
          { name: "a", detail: "1", kind: "binding", range: range(1, 0, 10), selectionRange: range(1, 5, 6), children: [] },
          { name: "mark", kind: "label", range: range(2, 0, 6), selectionRange: range(2, 1, 5), children: [] },
        ],
      },
    ]);

    expect(symbols).toEqual([
      {
        name: "Intro",
        detail: "<intro>",
        kind: SymbolKind.Namespace,
        range: range(0, 0, 15),
        selectionRange: range(0, 2, 15),
        children: [
          {
            name: "a",
            detail: "1",
            kind: SymbolKind.Variable,
            range: range(1, 0, 10),
            selectionRange: range(1, 5, 6),
            children: [],
          },
          { name: "mark", kind: SymbolKind.Key, range: range(2, 0, 6), selectionRange: range(2, 1, 5), children: [] },
        ],
      },
    ]);
  });
});

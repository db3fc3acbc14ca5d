/**
 * Type mapping utilities: workspace answers → LSP types
 */
import {
  CompletionItemKind,
  DiagnosticSeverity as LspDiagnosticSeverity,
  DiagnosticTag as LspDiagnosticTag,
  FoldingRangeKind as LspFoldingRangeKind,
  MarkupKind,
  SymbolKind,
  TextDocumentEdit,
  type CompletionItem,
  type Diagnostic,
  type DocumentSymbol,
  type FoldingRange,
  type Hover,
  type Location as LspLocation,
  type Range,
  type SymbolInformation,
  type TextEdit,
  type WorkspaceEdit,
} from "vscode-languageserver/node.js";
import {
  canonicalDocumentUri,
  toProtocolUri,
  type DiagnosticSeverity,
  type DiagnosticTag,
  type DocumentUri,
  type QuillDiagnostic,
  type TextRange,
} from "@quill-ls/compiler";
import type {
  CompletionEntry,
  CompletionEntryKind,
  DocumentSymbolInfo,
  DocumentSymbolKind,
  EditList,
  FoldingRangeInfo,
  HoverInfo,
  Location,
  PrepareRenameResult,
  WorkspaceSymbolInfo,
} from "@quill-ls/workspace";

export function toLspUri(uri: DocumentUri): string {
  return toProtocolUri(uri);
}

export function fromLspUri(uri: string): DocumentUri {
  return canonicalDocumentUri(uri).uri;
}

export function toRange(range: TextRange): Range {
  return {
    start: { line: range.start.line, character: range.start.character },
    end: { line: range.end.line, character: range.end.character },
  };
}

function toLspSeverity(severity: DiagnosticSeverity): LspDiagnosticSeverity {
  switch (severity) {
    case "warning":
      return LspDiagnosticSeverity.Warning;
    case "info":
      return LspDiagnosticSeverity.Information;
    case "hint":
      return LspDiagnosticSeverity.Hint;
    default:
      return LspDiagnosticSeverity.Error;
  }
}

function toLspTags(tags: readonly DiagnosticTag[] | undefined): LspDiagnosticTag[] | undefined {
  if (!tags?.length) return undefined;
  const mapped: LspDiagnosticTag[] = [];
  for (const tag of tags) {
    if (tag === "unnecessary") mapped.push(LspDiagnosticTag.Unnecessary);
  }
  return mapped.length ? mapped : undefined;
}

export function mapDiagnostics(diagnostics: readonly QuillDiagnostic[]): Diagnostic[] {
  return diagnostics.map((diag) => {
    const base: Diagnostic = {
      range: toRange(diag.range),
      message: diag.message,
      severity: toLspSeverity(diag.severity),
      code: diag.code,
      source: diag.source,
    };
    const tags = toLspTags(diag.tags);
    if (tags) base.tags = tags;
    if (diag.related?.length) {
      base.relatedInformation = diag.related.map((rel) => ({
        message: rel.message,
        location: { uri: toLspUri(rel.uri), range: toRange(rel.range) },
      }));
    }
    return base;
  });
}

function toCompletionKind(kind: CompletionEntryKind): CompletionItemKind {
  switch (kind) {
    case "label":
      return CompletionItemKind.Reference;
    case "variable":
      return CompletionItemKind.Variable;
    case "input":
      return CompletionItemKind.Constant;
    case "keyword":
      return CompletionItemKind.Keyword;
  }
}

export function mapCompletions(entries: readonly CompletionEntry[]): CompletionItem[] {
  return entries.map((entry) => {
    const completion: CompletionItem = {
      label: entry.label,
      kind: toCompletionKind(entry.kind),
      textEdit: { range: toRange(entry.range), newText: entry.label },
    };
    if (entry.detail) completion.detail = entry.detail;
    return completion;
  });
}

export function mapHover(hover: HoverInfo | null): Hover | null {
  if (!hover) return null;
  return {
    contents: { kind: MarkupKind.Markdown, value: hover.contents },
    range: toRange(hover.range),
  };
}

export function mapLocations(locations: readonly Location[]): LspLocation[] {
  return locations.map((loc) => ({ uri: toLspUri(loc.uri), range: toRange(loc.range) }));
}

export function mapPrepareRename(result: PrepareRenameResult | null): { range: Range; placeholder: string } | null {
  if (!result) return null;
  return { range: toRange(result.range), placeholder: result.placeholder };
}

/** Formatting edits for a single document; the version check already happened in the engine. */
export function mapTextEdits(edits: EditList): TextEdit[] {
  return edits.map((edit) => ({ range: toRange(edit.range), newText: edit.newText }));
}

/**
 * One versioned `TextDocumentEdit` per document. Files that are not open carry
 * a null version, which tells the client to apply the edit to whatever is on disk.
 */
export function mapWorkspaceEdit(edits: EditList | null): WorkspaceEdit | null {
  if (!edits) return null;
  const grouped = new Map<DocumentUri, { version: number | null; edits: TextEdit[] }>();
  for (const edit of edits) {
    let group = grouped.get(edit.uri);
    if (!group) {
      group = { version: edit.version, edits: [] };
      grouped.set(edit.uri, group);
    }
    group.edits.push({ range: toRange(edit.range), newText: edit.newText });
  }
  const documentChanges: TextDocumentEdit[] = [];
  for (const [uri, group] of grouped) {
    documentChanges.push(TextDocumentEdit.create({ uri: toLspUri(uri), version: group.version }, group.edits));
  }
  return { documentChanges };
}

function toSymbolKind(kind: DocumentSymbolKind): SymbolKind {
  switch (kind) {
    case "heading":
      return SymbolKind.Namespace;
    case "label":
      return SymbolKind.Key;
    case "binding":
      return SymbolKind.Variable;
  }
}

export function mapDocumentSymbols(symbols: readonly DocumentSymbolInfo[]): DocumentSymbol[] {
  return symbols.map((symbol) => {
    const mapped: DocumentSymbol = {
      name: symbol.name,
      kind: toSymbolKind(symbol.kind),
      range: toRange(symbol.range),
      selectionRange: toRange(symbol.selectionRange),
      children: mapDocumentSymbols(symbol.children),
    };
    if (symbol.detail) mapped.detail = symbol.detail;
    return mapped;
  });
}

export function mapWorkspaceSymbols(symbols: readonly WorkspaceSymbolInfo[]): SymbolInformation[] {
  return symbols.map((symbol) => {
    const mapped: SymbolInformation = {
      name: symbol.name,
      kind: toSymbolKind(symbol.kind),
      location: { uri: toLspUri(symbol.location.uri), range: toRange(symbol.location.range) },
    };
    if (symbol.containerName) mapped.containerName = symbol.containerName;
    return mapped;
  });
}

export function mapFoldingRanges(ranges: readonly FoldingRangeInfo[]): FoldingRange[] {
  return ranges.map((range) => ({
    startLine: range.startLine,
    endLine: range.endLine,
    kind: range.kind === "imports" ? LspFoldingRangeKind.Imports : LspFoldingRangeKind.Region,
  }));
}

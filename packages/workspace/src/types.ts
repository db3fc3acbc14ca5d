import type { DocumentUri, QuillDiagnostic, TextRange } from "@quill-ls/compiler";
import type { CancellationToken } from "./cancellation.js";
import type { DocumentOrigin, ReadSetEntry } from "./snapshot.js";

/** What a running query may do with the task that runs it. */
export interface QueryContext {
  readonly token: CancellationToken;
  /** Report the documents the answer depends on, as soon as they are known. */
  declareReadSet(readSet: readonly ReadSetEntry[], scope: "document" | "workspace"): void;
  /** Safe point: yields, then throws if the task was cancelled or superseded. */
  checkpoint(): Promise<void>;
}

export interface Location {
  readonly uri: DocumentUri;
  readonly range: TextRange;
}

export interface HoverInfo {
  /** Markdown. */
  readonly contents: string;
  readonly range: TextRange;
}

export type CompletionEntryKind = "label" | "variable" | "input" | "keyword";

export interface CompletionEntry {
  readonly label: string;
  readonly kind: CompletionEntryKind;
  readonly detail?: string;
  /** The identifier prefix the entry replaces. */
  readonly range: TextRange;
}

export interface PrepareRenameResult {
  readonly range: TextRange;
  readonly placeholder: string;
}

export interface DocumentEdit {
  readonly uri: DocumentUri;
  /** Version the edit was computed against; null for files that are not open. */
  readonly version: number | null;
  readonly range: TextRange;
  readonly newText: string;
}

/** Sorted by document then position; non-overlapping; one version per document. */
export type EditList = readonly DocumentEdit[];

export type DocumentSymbolKind = "heading" | "label" | "binding";

export interface DocumentSymbolInfo {
  readonly name: string;
  readonly detail?: string;
  readonly kind: DocumentSymbolKind;
  readonly range: TextRange;
  readonly selectionRange: TextRange;
  readonly children: readonly DocumentSymbolInfo[];
}

export interface WorkspaceSymbolInfo {
  readonly name: string;
  readonly kind: DocumentSymbolKind;
  readonly location: Location;
  /** Title of the enclosing heading, if any. */
  readonly containerName?: string;
}

/** `imports` folds a run of include lines. */
export type FoldingRangeKind = "section" | "imports";

export interface FoldingRangeInfo {
  /** Zero-based lines, both inclusive. */
  readonly startLine: number;
  readonly endLine: number;
  readonly kind: FoldingRangeKind;
}

export interface DiagnosticSetEntry {
  readonly version: number;
  readonly origin: DocumentOrigin;
  readonly diagnostics: readonly QuillDiagnostic[];
}

/** Diagnostics of one compile root, replaced wholesale by the next one. */
export interface DiagnosticSet {
  readonly root: DocumentUri;
  readonly fingerprint: string;
  readonly entries: ReadonlyMap<DocumentUri, DiagnosticSetEntry>;
  /** Every document the set was computed from, include targets that were absent included. */
  readonly dependencies: readonly DocumentUri[];
}

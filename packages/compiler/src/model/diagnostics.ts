/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Diagnostics leave the compiler already positioned (line/character) so that every
 * consumer (cache, publisher, transport) can compare and ship them by value.
 * ======================================================================================= */

import type { DocumentUri, TextRange } from "./primitives.js";
import type { SyntaxErrorCode } from "../syntax/ast.js";

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export type DiagnosticTag = "unnecessary";

export type CompileDiagnosticCode =
  | "include-cycle"
  | "file-not-found"
  | "duplicate-label"
  | "unknown-label"
  | "unknown-variable"
  | "unused-binding"
  | "internal-error";

export type QuillDiagnosticCode = SyntaxErrorCode | CompileDiagnosticCode;

export interface DiagnosticRelated {
  readonly uri: DocumentUri;
  readonly range: TextRange;
  readonly message: string;
}

export interface QuillDiagnostic {
  readonly code: QuillDiagnosticCode;
  readonly message: string;
  readonly severity: DiagnosticSeverity;
  readonly range: TextRange;
  readonly tags?: readonly DiagnosticTag[];
  readonly related?: readonly DiagnosticRelated[];
  readonly source: "quill";
}

/** Diagnostics of one compile, keyed by every document of the include closure. */
export type DiagnosticMap = ReadonlyMap<DocumentUri, readonly QuillDiagnostic[]>;

export function compareDiagnostics(a: QuillDiagnostic, b: QuillDiagnostic): number {
  return (
    a.range.start.line - b.range.start.line ||
    a.range.start.character - b.range.start.character ||
    a.range.end.line - b.range.end.line ||
    a.range.end.character - b.range.end.character ||
    (a.code < b.code ? -1 : a.code > b.code ? 1 : 0)
  );
}

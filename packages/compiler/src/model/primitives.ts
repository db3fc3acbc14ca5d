/**
 * Core identity and text primitives shared by every layer.
 *
 * Offsets are UTF-16 code units (JavaScript string indices), which is also the
 * default LSP position encoding.
 */

/** Canonical document identifier. Produce via `canonicalDocumentUri` / `asDocumentUri`. */
export type DocumentUri = string & { readonly __brand: "DocumentUri" };

export function asDocumentUri(value: string): DocumentUri {
  return value as DocumentUri;
}

export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

export interface TextPosition {
  readonly line: number;
  readonly character: number;
}

export interface TextRange {
  readonly start: TextPosition;
  readonly end: TextPosition;
}

export interface DocumentSpan {
  readonly uri: DocumentUri;
  readonly span: TextSpan;
}

export function span(start: number, end: number): TextSpan {
  return { start, end };
}

export function spanLength(s: TextSpan): number {
  return s.end - s.start;
}

/** Cursor-friendly containment: a cursor sitting right after the last character still hits. */
export function spanContainsOffset(s: TextSpan, offset: number): boolean {
  return offset >= s.start && offset <= s.end;
}

export function spansOverlap(a: TextSpan, b: TextSpan): boolean {
  return a.start < b.end && b.start < a.end;
}

export function compareSpans(a: TextSpan, b: TextSpan): number {
  return a.start - b.start || a.end - b.end;
}

export function comparePositions(a: TextPosition, b: TextPosition): number {
  return a.line - b.line || a.character - b.character;
}

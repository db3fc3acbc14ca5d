import { isDirectiveKeyword, isIdentifier, type DocumentUri, type TextPosition } from "@quill-ls/compiler";
import { InvalidRenameError } from "../errors.js";
import type { DocumentEdit, EditList, PrepareRenameResult } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";
import { validateEditList } from "./edits.js";
import { findOccurrences, includeConnected, symbolAt } from "./symbols-at.js";

export async function prepareRename(analysis: SnapshotAnalysis, position: TextPosition): Promise<PrepareRenameResult | null> {
  const uri = analysis.entry.uri;
  const module = await analysis.parse(uri);
  const symbol = module ? symbolAt(module, analysis.offsetAt(uri, position)) : null;
  if (!symbol) return null;
  return { range: analysis.rangeOf(uri, symbol.nameSpan), placeholder: symbol.name };
}

/**
 * Rename a label or binding in every include-connected document. Edits on
 * open documents carry their version; edits on files read from disk carry
 * null. Not cached: the answer depends on `newName` and is cheap next to the
 * parses it reuses.
 */
export async function rename(
  analysis: SnapshotAnalysis,
  uri: DocumentUri,
  position: TextPosition,
  newName: string,
): Promise<EditList | null> {
  if (!isIdentifier(newName)) throw new InvalidRenameError(newName);

  const module = await analysis.parse(uri);
  const symbol = module ? symbolAt(module, analysis.offsetAt(uri, position)) : null;
  if (!symbol) return null;
  // `#let` and `#include` would read as directives, not uses.
  if (symbol.kind === "binding" && isDirectiveKeyword(newName)) throw new InvalidRenameError(newName);

  const occurrences = await findOccurrences(analysis, symbol, await includeConnected(analysis, uri));
  const edits: DocumentEdit[] = [];
  for (const occurrence of occurrences) {
    const doc = analysis.document(occurrence.uri);
    if (!doc) continue;
    edits.push({
      uri: occurrence.uri,
      version: doc.origin === "memory" ? doc.version : null,
      range: analysis.rangeOf(occurrence.uri, occurrence.nameSpan),
      newText: newName,
    });
  }
  return validateEditList(edits);
}

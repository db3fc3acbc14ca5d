import type { DocumentUri, TextPosition } from "@quill-ls/compiler";
import { defineCacheKind } from "../cache.js";
import type { Location } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";
import { findOccurrences, includeConnected, symbolAt } from "./symbols-at.js";

export const REFERENCES = defineCacheKind<readonly Location[]>("references");

/**
 * Every occurrence of the label or binding under the cursor, across the
 * documents include-connected to `uri`. Runs on a workspace snapshot.
 */
export async function references(
  analysis: SnapshotAnalysis,
  uri: DocumentUri,
  position: TextPosition,
  includeDeclaration: boolean,
): Promise<readonly Location[]> {
  const offset = analysis.offsetAt(uri, position);
  return analysis.memo(REFERENCES, { uri, offset, includeDeclaration }, async (bound) => {
    const module = await bound.parse(uri);
    const symbol = module ? symbolAt(module, offset) : null;
    if (!symbol) return [];
    const occurrences = await findOccurrences(bound, symbol, await includeConnected(bound, uri));
    return occurrences
      .filter((occurrence) => includeDeclaration || !occurrence.declaration)
      .map((occurrence) => ({ uri: occurrence.uri, range: bound.rangeOf(occurrence.uri, occurrence.nameSpan) }));
  });
}

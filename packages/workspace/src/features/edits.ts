import { comparePositions, type DocumentUri } from "@quill-ls/compiler";
import { EditConflictError } from "../errors.js";
import type { DocumentEdit, EditList } from "../types.js";

/**
 * Sort an edit list by document then position and check it can be applied
 * as one transaction: each document bound to a single version and no two
 * edits of a document overlapping.
 */
export function validateEditList(edits: readonly DocumentEdit[]): EditList {
  const sorted = [...edits].sort(
    (a, b) => (a.uri < b.uri ? -1 : a.uri > b.uri ? 1 : comparePositions(a.range.start, b.range.start)),
  );
  for (let i = 1; i < sorted.length; i += 1) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (!previous || !current || previous.uri !== current.uri) continue;
    if (previous.version !== current.version) {
      throw new EditConflictError(current.uri, `edits computed against versions ${previous.version} and ${current.version}`);
    }
    if (comparePositions(current.range.start, previous.range.end) < 0) {
      throw new EditConflictError(current.uri, "overlapping edits");
    }
  }
  return sorted;
}

/**
 * Check every edited document is still where the edits expect it: open at
 * the bound version, or still closed for edits computed from disk.
 */
export function verifyEditVersions(edits: EditList, versionOf: (uri: DocumentUri) => number | undefined): void {
  for (const edit of edits) {
    const current = versionOf(edit.uri);
    if (edit.version === null) {
      if (current !== undefined) throw new EditConflictError(edit.uri, `opened at version ${current} after the edits were computed`);
    } else if (current !== edit.version) {
      throw new EditConflictError(
        edit.uri,
        current === undefined ? "closed after the edits were computed" : `now at version ${current}, edits target ${edit.version}`,
      );
    }
  }
}

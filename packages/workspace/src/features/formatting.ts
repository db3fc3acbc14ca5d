import { computeTextEdit } from "@quill-ls/compiler";
import { defineCacheKind } from "../cache.js";
import type { EditList } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";
import { validateEditList } from "./edits.js";

export const FORMATTING = defineCacheKind<EditList>("formatting");

/** At most one edit: the smallest replacement that yields the formatted text. */
export async function formatting(analysis: SnapshotAnalysis): Promise<EditList> {
  const { mode, printWidth } = analysis.env.config().formatter;
  if (mode === "disable") return [];

  return analysis.memo(FORMATTING, { printWidth }, async (bound) => {
    const doc = bound.entry;
    const formatted = bound.env.engine.format(doc.text, { printWidth });
    const edit = computeTextEdit(doc.text, formatted);
    if (!edit) return [];
    return validateEditList([
      {
        uri: doc.uri,
        version: doc.version,
        range: bound.rangeOf(doc.uri, edit.span),
        newText: edit.newText,
      },
    ]);
  });
}

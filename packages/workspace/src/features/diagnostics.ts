import type { DocumentUri, QuillDiagnostic } from "@quill-ls/compiler";
import type { ComputeFailureError } from "../errors.js";
import type { DiagnosticSet, DiagnosticSetEntry } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";

/**
 * Diagnostics of the entry's whole closure, one entry per snapshot document
 * so that documents whose problems went away are published empty.
 */
export async function diagnostics(analysis: SnapshotAnalysis): Promise<DiagnosticSet> {
  const entry = analysis.entry;
  const outcome = await analysis.compile();
  const entries = new Map<DocumentUri, DiagnosticSetEntry>();

  for (const doc of analysis.snapshot.documents.values()) {
    let list: readonly QuillDiagnostic[];
    if (outcome.ok) list = outcome.result.diagnostics.get(doc.uri) ?? [];
    else list = doc.uri === entry.uri ? [internalError(outcome.error)] : [];
    entries.set(doc.uri, { version: doc.version, origin: doc.origin, diagnostics: list });
  }

  return {
    root: entry.uri,
    fingerprint: analysis.snapshot.fingerprint,
    entries,
    dependencies: analysis.snapshot.readSet.map((read) => read.uri),
  };
}

function internalError(error: ComputeFailureError): QuillDiagnostic {
  const start = { line: 0, character: 0 };
  return {
    code: "internal-error",
    message: error.message,
    severity: "error",
    range: { start, end: start },
    source: "quill",
  };
}

import {
  DIRECTIVE_KEYWORDS,
  itemsOfKind,
  relativeDocumentPath,
  type TextPosition,
} from "@quill-ls/compiler";
import { defineCacheKind } from "../cache.js";
import type { CompletionEntry, CompletionEntryKind } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";

export const COMPLETION = defineCacheKind<readonly CompletionEntry[]>("completion");

const IDENT_PART_RE = /[A-Za-z0-9_-]/;

const KIND_ORDER: Record<CompletionEntryKind, number> = {
  keyword: 0,
  variable: 1,
  input: 2,
  label: 3,
};

interface Candidate {
  readonly label: string;
  readonly kind: CompletionEntryKind;
  readonly detail?: string;
}

export async function completion(analysis: SnapshotAnalysis, position: TextPosition): Promise<readonly CompletionEntry[]> {
  const offset = analysis.offsetAt(analysis.entry.uri, position);
  return analysis.memo(COMPLETION, { offset }, (bound) => computeCompletion(bound, offset));
}

/**
 * Completions after `@` (labels) or `#` (keywords, bindings, inputs). When
 * the closure cannot be compiled, falls back to what the entry alone declares.
 */
async function computeCompletion(analysis: SnapshotAnalysis, offset: number): Promise<readonly CompletionEntry[]> {
  const entry = analysis.entry;
  const text = entry.text;
  let start = offset;
  while (start > 0 && IDENT_PART_RE.test(text[start - 1] ?? "")) start -= 1;
  const sigil = text[start - 1];
  if (sigil !== "@" && sigil !== "#") return [];

  const prefix = text.slice(start, offset);
  const candidates = sigil === "@" ? await labelCandidates(analysis) : await hashCandidates(analysis);
  const range = analysis.rangeOf(entry.uri, { start, end: offset });
  return candidates
    .filter((candidate) => candidate.label.startsWith(prefix))
    .sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0))
    .map((candidate) => ({ ...candidate, range }));
}

async function labelCandidates(analysis: SnapshotAnalysis): Promise<Candidate[]> {
  const entry = analysis.entry.uri;
  const outcome = await analysis.compile();
  if (outcome.ok) {
    return [...outcome.result.artifact.labels.values()].map((label) => ({
      label: label.name,
      kind: "label",
      detail: label.heading ?? relativeDocumentPath(entry, label.uri),
    }));
  }
  const module = await analysis.parse(entry);
  if (!module) return [];
  const names = new Set(itemsOfKind(module, "label").map((label) => label.name));
  return [...names].map((name) => ({ label: name, kind: "label" }));
}

async function hashCandidates(analysis: SnapshotAnalysis): Promise<Candidate[]> {
  const candidates: Candidate[] = DIRECTIVE_KEYWORDS.map((keyword) => ({ label: keyword, kind: "keyword" }));
  const bindings = new Map<string, string>();
  let inputs: Readonly<Record<string, string>>;

  const outcome = await analysis.compile();
  if (outcome.ok) {
    for (const binding of outcome.result.artifact.bindings) bindings.set(binding.name, binding.value);
    inputs = outcome.result.artifact.inputs;
  } else {
    const module = await analysis.parse(analysis.entry.uri);
    for (const binding of module ? itemsOfKind(module, "binding") : []) bindings.set(binding.name, binding.value);
    inputs = analysis.snapshot.config.inputs;
  }

  for (const [name, value] of bindings) candidates.push({ label: name, kind: "variable", detail: value });
  for (const [name, value] of Object.entries(inputs)) {
    if (bindings.has(name)) continue;
    candidates.push({ label: name, kind: "input", detail: value });
  }
  return candidates;
}

import { findItemAt, type TextPosition } from "@quill-ls/compiler";
import { defineCacheKind } from "../cache.js";
import type { Location } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";

export const DEFINITION = defineCacheKind<readonly Location[]>("definition");

export async function definition(analysis: SnapshotAnalysis, position: TextPosition): Promise<readonly Location[]> {
  const offset = analysis.offsetAt(analysis.entry.uri, position);
  return analysis.memo(DEFINITION, { offset }, (bound) => computeDefinition(bound, offset));
}

async function computeDefinition(analysis: SnapshotAnalysis, offset: number): Promise<readonly Location[]> {
  const uri = analysis.entry.uri;
  const module = await analysis.parse(uri);
  const item = module ? findItemAt(module, offset) : null;
  if (!item) return [];

  if (item.kind === "include") {
    if (!analysis.document(item.target)) return [];
    const start = { line: 0, character: 0 };
    return [{ uri: item.target, range: { start, end: start } }];
  }
  if (item.kind !== "reference" && item.kind !== "use") return [];

  const outcome = await analysis.compile();
  if (!outcome.ok) return [];
  const artifact = outcome.result.artifact;

  if (item.kind === "reference") {
    const ref = artifact.references.find((candidate) => candidate.uri === uri && candidate.span.start === item.span.start);
    const target = ref?.target;
    return target ? [{ uri: target.uri, range: analysis.rangeOf(target.uri, target.span) }] : [];
  }
  const use = artifact.uses.find((candidate) => candidate.uri === uri && candidate.span.start === item.span.start);
  const target = use?.target ?? null;
  if (target === null || target.kind !== "binding") return [];
  const binding = target.binding;
  return [{ uri: binding.uri, range: analysis.rangeOf(binding.uri, binding.nameSpan) }];
}

import {
  findItemAt,
  itemsOfKind,
  type DocumentUri,
  type ModuleItem,
  type ParsedModule,
  type TextSpan,
} from "@quill-ls/compiler";
import type { SnapshotAnalysis } from "./analysis.js";

/** Something that can be referenced and renamed: a label or a binding. */
export interface SymbolRef {
  readonly kind: "label" | "binding";
  readonly name: string;
  readonly nameSpan: TextSpan;
}

export interface Occurrence {
  readonly uri: DocumentUri;
  readonly nameSpan: TextSpan;
  readonly declaration: boolean;
}

export function symbolOf(item: ModuleItem | null): SymbolRef | null {
  switch (item?.kind) {
    case "label":
    case "reference":
      return { kind: "label", name: item.name, nameSpan: item.nameSpan };
    case "binding":
    case "use":
      return { kind: "binding", name: item.name, nameSpan: item.nameSpan };
    default:
      return null;
  }
}

export function symbolAt(module: ParsedModule, offset: number): SymbolRef | null {
  return symbolOf(findItemAt(module, offset));
}

/**
 * Documents of the snapshot reachable from `uri` through includes in either
 * direction, sorted.
 */
export async function includeConnected(analysis: SnapshotAnalysis, uri: DocumentUri): Promise<DocumentUri[]> {
  const edges = new Map<DocumentUri, Set<DocumentUri>>();
  const link = (a: DocumentUri, b: DocumentUri) => {
    let set = edges.get(a);
    if (!set) {
      set = new Set();
      edges.set(a, set);
    }
    set.add(b);
  };
  for (const doc of analysis.snapshot.documents.keys()) {
    const module = await analysis.parse(doc);
    if (!module) continue;
    for (const include of itemsOfKind(module, "include")) {
      if (!analysis.snapshot.documents.has(include.target)) continue;
      link(doc, include.target);
      link(include.target, doc);
    }
  }

  const seen = new Set<DocumentUri>([uri]);
  const queue = [uri];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined) break;
    for (const neighbour of edges.get(next) ?? []) {
      if (seen.has(neighbour)) continue;
      seen.add(neighbour);
      queue.push(neighbour);
    }
  }
  return [...seen].sort();
}

/** Every declaration and use of `symbol` across `uris`, by name. */
export async function findOccurrences(
  analysis: SnapshotAnalysis,
  symbol: SymbolRef,
  uris: readonly DocumentUri[],
): Promise<Occurrence[]> {
  const occurrences: Occurrence[] = [];
  for (const uri of uris) {
    const module = await analysis.parse(uri);
    if (!module) continue;
    for (const item of module.items) {
      const found = symbolOf(item);
      if (!found || found.kind !== symbol.kind || found.name !== symbol.name) continue;
      occurrences.push({ uri, nameSpan: found.nameSpan, declaration: item.kind === "label" || item.kind === "binding" });
    }
  }
  return occurrences;
}

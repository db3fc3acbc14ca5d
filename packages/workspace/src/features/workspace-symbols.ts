import type { HeadingNode } from "@quill-ls/compiler";
import { defineCacheKind } from "../cache.js";
import type { SnapshotDocument } from "../snapshot.js";
import type { WorkspaceSymbolInfo } from "../types.js";
import { parseDocument, type SnapshotAnalysis } from "./analysis.js";

/** Every symbol of one file, keyed by its content. */
export const FILE_SYMBOLS = defineCacheKind<readonly WorkspaceSymbolInfo[]>("file-symbols");

/**
 * Headings, labels and bindings of every document in the workspace snapshot
 * whose name contains `query`, ignoring case. An empty query matches all.
 */
export async function workspaceSymbols(analysis: SnapshotAnalysis, query: string): Promise<readonly WorkspaceSymbolInfo[]> {
  const needle = query.trim().toLowerCase();
  const docs = [...analysis.snapshot.documents.values()].sort((a, b) => (a.uri < b.uri ? -1 : a.uri > b.uri ? 1 : 0));
  const matches: WorkspaceSymbolInfo[] = [];
  for (const doc of docs) {
    const symbols = await fileSymbols(analysis, doc);
    for (const symbol of symbols) {
      if (symbol.name.toLowerCase().includes(needle)) matches.push(symbol);
    }
  }
  return matches;
}

async function fileSymbols(analysis: SnapshotAnalysis, doc: SnapshotDocument): Promise<readonly WorkspaceSymbolInfo[]> {
  const env = analysis.env;
  const symbols = await env.cache.getOrCompute(
    FILE_SYMBOLS,
    env.snapshots.fingerprintDocument(doc),
    async (token) => {
      const module = await parseDocument(env, doc, token);
      const found: WorkspaceSymbolInfo[] = [];
      const headings: HeadingNode[] = [];
      for (const item of module.items) {
        if (item.kind !== "heading" && item.kind !== "label" && item.kind !== "binding") continue;
        if (item.kind === "heading") {
          while ((headings.at(-1)?.level ?? 0) >= item.level) headings.pop();
        }
        const container = headings.at(-1)?.title;
        found.push({
          name: item.kind === "heading" ? item.title : item.name,
          kind: item.kind,
          location: { uri: doc.uri, range: analysis.rangeOf(doc.uri, item.span) },
          ...(container === undefined ? {} : { containerName: container }),
        });
        if (item.kind === "heading") headings.push(item);
      }
      return found;
    },
    { token: analysis.ctx.token },
  );
  await analysis.ctx.checkpoint();
  return symbols;
}

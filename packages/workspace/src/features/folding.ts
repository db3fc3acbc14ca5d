import type { DocumentSymbolInfo, FoldingRangeInfo } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";
import { documentSymbols } from "./symbols.js";

/**
 * Heading sections from the outline, plus each run of two or more include
 * lines in a row. Sorted by start line; single-line ranges are left out.
 */
export async function foldingRanges(analysis: SnapshotAnalysis): Promise<readonly FoldingRangeInfo[]> {
  const ranges: FoldingRangeInfo[] = [];

  const visit = (symbols: readonly DocumentSymbolInfo[]) => {
    for (const symbol of symbols) {
      if (symbol.kind !== "heading") continue;
      const { start, end } = symbol.range;
      if (end.line > start.line) ranges.push({ startLine: start.line, endLine: end.line, kind: "section" });
      visit(symbol.children);
    }
  };
  visit(await documentSymbols(analysis));

  const doc = analysis.entry;
  const module = await analysis.parse(doc.uri);
  const runs: { start: number; end: number }[] = [];
  for (const item of module?.items ?? []) {
    if (item.kind !== "include") continue;
    const line = analysis.rangeOf(doc.uri, item.span).start.line;
    const last = runs.at(-1);
    if (last && line === last.end + 1) last.end = line;
    else runs.push({ start: line, end: line });
  }
  for (const run of runs) {
    if (run.end > run.start) ranges.push({ startLine: run.start, endLine: run.end, kind: "imports" });
  }

  return ranges.sort((a, b) => a.startLine - b.startLine || b.endLine - a.endLine);
}

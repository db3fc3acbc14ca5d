import type { HeadingNode, TextSpan } from "@quill-ls/compiler";
import { defineCacheKind } from "../cache.js";
import type { DocumentSymbolInfo } from "../types.js";
import type { SnapshotAnalysis } from "./analysis.js";

export const DOCUMENT_SYMBOLS = defineCacheKind<readonly DocumentSymbolInfo[]>("document-symbols");

interface Section {
  readonly heading: HeadingNode;
  readonly children: DocumentSymbolInfo[];
}

/**
 * Outline of the entry document: headings nest by level, and each section
 * runs until the next heading of the same or a higher level. Bindings and
 * labels that are not on a heading line become children of their section.
 */
export async function documentSymbols(analysis: SnapshotAnalysis): Promise<readonly DocumentSymbolInfo[]> {
  return analysis.memo(DOCUMENT_SYMBOLS, null, async (bound) => {
    const doc = bound.entry;
    const module = await bound.parse(doc.uri);
    if (!module) return [];

    const text = doc.text;
    const roots: DocumentSymbolInfo[] = [];
    const stack: Section[] = [];
    const range = (at: TextSpan) => bound.rangeOf(doc.uri, at);

    const close = (section: Section, end: number) => {
      let stop = end;
      while (stop > section.heading.span.end && /\s/.test(text[stop - 1] ?? "")) stop -= 1;
      const symbol: DocumentSymbolInfo = {
        name: section.heading.title,
        ...(section.heading.label === null ? {} : { detail: `<${section.heading.label}>` }),
        kind: "heading",
        range: range({ start: section.heading.span.start, end: stop }),
        selectionRange: range(section.heading.titleSpan),
        children: section.children,
      };
      (stack.at(-1)?.children ?? roots).push(symbol);
    };

    let current: HeadingNode | null = null;
    for (const item of module.items) {
      if (item.kind === "heading") {
        while (stack.length > 0) {
          const top = stack.at(-1);
          if (!top || top.heading.level < item.level) break;
          stack.pop();
          close(top, item.span.start);
        }
        stack.push({ heading: item, children: [] });
        current = item;
        continue;
      }
      if (item.kind === "label") {
        if (current && item.span.start >= current.span.start && item.span.end <= current.span.end) continue;
      } else if (item.kind !== "binding") {
        continue;
      }
      const symbol: DocumentSymbolInfo = {
        name: item.name,
        ...(item.kind === "binding" ? { detail: item.value } : {}),
        kind: item.kind,
        range: range(item.span),
        selectionRange: range(item.nameSpan),
        children: [],
      };
      (stack.at(-1)?.children ?? roots).push(symbol);
    }

    while (stack.length > 0) {
      const top = stack.pop();
      if (top) close(top, text.length);
    }
    return roots;
  });
}

import { spanContainsOffset, spanLength, type TextSpan } from "../model/primitives.js";
import type { ModuleItem, ParsedModule } from "./ast.js";

/** The part of an item a cursor has to touch to select it. */
export function hitSpan(item: ModuleItem): TextSpan {
  switch (item.kind) {
    case "binding":
      return item.nameSpan;
    case "heading":
      return item.titleSpan;
    default:
      return item.span;
  }
}

/** Innermost item under `offset`; labels on a heading line win over the heading. */
export function findItemAt(module: ParsedModule, offset: number): ModuleItem | null {
  let best: ModuleItem | null = null;
  for (const item of module.items) {
    const hit = hitSpan(item);
    if (!spanContainsOffset(hit, offset)) continue;
    if (best === null || spanLength(hit) < spanLength(hitSpan(best))) best = item;
  }
  return best;
}

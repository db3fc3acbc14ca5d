import type { DocumentUri } from "../model/primitives.js";
import { resolveIncludeTarget } from "../program/paths.js";

const INCLUDE_LINE_RE = /^[ \t]*#include[ \t]+"([^"\r\n]*)"/gm;

/**
 * Cheap dependency discovery for snapshot building: finds `#include` targets
 * without a full parse. Targets are resolved, de-duplicated and kept in
 * document order.
 */
export function scanDependencies(text: string, uri: DocumentUri): DocumentUri[] {
  const seen = new Set<DocumentUri>();
  for (const match of text.matchAll(INCLUDE_LINE_RE)) {
    const specifier = match[1];
    if (specifier === undefined || specifier.trim() === "") continue;
    seen.add(resolveIncludeTarget(uri, specifier));
  }
  return [...seen];
}

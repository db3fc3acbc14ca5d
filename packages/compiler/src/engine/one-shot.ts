import type { DocumentUri } from "../model/primitives.js";
import { normalizeDocumentUri } from "../program/paths.js";
import type { CompileResult } from "./artifact.js";
import { quillEngine, type CompilerEngine } from "./engine.js";
import { createWorld, type WorldOptions, type WorldSource } from "./world.js";

/** Returns the file's text, or null when it does not exist. */
export type SourceLoader = (uri: DocumentUri) => string | null | Promise<string | null>;

export interface OneShotOptions extends WorldOptions {
  readonly engine?: CompilerEngine;
}

export class EntryNotFoundError extends Error {
  constructor(readonly uri: DocumentUri) {
    super(`cannot compile ${uri}: file not found`);
    this.name = "EntryNotFoundError";
  }
}

/**
 * Load the include closure of `entry` and compile it once, with no caching.
 * Used for explicit compile commands and as the uncached reference result in
 * tests.
 */
export async function compileDocument(
  entry: string,
  load: SourceLoader,
  options: OneShotOptions = {},
): Promise<CompileResult> {
  const engine = options.engine ?? quillEngine;
  const root = normalizeDocumentUri(entry);
  const sources = new Map<DocumentUri, WorldSource>();
  const missing = new Set<DocumentUri>();
  const queue: DocumentUri[] = [root];

  while (queue.length > 0) {
    const uri = queue.shift();
    if (uri === undefined || sources.has(uri) || missing.has(uri)) continue;
    const text = await load(uri);
    if (text === null) {
      if (uri === root) throw new EntryNotFoundError(root);
      missing.add(uri);
      continue;
    }
    sources.set(uri, { uri, text, module: engine.parse(uri, text) });
    queue.push(...engine.scanDependencies(text, uri));
  }

  return engine.compile(createWorld(root, sources.values(), options));
}

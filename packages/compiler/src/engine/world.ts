import type { DocumentUri } from "../model/primitives.js";
import type { ParsedModule } from "../syntax/ast.js";

export interface WorldSource {
  readonly uri: DocumentUri;
  readonly text: string;
  readonly module: ParsedModule;
}

/**
 * Everything a compile may read. Sources are resolved up front, so a compile
 * never loads files itself and stays deterministic for a fixed world.
 */
export interface CompileWorld {
  readonly entry: DocumentUri;
  /** Values for `#name` uses that no binding in the document defines. */
  readonly inputs: Readonly<Record<string, string>>;
  readonly fontRevision: string;
  source(uri: DocumentUri): WorldSource | undefined;
}

export interface WorldOptions {
  readonly inputs?: Readonly<Record<string, string>>;
  readonly fontRevision?: string;
}

export function createWorld(
  entry: DocumentUri,
  sources: Iterable<WorldSource>,
  options: WorldOptions = {},
): CompileWorld {
  const table = new Map<DocumentUri, WorldSource>();
  for (const source of sources) table.set(source.uri, source);
  return {
    entry,
    inputs: options.inputs ?? {},
    fontRevision: options.fontRevision ?? "default",
    source: (uri) => table.get(uri),
  };
}

import type { DocumentUri } from "../model/primitives.js";
import { formatQuill, type FormatOptions } from "../format/format.js";
import type { ParsedModule } from "../syntax/ast.js";
import { parseModule } from "../syntax/parser.js";
import { scanDependencies } from "../syntax/scan.js";
import type { CompileResult } from "./artifact.js";
import { compile } from "./compile.js";
import type { CompileWorld } from "./world.js";

/**
 * The compiling engine as seen by the analysis layer. Every member must be
 * deterministic: the same inputs always produce equal outputs, which is what
 * makes fingerprint-keyed caching sound.
 */
export interface CompilerEngine {
  readonly id: string;
  parse(uri: DocumentUri, text: string): ParsedModule;
  /** Include targets of a document without a full parse. */
  scanDependencies(text: string, uri: DocumentUri): DocumentUri[];
  compile(world: CompileWorld): CompileResult;
  format(text: string, options: FormatOptions): string;
}

export const quillEngine: CompilerEngine = {
  id: "quill",
  parse: parseModule,
  scanDependencies,
  compile,
  format: formatQuill,
};

// Compiler package public API
//
// Quill syntax, the reference compile, the formatter and the primitives the
// analysis layers share. Import from here rather than deep paths for stability.

// === Model ===
export { asDocumentUri, span, spanLength, spanContainsOffset, spansOverlap, compareSpans, comparePositions } from "./model/primitives.js";
export type { DocumentUri, TextSpan, TextPosition, TextRange, DocumentSpan } from "./model/primitives.js";
export { LineIndex, computeLineStarts, spanToRange, offsetAtPosition } from "./model/text.js";
export { compareDiagnostics } from "./model/diagnostics.js";
export type {
  QuillDiagnostic,
  QuillDiagnosticCode,
  CompileDiagnosticCode,
  DiagnosticSeverity,
  DiagnosticTag,
  DiagnosticRelated,
  DiagnosticMap,
} from "./model/diagnostics.js";

// === Paths ===
export {
  normalizePathForId,
  normalizeDocumentUri,
  canonicalDocumentUri,
  resolveIncludeTarget,
  toProtocolUri,
  relativeDocumentPath,
} from "./program/paths.js";
export type { CanonicalDocumentUri } from "./program/paths.js";

// === Syntax ===
export { IDENTIFIER_RE, DIRECTIVE_KEYWORDS, isIdentifier, isDirectiveKeyword, itemsOfKind } from "./syntax/ast.js";
export type {
  DirectiveKeyword,
  HeadingNode,
  LabelNode,
  ReferenceNode,
  BindingNode,
  UseNode,
  IncludeNode,
  ModuleItem,
  ModuleItemKind,
  ModuleItemOf,
  SyntaxError,
  SyntaxErrorCode,
  ParsedModule,
} from "./syntax/ast.js";
export { parseModule } from "./syntax/parser.js";
export { scanDependencies } from "./syntax/scan.js";
export { findItemAt, hitSpan } from "./syntax/query.js";

// === Engine ===
export { compile, MissingEntryError } from "./engine/compile.js";
export { createWorld } from "./engine/world.js";
export type { CompileWorld, WorldSource, WorldOptions } from "./engine/world.js";
export type {
  CompiledArtifact,
  CompileResult,
  OutlineEntry,
  LabelDefinition,
  BindingDefinition,
  ResolvedReference,
  ResolvedUse,
  UseTarget,
  IncludeEdge,
} from "./engine/artifact.js";
export { quillEngine } from "./engine/engine.js";
export type { CompilerEngine } from "./engine/engine.js";
export { compileDocument, EntryNotFoundError } from "./engine/one-shot.js";
export type { SourceLoader, OneShotOptions } from "./engine/one-shot.js";

// === Formatting ===
export { formatQuill, DEFAULT_FORMAT_OPTIONS } from "./format/format.js";
export type { FormatOptions } from "./format/format.js";
export { computeTextEdit } from "./format/diff.js";
export type { TextReplacement } from "./format/diff.js";

// === Hashing ===
export { stableHash, stableSerialize, contentHash } from "./pipeline/hash.js";

// === Logging / Debug ===
export type { Logger } from "./shared/logger.js";
export { SILENT_LOGGER, formatError } from "./shared/logger.js";
export {
  debug,
  configureDebug,
  refreshDebugChannels,
  setDebugChannels,
  isDebugEnabled,
  DEBUG_CHANNELS,
} from "./shared/debug.js";
export type { DebugChannel, DebugChannelName, DebugConfig, DebugData } from "./shared/debug.js";

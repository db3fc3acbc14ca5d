// Workspace package public API
//
// Incremental analysis of open Quill documents: the document store, world
// snapshots, the shared analysis cache, query dispatch, the task scheduler
// and diagnostics publication, with `AnalysisEngine` tying them together.

// === Engine ===
export { AnalysisEngine } from "./engine.js";
export type { AnalysisEngineOptions, RequestOptions, EngineStats, FocusSource } from "./engine.js";

// === Configuration ===
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./config.js";
export type { EngineConfig, EngineConfigPatch, CompileConfig, FormatterMode } from "./config.js";

// === Errors & cancellation ===
export {
  WorkspaceError,
  UnknownDocumentError,
  StaleEditError,
  EditConflictError,
  CancelledError,
  SupersededError,
  ComputeFailureError,
  InvalidRenameError,
  isWorkspaceError,
  isAbandonment,
} from "./errors.js";
export type { WorkspaceErrorKind, CancelReason } from "./errors.js";
export {
  CancellationSource,
  LinkedCancellationSource,
  NEVER_CANCELLED,
  checkpoint,
  throwIfCancelled,
  yieldToEventLoop,
} from "./cancellation.js";
export type { CancellationToken } from "./cancellation.js";
export { DisposableStore, toDisposable } from "./disposables.js";
export type { DisposableLike } from "./disposables.js";
export { SimpleEmitter } from "./events.js";
export type { Listener } from "./events.js";

// === Documents & snapshots ===
export { DocumentStore, QUILL_LANGUAGE_ID } from "./document-store.js";
export type { ContentChange, InvalidationEvent, DocumentState, DocumentReader } from "./document-store.js";
export { SnapshotBuilder, defaultFileLoader } from "./snapshot.js";
export type {
  Snapshot,
  SnapshotScope,
  SnapshotDocument,
  SnapshotLease,
  DocumentOrigin,
  ReadOrigin,
  ReadSetEntry,
  FileLoader,
  FingerprintFn,
  FingerprintInput,
} from "./snapshot.js";

// === Cache ===
export { AnalysisCache, defineCacheKind, defaultEvictionScore } from "./cache.js";
export type { CacheKind, CacheStats, EvictionCandidate, EvictionScore, ComputeOptions } from "./cache.js";

// === Queries ===
export { QueryEngine, QUERY_SCOPES, scopeFor, targetOf, verifyAnswer } from "./queries.js";
export type { Query, QueryKind, QueryOf, QueryInputs, QueryOutputs, Answer } from "./queries.js";
export { validateEditList, verifyEditVersions } from "./features/edits.js";
export type {
  QueryContext,
  Location,
  HoverInfo,
  CompletionEntry,
  CompletionEntryKind,
  PrepareRenameResult,
  DocumentEdit,
  EditList,
  DocumentSymbolInfo,
  DocumentSymbolKind,
  WorkspaceSymbolInfo,
  FoldingRangeInfo,
  FoldingRangeKind,
  DiagnosticSet,
  DiagnosticSetEntry,
} from "./types.js";

// === Scheduling & publication ===
export { TaskScheduler } from "./scheduler.js";
export type {
  TaskSpec,
  TaskHandle,
  TaskState,
  TaskPriority,
  TaskContext,
  SchedulerLimits,
  SchedulerStats,
} from "./scheduler.js";
export { DiagnosticsPublisher } from "./diagnostics-publisher.js";
export type { DiagnosticsSink } from "./diagnostics-publisher.js";

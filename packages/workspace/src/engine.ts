import {
  canonicalDocumentUri,
  compileDocument,
  debug,
  quillEngine,
  SILENT_LOGGER,
  stableHash,
  type CompilerEngine,
  type CompileResult,
  type DocumentUri,
  type Logger,
} from "@quill-ls/compiler";
import { AnalysisCache, type CacheStats, type EvictionScore } from "./cache.js";
import type { CancellationToken } from "./cancellation.js";
import { resolveEngineConfig, type EngineConfig, type EngineConfigPatch } from "./config.js";
import { DiagnosticsPublisher, type DiagnosticsSink } from "./diagnostics-publisher.js";
import { DisposableStore, type DisposableLike } from "./disposables.js";
import { DocumentStore, type ContentChange } from "./document-store.js";
import { UnknownDocumentError } from "./errors.js";
import type { AnalysisEnv } from "./features/analysis.js";
import { QueryEngine, targetOf, verifyAnswer, type QueryKind, type QueryOf, type QueryOutputs } from "./queries.js";
import { TaskScheduler, type SchedulerStats } from "./scheduler.js";
import { defaultFileLoader, SnapshotBuilder, type FileLoader, type FingerprintFn } from "./snapshot.js";

export interface AnalysisEngineOptions {
  readonly engine?: CompilerEngine;
  /** Reads files that are not open. Defaults to the file system. */
  readonly loader?: FileLoader;
  readonly logger?: Logger;
  readonly config?: EngineConfigPatch;
  readonly sink?: DiagnosticsSink;
  readonly fingerprint?: FingerprintFn;
  readonly evictionScore?: EvictionScore;
}

export interface RequestOptions {
  readonly token?: CancellationToken;
}

/** What asked for a focus change: the user, opening a document, or using one. */
export type FocusSource = "command" | "open" | "activity";

export interface EngineStats {
  readonly engine: string;
  readonly documents: number;
  readonly leasedSnapshots: number;
  readonly main: DocumentUri | null;
  readonly focus: DocumentUri | null;
  readonly cache: CacheStats;
  readonly scheduler: SchedulerStats;
}

const NULL_SINK: DiagnosticsSink = { publish: () => {} };

/**
 * The analysis engine: one document store, the snapshot builder, the shared
 * cache, the scheduler and the diagnostics publisher, wired together.
 *
 * Store mutations reach the scheduler synchronously, before the mutating
 * call returns, so no running task can miss an edit to something it read.
 */
export class AnalysisEngine implements DisposableLike {
  readonly store: DocumentStore;
  readonly snapshots: SnapshotBuilder;
  readonly cache: AnalysisCache;
  readonly scheduler: TaskScheduler;
  readonly publisher: DiagnosticsPublisher;
  readonly queries: QueryEngine;

  readonly #engine: CompilerEngine;
  readonly #loader: FileLoader;
  readonly #logger: Logger;
  readonly #disposables = new DisposableStore();
  #config: EngineConfig;
  #focusedByCommand = false;
  #focusedByActivity = false;

  constructor(options: AnalysisEngineOptions = {}) {
    this.#engine = options.engine ?? quillEngine;
    this.#loader = options.loader ?? defaultFileLoader;
    this.#logger = options.logger ?? SILENT_LOGGER;
    this.#config = resolveEngineConfig(options.config);

    this.store = new DocumentStore(this.#logger);
    this.snapshots = new SnapshotBuilder({
      documents: this.store,
      engine: this.#engine,
      config: this.#config.compile,
      loader: this.#loader,
      ...(options.fingerprint ? { fingerprint: options.fingerprint } : {}),
    });
    this.cache = new AnalysisCache({
      maxWeight: this.#config.cache.maxWeight,
      ...(options.evictionScore ? { score: options.evictionScore } : {}),
    });
    this.scheduler = new TaskScheduler({
      documents: this.store,
      limits: () => this.#config,
      logger: this.#logger,
    });

    const env: AnalysisEnv = {
      cache: this.cache,
      engine: this.#engine,
      snapshots: this.snapshots,
      logger: this.#logger,
      config: () => this.#config,
    };
    this.queries = new QueryEngine(env);
    this.publisher = new DiagnosticsPublisher({
      scheduler: this.scheduler,
      documents: this.store,
      compute: async (root, ctx) => (await this.queries.run({ kind: "diagnostics", uri: root }, ctx)).value,
      sink: options.sink ?? NULL_SINK,
      debounceMs: () => this.#config.debounceMs,
      logger: this.#logger,
    });

    this.#disposables.add(
      this.store.onDidInvalidate((event) => {
        this.scheduler.invalidate(event);
        if (event.kind === "close") this.publisher.forget(event.uri);
        else this.publisher.trigger(event.uri);
      }),
    );
    this.#disposables.add(this.publisher);
    this.#disposables.add(this.scheduler);
  }

  get config(): EngineConfig {
    return this.#config;
  }

  get compilerEngine(): CompilerEngine {
    return this.#engine;
  }

  open(uri: string, text: string, version: number, languageId?: string): DocumentUri {
    return this.store.open(uri, text, version, languageId);
  }

  edit(uri: string, changes: readonly ContentChange[], version: number): DocumentUri {
    return this.store.edit(uri, changes, version);
  }

  close(uri: string): DocumentUri {
    return this.store.close(uri);
  }

  /**
   * Run one query as an interactive task. Rejects with `UnknownDocumentError`
   * for documents that are not open, `CancelledError` when the token fires or
   * the document closes, `SupersededError` when edits outpace restarts, and
   * `EditConflictError` when returned edits no longer apply.
   */
  async request<K extends QueryKind>(query: QueryOf<K>, options: RequestOptions = {}): Promise<QueryOutputs[K]> {
    const target = targetOf(query);
    if (target !== null && !this.store.has(target)) throw new UnknownDocumentError(target);

    const handle = this.scheduler.submit({
      label: query.kind,
      priority: "interactive",
      ...(target === null ? {} : { target }),
      ...(options.token ? { token: options.token } : {}),
      run: (ctx) => this.queries.run(query, ctx),
    });
    const answer = await handle.result;
    verifyAnswer(query.kind, answer.value, (target) => this.store.versionOf(target));
    return answer.value;
  }

  /** Compile once, bypassing the cache. Open documents are read from the store. */
  async compileDocument(uri: string): Promise<CompileResult> {
    const entry = canonicalDocumentUri(uri).uri;
    return compileDocument(
      entry,
      (target) => (this.store.has(target) ? this.store.snapshotOf(target).text : this.#loader(target)),
      {
        engine: this.#engine,
        inputs: this.#config.compile.inputs,
        fontRevision: this.#config.compile.fontRevision,
      },
    );
  }

  /**
   * Apply a configuration patch. A change to what compiles read re-triggers
   * diagnostics for every open document.
   */
  configure(patch: EngineConfigPatch): EngineConfig {
    const previous = this.#config;
    const next = resolveEngineConfig(patch, previous);
    this.#config = next;
    this.snapshots.configure(next.compile);
    this.cache.setMaxWeight(next.cache.maxWeight);

    const compileChanged = stableHash(previous.compile) !== stableHash(next.compile);
    debug.server("configure", { compileChanged });
    if (compileChanged) this.refreshDiagnostics();
    return next;
  }

  /**
   * Re-run diagnostics for every open document. Files read from disk are
   * re-read by the next snapshot, so this is all a change on disk needs.
   */
  refreshDiagnostics(): void {
    for (const uri of this.store.all()) this.publisher.trigger(uri);
  }

  /** Make `uri` the compile root of every document in its closure, or unpin with null. */
  pinMain(uri: string | null): DocumentUri | null {
    const main = uri === null ? null : canonicalDocumentUri(uri).uri;
    this.publisher.pinMain(main);
    return main;
  }

  /**
   * Focus `uri` as the main document for as long as nothing is pinned. Once
   * the user has focused by command, implicit focus stops; once hovering or
   * folding has focused a document, merely opening another no longer moves
   * it. Returns whether the focus changed.
   */
  focusMain(uri: string | null, source: FocusSource = "command"): boolean {
    if (source === "command") {
      this.#focusedByCommand = true;
    } else if (this.#focusedByCommand) {
      return false;
    } else if (source === "activity") {
      this.#focusedByActivity = true;
    } else if (this.#focusedByActivity) {
      return false;
    }

    const focus = uri === null ? null : canonicalDocumentUri(uri).uri;
    if (focus === this.publisher.focus) return false;
    debug.server("focus", { uri: focus, source });
    this.publisher.focusMain(focus);
    return true;
  }

  clearCache(): void {
    this.cache.clear();
  }

  stats(): EngineStats {
    return {
      engine: this.#engine.id,
      documents: this.store.size,
      leasedSnapshots: this.snapshots.leasedCount,
      main: this.publisher.main,
      focus: this.publisher.focus,
      cache: this.cache.stats(),
      scheduler: this.scheduler.stats(),
    };
  }

  /** Wait for every scheduled diagnostics run and every running task. */
  async settle(): Promise<void> {
    await this.publisher.flush();
    await this.scheduler.idle();
  }

  dispose(): void {
    this.#disposables.dispose();
  }
}

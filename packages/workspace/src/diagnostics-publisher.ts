import {
  debug,
  formatError,
  stableHash,
  type DocumentUri,
  type Logger,
  type QuillDiagnostic,
} from "@quill-ls/compiler";
import type { DisposableLike } from "./disposables.js";
import type { DocumentReader } from "./document-store.js";
import { isAbandonment, UnknownDocumentError } from "./errors.js";
import type { TaskContext, TaskScheduler } from "./scheduler.js";
import type { DiagnosticSet } from "./types.js";

/** Where published diagnostics go; the language server forwards them to the client. */
export interface DiagnosticsSink {
  /** `version` is the open document's version, or null for files read from disk. */
  publish(uri: DocumentUri, version: number | null, diagnostics: readonly QuillDiagnostic[]): void;
}

export interface DiagnosticsPublisherOptions {
  readonly scheduler: TaskScheduler;
  readonly documents: Pick<DocumentReader, "has" | "versionOf">;
  readonly compute: (root: DocumentUri, ctx: TaskContext) => Promise<DiagnosticSet>;
  readonly sink: DiagnosticsSink;
  readonly debounceMs: () => number;
  readonly logger: Logger;
}

interface PublishedState {
  readonly version: number;
  readonly hash: string;
  readonly root: DocumentUri;
}

/**
 * Turns edits into diagnostics pushes.
 *
 * Triggers are debounced per compile root and each burst becomes one
 * background task. Every document has exactly one owning root at a time, so
 * two roots sharing an included file never publish over each other. A push
 * is skipped when its version is older than the last one published for the
 * document, or when it carries the same diagnostics.
 */
export class DiagnosticsPublisher implements DisposableLike {
  readonly #options: DiagnosticsPublisherOptions;
  readonly #timers = new Map<DocumentUri, ReturnType<typeof setTimeout>>();
  readonly #inFlight = new Set<Promise<void>>();
  readonly #published = new Map<DocumentUri, PublishedState>();
  /** Documents in each root's last diagnostic set. */
  readonly #rootDocuments = new Map<DocumentUri, ReadonlySet<DocumentUri>>();
  /** Everything each root's last set was computed from, absent include targets too. */
  readonly #rootDependencies = new Map<DocumentUri, ReadonlySet<DocumentUri>>();
  #main: DocumentUri | null = null;
  #focus: DocumentUri | null = null;
  #disposed = false;

  constructor(options: DiagnosticsPublisherOptions) {
    this.#options = options;
  }

  get main(): DocumentUri | null {
    return this.#main;
  }

  /** The focused document; it owns its closure only while nothing is pinned. */
  get focus(): DocumentUri | null {
    return this.#focus;
  }

  pinMain(uri: DocumentUri | null): void {
    debug.publisher("pin-main", { uri });
    this.#moveMain(() => {
      this.#main = uri;
    });
  }

  focusMain(uri: DocumentUri | null): void {
    debug.publisher("focus", { uri });
    this.#moveMain(() => {
      this.#focus = uri;
    });
  }

  /** Schedule diagnostics for every root whose result may depend on `uri`. */
  trigger(uri: DocumentUri): void {
    if (this.#disposed) return;
    for (const root of this.rootsOf(uri)) this.#schedule(root);
  }

  /**
   * Roots to recompute when `uri` changes: its owner (the pinned or focused
   * main for documents in its closure, otherwise the document itself) plus any
   * other open root that depended on it last time, even if it was absent then.
   */
  rootsOf(uri: DocumentUri): DocumentUri[] {
    const roots = new Set<DocumentUri>();
    const owner = this.#ownerOf(uri);
    if (owner !== null && this.#options.documents.has(owner)) roots.add(owner);
    for (const [root, dependencies] of this.#rootDependencies) {
      if (dependencies.has(uri) && this.#options.documents.has(root)) roots.add(root);
    }
    return [...roots].sort();
  }

  /** Documents of `root`'s last published set. */
  documentsOf(root: DocumentUri): DocumentUri[] {
    return [...(this.#rootDocuments.get(root) ?? [])].sort();
  }

  /**
   * Drop all bookkeeping for a closed document and clear it. Documents it
   * owned are cleared too and handed back to whoever owns them now.
   */
  forget(uri: DocumentUri): void {
    this.#cancelTimer(uri);
    const dependents = [...this.#rootDependencies].filter(([root, deps]) => root !== uri && deps.has(uri)).map(([root]) => root);
    this.#rootDocuments.delete(uri);
    this.#rootDependencies.delete(uri);

    this.#published.delete(uri);
    this.#options.sink.publish(uri, null, []);
    for (const [doc, state] of [...this.#published]) {
      if (state.root !== uri) continue;
      this.#published.delete(doc);
      this.#options.sink.publish(doc, this.#options.documents.versionOf(doc) ?? null, []);
      if (this.#options.documents.has(doc)) this.trigger(doc);
    }
    debug.publisher("forget", { uri, dependents: dependents.length });
    for (const root of dependents) this.#schedule(root);
  }

  /** Fire pending debounces now and wait until everything scheduled has published. */
  async flush(): Promise<void> {
    for (;;) {
      for (const root of [...this.#timers.keys()]) this.#fire(root);
      if (this.#inFlight.size === 0) return;
      await Promise.all(this.#inFlight);
    }
  }

  dispose(): void {
    this.#disposed = true;
    for (const timer of this.#timers.values()) clearTimeout(timer);
    this.#timers.clear();
  }

  /** Re-trigger the closures of the old and the new main when `update` changes which one is in effect. */
  #moveMain(update: () => void): void {
    const previous = this.#main ?? this.#focus;
    update();
    const next = this.#main ?? this.#focus;
    if (previous === next) return;
    if (previous !== null) {
      for (const doc of this.#rootDocuments.get(previous) ?? []) this.trigger(doc);
    }
    if (next !== null) this.trigger(next);
  }

  #ownerOf(uri: DocumentUri): DocumentUri | null {
    const main = this.#main ?? this.#focus;
    if (main !== null && this.#options.documents.has(main) && (main === uri || this.#rootDependencies.get(main)?.has(uri))) {
      return main;
    }
    if (this.#options.documents.has(uri)) return uri;
    // Closed files belong to the first open root that includes them.
    const roots = [...this.#rootDocuments]
      .filter(([root, docs]) => docs.has(uri) && this.#options.documents.has(root))
      .map(([root]) => root)
      .sort();
    return roots[0] ?? null;
  }

  #schedule(root: DocumentUri): void {
    this.#cancelTimer(root);
    const delay = this.#options.debounceMs();
    this.#timers.set(root, setTimeout(() => this.#fire(root), delay));
    debug.publisher("schedule", { root, delay });
  }

  #cancelTimer(root: DocumentUri): void {
    const timer = this.#timers.get(root);
    if (timer === undefined) return;
    clearTimeout(timer);
    this.#timers.delete(root);
  }

  #fire(root: DocumentUri): void {
    this.#cancelTimer(root);
    if (this.#disposed || !this.#options.documents.has(root)) return;

    const handle = this.#options.scheduler.submit({
      label: `diagnostics ${root}`,
      priority: "background",
      target: root,
      run: (ctx) => this.#options.compute(root, ctx),
    });
    const done = handle.result
      .then(
        (set) => this.#publishSet(set),
        (error: unknown) => this.#reportFailure(root, error),
      )
      .catch((error: unknown) => this.#options.logger.error(`[diagnostics] publishing ${root} failed: ${formatError(error)}`));
    this.#inFlight.add(done);
    void done.finally(() => this.#inFlight.delete(done));
  }

  #publishSet(set: DiagnosticSet): void {
    if (this.#disposed) return;
    const root = set.root;
    const previous = this.#rootDocuments.get(root);
    this.#rootDocuments.set(root, new Set(set.entries.keys()));
    this.#rootDependencies.set(root, new Set(set.dependencies));

    for (const [uri, entry] of set.entries) {
      if (this.#ownerOf(uri) !== root) continue;
      this.#publish(uri, root, entry.version, entry.origin === "memory" ? entry.version : null, entry.diagnostics);
    }
    for (const uri of previous ?? []) {
      if (set.entries.has(uri) || this.#published.get(uri)?.root !== root) continue;
      this.#published.delete(uri);
      debug.publisher("clear", { root, uri });
      this.#options.sink.publish(uri, this.#options.documents.versionOf(uri) ?? null, []);
    }
  }

  #publish(
    uri: DocumentUri,
    root: DocumentUri,
    version: number,
    protocolVersion: number | null,
    diagnostics: readonly QuillDiagnostic[],
  ): void {
    const last = this.#published.get(uri);
    if (last && version < last.version) {
      debug.publisher("drop.older", { uri, version, published: last.version });
      return;
    }
    const hash = stableHash(diagnostics);
    this.#published.set(uri, { version, hash, root });
    if (last && last.hash === hash) {
      debug.publisher("skip.unchanged", { uri, version });
      return;
    }
    debug.publisher("publish", { uri, version, count: diagnostics.length });
    this.#options.sink.publish(uri, protocolVersion, diagnostics);
  }

  #reportFailure(root: DocumentUri, error: unknown): void {
    if (isAbandonment(error) || error instanceof UnknownDocumentError) {
      debug.publisher("abandoned", { root, reason: error.message });
      return;
    }
    this.#options.logger.error(`[diagnostics] ${root} failed: ${formatError(error)}`);
  }
}

import {
  createWorld,
  formatError,
  LineIndex,
  stableHash,
  type CompileResult,
  type CompilerEngine,
  type DocumentUri,
  type Logger,
  type ParsedModule,
  type TextPosition,
  type TextRange,
  type TextSpan,
  type WorldSource,
} from "@quill-ls/compiler";
import { defineCacheKind, type AnalysisCache, type CacheKind } from "../cache.js";
import { checkpoint, type CancellationToken } from "../cancellation.js";
import type { EngineConfig } from "../config.js";
import { ComputeFailureError } from "../errors.js";
import type { Snapshot, SnapshotBuilder, SnapshotDocument } from "../snapshot.js";
import type { QueryContext } from "../types.js";

export const PARSE = defineCacheKind<ParsedModule>("parse");
export const COMPILE = defineCacheKind<CompileResult>("compile");

export interface AnalysisEnv {
  readonly cache: AnalysisCache;
  readonly engine: CompilerEngine;
  readonly snapshots: SnapshotBuilder;
  readonly logger: Logger;
  readonly config: () => EngineConfig;
}

export type CompileOutcome =
  | { readonly ok: true; readonly result: CompileResult }
  | { readonly ok: false; readonly error: ComputeFailureError };

/** Context for work that runs inside a cache computation rather than a task. */
function computationContext(token: CancellationToken): QueryContext {
  return {
    token,
    declareReadSet: () => {},
    checkpoint: () => checkpoint(token),
  };
}

/**
 * Cached sub-computations over one leased snapshot: per-file parses keyed by
 * content, the closure compile keyed by the snapshot fingerprint, and
 * position-level answers keyed by both.
 */
export class SnapshotAnalysis {
  readonly #lineIndexes = new Map<DocumentUri, LineIndex>();

  constructor(
    readonly snapshot: Snapshot,
    readonly env: AnalysisEnv,
    readonly ctx: QueryContext,
  ) {}

  get entry(): SnapshotDocument {
    const uri = this.snapshot.entry;
    const doc = uri === null ? undefined : this.snapshot.documents.get(uri);
    if (!doc) throw new Error("snapshot has no entry document");
    return doc;
  }

  document(uri: DocumentUri): SnapshotDocument | undefined {
    return this.snapshot.documents.get(uri);
  }

  lineIndex(uri: DocumentUri): LineIndex {
    let index = this.#lineIndexes.get(uri);
    if (!index) {
      index = new LineIndex(this.snapshot.documents.get(uri)?.text ?? "");
      this.#lineIndexes.set(uri, index);
    }
    return index;
  }

  rangeOf(uri: DocumentUri, at: TextSpan): TextRange {
    return this.lineIndex(uri).spanToRange(at);
  }

  offsetAt(uri: DocumentUri, position: TextPosition): number {
    return this.lineIndex(uri).offsetAt(position);
  }

  async parse(uri: DocumentUri): Promise<ParsedModule | null> {
    const doc = this.snapshot.documents.get(uri);
    if (!doc) return null;
    const module = await parseDocument(this.env, doc, this.ctx.token);
    await this.ctx.checkpoint();
    return module;
  }

  /** Compile the snapshot's entry. Engine failures come back as a value. */
  async compile(): Promise<CompileOutcome> {
    const snapshot = this.snapshot;
    try {
      const result = await this.env.cache.getOrCompute(
        COMPILE,
        snapshot.fingerprint,
        (token) => compileSnapshot(this.env, snapshot, token),
        { token: this.ctx.token, weight: Math.max(1, snapshot.documents.size) },
      );
      await this.ctx.checkpoint();
      return { ok: true, result };
    } catch (e) {
      if (e instanceof ComputeFailureError) return { ok: false, error: e };
      throw e;
    }
  }

  /**
   * Memoize a derived answer under this snapshot's fingerprint plus `key`.
   * The computation gets its own analysis bound to the cache's token, so one
   * waiter giving up never fails the others.
   */
  async memo<T>(kind: CacheKind<T>, key: unknown, compute: (analysis: SnapshotAnalysis) => Promise<T>): Promise<T> {
    const fingerprint = stableHash({ fingerprint: this.snapshot.fingerprint, key });
    const value = await this.env.cache.getOrCompute(
      kind,
      fingerprint,
      (token) => compute(new SnapshotAnalysis(this.snapshot, this.env, computationContext(token))),
      { token: this.ctx.token },
    );
    await this.ctx.checkpoint();
    return value;
  }
}

export function parseDocument(env: AnalysisEnv, doc: SnapshotDocument, token: CancellationToken): Promise<ParsedModule> {
  return env.cache.getOrCompute(PARSE, env.snapshots.fingerprintDocument(doc), () => env.engine.parse(doc.uri, doc.text), {
    token,
  });
}

async function compileSnapshot(env: AnalysisEnv, snapshot: Snapshot, token: CancellationToken): Promise<CompileResult> {
  const entry = snapshot.entry;
  if (entry === null) throw new Error("workspace snapshots have no compile entry");

  const sources: WorldSource[] = [];
  for (const doc of snapshot.documents.values()) {
    const module = await parseDocument(env, doc, token);
    sources.push({ uri: doc.uri, text: doc.text, module });
    await checkpoint(token);
  }
  const world = createWorld(entry, sources, {
    inputs: snapshot.config.inputs,
    fontRevision: snapshot.config.fontRevision,
  });

  try {
    return env.engine.compile(world);
  } catch (e) {
    env.logger.error(`[compile] ${entry} failed: ${formatError(e)}`);
    throw new ComputeFailureError(entry, e);
  }
}

import { debug, type DocumentUri, type TextPosition } from "@quill-ls/compiler";
import type { SnapshotScope, ReadSetEntry } from "./snapshot.js";
import type {
  CompletionEntry,
  DiagnosticSet,
  DocumentSymbolInfo,
  EditList,
  FoldingRangeInfo,
  HoverInfo,
  Location,
  PrepareRenameResult,
  QueryContext,
  WorkspaceSymbolInfo,
} from "./types.js";
import { SnapshotAnalysis, type AnalysisEnv } from "./features/analysis.js";
import { completion } from "./features/completion.js";
import { definition } from "./features/definition.js";
import { diagnostics } from "./features/diagnostics.js";
import { verifyEditVersions } from "./features/edits.js";
import { foldingRanges } from "./features/folding.js";
import { formatting } from "./features/formatting.js";
import { hover } from "./features/hover.js";
import { references } from "./features/references.js";
import { prepareRename, rename } from "./features/rename.js";
import { documentSymbols } from "./features/symbols.js";
import { workspaceSymbols } from "./features/workspace-symbols.js";

// ============================================================================
// Query variants
// ============================================================================

interface PositionInput {
  readonly uri: DocumentUri;
  readonly position: TextPosition;
}

interface DocumentInput {
  readonly uri: DocumentUri;
}

export interface QueryInputs {
  hover: PositionInput;
  completion: PositionInput;
  definition: PositionInput;
  references: PositionInput & { readonly includeDeclaration: boolean };
  prepareRename: PositionInput;
  rename: PositionInput & { readonly newName: string };
  formatting: DocumentInput;
  documentSymbols: DocumentInput;
  foldingRanges: DocumentInput;
  workspaceSymbols: { readonly query: string };
  diagnostics: DocumentInput;
}

export interface QueryOutputs {
  hover: HoverInfo | null;
  completion: readonly CompletionEntry[];
  definition: readonly Location[];
  references: readonly Location[];
  prepareRename: PrepareRenameResult | null;
  rename: EditList | null;
  formatting: EditList;
  documentSymbols: readonly DocumentSymbolInfo[];
  foldingRanges: readonly FoldingRangeInfo[];
  workspaceSymbols: readonly WorkspaceSymbolInfo[];
  diagnostics: DiagnosticSet;
}

export type QueryKind = keyof QueryInputs;
export type QueryOf<K extends QueryKind> = { readonly kind: K } & QueryInputs[K];
export type Query = { [K in QueryKind]: QueryOf<K> }[QueryKind];

/** A query result plus the exact world it was computed from. */
export interface Answer<T> {
  readonly value: T;
  readonly fingerprint: string;
  readonly readSet: readonly ReadSetEntry[];
}

// ============================================================================
// Dispatch tables
// ============================================================================

type ScopeKind = SnapshotScope["kind"];

/** How much of the world each query needs to see. */
export const QUERY_SCOPES: { readonly [K in QueryKind]: ScopeKind } = {
  hover: "document",
  completion: "document",
  definition: "document",
  references: "workspace",
  prepareRename: "document",
  rename: "workspace",
  formatting: "file",
  documentSymbols: "file",
  foldingRanges: "file",
  workspaceSymbols: "workspace",
  diagnostics: "document",
};

type QueryHandler<K extends QueryKind> = (query: QueryOf<K>, analysis: SnapshotAnalysis) => Promise<QueryOutputs[K]>;

const HANDLERS: { readonly [K in QueryKind]: QueryHandler<K> } = {
  hover: (q, a) => hover(a, q.position),
  completion: (q, a) => completion(a, q.position),
  definition: (q, a) => definition(a, q.position),
  references: (q, a) => references(a, q.uri, q.position, q.includeDeclaration),
  prepareRename: (q, a) => prepareRename(a, q.position),
  rename: (q, a) => rename(a, q.uri, q.position, q.newName),
  formatting: (_q, a) => formatting(a),
  documentSymbols: (_q, a) => documentSymbols(a),
  foldingRanges: (_q, a) => foldingRanges(a),
  workspaceSymbols: (q, a) => workspaceSymbols(a, q.query),
  diagnostics: (_q, a) => diagnostics(a),
};

type AnswerCheck<K extends QueryKind> = (value: QueryOutputs[K], versionOf: (uri: DocumentUri) => number | undefined) => void;

const noCheck = (): void => {};

/** Checks run on a delivered answer against the live store. */
const ANSWER_CHECKS: { readonly [K in QueryKind]: AnswerCheck<K> } = {
  hover: noCheck,
  completion: noCheck,
  definition: noCheck,
  references: noCheck,
  prepareRename: noCheck,
  rename: (edits, versionOf) => {
    if (edits) verifyEditVersions(edits, versionOf);
  },
  formatting: (edits, versionOf) => verifyEditVersions(edits, versionOf),
  documentSymbols: noCheck,
  foldingRanges: noCheck,
  workspaceSymbols: noCheck,
  diagnostics: noCheck,
};

/** Edit lists must still apply to the documents as they are now. */
export function verifyAnswer<K extends QueryKind>(
  kind: K,
  value: QueryOutputs[K],
  versionOf: (uri: DocumentUri) => number | undefined,
): void {
  const check: AnswerCheck<K> = ANSWER_CHECKS[kind];
  check(value, versionOf);
}

/** The document a query is about; null for queries over the whole workspace. */
export function targetOf(query: { readonly kind: QueryKind; readonly uri?: DocumentUri }): DocumentUri | null {
  return query.uri ?? null;
}

export function scopeFor<K extends QueryKind>(query: QueryOf<K>): SnapshotScope {
  const kind: ScopeKind = QUERY_SCOPES[query.kind];
  if (kind === "workspace") return { kind };
  const entry = targetOf(query);
  if (entry === null) throw new Error(`${query.kind} queries need a document`);
  return { kind, entry };
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Answers queries against leased snapshots. Stateless apart from the shared
 * cache; a query run is a task body and reports its read set through `ctx`
 * as soon as the snapshot is known.
 */
export class QueryEngine {
  constructor(private readonly env: AnalysisEnv) {}

  async run<K extends QueryKind>(query: QueryOf<K>, ctx: QueryContext): Promise<Answer<QueryOutputs[K]>> {
    const scope = scopeFor(query);
    const lease = await this.env.snapshots.lease(scope);
    try {
      const snapshot = lease.snapshot;
      ctx.declareReadSet(snapshot.readSet, scope.kind === "workspace" ? "workspace" : "document");
      await ctx.checkpoint();
      debug.query("run", { kind: query.kind, uri: targetOf(query), fingerprint: snapshot.fingerprint.slice(0, 12) });

      const analysis = new SnapshotAnalysis(snapshot, this.env, ctx);
      const value = await dispatch(query, analysis);
      return { value, fingerprint: snapshot.fingerprint, readSet: snapshot.readSet };
    } finally {
      lease.release();
    }
  }
}

function dispatch<K extends QueryKind>(query: QueryOf<K>, analysis: SnapshotAnalysis): Promise<QueryOutputs[K]> {
  const handler: QueryHandler<K> = HANDLERS[query.kind];
  return handler(query, analysis);
}

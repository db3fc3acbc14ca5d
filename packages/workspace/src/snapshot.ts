import { readFile } from "node:fs/promises";
import {
  canonicalDocumentUri,
  contentHash,
  debug,
  stableHash,
  type CompilerEngine,
  type DocumentUri,
} from "@quill-ls/compiler";
import type { CompileConfig } from "./config.js";
import type { DocumentReader } from "./document-store.js";
import { UnknownDocumentError } from "./errors.js";

export type SnapshotScope =
  /** Entry plus its transitive include closure. */
  | { readonly kind: "document"; readonly entry: DocumentUri }
  /** The entry alone, for answers that never look past one file. */
  | { readonly kind: "file"; readonly entry: DocumentUri }
  /** Every open document plus their closures. */
  | { readonly kind: "workspace" };

export type DocumentOrigin = "memory" | "disk";

/** `absent`: an include target that was neither open nor on disk. */
export type ReadOrigin = DocumentOrigin | "absent";

export interface SnapshotDocument {
  readonly uri: DocumentUri;
  readonly text: string;
  /** Store version for open documents; 0 for files read from disk. */
  readonly version: number;
  readonly contentHash: string;
  readonly origin: DocumentOrigin;
}

export interface ReadSetEntry {
  readonly uri: DocumentUri;
  readonly version: number;
  readonly origin: ReadOrigin;
}

export interface Snapshot {
  readonly scope: SnapshotScope;
  readonly entry: DocumentUri | null;
  readonly documents: ReadonlyMap<DocumentUri, SnapshotDocument>;
  /** Include targets that could not be read. Opening one changes the snapshot. */
  readonly missing: readonly DocumentUri[];
  readonly config: CompileConfig;
  readonly fingerprint: string;
  readonly readSet: readonly ReadSetEntry[];
}

export interface FingerprintInput {
  readonly scope: string;
  readonly documents: readonly (readonly [uri: string, version: number, contentHash: string, origin: DocumentOrigin])[];
  readonly config: CompileConfig;
}

export type FingerprintFn = (input: FingerprintInput) => string;

/** Text of a file that is not open, or null when it does not exist. */
export type FileLoader = (uri: DocumentUri) => Promise<string | null>;

export interface SnapshotLease {
  readonly snapshot: Snapshot;
  release(): void;
}

export interface SnapshotBuilderOptions {
  readonly documents: DocumentReader;
  readonly engine: Pick<CompilerEngine, "scanDependencies">;
  readonly config: CompileConfig;
  readonly loader?: FileLoader;
  readonly fingerprint?: FingerprintFn;
}

export const defaultFileLoader: FileLoader = async (uri) => {
  const path = canonicalDocumentUri(uri).path;
  if (path === null) return null;
  try {
    return await readFile(path, "utf8");
  } catch (e) {
    if (isMissingFile(e)) return null;
    throw e;
  }
};

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "EISDIR" || e.code === "ENOTDIR");
}

interface Interned {
  readonly snapshot: Snapshot;
  leases: number;
}

/**
 * Assembles immutable world views. Building only reads text and scans for
 * includes; compilation happens later, on demand, through the cache.
 */
export class SnapshotBuilder {
  readonly #documents: DocumentReader;
  readonly #engine: Pick<CompilerEngine, "scanDependencies">;
  readonly #loader: FileLoader;
  readonly #fingerprint: FingerprintFn;
  readonly #interned = new Map<string, Interned>();
  #config: CompileConfig;

  constructor(options: SnapshotBuilderOptions) {
    this.#documents = options.documents;
    this.#engine = options.engine;
    this.#config = options.config;
    this.#loader = options.loader ?? defaultFileLoader;
    this.#fingerprint = options.fingerprint ?? stableHash;
  }

  configure(config: CompileConfig): void {
    this.#config = config;
  }

  get config(): CompileConfig {
    return this.#config;
  }

  async build(scope: SnapshotScope): Promise<Snapshot> {
    const documents = new Map<DocumentUri, SnapshotDocument>();
    const config = this.#config;

    let missing: DocumentUri[];
    if (scope.kind === "workspace") {
      missing = await this.#collect(this.#documents.all(), documents, true);
    } else {
      if (!this.#documents.has(scope.entry)) throw new UnknownDocumentError(scope.entry);
      missing = await this.#collect([scope.entry], documents, scope.kind === "document");
    }
    missing.sort();

    const ordered = [...documents.values()].sort((a, b) => (a.uri < b.uri ? -1 : a.uri > b.uri ? 1 : 0));
    const entry = scope.kind === "workspace" ? null : scope.entry;
    const fingerprint = this.#fingerprint({
      scope: scope.kind === "workspace" ? "workspace" : `${scope.kind}:${scope.entry}`,
      documents: ordered.map((doc) => [doc.uri, doc.version, doc.contentHash, doc.origin] as const),
      config,
    });
    const readSet: ReadSetEntry[] = ordered.map((doc) => Object.freeze({ uri: doc.uri, version: doc.version, origin: doc.origin }));
    for (const uri of missing) readSet.push(Object.freeze({ uri, version: 0, origin: "absent" }));
    const snapshot: Snapshot = Object.freeze({
      scope,
      entry,
      documents,
      missing: Object.freeze(missing),
      config,
      fingerprint,
      readSet: Object.freeze(readSet),
    });
    debug.snapshot("build", {
      scope: scope.kind,
      entry,
      documents: ordered.length,
      missing: missing.length,
      fingerprint: fingerprint.slice(0, 12),
    });
    return snapshot;
  }

  /**
   * Build and intern: while a snapshot with the same fingerprint is leased,
   * every lease shares that one instance.
   */
  async lease(scope: SnapshotScope): Promise<SnapshotLease> {
    const built = await this.build(scope);
    let interned = this.#interned.get(built.fingerprint);
    if (interned) {
      debug.snapshot("lease.shared", { fingerprint: built.fingerprint.slice(0, 12), leases: interned.leases + 1 });
    } else {
      interned = { snapshot: built, leases: 0 };
      this.#interned.set(built.fingerprint, interned);
    }
    interned.leases += 1;
    const held = interned;
    let released = false;
    return {
      snapshot: held.snapshot,
      release: () => {
        if (released) return;
        released = true;
        held.leases -= 1;
        if (held.leases === 0 && this.#interned.get(held.snapshot.fingerprint) === held) {
          this.#interned.delete(held.snapshot.fingerprint);
        }
      },
    };
  }

  /** Fingerprint of one document's content, for per-file cache entries. */
  fingerprintDocument(doc: Pick<SnapshotDocument, "uri" | "contentHash">): string {
    return stableHash({ uri: doc.uri, contentHash: doc.contentHash });
  }

  get leasedCount(): number {
    return this.#interned.size;
  }

  /** Reads `roots` and, when asked, their include closure. Returns the targets that could not be read. */
  async #collect(
    roots: readonly DocumentUri[],
    into: Map<DocumentUri, SnapshotDocument>,
    followIncludes: boolean,
  ): Promise<DocumentUri[]> {
    const missing = new Set<DocumentUri>();
    const queue = [...roots];
    while (queue.length > 0) {
      const uri = queue.shift();
      if (uri === undefined || into.has(uri) || missing.has(uri)) continue;
      const doc = await this.#read(uri);
      if (!doc) {
        missing.add(uri);
        continue;
      }
      into.set(uri, Object.freeze(doc));
      if (followIncludes) queue.push(...this.#engine.scanDependencies(doc.text, uri));
    }
    return [...missing];
  }

  async #read(uri: DocumentUri): Promise<SnapshotDocument | null> {
    if (this.#documents.has(uri)) {
      const { text, version } = this.#documents.snapshotOf(uri);
      return { uri, text, version, contentHash: contentHash(text), origin: "memory" };
    }
    const text = await this.#loader(uri);
    if (text === null) return null;
    // The file may have been opened while it was loading; the open copy wins.
    if (this.#documents.has(uri)) return this.#read(uri);
    return { uri, text, version: 0, contentHash: contentHash(text), origin: "disk" };
  }
}

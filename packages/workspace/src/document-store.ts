import { TextDocument, type TextDocumentContentChangeEvent } from "vscode-languageserver-textdocument";
import { canonicalDocumentUri, debug, type DocumentUri, type Logger } from "@quill-ls/compiler";
import type { DisposableLike } from "./disposables.js";
import { StaleEditError, UnknownDocumentError } from "./errors.js";
import { SimpleEmitter, type Listener } from "./events.js";

export type ContentChange = TextDocumentContentChangeEvent;

export interface InvalidationEvent {
  readonly kind: "open" | "edit" | "close";
  readonly uri: DocumentUri;
  /** Version after the mutation; null once closed. */
  readonly version: number | null;
}

export interface DocumentState {
  readonly text: string;
  readonly version: number;
}

/** Read side of the store, which is all snapshot building needs. */
export interface DocumentReader {
  has(uri: DocumentUri): boolean;
  snapshotOf(uri: DocumentUri): DocumentState;
  versionOf(uri: DocumentUri): number | undefined;
  all(): DocumentUri[];
}

export const QUILL_LANGUAGE_ID = "quill";

/**
 * Authoritative text and versions of open documents. Every successful
 * mutation emits an invalidation event synchronously, before the call returns.
 */
export class DocumentStore implements DocumentReader {
  readonly #documents = new Map<DocumentUri, TextDocument>();
  readonly #logger: Logger;
  readonly #emitter: SimpleEmitter<InvalidationEvent>;

  constructor(logger: Logger) {
    this.#logger = logger;
    this.#emitter = new SimpleEmitter("document-store", logger);
  }

  open(uri: string, text: string, version: number, languageId: string = QUILL_LANGUAGE_ID): DocumentUri {
    const key = canonicalDocumentUri(uri).uri;
    const existing = this.#documents.get(key);
    if (existing) {
      if (version < existing.version) {
        this.#rejectStale(key, version, existing.version);
      }
      this.#logger.warn(`[store] ${key} opened twice; replacing version ${existing.version} with ${version}`);
    }
    this.#documents.set(key, TextDocument.create(key, languageId, version, text));
    debug.store("open", { uri: key, version, length: text.length });
    this.#emitter.emit({ kind: "open", uri: key, version });
    return key;
  }

  /**
   * Apply content changes (ranged or full) in order. Versions must strictly
   * increase; a late edit is logged and rejected without touching the text.
   */
  edit(uri: string, changes: readonly ContentChange[], version: number): DocumentUri {
    const key = canonicalDocumentUri(uri).uri;
    const current = this.#require(key);
    if (version <= current.version) {
      this.#rejectStale(key, version, current.version);
    }
    this.#documents.set(key, TextDocument.update(current, [...changes], version));
    debug.store("edit", { uri: key, version, changes: changes.length });
    this.#emitter.emit({ kind: "edit", uri: key, version });
    return key;
  }

  close(uri: string): DocumentUri {
    const key = canonicalDocumentUri(uri).uri;
    this.#require(key);
    this.#documents.delete(key);
    debug.store("close", { uri: key });
    this.#emitter.emit({ kind: "close", uri: key, version: null });
    return key;
  }

  snapshotOf(uri: DocumentUri): DocumentState {
    const doc = this.#require(uri);
    return { text: doc.getText(), version: doc.version };
  }

  versionOf(uri: DocumentUri): number | undefined {
    return this.#documents.get(uri)?.version;
  }

  languageIdOf(uri: DocumentUri): string | undefined {
    return this.#documents.get(uri)?.languageId;
  }

  has(uri: DocumentUri): boolean {
    return this.#documents.has(uri);
  }

  all(): DocumentUri[] {
    return [...this.#documents.keys()].sort();
  }

  get size(): number {
    return this.#documents.size;
  }

  onDidInvalidate(listener: Listener<InvalidationEvent>): DisposableLike {
    return this.#emitter.on(listener);
  }

  #require(uri: DocumentUri): TextDocument {
    const doc = this.#documents.get(uri);
    if (!doc) throw new UnknownDocumentError(uri);
    return doc;
  }

  #rejectStale(uri: DocumentUri, version: number, current: number): never {
    this.#logger.warn(`[store] dropped stale edit for ${uri}: version ${version} <= ${current}`);
    throw new StaleEditError(uri, version, current);
  }
}

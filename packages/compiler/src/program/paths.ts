import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { asDocumentUri, type DocumentUri } from "../model/primitives.js";

const SCHEME_RE = /^[a-zA-Z][a-zA-Z0-9+.-]+:/;
const DRIVE_RE = /^[a-zA-Z]:[\\/]/;

function toFsPath(input: string): string {
  if (input.startsWith("file:")) {
    try {
      return fileURLToPath(input);
    } catch {
      // Malformed file URI: keep the raw string so the caller still gets a stable identity.
      return input;
    }
  }
  return input;
}

/** Forward slashes, collapsed segments, lower-case drive letter. */
export function normalizePathForId(input: string): string {
  let p = input.replace(/\\/g, "/");
  if (DRIVE_RE.test(p)) p = p.charAt(0).toLowerCase() + p.slice(1);
  return path.posix.normalize(p);
}

function isPathLike(input: string): boolean {
  return input.startsWith("/") || DRIVE_RE.test(input) || !SCHEME_RE.test(input);
}

/** Normalize/brand a document identifier so hosts can't drift on URI shapes. */
export function normalizeDocumentUri(input: string): DocumentUri {
  const fsPath = toFsPath(input);
  if (!isPathLike(fsPath)) return asDocumentUri(fsPath);
  return asDocumentUri(normalizePathForId(fsPath));
}

export interface CanonicalDocumentUri {
  readonly uri: DocumentUri;
  /** Filesystem path when the document lives on disk, otherwise null (e.g. `untitled:` buffers). */
  readonly path: string | null;
}

export function canonicalDocumentUri(input: string): CanonicalDocumentUri {
  const uri = normalizeDocumentUri(input);
  return { uri, path: isPathLike(uri) ? uri : null };
}

/** Resolve an include specifier relative to the including document. */
export function resolveIncludeTarget(from: DocumentUri, specifier: string): DocumentUri {
  const spec = specifier.replace(/\\/g, "/");
  if (spec.startsWith("/") || DRIVE_RE.test(spec)) return normalizeDocumentUri(spec);
  const base = canonicalDocumentUri(from);
  if (base.path === null) {
    // Non-file documents resolve against their own scheme-relative path.
    const slash = from.lastIndexOf("/");
    const dir = slash >= 0 ? from.slice(0, slash) : from.slice(0, from.indexOf(":") + 1);
    return asDocumentUri(`${dir}${dir.endsWith(":") ? "" : "/"}${spec}`);
  }
  return asDocumentUri(normalizePathForId(path.posix.join(path.posix.dirname(base.path), spec)));
}

/** Convert a canonical document URI back to a protocol URI. */
export function toProtocolUri(uri: DocumentUri): string {
  if (!isPathLike(uri)) return uri;
  return pathToFileURL(uri).toString();
}

/** Path relative to another document's directory, used for display. */
export function relativeDocumentPath(from: DocumentUri, to: DocumentUri): string {
  const fromPath = canonicalDocumentUri(from).path;
  const toPath = canonicalDocumentUri(to).path;
  if (fromPath === null || toPath === null) return to;
  return path.posix.relative(path.posix.dirname(fromPath), toPath) || path.posix.basename(toPath);
}

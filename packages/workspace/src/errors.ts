import type { DocumentUri } from "@quill-ls/compiler";

export type WorkspaceErrorKind =
  | "unknown-document"
  | "stale-edit"
  | "edit-conflict"
  | "cancelled"
  | "superseded"
  | "compute-failure"
  | "invalid-rename";

/** Why a cancellation token fired. */
export type CancelReason = "client" | "closed" | "disposed" | "superseded" | "abandoned";

/**
 * Base of every failure the analysis engine reports on purpose. Anything
 * else reaching a caller is a bug and is logged as such by the transport.
 */
export abstract class WorkspaceError extends Error {
  abstract readonly kind: WorkspaceErrorKind;
}

export class UnknownDocumentError extends WorkspaceError {
  readonly kind = "unknown-document";

  constructor(readonly uri: DocumentUri) {
    super(`document is not open: ${uri}`);
    this.name = "UnknownDocumentError";
  }
}

export class StaleEditError extends WorkspaceError {
  readonly kind = "stale-edit";

  constructor(
    readonly uri: DocumentUri,
    readonly version: number,
    readonly currentVersion: number,
  ) {
    super(`stale edit for ${uri}: version ${version} is not newer than ${currentVersion}`);
    this.name = "StaleEditError";
  }
}

export class EditConflictError extends WorkspaceError {
  readonly kind = "edit-conflict";

  constructor(
    readonly uri: DocumentUri,
    readonly detail: string,
  ) {
    super(`edits for ${uri} no longer apply: ${detail}`);
    this.name = "EditConflictError";
  }
}

export class CancelledError extends WorkspaceError {
  readonly kind = "cancelled";

  constructor(readonly reason: CancelReason = "client") {
    super(`request cancelled (${reason})`);
    this.name = "CancelledError";
  }
}

export class SupersededError extends WorkspaceError {
  readonly kind = "superseded";

  constructor(
    readonly uri: DocumentUri,
    readonly attempts: number,
  ) {
    super(`result invalidated by a newer version of ${uri} after ${attempts} attempt(s)`);
    this.name = "SupersededError";
  }
}

export class ComputeFailureError extends WorkspaceError {
  readonly kind = "compute-failure";

  constructor(
    readonly entry: DocumentUri,
    cause: unknown,
  ) {
    super(`compile of ${entry} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "ComputeFailureError";
  }
}

export class InvalidRenameError extends WorkspaceError {
  readonly kind = "invalid-rename";

  constructor(readonly newName: string) {
    super(`\`${newName}\` is not a valid name`);
    this.name = "InvalidRenameError";
  }
}

export function isWorkspaceError(error: unknown): error is WorkspaceError {
  return error instanceof WorkspaceError;
}

/** Cancellation and supersession end a request without being failures. */
export function isAbandonment(error: unknown): error is CancelledError | SupersededError {
  return error instanceof CancelledError || error instanceof SupersededError;
}

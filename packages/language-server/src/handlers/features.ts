/**
 * LSP feature handlers: completions, hover, definition, references, rename,
 * formatting, document and workspace symbols, folding ranges
 *
 * Every request runs through the engine's scheduler with the client's
 * cancellation token bridged in. Failures the engine reports on purpose map
 * to their LSP error codes; anything else is logged and answered with an
 * internal error so the connection stays up.
 */
import {
  ErrorCodes,
  LSPErrorCodes,
  ResponseError,
  type CancellationToken as LspCancellationToken,
  type CompletionItem,
  type CompletionParams,
  type Connection,
  type DocumentFormattingParams,
  type DocumentSymbol,
  type DocumentSymbolParams,
  type FoldingRange,
  type FoldingRangeParams,
  type Hover,
  type HoverParams,
  type DefinitionParams,
  type Location,
  type PrepareRenameParams,
  type Range,
  type ReferenceParams,
  type RenameParams,
  type SymbolInformation,
  type TextEdit,
  type WorkspaceEdit,
  type WorkspaceSymbolParams,
} from "vscode-languageserver/node.js";
import { formatError } from "@quill-ls/compiler";
import {
  CancellationSource,
  CancelledError,
  EditConflictError,
  InvalidRenameError,
  SupersededError,
  UnknownDocumentError,
  type QueryKind,
  type QueryOf,
  type QueryOutputs,
} from "@quill-ls/workspace";
import type { ServerContext } from "../context.js";
import {
  fromLspUri,
  mapCompletions,
  mapDocumentSymbols,
  mapFoldingRanges,
  mapHover,
  mapLocations,
  mapPrepareRename,
  mapTextEdits,
  mapWorkspaceEdit,
  mapWorkspaceSymbols,
} from "../mapping/lsp-types.js";

/**
 * Map an engine failure to the error the client sees. Cancellation and
 * staleness are expected and not logged.
 */
export function toResponseError(ctx: ServerContext, feature: string, uri: string, e: unknown): ResponseError<void> {
  if (e instanceof ResponseError) return e;
  if (e instanceof CancelledError) {
    return new ResponseError<void>(LSPErrorCodes.RequestCancelled, e.message);
  }
  if (e instanceof SupersededError || e instanceof EditConflictError) {
    return new ResponseError<void>(LSPErrorCodes.ContentModified, e.message);
  }
  if (e instanceof UnknownDocumentError) {
    ctx.logger.warn(`[${feature}] ${e.message}`);
    return new ResponseError<void>(ErrorCodes.InvalidParams, e.message);
  }
  if (e instanceof InvalidRenameError) {
    return new ResponseError<void>(ErrorCodes.InvalidParams, e.message);
  }
  ctx.logger.error(`[${feature}] failed for ${uri}: ${formatError(e)}`);
  return new ResponseError<void>(ErrorCodes.InternalError, e instanceof Error ? e.message : String(e));
}

/** Run one query with the client's token linked to a fresh engine token. */
export async function runQuery<K extends QueryKind>(
  ctx: ServerContext,
  query: QueryOf<K>,
  token: LspCancellationToken | undefined,
): Promise<QueryOutputs[K]> {
  const source = new CancellationSource();
  const subscription = token?.onCancellationRequested(() => source.cancel("client"));
  if (token?.isCancellationRequested) source.cancel("client");
  try {
    return await ctx.engine.request(query, { token: source.token });
  } finally {
    subscription?.dispose();
  }
}

async function serve<T>(ctx: ServerContext, feature: string, uri: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (e) {
    throw toResponseError(ctx, feature, uri, e);
  }
}

export function handleCompletion(
  ctx: ServerContext,
  params: CompletionParams,
  token?: LspCancellationToken,
): Promise<CompletionItem[]> {
  const uri = params.textDocument.uri;
  return serve(ctx, "completion", uri, async () =>
    mapCompletions(await runQuery(ctx, { kind: "completion", uri: fromLspUri(uri), position: params.position }, token)),
  );
}

export function handleHover(ctx: ServerContext, params: HoverParams, token?: LspCancellationToken): Promise<Hover | null> {
  const uri = params.textDocument.uri;
  ctx.engine.focusMain(uri, "activity");
  return serve(ctx, "hover", uri, async () =>
    mapHover(await runQuery(ctx, { kind: "hover", uri: fromLspUri(uri), position: params.position }, token)),
  );
}

export function handleDefinition(
  ctx: ServerContext,
  params: DefinitionParams,
  token?: LspCancellationToken,
): Promise<Location[]> {
  const uri = params.textDocument.uri;
  return serve(ctx, "definition", uri, async () =>
    mapLocations(await runQuery(ctx, { kind: "definition", uri: fromLspUri(uri), position: params.position }, token)),
  );
}

export function handleReferences(
  ctx: ServerContext,
  params: ReferenceParams,
  token?: LspCancellationToken,
): Promise<Location[]> {
  const uri = params.textDocument.uri;
  return serve(ctx, "references", uri, async () =>
    mapLocations(
      await runQuery(
        ctx,
        {
          kind: "references",
          uri: fromLspUri(uri),
          position: params.position,
          includeDeclaration: params.context.includeDeclaration,
        },
        token,
      ),
    ),
  );
}

export function handlePrepareRename(
  ctx: ServerContext,
  params: PrepareRenameParams,
  token?: LspCancellationToken,
): Promise<{ range: Range; placeholder: string } | null> {
  const uri = params.textDocument.uri;
  return serve(ctx, "prepareRename", uri, async () =>
    mapPrepareRename(await runQuery(ctx, { kind: "prepareRename", uri: fromLspUri(uri), position: params.position }, token)),
  );
}

export function handleRename(
  ctx: ServerContext,
  params: RenameParams,
  token?: LspCancellationToken,
): Promise<WorkspaceEdit | null> {
  const uri = params.textDocument.uri;
  return serve(ctx, "rename", uri, async () =>
    mapWorkspaceEdit(
      await runQuery(
        ctx,
        { kind: "rename", uri: fromLspUri(uri), position: params.position, newName: params.newName },
        token,
      ),
    ),
  );
}

/**
 * Whole-document formatting. The engine has already checked the edits against
 * the current version, so plain `TextEdit`s are enough here.
 */
export function handleFormatting(
  ctx: ServerContext,
  params: DocumentFormattingParams,
  token?: LspCancellationToken,
): Promise<TextEdit[]> {
  const uri = params.textDocument.uri;
  return serve(ctx, "formatting", uri, async () =>
    mapTextEdits(await runQuery(ctx, { kind: "formatting", uri: fromLspUri(uri) }, token)),
  );
}

export function handleDocumentSymbols(
  ctx: ServerContext,
  params: DocumentSymbolParams,
  token?: LspCancellationToken,
): Promise<DocumentSymbol[]> {
  const uri = params.textDocument.uri;
  return serve(ctx, "documentSymbol", uri, async () =>
    mapDocumentSymbols(await runQuery(ctx, { kind: "documentSymbols", uri: fromLspUri(uri) }, token)),
  );
}

/** An empty query lists every symbol. */
export function handleWorkspaceSymbols(
  ctx: ServerContext,
  params: WorkspaceSymbolParams,
  token?: LspCancellationToken,
): Promise<SymbolInformation[]> {
  return serve(ctx, "workspaceSymbol", "<workspace>", async () =>
    mapWorkspaceSymbols(await runQuery(ctx, { kind: "workspaceSymbols", query: params.query }, token)),
  );
}

export function handleFoldingRanges(
  ctx: ServerContext,
  params: FoldingRangeParams,
  token?: LspCancellationToken,
): Promise<FoldingRange[]> {
  const uri = params.textDocument.uri;
  ctx.engine.focusMain(uri, "activity");
  return serve(ctx, "foldingRange", uri, async () =>
    mapFoldingRanges(await runQuery(ctx, { kind: "foldingRanges", uri: fromLspUri(uri) }, token)),
  );
}

/**
 * Registers all LSP feature handlers on the connection.
 */
export function registerFeatureHandlers(connection: Connection, ctx: ServerContext): void {
  connection.onCompletion((params, token) => handleCompletion(ctx, params, token));
  connection.onHover((params, token) => handleHover(ctx, params, token));
  connection.onDefinition((params, token) => handleDefinition(ctx, params, token));
  connection.onReferences((params, token) => handleReferences(ctx, params, token));
  connection.onPrepareRename((params, token) => handlePrepareRename(ctx, params, token));
  connection.onRenameRequest((params, token) => handleRename(ctx, params, token));
  connection.onDocumentFormatting((params, token) => handleFormatting(ctx, params, token));
  connection.onDocumentSymbol((params, token) => handleDocumentSymbols(ctx, params, token));
  connection.onWorkspaceSymbol((params, token) => handleWorkspaceSymbols(ctx, params, token));
  connection.onFoldingRanges((params, token) => handleFoldingRanges(ctx, params, token));
}

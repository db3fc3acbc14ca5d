/**
 * LSP lifecycle handlers: initialize, document events, configuration changes
 */
import {
  DidChangeConfigurationNotification,
  type Connection,
  type DidChangeConfigurationParams,
  type DidChangeTextDocumentParams,
  type DidChangeWatchedFilesParams,
  type DidCloseTextDocumentParams,
  type DidOpenTextDocumentParams,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import { URI } from "vscode-uri";
import { formatError, setDebugChannels } from "@quill-ls/compiler";
import { resolveEngineConfig, StaleEditError, UnknownDocumentError } from "@quill-ls/workspace";
import type { ServerContext } from "../context.js";
import { buildServerCapabilities, SERVER_INFO } from "../capabilities.js";
import { normalizeSettings, settingsSectionOf, type ServerSettings } from "../config.js";
import { fromLspUri } from "../mapping/lsp-types.js";

/**
 * Replace the active settings. Fields left out of `settings` go back to their
 * defaults rather than keeping an earlier value.
 */
export function applySettings(ctx: ServerContext, settings: ServerSettings): void {
  ctx.settings = settings;
  setDebugChannels(settings.debugChannels);
  const config = ctx.engine.configure(resolveEngineConfig(settings.engine));
  ctx.logger.info(
    `[config] debounce=${config.debounceMs}ms workers=${config.maxWorkers} restarts=${config.maxRestarts} ` +
      `cache=${config.cache.maxWeight} formatter=${config.formatter.mode}`,
  );
}

/** Pull the `quill` section from the client and apply it. */
export async function refreshSettings(ctx: ServerContext): Promise<void> {
  if (!ctx.pullsConfiguration) return;
  try {
    applySettings(ctx, normalizeSettings(await ctx.client.fetchSettings()));
  } catch (e) {
    ctx.logger.warn(`[config] could not read settings: ${formatError(e)}`);
  }
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  ctx.workspaceRoot = params.rootUri ? URI.parse(params.rootUri).fsPath : null;
  ctx.pullsConfiguration = params.capabilities.workspace?.configuration === true;
  ctx.logger.info(`initialize: root=${ctx.workspaceRoot ?? "<cwd>"} engine=${ctx.engine.compilerEngine.id}`);
  if (params.initializationOptions !== undefined) {
    applySettings(ctx, normalizeSettings(params.initializationOptions));
  }
  return {
    capabilities: buildServerCapabilities(),
    serverInfo: { ...SERVER_INFO },
  };
}

export function handleDidOpen(ctx: ServerContext, params: DidOpenTextDocumentParams): void {
  const { uri, languageId, version, text } = params.textDocument;
  ctx.logger.log(`didOpen ${uri} v${version}`);
  try {
    ctx.engine.open(uri, text, version, languageId);
  } catch (e) {
    if (e instanceof StaleEditError) {
      ctx.logger.warn(`[didOpen] dropped: ${e.message}`);
      return;
    }
    throw e;
  }
  ctx.engine.focusMain(uri, "open");
}

export function handleDidChange(ctx: ServerContext, params: DidChangeTextDocumentParams): void {
  const { uri, version } = params.textDocument;
  try {
    ctx.engine.edit(uri, params.contentChanges, version);
  } catch (e) {
    if (e instanceof StaleEditError || e instanceof UnknownDocumentError) {
      ctx.logger.warn(`[didChange] dropped: ${e.message}`);
      return;
    }
    throw e;
  }
}

export function handleDidClose(ctx: ServerContext, params: DidCloseTextDocumentParams): void {
  const { uri } = params.textDocument;
  ctx.logger.log(`didClose ${uri}`);
  try {
    ctx.engine.close(uri);
  } catch (e) {
    if (e instanceof UnknownDocumentError) {
      ctx.logger.warn(`[didClose] dropped: ${e.message}`);
      return;
    }
    throw e;
  }
}

export async function handleDidChangeConfiguration(ctx: ServerContext, params: DidChangeConfigurationParams): Promise<void> {
  if (ctx.pullsConfiguration) {
    await refreshSettings(ctx);
    return;
  }
  applySettings(ctx, normalizeSettings(settingsSectionOf(params.settings)));
}

/**
 * Files that are not open are read from disk by every snapshot, so a change
 * to one only has to re-run diagnostics. Open documents ignore the disk.
 */
export function handleDidChangeWatchedFiles(ctx: ServerContext, params: DidChangeWatchedFilesParams): void {
  const relevant = params.changes.filter(
    (change) => change.uri.endsWith(".quill") && !ctx.engine.store.has(fromLspUri(change.uri)),
  );
  if (!relevant.length) return;
  ctx.logger.log(`didChangeWatchedFiles: ${relevant.length} quill file(s) changed on disk`);
  ctx.engine.refreshDiagnostics();
}

/**
 * Registers all lifecycle handlers on the connection.
 */
export function registerLifecycleHandlers(connection: Connection, ctx: ServerContext): void {
  let dynamicConfiguration = false;

  connection.onInitialize((params) => {
    dynamicConfiguration = params.capabilities.workspace?.didChangeConfiguration?.dynamicRegistration === true;
    return handleInitialize(ctx, params);
  });

  connection.onInitialized(() => {
    if (ctx.pullsConfiguration && dynamicConfiguration) {
      void connection.client.register(DidChangeConfigurationNotification.type, undefined).catch((e: unknown) => {
        ctx.logger.warn(`[config] could not register for configuration changes: ${formatError(e)}`);
      });
    }
    void refreshSettings(ctx);
  });

  connection.onDidOpenTextDocument((params) => handleDidOpen(ctx, params));
  connection.onDidChangeTextDocument((params) => handleDidChange(ctx, params));
  connection.onDidCloseTextDocument((params) => handleDidClose(ctx, params));
  connection.onDidChangeConfiguration((params) => {
    ctx.logger.log("didChangeConfiguration: reloading settings");
    void handleDidChangeConfiguration(ctx, params);
  });
  connection.onDidChangeWatchedFiles((params) => handleDidChangeWatchedFiles(ctx, params));

  connection.onShutdown(() => {
    ctx.engine.dispose();
  });
}

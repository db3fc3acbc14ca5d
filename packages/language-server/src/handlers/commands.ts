/**
 * `workspace/executeCommand` handlers: quill.clearCache, quill.pinMain,
 * quill.focusMain, quill.getServerInfo, quill.compile
 */
import { ErrorCodes, ResponseError, type Connection, type ExecuteCommandParams } from "vscode-languageserver/node.js";
import { EntryNotFoundError, formatError, type DiagnosticSeverity } from "@quill-ls/compiler";
import type { EngineStats } from "@quill-ls/workspace";
import type { ServerContext } from "../context.js";
import { CommandKeys, SERVER_INFO } from "../capabilities.js";
import { toLspUri } from "../mapping/lsp-types.js";

/** Command arguments arrive untyped; a uri is either a string or `{ uri }`. */
function uriFromParam(param: unknown): string | undefined {
  if (typeof param === "string") return param;
  if (typeof param === "object" && param !== null && "uri" in param && typeof param.uri === "string") return param.uri;
  return undefined;
}

function requireUri(command: string, param: unknown): string {
  const uri = uriFromParam(param);
  if (uri === undefined) {
    throw new ResponseError<void>(ErrorCodes.InvalidParams, `${command} expects a document uri`);
  }
  return uri;
}

export interface ServerInfo extends EngineStats {
  readonly name: string;
  readonly version: string;
  readonly workspaceRoot: string | null;
}

export interface CompileSummary {
  readonly entry: string;
  /** Closure files in expansion order. */
  readonly files: readonly string[];
  readonly diagnostics: Readonly<Record<DiagnosticSeverity, number>>;
}

export function handleClearCache(ctx: ServerContext): null {
  ctx.engine.clearCache();
  ctx.logger.info("[commands] cache cleared");
  return null;
}

/** Pin a main document, or unpin with null. Returns the canonical pinned uri. */
export function handlePinMain(ctx: ServerContext, param: unknown): string | null {
  const uri = param === null || param === undefined ? null : requireUri(CommandKeys.pinMain, param);
  const main = ctx.engine.pinMain(uri);
  ctx.logger.info(`[commands] main ${main ? `pinned to ${main}` : "unpinned"}`);
  return main === null ? null : toLspUri(main);
}

/**
 * Focus a main document, or drop the focus with null. The focus applies while
 * nothing is pinned, and from now on opening or hovering no longer moves it.
 */
export function handleFocusMain(ctx: ServerContext, param: unknown): string | null {
  const uri = param === null || param === undefined ? null : requireUri(CommandKeys.focusMain, param);
  ctx.engine.focusMain(uri);
  const focus = ctx.engine.publisher.focus;
  ctx.logger.info(`[commands] focus ${focus ?? "cleared"}`);
  return focus === null ? null : toLspUri(focus);
}

export function handleGetServerInfo(ctx: ServerContext): ServerInfo {
  return {
    ...SERVER_INFO,
    workspaceRoot: ctx.workspaceRoot,
    ...ctx.engine.stats(),
  };
}

export async function handleCompile(ctx: ServerContext, param: unknown): Promise<CompileSummary> {
  const uri = requireUri(CommandKeys.compile, param);
  try {
    const result = await ctx.engine.compileDocument(uri);
    const diagnostics: Record<DiagnosticSeverity, number> = { error: 0, warning: 0, info: 0, hint: 0 };
    for (const list of result.diagnostics.values()) {
      for (const diag of list) diagnostics[diag.severity] += 1;
    }
    return {
      entry: toLspUri(result.artifact.entry),
      files: result.artifact.files.map(toLspUri),
      diagnostics,
    };
  } catch (e) {
    if (e instanceof EntryNotFoundError) {
      throw new ResponseError<void>(ErrorCodes.InvalidParams, e.message);
    }
    ctx.logger.error(`[commands] ${CommandKeys.compile} failed for ${uri}: ${formatError(e)}`);
    throw new ResponseError<void>(ErrorCodes.InternalError, e instanceof Error ? e.message : String(e));
  }
}

export async function handleExecuteCommand(ctx: ServerContext, params: ExecuteCommandParams): Promise<unknown> {
  const [first] = params.arguments ?? [];
  ctx.logger.log(`executeCommand ${params.command}`);
  switch (params.command) {
    case CommandKeys.clearCache:
      return handleClearCache(ctx);
    case CommandKeys.pinMain:
      return handlePinMain(ctx, first);
    case CommandKeys.focusMain:
      return handleFocusMain(ctx, first);
    case CommandKeys.getServerInfo:
      return handleGetServerInfo(ctx);
    case CommandKeys.compile:
      return handleCompile(ctx, first);
    default:
      throw new ResponseError<void>(ErrorCodes.MethodNotFound, `unknown command: ${params.command}`);
  }
}

/**
 * Registers the executeCommand handler on the connection.
 */
export function registerCommandHandlers(connection: Connection, ctx: ServerContext): void {
  connection.onExecuteCommand((params) => handleExecuteCommand(ctx, params));
}

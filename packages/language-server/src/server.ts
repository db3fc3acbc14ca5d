import type { Connection } from "vscode-languageserver/node.js";
import { configureDebug, type CompilerEngine, type Logger } from "@quill-ls/compiler";
import type { FileLoader } from "@quill-ls/workspace";
import { SETTINGS_SECTION } from "./config.js";
import { createServerContext, type ServerContext } from "./context.js";
import { registerCommandHandlers } from "./handlers/commands.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";

export interface StartServerOptions {
  /** Defaults to the reference Quill engine. */
  readonly compilerEngine?: CompilerEngine;
  /** Reads files that are not open. Defaults to the file system. */
  readonly loader?: FileLoader;
}

/** Logger that writes to the client's output channel. */
export function createConnectionLogger(connection: Connection): Logger {
  return {
    log: (m: string) => connection.console.log(`[quill-ls] ${m}`),
    info: (m: string) => connection.console.info(`[quill-ls] ${m}`),
    warn: (m: string) => connection.console.warn(`[quill-ls] ${m}`),
    error: (m: string) => connection.console.error(`[quill-ls] ${m}`),
  };
}

/**
 * Wire a server onto `connection`. The caller owns `connection.listen()`, so
 * tests can drive a server over in-memory streams.
 */
export function startServer(connection: Connection, options: StartServerOptions = {}): ServerContext {
  const logger = createConnectionLogger(connection);
  configureDebug({ output: (message) => connection.console.log(message) });

  const ctx = createServerContext({
    client: {
      sendDiagnostics: (params) => connection.sendDiagnostics(params),
      fetchSettings: () => connection.workspace.getConfiguration(SETTINGS_SECTION),
    },
    logger,
    ...(options.compilerEngine ? { compilerEngine: options.compilerEngine } : {}),
    ...(options.loader ? { loader: options.loader } : {}),
  });

  registerLifecycleHandlers(connection, ctx);
  registerFeatureHandlers(connection, ctx);
  registerCommandHandlers(connection, ctx);
  return ctx;
}

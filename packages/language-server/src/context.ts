import type { PublishDiagnosticsParams } from "vscode-languageserver/node.js";
import { formatError, type CompilerEngine, type Logger } from "@quill-ls/compiler";
import { AnalysisEngine, type FileLoader } from "@quill-ls/workspace";
import { DEFAULT_SERVER_SETTINGS, type ServerSettings } from "./config.js";
import { mapDiagnostics, toLspUri } from "./mapping/lsp-types.js";

/** The parts of the connection the server calls back into the client with. */
export interface ClientChannel {
  sendDiagnostics(params: PublishDiagnosticsParams): Promise<void>;
  /** Pull the `quill` settings section. */
  fetchSettings(): Promise<unknown>;
}

/**
 * Shared server context passed to all handlers.
 * The analysis engine owns every open document; the server keeps no copy.
 */
export interface ServerContext {
  readonly client: ClientChannel;
  readonly logger: Logger;
  readonly engine: AnalysisEngine;

  // Mutable state, set during initialize
  workspaceRoot: string | null;
  /** Whether the client answers `workspace/configuration`. */
  pullsConfiguration: boolean;
  settings: ServerSettings;
}

export interface ServerContextInit {
  client: ClientChannel;
  logger: Logger;
  compilerEngine?: CompilerEngine;
  loader?: FileLoader;
}

export function createServerContext(init: ServerContextInit): ServerContext {
  const { client, logger } = init;

  const engine = new AnalysisEngine({
    logger,
    ...(init.compilerEngine ? { engine: init.compilerEngine } : {}),
    ...(init.loader ? { loader: init.loader } : {}),
    sink: {
      publish: (uri, version, diagnostics) => {
        const params: PublishDiagnosticsParams = { uri: toLspUri(uri), diagnostics: mapDiagnostics(diagnostics) };
        if (version !== null) params.version = version;
        void client.sendDiagnostics(params).catch((e: unknown) => {
          logger.error(`[diagnostics] publish failed for ${uri}: ${formatError(e)}`);
        });
      },
    },
  });

  return {
    client,
    logger,
    engine,
    workspaceRoot: null,
    pullsConfiguration: false,
    settings: DEFAULT_SERVER_SETTINGS,
  };
}

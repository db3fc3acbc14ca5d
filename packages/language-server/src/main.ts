/**
 * Quill Language Server - Entry Point
 *
 * This is a thin entry point that creates the connection and hands it to the
 * server. The actual logic is split into:
 *
 * - server.ts             - wires the context and handlers onto a connection
 * - context.ts            - ServerContext with the analysis engine and client channel
 * - config.ts             - `quill` settings normalization
 * - mapping/lsp-types.ts  - Type conversion from workspace answers to LSP types
 * - handlers/features.ts  - LSP feature handlers (completions, hover, etc.)
 * - handlers/commands.ts  - quill.* commands
 * - handlers/lifecycle.ts - Lifecycle and document event handlers
 */
import { createConnection, ProposedFeatures } from "vscode-languageserver/node.js";
import { startServer } from "./server.js";

// Create LSP connection (transport chosen from the command line: --stdio, --node-ipc, --socket)
const connection = createConnection(ProposedFeatures.all);

startServer(connection);

// Start listening
connection.listen();

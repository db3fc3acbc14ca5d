// Canonical test-facing exports for language-server internals.
// Keeps test imports package-based instead of reaching into ../../src paths.
export * from "./capabilities.js";
export * from "./config.js";
export * from "./context.js";
export * from "./server.js";
export * from "./handlers/commands.js";
export * from "./handlers/features.js";
export * from "./handlers/lifecycle.js";
export * from "./mapping/lsp-types.js";

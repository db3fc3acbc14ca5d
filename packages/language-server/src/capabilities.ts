import { TextDocumentSyncKind, type ServerCapabilities } from "vscode-languageserver/node.js";

export const CommandKeys = {
  clearCache: "quill.clearCache",
  pinMain: "quill.pinMain",
  focusMain: "quill.focusMain",
  getServerInfo: "quill.getServerInfo",
  compile: "quill.compile",
} as const;

export type CommandKey = (typeof CommandKeys)[keyof typeof CommandKeys];

export const COMMANDS: readonly CommandKey[] = Object.values(CommandKeys);

export const COMPLETION_TRIGGER_CHARACTERS = ["@", "#"];

export function buildServerCapabilities(): ServerCapabilities {
  return {
    textDocumentSync: {
      openClose: true,
      change: TextDocumentSyncKind.Incremental,
    },
    completionProvider: { triggerCharacters: COMPLETION_TRIGGER_CHARACTERS },
    hoverProvider: true,
    definitionProvider: true,
    referencesProvider: true,
    renameProvider: { prepareProvider: true },
    documentFormattingProvider: true,
    documentSymbolProvider: true,
    workspaceSymbolProvider: true,
    foldingRangeProvider: true,
    executeCommandProvider: { commands: [...COMMANDS] },
  };
}

export const SERVER_INFO = { name: "quill-ls", version: "0.4.0" } as const;

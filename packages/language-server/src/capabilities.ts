import { TextDocumentSyncKind, type ServerCapabilities } from "vscode-languageserver/node.js";

export const CustomRequests = {
  syntheticDocument: "polyglot/syntheticDocument",
  dumpState: "polyglot/dumpState",
} as const;

export type CustomRequest = (typeof CustomRequests)[keyof typeof CustomRequests];

/** Trigger characters common to the default embedded languages. */
const COMPLETION_TRIGGERS = [".", ":", "$", "@", "<", "/", "-"];

/**
 * What the host server advertises. Downstream servers are started lazily, so
 * this cannot depend on their capabilities; a request a language does not
 * support comes back empty from that language.
 */
export function buildServerCapabilities(): ServerCapabilities {
  return {
    // Host edits are diffed by line, so incremental sync is enough.
    textDocumentSync: TextDocumentSyncKind.Incremental,
    hoverProvider: true,
    completionProvider: { resolveProvider: true, triggerCharacters: COMPLETION_TRIGGERS },
    signatureHelpProvider: { triggerCharacters: ["(", ","] },
    definitionProvider: true,
    typeDefinitionProvider: true,
    implementationProvider: true,
    declarationProvider: true,
    referencesProvider: true,
    documentHighlightProvider: true,
    renameProvider: { prepareProvider: true },
    documentSymbolProvider: true,
    inlayHintProvider: true,
  };
}

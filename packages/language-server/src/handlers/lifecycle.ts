/**
 * LSP lifecycle handlers: initialize, document events, configuration changes
 */
import type {
  DidChangeConfigurationParams,
  InitializeParams,
  InitializeResult,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import { changedLineRange, formatError, isRecord } from "@polyglot-bridge/core";
import type { ServerContext } from "../context.js";
import { buildServerCapabilities } from "../capabilities.js";
import { CONFIG_SECTION } from "../services/config.js";

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  ctx.workspaceRoot = params.rootUri ? URI.parse(params.rootUri).fsPath : null;
  ctx.logger.info(`initialize: root=${ctx.workspaceRoot ?? "<cwd>"}`);
  // Emits a change, which rebuilds the bridge against the new root.
  ctx.config.update(params.initializationOptions);
  return {
    capabilities: buildServerCapabilities(),
    serverInfo: { name: "polyglot-bridge" },
  };
}

/**
 * Feed the current text of a host document into the bridge. The first sight
 * of a document opens it; later calls pass the lines touched since the text
 * the bridge last saw, and do nothing when no line changed.
 */
export function syncHostDocument(ctx: ServerContext, doc: TextDocument): void {
  const text = doc.getText();
  const previous = ctx.hostTexts.get(doc.uri);
  try {
    if (previous === undefined) {
      ctx.bridge.openHost(doc.uri);
    } else {
      const changed = changedLineRange(previous, text);
      if (!changed) return;
      ctx.bridge.onHostEdit(doc.uri, changed);
    }
    ctx.hostTexts.set(doc.uri, text);
    ctx.publishDiagnostics(doc.uri);
  } catch (e) {
    ctx.logger.error(`[sync] failed for ${doc.uri} v${doc.version}: ${formatError(e)}`);
  }
}

export function closeHostDocument(ctx: ServerContext, uri: string): void {
  ctx.hostTexts.delete(uri);
  try {
    ctx.bridge.closeHost(uri);
  } catch (e) {
    ctx.logger.error(`[sync] close failed for ${uri}: ${formatError(e)}`);
  }
  void ctx.connection.sendDiagnostics({ uri, diagnostics: [] }).catch((e: unknown) => {
    ctx.logger.error(`[diagnostics] clear failed for ${uri}: ${formatError(e)}`);
  });
}

/**
 * Re-read configuration: pulled from the client when it supports
 * `workspace/configuration`, otherwise taken from the notification payload.
 */
export async function refreshConfiguration(
  ctx: ServerContext,
  pull: boolean,
  params?: DidChangeConfigurationParams,
): Promise<void> {
  try {
    const settings: unknown = pull
      ? await ctx.connection.workspace.getConfiguration(CONFIG_SECTION)
      : sectionOf(params?.settings);
    ctx.config.update(settings);
  } catch (e) {
    ctx.logger.error(`[config] refresh failed: ${formatError(e)}`);
  }
}

function sectionOf(settings: unknown): unknown {
  return isRecord(settings) ? settings[CONFIG_SECTION] : undefined;
}

/**
 * Registers all lifecycle handlers on the connection and documents.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  let pullConfiguration = false;

  ctx.connection.onInitialize((params) => {
    pullConfiguration = params.capabilities.workspace?.configuration === true;
    return handleInitialize(ctx, params);
  });

  ctx.connection.onInitialized(() => {
    if (pullConfiguration) void refreshConfiguration(ctx, true);
  });

  ctx.config.onDidChange(() => ctx.rebuildBridge());

  ctx.connection.onDidChangeConfiguration((params) => {
    ctx.logger.log("didChangeConfiguration: reloading settings");
    void refreshConfiguration(ctx, pullConfiguration, params);
  });

  // didOpen also fires onDidChangeContent; the second sync finds no change.
  ctx.documents.onDidOpen((e) => {
    ctx.logger.log(`didOpen ${e.document.uri}`);
    syncHostDocument(ctx, e.document);
  });

  ctx.documents.onDidChangeContent((e) => {
    ctx.logger.log(`didChange ${e.document.uri} v${e.document.version}`);
    syncHostDocument(ctx, e.document);
  });

  ctx.documents.onDidClose((e) => {
    ctx.logger.log(`didClose ${e.document.uri}`);
    closeHostDocument(ctx, e.document.uri);
  });

  ctx.connection.onShutdown(() => {
    ctx.logger.info("shutdown: stopping embedded servers");
    ctx.dispose();
  });
}

import type { Connection, PublishDiagnosticsParams, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import {
  createPolyglotBridge,
  createRegionRules,
  formatError,
  type Logger,
  type PolyglotBridge,
} from "@polyglot-bridge/core";
import type { ConfigService } from "./services/config.js";
import { EmbeddedServerPool, spawnLauncher, type ServerLauncher } from "./services/server-pool.js";

/**
 * Shared server context passed to all handlers.
 * The bridge and the server pool are replaced whenever configuration changes.
 */
export interface ServerContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly logger: Logger;
  readonly config: ConfigService;
  /** Last host text the bridge saw, per host uri; edits are diffed against it. */
  readonly hostTexts: Map<string, string>;

  // Mutable state
  workspaceRoot: string | null;
  bridge: PolyglotBridge;
  pool: EmbeddedServerPool;

  /** Recreate pool and bridge from the current configuration and reopen every host. */
  rebuildBridge(): void;
  /** Send the merged diagnostics of a host to the client. */
  publishDiagnostics(hostUri: string): void;
  dispose(): void;
}

export interface ServerContextInit {
  connection: Connection;
  documents: TextDocuments<TextDocument>;
  logger: Logger;
  config: ConfigService;
  launcher?: ServerLauncher;
}

export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, documents, logger, config, launcher } = init;
  const hostTexts = new Map<string, string>();

  let workspaceRoot: string | null = null;
  let pool: EmbeddedServerPool;
  let bridge: PolyglotBridge;

  function sendDiagnostics(params: PublishDiagnosticsParams): void {
    void connection.sendDiagnostics(params).catch((e: unknown) => {
      logger.error(`[diagnostics] publish failed for ${params.uri}: ${formatError(e)}`);
    });
  }

  function publishDiagnostics(hostUri: string): void {
    sendDiagnostics(bridge.diagnostics.publish(hostUri));
  }

  function createBridge(): void {
    const current = config.current;
    pool = new EmbeddedServerPool({
      servers: current.servers,
      logger,
      rootUri: workspaceRoot === null ? null : URI.file(workspaceRoot).toString(),
      launcher: launcher ?? spawnLauncher(workspaceRoot ?? undefined),
      onDiagnostics: (params) => {
        const merged = bridge.acceptDiagnostics(params);
        // Diagnostics for real files are not ours to republish.
        if (merged !== params) sendDiagnostics(merged);
      },
    });
    bridge = createPolyglotBridge({
      documents,
      transport: pool,
      layout: current.layout,
      aliasScheme: current.aliasScheme,
      extensions: current.extensions,
      rules: createRegionRules({ fenceAliases: current.fenceAliases, languages: current.languages }),
      logger,
    });
  }

  function rebuildBridge(): void {
    pool.dispose();
    createBridge();
    hostTexts.clear();
    for (const doc of documents.all()) {
      try {
        bridge.openHost(doc.uri);
        hostTexts.set(doc.uri, doc.getText());
        publishDiagnostics(doc.uri);
      } catch (e) {
        logger.error(`[bridge] reopen failed for ${doc.uri}: ${formatError(e)}`);
      }
    }
    logger.info(`[bridge] rebuilt (${hostTexts.size} open host document(s))`);
  }

  createBridge();

  return {
    connection,
    documents,
    logger,
    config,
    hostTexts,

    get workspaceRoot() { return workspaceRoot; },
    set workspaceRoot(v) { workspaceRoot = v; },

    get bridge() { return bridge; },
    set bridge(v) { bridge = v; },

    get pool() { return pool; },
    set pool(v) { pool = v; },

    rebuildBridge,
    publishDiagnostics,
    dispose() {
      pool.dispose();
    },
  };
}

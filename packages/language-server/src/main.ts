#!/usr/bin/env node
/**
 * Polyglot Bridge Language Server - Entry Point
 *
 * A thin entry point that creates the server context and wires together
 * all the handlers. The actual logic is split into:
 *
 * - context.ts              - ServerContext: bridge, server pool and shared state
 * - handlers/features.ts    - bridged LSP features (completion, hover, etc.)
 * - handlers/custom.ts      - polyglot/* inspection requests
 * - handlers/lifecycle.ts   - lifecycle, document and configuration events
 * - services/server-pool.ts - downstream language server processes
 */
import { createConnection, ProposedFeatures, TextDocuments } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { createServerContext } from "./context.js";
import { ConfigService } from "./services/config.js";
import { ConnectionLogger } from "./services/logger.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerCustomHandlers } from "./handlers/custom.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";

// Create LSP connection and document store
const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

// Logger writes to the LSP connection console; its level follows configuration
const logger = new ConnectionLogger(connection.console, "polyglot");
const config = new ConfigService(logger);
config.onDidChange((current) => logger.setLevel(current.logging.level));

// Create server context with all dependencies
const ctx = createServerContext({
  connection,
  documents,
  logger,
  config,
});

// Register all handlers
registerLifecycleHandlers(ctx);
registerFeatureHandlers(ctx);
registerCustomHandlers(ctx);

// Start listening
documents.listen(connection);
connection.listen();

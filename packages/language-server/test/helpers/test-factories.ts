/**
 * Test factories for the language server.
 *
 * Provides:
 * 1. Host documents and a TextDocuments-like store
 * 2. A mock ServerContext around a real bridge and an in-process transport
 * 3. An in-process launcher standing in for downstream server processes
 */
import { PassThrough } from "node:stream";
import { vi } from "vitest";
import {
  createMessageConnection,
  StreamMessageReader,
  StreamMessageWriter,
  type MessageConnection,
  type PublishDiagnosticsParams,
} from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import {
  createPolyglotBridge,
  isRecord,
  type EmbeddedServerTransport,
  type SyntheticDocument,
} from "@polyglot-bridge/core";
import { ConfigService, type ServerLauncher } from "@polyglot-bridge/language-server/api";

export const HOST_URI = "file:///notes/doc1.md";

/** Python at host lines 2-3, javascript at 6-7. */
export const PY_AND_JS = [
  "intro",
  "```py",
  "a = 1",
  "b = 2",
  "```",
  "```js",
  "let c = 3;",
  "c += 1;",
  "```",
].join("\n");

export function hostDoc(text: string, uri = HOST_URI, version = 1): TextDocument {
  return TextDocument.create(uri, "markdown", version, text);
}

export function createMockLogger() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** The part of `TextDocuments` the server reads. */
export function createDocuments(...docs: TextDocument[]) {
  const byUri = new Map<string, TextDocument>();
  for (const doc of docs) byUri.set(doc.uri, doc);
  return {
    get: (uri: string) => byUri.get(uri),
    all: () => [...byUri.values()],
    set: (doc: TextDocument) => {
      byUri.set(doc.uri, doc);
    },
  };
}

export type RequestHandler = (method: string, params: Record<string, unknown>) => unknown;

export interface FakeTransport extends EmbeddedServerTransport {
  readonly opened: SyntheticDocument[];
  readonly changed: SyntheticDocument[];
  readonly requests: Array<{ languageId: string; method: string }>;
  respond(languageId: string, handler: RequestHandler): void;
}

/** Languages without a handler have no server; a throwing handler rejects. */
export function createFakeTransport(): FakeTransport {
  const handlers = new Map<string, RequestHandler>();
  const transport: FakeTransport = {
    opened: [],
    changed: [],
    requests: [],
    respond(languageId, handler) {
      handlers.set(languageId, handler);
    },
    hasServer: (languageId) => handlers.has(languageId),
    async sendRequest(languageId, method, params) {
      const handler = handlers.get(languageId);
      if (!handler) throw new Error(`no handler for ${languageId}`);
      transport.requests.push({ languageId, method });
      return handler(method, isRecord(params) ? params : {});
    },
    openDocument: (doc) => {
      transport.opened.push(doc);
    },
    changeDocument: (doc) => {
      transport.changed.push(doc);
    },
    closeDocument: () => {},
  };
  return transport;
}

/**
 * A ServerContext stand-in: real bridge (aligned layout) over a fake
 * transport; connection calls are spies.
 */
export function createMockContext(...docs: TextDocument[]) {
  const logger = createMockLogger();
  const documents = createDocuments(...docs);
  const transport = createFakeTransport();
  const config = new ConfigService(logger);
  const bridge = createPolyglotBridge({ documents, transport, logger });
  const connection = {
    sendDiagnostics: vi.fn(async (_params: PublishDiagnosticsParams) => {}),
    workspace: { getConfiguration: vi.fn(async (): Promise<unknown> => ({})) },
  };
  const ctx = {
    connection,
    documents,
    logger,
    config,
    hostTexts: new Map<string, string>(),
    workspaceRoot: null as string | null,
    bridge,
    pool: { running: () => ["python"] },
    rebuildBridge: vi.fn(),
    publishDiagnostics: vi.fn((hostUri: string) => {
      void connection.sendDiagnostics(bridge.diagnostics.publish(hostUri));
    }),
    dispose: vi.fn(),
  };
  return { ctx, transport, logger, documents, connection };
}

// =============================================================================
// In-process downstream servers
// =============================================================================

export interface FakeServer {
  readonly languageId: string;
  readonly connection: MessageConnection;
  readonly notifications: Array<{ method: string; params: unknown }>;
  /** Report the process as gone. */
  exit(reason: string): void;
  killed: boolean;
}

export type ServerSetup = (server: FakeServer) => void;

/**
 * Launcher whose "processes" are JSON-RPC connections over in-memory
 * streams. Every server answers `initialize` and records notifications;
 * `setup` adds per-test request handlers.
 */
export function createInProcessLauncher(setup: ServerSetup = () => {}) {
  const servers: FakeServer[] = [];
  const launcher: ServerLauncher = (languageId) => {
    const toServer = new PassThrough();
    const toClient = new PassThrough();
    const connection = createMessageConnection(new StreamMessageReader(toServer), new StreamMessageWriter(toClient));
    const exitListeners: Array<(reason: string) => void> = [];
    const server: FakeServer = {
      languageId,
      connection,
      notifications: [],
      exit(reason) {
        for (const listener of exitListeners) listener(reason);
      },
      killed: false,
    };
    connection.onRequest("initialize", () => ({ capabilities: {} }));
    connection.onNotification((method, params) => {
      server.notifications.push({ method, params });
    });
    setup(server);
    connection.listen();
    servers.push(server);
    return {
      output: toClient,
      input: toServer,
      onExit(listener) {
        exitListeners.push(listener);
      },
      kill() {
        server.killed = true;
        connection.dispose();
      },
    };
  };
  return { launcher, servers };
}

/** A launcher whose process never starts. */
export function createFailingLauncher(reason = "failed to start: spawn missing-server ENOENT"): ServerLauncher {
  return () => {
    const output = new PassThrough();
    const input = new PassThrough();
    return {
      output,
      input,
      onExit(listener) {
        setTimeout(() => listener(reason), 0);
      },
      kill() {
        output.end();
      },
    };
  };
}

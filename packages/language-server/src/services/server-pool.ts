/**
 * Downstream language servers, one process per embedded language.
 *
 * Servers start lazily on first use. Until the initialize/initialized
 * handshake completes, notifications and requests wait on it. Synthetic
 * documents are tracked per language so a restarted server gets them
 * reopened.
 */
import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import {
  createMessageConnection,
  StreamMessageReader,
  StreamMessageWriter,
  type ClientCapabilities,
  type MessageConnection,
  type PublishDiagnosticsParams,
} from "vscode-languageserver/node.js";
import { formatError, type EmbeddedServerTransport, type Logger, type SyntheticDocument } from "@polyglot-bridge/core";
import { DisposableStore, toDisposable, type DisposableLike } from "./disposables.js";
import type { ServerSpec } from "./config.js";

export interface LaunchedServer {
  /** The server's stdout. */
  readonly output: Readable;
  /** The server's stdin. */
  readonly input: Writable;
  onExit(listener: (reason: string) => void): void;
  kill(): void;
}

export type ServerLauncher = (languageId: string, spec: ServerSpec) => LaunchedServer;

export function spawnLauncher(cwd?: string): ServerLauncher {
  return (_languageId, spec) => {
    const child = spawn(spec.command, spec.args, { cwd, stdio: "pipe" });
    return {
      output: child.stdout,
      input: child.stdin,
      onExit(listener) {
        child.once("exit", (code, signal) => listener(`exited (code=${code ?? "null"} signal=${signal ?? "null"})`));
        child.once("error", (error) => listener(`failed to start: ${error.message}`));
      },
      kill() {
        child.kill();
      },
    };
  };
}

export const CLIENT_CAPABILITIES: ClientCapabilities = {
  textDocument: {
    synchronization: { dynamicRegistration: false },
    hover: { contentFormat: ["markdown", "plaintext"] },
    completion: { completionItem: { snippetSupport: false, insertReplaceSupport: true } },
    signatureHelp: { signatureInformation: { documentationFormat: ["markdown", "plaintext"] } },
    definition: { linkSupport: true },
    typeDefinition: { linkSupport: true },
    implementation: { linkSupport: true },
    declaration: { linkSupport: true },
    documentSymbol: { hierarchicalDocumentSymbolSupport: true },
    rename: { prepareSupport: true },
    publishDiagnostics: { relatedInformation: true },
    inlayHint: {},
  },
  workspace: {
    workspaceEdit: { documentChanges: true },
    configuration: true,
  },
};

const SHUTDOWN_TIMEOUT_MS = 2000;

interface RunningServer {
  readonly languageId: string;
  readonly connection: MessageConnection;
  readonly ready: Promise<void>;
  readonly disposables: DisposableStore;
}

export interface EmbeddedServerPoolOptions {
  servers: Readonly<Record<string, ServerSpec>>;
  logger: Logger;
  rootUri?: string | null;
  launcher?: ServerLauncher;
  onDiagnostics?: (params: PublishDiagnosticsParams) => void;
}

export class EmbeddedServerPool implements EmbeddedServerTransport, DisposableLike {
  readonly #servers: Readonly<Record<string, ServerSpec>>;
  readonly #logger: Logger;
  readonly #rootUri: string | null;
  readonly #launcher: ServerLauncher;
  readonly #onDiagnostics: (params: PublishDiagnosticsParams) => void;
  readonly #running = new Map<string, RunningServer>();
  readonly #documents = new Map<string, Map<string, SyntheticDocument>>();
  readonly #failed = new Set<string>();
  #disposed = false;

  constructor(options: EmbeddedServerPoolOptions) {
    this.#servers = options.servers;
    this.#logger = options.logger;
    this.#rootUri = options.rootUri ?? null;
    this.#launcher = options.launcher ?? spawnLauncher();
    this.#onDiagnostics = options.onDiagnostics ?? (() => {});
  }

  hasServer(languageId: string): boolean {
    return !this.#disposed && this.#servers[languageId] !== undefined && !this.#failed.has(languageId);
  }

  /** Languages whose server process is currently up. */
  running(): string[] {
    return [...this.#running.keys()];
  }

  async sendRequest(languageId: string, method: string, params: unknown): Promise<unknown> {
    const server = this.#ensure(languageId);
    await server.ready;
    return server.connection.sendRequest(method, params);
  }

  openDocument(doc: SyntheticDocument): void {
    this.#track(doc);
    const server = this.#running.get(doc.languageId);
    if (server) {
      this.#notify(server, "textDocument/didOpen", didOpenParams(doc));
    } else {
      // Starting the server replays every tracked document.
      this.#ensure(doc.languageId);
    }
  }

  changeDocument(doc: SyntheticDocument): void {
    this.#track(doc);
    const server = this.#running.get(doc.languageId);
    if (!server) {
      this.#ensure(doc.languageId);
      return;
    }
    this.#notify(server, "textDocument/didChange", {
      textDocument: { uri: doc.uri, version: doc.document.version },
      contentChanges: [{ text: doc.document.getText() }],
    });
  }

  closeDocument(doc: SyntheticDocument): void {
    this.#documents.get(doc.languageId)?.delete(doc.uri);
    const server = this.#running.get(doc.languageId);
    if (server) this.#notify(server, "textDocument/didClose", { textDocument: { uri: doc.uri } });
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;
    for (const server of [...this.#running.values()]) {
      this.#stop(server);
    }
    this.#documents.clear();
  }

  #track(doc: SyntheticDocument): void {
    let docs = this.#documents.get(doc.languageId);
    if (!docs) {
      docs = new Map();
      this.#documents.set(doc.languageId, docs);
    }
    docs.set(doc.uri, doc);
  }

  #ensure(languageId: string): RunningServer {
    const existing = this.#running.get(languageId);
    if (existing) return existing;
    const spec = this.#servers[languageId];
    if (!spec || !this.hasServer(languageId)) {
      throw new Error(`no language server configured for ${languageId}`);
    }
    const server = this.#start(languageId, spec);
    this.#running.set(languageId, server);
    for (const doc of this.#documents.get(languageId)?.values() ?? []) {
      this.#notify(server, "textDocument/didOpen", didOpenParams(doc));
    }
    return server;
  }

  #start(languageId: string, spec: ServerSpec): RunningServer {
    const tag = `[server:${languageId}]`;
    this.#logger.info(`${tag} starting ${spec.command} ${spec.args.join(" ")}`.trimEnd());
    const disposables = new DisposableStore((e) => this.#logger.warn(`${tag} dispose failed: ${formatError(e)}`));
    const launched = this.#launcher(languageId, spec);
    const connection = createMessageConnection(
      new StreamMessageReader(launched.output),
      new StreamMessageWriter(launched.input),
    );
    disposables.add(toDisposable(() => launched.kill()));
    disposables.add(toDisposable(() => connection.dispose()));

    connection.onNotification("textDocument/publishDiagnostics", (params: PublishDiagnosticsParams) => {
      this.#onDiagnostics(params);
    });
    connection.onNotification("window/logMessage", (params: { message?: string }) => {
      this.#logger.log(`${tag} ${params.message ?? ""}`);
    });
    connection.onRequest("workspace/configuration", (params: { items?: unknown[] }) => (params.items ?? []).map(() => null));
    // registerCapability, workDoneProgress/create, ...: acknowledge and ignore.
    connection.onRequest((method) => {
      this.#logger.log(`${tag} ignoring server request ${method}`);
      return null;
    });
    connection.onError(([error]) => {
      this.#logger.warn(`${tag} connection error: ${error.message}`);
    });
    connection.listen();

    const ready = new Promise<void>((resolve, reject) => {
      launched.onExit((reason) => {
        this.#logger.warn(`${tag} ${reason}`);
        const current = this.#running.get(languageId);
        if (current?.connection === connection) this.#running.delete(languageId);
        if (reason.startsWith("failed to start")) this.#failed.add(languageId);
        disposables.dispose();
        reject(new Error(`${languageId} language server ${reason}`));
      });
      connection
        .sendRequest("initialize", {
          processId: process.pid,
          rootUri: this.#rootUri,
          capabilities: CLIENT_CAPABILITIES,
          initializationOptions: spec.initializationOptions,
        })
        .then(() => connection.sendNotification("initialized", {}))
        .then(
          () => {
            this.#logger.info(`${tag} initialized`);
            resolve();
          },
          reject,
        );
    });
    void ready.catch((e: unknown) => {
      this.#logger.error(`${tag} initialize failed: ${formatError(e)}`);
    });

    return { languageId, connection, ready, disposables };
  }

  #notify(server: RunningServer, method: string, params: unknown): void {
    void server.ready
      .then(() => server.connection.sendNotification(method, params))
      .catch((e: unknown) => {
        this.#logger.warn(`[server:${server.languageId}] ${method} not delivered: ${formatError(e)}`);
      });
  }

  /** shutdown, then exit; the process is killed either way. */
  #stop(server: RunningServer): void {
    this.#running.delete(server.languageId);
    void server.ready
      .then(() => withTimeout(server.connection.sendRequest("shutdown"), SHUTDOWN_TIMEOUT_MS, "shutdown"))
      .then(() => server.connection.sendNotification("exit"))
      .catch((e: unknown) => {
        this.#logger.log(`[server:${server.languageId}] shutdown incomplete: ${formatError(e)}`);
      })
      .finally(() => server.disposables.dispose());
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function didOpenParams(doc: SyntheticDocument) {
  return {
    textDocument: {
      uri: doc.uri,
      languageId: doc.languageId,
      version: doc.document.version,
      text: doc.document.getText(),
    },
  };
}

/**
 * PolyglotBridge: the one entry point a host-side server talks to.
 *
 * Host lifecycle events go through the store and out to the transport as
 * full-text didOpen/didChange/didClose of synthetic documents. Feature
 * requests are routed, sent, and translated back into host terms.
 */
import type { PublishDiagnosticsParams } from "vscode-languageserver/node.js";
import { BridgeError, BridgeErrorCode, formatError, isBridgeError } from "./errors.js";
import { createRegionRules, type RegionRules } from "./extract.js";
import {
  degradationFromError,
  isDegradation,
  isNotApplicable,
  notApplicable,
  NOT_APPLICABLE,
  type FeatureResponse,
  type NotApplicable,
} from "./feature-response.js";
import { IdentityScheme } from "./identity.js";
import { RequestRouter, type RoutedRequest } from "./router.js";
import { SyntheticDocumentStore, type SyncResult } from "./synthetic-store.js";
import { ResponseTranslator } from "./translator.js";
import { DiagnosticsMerger } from "./diagnostics.js";
import {
  NOOP_LOGGER,
  type HostDocumentSource,
  type LineRange,
  type Logger,
  type Position,
  type SyntheticDocument,
  type SyntheticLayout,
} from "./types.js";

/** Outbound side: whatever owns the downstream language servers. */
export interface EmbeddedServerTransport {
  hasServer(languageId: string): boolean;
  sendRequest(languageId: string, method: string, params: unknown): Promise<unknown>;
  openDocument(doc: SyntheticDocument): void;
  changeDocument(doc: SyntheticDocument): void;
  closeDocument(doc: SyntheticDocument): void;
}

export interface PolyglotBridgeOptions {
  documents: HostDocumentSource;
  transport: EmbeddedServerTransport;
  store: SyntheticDocumentStore;
  identity: IdentityScheme;
  router: RequestRouter;
  translator: ResponseTranslator;
  diagnostics: DiagnosticsMerger;
  logger?: Logger;
}

export class PolyglotBridge {
  readonly store: SyntheticDocumentStore;
  readonly identity: IdentityScheme;
  readonly router: RequestRouter;
  readonly diagnostics: DiagnosticsMerger;
  readonly #documents: HostDocumentSource;
  readonly #transport: EmbeddedServerTransport;
  readonly #translator: ResponseTranslator;
  readonly #logger: Logger;

  constructor(options: PolyglotBridgeOptions) {
    this.#documents = options.documents;
    this.#transport = options.transport;
    this.store = options.store;
    this.identity = options.identity;
    this.router = options.router;
    this.#translator = options.translator;
    this.diagnostics = options.diagnostics;
    this.#logger = options.logger ?? NOOP_LOGGER;
  }

  // --------------------------------------------------------------------------
  // Host lifecycle
  // --------------------------------------------------------------------------

  openHost(hostUri: string): SyncResult {
    return this.#sync(hostUri);
  }

  /** Run after every host edit, with the host lines the edit touched when known. */
  onHostEdit(hostUri: string, changedLines?: LineRange): SyncResult {
    return this.#sync(hostUri, changedLines);
  }

  closeHost(hostUri: string): SyntheticDocument[] {
    const removed = this.store.close(hostUri);
    for (const doc of removed) {
      if (this.#transport.hasServer(doc.languageId)) this.#transport.closeDocument(doc);
    }
    this.router.forgetHost(hostUri);
    this.diagnostics.forgetHost(hostUri);
    this.#logger.log(`[bridge] closed ${hostUri} (${removed.length} synthetic document(s))`);
    return removed;
  }

  #sync(hostUri: string, changedLines?: LineRange): SyncResult {
    const host = this.#documents.get(hostUri);
    if (!host) {
      throw new BridgeError(`host document ${hostUri} is not open`, BridgeErrorCode.UNKNOWN_HOST, hostUri);
    }
    const result = this.store.sync(host, changedLines);
    for (const doc of result.removed) {
      if (this.#transport.hasServer(doc.languageId)) this.#transport.closeDocument(doc);
      this.diagnostics.clear(hostUri, doc.languageId);
    }
    for (const doc of result.created) {
      if (this.#transport.hasServer(doc.languageId)) this.#transport.openDocument(doc);
    }
    for (const doc of result.rebuilt) {
      if (this.#transport.hasServer(doc.languageId)) this.#transport.changeDocument(doc);
    }
    return result;
  }

  // --------------------------------------------------------------------------
  // Requests
  // --------------------------------------------------------------------------

  /**
   * Route a position-bearing request to the language under `position` and
   * translate the answer. Upstream errors propagate unchanged.
   */
  async dispatch(
    hostUri: string,
    position: Position,
    method: string,
    params: Record<string, unknown> = {},
  ): Promise<FeatureResponse<unknown>> {
    const routed = this.router.route(hostUri, position, method, params);
    if (isNotApplicable(routed)) return routed;
    const response = await this.#exchange(routed);
    if (isNotApplicable(response)) return response;
    const translated = this.#translate(routed, response.result);
    if (method === "textDocument/completion" && !isDegradation(translated)) {
      this.router.noteCompletion(hostUri, routed.languageId);
    }
    return translated;
  }

  /**
   * Send the request to every language of the host and concatenate the
   * translated lists. A failing server only loses its own share.
   */
  async dispatchAll(hostUri: string, method: string, params: Record<string, unknown> = {}): Promise<FeatureResponse<unknown[]>> {
    const routed = this.router.fanOut(hostUri, method, params).filter((request) => {
      if (this.#transport.hasServer(request.languageId)) return true;
      this.router.discard(request.id);
      return false;
    });
    if (routed.length === 0) return NOT_APPLICABLE;

    const settled = await Promise.allSettled(routed.map((request) => this.#exchange(request)));
    const merged: unknown[] = [];
    settled.forEach((outcome, i) => {
      const request = routed[i];
      if (!request) return;
      if (outcome.status === "rejected") {
        this.#logger.warn(`[bridge] ${method} failed for ${request.languageId}: ${formatError(outcome.reason)}`);
        return;
      }
      if (isNotApplicable(outcome.value)) return;
      const translated = this.#translate(request, outcome.value.result);
      if (isDegradation(translated)) {
        this.#logger.warn(`[bridge] ${method} degraded for ${request.languageId}: ${translated.why}`);
        return;
      }
      if (Array.isArray(translated)) merged.push(...translated);
    });
    return merged;
  }

  /** Send `completionItem/resolve` back to the language that produced the item. */
  async resolveCompletion(hostUri: string, item: Record<string, unknown>): Promise<FeatureResponse<unknown>> {
    const routed = this.router.routeResolve(hostUri, item);
    if (isNotApplicable(routed)) return routed;
    const response = await this.#exchange(routed);
    if (isNotApplicable(response)) return response;
    return this.#translate(routed, response.result);
  }

  acceptDiagnostics(params: PublishDiagnosticsParams): PublishDiagnosticsParams {
    return this.diagnostics.accept(params);
  }

  async #exchange(routed: RoutedRequest): Promise<{ result: unknown } | NotApplicable> {
    if (!this.#transport.hasServer(routed.languageId)) {
      this.router.discard(routed.id);
      return notApplicable(`no language server for ${routed.languageId}`);
    }
    try {
      return { result: await this.#transport.sendRequest(routed.languageId, routed.method, routed.params) };
    } catch (e) {
      this.router.discard(routed.id);
      throw e;
    }
  }

  #translate(routed: RoutedRequest, result: unknown): FeatureResponse<unknown> {
    const ctx = this.router.consume(routed.id);
    if (!ctx) {
      return degradationFromError(routed.method, new Error(`request #${routed.id} has no pending context`));
    }
    try {
      return this.#translator.translate(ctx, result).result;
    } catch (e) {
      if (!isBridgeError(e)) throw e;
      this.#logger.warn(`[bridge] ${routed.method} #${routed.id} could not be translated: ${e.message}`);
      return degradationFromError(routed.method, e);
    }
  }
}

export interface CreateBridgeOptions {
  documents: HostDocumentSource;
  transport: EmbeddedServerTransport;
  layout?: SyntheticLayout;
  aliasScheme?: string;
  extensions?: Readonly<Record<string, string>>;
  rules?: RegionRules;
  logger?: Logger;
}

/** Wire a bridge with fresh collaborators. */
export function createPolyglotBridge(options: CreateBridgeOptions): PolyglotBridge {
  const logger = options.logger ?? NOOP_LOGGER;
  const identity = new IdentityScheme({ scheme: options.aliasScheme, extensions: options.extensions });
  const store = new SyntheticDocumentStore({
    identity,
    rules: options.rules ?? createRegionRules(),
    layout: options.layout,
    logger,
  });
  const router = new RequestRouter({ store, logger });
  const translator = new ResponseTranslator({ store, identity, logger });
  const diagnostics = new DiagnosticsMerger({ store, identity, logger });
  return new PolyglotBridge({
    documents: options.documents,
    transport: options.transport,
    store,
    identity,
    router,
    translator,
    diagnostics,
    logger,
  });
}

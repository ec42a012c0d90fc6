/**
 * Request routing: decides which synthetic document receives a host request
 * and rewrites the request into synthetic coordinates.
 */
import { NOT_APPLICABLE, notApplicable, type NotApplicable } from "./feature-response.js";
import type { SyntheticDocumentStore } from "./synthetic-store.js";
import { NOOP_LOGGER, type Logger, type Position, type TranslationContext } from "./types.js";
import { isRange, isRecord } from "./shapes.js";

export interface RoutedRequest {
  readonly id: number;
  readonly languageId: string;
  readonly method: string;
  readonly params: Record<string, unknown>;
}

export interface RequestRouterOptions {
  store: SyntheticDocumentStore;
  logger?: Logger;
}

export class RequestRouter {
  readonly #store: SyntheticDocumentStore;
  readonly #logger: Logger;
  readonly #contexts = new Map<number, TranslationContext>();
  readonly #lastCompletionLanguage = new Map<string, string>();
  #lastCompletionHost: string | undefined;
  #nextId = 1;

  constructor(options: RequestRouterOptions) {
    this.#store = options.store;
    this.#logger = options.logger ?? NOOP_LOGGER;
  }

  /**
   * Route a position-bearing request. Returns NOT_APPLICABLE (and records
   * nothing) when no embedded language covers the host position.
   */
  route(hostUri: string, position: Position, method: string, params: Record<string, unknown> = {}): RoutedRequest | NotApplicable {
    const doc = this.#store.languageAt(hostUri, position);
    if (!doc) return NOT_APPLICABLE;

    const outgoing: Record<string, unknown> = {
      ...params,
      textDocument: { ...(isRecord(params.textDocument) ? params.textDocument : {}), uri: doc.uri },
      position: this.#store.toSynthetic(hostUri, doc.languageId, position),
    };
    if (isRange(params.range)) {
      const range = this.#store.toSyntheticRange(hostUri, doc.languageId, params.range);
      if (!range) return notApplicable(`range is outside the ${doc.languageId} region`);
      outgoing.range = range;
    }
    return this.#record(hostUri, doc.languageId, doc.uri, method, outgoing);
  }

  /**
   * One request per synthetic document of the host. A `range` param is
   * clamped to each language's chunks; languages it misses are skipped.
   */
  fanOut(hostUri: string, method: string, params: Record<string, unknown> = {}): RoutedRequest[] {
    const routed: RoutedRequest[] = [];
    for (const doc of this.#store.list(hostUri)) {
      const outgoing: Record<string, unknown> = {
        ...params,
        textDocument: { ...(isRecord(params.textDocument) ? params.textDocument : {}), uri: doc.uri },
      };
      if (isRange(params.range)) {
        const range = this.#store.toSyntheticRange(hostUri, doc.languageId, params.range);
        if (!range) continue;
        outgoing.range = range;
      }
      routed.push(this.#record(hostUri, doc.languageId, doc.uri, method, outgoing));
    }
    return routed;
  }

  /**
   * Route `completionItem/resolve` back to the language that produced the
   * host's last completion list, restoring the item's alias in `data.uri`.
   */
  routeResolve(hostUri: string, item: Record<string, unknown>, method = "completionItem/resolve"): RoutedRequest | NotApplicable {
    const languageId = this.#lastCompletionLanguage.get(hostUri);
    const doc = languageId === undefined ? undefined : this.#store.get(hostUri, languageId);
    if (!doc) return notApplicable("no completion list to resolve against");
    const outgoing: Record<string, unknown> = { ...item };
    if (isRecord(item.data) && typeof item.data.uri === "string") {
      outgoing.data = { ...item.data, uri: doc.uri };
    }
    return this.#record(hostUri, doc.languageId, doc.uri, method, outgoing);
  }

  noteCompletion(hostUri: string, languageId: string): void {
    this.#lastCompletionLanguage.set(hostUri, languageId);
    this.#lastCompletionHost = hostUri;
  }

  /** Host of the most recent completion list, for items that do not name one. */
  get lastCompletionHost(): string | undefined {
    return this.#lastCompletionHost;
  }

  /** Hand out the context of a request exactly once. */
  consume(id: number): TranslationContext | undefined {
    const ctx = this.#contexts.get(id);
    if (ctx) this.#contexts.delete(id);
    return ctx;
  }

  discard(id: number): void {
    this.#contexts.delete(id);
  }

  pending(): TranslationContext[] {
    return [...this.#contexts.values()];
  }

  /** Forget per-host routing state when the host closes. */
  forgetHost(hostUri: string): void {
    this.#lastCompletionLanguage.delete(hostUri);
    if (this.#lastCompletionHost === hostUri) this.#lastCompletionHost = undefined;
    for (const [id, ctx] of this.#contexts) {
      if (ctx.hostUri === hostUri) this.#contexts.delete(id);
    }
  }

  #record(hostUri: string, languageId: string, syntheticUri: string, method: string, params: Record<string, unknown>): RoutedRequest {
    const id = this.#nextId++;
    this.#contexts.set(id, { requestId: id, method, hostUri, languageId, syntheticUri, params });
    this.#logger.log(`[router] #${id} ${method} ${hostUri} -> ${languageId}`);
    return { id, languageId, method, params };
  }
}

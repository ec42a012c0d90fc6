/**
 * Response translation: one rewrite rule per protocol method.
 *
 * Every rule works on a flat item sequence (see `normalizeResponse`) and
 * hands back the payload in its original shape. Aliases are replaced by
 * the host uri they decode to; ranges attached to an alias are mapped
 * through that alias' own (host, language). Uris that are not aliases are
 * left alone, so translating an already-translated payload is a no-op,
 * except for link origins, which always lie in the requesting document.
 *
 * Item-level mapping failures drop the item (and are counted). Rename is
 * all-or-nothing: a partial rename would corrupt the host, so a failed
 * edit fails the whole translation.
 */
import { formatError, isBridgeError } from "./errors.js";
import type { DecodedAlias, IdentityScheme } from "./identity.js";
import { isPosition, isRange, isRecord, normalizeCompletion, normalizeResponse } from "./shapes.js";
import type { SyntheticDocumentStore } from "./synthetic-store.js";
import { NOOP_LOGGER, type Logger, type Position, type Range, type TranslationContext } from "./types.js";

export interface Translation {
  readonly result: unknown;
  readonly context: TranslationContext;
  /** Items dropped because their coordinates could not be mapped. */
  readonly dropped: number;
}

export interface ResponseTranslatorOptions {
  store: SyntheticDocumentStore;
  identity: IdentityScheme;
  logger?: Logger;
}

/** Signals an item that cannot be mapped; the item is dropped. */
const DROP = Symbol("drop");

type Rule = (payload: unknown, ctx: TranslationContext, state: RuleState) => unknown;

interface RuleState {
  dropped: number;
}

export const LOCATION_METHODS = [
  "textDocument/definition",
  "textDocument/typeDefinition",
  "textDocument/implementation",
  "textDocument/declaration",
] as const;

export class ResponseTranslator {
  readonly #store: SyntheticDocumentStore;
  readonly #identity: IdentityScheme;
  readonly #logger: Logger;
  readonly #rules: ReadonlyMap<string, Rule>;

  constructor(options: ResponseTranslatorOptions) {
    this.#store = options.store;
    this.#identity = options.identity;
    this.#logger = options.logger ?? NOOP_LOGGER;

    const locations: Rule = (payload, ctx, state) => this.#eachItem(payload, state, (item) => this.#location(item, ctx));
    const rules = new Map<string, Rule>();
    for (const method of LOCATION_METHODS) rules.set(method, locations);
    rules.set("textDocument/references", locations);
    rules.set("textDocument/documentSymbol", (payload, ctx, state) => this.#eachItem(payload, state, (item) => this.#symbol(item, ctx)));
    rules.set("textDocument/documentHighlight", (payload, ctx, state) => this.#eachItem(payload, state, (item) => this.#withRange(item, ctx, "range")));
    rules.set("textDocument/rename", (payload) => this.#workspaceEdit(payload));
    rules.set("textDocument/prepareRename", (payload, ctx) => this.#prepareRename(payload, ctx));
    rules.set("textDocument/completion", (payload, ctx, state) => this.#completion(payload, ctx, state));
    rules.set("completionItem/resolve", (payload, ctx, state) => {
      const item = this.#completionItem(payload, ctx);
      if (item !== DROP) return item;
      state.dropped += 1;
      return this.#withoutEdits(payload);
    });
    rules.set("textDocument/hover", (payload, ctx) => this.#hover(payload, ctx));
    rules.set("textDocument/inlayHint", (payload, ctx, state) => this.#eachItem(payload, state, (item) => this.#inlayHint(item, ctx)));
    rules.set("textDocument/signatureHelp", (payload) => payload);
    this.#rules = rules;
  }

  supports(method: string): boolean {
    return this.#rules.has(method);
  }

  /**
   * Translate a successful upstream payload. Upstream errors never reach
   * this point; they are forwarded untouched by the caller.
   */
  translate(ctx: TranslationContext, payload: unknown): Translation {
    const context = this.#restoreContext(ctx);
    if (payload === null || payload === undefined) {
      return { result: payload ?? null, context, dropped: 0 };
    }
    const rule = this.#rules.get(ctx.method);
    if (!rule) {
      this.#logger.log(`[translator] no rule for ${ctx.method}; forwarding payload as-is`);
      return { result: payload, context, dropped: 0 };
    }
    const state: RuleState = { dropped: 0 };
    const result = rule(payload, ctx, state);
    if (state.dropped > 0) {
      this.#logger.warn(`[translator] #${ctx.requestId} ${ctx.method}: dropped ${state.dropped} unmappable item(s)`);
    }
    return { result, context, dropped: state.dropped };
  }

  /** Replace every alias in the request echo with the host identity. */
  #restoreContext(ctx: TranslationContext): TranslationContext {
    const params: Record<string, unknown> = { ...ctx.params };
    if (isRecord(params.textDocument) && typeof params.textDocument.uri === "string") {
      params.textDocument = { ...params.textDocument, uri: this.#identity.toHostUri(params.textDocument.uri) };
    }
    if (isRecord(params.data) && typeof params.data.uri === "string") {
      params.data = { ...params.data, uri: this.#identity.toHostUri(params.data.uri) };
    }
    return { ...ctx, params };
  }

  #eachItem(payload: unknown, state: RuleState, rewrite: (item: unknown) => unknown): unknown {
    const normalized = normalizeResponse(payload);
    const out: unknown[] = [];
    for (const item of normalized.items) {
      const rewritten = rewrite(item);
      if (rewritten === DROP) {
        state.dropped += 1;
      } else {
        out.push(rewritten);
      }
    }
    return normalized.restore(out);
  }

  /** Run a mapping step; coordinate failures become DROP. */
  #attempt<T>(step: () => T): T | typeof DROP {
    try {
      return step();
    } catch (e) {
      if (!isBridgeError(e)) throw e;
      this.#logger.log(`[translator] ${formatError(e)}`);
      return DROP;
    }
  }

  #contextTarget(ctx: TranslationContext): DecodedAlias {
    return { hostUri: ctx.hostUri, languageId: ctx.languageId };
  }

  #mapPosition(target: DecodedAlias, position: Position): Position {
    return this.#store.toHost(target.hostUri, target.languageId, position);
  }

  #mapRange(target: DecodedAlias, range: Range): Range {
    return this.#store.toHostRange(target.hostUri, target.languageId, range);
  }

  // --------------------------------------------------------------------------
  // Location / LocationLink
  // --------------------------------------------------------------------------

  #location(item: unknown, ctx: TranslationContext): unknown {
    if (!isRecord(item)) return item;
    return this.#attempt(() => {
      const out: Record<string, unknown> = { ...item };
      const direct = typeof item.uri === "string" ? this.#identity.tryDecode(item.uri) : null;
      if (direct) {
        out.uri = direct.hostUri;
        if (isRange(item.range)) out.range = this.#mapRange(direct, item.range);
      }
      const target = typeof item.targetUri === "string" ? this.#identity.tryDecode(item.targetUri) : null;
      if (target) {
        out.targetUri = target.hostUri;
        if (isRange(item.targetRange)) out.targetRange = this.#mapRange(target, item.targetRange);
        if (isRange(item.targetSelectionRange)) out.targetSelectionRange = this.#mapRange(target, item.targetSelectionRange);
      }
      // The origin lies in the document the request was made against, wherever the target is.
      if (typeof item.targetUri === "string" && isRange(item.originSelectionRange)) {
        out.originSelectionRange = this.#mapRange(this.#contextTarget(ctx), item.originSelectionRange);
      }
      return out;
    });
  }

  // --------------------------------------------------------------------------
  // Document symbols
  // --------------------------------------------------------------------------

  #symbol(item: unknown, ctx: TranslationContext): unknown {
    if (!isRecord(item)) return item;
    // SymbolInformation carries a nested location.
    if (isRecord(item.location)) {
      const location = this.#location(item.location, ctx);
      return location === DROP ? DROP : { ...item, location };
    }
    return this.#attempt(() => this.#documentSymbol(item, this.#contextTarget(ctx)));
  }

  #documentSymbol(symbol: Record<string, unknown>, target: DecodedAlias): Record<string, unknown> {
    const out: Record<string, unknown> = { ...symbol };
    if (isRange(symbol.range)) out.range = this.#mapRange(target, symbol.range);
    if (isRange(symbol.selectionRange)) out.selectionRange = this.#mapRange(target, symbol.selectionRange);
    if (Array.isArray(symbol.children)) {
      out.children = symbol.children.map((child) => (isRecord(child) ? this.#documentSymbol(child, target) : child));
    }
    return out;
  }

  #withRange(item: unknown, ctx: TranslationContext, key: string): unknown {
    if (!isRecord(item)) return item;
    const range = item[key];
    if (!isRange(range)) return item;
    return this.#attempt(() => ({ ...item, [key]: this.#mapRange(this.#contextTarget(ctx), range) }));
  }

  // --------------------------------------------------------------------------
  // Rename
  // --------------------------------------------------------------------------

  #prepareRename(payload: unknown, ctx: TranslationContext): unknown {
    if (isRange(payload)) return this.#mapRange(this.#contextTarget(ctx), payload);
    if (isRecord(payload) && isRange(payload.range)) {
      return { ...payload, range: this.#mapRange(this.#contextTarget(ctx), payload.range) };
    }
    return payload;
  }

  /**
   * Rewrite a WorkspaceEdit. Several aliases of one host merge into a single
   * host entry; aliases of another host stay with that host.
   */
  #workspaceEdit(payload: unknown): unknown {
    if (!isRecord(payload)) return payload;
    const out: Record<string, unknown> = { ...payload };

    if (isRecord(payload.changes)) {
      const changes: Record<string, unknown[]> = {};
      const merged = new Set<string>();
      for (const [uri, edits] of Object.entries(payload.changes)) {
        const target = this.#identity.tryDecode(uri);
        const hostUri = target?.hostUri ?? uri;
        const list = Array.isArray(edits) ? edits.map((edit) => this.#textEdit(edit, target)) : [];
        const existing = changes[hostUri];
        if (existing) {
          existing.push(...list);
          merged.add(hostUri);
        } else {
          changes[hostUri] = list;
        }
      }
      for (const hostUri of merged) {
        const list = changes[hostUri];
        if (list) changes[hostUri] = sortEdits(list);
      }
      out.changes = changes;
    }

    if (Array.isArray(payload.documentChanges)) {
      const documentChanges: unknown[] = [];
      const byHost = new Map<string, { textDocument: Record<string, unknown>; edits: unknown[] }>();
      const merged = new Set<string>();
      for (const change of payload.documentChanges) {
        if (!isRecord(change)) {
          documentChanges.push(change);
          continue;
        }
        if (isRecord(change.textDocument) && typeof change.textDocument.uri === "string" && Array.isArray(change.edits)) {
          const target = this.#identity.tryDecode(change.textDocument.uri);
          if (!target) {
            documentChanges.push(change);
            continue;
          }
          const edits = change.edits.map((edit) => this.#textEdit(edit, target));
          const existing = byHost.get(target.hostUri);
          if (existing) {
            existing.edits.push(...edits);
            merged.add(target.hostUri);
            continue;
          }
          // The synthetic version means nothing to the host document.
          const entry = { ...change, textDocument: { ...change.textDocument, uri: target.hostUri, version: null }, edits };
          byHost.set(target.hostUri, entry);
          documentChanges.push(entry);
          continue;
        }
        documentChanges.push(this.#resourceOperation(change));
      }
      for (const hostUri of merged) {
        const entry = byHost.get(hostUri);
        if (entry) entry.edits = sortEdits(entry.edits);
      }
      out.documentChanges = documentChanges;
    }

    return out;
  }

  #textEdit(edit: unknown, target: DecodedAlias | null): unknown {
    if (!target || !isRecord(edit) || !isRange(edit.range)) return edit;
    return { ...edit, range: this.#mapRange(target, edit.range) };
  }

  #resourceOperation(change: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = { ...change };
    for (const key of ["uri", "oldUri", "newUri"]) {
      const value = change[key];
      if (typeof value === "string") out[key] = this.#identity.toHostUri(value);
    }
    return out;
  }

  // --------------------------------------------------------------------------
  // Completion
  // --------------------------------------------------------------------------

  #completion(payload: unknown, ctx: TranslationContext, state: RuleState): unknown {
    const normalized = normalizeCompletion(payload);
    const items: unknown[] = [];
    for (const item of normalized.items) {
      const rewritten = this.#completionItem(item, ctx);
      if (rewritten === DROP) {
        state.dropped += 1;
      } else {
        items.push(rewritten);
      }
    }
    const restored = normalized.restore(items);
    if (isRecord(restored) && isRecord(restored.itemDefaults) && restored.itemDefaults.editRange !== undefined) {
      const editRange = this.#attempt(() => this.#editRange(restored.itemDefaults, ctx));
      if (editRange !== DROP) return { ...restored, itemDefaults: editRange };
      const itemDefaults: Record<string, unknown> = { ...restored.itemDefaults };
      delete itemDefaults.editRange;
      return { ...restored, itemDefaults };
    }
    return restored;
  }

  #editRange(defaults: unknown, ctx: TranslationContext): unknown {
    if (!isRecord(defaults)) return defaults;
    const target = this.#contextTarget(ctx);
    const editRange = defaults.editRange;
    if (isRange(editRange)) return { ...defaults, editRange: this.#mapRange(target, editRange) };
    if (isRecord(editRange) && isRange(editRange.insert) && isRange(editRange.replace)) {
      return {
        ...defaults,
        editRange: { insert: this.#mapRange(target, editRange.insert), replace: this.#mapRange(target, editRange.replace) },
      };
    }
    return defaults;
  }

  #completionItem(item: unknown, ctx: TranslationContext): unknown {
    if (!isRecord(item)) return item;
    return this.#attempt(() => {
      const target = this.#contextTarget(ctx);
      const out: Record<string, unknown> = { ...item };
      if (isRecord(item.data) && typeof item.data.uri === "string") {
        out.data = { ...item.data, uri: this.#identity.toHostUri(item.data.uri) };
      }
      const textEdit = item.textEdit;
      if (isRecord(textEdit)) {
        if (isRange(textEdit.range)) {
          out.textEdit = { ...textEdit, range: this.#mapRange(target, textEdit.range) };
        } else if (isRange(textEdit.insert) && isRange(textEdit.replace)) {
          out.textEdit = {
            ...textEdit,
            insert: this.#mapRange(target, textEdit.insert),
            replace: this.#mapRange(target, textEdit.replace),
          };
        }
      }
      if (Array.isArray(item.additionalTextEdits)) {
        out.additionalTextEdits = item.additionalTextEdits.map((edit) => this.#textEdit(edit, target));
      }
      return out;
    });
  }

  /** A resolved item whose edits do not map, kept without them. */
  #withoutEdits(item: unknown): unknown {
    if (!isRecord(item)) return item;
    const out: Record<string, unknown> = { ...item };
    delete out.textEdit;
    delete out.additionalTextEdits;
    if (isRecord(item.data) && typeof item.data.uri === "string") {
      out.data = { ...item.data, uri: this.#identity.toHostUri(item.data.uri) };
    }
    return out;
  }

  // --------------------------------------------------------------------------
  // Hover / inlay hints
  // --------------------------------------------------------------------------

  #hover(payload: unknown, ctx: TranslationContext): unknown {
    if (!isRecord(payload) || !isRange(payload.range)) return payload;
    const range = payload.range;
    const mapped = this.#attempt(() => this.#mapRange(this.#contextTarget(ctx), range));
    if (mapped !== DROP) return { ...payload, range: mapped };
    // The range is optional; contents are still worth showing.
    const rest: Record<string, unknown> = { ...payload };
    delete rest.range;
    return rest;
  }

  #inlayHint(item: unknown, ctx: TranslationContext): unknown {
    if (!isRecord(item) || !isPosition(item.position)) return item;
    const position = item.position;
    return this.#attempt(() => {
      const target = this.#contextTarget(ctx);
      const out: Record<string, unknown> = { ...item, position: this.#mapPosition(target, position) };
      if (Array.isArray(item.textEdits)) {
        out.textEdits = item.textEdits.map((edit) => this.#textEdit(edit, target));
      }
      return out;
    });
  }
}

function rangeStart(edit: unknown): Position {
  if (isRecord(edit) && isRange(edit.range)) return edit.range.start;
  return { line: 0, character: 0 };
}

function sortEdits(edits: readonly unknown[]): unknown[] {
  return [...edits].sort((a, b) => {
    const left = rangeStart(a);
    const right = rangeStart(b);
    return left.line - right.line || left.character - right.character;
  });
}


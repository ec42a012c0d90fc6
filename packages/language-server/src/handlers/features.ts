/**
 * LSP feature handlers. Position-bearing requests are routed to the language
 * under the cursor; document-wide ones fan out to every language of the host.
 *
 * NotApplicable and Degradation collapse to the LSP "no result" value.
 * Upstream protocol errors are rethrown so the client sees them verbatim;
 * anything else is logged and answered with the fallback.
 */
import {
  CompletionRequest,
  CompletionResolveRequest,
  DeclarationRequest,
  DefinitionRequest,
  DocumentHighlightRequest,
  DocumentSymbolRequest,
  HoverRequest,
  ImplementationRequest,
  InlayHintRequest,
  PrepareRenameRequest,
  ReferencesRequest,
  RenameRequest,
  ResponseError,
  SignatureHelpRequest,
  TypeDefinitionRequest,
  type CompletionItem,
  type CompletionParams,
  type DocumentSymbolParams,
  type InlayHintParams,
  type PrepareRenameParams,
  type ReferenceParams,
  type RenameParams,
  type SignatureHelpParams,
  type TextDocumentPositionParams,
} from "vscode-languageserver/node.js";
import {
  formatError,
  isDegradation,
  isNotApplicable,
  isRecord,
  type FeatureResponse,
} from "@polyglot-bridge/core";
import type { ServerContext } from "../context.js";

async function settle<F>(
  ctx: ServerContext,
  feature: string,
  uri: string,
  fallback: F,
  run: () => Promise<FeatureResponse<unknown>>,
): Promise<unknown> {
  try {
    const response = await run();
    if (isNotApplicable(response)) return fallback;
    if (isDegradation(response)) {
      ctx.logger.warn(`[${feature}] degraded for ${uri}: ${response.why}`);
      return fallback;
    }
    return response;
  } catch (e) {
    if (e instanceof ResponseError) throw e;
    ctx.logger.error(`[${feature}] failed for ${uri}: ${formatError(e)}`);
    return fallback;
  }
}

function positional(
  ctx: ServerContext,
  feature: string,
  method: string,
  params: TextDocumentPositionParams,
): Promise<unknown> {
  const uri = params.textDocument.uri;
  return settle(ctx, feature, uri, null, () => ctx.bridge.dispatch(uri, params.position, method, { ...params }));
}

export function handleHover(ctx: ServerContext, params: TextDocumentPositionParams): Promise<unknown> {
  return positional(ctx, "hover", HoverRequest.method, params);
}

export function handleCompletion(ctx: ServerContext, params: CompletionParams): Promise<unknown> {
  return positional(ctx, "completion", CompletionRequest.method, params);
}

/**
 * Items carry their host uri in `data.uri`; items without one belong to the
 * host of the last completion list. With neither, the item comes back as it is.
 */
export function handleCompletionResolve(ctx: ServerContext, item: CompletionItem): Promise<unknown> {
  const data: unknown = item.data;
  const uri = isRecord(data) && typeof data.uri === "string" ? data.uri : ctx.bridge.router.lastCompletionHost;
  if (uri === undefined) return Promise.resolve(item);
  return settle(ctx, "completionResolve", uri, item, () => ctx.bridge.resolveCompletion(uri, { ...item }));
}

export function handleSignatureHelp(ctx: ServerContext, params: SignatureHelpParams): Promise<unknown> {
  return positional(ctx, "signatureHelp", SignatureHelpRequest.method, params);
}

export function handleDefinition(ctx: ServerContext, params: TextDocumentPositionParams): Promise<unknown> {
  return positional(ctx, "definition", DefinitionRequest.method, params);
}

export function handleTypeDefinition(ctx: ServerContext, params: TextDocumentPositionParams): Promise<unknown> {
  return positional(ctx, "typeDefinition", TypeDefinitionRequest.method, params);
}

export function handleImplementation(ctx: ServerContext, params: TextDocumentPositionParams): Promise<unknown> {
  return positional(ctx, "implementation", ImplementationRequest.method, params);
}

export function handleDeclaration(ctx: ServerContext, params: TextDocumentPositionParams): Promise<unknown> {
  return positional(ctx, "declaration", DeclarationRequest.method, params);
}

export function handleReferences(ctx: ServerContext, params: ReferenceParams): Promise<unknown> {
  return positional(ctx, "references", ReferencesRequest.method, params);
}

export function handleDocumentHighlight(ctx: ServerContext, params: TextDocumentPositionParams): Promise<unknown> {
  return positional(ctx, "documentHighlight", DocumentHighlightRequest.method, params);
}

export function handleRename(ctx: ServerContext, params: RenameParams): Promise<unknown> {
  return positional(ctx, "rename", RenameRequest.method, params);
}

export function handlePrepareRename(ctx: ServerContext, params: PrepareRenameParams): Promise<unknown> {
  return positional(ctx, "prepareRename", PrepareRenameRequest.method, params);
}

export function handleDocumentSymbol(ctx: ServerContext, params: DocumentSymbolParams): Promise<unknown> {
  const uri = params.textDocument.uri;
  return settle(ctx, "documentSymbol", uri, [], () => ctx.bridge.dispatchAll(uri, DocumentSymbolRequest.method, { ...params }));
}

export function handleInlayHint(ctx: ServerContext, params: InlayHintParams): Promise<unknown> {
  const uri = params.textDocument.uri;
  return settle(ctx, "inlayHint", uri, [], () => ctx.bridge.dispatchAll(uri, InlayHintRequest.method, { ...params }));
}

/**
 * Registers all LSP feature handlers on the connection.
 * Bridged results are untyped payloads from another server, so the handlers
 * are registered by method name.
 */
export function registerFeatureHandlers(ctx: ServerContext): void {
  const { connection } = ctx;
  connection.onRequest(HoverRequest.method, (params: TextDocumentPositionParams) => handleHover(ctx, params));
  connection.onRequest(CompletionRequest.method, (params: CompletionParams) => handleCompletion(ctx, params));
  connection.onRequest(CompletionResolveRequest.method, (item: CompletionItem) => handleCompletionResolve(ctx, item));
  connection.onRequest(SignatureHelpRequest.method, (params: SignatureHelpParams) => handleSignatureHelp(ctx, params));
  connection.onRequest(DefinitionRequest.method, (params: TextDocumentPositionParams) => handleDefinition(ctx, params));
  connection.onRequest(TypeDefinitionRequest.method, (params: TextDocumentPositionParams) => handleTypeDefinition(ctx, params));
  connection.onRequest(ImplementationRequest.method, (params: TextDocumentPositionParams) => handleImplementation(ctx, params));
  connection.onRequest(DeclarationRequest.method, (params: TextDocumentPositionParams) => handleDeclaration(ctx, params));
  connection.onRequest(ReferencesRequest.method, (params: ReferenceParams) => handleReferences(ctx, params));
  connection.onRequest(DocumentHighlightRequest.method, (params: TextDocumentPositionParams) => handleDocumentHighlight(ctx, params));
  connection.onRequest(RenameRequest.method, (params: RenameParams) => handleRename(ctx, params));
  connection.onRequest(PrepareRenameRequest.method, (params: PrepareRenameParams) => handlePrepareRename(ctx, params));
  connection.onRequest(DocumentSymbolRequest.method, (params: DocumentSymbolParams) => handleDocumentSymbol(ctx, params));
  connection.onRequest(InlayHintRequest.method, (params: InlayHintParams) => handleInlayHint(ctx, params));
}

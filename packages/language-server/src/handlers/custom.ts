/**
 * Custom request handlers: polyglot/syntheticDocument, polyglot/dumpState
 */
import type { Chunk } from "@polyglot-bridge/core";
import type { ServerContext } from "../context.js";
import { CustomRequests } from "../capabilities.js";

type MaybeSyntheticParams = { uri?: unknown; languageId?: unknown } | null | undefined;

export interface SyntheticDocumentInfo {
  uri: string;
  languageId: string;
  version: number;
  text: string;
  chunks: readonly Chunk[];
}

export function handleGetSyntheticDocument(ctx: ServerContext, params: MaybeSyntheticParams): SyntheticDocumentInfo | null {
  ctx.logger.log(`RPC ${CustomRequests.syntheticDocument} params=${JSON.stringify(params)}`);
  if (!params || typeof params.uri !== "string" || typeof params.languageId !== "string") return null;
  const doc = ctx.bridge.store.get(params.uri, params.languageId);
  if (!doc) return null;
  return {
    uri: doc.uri,
    languageId: doc.languageId,
    version: doc.document.version,
    text: doc.document.getText(),
    chunks: doc.chunks,
  };
}

export function handleDumpState(ctx: ServerContext) {
  const { store, router } = ctx.bridge;
  return {
    workspaceRoot: ctx.workspaceRoot,
    layout: ctx.config.current.layout,
    aliasScheme: ctx.config.current.aliasScheme,
    configuredServers: Object.keys(ctx.config.current.servers),
    runningServers: ctx.pool.running(),
    hosts: store.hosts().map((hostUri) => ({
      uri: hostUri,
      languages: store.list(hostUri).map((doc) => ({
        languageId: doc.languageId,
        uri: doc.uri,
        version: doc.document.version,
        chunks: doc.chunks.length,
      })),
      problems: store.problems(hostUri),
    })),
    pending: router.pending().map((pending) => ({
      id: pending.requestId,
      method: pending.method,
      hostUri: pending.hostUri,
      languageId: pending.languageId,
    })),
  };
}

/**
 * Registers all custom request handlers on the connection.
 */
export function registerCustomHandlers(ctx: ServerContext): void {
  ctx.connection.onRequest(CustomRequests.syntheticDocument, (params: MaybeSyntheticParams) => handleGetSyntheticDocument(ctx, params));
  ctx.connection.onRequest(CustomRequests.dumpState, () => handleDumpState(ctx));
}

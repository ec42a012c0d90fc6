import { describe, test, expect } from "vitest";
import { DiagnosticSeverity, type InitializeParams } from "vscode-languageserver/node.js";
import {
  closeHostDocument,
  handleInitialize,
  refreshConfiguration,
  syncHostDocument,
} from "@polyglot-bridge/language-server/api";
import { createMockContext, hostDoc, HOST_URI, PY_AND_JS } from "../helpers/test-factories.js";

function initializeParams(overrides: Partial<InitializeParams> = {}): InitializeParams {
  return { processId: null, rootUri: null, capabilities: {}, ...overrides };
}

describe("handleInitialize", () => {
  test("records the workspace root and reads initialization options", () => {
    const { ctx } = createMockContext();
    const result = handleInitialize(
      ctx as never,
      initializeParams({ rootUri: "file:///work/space", initializationOptions: { layout: "compact" } }),
    );

    expect(ctx.workspaceRoot).toBe("/work/space");
    expect(ctx.config.current.layout).toBe("compact");
    expect(result.capabilities.hoverProvider).toBe(true);
    expect(result.capabilities.renameProvider).toEqual({ prepareProvider: true });
    expect(result.capabilities.completionProvider?.resolveProvider).toBe(true);
  });

  test("leaves the root unset without a rootUri", () => {
    const { ctx } = createMockContext();
    handleInitialize(ctx as never, initializeParams());
    expect(ctx.workspaceRoot).toBeNull();
    expect(ctx.config.current.layout).toBe("aligned");
  });
});

describe("syncHostDocument", () => {
  test("opens a host the first time it is seen", () => {
    const doc = hostDoc(PY_AND_JS);
    const { ctx, transport, connection } = createMockContext(doc);
    transport.respond("python", () => null);
    transport.respond("javascript", () => null);

    syncHostDocument(ctx as never, doc);

    expect(transport.opened.map((d) => d.languageId)).toEqual(["python", "javascript"]);
    expect(ctx.hostTexts.get(HOST_URI)).toBe(PY_AND_JS);
    expect(connection.sendDiagnostics).toHaveBeenCalledWith({ uri: HOST_URI, diagnostics: [] });
  });

  test("forwards only the languages an edit touched", () => {
    const doc = hostDoc(PY_AND_JS);
    const { ctx, transport, documents } = createMockContext(doc);
    transport.respond("python", () => null);
    transport.respond("javascript", () => null);
    syncHostDocument(ctx as never, doc);

    const edited = hostDoc(PY_AND_JS.replace("c += 1;", "c += 2;"), HOST_URI, 2);
    documents.set(edited);
    syncHostDocument(ctx as never, edited);

    expect(transport.changed.map((d) => [d.languageId, d.document.version])).toEqual([["javascript", 2]]);
    expect(ctx.hostTexts.get(HOST_URI)).toBe(edited.getText());
  });

  test("does nothing when the text is unchanged", () => {
    const doc = hostDoc(PY_AND_JS);
    const { ctx, transport, connection } = createMockContext(doc);
    transport.respond("python", () => null);
    syncHostDocument(ctx as never, doc);
    syncHostDocument(ctx as never, doc);

    expect(transport.opened).toHaveLength(1);
    expect(transport.changed).toEqual([]);
    expect(connection.sendDiagnostics).toHaveBeenCalledTimes(1);
  });

  test("publishes malformed regions as warnings", () => {
    const doc = hostDoc("intro\n```py\na = 1");
    const { ctx, connection } = createMockContext(doc);
    syncHostDocument(ctx as never, doc);

    expect(connection.sendDiagnostics).toHaveBeenCalledWith({
      uri: HOST_URI,
      diagnostics: [
        {
          range: { start: { line: 1, character: 0 }, end: { line: 2, character: 0 } },
          severity: DiagnosticSeverity.Warning,
          source: "polyglot-bridge",
          message: "region opened at line 1 is never closed",
        },
      ],
    });
  });

  test("logs hosts the bridge cannot read", () => {
    const { ctx, logger } = createMockContext();
    syncHostDocument(ctx as never, hostDoc(PY_AND_JS, "file:///notes/ghost.md"));

    expect(ctx.hostTexts.has("file:///notes/ghost.md")).toBe(false);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining("[sync] failed for file:///notes/ghost.md v1"));
  });
});

describe("closeHostDocument", () => {
  test("closes synthetic documents and clears the host's diagnostics", () => {
    const doc = hostDoc(PY_AND_JS);
    const { ctx, transport, connection } = createMockContext(doc);
    transport.respond("python", () => null);
    syncHostDocument(ctx as never, doc);

    closeHostDocument(ctx as never, HOST_URI);

    expect(ctx.bridge.store.has(HOST_URI)).toBe(false);
    expect(ctx.hostTexts.has(HOST_URI)).toBe(false);
    expect(connection.sendDiagnostics).toHaveBeenLastCalledWith({ uri: HOST_URI, diagnostics: [] });
  });
});

describe("refreshConfiguration", () => {
  test("pulls the polyglot section from the client", async () => {
    const { ctx, connection } = createMockContext();
    connection.workspace.getConfiguration.mockResolvedValueOnce({ layout: "compact" });

    await refreshConfiguration(ctx as never, true);

    expect(connection.workspace.getConfiguration).toHaveBeenCalledWith("polyglot");
    expect(ctx.config.current.layout).toBe("compact");
  });

  test("reads pushed settings when the client cannot be asked", async () => {
    const { ctx, connection } = createMockContext();

    await refreshConfiguration(ctx as never, false, { settings: { polyglot: { aliasScheme: "embedded" } } });

    expect(connection.workspace.getConfiguration).not.toHaveBeenCalled();
    expect(ctx.config.current.aliasScheme).toBe("embedded");
  });

  test("logs a failed pull and keeps the current settings", async () => {
    const { ctx, connection, logger } = createMockContext();
    connection.workspace.getConfiguration.mockRejectedValueOnce(new Error("client went away"));

    await refreshConfiguration(ctx as never, true);

    expect(ctx.config.current.layout).toBe("aligned");
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining("[config] refresh failed: Error: client went away"));
  });
});

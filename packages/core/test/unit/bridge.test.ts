import { describe, test, expect } from "vitest";
import { ErrorCodes, ResponseError } from "vscode-languageserver/node.js";
import { createPolyglotBridge } from "../../src/bridge.js";
import { IdentityScheme } from "../../src/identity.js";
import { BridgeError } from "../../src/errors.js";
import { isDegradation, isNotApplicable } from "../../src/feature-response.js";
import {
  createFakeTransport,
  createMockLogger,
  documentSource,
  hostDoc,
  HOST_URI,
  pos,
  PY_AND_JS,
  range,
  TWO_PY_REGIONS,
} from "../helpers/test-factories.js";

const identity = new IdentityScheme();
const PY_ALIAS = identity.encode(HOST_URI, "python");
const JS_ALIAS = identity.encode(HOST_URI, "javascript");

function setup(text = PY_AND_JS) {
  const documents = documentSource(hostDoc(text));
  const transport = createFakeTransport();
  const logger = createMockLogger();
  const bridge = createPolyglotBridge({ documents, transport, layout: "compact", logger });
  return { bridge, documents, transport, logger };
}

describe("PolyglotBridge host lifecycle", () => {
  test("opens synthetic documents only for languages with a server", () => {
    const { bridge, transport } = setup();
    transport.respond("python", () => null);
    bridge.openHost(HOST_URI);
    expect(transport.opened.map((doc) => doc.uri)).toEqual([PY_ALIAS]);
  });

  test("refuses hosts it cannot read", () => {
    const { bridge } = setup();
    expect(() => bridge.openHost("file:///missing.md")).toThrow(BridgeError);
  });

  test("pushes a change only for the language an edit touched", () => {
    const { bridge, documents, transport } = setup();
    transport.respond("python", () => null);
    transport.respond("javascript", () => null);
    bridge.openHost(HOST_URI);

    documents.set(hostDoc(PY_AND_JS.replace("c += 1;", "c += 2;"), HOST_URI, 2));
    bridge.onHostEdit(HOST_URI, { start: 7, end: 7 });

    expect(transport.changed.map((doc) => [doc.uri, doc.document.version])).toEqual([[JS_ALIAS, 2]]);
  });

  test("closes every synthetic document with the host", () => {
    const { bridge, transport } = setup();
    transport.respond("python", () => null);
    transport.respond("javascript", () => null);
    bridge.openHost(HOST_URI);
    bridge.closeHost(HOST_URI);
    expect(transport.closed.map((doc) => doc.uri)).toEqual([PY_ALIAS, JS_ALIAS]);
    expect(bridge.store.has(HOST_URI)).toBe(false);
  });
});

describe("PolyglotBridge.dispatch", () => {
  test("issues no request outside every region", async () => {
    const { bridge, transport } = setup(TWO_PY_REGIONS);
    transport.respond("python", () => null);
    bridge.openHost(HOST_URI);

    const result = await bridge.dispatch(HOST_URI, pos(7, 0), "textDocument/hover", { textDocument: { uri: HOST_URI } });
    expect(isNotApplicable(result)).toBe(true);
    expect(transport.requests).toEqual([]);
  });

  test("routes, sends and translates a definition request", async () => {
    const { bridge, transport } = setup(TWO_PY_REGIONS);
    transport.respond("python", () => ({ uri: PY_ALIAS, range: range(4, 0, 4, 5) }));
    bridge.openHost(HOST_URI);

    const result = await bridge.dispatch(HOST_URI, pos(9, 4), "textDocument/definition", {
      textDocument: { uri: HOST_URI },
      position: pos(9, 4),
    });

    expect(result).toEqual({ uri: HOST_URI, range: range(9, 0, 9, 5) });
    expect(transport.requests).toEqual([
      {
        languageId: "python",
        method: "textDocument/definition",
        params: { textDocument: { uri: PY_ALIAS }, position: pos(4, 4) },
      },
    ]);
    expect(bridge.router.pending()).toEqual([]);
  });

  test("is not applicable for a language without a server", async () => {
    const { bridge } = setup();
    bridge.openHost(HOST_URI);
    const result = await bridge.dispatch(HOST_URI, pos(6, 0), "textDocument/hover");
    expect(result).toEqual({ __notApplicable: true, reason: "no language server for javascript" });
    expect(bridge.router.pending()).toEqual([]);
  });

  test("re-throws upstream errors unchanged", async () => {
    const { bridge, transport } = setup();
    const failure = new ResponseError(ErrorCodes.InternalError, "python server crashed");
    transport.respond("python", () => {
      throw failure;
    });
    bridge.openHost(HOST_URI);

    await expect(bridge.dispatch(HOST_URI, pos(2, 0), "textDocument/hover")).rejects.toBe(failure);
    expect(bridge.router.pending()).toEqual([]);
  });

  test("degrades a rename it cannot map", async () => {
    const { bridge, transport } = setup();
    transport.respond("python", () => ({ changes: { [PY_ALIAS]: [{ range: range(8, 0, 8, 1), newText: "z" }] } }));
    bridge.openHost(HOST_URI);

    const result = await bridge.dispatch(HOST_URI, pos(2, 0), "textDocument/rename", { newName: "z" });
    expect(isDegradation(result)).toBe(true);
    expect(result).toMatchObject({ rung: 3, what: "textDocument/rename" });
  });

  test("sends completion resolves back to the language that completed", async () => {
    const { bridge, transport } = setup();
    transport.respond("python", (method, params) =>
      method === "textDocument/completion"
        ? { isIncomplete: false, items: [{ label: "abs", data: { uri: PY_ALIAS } }] }
        : { ...params, detail: "builtin" },
    );
    bridge.openHost(HOST_URI);

    const list = await bridge.dispatch(HOST_URI, pos(2, 1), "textDocument/completion");
    expect(list).toEqual({ isIncomplete: false, items: [{ label: "abs", data: { uri: HOST_URI } }] });

    const resolved = await bridge.resolveCompletion(HOST_URI, { label: "abs", data: { uri: HOST_URI } });
    expect(transport.requests[1]).toEqual({
      languageId: "python",
      method: "completionItem/resolve",
      params: { label: "abs", data: { uri: PY_ALIAS } },
    });
    expect(resolved).toEqual({ label: "abs", data: { uri: HOST_URI }, detail: "builtin" });
  });
});

describe("PolyglotBridge.dispatchAll", () => {
  const symbol = (name: string, line: number) => ({
    name,
    kind: 13,
    range: range(line, 0, line, 1),
    selectionRange: range(line, 0, line, 1),
  });

  test("concatenates the translated lists of every language", async () => {
    const { bridge, transport } = setup();
    transport.respond("python", () => [symbol("a", 0)]);
    transport.respond("javascript", () => [symbol("c", 0)]);
    bridge.openHost(HOST_URI);

    const result = await bridge.dispatchAll(HOST_URI, "textDocument/documentSymbol", { textDocument: { uri: HOST_URI } });
    expect(result).toEqual([symbol("a", 2), symbol("c", 6)]);
  });

  test("keeps the other languages when one server fails", async () => {
    const { bridge, transport, logger } = setup();
    transport.respond("python", () => [symbol("a", 1)]);
    transport.respond("javascript", () => {
      throw new Error("boom");
    });
    bridge.openHost(HOST_URI);

    const result = await bridge.dispatchAll(HOST_URI, "textDocument/documentSymbol");
    expect(result).toEqual([symbol("a", 3)]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(bridge.router.pending()).toEqual([]);
  });

  test("is not applicable when no language has a server", async () => {
    const { bridge } = setup();
    bridge.openHost(HOST_URI);
    expect(isNotApplicable(await bridge.dispatchAll(HOST_URI, "textDocument/documentSymbol"))).toBe(true);
  });
});

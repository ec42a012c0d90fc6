import type { Position, Range } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";

export type { Position, Range };

/** Minimal logger contract shared by every bridge component. */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const NOOP_LOGGER: Logger = Object.freeze({
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
});

/** Host documents are read through this, never owned by the bridge. */
export interface HostDocumentSource {
  get(uri: string): TextDocument | undefined;
}

/** Inclusive range of 0-based host lines. */
export interface LineRange {
  start: number;
  end: number;
}

/**
 * One contiguous host region of a single language.
 * Lines are 0-based; `hostEndLine` is inclusive.
 */
export interface Chunk {
  readonly languageId: string;
  readonly hostStartLine: number;
  readonly hostEndLine: number;
  readonly hostStartCharacter: number;
  readonly hostEndCharacter: number;
  readonly syntheticStartLine: number;
}

/** How chunks are laid out inside a synthetic document. */
export type SyntheticLayout = "aligned" | "compact";

export interface RegionProblem {
  readonly kind: "MalformedRegion";
  readonly languageId: string | null;
  readonly hostStartLine: number;
  readonly message: string;
}

export interface SyntheticDocument {
  readonly uri: string;
  readonly hostUri: string;
  readonly languageId: string;
  readonly document: TextDocument;
  readonly chunks: readonly Chunk[];
}

/** Per in-flight request; consumed exactly once by the translator. */
export interface TranslationContext {
  readonly requestId: number;
  readonly method: string;
  readonly hostUri: string;
  readonly languageId: string;
  readonly syntheticUri: string;
  params: Record<string, unknown>;
}

/**
 * Synthetic document store: one synthetic document per (host, language).
 *
 * Each synthetic document is assembled from the host slices named by that
 * language's chunks. Inside a chunk, synthetic line ↔ host line is a pure
 * additive offset and columns pass through unchanged; the offset only
 * changes at chunk boundaries.
 *
 * Layouts:
 * - aligned: gaps between chunks are filled with blank lines, so every
 *   chunk keeps its host line numbers (offset 0).
 * - compact: chunks are concatenated with one blank separator line.
 *
 * Languages are independent entries: rebuilding one never touches another.
 */
import { TextDocument } from "vscode-languageserver-textdocument";
import { BridgeError, BridgeErrorCode } from "./errors.js";
import { extractRegions, groupByLanguage, splitLines, type HostRegion, type RegionRules, createRegionRules } from "./extract.js";
import type { IdentityScheme } from "./identity.js";
import {
  NOOP_LOGGER,
  type Chunk,
  type LineRange,
  type Logger,
  type Position,
  type Range,
  type RegionProblem,
  type SyntheticDocument,
  type SyntheticLayout,
} from "./types.js";

export interface SyntheticStoreOptions {
  identity: IdentityScheme;
  rules?: RegionRules;
  layout?: SyntheticLayout;
  logger?: Logger;
}

export interface SyncResult {
  readonly hostUri: string;
  readonly created: SyntheticDocument[];
  readonly rebuilt: SyntheticDocument[];
  readonly removed: SyntheticDocument[];
  readonly problems: RegionProblem[];
}

interface HostEntry {
  host: TextDocument;
  regions: Map<string, HostRegion[]>;
  problems: RegionProblem[];
  languages: Map<string, SyntheticDocument>;
}

export function layoutChunks(regions: readonly HostRegion[], layout: SyntheticLayout): Chunk[] {
  let cursor = 0;
  return regions.map((region) => {
    const syntheticStartLine = layout === "aligned" ? region.hostStartLine : cursor;
    cursor = syntheticStartLine + chunkLineCount(region) + 1;
    return { ...region, syntheticStartLine };
  });
}

export function chunkLineCount(chunk: Pick<Chunk, "hostStartLine" | "hostEndLine">): number {
  return chunk.hostEndLine - chunk.hostStartLine + 1;
}

export function buildSyntheticText(hostLines: readonly string[], chunks: readonly Chunk[]): string {
  const out: string[] = [];
  for (const chunk of chunks) {
    while (out.length < chunk.syntheticStartLine) out.push("");
    for (let line = chunk.hostStartLine; line <= chunk.hostEndLine; line += 1) {
      out.push(hostLines[line] ?? "");
    }
  }
  return out.length ? `${out.join("\n")}\n` : "";
}

function sameChunks(a: readonly Chunk[], b: readonly Chunk[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((chunk, i) => {
    const other = b[i];
    return other !== undefined
      && chunk.languageId === other.languageId
      && chunk.hostStartLine === other.hostStartLine
      && chunk.hostEndLine === other.hostEndLine
      && chunk.hostStartCharacter === other.hostStartCharacter
      && chunk.hostEndCharacter === other.hostEndCharacter
      && chunk.syntheticStartLine === other.syntheticStartLine;
  });
}

function intersects(chunks: readonly Chunk[], lines: LineRange): boolean {
  return chunks.some((chunk) => chunk.hostStartLine <= lines.end && lines.start <= chunk.hostEndLine);
}

/** Last chunk whose `key` start is <= line, or undefined. */
function floorChunk(chunks: readonly Chunk[], line: number, key: "hostStartLine" | "syntheticStartLine"): Chunk | undefined {
  let lo = 0;
  let hi = chunks.length - 1;
  let found: Chunk | undefined;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const chunk = chunks[mid];
    if (!chunk) break;
    if (chunk[key] <= line) {
      found = chunk;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

export class SyntheticDocumentStore {
  readonly layout: SyntheticLayout;
  readonly #identity: IdentityScheme;
  readonly #rules: RegionRules;
  readonly #logger: Logger;
  readonly #hosts = new Map<string, HostEntry>();

  constructor(options: SyntheticStoreOptions) {
    this.#identity = options.identity;
    this.#rules = options.rules ?? createRegionRules();
    this.layout = options.layout ?? "aligned";
    this.#logger = options.logger ?? NOOP_LOGGER;
  }

  /**
   * Re-extract the host's chunks and rebuild every language whose chunk
   * list changed or whose chunks intersect `changedLines` (before or after
   * the edit). Without `changedLines` every language is a candidate.
   */
  sync(host: TextDocument, changedLines?: LineRange): SyncResult {
    const extraction = extractRegions(host.getText(), this.#rules);
    const groups = groupByLanguage(extraction.regions);
    const entry = this.#hosts.get(host.uri) ?? {
      host,
      regions: new Map<string, HostRegion[]>(),
      problems: [],
      languages: new Map<string, SyntheticDocument>(),
    };
    entry.host = host;
    entry.regions = groups;
    entry.problems = extraction.problems;
    this.#hosts.set(host.uri, entry);

    const result: SyncResult = { hostUri: host.uri, created: [], rebuilt: [], removed: [], problems: extraction.problems };
    for (const problem of extraction.problems) {
      this.#logger.warn(`[store] malformed region in ${host.uri} at line ${problem.hostStartLine}: ${problem.message}`);
    }

    for (const [languageId, previous] of entry.languages) {
      if (groups.has(languageId)) continue;
      entry.languages.delete(languageId);
      result.removed.push(previous);
    }

    for (const [languageId, regions] of groups) {
      const previous = entry.languages.get(languageId);
      if (!previous) {
        result.created.push(this.#build(entry, languageId, regions, null));
        continue;
      }
      const chunks = layoutChunks(regions, this.layout);
      const candidate = !changedLines
        || !sameChunks(previous.chunks, chunks)
        || intersects(previous.chunks, changedLines)
        || intersects(chunks, changedLines);
      if (!candidate) continue;
      const rebuilt = this.#build(entry, languageId, regions, previous);
      if (rebuilt !== previous) result.rebuilt.push(rebuilt);
    }

    return result;
  }

  /** Recompute one language's text from the last extracted chunk list; always bumps the version. */
  rebuild(hostUri: string, languageId: string): SyntheticDocument {
    const entry = this.#entry(hostUri);
    const regions = entry.regions.get(languageId);
    if (!regions) {
      throw new BridgeError(`no ${languageId} regions in ${hostUri}`, BridgeErrorCode.NO_SYNTHETIC_REGION, hostUri);
    }
    return this.#build(entry, languageId, regions, entry.languages.get(languageId) ?? null, true);
  }

  get(hostUri: string, languageId: string): SyntheticDocument | undefined {
    return this.#hosts.get(hostUri)?.languages.get(languageId);
  }

  list(hostUri: string): SyntheticDocument[] {
    return [...(this.#hosts.get(hostUri)?.languages.values() ?? [])];
  }

  has(hostUri: string): boolean {
    return this.#hosts.has(hostUri);
  }

  hosts(): string[] {
    return [...this.#hosts.keys()];
  }

  problems(hostUri: string): readonly RegionProblem[] {
    return this.#hosts.get(hostUri)?.problems ?? [];
  }

  /** Destroy every synthetic document of a host. */
  close(hostUri: string): SyntheticDocument[] {
    const entry = this.#hosts.get(hostUri);
    if (!entry) return [];
    this.#hosts.delete(hostUri);
    return [...entry.languages.values()];
  }

  /** The synthetic document whose chunks cover the host position, if any. */
  languageAt(hostUri: string, position: Position): SyntheticDocument | undefined {
    const entry = this.#hosts.get(hostUri);
    if (!entry) return undefined;
    for (const doc of entry.languages.values()) {
      const chunk = floorChunk(doc.chunks, position.line, "hostStartLine");
      if (chunk && position.line <= chunk.hostEndLine) return doc;
    }
    return undefined;
  }

  toHost(hostUri: string, languageId: string, position: Position): Position {
    const doc = this.#require(hostUri, languageId);
    const chunk = floorChunk(doc.chunks, position.line, "syntheticStartLine");
    if (chunk) {
      const offset = position.line - chunk.syntheticStartLine;
      const count = chunkLineCount(chunk);
      if (offset < count) {
        return { line: chunk.hostStartLine + offset, character: position.character };
      }
      // Exclusive end of a chunk (start of the following line).
      if (offset === count && position.character === 0) {
        return { line: chunk.hostEndLine + 1, character: 0 };
      }
    }
    throw new BridgeError(
      `synthetic line ${position.line} of ${doc.uri} is outside every chunk`,
      BridgeErrorCode.POSITION_OUT_OF_RANGE,
      doc.uri,
      position.line,
    );
  }

  toSynthetic(hostUri: string, languageId: string, position: Position): Position {
    const doc = this.#require(hostUri, languageId);
    const chunk = floorChunk(doc.chunks, position.line, "hostStartLine");
    if (!chunk || position.line > chunk.hostEndLine) {
      throw new BridgeError(
        `host line ${position.line} of ${hostUri} is not covered by a ${languageId} chunk`,
        BridgeErrorCode.NO_SYNTHETIC_REGION,
        hostUri,
        position.line,
      );
    }
    return { line: chunk.syntheticStartLine + (position.line - chunk.hostStartLine), character: position.character };
  }

  toHostRange(hostUri: string, languageId: string, range: Range): Range {
    return {
      start: this.toHost(hostUri, languageId, range.start),
      end: this.toHost(hostUri, languageId, range.end),
    };
  }

  /**
   * Clamp a host range to the chunks of one language and map it into
   * synthetic coordinates. Null when no chunk overlaps the range.
   */
  toSyntheticRange(hostUri: string, languageId: string, range: Range): Range | null {
    const doc = this.get(hostUri, languageId);
    if (!doc) return null;
    const overlapping = doc.chunks.filter(
      (chunk) => chunk.hostStartLine <= range.end.line && range.start.line <= chunk.hostEndLine,
    );
    const first = overlapping[0];
    const last = overlapping[overlapping.length - 1];
    if (!first || !last) return null;
    const start = range.start.line >= first.hostStartLine
      ? range.start
      : { line: first.hostStartLine, character: first.hostStartCharacter };
    const end = range.end.line <= last.hostEndLine
      ? range.end
      : { line: last.hostEndLine, character: last.hostEndCharacter };
    return {
      start: this.toSynthetic(hostUri, languageId, start),
      end: this.toSynthetic(hostUri, languageId, end),
    };
  }

  #build(
    entry: HostEntry,
    languageId: string,
    regions: readonly HostRegion[],
    previous: SyntheticDocument | null,
    force = false,
  ): SyntheticDocument {
    const chunks = layoutChunks(regions, this.layout);
    const text = buildSyntheticText(splitLines(entry.host.getText()), chunks);
    if (!force && previous && previous.document.getText() === text && sameChunks(previous.chunks, chunks)) {
      return previous;
    }
    const hostUri = entry.host.uri;
    const uri = this.#identity.encode(hostUri, languageId);
    const document = previous
      ? TextDocument.create(uri, languageId, previous.document.version + 1, text)
      : TextDocument.create(uri, languageId, 1, text);
    const doc: SyntheticDocument = { uri, hostUri, languageId, document, chunks };
    entry.languages.set(languageId, doc);
    this.#logger.log(`[store] ${previous ? "rebuilt" : "created"} ${uri} v${document.version} chunks=${chunks.length}`);
    return doc;
  }

  #entry(hostUri: string): HostEntry {
    const entry = this.#hosts.get(hostUri);
    if (!entry) {
      throw new BridgeError(`unknown host document ${hostUri}`, BridgeErrorCode.UNKNOWN_HOST, hostUri);
    }
    return entry;
  }

  #require(hostUri: string, languageId: string): SyntheticDocument {
    const doc = this.#entry(hostUri).languages.get(languageId);
    if (!doc) {
      throw new BridgeError(`no ${languageId} document for ${hostUri}`, BridgeErrorCode.NO_SYNTHETIC_REGION, hostUri);
    }
    return doc;
  }
}

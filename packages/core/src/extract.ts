/**
 * Chunk extraction: scans host text line by line and reports the embedded
 * language regions it finds.
 *
 * Two kinds of markers are understood:
 * - fenced blocks (``` or ~~~, CommonMark style) whose info string names
 *   the language (`python`, `{python}`, `{r echo=FALSE}`, `{.ts}`),
 * - tag regions (`<script>` … `</script>`) with a fixed language.
 *
 * A region covers the lines strictly between its opening and closing
 * marker. Markers inside an open fenced block are content, not markers.
 */
import type { RegionProblem } from "./types.js";

/** A language region as found in the host, before synthetic layout. */
export interface HostRegion {
  readonly languageId: string;
  readonly hostStartLine: number;
  readonly hostEndLine: number;
  readonly hostStartCharacter: number;
  readonly hostEndCharacter: number;
}

export interface TagRegionRule {
  readonly languageId: string;
  readonly open: RegExp;
  readonly close: RegExp;
}

export interface RegionRules {
  /** Fence token (lower case) → language id. Unlisted tokens are used verbatim. */
  readonly fenceAliases: Readonly<Record<string, string>>;
  /** When set, only these language ids produce regions. */
  readonly languages: readonly string[] | null;
  readonly tags: readonly TagRegionRule[];
}

export interface ExtractionResult {
  readonly regions: HostRegion[];
  readonly problems: RegionProblem[];
}

export const DEFAULT_FENCE_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  py: "python",
  python3: "python",
  js: "javascript",
  mjs: "javascript",
  cjs: "javascript",
  jsx: "javascriptreact",
  ts: "typescript",
  mts: "typescript",
  tsx: "typescriptreact",
  sh: "shellscript",
  bash: "shellscript",
  zsh: "shellscript",
  shell: "shellscript",
  rs: "rust",
  golang: "go",
  rb: "ruby",
  yml: "yaml",
  jl: "julia",
  "c++": "cpp",
  md: "markdown",
});

export const DEFAULT_TAG_RULES: readonly TagRegionRule[] = Object.freeze([
  { languageId: "javascript", open: /<script\b[^>]*>/i, close: /<\/script\s*>/i },
  { languageId: "css", open: /<style\b[^>]*>/i, close: /<\/style\s*>/i },
]);

export function createRegionRules(overrides: Partial<RegionRules> = {}): RegionRules {
  return {
    fenceAliases: { ...DEFAULT_FENCE_ALIASES, ...(overrides.fenceAliases ?? {}) },
    languages: overrides.languages ?? null,
    tags: overrides.tags ?? DEFAULT_TAG_RULES,
  };
}

const FENCE_OPEN = /^( {0,3})(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

/**
 * Extract the language token from a fence info string.
 * Returns null for an empty info string.
 */
export function parseInfoString(info: string): string | null {
  let rest = info.trim();
  if (rest.startsWith("{")) {
    const close = rest.indexOf("}");
    rest = (close === -1 ? rest.slice(1) : rest.slice(1, close)).trim();
  }
  const token = rest.split(/[\s,]+/)[0] ?? "";
  const cleaned = token.replace(/^\./, "");
  return cleaned.length > 0 ? cleaned : null;
}

export function resolveLanguage(token: string | null, rules: RegionRules): string | null {
  if (token === null) return null;
  const languageId = rules.fenceAliases[token.toLowerCase()] ?? token;
  if (rules.languages && !rules.languages.includes(languageId)) return null;
  return languageId;
}

type OpenRegion =
  | { kind: "fence"; marker: string; length: number; languageId: string | null; line: number }
  | { kind: "tag"; rule: TagRegionRule; languageId: string | null; line: number };

/**
 * Scan `text` for embedded regions. Malformed regions are reported in
 * `problems` and skipped; every other region is still extracted.
 */
export function extractRegions(text: string, rules: RegionRules): ExtractionResult {
  const lines = splitLines(text);
  const found: HostRegion[] = [];
  const problems: RegionProblem[] = [];
  let open: OpenRegion | null = null;

  const emit = (languageId: string | null, openLine: number, closeLine: number) => {
    if (languageId === null) return;
    const start = openLine + 1;
    const end = closeLine - 1;
    // Zero-line regions are dropped.
    if (end < start) return;
    found.push({
      languageId,
      hostStartLine: start,
      hostEndLine: end,
      hostStartCharacter: 0,
      hostEndCharacter: (lines[end] ?? "").length,
    });
  };

  const malformed = (languageId: string | null, line: number, message: string) => {
    problems.push({ kind: "MalformedRegion", languageId, hostStartLine: line, message });
  };

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i] ?? "";

    if (open?.kind === "fence") {
      const close = FENCE_CLOSE.exec(line);
      const marker = close?.[1];
      if (marker && marker[0] === open.marker && marker.length >= open.length) {
        emit(open.languageId, open.line, i);
        open = null;
      }
      continue;
    }

    if (open?.kind === "tag") {
      if (open.rule.close.test(line)) {
        emit(open.languageId, open.line, i);
        open = null;
        continue;
      }
      const nested: TagRegionRule | undefined = rules.tags.find((rule) => rule.open.test(line));
      if (nested) {
        malformed(open.languageId, open.line, `region opened at line ${open.line} overlaps region opened at line ${i}`);
        open = { kind: "tag", rule: nested, languageId: resolveLanguage(nested.languageId, rules), line: i };
      }
      continue;
    }

    const fence = FENCE_OPEN.exec(line);
    if (fence) {
      const marker = fence[2] ?? "";
      const info = fence[3] ?? "";
      // A backtick fence cannot carry backticks in its info string.
      if (!(marker.startsWith("`") && info.includes("`"))) {
        open = {
          kind: "fence",
          marker: marker.charAt(0),
          length: marker.length,
          languageId: resolveLanguage(parseInfoString(info), rules),
          line: i,
        };
        continue;
      }
    }

    const tag = rules.tags.find((rule) => rule.open.test(line));
    if (tag) {
      // Open and close on one line leaves no lines between them.
      if (!tag.close.test(line)) {
        open = { kind: "tag", rule: tag, languageId: resolveLanguage(tag.languageId, rules), line: i };
      }
      continue;
    }

    const stray = rules.tags.find((rule) => rule.close.test(line));
    if (stray) {
      malformed(resolveLanguage(stray.languageId, rules), i, `closing marker at line ${i} has no opening marker`);
    }
  }

  if (open !== null && open.languageId !== null) {
    malformed(open.languageId, open.line, `region opened at line ${open.line} is never closed`);
  }

  return { regions: coalesce(found), problems };
}

/** Merge same-language regions that touch, so each chunk is maximal. */
function coalesce(regions: HostRegion[]): HostRegion[] {
  const sorted = [...regions].sort((a, b) => a.hostStartLine - b.hostStartLine);
  const merged: HostRegion[] = [];
  for (const region of sorted) {
    const prev = merged[merged.length - 1];
    if (prev && prev.languageId === region.languageId && prev.hostEndLine + 1 === region.hostStartLine) {
      merged[merged.length - 1] = {
        ...prev,
        hostEndLine: region.hostEndLine,
        hostEndCharacter: region.hostEndCharacter,
      };
      continue;
    }
    merged.push(region);
  }
  return merged;
}

/** Group regions by language, preserving host order. */
export function groupByLanguage(regions: readonly HostRegion[]): Map<string, HostRegion[]> {
  const groups = new Map<string, HostRegion[]>();
  for (const region of regions) {
    const group = groups.get(region.languageId);
    if (group) {
      group.push(region);
    } else {
      groups.set(region.languageId, [region]);
    }
  }
  return groups;
}

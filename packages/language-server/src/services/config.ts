import { isRecord, type Logger, type SyntheticLayout } from "@polyglot-bridge/core";
import type { DisposableLike } from "./disposables.js";
import { SimpleEmitter, type Listener } from "./events.js";
import { isLogLevel, type LogLevel } from "./logger.js";

/** How to start the language server of one embedded language. */
export interface ServerSpec {
  command: string;
  args: string[];
  initializationOptions?: unknown;
}

export interface BridgeConfig {
  layout: SyntheticLayout;
  aliasScheme: string;
  /** Allow-list of language ids; null extracts every language. */
  languages: string[] | null;
  fenceAliases: Record<string, string>;
  extensions: Record<string, string>;
  servers: Record<string, ServerSpec>;
  logging: {
    level: LogLevel;
  };
}

export const CONFIG_SECTION = "polyglot";

export const DEFAULT_CONFIG: BridgeConfig = {
  layout: "aligned",
  aliasScheme: "polyglot",
  languages: null,
  fenceAliases: {},
  extensions: {
    python: "py",
    javascript: "js",
    typescript: "ts",
    r: "R",
    shellscript: "sh",
    css: "css",
  },
  servers: {
    python: { command: "pyright-langserver", args: ["--stdio"] },
    javascript: { command: "typescript-language-server", args: ["--stdio"] },
    typescript: { command: "typescript-language-server", args: ["--stdio"] },
    css: { command: "vscode-css-language-server", args: ["--stdio"] },
    shellscript: { command: "bash-language-server", args: ["start"] },
  },
  logging: {
    level: "info",
  },
};

const LAYOUTS: readonly SyntheticLayout[] = ["aligned", "compact"];
const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*$/;

/** Value at a dotted key path, or undefined. */
function lookup(settings: unknown, key: string): unknown {
  let current = settings;
  for (const part of key.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function readLayout(value: unknown): SyntheticLayout {
  return LAYOUTS.find((layout) => layout === value) ?? DEFAULT_CONFIG.layout;
}

function readScheme(value: unknown): string {
  return typeof value === "string" && SCHEME_PATTERN.test(value) ? value : DEFAULT_CONFIG.aliasScheme;
}

function readLanguages(value: unknown): string[] | null {
  if (!Array.isArray(value)) return DEFAULT_CONFIG.languages;
  return value.filter((entry): entry is string => typeof entry === "string" && entry.length > 0);
}

function readStringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(value)) return out;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string" && entry.length > 0) out[key] = entry;
  }
  return out;
}

function readServerSpec(value: unknown): ServerSpec | null {
  if (!isRecord(value) || typeof value.command !== "string" || value.command.length === 0) return null;
  const args = Array.isArray(value.args) ? value.args.map((arg) => String(arg)) : [];
  return value.initializationOptions === undefined
    ? { command: value.command, args }
    : { command: value.command, args, initializationOptions: value.initializationOptions };
}

/** Configured servers override the defaults per language; `null` removes one. */
function readServers(value: unknown): Record<string, ServerSpec> {
  const servers: Record<string, ServerSpec> = { ...DEFAULT_CONFIG.servers };
  if (!isRecord(value)) return servers;
  for (const [languageId, entry] of Object.entries(value)) {
    if (entry === null) {
      delete servers[languageId];
      continue;
    }
    const spec = readServerSpec(entry);
    if (spec) servers[languageId] = spec;
  }
  return servers;
}

/** Read settings, falling back to defaults for anything missing or ill-typed. */
export function readConfig(settings: unknown): BridgeConfig {
  const level = lookup(settings, "logging.level");
  return {
    layout: readLayout(lookup(settings, "layout")),
    aliasScheme: readScheme(lookup(settings, "aliasScheme")),
    languages: readLanguages(lookup(settings, "languages")),
    fenceAliases: readStringRecord(lookup(settings, "fenceAliases")),
    extensions: { ...DEFAULT_CONFIG.extensions, ...readStringRecord(lookup(settings, "extensions")) },
    servers: readServers(lookup(settings, "servers")),
    logging: {
      level: isLogLevel(level) ? level : DEFAULT_CONFIG.logging.level,
    },
  };
}

export class ConfigService {
  #current: BridgeConfig;
  readonly #logger: Logger;
  readonly #emitter: SimpleEmitter<BridgeConfig>;

  constructor(logger: Logger, settings?: unknown) {
    this.#logger = logger;
    this.#current = readConfig(settings);
    this.#emitter = new SimpleEmitter((e) => {
      this.#logger.error(`[config] change listener failed: ${e instanceof Error ? e.message : String(e)}`);
    });
  }

  get current(): BridgeConfig {
    return this.#current;
  }

  update(settings: unknown): BridgeConfig {
    this.#current = readConfig(settings);
    const servers = Object.keys(this.#current.servers).join(",") || "<none>";
    this.#logger.info(`[config] layout=${this.#current.layout} scheme=${this.#current.aliasScheme} servers=${servers}`);
    this.#emitter.emit(this.#current);
    return this.#current;
  }

  onDidChange(listener: Listener<BridgeConfig>): DisposableLike {
    return this.#emitter.on(listener);
  }
}

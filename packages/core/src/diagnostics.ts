import { DiagnosticSeverity, type Diagnostic, type PublishDiagnosticsParams } from "vscode-languageserver/node.js";
import { formatError, isBridgeError } from "./errors.js";
import type { IdentityScheme } from "./identity.js";
import type { SyntheticDocumentStore } from "./synthetic-store.js";
import { NOOP_LOGGER, type Logger, type RegionProblem } from "./types.js";

export interface DiagnosticsMergerOptions {
  store: SyntheticDocumentStore;
  identity: IdentityScheme;
  logger?: Logger;
  /** `source` given to diagnostics about malformed regions. */
  source?: string;
}

export const REGION_DIAGNOSTIC_SOURCE = "polyglot-bridge";

/**
 * Collects diagnostics published against synthetic documents and
 * republishes them against the host, merged across languages. Each
 * language's latest set replaces its previous one.
 */
export class DiagnosticsMerger {
  readonly #store: SyntheticDocumentStore;
  readonly #identity: IdentityScheme;
  readonly #logger: Logger;
  readonly #source: string;
  readonly #byHost = new Map<string, Map<string, Diagnostic[]>>();

  constructor(options: DiagnosticsMergerOptions) {
    this.#store = options.store;
    this.#identity = options.identity;
    this.#logger = options.logger ?? NOOP_LOGGER;
    this.#source = options.source ?? REGION_DIAGNOSTIC_SOURCE;
  }

  /**
   * Accept a downstream publish. Returns the merged host publish, or the
   * params untouched when they do not name an alias of an open host.
   */
  accept(params: PublishDiagnosticsParams): PublishDiagnosticsParams {
    const target = this.#identity.tryDecode(params.uri);
    if (!target) return params;
    if (!this.#store.has(target.hostUri)) {
      this.#logger.log(`[diagnostics] ignoring publish for closed host ${target.hostUri}`);
      return params;
    }

    const mapped: Diagnostic[] = [];
    let dropped = 0;
    for (const diagnostic of params.diagnostics) {
      const translated = this.#translate(diagnostic, target.hostUri, target.languageId);
      if (translated) {
        mapped.push(translated);
      } else {
        dropped += 1;
      }
    }
    if (dropped > 0) {
      this.#logger.warn(`[diagnostics] dropped ${dropped} unmappable diagnostic(s) from ${params.uri}`);
    }

    let languages = this.#byHost.get(target.hostUri);
    if (!languages) {
      languages = new Map();
      this.#byHost.set(target.hostUri, languages);
    }
    languages.set(target.languageId, mapped);
    return this.publish(target.hostUri);
  }

  /** Drop one language's diagnostics (or all of them) for a host. */
  clear(hostUri: string, languageId?: string): PublishDiagnosticsParams {
    if (languageId === undefined) {
      this.#byHost.delete(hostUri);
    } else {
      this.#byHost.get(hostUri)?.delete(languageId);
    }
    return this.publish(hostUri);
  }

  /** The merged diagnostics of a host, region problems included. */
  publish(hostUri: string): PublishDiagnosticsParams {
    const diagnostics: Diagnostic[] = this.#store.problems(hostUri).map((problem) => this.#problem(problem));
    for (const list of this.#byHost.get(hostUri)?.values() ?? []) {
      diagnostics.push(...list);
    }
    return { uri: hostUri, diagnostics };
  }

  forgetHost(hostUri: string): void {
    this.#byHost.delete(hostUri);
  }

  #translate(diagnostic: Diagnostic, hostUri: string, languageId: string): Diagnostic | null {
    try {
      const out: Diagnostic = {
        ...diagnostic,
        range: this.#store.toHostRange(hostUri, languageId, diagnostic.range),
        source: diagnostic.source ?? languageId,
      };
      if (diagnostic.relatedInformation) {
        out.relatedInformation = diagnostic.relatedInformation.flatMap((info) => {
          const related = this.#identity.tryDecode(info.location.uri);
          if (!related) return [info];
          const range = this.#store.toHostRange(related.hostUri, related.languageId, info.location.range);
          return [{ ...info, location: { uri: related.hostUri, range } }];
        });
      }
      return out;
    } catch (e) {
      if (!isBridgeError(e)) throw e;
      this.#logger.log(`[diagnostics] ${formatError(e)}`);
      return null;
    }
  }

  #problem(problem: RegionProblem): Diagnostic {
    return {
      range: {
        start: { line: problem.hostStartLine, character: 0 },
        end: { line: problem.hostStartLine + 1, character: 0 },
      },
      severity: DiagnosticSeverity.Warning,
      source: this.#source,
      message: problem.message,
    };
  }
}

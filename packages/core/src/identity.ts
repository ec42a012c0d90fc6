import { BridgeError, BridgeErrorCode } from "./errors.js";

export const DEFAULT_ALIAS_SCHEME = "polyglot";

export interface DecodedAlias {
  readonly hostUri: string;
  readonly languageId: string;
}

export interface IdentitySchemeOptions {
  scheme?: string;
  /** Language id → file extension appended as a trailing `embedded.<ext>` segment. */
  extensions?: Readonly<Record<string, string>>;
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*$/;
const FILE_SEGMENT = "embedded";

/**
 * Reversible encoding of (host uri, language id) into a single uri string:
 *
 *   <scheme>://<encodeURIComponent(host)>/<encodeURIComponent(language)>[/embedded.<ext>]
 *
 * Both parts are percent-encoded, so neither can contain a `/` and the
 * encoding is injective whatever characters the host uri carries.
 */
export class IdentityScheme {
  readonly scheme: string;
  readonly #prefix: string;
  readonly #extensions: Readonly<Record<string, string>>;

  constructor(options: IdentitySchemeOptions = {}) {
    const scheme = (options.scheme ?? DEFAULT_ALIAS_SCHEME).toLowerCase();
    if (!SCHEME_PATTERN.test(scheme)) {
      throw new Error(`IdentityScheme: invalid uri scheme "${scheme}"`);
    }
    this.scheme = scheme;
    this.#prefix = `${scheme}://`;
    this.#extensions = { ...(options.extensions ?? {}) };
  }

  encode(hostUri: string, languageId: string): string {
    const base = `${this.#prefix}${encodeURIComponent(hostUri)}/${encodeURIComponent(languageId)}`;
    const ext = this.#extensions[languageId];
    return ext ? `${base}/${FILE_SEGMENT}.${encodeURIComponent(ext)}` : base;
  }

  decode(alias: string): DecodedAlias {
    const decoded = this.tryDecode(alias);
    if (!decoded) {
      throw new BridgeError(`not an embedded document alias: ${alias}`, BridgeErrorCode.NOT_AN_ALIAS, alias);
    }
    return decoded;
  }

  tryDecode(candidate: unknown): DecodedAlias | null {
    if (typeof candidate !== "string" || !candidate.startsWith(this.#prefix)) return null;
    const segments = candidate.slice(this.#prefix.length).split("/");
    if (segments.length < 2 || segments.length > 3) return null;
    const [host, language, file] = segments;
    if (!host || !language) return null;
    if (file !== undefined && !file.startsWith(`${FILE_SEGMENT}.`)) return null;
    try {
      return { hostUri: decodeURIComponent(host), languageId: decodeURIComponent(language) };
    } catch {
      // Malformed percent-encoding: not something encode() produced.
      return null;
    }
  }

  isAlias(candidate: unknown): boolean {
    return this.tryDecode(candidate) !== null;
  }

  /** Host uri for `uri`: decoded when it is an alias, unchanged otherwise. */
  toHostUri(uri: string): string {
    return this.tryDecode(uri)?.hostUri ?? uri;
  }
}

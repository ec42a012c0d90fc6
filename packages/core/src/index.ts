// Types
export type {
  Chunk,
  HostDocumentSource,
  LineRange,
  Logger,
  Position,
  Range,
  RegionProblem,
  SyntheticDocument,
  SyntheticLayout,
  TranslationContext,
} from "./types.js";
export { NOOP_LOGGER } from "./types.js";

// Errors and feature responses
export { BridgeError, BridgeErrorCode, formatError, isBridgeError, type BridgeErrorCodeType } from "./errors.js";
export {
  degradation,
  degradationFromError,
  isDegradation,
  isNotApplicable,
  isSuccess,
  notApplicable,
  successOr,
  NOT_APPLICABLE,
  type Degradation,
  type FeatureResponse,
  type NotApplicable,
} from "./feature-response.js";

// Extraction
export {
  createRegionRules,
  extractRegions,
  groupByLanguage,
  parseInfoString,
  resolveLanguage,
  splitLines,
  DEFAULT_FENCE_ALIASES,
  DEFAULT_TAG_RULES,
  type ExtractionResult,
  type HostRegion,
  type RegionRules,
  type TagRegionRule,
} from "./extract.js";

// Identity
export { IdentityScheme, DEFAULT_ALIAS_SCHEME, type DecodedAlias, type IdentitySchemeOptions } from "./identity.js";

// Store
export {
  SyntheticDocumentStore,
  buildSyntheticText,
  chunkLineCount,
  layoutChunks,
  type SyncResult,
  type SyntheticStoreOptions,
} from "./synthetic-store.js";

// Routing and translation
export { RequestRouter, type RequestRouterOptions, type RoutedRequest } from "./router.js";
export { ResponseTranslator, LOCATION_METHODS, type ResponseTranslatorOptions, type Translation } from "./translator.js";
export { DiagnosticsMerger, REGION_DIAGNOSTIC_SOURCE, type DiagnosticsMergerOptions } from "./diagnostics.js";
export { isPosition, isRange, isRecord, normalizeCompletion, normalizeResponse, type NormalizedResponse } from "./shapes.js";
export { changedLineRange } from "./text.js";

// Bridge
export {
  PolyglotBridge,
  createPolyglotBridge,
  type CreateBridgeOptions,
  type EmbeddedServerTransport,
  type PolyglotBridgeOptions,
} from "./bridge.js";

/**
 * FeatureResponse: the result shape of every bridged request.
 *
 * FeatureResponse<T> = T | Degradation | NotApplicable
 *
 * - T: the translated payload, already in host coordinates.
 * - NotApplicable: no embedded language covers the position (cursor in
 *   prose) or no server is registered for it. Nothing was sent.
 * - Degradation: the request was routed but the payload could not be
 *   mapped back (stale chunk table after an edit race).
 *
 * Upstream protocol errors are not a FeatureResponse; they propagate as-is.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Degradation ladder:
 * - Rung 2 = partial result (some items were dropped during translation)
 * - Rung 3 = no result (the whole payload could not be translated)
 */
export interface Degradation {
  readonly __degraded: true;
  readonly rung: 2 | 3;
  readonly what: string;
  readonly why: string;
}

/** Legitimate silence: nothing embedded at the position. Not an error. */
export interface NotApplicable {
  readonly __notApplicable: true;
  readonly reason: string;
}

export type FeatureResponse<T> = T | Degradation | NotApplicable;

// ============================================================================
// Type Guards
// ============================================================================

export function isDegradation(value: unknown): value is Degradation {
  if (value === null || value === undefined || typeof value !== "object") return false;
  return "__degraded" in value && value.__degraded === true;
}

export function isNotApplicable(value: unknown): value is NotApplicable {
  if (value === null || value === undefined || typeof value !== "object") return false;
  return "__notApplicable" in value && value.__notApplicable === true;
}

export function isSuccess<T>(response: FeatureResponse<T>): response is T {
  return !isDegradation(response) && !isNotApplicable(response);
}

// ============================================================================
// Factory Functions
// ============================================================================

export function degradation(rung: 2 | 3, what: string, why: string): Degradation {
  return { __degraded: true, rung, what, why };
}

export function notApplicable(reason: string): NotApplicable {
  return { __notApplicable: true, reason };
}

export const NOT_APPLICABLE: NotApplicable = Object.freeze(notApplicable("no embedded language at position"));

/** Wrap a caught exception as a rung 3 degradation. */
export function degradationFromError(featureName: string, error: unknown): Degradation {
  const why = error instanceof Error ? error.message : String(error);
  return degradation(3, featureName, why);
}

/** Collapse a FeatureResponse to the value an LSP handler returns. */
export function successOr<T, F>(response: FeatureResponse<T>, fallback: F): T | F {
  return isSuccess(response) ? response : fallback;
}

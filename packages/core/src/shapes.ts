/**
 * Structural guards for protocol payloads, plus the one place where
 * single-vs-list response shapes are normalized.
 */
import type { Position, Range } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isPosition(value: unknown): value is Position {
  return isRecord(value) && typeof value.line === "number" && typeof value.character === "number";
}

export function isRange(value: unknown): value is Range {
  return isRecord(value) && isPosition(value.start) && isPosition(value.end);
}

/**
 * A response as a flat item sequence plus the inverse that restores the
 * original shape (single object or array).
 */
export interface NormalizedResponse<T> {
  readonly items: T[];
  restore(items: readonly T[]): unknown;
}

export function normalizeResponse(response: unknown): NormalizedResponse<unknown> {
  if (Array.isArray(response)) {
    return { items: [...response], restore: (items) => [...items] };
  }
  // A single item that failed translation restores to null.
  return { items: [response], restore: (items) => items[0] ?? null };
}

/** Items of a completion response, whether a bare array or a CompletionList. */
export function normalizeCompletion(response: unknown): NormalizedResponse<unknown> {
  if (isRecord(response) && Array.isArray(response.items)) {
    const list = response;
    return { items: [...response.items], restore: (items) => ({ ...list, items: [...items] }) };
  }
  return normalizeResponse(response);
}

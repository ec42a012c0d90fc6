import { splitLines } from "./extract.js";
import type { LineRange } from "./types.js";

// Line-level diff helpers for host edits.

/**
 * The host lines touched by replacing `oldText` with `newText`: everything
 * between the longest common line prefix and suffix. The end covers the
 * longer of the two documents' changed spans. Null when nothing changed.
 */
export function changedLineRange(oldText: string, newText: string): LineRange | null {
  if (oldText === newText) return null;
  const before = splitLines(oldText);
  const after = splitLines(newText);
  const shorter = Math.min(before.length, after.length);

  let prefix = 0;
  while (prefix < shorter && before[prefix] === after[prefix]) prefix += 1;

  let suffix = 0;
  while (
    suffix < shorter - prefix
    && before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix += 1;
  }

  const oldEnd = before.length - suffix - 1;
  const newEnd = after.length - suffix - 1;
  return { start: prefix, end: Math.max(prefix, oldEnd, newEnd) };
}

import type { StateChanges, StateResult } from "../types.js";

export function newResult(name: string): StateResult {
  return { name, result: null, comment: "", changes: {} };
}

/** Single-quote a value for a result comment. */
export function quoted(value: string): string {
  return `'${value}'`;
}

export function hasChanges(changes: StateChanges): boolean {
  return Object.keys(changes).length > 0;
}

/**
 * One display line per change: `new: a, b` for installs, `name: action`
 * otherwise. Empty package lists (the `old` side of an install) are skipped.
 */
export function describeChanges(changes: StateChanges): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(changes)) {
    if (Array.isArray(value)) {
      if (value.length > 0) lines.push(`${key}: ${value.join(", ")}`);
    } else {
      lines.push(`${key}: ${value}`);
    }
  }
  return lines;
}

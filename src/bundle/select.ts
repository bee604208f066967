import { EmptySelectionError, IndexOutOfRangeError } from "./errors.js";
import type { Bundle, Selection } from "./types.js";

const INTEGER = /^[+-]?\d+$/;

/** Parses a comma-separated index list such as `0,2,-1`. Blank tokens are ignored. */
export function parseIndexList(value: string): number[] {
  const indices: number[] = [];
  for (const token of value.split(",")) {
    const trimmed = token.trim();
    if (!trimmed) {
      continue;
    }
    if (!INTEGER.test(trimmed)) {
      throw new Error(`Invalid bundle index "${trimmed}": expected comma-separated integers`);
    }
    indices.push(Number.parseInt(trimmed, 10));
  }
  return indices;
}

/**
 * Resolves requested indices against `count` bundles. Negative indices count
 * from the end. The result keeps the order indices were first requested in.
 */
export function resolveSelection(count: number, requested: Selection = "all"): number[] {
  if (requested === "all") {
    return Array.from({ length: count }, (_, index) => index);
  }
  if (requested.length === 0) {
    throw new EmptySelectionError();
  }

  const resolved: number[] = [];
  const seen = new Set<number>();
  for (const index of requested) {
    const normalized = index < 0 ? count + index : index;
    if (!Number.isInteger(index) || normalized < 0 || normalized >= count) {
      throw new IndexOutOfRangeError(index, count);
    }
    if (!seen.has(normalized)) {
      seen.add(normalized);
      resolved.push(normalized);
    }
  }
  return resolved;
}

export function selectBundles(bundles: readonly Bundle[], requested: Selection = "all"): Bundle[] {
  return resolveSelection(bundles.length, requested).map((index) => bundles[index]);
}

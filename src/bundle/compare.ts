import { hex } from "../utils/format.js";
import { PatchVerificationError } from "./errors.js";
import { scanBundles, toBuffer } from "./scan.js";
import type { Bundle } from "./types.js";

export interface Comparison {
  bundles: Bundle[];
  /** Indices of bundles whose bytes differ between original and patched. */
  changed: number[];
}

function firstDifference(a: Buffer, b: Buffer, from: number, to: number): number {
  for (let offset = from; offset < to; offset += 1) {
    if (a[offset] !== b[offset]) {
      return offset;
    }
  }
  return -1;
}

function assertSegmentEqual(original: Buffer, patched: Buffer, from: number, to: number): void {
  if (from >= to || original.subarray(from, to).equals(patched.subarray(from, to))) {
    return;
  }
  const offset = firstDifference(original, patched, from, to);
  throw new PatchVerificationError(`Patched blob differs outside certificate bundles at ${hex(offset)}`, offset);
}

/**
 * Checks that `patched` could have come from patching bundles of `original`:
 * same length, and identical bytes everywhere outside the original bundles.
 */
export function compareWithOriginal(original: Uint8Array, patched: Uint8Array): Comparison {
  const before = toBuffer(original);
  const after = toBuffer(patched);
  if (before.length !== after.length) {
    throw new PatchVerificationError(`Patched blob is ${after.length} bytes, original is ${before.length}`);
  }

  const bundles = scanBundles(before);
  const changed: number[] = [];
  let cursor = 0;
  for (const bundle of bundles) {
    assertSegmentEqual(before, after, cursor, bundle.start);
    if (!before.subarray(bundle.start, bundle.end).equals(after.subarray(bundle.start, bundle.end))) {
      changed.push(bundle.index);
    }
    cursor = bundle.end;
  }
  assertSegmentEqual(before, after, cursor, before.length);
  return { bundles, changed };
}

/** True when the bundle range holds `replacement` followed only by NUL bytes. */
export function matchesReplacement(patched: Uint8Array, bundle: Bundle, replacement: Uint8Array): boolean {
  const data = toBuffer(patched);
  const region = data.subarray(bundle.start, bundle.end);
  if (replacement.length > region.length) {
    return false;
  }
  if (!region.subarray(0, replacement.length).equals(toBuffer(replacement))) {
    return false;
  }
  return region.subarray(replacement.length).every((byte) => byte === 0);
}

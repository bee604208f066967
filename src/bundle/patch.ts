import { hex } from "../utils/format.js";
import { NoBundlesFoundError, OversizeReplacementError, UndersizeReplacementError } from "./errors.js";
import { scanBundles, toBuffer } from "./scan.js";
import { selectBundles } from "./select.js";
import type {
  Bundle,
  PatchOptions,
  PatchPlanEntry,
  PatchRecord,
  PatchResult,
  ReconciliationOutcome,
  ReplaceOptions,
  ReplaceResult
} from "./types.js";

function reconcile(originalLength: number, replacementLength: number, strict: boolean): ReconciliationOutcome {
  if (replacementLength > originalLength) {
    return "oversize";
  }
  if (replacementLength === originalLength) {
    return "exact";
  }
  return strict ? "undersize" : "padded";
}

export function planPatch(targets: readonly Bundle[], replacementLength: number, options: PatchOptions = {}): PatchPlanEntry[] {
  const strict = options.strict ?? false;
  return targets.map((bundle, planIndex) => {
    const originalLength = bundle.end - bundle.start;
    return {
      planIndex,
      bundle,
      originalLength,
      replacementLength,
      outcome: reconcile(originalLength, replacementLength, strict)
    };
  });
}

function assertWithin(bundle: Bundle, size: number): void {
  if (bundle.start < 0 || bundle.start > bundle.end || bundle.end > size) {
    throw new RangeError(`Bundle #${bundle.index} @${hex(bundle.start)}-${hex(bundle.end)} lies outside a ${size}-byte blob`);
  }
}

/**
 * Writes `replacement` over every target range of a copy of `blob`. Shorter
 * replacements are NUL-padded unless strict, so the output is always the
 * same length as the input and all targets use their original offsets.
 */
export function patchBlob(
  blob: Uint8Array,
  targets: readonly Bundle[],
  replacement: Uint8Array,
  options: PatchOptions = {}
): PatchResult {
  for (const bundle of targets) {
    assertWithin(bundle, blob.length);
  }

  const plan = planPatch(targets, replacement.length, options);
  for (const entry of plan) {
    const details = {
      planIndex: entry.planIndex,
      start: entry.bundle.start,
      end: entry.bundle.end,
      originalLength: entry.originalLength,
      replacementLength: entry.replacementLength
    };
    if (entry.outcome === "oversize") {
      throw new OversizeReplacementError(details);
    }
    if (entry.outcome === "undersize") {
      throw new UndersizeReplacementError(details);
    }
  }

  const output = Buffer.from(toBuffer(blob));
  const records: PatchRecord[] = [];
  for (const entry of plan) {
    const { start, end } = entry.bundle;
    output.set(replacement, start);
    output.fill(0, start + replacement.length, end);
    records.push({
      planIndex: entry.planIndex,
      bundleIndex: entry.bundle.index,
      start,
      end,
      originalLength: entry.originalLength,
      replacementLength: entry.replacementLength,
      padded: entry.outcome === "padded"
    });
  }
  return { output, records };
}

/** Scans `blob`, selects bundles by `options.indices` (all by default) and patches them. */
export function replaceBundles(blob: Uint8Array, replacement: Uint8Array, options: ReplaceOptions = {}): ReplaceResult {
  const bundles = scanBundles(blob);
  if (bundles.length === 0) {
    throw new NoBundlesFoundError();
  }
  const targets = selectBundles(bundles, options.indices ?? "all");
  const { output, records } = patchBlob(blob, targets, replacement, { strict: options.strict });
  return { output, bundles, records };
}

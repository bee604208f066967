export interface Bundle {
  /** Position in scan order. */
  index: number;
  start: number;
  end: number;
  /** Number of PEM blocks merged into this bundle. */
  certificates: number;
}

export type Selection = readonly number[] | "all";

export type ReconciliationOutcome = "exact" | "padded" | "oversize" | "undersize";

export interface PatchPlanEntry {
  planIndex: number;
  bundle: Bundle;
  originalLength: number;
  replacementLength: number;
  outcome: ReconciliationOutcome;
}

export interface PatchRecord {
  planIndex: number;
  bundleIndex: number;
  start: number;
  end: number;
  originalLength: number;
  replacementLength: number;
  padded: boolean;
}

export interface PatchOptions {
  /** Reject replacements shorter than the original range instead of NUL-padding them. */
  strict?: boolean;
}

export interface ReplaceOptions extends PatchOptions {
  indices?: Selection;
}

export interface PatchResult {
  output: Buffer;
  records: PatchRecord[];
}

export interface ReplaceResult extends PatchResult {
  bundles: Bundle[];
}

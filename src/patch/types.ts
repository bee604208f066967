import type { Bundle, PatchRecord, Selection } from "../bundle/types.js";

export interface ScanOptions {
  input: string;
}

export interface ScanSummary {
  size: number;
  sha256: string;
  bundles: Bundle[];
}

export interface ApplyOptions {
  input: string;
  certs: string;
  output: string;
  indices?: Selection;
  strict?: boolean;
}

export interface ApplySummary {
  output: string;
  bundleCount: number;
  records: PatchRecord[];
  sha256: string;
}

export interface VerifyOptions {
  original: string;
  patched: string;
  /** When set, every changed bundle must hold exactly these bytes plus NUL padding. */
  certs?: string;
}

export interface VerifySummary {
  bundles: Bundle[];
  changed: number[];
}

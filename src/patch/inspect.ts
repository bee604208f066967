import path from "node:path";
import { scanBundles } from "../bundle/scan.js";
import { readBytes } from "../utils/fs.js";
import { hashBytes } from "../utils/hash.js";
import type { ScanOptions, ScanSummary } from "./types.js";

export async function inspectBundles(options: ScanOptions): Promise<ScanSummary> {
  const blob = await readBytes(path.resolve(options.input), "Input");
  return { size: blob.length, sha256: hashBytes(blob), bundles: scanBundles(blob) };
}

import path from "node:path";
import { replaceBundles } from "../bundle/patch.js";
import { readBytes, writeBytes } from "../utils/fs.js";
import { hashBytes } from "../utils/hash.js";
import type { ApplyOptions, ApplySummary } from "./types.js";

/**
 * Patches the input blob and writes the result. The output is written only
 * after every selected bundle has been patched.
 */
export async function applyCertPatch(options: ApplyOptions): Promise<ApplySummary> {
  const input = path.resolve(options.input);
  const certs = path.resolve(options.certs);
  const output = path.resolve(options.output);
  if (input === output) {
    throw new Error(`Output path must differ from input: ${output}`);
  }

  const blob = await readBytes(input, "Input");
  const replacement = await readBytes(certs, "Replacement bundle");
  const result = replaceBundles(blob, replacement, { indices: options.indices, strict: options.strict });
  await writeBytes(output, result.output);

  return {
    output,
    bundleCount: result.bundles.length,
    records: result.records,
    sha256: hashBytes(result.output)
  };
}

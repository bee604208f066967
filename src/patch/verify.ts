import path from "node:path";
import { compareWithOriginal, matchesReplacement } from "../bundle/compare.js";
import { PatchVerificationError } from "../bundle/errors.js";
import { hex } from "../utils/format.js";
import { readBytes } from "../utils/fs.js";
import type { VerifyOptions, VerifySummary } from "./types.js";

export async function verifyCertPatch(options: VerifyOptions): Promise<VerifySummary> {
  const original = await readBytes(path.resolve(options.original), "Original");
  const patched = await readBytes(path.resolve(options.patched), "Patched");

  const { bundles, changed } = compareWithOriginal(original, patched);

  if (options.certs !== undefined) {
    const replacement = await readBytes(path.resolve(options.certs), "Replacement bundle");
    for (const index of changed) {
      const bundle = bundles[index];
      if (!matchesReplacement(patched, bundle, replacement)) {
        throw new PatchVerificationError(
          `Bundle #${index} @${hex(bundle.start)}-${hex(bundle.end)} does not hold the replacement bundle`,
          bundle.start
        );
      }
    }
  }

  return { bundles, changed };
}

#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { parseIndexList } from "./bundle/select.js";
import { applyCertPatch } from "./patch/apply.js";
import { inspectBundles } from "./patch/inspect.js";
import { verifyCertPatch } from "./patch/verify.js";
import { hex } from "./utils/format.js";

function parseIndexOption(value: string): number[] {
  try {
    return parseIndexList(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

const program = new Command();

program
  .name("certpatch")
  .description("Locate and replace embedded PEM certificate bundles in binary images.")
  .version("0.1.0");

program
  .command("scan")
  .description("List the certificate bundles found in a binary.")
  .requiredOption("--in <file>", "Binary to scan")
  .action(async (opts: { in: string }) => {
    try {
      const summary = await inspectBundles({ input: opts.in });
      console.log(`${opts.in}: ${summary.size} bytes, sha256 ${summary.sha256}`);
      for (const bundle of summary.bundles) {
        console.log(
          `#${bundle.index} @${hex(bundle.start)}-${hex(bundle.end)} ` +
            `${bundle.end - bundle.start} bytes, ${bundle.certificates} certificate(s)`
        );
      }
      console.log(`${summary.bundles.length} bundle(s) found`);
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  });

program
  .command("patch")
  .description("Replace certificate bundles with a new PEM bundle.")
  .requiredOption("--in <file>", "Original binary")
  .requiredOption("--certs <pem>", "Replacement PEM bundle")
  .requiredOption("--out <file>", "Patched output")
  .option("--index <list>", "Comma-separated bundle numbers to patch (default: all)", parseIndexOption)
  .option("--strict", "Abort if the replacement is shorter than the original (no NUL padding)", false)
  .action(
    async (opts: { in: string; certs: string; out: string; index?: number[]; strict: boolean }) => {
      try {
        const summary = await applyCertPatch({
          input: opts.in,
          certs: opts.certs,
          output: opts.out,
          indices: opts.index,
          strict: opts.strict
        });
        for (const record of summary.records) {
          console.log(
            `Patched bundle #${record.planIndex} @${hex(record.start)}-${hex(record.end)} ` +
              `with ${record.replacementLength} bytes (kept ${record.originalLength})`
          );
        }
        console.log(`${summary.output} written: ${summary.records.length} of ${summary.bundleCount} bundle(s) patched`);
        console.log(`sha256 ${summary.sha256}`);
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = 1;
      }
    }
  );

program
  .command("verify")
  .description("Check that a patched binary only differs from the original inside certificate bundles.")
  .requiredOption("--original <file>", "Original binary")
  .requiredOption("--patched <file>", "Patched binary")
  .option("--certs <pem>", "Require every changed bundle to hold this PEM bundle")
  .action(async (opts: { original: string; patched: string; certs?: string }) => {
    try {
      const summary = await verifyCertPatch({
        original: opts.original,
        patched: opts.patched,
        certs: opts.certs
      });
      console.log(
        `Verification successful: ${summary.changed.length} of ${summary.bundles.length} bundle(s) changed` +
          (summary.changed.length ? ` (${summary.changed.map((index) => `#${index}`).join(", ")})` : "")
      );
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);

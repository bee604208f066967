import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import { applyCertPatch } from "../src/patch/apply.js";
import { inspectBundles } from "../src/patch/inspect.js";
import { verifyCertPatch } from "../src/patch/verify.js";
import { UndersizeReplacementError } from "../src/bundle/errors.js";
import { hashBytes } from "../src/utils/hash.js";
import { blobOf, certBlock } from "./helpers.js";

const rootsA = certBlock("A".repeat(48));
const rootsB = certBlock("B".repeat(48));
const firmware = blobOf(Buffer.from([0x7f, 0x45, 0x4c, 0x46, 0x00]), rootsA, "\n", rootsB, "\0\0\0", rootsA, "\xff\xfe");
const replacement = Buffer.from(certBlock("N".repeat(16)), "latin1");

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "certpatch-test-"));
  try {
    await run(tempRoot);
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
}

async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

test("scan lists bundles of a file", async () => {
  await withTempDir(async (dir) => {
    const input = path.join(dir, "firmware.bin");
    await writeFile(input, firmware);
    const summary = await inspectBundles({ input });
    assert.equal(summary.size, firmware.length);
    assert.equal(summary.sha256, hashBytes(firmware));
    assert.deepEqual(
      summary.bundles.map((bundle) => bundle.certificates),
      [2, 1]
    );
  });
});

test("patch every bundle of a file", async () => {
  await withTempDir(async (dir) => {
    const input = path.join(dir, "firmware.bin");
    const certs = path.join(dir, "roots.pem");
    const output = path.join(dir, "out", "patched.bin");
    await writeFile(input, firmware);
    await writeFile(certs, replacement);

    const summary = await applyCertPatch({ input, certs, output });
    const written = await fs.readFile(output);

    assert.equal(written.length, firmware.length);
    assert.equal(summary.bundleCount, 2);
    assert.equal(summary.records.length, 2);
    assert.ok(summary.records.every((record) => record.padded));
    assert.equal(summary.sha256, hashBytes(written));

    const verified = await verifyCertPatch({ original: input, patched: output, certs });
    assert.deepEqual(verified.changed, [0, 1]);
  });
});

test("patch only the last bundle", async () => {
  await withTempDir(async (dir) => {
    const input = path.join(dir, "firmware.bin");
    const certs = path.join(dir, "roots.pem");
    const output = path.join(dir, "patched.bin");
    await writeFile(input, firmware);
    await writeFile(certs, replacement);

    const summary = await applyCertPatch({ input, certs, output, indices: [-1] });
    assert.deepEqual(
      summary.records.map((record) => record.bundleIndex),
      [1]
    );
    const verified = await verifyCertPatch({ original: input, patched: output });
    assert.deepEqual(verified.changed, [1]);
  });
});

test("strict mode writes nothing when the replacement is short", async () => {
  await withTempDir(async (dir) => {
    const input = path.join(dir, "firmware.bin");
    const certs = path.join(dir, "roots.pem");
    const output = path.join(dir, "patched.bin");
    await writeFile(input, firmware);
    await writeFile(certs, replacement);

    await assert.rejects(applyCertPatch({ input, certs, output, strict: true }), UndersizeReplacementError);
    await assert.rejects(fs.access(output));
  });
});

test("output must not overwrite the input", async () => {
  await withTempDir(async (dir) => {
    const input = path.join(dir, "firmware.bin");
    await writeFile(input, firmware);
    await assert.rejects(applyCertPatch({ input, certs: input, output: input }), {
      message: `Output path must differ from input: ${input}`
    });
  });
});

test("output is written as a flat blob whatever its extension", async () => {
  await withTempDir(async (dir) => {
    const input = path.join(dir, "firmware.bin");
    const certs = path.join(dir, "roots.pem");
    const output = path.join(dir, "patched.zip");
    await writeFile(input, firmware);
    await writeFile(certs, replacement);

    const summary = await applyCertPatch({ input, certs, output, indices: [0] });
    const written = await fs.readFile(output);
    assert.equal(written.length, firmware.length);
    assert.equal(hashBytes(written), summary.sha256);

    const verified = await verifyCertPatch({ original: input, patched: output, certs });
    assert.deepEqual(verified.changed, [0]);
    assert.deepEqual((await inspectBundles({ input: output })).bundles.length, 2);
  });
});

test("missing input is reported before anything is written", async () => {
  await withTempDir(async (dir) => {
    const input = path.join(dir, "missing.bin");
    const output = path.join(dir, "patched.bin");
    await assert.rejects(applyCertPatch({ input, certs: input, output }), {
      message: `Input file not found: ${input}`
    });
    await assert.rejects(fs.access(output));
  });
});

test("verify rejects a binary changed outside its bundles", async () => {
  await withTempDir(async (dir) => {
    const original = path.join(dir, "firmware.bin");
    const patched = path.join(dir, "patched.bin");
    const tampered = Buffer.from(firmware);
    tampered[1] = 0x00;
    await writeFile(original, firmware);
    await writeFile(patched, tampered);

    await assert.rejects(verifyCertPatch({ original, patched }), {
      message: "Patched blob differs outside certificate bundles at 0x1"
    });
  });
});

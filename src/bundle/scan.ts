import { MalformedInputError } from "./errors.js";
import type { Bundle } from "./types.js";

export const CERT_BEGIN = Buffer.from("-----BEGIN CERTIFICATE-----", "ascii");
export const CERT_END = Buffer.from("-----END CERTIFICATE-----", "ascii");

// Only these separate chained certificates: space, tab, CR, LF.
const WHITESPACE = new Set([0x20, 0x09, 0x0d, 0x0a]);

export function toBuffer(blob: Uint8Array): Buffer {
  return Buffer.isBuffer(blob) ? blob : Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);
}

function matchesAt(data: Buffer, marker: Buffer, offset: number): boolean {
  if (offset + marker.length > data.length) {
    return false;
  }
  return data.compare(marker, 0, marker.length, offset, offset + marker.length) === 0;
}

function skipWhitespace(data: Buffer, offset: number): number {
  let pos = offset;
  while (pos < data.length && WHITESPACE.has(data[pos])) {
    pos += 1;
  }
  return pos;
}

/**
 * Reads the bundle starting at the first BEGIN marker at or after `cursor`.
 * Certificates chained by whitespace alone are folded into the same bundle.
 */
function scanFrom(data: Buffer, cursor: number, index: number): Bundle | undefined {
  const start = data.indexOf(CERT_BEGIN, cursor);
  if (start === -1) {
    return undefined;
  }

  let begin = start;
  let certificates = 0;
  for (;;) {
    const endMarker = data.indexOf(CERT_END, begin);
    if (endMarker === -1) {
      throw new MalformedInputError(begin);
    }
    certificates += 1;
    const end = skipWhitespace(data, endMarker + CERT_END.length);
    if (!matchesAt(data, CERT_BEGIN, end)) {
      return { index, start, end, certificates };
    }
    begin = end;
  }
}

/** Every certificate bundle in `blob`, in offset order. */
export function scanBundles(blob: Uint8Array): Bundle[] {
  const data = toBuffer(blob);
  const bundles: Bundle[] = [];
  let cursor = 0;
  for (;;) {
    const bundle = scanFrom(data, cursor, bundles.length);
    if (!bundle) {
      return bundles;
    }
    bundles.push(bundle);
    cursor = bundle.end;
  }
}

export const BEGIN = "-----BEGIN CERTIFICATE-----";
export const END = "-----END CERTIFICATE-----";

/** A PEM-shaped certificate block with no trailing newline. The body is not real base64 DER. */
export function certBlock(body: string): string {
  return `${BEGIN}\n${body}\n${END}`;
}

export function blobOf(...parts: Array<string | Uint8Array>): Buffer {
  return Buffer.concat(parts.map((part) => (typeof part === "string" ? Buffer.from(part, "latin1") : part)));
}

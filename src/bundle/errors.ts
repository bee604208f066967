import { hex } from "../utils/format.js";

export type CertPatchErrorCode =
  | "MALFORMED_INPUT"
  | "NO_BUNDLES"
  | "INDEX_OUT_OF_RANGE"
  | "EMPTY_SELECTION"
  | "OVERSIZE_REPLACEMENT"
  | "UNDERSIZE_REPLACEMENT"
  | "VERIFICATION_FAILED";

export class CertPatchError extends Error {
  readonly code: CertPatchErrorCode;

  constructor(code: CertPatchErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedInputError extends CertPatchError {
  /** Offset of the BEGIN marker that has no END marker after it. */
  readonly offset: number;

  constructor(offset: number) {
    super("MALFORMED_INPUT", `Malformed bundle: BEGIN marker at ${hex(offset)} has no matching END marker`);
    this.offset = offset;
  }
}

export class NoBundlesFoundError extends CertPatchError {
  constructor() {
    super("NO_BUNDLES", "No certificate bundles found in input binary");
  }
}

export class IndexOutOfRangeError extends CertPatchError {
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number) {
    super("INDEX_OUT_OF_RANGE", `Index ${index} out of range: only ${count} bundle(s) present`);
    this.index = index;
    this.count = count;
  }
}

export class EmptySelectionError extends CertPatchError {
  constructor() {
    super("EMPTY_SELECTION", "No bundle indices requested; omit the selection to patch every bundle");
  }
}

export interface ReplacementMismatch {
  planIndex: number;
  start: number;
  end: number;
  originalLength: number;
  replacementLength: number;
}

function describeTarget(details: ReplacementMismatch): string {
  return `target #${details.planIndex} @${hex(details.start)}-${hex(details.end)}`;
}

export class ReplacementSizeError extends CertPatchError implements ReplacementMismatch {
  readonly planIndex: number;
  readonly start: number;
  readonly end: number;
  readonly originalLength: number;
  readonly replacementLength: number;

  constructor(code: "OVERSIZE_REPLACEMENT" | "UNDERSIZE_REPLACEMENT", message: string, details: ReplacementMismatch) {
    super(code, message);
    this.planIndex = details.planIndex;
    this.start = details.start;
    this.end = details.end;
    this.originalLength = details.originalLength;
    this.replacementLength = details.replacementLength;
  }
}

export class OversizeReplacementError extends ReplacementSizeError {
  constructor(details: ReplacementMismatch) {
    super(
      "OVERSIZE_REPLACEMENT",
      `Replacement bundle larger than original (${describeTarget(details)}): ` +
        `${details.replacementLength} > ${details.originalLength} bytes`,
      details
    );
  }
}

export class UndersizeReplacementError extends ReplacementSizeError {
  constructor(details: ReplacementMismatch) {
    super(
      "UNDERSIZE_REPLACEMENT",
      `Replacement bundle smaller than original (${describeTarget(details)}): ` +
        `${details.replacementLength} < ${details.originalLength} bytes and strict mode is enabled`,
      details
    );
  }
}

export class PatchVerificationError extends CertPatchError {
  readonly offset?: number;

  constructor(message: string, offset?: number) {
    super("VERIFICATION_FAILED", message);
    this.offset = offset;
  }
}

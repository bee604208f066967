export { scanBundles, CERT_BEGIN, CERT_END } from "./bundle/scan.js";
export { parseIndexList, resolveSelection, selectBundles } from "./bundle/select.js";
export { planPatch, patchBlob, replaceBundles } from "./bundle/patch.js";
export { compareWithOriginal, matchesReplacement } from "./bundle/compare.js";
export type { Comparison } from "./bundle/compare.js";
export * from "./bundle/errors.js";
export type * from "./bundle/types.js";
export { applyCertPatch } from "./patch/apply.js";
export { inspectBundles } from "./patch/inspect.js";
export { verifyCertPatch } from "./patch/verify.js";
export type * from "./patch/types.js";

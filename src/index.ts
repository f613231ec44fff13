export * from "./core/index.js";
export { bytesToHex, hexToBytes, HexError, type HexErrorCode } from "./encoding/hex.js";
export * from "./cavp/index.js";
export * from "./vectors/index.js";
export { canonicalJson } from "./shared/canonical-json.js";

export { hash, digest, initialState } from "./hash.js";
export { pad, paddedLength } from "./pad.js";
export {
  compress,
  transformBlock,
  expandSchedule,
  type HashState,
} from "./compress.js";
export { render, renderBytes } from "./render.js";
export {
  rotr,
  add32,
  choose,
  majority,
  smallSigma0,
  smallSigma1,
  bigSigma0,
  bigSigma1,
} from "./bitwise.js";
export {
  H0,
  K,
  BLOCK_BYTES,
  DIGEST_BYTES,
  STATE_WORDS,
  ROUNDS,
} from "./constants.js";
export { HashError, type HashErrorCode } from "./errors.js";

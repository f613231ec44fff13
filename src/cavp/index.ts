export { CavpError, type CavpErrorCode } from "./errors.js";
export {
  parseResponseFile,
  type RawRecord,
  type ResponseFile,
} from "./rsp-parser.js";
export {
  MessageRecordSchema,
  MonteRecordSchema,
  ParametersSchema,
  SeedSchema,
  type MessageRecord,
  type MonteRecord,
} from "./schemas.js";
export {
  runMonteCarlo,
  monteCarloCheckpoint,
  MONTE_CARLO_ITERATIONS,
  MONTE_CARLO_CHECKPOINTS,
} from "./monte-carlo.js";
export {
  validateResponseFile,
  type CavpKind,
  type CavpFailure,
  type CavpReport,
} from "./validate.js";

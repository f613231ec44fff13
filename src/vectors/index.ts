export { PRINTABLE } from "./charset.js";
export {
  VectorFileError,
  TestVectorSchema,
  VectorFileSchema,
  referenceHash,
  randomInput,
  generateVectors,
  writeVectorFile,
  readVectorFile,
  checkVectors,
  type VectorFileErrorCode,
  type TestVector,
  type GenerateOptions,
  type VectorFailure,
  type VectorCheckReport,
} from "./vector-file.js";

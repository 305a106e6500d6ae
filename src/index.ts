export {
  Chain,
  type ChainOptions,
  type AppendOptions,
  type Payload,
} from "./core/chain.js";
export {
  createRecord,
  encodeRecord,
  computeDigest,
  type ChainRecord,
  type RecordFields,
} from "./core/record.js";
export {
  signDigest,
  verifyDigestSignature,
  type RecordSignature,
} from "./core/signature.js";
export { GENESIS_DIGEST, HASH_ALGO, DIGEST_LENGTH, isDigest } from "./core/hash.js";
export {
  inspectRecords,
  type VerificationReport,
  type VerificationFailure,
  type VerificationCheck,
} from "./core/verify.js";
export {
  takeCheckpoint,
  verifyAgainstCheckpoint,
  type Checkpoint,
} from "./core/checkpoint.js";
export { serializeChain, serializeRecord, deserializeChain } from "./core/codec.js";
export {
  CHAIN_FORMAT,
  SerializedChainSchema,
  SerializedRecordSchema,
  type SerializedChain,
  type SerializedRecord,
} from "./core/schemas.js";
export {
  ChainError,
  CapacityError,
  MalformedChainError,
  ChainFormatError,
  ConfigError,
  type ChainErrorCode,
} from "./core/errors.js";
export { loadConfig, type ChainConfig } from "./config.js";

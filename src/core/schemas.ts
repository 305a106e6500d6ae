import { z } from "zod";
import { HASH_ALGO, isDigest } from "./hash.js";
import { isHex, isSignature } from "./signature.js";

export const CHAIN_FORMAT = "provenance-chain/v1";

const DigestSchema = z.string().refine(isDigest, "expected 64 lowercase hex chars");

const Base64Schema = z
  .string()
  .regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, "expected base64");

export const SerializedRecordSchema = z.object({
  index: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  timestamp: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  payload: Base64Schema,
  prevDigest: DigestSchema,
  selfDigest: DigestSchema,
  signature: z.string().refine(isSignature, "expected 128 lowercase hex chars").optional(),
  publicKey: z.string().refine(isHex, "expected lowercase hex").optional(),
});

export type SerializedRecord = z.infer<typeof SerializedRecordSchema>;

export const SerializedChainSchema = z.object({
  format: z.literal(CHAIN_FORMAT),
  algorithm: z.literal(HASH_ALGO),
  records: z.array(SerializedRecordSchema),
});

export type SerializedChain = z.infer<typeof SerializedChainSchema>;

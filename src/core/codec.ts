import { Buffer } from "node:buffer";
import { Chain, type ChainOptions } from "./chain.js";
import type { ChainRecord } from "./record.js";
import { HASH_ALGO } from "./hash.js";
import { ChainFormatError } from "./errors.js";
import {
  CHAIN_FORMAT,
  SerializedChainSchema,
  type SerializedChain,
  type SerializedRecord,
} from "./schemas.js";

/**
 * Maps a chain to JSON-safe values. Payloads become base64; everything
 * else is copied unchanged so digests can be re-derived after decoding.
 */
export function serializeChain(chain: Chain): SerializedChain {
  return {
    format: CHAIN_FORMAT,
    algorithm: HASH_ALGO,
    records: chain.records().map(serializeRecord),
  };
}

export function serializeRecord(record: ChainRecord): SerializedRecord {
  return {
    index: record.index,
    timestamp: record.timestamp,
    payload: Buffer.from(record.payload).toString("base64"),
    prevDigest: record.prevDigest,
    selfDigest: record.selfDigest,
    ...signatureFields(record),
  };
}

function signatureFields(
  source: Pick<ChainRecord, "signature" | "publicKey">
): Pick<ChainRecord, "signature" | "publicKey"> {
  return {
    ...(source.signature !== undefined ? { signature: source.signature } : {}),
    ...(source.publicKey !== undefined ? { publicKey: source.publicKey } : {}),
  };
}

/**
 * Validates and rebuilds a chain. Only the shape is checked here: tampered
 * but well-formed content decodes fine and fails verify() afterwards.
 *
 * @throws ChainFormatError when the input does not match the schema
 */
export function deserializeChain(
  input: unknown,
  options: ChainOptions = {}
): Chain {
  const parsed = SerializedChainSchema.safeParse(input);

  if (!parsed.success) {
    throw new ChainFormatError("Invalid serialized chain", parsed.error.flatten());
  }

  const records: ChainRecord[] = parsed.data.records.map((r) =>
    Object.freeze({
      index: r.index,
      timestamp: r.timestamp,
      payload: new Uint8Array(Buffer.from(r.payload, "base64")),
      prevDigest: r.prevDigest,
      selfDigest: r.selfDigest,
      ...signatureFields(r),
    })
  );

  return Chain.fromRecords(records, options);
}

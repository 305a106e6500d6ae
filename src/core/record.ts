import { Buffer } from "node:buffer";
import type { KeyObject } from "crypto";
import { hash, isDigest } from "./hash.js";
import { signDigest } from "./signature.js";

export type RecordFields = {
  readonly index: number;
  readonly timestamp: number;
  readonly payload: Uint8Array;
  readonly prevDigest: string;
};

export type ChainRecord = RecordFields & {
  readonly selfDigest: string;
  /** Ed25519 signature over selfDigest, hex. Absent on unsigned records. */
  readonly signature?: string;
  /** Signer's public key, hex SPKI DER. Present whenever signature is. */
  readonly publicKey?: string;
};

const U64_BYTES = 8;

/**
 * Canonical byte layout shared by record creation and verification:
 *
 *   index (u64 BE) | timestamp ms (u64 BE) | payload length (u64 BE) | payload | prevDigest (32 raw bytes)
 *
 * Throws RangeError when index or timestamp is not a non-negative safe
 * integer, or prevDigest is not a 64-char lowercase hex digest.
 */
export function encodeRecord(fields: RecordFields): Buffer {
  const { index, timestamp, payload, prevDigest } = fields;
  if (!isDigest(prevDigest)) {
    throw new RangeError(`prevDigest must be 64 lowercase hex chars, got "${prevDigest}"`);
  }
  const digestBytes = Buffer.from(prevDigest, "hex");

  const header = Buffer.alloc(U64_BYTES * 3);
  header.writeBigUInt64BE(toU64(index, "index"), 0);
  header.writeBigUInt64BE(toU64(timestamp, "timestamp"), U64_BYTES);
  header.writeBigUInt64BE(BigInt(payload.byteLength), U64_BYTES * 2);

  return Buffer.concat([header, payload, digestBytes]);
}

export function computeDigest(fields: RecordFields): string {
  return hash(encodeRecord(fields));
}

export function createRecord(
  index: number,
  payload: Uint8Array,
  prevDigest: string,
  timestamp: number,
  signingKey?: KeyObject
): ChainRecord {
  // Own copy: the caller's buffer must not alias stored bytes.
  const stored = new Uint8Array(payload);
  const fields: RecordFields = { index, timestamp, payload: stored, prevDigest };
  const selfDigest = computeDigest(fields);

  return Object.freeze({
    ...fields,
    selfDigest,
    ...(signingKey ? signDigest(selfDigest, signingKey) : {}),
  });
}

export function toPayloadBytes(payload: Uint8Array | string): Uint8Array {
  return typeof payload === "string" ? Buffer.from(payload, "utf8") : payload;
}

function toU64(value: number, label: string): bigint {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative safe integer, got ${value}`);
  }
  return BigInt(value);
}

import type { ChainRecord } from "./record.js";
import { computeDigest } from "./record.js";
import { GENESIS_DIGEST, isDigest } from "./hash.js";
import { MalformedChainError } from "./errors.js";
import { verifyDigestSignature } from "./signature.js";

export type VerificationCheck =
  | "shape"
  | "genesis"
  | "index"
  | "linkage"
  | "timestamp"
  | "digest"
  | "signature";

export type VerificationFailure = {
  readonly index: number;
  readonly check: VerificationCheck;
  readonly message: string;
};

export type VerificationReport = {
  readonly valid: boolean;
  readonly length: number;
  /** selfDigest of the tail record, null unless the chain is valid */
  readonly headDigest: string | null;
  readonly failures: readonly VerificationFailure[];
};

/**
 * Walks every record from genesis to tail and collects every failed check.
 * The walk never stops early, so one report describes the whole chain.
 *
 * Throws MalformedChainError only when there is nothing to verify.
 */
export function inspectRecords(
  records: readonly ChainRecord[]
): VerificationReport {
  if (records.length === 0) {
    throw new MalformedChainError("Chain has no genesis record");
  }

  const failures: VerificationFailure[] = [];
  const fail = (index: number, check: VerificationCheck, message: string) => {
    failures.push({ index, check, message });
  };

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    if (!record) {
      fail(i, "shape", `Missing record at position ${i}`);
      continue;
    }

    const wellFormed = isWellFormed(record);
    if (!wellFormed) {
      fail(i, "shape", `Malformed record fields at position ${i}`);
    }

    if (i === 0) {
      if (record.index !== 0) {
        fail(i, "genesis", `Genesis index must be 0, got ${record.index}`);
      }
      if (record.prevDigest !== GENESIS_DIGEST) {
        fail(i, "genesis", "Genesis prevDigest is not the sentinel digest");
      }
      if (record.signature !== undefined || record.publicKey !== undefined) {
        fail(i, "genesis", "Genesis record carries a signature");
      }
    } else {
      if (record.index !== i) {
        fail(i, "index", `Expected index ${i}, got ${record.index}`);
      }

      const prev = records[i - 1];
      if (prev) {
        if (record.prevDigest !== prev.selfDigest) {
          fail(i, "linkage", `Broken prev digest at position ${i}`);
        }
        if (record.timestamp < prev.timestamp) {
          fail(
            i,
            "timestamp",
            `Timestamp ${record.timestamp} precedes predecessor's ${prev.timestamp}`
          );
        }
      }
    }

    if (wellFormed && computeDigest(record) !== record.selfDigest) {
      fail(i, "digest", `Self digest mismatch at position ${i}`);
    }

    if (i > 0 && !hasValidSignature(record)) {
      fail(i, "signature", `Signature does not verify at position ${i}`);
    }
  }

  const valid = failures.length === 0;
  const tail = records[records.length - 1];

  return {
    valid,
    length: records.length,
    headDigest: valid && tail ? tail.selfDigest : null,
    failures,
  };
}

/** Unsigned records pass; a signature needs its key and must verify. */
function hasValidSignature(record: ChainRecord): boolean {
  const { signature, publicKey } = record;
  if (signature === undefined && publicKey === undefined) {
    return true;
  }
  if (signature === undefined || publicKey === undefined) {
    return false;
  }
  return verifyDigestSignature(record.selfDigest, { signature, publicKey });
}

function isWellFormed(record: ChainRecord): boolean {
  return (
    Number.isSafeInteger(record.index) &&
    record.index >= 0 &&
    Number.isSafeInteger(record.timestamp) &&
    record.timestamp >= 0 &&
    record.payload instanceof Uint8Array &&
    isDigest(record.prevDigest) &&
    isDigest(record.selfDigest)
  );
}

import { createHash } from "crypto";

export const HASH_ALGO = "sha256-v1";

/** Digest size in bytes. */
export const DIGEST_LENGTH = 32;

/** prevDigest of every genesis record. */
export const GENESIS_DIGEST = "0".repeat(DIGEST_LENGTH * 2);

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

export function hash(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export function isDigest(value: unknown): value is string {
  return typeof value === "string" && DIGEST_PATTERN.test(value);
}

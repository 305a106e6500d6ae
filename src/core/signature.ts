import { createPublicKey, sign, verify, type KeyObject } from "crypto";
import { Buffer } from "node:buffer";

/**
 * Ed25519 signature over a record's selfDigest, with the signer's public
 * key as hex-encoded SPKI DER. Not part of the canonical encoding.
 */
export type RecordSignature = {
  readonly signature: string;
  readonly publicKey: string;
};

const SIGNATURE_PATTERN = /^[0-9a-f]{128}$/;
const HEX_PATTERN = /^(?:[0-9a-f]{2})+$/;

export function isSignature(value: unknown): value is string {
  return typeof value === "string" && SIGNATURE_PATTERN.test(value);
}

export function isHex(value: unknown): value is string {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

/** @throws RangeError unless the key is an Ed25519 private key */
export function signDigest(digest: string, privateKey: KeyObject): RecordSignature {
  if (privateKey.type !== "private" || privateKey.asymmetricKeyType !== "ed25519") {
    throw new RangeError(
      `Signing key must be an Ed25519 private key, got ${privateKey.type} ${privateKey.asymmetricKeyType ?? "key"}`
    );
  }

  const signature = sign(null, Buffer.from(digest, "hex"), privateKey);
  const publicKey = createPublicKey(privateKey).export({ format: "der", type: "spki" });

  return {
    signature: signature.toString("hex"),
    publicKey: publicKey.toString("hex"),
  };
}

export function verifyDigestSignature(
  digest: string,
  { signature, publicKey }: RecordSignature
): boolean {
  if (!isSignature(signature) || !isHex(publicKey)) {
    return false;
  }

  let key: KeyObject;
  try {
    key = createPublicKey({
      key: Buffer.from(publicKey, "hex"),
      format: "der",
      type: "spki",
    });
  } catch {
    // Undecodable key bytes cannot have produced the signature.
    return false;
  }

  if (key.asymmetricKeyType !== "ed25519") {
    return false;
  }

  return verify(null, Buffer.from(digest, "hex"), key, Buffer.from(signature, "hex"));
}

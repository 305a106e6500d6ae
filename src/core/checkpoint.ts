import type { Chain } from "./chain.js";
import { MalformedChainError } from "./errors.js";

/**
 * A trusted note of where the chain's tail stood at some point in time.
 * Kept outside the chain; a self-consistent chain alone cannot prove it
 * was not truncated or rebuilt from an earlier record.
 */
export interface Checkpoint {
  index: number;
  digest: string;
  takenAt: number;
}

export function takeCheckpoint(chain: Chain, takenAt: number = Date.now()): Checkpoint {
  const head = chain.head;
  if (!head) {
    throw new MalformedChainError("Cannot checkpoint a chain without records");
  }

  return {
    index: head.index,
    digest: head.selfDigest,
    takenAt,
  };
}

/**
 * True when the chain verifies, still reaches the checkpointed index, and
 * carries the checkpointed digest there.
 */
export function verifyAgainstCheckpoint(
  chain: Chain,
  checkpoint: Checkpoint
): boolean {
  if (!chain.verify()) {
    return false;
  }

  // A valid chain has record.index === position.
  const anchored = chain.at(checkpoint.index);
  if (checkpoint.index < 0 || !anchored) {
    return false;
  }

  return anchored.selfDigest === checkpoint.digest;
}

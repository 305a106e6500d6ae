import type { KeyObject } from "crypto";
import type { ChainRecord } from "./record.js";
import { createRecord, toPayloadBytes } from "./record.js";
import { GENESIS_DIGEST } from "./hash.js";
import { inspectRecords, type VerificationReport } from "./verify.js";
import { CapacityError, MalformedChainError } from "./errors.js";

export type ChainOptions = {
  /** Maximum number of records, genesis included. Defaults to Number.MAX_SAFE_INTEGER. */
  maxLength?: number;
  /** Source of record timestamps in epoch milliseconds. Defaults to Date.now. */
  clock?: () => number;
};

export type Payload = Uint8Array | string;

export type AppendOptions = {
  /** Ed25519 private key; when given, each appended record is signed. */
  signingKey?: KeyObject;
};

/**
 * Append-only, tamper-evident sequence of records.
 *
 * Every record after genesis carries the selfDigest of its predecessor as
 * its prevDigest, and every selfDigest binds the record's own fields, so
 * any edit to stored history shows up in {@link Chain.verify}.
 *
 * @example
 * const chain = new Chain();
 * chain.push("Hello, world!");
 * chain.verify(); // true
 */
export class Chain implements Iterable<ChainRecord> {
  readonly maxLength: number;
  private readonly clock: () => number;
  private entries: ChainRecord[];

  /**
   * With no seed records the chain starts from a fresh genesis record.
   * Seed records are taken as given, see {@link Chain.fromRecords}.
   */
  constructor(options: ChainOptions = {}, seed?: readonly ChainRecord[]) {
    const maxLength = options.maxLength ?? Number.MAX_SAFE_INTEGER;
    if (!Number.isSafeInteger(maxLength) || maxLength < 1) {
      throw new RangeError(
        `maxLength must be a positive safe integer, got ${maxLength}`
      );
    }

    this.maxLength = maxLength;
    this.clock = options.clock ?? Date.now;
    this.entries = seed
      ? [...seed]
      : [createRecord(0, new Uint8Array(0), GENESIS_DIGEST, this.now())];
  }

  /**
   * Rebuilds a chain from records produced elsewhere, e.g. decoded from JSON.
   * Nothing is checked here; call verify() before trusting the result.
   */
  static fromRecords(
    records: readonly ChainRecord[],
    options: ChainOptions = {}
  ): Chain {
    return new Chain(options, records);
  }

  get length(): number {
    return this.entries.length;
  }

  get genesis(): ChainRecord | undefined {
    return this.entries[0];
  }

  get head(): ChainRecord | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Negative positions count back from the tail. */
  at(position: number): ChainRecord | undefined {
    const index = position < 0 ? this.entries.length + position : position;
    return this.entries[index];
  }

  records(): readonly ChainRecord[] {
    return this.entries;
  }

  [Symbol.iterator](): Iterator<ChainRecord> {
    return this.entries[Symbol.iterator]();
  }

  /**
   * Appends one record linked to the current tail and returns it.
   *
   * @throws CapacityError when the chain is full
   * @throws MalformedChainError when the chain has no tail to link to
   */
  push(payload: Payload, options: AppendOptions = {}): ChainRecord {
    this.ensureCapacity(1);
    return this.append(toPayloadBytes(payload), options.signingKey);
  }

  /**
   * Appends every payload in order. Capacity is checked for the whole
   * batch first, so either all of them are appended or none are.
   */
  extend(payloads: Iterable<Payload>, options: AppendOptions = {}): ChainRecord[] {
    const batch = Array.from(payloads, toPayloadBytes);
    this.ensureCapacity(batch.length);
    return batch.map((payload) => this.append(payload, options.signingKey));
  }

  /**
   * True when every record passes every check, false when anything
   * anywhere is out of place.
   *
   * @throws MalformedChainError when the chain holds no records at all
   */
  verify(): boolean {
    return this.inspect().valid;
  }

  /** Same walk as verify(), reporting each failed check. */
  inspect(): VerificationReport {
    return inspectRecords(this.entries);
  }

  private append(payload: Uint8Array, signingKey?: KeyObject): ChainRecord {
    const last = this.tail();
    const timestamp = Math.max(this.now(), last.timestamp);
    const record = createRecord(last.index + 1, payload, last.selfDigest, timestamp, signingKey);
    this.entries.push(record);
    return record;
  }

  /** Checks both limits for the whole request before anything is appended. */
  private ensureCapacity(requested: number): void {
    if (this.entries.length + requested > this.maxLength) {
      throw new CapacityError(this.maxLength, requested);
    }
    if (requested > 0 && !Number.isSafeInteger(this.tail().index + requested)) {
      throw new CapacityError(Number.MAX_SAFE_INTEGER, requested, "index");
    }
  }

  private tail(): ChainRecord {
    const last = this.head;
    if (!last) {
      throw new MalformedChainError("Cannot append to a chain without a genesis record");
    }
    return last;
  }

  private now(): number {
    return Math.floor(this.clock());
  }
}

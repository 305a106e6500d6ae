import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Buffer } from "node:buffer";
import {
  Chain,
  ChainFormatError,
  MalformedChainError,
  CHAIN_FORMAT,
  HASH_ALGO,
  serializeChain,
  deserializeChain,
} from "../src/index.js";

function throughJson(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

describe("serializeChain", () => {
  it("tags the format and base64-encodes payloads", () => {
    const chain = new Chain();
    const record = chain.push("hello");

    const serialized = serializeChain(chain);

    assert.equal(serialized.format, CHAIN_FORMAT);
    assert.equal(serialized.algorithm, HASH_ALGO);
    assert.equal(serialized.records.length, 2);
    assert.equal(serialized.records[0]?.payload, "");
    assert.deepEqual(serialized.records[1], {
      index: 1,
      timestamp: record.timestamp,
      payload: "aGVsbG8=",
      prevDigest: record.prevDigest,
      selfDigest: record.selfDigest,
    });
  });
});

describe("deserializeChain", () => {
  it("restores a chain that verifies with the same digests", () => {
    const chain = new Chain();
    chain.extend(["a", new Uint8Array([0, 255, 7]), ""]);

    const restored = deserializeChain(throughJson(serializeChain(chain)));

    assert.equal(restored.verify(), true);
    assert.deepEqual(
      restored.records().map((r) => r.selfDigest),
      chain.records().map((r) => r.selfDigest)
    );
    assert.deepEqual([...(restored.at(2)?.payload ?? [])], [0, 255, 7]);
  });

  it("accepts tampered content and leaves detection to verify", () => {
    const chain = new Chain();
    chain.push("good");
    const serialized = serializeChain(chain);
    const tampered = {
      ...serialized,
      records: serialized.records.map((r) =>
        r.index === 1 ? { ...r, payload: Buffer.from("evil").toString("base64") } : r
      ),
    };

    const restored = deserializeChain(tampered);

    assert.equal(tampered.records[1]?.payload, "ZXZpbA==");
    assert.equal(restored.verify(), false);
  });

  it("throws ChainFormatError for input that does not match the schema", () => {
    assert.throws(
      () => deserializeChain({ format: "other", algorithm: HASH_ALGO, records: [] }),
      (err: unknown) => err instanceof ChainFormatError && err.code === "CHAIN_FORMAT"
    );
    assert.throws(
      () =>
        deserializeChain({
          format: CHAIN_FORMAT,
          algorithm: HASH_ALGO,
          records: [{ index: 0, timestamp: 0, payload: "", prevDigest: "xyz", selfDigest: "xyz" }],
        }),
      ChainFormatError
    );
  });

  it("rejects uppercase digests like isDigest does", () => {
    const chain = new Chain();
    const serialized = serializeChain(chain);
    const upper = {
      ...serialized,
      records: serialized.records.map((r) => ({ ...r, selfDigest: r.selfDigest.toUpperCase() })),
    };

    assert.throws(() => deserializeChain(upper), ChainFormatError);
  });

  it("yields a malformed chain from an empty record list", () => {
    const restored = deserializeChain({ format: CHAIN_FORMAT, algorithm: HASH_ALGO, records: [] });

    assert.equal(restored.length, 0);
    assert.throws(() => restored.verify(), MalformedChainError);
  });
});

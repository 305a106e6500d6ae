export type ChainErrorCode =
  | "CAPACITY"
  | "MALFORMED_CHAIN"
  | "CHAIN_FORMAT"
  | "CONFIG";

export class ChainError extends Error {
  readonly code: ChainErrorCode;

  constructor(code: ChainErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown by push/extend when the chain cannot take more records.
 * Recoverable only by starting a new chain or raising the limit.
 */
export class CapacityError extends ChainError {
  readonly limit: number;
  /** Which bound was hit: the record count or the index counter. */
  readonly bound: "length" | "index";

  constructor(limit: number, requested = 1, bound: "length" | "index" = "length") {
    super(
      "CAPACITY",
      bound === "index"
        ? `Chain capacity exceeded: record index cannot pass ${limit}, ${requested} more requested`
        : `Chain capacity exceeded: limit is ${limit} records, ${requested} more requested`
    );
    this.limit = limit;
    this.bound = bound;
  }
}

/**
 * The chain lacks the structure needed to verify or extend it at all.
 * Distinct from a tampered chain, which verifies to false.
 */
export class MalformedChainError extends ChainError {
  constructor(message: string) {
    super("MALFORMED_CHAIN", message);
  }
}

export class ChainFormatError extends ChainError {
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super("CHAIN_FORMAT", message);
    this.issues = issues;
  }
}

export class ConfigError extends ChainError {
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super("CONFIG", message);
    this.issues = issues;
  }
}

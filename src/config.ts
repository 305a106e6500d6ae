import { z } from "zod";
import type { ChainOptions } from "./core/chain.js";
import { ConfigError } from "./core/errors.js";

const EnvSchema = z.object({
  PROVENANCE_CHAIN_MAX_LENGTH: z
    .string()
    .regex(/^\d+$/, "must be a positive integer")
    .transform(Number)
    .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER))
    .optional(),
});

export type ChainConfig = Required<Pick<ChainOptions, "maxLength">>;

/**
 * Reads chain limits from the environment. Entry points load .env through
 * dotenv before calling this; the library itself never touches process.env.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ChainConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError("Invalid environment configuration", parsed.error.flatten());
  }

  return {
    maxLength: parsed.data.PROVENANCE_CHAIN_MAX_LENGTH ?? Number.MAX_SAFE_INTEGER,
  };
}

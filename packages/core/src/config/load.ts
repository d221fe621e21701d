/**
 * Configuration Loading
 *
 * Resolves a settlement config from a partial object or from CIPHERLICENSE_*
 * environment variables. Anything the caller leaves out takes the schema default.
 */

import { SettlementError } from "../errors";
import { settlementConfigSchema, type SettlementConfig, type SettlementConfigInput } from "./schema";

export function resolveConfig(input: SettlementConfigInput = {}): SettlementConfig {
  const parsed = settlementConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new SettlementError("INVALID_CONFIG", `Invalid settlement config: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

function intFromEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return Number(raw);
}

/**
 * Read config from the environment.
 *
 * Recognised variables:
 * - CIPHERLICENSE_DECRYPTION_TIMEOUT_MS
 * - CIPHERLICENSE_RATE_DENOMINATOR
 * - CIPHERLICENSE_TOLERANCE (as "95/100")
 * - CIPHERLICENSE_BIDDING_HOURS (as "1-168")
 * - CIPHERLICENSE_MIN_BID_ESCROW
 * - CIPHERLICENSE_ORACLE_SIGNERS (comma-separated base58 keys)
 * - CIPHERLICENSE_OPERATOR
 * - CIPHERLICENSE_DB_PATH (switches the store to sqlite)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SettlementConfig {
  const input: SettlementConfigInput = {};

  const timeout = intFromEnv(env.CIPHERLICENSE_DECRYPTION_TIMEOUT_MS);
  if (timeout !== undefined) input.decryption_timeout_ms = timeout;

  const denominator = intFromEnv(env.CIPHERLICENSE_RATE_DENOMINATOR);
  if (denominator !== undefined) input.rate_denominator = denominator;

  if (env.CIPHERLICENSE_TOLERANCE) {
    const [num, den] = env.CIPHERLICENSE_TOLERANCE.split("/");
    input.tolerance_numerator = Number(num);
    input.tolerance_denominator = Number(den);
  }

  if (env.CIPHERLICENSE_BIDDING_HOURS) {
    const [min, max] = env.CIPHERLICENSE_BIDDING_HOURS.split("-");
    input.bidding_min_hours = Number(min);
    input.bidding_max_hours = Number(max);
  }

  if (env.CIPHERLICENSE_MIN_BID_ESCROW) input.min_bid_escrow = env.CIPHERLICENSE_MIN_BID_ESCROW;

  if (env.CIPHERLICENSE_ORACLE_SIGNERS) {
    input.oracle_signers = env.CIPHERLICENSE_ORACLE_SIGNERS.split(",")
      .map((key) => key.trim())
      .filter((key) => key.length > 0);
  }

  if (env.CIPHERLICENSE_OPERATOR) input.operator = env.CIPHERLICENSE_OPERATOR;

  if (env.CIPHERLICENSE_DB_PATH) {
    input.store = { mode: "sqlite", db_path: env.CIPHERLICENSE_DB_PATH };
  }

  return resolveConfig(input);
}

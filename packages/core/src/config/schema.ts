import { z } from "zod";
import { MS_PER_DAY } from "../types";

const base58 = z.string().regex(/^[1-9A-HJ-NP-Za-km-z]+$/, "must be base58");

const amountSchema = z
  .union([z.bigint(), z.number().int(), z.string().regex(/^\d+$/)])
  .transform((value) => BigInt(value))
  .refine((value) => value > 0n, { message: "must be > 0" });

const storeSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("memory") }),
  z.object({ mode: z.literal("sqlite"), db_path: z.string().min(1) }),
]);

export const settlementConfigSchema = z
  .object({
    decryption_timeout_ms: z.number().int().positive().default(7 * MS_PER_DAY),
    rate_denominator: z.number().int().positive().default(10_000),
    tolerance_numerator: z.number().int().nonnegative().default(95),
    tolerance_denominator: z.number().int().positive().default(100),
    bidding_min_hours: z.number().int().positive().default(1),
    bidding_max_hours: z.number().int().positive().default(168),
    min_bid_escrow: amountSchema.default("1"),
    /** Base58 Ed25519 public keys whose attestations are trusted. */
    oracle_signers: z.array(base58).default([]),
    /** Account allowed to use the registry's emergency pause/resume. */
    operator: z.string().min(1).optional(),
    store: storeSchema.default({ mode: "memory" }),
  })
  .refine((cfg) => cfg.tolerance_numerator <= cfg.tolerance_denominator, {
    message: "tolerance_numerator must not exceed tolerance_denominator",
    path: ["tolerance_numerator"],
  })
  .refine((cfg) => cfg.bidding_min_hours <= cfg.bidding_max_hours, {
    message: "bidding_min_hours must not exceed bidding_max_hours",
    path: ["bidding_min_hours"],
  });

export type SettlementConfigInput = z.input<typeof settlementConfigSchema>;
export type SettlementConfig = z.output<typeof settlementConfigSchema>;

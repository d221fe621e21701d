import type { Address } from "../types";

/**
 * Native-asset ledger the system holds custody on.
 *
 * escrow() moves funds from an account into system custody and throws
 * INSUFFICIENT_FUNDS when the account cannot cover it. payout() moves funds out
 * of custody and reports a rejected transfer by returning false, leaving custody
 * untouched.
 */
export interface Ledger {
  escrow(from: Address, amount: bigint): void;
  payout(to: Address, amount: bigint): boolean;
  custodyBalance(): bigint;
}

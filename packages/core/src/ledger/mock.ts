import { SettlementError } from "../errors";
import type { Address } from "../types";
import type { Ledger } from "./provider";

/**
 * In-memory ledger for tests and the demo.
 *
 * Accounts start at zero. Payouts to accounts listed with rejectPayoutsTo()
 * fail the way a recipient that refuses transfers would. onPayout() runs a hook
 * after funds land, which is where re-entrancy tests call back into the system.
 */
export class MockLedger implements Ledger {
  private balances = new Map<Address, bigint>();
  private custody = 0n;
  private rejecting = new Set<Address>();
  private payoutHook?: (to: Address, amount: bigint) => void;

  // --- test helpers ---
  setBalance(account: Address, balance: bigint): void {
    if (balance < 0n) throw new Error("balance must be >= 0");
    this.balances.set(account, balance);
  }

  getBalance(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  rejectPayoutsTo(account: Address, reject = true): void {
    if (reject) {
      this.rejecting.add(account);
    } else {
      this.rejecting.delete(account);
    }
  }

  onPayout(hook: ((to: Address, amount: bigint) => void) | undefined): void {
    this.payoutHook = hook;
  }

  /** Sum of every account balance plus custody. Constant across escrow and payout. */
  totalSupply(): bigint {
    let total = this.custody;
    for (const balance of this.balances.values()) total += balance;
    return total;
  }

  // --- Ledger ---
  escrow(from: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new SettlementError("INVALID_AMOUNT", "Escrow amount must be > 0", { amount: amount.toString() });
    }
    const balance = this.getBalance(from);
    if (balance < amount) {
      throw new SettlementError("INSUFFICIENT_FUNDS", `Insufficient balance to escrow ${amount} from ${from}`, {
        account: from,
        balance: balance.toString(),
        amount: amount.toString(),
      });
    }
    this.balances.set(from, balance - amount);
    this.custody += amount;
  }

  payout(to: Address, amount: bigint): boolean {
    if (amount <= 0n || amount > this.custody) return false;
    if (this.rejecting.has(to)) return false;
    this.custody -= amount;
    this.balances.set(to, this.getBalance(to) + amount);
    this.payoutHook?.(to, amount);
    return true;
  }

  custodyBalance(): bigint {
    return this.custody;
  }
}

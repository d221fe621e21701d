/**
 * Refund Ledger
 *
 * Per-account reclaimable balances. Credits only ever add; withdraw() is the
 * only way a balance goes down, and it zeroes the balance before paying out.
 */

import { fail } from "../errors";
import type { EventContext, EventJournal } from "../events";
import type { Ledger } from "../ledger";
import type { RefundBalance, RefundReason } from "../state/types";
import type { StateStore } from "../state/store";
import type { Address } from "../types";

export class RefundLedger {
  constructor(
    private readonly store: StateStore,
    private readonly ledger: Ledger,
    private readonly journal: EventJournal
  ) {}

  /** Never throws. Nothing is owed for a zero or negative amount, so it records nothing. */
  credit(account: Address, amount: bigint, reason: RefundReason, context: EventContext = {}): void {
    if (amount <= 0n) return;
    this.store.setRefund(account, this.store.getRefund(account) + amount);
    this.journal.emit({ type: "refund_credited", account, amount, reason, context });
  }

  balanceOf(account: Address): bigint {
    return this.store.getRefund(account);
  }

  list(): RefundBalance[] {
    return this.store.listRefunds();
  }

  totalOutstanding(): bigint {
    return this.store.listRefunds().reduce((sum, entry) => sum + entry.amount, 0n);
  }

  withdraw(caller: Address): bigint {
    const amount = this.store.getRefund(caller);
    if (amount === 0n) {
      fail("NOTHING_TO_WITHDRAW", "No refund balance to withdraw", { account: caller });
    }
    this.store.setRefund(caller, 0n);
    if (!this.ledger.payout(caller, amount)) {
      this.store.setRefund(caller, amount);
      fail("TRANSFER_FAILED", `Refund payout to ${caller} was rejected`, {
        account: caller,
        amount: amount.toString(),
      });
    }
    this.journal.emit({ type: "refund_withdrawn", account: caller, amount });
    return amount;
  }
}

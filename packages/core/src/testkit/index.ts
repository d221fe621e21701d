/**
 * Test Kit
 *
 * Deterministic building blocks for tests and the demo: a manual clock, the
 * in-memory ledger and oracle, and a harness that wires them into a
 * SettlementSystem with the oracle as its only trusted signer.
 */

import { SettlementError } from "../errors";
import { MockLedger } from "../ledger/mock";
import { silentLogger, type Logger } from "../logger";
import { MockConfidentialOracle } from "../oracle/mock";
import type { StateStore } from "../state/store";
import { SettlementSystem } from "../system";
import type { SettlementConfigInput } from "../config";
import type { Address, RequestId } from "../types";

export { MockLedger } from "../ledger/mock";
export { MockConfidentialOracle } from "../oracle/mock";

export const TEST_ORACLE_SEED = new Uint8Array(32).fill(7);

export class ManualClock {
  constructor(private current = 1_700_000_000_000) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

export type TestHarness = {
  clock: ManualClock;
  ledger: MockLedger;
  oracle: MockConfidentialOracle;
  system: SettlementSystem;
  fund(account: Address, amount: bigint): void;
  /** Have the oracle answer a request honestly and deliver the answer. */
  deliver(requestId: RequestId): void;
};

export type TestHarnessOptions = {
  /** Defaults to an oracle keyed from TEST_ORACLE_SEED. */
  oracle?: MockConfidentialOracle;
  config?: SettlementConfigInput;
  store?: StateStore;
  log?: Logger;
  startMs?: number;
};

export function createTestHarness(opts: TestHarnessOptions = {}): TestHarness {
  const clock = new ManualClock(opts.startMs);
  const ledger = new MockLedger();
  const oracle = opts.oracle ?? new MockConfidentialOracle({ seed: TEST_ORACLE_SEED });
  const system = new SettlementSystem({
    ledger,
    oracle,
    store: opts.store,
    now: clock.now,
    log: opts.log ?? silentLogger,
    config: { oracle_signers: [oracle.publicKeyB58], ...opts.config },
  });
  return {
    clock,
    ledger,
    oracle,
    system,
    fund: (account, amount) => ledger.setBalance(account, ledger.getBalance(account) + amount),
    deliver: (requestId) => oracle.deliver(oracle.respond(requestId), system),
  };
}

/** Run fn and return the SettlementError it throws. Fails if it does not throw one. */
export function catchSettlementError(fn: () => unknown): SettlementError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SettlementError) return error;
    throw error;
  }
  throw new Error("Expected a SettlementError, but nothing was thrown");
}

/**
 * Settlement System
 *
 * Public surface of the coordination layer. Wires the registry, coordinator,
 * engines and refund ledger together and runs every operation as one atomic
 * unit: the store (registry included) and staged events roll back when it throws.
 * Operations that move native balance also run under the re-entrancy guard.
 */

import { BiddingEngine, type BidReceipt } from "./bidding";
import { resolveConfig, type SettlementConfig, type SettlementConfigInput } from "./config";
import { DecryptionCoordinator, type CompletionOutcome, type Sequence } from "./coordinator";
import { EventJournal, type EventListener, type SettlementEvent } from "./events";
import { ReentrancyGuard } from "./guard";
import type { Ledger } from "./ledger";
import { log as defaultLog, type Logger } from "./logger";
import { Ed25519AttestationVerifier, type Attestation, type AttestationVerifier, type ConfidentialOracle } from "./oracle";
import { RefundLedger } from "./refunds";
import {
  PatentRegistry,
  type License,
  type LicenseRequest,
  type LicenseStatus,
  type Patent,
  type PatentStatus,
  type PatentTerms,
} from "./registry";
import { MemoryStateStore } from "./state/memory";
import { SqliteStateStore } from "./state/sqlite";
import type { StateStore } from "./state/store";
import type {
  BiddingSession,
  DecryptionRequest,
  RefundBalance,
  RoyaltyPayment,
} from "./state/types";
import type { Address, AgreementId, AssetId, CiphertextHandle, Clock, RequestId } from "./types";
import { VerificationEngine } from "./verification";

export type SettlementDeps = {
  ledger: Ledger;
  oracle: ConfidentialOracle;
  /** Defaults to an Ed25519 verifier trusting config.oracle_signers. */
  verifier?: AttestationVerifier;
  /** Defaults to the store named by config.store. */
  store?: StateStore;
  config?: SettlementConfigInput;
  now?: Clock;
  sequence?: Sequence;
  log?: Logger;
};

export type CustodyAudit = {
  custody: bigint;
  active_escrow: bigint;
  refund_total: bigint;
  balanced: boolean;
};

function storeFromConfig(config: SettlementConfig): StateStore {
  switch (config.store.mode) {
    case "memory":
      return new MemoryStateStore();
    case "sqlite":
      return new SqliteStateStore(config.store.db_path);
  }
}

export class SettlementSystem {
  readonly config: SettlementConfig;
  readonly journal: EventJournal;
  readonly registry: PatentRegistry;
  readonly coordinator: DecryptionCoordinator;
  readonly bidding: BiddingEngine;
  readonly verification: VerificationEngine;
  readonly refunds: RefundLedger;

  private readonly store: StateStore;
  private readonly ledger: Ledger;
  private readonly guard = new ReentrancyGuard();
  private readonly log: Logger;

  constructor(deps: SettlementDeps) {
    const config = resolveConfig(deps.config);
    const now = deps.now ?? Date.now;
    const log = deps.log ?? defaultLog;
    const store = deps.store ?? storeFromConfig(config);
    const verifier = deps.verifier ?? new Ed25519AttestationVerifier(config.oracle_signers);

    this.config = config;
    this.store = store;
    this.ledger = deps.ledger;
    this.log = log;
    this.journal = new EventJournal(now, log);
    this.registry = new PatentRegistry({
      store,
      now,
      oracle: deps.oracle,
      journal: this.journal,
      operator: config.operator,
    });
    this.refunds = new RefundLedger(store, deps.ledger, this.journal);
    this.coordinator = new DecryptionCoordinator({
      store,
      oracle: deps.oracle,
      verifier,
      journal: this.journal,
      now,
      timeoutMs: config.decryption_timeout_ms,
      sequence: deps.sequence,
      log,
    });
    const shared = {
      store,
      registry: this.registry,
      ledger: deps.ledger,
      refunds: this.refunds,
      coordinator: this.coordinator,
      journal: this.journal,
      config,
      now,
      log,
    };
    this.bidding = new BiddingEngine(shared);
    this.verification = new VerificationEngine({ ...shared, oracle: deps.oracle });
    this.coordinator.bind({ bidding: this.bidding, verification: this.verification });
  }

  // --- registry ---

  registerPatent(caller: Address, terms: PatentTerms): AssetId {
    return this.atomic(() => this.registry.registerPatent(caller, terms));
  }

  requestLicense(caller: Address, request: LicenseRequest): AgreementId {
    return this.atomic(() => this.registry.requestLicense(caller, request));
  }

  approveLicense(caller: Address, licenseId: AgreementId, durationDays: number): void {
    this.atomic(() => this.registry.approveLicense(caller, licenseId, durationDays));
  }

  updatePatentStatus(caller: Address, patentId: AssetId, status: PatentStatus): void {
    this.atomic(() => this.registry.updatePatentStatus(caller, patentId, status));
  }

  updateLicenseStatus(caller: Address, licenseId: AgreementId, status: LicenseStatus): void {
    this.atomic(() => this.registry.updateLicenseStatus(caller, licenseId, status));
  }

  emergencyPause(caller: Address, patentId: AssetId): void {
    this.atomic(() => this.registry.emergencyPause(caller, patentId));
  }

  emergencyResume(caller: Address, patentId: AssetId): void {
    this.atomic(() => this.registry.emergencyResume(caller, patentId));
  }

  getPatentInfo(patentId: AssetId): Patent {
    return this.registry.getPatentInfo(patentId);
  }

  getLicenseInfo(licenseId: AgreementId): License {
    return this.registry.getLicenseInfo(licenseId);
  }

  getUserPatents(account: Address): AssetId[] {
    return this.registry.getUserPatents(account);
  }

  getUserLicenses(account: Address): AgreementId[] {
    return this.registry.getUserLicenses(account);
  }

  getRoyaltyPaymentCount(agreementId: AgreementId): number {
    return this.store.listPayments(agreementId).length;
  }

  // --- bidding ---

  startBidding(caller: Address, assetId: AssetId, durationHours: number): BiddingSession {
    return this.atomic(() => this.bidding.start(caller, assetId, durationHours));
  }

  submitBid(caller: Address, assetId: AssetId, amountHandle: CiphertextHandle, escrow: bigint): BidReceipt {
    return this.atomic(() => this.bidding.submitBid(caller, assetId, amountHandle, escrow));
  }

  finalizeBidding(caller: Address, assetId: AssetId): RequestId {
    return this.guarded("finalizeBidding", () => this.bidding.finalize(caller, assetId));
  }

  // --- royalties ---

  payRoyalties(
    caller: Address,
    agreementId: AgreementId,
    revenueHandle: CiphertextHandle,
    reportingPeriod: number,
    amount: bigint
  ): RoyaltyPayment {
    return this.guarded("payRoyalties", () =>
      this.verification.payRoyalties(caller, agreementId, revenueHandle, reportingPeriod, amount)
    );
  }

  requestVerification(caller: Address, agreementId: AgreementId, paymentIndex: number): RequestId {
    return this.atomic(() => this.verification.requestVerification(caller, agreementId, paymentIndex));
  }

  // --- refunds ---

  claimTimeout(caller: Address, requestId: RequestId): void {
    this.atomic(() => this.coordinator.claimTimeout(caller, requestId));
  }

  withdraw(caller: Address): bigint {
    return this.guarded("withdraw", () => this.refunds.withdraw(caller));
  }

  /** claimTimeout and, when that leaves the caller a balance, withdraw. */
  claim(caller: Address, requestId: RequestId): bigint {
    return this.guarded("claim", () => {
      this.coordinator.claimTimeout(caller, requestId);
      return this.refunds.balanceOf(caller) > 0n ? this.refunds.withdraw(caller) : 0n;
    });
  }

  // --- oracle callbacks ---

  completeBidding(requestId: RequestId, cleartexts: readonly bigint[], attestation: Attestation): CompletionOutcome {
    return this.guarded("completeBidding", () =>
      this.coordinator.complete(requestId, cleartexts, attestation, "bidding")
    );
  }

  completeVerification(
    requestId: RequestId,
    cleartexts: readonly bigint[],
    attestation: Attestation
  ): CompletionOutcome {
    return this.guarded("completeVerification", () =>
      this.coordinator.complete(requestId, cleartexts, attestation, "verification")
    );
  }

  reportFailure(requestId: RequestId, reason: string, attestation: Attestation): CompletionOutcome {
    return this.guarded("reportFailure", () => this.coordinator.fail(requestId, reason, attestation));
  }

  // --- views ---

  getRequest(requestId: RequestId): DecryptionRequest | undefined {
    return this.coordinator.get(requestId);
  }

  listPendingRequests(): DecryptionRequest[] {
    return this.coordinator.listPending();
  }

  getSession(assetId: AssetId): BiddingSession | undefined {
    return this.bidding.getSession(assetId);
  }

  isBiddingActive(assetId: AssetId): boolean {
    return this.bidding.isBiddingActive(assetId);
  }

  listPayments(agreementId: AgreementId): RoyaltyPayment[] {
    return this.verification.listPayments(agreementId);
  }

  refundBalanceOf(account: Address): bigint {
    return this.refunds.balanceOf(account);
  }

  listRefunds(): RefundBalance[] {
    return this.refunds.list();
  }

  /** custody == active bid escrow + outstanding refunds */
  auditCustody(): CustodyAudit {
    const custody = this.ledger.custodyBalance();
    const activeEscrow = this.bidding.activeEscrow();
    const refundTotal = this.refunds.totalOutstanding();
    const balanced = custody === activeEscrow + refundTotal;
    if (!balanced) {
      this.log("error", "Custody does not match obligations", {
        custody,
        active_escrow: activeEscrow,
        refund_total: refundTotal,
      });
    }
    return { custody, active_escrow: activeEscrow, refund_total: refundTotal, balanced };
  }

  events(): SettlementEvent[] {
    return this.journal.list();
  }

  subscribe(listener: EventListener): () => void {
    return this.journal.subscribe(listener);
  }

  close(): void {
    this.store.close();
  }

  private atomic<T>(fn: () => T): T {
    return this.journal.atomic(() => this.store.transaction(fn));
  }

  private guarded<T>(operation: string, fn: () => T): T {
    return this.guard.run(operation, () => this.atomic(fn));
  }
}

export function createSettlementSystem(deps: SettlementDeps): SettlementSystem {
  return new SettlementSystem(deps);
}

/**
 * Royalty Verification Engine
 *
 * Licensees pay royalties against an encrypted revenue report; licensors can
 * later have the oracle check the payment against revenue and the sealed rate.
 * Verification never moves funds. A failed or timed-out check records the
 * payment as invalid with its cause.
 */

import type { SettlementConfig } from "../config";
import type { CorrelationHandler, DecryptionCoordinator, TagOf } from "../coordinator";
import { fail } from "../errors";
import type { EventJournal } from "../events";
import type { Ledger } from "../ledger";
import { log as defaultLog, type Logger } from "../logger";
import type { ConfidentialOracle } from "../oracle";
import type { RefundLedger } from "../refunds";
import type { AgreementRegistry, AgreementView } from "../registry";
import type { StateStore } from "../state/store";
import type { DecryptionRequest, FailureCause, RoyaltyPayment } from "../state/types";
import type { Address, AgreementId, CiphertextHandle, Clock, RequestId } from "../types";
import { computeExpected, isWithinTolerance } from "./math";

export type VerificationEngineDeps = {
  store: StateStore;
  registry: AgreementRegistry;
  ledger: Ledger;
  oracle: ConfidentialOracle;
  refunds: RefundLedger;
  coordinator: DecryptionCoordinator;
  journal: EventJournal;
  config: Pick<SettlementConfig, "rate_denominator" | "tolerance_numerator" | "tolerance_denominator">;
  now: Clock;
  log?: Logger;
};

export class VerificationEngine implements CorrelationHandler<"verification"> {
  private readonly log: Logger;

  constructor(private readonly deps: VerificationEngineDeps) {
    this.log = deps.log ?? defaultLog;
  }

  payRoyalties(
    caller: Address,
    agreementId: AgreementId,
    revenueHandle: CiphertextHandle,
    reportingPeriod: number,
    amount: bigint
  ): RoyaltyPayment {
    const agreement = this.requireAgreement(agreementId);
    if (agreement.licensee !== caller) {
      fail("NOT_LICENSEE", "Not the licensee", { agreement_id: agreementId, caller });
    }
    if (agreement.status !== "active") {
      fail("LICENSE_NOT_ACTIVE", "License not active", { agreement_id: agreementId, status: agreement.status });
    }
    if (amount <= 0n) {
      fail("INVALID_AMOUNT", "Royalty payment must be > 0", { amount: amount.toString() });
    }

    const paidAmountHandle = this.deps.oracle.sealPublic(amount);
    this.deps.ledger.escrow(caller, amount);

    const payment: RoyaltyPayment = {
      agreement_id: agreementId,
      payment_index: this.deps.store.listPayments(agreementId).length,
      payer: caller,
      revenue_handle: revenueHandle,
      paid_amount: amount,
      paid_amount_handle: paidAmountHandle,
      reporting_period: reportingPeriod,
      paid_at_ms: this.deps.now(),
      outcome: "unverified",
    };
    this.deps.store.putPayment(payment);
    this.deps.journal.emit({
      type: "royalty_paid",
      agreement_id: agreementId,
      payment_index: payment.payment_index,
      payer: caller,
      amount,
      reporting_period: reportingPeriod,
    });

    const context = { agreement_id: agreementId, payment_index: payment.payment_index };
    if (this.deps.ledger.payout(agreement.licensor, amount)) {
      this.deps.journal.emit({ type: "proceeds_paid", to: agreement.licensor, amount, context });
    } else {
      this.deps.refunds.credit(agreement.licensor, amount, "undelivered_proceeds", context);
    }
    return payment;
  }

  requestVerification(caller: Address, agreementId: AgreementId, paymentIndex: number): RequestId {
    const agreement = this.requireAgreement(agreementId);
    if (agreement.licensor !== caller) {
      fail("NOT_LICENSOR", "Not the licensor", { agreement_id: agreementId, caller });
    }
    const payment = Number.isInteger(paymentIndex)
      ? this.deps.store.getPayment(agreementId, paymentIndex)
      : undefined;
    if (!payment) {
      fail("INVALID_PAYMENT_INDEX", `No royalty payment ${paymentIndex} for agreement ${agreementId}`, {
        agreement_id: agreementId,
        payment_index: paymentIndex,
        payment_count: this.deps.store.listPayments(agreementId).length,
      });
    }
    if (payment.outcome !== "unverified") {
      fail("ALREADY_VERIFIED", `Payment ${paymentIndex} is already ${payment.outcome}`, {
        agreement_id: agreementId,
        payment_index: paymentIndex,
        outcome: payment.outcome,
      });
    }
    if (payment.request_id !== undefined) {
      fail("VERIFICATION_PENDING", `Payment ${paymentIndex} is awaiting request ${payment.request_id}`, {
        agreement_id: agreementId,
        payment_index: paymentIndex,
        request_id: payment.request_id,
      });
    }

    const requestId = this.deps.coordinator.issue(
      caller,
      { kind: "verification", agreement_id: agreementId, payment_index: paymentIndex },
      [payment.revenue_handle, agreement.royalty_rate_handle, payment.paid_amount_handle]
    );
    payment.request_id = requestId;
    this.deps.store.putPayment(payment);
    this.deps.journal.emit({
      type: "verification_requested",
      agreement_id: agreementId,
      payment_index: paymentIndex,
      request_id: requestId,
    });
    return requestId;
  }

  listPayments(agreementId: AgreementId): RoyaltyPayment[] {
    return this.deps.store.listPayments(agreementId);
  }

  onResult(tag: TagOf<"verification">, cleartexts: readonly bigint[], request: DecryptionRequest): void {
    const payment = this.requireAwaiting(tag, request.request_id);
    if (cleartexts.length !== 3) {
      fail("MALFORMED_PAYLOAD", `Expected 3 values (revenue, rate, paid), got ${cleartexts.length}`, {
        request_id: request.request_id,
      });
    }
    const [revenue, rate, paid] = cleartexts;
    if (revenue < 0n || rate < 0n || paid < 0n) {
      fail("MALFORMED_PAYLOAD", "Verification values must be non-negative", { request_id: request.request_id });
    }

    const { config } = this.deps;
    const expected = computeExpected(revenue, rate, BigInt(config.rate_denominator));
    const valid = isWithinTolerance(
      paid,
      expected,
      BigInt(config.tolerance_numerator),
      BigInt(config.tolerance_denominator)
    );

    payment.outcome = valid ? "valid" : "invalid";
    payment.verified_at_ms = this.deps.now();
    this.deps.store.putPayment(payment);
    this.deps.journal.emit({
      type: "verification_outcome",
      agreement_id: tag.agreement_id,
      payment_index: tag.payment_index,
      outcome: payment.outcome,
    });
    this.log("info", "Royalty payment verified", {
      agreement_id: tag.agreement_id,
      payment_index: tag.payment_index,
      outcome: payment.outcome,
    });
  }

  onFailure(tag: TagOf<"verification">, cause: FailureCause, request: DecryptionRequest): void {
    const payment = this.requireAwaiting(tag, request.request_id);
    payment.outcome = "invalid";
    payment.cause = cause;
    payment.verified_at_ms = this.deps.now();
    this.deps.store.putPayment(payment);
    this.deps.journal.emit({
      type: "verification_outcome",
      agreement_id: tag.agreement_id,
      payment_index: tag.payment_index,
      outcome: "invalid",
      cause,
    });
  }

  private requireAgreement(agreementId: AgreementId): AgreementView {
    const agreement = this.deps.registry.getAgreement(agreementId);
    if (!agreement) {
      fail("UNKNOWN_LICENSE", "Invalid license ID", { agreement_id: agreementId });
    }
    return agreement;
  }

  private requireAwaiting(tag: TagOf<"verification">, requestId: RequestId): RoyaltyPayment {
    const payment = this.deps.store.getPayment(tag.agreement_id, tag.payment_index);
    if (!payment || payment.outcome !== "unverified" || payment.request_id !== requestId) {
      fail("INVALID_REQUEST", `No payment is awaiting request ${requestId}`, {
        agreement_id: tag.agreement_id,
        payment_index: tag.payment_index,
        request_id: requestId,
      });
    }
    return payment;
  }
}

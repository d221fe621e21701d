import { describe, it, expect, beforeEach } from "vitest";
import { computeExpected, isWithinTolerance } from "../math";
import { catchSettlementError, createTestHarness, type TestHarness } from "../../testkit";
import { MS_PER_DAY } from "../../types";
import { BOB, LICENSEE, OWNER, activeLicense } from "../../__tests__/helpers";

describe("verification math", () => {
  it("computes floor(revenue * rate / denominator)", () => {
    expect(computeExpected(1000n, 1000n, 10_000n)).toBe(100n);
    expect(computeExpected(999n, 1000n, 10_000n)).toBe(99n);
    expect(computeExpected(0n, 1000n, 10_000n)).toBe(0n);
  });

  it("accepts payments at or above floor(expected * tolerance)", () => {
    expect(isWithinTolerance(95n, 100n, 95n, 100n)).toBe(true);
    expect(isWithinTolerance(94n, 100n, 95n, 100n)).toBe(false);
    // floor(99 * 95 / 100) = 94
    expect(isWithinTolerance(94n, 99n, 95n, 100n)).toBe(true);
  });

  it("rejects a zero denominator", () => {
    expect(() => computeExpected(1n, 1n, 0n)).toThrow("rate denominator must be > 0");
    expect(() => isWithinTolerance(1n, 1n, 1n, 0n)).toThrow("tolerance denominator must be > 0");
  });
});

describe("VerificationEngine", () => {
  let h: TestHarness;
  let licenseId: number;

  beforeEach(() => {
    h = createTestHarness();
    licenseId = activeLicense(h);
  });

  function pay(revenue: bigint, amount: bigint) {
    h.fund(LICENSEE, amount);
    return h.system.payRoyalties(LICENSEE, licenseId, h.oracle.encrypt(revenue), 202501, amount);
  }

  describe("payRoyalties", () => {
    it("records the payment and passes the funds to the licensor", () => {
      const payment = pay(1000n, 95n);

      expect(payment).toMatchObject({
        agreement_id: licenseId,
        payment_index: 0,
        payer: LICENSEE,
        paid_amount: 95n,
        reporting_period: 202501,
        outcome: "unverified",
      });
      expect(h.ledger.getBalance(OWNER)).toBe(95n);
      expect(h.ledger.custodyBalance()).toBe(0n);
      expect(h.system.getRoyaltyPaymentCount(licenseId)).toBe(1);
      expect(h.system.journal.ofType("royalty_paid")).toMatchObject([
        { agreement_id: licenseId, payment_index: 0, payer: LICENSEE, amount: 95n, reporting_period: 202501 },
      ]);
    });

    it("allows only the licensee of an active license", () => {
      h.fund(BOB, 10n);
      expect(catchSettlementError(() => h.system.payRoyalties(BOB, licenseId, "ct:r", 202501, 10n)).code).toBe(
        "NOT_LICENSEE"
      );
      expect(catchSettlementError(() => h.system.payRoyalties(LICENSEE, 99, "ct:r", 202501, 10n)).code).toBe(
        "UNKNOWN_LICENSE"
      );
      expect(catchSettlementError(() => h.system.payRoyalties(LICENSEE, licenseId, "ct:r", 202501, 0n)).code).toBe(
        "INVALID_AMOUNT"
      );

      h.system.updateLicenseStatus(OWNER, licenseId, "suspended");
      expect(catchSettlementError(() => pay(1000n, 10n)).code).toBe("LICENSE_NOT_ACTIVE");
    });

    it("credits the licensor when the payout is rejected", () => {
      h.ledger.rejectPayoutsTo(OWNER);
      pay(1000n, 95n);
      expect(h.system.refundBalanceOf(OWNER)).toBe(95n);
      expect(h.system.auditCustody()).toEqual({ custody: 95n, active_escrow: 0n, refund_total: 95n, balanced: true });
    });
  });

  describe("requestVerification", () => {
    it("sends revenue, rate and paid handles to the oracle", () => {
      const payment = pay(1000n, 95n);
      const requestId = h.system.requestVerification(OWNER, licenseId, 0);

      const license = h.system.getLicenseInfo(licenseId);
      expect(h.system.getRequest(requestId)).toMatchObject({
        correlation: { kind: "verification", agreement_id: licenseId, payment_index: 0 },
        handles: [payment.revenue_handle, license.royalty_rate_handle, payment.paid_amount_handle],
        callback: "completeVerification",
      });
      expect(h.system.listPayments(licenseId)[0].request_id).toBe(requestId);
    });

    it("checks caller, index and verification state", () => {
      pay(1000n, 95n);
      expect(catchSettlementError(() => h.system.requestVerification(LICENSEE, licenseId, 0)).code).toBe(
        "NOT_LICENSOR"
      );
      expect(catchSettlementError(() => h.system.requestVerification(OWNER, licenseId, 1)).code).toBe(
        "INVALID_PAYMENT_INDEX"
      );
      expect(catchSettlementError(() => h.system.requestVerification(OWNER, licenseId, -1)).code).toBe(
        "INVALID_PAYMENT_INDEX"
      );

      const requestId = h.system.requestVerification(OWNER, licenseId, 0);
      expect(catchSettlementError(() => h.system.requestVerification(OWNER, licenseId, 0)).code).toBe(
        "VERIFICATION_PENDING"
      );

      h.deliver(requestId);
      expect(catchSettlementError(() => h.system.requestVerification(OWNER, licenseId, 0)).code).toBe(
        "ALREADY_VERIFIED"
      );
    });
  });

  describe("result handling", () => {
    it("marks a payment inside tolerance valid", () => {
      pay(1000n, 95n);
      h.deliver(h.system.requestVerification(OWNER, licenseId, 0));

      expect(h.system.listPayments(licenseId)[0]).toMatchObject({ outcome: "valid", verified_at_ms: h.clock.now() });
      expect(h.system.journal.ofType("verification_outcome")).toMatchObject([
        { agreement_id: licenseId, payment_index: 0, outcome: "valid" },
      ]);
    });

    it("marks an underpayment invalid without moving funds", () => {
      pay(1000n, 94n);
      const before = h.ledger.getBalance(OWNER);
      h.deliver(h.system.requestVerification(OWNER, licenseId, 0));

      const verified = h.system.listPayments(licenseId)[0];
      expect(verified.outcome).toBe("invalid");
      expect(verified.cause).toBeUndefined();
      expect(h.ledger.getBalance(OWNER)).toBe(before);
      expect(h.system.listRefunds()).toEqual([]);
    });

    it("verifies each payment independently", () => {
      pay(1000n, 95n);
      pay(2000n, 150n);
      h.deliver(h.system.requestVerification(OWNER, licenseId, 1));

      expect(h.system.listPayments(licenseId).map((p) => p.outcome)).toEqual(["unverified", "invalid"]);
    });

    it("records a malformed payload as invalid with its cause", () => {
      pay(1000n, 95n);
      const requestId = h.system.requestVerification(OWNER, licenseId, 0);
      h.oracle.deliver(h.oracle.respondWith(requestId, [1000n, 1000n]), h.system);

      expect(h.system.listPayments(licenseId)[0]).toMatchObject({ outcome: "invalid", cause: "malformed_payload" });
      expect(h.system.getRequest(requestId)?.status).toBe("failed");
    });

    it("records an altered result as invalid with attestation_invalid", () => {
      pay(1000n, 95n);
      const requestId = h.system.requestVerification(OWNER, licenseId, 0);
      const response = h.oracle.respond(requestId);
      if (response.kind !== "fulfilled") throw new Error("expected a fulfilled response");

      h.system.completeVerification(requestId, [1000n, 1000n, 100n], response.attestation);

      expect(h.system.listPayments(licenseId)[0]).toMatchObject({ outcome: "invalid", cause: "attestation_invalid" });
      expect(h.system.getRequest(requestId)?.status).toBe("failed");
      expect(h.system.listRefunds()).toEqual([]);
    });

    it("records a timeout as invalid with its cause", () => {
      pay(1000n, 95n);
      const requestId = h.system.requestVerification(OWNER, licenseId, 0);
      h.clock.advance(7 * MS_PER_DAY);
      h.system.claimTimeout(BOB, requestId);

      expect(h.system.listPayments(licenseId)[0]).toMatchObject({ outcome: "invalid", cause: "timeout" });
      expect(h.system.journal.ofType("verification_outcome")).toMatchObject([
        { outcome: "invalid", cause: "timeout" },
      ]);
      expect(h.system.listRefunds()).toEqual([]);
    });
  });
});

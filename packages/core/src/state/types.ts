/**
 * Durable Record Types
 *
 * The persisted state of the coordination layer: decryption requests by id,
 * bidding sessions by asset, royalty payments by (agreement, index) and refund
 * balances by account. Registry records (patents, licenses) live in the same
 * store and are typed in registry/types.ts.
 */

import type { Address, AgreementId, AssetId, CiphertextHandle, RequestId } from "../types";

/**
 * Business case a decryption request belongs to. Every request carries exactly
 * one tag, and dispatch on `kind` is exhaustive.
 */
export type CorrelationTag =
  | { kind: "bidding"; asset_id: AssetId }
  | { kind: "verification"; agreement_id: AgreementId; payment_index: number };

export type CorrelationKind = CorrelationTag["kind"];

/** Oracle entry point a request's result must come back through. */
export type CallbackSelector = "completeBidding" | "completeVerification";

export const CALLBACK_FOR_KIND: Record<CorrelationKind, CallbackSelector> = {
  bidding: "completeBidding",
  verification: "completeVerification",
};

export type RequestStatus = "pending" | "completed" | "failed" | "timed_out";

/** Why a request ended without a usable result. */
export type FailureCause = "oracle_failure" | "malformed_payload" | "attestation_invalid" | "timeout";

/** Why a bidding session closed without an award. */
export type UnresolvedCause = FailureCause | "asset_unavailable";

export interface DecryptionRequest {
  request_id: RequestId;
  issuer: Address;
  created_at_ms: number;
  status: RequestStatus;
  correlation: CorrelationTag;
  handles: CiphertextHandle[];
  callback: CallbackSelector;
  resolved_at_ms?: number;
  failure_reason?: string;
}

export type SessionStatus = "open" | "awaiting_result" | "resolved" | "unresolved";

export interface SealedBid {
  bidder: Address;
  /** Plaintext deposit, used for refund accounting only. */
  escrow: bigint;
  /** Encrypted bid value, compared by the oracle. */
  amount_handle: CiphertextHandle;
  submitted_at_ms: number;
}

export interface BiddingSession {
  asset_id: AssetId;
  controller: Address;
  status: SessionStatus;
  opened_at_ms: number;
  end_at_ms: number;
  /** Insertion order is submission order; ties resolve to the lower index. */
  bids: SealedBid[];
  request_id?: RequestId;
  winner?: Address;
  winning_index?: number;
  closed_at_ms?: number;
}

export type VerificationOutcome = "unverified" | "valid" | "invalid";

export interface RoyaltyPayment {
  agreement_id: AgreementId;
  payment_index: number;
  payer: Address;
  revenue_handle: CiphertextHandle;
  paid_amount: bigint;
  paid_amount_handle: CiphertextHandle;
  reporting_period: number;
  paid_at_ms: number;
  outcome: VerificationOutcome;
  request_id?: RequestId;
  /** Why an invalid outcome was recorded without a comparison. */
  cause?: FailureCause;
  verified_at_ms?: number;
}

export type RefundReason =
  | "timeout"
  | "oracle_failure"
  | "asset_unavailable"
  | "lost_bid"
  | "replaced_bid"
  | "undelivered_proceeds";

export interface RefundBalance {
  account: Address;
  amount: bigint;
}

export function isSessionActive(session: BiddingSession): boolean {
  return session.status === "open" || session.status === "awaiting_result";
}

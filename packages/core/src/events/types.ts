/**
 * Settlement Events
 *
 * Every state transition appends one of these to the journal. Amounts stay
 * bigint in memory; sinks that serialize them write decimal strings.
 */

import type { Address, AgreementId, AssetId, RequestId } from "../types";
import type {
  CallbackSelector,
  CorrelationTag,
  FailureCause,
  RefundReason,
  UnresolvedCause,
  VerificationOutcome,
} from "../state/types";

/** Where a refund credit or payout originated. */
export type EventContext = {
  request_id?: RequestId;
  asset_id?: AssetId;
  agreement_id?: AgreementId;
  payment_index?: number;
};

export type SettlementEventBody =
  | { type: "request_issued"; request_id: RequestId; issuer: Address; correlation: CorrelationTag; callback: CallbackSelector }
  | { type: "request_completed"; request_id: RequestId; correlation: CorrelationTag }
  | { type: "request_failed"; request_id: RequestId; correlation: CorrelationTag; cause: FailureCause; reason?: string }
  | { type: "request_timed_out"; request_id: RequestId; correlation: CorrelationTag; claimed_by: Address }
  | { type: "refund_credited"; account: Address; amount: bigint; reason: RefundReason; context: EventContext }
  | { type: "refund_withdrawn"; account: Address; amount: bigint }
  | { type: "proceeds_paid"; to: Address; amount: bigint; context: EventContext }
  | { type: "bidding_started"; asset_id: AssetId; controller: Address; end_at_ms: number }
  | { type: "bid_submitted"; asset_id: AssetId; bidder: Address; escrow: bigint; bid_index: number; replaced: boolean }
  | { type: "bidding_finalize_requested"; asset_id: AssetId; request_id: RequestId; bid_count: number }
  | { type: "winner_awarded"; asset_id: AssetId; winner: Address; winning_index: number }
  | { type: "bidding_unresolved"; asset_id: AssetId; request_id: RequestId; cause: UnresolvedCause }
  | {
      type: "royalty_paid";
      agreement_id: AgreementId;
      payment_index: number;
      payer: Address;
      amount: bigint;
      reporting_period: number;
    }
  | { type: "verification_requested"; agreement_id: AgreementId; payment_index: number; request_id: RequestId }
  | {
      type: "verification_outcome";
      agreement_id: AgreementId;
      payment_index: number;
      outcome: VerificationOutcome;
      cause?: FailureCause;
    }
  | { type: "patent_registered"; patent_id: AssetId; owner: Address }
  | { type: "patent_status_changed"; patent_id: AssetId; status: string }
  | { type: "license_requested"; license_id: AgreementId; patent_id: AssetId; licensee: Address }
  | { type: "license_approved"; license_id: AgreementId; licensor: Address }
  | { type: "license_status_changed"; license_id: AgreementId; status: string }
  | { type: "registry_pause_changed"; patent_id: AssetId; paused: boolean; by: Address };

export type SettlementEventType = SettlementEventBody["type"];

export type SettlementEvent = SettlementEventBody & {
  /** Position in the committed journal, starting at 1 and gapless. */
  seq: number;
  ts_ms: number;
};

export type EventOfType<K extends SettlementEventType> = Extract<SettlementEvent, { type: K }>;

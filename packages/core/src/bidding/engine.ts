/**
 * Confidential Bidding Engine
 *
 * One time-boxed sealed-bid session per asset:
 *   closed -> open -> awaiting_result -> resolved | unresolved
 *
 * Bids carry a plaintext escrow (what moves on the ledger) and an encrypted
 * amount (what the oracle compares). Every escrow leaves custody through
 * exactly one of: winner payout, or a lost_bid, replaced_bid, oracle_failure,
 * asset_unavailable or timeout credit.
 *
 * Bids are only taken while the asset is active, and the award is only applied
 * if it still is when the result arrives. Finalizing never depends on the
 * asset's status, so escrow can always be released.
 */

import type { SettlementConfig } from "../config";
import type { CorrelationHandler, DecryptionCoordinator, TagOf } from "../coordinator";
import { fail } from "../errors";
import type { EventJournal } from "../events";
import type { Ledger } from "../ledger";
import { log as defaultLog, type Logger } from "../logger";
import type { RefundLedger } from "../refunds";
import type { AgreementRegistry } from "../registry";
import type { StateStore } from "../state/store";
import {
  isSessionActive,
  type BiddingSession,
  type DecryptionRequest,
  type FailureCause,
  type RefundReason,
  type SealedBid,
  type UnresolvedCause,
} from "../state/types";
import { MS_PER_HOUR, type Address, type AssetId, type CiphertextHandle, type Clock, type RequestId } from "../types";

export type BiddingEngineDeps = {
  store: StateStore;
  registry: AgreementRegistry;
  ledger: Ledger;
  refunds: RefundLedger;
  coordinator: DecryptionCoordinator;
  journal: EventJournal;
  config: Pick<SettlementConfig, "bidding_min_hours" | "bidding_max_hours" | "min_bid_escrow">;
  now: Clock;
  log?: Logger;
};

export type BidReceipt = {
  asset_id: AssetId;
  bid_index: number;
  replaced: boolean;
};

/** Index of the maximum value; the earliest index wins a tie. */
export function selectWinner(values: readonly bigint[]): number {
  if (values.length === 0) {
    throw new Error("selectWinner needs at least one value");
  }
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

const REFUND_REASON_FOR_CAUSE: Record<UnresolvedCause, RefundReason> = {
  timeout: "timeout",
  asset_unavailable: "asset_unavailable",
  oracle_failure: "oracle_failure",
  malformed_payload: "oracle_failure",
  attestation_invalid: "oracle_failure",
};

export class BiddingEngine implements CorrelationHandler<"bidding"> {
  private readonly log: Logger;

  constructor(private readonly deps: BiddingEngineDeps) {
    this.log = deps.log ?? defaultLog;
  }

  start(caller: Address, assetId: AssetId, durationHours: number): BiddingSession {
    const { registry, store, config } = this.deps;
    const controller = registry.getControllingAccount(assetId);
    if (controller === undefined) {
      fail("UNKNOWN_PATENT", "Invalid patent ID", { asset_id: assetId });
    }
    if (controller !== caller) {
      fail("NOT_CONTROLLER", "Not patent owner", { asset_id: assetId, caller });
    }
    if (registry.getStatus(assetId) !== "active") {
      fail("PATENT_NOT_ACTIVE", "Patent not active", { asset_id: assetId, status: registry.getStatus(assetId) });
    }
    const existing = store.getSession(assetId);
    if (existing && isSessionActive(existing) && !this.isAbandoned(existing)) {
      fail("SESSION_ALREADY_OPEN", `Bidding for asset ${assetId} is already ${existing.status}`, {
        asset_id: assetId,
        status: existing.status,
      });
    }
    if (
      !Number.isInteger(durationHours) ||
      durationHours < config.bidding_min_hours ||
      durationHours > config.bidding_max_hours
    ) {
      fail("INVALID_DURATION", "Invalid duration", {
        duration_hours: durationHours,
        min: config.bidding_min_hours,
        max: config.bidding_max_hours,
      });
    }

    const now = this.deps.now();
    const session: BiddingSession = {
      asset_id: assetId,
      controller: caller,
      status: "open",
      opened_at_ms: now,
      end_at_ms: now + durationHours * MS_PER_HOUR,
      bids: [],
    };
    store.putSession(session);
    this.deps.journal.emit({
      type: "bidding_started",
      asset_id: assetId,
      controller: caller,
      end_at_ms: session.end_at_ms,
    });
    return session;
  }

  submitBid(caller: Address, assetId: AssetId, amountHandle: CiphertextHandle, escrow: bigint): BidReceipt {
    const { store, config, registry } = this.deps;
    const session = store.getSession(assetId);
    if (!session || session.status !== "open") {
      fail("NOT_OPEN", "Bidding not open", { asset_id: assetId });
    }
    const status = registry.getStatus(assetId);
    if (status !== "active") {
      fail("PATENT_NOT_ACTIVE", "Patent not active", { asset_id: assetId, status });
    }
    const now = this.deps.now();
    if (now >= session.end_at_ms) {
      fail("ENDED", "Bidding ended", { asset_id: assetId, end_at_ms: session.end_at_ms });
    }
    if (escrow <= 0n) {
      fail("INVALID_AMOUNT", "Bid escrow must be > 0", { escrow: escrow.toString() });
    }
    if (escrow < config.min_bid_escrow) {
      fail("ESCROW_BELOW_FLOOR", `Bid escrow is below the minimum of ${config.min_bid_escrow}`, {
        escrow: escrow.toString(),
        min_bid_escrow: config.min_bid_escrow.toString(),
      });
    }

    this.deps.ledger.escrow(caller, escrow);

    const previous = session.bids.find((bid) => bid.bidder === caller);
    if (previous) {
      session.bids = session.bids.filter((bid) => bid !== previous);
      this.deps.refunds.credit(caller, previous.escrow, "replaced_bid", { asset_id: assetId });
    }
    const bid: SealedBid = { bidder: caller, escrow, amount_handle: amountHandle, submitted_at_ms: now };
    session.bids.push(bid);
    store.putSession(session);

    const bidIndex = session.bids.length - 1;
    this.deps.journal.emit({
      type: "bid_submitted",
      asset_id: assetId,
      bidder: caller,
      escrow,
      bid_index: bidIndex,
      replaced: previous !== undefined,
    });
    return { asset_id: assetId, bid_index: bidIndex, replaced: previous !== undefined };
  }

  finalize(caller: Address, assetId: AssetId): RequestId {
    const session = this.deps.store.getSession(assetId);
    if (!session) {
      fail("NOT_OPEN", "Bidding not open", { asset_id: assetId });
    }
    if (session.controller !== caller) {
      fail("NOT_CONTROLLER", "Not patent owner", { asset_id: assetId, caller });
    }
    if (session.status !== "open") {
      fail("NOT_OPEN", `Bidding for asset ${assetId} is ${session.status}`, {
        asset_id: assetId,
        status: session.status,
      });
    }
    if (this.deps.now() < session.end_at_ms) {
      fail("BIDDING_NOT_ENDED", "Bidding has not ended", { asset_id: assetId, end_at_ms: session.end_at_ms });
    }
    if (session.bids.length === 0) {
      fail("NO_BIDS", "No bids to finalize", { asset_id: assetId });
    }

    const requestId = this.deps.coordinator.issue(
      caller,
      { kind: "bidding", asset_id: assetId },
      session.bids.map((bid) => bid.amount_handle)
    );
    session.status = "awaiting_result";
    session.request_id = requestId;
    this.deps.store.putSession(session);
    this.deps.journal.emit({
      type: "bidding_finalize_requested",
      asset_id: assetId,
      request_id: requestId,
      bid_count: session.bids.length,
    });
    return requestId;
  }

  getSession(assetId: AssetId): BiddingSession | undefined {
    return this.deps.store.getSession(assetId);
  }

  isBiddingActive(assetId: AssetId): boolean {
    const session = this.deps.store.getSession(assetId);
    return session !== undefined && session.status === "open" && this.deps.now() < session.end_at_ms;
  }

  /** Escrow still held for bids in open or awaiting sessions. */
  activeEscrow(): bigint {
    let total = 0n;
    for (const session of this.deps.store.listSessions()) {
      if (!isSessionActive(session)) continue;
      for (const bid of session.bids) total += bid.escrow;
    }
    return total;
  }

  onResult(tag: TagOf<"bidding">, cleartexts: readonly bigint[], request: DecryptionRequest): void {
    const session = this.requireAwaiting(tag.asset_id, request.request_id);
    if (cleartexts.length !== session.bids.length) {
      fail("MALFORMED_PAYLOAD", `Expected ${session.bids.length} bid values, got ${cleartexts.length}`, {
        asset_id: tag.asset_id,
        request_id: request.request_id,
      });
    }
    if (cleartexts.some((value) => value < 0n)) {
      fail("MALFORMED_PAYLOAD", "Bid values must be non-negative", {
        asset_id: tag.asset_id,
        request_id: request.request_id,
      });
    }

    const status = this.deps.registry.getStatus(tag.asset_id);
    if (status !== "active") {
      this.log("warn", "Asset no longer active, award withheld", { asset_id: tag.asset_id, status });
      this.unresolve(session, request, "asset_unavailable");
      return;
    }

    const winningIndex = selectWinner(cleartexts);
    const winner = session.bids[winningIndex];
    const context = { request_id: request.request_id, asset_id: tag.asset_id };

    session.bids.forEach((bid, index) => {
      if (index !== winningIndex) this.deps.refunds.credit(bid.bidder, bid.escrow, "lost_bid", context);
    });
    this.deps.registry.setStatus(tag.asset_id, "exclusively_licensed");

    session.status = "resolved";
    session.winner = winner.bidder;
    session.winning_index = winningIndex;
    session.closed_at_ms = this.deps.now();
    this.deps.store.putSession(session);
    this.deps.journal.emit({
      type: "winner_awarded",
      asset_id: tag.asset_id,
      winner: winner.bidder,
      winning_index: winningIndex,
    });

    // Proceeds go out last; a rejecting controller is credited instead.
    if (this.deps.ledger.payout(session.controller, winner.escrow)) {
      this.deps.journal.emit({ type: "proceeds_paid", to: session.controller, amount: winner.escrow, context });
    } else {
      this.deps.refunds.credit(session.controller, winner.escrow, "undelivered_proceeds", context);
    }
    this.log("info", "Bidding resolved", {
      asset_id: tag.asset_id,
      winner: winner.bidder,
      bid_count: session.bids.length,
    });
  }

  onFailure(tag: TagOf<"bidding">, cause: FailureCause, request: DecryptionRequest): void {
    this.unresolve(this.requireAwaiting(tag.asset_id, request.request_id), request, cause);
  }

  /** Credits every bid back and closes the session without a winner. */
  private unresolve(session: BiddingSession, request: DecryptionRequest, cause: UnresolvedCause): void {
    const reason = REFUND_REASON_FOR_CAUSE[cause];
    const context = { request_id: request.request_id, asset_id: session.asset_id };
    for (const bid of session.bids) {
      this.deps.refunds.credit(bid.bidder, bid.escrow, reason, context);
    }
    session.status = "unresolved";
    session.closed_at_ms = this.deps.now();
    this.deps.store.putSession(session);
    this.deps.journal.emit({
      type: "bidding_unresolved",
      asset_id: session.asset_id,
      request_id: request.request_id,
      cause,
    });
    this.log("warn", "Bidding unresolved, escrows refunded", {
      asset_id: session.asset_id,
      cause,
      bid_count: session.bids.length,
    });
  }

  /** An open session that ended without a single bid holds no funds and can be replaced. */
  private isAbandoned(session: BiddingSession): boolean {
    return session.status === "open" && session.bids.length === 0 && this.deps.now() >= session.end_at_ms;
  }

  private requireAwaiting(assetId: AssetId, requestId: RequestId): BiddingSession {
    const session = this.deps.store.getSession(assetId);
    if (!session || session.status !== "awaiting_result" || session.request_id !== requestId) {
      fail("INVALID_REQUEST", `No session for asset ${assetId} is awaiting request ${requestId}`, {
        asset_id: assetId,
        request_id: requestId,
      });
    }
    return session;
  }
}

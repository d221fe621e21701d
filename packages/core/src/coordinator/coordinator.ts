/**
 * Decryption Request Coordinator
 *
 * Owns the request lifecycle: pending -> completed | failed | timed_out,
 * exactly once. A callback whose attestation does not verify ends the request
 * as failed (attestation_invalid) and runs the failure path; its cleartexts
 * are never applied. The status is written before the domain effect runs, and
 * every pending request can be driven to a refund by time alone through
 * claimTimeout().
 */

import { describeError, fail, isSettlementError } from "../errors";
import type { EventJournal } from "../events";
import { log as defaultLog, type Logger } from "../logger";
import {
  failedPayload,
  fulfilledPayload,
  type Attestation,
  type AttestationVerifier,
  type AttestedPayload,
  type ConfidentialOracle,
} from "../oracle";
import type { StateStore } from "../state/store";
import {
  CALLBACK_FOR_KIND,
  type CorrelationKind,
  type CorrelationTag,
  type DecryptionRequest,
  type FailureCause,
} from "../state/types";
import type { Address, CiphertextHandle, Clock, RequestId } from "../types";
import { createSequence, type Sequence } from "./sequence";

export type TagOf<K extends CorrelationKind> = Extract<CorrelationTag, { kind: K }>;

/**
 * Domain side of a correlation kind. onResult may throw MALFORMED_PAYLOAD, in
 * which case its writes are discarded and onFailure runs instead.
 */
export interface CorrelationHandler<K extends CorrelationKind> {
  onResult(tag: TagOf<K>, cleartexts: readonly bigint[], request: DecryptionRequest): void;
  onFailure(tag: TagOf<K>, cause: FailureCause, request: DecryptionRequest): void;
}

export type CorrelationHandlers = { [K in CorrelationKind]: CorrelationHandler<K> };

export type CompletionOutcome =
  | { request_id: RequestId; status: "completed" }
  | { request_id: RequestId; status: "failed"; cause: FailureCause; reason?: string };

export type CoordinatorOptions = {
  store: StateStore;
  oracle: ConfidentialOracle;
  verifier: AttestationVerifier;
  journal: EventJournal;
  now: Clock;
  timeoutMs: number;
  sequence?: Sequence;
  log?: Logger;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled correlation: ${JSON.stringify(value)}`);
}

export class DecryptionCoordinator {
  private handlers: CorrelationHandlers | undefined;
  private readonly sequence: Sequence;
  private readonly log: Logger;

  constructor(private readonly opts: CoordinatorOptions) {
    this.sequence = opts.sequence ?? createSequence(opts.store.lastRequestId() + 1);
    this.log = opts.log ?? defaultLog;
  }

  get timeoutMs(): number {
    return this.opts.timeoutMs;
  }

  bind(handlers: CorrelationHandlers): void {
    this.handlers = handlers;
  }

  issue(issuer: Address, correlation: CorrelationTag, handles: readonly CiphertextHandle[]): RequestId {
    const requestId = this.sequence.next();
    const callback = CALLBACK_FOR_KIND[correlation.kind];
    const request: DecryptionRequest = {
      request_id: requestId,
      issuer,
      created_at_ms: this.opts.now(),
      status: "pending",
      correlation,
      handles: [...handles],
      callback,
    };
    this.opts.store.putRequest(request);
    this.opts.journal.emit({ type: "request_issued", request_id: requestId, issuer, correlation, callback });
    this.opts.oracle.requestDecryption(requestId, request.handles, callback);
    this.log("debug", "Decryption request issued", { request_id: requestId, kind: correlation.kind });
    return requestId;
  }

  complete(
    requestId: RequestId,
    cleartexts: readonly bigint[],
    attestation: Attestation,
    expectedKind?: CorrelationKind
  ): CompletionOutcome {
    const request = this.requirePending(requestId, expectedKind);
    const handlers = this.requireHandlers();
    if (!this.attested(fulfilledPayload(requestId, cleartexts), attestation, requestId)) {
      return this.rejectAttestation(handlers, request);
    }

    try {
      this.opts.journal.atomic(() =>
        this.opts.store.transaction(() => {
          const completed = this.resolve(request, "completed");
          this.opts.journal.emit({
            type: "request_completed",
            request_id: requestId,
            correlation: completed.correlation,
          });
          this.dispatchResult(handlers, completed, cleartexts);
        })
      );
      return { request_id: requestId, status: "completed" };
    } catch (error) {
      if (!isSettlementError(error, "MALFORMED_PAYLOAD")) throw error;
      this.log("warn", "Oracle payload rejected", { request_id: requestId, error: describeError(error) });
      this.failRequest(handlers, request, "malformed_payload", error.message);
      return { request_id: requestId, status: "failed", cause: "malformed_payload", reason: error.message };
    }
  }

  /** Signed failure report from the oracle. */
  fail(requestId: RequestId, reason: string, attestation: Attestation): CompletionOutcome {
    const request = this.requirePending(requestId);
    const handlers = this.requireHandlers();
    if (!this.attested(failedPayload(requestId, reason), attestation, requestId)) {
      return this.rejectAttestation(handlers, request);
    }
    this.failRequest(handlers, request, "oracle_failure", reason);
    return { request_id: requestId, status: "failed", cause: "oracle_failure", reason };
  }

  /** Permissionless once the timeout has elapsed. */
  claimTimeout(caller: Address, requestId: RequestId): void {
    const request = this.opts.store.getRequest(requestId);
    if (!request) {
      fail("NOT_PENDING", `No decryption request ${requestId}`, { request_id: requestId });
    }
    if (request.status !== "pending") {
      fail("ALREADY_RESOLVED", `Request ${requestId} is already ${request.status}`, {
        request_id: requestId,
        status: request.status,
      });
    }
    const elapsed = this.opts.now() - request.created_at_ms;
    if (elapsed < this.opts.timeoutMs) {
      fail("NOT_EXPIRED", `Request ${requestId} has not timed out yet`, {
        request_id: requestId,
        elapsed_ms: elapsed,
        timeout_ms: this.opts.timeoutMs,
      });
    }

    const handlers = this.requireHandlers();
    const timedOut = this.resolve(request, "timed_out");
    this.opts.journal.emit({
      type: "request_timed_out",
      request_id: requestId,
      correlation: timedOut.correlation,
      claimed_by: caller,
    });
    this.dispatchFailure(handlers, timedOut, "timeout");
    this.log("info", "Decryption request timed out", { request_id: requestId, claimed_by: caller });
  }

  get(requestId: RequestId): DecryptionRequest | undefined {
    return this.opts.store.getRequest(requestId);
  }

  listPending(): DecryptionRequest[] {
    return this.opts.store.listRequests({ status: "pending" });
  }

  private failRequest(
    handlers: CorrelationHandlers,
    request: DecryptionRequest,
    cause: FailureCause,
    reason: string
  ): void {
    const failed = this.resolve(request, "failed", reason);
    this.opts.journal.emit({
      type: "request_failed",
      request_id: request.request_id,
      correlation: failed.correlation,
      cause,
      reason,
    });
    this.dispatchFailure(handlers, failed, cause);
  }

  private resolve(
    request: DecryptionRequest,
    status: "completed" | "failed" | "timed_out",
    reason?: string
  ): DecryptionRequest {
    const resolved: DecryptionRequest = {
      ...request,
      status,
      resolved_at_ms: this.opts.now(),
      ...(reason !== undefined ? { failure_reason: reason } : {}),
    };
    this.opts.store.putRequest(resolved);
    return resolved;
  }

  private dispatchResult(handlers: CorrelationHandlers, request: DecryptionRequest, cleartexts: readonly bigint[]): void {
    const tag = request.correlation;
    switch (tag.kind) {
      case "bidding":
        return handlers.bidding.onResult(tag, cleartexts, request);
      case "verification":
        return handlers.verification.onResult(tag, cleartexts, request);
      default:
        return assertNever(tag);
    }
  }

  private dispatchFailure(handlers: CorrelationHandlers, request: DecryptionRequest, cause: FailureCause): void {
    const tag = request.correlation;
    switch (tag.kind) {
      case "bidding":
        return handlers.bidding.onFailure(tag, cause, request);
      case "verification":
        return handlers.verification.onFailure(tag, cause, request);
      default:
        return assertNever(tag);
    }
  }

  private requirePending(requestId: RequestId, expectedKind?: CorrelationKind): DecryptionRequest {
    const request = this.opts.store.getRequest(requestId);
    if (!request) {
      fail("INVALID_REQUEST", `Unknown decryption request ${requestId}`, { request_id: requestId });
    }
    if (request.status !== "pending") {
      fail("INVALID_REQUEST", `Request ${requestId} is already ${request.status}`, {
        request_id: requestId,
        status: request.status,
      });
    }
    if (expectedKind !== undefined && request.correlation.kind !== expectedKind) {
      fail("INVALID_REQUEST", `Request ${requestId} is not a ${expectedKind} request`, {
        request_id: requestId,
        expected: expectedKind,
        actual: request.correlation.kind,
      });
    }
    return request;
  }

  private attested(payload: AttestedPayload, attestation: Attestation, requestId: RequestId): boolean {
    if (this.opts.verifier.verify(payload, attestation)) return true;
    this.log("warn", "Attestation rejected", {
      request_id: requestId,
      signer: attestation.signer_public_key_b58,
    });
    return false;
  }

  private rejectAttestation(handlers: CorrelationHandlers, request: DecryptionRequest): CompletionOutcome {
    const reason = `Attestation for request ${request.request_id} did not verify`;
    this.failRequest(handlers, request, "attestation_invalid", reason);
    return { request_id: request.request_id, status: "failed", cause: "attestation_invalid", reason };
  }

  private requireHandlers(): CorrelationHandlers {
    if (!this.handlers) {
      fail("HANDLERS_NOT_BOUND", "Coordinator has no correlation handlers bound");
    }
    return this.handlers;
  }
}

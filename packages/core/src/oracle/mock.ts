/**
 * Mock Confidential Oracle
 *
 * Holds plaintexts behind counter-based handles and answers decryption jobs
 * on demand. Nothing is delivered until the test (or demo) asks for it, which
 * is how lost callbacks and timeouts are simulated.
 */

import type { Attestation } from "./attestation";
import {
  failedPayload,
  fulfilledPayload,
  generateKeypair,
  keypairFromSeed,
  publicKeyToB58,
  signAttestation,
  type Keypair,
} from "./attestation";
import type { ConfidentialOracle } from "./types";
import type { CallbackSelector } from "../state/types";
import type { CiphertextHandle, RequestId } from "../types";

export type DecryptionJob = {
  request_id: RequestId;
  handles: CiphertextHandle[];
  callback: CallbackSelector;
};

export type OracleResponse =
  | {
      kind: "fulfilled";
      request_id: RequestId;
      callback: CallbackSelector;
      cleartexts: bigint[];
      attestation: Attestation;
    }
  | { kind: "failed"; request_id: RequestId; callback: CallbackSelector; reason: string; attestation: Attestation };

/** The oracle-only entry points of the settlement system. */
export interface OracleCallbackTarget {
  completeBidding(requestId: RequestId, cleartexts: readonly bigint[], attestation: Attestation): void;
  completeVerification(requestId: RequestId, cleartexts: readonly bigint[], attestation: Attestation): void;
  reportFailure(requestId: RequestId, reason: string, attestation: Attestation): void;
}

export class MockConfidentialOracle implements ConfidentialOracle {
  private readonly keypair: Keypair;
  private plaintexts = new Map<CiphertextHandle, bigint>();
  private jobs = new Map<RequestId, DecryptionJob>();
  private counter = 0;

  constructor(opts: { seed?: Uint8Array; keypair?: Keypair } = {}) {
    this.keypair = opts.keypair ?? (opts.seed ? keypairFromSeed(opts.seed) : generateKeypair());
  }

  get publicKeyB58(): string {
    return publicKeyToB58(this.keypair.publicKey);
  }

  encrypt(value: bigint): CiphertextHandle {
    this.counter += 1;
    const handle = `ct:${this.counter}`;
    this.plaintexts.set(handle, value);
    return handle;
  }

  sealPublic(value: bigint): CiphertextHandle {
    return this.encrypt(value);
  }

  requestDecryption(requestId: RequestId, handles: readonly CiphertextHandle[], callback: CallbackSelector): void {
    this.jobs.set(requestId, { request_id: requestId, handles: [...handles], callback });
  }

  pending(): DecryptionJob[] {
    return [...this.jobs.values()].sort((a, b) => a.request_id - b.request_id);
  }

  /** Forget a job without answering it. */
  drop(requestId: RequestId): void {
    this.jobs.delete(requestId);
  }

  /**
   * Decrypt a queued job. A handle the oracle never issued yields a signed
   * failure instead of cleartexts.
   */
  respond(requestId: RequestId): OracleResponse {
    const job = this.takeJob(requestId);
    const cleartexts: bigint[] = [];
    for (const handle of job.handles) {
      const value = this.plaintexts.get(handle);
      if (value === undefined) {
        return this.signFailure(job, `unknown ciphertext handle ${handle}`);
      }
      cleartexts.push(value);
    }
    return this.signFulfilled(job, cleartexts);
  }

  /** Answer a job with arbitrary (possibly malformed) cleartexts. */
  respondWith(requestId: RequestId, cleartexts: readonly bigint[]): OracleResponse {
    return this.signFulfilled(this.takeJob(requestId), [...cleartexts]);
  }

  respondFailure(requestId: RequestId, reason: string): OracleResponse {
    return this.signFailure(this.takeJob(requestId), reason);
  }

  deliver(response: OracleResponse, target: OracleCallbackTarget): void {
    if (response.kind === "failed") {
      target.reportFailure(response.request_id, response.reason, response.attestation);
      return;
    }
    switch (response.callback) {
      case "completeBidding":
        target.completeBidding(response.request_id, response.cleartexts, response.attestation);
        return;
      case "completeVerification":
        target.completeVerification(response.request_id, response.cleartexts, response.attestation);
        return;
    }
  }

  private takeJob(requestId: RequestId): DecryptionJob {
    const job = this.jobs.get(requestId);
    if (!job) {
      throw new Error(`No pending decryption job for request ${requestId}`);
    }
    this.jobs.delete(requestId);
    return job;
  }

  private signFulfilled(job: DecryptionJob, cleartexts: bigint[]): OracleResponse {
    return {
      kind: "fulfilled",
      request_id: job.request_id,
      callback: job.callback,
      cleartexts,
      attestation: signAttestation(fulfilledPayload(job.request_id, cleartexts), this.keypair),
    };
  }

  private signFailure(job: DecryptionJob, reason: string): OracleResponse {
    return {
      kind: "failed",
      request_id: job.request_id,
      callback: job.callback,
      reason,
      attestation: signAttestation(failedPayload(job.request_id, reason), this.keypair),
    };
  }
}

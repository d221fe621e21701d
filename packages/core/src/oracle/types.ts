import type { CiphertextHandle, RequestId } from "../types";
import type { CallbackSelector } from "../state/types";

/**
 * Confidential-compute oracle. requestDecryption() only enqueues work; the
 * result arrives later, if at all, through the callback named by the selector.
 */
export interface ConfidentialOracle {
  requestDecryption(requestId: RequestId, handles: readonly CiphertextHandle[], callback: CallbackSelector): void;
  /** Trivially encrypt a public value so it can sit beside real ciphertexts. */
  sealPublic(value: bigint): CiphertextHandle;
}

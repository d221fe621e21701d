/**
 * StateStore Interface
 *
 * Storage contract for the durable state: the patent registry and the
 * coordination layer's requests, sessions, payments and refunds.
 *
 * Core invariants:
 * - Records handed out are copies; mutating them has no effect until put back
 * - transaction() is all-or-nothing: if fn throws, every write inside it is undone
 * - Transactions nest as savepoints: a throwing inner body undoes only its own writes
 */

import type { License, Patent } from "../registry/types";
import type { Address, AgreementId, AssetId, RequestId } from "../types";
import type {
  BiddingSession,
  DecryptionRequest,
  RefundBalance,
  RequestStatus,
  RoyaltyPayment,
} from "./types";

export interface StateStore {
  getPatent(patentId: AssetId): Patent | undefined;
  putPatent(patent: Patent): void;
  /** In id order, optionally only those owned by one account. */
  listPatents(filter?: { owner?: Address }): Patent[];
  /** Highest patent id ever stored, 0 when empty. */
  lastPatentId(): number;

  getLicense(licenseId: AgreementId): License | undefined;
  putLicense(license: License): void;
  listLicenses(filter?: { licensee?: Address }): License[];
  lastLicenseId(): number;

  getRequest(requestId: RequestId): DecryptionRequest | undefined;
  putRequest(request: DecryptionRequest): void;
  listRequests(filter?: { status?: RequestStatus }): DecryptionRequest[];
  /** Highest request id ever stored, 0 when empty. Seeds the id sequence. */
  lastRequestId(): number;

  getSession(assetId: AssetId): BiddingSession | undefined;
  putSession(session: BiddingSession): void;
  listSessions(): BiddingSession[];

  getPayment(agreementId: AgreementId, paymentIndex: number): RoyaltyPayment | undefined;
  listPayments(agreementId: AgreementId): RoyaltyPayment[];
  putPayment(payment: RoyaltyPayment): void;

  getRefund(account: Address): bigint;
  setRefund(account: Address, amount: bigint): void;
  listRefunds(): RefundBalance[];

  transaction<T>(fn: () => T): T;
  close(): void;
}

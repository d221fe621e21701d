/**
 * In-Memory State Store
 *
 * Map-backed StateStore. Transactions snapshot every map on entry and restore
 * the snapshot when the body throws. Nested transactions behave as savepoints.
 */

import type { License, Patent } from "../registry/types";
import type { Address, AgreementId, AssetId, RequestId } from "../types";
import type { StateStore } from "./store";
import type {
  BiddingSession,
  DecryptionRequest,
  RefundBalance,
  RequestStatus,
  RoyaltyPayment,
} from "./types";

type Tables = {
  patents: Map<AssetId, Patent>;
  licenses: Map<AgreementId, License>;
  requests: Map<RequestId, DecryptionRequest>;
  sessions: Map<AssetId, BiddingSession>;
  payments: Map<AgreementId, RoyaltyPayment[]>;
  refunds: Map<Address, bigint>;
};

function emptyTables(): Tables {
  return {
    patents: new Map(),
    licenses: new Map(),
    requests: new Map(),
    sessions: new Map(),
    payments: new Map(),
    refunds: new Map(),
  };
}

function maxKey(keys: Iterable<number>): number {
  let max = 0;
  for (const id of keys) {
    if (id > max) max = id;
  }
  return max;
}

function byId<T>(values: Iterable<T>, id: (value: T) => number): T[] {
  return [...values].sort((a, b) => id(a) - id(b)).map((value) => structuredClone(value));
}

export class MemoryStateStore implements StateStore {
  private tables: Tables = emptyTables();

  getPatent(patentId: AssetId): Patent | undefined {
    const found = this.tables.patents.get(patentId);
    return found ? structuredClone(found) : undefined;
  }

  putPatent(patent: Patent): void {
    this.tables.patents.set(patent.patent_id, structuredClone(patent));
  }

  listPatents(filter?: { owner?: Address }): Patent[] {
    const all = byId(this.tables.patents.values(), (p) => p.patent_id);
    return filter?.owner === undefined ? all : all.filter((p) => p.owner === filter.owner);
  }

  lastPatentId(): number {
    return maxKey(this.tables.patents.keys());
  }

  getLicense(licenseId: AgreementId): License | undefined {
    const found = this.tables.licenses.get(licenseId);
    return found ? structuredClone(found) : undefined;
  }

  putLicense(license: License): void {
    this.tables.licenses.set(license.license_id, structuredClone(license));
  }

  listLicenses(filter?: { licensee?: Address }): License[] {
    const all = byId(this.tables.licenses.values(), (l) => l.license_id);
    return filter?.licensee === undefined ? all : all.filter((l) => l.licensee === filter.licensee);
  }

  lastLicenseId(): number {
    return maxKey(this.tables.licenses.keys());
  }

  getRequest(requestId: RequestId): DecryptionRequest | undefined {
    const found = this.tables.requests.get(requestId);
    return found ? structuredClone(found) : undefined;
  }

  putRequest(request: DecryptionRequest): void {
    this.tables.requests.set(request.request_id, structuredClone(request));
  }

  listRequests(filter?: { status?: RequestStatus }): DecryptionRequest[] {
    const all = [...this.tables.requests.values()].sort((a, b) => a.request_id - b.request_id);
    const matching = filter?.status ? all.filter((r) => r.status === filter.status) : all;
    return matching.map((r) => structuredClone(r));
  }

  lastRequestId(): number {
    return maxKey(this.tables.requests.keys());
  }

  getSession(assetId: AssetId): BiddingSession | undefined {
    const found = this.tables.sessions.get(assetId);
    return found ? structuredClone(found) : undefined;
  }

  putSession(session: BiddingSession): void {
    this.tables.sessions.set(session.asset_id, structuredClone(session));
  }

  listSessions(): BiddingSession[] {
    return [...this.tables.sessions.values()]
      .sort((a, b) => a.asset_id - b.asset_id)
      .map((s) => structuredClone(s));
  }

  getPayment(agreementId: AgreementId, paymentIndex: number): RoyaltyPayment | undefined {
    const found = this.tables.payments.get(agreementId)?.[paymentIndex];
    return found ? structuredClone(found) : undefined;
  }

  listPayments(agreementId: AgreementId): RoyaltyPayment[] {
    return (this.tables.payments.get(agreementId) ?? []).map((p) => structuredClone(p));
  }

  putPayment(payment: RoyaltyPayment): void {
    const list = this.tables.payments.get(payment.agreement_id) ?? [];
    if (payment.payment_index > list.length) {
      throw new Error(
        `Payment index ${payment.payment_index} leaves a gap for agreement ${payment.agreement_id}`
      );
    }
    list[payment.payment_index] = structuredClone(payment);
    this.tables.payments.set(payment.agreement_id, list);
  }

  getRefund(account: Address): bigint {
    return this.tables.refunds.get(account) ?? 0n;
  }

  setRefund(account: Address, amount: bigint): void {
    if (amount === 0n) {
      this.tables.refunds.delete(account);
    } else {
      this.tables.refunds.set(account, amount);
    }
  }

  listRefunds(): RefundBalance[] {
    return [...this.tables.refunds.entries()]
      .map(([account, amount]) => ({ account, amount }))
      .sort((a, b) => a.account.localeCompare(b.account));
  }

  transaction<T>(fn: () => T): T {
    // Every level snapshots, so an inner failure caught by the caller
    // rolls back like a savepoint.
    const snapshot = structuredClone(this.tables);
    try {
      return fn();
    } catch (error) {
      this.tables = snapshot;
      throw error;
    }
  }

  close(): void {
    // nothing to release
  }
}

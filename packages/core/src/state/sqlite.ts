/**
 * SQLite State Store
 *
 * better-sqlite3 backed StateStore. Amounts are stored as decimal TEXT so that
 * bigint values survive without precision loss, booleans as 0/1. Nested
 * transactions map onto better-sqlite3 savepoints.
 */

import Database from "better-sqlite3";
import { z } from "zod";
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

const correlationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("bidding"), asset_id: z.number().int() }),
  z.object({
    kind: z.literal("verification"),
    agreement_id: z.number().int(),
    payment_index: z.number().int(),
  }),
]);

const handlesSchema = z.array(z.string());

const bidsSchema = z.array(
  z.object({
    bidder: z.string(),
    escrow: z.string().transform((v) => BigInt(v)),
    amount_handle: z.string(),
    submitted_at_ms: z.number().int(),
  })
);

const requestStatusSchema = z.enum(["pending", "completed", "failed", "timed_out"]);
const callbackSchema = z.enum(["completeBidding", "completeVerification"]);
const sessionStatusSchema = z.enum(["open", "awaiting_result", "resolved", "unresolved"]);
const outcomeSchema = z.enum(["unverified", "valid", "invalid"]);
const causeSchema = z.enum(["oracle_failure", "malformed_payload", "attestation_invalid", "timeout"]);
const patentStatusSchema = z.enum(["active", "suspended", "expired", "exclusively_licensed"]);
const licenseStatusSchema = z.enum(["pending", "active", "suspended", "expired", "revoked"]);

type PatentRow = {
  patent_id: number;
  owner: string;
  royalty_rate_handle: string;
  min_license_fee_handle: string;
  exclusivity_period_days: number;
  registered_at_ms: number;
  valid_until_ms: number;
  patent_hash: string;
  territory_code: number;
  is_confidential: number;
  status: string;
};

type LicenseRow = {
  license_id: number;
  patent_id: number;
  licensee: string;
  licensor: string;
  fee_handle: string;
  royalty_rate_handle: string;
  revenue_cap_handle: string;
  duration_days: number;
  exclusive: number;
  auto_renewal: number;
  territory_mask: number;
  status: string;
  requested_at_ms: number;
  approved_at_ms: number | null;
  expires_at_ms: number | null;
};

type RequestRow = {
  request_id: number;
  issuer: string;
  created_at_ms: number;
  status: string;
  correlation_json: string;
  handles_json: string;
  callback: string;
  resolved_at_ms: number | null;
  failure_reason: string | null;
};

type SessionRow = {
  asset_id: number;
  controller: string;
  status: string;
  opened_at_ms: number;
  end_at_ms: number;
  bids_json: string;
  request_id: number | null;
  winner: string | null;
  winning_index: number | null;
  closed_at_ms: number | null;
};

type PaymentRow = {
  agreement_id: number;
  payment_index: number;
  payer: string;
  revenue_handle: string;
  paid_amount: string;
  paid_amount_handle: string;
  reporting_period: number;
  paid_at_ms: number;
  outcome: string;
  request_id: number | null;
  cause: string | null;
  verified_at_ms: number | null;
};

type RefundRow = { account: string; amount: string };

function orUndefined<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

function toPatent(row: PatentRow): Patent {
  return {
    patent_id: row.patent_id,
    owner: row.owner,
    royalty_rate_handle: row.royalty_rate_handle,
    min_license_fee_handle: row.min_license_fee_handle,
    exclusivity_period_days: row.exclusivity_period_days,
    registered_at_ms: row.registered_at_ms,
    valid_until_ms: row.valid_until_ms,
    patent_hash: row.patent_hash,
    territory_code: row.territory_code,
    is_confidential: row.is_confidential === 1,
    status: patentStatusSchema.parse(row.status),
  };
}

function toLicense(row: LicenseRow): License {
  return {
    license_id: row.license_id,
    patent_id: row.patent_id,
    licensee: row.licensee,
    licensor: row.licensor,
    fee_handle: row.fee_handle,
    royalty_rate_handle: row.royalty_rate_handle,
    revenue_cap_handle: row.revenue_cap_handle,
    duration_days: row.duration_days,
    exclusive: row.exclusive === 1,
    auto_renewal: row.auto_renewal === 1,
    territory_mask: row.territory_mask,
    status: licenseStatusSchema.parse(row.status),
    requested_at_ms: row.requested_at_ms,
    approved_at_ms: orUndefined(row.approved_at_ms),
    expires_at_ms: orUndefined(row.expires_at_ms),
  };
}

function toRequest(row: RequestRow): DecryptionRequest {
  return {
    request_id: row.request_id,
    issuer: row.issuer,
    created_at_ms: row.created_at_ms,
    status: requestStatusSchema.parse(row.status),
    correlation: correlationSchema.parse(JSON.parse(row.correlation_json)),
    handles: handlesSchema.parse(JSON.parse(row.handles_json)),
    callback: callbackSchema.parse(row.callback),
    resolved_at_ms: orUndefined(row.resolved_at_ms),
    failure_reason: orUndefined(row.failure_reason),
  };
}

function toSession(row: SessionRow): BiddingSession {
  return {
    asset_id: row.asset_id,
    controller: row.controller,
    status: sessionStatusSchema.parse(row.status),
    opened_at_ms: row.opened_at_ms,
    end_at_ms: row.end_at_ms,
    bids: bidsSchema.parse(JSON.parse(row.bids_json)),
    request_id: orUndefined(row.request_id),
    winner: orUndefined(row.winner),
    winning_index: orUndefined(row.winning_index),
    closed_at_ms: orUndefined(row.closed_at_ms),
  };
}

function toPayment(row: PaymentRow): RoyaltyPayment {
  return {
    agreement_id: row.agreement_id,
    payment_index: row.payment_index,
    payer: row.payer,
    revenue_handle: row.revenue_handle,
    paid_amount: BigInt(row.paid_amount),
    paid_amount_handle: row.paid_amount_handle,
    reporting_period: row.reporting_period,
    paid_at_ms: row.paid_at_ms,
    outcome: outcomeSchema.parse(row.outcome),
    request_id: orUndefined(row.request_id),
    cause: row.cause === null ? undefined : causeSchema.parse(row.cause),
    verified_at_ms: orUndefined(row.verified_at_ms),
  };
}

export class SqliteStateStore implements StateStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS patents (
        patent_id INTEGER PRIMARY KEY,
        owner TEXT NOT NULL,
        royalty_rate_handle TEXT NOT NULL,
        min_license_fee_handle TEXT NOT NULL,
        exclusivity_period_days INTEGER NOT NULL,
        registered_at_ms INTEGER NOT NULL,
        valid_until_ms INTEGER NOT NULL,
        patent_hash TEXT NOT NULL,
        territory_code INTEGER NOT NULL,
        is_confidential INTEGER NOT NULL,
        status TEXT NOT NULL CHECK(status IN ('active', 'suspended', 'expired', 'exclusively_licensed'))
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_patents_owner ON patents(owner, patent_id)
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS licenses (
        license_id INTEGER PRIMARY KEY,
        patent_id INTEGER NOT NULL,
        licensee TEXT NOT NULL,
        licensor TEXT NOT NULL,
        fee_handle TEXT NOT NULL,
        royalty_rate_handle TEXT NOT NULL,
        revenue_cap_handle TEXT NOT NULL,
        duration_days INTEGER NOT NULL,
        exclusive INTEGER NOT NULL,
        auto_renewal INTEGER NOT NULL,
        territory_mask INTEGER NOT NULL,
        status TEXT NOT NULL CHECK(status IN ('pending', 'active', 'suspended', 'expired', 'revoked')),
        requested_at_ms INTEGER NOT NULL,
        approved_at_ms INTEGER,
        expires_at_ms INTEGER
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_licenses_licensee ON licenses(licensee, license_id)
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS decryption_requests (
        request_id INTEGER PRIMARY KEY,
        issuer TEXT NOT NULL,
        created_at_ms INTEGER NOT NULL,
        status TEXT NOT NULL CHECK(status IN ('pending', 'completed', 'failed', 'timed_out')),
        correlation_json TEXT NOT NULL,
        handles_json TEXT NOT NULL,
        callback TEXT NOT NULL,
        resolved_at_ms INTEGER,
        failure_reason TEXT
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_decryption_requests_status ON decryption_requests(status, created_at_ms)
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bidding_sessions (
        asset_id INTEGER PRIMARY KEY,
        controller TEXT NOT NULL,
        status TEXT NOT NULL CHECK(status IN ('open', 'awaiting_result', 'resolved', 'unresolved')),
        opened_at_ms INTEGER NOT NULL,
        end_at_ms INTEGER NOT NULL,
        bids_json TEXT NOT NULL,
        request_id INTEGER,
        winner TEXT,
        winning_index INTEGER,
        closed_at_ms INTEGER
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS royalty_payments (
        agreement_id INTEGER NOT NULL,
        payment_index INTEGER NOT NULL,
        payer TEXT NOT NULL,
        revenue_handle TEXT NOT NULL,
        paid_amount TEXT NOT NULL,
        paid_amount_handle TEXT NOT NULL,
        reporting_period INTEGER NOT NULL,
        paid_at_ms INTEGER NOT NULL,
        outcome TEXT NOT NULL CHECK(outcome IN ('unverified', 'valid', 'invalid')),
        request_id INTEGER,
        cause TEXT,
        verified_at_ms INTEGER,
        PRIMARY KEY (agreement_id, payment_index)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS refund_balances (
        account TEXT PRIMARY KEY,
        amount TEXT NOT NULL
      )
    `);
  }

  getPatent(patentId: AssetId): Patent | undefined {
    const row = this.db.prepare<[number], PatentRow>(`SELECT * FROM patents WHERE patent_id = ?`).get(patentId);
    return row ? toPatent(row) : undefined;
  }

  putPatent(patent: Patent): void {
    this.db
      .prepare(`
        INSERT INTO patents (
          patent_id, owner, royalty_rate_handle, min_license_fee_handle,
          exclusivity_period_days, registered_at_ms, valid_until_ms,
          patent_hash, territory_code, is_confidential, status
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(patent_id) DO UPDATE SET
          owner = excluded.owner,
          status = excluded.status
      `)
      .run(
        patent.patent_id,
        patent.owner,
        patent.royalty_rate_handle,
        patent.min_license_fee_handle,
        patent.exclusivity_period_days,
        patent.registered_at_ms,
        patent.valid_until_ms,
        patent.patent_hash,
        patent.territory_code,
        patent.is_confidential ? 1 : 0,
        patent.status
      );
  }

  listPatents(filter?: { owner?: Address }): Patent[] {
    if (filter?.owner !== undefined) {
      return this.db
        .prepare<[string], PatentRow>(`SELECT * FROM patents WHERE owner = ? ORDER BY patent_id`)
        .all(filter.owner)
        .map(toPatent);
    }
    return this.db.prepare<[], PatentRow>(`SELECT * FROM patents ORDER BY patent_id`).all().map(toPatent);
  }

  lastPatentId(): number {
    const row = this.db
      .prepare<[], { max_id: number | null }>(`SELECT MAX(patent_id) AS max_id FROM patents`)
      .get();
    return row?.max_id ?? 0;
  }

  getLicense(licenseId: AgreementId): License | undefined {
    const row = this.db
      .prepare<[number], LicenseRow>(`SELECT * FROM licenses WHERE license_id = ?`)
      .get(licenseId);
    return row ? toLicense(row) : undefined;
  }

  putLicense(license: License): void {
    this.db
      .prepare(`
        INSERT INTO licenses (
          license_id, patent_id, licensee, licensor, fee_handle,
          royalty_rate_handle, revenue_cap_handle, duration_days, exclusive,
          auto_renewal, territory_mask, status, requested_at_ms,
          approved_at_ms, expires_at_ms
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(license_id) DO UPDATE SET
          duration_days = excluded.duration_days,
          status = excluded.status,
          approved_at_ms = excluded.approved_at_ms,
          expires_at_ms = excluded.expires_at_ms
      `)
      .run(
        license.license_id,
        license.patent_id,
        license.licensee,
        license.licensor,
        license.fee_handle,
        license.royalty_rate_handle,
        license.revenue_cap_handle,
        license.duration_days,
        license.exclusive ? 1 : 0,
        license.auto_renewal ? 1 : 0,
        license.territory_mask,
        license.status,
        license.requested_at_ms,
        license.approved_at_ms ?? null,
        license.expires_at_ms ?? null
      );
  }

  listLicenses(filter?: { licensee?: Address }): License[] {
    if (filter?.licensee !== undefined) {
      return this.db
        .prepare<[string], LicenseRow>(`SELECT * FROM licenses WHERE licensee = ? ORDER BY license_id`)
        .all(filter.licensee)
        .map(toLicense);
    }
    return this.db.prepare<[], LicenseRow>(`SELECT * FROM licenses ORDER BY license_id`).all().map(toLicense);
  }

  lastLicenseId(): number {
    const row = this.db
      .prepare<[], { max_id: number | null }>(`SELECT MAX(license_id) AS max_id FROM licenses`)
      .get();
    return row?.max_id ?? 0;
  }

  getRequest(requestId: RequestId): DecryptionRequest | undefined {
    const row = this.db
      .prepare<[number], RequestRow>(`SELECT * FROM decryption_requests WHERE request_id = ?`)
      .get(requestId);
    return row ? toRequest(row) : undefined;
  }

  putRequest(request: DecryptionRequest): void {
    this.db
      .prepare(`
        INSERT INTO decryption_requests (
          request_id, issuer, created_at_ms, status, correlation_json,
          handles_json, callback, resolved_at_ms, failure_reason
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(request_id) DO UPDATE SET
          status = excluded.status,
          resolved_at_ms = excluded.resolved_at_ms,
          failure_reason = excluded.failure_reason
      `)
      .run(
        request.request_id,
        request.issuer,
        request.created_at_ms,
        request.status,
        JSON.stringify(request.correlation),
        JSON.stringify(request.handles),
        request.callback,
        request.resolved_at_ms ?? null,
        request.failure_reason ?? null
      );
  }

  listRequests(filter?: { status?: RequestStatus }): DecryptionRequest[] {
    if (filter?.status) {
      return this.db
        .prepare<[string], RequestRow>(
          `SELECT * FROM decryption_requests WHERE status = ? ORDER BY request_id`
        )
        .all(filter.status)
        .map(toRequest);
    }
    return this.db
      .prepare<[], RequestRow>(`SELECT * FROM decryption_requests ORDER BY request_id`)
      .all()
      .map(toRequest);
  }

  lastRequestId(): number {
    const row = this.db
      .prepare<[], { max_id: number | null }>(`SELECT MAX(request_id) AS max_id FROM decryption_requests`)
      .get();
    return row?.max_id ?? 0;
  }

  getSession(assetId: AssetId): BiddingSession | undefined {
    const row = this.db
      .prepare<[number], SessionRow>(`SELECT * FROM bidding_sessions WHERE asset_id = ?`)
      .get(assetId);
    return row ? toSession(row) : undefined;
  }

  putSession(session: BiddingSession): void {
    const bids = session.bids.map((bid) => ({ ...bid, escrow: bid.escrow.toString() }));
    this.db
      .prepare(`
        INSERT INTO bidding_sessions (
          asset_id, controller, status, opened_at_ms, end_at_ms, bids_json,
          request_id, winner, winning_index, closed_at_ms
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(asset_id) DO UPDATE SET
          controller = excluded.controller,
          status = excluded.status,
          opened_at_ms = excluded.opened_at_ms,
          end_at_ms = excluded.end_at_ms,
          bids_json = excluded.bids_json,
          request_id = excluded.request_id,
          winner = excluded.winner,
          winning_index = excluded.winning_index,
          closed_at_ms = excluded.closed_at_ms
      `)
      .run(
        session.asset_id,
        session.controller,
        session.status,
        session.opened_at_ms,
        session.end_at_ms,
        JSON.stringify(bids),
        session.request_id ?? null,
        session.winner ?? null,
        session.winning_index ?? null,
        session.closed_at_ms ?? null
      );
  }

  listSessions(): BiddingSession[] {
    return this.db
      .prepare<[], SessionRow>(`SELECT * FROM bidding_sessions ORDER BY asset_id`)
      .all()
      .map(toSession);
  }

  getPayment(agreementId: AgreementId, paymentIndex: number): RoyaltyPayment | undefined {
    const row = this.db
      .prepare<[number, number], PaymentRow>(
        `SELECT * FROM royalty_payments WHERE agreement_id = ? AND payment_index = ?`
      )
      .get(agreementId, paymentIndex);
    return row ? toPayment(row) : undefined;
  }

  listPayments(agreementId: AgreementId): RoyaltyPayment[] {
    return this.db
      .prepare<[number], PaymentRow>(
        `SELECT * FROM royalty_payments WHERE agreement_id = ? ORDER BY payment_index`
      )
      .all(agreementId)
      .map(toPayment);
  }

  putPayment(payment: RoyaltyPayment): void {
    this.db
      .prepare(`
        INSERT INTO royalty_payments (
          agreement_id, payment_index, payer, revenue_handle, paid_amount,
          paid_amount_handle, reporting_period, paid_at_ms, outcome,
          request_id, cause, verified_at_ms
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(agreement_id, payment_index) DO UPDATE SET
          outcome = excluded.outcome,
          request_id = excluded.request_id,
          cause = excluded.cause,
          verified_at_ms = excluded.verified_at_ms
      `)
      .run(
        payment.agreement_id,
        payment.payment_index,
        payment.payer,
        payment.revenue_handle,
        payment.paid_amount.toString(),
        payment.paid_amount_handle,
        payment.reporting_period,
        payment.paid_at_ms,
        payment.outcome,
        payment.request_id ?? null,
        payment.cause ?? null,
        payment.verified_at_ms ?? null
      );
  }

  getRefund(account: Address): bigint {
    const row = this.db
      .prepare<[string], RefundRow>(`SELECT account, amount FROM refund_balances WHERE account = ?`)
      .get(account);
    return row ? BigInt(row.amount) : 0n;
  }

  setRefund(account: Address, amount: bigint): void {
    if (amount === 0n) {
      this.db.prepare(`DELETE FROM refund_balances WHERE account = ?`).run(account);
      return;
    }
    this.db
      .prepare(`
        INSERT INTO refund_balances (account, amount) VALUES (?, ?)
        ON CONFLICT(account) DO UPDATE SET amount = excluded.amount
      `)
      .run(account, amount.toString());
  }

  listRefunds(): RefundBalance[] {
    return this.db
      .prepare<[], RefundRow>(`SELECT account, amount FROM refund_balances ORDER BY account`)
      .all()
      .map((row) => ({ account: row.account, amount: BigInt(row.amount) }));
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Agreement Registry Types
 *
 * Patents are the auctionable assets, licenses the agreements royalties are
 * paid under. The settlement core only sees them through AgreementRegistry.
 */

import type { Address, AgreementId, AssetId, CiphertextHandle } from "../types";

export type PatentStatus = "active" | "suspended" | "expired" | "exclusively_licensed";

export type LicenseStatus = "pending" | "active" | "suspended" | "expired" | "revoked";

export const PATENT_STATUSES: readonly PatentStatus[] = ["active", "suspended", "expired", "exclusively_licensed"];

export const LICENSE_STATUSES: readonly LicenseStatus[] = ["pending", "active", "suspended", "expired", "revoked"];

export type PatentTerms = {
  /** Basis points, at most 10000. */
  royalty_rate_bps: number;
  min_license_fee: bigint;
  exclusivity_period_days: number;
  validity_years: number;
  /** Content hash of the patent document (e.g. an IPFS CID). */
  patent_hash: string;
  territory_code: number;
  is_confidential: boolean;
};

export type Patent = {
  patent_id: AssetId;
  owner: Address;
  royalty_rate_handle: CiphertextHandle;
  min_license_fee_handle: CiphertextHandle;
  exclusivity_period_days: number;
  registered_at_ms: number;
  valid_until_ms: number;
  patent_hash: string;
  territory_code: number;
  is_confidential: boolean;
  status: PatentStatus;
};

export type LicenseRequest = {
  patent_id: AssetId;
  proposed_fee: bigint;
  proposed_royalty_rate_bps: number;
  revenue_cap: bigint;
  duration_days: number;
  request_exclusive: boolean;
  auto_renewal: boolean;
  territory_mask: number;
};

export type License = {
  license_id: AgreementId;
  patent_id: AssetId;
  licensee: Address;
  licensor: Address;
  fee_handle: CiphertextHandle;
  royalty_rate_handle: CiphertextHandle;
  revenue_cap_handle: CiphertextHandle;
  duration_days: number;
  exclusive: boolean;
  auto_renewal: boolean;
  territory_mask: number;
  status: LicenseStatus;
  requested_at_ms: number;
  approved_at_ms?: number;
  expires_at_ms?: number;
};

/** What royalty verification needs to know about an agreement. */
export type AgreementView = {
  agreement_id: AgreementId;
  licensee: Address;
  licensor: Address;
  status: LicenseStatus;
  royalty_rate_handle: CiphertextHandle;
};

export interface AgreementRegistry {
  getControllingAccount(assetId: AssetId): Address | undefined;
  getStatus(assetId: AssetId): PatentStatus | undefined;
  setStatus(assetId: AssetId, status: PatentStatus): void;
  getAgreement(agreementId: AgreementId): AgreementView | undefined;
}

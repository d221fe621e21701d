/**
 * Patent Registry
 *
 * AgreementRegistry kept in the StateStore, so patents and licenses survive a
 * restart together with the sessions and requests that point at them.
 * Confidential terms (royalty rate, fees, caps) are sealed through the oracle
 * on the way in and only their handles are kept.
 */

import { fail } from "../errors";
import type { EventJournal } from "../events";
import type { ConfidentialOracle } from "../oracle";
import type { StateStore } from "../state/store";
import { MS_PER_DAY, type Address, type AgreementId, type AssetId, type Clock } from "../types";
import type {
  AgreementRegistry,
  AgreementView,
  License,
  LicenseRequest,
  LicenseStatus,
  Patent,
  PatentStatus,
  PatentTerms,
} from "./types";

export const MAX_ROYALTY_RATE_BPS = 10_000;
export const MAX_VALIDITY_YEARS = 20;
export const MAX_LICENSE_DAYS = 3650;
const MS_PER_YEAR = 365 * MS_PER_DAY;

export type PatentRegistryOptions = {
  store: StateStore;
  now: Clock;
  oracle: ConfidentialOracle;
  journal: EventJournal;
  /** Account allowed to emergency pause/resume. Without one, nobody is. */
  operator?: Address;
};

function assertRate(bps: number): void {
  if (!Number.isInteger(bps) || bps < 0 || bps > MAX_ROYALTY_RATE_BPS) {
    fail("ROYALTY_RATE_TOO_HIGH", "Royalty rate too high", { royalty_rate_bps: bps, max: MAX_ROYALTY_RATE_BPS });
  }
}

function assertLicenseDays(days: number): void {
  if (!Number.isInteger(days) || days < 1 || days > MAX_LICENSE_DAYS) {
    fail("INVALID_DURATION", "Invalid duration", { duration_days: days, min: 1, max: MAX_LICENSE_DAYS });
  }
}

export class PatentRegistry implements AgreementRegistry {
  constructor(private readonly opts: PatentRegistryOptions) {}

  /** Ids continue from the highest one in the store. */
  get nextPatentId(): number {
    return this.opts.store.lastPatentId() + 1;
  }

  get nextLicenseId(): number {
    return this.opts.store.lastLicenseId() + 1;
  }

  registerPatent(caller: Address, terms: PatentTerms): AssetId {
    assertRate(terms.royalty_rate_bps);
    if (
      !Number.isInteger(terms.validity_years) ||
      terms.validity_years < 1 ||
      terms.validity_years > MAX_VALIDITY_YEARS
    ) {
      fail("INVALID_VALIDITY_PERIOD", "Invalid validity period", { validity_years: terms.validity_years });
    }
    if (terms.min_license_fee < 0n) {
      fail("INVALID_AMOUNT", "Minimum license fee must be >= 0");
    }

    const now = this.opts.now();
    const patentId = this.nextPatentId;
    const patent: Patent = {
      patent_id: patentId,
      owner: caller,
      royalty_rate_handle: this.opts.oracle.sealPublic(BigInt(terms.royalty_rate_bps)),
      min_license_fee_handle: this.opts.oracle.sealPublic(terms.min_license_fee),
      exclusivity_period_days: terms.exclusivity_period_days,
      registered_at_ms: now,
      valid_until_ms: now + terms.validity_years * MS_PER_YEAR,
      patent_hash: terms.patent_hash,
      territory_code: terms.territory_code,
      is_confidential: terms.is_confidential,
      status: "active",
    };
    this.opts.store.putPatent(patent);
    this.opts.journal.emit({ type: "patent_registered", patent_id: patentId, owner: caller });
    return patentId;
  }

  requestLicense(caller: Address, request: LicenseRequest): AgreementId {
    const patent = this.requirePatent(request.patent_id);
    if (patent.status !== "active") {
      fail("PATENT_NOT_ACTIVE", "Patent not active", { patent_id: patent.patent_id, status: patent.status });
    }
    assertLicenseDays(request.duration_days);
    assertRate(request.proposed_royalty_rate_bps);

    const { oracle } = this.opts;
    const licenseId = this.nextLicenseId;
    const license: License = {
      license_id: licenseId,
      patent_id: patent.patent_id,
      licensee: caller,
      licensor: patent.owner,
      fee_handle: oracle.sealPublic(request.proposed_fee),
      royalty_rate_handle: oracle.sealPublic(BigInt(request.proposed_royalty_rate_bps)),
      revenue_cap_handle: oracle.sealPublic(request.revenue_cap),
      duration_days: request.duration_days,
      exclusive: request.request_exclusive,
      auto_renewal: request.auto_renewal,
      territory_mask: request.territory_mask,
      status: "pending",
      requested_at_ms: this.opts.now(),
    };
    this.opts.store.putLicense(license);
    this.opts.journal.emit({
      type: "license_requested",
      license_id: licenseId,
      patent_id: patent.patent_id,
      licensee: caller,
    });
    return licenseId;
  }

  approveLicense(caller: Address, licenseId: AgreementId, durationDays: number): void {
    const license = this.requireLicense(licenseId);
    if (license.licensor !== caller) {
      fail("NOT_LICENSOR", "Not the licensor", { license_id: licenseId });
    }
    if (license.status !== "pending") {
      fail("LICENSE_NOT_PENDING", "License not pending", { license_id: licenseId, status: license.status });
    }
    assertLicenseDays(durationDays);

    const now = this.opts.now();
    license.status = "active";
    license.duration_days = durationDays;
    license.approved_at_ms = now;
    license.expires_at_ms = now + durationDays * MS_PER_DAY;
    this.opts.store.putLicense(license);
    this.opts.journal.emit({ type: "license_approved", license_id: licenseId, licensor: caller });
  }

  updatePatentStatus(caller: Address, patentId: AssetId, status: PatentStatus): void {
    const patent = this.requirePatent(patentId);
    if (patent.owner !== caller) {
      fail("NOT_CONTROLLER", "Not patent owner", { patent_id: patentId });
    }
    this.setStatus(patentId, status);
  }

  updateLicenseStatus(caller: Address, licenseId: AgreementId, status: LicenseStatus): void {
    const license = this.requireLicense(licenseId);
    if (license.licensor !== caller) {
      fail("NOT_LICENSOR", "Not the licensor", { license_id: licenseId });
    }
    license.status = status;
    this.opts.store.putLicense(license);
    this.opts.journal.emit({ type: "license_status_changed", license_id: licenseId, status });
  }

  /** Suspends an active patent. */
  emergencyPause(caller: Address, patentId: AssetId): void {
    this.requireOperator(caller);
    const patent = this.requirePatent(patentId);
    if (patent.status !== "active") {
      fail("PATENT_NOT_ACTIVE", "Patent not active", { patent_id: patentId, status: patent.status });
    }
    this.setStatus(patentId, "suspended");
    this.opts.journal.emit({ type: "registry_pause_changed", patent_id: patentId, paused: true, by: caller });
  }

  /** Reactivates a suspended patent. Licensed or expired patents stay as they are. */
  emergencyResume(caller: Address, patentId: AssetId): void {
    this.requireOperator(caller);
    const patent = this.requirePatent(patentId);
    if (patent.status !== "suspended") {
      fail("PATENT_NOT_SUSPENDED", "Patent not suspended", { patent_id: patentId, status: patent.status });
    }
    this.setStatus(patentId, "active");
    this.opts.journal.emit({ type: "registry_pause_changed", patent_id: patentId, paused: false, by: caller });
  }

  getPatentInfo(patentId: AssetId): Patent {
    return this.requirePatent(patentId);
  }

  getLicenseInfo(licenseId: AgreementId): License {
    return this.requireLicense(licenseId);
  }

  getUserPatents(account: Address): AssetId[] {
    return this.opts.store.listPatents({ owner: account }).map((patent) => patent.patent_id);
  }

  getUserLicenses(account: Address): AgreementId[] {
    return this.opts.store.listLicenses({ licensee: account }).map((license) => license.license_id);
  }

  // --- AgreementRegistry ---

  getControllingAccount(assetId: AssetId): Address | undefined {
    return this.opts.store.getPatent(assetId)?.owner;
  }

  getStatus(assetId: AssetId): PatentStatus | undefined {
    return this.opts.store.getPatent(assetId)?.status;
  }

  setStatus(assetId: AssetId, status: PatentStatus): void {
    const patent = this.requirePatent(assetId);
    patent.status = status;
    this.opts.store.putPatent(patent);
    this.opts.journal.emit({ type: "patent_status_changed", patent_id: assetId, status });
  }

  getAgreement(agreementId: AgreementId): AgreementView | undefined {
    const license = this.opts.store.getLicense(agreementId);
    if (!license) return undefined;
    return {
      agreement_id: license.license_id,
      licensee: license.licensee,
      licensor: license.licensor,
      status: license.status,
      royalty_rate_handle: license.royalty_rate_handle,
    };
  }

  private requirePatent(patentId: AssetId): Patent {
    const patent = this.opts.store.getPatent(patentId);
    if (!patent) {
      fail("UNKNOWN_PATENT", "Invalid patent ID", { patent_id: patentId });
    }
    return patent;
  }

  private requireLicense(licenseId: AgreementId): License {
    const license = this.opts.store.getLicense(licenseId);
    if (!license) {
      fail("UNKNOWN_LICENSE", "Invalid license ID", { license_id: licenseId });
    }
    return license;
  }

  private requireOperator(caller: Address): void {
    if (this.opts.operator === undefined || this.opts.operator !== caller) {
      fail("NOT_OPERATOR", "Not authorized", { caller });
    }
  }
}

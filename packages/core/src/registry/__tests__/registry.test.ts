import { describe, it, expect, beforeEach } from "vitest";
import { PatentRegistry } from "../registry";
import type { LicenseRequest, PatentTerms } from "../types";
import { EventJournal } from "../../events";
import { MockConfidentialOracle } from "../../oracle";
import { MemoryStateStore } from "../../state/memory";
import { catchSettlementError, ManualClock } from "../../testkit";
import { MS_PER_DAY } from "../../types";

const terms: PatentTerms = {
  royalty_rate_bps: 1000,
  min_license_fee: 1_000_000n,
  exclusivity_period_days: 180,
  validity_years: 10,
  patent_hash: "QmTestHash",
  territory_code: 255,
  is_confidential: true,
};

const licenseRequest: LicenseRequest = {
  patent_id: 1,
  proposed_fee: 1_500_000n,
  proposed_royalty_rate_bps: 1000,
  revenue_cap: 100_000_000n,
  duration_days: 365,
  request_exclusive: false,
  auto_renewal: true,
  territory_mask: 255,
};

describe("PatentRegistry", () => {
  let clock: ManualClock;
  let journal: EventJournal;
  let store: MemoryStateStore;
  let registry: PatentRegistry;

  beforeEach(() => {
    clock = new ManualClock(0);
    journal = new EventJournal(clock.now, () => {});
    store = new MemoryStateStore();
    registry = new PatentRegistry({
      store,
      now: clock.now,
      oracle: new MockConfidentialOracle(),
      journal,
      operator: "operator",
    });
  });

  describe("patents", () => {
    it("registers with ids starting at 1 and seals the rate", () => {
      expect(registry.nextPatentId).toBe(1);
      expect(registry.registerPatent("owner", terms)).toBe(1);
      expect(registry.registerPatent("owner", { ...terms, patent_hash: "QmOther" })).toBe(2);
      expect(registry.nextPatentId).toBe(3);

      const info = registry.getPatentInfo(1);
      expect(info).toMatchObject({
        owner: "owner",
        status: "active",
        patent_hash: "QmTestHash",
        territory_code: 255,
        is_confidential: true,
        valid_until_ms: 10 * 365 * MS_PER_DAY,
      });
      expect(info.royalty_rate_handle).toMatch(/^ct:/);
      expect(registry.getUserPatents("owner")).toEqual([1, 2]);
      expect(journal.ofType("patent_registered").map((e) => e.patent_id)).toEqual([1, 2]);
    });

    it("rejects a royalty rate over 100%", () => {
      expect(catchSettlementError(() => registry.registerPatent("owner", { ...terms, royalty_rate_bps: 10_001 })).code).toBe(
        "ROYALTY_RATE_TOO_HIGH"
      );
    });

    it("rejects validity outside 1-20 years", () => {
      for (const validity_years of [0, 21]) {
        expect(catchSettlementError(() => registry.registerPatent("owner", { ...terms, validity_years })).code).toBe(
          "INVALID_VALIDITY_PERIOD"
        );
      }
    });

    it("fails UNKNOWN_PATENT for an unregistered id", () => {
      const error = catchSettlementError(() => registry.getPatentInfo(999));
      expect(error.code).toBe("UNKNOWN_PATENT");
      expect(error.message).toBe("Invalid patent ID");
    });

    it("lets only the owner change status", () => {
      registry.registerPatent("owner", terms);
      expect(catchSettlementError(() => registry.updatePatentStatus("licensee", 1, "suspended")).code).toBe(
        "NOT_CONTROLLER"
      );
      registry.updatePatentStatus("owner", 1, "suspended");
      expect(registry.getStatus(1)).toBe("suspended");
      expect(journal.ofType("patent_status_changed")).toMatchObject([{ patent_id: 1, status: "suspended" }]);
    });
  });

  describe("licenses", () => {
    beforeEach(() => {
      registry.registerPatent("owner", terms);
    });

    it("creates a pending license for an active patent", () => {
      expect(registry.requestLicense("licensee", licenseRequest)).toBe(1);
      expect(registry.nextLicenseId).toBe(2);
      expect(registry.getLicenseInfo(1)).toMatchObject({
        patent_id: 1,
        licensee: "licensee",
        licensor: "owner",
        status: "pending",
        duration_days: 365,
      });
      expect(registry.getUserLicenses("licensee")).toEqual([1]);
    });

    it("refuses licenses on an inactive patent", () => {
      registry.updatePatentStatus("owner", 1, "suspended");
      expect(catchSettlementError(() => registry.requestLicense("licensee", licenseRequest)).code).toBe(
        "PATENT_NOT_ACTIVE"
      );
    });

    it("refuses a duration outside 1-3650 days", () => {
      for (const duration_days of [0, 3651]) {
        expect(catchSettlementError(() => registry.requestLicense("licensee", { ...licenseRequest, duration_days })).code).toBe(
          "INVALID_DURATION"
        );
      }
    });

    it("approves once, and only by the licensor", () => {
      registry.requestLicense("licensee", licenseRequest);
      expect(catchSettlementError(() => registry.approveLicense("licensee", 1, 365)).code).toBe("NOT_LICENSOR");

      clock.set(1000);
      registry.approveLicense("owner", 1, 30);
      expect(registry.getLicenseInfo(1)).toMatchObject({
        status: "active",
        approved_at_ms: 1000,
        expires_at_ms: 1000 + 30 * MS_PER_DAY,
      });
      expect(registry.getAgreement(1)).toEqual({
        agreement_id: 1,
        licensee: "licensee",
        licensor: "owner",
        status: "active",
        royalty_rate_handle: registry.getLicenseInfo(1).royalty_rate_handle,
      });

      expect(catchSettlementError(() => registry.approveLicense("owner", 1, 365)).code).toBe("LICENSE_NOT_PENDING");
    });

    it("lets only the licensor change license status", () => {
      registry.requestLicense("licensee", licenseRequest);
      expect(catchSettlementError(() => registry.updateLicenseStatus("licensee", 1, "revoked")).code).toBe(
        "NOT_LICENSOR"
      );
      registry.updateLicenseStatus("owner", 1, "revoked");
      expect(registry.getAgreement(1)?.status).toBe("revoked");
    });
  });

  describe("emergency controls", () => {
    beforeEach(() => {
      registry.registerPatent("owner", terms);
    });

    it("pauses and resumes for the operator only", () => {
      expect(catchSettlementError(() => registry.emergencyPause("owner", 1)).code).toBe("NOT_OPERATOR");
      expect(catchSettlementError(() => registry.emergencyResume("owner", 1)).code).toBe("NOT_OPERATOR");

      registry.emergencyPause("operator", 1);
      expect(registry.getStatus(1)).toBe("suspended");
      registry.emergencyResume("operator", 1);
      expect(registry.getStatus(1)).toBe("active");
      expect(journal.ofType("registry_pause_changed").map((e) => e.paused)).toEqual([true, false]);
    });

    it("names the patent in pause and resume events", () => {
      registry.registerPatent("owner", { ...terms, patent_hash: "QmSecond" });
      registry.emergencyPause("operator", 2);
      registry.emergencyResume("operator", 2);

      expect(journal.ofType("registry_pause_changed")).toMatchObject([
        { patent_id: 2, paused: true, by: "operator" },
        { patent_id: 2, paused: false, by: "operator" },
      ]);
      expect(registry.getStatus(1)).toBe("active");
    });

    it("never reopens a patent that is not suspended", () => {
      registry.setStatus(1, "exclusively_licensed");

      const resume = catchSettlementError(() => registry.emergencyResume("operator", 1));
      expect(resume.code).toBe("PATENT_NOT_SUSPENDED");
      expect(resume.details).toEqual({ patent_id: 1, status: "exclusively_licensed" });
      expect(catchSettlementError(() => registry.emergencyPause("operator", 1)).code).toBe("PATENT_NOT_ACTIVE");
      expect(registry.getStatus(1)).toBe("exclusively_licensed");
      expect(journal.ofType("registry_pause_changed")).toEqual([]);
    });

    it("authorizes nobody when no operator is configured", () => {
      const open = new PatentRegistry({
        store: new MemoryStateStore(),
        now: clock.now,
        oracle: new MockConfidentialOracle(),
        journal,
      });
      open.registerPatent("owner", terms);
      expect(catchSettlementError(() => open.emergencyPause("operator", 1)).code).toBe("NOT_OPERATOR");
    });
  });

  it("rolls back with the store transaction it runs in", () => {
    expect(() =>
      store.transaction(() => {
        registry.registerPatent("owner", terms);
        throw new Error("abort");
      })
    ).toThrow("abort");
    expect(registry.nextPatentId).toBe(1);
    expect(registry.getUserPatents("owner")).toEqual([]);
  });

  it("continues numbering from the patents and licenses already in its store", () => {
    registry.registerPatent("owner", terms);
    registry.requestLicense("licensee", licenseRequest);

    const reopened = new PatentRegistry({ store, now: clock.now, oracle: new MockConfidentialOracle(), journal });
    expect(reopened.getPatentInfo(1).owner).toBe("owner");
    expect(reopened.registerPatent("other", terms)).toBe(2);
    expect(reopened.requestLicense("licensee", licenseRequest)).toBe(2);
    expect(reopened.getUserLicenses("licensee")).toEqual([1, 2]);
  });
});

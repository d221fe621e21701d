import type { BidReceipt } from "../bidding";
import type { PatentTerms } from "../registry";
import type { TestHarness } from "../testkit";
import { MS_PER_HOUR, type AgreementId, type AssetId, type RequestId } from "../types";

export const OWNER = "owner";
export const ALICE = "alice";
export const BOB = "bob";
export const CAROL = "carol";
export const LICENSEE = "licensee";

export const PATENT_TERMS: PatentTerms = {
  royalty_rate_bps: 1000,
  min_license_fee: 1_000n,
  exclusivity_period_days: 180,
  validity_years: 10,
  patent_hash: "QmTestHash",
  territory_code: 255,
  is_confidential: true,
};

/** Registers a patent for OWNER and opens bidding on it. */
export function openAuction(h: TestHarness, hours = 24): AssetId {
  const assetId = h.system.registerPatent(OWNER, PATENT_TERMS);
  h.system.startBidding(OWNER, assetId, hours);
  return assetId;
}

/** Funds the bidder with exactly the escrow and submits an encrypted bid. */
export function placeBid(h: TestHarness, bidder: string, assetId: AssetId, value: bigint, escrow: bigint): BidReceipt {
  h.fund(bidder, escrow);
  return h.system.submitBid(bidder, assetId, h.oracle.encrypt(value), escrow);
}

export function closeAuction(h: TestHarness, assetId: AssetId, hours = 24): RequestId {
  h.clock.advance(hours * MS_PER_HOUR);
  return h.system.finalizeBidding(OWNER, assetId);
}

/** Registers a patent, has LICENSEE request a license at rateBps and OWNER approve it. */
export function activeLicense(h: TestHarness, rateBps = 1000): AgreementId {
  const patentId = h.system.registerPatent(OWNER, PATENT_TERMS);
  const licenseId = h.system.requestLicense(LICENSEE, {
    patent_id: patentId,
    proposed_fee: 1_500n,
    proposed_royalty_rate_bps: rateBps,
    revenue_cap: 100_000n,
    duration_days: 365,
    request_exclusive: false,
    auto_renewal: true,
    territory_mask: 255,
  });
  h.system.approveLicense(OWNER, licenseId, 365);
  return licenseId;
}

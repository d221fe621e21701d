/**
 * Demo Scenarios
 *
 * Scripted runs of the settlement system against the in-memory ledger and
 * oracle. "workflow" replays the full licensing lifecycle; the others isolate
 * one settlement path each.
 */

import type {
  CustodyAudit,
  EventListener,
  LicenseRequest,
  PatentTerms,
  SettlementConfigInput,
  SettlementEvent,
  StateStore,
} from "@cipherlicense/core";
import { MS_PER_HOUR } from "@cipherlicense/core";
import { createTestHarness, type TestHarness } from "@cipherlicense/core/testkit";
import type { CompletionBody } from "@cipherlicense/oracle-bridge";

export const SCENARIO_NAMES = ["workflow", "award", "oracle-failure", "timeout", "verify"] as const;

export type ScenarioName = (typeof SCENARIO_NAMES)[number];

export function isScenarioName(value: string): value is ScenarioName {
  return SCENARIO_NAMES.some((name) => name === value);
}

export const INVENTOR = "inventor";
export const LICENSEE = "licensee";
export const BIDDER_A = "bidder-a";
export const BIDDER_B = "bidder-b";

const ACCOUNTS = [INVENTOR, LICENSEE, BIDDER_A, BIDDER_B];

const PATENTS: Array<{ name: string; terms: PatentTerms }> = [
  {
    name: "Advanced AI Algorithm",
    terms: {
      royalty_rate_bps: 1500,
      min_license_fee: 1_000n,
      exclusivity_period_days: 180,
      validity_years: 10,
      patent_hash: "QmAIAlgorithmHash123",
      territory_code: 255,
      is_confidential: true,
    },
  },
  {
    name: "Blockchain Security Protocol",
    terms: {
      royalty_rate_bps: 1000,
      min_license_fee: 500n,
      exclusivity_period_days: 90,
      validity_years: 15,
      patent_hash: "QmBlockchainSecurityHash456",
      territory_code: 1,
      is_confidential: false,
    },
  },
  {
    name: "Green Energy Storage System",
    terms: {
      royalty_rate_bps: 2000,
      min_license_fee: 2_000n,
      exclusivity_period_days: 365,
      validity_years: 20,
      patent_hash: "QmGreenEnergyHash789",
      territory_code: 255,
      is_confidential: true,
    },
  },
];

function licenseRequest(patentId: number, overrides: Partial<LicenseRequest> = {}): LicenseRequest {
  return {
    patent_id: patentId,
    proposed_fee: 1_200n,
    proposed_royalty_rate_bps: 1500,
    revenue_cap: 100_000n,
    duration_days: 365,
    request_exclusive: false,
    auto_renewal: true,
    territory_mask: 255,
    ...overrides,
  };
}

type Print = (line: string) => void;

type Counts = { patents: number; licenses: number; royalty_payments: number; bids: number };

export type ScenarioOptions = {
  print?: Print;
  config?: SettlementConfigInput;
  store?: StateStore;
  onEvent?: EventListener;
};

export type ScenarioReport = Counts & {
  name: ScenarioName;
  audit: CustodyAudit;
  /** Ledger balance per demo account, as decimal strings. */
  balances: Record<string, string>;
  events: SettlementEvent[];
};

// --- building blocks ---

function step(print: Print, title: string): void {
  print("");
  print(`--- ${title} ---`);
}

function register(h: TestHarness, print: Print, index: number): number {
  const { name, terms } = PATENTS[index];
  const patentId = h.system.registerPatent(INVENTOR, terms);
  print(`Registered "${name}" as patent ${patentId}`);
  return patentId;
}

/** Opens a 24h auction on the patent, collects two bids and finalizes it. */
function auction(h: TestHarness, print: Print, assetId: number): number {
  h.system.startBidding(INVENTOR, assetId, 24);
  print(`Bidding open on patent ${assetId} for 24h`);

  for (const [bidder, amount] of [
    [BIDDER_A, 2_500n],
    [BIDDER_B, 3_000n],
  ] as const) {
    h.fund(bidder, amount);
    const receipt = h.system.submitBid(bidder, assetId, h.oracle.encrypt(amount), amount);
    print(`${bidder} submitted sealed bid #${receipt.bid_index} with escrow ${amount}`);
  }

  h.clock.advance(24 * MS_PER_HOUR);
  const requestId = h.system.finalizeBidding(INVENTOR, assetId);
  print(`Bidding finalized, decryption request ${requestId} issued`);
  return requestId;
}

function withdrawAll(h: TestHarness, print: Print): void {
  for (const { account } of h.system.listRefunds()) {
    const amount = h.system.withdraw(account);
    print(`${account} withdrew refund of ${amount}`);
  }
}

function describeSession(h: TestHarness, print: Print, assetId: number): void {
  const session = h.system.getSession(assetId);
  if (!session) return;
  if (session.winner !== undefined) {
    print(`Session ${assetId}: ${session.status}, winner ${session.winner} (bid #${session.winning_index})`);
  } else {
    print(`Session ${assetId}: ${session.status}`);
  }
}

// --- scenarios ---

function runWorkflow(h: TestHarness, print: Print): Counts {
  step(print, "Step 1: Registering Patents");
  const patentIds = PATENTS.map((_, index) => register(h, print, index));

  step(print, "Step 2: Requesting Licenses");
  const requests = [
    licenseRequest(patentIds[0]),
    licenseRequest(patentIds[1], {
      proposed_fee: 600n,
      proposed_royalty_rate_bps: 1000,
      revenue_cap: 50_000n,
      duration_days: 180,
      auto_renewal: false,
      territory_mask: 1,
    }),
  ];
  const licenseIds = requests.map((request) => {
    const licenseId = h.system.requestLicense(LICENSEE, request);
    print(`License ${licenseId} requested for patent ${request.patent_id}`);
    return licenseId;
  });

  step(print, "Step 3: Approving Licenses");
  for (const licenseId of licenseIds) {
    h.system.approveLicense(INVENTOR, licenseId, 365);
    print(`License ${licenseId} approved`);
  }

  step(print, "Step 4: Confidential Bidding");
  const assetId = patentIds[2];
  const requestId = auction(h, print, assetId);
  h.deliver(requestId);
  describeSession(h, print, assetId);

  step(print, "Step 5: Royalty Payment");
  const licenseId = licenseIds[0];
  h.fund(LICENSEE, 1_500n);
  const payment = h.system.payRoyalties(LICENSEE, licenseId, h.oracle.encrypt(10_000n), 202501, 1_500n);
  print(`Royalty payment #${payment.payment_index} of ${payment.paid_amount} for license ${licenseId}`);
  const verificationId = h.system.requestVerification(INVENTOR, licenseId, payment.payment_index);
  h.deliver(verificationId);
  print(`Verification outcome: ${h.system.listPayments(licenseId)[payment.payment_index]?.outcome}`);

  step(print, "Step 6: Refunds");
  withdrawAll(h, print);

  step(print, "Step 7: Final State Summary");
  const patents = h.system.getUserPatents(INVENTOR);
  print(`Total Patents Registered: ${h.system.registry.nextPatentId - 1}`);
  print(`Total Licenses Created: ${h.system.registry.nextLicenseId - 1}`);
  print(`Inventor's Patents: ${patents.length}`);
  print(`Licensee's Licenses: ${h.system.getUserLicenses(LICENSEE).length}`);
  const first = h.system.getPatentInfo(patents[0]);
  print("First Patent Details:");
  print(`  Owner: ${first.owner}`);
  print(`  Status: ${first.status}`);
  print(`  Confidential: ${first.is_confidential}`);
  print(`  Patent Hash: ${first.patent_hash}`);

  return { patents: patents.length, licenses: licenseIds.length, royalty_payments: 1, bids: 2 };
}

function runAward(h: TestHarness, print: Print): Counts {
  step(print, "Sealed-bid auction");
  const assetId = register(h, print, 2);
  const requestId = auction(h, print, assetId);
  h.deliver(requestId);
  describeSession(h, print, assetId);
  withdrawAll(h, print);
  return { patents: 1, licenses: 0, royalty_payments: 0, bids: 2 };
}

function runOracleFailure(h: TestHarness, print: Print): Counts {
  step(print, "Auction with a failing oracle");
  const assetId = register(h, print, 2);
  const requestId = auction(h, print, assetId);
  const outcome = h.system.reportFailure(
    requestId,
    "enclave unavailable",
    h.oracle.respondFailure(requestId, "enclave unavailable").attestation
  );
  print(`Request ${requestId} ${outcome.status}`);
  describeSession(h, print, assetId);
  withdrawAll(h, print);
  return { patents: 1, licenses: 0, royalty_payments: 0, bids: 2 };
}

function runTimeout(h: TestHarness, print: Print): Counts {
  step(print, "Auction whose callback never arrives");
  const assetId = register(h, print, 2);
  const requestId = auction(h, print, assetId);
  h.oracle.drop(requestId);
  h.clock.advance(h.system.config.decryption_timeout_ms);
  const claimed = h.system.claim(BIDDER_A, requestId);
  print(`${BIDDER_A} claimed the timed-out request and recovered ${claimed}`);
  describeSession(h, print, assetId);
  withdrawAll(h, print);
  return { patents: 1, licenses: 0, royalty_payments: 0, bids: 2 };
}

function runVerify(h: TestHarness, print: Print): Counts {
  step(print, "Royalty verification");
  const patentId = register(h, print, 0);
  const licenseId = h.system.requestLicense(LICENSEE, licenseRequest(patentId));
  h.system.approveLicense(INVENTOR, licenseId, 365);

  // Revenue 10000 at 15% owes 1500; 1000 falls below the 95% tolerance
  const paid = [1_500n, 1_000n];
  h.fund(LICENSEE, 2_500n);
  for (const amount of paid) {
    const payment = h.system.payRoyalties(LICENSEE, licenseId, h.oracle.encrypt(10_000n), 202501, amount);
    const requestId = h.system.requestVerification(INVENTOR, licenseId, payment.payment_index);
    h.deliver(requestId);
  }
  for (const payment of h.system.listPayments(licenseId)) {
    print(`Payment #${payment.payment_index} of ${payment.paid_amount}: ${payment.outcome}`);
  }
  return { patents: 1, licenses: 1, royalty_payments: paid.length, bids: 0 };
}

export type SeededAuction = {
  asset_id: number;
  request_id: number;
  /** Gateway route the answer goes to. */
  path: string;
  /** The oracle's signed answer, ready to POST. */
  body: CompletionBody;
};

/**
 * Leaves one bidding request pending on h and returns the oracle's signed
 * answer to it without delivering it, so the callback gateway has something
 * to settle.
 */
export function seedPendingAuction(h: TestHarness, print: Print = () => {}): SeededAuction {
  const assetId = register(h, print, 2);
  const requestId = auction(h, print, assetId);
  const response = h.oracle.respond(requestId);
  if (response.kind !== "fulfilled") {
    throw new Error(`Oracle could not decrypt request ${requestId}: ${response.reason}`);
  }
  return {
    asset_id: assetId,
    request_id: requestId,
    path: "/callbacks/bidding",
    body: {
      request_id: requestId,
      cleartexts: response.cleartexts.map((value) => value.toString()),
      attestation: response.attestation,
    },
  };
}

const RUNNERS: Record<ScenarioName, (h: TestHarness, print: Print) => Counts> = {
  workflow: runWorkflow,
  award: runAward,
  "oracle-failure": runOracleFailure,
  timeout: runTimeout,
  verify: runVerify,
};

export function runScenario(name: ScenarioName, opts: ScenarioOptions = {}): ScenarioReport {
  const print = opts.print ?? ((line: string) => console.log(line));
  const h = createTestHarness({ config: opts.config, store: opts.store });
  const unsubscribe = opts.onEvent ? h.system.subscribe(opts.onEvent) : undefined;
  try {
    const counts = RUNNERS[name](h, print);
    const audit = h.system.auditCustody();
    const balances: Record<string, string> = {};
    for (const account of ACCOUNTS) balances[account] = h.ledger.getBalance(account).toString();

    step(print, "Custody");
    print(`Custody ${audit.custody}, active escrow ${audit.active_escrow}, refunds ${audit.refund_total}`);
    print(audit.balanced ? "Custody balanced" : "Custody MISMATCH");

    return { name, ...counts, audit, balances, events: h.system.events() };
  } finally {
    unsubscribe?.();
    h.system.close();
  }
}

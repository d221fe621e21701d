import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createJsonlEventSink, silentLogger, type SettlementEvent } from "@cipherlicense/core";
import { createTestHarness } from "@cipherlicense/core/testkit";
import { startCallbackServer } from "@cipherlicense/oracle-bridge";
import {
  BIDDER_A,
  BIDDER_B,
  INVENTOR,
  LICENSEE,
  isScenarioName,
  runScenario,
  SCENARIO_NAMES,
  seedPendingAuction,
} from "../scenarios";

function types(events: SettlementEvent[]): string[] {
  return events.map((event) => event.type);
}

describe("demo scenarios", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("recognises scenario names", () => {
    expect(SCENARIO_NAMES.every((name) => isScenarioName(name))).toBe(true);
    expect(isScenarioName("nope")).toBe(false);
  });

  it.each(SCENARIO_NAMES)("%s leaves custody balanced and empty", (name) => {
    const report = runScenario(name, { print: () => {} });
    expect(report.audit).toEqual({ custody: 0n, active_escrow: 0n, refund_total: 0n, balanced: true });
  });

  it("replays the full licensing workflow", () => {
    const lines: string[] = [];
    const report = runScenario("workflow", { print: (line) => lines.push(line) });

    expect(report).toMatchObject({ name: "workflow", patents: 3, licenses: 2, royalty_payments: 1, bids: 2 });
    expect(report.balances).toEqual({
      [INVENTOR]: "4500",
      [LICENSEE]: "0",
      [BIDDER_A]: "2500",
      [BIDDER_B]: "0",
    });
    expect(lines).toContain("Total Patents Registered: 3");
    expect(lines).toContain("Total Licenses Created: 2");
    expect(lines).toContain("Session 3: resolved, winner bidder-b (bid #1)");
    expect(lines).toContain("Verification outcome: valid");
    expect(lines).toContain("  Owner: inventor");
    expect(lines).toContain("Custody balanced");
  });

  it("refunds every bidder when the oracle reports a failure", () => {
    const report = runScenario("oracle-failure", { print: () => {} });

    const failures = report.events.flatMap((event) => (event.type === "request_failed" ? [event.cause] : []));
    expect(failures).toEqual(["oracle_failure"]);
    expect(report.balances[BIDDER_A]).toBe("2500");
    expect(report.balances[BIDDER_B]).toBe("3000");
    expect(report.balances[INVENTOR]).toBe("0");
  });

  it("recovers escrow through the timeout path", () => {
    const lines: string[] = [];
    const report = runScenario("timeout", { print: (line) => lines.push(line) });

    expect(types(report.events)).toContain("request_timed_out");
    expect(lines).toContain("bidder-a claimed the timed-out request and recovered 2500");
    expect(lines).toContain("bidder-b withdrew refund of 3000");
    expect(report.balances[BIDDER_B]).toBe("3000");
  });

  it("records one valid and one invalid royalty payment", () => {
    const report = runScenario("verify", { print: () => {} });

    const outcomes = report.events.flatMap((event) =>
      event.type === "verification_outcome" ? [event.outcome] : []
    );
    expect(outcomes).toEqual(["valid", "invalid"]);
    expect(report.balances[INVENTOR]).toBe("2500");
  });

  it("streams committed events to a JSONL sink", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cipherlicense-demo-"));
    const file = path.join(dir, "events", "award.jsonl");

    const report = runScenario("award", { print: () => {}, onEvent: createJsonlEventSink(file) });

    const lines = fs.readFileSync(file, "utf8").trim().split("\n");
    expect(lines).toHaveLength(report.events.length);
    expect(JSON.parse(lines[0])).toMatchObject({ seq: 1, type: "patent_registered", owner: INVENTOR });
  });

  it("runs against a SQLite store", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cipherlicense-demo-"));
    const report = runScenario("award", {
      print: () => {},
      config: { store: { mode: "sqlite", db_path: path.join(dir, "demo.db") } },
    });

    const winners = report.events.flatMap((event) => (event.type === "winner_awarded" ? [event.winner] : []));
    expect(winners).toEqual([BIDDER_B]);
    expect(report.balances[INVENTOR]).toBe("3000");
  });

  it("seeds a pending auction whose signed answer settles through the gateway", async () => {
    const h = createTestHarness();
    const seeded = seedPendingAuction(h);

    expect(seeded).toMatchObject({ asset_id: 1, request_id: 1, path: "/callbacks/bidding" });
    expect(seeded.body.cleartexts).toEqual(["2500", "3000"]);
    expect(h.system.listPendingRequests().map((request) => request.request_id)).toEqual([1]);

    const server = await startCallbackServer({ system: h.system, log: silentLogger });
    try {
      const pending = await fetch(`${server.url}/requests/pending`);
      expect(await pending.json()).toMatchObject({ requests: [{ request_id: 1, callback: "completeBidding" }] });

      const reply = await fetch(`${server.url}${seeded.path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(seeded.body),
      });
      expect(reply.status).toBe(200);
      expect(await reply.json()).toEqual({ request_id: 1, status: "completed" });
      expect(h.system.getSession(seeded.asset_id)).toMatchObject({ status: "resolved", winner: BIDDER_B });
    } finally {
      await server.close();
      h.system.close();
    }
  });
});

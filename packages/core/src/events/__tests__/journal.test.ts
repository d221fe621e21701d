import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { EventJournal } from "../journal";
import { createJsonlEventSink, serializeEvent } from "../jsonl";
import type { SettlementEvent } from "../types";

function clock(start = 100) {
  let t = start;
  return { now: () => t, tick: () => (t += 1) };
}

describe("EventJournal", () => {
  it("commits events emitted outside atomic() immediately", () => {
    const { now } = clock();
    const journal = new EventJournal(now, () => {});
    journal.emit({ type: "refund_withdrawn", account: "bob", amount: 5n });

    expect(journal.list()).toEqual([{ type: "refund_withdrawn", account: "bob", amount: 5n, seq: 1, ts_ms: 100 }]);
  });

  it("holds staged events until the outermost atomic() returns", () => {
    const { now } = clock();
    const journal = new EventJournal(now, () => {});
    const seen: number[] = [];
    journal.subscribe((event) => seen.push(event.seq));

    journal.atomic(() => {
      journal.emit({ type: "refund_withdrawn", account: "a", amount: 1n });
      journal.atomic(() => {
        journal.emit({ type: "refund_withdrawn", account: "b", amount: 2n });
      });
      expect(journal.list()).toEqual([]);
      expect(seen).toEqual([]);
    });

    expect(seen).toEqual([1, 2]);
    expect(journal.list().map((e) => e.seq)).toEqual([1, 2]);
  });

  it("discards what a throwing body staged, keeping earlier siblings", () => {
    const { now } = clock();
    const journal = new EventJournal(now, () => {});

    journal.atomic(() => {
      journal.emit({ type: "refund_withdrawn", account: "kept", amount: 1n });
      try {
        journal.atomic(() => {
          journal.emit({ type: "refund_withdrawn", account: "dropped", amount: 2n });
          throw new Error("inner");
        });
      } catch {
        // expected
      }
    });

    expect(() =>
      journal.atomic(() => {
        journal.emit({ type: "refund_withdrawn", account: "also dropped", amount: 3n });
        throw new Error("outer");
      })
    ).toThrow("outer");

    const accounts = journal.list().map((e) => (e.type === "refund_withdrawn" ? e.account : e.type));
    expect(accounts).toEqual(["kept"]);
  });

  it("filters by type", () => {
    const { now } = clock();
    const journal = new EventJournal(now, () => {});
    journal.emit({ type: "patent_registered", patent_id: 1, owner: "o" });
    journal.emit({ type: "refund_withdrawn", account: "bob", amount: 5n });

    const registered = journal.ofType("patent_registered");
    expect(registered).toHaveLength(1);
    expect(registered[0].owner).toBe("o");
  });

  it("reports a failing listener without losing the event", () => {
    const { now } = clock();
    const logger = vi.fn();
    const journal = new EventJournal(now, logger);
    journal.subscribe(() => {
      throw new Error("sink down");
    });

    journal.emit({ type: "refund_withdrawn", account: "bob", amount: 5n });

    expect(journal.list()).toHaveLength(1);
    expect(logger).toHaveBeenCalledWith("warn", "Event listener failed", {
      seq: 1,
      type: "refund_withdrawn",
      error: "sink down",
    });
  });

  it("stops notifying after unsubscribe", () => {
    const { now } = clock();
    const journal = new EventJournal(now, () => {});
    const listener = vi.fn();
    const unsubscribe = journal.subscribe(listener);
    journal.emit({ type: "patent_registered", patent_id: 1, owner: "o" });
    unsubscribe();
    journal.emit({ type: "patent_registered", patent_id: 2, owner: "o" });
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe("JSONL sink", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("serializes bigint amounts as decimal strings", () => {
    const event: SettlementEvent = {
      type: "refund_credited",
      account: "bob",
      amount: 10n,
      reason: "lost_bid",
      context: { asset_id: 3 },
      seq: 4,
      ts_ms: 1,
    };
    expect(serializeEvent(event)).toBe(
      '{"type":"refund_credited","account":"bob","amount":"10","reason":"lost_bid","context":{"asset_id":3},"seq":4,"ts_ms":1}'
    );
  });

  it("appends one line per committed event", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cipherlicense-events-"));
    const file = path.join(dir, "nested", "events.jsonl");
    const { now } = clock();
    const journal = new EventJournal(now, () => {});
    journal.subscribe(createJsonlEventSink(file));

    journal.emit({ type: "patent_registered", patent_id: 1, owner: "o" });
    journal.emit({ type: "refund_withdrawn", account: "bob", amount: 5n });

    const lines = fs.readFileSync(file, "utf8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toEqual({ type: "refund_withdrawn", account: "bob", amount: "5", seq: 2, ts_ms: 100 });
  });
});

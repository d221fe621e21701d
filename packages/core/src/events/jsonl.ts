/**
 * JSONL Event Sink
 *
 * Appends each committed event to a file as one JSON line, bigint amounts as
 * decimal strings.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { EventListener } from "./journal";
import type { SettlementEvent } from "./types";

export function serializeEvent(event: SettlementEvent): string {
  return JSON.stringify(event, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value));
}

export function createJsonlEventSink(filePath: string): EventListener {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return (event) => {
    fs.appendFileSync(filePath, serializeEvent(event) + "\n", "utf8");
  };
}

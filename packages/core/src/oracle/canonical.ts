/**
 * Canonical JSON serialization for deterministic hashing.
 * Sorts object keys recursively while preserving array order.
 */

import { createHash } from "node:crypto";

export function stableCanonicalize(obj: unknown): string {
  if (obj === null || obj === undefined) {
    return "null";
  }

  if (typeof obj === "string" || typeof obj === "number" || typeof obj === "boolean") {
    return JSON.stringify(obj);
  }

  if (typeof obj === "bigint") {
    return JSON.stringify(obj.toString());
  }

  if (Array.isArray(obj)) {
    const items = obj.map((item: unknown) => stableCanonicalize(item));
    return `[${items.join(",")}]`;
  }

  if (typeof obj === "object") {
    const pairs = Object.entries(obj)
      .filter(([, value]) => value !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `${JSON.stringify(key)}:${stableCanonicalize(value)}`);
    return `{${pairs.join(",")}}`;
  }

  return JSON.stringify(String(obj));
}

export function sha256Canonical(obj: unknown): Uint8Array {
  const hash = createHash("sha256");
  hash.update(stableCanonicalize(obj), "utf8");
  return new Uint8Array(hash.digest());
}

/**
 * CipherLicense settlement core.
 */

export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./config";
export * from "./security/redact";
export * from "./state/types";
export type { StateStore } from "./state/store";
export { MemoryStateStore } from "./state/memory";
export { SqliteStateStore } from "./state/sqlite";
export * from "./events";
export * from "./ledger";
export * from "./oracle";
export * from "./registry";
export * from "./coordinator";
export * from "./guard";
export * from "./refunds";
export * from "./bidding";
export * from "./verification";
export * from "./system";

/**
 * Shared Primitives
 *
 * Identifiers and value types used across the coordination layer.
 */

/** Account identifier on the hosting ledger. */
export type Address = string;

/** Opaque reference to an encrypted value. Only the oracle can open it. */
export type CiphertextHandle = string;

export type RequestId = number;

/** Patent id in the agreement registry. Bidding sessions are keyed by it. */
export type AssetId = number;

/** License id in the agreement registry. Royalty payments are keyed by it. */
export type AgreementId = number;

/** Epoch milliseconds source. Injected everywhere time matters. */
export type Clock = () => number;

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

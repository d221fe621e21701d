/**
 * Settlement Error Codes
 *
 * Stable codes surfaced by every failing operation, grouped by taxonomy kind.
 * Codes are part of the public contract (the HTTP gateway and the event journal
 * both carry them), so existing codes must never be renamed.
 */

export type ErrorKind =
  | "authorization"
  | "invalid_state"
  | "invalid_input"
  | "attestation_invalid"
  | "transfer_failure";

export const ERROR_KINDS = {
  // Authorization: wrong caller for an owner-gated action
  NOT_CONTROLLER: "authorization",
  NOT_LICENSOR: "authorization",
  NOT_LICENSEE: "authorization",
  NOT_OPERATOR: "authorization",

  // Invalid state: operation outside its lifecycle phase
  INVALID_REQUEST: "invalid_state",
  NOT_PENDING: "invalid_state",
  ALREADY_RESOLVED: "invalid_state",
  NOT_EXPIRED: "invalid_state",
  SESSION_ALREADY_OPEN: "invalid_state",
  NOT_OPEN: "invalid_state",
  ENDED: "invalid_state",
  BIDDING_NOT_ENDED: "invalid_state",
  NO_BIDS: "invalid_state",
  PATENT_NOT_ACTIVE: "invalid_state",
  PATENT_NOT_SUSPENDED: "invalid_state",
  LICENSE_NOT_PENDING: "invalid_state",
  LICENSE_NOT_ACTIVE: "invalid_state",
  ALREADY_VERIFIED: "invalid_state",
  VERIFICATION_PENDING: "invalid_state",
  NOTHING_TO_WITHDRAW: "invalid_state",
  REENTRANT_CALL: "invalid_state",
  HANDLERS_NOT_BOUND: "invalid_state",

  // Invalid input: out-of-range parameters
  INVALID_DURATION: "invalid_input",
  INVALID_AMOUNT: "invalid_input",
  ESCROW_BELOW_FLOOR: "invalid_input",
  INSUFFICIENT_FUNDS: "invalid_input",
  INVALID_PAYMENT_INDEX: "invalid_input",
  UNKNOWN_PATENT: "invalid_input",
  UNKNOWN_LICENSE: "invalid_input",
  ROYALTY_RATE_TOO_HIGH: "invalid_input",
  INVALID_VALIDITY_PERIOD: "invalid_input",
  MALFORMED_PAYLOAD: "invalid_input",
  INVALID_CONFIG: "invalid_input",

  ATTESTATION_INVALID: "attestation_invalid",

  TRANSFER_FAILED: "transfer_failure",
} as const satisfies Record<string, ErrorKind>;

export type ErrorCode = keyof typeof ERROR_KINDS;

export function kindOf(code: ErrorCode): ErrorKind {
  return ERROR_KINDS[code];
}

import { kindOf, type ErrorCode, type ErrorKind } from "./codes";

export class SettlementError extends Error {
  public readonly kind: ErrorKind;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SettlementError";
    this.kind = kindOf(code);
  }
}

export function fail(code: ErrorCode, message: string, details?: Record<string, unknown>): never {
  throw new SettlementError(code, message, details);
}

export function isSettlementError(error: unknown, code?: ErrorCode): error is SettlementError {
  if (!(error instanceof SettlementError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Flatten any thrown value into a loggable message.
 */
export function describeError(error: unknown): string {
  if (error instanceof SettlementError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Oracle Relay
 *
 * Client side of the callback gateway: polls for pending decryption requests
 * and posts signed oracle responses to the matching callback route.
 */

import type { CompletionOutcome, OracleResponse } from "@cipherlicense/core";
import type { z } from "zod";
import {
  errorBodySchema,
  outcomeSchema,
  pendingListSchema,
  type CompletionBody,
  type FailureBody,
  type PendingRequestView,
} from "./schemas";

export class RelayError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
    readonly kind?: string
  ) {
    super(message);
    this.name = "RelayError";
  }
}

const CALLBACK_PATHS = {
  completeBidding: "/callbacks/bidding",
  completeVerification: "/callbacks/verification",
} as const;

export class OracleRelay {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async pending(): Promise<PendingRequestView[]> {
    const response = await this.fetchImpl(`${this.baseUrl}/requests/pending`);
    const body = await this.readJson(response, pendingListSchema);
    return body.requests;
  }

  async deliver(response: OracleResponse): Promise<CompletionOutcome> {
    if (response.kind === "failed") {
      const body: FailureBody = {
        request_id: response.request_id,
        reason: response.reason,
        attestation: response.attestation,
      };
      return this.post("/callbacks/failure", body);
    }
    const body: CompletionBody = {
      request_id: response.request_id,
      cleartexts: response.cleartexts.map((value) => value.toString()),
      attestation: response.attestation,
    };
    return this.post(CALLBACK_PATHS[response.callback], body);
  }

  private async post(path: string, body: CompletionBody | FailureBody): Promise<CompletionOutcome> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    return this.readJson(response, outcomeSchema);
  }

  private async readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const json: unknown = await response.json();
    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(json);
      if (!parsed.success) throw new RelayError(`Gateway responded ${response.status}`, response.status);
      throw new RelayError(parsed.data.error, response.status, parsed.data.code, parsed.data.kind);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new RelayError(`Unexpected gateway response: ${parsed.error.message}`, response.status);
    }
    return parsed.data;
  }
}

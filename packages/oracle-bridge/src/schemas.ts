/**
 * Wire Schemas
 *
 * Bodies exchanged between the oracle and the callback gateway. Cleartexts
 * travel as decimal strings so 256-bit values survive JSON.
 */

import { z } from "zod";

const decimal = z
  .string()
  .regex(/^-?\d+$/, "must be a decimal integer string")
  .transform((value) => BigInt(value));

export const attestationSchema = z.object({
  signer_public_key_b58: z.string().min(1),
  signature_b58: z.string().min(1),
});

const requestId = z.number().int().positive();

export const completionBodySchema = z.object({
  request_id: requestId,
  cleartexts: z.array(decimal),
  attestation: attestationSchema,
});

export const failureBodySchema = z.object({
  request_id: requestId,
  reason: z.string().min(1),
  attestation: attestationSchema,
});

export const outcomeSchema = z.discriminatedUnion("status", [
  z.object({ request_id: requestId, status: z.literal("completed") }),
  z.object({
    request_id: requestId,
    status: z.literal("failed"),
    cause: z.enum(["oracle_failure", "malformed_payload", "attestation_invalid", "timeout"]),
    reason: z.string().optional(),
  }),
]);

export const pendingRequestSchema = z.object({
  request_id: requestId,
  callback: z.enum(["completeBidding", "completeVerification"]),
  handles: z.array(z.string()),
  created_at_ms: z.number(),
});

export const pendingListSchema = z.object({ requests: z.array(pendingRequestSchema) });

export const errorBodySchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  kind: z.string().optional(),
});

export type CompletionBody = z.input<typeof completionBodySchema>;
export type FailureBody = z.input<typeof failureBodySchema>;
export type PendingRequestView = z.output<typeof pendingRequestSchema>;

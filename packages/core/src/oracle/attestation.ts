/**
 * Oracle Attestations
 *
 * An attestation is an Ed25519 signature (tweetnacl) over the SHA-256 of the
 * canonical JSON payload. The payload binds the request id to the exact
 * cleartexts, so a signature for one request cannot be replayed against
 * another or with altered values.
 */

import nacl from "tweetnacl";
import bs58 from "bs58";
import type { RequestId } from "../types";
import { sha256Canonical } from "./canonical";

export const ATTESTATION_DOMAIN = "cipherlicense-decryption/1";

export type Keypair = {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
};

export type AttestedPayload =
  | { domain: typeof ATTESTATION_DOMAIN; kind: "fulfilled"; request_id: RequestId; cleartexts: string[] }
  | { domain: typeof ATTESTATION_DOMAIN; kind: "failed"; request_id: RequestId; reason: string };

export type Attestation = {
  signer_public_key_b58: string;
  signature_b58: string;
};

export interface AttestationVerifier {
  verify(payload: AttestedPayload, attestation: Attestation): boolean;
}

export function fulfilledPayload(requestId: RequestId, cleartexts: readonly bigint[]): AttestedPayload {
  return {
    domain: ATTESTATION_DOMAIN,
    kind: "fulfilled",
    request_id: requestId,
    cleartexts: cleartexts.map((value) => value.toString()),
  };
}

export function failedPayload(requestId: RequestId, reason: string): AttestedPayload {
  return { domain: ATTESTATION_DOMAIN, kind: "failed", request_id: requestId, reason };
}

export function generateKeypair(): Keypair {
  return nacl.sign.keyPair();
}

export function keypairFromSeed(seed: Uint8Array): Keypair {
  if (seed.length !== 32) {
    throw new Error(`Ed25519 seed must be 32 bytes, got ${seed.length}`);
  }
  return nacl.sign.keyPair.fromSeed(seed);
}

export function publicKeyToB58(publicKey: Uint8Array): string {
  return bs58.encode(publicKey);
}

export function signAttestation(payload: AttestedPayload, keypair: Keypair): Attestation {
  const signature = nacl.sign.detached(sha256Canonical(payload), keypair.secretKey);
  return {
    signer_public_key_b58: bs58.encode(keypair.publicKey),
    signature_b58: bs58.encode(signature),
  };
}

/**
 * Accepts attestations from a fixed set of oracle signer keys.
 */
export class Ed25519AttestationVerifier implements AttestationVerifier {
  private readonly trusted: Set<string>;

  constructor(trustedSignersB58: readonly string[]) {
    this.trusted = new Set(trustedSignersB58);
  }

  trusts(signerB58: string): boolean {
    return this.trusted.has(signerB58);
  }

  verify(payload: AttestedPayload, attestation: Attestation): boolean {
    if (!this.trusted.has(attestation.signer_public_key_b58)) return false;
    try {
      const publicKey = bs58.decode(attestation.signer_public_key_b58);
      const signature = bs58.decode(attestation.signature_b58);
      if (publicKey.length !== nacl.sign.publicKeyLength) return false;
      if (signature.length !== nacl.sign.signatureLength) return false;
      return nacl.sign.detached.verify(sha256Canonical(payload), signature, publicKey);
    } catch {
      // bs58 throws on non-base58 input
      return false;
    }
  }
}

import { describe, it, expect } from "vitest";
import bs58 from "bs58";
import {
  ATTESTATION_DOMAIN,
  Ed25519AttestationVerifier,
  failedPayload,
  fulfilledPayload,
  keypairFromSeed,
  publicKeyToB58,
  signAttestation,
} from "../attestation";
import { stableCanonicalize } from "../canonical";

const oracleKeys = keypairFromSeed(new Uint8Array(32).fill(1));
const strangerKeys = keypairFromSeed(new Uint8Array(32).fill(2));
const oracleB58 = publicKeyToB58(oracleKeys.publicKey);

describe("stableCanonicalize", () => {
  it("sorts keys recursively and keeps array order", () => {
    expect(stableCanonicalize({ b: [3, { d: 1, c: 2 }], a: "x" })).toBe('{"a":"x","b":[3,{"c":2,"d":1}]}');
  });

  it("drops undefined fields and writes bigint as a string", () => {
    expect(stableCanonicalize({ a: undefined, n: 12n })).toBe('{"n":"12"}');
  });
});

describe("attestations", () => {
  const verifier = new Ed25519AttestationVerifier([oracleB58]);

  it("binds the request id and cleartexts", () => {
    const payload = fulfilledPayload(4, [5n, 0n]);
    expect(payload).toEqual({ domain: ATTESTATION_DOMAIN, kind: "fulfilled", request_id: 4, cleartexts: ["5", "0"] });

    const attestation = signAttestation(payload, oracleKeys);
    expect(attestation.signer_public_key_b58).toBe(oracleB58);
    expect(verifier.verify(payload, attestation)).toBe(true);

    expect(verifier.verify(fulfilledPayload(5, [5n, 0n]), attestation)).toBe(false);
    expect(verifier.verify(fulfilledPayload(4, [5n, 1n]), attestation)).toBe(false);
    expect(verifier.verify(failedPayload(4, "x"), attestation)).toBe(false);
  });

  it("rejects signers outside the trusted set", () => {
    const payload = failedPayload(1, "enclave unavailable");
    expect(verifier.verify(payload, signAttestation(payload, strangerKeys))).toBe(false);
  });

  it("rejects a trusted key paired with someone else's signature", () => {
    const payload = failedPayload(1, "enclave unavailable");
    const forged = {
      signer_public_key_b58: oracleB58,
      signature_b58: signAttestation(payload, strangerKeys).signature_b58,
    };
    expect(verifier.verify(payload, forged)).toBe(false);
  });

  it("returns false for garbage encodings", () => {
    const payload = failedPayload(1, "x");
    expect(verifier.verify(payload, { signer_public_key_b58: oracleB58, signature_b58: "0OIl" })).toBe(false);
    expect(
      verifier.verify(payload, { signer_public_key_b58: oracleB58, signature_b58: bs58.encode(new Uint8Array(10)) })
    ).toBe(false);
  });

  it("trusts only the configured keys", () => {
    expect(verifier.trusts(oracleB58)).toBe(true);
    expect(verifier.trusts(publicKeyToB58(strangerKeys.publicKey))).toBe(false);
  });

  it("requires a 32-byte seed", () => {
    expect(() => keypairFromSeed(new Uint8Array(16))).toThrow("Ed25519 seed must be 32 bytes, got 16");
  });
});

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import bs58 from "bs58";
import nacl from "tweetnacl";
import { loadOracleKeypair } from "../keypair";

describe("loadOracleKeypair", () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cipherlicense-keypair-"));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads the keypair from CIPHERLICENSE_ORACLE_SECRET_KEY_B58", () => {
    const expected = nacl.sign.keyPair();
    const result = loadOracleKeypair({
      CIPHERLICENSE_ORACLE_SECRET_KEY_B58: bs58.encode(expected.secretKey),
    });

    expect(result.mode).toBe("env-secret-key");
    expect(result.publicKeyB58).toBe(bs58.encode(expected.publicKey));
    expect(result.warning).toBeUndefined();
  });

  it("prefers the env secret over a keypair file", () => {
    const expected = nacl.sign.keyPair();
    const result = loadOracleKeypair({
      CIPHERLICENSE_ORACLE_SECRET_KEY_B58: bs58.encode(expected.secretKey),
      CIPHERLICENSE_ORACLE_KEYPAIR_FILE: path.join(dir, "missing.json"),
    });
    expect(result.mode).toBe("env-secret-key");
  });

  it("rejects a secret key of the wrong length", () => {
    expect(() =>
      loadOracleKeypair({ CIPHERLICENSE_ORACLE_SECRET_KEY_B58: bs58.encode(new Uint8Array(32).fill(1)) })
    ).toThrow(
      "Failed to load keypair from CIPHERLICENSE_ORACLE_SECRET_KEY_B58: Invalid secret key length: expected 64 bytes, got 32"
    );
  });

  it("loads the keypair from CIPHERLICENSE_ORACLE_KEYPAIR_FILE", () => {
    const expected = nacl.sign.keyPair();
    const file = path.join(dir, "oracle.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ secretKeyB58: bs58.encode(expected.secretKey), publicKeyB58: bs58.encode(expected.publicKey) })
    );

    const result = loadOracleKeypair({ CIPHERLICENSE_ORACLE_KEYPAIR_FILE: file });

    expect(result.mode).toBe("keypair-file");
    expect(result.publicKeyB58).toBe(bs58.encode(expected.publicKey));
  });

  it("rejects a keypair file whose public key does not match", () => {
    const file = path.join(dir, "mismatch.json");
    fs.writeFileSync(
      file,
      JSON.stringify({
        secretKeyB58: bs58.encode(nacl.sign.keyPair().secretKey),
        publicKeyB58: bs58.encode(nacl.sign.keyPair().publicKey),
      })
    );

    expect(() => loadOracleKeypair({ CIPHERLICENSE_ORACLE_KEYPAIR_FILE: file })).toThrow(
      `Failed to load keypair from ${file}: Public key in file does not match secret key`
    );
  });

  it("derives the same identity from the same dev seed", () => {
    const first = loadOracleKeypair({ CIPHERLICENSE_DEV_ORACLE_SEED: "test-seed-v1" });
    const second = loadOracleKeypair({ CIPHERLICENSE_DEV_ORACLE_SEED: "test-seed-v1" });
    const other = loadOracleKeypair({ CIPHERLICENSE_DEV_ORACLE_SEED: "test-seed-v2" });

    expect(first.mode).toBe("dev-seed");
    expect(first.publicKeyB58).toBe(second.publicKeyB58);
    expect(other.publicKeyB58).not.toBe(first.publicKeyB58);
    expect(first.warning).toContain("DEV-ONLY");
  });

  it("falls back to an ephemeral keypair", () => {
    const first = loadOracleKeypair({});
    const second = loadOracleKeypair({});

    expect(first.mode).toBe("ephemeral");
    expect(first.warning).toBeUndefined();
    expect(first.publicKeyB58).not.toBe(second.publicKeyB58);
  });
});

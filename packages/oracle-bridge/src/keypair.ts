/**
 * Oracle Keypair Loading
 *
 * Loads the oracle signing identity with the following precedence:
 * 1. CIPHERLICENSE_ORACLE_SECRET_KEY_B58 (base58 64-byte Ed25519 secret key)
 * 2. CIPHERLICENSE_ORACLE_KEYPAIR_FILE (JSON file with {secretKeyB58, publicKeyB58?})
 * 3. CIPHERLICENSE_DEV_ORACLE_SEED (explicit opt-in for a deterministic dev identity)
 * 4. Random ephemeral keypair (fallback)
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import bs58 from "bs58";
import nacl from "tweetnacl";
import { z } from "zod";
import { describeError, publicKeyToB58, type Keypair } from "@cipherlicense/core";

export type OracleIdentityMode = "env-secret-key" | "keypair-file" | "dev-seed" | "ephemeral";

export interface OracleKeypairLoadResult {
  keypair: Keypair;
  publicKeyB58: string;
  mode: OracleIdentityMode;
  warning?: string; // only set for dev-seed mode
}

const keypairFileSchema = z.object({
  secretKeyB58: z.string().min(1),
  publicKeyB58: z.string().min(1).optional(),
});

function fromSecretKey(secretKey: Uint8Array): Keypair {
  if (secretKey.length !== 64) {
    throw new Error(`Invalid secret key length: expected 64 bytes, got ${secretKey.length}`);
  }
  return nacl.sign.keyPair.fromSecretKey(secretKey);
}

function loadFromFile(file: string): Keypair {
  const parsed = keypairFileSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
  if (!parsed.success) {
    throw new Error("Keypair file must contain a secretKeyB58 string");
  }
  const keypair = fromSecretKey(bs58.decode(parsed.data.secretKeyB58));
  if (parsed.data.publicKeyB58 && parsed.data.publicKeyB58 !== publicKeyToB58(keypair.publicKey)) {
    throw new Error("Public key in file does not match secret key");
  }
  return keypair;
}

export function loadOracleKeypair(env: NodeJS.ProcessEnv = process.env): OracleKeypairLoadResult {
  const secretKeyB58 = env.CIPHERLICENSE_ORACLE_SECRET_KEY_B58;
  if (secretKeyB58) {
    let keypair: Keypair;
    try {
      keypair = fromSecretKey(bs58.decode(secretKeyB58));
    } catch (error) {
      throw new Error(`Failed to load keypair from CIPHERLICENSE_ORACLE_SECRET_KEY_B58: ${describeError(error)}`);
    }
    return { keypair, publicKeyB58: publicKeyToB58(keypair.publicKey), mode: "env-secret-key" };
  }

  const keypairFile = env.CIPHERLICENSE_ORACLE_KEYPAIR_FILE;
  if (keypairFile) {
    let keypair: Keypair;
    try {
      keypair = loadFromFile(keypairFile);
    } catch (error) {
      throw new Error(`Failed to load keypair from ${keypairFile}: ${describeError(error)}`);
    }
    return { keypair, publicKeyB58: publicKeyToB58(keypair.publicKey), mode: "keypair-file" };
  }

  const devSeed = env.CIPHERLICENSE_DEV_ORACLE_SEED;
  if (devSeed) {
    const seedHash = createHash("sha256").update(devSeed).digest(); // 32 bytes
    const keypair = nacl.sign.keyPair.fromSeed(new Uint8Array(seedHash));
    return {
      keypair,
      publicKeyB58: publicKeyToB58(keypair.publicKey),
      mode: "dev-seed",
      warning: "DEV-ONLY: Using deterministic oracle identity from seed (NOT for production)",
    };
  }

  const keypair = nacl.sign.keyPair();
  return { keypair, publicKeyB58: publicKeyToB58(keypair.publicKey), mode: "ephemeral" };
}

/**
 * Secret Redaction
 *
 * Strips key material from structured data before it reaches a log line.
 * Attestations and public keys are not secret and pass through untouched.
 */

const SECRET_KEY_PATTERN = /(secret|private|seed|mnemonic|passphrase)/i;

export const REDACTED = "[REDACTED]";

export function redactSecrets(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }
  if (value instanceof Uint8Array) {
    return `<${value.length} bytes>`;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redactSecrets(inner);
    }
    return out;
  }
  return value;
}

export function redactRecord(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(data)) {
    out[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : redactSecrets(inner);
  }
  return out;
}

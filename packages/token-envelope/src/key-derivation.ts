import { hkdfSync } from "node:crypto";

const KEY_DERIVATION_SALT = "sessionguard.kdf";

/** Derives a purpose-bound key from a shared secret with HKDF-SHA256. */
export const deriveKey = (secret: string, purpose: string, length = 32): Buffer => {
  if (secret.length === 0) {
    throw new Error("Key derivation requires a non-empty secret");
  }
  return Buffer.from(hkdfSync("sha256", secret, KEY_DERIVATION_SALT, purpose, length));
};

import { webcrypto } from "node:crypto";
import { VAULT_CONSTANTS } from "../constants";
import { base64ToBytes } from "../utils/base64";
import { bytesEqual, concatBytes, utf8Encode } from "../utils/bytes";

// Unsalted per user: weaker than the vault key wrap, used only to gate unlock.

async function sha256(data: Uint8Array): Promise<Uint8Array> {
  return new Uint8Array(await webcrypto.subtle.digest("SHA-256", data));
}

function hexToBytes(hex: string): Uint8Array | null {
  if (!/^(?:[0-9a-f]{2})+$/i.test(hex)) return null;
  return new Uint8Array(Buffer.from(hex, "hex"));
}

export async function computeVerifier(secret: string): Promise<string> {
  const digest = await sha256(concatBytes(utf8Encode(secret), utf8Encode(VAULT_CONSTANTS.VERIFIER_SALT)));
  return Buffer.from(digest).toString("hex");
}

/**
 * Checks `secret` against a stored verifier. Accepts the fixed-salt hex digest
 * and the older `base64(salt).hexDigest` form.
 */
export async function verifyMasterPassword(secret: string, stored: string): Promise<boolean> {
  const parts = stored.split(".");
  if (parts.length === 1) {
    const expected = hexToBytes(stored);
    if (!expected) return false;
    const actual = hexToBytes(await computeVerifier(secret));
    return actual !== null && bytesEqual(actual, expected);
  }
  if (parts.length !== 2) return false;

  const [saltB64, hex] = parts;
  const expected = hexToBytes(hex);
  if (!expected) return false;
  let salt: Uint8Array;
  try {
    salt = base64ToBytes(saltB64);
  } catch {
    return false;
  }
  const actual = await sha256(concatBytes(utf8Encode(secret), salt));
  return bytesEqual(actual, expected);
}

import { webcrypto } from "node:crypto";
import { VAULT_CONSTANTS } from "../constants";
import { DecryptionFailedError, EncryptionFailedError, ValidationError } from "../errors";

/**
 * Raw-bytes block cipher. Callers supply a fresh IV for every encryption.
 *
 * The current implementation carries no authentication tag: a flipped bit can
 * decrypt to altered plaintext without raising.
 */
export interface SymmetricCipher {
  encrypt(plaintext: Uint8Array, key: Uint8Array, iv: Uint8Array): Promise<Uint8Array>;
  decrypt(ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array): Promise<Uint8Array>;
}

/** AES-256-CBC with PKCS#7 padding. */
export class AesCbcCipher implements SymmetricCipher {
  async encrypt(plaintext: Uint8Array, key: Uint8Array, iv: Uint8Array): Promise<Uint8Array> {
    this.assertParams(key, iv, "encrypt()");
    try {
      const k = await this.importKey(key, "encrypt");
      const ct = await webcrypto.subtle.encrypt({ name: VAULT_CONSTANTS.AES.NAME, iv }, k, plaintext);
      return new Uint8Array(ct);
    } catch (e) {
      throw new EncryptionFailedError("Encryption failed", { cause: e });
    }
  }

  async decrypt(ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array): Promise<Uint8Array> {
    this.assertParams(key, iv, "decrypt()");
    const { BLOCK_SIZE } = VAULT_CONSTANTS.AES;
    if (ciphertext.byteLength === 0 || ciphertext.byteLength % BLOCK_SIZE !== 0) {
      throw new DecryptionFailedError(`Ciphertext length must be a non-zero multiple of ${BLOCK_SIZE}`);
    }
    try {
      const k = await this.importKey(key, "decrypt");
      const pt = await webcrypto.subtle.decrypt({ name: VAULT_CONSTANTS.AES.NAME, iv }, k, ciphertext);
      return new Uint8Array(pt);
    } catch {
      throw new DecryptionFailedError();
    }
  }

  private importKey(key: Uint8Array, usage: "encrypt" | "decrypt"): Promise<webcrypto.CryptoKey> {
    return webcrypto.subtle.importKey("raw", key, { name: VAULT_CONSTANTS.AES.NAME }, false, [usage]);
  }

  private assertParams(key: Uint8Array, iv: Uint8Array, where: string): void {
    if (!(key instanceof Uint8Array) || key.byteLength * 8 !== VAULT_CONSTANTS.AES.LENGTH) {
      throw new ValidationError(`Invalid key length for ${where}; expected ${VAULT_CONSTANTS.AES.LENGTH} bits`);
    }
    if (!(iv instanceof Uint8Array) || iv.byteLength !== VAULT_CONSTANTS.AES.IV_LENGTH) {
      throw new ValidationError(`IV must be ${VAULT_CONSTANTS.AES.IV_LENGTH} bytes for ${where}`);
    }
  }
}

export const defaultCipher: SymmetricCipher = new AesCbcCipher();

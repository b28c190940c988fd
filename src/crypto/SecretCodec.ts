import { VAULT_CONSTANTS } from "../constants";
import { DecryptionFailedError, InvalidFormatError } from "../errors";
import type { BlobFormat, DecodeResult } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { concatBytes, utf8DecodeStrict, utf8Encode, zeroize } from "../utils/bytes";
import { mapWithConcurrency } from "../utils/concurrency";
import { Pbkdf2KeyDerivation, type KeyDerivation } from "./KeyDerivation";
import { defaultRandomSource, type RandomSource } from "./RandomSource";
import { defaultCipher, type SymmetricCipher } from "./SymmetricCipher";

export interface SecretCodecOptions {
  cipher?: SymmetricCipher;
  random?: RandomSource;
  /** Derivation used by the legacy per-secret format. */
  legacyKdf?: KeyDerivation;
}

/**
 * Per-salt cache of legacy keys, keyed by base64 salt. Lets a batch of legacy
 * blobs sharing a salt pay for a single derivation. Owners must call `clear()`.
 */
export class LegacyKeyCache {
  private readonly keys = new Map<string, Promise<Uint8Array>>();

  getOrDerive(saltB64: string, derive: () => Promise<Uint8Array>): Promise<Uint8Array> {
    let key = this.keys.get(saltB64);
    if (!key) {
      key = derive();
      this.keys.set(saltB64, key);
      // failed derivations are not cached
      key.catch(() => this.keys.delete(saltB64));
    }
    return key;
  }

  async clear(): Promise<void> {
    const pending = [...this.keys.values()];
    this.keys.clear();
    const settled = await Promise.allSettled(pending);
    for (const r of settled) if (r.status === "fulfilled") zeroize(r.value);
  }
}

const { FORMAT_TAG, SALT_LEN } = VAULT_CONSTANTS;
const { IV_LENGTH, BLOCK_SIZE } = VAULT_CONSTANTS.AES;
const LEGACY_MIN_LEN = SALT_LEN + IV_LENGTH + BLOCK_SIZE;

/**
 * Encodes single secrets to self-describing base64 blobs and back.
 *
 * Blob shapes:
 * - current, tagged:   `0x02 ‖ iv(16) ‖ ct` (every new write)
 * - current, untagged: `iv(16) ‖ ct` (older data, still readable)
 * - legacy:            `salt(32) ‖ iv(16) ‖ ct`, key derived from the user secret per blob
 *
 * Untagged blobs are told apart by length only. An untagged current blob of
 * 64 bytes or more classifies as legacy.
 */
export class SecretCodec {
  private readonly cipher: SymmetricCipher;
  private readonly random: RandomSource;
  private readonly legacyKdf: KeyDerivation;

  constructor(opts?: SecretCodecOptions) {
    this.cipher = opts?.cipher ?? defaultCipher;
    this.random = opts?.random ?? defaultRandomSource;
    this.legacyKdf = opts?.legacyKdf ?? new Pbkdf2KeyDerivation();
  }

  detectFormat(blob: string): BlobFormat {
    let bytes: Uint8Array;
    try {
      bytes = base64ToBytes(blob);
    } catch {
      return "unknown";
    }
    if (isTagged(bytes)) return "current";
    if (bytes.byteLength >= LEGACY_MIN_LEN) return "legacy";
    if (bytes.byteLength > IV_LENGTH) return "current";
    return "unknown";
  }

  isLegacyFormat(blob: string): boolean {
    return this.detectFormat(blob) === "legacy";
  }

  async encodeCurrent(plaintext: string, vaultKey: Uint8Array): Promise<string> {
    const iv = this.random.bytes(IV_LENGTH);
    const ct = await this.cipher.encrypt(utf8Encode(plaintext), vaultKey, iv);
    return bytesToBase64(concatBytes(Uint8Array.of(FORMAT_TAG), iv, ct));
  }

  async decodeCurrent(blob: string, vaultKey: Uint8Array): Promise<string> {
    const bytes = decodeBlob(blob);
    const body = isTagged(bytes) ? bytes.subarray(1) : bytes;
    if (body.byteLength < IV_LENGTH) {
      throw new InvalidFormatError(`Ciphertext shorter than the ${IV_LENGTH}-byte IV`);
    }
    const pt = await this.cipher.decrypt(body.subarray(IV_LENGTH), vaultKey, body.subarray(0, IV_LENGTH));
    return decodePlaintext(pt);
  }

  /** Writes the legacy shape. New data must use {@link encodeCurrent}. */
  async encodeLegacy(plaintext: string, secret: string): Promise<string> {
    const salt = this.random.bytes(SALT_LEN);
    const iv = this.random.bytes(IV_LENGTH);
    const key = await this.legacyKdf.derive(secret, salt);
    try {
      const ct = await this.cipher.encrypt(utf8Encode(plaintext), key, iv);
      return bytesToBase64(concatBytes(salt, iv, ct));
    } finally {
      zeroize(key);
    }
  }

  async decodeLegacy(blob: string, secret: string, keyCache?: LegacyKeyCache): Promise<string> {
    const bytes = decodeBlob(blob);
    if (bytes.byteLength < SALT_LEN + IV_LENGTH) {
      throw new InvalidFormatError(`Legacy ciphertext shorter than salt + IV (${SALT_LEN + IV_LENGTH} bytes)`);
    }
    const salt = bytes.subarray(0, SALT_LEN);
    const iv = bytes.subarray(SALT_LEN, SALT_LEN + IV_LENGTH);
    const ct = bytes.subarray(SALT_LEN + IV_LENGTH);

    if (keyCache) {
      const key = await keyCache.getOrDerive(bytesToBase64(salt), () => this.legacyKdf.derive(secret, salt));
      return decodePlaintext(await this.cipher.decrypt(ct, key, iv));
    }
    const key = await this.legacyKdf.derive(secret, salt);
    try {
      return decodePlaintext(await this.cipher.decrypt(ct, key, iv));
    } finally {
      zeroize(key);
    }
  }

  /**
   * Decodes many current-format blobs, at most `concurrency` at a time.
   * Results keep input order; a failing blob yields `{ ok: false }` instead of rejecting.
   */
  decodeMany(
    blobs: readonly string[],
    vaultKey: Uint8Array,
    concurrency: number = VAULT_CONSTANTS.BATCH_CONCURRENCY
  ): Promise<DecodeResult[]> {
    return mapWithConcurrency(blobs, concurrency, async (blob): Promise<DecodeResult> => {
      try {
        return { ok: true, plaintext: await this.decodeCurrent(blob, vaultKey) };
      } catch (e) {
        return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
      }
    });
  }
}

function isTagged(bytes: Uint8Array): boolean {
  const bodyLen = bytes.byteLength - 1 - IV_LENGTH;
  return bytes[0] === FORMAT_TAG && bodyLen >= BLOCK_SIZE && bodyLen % BLOCK_SIZE === 0;
}

function decodeBlob(blob: string): Uint8Array {
  try {
    return base64ToBytes(blob);
  } catch {
    throw new InvalidFormatError("Ciphertext is not valid base64");
  }
}

function decodePlaintext(pt: Uint8Array): string {
  try {
    return utf8DecodeStrict(pt);
  } catch {
    throw new DecryptionFailedError();
  } finally {
    zeroize(pt);
  }
}

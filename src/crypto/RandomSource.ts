import { webcrypto } from "node:crypto";
import { ValidationError } from "../errors";

export interface RandomSource {
  bytes(length: number): Uint8Array;
  /** Uniform integer in [0, maxExclusive). */
  uniformInt(maxExclusive: number): number;
}

// getRandomValues refuses more than 64 KiB per call
const MAX_CHUNK = 65_536;
const UINT32_RANGE = 0x1_0000_0000;

export class CryptoRandomSource implements RandomSource {
  bytes(length: number): Uint8Array {
    if (!Number.isInteger(length) || length < 0) {
      throw new ValidationError(`length must be a non-negative integer, got ${length}`);
    }
    const out = new Uint8Array(length);
    for (let offset = 0; offset < length; offset += MAX_CHUNK) {
      webcrypto.getRandomValues(out.subarray(offset, Math.min(offset + MAX_CHUNK, length)));
    }
    return out;
  }

  uniformInt(maxExclusive: number): number {
    if (!Number.isInteger(maxExclusive) || maxExclusive < 1 || maxExclusive > UINT32_RANGE) {
      throw new ValidationError(`maxExclusive must be an integer in [1, 2^32], got ${maxExclusive}`);
    }
    // Rejection sampling keeps the result unbiased
    const limit = UINT32_RANGE - (UINT32_RANGE % maxExclusive);
    const buf = new Uint32Array(1);
    for (;;) {
      webcrypto.getRandomValues(buf);
      const v = buf[0];
      if (v < limit) return v % maxExclusive;
    }
  }
}

export const defaultRandomSource: RandomSource = new CryptoRandomSource();

import { webcrypto } from "node:crypto";
import * as argon2 from "argon2";
import { VAULT_CONSTANTS } from "../constants";
import { KeyDerivationError } from "../errors";
import type { KdfParams } from "../types";
import { utf8Encode } from "../utils/bytes";

/**
 * Turns a user secret and salt into fixed-length key material.
 * Implementations are deterministic and must never log their inputs or output.
 */
export interface KeyDerivation {
  derive(secret: string, salt: Uint8Array, outputLength?: number): Promise<Uint8Array>;
  /** Parameters persisted alongside an account so the same derivation can be rebuilt. */
  describe(): KdfParams;
}

function assertInputs(secret: string, salt: Uint8Array, outputLength: number): void {
  if (typeof secret !== "string" || secret.length === 0) {
    throw new KeyDerivationError("Secret must be a non-empty string");
  }
  if (!(salt instanceof Uint8Array) || salt.byteLength < VAULT_CONSTANTS.MIN_SALT_LEN) {
    throw new KeyDerivationError(`Salt must be a Uint8Array of at least ${VAULT_CONSTANTS.MIN_SALT_LEN} bytes`);
  }
  const { MIN, MAX } = VAULT_CONSTANTS.OUTPUT_LEN;
  if (!Number.isInteger(outputLength) || outputLength < MIN || outputLength > MAX) {
    throw new KeyDerivationError(`outputLength must be an integer in [${MIN}, ${MAX}]`);
  }
}

export class Pbkdf2KeyDerivation implements KeyDerivation {
  readonly iterations: number;

  constructor(opts?: { iterations?: number }) {
    const iterations = opts?.iterations ?? VAULT_CONSTANTS.PBKDF2.ITERATIONS;
    const { MIN_ITERATIONS, MAX_ITERATIONS } = VAULT_CONSTANTS.PBKDF2;
    if (!Number.isInteger(iterations) || iterations < MIN_ITERATIONS || iterations > MAX_ITERATIONS) {
      throw new KeyDerivationError(`iterations must be an integer in [${MIN_ITERATIONS}, ${MAX_ITERATIONS}]`);
    }
    this.iterations = iterations;
  }

  async derive(
    secret: string,
    salt: Uint8Array,
    outputLength: number = VAULT_CONSTANTS.KEY_LEN
  ): Promise<Uint8Array> {
    assertInputs(secret, salt, outputLength);
    try {
      const base = await webcrypto.subtle.importKey("raw", utf8Encode(secret), "PBKDF2", false, ["deriveBits"]);
      const bits = await webcrypto.subtle.deriveBits(
        { name: "PBKDF2", hash: VAULT_CONSTANTS.PBKDF2.HASH, salt, iterations: this.iterations },
        base,
        outputLength * 8
      );
      return new Uint8Array(bits);
    } catch (e) {
      throw new KeyDerivationError("PBKDF2 derivation failed", { cause: e });
    }
  }

  describe(): KdfParams {
    return { alg: VAULT_CONSTANTS.PBKDF2.ALG, iterations: this.iterations };
  }
}

export class Argon2idKeyDerivation implements KeyDerivation {
  readonly timeCost: number;
  readonly memoryCost: number;
  readonly parallelism: number;

  constructor(opts?: { timeCost?: number; memoryCost?: number; parallelism?: number }) {
    this.timeCost = opts?.timeCost ?? VAULT_CONSTANTS.ARGON2.TIME_COST;
    this.memoryCost = opts?.memoryCost ?? VAULT_CONSTANTS.ARGON2.MEMORY_KIB;
    this.parallelism = opts?.parallelism ?? VAULT_CONSTANTS.ARGON2.PARALLELISM;

    if (!Number.isInteger(this.timeCost) || this.timeCost < 1 || this.timeCost > VAULT_CONSTANTS.ARGON2.MAX_TIME_COST) {
      throw new KeyDerivationError(`timeCost must be an integer in [1, ${VAULT_CONSTANTS.ARGON2.MAX_TIME_COST}]`);
    }
    if (!Number.isInteger(this.memoryCost) || this.memoryCost < 1024) {
      throw new KeyDerivationError("memoryCost must be an integer of at least 1024 KiB");
    }
    if (!Number.isInteger(this.parallelism) || this.parallelism < 1) {
      throw new KeyDerivationError("parallelism must be a positive integer");
    }
  }

  async derive(
    secret: string,
    salt: Uint8Array,
    outputLength: number = VAULT_CONSTANTS.KEY_LEN
  ): Promise<Uint8Array> {
    assertInputs(secret, salt, outputLength);

    let hash: Buffer;
    try {
      hash = await argon2.hash(secret, {
        type: argon2.argon2id,
        salt: Buffer.from(salt),
        timeCost: this.timeCost,
        memoryCost: this.memoryCost,
        parallelism: this.parallelism,
        hashLength: outputLength,
        raw: true
      });
    } catch (e) {
      throw new KeyDerivationError(`Argon2 derivation failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }

    if (hash.byteLength !== outputLength) {
      throw new KeyDerivationError(`Argon2 returned invalid hash size (expected ${outputLength} bytes)`);
    }
    return new Uint8Array(hash);
  }

  describe(): KdfParams {
    return {
      alg: VAULT_CONSTANTS.ARGON2.ALG,
      timeCost: this.timeCost,
      memoryCost: this.memoryCost,
      parallelism: this.parallelism
    };
  }
}

/** Rebuilds the derivation an account was created with. */
export function keyDerivationFor(params: KdfParams): KeyDerivation {
  switch (params.alg) {
    case "pbkdf2-sha256":
      return new Pbkdf2KeyDerivation({ iterations: params.iterations });
    case "argon2id":
      return new Argon2idKeyDerivation(params);
  }
}

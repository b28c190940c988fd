import { VAULT_CONSTANTS } from "../constants";
import { keyDerivationFor, Pbkdf2KeyDerivation, type KeyDerivation } from "../crypto/KeyDerivation";
import { defaultRandomSource, type RandomSource } from "../crypto/RandomSource";
import { SessionKeyCache } from "../crypto/SessionKeyCache";
import { defaultCipher, type SymmetricCipher } from "../crypto/SymmetricCipher";
import { DecryptionFailedError, LockedError, ValidationError } from "../errors";
import type { Logger } from "../logger";
import type { AccountKeyRecord, KdfParams, Lockable, VaultSession } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { zeroize } from "../utils/bytes";
import type { State } from "./states/BaseState";
import { LockedState } from "./states/LockedState";
import { UnlockedState } from "./states/UnlockedState";

export interface VaultKeyManagerOptions {
  /** Derivation for new accounts and re-wraps. Existing records carry their own parameters. */
  kdf?: KeyDerivation;
  resolveKdf?: (params: KdfParams) => KeyDerivation;
  cipher?: SymmetricCipher;
  random?: RandomSource;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Owns the two-tier key model: a MasterKey derived from the user's secret wraps a
 * random VaultKey, and the unwrapped VaultKey is held for the session.
 *
 * @remarks
 * - Starts `Locked`. {@link initializeForAccount} and {@link unlock} move it to `Unlocked`;
 *   {@link lock} moves it back and zero-fills the cached key.
 * - The MasterKey is zero-filled as soon as the VaultKey has been wrapped or unwrapped.
 * - A `lock()` issued while an unlock is still deriving wins: the unlock rejects with
 *   {@link LockedError} and nothing is cached. A failed unlock only drops the cached
 *   key, so a correct unlock running beside it still succeeds.
 * - Persisting the returned {@link AccountKeyRecord} is the caller's job, as is refusing
 *   to initialize an account that already has one.
 */
export class VaultKeyManager implements VaultSession, Lockable {
  /** @internal */
  state: State;
  /** @internal */
  readonly session = new SessionKeyCache();

  readonly kdf: KeyDerivation;
  readonly cipher: SymmetricCipher;
  readonly random: RandomSource;
  readonly logger: Logger;
  readonly keyLength: number = VAULT_CONSTANTS.KEY_LEN;

  private readonly resolveKdf: (params: KdfParams) => KeyDerivation;
  private readonly now: () => Date;
  private epoch = 0;

  constructor(opts?: VaultKeyManagerOptions) {
    this.kdf = opts?.kdf ?? new Pbkdf2KeyDerivation();
    this.resolveKdf = opts?.resolveKdf ?? keyDerivationFor;
    this.cipher = opts?.cipher ?? defaultCipher;
    this.random = opts?.random ?? defaultRandomSource;
    this.logger = opts?.logger ?? console;
    this.now = opts?.now ?? (() => new Date());
    this.state = new LockedState(this);
  }

  // --------------------------- public API ---------------------------

  isUnlocked(): boolean {
    return this.state.isUnlocked();
  }

  /**
   * Creates the account's key material: fresh salt, MasterKey, random VaultKey.
   * Leaves the manager unlocked with the new VaultKey.
   *
   * @returns the record to persist; calling this again for a live account orphans its secrets
   * @throws {ValidationError} If the secret is empty.
   */
  initializeForAccount(secret: string): Promise<AccountKeyRecord> {
    return this.state.initializeForAccount(secret);
  }

  /**
   * Derives the MasterKey from `secret` and the record's salt, then unwraps the VaultKey.
   *
   * @returns the VaultKey (a copy; the session keeps its own)
   * @throws {UnlockFailedError} On a wrong secret or an unreadable record.
   * @throws {LockedError} If {@link lock} was called while the unlock was in flight.
   */
  unlock(secret: string, record: AccountKeyRecord): Promise<Uint8Array> {
    return this.state.unlock(secret, record);
  }

  /**
   * Re-wraps the current VaultKey under `newSecret` with a new salt and IV.
   *
   * @throws {LockedError} If locked.
   */
  rewrap(newSecret: string): Promise<AccountKeyRecord> {
    return this.state.rewrap(newSecret);
  }

  lock(): void {
    this.epoch++;
    this.state.lock();
  }

  /** @throws {LockedError} If locked. */
  getVaultKey(): Uint8Array {
    return this.state.getVaultKey();
  }

  // --------------------------- internals used by states ---------------------------

  /** @internal */
  transitionTo(state: State): void {
    this.state = state;
  }

  /**
   * Drops the cached key without cancelling unlocks in flight, unlike {@link lock}.
   * @internal
   */
  resetSession(): void {
    this.state.lock();
  }

  /** @internal */
  currentEpoch(): number {
    return this.epoch;
  }

  /** @internal */
  assertSecret(secret: string): void {
    if (typeof secret !== "string" || secret.length === 0) {
      throw new ValidationError("secret must be a non-empty string");
    }
  }

  /** @internal */
  adoptVaultKey(vaultKey: Uint8Array, epoch: number): void {
    if (epoch !== this.epoch) {
      zeroize(vaultKey);
      throw new LockedError("Vault was locked while unlocking");
    }
    this.session.set(vaultKey);
    if (!this.state.isUnlocked()) this.transitionTo(new UnlockedState(this));
    this.logger.debug("[vault] unlocked");
  }

  /** @internal */
  async wrapVaultKey(secret: string, vaultKey: Uint8Array): Promise<AccountKeyRecord> {
    const salt = this.random.bytes(VAULT_CONSTANTS.SALT_LEN);
    const iv = this.random.bytes(VAULT_CONSTANTS.AES.IV_LENGTH);
    const masterKey = await this.kdf.derive(secret, salt);
    let wrapped: Uint8Array;
    try {
      wrapped = await this.cipher.encrypt(vaultKey, masterKey, iv);
    } finally {
      zeroize(masterKey);
    }
    const ts = this.now().toISOString();
    return {
      salt: bytesToBase64(salt),
      vaultKeyIV: bytesToBase64(iv),
      encryptedVaultKey: bytesToBase64(wrapped),
      kdf: this.kdf.describe(),
      createdAt: ts,
      updatedAt: ts
    };
  }

  /** @internal */
  async unwrapVaultKey(secret: string, record: AccountKeyRecord): Promise<Uint8Array> {
    const kdf = this.resolveKdf(
      record.kdf ?? { alg: "pbkdf2-sha256", iterations: record.iterations ?? VAULT_CONSTANTS.PBKDF2.ITERATIONS }
    );
    const salt = base64ToBytes(record.salt);
    const iv = base64ToBytes(record.vaultKeyIV);
    const wrapped = base64ToBytes(record.encryptedVaultKey);

    const masterKey = await kdf.derive(secret, salt);
    try {
      const vaultKey = await this.cipher.decrypt(wrapped, masterKey, iv);
      // a wrong key occasionally yields valid padding; the length check catches it
      if (vaultKey.byteLength !== this.keyLength) {
        zeroize(vaultKey);
        throw new DecryptionFailedError();
      }
      return vaultKey;
    } finally {
      zeroize(masterKey);
    }
  }
}

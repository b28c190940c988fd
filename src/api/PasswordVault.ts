import { VAULT_CONSTANTS } from "../constants";
import { Pbkdf2KeyDerivation, type KeyDerivation } from "../crypto/KeyDerivation";
import { computeVerifier, verifyMasterPassword } from "../crypto/MasterPasswordVerifier";
import type { RandomSource } from "../crypto/RandomSource";
import { SecretCodec } from "../crypto/SecretCodec";
import type { SymmetricCipher } from "../crypto/SymmetricCipher";
import {
  AccountExistsError,
  AccountNotFoundError,
  DecryptionFailedError,
  InvalidFormatError,
  LockedError,
  SecretNotFoundError,
  UnlockFailedError,
  ValidationError
} from "../errors";
import type { Logger } from "../logger";
import { AccountStorage, type StoredAccount } from "../storage/AccountStorage";
import type { DocumentStore } from "../storage/DocumentStore";
import type { DecodeResult, MigrationResult, SecretRecord } from "../types";
import { AutoLock } from "./vault/AutoLock";
import { MigrationEngine } from "./vault/MigrationEngine";
import { VaultKeyManager } from "./VaultKeyManager";

/**
 * Configuration for {@link PasswordVault}.
 */
export interface PasswordVaultOptions {
  accountId: string;
  store: DocumentStore;
  /** Derivation for new accounts and password changes. @defaultValue PBKDF2-SHA256, 100 000 iterations */
  kdf?: KeyDerivation;
  /** Derivation of the legacy per-secret format. @defaultValue PBKDF2-SHA256, 100 000 iterations */
  legacyKdf?: KeyDerivation;
  cipher?: SymmetricCipher;
  random?: RandomSource;
  logger?: Logger;
  /** Idle time before the vault locks itself; `null` disables. @defaultValue 300 000 */
  autoLockMs?: number | null;
  onAutoLock?: () => void;
  /** @defaultValue 5 */
  batchConcurrency?: number;
  now?: () => Date;
}

/**
 * A single account's password vault over a document store.
 *
 * @remarks
 * - Secrets are encrypted with the account's VaultKey; the VaultKey is stored only
 *   wrapped under a key derived from the master password.
 * - The vault starts locked. {@link setup} (first use) or {@link unlock} opens it.
 * - Error taxonomy:
 *   - {@link UnlockFailedError}: wrong master password, whatever the cause.
 *   - {@link LockedError}: operation needs an unlocked vault.
 *   - {@link AccountExistsError} / {@link AccountNotFoundError}: setup or unlock against the wrong state.
 *   - {@link DecryptionFailedError} / {@link InvalidFormatError}: a stored blob cannot be read.
 *     Legacy-format blobs are only readable through {@link migrateLegacySecrets}.
 *   - {@link PersistenceError}: the document store failed.
 */
export class PasswordVault {
  readonly keys: VaultKeyManager;
  readonly codec: SecretCodec;
  private readonly storage: AccountStorage;
  private readonly migration: MigrationEngine;
  private readonly autoLock: AutoLock | null;
  private readonly logger: Logger;
  private readonly batchConcurrency: number;
  private readonly now: () => Date;

  constructor(opts: PasswordVaultOptions) {
    if (typeof opts.accountId !== "string" || opts.accountId.trim().length === 0) {
      throw new ValidationError("accountId must be a non-empty string");
    }
    this.logger = opts.logger ?? console;
    this.now = opts.now ?? (() => new Date());
    this.batchConcurrency = opts.batchConcurrency ?? VAULT_CONSTANTS.BATCH_CONCURRENCY;
    if (!Number.isInteger(this.batchConcurrency) || this.batchConcurrency < 1) {
      throw new ValidationError("batchConcurrency must be a positive integer");
    }
    this.storage = new AccountStorage(opts.store, opts.accountId);
    this.keys = new VaultKeyManager({
      kdf: opts.kdf ?? new Pbkdf2KeyDerivation(),
      cipher: opts.cipher,
      random: opts.random,
      logger: this.logger,
      now: this.now
    });
    this.codec = new SecretCodec({ cipher: opts.cipher, random: opts.random, legacyKdf: opts.legacyKdf });
    this.migration = new MigrationEngine({
      codec: this.codec,
      records: this.storage,
      logger: this.logger,
      now: this.now
    });
    this.autoLock =
      opts.autoLockMs === null
        ? null
        : new AutoLock(this.keys, { timeoutMs: opts.autoLockMs, onLock: opts.onAutoLock });
  }

  // --------------------------- account lifecycle ---------------------------

  async hasAccount(): Promise<boolean> {
    return (await this.storage.loadAccount()) !== null;
  }

  /**
   * First-time setup: creates and stores the wrapped VaultKey together with the
   * master-password verifier. Leaves the vault unlocked, or locked if the write fails.
   *
   * @throws {AccountExistsError} If the account already has key material.
   * @throws {PersistenceError} If the account document cannot be written.
   */
  async setup(masterPassword: string): Promise<void> {
    if (await this.hasAccount()) {
      throw new AccountExistsError(this.storage.accountId);
    }
    const record = await this.keys.initializeForAccount(masterPassword);
    try {
      await this.storage.saveAccount(record, await computeVerifier(masterPassword));
    } catch (e) {
      // a key that was never stored must not stay usable
      this.keys.lock();
      throw e;
    }
    this.autoLock?.start();
    this.logger.info(`[vault] initialized account ${this.storage.accountId}`);
  }

  /**
   * @throws {AccountNotFoundError} If {@link setup} never ran for this account.
   * @throws {UnlockFailedError} If the master password is wrong.
   */
  async unlock(masterPassword: string): Promise<void> {
    await this.openAccount(masterPassword);
  }

  lock(): void {
    this.autoLock?.stop();
    this.keys.lock();
  }

  isUnlocked(): boolean {
    return this.keys.isUnlocked();
  }

  /**
   * Re-wraps the VaultKey under a new master password. Stored secrets are not re-encrypted.
   * The key record and verifier are written in one document, so a failed write leaves
   * the old password in force.
   *
   * @throws {UnlockFailedError} If `oldPassword` is wrong.
   */
  async changeMasterPassword(oldPassword: string, newPassword: string): Promise<void> {
    if (typeof newPassword !== "string" || newPassword.length === 0) {
      throw new ValidationError("newPassword must be a non-empty string");
    }
    const { record: previous } = await this.openAccount(oldPassword);
    const rewrapped = await this.keys.rewrap(newPassword);
    await this.storage.saveAccount(
      { ...rewrapped, createdAt: previous.createdAt ?? rewrapped.createdAt },
      await computeVerifier(newPassword)
    );
    this.logger.info(`[vault] master password changed for account ${this.storage.accountId}`);
  }

  // --------------------------- secrets ---------------------------

  /** @throws {LockedError} If locked. */
  async encryptSecret(plaintext: string): Promise<string> {
    return this.withVaultKey((key) => this.codec.encodeCurrent(plaintext, key));
  }

  /**
   * @throws {LockedError} If locked.
   * @throws {InvalidFormatError} If `blob` is in the legacy format and has not been migrated.
   */
  async decryptSecret(blob: string): Promise<string> {
    return this.withVaultKey(async (key) => {
      try {
        return await this.codec.decodeCurrent(blob, key);
      } catch (e) {
        if (e instanceof DecryptionFailedError && this.codec.isLegacyFormat(blob)) {
          throw new InvalidFormatError("Secret is in the legacy format; run migrateLegacySecrets first");
        }
        throw e;
      }
    });
  }

  /** Batch decrypt of current-format blobs; per-blob failures come back as `{ ok: false }`. */
  async decryptSecrets(blobs: readonly string[]): Promise<DecodeResult[]> {
    return this.withVaultKey((key) => this.codec.decodeMany(blobs, key, this.batchConcurrency));
  }

  async saveSecret(id: string, plaintext: string, metadata?: Record<string, unknown>): Promise<SecretRecord> {
    if (typeof id !== "string" || id.trim().length === 0) {
      throw new ValidationError("id must be a non-empty string");
    }
    const encryptedPassword = await this.encryptSecret(plaintext);
    const existing = await this.storage.loadSecret(id);
    const ts = this.now().toISOString();
    const record: SecretRecord = { id, encryptedPassword, createdAt: existing?.createdAt ?? ts, updatedAt: ts };
    const meta = metadata ?? existing?.metadata;
    if (meta) record.metadata = meta;
    await this.storage.save(record);
    return record;
  }

  /** @throws {SecretNotFoundError} If nothing is stored under `id`. */
  async revealSecret(id: string): Promise<string> {
    const record = await this.storage.loadSecret(id);
    if (!record) throw new SecretNotFoundError(id);
    return this.decryptSecret(record.encryptedPassword);
  }

  /**
   * Moves legacy-format records onto the VaultKey. Requires an unlocked vault.
   * The master password is still needed: legacy blobs are keyed by it directly.
   *
   * @throws {UnlockFailedError} If `masterPassword` is not the account's. No record is touched.
   */
  async migrateLegacySecrets(masterPassword: string, records: readonly SecretRecord[]): Promise<MigrationResult> {
    if (!this.keys.isUnlocked()) throw new LockedError("Unlock the vault before migrating");
    const account = await this.requireAccount();
    if (!(await this.matchesMasterPassword(masterPassword, account))) {
      throw new UnlockFailedError();
    }
    const result = await this.migration.migrateAccount(masterPassword, records, this.keys);
    this.autoLock?.touch();
    return result;
  }

  private async requireAccount(): Promise<StoredAccount> {
    const account = await this.storage.loadAccount();
    if (!account) throw new AccountNotFoundError(this.storage.accountId);
    return account;
  }

  private async openAccount(masterPassword: string): Promise<StoredAccount> {
    const account = await this.requireAccount();

    // cheap gate before the expensive derivation
    if (account.verifier !== null && !(await verifyMasterPassword(masterPassword, account.verifier))) {
      this.keys.resetSession();
      throw new UnlockFailedError();
    }

    const vaultKey = await this.keys.unlock(masterPassword, account.record);
    vaultKey.fill(0);
    this.autoLock?.start();
    return account;
  }

  /** Verifier check; accounts without a verifier pay for a trial unwrap. */
  private async matchesMasterPassword(masterPassword: string, account: StoredAccount): Promise<boolean> {
    if (account.verifier !== null) return verifyMasterPassword(masterPassword, account.verifier);
    try {
      const vaultKey = await this.keys.unwrapVaultKey(masterPassword, account.record);
      vaultKey.fill(0);
      return true;
    } catch {
      return false;
    }
  }

  private async withVaultKey<T>(fn: (key: Uint8Array) => Promise<T>): Promise<T> {
    const key = this.keys.getVaultKey();
    try {
      const out = await fn(key);
      this.autoLock?.touch();
      return out;
    } finally {
      key.fill(0);
    }
  }
}

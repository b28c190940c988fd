import { LegacyKeyCache, type SecretCodec } from "../../crypto/SecretCodec";
import { errorKindOf, InvalidFormatError, LockedError } from "../../errors";
import type { Logger } from "../../logger";
import type { MigrationFailure, MigrationResult, SecretRecord, VaultSession } from "../../types";
import type { SecretRecordStore } from "../../storage/AccountStorage";

export interface MigrationEngineOptions {
  codec: SecretCodec;
  records: SecretRecordStore;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Re-encodes an account's legacy blobs under the vault key.
 *
 * Best effort: each record is decoded, re-encoded and saved on its own, and a
 * record that fails at any step is left as it was and reported. Running it
 * again is a no-op for records already migrated.
 */
export class MigrationEngine {
  private readonly codec: SecretCodec;
  private readonly records: SecretRecordStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: MigrationEngineOptions) {
    this.codec = opts.codec;
    this.records = opts.records;
    this.logger = opts.logger ?? console;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * @param secret the user's master password, needed to open legacy blobs
   * @param session must already be unlocked for this account
   * @throws {LockedError} If the session is locked. No record is touched.
   */
  async migrateAccount(
    secret: string,
    records: readonly SecretRecord[],
    session: VaultSession
  ): Promise<MigrationResult> {
    if (!session.isUnlocked()) throw new LockedError("Unlock the vault before migrating");
    const vaultKey = session.getVaultKey();
    const keyCache = new LegacyKeyCache();

    let migratedCount = 0;
    let unchangedCount = 0;
    const failures: MigrationFailure[] = [];

    try {
      for (const record of records) {
        const format = this.codec.detectFormat(record.encryptedPassword);
        if (format === "current") {
          unchangedCount++;
          continue;
        }
        try {
          if (format === "unknown") {
            throw new InvalidFormatError("Unrecognized ciphertext format");
          }
          const plaintext = await this.codec.decodeLegacy(record.encryptedPassword, secret, keyCache);
          const encryptedPassword = await this.codec.encodeCurrent(plaintext, vaultKey);
          await this.records.save({ ...record, encryptedPassword, updatedAt: this.now().toISOString() });
          migratedCount++;
        } catch (e) {
          const kind = errorKindOf(e);
          failures.push({ id: record.id, kind });
          this.logger.warn(`[migration] record ${record.id} left as is (${kind})`);
        }
      }
    } finally {
      vaultKey.fill(0);
      await keyCache.clear();
    }

    if (migratedCount > 0 || failures.length > 0) {
      this.logger.info(
        `[migration] migrated ${migratedCount} of ${records.length} records, ${failures.length} skipped`
      );
    }
    return { migratedCount, skippedCount: failures.length, unchangedCount, failures };
  }
}

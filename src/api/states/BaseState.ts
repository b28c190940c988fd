import type { VaultKeyManager } from "../VaultKeyManager";
import { UnlockFailedError } from "../../errors";
import type { AccountKeyRecord } from "../../types";

export abstract class State {
  constructor(protected context: VaultKeyManager) {}

  abstract isUnlocked(): boolean;
  abstract rewrap(newSecret: string): Promise<AccountKeyRecord>;
  abstract lock(): void;
  abstract getVaultKey(): Uint8Array;

  async initializeForAccount(secret: string): Promise<AccountKeyRecord> {
    this.context.assertSecret(secret);
    const epoch = this.context.currentEpoch();
    const vaultKey = this.context.random.bytes(this.context.keyLength);
    try {
      const record = await this.context.wrapVaultKey(secret, vaultKey);
      this.context.adoptVaultKey(vaultKey, epoch);
      return record;
    } finally {
      vaultKey.fill(0);
    }
  }

  async unlock(secret: string, record: AccountKeyRecord): Promise<Uint8Array> {
    this.context.assertSecret(secret);
    const epoch = this.context.currentEpoch();
    let vaultKey: Uint8Array;
    try {
      vaultKey = await this.context.unwrapVaultKey(secret, record);
    } catch {
      // Wrong password and corrupted record must look the same to the caller
      this.context.logger.warn("[vault] unlock rejected");
      this.context.resetSession();
      throw new UnlockFailedError();
    }
    this.context.adoptVaultKey(vaultKey, epoch);
    return vaultKey;
  }

  protected transitionTo(state: State): void {
    this.context.transitionTo(state);
  }
}

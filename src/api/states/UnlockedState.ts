import { State } from "./BaseState";
import { LockedState } from "./LockedState";
import { LockedError } from "../../errors";
import type { AccountKeyRecord } from "../../types";

export class UnlockedState extends State {
  isUnlocked(): boolean {
    return true;
  }

  /** Wraps the session's vault key under a key derived from `newSecret`. Stored secrets are untouched. */
  async rewrap(newSecret: string): Promise<AccountKeyRecord> {
    this.context.assertSecret(newSecret);
    const vaultKey = this.getVaultKey();
    try {
      return await this.context.wrapVaultKey(newSecret, vaultKey);
    } finally {
      vaultKey.fill(0);
    }
  }

  lock(): void {
    this.context.session.clear();
    this.transitionTo(new LockedState(this.context));
    this.context.logger.debug("[vault] locked");
  }

  getVaultKey(): Uint8Array {
    const key = this.context.session.get();
    if (!key) throw new LockedError();
    return key;
  }
}

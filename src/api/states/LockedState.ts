import { State } from "./BaseState";
import { LockedError } from "../../errors";
import type { AccountKeyRecord } from "../../types";

export class LockedState extends State {
  isUnlocked(): boolean {
    return false;
  }

  async rewrap(_newSecret: string): Promise<AccountKeyRecord> {
    throw new LockedError();
  }

  lock(): void {
    this.context.session.clear();
  }

  getVaultKey(): Uint8Array {
    throw new LockedError();
  }
}

import { zeroize } from "../utils/bytes";

/**
 * Holds the unwrapped vault key for the unlocked session, in RAM only.
 * Readers get copies, so clearing never disturbs a decode already in flight.
 */
export class SessionKeyCache {
  private key: Uint8Array | null = null;

  set(key: Uint8Array) {
    this.clear();
    this.key = key.slice();
  }

  has(): boolean {
    return this.key !== null;
  }

  get(): Uint8Array | null {
    return this.key ? this.key.slice() : null;
  }

  clear() {
    zeroize(this.key);
    this.key = null;
  }
}

export type KdfParams =
  | { alg: "pbkdf2-sha256"; iterations: number }
  | { alg: "argon2id"; timeCost: number; memoryCost: number; parallelism: number };

/** Wrapped vault key material persisted per account. Binary fields are base64. */
export interface AccountKeyRecord {
  salt: string;
  vaultKeyIV: string;
  encryptedVaultKey: string;
  kdf?: KdfParams;
  iterations?: number;  // records written before `kdf` existed
  createdAt?: string;
  updatedAt?: string;
}

/** The `users/{id}/vault` document: key record plus master-password verifier, written together. */
export interface VaultDocument extends AccountKeyRecord {
  verifier?: string;
}

export interface SecretRecord {
  id: string;
  encryptedPassword: string;  // base64 CiphertextBlob
  createdAt: string;
  updatedAt: string;
  metadata?: Record<string, unknown>;
}

export type BlobFormat = "current" | "legacy" | "unknown";

export type DecodeResult =
  | { ok: true; plaintext: string }
  | { ok: false; error: Error };

export interface MigrationFailure {
  id: string;
  kind: string;
}

export interface MigrationResult {
  migratedCount: number;
  skippedCount: number;
  unchangedCount: number;
  failures: MigrationFailure[];
}

/** Anything holding an unlocked vault key for the current session. */
export interface VaultSession {
  isUnlocked(): boolean;
  getVaultKey(): Uint8Array;
}

export interface Lockable {
  lock(): void;
}

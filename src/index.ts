import { PasswordVault, type PasswordVaultOptions } from "./api/PasswordVault";

export type { PasswordVaultOptions } from "./api/PasswordVault";
export { PasswordVault } from "./api/PasswordVault";
export { VaultKeyManager, type VaultKeyManagerOptions } from "./api/VaultKeyManager";
export { MigrationEngine, type MigrationEngineOptions } from "./api/vault/MigrationEngine";
export { AutoLock, type AutoLockOptions } from "./api/vault/AutoLock";
export {
  Argon2idKeyDerivation,
  keyDerivationFor,
  Pbkdf2KeyDerivation,
  type KeyDerivation
} from "./crypto/KeyDerivation";
export { AesCbcCipher, type SymmetricCipher } from "./crypto/SymmetricCipher";
export { CryptoRandomSource, type RandomSource } from "./crypto/RandomSource";
export { LegacyKeyCache, SecretCodec, type SecretCodecOptions } from "./crypto/SecretCodec";
export { computeVerifier, verifyMasterPassword } from "./crypto/MasterPasswordVerifier";
export { generatePassword, characterPool, type GeneratorOptions } from "./password/PasswordGenerator";
export { scorePassword, describeStrength, type StrengthScore } from "./password/strength";
export { MemoryDocumentStore, type DocumentStore } from "./storage/DocumentStore";
export { AccountStorage, type SecretRecordStore, type StoredAccount } from "./storage/AccountStorage";
export { silentLogger, type Logger } from "./logger";
export { VAULT_CONSTANTS } from "./constants";
export * from "./errors";
export type * from "./types";

/**
 * Creates a {@link PasswordVault} for one account.
 *
 * @example
 * ```typescript
 * import createPasswordVault, { MemoryDocumentStore } from "envelope-vault";
 *
 * const vault = createPasswordVault({ accountId: "u1", store: new MemoryDocumentStore() });
 *
 * async function main() {
 *   await vault.setup("correct horse battery staple");
 *   await vault.saveSecret("github", "s3cr3t!");
 *   vault.lock();
 *
 *   await vault.unlock("correct horse battery staple");
 *   console.log(await vault.revealSecret("github")); // "s3cr3t!"
 * }
 *
 * main();
 * ```
 */
export default function createPasswordVault(opts: PasswordVaultOptions): PasswordVault {
  return new PasswordVault(opts);
}

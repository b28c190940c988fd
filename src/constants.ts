export const VAULT_CONSTANTS = {
  // Tag byte prepended to every blob written in the vault-key format.
  FORMAT_TAG: 0x02 as const,

  KEY_LEN: 32 as const,
  SALT_LEN: 32 as const,
  MIN_SALT_LEN: 16 as const,

  // AES-256-CBC, PKCS#7 padding
  AES: {
    NAME: "AES-CBC" as const,
    LENGTH: 256 as const,
    IV_LENGTH: 16 as const,
    BLOCK_SIZE: 16 as const
  },

  PBKDF2: {
    ALG: "pbkdf2-sha256" as const,
    HASH: "SHA-256" as const,
    ITERATIONS: 100_000,
    MIN_ITERATIONS: 1_000,
    MAX_ITERATIONS: 10_000_000
  },

  // argon2 takes memoryCost in KiB
  ARGON2: {
    ALG: "argon2id" as const,
    TIME_COST: 3,
    MEMORY_KIB: 64 * 1024,
    PARALLELISM: 1,
    MAX_TIME_COST: 64
  },

  OUTPUT_LEN: { MIN: 16, MAX: 64 },

  VERIFIER_SALT: "envelope-vault:verifier:v1",

  BATCH_CONCURRENCY: 5,
  AUTO_LOCK_MS: 300_000,

  GENERATOR: {
    DEFAULT_LENGTH: 16,
    MAX_LENGTH: 1024,
    UPPER: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
    LOWER: "abcdefghijklmnopqrstuvwxyz",
    DIGITS: "0123456789",
    SYMBOLS: "!@#$%^&*()_+-=[]{}|;:,.<>?",
    SIMILAR: "il1Lo0O"
  }
};

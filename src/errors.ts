export type VaultErrorKind =
  | "DecryptionFailed"
  | "InvalidFormat"
  | "UnlockFailed"
  | "KeyDerivationError"
  | "EncryptionFailed"
  | "Validation"
  | "Locked"
  | "AccountExists"
  | "AccountNotFound"
  | "SecretNotFound"
  | "Persistence";

export class VaultError extends Error {
  constructor(
    public readonly kind: VaultErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "VaultError";
  }
}

/** Bad key, corrupted ciphertext or bad padding. The three are indistinguishable. */
export class DecryptionFailedError extends VaultError {
  constructor(message = "Invalid key or data.") {
    super("DecryptionFailed", message);
    this.name = "DecryptionFailedError";
  }
}

export class InvalidFormatError extends VaultError {
  constructor(message: string) {
    super("InvalidFormat", message);
    this.name = "InvalidFormatError";
  }
}

/** Surfaced to users as "incorrect password", whatever the underlying cause. */
export class UnlockFailedError extends VaultError {
  constructor() {
    super("UnlockFailed", "Incorrect master password");
    this.name = "UnlockFailedError";
  }
}

export class KeyDerivationError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("KeyDerivationError", message, options);
    this.name = "KeyDerivationError";
  }
}

export class EncryptionFailedError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EncryptionFailed", message, options);
    this.name = "EncryptionFailedError";
  }
}

export class ValidationError extends VaultError {
  constructor(message: string) {
    super("Validation", message);
    this.name = "ValidationError";
  }
}

export class LockedError extends VaultError {
  constructor(message = "Vault locked") {
    super("Locked", message);
    this.name = "LockedError";
  }
}

export class AccountExistsError extends VaultError {
  constructor(accountId: string) {
    super("AccountExists", `Vault already initialized for account ${accountId}`);
    this.name = "AccountExistsError";
  }
}

export class AccountNotFoundError extends VaultError {
  constructor(accountId: string) {
    super("AccountNotFound", `No vault found for account ${accountId}`);
    this.name = "AccountNotFoundError";
  }
}

export class SecretNotFoundError extends VaultError {
  constructor(id: string) {
    super("SecretNotFound", `No secret stored under id ${id}`);
    this.name = "SecretNotFoundError";
  }
}

export class PersistenceError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("Persistence", message, options);
    this.name = "PersistenceError";
  }
}

export function errorKindOf(e: unknown): VaultErrorKind | "Unknown" {
  return e instanceof VaultError ? e.kind : "Unknown";
}

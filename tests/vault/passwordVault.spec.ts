import "../setup";
import { PasswordVault, type PasswordVaultOptions } from "../../src/api/PasswordVault";
import { Pbkdf2KeyDerivation } from "../../src/crypto/KeyDerivation";
import {
  AccountExistsError,
  AccountNotFoundError,
  InvalidFormatError,
  LockedError,
  PersistenceError,
  SecretNotFoundError,
  UnlockFailedError,
  ValidationError
} from "../../src/errors";
import { AccountStorage } from "../../src/storage/AccountStorage";
import { MemoryDocumentStore } from "../../src/storage/DocumentStore";
import type { SecretRecord } from "../../src/types";
import { fastKdf, loggedText, mockLogger } from "../setup";

const MASTER = "correct horse";

/** In-memory store whose writes to matching keys fail while `failing` is set. */
class FlakyStore extends MemoryDocumentStore {
  failing = false;

  constructor(private readonly failsOn: (key: string) => boolean) {
    super();
  }

  async put(key: string, value: unknown): Promise<void> {
    if (this.failing && this.failsOn(key)) throw new Error("write refused");
    return super.put(key, value);
  }
}

function clock(start = "2026-01-01T00:00:00.000Z") {
  let t = Date.parse(start);
  return () => new Date((t += 1_000));
}

function newVault(overrides: Partial<PasswordVaultOptions> = {}, store = new MemoryDocumentStore()) {
  const logger = mockLogger();
  const vault = new PasswordVault({
    accountId: "alice",
    store,
    kdf: fastKdf(),
    legacyKdf: fastKdf(),
    logger,
    autoLockMs: null,
    now: clock(),
    ...overrides
  });
  return { vault, store, logger };
}

describe("PasswordVault", () => {
  it("rejects an empty account id", () => {
    expect(() => newVault({ accountId: " " })).toThrow(ValidationError);
  });

  it("rejects a batch concurrency below one", () => {
    expect(() => newVault({ batchConcurrency: 0 })).toThrow(ValidationError);
    expect(() => newVault({ batchConcurrency: 1.5 })).toThrow(ValidationError);
  });

  describe("setup", () => {
    it("stores the wrapped key and verifier and leaves the vault unlocked", async () => {
      const { vault, store, logger } = newVault();
      expect(await vault.hasAccount()).toBe(false);

      await vault.setup(MASTER);
      expect(await vault.hasAccount()).toBe(true);
      expect(vault.isUnlocked()).toBe(true);
      expect(store.keys()).toEqual(["users/alice/vault"]);
      expect(await store.get("users/alice/vault")).toMatchObject({
        verifier: "eb642201dde59a44990c735b9cf57769777141321b6e1abd7292bd1fc4ca3df6"
      });
      expect(logger.info).toHaveBeenCalledWith("[vault] initialized account alice");
    });

    it("locks again when the account cannot be written", async () => {
      const store = new FlakyStore((key) => key === "users/alice/vault");
      store.failing = true;
      const { vault } = newVault({}, store);

      await expect(vault.setup(MASTER)).rejects.toBeInstanceOf(PersistenceError);
      expect(vault.isUnlocked()).toBe(false);
      await expect(vault.encryptSecret("orphan")).rejects.toBeInstanceOf(LockedError);
      expect(await vault.hasAccount()).toBe(false);
    });

    it("refuses to run twice", async () => {
      const { vault } = newVault();
      await vault.setup(MASTER);
      await expect(vault.setup("another")).rejects.toBeInstanceOf(AccountExistsError);
    });
  });

  describe("unlock", () => {
    it("fails for an account that was never set up", async () => {
      const { vault } = newVault();
      await expect(vault.unlock(MASTER)).rejects.toBeInstanceOf(AccountNotFoundError);
    });

    it("reopens stored secrets after a lock", async () => {
      const { vault } = newVault();
      await vault.setup(MASTER);
      await vault.saveSecret("github", "s3cr3t!");
      vault.lock();
      expect(vault.isUnlocked()).toBe(false);

      await vault.unlock(MASTER);
      expect(await vault.revealSecret("github")).toBe("s3cr3t!");
    });

    it("rejects a wrong password at the verifier, before any key derivation", async () => {
      const { vault } = newVault();
      await vault.setup(MASTER);
      vault.lock();
      const derive = jest.spyOn(Pbkdf2KeyDerivation.prototype, "derive");
      try {
        await expect(vault.unlock("battery staple")).rejects.toBeInstanceOf(UnlockFailedError);
        expect(derive).not.toHaveBeenCalled();
      } finally {
        derive.mockRestore();
      }
      expect(vault.isUnlocked()).toBe(false);
    });

    it("still rejects a wrong password when no verifier is stored", async () => {
      const { vault, store } = newVault();
      await vault.setup(MASTER);
      vault.lock();
      const account = await new AccountStorage(store, "alice").loadAccount();
      // key record only, as accounts without a verifier store it
      await store.put("users/alice/vault", account?.record);

      await expect(vault.unlock("battery staple")).rejects.toBeInstanceOf(UnlockFailedError);
      await vault.unlock(MASTER);
      expect(vault.isUnlocked()).toBe(true);
    });

    it("reports a malformed key record", async () => {
      const { vault, store } = newVault();
      await store.put("users/alice/vault", { salt: 42 });
      await expect(vault.unlock(MASTER)).rejects.toBeInstanceOf(InvalidFormatError);
    });
  });

  describe("secrets", () => {
    it("needs an unlocked vault", async () => {
      const { vault } = newVault();
      await vault.setup(MASTER);
      vault.lock();
      await expect(vault.encryptSecret("x")).rejects.toBeInstanceOf(LockedError);
      await expect(vault.saveSecret("github", "x")).rejects.toBeInstanceOf(LockedError);
    });

    it("keeps createdAt and metadata when a secret is overwritten", async () => {
      const { vault } = newVault();
      await vault.setup(MASTER);

      const first = await vault.saveSecret("github", "one", { username: "alice" });
      const second = await vault.saveSecret("github", "two");
      expect(second.createdAt).toBe(first.createdAt);
      expect(second.updatedAt).not.toBe(first.updatedAt);
      expect(second.metadata).toEqual({ username: "alice" });
      expect(await vault.revealSecret("github")).toBe("two");
    });

    it("throws SecretNotFound for an unknown id", async () => {
      const { vault } = newVault();
      await vault.setup(MASTER);
      await expect(vault.revealSecret("nope")).rejects.toBeInstanceOf(SecretNotFoundError);
    });

    it("decrypts a batch and reports failures per blob", async () => {
      const { vault } = newVault({ batchConcurrency: 2 });
      await vault.setup(MASTER);
      const a = await vault.encryptSecret("alpha");
      const b = await vault.encryptSecret("beta");

      const results = await vault.decryptSecrets([a, "%%%", b]);
      expect(results[0]).toEqual({ ok: true, plaintext: "alpha" });
      expect(results[1].ok).toBe(false);
      expect(results[2]).toEqual({ ok: true, plaintext: "beta" });
    });
  });

  describe("changeMasterPassword", () => {
    it("re-wraps the key so existing secrets stay readable", async () => {
      const { vault, store } = newVault();
      await vault.setup(MASTER);
      await vault.saveSecret("github", "s3cr3t!");
      const before = (await new AccountStorage(store, "alice").loadAccount())?.record;

      await vault.changeMasterPassword(MASTER, "battery staple");
      const after = (await new AccountStorage(store, "alice").loadAccount())?.record;
      expect(after?.salt).not.toBe(before?.salt);
      expect(after?.createdAt).toBe(before?.createdAt);
      expect(after?.updatedAt).not.toBe(before?.updatedAt);

      vault.lock();
      await expect(vault.unlock(MASTER)).rejects.toBeInstanceOf(UnlockFailedError);
      await vault.unlock("battery staple");
      expect(await vault.revealSecret("github")).toBe("s3cr3t!");
    });

    it("leaves everything as it was when the old password is wrong", async () => {
      const { vault, store } = newVault();
      await vault.setup(MASTER);
      const before = await store.get("users/alice/vault");

      await expect(vault.changeMasterPassword("wrong", "battery staple")).rejects.toBeInstanceOf(UnlockFailedError);
      expect(await store.get("users/alice/vault")).toEqual(before);
    });

    it("keeps the old password working when the new record cannot be written", async () => {
      const store = new FlakyStore((key) => key === "users/alice/vault");
      const { vault } = newVault({}, store);
      await vault.setup(MASTER);
      await vault.saveSecret("github", "s3cr3t!");

      store.failing = true;
      await expect(vault.changeMasterPassword(MASTER, "battery staple")).rejects.toBeInstanceOf(PersistenceError);
      store.failing = false;

      const { vault: reopened } = newVault({}, store);
      await expect(reopened.unlock("battery staple")).rejects.toBeInstanceOf(UnlockFailedError);
      await reopened.unlock(MASTER);
      expect(await reopened.revealSecret("github")).toBe("s3cr3t!");
    });

    it("never writes a standalone verifier document", async () => {
      const store = new FlakyStore((key) => key.endsWith("verifier"));
      store.failing = true;
      const { vault } = newVault({}, store);
      await vault.setup(MASTER);
      await vault.saveSecret("github", "s3cr3t!");

      await vault.changeMasterPassword(MASTER, "battery staple");

      const { vault: reopened } = newVault({}, store);
      await expect(reopened.unlock(MASTER)).rejects.toBeInstanceOf(UnlockFailedError);
      await reopened.unlock("battery staple");
      expect(await reopened.revealSecret("github")).toBe("s3cr3t!");
    });

    it("rejects an empty new password", async () => {
      const { vault } = newVault();
      await vault.setup(MASTER);
      await expect(vault.changeMasterPassword(MASTER, "")).rejects.toBeInstanceOf(ValidationError);
    });
  });

  it("migrates legacy records and never logs secrets", async () => {
    const { vault, logger } = newVault();
    await vault.setup(MASTER);
    const records: SecretRecord[] = [
      {
        id: "old",
        encryptedPassword: await vault.codec.encodeLegacy("legacy-password-1234", MASTER),
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z"
      }
    ];

    const result = await vault.migrateLegacySecrets(MASTER, records);
    expect(result.migratedCount).toBe(1);
    expect(await vault.revealSecret("old")).toBe("legacy-password-1234");

    const text = loggedText(logger);
    expect(text).not.toContain(MASTER);
    expect(text).not.toContain("legacy-password-1234");
  });

  describe("legacy records", () => {
    async function legacyVault() {
      const { vault, store } = newVault();
      await vault.setup(MASTER);
      const record: SecretRecord = {
        id: "old",
        encryptedPassword: await vault.codec.encodeLegacy("legacy-password-1234", MASTER),
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z"
      };
      await store.put("users/alice/passwords/old", record);
      return { vault, store, record };
    }

    it("points at the migration when read before it", async () => {
      const { vault } = await legacyVault();
      await expect(vault.revealSecret("old")).rejects.toBeInstanceOf(InvalidFormatError);
      await expect(vault.revealSecret("old")).rejects.toThrow(
        "Secret is in the legacy format; run migrateLegacySecrets first"
      );
    });

    it("refuses to migrate with a wrong master password", async () => {
      const { vault, store, record } = await legacyVault();

      await expect(vault.migrateLegacySecrets("battery staple", [record])).rejects.toBeInstanceOf(UnlockFailedError);
      expect(await store.get("users/alice/passwords/old")).toEqual(record);
      expect(vault.isUnlocked()).toBe(true);
    });

    it("checks the master password by unwrapping when no verifier is stored", async () => {
      const { vault, store, record } = await legacyVault();
      const account = await new AccountStorage(store, "alice").loadAccount();
      await store.put("users/alice/vault", account?.record);

      await expect(vault.migrateLegacySecrets("battery staple", [record])).rejects.toBeInstanceOf(UnlockFailedError);
      const result = await vault.migrateLegacySecrets(MASTER, [record]);
      expect(result.migratedCount).toBe(1);
    });

    it("needs an unlocked vault", async () => {
      const { vault, record } = await legacyVault();
      vault.lock();
      await expect(vault.migrateLegacySecrets(MASTER, [record])).rejects.toBeInstanceOf(LockedError);
    });
  });

  describe("auto-lock", () => {
    beforeEach(() => jest.useFakeTimers({ doNotFake: ["nextTick", "queueMicrotask", "setImmediate"] }));
    afterEach(() => jest.useRealTimers());

    it("locks after the idle period", async () => {
      const onAutoLock = jest.fn();
      const { vault } = newVault({ autoLockMs: 1_000, onAutoLock });
      await vault.setup(MASTER);

      jest.advanceTimersByTime(1_000);
      expect(vault.isUnlocked()).toBe(false);
      expect(onAutoLock).toHaveBeenCalledTimes(1);
    });

    it("activity postpones the lock", async () => {
      const { vault } = newVault({ autoLockMs: 1_000 });
      await vault.setup(MASTER);

      jest.advanceTimersByTime(800);
      await vault.encryptSecret("keep me open");
      jest.advanceTimersByTime(800);
      expect(vault.isUnlocked()).toBe(true);

      jest.advanceTimersByTime(200);
      expect(vault.isUnlocked()).toBe(false);
    });

    it("an explicit lock disarms the timer", async () => {
      const onAutoLock = jest.fn();
      const { vault } = newVault({ autoLockMs: 1_000, onAutoLock });
      await vault.setup(MASTER);

      vault.lock();
      jest.advanceTimersByTime(5_000);
      expect(onAutoLock).not.toHaveBeenCalled();
    });
  });
});

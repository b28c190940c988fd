import type { z } from "zod";
import { InvalidFormatError, PersistenceError } from "../errors";
import type { AccountKeyRecord, SecretRecord, VaultDocument } from "../types";
import type { DocumentStore } from "./DocumentStore";
import { SecretRecordSchema, VaultDocumentSchema, VerifierDocSchema } from "./schemas";

/** Where migrated or newly written secret records go. */
export interface SecretRecordStore {
  save(record: SecretRecord): Promise<void>;
}

export interface StoredAccount {
  record: AccountKeyRecord;
  verifier: string | null;
}

/**
 * Account-scoped documents laid out under `users/{accountId}/`: `vault` holds the
 * wrapped vault key with its master-password verifier, `passwords/{id}` the secrets.
 */
export class AccountStorage implements SecretRecordStore {
  constructor(
    private readonly store: DocumentStore,
    readonly accountId: string
  ) {}

  private get root(): string {
    return `users/${this.accountId}`;
  }

  /**
   * The account's key record and verifier, or `null` before setup. Accounts that
   * predate the embedded verifier fall back to the standalone verifier document.
   */
  async loadAccount(): Promise<StoredAccount | null> {
    const doc = await this.read(`${this.root}/vault`, VaultDocumentSchema);
    if (!doc) return null;
    const { verifier, ...record } = doc;
    return { record, verifier: verifier ?? (await this.loadStandaloneVerifier()) };
  }

  /** Writes the key record and its verifier in a single `put`. */
  async saveAccount(record: AccountKeyRecord, verifier: string): Promise<void> {
    const doc: VaultDocument = { ...record, verifier };
    await this.write(`${this.root}/vault`, doc);
  }

  async loadSecret(id: string): Promise<SecretRecord | null> {
    return this.read(`${this.root}/passwords/${id}`, SecretRecordSchema);
  }

  async save(record: SecretRecord): Promise<void> {
    await this.write(`${this.root}/passwords/${record.id}`, record);
  }

  private async loadStandaloneVerifier(): Promise<string | null> {
    const doc = await this.read(`${this.root}/verifier`, VerifierDocSchema);
    return doc?.hash ?? null;
  }

  private async read<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    let raw: unknown;
    try {
      raw = await this.store.get(key);
    } catch (e) {
      throw new PersistenceError(`Failed to read ${key}`, { cause: e });
    }
    if (raw === null || raw === undefined) return null;
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidFormatError(`Malformed document at ${key}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`);
    }
    return parsed.data;
  }

  private async write(key: string, value: unknown): Promise<void> {
    try {
      await this.store.put(key, value);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new PersistenceError(`Failed to persist ${key}: ${msg}`, { cause: e });
    }
  }
}

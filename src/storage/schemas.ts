import { z } from "zod";
import type { KdfParams, SecretRecord, VaultDocument } from "../types";

const base64String = z.string().min(1).regex(/^[A-Za-z0-9+/_\-\s]+={0,2}$/, "must be base64");

export const KdfParamsSchema: z.ZodType<KdfParams> = z.discriminatedUnion("alg", [
  z.object({ alg: z.literal("pbkdf2-sha256"), iterations: z.number().int().positive() }),
  z.object({
    alg: z.literal("argon2id"),
    timeCost: z.number().int().positive(),
    memoryCost: z.number().int().positive(),
    parallelism: z.number().int().positive()
  })
]);

const accountKeyRecordObject = z.object({
  salt: base64String,
  vaultKeyIV: base64String,
  encryptedVaultKey: base64String,
  kdf: KdfParamsSchema.optional(),
  iterations: z.number().int().positive().optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional()
});

export const VaultDocumentSchema: z.ZodType<VaultDocument> = accountKeyRecordObject.extend({
  verifier: z.string().min(1).optional()
});

export const SecretRecordSchema: z.ZodType<SecretRecord> = z.object({
  id: z.string().min(1),
  encryptedPassword: base64String,
  createdAt: z.string(),
  updatedAt: z.string(),
  metadata: z.record(z.unknown()).optional()
});

// standalone verifier document of accounts created before it moved into the vault document
export const VerifierDocSchema = z.object({ hash: z.string().min(1) });

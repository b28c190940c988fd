import { ValidationError } from "../errors";

const MAX_BASE64_LEN = 1024 * 1024;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function bytesToBase64(bytes: Uint8Array): string {
  if (bytes.byteLength === 0) return "";
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

export function base64ToBytes(b64: string): Uint8Array {
  if (typeof b64 !== "string" || b64.trim().length === 0) {
    throw new ValidationError("Base64 input must be a non-empty string");
  }

  // normalize: remove whitespace, convert URL-safe to standard, add padding
  const cleaned = b64.replace(/\s+/g, "").replace(/-/g, "+").replace(/_/g, "/");
  if (cleaned.length > MAX_BASE64_LEN) {
    throw new ValidationError("Base64 input too large");
  }
  const pad = cleaned.length % 4;
  if (pad === 1) throw new ValidationError("Invalid base64 input");
  const normalized = pad === 0 ? cleaned : cleaned + "=".repeat(4 - pad);

  // Buffer.from silently drops bad characters
  if (!BASE64_RE.test(normalized)) {
    throw new ValidationError("Invalid base64 input");
  }
  // copy out of Buffer's shared pool so callers may zero-fill the result
  return new Uint8Array(Buffer.from(normalized, "base64"));
}

import { timingSafeEqual } from "node:crypto";

const utf8 = new TextEncoder();
const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

export function utf8Encode(s: string): Uint8Array {
  return utf8.encode(s);
}

/** Throws TypeError on malformed input. */
export function utf8DecodeStrict(bytes: Uint8Array): string {
  return strictUtf8.decode(bytes);
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.byteLength, 0));
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.byteLength;
  }
  return out;
}

export function zeroize(bytes: Uint8Array | null | undefined): void {
  bytes?.fill(0);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.byteLength === b.byteLength && timingSafeEqual(a, b);
}

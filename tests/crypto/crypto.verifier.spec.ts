import "../setup";
import { computeVerifier, verifyMasterPassword } from "../../src/crypto/MasterPasswordVerifier";

describe("master password verifier", () => {
  it("hashes secret and fixed salt with SHA-256", async () => {
    expect(await computeVerifier("correct horse")).toBe(
      "eb642201dde59a44990c735b9cf57769777141321b6e1abd7292bd1fc4ca3df6"
    );
  });

  it("accepts the right secret only", async () => {
    const stored = await computeVerifier("correct horse");
    expect(await verifyMasterPassword("correct horse", stored)).toBe(true);
    expect(await verifyMasterPassword("correct horsE", stored)).toBe(false);
  });

  it("reads the older salt.digest form", async () => {
    const stored = "AAECAwQFBgcICQoLDA0ODw==.35a7e539bf2d72e27381958ec770ccbc3aca00ca3abf1ebbc2860ac0c6486754";
    expect(await verifyMasterPassword("correct horse", stored)).toBe(true);
    expect(await verifyMasterPassword("wrong", stored)).toBe(false);
  });

  it("treats malformed stored values as a mismatch", async () => {
    expect(await verifyMasterPassword("x", "")).toBe(false);
    expect(await verifyMasterPassword("x", "not-hex")).toBe(false);
    expect(await verifyMasterPassword("x", "a.b.c")).toBe(false);
    expect(await verifyMasterPassword("x", "!!!.abcd")).toBe(false);
  });
});

import { describe, expect, it } from "vitest";
import {
  constantTimeEqual,
  decryptSecret,
  encryptSecret,
  generateNumericCode,
  hashOtpCode,
  hashOtpCodeCandidates,
  matchesAnyHash,
} from "../../libs/crypto.js";
import { maskEmail, maskPhone, normalizeEmail, normalizePhone } from "../../libs/pii.js";

describe("secret encryption", () => {
  it("round-trips under the same key with a fresh iv each time", () => {
    const first = encryptSecret("JBSWY3DPEHPK3PXP", "test-totp-key");
    const second = encryptSecret("JBSWY3DPEHPK3PXP", "test-totp-key");

    expect(first).not.toBe(second);
    expect(first.split(".")).toHaveLength(3);
    expect(decryptSecret(first, "test-totp-key")).toBe("JBSWY3DPEHPK3PXP");
  });

  it("fails under another key or a malformed value", () => {
    const sealed = encryptSecret("JBSWY3DPEHPK3PXP", "test-totp-key");

    expect(() => decryptSecret(sealed, "other-key")).toThrow();
    expect(() => decryptSecret("not-sealed", "test-totp-key")).toThrow("encrypted_secret_malformed");
  });
});

describe("otp hashing", () => {
  it("binds the hash to salt and pepper", () => {
    const hash = hashOtpCode("123456", "salt-a", "test-pepper");

    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(hashOtpCode("123456", "salt-b", "test-pepper")).not.toBe(hash);
    expect(hashOtpCode("123456", "salt-a", "other-pepper")).not.toBe(hash);
  });

  it("matches a hash made with any configured pepper", () => {
    const stored = hashOtpCode("123456", "salt-a", "old-pepper");
    const candidates = hashOtpCodeCandidates("123456", "salt-a", ["new-pepper", "old-pepper"]);

    expect(candidates).toHaveLength(2);
    expect(matchesAnyHash(stored, candidates)).toBe(true);
    expect(matchesAnyHash(stored, hashOtpCodeCandidates("654321", "salt-a", ["new-pepper", "old-pepper"]))).toBe(
      false,
    );
  });

  it("generates codes of the requested length", () => {
    expect(generateNumericCode(8)).toMatch(/^\d{8}$/);
  });

  it("compares strings of different length as unequal", () => {
    expect(constantTimeEqual("abc", "abc")).toBe(true);
    expect(constantTimeEqual("abc", "abd")).toBe(false);
    expect(constantTimeEqual("abc", "abcd")).toBe(false);
  });
});

describe("pii helpers", () => {
  it("normalizes targets", () => {
    expect(normalizeEmail("  Alice@Example.TEST ")).toBe("alice@example.test");
    expect(normalizePhone("+49 (151) 234-567")).toBe("+49151234567");
  });

  it("masks targets for display", () => {
    expect(maskEmail("alice@example.test")).toBe("al**@example.test");
    expect(maskEmail("al@example.test")).toBe("a**@example.test");
    expect(maskEmail("broken")).toBe("***");
    expect(maskPhone("+49151234567")).toBe("***-***-4567");
    expect(maskPhone("12")).toBe("***-***-****");
  });
});

import { describe, expect, it } from "vitest";
import { SignJWT } from "jose";
import { env } from "../../libs/env.js";
import {
  signFactorAssertion,
  signRecoveryToken,
  verifyAccessToken,
  verifyFactorAssertion,
  verifyRecoveryToken,
} from "../../libs/jwt.js";
import { TEST_EPOCH } from "../support/fakes.js";

const encoder = new TextEncoder();

function accessToken(notBefore: string, expiresIn: string) {
  const secret = encoder.encode(env.JWT_SECRET_ACTIVE ?? "test-secret");

  return new SignJWT({ typ: "access" })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject("00000000-0000-4000-8000-000000000002")
    .setJti("00000000-0000-4000-8000-000000000003")
    .setIssuedAt()
    .setNotBefore(notBefore)
    .setExpirationTime(expiresIn)
    .setIssuer(env.JWT_ISSUER)
    .setAudience(env.JWT_AUDIENCE)
    .sign(secret);
}

function at(offsetSec: number): Date {
  return new Date(TEST_EPOCH.getTime() + offsetSec * 1000);
}

describe("JWT clock skew", () => {
  it("accepts token slightly in the future within tolerance", async () => {
    const token = await accessToken("45s", "15m");

    await expect(verifyAccessToken(token)).resolves.toMatchObject({
      typ: "access",
      sub: "00000000-0000-4000-8000-000000000002",
    });
  });

  it("rejects token far in the future beyond tolerance", async () => {
    const token = await accessToken("5m", "20m");

    await expect(verifyAccessToken(token)).rejects.toBeDefined();
  });
});

describe("factor assertions", () => {
  it("verifies against the clock the assertion was issued with", async () => {
    const signed = await signFactorAssertion({
      userId: "user-1",
      factor: "totp",
      methodId: "method-1",
      now: TEST_EPOCH,
      ttlSec: 120,
    });
    expect(signed.expiresAt).toEqual(at(120));

    await expect(verifyFactorAssertion(signed.token, at(170))).resolves.toMatchObject({
      sub: "user-1",
      amr: ["totp"],
      mid: "method-1",
    });
    await expect(verifyFactorAssertion(signed.token, at(181))).rejects.toBeDefined();
  });

  it("does not accept one credential type in place of another", async () => {
    const recovery = await signRecoveryToken({ userId: "user-1", recoveryId: "rec-1", now: TEST_EPOCH, ttlSec: 900 });
    const assertion = await signFactorAssertion({ userId: "user-1", factor: "push", now: TEST_EPOCH, ttlSec: 120 });

    await expect(verifyFactorAssertion(recovery.token, TEST_EPOCH)).rejects.toThrow("invalid_token_type");
    await expect(verifyRecoveryToken(assertion.token, TEST_EPOCH)).rejects.toThrow("invalid_token_type");
    await expect(verifyAccessToken(assertion.token)).rejects.toBeDefined();
  });
});

import { authenticator } from "otplib";
import { beforeEach, describe, expect, it } from "vitest";
import { verifyFactorAssertion } from "../../libs/jwt.js";
import { getMethod } from "../../modules/methods/service.js";
import { enrollTotp, verifyTotp, type TotpEnrollment } from "../../modules/totp/service.js";
import { makeDeps, type TestDeps } from "../support/deps.js";

const USER = "user-1";

let deps: TestDeps;

beforeEach(() => {
  deps = makeDeps();
});

function codeAt(secret: string, offsetSec = 0): string {
  return authenticator.clone({ epoch: deps.clock.now().getTime() + offsetSec * 1000 }).generate(secret);
}

async function enroll(): Promise<TotpEnrollment> {
  const result = await enrollTotp(deps, USER, "alice@example.test");
  if (!result.ok) throw new Error(result.reason);
  return result.value;
}

describe("TOTP", () => {
  it("enrolls with an encrypted secret and a provisioning uri", async () => {
    const enrollment = await enroll();

    expect(enrollment.otpauthUri.startsWith("otpauth://totp/")).toBe(true);
    expect(enrollment.otpauthUri).toContain(`secret=${enrollment.secret}`);

    const method = await getMethod(deps, enrollment.methodId);
    expect(method?.type).toBe("TOTP");
    expect(method?.verified).toBe(false);
    expect(method?.type === "TOTP" && method.encryptedSecret).not.toContain(enrollment.secret);
  });

  it("completes enrollment with the first valid code and returns an assertion", async () => {
    const enrollment = await enroll();

    const result = await verifyTotp(deps, USER, codeAt(enrollment.secret));
    if (!result.ok) throw new Error(result.reason);

    expect(result.value.enrolled).toBe(true);
    expect(result.value.methodId).toBe(enrollment.methodId);
    expect((await getMethod(deps, enrollment.methodId))?.verified).toBe(true);

    const claims = await verifyFactorAssertion(result.value.assertion, deps.clock.now());
    expect(claims.amr).toEqual(["totp"]);
  });

  it("accepts each time step only once", async () => {
    const enrollment = await enroll();
    const code = codeAt(enrollment.secret);

    expect((await verifyTotp(deps, USER, code)).ok).toBe(true);
    expect(await verifyTotp(deps, USER, code)).toEqual({
      ok: false,
      kind: "ALREADY_USED",
      reason: "totp_code_already_used",
    });

    // Aelterer Schritt innerhalb des Fensters ist ebenfalls verbraucht
    expect(await verifyTotp(deps, USER, codeAt(enrollment.secret, -30))).toEqual({
      ok: false,
      kind: "ALREADY_USED",
      reason: "totp_code_already_used",
    });

    deps.clock.advance(30);
    const next = await verifyTotp(deps, USER, codeAt(enrollment.secret));
    expect(next.ok && next.value.enrolled).toBe(false);
  });

  it("tolerates whitespace inside the code", async () => {
    const enrollment = await enroll();
    const code = codeAt(enrollment.secret);

    const result = await verifyTotp(deps, USER, `${code.slice(0, 3)} ${code.slice(3)}`);

    expect(result.ok).toBe(true);
  });

  it("rejects codes outside the drift window", async () => {
    const enrollment = await enroll();

    const result = await verifyTotp(deps, USER, codeAt(enrollment.secret, -120));

    expect(result).toEqual({ ok: false, kind: "MISMATCH", reason: "totp_mismatch" });
  });

  it("reports NOT_FOUND without an enrolled authenticator", async () => {
    expect(await verifyTotp(deps, USER, "123456")).toEqual({
      ok: false,
      kind: "NOT_FOUND",
      reason: "totp_not_enrolled",
    });
  });

  it("retires a pending enrollment when a new one starts", async () => {
    const first = await enroll();
    const second = await enroll();

    expect((await getMethod(deps, first.methodId))?.status).toBe("DISABLED");
    expect((await getMethod(deps, second.methodId))?.status).toBe("ACTIVE");
    expect((await verifyTotp(deps, USER, codeAt(first.secret))).ok).toBe(false);
  });

  it("treats a secret sealed under another key as a mismatch", async () => {
    const enrollment = await enroll();
    deps.config = { ...deps.config, totp: { ...deps.config.totp, encryptionKey: "other-key" } };

    const result = await verifyTotp(deps, USER, codeAt(enrollment.secret));

    expect(result).toEqual({ ok: false, kind: "MISMATCH", reason: "totp_mismatch" });
  });
});

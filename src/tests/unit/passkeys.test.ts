import { beforeEach, describe, expect, it } from "vitest";
import type { AuthResult } from "../../libs/errors.js";
import { verifyFactorAssertion } from "../../libs/jwt.js";
import { readCounter } from "../../libs/metrics.js";
import { getMethod } from "../../modules/methods/service.js";
import {
  beginCeremony,
  completeCeremony,
  completeRegistration,
  sweepExpiredChallenges,
} from "../../modules/passkeys/service.js";
import type { AuthenticationCompletion } from "../../modules/passkeys/types.js";
import { makeDeps, type TestDeps } from "../support/deps.js";
import { authenticationResponse, registrationResponse } from "../support/fakes.js";

const USER = "user-1";
const OTHER = "user-2";
const CREDENTIAL = "cred-alpha";

let deps: TestDeps;

beforeEach(() => {
  deps = makeDeps();
});

async function challengeFor(purpose: "registration" | "authentication", userId?: string): Promise<string> {
  const started = await beginCeremony(deps, purpose, userId);
  if (!started.ok) throw new Error(started.reason);
  return started.value.challenge;
}

async function registerPasskey(userId = USER, credentialId = CREDENTIAL): Promise<string> {
  const challenge = await challengeFor("registration", userId);
  const registered = await completeRegistration(deps, userId, {
    challenge,
    response: registrationResponse(credentialId),
    name: "Laptop",
  });
  if (!registered.ok) throw new Error(registered.reason);
  return registered.value.id;
}

function authenticate(challenge: string, signature?: string, credentialId = CREDENTIAL) {
  return completeCeremony(deps, {
    challenge,
    credentialId,
    response: authenticationResponse(credentialId, signature),
  });
}

describe("beginCeremony", () => {
  it("issues a challenge with the configured lifetime", async () => {
    const started = await beginCeremony(deps, "authentication");
    if (!started.ok) throw new Error(started.reason);

    expect(started.value.challenge).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(started.value.expiresAt).toEqual(new Date("2026-03-02T09:05:00.000Z"));
    expect(started.value.timeoutMs).toBe(300_000);
    expect(started.value.rpId).toBe("localhost");
    expect(started.value.credentials).toEqual([]);
  });

  it("lists the user's passkeys for the client", async () => {
    await registerPasskey();

    const started = await beginCeremony(deps, "authentication", USER);

    expect(started.ok && started.value.credentials).toEqual([{ id: CREDENTIAL, transports: ["internal"] }]);
  });

  it("requires a user for registration", async () => {
    expect(await beginCeremony(deps, "registration")).toEqual({
      ok: false,
      kind: "VALIDATION_FAILED",
      reason: "registration_requires_user",
    });
  });
});

describe("completeRegistration", () => {
  it("stores a verified passkey method", async () => {
    const methodId = await registerPasskey();

    const method = await getMethod(deps, methodId);
    expect(method?.type).toBe("PASSKEY");
    expect(method?.verified).toBe(true);
    expect(method?.type === "PASSKEY" && method.publicKey).toBe(`pk-${CREDENTIAL}`);
  });

  it("rejects an attestation the verifier refuses", async () => {
    const challenge = await challengeFor("registration", USER);
    deps.passkeyVerifier.rejectRegistration = true;

    const result = await completeRegistration(deps, USER, {
      challenge,
      response: registrationResponse(CREDENTIAL),
      name: "Laptop",
    });

    expect(result).toEqual({ ok: false, kind: "VALIDATION_FAILED", reason: "attestation_invalid" });
    expect(await deps.stores.methods.queryByOwner(USER)).toEqual([]);
  });

  it("does not let another user finish a bound registration", async () => {
    const challenge = await challengeFor("registration", USER);

    const result = await completeRegistration(deps, OTHER, {
      challenge,
      response: registrationResponse(CREDENTIAL),
      name: "Laptop",
    });

    expect(result).toEqual({ ok: false, kind: "UNAUTHORIZED", reason: "challenge_bound_to_other_user" });
  });

  it("refuses an authentication challenge for registration", async () => {
    const challenge = await challengeFor("authentication");

    const result = await completeRegistration(deps, USER, {
      challenge,
      response: registrationResponse(CREDENTIAL),
      name: "Laptop",
    });

    expect(result).toEqual({ ok: false, kind: "VALIDATION_FAILED", reason: "challenge_purpose_mismatch" });
  });
});

describe("completeCeremony", () => {
  it("resolves the credential globally and issues a passkey assertion", async () => {
    const methodId = await registerPasskey();
    const challenge = await challengeFor("authentication");

    const result = await authenticate(challenge);
    if (!result.ok) throw new Error(result.reason);

    expect(result.value.userId).toBe(USER);
    expect(result.value.methodId).toBe(methodId);
    const claims = await verifyFactorAssertion(result.value.assertion, deps.clock.now());
    expect(claims.amr).toEqual(["passkey"]);
    expect(deps.passkeyVerifier.authenticationCalls[0]?.expectedChallenge).toBe(challenge);
  });

  it("accepts a challenge only once", async () => {
    await registerPasskey();
    const challenge = await challengeFor("authentication");

    expect((await authenticate(challenge)).ok).toBe(true);
    expect(await authenticate(challenge)).toEqual({
      ok: false,
      kind: "ALREADY_USED",
      reason: "challenge_already_used",
    });
  });

  it("rejects an expired challenge", async () => {
    await registerPasskey();
    const challenge = await challengeFor("authentication");
    deps.clock.advance(300);
    const counter = { purpose: "authentication", result: "expired" };
    const before = readCounter("passkey_ceremony_total", counter);

    expect(await authenticate(challenge)).toEqual({ ok: false, kind: "EXPIRED", reason: "challenge_expired" });
    expect(readCounter("passkey_ceremony_total", counter)).toBe(before + 1);
  });

  it("reports an unknown credential", async () => {
    const challenge = await challengeFor("authentication");

    expect(await authenticate(challenge, undefined, "cred-unknown")).toEqual({
      ok: false,
      kind: "NOT_FOUND",
      reason: "credential_not_found",
    });
  });

  it("leaves the challenge usable after a bad signature", async () => {
    await registerPasskey();
    const challenge = await challengeFor("authentication");

    expect(await authenticate(challenge, "bad-signature")).toEqual({
      ok: false,
      kind: "VALIDATION_FAILED",
      reason: "assertion_invalid",
    });
    expect((await authenticate(challenge)).ok).toBe(true);
  });

  it("rejects a response whose id differs from the claimed credential", async () => {
    const challenge = await challengeFor("authentication");

    const result = await completeCeremony(deps, {
      challenge,
      credentialId: CREDENTIAL,
      response: authenticationResponse("cred-other"),
    });

    expect(result).toEqual({ ok: false, kind: "VALIDATION_FAILED", reason: "credential_id_mismatch" });
  });

  it("detects a signature counter that moves backwards", async () => {
    const methodId = await registerPasskey();

    deps.passkeyVerifier.nextSignCount = 5;
    expect((await authenticate(await challengeFor("authentication"))).ok).toBe(true);
    const stored = await getMethod(deps, methodId);
    expect(stored?.type === "PASSKEY" && stored.signCount).toBe(5);

    deps.passkeyVerifier.nextSignCount = 3;
    expect(await authenticate(await challengeFor("authentication"))).toEqual({
      ok: false,
      kind: "VALIDATION_FAILED",
      reason: "sign_count_regression",
    });
  });

  it("lets exactly one of two concurrent completions win", async () => {
    await registerPasskey();
    const challenge = await challengeFor("authentication");

    let concurrent: AuthResult<AuthenticationCompletion> | null = null;
    deps.stores.challenges.interleaveBeforeNextPut(async () => {
      concurrent = await authenticate(challenge);
    });

    const first = await authenticate(challenge);

    expect(concurrent).toMatchObject({ ok: true });
    expect(first).toEqual({ ok: false, kind: "ALREADY_USED", reason: "challenge_already_used" });
  });
});

describe("sweepExpiredChallenges", () => {
  it("removes expired challenges and keeps live ones", async () => {
    await challengeFor("authentication");
    await challengeFor("authentication");
    deps.clock.advance(200);
    await challengeFor("authentication");

    deps.clock.advance(100);
    expect(await sweepExpiredChallenges(deps)).toBe(2);
    expect(deps.stores.challenges.size()).toBe(1);
  });
});

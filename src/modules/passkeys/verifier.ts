// src/modules/passkeys/verifier.ts
// ============================================================================
// Kryptografische Pruefung von WebAuthn-Antworten
// ----------------------------------------------------------------------------
// Der Challenge-Service kennt nur dieses Interface. Produktion nutzt
// @simplewebauthn/server, Tests einen Fake.
// ============================================================================

import { verifyAuthenticationResponse, verifyRegistrationResponse } from "@simplewebauthn/server";
import { isoBase64URL } from "@simplewebauthn/server/helpers";
import type { PasskeyTransport } from "../methods/types.js";
import type { AuthenticationResponse, RegistrationResponse } from "./types.js";

export type StoredCredential = {
  credentialId: string;
  publicKey: string;
  signCount: number;
  transports: PasskeyTransport[];
};

export type AuthenticationCheck =
  | { verified: true; newSignCount: number }
  | { verified: false; reason: string };

export type RegistrationCheck =
  | { verified: true; credential: StoredCredential }
  | { verified: false; reason: string };

export interface PasskeyVerifier {
  verifyAuthentication(input: {
    response: AuthenticationResponse;
    expectedChallenge: string;
    credential: StoredCredential;
  }): Promise<AuthenticationCheck>;

  verifyRegistration(input: {
    response: RegistrationResponse;
    expectedChallenge: string;
  }): Promise<RegistrationCheck>;
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : "webauthn_verification_error";
}

export class SimpleWebAuthnVerifier implements PasskeyVerifier {
  constructor(
    private readonly rp: {
      rpId: string;
      origins: string[];
    },
  ) {}

  async verifyAuthentication(input: {
    response: AuthenticationResponse;
    expectedChallenge: string;
    credential: StoredCredential;
  }): Promise<AuthenticationCheck> {
    try {
      const verification = await verifyAuthenticationResponse({
        response: input.response,
        expectedChallenge: input.expectedChallenge,
        expectedOrigin: this.rp.origins,
        expectedRPID: this.rp.rpId,
        credential: {
          id: input.credential.credentialId,
          publicKey: isoBase64URL.toBuffer(input.credential.publicKey),
          counter: input.credential.signCount,
          transports: input.credential.transports,
        },
        requireUserVerification: true,
      });

      if (!verification.verified) {
        return { verified: false, reason: "assertion_rejected" };
      }
      return { verified: true, newSignCount: verification.authenticationInfo.newCounter };
    } catch (err) {
      // Library wirft bei kaputten/abweichenden Antworten
      return { verified: false, reason: reasonOf(err) };
    }
  }

  async verifyRegistration(input: {
    response: RegistrationResponse;
    expectedChallenge: string;
  }): Promise<RegistrationCheck> {
    try {
      const verification = await verifyRegistrationResponse({
        response: input.response,
        expectedChallenge: input.expectedChallenge,
        expectedOrigin: this.rp.origins,
        expectedRPID: this.rp.rpId,
        requireUserVerification: true,
      });

      if (!verification.verified || !verification.registrationInfo) {
        return { verified: false, reason: "attestation_rejected" };
      }

      const { credential } = verification.registrationInfo;
      return {
        verified: true,
        credential: {
          credentialId: credential.id,
          publicKey: isoBase64URL.fromBuffer(credential.publicKey),
          signCount: credential.counter,
          transports: input.response.response.transports ?? [],
        },
      };
    } catch (err) {
      return { verified: false, reason: reasonOf(err) };
    }
  }
}

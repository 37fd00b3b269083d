// src/modules/passkeys/repository.ts
// Collection "passkey_challenges"; Lookup per Challenge-Wert ueber globalen Schluessel.

import type { CollectionSpec, DocumentStore } from "../../libs/store.js";
import { PasskeyChallengeSchema, type PasskeyChallenge } from "./types.js";

export function challengeKey(challenge: string): string {
  return `challenge:${challenge}`;
}

export const passkeyChallengeCollection: CollectionSpec<PasskeyChallenge> = {
  name: "passkey_challenges",
  schema: PasskeyChallengeSchema,
  ownerOf: (doc) => doc.userId,
  globalKeysOf: (doc) => [challengeKey(doc.challenge)],
  expiresAtOf: (doc) => doc.expiresAt,
};

export type PasskeyChallengeStore = DocumentStore<PasskeyChallenge>;

export async function findChallengeByValue(
  store: PasskeyChallengeStore,
  challenge: string,
): Promise<PasskeyChallenge | null> {
  const matches = await store.queryByGlobalKey(challengeKey(challenge));
  return matches.find((doc) => doc.challenge === challenge) ?? null;
}

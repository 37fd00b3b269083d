// src/modules/recovery/repository.ts
// Collection "recovery_requests"; offene Anfragen sind fuer den Sweeper faellig.

import { normalizeEmail } from "../../libs/pii.js";
import type { CollectionSpec, DocumentStore } from "../../libs/store.js";
import { RecoveryRequestSchema, isActive, type RecoveryRequest } from "./types.js";

export function recoveryEmailKey(email: string): string {
  return `email:${normalizeEmail(email)}`;
}

export const recoveryCollection: CollectionSpec<RecoveryRequest> = {
  name: "recovery_requests",
  schema: RecoveryRequestSchema,
  ownerOf: (doc) => doc.userId,
  globalKeysOf: (doc) => [recoveryEmailKey(doc.email)],
  expiresAtOf: (doc) => (isActive(doc.status) ? doc.expiresAt : null),
};

export type RecoveryStore = DocumentStore<RecoveryRequest>;

export async function listActiveRecoveries(store: RecoveryStore, userId: string): Promise<RecoveryRequest[]> {
  const requests = await store.queryByOwner(userId);
  return requests.filter((request) => isActive(request.status));
}

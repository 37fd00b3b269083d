// src/modules/push/repository.ts
// Collection "push_auth_requests"; nur PENDING-Anfragen sind fuer den Sweeper faellig.

import type { CollectionSpec, DocumentStore } from "../../libs/store.js";
import { PushAuthRequestSchema, type PushAuthRequest } from "./types.js";

export const pushRequestCollection: CollectionSpec<PushAuthRequest> = {
  name: "push_auth_requests",
  schema: PushAuthRequestSchema,
  ownerOf: (doc) => doc.userId,
  globalKeysOf: () => [],
  expiresAtOf: (doc) => (doc.status === "PENDING" ? doc.expiresAt : null),
};

export type PushRequestStore = DocumentStore<PushAuthRequest>;

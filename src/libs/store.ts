// src/libs/store.ts
// ============================================================================
// Dokument-Store (Port)
// ----------------------------------------------------------------------------
// Alle Faktor-Dokumente (Methoden, Challenges, Push-Requests, OTP-Ziele,
// Recovery-Requests) liegen in Collections mit:
//  - id + version (optimistische Nebenlaeufigkeit)
//  - optionalem Owner (userId) fuer queryByOwner
//  - globalen Schluesseln (credentialId, Telefonnummer, ...) fuer userueber-
//    greifende Lookups
//  - optionalem Ablaufzeitpunkt fuer Sweeper
//
// Jede Zustandsaenderung laeuft ueber mutateDocument(): lesen, entscheiden,
// bedingt schreiben. Bei Versionskonflikt wird neu gelesen und NEU entschieden,
// damit der Verlierer eines Rennens den korrekten fachlichen Fehler sieht.
// ============================================================================

import type { z } from "zod";
import { StoreConflictError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface StoredDocument {
  id: string;
  version: number;
}

export interface CollectionSpec<T extends StoredDocument> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  ownerOf(doc: T): string | null;
  globalKeysOf(doc: T): string[];
  /** Zeitpunkt, ab dem ein Sweeper das Dokument anfassen soll (null = nie). */
  expiresAtOf(doc: T): Date | null;
}

export interface DocumentStore<T extends StoredDocument> {
  readonly spec: CollectionSpec<T>;
  get(id: string): Promise<T | null>;
  /** Legt mit version=1 an; null, wenn die id bereits existiert. */
  create(doc: T): Promise<T | null>;
  /** Schreibt nur, wenn die gespeicherte Version expectedVersion ist. */
  put(doc: T, expectedVersion: number): Promise<T | null>;
  delete(id: string, expectedVersion?: number): Promise<boolean>;
  queryByOwner(ownerId: string): Promise<T[]>;
  queryByGlobalKey(key: string): Promise<T[]>;
  queryExpired(before: Date, limit?: number): Promise<T[]>;
}

// ---------------------------------------------------------------------------
// Read-Decide-Write
// ---------------------------------------------------------------------------

export type Decision<T, R> =
  | { result: R }
  | { result: R; next: T }
  | { result: R; remove: true };

export const DEFAULT_MUTATE_ATTEMPTS = 5;

export async function mutateDocument<T extends StoredDocument, R>(
  store: DocumentStore<T>,
  id: string,
  decide: (current: T | null) => Decision<T, R>,
  maxAttempts: number = DEFAULT_MUTATE_ATTEMPTS,
): Promise<R> {
  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const current = await store.get(id);
    const decision = decide(current);

    if ("next" in decision) {
      const written = current
        ? await store.put(decision.next, current.version)
        : await store.create(decision.next);
      if (written) return decision.result;
      continue;
    }

    if ("remove" in decision) {
      if (!current) return decision.result;
      const removed = await store.delete(id, current.version);
      if (removed) return decision.result;
      continue;
    }

    return decision.result;
  }

  throw new StoreConflictError(store.spec.name, id);
}

/**
 * Sweeper-Helfer: wendet decide auf jedes abgelaufene Dokument an. Ein
 * umkaempftes Dokument wird uebersprungen und beim naechsten Lauf erneut
 * gesehen.
 */
export async function sweepDocuments<T extends StoredDocument>(
  store: DocumentStore<T>,
  now: Date,
  decide: (current: T | null) => Decision<T, boolean>,
  log: Logger,
  batchSize = 500,
): Promise<number> {
  const candidates = await store.queryExpired(now, batchSize);
  let changed = 0;
  for (const candidate of candidates) {
    try {
      if (await mutateDocument(store, candidate.id, decide)) changed += 1;
    } catch (err) {
      if (!(err instanceof StoreConflictError)) throw err;
      log.warn({ collection: store.spec.name, id: candidate.id }, "sweep_document_contended");
    }
  }
  return changed;
}

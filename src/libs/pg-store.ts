// src/libs/pg-store.ts
// ============================================================================
// PostgreSQL-Adapter fuer den Dokument-Store
// ----------------------------------------------------------------------------
// Eine Tabelle auth.documents (siehe db/migrations/001_auth_documents.sql):
//   (collection, id) PK, owner_id, global_keys text[] (GIN), version,
//   expires_at, doc jsonb
// Die version-Spalte ist die einzige Quelle der Wahrheit fuer CAS; im jsonb
// liegt das Dokument ohne version. Beim Lesen validiert das zod-Schema der
// Collection und wandelt ISO-Strings zurueck in Date.
// ============================================================================

import type pg from "pg";
import type { CollectionSpec, DocumentStore, StoredDocument } from "./store.js";

type DocumentRow = {
  id: string;
  version: number;
  doc: Record<string, unknown>;
};

export class PgDocumentStore<T extends StoredDocument> implements DocumentStore<T> {
  constructor(
    private readonly pool: pg.Pool,
    readonly spec: CollectionSpec<T>,
  ) {}

  private revive(row: DocumentRow): T {
    return this.spec.schema.parse({ ...row.doc, id: row.id, version: row.version });
  }

  private serialize(doc: T): string {
    const { version: _version, ...rest } = doc;
    return JSON.stringify(rest);
  }

  async get(id: string): Promise<T | null> {
    const { rows } = await this.pool.query<DocumentRow>(
      `SELECT id, version, doc FROM auth.documents WHERE collection = $1 AND id = $2;`,
      [this.spec.name, id],
    );
    return rows[0] ? this.revive(rows[0]) : null;
  }

  async create(doc: T): Promise<T | null> {
    const { rows } = await this.pool.query<DocumentRow>(
      `
        INSERT INTO auth.documents (collection, id, owner_id, global_keys, version, expires_at, doc)
        VALUES ($1, $2, $3, $4, 1, $5, $6::jsonb)
        ON CONFLICT (collection, id) DO NOTHING
        RETURNING id, version, doc;
      `,
      [
        this.spec.name,
        doc.id,
        this.spec.ownerOf(doc),
        this.spec.globalKeysOf(doc),
        this.spec.expiresAtOf(doc),
        this.serialize(doc),
      ],
    );
    return rows[0] ? this.revive(rows[0]) : null;
  }

  async put(doc: T, expectedVersion: number): Promise<T | null> {
    const { rows } = await this.pool.query<DocumentRow>(
      `
        UPDATE auth.documents
           SET owner_id = $3,
               global_keys = $4,
               expires_at = $5,
               doc = $6::jsonb,
               version = version + 1,
               updated_at = now()
         WHERE collection = $1
           AND id = $2
           AND version = $7
        RETURNING id, version, doc;
      `,
      [
        this.spec.name,
        doc.id,
        this.spec.ownerOf(doc),
        this.spec.globalKeysOf(doc),
        this.spec.expiresAtOf(doc),
        this.serialize(doc),
        expectedVersion,
      ],
    );
    return rows[0] ? this.revive(rows[0]) : null;
  }

  async delete(id: string, expectedVersion?: number): Promise<boolean> {
    const result =
      expectedVersion === undefined
        ? await this.pool.query(
            `DELETE FROM auth.documents WHERE collection = $1 AND id = $2;`,
            [this.spec.name, id],
          )
        : await this.pool.query(
            `DELETE FROM auth.documents WHERE collection = $1 AND id = $2 AND version = $3;`,
            [this.spec.name, id, expectedVersion],
          );
    return (result.rowCount ?? 0) > 0;
  }

  async queryByOwner(ownerId: string): Promise<T[]> {
    const { rows } = await this.pool.query<DocumentRow>(
      `
        SELECT id, version, doc
          FROM auth.documents
         WHERE collection = $1 AND owner_id = $2
         ORDER BY created_at ASC;
      `,
      [this.spec.name, ownerId],
    );
    return rows.map((row) => this.revive(row));
  }

  async queryByGlobalKey(key: string): Promise<T[]> {
    // Index-Lookup ueber GIN(global_keys), kein Scan ueber alle User
    const { rows } = await this.pool.query<DocumentRow>(
      `
        SELECT id, version, doc
          FROM auth.documents
         WHERE collection = $1 AND global_keys @> ARRAY[$2]::text[]
         ORDER BY created_at ASC;
      `,
      [this.spec.name, key],
    );
    return rows.map((row) => this.revive(row));
  }

  async queryExpired(before: Date, limit = 500): Promise<T[]> {
    const { rows } = await this.pool.query<DocumentRow>(
      `
        SELECT id, version, doc
          FROM auth.documents
         WHERE collection = $1
           AND expires_at IS NOT NULL
           AND expires_at <= $2
         ORDER BY expires_at ASC
         LIMIT $3;
      `,
      [this.spec.name, before, limit],
    );
    return rows.map((row) => this.revive(row));
  }
}

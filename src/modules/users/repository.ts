// src/modules/users/repository.ts
// ============================================================================
// Read-only Zugriff auf das Benutzerverzeichnis (auth.users)
// ----------------------------------------------------------------------------
// Konten werden ausserhalb dieses Dienstes angelegt. Recovery und Push-
// Sign-in brauchen nur die Aufloesung E-Mail -> userId.
// ============================================================================

import type pg from "pg";
import { normalizeEmail } from "../../libs/pii.js";

export interface UserDirectory {
  findUserIdByEmail(email: string): Promise<string | null>;
}

type UserRow = {
  id: string;
};

export class PgUserDirectory implements UserDirectory {
  constructor(private readonly pool: pg.Pool) {}

  async findUserIdByEmail(email: string): Promise<string | null> {
    const { rows } = await this.pool.query<UserRow>(
      `
        SELECT id
          FROM auth.users
         WHERE email = $1
           AND is_active = true
         LIMIT 1;
      `,
      [normalizeEmail(email)],
    );
    return rows[0]?.id ?? null;
  }
}

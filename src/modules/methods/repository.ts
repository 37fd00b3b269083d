// src/modules/methods/repository.ts
// ============================================================================
// Collection "authentication_methods"
// ----------------------------------------------------------------------------
// Owner = userId. Globale Schluessel erlauben Lookups ueber alle User hinweg
// (Passkey-Login ohne Identitaet, Telefon/E-Mail-Faktor -> User).
// ============================================================================

import type { CollectionSpec, DocumentStore } from "../../libs/store.js";
import { normalizeEmail, normalizePhone } from "../../libs/pii.js";
import { AuthenticationMethodSchema, type AuthenticationMethod } from "./types.js";

export function passkeyKey(credentialId: string): string {
  return `passkey:${credentialId}`;
}

export function phoneKey(phoneNumber: string): string {
  return `phone:${normalizePhone(phoneNumber)}`;
}

export function emailKey(email: string): string {
  return `email:${normalizeEmail(email)}`;
}

export function pushKey(endpoint: string): string {
  return `push:${endpoint}`;
}

/** Ziel-Schluessel einer Methode; TOTP hat kein externes Ziel. */
export function targetKeyOf(method: AuthenticationMethod): string | null {
  switch (method.type) {
    case "TOTP":
      return null;
    case "PASSKEY":
      return passkeyKey(method.credentialId);
    case "SMS_OTP":
      return phoneKey(method.phoneNumber);
    case "EMAIL_OTP":
      return emailKey(method.email);
    case "PUSH":
      return pushKey(method.endpoint);
  }
}

export const methodCollection: CollectionSpec<AuthenticationMethod> = {
  name: "authentication_methods",
  schema: AuthenticationMethodSchema,
  ownerOf: (method) => method.userId,
  globalKeysOf: (method) => {
    const key = targetKeyOf(method);
    return key ? [key] : [];
  },
  expiresAtOf: () => null,
};

export type MethodStore = DocumentStore<AuthenticationMethod>;

export async function listMethodsByUser(
  store: MethodStore,
  userId: string,
): Promise<AuthenticationMethod[]> {
  return store.queryByOwner(userId);
}

export async function findMethodsByTargetKey(
  store: MethodStore,
  key: string,
): Promise<AuthenticationMethod[]> {
  return store.queryByGlobalKey(key);
}

/**
 * Identity normalization and validation
 */

import type { IdentityRow } from "./database.js";

export const LOCK_SENTINEL = "*";

export interface IdentityRecord {
  id: number | string;
  login: string;
  name: string;
  distinguishedName: string;
  credentialHash: string;
  roles: Map<string, string[]>;
}

export type DiscardReason = "unsafe" | "deactivated";

export type SanitizeResult =
  | { kind: "keep"; record: IdentityRecord; locked: boolean }
  | { kind: "discard"; reason: DiscardReason };

const CONTROL_CHARACTERS = /[\x00-\x1f]/;
const DIGITS_ONLY = /^\d+$/;
const UNKNOWN_DN = /^(\/O=)?\/?unknown/i;
const DISTINGUISHED_NAME = /^(\/(C|O|DC)=[^/]+)+(\/[^/=]+=[^/]*)*\/CN=[^/]+$/;
const HANDLE_LOGIN = /^[a-z0-9_]+(\.nocern|\.notcms)?$/;
const EMAIL_LOGIN = /^[-a-z0-9_.+]+@([-a-z0-9]+\.)+[a-z]{2,5}$/;

export function hasControlCharacters(value: string): boolean {
  return CONTROL_CHARACTERS.test(value);
}

/**
 * Digit-only subjects and "unknown" placeholders carry no identity
 */
export function isPlaceholderDistinguishedName(dn: string): boolean {
  return DIGITS_ONLY.test(dn) || UNKNOWN_DN.test(dn);
}

export function normalizeDistinguishedName(dn: string): string {
  const trimmed = dn.trim();
  return isPlaceholderDistinguishedName(trimmed) ? "" : trimmed;
}

export function normalizeLogin(login: string): string {
  return login.trim().toLowerCase();
}

/**
 * `/(C|O|DC)=...` naming authority first, non-empty `/CN=...` last.
 * An empty DN is valid.
 */
export function isValidDistinguishedName(dn: string): boolean {
  return dn === "" || DISTINGUISHED_NAME.test(dn);
}

/**
 * Accepts a bare handle, an e-mail address, or the empty string.
 * The empty login is deliberately allowed.
 */
export function isValidLogin(login: string): boolean {
  return login === "" || HANDLE_LOGIN.test(login) || EMAIL_LOGIN.test(login);
}

/**
 * Certificate-only accounts carry the lock sentinel as their credential
 */
export function isServiceAccount(
  login: string,
  dn: string,
  credential: string
): boolean {
  return login.includes("@") && dn !== "" && credential === LOCK_SENTINEL;
}

export function isDeactivatedCredential(credential: string): boolean {
  return credential.includes(LOCK_SENTINEL) || credential.includes("Removed");
}

export function buildDisplayName(forename: string, surname: string): string {
  return [forename, surname].filter((part) => part !== "").join(" ");
}

/**
 * Turn one identity row into a record, or decide to drop it
 */
export function sanitizeIdentity(row: IdentityRow): SanitizeResult {
  const forename = row.forename ?? "";
  const surname = row.surname ?? "";
  const login = normalizeLogin(row.login ?? "");
  const dn = normalizeDistinguishedName(row.dn ?? "");
  let credential = row.passwd ?? "";

  if ([dn, login, forename, surname].some(hasControlCharacters)) {
    return { kind: "discard", reason: "unsafe" };
  }
  if (!isValidDistinguishedName(dn) || !isValidLogin(login)) {
    return { kind: "discard", reason: "unsafe" };
  }

  if (
    !isServiceAccount(login, dn, credential) &&
    isDeactivatedCredential(credential)
  ) {
    return { kind: "discard", reason: "deactivated" };
  }

  let locked = false;
  if (credential === "") {
    credential = LOCK_SENTINEL;
    locked = true;
  }

  return {
    kind: "keep",
    locked,
    record: {
      id: row.id,
      login,
      name: buildDisplayName(forename, surname),
      distinguishedName: dn,
      credentialHash: credential,
      roles: new Map(),
    },
  };
}

/**
 * Human-readable line for a discarded or locked identity
 */
export function describeIdentity(row: IdentityRow, verdict: string): string {
  return (
    `${verdict} id=${row.id} login=${JSON.stringify(row.login ?? "")}` +
    ` dn=${JSON.stringify(row.dn ?? "")}` +
    ` name=${JSON.stringify(buildDisplayName(row.forename ?? "", row.surname ?? ""))}`
  );
}

/**
 * Canonical snapshot serialization
 *
 * Output depends only on the record set: ids, role keys, role lists and
 * object keys are all sorted by code unit before rendering.
 */

import type { IdentityRecord } from "./sanitizer.js";

export interface SnapshotEntry {
  DN: string;
  ID: number | string;
  LOGIN: string;
  NAME: string;
  PASSWD: string;
  ROLES: Array<[role: string, grants: string[]]>;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

const INTEGER_TEXT = /^-?\d+$/;

function isNumericId(id: number | string): boolean {
  return typeof id === "number" || INTEGER_TEXT.test(id);
}

function compareNumericIds(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (Number.isInteger(Number(a)) && Number.isInteger(Number(b))) {
    const left = BigInt(a);
    const right = BigInt(b);
    if (left !== right) return left < right ? -1 : 1;
  } else if (Number(a) !== Number(b)) {
    return Number(a) - Number(b);
  }
  // equal value, different spelling: the number first, then by text
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return compareStrings(a, b);
}

/**
 * Numeric ids, including digit strings beyond the safe integer range, sort
 * by value and ahead of other string ids
 */
export function compareIds(a: number | string, b: number | string): number {
  const numericA = isNumericId(a);
  const numericB = isNumericId(b);
  if (numericA && numericB) return compareNumericIds(a, b);
  if (numericA) return -1;
  if (numericB) return 1;
  return compareStrings(String(a), String(b));
}

export function sortUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort(compareStrings);
}

export function toSnapshotEntry(record: IdentityRecord): SnapshotEntry {
  return {
    DN: record.distinguishedName,
    ID: record.id,
    LOGIN: record.login,
    NAME: record.name,
    PASSWD: record.credentialHash,
    ROLES: [...record.roles.keys()]
      .sort(compareStrings)
      .map((role): [string, string[]] => [
        role,
        sortUnique(record.roles.get(role) ?? []),
      ]),
  };
}

/**
 * One-line JSON object. Rendered by hand because plain objects move
 * integer-like keys ahead of the others.
 */
export function renderEntry(entry: SnapshotEntry): string {
  const roles = entry.ROLES.map(
    ([role, grants]) => `${JSON.stringify(role)}:${JSON.stringify(grants)}`
  ).join(",");

  return (
    `{"DN":${JSON.stringify(entry.DN)}` +
    `,"ID":${JSON.stringify(entry.ID)}` +
    `,"LOGIN":${JSON.stringify(entry.LOGIN)}` +
    `,"NAME":${JSON.stringify(entry.NAME)}` +
    `,"PASSWD":${JSON.stringify(entry.PASSWD)}` +
    `,"ROLES":{${roles}}}`
  );
}

/**
 * Render records as a JSON array, one record per line, newline-terminated
 */
export function serializeRecords(records: Iterable<IdentityRecord>): string {
  const lines = [...records]
    .sort((a, b) => compareIds(a.id, b.id))
    .map((record) => renderEntry(toSnapshotEntry(record)));

  if (lines.length === 0) {
    return "[\n]\n";
  }
  return `[\n${lines.join(",\n")}\n]\n`;
}

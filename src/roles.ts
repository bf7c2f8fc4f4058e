/**
 * Role grant aggregation
 */

import type { GrantRow } from "./database.js";
import type { IdentityRecord } from "./sanitizer.js";

export interface AggregateResult {
  attached: number;
  orphaned: number;
}

/**
 * Lowercase, and collapse each run outside [a-z0-9] to one hyphen
 */
export function normalizeRoleToken(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, "-");
}

export function formatGrant(grant: GrantRow): string {
  return `${grant.kind}:${normalizeRoleToken(grant.name)}`;
}

/**
 * Attach one grant to its identity. Returns false when the identity was
 * not retained; that is an expected outcome, not an error.
 */
export function attachGrant(
  records: ReadonlyMap<number | string, IdentityRecord>,
  grant: GrantRow
): boolean {
  const record = records.get(grant.contactId);
  if (!record) {
    return false;
  }

  const role = normalizeRoleToken(grant.role);
  const grants = record.roles.get(role);
  if (grants) {
    grants.push(formatGrant(grant));
  } else {
    record.roles.set(role, [formatGrant(grant)]);
  }
  return true;
}

export function aggregateGrants(
  records: ReadonlyMap<number | string, IdentityRecord>,
  grants: GrantRow[]
): AggregateResult {
  const result: AggregateResult = { attached: 0, orphaned: 0 };
  for (const grant of grants) {
    if (attachGrant(records, grant)) {
      result.attached++;
    } else {
      result.orphaned++;
    }
  }
  return result;
}

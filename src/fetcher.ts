/**
 * Row fetching for authmap-export
 *
 * Everything the driver hands back is mapped into typed rows here, so the
 * rest of the pipeline never sees an untyped tuple.
 */

import type {
  DatabaseConnection,
  DriverRow,
  GrantKind,
  GrantRow,
  IdentityRow,
} from "./database.js";

export const IDENTITY_QUERY = `
  SELECT c.id, c.username AS login, c.forename, c.surname,
         c.dn, p.passwd
  FROM contact c
  LEFT OUTER JOIN user_passwd p ON p.username = c.username
`;

export const SITE_GRANT_QUERY = `
  SELECT sr.contact AS contact_id, r.title AS role, s.name AS name
  FROM site_responsibility sr
  JOIN role r ON r.id = sr.role
  JOIN site s ON s.id = sr.site
`;

export const GROUP_GRANT_QUERY = `
  SELECT gr.contact AS contact_id, r.title AS role, g.name AS name
  FROM group_responsibility gr
  JOIN role r ON r.id = gr.role
  JOIN user_group g ON g.id = gr.user_group
`;

/**
 * A driver row did not have the shape the queries promise
 */
export class RowShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RowShapeError";
  }
}

function toId(value: unknown, column: string): number | string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "bigint") {
    return toId(value.toString(), column);
  }
  if (typeof value === "string" && value.length > 0) {
    // bigint columns arrive as text; only exact round trips become numbers
    const numeric = Number(value);
    if (Number.isSafeInteger(numeric) && String(numeric) === value) {
      return numeric;
    }
    return value;
  }
  throw new RowShapeError(`Column ${column} holds no usable id: ${String(value)}`);
}

function toText(value: unknown, column: string): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  throw new RowShapeError(`Column ${column} is not text: ${typeof value}`);
}

export function toIdentityRow(raw: DriverRow): IdentityRow {
  return {
    id: toId(raw.id, "id"),
    login: toText(raw.login, "login"),
    forename: toText(raw.forename, "forename"),
    surname: toText(raw.surname, "surname"),
    dn: toText(raw.dn, "dn"),
    passwd: toText(raw.passwd, "passwd"),
  };
}

export function toGrantRow(kind: GrantKind, raw: DriverRow): GrantRow {
  return {
    kind,
    contactId: toId(raw.contact_id, "contact_id"),
    role: toText(raw.role, "role") ?? "",
    name: toText(raw.name, "name") ?? "",
  };
}

/**
 * Fetch one row per identity
 */
export async function fetchIdentities(
  connection: DatabaseConnection
): Promise<IdentityRow[]> {
  const rows = await connection.query(IDENTITY_QUERY);
  return rows.map(toIdentityRow);
}

/**
 * Fetch site-level then group-level role grants
 */
export async function fetchGrants(
  connection: DatabaseConnection
): Promise<GrantRow[]> {
  const siteRows = await connection.query(SITE_GRANT_QUERY);
  const groupRows = await connection.query(GROUP_GRANT_QUERY);

  return [
    ...siteRows.map((row) => toGrantRow("site", row)),
    ...groupRows.map((row) => toGrantRow("group", row)),
  ];
}

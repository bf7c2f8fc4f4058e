/**
 * Database connection and row shapes for authmap-export
 */

import { Client } from "pg";

/**
 * A row as the driver returns it; typed only at the fetch boundary
 */
export type DriverRow = Record<string, unknown>;

export interface DatabaseConnection {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  query(text: string, params?: unknown[]): Promise<DriverRow[]>;
}

/**
 * Raised when the identity store cannot be reached or refuses the login.
 * The CLI may swallow this one in quiet mode.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class QueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QueryError";
  }
}

export class PostgreSQLConnection implements DatabaseConnection {
  private client: Client;
  private lost: Error | null = null;

  constructor(connectionString: string, client?: Client) {
    this.client = client ?? new Client({ connectionString });
    // an idle client emits "error" when the server goes away
    this.client.on("error", (error: Error) => {
      this.lost = error;
    });
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (error) {
      throw new ConnectionError(
        `Cannot connect to identity database: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async disconnect(): Promise<void> {
    await this.client.end();
  }

  async query(text: string, params?: unknown[]): Promise<DriverRow[]> {
    if (this.lost) {
      throw this.lostConnection(this.lost);
    }
    try {
      const result = await this.client.query<DriverRow>(text, params);
      return result.rows;
    } catch (error) {
      if (this.lost) {
        throw this.lostConnection(this.lost);
      }
      throw new QueryError(
        `Query failed: ${describeError(error)}\n${text.trim()}`,
        { cause: error }
      );
    }
  }

  private lostConnection(error: Error): ConnectionError {
    return new ConnectionError(
      `Lost connection to identity database: ${error.message}`,
      { cause: error }
    );
  }
}

/**
 * Create a database connection from connection string
 */
export function createConnection(connectionString: string): DatabaseConnection {
  return new PostgreSQLConnection(connectionString);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type GrantKind = "site" | "group";

/**
 * Typed rows handed to the sanitizer and the role aggregator
 */
export interface IdentityRow {
  id: number | string;
  login: string | null;
  forename: string | null;
  surname: string | null;
  dn: string | null;
  passwd: string | null;
}

export interface GrantRow {
  kind: GrantKind;
  contactId: number | string;
  role: string;
  name: string;
}

/**
 * Main AuthMapExporter class - identity snapshot export
 */

import path from "path";
import type { DatabaseConnection, IdentityRow } from "./database.js";
import { createConnection, describeError } from "./database.js";
import type { AuthMapOptions } from "./config.js";
import { validateConfig, mergeConfigs, getDefaultConfig } from "./config.js";
import { fetchGrants, fetchIdentities } from "./fetcher.js";
import {
  describeIdentity,
  sanitizeIdentity,
  type IdentityRecord,
} from "./sanitizer.js";
import { aggregateGrants } from "./roles.js";
import { serializeRecords } from "./serializer.js";
import {
  publishSnapshot,
  readProcessSettings,
  type FileOps,
  type PublishSettings,
} from "./publisher.js";
import { silentReporter, type Reporter } from "./reporter.js";

export interface BuildResult {
  records: Map<number | string, IdentityRecord>;
  discarded: { unsafe: number; deactivated: number };
  duplicates: number;
  locked: number;
  grants: { attached: number; orphaned: number };
}

export interface ExportResult {
  outputPath: string;
  changed: boolean;
  retained: number;
  discarded: { unsafe: number; deactivated: number };
  duplicates: number;
  locked: number;
  grants: { attached: number; orphaned: number };
  bytes: number;
}

export interface ExporterDependencies {
  createConnection?: (connectionString: string) => DatabaseConnection;
  reporter?: Reporter;
  settings?: PublishSettings;
  fileOps?: FileOps;
}

/**
 * Sanitize identity rows into records keyed by id. The first row seen for
 * an id wins.
 */
export function collectIdentities(
  rows: IdentityRow[],
  reporter: Reporter = silentReporter
): Omit<BuildResult, "grants"> {
  const records = new Map<number | string, IdentityRecord>();
  const discarded = { unsafe: 0, deactivated: 0 };
  let duplicates = 0;
  let locked = 0;

  for (const row of rows) {
    const result = sanitizeIdentity(row);

    if (result.kind === "discard") {
      discarded[result.reason]++;
      reporter.warn(describeIdentity(row, `discarding ${result.reason} identity`));
      continue;
    }

    if (records.has(result.record.id)) {
      duplicates++;
      reporter.warn(describeIdentity(row, "ignoring duplicate identity"));
      continue;
    }

    if (result.locked) {
      locked++;
      reporter.warn(describeIdentity(row, "locking identity without password"));
    }
    records.set(result.record.id, result.record);
  }

  return { records, discarded, duplicates, locked };
}

/**
 * Extracts identities and role grants and publishes them as a snapshot
 */
export class AuthMapExporter {
  private connection: DatabaseConnection | null = null;
  private readonly options: AuthMapOptions;
  private readonly reporter: Reporter;
  private readonly settings: PublishSettings;
  private readonly fileOps?: FileOps;
  private readonly connectionFactory: (
    connectionString: string
  ) => DatabaseConnection;

  constructor(
    options: Partial<AuthMapOptions> = {},
    dependencies: ExporterDependencies = {}
  ) {
    this.options = mergeConfigs(getDefaultConfig(), options);
    this.connectionFactory = dependencies.createConnection ?? createConnection;
    this.reporter = dependencies.reporter ?? silentReporter;
    this.settings = dependencies.settings ?? readProcessSettings();
    this.fileOps = dependencies.fileOps;
  }

  /**
   * Connect to the database
   */
  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const dbUrl = this.options.database_url;
    if (!dbUrl) {
      throw new Error("Database connection string is required");
    }

    const connection = this.connectionFactory(dbUrl);
    await connection.connect();
    this.connection = connection;
  }

  /**
   * Disconnect from the database
   */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await connection.disconnect();
    }
  }

  /**
   * Fetch, sanitize and aggregate the current identity set
   */
  async buildRecords(): Promise<BuildResult> {
    const connection = this.requireConnection();

    const rows = await fetchIdentities(connection);
    const identities = collectIdentities(rows, this.reporter);

    const grantRows = await fetchGrants(connection);
    const grants = aggregateGrants(identities.records, grantRows);

    this.reporter.info(
      `${identities.records.size} identities retained, ` +
        `${grants.attached} role grants attached, ${grants.orphaned} ignored`
    );

    return { ...identities, grants };
  }

  /**
   * Build the snapshot text without publishing it
   */
  async render(): Promise<string> {
    const { records } = await this.buildRecords();
    return serializeRecords(records.values());
  }

  /**
   * Run the whole pipeline and publish the snapshot file
   */
  async export(): Promise<ExportResult> {
    validateConfig(this.options);
    const outputPath = path.resolve(this.options.out ?? "");

    const built = await this.withConnection(() => this.buildRecords());

    const content = serializeRecords(built.records.values());
    const published = await publishSnapshot(
      outputPath,
      content,
      this.settings,
      this.reporter,
      this.fileOps
    );

    return {
      outputPath,
      changed: published.changed,
      retained: built.records.size,
      discarded: built.discarded,
      duplicates: built.duplicates,
      locked: built.locked,
      grants: built.grants,
      bytes: Buffer.byteLength(content, "utf8"),
    };
  }

  private async withConnection<T>(work: () => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await work();
    } finally {
      // a failed close must not mask the error from the work itself
      await this.disconnect().catch((error: unknown) => {
        this.reporter.warn(
          `could not close database connection: ${describeError(error)}`
        );
      });
    }
  }

  private requireConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new Error("Not connected to database");
    }
    return this.connection;
  }
}

export {
  ConnectionError,
  createConnection,
  type DatabaseConnection,
  type GrantRow,
  type IdentityRow,
} from "./database.js";
export {
  ConfigError,
  resolveConfig,
  validateConfig,
  type AuthMapOptions,
} from "./config.js";
export { RowShapeError } from "./fetcher.js";
export {
  sanitizeIdentity,
  LOCK_SENTINEL,
  type IdentityRecord,
  type SanitizeResult,
} from "./sanitizer.js";
export { attachGrant, normalizeRoleToken } from "./roles.js";
export { serializeRecords } from "./serializer.js";
export {
  PublishError,
  publishSnapshot,
  readProcessSettings,
  type PublishSettings,
} from "./publisher.js";
export { createConsoleReporter, silentReporter, type Reporter } from "./reporter.js";

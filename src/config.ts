/**
 * Configuration management for authmap-export
 */

import fs from "fs";
import path from "path";

export interface DatabaseConfig {
  database_url?: string;
}

/**
 * Shape of a configuration file: either a single connection at top level,
 * or several named ones under `databases`
 */
export interface ConfigFile extends DatabaseConfig {
  out?: string;
  timeout_seconds?: number;
  databases?: Record<string, DatabaseConfig>;
}

export interface AuthMapOptions {
  out?: string;
  database_url?: string;
  verbose: boolean;
  quiet: boolean;
  timeout_seconds: number;
}

export interface CliArgs {
  out?: string;
  db?: string;
  verbose?: boolean;
  quiet?: boolean;
  timeout_seconds?: number;
}

type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const DEFAULT_TIMEOUT_SECONDS = 60;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Find configuration file in current directory
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  const possibleConfigs = [".authmaprc", ".authmaprc.json"];

  for (const configName of possibleConfigs) {
    const configPath = path.resolve(cwd, configName);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Expand environment variables in a string value
 * Supports: $VAR, ${VAR}, ${VAR:default}
 */
export function expandEnvVars(
  value: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return value.replace(
    /\$\{([^}]+)\}|\$([A-Z_][A-Z0-9_]*)/g,
    (match: string, braced: string | undefined, simple: string | undefined) => {
      if (braced !== undefined && braced.includes(":")) {
        const separator = braced.indexOf(":");
        const envVar = braced.slice(0, separator);
        const defaultValue = braced.slice(separator + 1);
        return env[envVar] || defaultValue;
      }

      const varName = braced ?? simple ?? "";
      return env[varName] || match;
    }
  );
}

function expandConfigEnvVars(value: JsonValue, env: NodeJS.ProcessEnv): JsonValue {
  if (typeof value === "string") {
    return expandEnvVars(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => expandConfigEnvVars(item, env));
  }

  if (value !== null && typeof value === "object") {
    const expanded: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandConfigEnvVars(item, env);
    }
    return expanded;
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function optionalString(
  source: Record<string, unknown>,
  key: string,
  where: string
): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${where}: "${key}" must be a string`);
  }
  return value;
}

function toDatabaseConfig(value: unknown, where: string): DatabaseConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${where}: expected an object`);
  }
  return { database_url: optionalString(value, "database_url", where) };
}

/**
 * Check a parsed file against the expected shape
 */
export function parseConfigFile(value: unknown, where: string): ConfigFile {
  if (!isRecord(value)) {
    throw new ConfigError(`${where}: expected a JSON object`);
  }

  const config: ConfigFile = {
    database_url: optionalString(value, "database_url", where),
    out: optionalString(value, "out", where),
  };

  if (value.timeout_seconds !== undefined) {
    if (typeof value.timeout_seconds !== "number") {
      throw new ConfigError(`${where}: "timeout_seconds" must be a number`);
    }
    config.timeout_seconds = value.timeout_seconds;
  }

  if (value.databases !== undefined) {
    if (!isRecord(value.databases)) {
      throw new ConfigError(`${where}: "databases" must be an object`);
    }
    const databases: Record<string, DatabaseConfig> = {};
    for (const [name, entry] of Object.entries(value.databases)) {
      databases[name] = toDatabaseConfig(entry, `${where}#${name}`);
    }
    config.databases = databases;
  }

  return config;
}

/**
 * Load and parse configuration file with environment variable expansion
 */
export function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): ConfigFile {
  let parsed: JsonValue;
  try {
    const configContent = fs.readFileSync(configPath, "utf8");
    parsed = JSON.parse(configContent);
  } catch (error) {
    throw new ConfigError(`Failed to load config file ${configPath}`, {
      cause: error,
    });
  }

  return parseConfigFile(expandConfigEnvVars(parsed, env), configPath);
}

/**
 * Split a `<file>[#<name>]` reference
 */
export function parseConfigReference(reference: string): {
  file: string;
  name?: string;
} {
  const hash = reference.lastIndexOf("#");
  if (hash <= 0) {
    return { file: reference };
  }
  return { file: reference.slice(0, hash), name: reference.slice(hash + 1) };
}

/**
 * Resolve a configuration reference to its connection parameters
 */
export function resolveDatabaseConfig(
  config: ConfigFile,
  name: string | undefined,
  where: string
): DatabaseConfig {
  if (name === undefined) {
    return { database_url: config.database_url };
  }

  const entry = config.databases?.[name];
  if (!entry) {
    throw new ConfigError(`${where}: no database named "${name}"`);
  }
  return entry;
}

/**
 * Resolve configuration from multiple sources:
 * 1. CLI arguments override everything
 * 2. Configuration file values
 * 3. Environment variables fill what the file leaves unset
 */
export function resolveConfig(
  cliArgs: CliArgs = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AuthMapOptions {
  let config: ConfigFile = {};
  let database: DatabaseConfig = {};

  const reference = cliArgs.db
    ? parseConfigReference(cliArgs.db)
    : undefined;
  const actualConfigPath = reference?.file ?? findConfigFile(cwd);
  if (actualConfigPath) {
    config = loadConfig(actualConfigPath, env);
    database = resolveDatabaseConfig(config, reference?.name, actualConfigPath);
  }

  // Start with config file values
  const resolved: AuthMapOptions = {
    out: config.out,
    database_url: database.database_url,
    verbose: false,
    quiet: false,
    timeout_seconds: config.timeout_seconds ?? DEFAULT_TIMEOUT_SECONDS,
  };

  // Fill gaps from environment variables
  if (env.DATABASE_URL && !resolved.database_url) {
    resolved.database_url = env.DATABASE_URL;
  }
  if (env.AUTHMAP_OUT && !resolved.out) {
    resolved.out = env.AUTHMAP_OUT;
  }
  if (env.AUTHMAP_TIMEOUT && config.timeout_seconds === undefined) {
    resolved.timeout_seconds = Number(env.AUTHMAP_TIMEOUT);
  }

  // Override with CLI arguments (highest precedence)
  if (cliArgs.out) {
    resolved.out = cliArgs.out;
  }
  if (cliArgs.timeout_seconds !== undefined) {
    resolved.timeout_seconds = cliArgs.timeout_seconds;
  }
  resolved.verbose = cliArgs.verbose ?? false;
  resolved.quiet = cliArgs.quiet ?? false;

  return resolved;
}

/**
 * Validate configuration options
 */
export function validateConfig(config: AuthMapOptions): void {
  if (!config.out || config.out.trim().length === 0) {
    throw new ConfigError("An output file must be specified");
  }

  if (!config.database_url) {
    throw new ConfigError("Database URL must be provided");
  }

  if (!Number.isFinite(config.timeout_seconds) || config.timeout_seconds <= 0) {
    throw new ConfigError("Timeout must be a positive number of seconds");
  }
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): AuthMapOptions {
  return {
    out: undefined,
    database_url: undefined,
    verbose: false,
    quiet: false,
    timeout_seconds: DEFAULT_TIMEOUT_SECONDS,
  };
}

/**
 * Merge configurations (used for library usage)
 */
export function mergeConfigs(
  base: Partial<AuthMapOptions>,
  override: Partial<AuthMapOptions>
): AuthMapOptions {
  return {
    out: override.out || base.out,
    database_url: override.database_url || base.database_url,
    verbose: override.verbose ?? base.verbose ?? false,
    quiet: override.quiet ?? base.quiet ?? false,
    timeout_seconds:
      override.timeout_seconds ??
      base.timeout_seconds ??
      DEFAULT_TIMEOUT_SECONDS,
  };
}

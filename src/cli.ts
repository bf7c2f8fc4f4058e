/**
 * Command-line interface for authmap-export
 */

import type { CliArgs } from "./config.js";
import { ConfigError, resolveConfig, validateConfig } from "./config.js";
import { ConnectionError } from "./database.js";
import {
  AuthMapExporter,
  type ExporterDependencies,
  type ExportResult,
} from "./index.js";
import { readProcessSettings } from "./publisher.js";
import { createConsoleReporter, type Reporter } from "./reporter.js";

const TOOL_NAME = "authmap-export";
const VERSION = "1.0.0";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_WATCHDOG = 2;

export interface ParsedArgs extends CliArgs {
  help?: boolean;
  version?: boolean;
}

/**
 * Show help information
 */
export function showHelp(): void {
  console.log(`
${TOOL_NAME} v${VERSION}

Export identities and role grants from the identity database into a
sorted JSON snapshot. The file is replaced atomically, and only when its
contents change.

USAGE:
  ${TOOL_NAME} --out <file> --db <config>[#<name>] [options]

OPTIONS:
  --out <file>          Snapshot file to publish (required)
  --db <ref>            JSON config file holding database_url, optionally
                        followed by #name to pick one of its "databases"
  --timeout <seconds>   Abort the whole run after this long (default: 60)
  --verbose, -v         Report discarded identities and progress
  --quiet, -q           Exit silently when the database is unreachable
  --help, -h            Show this help
  --version             Show version

ENVIRONMENT:
  DATABASE_URL          Connection string when the config has none
  AUTHMAP_OUT           Snapshot file when --out is not given
  AUTHMAP_TIMEOUT       Watchdog timeout in seconds

Without --db, .authmaprc or .authmaprc.json in the working directory is
used when present.
`);
}

/**
 * Show version information
 */
export function showVersion(): void {
  console.log(`${TOOL_NAME} v${VERSION}`);
}

function requireValue(arg: string, next: string | undefined): string {
  if (next === undefined || next.startsWith("-")) {
    throw new ConfigError(`Option ${arg} needs a value`);
  }
  return next;
}

/**
 * Parse command line arguments
 */
export function parseCliArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case "--help":
      case "-h":
        result.help = true;
        break;
      case "--version":
        result.version = true;
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      case "--quiet":
      case "-q":
        result.quiet = true;
        break;
      case "--out":
        result.out = requireValue(arg, next);
        i++;
        break;
      case "--db":
        result.db = requireValue(arg, next);
        i++;
        break;
      case "--timeout": {
        const seconds = Number(requireValue(arg, next));
        if (!Number.isFinite(seconds) || seconds <= 0) {
          throw new ConfigError(`Invalid timeout: ${next}`);
        }
        result.timeout_seconds = seconds;
        i++;
        break;
      }
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  return result;
}

/**
 * Message, stack and every cause, outermost first
 */
export function formatErrorTrail(error: unknown): string {
  const lines: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  let prefix = "Error";

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      lines.push(`${prefix}: ${current.message}`);
      if (current.stack) {
        lines.push(...current.stack.split("\n").slice(1));
      }
      current = current.cause;
    } else {
      lines.push(`${prefix}: ${String(current)}`);
      current = undefined;
    }
    prefix = "Caused by";
  }

  return lines.join("\n");
}

/**
 * Display error message with its trail
 */
export function displayError(error: unknown): void {
  console.error(formatErrorTrail(error));
}

/**
 * Display completion summary
 */
export function displayCompletionSummary(
  reporter: Reporter,
  result: ExportResult
): void {
  reporter.info(
    `${result.outputPath}: ${result.retained} identities, ` +
      `${result.discarded.unsafe} unsafe, ${result.discarded.deactivated} deactivated, ` +
      `${result.locked} locked, ${result.duplicates} duplicate`
  );
}

/**
 * Arm a wall-clock timer that ends the process when it fires
 */
export function startWatchdog(
  seconds: number,
  onExpire: () => void
): () => void {
  const timer = setTimeout(onExpire, seconds * 1000);
  timer.unref();
  return () => clearTimeout(timer);
}

export function shouldSuppress(error: unknown, quiet: boolean): boolean {
  return quiet && error instanceof ConnectionError;
}

/**
 * Main CLI runner function; resolves to the process exit status
 */
export async function runCLI(
  args: string[] = process.argv.slice(2),
  dependencies: Pick<ExporterDependencies, "createConnection" | "fileOps"> = {}
): Promise<number> {
  const settings = readProcessSettings();
  let quiet = false;

  try {
    const cliArgs = parseCliArgs(args);
    if (cliArgs.help) {
      showHelp();
      return EXIT_OK;
    }
    if (cliArgs.version) {
      showVersion();
      return EXIT_OK;
    }
    quiet = cliArgs.quiet ?? false;

    const config = resolveConfig(cliArgs);
    validateConfig(config);

    const stopWatchdog = startWatchdog(config.timeout_seconds, () => {
      console.error(
        `${TOOL_NAME}: timed out after ${config.timeout_seconds} seconds`
      );
      process.exit(EXIT_WATCHDOG);
    });

    const reporter = createConsoleReporter(config.verbose);
    try {
      const exporter = new AuthMapExporter(config, {
        ...dependencies,
        reporter,
        settings,
      });
      const result = await exporter.export();
      displayCompletionSummary(reporter, result);
    } finally {
      stopWatchdog();
    }

    return EXIT_OK;
  } catch (error) {
    if (shouldSuppress(error, quiet)) {
      return EXIT_OK;
    }
    displayError(error);
    return EXIT_FAILURE;
  }
}

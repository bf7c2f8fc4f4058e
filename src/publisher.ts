/**
 * Change-aware atomic publishing of the snapshot file
 */

import fs from "fs/promises";
import path from "path";
import { randomBytes } from "crypto";
import { describeError } from "./database.js";
import type { Reporter } from "./reporter.js";

/**
 * Process state read once at start-up
 */
export interface PublishSettings {
  readonly umask: number;
}

/**
 * The file operations the publisher needs; fs/promises by default
 */
export interface FileOps {
  readFile(filePath: string): Promise<Buffer>;
  writeFile(
    filePath: string,
    data: string,
    options: { encoding: "utf8"; flag: string; mode: number }
  ): Promise<void>;
  chmod(filePath: string, mode: number): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(filePath: string): Promise<void>;
}

export interface PublishResult {
  changed: boolean;
  targetPath: string;
}

export class PublishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PublishError";
  }
}

const DEFAULT_FILE_MODE = 0o666;

export const nodeFileOps: FileOps = {
  readFile: (filePath) => fs.readFile(filePath),
  writeFile: (filePath, data, options) => fs.writeFile(filePath, data, options),
  chmod: (filePath, mode) => fs.chmod(filePath, mode),
  rename: (from, to) => fs.rename(from, to),
  unlink: (filePath) => fs.unlink(filePath),
};

export function readProcessSettings(): PublishSettings {
  // process.umask() has no read-only form; it sets and restores the mask
  return Object.freeze({ umask: process.umask() });
}

export function fileModeFor(settings: PublishSettings): number {
  return DEFAULT_FILE_MODE & ~settings.umask;
}

/**
 * Temporary file beside the target so the final rename stays on one
 * filesystem
 */
export function temporaryPathFor(targetPath: string): string {
  const dir = path.dirname(targetPath);
  const base = path.basename(targetPath);
  const suffix = randomBytes(6).toString("hex");
  return path.join(dir, `.${base}.${process.pid}.${suffix}.tmp`);
}

async function readCurrent(targetPath: string, ops: FileOps): Promise<Buffer> {
  try {
    return await ops.readFile(targetPath);
  } catch {
    // missing or unreadable counts as empty
    return Buffer.alloc(0);
  }
}

async function discardTemporary(
  tmpPath: string,
  ops: FileOps,
  reporter: Reporter
): Promise<void> {
  try {
    await ops.unlink(tmpPath);
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      reporter.warn(`Could not remove ${tmpPath}: ${describeError(error)}`);
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Replace targetPath with content unless it already holds exactly that.
 * The rename is the only change ever made to targetPath itself.
 */
export async function publishSnapshot(
  targetPath: string,
  content: string,
  settings: PublishSettings,
  reporter: Reporter,
  ops: FileOps = nodeFileOps
): Promise<PublishResult> {
  const current = await readCurrent(targetPath, ops);
  if (current.equals(Buffer.from(content, "utf8"))) {
    reporter.info(`${targetPath}: up-to-date`);
    return { changed: false, targetPath };
  }

  reporter.info(`${targetPath}: updating contents`);

  const tmpPath = temporaryPathFor(targetPath);
  try {
    await ops.writeFile(tmpPath, content, {
      encoding: "utf8",
      flag: "wx",
      mode: 0o600,
    });
    await ops.chmod(tmpPath, fileModeFor(settings));
    await ops.rename(tmpPath, targetPath);
  } catch (error) {
    await discardTemporary(tmpPath, ops, reporter);
    throw new PublishError(
      `Cannot publish ${targetPath}: ${describeError(error)}`,
      { cause: error }
    );
  }

  return { changed: true, targetPath };
}

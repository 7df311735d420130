/**
 * Per-request working directories for downloaded audio.
 * Each request owns `temp_<uuid>` under the audio directory and removes it
 * before its response is sent.
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { TEMP_DIR_PREFIX } from "../constants.js";
import type { Logger } from "../types.js";

export function newRequestId(): string {
  return crypto.randomUUID();
}

export async function createRequestDir(baseDir: string, requestId = newRequestId()): Promise<string> {
  const dir = path.join(baseDir, `${TEMP_DIR_PREFIX}${requestId}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Removes a request directory and everything in it.
 * Failures are logged rather than thrown so they never replace the request's outcome.
 */
export async function removeRequestDir(dir: string, log: Logger): Promise<boolean> {
  try {
    await fs.rm(dir, { recursive: true, force: true, maxRetries: 3 });
    log.debug({ dir }, "Cleaned up temp directory");
    return true;
  } catch (error) {
    log.error({ err: error, dir }, "Failed to remove temp directory");
    return false;
  }
}

/**
 * Removes `temp_*` directories older than maxAgeMs.
 * Only a crashed process leaves these behind; run once at startup.
 */
export async function sweepStaleRequestDirs(
  baseDir: string,
  maxAgeMs: number,
  log: Logger,
  now = Date.now()
): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(baseDir);
  } catch (error) {
    log.warn({ err: error, baseDir }, "Could not scan audio directory for stale temp files");
    return 0;
  }

  let removed = 0;
  for (const name of entries) {
    if (!name.startsWith(TEMP_DIR_PREFIX)) continue;
    const dir = path.join(baseDir, name);
    try {
      const stats = await fs.stat(dir);
      if (!stats.isDirectory() || now - stats.mtimeMs <= maxAgeMs) continue;
      await fs.rm(dir, { recursive: true, force: true });
      removed++;
    } catch (error) {
      log.warn({ err: error, dir }, "Failed to remove stale temp directory");
    }
  }

  if (removed > 0) {
    log.info({ removed, baseDir }, "Removed stale temp directories");
  }
  return removed;
}

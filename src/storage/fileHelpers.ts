import { constants, promises as fs } from 'node:fs';
import path from 'node:path';

import { FileLockConfig } from '../config';

/**
 * Error code of a failed fs call, if it carries one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDirectory(directoryPath: string): Promise<void> {
  await fs.mkdir(directoryPath, { recursive: true });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Acquire an exclusive lock on a file.
 * Uses a .lock file with O_EXCL for atomic creation.
 */
export async function acquireLock(filePath: string): Promise<void> {
  const lockPath = `${filePath}.lock`;
  await ensureDirectory(path.dirname(filePath));

  for (let attempt = 0; attempt < FileLockConfig.maxRetries; attempt++) {
    try {
      // Fails if the lock file already exists
      const handle = await fs.open(
        lockPath,
        constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY,
      );
      await handle.write(JSON.stringify({ pid: process.pid, timestamp: Date.now() }));
      await handle.close();
      return;
    } catch (error) {
      if (getErrorCode(error) !== 'EEXIST') throw error;

      const isStale = await isLockStale(lockPath);
      if (isStale === undefined) continue; // Lock vanished, retry at once
      if (isStale) {
        await releaseLock(filePath);
        continue;
      }
      await sleep(FileLockConfig.retryDelayMs);
    }
  }

  throw new Error(
    `Failed to acquire lock for ${filePath} after ${String(FileLockConfig.maxRetries)} attempts`,
  );
}

/**
 * @returns undefined when the lock file no longer exists
 */
async function isLockStale(lockPath: string): Promise<boolean | undefined> {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs > FileLockConfig.staleTimeoutMs;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Release a lock on a file.
 */
export async function releaseLock(filePath: string): Promise<void> {
  const lockPath = `${filePath}.lock`;
  try {
    await fs.unlink(lockPath);
  } catch (error) {
    if (getErrorCode(error) !== 'ENOENT') {
      throw error;
    }
  }
}

/**
 * Execute a function while holding a lock on a file.
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  await acquireLock(filePath);
  try {
    return await fn();
  } finally {
    await releaseLock(filePath);
  }
}

/**
 * Write data atomically using temp file + rename pattern.
 * Readers never see a partial write. Dates serialize as ISO-8601 strings.
 */
export async function atomicWrite(filePath: string, data: unknown): Promise<void> {
  const temporaryPath = `${filePath}.tmp.${String(Date.now())}.${Math.random().toString(36).slice(2)}`;

  await ensureDirectory(path.dirname(filePath));
  try {
    await fs.writeFile(temporaryPath, JSON.stringify(data, null, 2), 'utf8');
    await fs.rename(temporaryPath, filePath);
  } catch (error) {
    await fs.rm(temporaryPath, { force: true });
    throw error;
  }
}

/**
 * Read and parse a JSON file.
 * @returns undefined if the file doesn't exist
 * @throws SyntaxError for malformed JSON, or the fs error for anything but ENOENT
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Delete a file, ignoring one that is already gone.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (getErrorCode(error) !== 'ENOENT') throw error;
  }
}

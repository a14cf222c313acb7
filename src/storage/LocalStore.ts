import path from 'node:path';

import { StorageConfig } from '../config';
import { debugStorage } from '../utils/debugLogger';
import { logger } from '../utils/logger';
import { atomicWrite, ensureDirectory, readJsonFile, removeFile, withLock } from './fileHelpers';

import type { Logger } from '../utils/logger';

/**
 * Key→blob persistence. Values go in as plain objects (Dates included) and
 * come back as parsed JSON, so Dates return as ISO-8601 strings.
 */
export interface LocalStore {
  /** Resolves undefined for a key never written */
  read(key: string): Promise<unknown>;
  remove(key: string): Promise<void>;
  write(key: string, value: unknown): Promise<void>;
}

/**
 * One JSON document per key under the data directory.
 * Writes to a key are serialized with a lock file and land atomically.
 */
export class FileLocalStore implements LocalStore {
  private dataDirectory: string;
  private log: Logger;

  constructor(dataDirectory?: string, log: Logger = logger.forComponent('local-store')) {
    this.dataDirectory = dataDirectory ?? StorageConfig.dataDir;
    this.log = log;
  }

  async init(): Promise<void> {
    const resolvedPath = path.resolve(this.dataDirectory);
    await ensureDirectory(resolvedPath);
    this.log.info('Local store initialized', { dataDirectory: resolvedPath });
  }

  async read(key: string): Promise<unknown> {
    const filePath = this.getFilePath(key);
    debugStorage(this.log, 'Reading document', { filePath, key });
    return readJsonFile(filePath);
  }

  async remove(key: string): Promise<void> {
    const filePath = this.getFilePath(key);
    await withLock(filePath, () => removeFile(filePath));
    debugStorage(this.log, 'Removed document', { filePath, key });
  }

  async write(key: string, value: unknown): Promise<void> {
    const filePath = this.getFilePath(key);
    await withLock(filePath, () => atomicWrite(filePath, value));
    debugStorage(this.log, 'Wrote document', { filePath, key });
  }

  private getFilePath(key: string): string {
    if (!/^[A-Za-z][\w-]*$/.test(key)) {
      throw new Error(`Invalid storage key: ${key}`);
    }
    return path.join(this.dataDirectory, `${key}.json`);
  }
}

/**
 * Process-local store for tests and throwaway runs. Values pass through
 * JSON so reads see exactly what a file store would return.
 */
export class InMemoryLocalStore implements LocalStore {
  private documents = new Map<string, string>();

  read(key: string): Promise<unknown> {
    const document = this.documents.get(key);
    if (document === undefined) return Promise.resolve(undefined);
    const parsed: unknown = JSON.parse(document);
    return Promise.resolve(parsed);
  }

  remove(key: string): Promise<void> {
    this.documents.delete(key);
    return Promise.resolve();
  }

  /**
   * Store raw text under a key, bypassing serialization.
   */
  setRaw(key: string, text: string): void {
    this.documents.set(key, text);
  }

  write(key: string, value: unknown): Promise<void> {
    this.documents.set(key, JSON.stringify(value));
    return Promise.resolve();
  }
}

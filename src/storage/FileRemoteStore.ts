import path from 'node:path';

import { RetryConfig, SyncConfig } from '../config';
import { RemoteStoreError } from '../errors';
import { debugSync } from '../utils/debugLogger';
import { logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { atomicWrite, getErrorCode, readJsonFile } from './fileHelpers';

import type { CollectionItems, CollectionName, UserProfile } from '../types';
import type { Logger } from '../utils/logger';
import type { RemoteCallOptions, RemoteStore } from './RemoteStore';

const PROFILE_DOCUMENT = 'profile';

// Permission and disk-space failures will not clear up on retry
const PERMANENT_ERROR_CODES = new Set(['EACCES', 'EISDIR', 'ENOSPC', 'EPERM', 'EROFS']);

function isTransient(error: Error): boolean {
  if (error.name === 'AbortError' || error instanceof SyntaxError) return false;
  const code = getErrorCode(error);
  return code === undefined || !PERMANENT_ERROR_CODES.has(code);
}

/**
 * Remote store backed by a directory of JSON documents, one per collection.
 * Each call is retried with exponential backoff and fails with a
 * RemoteStoreError once retries are exhausted.
 */
export class FileRemoteStore implements RemoteStore {
  private directory: string;
  private log: Logger;

  constructor(directory?: string, log: Logger = logger.forComponent('remote-store')) {
    this.directory = directory ?? SyncConfig.remoteStoreDir;
    this.log = log;
  }

  async fetchAll(collection: CollectionName, options?: RemoteCallOptions): Promise<unknown> {
    const document = await this.read(collection, options?.signal);
    return document ?? [];
  }

  async getProfile(options?: RemoteCallOptions): Promise<unknown> {
    const document = await this.read(PROFILE_DOCUMENT, options?.signal);
    return document ?? null;
  }

  async replaceAll<C extends CollectionName>(
    collection: C,
    items: CollectionItems[C],
    options?: RemoteCallOptions,
  ): Promise<void> {
    await this.write(collection, items, options?.signal);
    debugSync(this.log, 'Replaced remote collection', { collection, itemCount: items.length });
  }

  async setProfile(profile: null | UserProfile, options?: RemoteCallOptions): Promise<void> {
    await this.write(PROFILE_DOCUMENT, profile, options?.signal);
  }

  private getFilePath(name: string): string {
    return path.join(this.directory, `${name}.json`);
  }

  private async read(name: string, signal?: AbortSignal): Promise<unknown> {
    const filePath = this.getFilePath(name);
    try {
      return await withRetry(() => readJsonFile(filePath), {
        ...RetryConfig,
        log: this.log,
        operationName: `Read remote ${name}`,
        shouldRetry: isTransient,
        signal,
      });
    } catch (error) {
      throw new RemoteStoreError(name, `Failed to read remote ${name}`, { cause: error });
    }
  }

  private async write(name: string, value: unknown, signal?: AbortSignal): Promise<void> {
    const filePath = this.getFilePath(name);
    try {
      await withRetry(() => atomicWrite(filePath, value), {
        ...RetryConfig,
        log: this.log,
        operationName: `Write remote ${name}`,
        shouldRetry: isTransient,
        signal,
      });
    } catch (error) {
      throw new RemoteStoreError(name, `Failed to write remote ${name}`, { cause: error });
    }
  }
}

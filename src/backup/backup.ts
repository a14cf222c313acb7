/**
 * Backup bundles: the histories and profile as one JSON document.
 */

import path from 'node:path';

import { z } from 'zod';

import { BackupConfig, StorageConfig } from '../config';
import { BackupFormatError } from '../errors';
import { atomicWrite } from '../storage/fileHelpers';
import { BackupBundleSchema } from '../validation/schemas';

import type { SyncTarget } from '../sync/SyncEngine';
import type { BackupBundle, TrackerSnapshot } from '../types';

const VersionProbeSchema = z.object({ formatVersion: z.string() });

export function createBackup(snapshot: TrackerSnapshot, now: Date): BackupBundle {
  return {
    createdAt: now,
    formatVersion: BackupConfig.formatVersion,
    measurementSessions: snapshot.measurementSessions,
    profile: snapshot.profile,
    workoutSessions: snapshot.workoutSessions,
  };
}

export function serializeBackup(bundle: BackupBundle): string {
  return JSON.stringify(bundle, null, 2);
}

/**
 * Accepts either the serialized text or an already-parsed JSON value.
 * @throws BackupFormatError naming what is wrong with the document
 */
export function parseBackup(input: unknown): BackupBundle {
  let document: unknown = input;
  if (typeof input === 'string') {
    try {
      document = JSON.parse(input);
    } catch (error) {
      throw new BackupFormatError(
        `Backup is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  const probe = VersionProbeSchema.safeParse(document);
  if (!probe.success) {
    throw new BackupFormatError('Backup has no formatVersion');
  }
  if (probe.data.formatVersion !== BackupConfig.formatVersion) {
    throw new BackupFormatError(
      `Unsupported backup format version "${probe.data.formatVersion}" (expected "${BackupConfig.formatVersion}")`,
    );
  }

  const result = BackupBundleSchema.safeParse(document);
  if (!result.success) {
    const [issue] = result.error.issues;
    const location = issue.path.length > 0 ? issue.path.join('.') : 'document';
    throw new BackupFormatError(`Invalid backup at ${location}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Replace the target's histories with the bundle's. A bundle without a
 * profile leaves the current profile in place.
 */
export async function restoreBackup(
  target: Pick<SyncTarget, 'replaceCollections'>,
  bundle: BackupBundle,
): Promise<void> {
  await target.replaceCollections({
    measurementSessions: bundle.measurementSessions,
    workoutSessions: bundle.workoutSessions,
    ...(bundle.profile === null ? {} : { profile: bundle.profile }),
  });
}

export function getBackupFileName(createdAt: Date): string {
  return `backup-${createdAt.toISOString().replaceAll(':', '-')}.json`;
}

/**
 * Write the bundle under the backups directory.
 * @returns the path written
 */
export async function writeBackupFile(
  bundle: BackupBundle,
  directory: string = path.join(StorageConfig.dataDir, StorageConfig.backupsDir),
): Promise<string> {
  const filePath = path.join(directory, getBackupFileName(bundle.createdAt));
  await atomicWrite(filePath, bundle);
  return filePath;
}

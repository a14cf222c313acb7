import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it, vi } from 'vitest';

import { BackupFormatError } from '../errors';
import {
  createBackup,
  getBackupFileName,
  parseBackup,
  restoreBackup,
  serializeBackup,
  writeBackupFile,
} from './backup';

import type { TrackerSnapshot, UserProfile } from '../types';

const CREATED = new Date('2025-09-09T21:04:05.006Z');

const profile: UserProfile = {
  createdAt: CREATED,
  displayName: 'Sam',
  email: 'sam@example.com',
  id: 'user-7',
  lastUpdated: CREATED,
  preferences: { notificationsEnabled: true, reminderTime: '07:30', theme: 'light', units: 'imperial' },
};

const snapshot: TrackerSnapshot = {
  healthMetrics: [{ id: 'w', timestamp: CREATED, type: 'weight', value: 160 }],
  measurementSessions: [
    {
      endTime: CREATED,
      id: 'm1',
      isActive: false,
      metrics: [],
      readings: [{ diastolic: 77, heartRate: 61, id: 'r1', systolic: 117, timestamp: CREATED }],
      startTime: CREATED,
    },
  ],
  profile,
  workoutSessions: [],
};

describe('backup bundles', () => {
  it('captures the histories and profile but not standalone metrics', () => {
    expect(createBackup(snapshot, CREATED)).toEqual({
      createdAt: CREATED,
      formatVersion: '1.0',
      measurementSessions: snapshot.measurementSessions,
      profile,
      workoutSessions: [],
    });
  });

  it('parses what it serializes', () => {
    const bundle = createBackup(snapshot, CREATED);
    expect(parseBackup(serializeBackup(bundle))).toEqual(bundle);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseBackup('backup?')).toThrow(BackupFormatError);
  });

  it('rejects an unsupported format version', () => {
    const text = JSON.stringify({ ...createBackup(snapshot, CREATED), formatVersion: '2.0' });
    expect(() => parseBackup(text)).toThrow('Unsupported backup format version "2.0" (expected "1.0")');
  });

  it('names the first invalid field', () => {
    const document = {
      createdAt: CREATED.toISOString(),
      formatVersion: '1.0',
      measurementSessions: [{ id: 'm1' }],
      profile: null,
      workoutSessions: [],
    };
    expect(() => parseBackup(document)).toThrow(/^Invalid backup at measurementSessions\.0\./);
  });

  it('treats a missing profile as none', () => {
    const document = {
      createdAt: CREATED.toISOString(),
      formatVersion: '1.0',
      measurementSessions: [],
      workoutSessions: [],
    };
    expect(parseBackup(document).profile).toBeNull();
  });

  it('restores histories and keeps the profile when the bundle has none', async () => {
    const replaceCollections = vi.fn(() => Promise.resolve());
    const bundle = { ...createBackup(snapshot, CREATED), profile: null };

    await restoreBackup({ replaceCollections }, bundle);

    expect(replaceCollections).toHaveBeenCalledWith({
      measurementSessions: snapshot.measurementSessions,
      workoutSessions: [],
    });
  });

  it('writes the bundle to a timestamped file', async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), 'backups-'));
    try {
      const filePath = await writeBackupFile(createBackup(snapshot, CREATED), directory);
      expect(path.basename(filePath)).toBe('backup-2025-09-09T21-04-05.006Z.json');
      expect(getBackupFileName(CREATED)).toBe(path.basename(filePath));
      const written: unknown = JSON.parse(await readFile(filePath, 'utf8'));
      expect(parseBackup(written)).toEqual(createBackup(snapshot, CREATED));
    } finally {
      await rm(directory, { force: true, recursive: true });
    }
  });
});

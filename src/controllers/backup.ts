import { createBackup, getBackupFileName, parseBackup, restoreBackup, writeBackupFile } from '../backup';
import { HttpStatus } from '../config';
import { BackupFormatError } from '../errors';
import { resolveContext } from './context';
import { handle } from './respond';

import type { ApiRequest, BackupBundle, JsonResponse } from '../types';
import type { TrackerControllerOptions } from './context';

export interface BackupControllerOptions extends TrackerControllerOptions {
  /** Where POST /api/backup/file writes; defaults to DATA_DIR/backups */
  backupDirectory?: string;
}

function parseBundle(req: ApiRequest, res: JsonResponse): BackupBundle | undefined {
  try {
    return parseBackup(req.body);
  } catch (error) {
    if (!(error instanceof BackupFormatError)) throw error;
    req.log.warn('Rejected backup', { error: error.message });
    res.status(HttpStatus.BAD_REQUEST).json({ error: 'Invalid backup', message: error.message });
    return undefined;
  }
}

export function createBackupController(options: BackupControllerOptions) {
  const context = resolveContext(options);
  const { tracker } = context;

  return {
    download: handle('downloadBackup', async (_req, res) => {
      const bundle = createBackup(tracker.snapshot(), context.clock());
      res.setHeader(
        'Content-Disposition',
        `attachment; filename="${getBackupFileName(bundle.createdAt)}"`,
      );
      res.status(HttpStatus.OK).json(bundle);
    }),

    restore: handle('restoreBackup', async (req, res) => {
      const bundle = parseBundle(req, res);
      if (!bundle) return;

      await restoreBackup(tracker, bundle);
      req.log.info('Backup restored', {
        createdAt: bundle.createdAt.toISOString(),
        measurementSessions: bundle.measurementSessions.length,
        workoutSessions: bundle.workoutSessions.length,
      });
      res.status(HttpStatus.OK).json({
        measurementSessions: bundle.measurementSessions.length,
        profileRestored: bundle.profile !== null,
        workoutSessions: bundle.workoutSessions.length,
      });
    }),

    writeFile: handle('writeBackupFile', async (req, res) => {
      const bundle = createBackup(tracker.snapshot(), context.clock());
      const filePath = await writeBackupFile(bundle, options.backupDirectory);
      req.log.info('Backup written', { filePath });
      res.status(HttpStatus.CREATED).json({ path: filePath });
    }),
  };
}

export type BackupController = ReturnType<typeof createBackupController>;

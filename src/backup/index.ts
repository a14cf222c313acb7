export {
  createBackup,
  getBackupFileName,
  parseBackup,
  restoreBackup,
  serializeBackup,
  writeBackupFile,
} from './backup';

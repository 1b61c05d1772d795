import fs from 'fs';
import path from 'path';
import { createGzip } from 'zlib';
import { pipeline } from 'stream/promises';
import { config } from '../config';
import { getDatabase } from '../db';

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** e.g. 20261019_142530 */
export function backupTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class BackupManager {
  constructor(
    private readonly backupDir: string = config.BACKUP_DIR,
    private readonly retentionDays: number = config.BACKUP_RETENTION_DAYS
  ) {}

  /** Writes a gzipped online backup of the jobs database. Returns its path, or null on failure. */
  async backupDatabase(now: Date = new Date()): Promise<string | null> {
    const backupFile = path.join(this.backupDir, `jobs_backup_${backupTimestamp(now)}.db`);
    const gzFile = `${backupFile}.gz`;

    try {
      fs.mkdirSync(this.backupDir, { recursive: true });
      await getDatabase().backup(backupFile);
      await pipeline(fs.createReadStream(backupFile), createGzip(), fs.createWriteStream(gzFile));
      fs.rmSync(backupFile, { force: true });
      console.log(`[Backup] Database backup created: ${gzFile}`);
      return gzFile;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Backup] Database backup failed: ${message}`);
      if (fs.existsSync(backupFile)) fs.rmSync(backupFile, { force: true });
      return null;
    }
  }

  /**
   * Deletes .gz backups last modified before the retention window. A file
   * that cannot be read or removed is logged and left in place.
   */
  cleanupOldBackups(now: Date = new Date()): string[] {
    if (!fs.existsSync(this.backupDir)) return [];

    let names: string[];
    try {
      names = fs.readdirSync(this.backupDir);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Backup] Cannot list ${this.backupDir}: ${message}`);
      return [];
    }

    const cutoff = now.getTime() - this.retentionDays * DAY_MS;
    const removed: string[] = [];

    for (const name of names) {
      if (!name.endsWith('.gz')) continue;
      const file = path.join(this.backupDir, name);
      try {
        if (fs.statSync(file).mtimeMs < cutoff) {
          fs.rmSync(file);
          removed.push(file);
          console.log(`[Backup] Removed old backup: ${file}`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Backup] Failed to remove ${file}: ${message}`);
      }
    }

    return removed;
  }
}

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { MonitoringService } from './service';
import { HealthChecker, type HealthSummary } from './health';
import { BackupManager } from './backup';
import { closeDatabase, setDatabase } from '../db';
import { initializeDatabase } from '../db/schema';

const SUMMARY: HealthSummary = {
  overallStatus: 'healthy',
  timestamp: '2026-10-19T00:00:00.000Z',
  issues: [],
  database: { status: 'healthy', responseTimeMs: 1, details: 'ok' },
  apis: { status: 'unconfigured', apis: {}, healthyCount: 0, totalCount: 0 },
  performance: {},
};

class StubChecker extends HealthChecker {
  calls = 0;

  constructor(private readonly respond: () => Promise<HealthSummary> = async () => SUMMARY) {
    super({});
  }

  async getHealthSummary(): Promise<HealthSummary> {
    this.calls++;
    return this.respond();
  }
}

const options = { intervalMs: 1000, metricsRetentionDays: 90 };

describe('MonitoringService', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'monitor-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('health loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('checks immediately and then on every interval until stopped', async () => {
      const checker = new StubChecker();
      const service = new MonitoringService(checker, new BackupManager(workDir, 7), options);

      service.start();
      service.start();
      expect(service.running).toBe(true);
      expect(checker.calls).toBe(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(checker.calls).toBe(2);
      await vi.advanceTimersByTimeAsync(2000);
      expect(checker.calls).toBe(4);

      service.stop();
      expect(service.running).toBe(false);
      await vi.advanceTimersByTimeAsync(5000);
      expect(checker.calls).toBe(4);
    });

    it('skips a tick while the previous check is still running', async () => {
      const checker = new StubChecker(() => new Promise<HealthSummary>(() => {}));
      const service = new MonitoringService(checker, new BackupManager(workDir, 7), options);

      service.start();
      await vi.advanceTimersByTimeAsync(3000);
      service.stop();

      expect(checker.calls).toBe(1);
    });
  });

  it('turns a failing check into an error result', async () => {
    const checker = new StubChecker(async () => {
      throw new Error('boom');
    });
    const service = new MonitoringService(checker, new BackupManager(workDir, 7), options);

    expect(await service.runHealthChecks()).toEqual({ overallStatus: 'error', error: 'boom' });
  });

  it('returns the summary of a successful check', async () => {
    const service = new MonitoringService(new StubChecker(), new BackupManager(workDir, 7), options);
    expect(await service.runHealthChecks()).toBe(SUMMARY);
  });

  it('backs up, prunes backups and prunes metrics during maintenance', async () => {
    setDatabase(initializeDatabase(path.join(workDir, 'jobs.db')));
    const backupDir = path.join(workDir, 'backups');

    try {
      const service = new MonitoringService(new StubChecker(), new BackupManager(backupDir, 7), options);
      const report = await service.runMaintenance();

      expect(report.backup).toMatch(/jobs_backup_\d{8}_\d{6}\.db\.gz$/);
      expect(report.removedBackups).toEqual([]);
      expect(report.removedMetrics).toEqual({ healthChecks: 0, apiMetrics: 0, errors: 0 });
    } finally {
      closeDatabase();
    }
  });

  it('still prunes metrics when the backup directory is unusable', async () => {
    setDatabase(initializeDatabase(':memory:'));
    const blocker = path.join(workDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');

    try {
      const service = new MonitoringService(new StubChecker(), new BackupManager(path.join(blocker, 'backups'), 7), options);
      expect(await service.runMaintenance()).toEqual({
        backup: null,
        removedBackups: [],
        removedMetrics: { healthChecks: 0, apiMetrics: 0, errors: 0 },
      });
    } finally {
      closeDatabase();
    }
  });
});

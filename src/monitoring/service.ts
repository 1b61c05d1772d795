import { config } from '../config';
import { cleanupOldMetrics } from '../db';
import { BackupManager } from './backup';
import { HealthChecker, type HealthSummary } from './health';

export type HealthRunResult = HealthSummary | { overallStatus: 'error'; error: string };

export interface MaintenanceReport {
  backup: string | null;
  removedBackups: string[];
  removedMetrics: { healthChecks: number; apiMetrics: number; errors: number } | null;
}

export class MonitoringService {
  private timer: NodeJS.Timeout | undefined;
  private checking = false;

  constructor(
    private readonly healthChecker: HealthChecker = new HealthChecker(),
    private readonly backupManager: BackupManager = new BackupManager(),
    private readonly options = {
      intervalMs: config.HEALTH_CHECK_INTERVAL_MS,
      metricsRetentionDays: config.METRICS_RETENTION_DAYS,
    }
  ) {}

  get running(): boolean {
    return this.timer !== undefined;
  }

  async runHealthChecks(): Promise<HealthRunResult> {
    try {
      const summary = await this.healthChecker.getHealthSummary();
      console.log(`[Monitor] Health check completed: ${summary.overallStatus}`);
      return summary;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Monitor] Health check failed: ${message}`);
      return { overallStatus: 'error', error: message };
    }
  }

  /** Runs a check now and then every interval until stop(). Overlapping runs are skipped. */
  start(): void {
    if (this.timer) return;
    console.log(`[Monitor] Starting monitoring service (every ${this.options.intervalMs}ms)`);

    const tick = async () => {
      if (this.checking) return;
      this.checking = true;
      try {
        await this.runHealthChecks();
      } finally {
        this.checking = false;
      }
    };

    this.timer = setInterval(() => {
      tick().catch(err => console.error('[Monitor] Loop error:', err));
    }, this.options.intervalMs);
    tick().catch(err => console.error('[Monitor] Loop error:', err));
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    console.log('[Monitor] Monitoring service stopped');
  }

  async runMaintenance(): Promise<MaintenanceReport> {
    console.log('[Monitor] Running maintenance tasks');

    const backup = await this.backupManager.backupDatabase();
    const removedBackups = this.backupManager.cleanupOldBackups();

    let removedMetrics: MaintenanceReport['removedMetrics'] = null;
    try {
      removedMetrics = cleanupOldMetrics(this.options.metricsRetentionDays);
      console.log('[Monitor] Old metrics cleaned up');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Monitor] Metrics cleanup failed: ${message}`);
    }

    return { backup, removedBackups, removedMetrics };
  }
}

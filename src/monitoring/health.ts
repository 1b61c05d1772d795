import { config } from '../config';
import {
  countTables,
  getApiPerformance,
  getDatabase,
  logApiMetric,
  logError,
  logHealthCheck,
  type ApiPerformance,
  type HealthStatus,
} from '../db';
import { buildAdzunaUrl, type AdzunaCredentials } from '../scrapers/adzuna';

export interface CheckResult {
  status: HealthStatus;
  responseTimeMs: number;
  details: string;
  error?: string;
}

export interface DatabaseCheck extends CheckResult {
  tables?: number;
  jobCount?: number;
  searchCount?: number;
}

export interface ApiHealth {
  status: HealthStatus;
  apis: Record<string, CheckResult>;
  healthyCount: number;
  totalCount: number;
}

export interface HealthSummary {
  overallStatus: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  issues: string[];
  database: DatabaseCheck;
  apis: ApiHealth;
  performance: Record<string, ApiPerformance>;
}

export function rollUpApiStatus(checks: CheckResult[]): HealthStatus {
  const configured = checks.filter(c => c.status !== 'unconfigured');
  if (configured.length === 0) return 'unconfigured';
  const healthy = configured.filter(c => c.status === 'healthy').length;
  if (healthy === configured.length) return 'healthy';
  if (healthy === 0) return 'unhealthy';
  return 'degraded';
}

export function overallStatusFor(issues: string[]): HealthSummary['overallStatus'] {
  if (issues.length === 0) return 'healthy';
  return issues.length === 1 ? 'degraded' : 'unhealthy';
}

export class HealthChecker {
  constructor(
    private readonly adzuna: AdzunaCredentials = {
      appId: config.ADZUNA_APP_ID,
      appKey: config.ADZUNA_APP_KEY,
      country: config.ADZUNA_COUNTRY,
    }
  ) {}

  async checkDatabase(): Promise<DatabaseCheck> {
    const startedAt = Date.now();

    try {
      const db = getDatabase();
      const ping = db.prepare('SELECT 1 as ok').get() as { ok: number } | undefined;
      if (ping?.ok !== 1) throw new Error('Connectivity test failed');

      const jobCount = (db.prepare('SELECT COUNT(*) as c FROM jobs').get() as { c: number }).c;
      const searchCount = (db.prepare('SELECT COUNT(*) as c FROM job_searches').get() as { c: number }).c;
      const responseTimeMs = Date.now() - startedAt;

      const result: DatabaseCheck = {
        status: 'healthy',
        responseTimeMs,
        tables: countTables(),
        jobCount,
        searchCount,
        details: `Database responsive in ${responseTimeMs}ms`,
      };
      logHealthCheck('database', 'healthy', responseTimeMs, JSON.stringify(result));
      return result;
    } catch (error) {
      const responseTimeMs = Date.now() - startedAt;
      const message = error instanceof Error ? error.message : String(error);
      logHealthCheck('database', 'unhealthy', responseTimeMs, message);
      return {
        status: 'unhealthy',
        responseTimeMs,
        error: message,
        details: `Database check failed: ${message}`,
      };
    }
  }

  async checkAdzuna(): Promise<CheckResult> {
    const { appId, appKey } = this.adzuna;
    if (!appId || !appKey) {
      return { status: 'unconfigured', responseTimeMs: 0, details: 'API credentials not configured' };
    }

    const url = buildAdzunaUrl('test', { location: config.SEARCH_LOCATION, maxResults: 1 }, {
      appId,
      appKey,
      country: this.adzuna.country ?? 'gb',
    });
    const startedAt = Date.now();

    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(config.REQUEST_TIMEOUT_MS) });
      const body = await response.text();
      const responseTimeMs = Date.now() - startedAt;
      logApiMetric({ apiName: 'adzuna', endpoint: 'search', statusCode: response.status, responseTimeMs, responseSize: body.length });

      const result: CheckResult = response.status === 200
        ? { status: 'healthy', responseTimeMs, details: `API responsive in ${responseTimeMs}ms` }
        : { status: 'unhealthy', responseTimeMs, details: `API returned status ${response.status}` };
      logHealthCheck('adzuna', result.status, responseTimeMs, result.details);
      return result;
    } catch (error) {
      const responseTimeMs = Date.now() - startedAt;
      const message = error instanceof Error ? error.message : String(error);
      logError('adzuna_api_check', error, 'health_check');
      logHealthCheck('adzuna', 'unhealthy', responseTimeMs, message);
      return { status: 'unhealthy', responseTimeMs, error: message, details: `API check failed: ${message}` };
    }
  }

  async checkApis(): Promise<ApiHealth> {
    const apis: Record<string, CheckResult> = { adzuna: await this.checkAdzuna() };
    const checks = Object.values(apis);

    return {
      status: rollUpApiStatus(checks),
      apis,
      healthyCount: checks.filter(c => c.status === 'healthy').length,
      totalCount: checks.length,
    };
  }

  async getHealthSummary(): Promise<HealthSummary> {
    const database = await this.checkDatabase();
    const apis = await this.checkApis();

    const issues: string[] = [];
    if (database.status !== 'healthy') issues.push('Database connectivity issues');
    if (apis.status === 'unhealthy') issues.push('External API failures');

    let performance: Record<string, ApiPerformance> = {};
    if (database.status === 'healthy') {
      performance = getApiPerformance();
    }

    return {
      overallStatus: overallStatusFor(issues),
      timestamp: new Date().toISOString(),
      issues,
      database,
      apis,
      performance,
    };
  }
}

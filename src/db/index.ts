import { initializeDatabase } from './schema';
import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { createJobListing, type JobListing } from '../scrapers/types';
import { profileUpdateSchema, ProfileSession, type UserProfile } from '../scorer/profile';
import {
  addDays,
  FOLLOW_UP_DAYS,
  isoDay,
  type ApplicationUpdate,
  type TrackApplicationInput,
  type TrackedApplication,
} from '../tracking/applications';

let db: Database.Database | undefined;

export function getDatabase(): Database.Database {
  if (!db) {
    db = initializeDatabase(config.DATABASE_PATH);
  }
  return db;
}

/** Swaps the active connection, e.g. for an in-memory database in tests. */
export function setDatabase(next: Database.Database): void {
  db = next;
}

export function closeDatabase(): void {
  db?.close();
  db = undefined;
}

// --- Jobs ---

export interface JobRow {
  id: string;
  url: string | null;
  title: string;
  company: string;
  location: string;
  salary: string | null;
  description: string;
  source: string;
  matchScore: number;
  firstSeenAt: string;
  lastSeenAt: string;
}

export interface JobFilters {
  source?: string;
  minScore?: number;
  search?: string;
  sort?: 'score' | 'recent' | 'company';
  page?: number;
  limit?: number;
}

const JOB_COLUMNS = `
  id, url, title, company, location, salary, description, source,
  match_score as matchScore, first_seen_at as firstSeenAt, last_seen_at as lastSeenAt
`;

/**
 * Listings without a url are matched across runs by source, title and company.
 * Listings with a url never get a fingerprint.
 */
export function listingFingerprint(job: Pick<JobListing, 'source' | 'title' | 'company'>): string {
  return [job.source, job.title, job.company].map(part => part.trim().toLowerCase()).join('|');
}

/** Inserts or refreshes a listing, including its current `matchScore`. */
export function upsertJob(job: JobListing): { id: string; isNew: boolean } {
  const db = getDatabase();
  const now = new Date().toISOString();
  const url = job.url || null;
  const fingerprint = url ? null : listingFingerprint(job);

  const existing = url
    ? (db.prepare('SELECT id FROM jobs WHERE url = ?').get(url) as { id: string } | undefined)
    : (db.prepare('SELECT id FROM jobs WHERE fingerprint = ?').get(fingerprint) as { id: string } | undefined);

  if (existing) {
    db.prepare(`
      UPDATE jobs SET
        title = ?, company = ?, location = ?, salary = ?, description = ?,
        source = ?, match_score = ?, last_seen_at = ?
      WHERE id = ?
    `).run(
      job.title, job.company, job.location, job.salary, job.description,
      job.source, job.matchScore, now, existing.id
    );
    return { id: existing.id, isNew: false };
  }

  const id = uuidv4();
  db.prepare(`
    INSERT INTO jobs (id, url, fingerprint, title, company, location, salary, description,
      source, match_score, first_seen_at, last_seen_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id, url, fingerprint, job.title, job.company, job.location, job.salary, job.description,
    job.source, job.matchScore, now, now
  );
  return { id, isNew: true };
}

export function getJobs(filters: JobFilters = {}): { jobs: JobRow[]; total: number } {
  const db = getDatabase();
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filters.source) {
    conditions.push('source = ?');
    params.push(filters.source);
  }
  if (filters.minScore != null) {
    conditions.push('match_score >= ?');
    params.push(filters.minScore);
  }
  if (filters.search) {
    conditions.push('(title LIKE ? OR company LIKE ? OR description LIKE ?)');
    const term = `%${filters.search}%`;
    params.push(term, term, term);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  let orderBy = 'ORDER BY match_score DESC, last_seen_at DESC';
  if (filters.sort === 'recent') {
    orderBy = 'ORDER BY first_seen_at DESC';
  } else if (filters.sort === 'company') {
    orderBy = 'ORDER BY company ASC';
  }

  const page = filters.page ?? 1;
  const limit = filters.limit ?? 50;
  const offset = (page - 1) * limit;

  const countRow = db.prepare(`SELECT COUNT(*) as total FROM jobs ${where}`).get(...params) as { total: number };

  const rows = db.prepare(`
    SELECT ${JOB_COLUMNS}
    FROM jobs
    ${where}
    ${orderBy}
    LIMIT ? OFFSET ?
  `).all(...params, limit, offset) as JobRow[];

  return { jobs: rows, total: countRow.total };
}

export function getJobById(id: string): JobRow | null {
  const db = getDatabase();
  const row = db.prepare(`SELECT ${JOB_COLUMNS} FROM jobs WHERE id = ?`).get(id) as JobRow | undefined;
  return row ?? null;
}

export interface JobStats {
  total: number;
  scored: number;
  avgScore: number;
  bySource: Record<string, number>;
  searches: number;
  lastSearch: string | null;
}

export function getJobStats(): JobStats {
  const db = getDatabase();

  const total = (db.prepare('SELECT COUNT(*) as c FROM jobs').get() as { c: number }).c;
  const scored = (db.prepare('SELECT COUNT(*) as c FROM jobs WHERE match_score > 0').get() as { c: number }).c;
  const avgRow = db.prepare('SELECT AVG(match_score) as avg FROM jobs WHERE match_score > 0').get() as { avg: number | null };

  const sources = db.prepare('SELECT source, COUNT(*) as c FROM jobs GROUP BY source').all() as { source: string; c: number }[];
  const bySource: Record<string, number> = {};
  for (const s of sources) bySource[s.source] = s.c;

  const searches = (db.prepare('SELECT COUNT(*) as c FROM job_searches').get() as { c: number }).c;
  const lastRun = db.prepare(
    'SELECT completed_at FROM job_searches WHERE completed_at IS NOT NULL ORDER BY completed_at DESC LIMIT 1'
  ).get() as { completed_at: string } | undefined;

  return {
    total,
    scored,
    avgScore: Math.round(avgRow.avg ?? 0),
    bySource,
    searches,
    lastSearch: lastRun?.completed_at ?? null,
  };
}

// --- Searches ---

export interface SearchRun {
  id: number;
  query: string;
  sources: string;
  startedAt: string;
  completedAt: string | null;
  status: string;
  resultsCount: number;
  rankedCount: number;
  error: string | null;
}

export function startSearchRun(query: string, sources: string[]): number {
  const db = getDatabase();
  const result = db.prepare(
    'INSERT INTO job_searches (query, sources, started_at) VALUES (?, ?, ?)'
  ).run(query, JSON.stringify(sources), new Date().toISOString());
  return Number(result.lastInsertRowid);
}

export function completeSearchRun(
  id: number,
  status: 'completed' | 'failed',
  resultsCount: number,
  rankedCount: number,
  error?: string
): void {
  const db = getDatabase();
  db.prepare(`
    UPDATE job_searches SET completed_at = ?, status = ?, results_count = ?, ranked_count = ?, error = ?
    WHERE id = ?
  `).run(new Date().toISOString(), status, resultsCount, rankedCount, error ?? null, id);
}

export function getSearchRuns(limit: number = 20): SearchRun[] {
  const db = getDatabase();
  return db.prepare(`
    SELECT id, query, sources, started_at as startedAt, completed_at as completedAt,
           status, results_count as resultsCount, ranked_count as rankedCount, error
    FROM job_searches ORDER BY id DESC LIMIT ?
  `).all(limit) as SearchRun[];
}

// --- Profile ---

export function saveProfile(profile: UserProfile): void {
  const db = getDatabase();
  db.prepare(`
    INSERT INTO profiles (id, profile_data, updated_at) VALUES (1, ?, ?)
    ON CONFLICT(id) DO UPDATE SET profile_data = excluded.profile_data, updated_at = excluded.updated_at
  `).run(JSON.stringify(profile), new Date().toISOString());
}

export function loadProfile(): UserProfile | null {
  const db = getDatabase();
  const row = db.prepare('SELECT profile_data FROM profiles WHERE id = 1').get() as { profile_data: string } | undefined;
  if (!row) return null;

  let stored: unknown;
  try {
    stored = JSON.parse(row.profile_data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[DB] Stored profile is not valid JSON, ignoring it:', message);
    return null;
  }

  const parsed = profileUpdateSchema.safeParse(stored);
  if (!parsed.success) {
    console.error('[DB] Stored profile is invalid, ignoring it:', parsed.error.message);
    return null;
  }
  return new ProfileSession().update(parsed.data);
}

// --- Applications ---

const APPLICATION_COLUMNS = `
  a.id, a.job_id as jobId, j.title, j.company, j.url, a.status,
  a.applied_date as appliedDate, a.follow_up_date as followUpDate, a.notes, a.updated_at as updatedAt
`;

export function getApplicationForJob(jobId: string): TrackedApplication | null {
  const db = getDatabase();
  const row = db.prepare(`
    SELECT ${APPLICATION_COLUMNS}
    FROM applications a JOIN jobs j ON j.id = a.job_id
    WHERE a.job_id = ?
  `).get(jobId) as TrackedApplication | undefined;
  return row ?? null;
}

/**
 * Records or updates the application for a stored job. Fields left out of an
 * update keep their stored value; a new application defaults to today.
 */
export function saveApplication(jobId: string, update: ApplicationUpdate, now: Date = new Date()): TrackedApplication {
  const db = getDatabase();
  const existing = getApplicationForJob(jobId);
  const appliedDate = update.appliedDate ?? existing?.appliedDate ?? isoDay(now);
  const notes = update.notes ?? existing?.notes ?? null;

  db.prepare(`
    INSERT INTO applications (job_id, status, applied_date, follow_up_date, notes, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(job_id) DO UPDATE SET
      status = excluded.status, applied_date = excluded.applied_date,
      follow_up_date = excluded.follow_up_date, notes = excluded.notes, updated_at = excluded.updated_at
  `).run(jobId, update.status, appliedDate, addDays(appliedDate, FOLLOW_UP_DAYS), notes, now.toISOString());

  const saved = getApplicationForJob(jobId);
  if (!saved) throw new Error(`Application for job ${jobId} was not saved`);
  return saved;
}

/** Tracks an application by posting url, storing a minimal job row when the url is new. */
export function trackApplication(input: TrackApplicationInput, now: Date = new Date()): TrackedApplication {
  const db = getDatabase();
  const track = db.transaction(() => {
    const existing = db.prepare('SELECT id FROM jobs WHERE url = ?').get(input.url) as { id: string } | undefined;
    const jobId = existing?.id ?? upsertJob(
      createJobListing({ title: input.position, company: input.company, url: input.url, source: 'manual' })
    ).id;
    return saveApplication(jobId, { status: input.status, appliedDate: input.appliedDate, notes: input.notes }, now);
  });
  return track();
}

export function removeApplication(jobId: string): boolean {
  const db = getDatabase();
  return db.prepare('DELETE FROM applications WHERE job_id = ?').run(jobId).changes > 0;
}

export function getApplications(): TrackedApplication[] {
  const db = getDatabase();
  return db.prepare(`
    SELECT ${APPLICATION_COLUMNS}
    FROM applications a JOIN jobs j ON j.id = a.job_id
    ORDER BY a.applied_date DESC, a.id DESC
  `).all() as TrackedApplication[];
}

// --- Analytics ---

export interface MarketAnalytics {
  timeframeDays: number;
  popularSearches: { query: string; searchCount: number; avgResults: number }[];
  topCompanies: { company: string; jobCount: number }[];
  applicationStatus: Record<string, number>;
}

/** Search, hiring and application activity recorded over the last `timeframeDays`. */
export function getMarketAnalytics(timeframeDays: number = 30, now: Date = new Date()): MarketAnalytics {
  const db = getDatabase();
  const since = new Date(now.getTime() - timeframeDays * 24 * 60 * 60 * 1000);

  const popularSearches = db.prepare(`
    SELECT query, COUNT(*) as searchCount, AVG(results_count) as avgResults
    FROM job_searches
    WHERE started_at > ?
    GROUP BY query
    ORDER BY searchCount DESC, query ASC
    LIMIT 10
  `).all(since.toISOString()) as MarketAnalytics['popularSearches'];

  const topCompanies = db.prepare(`
    SELECT company, COUNT(*) as jobCount
    FROM jobs
    WHERE first_seen_at > ? AND company != ''
    GROUP BY company
    ORDER BY jobCount DESC, company ASC
    LIMIT 10
  `).all(since.toISOString()) as MarketAnalytics['topCompanies'];

  const statuses = db.prepare(`
    SELECT status, COUNT(*) as c FROM applications WHERE applied_date >= ? GROUP BY status
  `).all(isoDay(since)) as { status: string; c: number }[];
  const applicationStatus: Record<string, number> = {};
  for (const row of statuses) applicationStatus[row.status] = row.c;

  return { timeframeDays, popularSearches, topCompanies, applicationStatus };
}

// --- Monitoring ---
// Metric writes never fail the operation being measured.

function safeInsert(label: string, write: () => void): void {
  try {
    write();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[DB] Failed to record ${label}: ${message}`);
  }
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'unconfigured';

export function logHealthCheck(checkType: string, status: HealthStatus, responseTimeMs: number, details: string): void {
  safeInsert('health check', () => {
    getDatabase().prepare(`
      INSERT INTO health_checks (timestamp, check_type, status, response_time_ms, details)
      VALUES (?, ?, ?, ?, ?)
    `).run(new Date().toISOString(), checkType, status, responseTimeMs, details);
  });
}

export function logApiMetric(metric: {
  apiName: string;
  endpoint: string;
  statusCode: number;
  responseTimeMs: number;
  responseSize: number;
}): void {
  safeInsert('API metric', () => {
    getDatabase().prepare(`
      INSERT INTO api_metrics (timestamp, api_name, endpoint, status_code, response_time_ms, response_size)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      new Date().toISOString(), metric.apiName, metric.endpoint,
      metric.statusCode, metric.responseTimeMs, metric.responseSize
    );
  });
}

export function logError(errorType: string, error: unknown, context: string = ''): void {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack ?? null : null;
  safeInsert('error', () => {
    getDatabase().prepare(`
      INSERT INTO error_logs (timestamp, error_type, error_message, stack_trace, context)
      VALUES (?, ?, ?, ?, ?)
    `).run(new Date().toISOString(), errorType, message, stack, context);
  });
}

export interface ApiPerformance {
  requestCount: number;
  avgResponseTimeMs: number;
  errorCount: number;
  errorRate: number;
  successRate: number;
}

export function getApiPerformance(sinceMs: number = 60 * 60 * 1000): Record<string, ApiPerformance> {
  const db = getDatabase();
  const since = new Date(Date.now() - sinceMs).toISOString();

  const rows = db.prepare(`
    SELECT api_name as apiName, AVG(response_time_ms) as avgResponseTimeMs,
           COUNT(*) as requestCount,
           SUM(CASE WHEN status_code >= 400 OR status_code = 0 THEN 1 ELSE 0 END) as errorCount
    FROM api_metrics
    WHERE timestamp > ?
    GROUP BY api_name
  `).all(since) as { apiName: string; avgResponseTimeMs: number; requestCount: number; errorCount: number }[];

  const performance: Record<string, ApiPerformance> = {};
  for (const row of rows) {
    const errorRate = row.requestCount > 0 ? row.errorCount / row.requestCount : 0;
    performance[row.apiName] = {
      requestCount: row.requestCount,
      avgResponseTimeMs: row.avgResponseTimeMs,
      errorCount: row.errorCount,
      errorRate,
      successRate: 1 - errorRate,
    };
  }
  return performance;
}

/** Error rows are kept for twice the retention of the other metrics. */
export function cleanupOldMetrics(retentionDays: number): { healthChecks: number; apiMetrics: number; errors: number } {
  const db = getDatabase();
  const dayMs = 24 * 60 * 60 * 1000;
  const cutoff = new Date(Date.now() - retentionDays * dayMs).toISOString();
  const errorCutoff = new Date(Date.now() - retentionDays * 2 * dayMs).toISOString();

  const cleanup = db.transaction(() => ({
    healthChecks: db.prepare('DELETE FROM health_checks WHERE timestamp < ?').run(cutoff).changes,
    apiMetrics: db.prepare('DELETE FROM api_metrics WHERE timestamp < ?').run(cutoff).changes,
    errors: db.prepare('DELETE FROM error_logs WHERE timestamp < ?').run(errorCutoff).changes,
  }));
  return cleanup();
}

export function countTables(): number {
  const db = getDatabase();
  return (db.prepare("SELECT COUNT(*) as c FROM sqlite_master WHERE type = 'table'").get() as { c: number }).c;
}

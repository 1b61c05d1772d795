import { z } from 'zod';
import { config } from '../config';
import { logApiMetric } from '../db';
import { createJobListing, type JobListing, type ScraperAdapter, type SearchOptions } from './types';

const API_BASE = 'https://api.adzuna.com/v1/api/jobs';
const MAX_RESULTS_PER_PAGE = 50;
const DESCRIPTION_LIMIT = 1000;

const AdzunaJobSchema = z.object({
  title: z.string().default(''),
  company: z.object({ display_name: z.string().optional() }).optional(),
  location: z.object({ display_name: z.string().optional() }).optional(),
  salary_min: z.number().nullish(),
  salary_max: z.number().nullish(),
  redirect_url: z.string().optional(),
  description: z.string().optional(),
});

const AdzunaResponseSchema = z.object({
  results: z.array(z.unknown()).default([]),
});

type AdzunaJob = z.infer<typeof AdzunaJobSchema>;

export interface AdzunaCredentials {
  appId?: string;
  appKey?: string;
  country?: string;
}

export function formatSalaryRange(min?: number | null, max?: number | null): string | null {
  const fmt = (n: number) => `£${Math.round(n)}`;
  if (min && max && min !== max) return `${fmt(min)} - ${fmt(max)}`;
  if (min) return fmt(min);
  if (max) return fmt(max);
  return null;
}

export function normalizeAdzunaJob(item: AdzunaJob): JobListing {
  return createJobListing({
    title: item.title,
    company: item.company?.display_name ?? '',
    location: item.location?.display_name ?? '',
    salary: formatSalaryRange(item.salary_min, item.salary_max),
    description: (item.description ?? '').slice(0, DESCRIPTION_LIMIT),
    url: item.redirect_url ?? '',
    source: 'adzuna',
  });
}

export function buildAdzunaUrl(query: string, options: SearchOptions, credentials: Required<AdzunaCredentials>): string {
  const params = new URLSearchParams({
    app_id: credentials.appId,
    app_key: credentials.appKey,
    results_per_page: String(Math.min(Math.max(options.maxResults, 1), MAX_RESULTS_PER_PAGE)),
    what: query,
    where: options.location,
    sort_by: 'date',
  });
  return `${API_BASE}/${credentials.country}/search/1?${params}`;
}

function recordMetric(statusCode: number, startedAt: number, responseSize: number): void {
  logApiMetric({
    apiName: 'adzuna',
    endpoint: 'search',
    statusCode,
    responseTimeMs: Date.now() - startedAt,
    responseSize,
  });
}

export class AdzunaAdapter implements ScraperAdapter {
  name = 'adzuna';

  constructor(
    private readonly credentials: AdzunaCredentials = {
      appId: config.ADZUNA_APP_ID,
      appKey: config.ADZUNA_APP_KEY,
      country: config.ADZUNA_COUNTRY,
    }
  ) {}

  async search(query: string, options: SearchOptions): Promise<JobListing[]> {
    const { appId, appKey } = this.credentials;
    if (!appId || !appKey) {
      console.warn('[Adzuna] ADZUNA_APP_ID / ADZUNA_APP_KEY not set, skipping');
      return [];
    }

    const url = buildAdzunaUrl(query, options, { appId, appKey, country: this.credentials.country ?? 'gb' });
    const startedAt = Date.now();
    console.log(`[Adzuna] Searching "${query}" in ${options.location}...`);

    let body: string;
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(config.REQUEST_TIMEOUT_MS) });
      body = await response.text();
      recordMetric(response.status, startedAt, body.length);

      if (!response.ok) {
        console.error(`[Adzuna] HTTP ${response.status} for "${query}"`);
        return [];
      }
    } catch (error) {
      recordMetric(0, startedAt, 0);
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Adzuna] Search failed for "${query}": ${message}`);
      return [];
    }

    let payload: z.infer<typeof AdzunaResponseSchema>;
    try {
      payload = AdzunaResponseSchema.parse(JSON.parse(body));
    } catch (error) {
      console.error('[Adzuna] Unexpected response body:', error);
      return [];
    }

    const jobs: JobListing[] = [];
    let skipped = 0;
    for (const item of payload.results) {
      const parsed = AdzunaJobSchema.safeParse(item);
      if (!parsed.success || !parsed.data.title) {
        skipped++;
        continue;
      }
      jobs.push(normalizeAdzunaJob(parsed.data));
    }

    console.log(`[Adzuna] "${query}": ${jobs.length} jobs (${skipped} skipped)`);
    return jobs;
  }
}

import type { ScraperAdapter, JobListing } from './types';
import { AdzunaAdapter } from './adzuna';
import { IndeedAdapter } from './indeed';
import { ReedAdapter } from './reed';
import { delay } from './http';
import { config } from '../config';
import { upsertJob, startSearchRun, completeSearchRun, logError } from '../db';
import { dedupeByUrl, rankJobs } from '../scorer/pipeline';
import type { UserProfile } from '../scorer/profile';
import type { ScoringConfig } from '../scorer/config';

export const DEFAULT_QUERIES = [
  'software engineer',
  'python developer',
  'backend developer',
  'full stack developer',
  'data engineer',
  'DevOps engineer',
];

const adapters: Record<string, () => ScraperAdapter> = {
  adzuna: () => new AdzunaAdapter(),
  indeed: () => new IndeedAdapter(),
  reed: () => new ReedAdapter(),
};

export function availableSources(): string[] {
  return Object.keys(adapters);
}

export function createAdapters(sources: string[] = availableSources()): ScraperAdapter[] {
  return sources.map(source => {
    const factory = adapters[source];
    if (!factory) {
      throw new Error(`Unknown source: ${source}. Available: ${availableSources().join(', ')}`);
    }
    return factory();
  });
}

export interface SearchRequest {
  queries?: string[];
  sources?: string[];
  location?: string;
  limit?: number;
  maxResultsPerSource?: number;
}

export interface SearchResult {
  searchId: number;
  jobs: JobListing[];
  collected: number;
  unique: number;
  bySource: Record<string, number>;
}

export interface SearchDeps {
  adapters?: ScraperAdapter[];
  delayMs?: number;
}

/**
 * Runs every query against every source one request at a time, ranks the
 * whole batch for the given profile, then stores every collected listing.
 */
export async function runSearch(
  request: SearchRequest,
  profile: UserProfile,
  scoring: ScoringConfig,
  deps: SearchDeps = {}
): Promise<SearchResult> {
  const queries = request.queries?.length ? request.queries : DEFAULT_QUERIES;
  const sources = deps.adapters ?? createAdapters(request.sources);
  const delayMs = deps.delayMs ?? config.REQUEST_DELAY_MS;
  const options = {
    location: request.location ?? config.SEARCH_LOCATION,
    maxResults: request.maxResultsPerSource ?? 20,
  };

  const searchId = startSearchRun(queries.join(' | '), sources.map(s => s.name));

  try {
    const collected: JobListing[] = [];
    const bySource: Record<string, number> = {};

    for (const query of queries) {
      for (const adapter of sources) {
        try {
          const jobs = await adapter.search(query, options);
          collected.push(...jobs);
          bySource[adapter.name] = (bySource[adapter.name] ?? 0) + jobs.length;
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[Runner] ${adapter.name} failed for "${query}": ${message}`);
          logError('collector', error, `${adapter.name}: ${query}`);
          bySource[adapter.name] = bySource[adapter.name] ?? 0;
        }

        if (delayMs > 0) await delay(delayMs);
      }
    }

    // Ranking scores every unique listing, so rows are stored with their computed score
    const unique = dedupeByUrl(collected);
    const ranked = rankJobs(unique, profile, { limit: request.limit, scoring });
    for (const job of unique) {
      upsertJob(job);
    }

    completeSearchRun(searchId, 'completed', unique.length, ranked.length);
    console.log(`[Runner] Search complete: ${collected.length} collected, ${unique.length} unique, ${ranked.length} ranked`);

    return { searchId, jobs: ranked, collected: collected.length, unique: unique.length, bySource };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    completeSearchRun(searchId, 'failed', 0, 0, message);
    console.error('[Runner] Search failed:', message);
    throw error;
  }
}

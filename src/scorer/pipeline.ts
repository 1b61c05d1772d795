import type { JobListing } from '../scrapers/types';
import type { UserProfile } from './profile';
import { FINTECH_SCORING, type ScoringConfig } from './config';
import { scoreListing } from './scorer';

/** Keeps the first listing per non-empty url. Listings without a url are always kept. */
export function dedupeByUrl(jobs: readonly JobListing[]): JobListing[] {
  const seenUrls = new Set<string>();
  const unique: JobListing[] = [];

  for (const job of jobs) {
    if (job.url) {
      if (seenUrls.has(job.url)) continue;
      seenUrls.add(job.url);
    }
    unique.push(job);
  }

  return unique;
}

export function selectTopMatches(jobs: readonly JobListing[], limit: number, minScore: number): JobListing[] {
  // Array.prototype.sort is stable, so equal scores keep their input order
  return jobs
    .filter(job => job.matchScore > minScore)
    .sort((a, b) => b.matchScore - a.matchScore)
    .slice(0, Math.max(0, limit));
}

export interface RankOptions {
  limit?: number;
  scoring?: ScoringConfig;
}

/**
 * Dedupes, scores, filters and orders a batch of listings for one profile.
 * Scores are written onto the listings in place.
 */
export function rankJobs(jobs: readonly JobListing[], profile: UserProfile, options: RankOptions = {}): JobListing[] {
  const scoring = options.scoring ?? FINTECH_SCORING;
  const limit = options.limit ?? scoring.defaultLimit;

  const unique = dedupeByUrl(jobs);
  for (const job of unique) {
    scoreListing(job, profile, scoring);
  }

  return selectTopMatches(unique, limit, scoring.minScore);
}

import { describe, it, expect } from 'vitest';
import { dedupeByUrl, rankJobs, selectTopMatches } from './pipeline';
import { BASIC_SCORING } from './config';
import { createUserProfile, type UserProfile } from './profile';
import { createJobListing, type JobListing } from '../scrapers/types';

const profile: UserProfile = { ...createUserProfile(), skills: ['python'], minSalary: 50000 };

function scored(title: string, matchScore: number, url = ''): JobListing {
  return createJobListing({ title, url, matchScore });
}

describe('dedupeByUrl', () => {
  it('keeps the first listing per url in input order', () => {
    const a = scored('A', 0, 'u1');
    const b = scored('B', 0, 'u1');
    const c = scored('C', 0, 'u2');

    expect(dedupeByUrl([a, b, c])).toEqual([a, c]);
    expect(dedupeByUrl([a, b, c])[0]).toBe(a);
  });

  it('never drops listings without a url', () => {
    const jobs = [scored('A', 0), scored('B', 0), scored('C', 0, 'u1'), scored('D', 0)];
    expect(dedupeByUrl(jobs).map(j => j.title)).toEqual(['A', 'B', 'C', 'D']);
  });

  it('returns an empty array for empty input', () => {
    expect(dedupeByUrl([])).toEqual([]);
  });
});

describe('selectTopMatches', () => {
  const jobs = [
    scored('first-30', 30),
    scored('at-threshold', 20),
    scored('top', 50),
    scored('second-30', 30),
    scored('just-over', 21),
  ];

  it('drops scores at or below the threshold and sorts descending', () => {
    expect(selectTopMatches(jobs, 10, 20).map(j => j.title)).toEqual(['top', 'first-30', 'second-30', 'just-over']);
  });

  it('keeps input order among equal scores when truncating', () => {
    expect(selectTopMatches(jobs, 2, 20).map(j => j.title)).toEqual(['top', 'first-30']);
  });

  it('returns everything that qualifies when the limit is larger', () => {
    expect(selectTopMatches(jobs, 100, 20)).toHaveLength(4);
  });

  it('returns an empty array when nothing qualifies', () => {
    expect(selectTopMatches([scored('low', 5), scored('edge', 20)], 10, 20)).toEqual([]);
  });

  it('does not reorder the input array', () => {
    selectTopMatches(jobs, 10, 20);
    expect(jobs[0].title).toBe('first-30');
  });
});

describe('rankJobs', () => {
  it('ranks a matching listing and drops an unrelated one', () => {
    const a = createJobListing({
      title: 'Senior Python Developer',
      description: 'fintech payments platform',
      salary: '£60000',
      url: 'u1',
    });
    const b = createJobListing({ title: 'Office Manager', description: 'Facilities role', url: 'u2' });

    const ranked = rankJobs([a, b], profile);

    expect(ranked).toEqual([a]);
    expect(a.matchScore).toBe(65);
    expect(b.matchScore).toBe(0);
  });

  it('keeps only the first listing for a shared url even when a later one scores higher', () => {
    const first = createJobListing({ title: 'Python Developer', description: 'fintech payments', url: 'u1' });
    const second = createJobListing({
      title: 'Senior Python Developer',
      description: 'fintech payments banking',
      salary: '£80,000',
      url: 'u1',
    });

    const ranked = rankJobs([first, second], profile);

    expect(ranked).toHaveLength(1);
    expect(ranked[0].title).toBe('Python Developer');
    expect(ranked[0].matchScore).toBe(35);
  });

  it('uses the scoring configuration passed in', () => {
    const job = createJobListing({
      title: 'Senior Python Developer',
      description: 'fintech payments platform',
      salary: '£60000',
    });
    const [ranked] = rankJobs([job], profile, { scoring: BASIC_SCORING });
    expect(ranked.matchScore).toBe(55);
  });

  it('limits results to the default of 20', () => {
    const jobs = Array.from({ length: 25 }, (_, i) =>
      createJobListing({ title: `Python engineer ${i}`, description: 'fintech', url: `u${i}` })
    );
    expect(rankJobs(jobs, profile)).toHaveLength(20);
  });

  it('honours an explicit limit', () => {
    const jobs = Array.from({ length: 5 }, (_, i) =>
      createJobListing({ title: `Python engineer ${i}`, description: 'fintech', url: `u${i}` })
    );
    expect(rankJobs(jobs, profile, { limit: 3 }).map(j => j.url)).toEqual(['u0', 'u1', 'u2']);
    expect(rankJobs(jobs, profile, { limit: 0 })).toEqual([]);
  });

  it('returns an empty array when nothing clears the threshold', () => {
    const job = createJobListing({ title: 'Python Developer' });
    expect(rankJobs([job], profile)).toEqual([]);
    expect(job.matchScore).toBe(15);
  });

  it('never returns a score above 100', () => {
    const job = createJobListing({
      title: 'Principal Python Engineer',
      description: 'fintech banking payments blockchain trading investment regtech insurtech',
      salary: '£120,000',
    });
    const [ranked] = rankJobs([job], profile);
    expect(ranked.matchScore).toBe(100);
  });
});

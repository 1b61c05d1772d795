export interface JobListing {
  title: string;
  company: string;
  location: string;
  /** Free-text salary as shown by the source, e.g. "£50,000 - £60,000 a year" */
  salary: string | null;
  description: string;
  /** Identity key within a ranking run. Empty when the source gave no link. */
  url: string;
  source: string;
  /** 0-100, filled in by the scorer */
  matchScore: number;
}

export type JobListingInput = Pick<JobListing, 'title'> & Partial<Omit<JobListing, 'title'>>;

export function createJobListing(input: JobListingInput): JobListing {
  return {
    title: input.title,
    company: input.company ?? '',
    location: input.location ?? '',
    salary: input.salary || null,
    description: input.description ?? '',
    url: input.url ?? '',
    source: input.source ?? 'unknown',
    matchScore: input.matchScore ?? 0,
  };
}

export interface SearchOptions {
  location: string;
  maxResults: number;
}

export interface ScraperAdapter {
  name: string;
  search(query: string, options: SearchOptions): Promise<JobListing[]>;
}

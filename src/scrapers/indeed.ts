import { parseJobCards, type CardSelectors } from './cards';
import { fetchPage } from './http';
import type { JobListing, ScraperAdapter, SearchOptions } from './types';

const BASE_URL = 'https://uk.indeed.com';

export const INDEED_SELECTORS: CardSelectors = {
  card: ['div.job_seen_beacon', 'div[data-testid="job-result"]'],
  title: ['h2', 'a[data-testid="job-title"]'],
  company: ['span[data-testid="company-name"]', 'span.companyName'],
  location: ['div[data-testid="job-location"]', 'div.companyLocation'],
  salary: ['span.salary-snippet', 'div.salary-snippet-container'],
  description: ['div.job-snippet', 'div[data-testid="job-snippet"]'],
  defaultCompany: 'Unknown',
  defaultLocation: 'UK',
};

export function buildIndeedUrl(query: string): string {
  const params = new URLSearchParams({
    q: `${query} fintech`,
    l: 'United Kingdom',
    fromage: '14', // last two weeks
    salary: '50000',
  });
  return `${BASE_URL}/jobs?${params}`;
}

export function parseIndeedJobs(html: string): JobListing[] {
  return parseJobCards(html, BASE_URL, 'indeed', INDEED_SELECTORS);
}

export class IndeedAdapter implements ScraperAdapter {
  name = 'indeed';

  async search(query: string, options: SearchOptions): Promise<JobListing[]> {
    const url = buildIndeedUrl(query);
    console.log(`[Indeed] Crawling ${url}`);

    const html = await fetchPage(url);
    if (!html) return [];

    const jobs = parseIndeedJobs(html).slice(0, options.maxResults);
    console.log(`[Indeed] "${query}": ${jobs.length} cards parsed`);
    return jobs;
  }
}

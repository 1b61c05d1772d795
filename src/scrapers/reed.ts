import { parseJobCards, type CardSelectors } from './cards';
import { fetchPage } from './http';
import type { JobListing, ScraperAdapter, SearchOptions } from './types';

const BASE_URL = 'https://www.reed.co.uk';

export const REED_SELECTORS: CardSelectors = {
  card: ['article.job-result', 'div.job-result'],
  title: ['h3', 'h2'],
  company: ['a.gtmJobListingPostedBy', 'div.job-result-heading__company'],
  location: ['li.job-metadata__item--location', 'div.job-metadata'],
  salary: ['li.job-metadata__item--salary'],
  description: ['p.job-result-description__details'],
  defaultCompany: 'Unknown',
  defaultLocation: 'UK',
};

export function buildReedUrl(query: string): string {
  const params = new URLSearchParams({
    keywords: `${query} fintech`,
    location: 'UK',
    salaryfrom: '50000',
  });
  return `${BASE_URL}/jobs?${params}`;
}

export function parseReedJobs(html: string): JobListing[] {
  return parseJobCards(html, BASE_URL, 'reed', REED_SELECTORS);
}

export class ReedAdapter implements ScraperAdapter {
  name = 'reed';

  async search(query: string, options: SearchOptions): Promise<JobListing[]> {
    const url = buildReedUrl(query);
    console.log(`[Reed] Crawling ${url}`);

    const html = await fetchPage(url);
    if (!html) return [];

    const jobs = parseReedJobs(html).slice(0, options.maxResults);
    console.log(`[Reed] "${query}": ${jobs.length} cards parsed`);
    return jobs;
  }
}

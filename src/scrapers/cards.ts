import * as cheerio from 'cheerio';
import { absoluteUrl } from './http';
import { createJobListing, type JobListing } from './types';

/**
 * Selector lists for one job board's result cards. Each list is tried in
 * order and the first selector that matches wins.
 */
export interface CardSelectors {
  card: string[];
  title: string[];
  company: string[];
  location: string[];
  salary: string[];
  description: string[];
  defaultCompany: string;
  defaultLocation: string;
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function parseJobCards(html: string, baseUrl: string, source: string, selectors: CardSelectors): JobListing[] {
  const $ = cheerio.load(html);

  const cards = selectors.card.map(selector => $(selector).toArray()).find(found => found.length > 0) ?? [];

  const jobs: JobListing[] = [];
  for (const card of cards) {
    const firstMatch = (candidates: string[]) => {
      for (const selector of candidates) {
        const found = $(selector, card).first();
        if (found.length > 0) return found;
      }
      return undefined;
    };
    const textOf = (candidates: string[]) => {
      const found = firstMatch(candidates);
      return found ? cleanText(found.text()) : '';
    };

    const titleEl = firstMatch(selectors.title);
    if (!titleEl) continue;

    const nestedLink = titleEl.find('a').first();
    const linkEl = nestedLink.length > 0 ? nestedLink : titleEl;
    const title = cleanText(linkEl.text());
    if (!title) continue;

    jobs.push(
      createJobListing({
        title,
        company: textOf(selectors.company) || selectors.defaultCompany,
        location: textOf(selectors.location) || selectors.defaultLocation,
        salary: textOf(selectors.salary) || null,
        description: textOf(selectors.description),
        url: absoluteUrl(linkEl.attr('href'), baseUrl),
        source,
      })
    );
  }

  return jobs;
}

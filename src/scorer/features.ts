import type { JobListing } from '../scrapers/types';
import { parseSalaryRange, type SalaryRange } from './salary';
import keywords from './features.json';

export interface JobFeatures {
  techStack: string[];
  experienceLevel: string;
  remotePolicy: string;
  salary: SalaryRange | null;
  descriptionLength: number;
  hasBenefits: boolean;
}

const NOT_SPECIFIED = 'not_specified';

/**
 * Structured hints pulled from a listing's text. Matching is by substring;
 * experience levels and remote policies are tried in order and the first hit wins.
 */
export function extractJobFeatures(job: Pick<JobListing, 'title' | 'description' | 'salary'>): JobFeatures {
  const title = job.title.toLowerCase();
  const description = job.description.toLowerCase();
  const inListing = (term: string) => title.includes(term) || description.includes(term);

  const experience = keywords.experienceLevels.find(entry => entry.keywords.some(inListing));
  // Remote policy is read from the description only
  const remote = keywords.remotePolicies.find(entry => entry.keywords.some(term => description.includes(term)));

  return {
    techStack: keywords.techStack.filter(inListing),
    experienceLevel: experience?.level ?? NOT_SPECIFIED,
    remotePolicy: remote?.policy ?? NOT_SPECIFIED,
    salary: parseSalaryRange(job.salary),
    descriptionLength: job.description.length,
    hasBenefits: keywords.benefits.some(term => description.includes(term)),
  };
}

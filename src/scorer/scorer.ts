import type { JobListing } from '../scrapers/types';
import type { UserProfile } from './profile';
import { FINTECH_SCORING, type ScoringConfig } from './config';
import { parseSalaryAmount } from './salary';

export interface ScoreBreakdown {
  domain: number;
  skills: number;
  experience: number;
  qualifications: number;
  salary: number;
  seniority: number;
  total: number;
}

function countContained(terms: string[], text: string): number {
  return terms.filter(term => text.includes(term.toLowerCase())).length;
}

export function explainScore(
  job: Pick<JobListing, 'title' | 'description' | 'salary'>,
  profile: UserProfile,
  scoring: ScoringConfig = FINTECH_SCORING
): ScoreBreakdown {
  const { weights } = scoring;
  const jobText = `${job.title ?? ''} ${job.description ?? ''}`.toLowerCase();
  const title = (job.title ?? '').toLowerCase();

  const domain = countContained(scoring.domainKeywords, jobText) * weights.domainKeyword;
  const skills = countContained(profile.skills, jobText) * weights.skill;
  const experience = countContained(profile.experience, jobText) * weights.experience;
  const qualifications = countContained(profile.qualifications, jobText) * weights.qualification;

  const salary =
    job.salary && parseSalaryAmount(job.salary) >= profile.minSalary ? weights.salaryBonus : 0;

  const seniority =
    scoring.seniorityBonus.enabled && scoring.seniorityBonus.titleKeywords.some(k => title.includes(k.toLowerCase()))
      ? weights.seniorityBonus
      : 0;

  const total = Math.min(domain + skills + experience + qualifications + salary + seniority, scoring.maxScore);
  return { domain, skills, experience, qualifications, salary, seniority, total };
}

/** Scores the listing against the profile and stores the result on `matchScore`. */
export function scoreListing(job: JobListing, profile: UserProfile, scoring: ScoringConfig = FINTECH_SCORING): number {
  job.matchScore = explainScore(job, profile, scoring).total;
  return job.matchScore;
}

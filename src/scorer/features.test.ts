import { describe, it, expect } from 'vitest';
import { extractJobFeatures } from './features';
import { parseSalaryRange } from './salary';
import { createJobListing } from '../scrapers/types';

describe('extractJobFeatures', () => {
  it('pulls stack, level, remote policy, salary range and benefits from a listing', () => {
    const job = createJobListing({
      title: 'Senior Backend Engineer',
      description: 'Python and PostgreSQL on AWS. Hybrid working, pension and private healthcare.',
      salary: '£60,000 - £75,000',
    });

    expect(extractJobFeatures(job)).toEqual({
      techStack: ['python', 'aws', 'sql', 'postgresql'],
      experienceLevel: 'senior',
      remotePolicy: 'hybrid',
      salary: { min: 60000, max: 75000, average: 67500 },
      descriptionLength: job.description.length,
      hasBenefits: true,
    });
  });

  it('reports unspecified fields for a bare listing', () => {
    expect(extractJobFeatures(createJobListing({ title: '' }))).toEqual({
      techStack: [],
      experienceLevel: 'not_specified',
      remotePolicy: 'not_specified',
      salary: null,
      descriptionLength: 0,
      hasBenefits: false,
    });
  });

  it('takes the first matching experience level in order', () => {
    const job = createJobListing({ title: 'Graduate Analyst', description: 'Report to the senior team' });
    expect(extractJobFeatures(job).experienceLevel).toBe('junior');
  });

  it('reads the remote policy from the description only', () => {
    expect(extractJobFeatures(createJobListing({ title: 'Remote Analyst' })).remotePolicy).toBe('not_specified');
    expect(extractJobFeatures(createJobListing({ title: 'Analyst', description: 'Based in our London office' })).remotePolicy).toBe('onsite');
  });
});

describe('parseSalaryRange', () => {
  it('needs two currency figures', () => {
    expect(parseSalaryRange('£75,000 - £60,000 per annum')).toEqual({ min: 60000, max: 75000, average: 67500 });
    expect(parseSalaryRange('£50,000')).toBeNull();
    expect(parseSalaryRange('Competitive')).toBeNull();
    expect(parseSalaryRange(null)).toBeNull();
  });
});

import type { Server } from 'http';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createApp } from './app';
import { closeDatabase, setDatabase, upsertJob } from './db';
import { initializeDatabase } from './db/schema';
import { HealthChecker } from './monitoring/health';
import { FINTECH_SCORING } from './scorer/config';
import { ProfileSession } from './scorer/profile';
import { createJobListing, type ScraperAdapter } from './scrapers/types';

const board: ScraperAdapter = {
  name: 'board',
  search: async () => [
    createJobListing({
      title: 'Lead Python Engineer',
      description: 'open banking platform',
      salary: '£95,000',
      url: 'https://example.com/lead',
      source: 'board',
    }),
    createJobListing({ title: 'Receptionist', url: 'https://example.com/front-desk', source: 'board' }),
  ],
};

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let session: ProfileSession;

  beforeEach(async () => {
    setDatabase(initializeDatabase(':memory:'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    session = new ProfileSession();
    const app = createApp({
      session,
      scoring: FINTECH_SCORING,
      healthChecker: new HealthChecker({}),
      searchDeps: { adapters: [board], delayMs: 0 },
    });

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
    closeDatabase();
  });

  function send(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('answers the liveness check', async () => {
    const res = await send('GET', '/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', service: 'job-ranker' });
  });

  it('updates and returns the session profile', async () => {
    const res = await send('PUT', '/api/profile', { skills: ['Python'], minSalary: 60000 });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      profile: { skills: ['Python'], experience: [], qualifications: [], minSalary: 60000 },
    });

    expect(await (await send('GET', '/api/profile')).json()).toMatchObject({ profile: { skills: ['Python'] } });
    expect(session.snapshot().minSalary).toBe(60000);
  });

  it('rejects an invalid profile update', async () => {
    const res = await send('PUT', '/api/profile', { minSalary: -1 });
    expect(res.status).toBe(400);

    expect(await res.json()).toEqual({ success: false, error: expect.stringMatching(/^minSalary: /) });
    expect(session.snapshot().minSalary).toBe(50000);
  });

  it('rejects empty profile terms', async () => {
    const res = await send('PUT', '/api/profile', { skills: [''] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'skills.0: must not be empty' });
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/api/profile`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: '{"skills": [',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Malformed JSON body' });
  });

  it('ranks supplied listings for the session profile', async () => {
    session.update({ skills: ['Python'] });

    const res = await send('POST', '/api/jobs/rank', {
      jobs: [
        { title: 'Senior Python Developer', description: 'fintech payments platform', salary: '£60000', url: 'u1' },
        { title: 'Office Manager', url: 'u2' },
      ],
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      total: 1,
      jobs: [{ title: 'Senior Python Developer', matchScore: 65, source: 'unknown' }],
    });
  });

  it('runs a search and lists the stored results', async () => {
    session.update({ skills: ['Python'] });

    const search = await send('POST', '/api/jobs/search', { queries: ['python'] });
    expect(search.status).toBe(200);
    expect(await search.json()).toMatchObject({
      jobs: [{ title: 'Lead Python Engineer', matchScore: 65 }],
      collected: 2,
      unique: 2,
    });

    expect(await (await send('GET', '/api/jobs?minScore=50')).json()).toMatchObject({
      total: 1,
      jobs: [{ url: 'https://example.com/lead' }],
    });
    expect(await (await send('GET', '/api/searches')).json()).toMatchObject({
      searches: [{ query: 'python', status: 'completed', rankedCount: 1 }],
    });
    expect(await (await send('GET', '/api/jobs/stats')).json()).toMatchObject({ success: true, total: 2, searches: 1 });
  });

  it('rejects unknown sources', async () => {
    const res = await send('POST', '/api/jobs/search', { sources: ['monster'] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'sources: sources must be among: adzuna, indeed, reed' });
  });

  it('rejects a non-numeric score filter', async () => {
    const res = await send('GET', '/api/jobs?minScore=abc');
    expect(res.status).toBe(400);
  });

  it('reports the health summary', async () => {
    const res = await send('GET', '/api/health/summary');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ success: true, overallStatus: 'healthy', issues: [] });
  });

  describe('job detail and applications', () => {
    let jobId: string;

    beforeEach(() => {
      session.update({ skills: ['Python'] });
      jobId = upsertJob(createJobListing({
        title: 'Lead Python Engineer',
        company: 'Ledger Ltd',
        description: 'open banking platform',
        salary: '£95,000',
        url: 'https://example.com/lead',
        source: 'board',
        matchScore: 65,
      })).id;
    });

    it('returns a stored job with its breakdown and features', async () => {
      const res = await send('GET', `/api/jobs/${jobId}`);
      expect(res.status).toBe(200);

      expect(await res.json()).toMatchObject({
        success: true,
        job: { id: jobId, title: 'Lead Python Engineer', matchScore: 65 },
        breakdown: { total: 65 },
        features: { techStack: ['python'], experienceLevel: 'senior', remotePolicy: 'not_specified', salary: null },
        application: null,
      });
    });

    it('answers 404 for an unknown job', async () => {
      const res = await send('GET', '/api/jobs/missing');
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ success: false, error: 'Job not found' });
    });

    it('records, updates and removes an application', async () => {
      const saved = await send('POST', `/api/jobs/${jobId}/application`, {
        status: 'interview_scheduled',
        appliedDate: '2026-10-01',
        notes: 'Call with the CTO',
      });
      expect(saved.status).toBe(200);
      expect(await saved.json()).toMatchObject({
        success: true,
        application: { jobId, status: 'interview_scheduled', appliedDate: '2026-10-01', followUpDate: '2026-10-08' },
        timeline: { followUp: '2026-10-08', expectedResponse: '2026-10-15', moveOn: '2026-10-31' },
        nextActions: expect.arrayContaining(['Research the interviewers']),
      });

      const updated = await send('POST', `/api/jobs/${jobId}/application`, { status: 'interviewed' });
      expect(await updated.json()).toMatchObject({
        application: { status: 'interviewed', appliedDate: '2026-10-01', notes: 'Call with the CTO' },
      });

      expect(await (await send('GET', `/api/jobs/${jobId}`)).json()).toMatchObject({
        application: { status: 'interviewed' },
      });

      expect(await (await send('DELETE', `/api/jobs/${jobId}/application`)).json()).toEqual({ success: true });
      const again = await send('DELETE', `/api/jobs/${jobId}/application`);
      expect(again.status).toBe(404);
      expect(await again.json()).toEqual({ success: false, error: 'No application for this job' });
    });

    it('rejects an unknown status', async () => {
      const res = await send('POST', `/api/jobs/${jobId}/application`, { status: 'ghosted' });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ success: false, error: expect.stringMatching(/^status: /) });
    });

    it('does not record an application for an unknown job', async () => {
      const res = await send('POST', '/api/jobs/missing/application', { status: 'applied' });
      expect(res.status).toBe(404);
    });

    it('tracks an application by url and summarizes it', async () => {
      const tracked = await send('POST', '/api/applications', {
        url: 'https://example.com/jobs/9',
        company: 'Coin Co',
        position: 'Payments Engineer',
      });
      expect(tracked.status).toBe(200);
      expect(await tracked.json()).toMatchObject({
        application: { title: 'Payments Engineer', company: 'Coin Co', status: 'applied' },
      });

      expect(await (await send('GET', '/api/applications')).json()).toMatchObject({
        success: true,
        total: 1,
        byStatus: { applied: 1 },
        followUpsDue: 0,
        applications: [{ company: 'Coin Co', daysSinceApplication: 0, needsFollowUp: false }],
      });
    });
  });

  it('reports market analytics for recent activity', async () => {
    await send('POST', '/api/jobs/search', { queries: ['python'] });

    const res = await send('GET', '/api/analytics?days=7');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      timeframeDays: 7,
      popularSearches: [{ query: 'python', searchCount: 1, avgResults: 2 }],
      topCompanies: [],
      applicationStatus: {},
    });

    expect((await send('GET', '/api/analytics?days=0')).status).toBe(400);
  });
});

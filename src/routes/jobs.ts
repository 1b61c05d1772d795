import { Router, Request, Response } from 'express';
import { z } from 'zod';
import {
  getApplicationForJob,
  getApplications,
  getJobById,
  getJobs,
  getJobStats,
  getMarketAnalytics,
  getSearchRuns,
  removeApplication,
  saveApplication,
  saveProfile,
  trackApplication,
  type JobFilters,
} from '../db';
import { availableSources, runSearch, type SearchDeps } from '../scrapers/runner';
import { createJobListing } from '../scrapers/types';
import { extractJobFeatures } from '../scorer/features';
import { rankJobs } from '../scorer/pipeline';
import { explainScore } from '../scorer/scorer';
import { profileUpdateSchema, type ProfileSession } from '../scorer/profile';
import type { ScoringConfig } from '../scorer/config';
import {
  applicationTimeline,
  applicationUpdateSchema,
  nextActionsFor,
  summarizeApplications,
  trackApplicationSchema,
  type TrackedApplication,
} from '../tracking/applications';

const searchSchema = z.object({
  queries: z.array(z.string().min(1)).optional(),
  sources: z
    .array(z.string())
    .optional()
    .refine(s => !s || s.every(name => availableSources().includes(name)), {
      message: `sources must be among: ${availableSources().join(', ')}`,
    }),
  location: z.string().optional(),
  limit: z.number().int().positive().optional(),
});

const listingSchema = z.object({
  title: z.string(),
  company: z.string().optional(),
  location: z.string().optional(),
  salary: z.string().nullish(),
  description: z.string().optional(),
  url: z.string().optional(),
  source: z.string().optional(),
});

const rankSchema = z.object({
  jobs: z.array(listingSchema),
  limit: z.number().int().positive().optional(),
});

const listQuerySchema = z.object({
  source: z.string().optional(),
  minScore: z.coerce.number().optional(),
  search: z.string().optional(),
  sort: z.enum(['score', 'recent', 'company']).optional(),
  page: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().max(200).optional(),
});

const analyticsQuerySchema = z.object({
  days: z.coerce.number().int().positive().max(365).optional(),
});

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({ success: false, error: error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ') });
}

function applicationResponse(application: TrackedApplication) {
  return {
    success: true,
    application,
    timeline: applicationTimeline(application.appliedDate),
    nextActions: nextActionsFor(application.status),
  };
}

export interface JobRouterDeps {
  session: ProfileSession;
  scoring: ScoringConfig;
  searchDeps?: SearchDeps;
}

export function createJobRouter({ session, scoring, searchDeps }: JobRouterDeps): Router {
  const router = Router();

  // GET /api/profile - current session profile
  router.get('/profile', (_req: Request, res: Response) => {
    res.json({ success: true, profile: session.snapshot() });
  });

  // PUT /api/profile - overwrite the supplied fields
  router.put('/profile', (req: Request, res: Response) => {
    const parsed = profileUpdateSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      const profile = session.update(parsed.data);
      saveProfile(profile);
      res.json({ success: true, profile });
    } catch (error) {
      console.error('[API] Profile update error:', error);
      res.status(500).json({ success: false, error: 'Failed to update profile' });
    }
  });

  // GET /api/jobs/stats
  router.get('/jobs/stats', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, ...getJobStats() });
    } catch (error) {
      console.error('[API] Stats error:', error);
      res.status(500).json({ success: false, error: 'Failed to get stats' });
    }
  });

  // GET /api/jobs - stored listings with filters
  router.get('/jobs', (req: Request, res: Response) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      const filters: JobFilters = parsed.data;
      res.json({ success: true, ...getJobs(filters) });
    } catch (error) {
      console.error('[API] Jobs list error:', error);
      res.status(500).json({ success: false, error: 'Failed to list jobs' });
    }
  });

  // GET /api/jobs/:id - stored listing with its score breakdown and extracted features
  router.get('/jobs/:id', (req: Request, res: Response) => {
    try {
      const job = getJobById(req.params.id);
      if (!job) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      res.json({
        success: true,
        job,
        breakdown: explainScore(job, session.snapshot(), scoring),
        features: extractJobFeatures(job),
        application: getApplicationForJob(job.id),
      });
    } catch (error) {
      console.error('[API] Job detail error:', error);
      res.status(500).json({ success: false, error: 'Failed to get job' });
    }
  });

  // POST /api/jobs/:id/application - record or update the application for a stored job
  router.post('/jobs/:id/application', (req: Request, res: Response) => {
    const parsed = applicationUpdateSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      if (!getJobById(req.params.id)) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      const application = saveApplication(req.params.id, parsed.data);
      console.log(`[API] Application for ${req.params.id} is now ${application.status}`);
      res.json(applicationResponse(application));
    } catch (error) {
      console.error('[API] Application update error:', error);
      res.status(500).json({ success: false, error: 'Failed to save application' });
    }
  });

  // DELETE /api/jobs/:id/application
  router.delete('/jobs/:id/application', (req: Request, res: Response) => {
    try {
      if (!removeApplication(req.params.id)) {
        res.status(404).json({ success: false, error: 'No application for this job' });
        return;
      }
      res.json({ success: true });
    } catch (error) {
      console.error('[API] Application removal error:', error);
      res.status(500).json({ success: false, error: 'Failed to remove application' });
    }
  });

  // POST /api/jobs/search - collect from sources and rank for the session profile
  router.post('/jobs/search', async (req: Request, res: Response) => {
    const parsed = searchSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      const result = await runSearch(parsed.data, session.snapshot(), scoring, searchDeps);
      res.json({ success: true, ...result });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[API] Search error:', message);
      res.status(500).json({ success: false, error: message });
    }
  });

  // POST /api/jobs/rank - rank caller-supplied listings without collecting
  router.post('/jobs/rank', (req: Request, res: Response) => {
    const parsed = rankSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    const listings = parsed.data.jobs.map(job => createJobListing(job));
    const jobs = rankJobs(listings, session.snapshot(), { limit: parsed.data.limit, scoring });
    res.json({ success: true, jobs, total: jobs.length });
  });

  // GET /api/searches - recent search history
  router.get('/searches', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, searches: getSearchRuns() });
    } catch (error) {
      console.error('[API] Search history error:', error);
      res.status(500).json({ success: false, error: 'Failed to get search history' });
    }
  });

  // POST /api/applications - track an application by posting url
  router.post('/applications', (req: Request, res: Response) => {
    const parsed = trackApplicationSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      const application = trackApplication(parsed.data);
      console.log(`[API] Tracking application to ${application.company}: ${application.title}`);
      res.json(applicationResponse(application));
    } catch (error) {
      console.error('[API] Track application error:', error);
      res.status(500).json({ success: false, error: 'Failed to track application' });
    }
  });

  // GET /api/applications - status summary with follow-ups due
  router.get('/applications', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, ...summarizeApplications(getApplications()) });
    } catch (error) {
      console.error('[API] Applications error:', error);
      res.status(500).json({ success: false, error: 'Failed to get applications' });
    }
  });

  // GET /api/analytics?days=30
  router.get('/analytics', (req: Request, res: Response) => {
    const parsed = analyticsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }
    try {
      res.json({ success: true, ...getMarketAnalytics(parsed.data.days) });
    } catch (error) {
      console.error('[API] Analytics error:', error);
      res.status(500).json({ success: false, error: 'Failed to get analytics' });
    }
  });

  return router;
}

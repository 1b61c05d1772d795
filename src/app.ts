import express from 'express';
import cors from 'cors';
import { createJobRouter } from './routes/jobs';
import { createHealthRouter } from './routes/health';
import { HealthChecker } from './monitoring/health';
import type { ProfileSession } from './scorer/profile';
import type { ScoringConfig } from './scorer/config';
import type { SearchDeps } from './scrapers/runner';

export interface AppDeps {
  session: ProfileSession;
  scoring: ScoringConfig;
  healthChecker?: HealthChecker;
  searchDeps?: SearchDeps;
}

export function createApp({ session, scoring, healthChecker = new HealthChecker(), searchDeps }: AppDeps): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createJobRouter({ session, scoring, searchDeps }));
  app.use('/api', createHealthRouter(healthChecker));

  // Liveness
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'job-ranker' });
  });

  // Error handler
  app.use(
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      console.error('[Error]', err);
      const status = err instanceof SyntaxError ? 400 : 500;
      res.status(status).json({ success: false, error: status === 400 ? 'Malformed JSON body' : 'Internal server error' });
    }
  );

  return app;
}

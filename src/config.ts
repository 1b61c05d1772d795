import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Blank entries in .env (e.g. `ADZUNA_APP_ID=`) count as unset
const optionalString = z.preprocess(v => (v === '' ? undefined : v), z.string().optional());

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_PATH: z.string().min(1).default('data/jobs.db'),
  BACKUP_DIR: z.string().min(1).default('backups'),

  ADZUNA_APP_ID: optionalString,
  ADZUNA_APP_KEY: optionalString,
  ADZUNA_COUNTRY: z.string().min(2).default('gb'),

  SEARCH_LOCATION: z.string().default('London'),
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  SCORING_PRESET: z.enum(['fintech', 'basic']).default('fintech'),

  HEALTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  METRICS_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  BACKUP_RETENTION_DAYS: z.coerce.number().int().positive().default(7),

  PROFILE_PATH: optionalString,
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

export const config = loadConfig();

import { z } from 'zod';

const DEFAULT_REDIS_URL = 'redis://localhost:6379';
const DEFAULT_RUN_SOURCES = 'greenhouse,lever';
const DEFAULT_RUN_CRON = '0 6 * * *';

function positiveInt(fallback: number) {
  return z
    .string()
    .trim()
    .optional()
    .transform((raw, ctx) => {
      if (!raw) return fallback;
      const parsed = Number(raw);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive integer, got "${raw}"` });
        return z.NEVER;
      }
      return parsed;
    });
}

const envSchema = z.object({
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL environment variable is required' }).trim().min(1, {
    message: 'DATABASE_URL environment variable is required',
  }),
  REDIS_URL: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || DEFAULT_REDIS_URL),
  RUN_SOURCES: z
    .string()
    .optional()
    .transform((value) => (value?.trim() ? value : DEFAULT_RUN_SOURCES))
    .transform((value) => [...new Set(value.split(',').map((source) => source.trim().toLowerCase()).filter(Boolean))])
    .pipe(z.array(z.string().regex(/^[a-z0-9_-]+$/, 'source ids may only use a-z, 0-9, "_" and "-"')).min(1)),
  RUN_CRON: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || DEFAULT_RUN_CRON),
  RULES_DIR: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),
  SNAPSHOT_PAGE_SIZE: positiveInt(1000),
  WORKER_CONCURRENCY: positiveInt(2),
});

export interface WorkerConfig {
  databaseUrl: string;
  redisUrl: string;
  runSources: string[];
  runCron: string;
  rulesDir?: string;
  snapshotPageSize: number;
  concurrency: number;
}

export class WorkerConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid worker configuration: ${issues.join('; ')}`);
    this.name = 'WorkerConfigError';
    this.issues = issues;
  }
}

/**
 * Read the worker configuration from the environment. Logging settings are
 * read separately by createWorkerLogger.
 */
export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new WorkerConfigError(
      result.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    );
  }

  const parsed = result.data;
  return {
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,
    runSources: parsed.RUN_SOURCES,
    runCron: parsed.RUN_CRON,
    rulesDir: parsed.RULES_DIR,
    snapshotPageSize: parsed.SNAPSHOT_PAGE_SIZE,
    concurrency: parsed.WORKER_CONCURRENCY,
  };
}

import type { Job } from 'bullmq';
import { rawPostings, type Database } from '@jobledger/db';
import {
  ingestPartition,
  normalizeTimestamp,
  type PartitionIngestionResult,
  type PartitionStore,
  type RuleConfig,
} from '@jobledger/ingestion';
import { and, asc, eq } from 'drizzle-orm';
import type { Logger } from 'pino';
import { PARTITION_BUILD_QUEUE, type PartitionBuildJobData } from '../queues.js';
import { createIngestionLogger } from '../observability/ingestion-logger.js';

export interface BuildPartitionJobDeps {
  db: Database;
  store: PartitionStore;
  rules: RuleConfig;
  logger: Logger;
}

export interface LandedPosting {
  payload: unknown;
  landedAt: Date;
}

/** Raw payloads landed for one (run_date, source), in landing order. */
export async function loadRawPostings(db: Database, runDate: string, source: string): Promise<LandedPosting[]> {
  return db
    .select({ payload: rawPostings.payload, landedAt: rawPostings.landedAt })
    .from(rawPostings)
    .where(and(eq(rawPostings.runDate, runDate), eq(rawPostings.source, source)))
    .orderBy(asc(rawPostings.id));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A posting without a usable `scrapedAt` takes the time its row landed, so a
 * rebuild of the same slice produces the same records.
 */
export function withLandedAt({ payload, landedAt }: LandedPosting): unknown {
  if (!isPlainObject(payload)) return payload;
  const own = typeof payload.scrapedAt === 'string' ? normalizeTimestamp(payload.scrapedAt) : null;
  if (own) return payload;
  return { ...payload, scrapedAt: landedAt.toISOString() };
}

function latestLanding(rows: readonly LandedPosting[]): string | undefined {
  let latest: number | undefined;
  for (const row of rows) {
    const time = row.landedAt.getTime();
    if (latest === undefined || time > latest) latest = time;
  }
  return latest === undefined ? undefined : new Date(latest).toISOString();
}

export async function handleBuildPartitionJob(
  job: Job<PartitionBuildJobData>,
  deps: BuildPartitionJobDeps,
): Promise<PartitionIngestionResult> {
  const { runDate, source } = job.data;
  const rows = await loadRawPostings(deps.db, runDate, source);
  const ingestionLogger = createIngestionLogger(
    deps.logger.child({
      queue: PARTITION_BUILD_QUEUE,
      runDate,
      source,
      traceId: job.data.traceId,
    }),
  );

  const result = await ingestPartition(rows.map(withLandedAt), {
    key: { runDate, source },
    store: deps.store,
    rules: deps.rules,
    scrapedAt: latestLanding(rows),
    logger: ingestionLogger,
  });

  if (result.errors.length > 0) {
    throw new Error(`[${PARTITION_BUILD_QUEUE}:${runDate}:${source}] ${result.errors.join(' | ')}`);
  }

  return result;
}

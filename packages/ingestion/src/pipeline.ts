import { buildBatch } from './batch.js';
import { classifyAgainstHistory } from './dedup.js';
import { reduceLatest } from './latest.js';
import { normalizeSource, normalizeTimestamp } from './normalize.js';
import { normalizePartitionKey, type PartitionStore } from './partition-store.js';
import type { RuleConfig } from './rule-config.js';
import type {
  BatchStageStats,
  IngestionLogger,
  PartitionIngestionResult,
  PartitionKey,
  SnapshotResult,
} from './types.js';

const defaultLogger: IngestionLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

export interface IngestPartitionOptions {
  key: PartitionKey;
  store: PartitionStore;
  rules: RuleConfig;
  /** Fallback scrape timestamp for postings without one. Defaults to now. */
  scrapedAt?: string;
  logger?: IngestionLogger;
}

function formatCounts(counts: Record<string, number | undefined>): string {
  return Object.entries(counts)
    .map(([reason, count]) => `${reason}=${count ?? 0}`)
    .join(', ');
}

/**
 * Build one (run_date, source) partition and replace it in the store.
 * Stages: build → history dedup → write
 */
export async function ingestPartition(
  postings: readonly unknown[],
  options: IngestPartitionOptions,
): Promise<PartitionIngestionResult> {
  const { store, rules, logger = defaultLogger } = options;
  const start = performance.now();
  const errors: string[] = [];
  const runDate = options.key.runDate;
  const source = normalizeSource(options.key.source);
  const tag = `[ingest:${runDate}:${source}]`;

  const stats: BatchStageStats = {
    received: postings.length,
    accepted: 0,
    rejected: 0,
    rejectsByReason: {},
    newJobs: 0,
    seenBefore: 0,
    written: 0,
  };

  try {
    const key = normalizePartitionKey(options.key);
    const scrapedAt = normalizeTimestamp(options.scrapedAt) ?? new Date().toISOString();

    // 1. Build
    logger.info(`${tag} Building ${postings.length} postings`);
    const batch = buildBatch(postings, { runDate: key.runDate, source: key.source, scrapedAt, rules });
    stats.accepted = batch.stats.accepted;
    stats.rejected = batch.stats.rejected;
    stats.rejectsByReason = batch.stats.rejectsByReason;
    if (batch.rejects.length > 0) {
      logger.warn(`${tag} ${batch.rejects.length} postings rejected (${formatCounts(batch.stats.rejectsByReason)})`);
    }

    // 2. History dedup
    const history = await classifyAgainstHistory(batch.records, store, key.runDate);
    stats.newJobs = history.newJobs.length;
    stats.seenBefore = history.seenBefore.length;
    logger.info(`${tag} ${stats.newJobs} new jobs, ${stats.seenBefore} seen in earlier runs`);

    // 3. Write
    const written = await store.writePartition(key, batch.records, batch.rejects);
    stats.written = written.written;
    logger.info(`${tag} Partition replaced: ${written.written} jobs, ${written.rejects} rejects`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    errors.push(message);
    logger.error(`${tag} Error: ${message}`);
  }

  return {
    runDate,
    source,
    stats,
    errors,
    durationMs: performance.now() - start,
  };
}

export interface RefreshLatestOptions {
  logger?: IngestionLogger;
}

/**
 * Recompute the latest snapshot from every stored partition and replace the
 * materialized copy.
 */
export async function refreshLatestSnapshot(
  store: PartitionStore,
  options: RefreshLatestOptions = {},
): Promise<SnapshotResult> {
  const { logger = defaultLogger } = options;
  const start = performance.now();
  let scanned = 0;

  async function* counted() {
    for await (const record of store.scanLatestOrder()) {
      scanned++;
      yield record;
    }
  }

  const jobs = await store.replaceLatest(reduceLatest(counted()));
  logger.info(`[snapshot] ${jobs} latest jobs from ${scanned} partition rows`);

  return { jobs, scanned, durationMs: performance.now() - start };
}

import type { Job } from 'bullmq';
import {
  refreshLatestSnapshot,
  summarizeRecords,
  type PartitionStore,
  type RunSummary,
  type SnapshotResult,
} from '@jobledger/ingestion';
import type { Logger } from 'pino';
import { LATEST_SNAPSHOT_QUEUE, type LatestSnapshotJobData } from '../queues.js';
import { createIngestionLogger } from '../observability/ingestion-logger.js';

export interface LatestSnapshotJobDeps {
  store: PartitionStore;
  logger: Logger;
}

export interface LatestSnapshotJobResult extends SnapshotResult {
  runDate: string;
  summary: RunSummary;
}

export async function handleLatestSnapshotJob(
  job: Job<LatestSnapshotJobData>,
  deps: LatestSnapshotJobDeps,
): Promise<LatestSnapshotJobResult> {
  const logger = deps.logger.child({
    queue: LATEST_SNAPSHOT_QUEUE,
    runDate: job.data.runDate,
    traceId: job.data.traceId,
  });

  const snapshot = await refreshLatestSnapshot(deps.store, {
    logger: createIngestionLogger(logger),
  });
  const summary = summarizeRecords(await deps.store.readLatest());

  logger.info(
    {
      event: 'snapshot_summary',
      totalJobs: summary.totalJobs,
      bySource: summary.bySource,
      uniqueCompanies: summary.uniqueCompanies,
      remoteJobs: summary.remoteJobs,
      statesCovered: summary.statesCovered,
      topSkills: summary.topSkills.slice(0, 10),
    },
    'Latest snapshot summary',
  );

  return {
    ...snapshot,
    runDate: job.data.runDate,
    summary,
  };
}

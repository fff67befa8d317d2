import type { Job } from 'bullmq';
import type { DailyRunJobData, Queues } from '../queues.js';
import { enqueueRun, type EnqueuedRun } from '../scheduler.js';

export interface DailyRunJobDeps {
  queues: Pick<Queues, 'flowProducer'>;
}

/** UTC calendar date of the tick that produced the job. */
export function runDateFromTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * The cron tick a repeatable job stands for. BullMQ creates each iteration
 * ahead of time, so `timestamp` is when the previous one ran; the tick itself
 * is kept in `opts.prevMillis`.
 */
export function tickMillis(job: Job<DailyRunJobData>): number {
  return job.opts?.prevMillis ?? job.timestamp;
}

export async function handleDailyRunJob(job: Job<DailyRunJobData>, deps: DailyRunJobDeps): Promise<EnqueuedRun> {
  const runDate = job.data.runDate ?? runDateFromTimestamp(tickMillis(job));

  return enqueueRun(deps.queues.flowProducer, {
    runDate,
    sources: job.data.sources,
    traceId: job.data.traceId,
  });
}

import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { withTrace, type TraceableData } from './trace.js';

export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
  cause?: SerializedError;
}

export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    ...(error.cause === undefined ? {} : { cause: serializeError(error.cause) }),
  };
}

export interface WithLoggerOptions<TData extends TraceableData, TResult> {
  logger: Logger;
  queue: string;
  job: Job<TData>;
  context?: (traceId: string) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

/**
 * Wrap a job processor with job_started / job_completed / job_failed events.
 * Failures are rethrown so BullMQ applies the job's retry policy; the failure
 * event says whether another attempt follows.
 */
export async function withLogger<TData extends TraceableData, TResult>({
  logger,
  queue,
  job,
  context,
  summary,
  run,
}: WithLoggerOptions<TData, TResult>): Promise<TResult> {
  const traceId = withTrace(job);
  const attempt = job.attemptsMade + 1;
  const maxAttempts = job.opts?.attempts ?? 1;
  const startedAt = Date.now();
  const fields = {
    queue,
    jobName: job.name,
    jobId: String(job.id ?? 'unknown'),
    // Set on partition builds: the snapshot job waiting for them.
    parentJobId: job.parent?.id,
    attempt,
    traceId,
    ...context?.(traceId),
  };

  logger.info(
    {
      event: 'job_started',
      ...fields,
      waitMs: job.timestamp > 0 ? Math.max(0, startedAt - job.timestamp) : undefined,
    },
    'Job started',
  );

  let result: TResult;
  try {
    result = await run();
  } catch (error) {
    const willRetry = attempt < maxAttempts;
    logger.error(
      {
        event: 'job_failed',
        ...fields,
        maxAttempts,
        willRetry,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      willRetry ? 'Job failed, retry scheduled' : 'Job failed',
    );
    throw error;
  }

  logger.info(
    {
      event: 'job_completed',
      ...fields,
      durationMs: Date.now() - startedAt,
      ...summary?.(result),
    },
    'Job completed',
  );
  return result;
}

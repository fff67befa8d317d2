import type { IngestionLogger } from '@jobledger/ingestion';
import type { Logger } from 'pino';

/** Routes engine stage messages into pino; info-level stage chatter goes to debug. */
export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    info: (message) => logger.debug({ event: 'ingestion_stage' }, message),
    warn: (message) => logger.warn({ event: 'ingestion_stage' }, message),
    error: (message) => logger.error({ event: 'ingestion_stage' }, message),
  };
}

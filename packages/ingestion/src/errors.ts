import type { PartitionKey } from './types.js';

export class RuleConfigError extends Error {
  readonly file?: string;

  constructor(message: string, file?: string, options?: { cause?: unknown }) {
    super(file ? `${message} (${file})` : message, options);
    this.name = 'RuleConfigError';
    this.file = file;
  }
}

export class PartitionKeyMismatchError extends Error {
  readonly key: PartitionKey;
  readonly jobKey: string;

  constructor(key: PartitionKey, jobKey: string, found: PartitionKey) {
    super(
      `Record ${jobKey} belongs to partition ${found.runDate}/${found.source}, not ${key.runDate}/${key.source}`,
    );
    this.name = 'PartitionKeyMismatchError';
    this.key = key;
    this.jobKey = jobKey;
  }
}

export class SnapshotOrderError extends Error {
  readonly previous: string;
  readonly current: string;

  constructor(previous: string, current: string) {
    super(`Snapshot input is not ordered by job key: ${current} after ${previous}`);
    this.name = 'SnapshotOrderError';
    this.previous = previous;
    this.current = current;
  }
}

export { createDatabase, type Database } from './client.js';
export { rawPostings, jobPartitions, jobLatest, jobRejects } from './schema.js';

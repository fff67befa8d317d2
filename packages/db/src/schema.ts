import {
  pgTable,
  bigserial,
  text,
  varchar,
  date,
  timestamp,
  boolean,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

/**
 * Landing table written by source connectors. The build job reads one
 * (run_date, source) slice of it.
 */
export const rawPostings = pgTable(
  'raw_postings',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    runDate: date('run_date', { mode: 'string' }).notNull(),
    source: varchar({ length: 50 }).notNull(),
    payload: jsonb().notNull(),
    landedAt: timestamp('landed_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [index('idx_raw_postings_run_source').on(t.runDate, t.source, t.id)],
);

/** Columns shared by the history and latest-snapshot tables. */
const canonicalColumns = () => ({
  runDate: date('run_date', { mode: 'string' }).notNull(),
  source: varchar({ length: 50 }).notNull(),
  jobKey: varchar('job_key', { length: 64 }).notNull(),
  sourceJobId: varchar('source_job_id', { length: 255 }).notNull(),
  jobUrl: text('job_url'),
  companyId: varchar('company_id', { length: 64 }).notNull(),
  companyName: varchar('company_name', { length: 255 }),
  companyDomain: varchar('company_domain', { length: 255 }),
  title: text().notNull(),
  description: text().notNull(),
  department: varchar({ length: 255 }),
  employmentType: varchar('employment_type', { length: 100 }),
  locationRaw: varchar('location_raw', { length: 500 }).notNull(),
  city: varchar({ length: 255 }),
  state: varchar({ length: 2 }),
  postalCode: varchar('postal_code', { length: 10 }),
  msa: varchar({ length: 255 }),
  country: varchar({ length: 2 }).notNull(),
  isRemote: boolean('is_remote').notNull(),
  postedAt: date('posted_at', { mode: 'string' }),
  scrapedAt: timestamp('scraped_at', { withTimezone: true }).notNull(),
  roleFamily: varchar('role_family', { length: 100 }),
  skills: text().array().notNull(),
  industryTag: varchar('industry_tag', { length: 100 }),
});

/**
 * Canonical history, one row per job per (run_date, source) partition.
 * Rows of a partition are replaced wholesale when the run is repeated.
 */
export const jobPartitions = pgTable('job_partitions', canonicalColumns(), (t) => [
  uniqueIndex('uq_job_partitions_key').on(t.runDate, t.source, t.jobKey),
  index('idx_job_partitions_job_key').on(t.jobKey, t.runDate, t.scrapedAt),
]);

/**
 * Materialized latest snapshot: one row per job_key, rebuilt from
 * job_partitions on every snapshot run.
 */
export const jobLatest = pgTable('job_latest', canonicalColumns(), (t) => [
  uniqueIndex('uq_job_latest_job_key').on(t.jobKey),
  index('idx_job_latest_state').on(t.state),
]);

export const jobRejects = pgTable(
  'job_rejects',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    runDate: date('run_date', { mode: 'string' }).notNull(),
    source: varchar({ length: 50 }).notNull(),
    sourceJobId: varchar('source_job_id', { length: 255 }),
    companyId: varchar('company_id', { length: 64 }),
    companyName: varchar('company_name', { length: 255 }),
    locationRaw: varchar('location_raw', { length: 500 }),
    reason: varchar({ length: 50 }).notNull(),
    detail: text().notNull(),
  },
  (t) => [index('idx_job_rejects_run_source').on(t.runDate, t.source), index('idx_job_rejects_reason').on(t.reason)],
);

export type AtsType = 'greenhouse' | 'lever' | 'unknown';

/**
 * One job posting as landed by a source connector. Required keys are
 * `source`, `sourceJobId`, `companyId`, `title` and `locationRaw`;
 * everything else may be missing or null.
 */
export interface RawJobPosting {
  source: string;
  sourceJobId: string;
  companyId: string;
  companyName?: string | null;
  companyDomain?: string | null;
  title: string;
  description?: string | null;
  locationRaw: string;
  department?: string | null;
  employmentType?: string | null;
  /** ISO date or date-time as published by the ATS. */
  postedAt?: string | null;
  jobUrl?: string | null;
  /** ISO timestamp of the fetch that produced this posting. */
  scrapedAt?: string | null;
}

export interface CompanySeed {
  companyName: string;
  careersUrl?: string;
  atsType?: AtsType;
  isPortfolio: boolean;
  notes?: string;
}

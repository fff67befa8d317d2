import { createHash } from 'node:crypto';

export interface JobIdentity {
  source: string;
  sourceJobId: string;
  companyId: string;
}

/**
 * SHA-256 over the immutable identity of a posting. Title, description and
 * location are excluded: they get edited between scrapes without the posting
 * becoming a different job. Changing this format is a breaking schema change.
 */
export function computeJobKey({ source, sourceJobId, companyId }: JobIdentity): string {
  const input = [source.toLowerCase().trim(), sourceJobId.trim(), companyId.trim()].join('|');
  return createHash('sha256').update(input).digest('hex');
}

import { createHash } from 'node:crypto';

/**
 * Stable 16-hex company id. Connectors stamp it on every posting so the job
 * key does not depend on how a company's display name is spelled later.
 */
export function generateCompanyId(companyName: string, domain?: string | null): string {
  const name = companyName.toLowerCase().trim();
  const input = domain ? `${name}|${domain.toLowerCase().trim()}` : name;
  return createHash('sha256').update(input).digest('hex').slice(0, 16);
}

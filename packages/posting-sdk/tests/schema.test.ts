import { describe, it, expect, vi } from 'vitest';
import { companySeedSchema, validateRawPosting, validateRawPostings } from '../src/schema.js';
import { generateCompanyId } from '../src/company.js';

const posting = {
  source: 'lever',
  sourceJobId: 'b7c1',
  companyId: 'abc',
  title: 'Account Executive',
  locationRaw: 'Chicago, IL',
};

describe('validateRawPosting', () => {
  it('accepts a minimal posting', () => {
    const result = validateRawPosting(posting);

    expect(result).toEqual({ success: true, posting });
  });

  it('coerces numeric source job ids to strings', () => {
    const result = validateRawPosting({ ...posting, sourceJobId: 4242 });

    expect(result.success && result.posting.sourceJobId).toBe('4242');
  });

  it('names every missing or blank required field', () => {
    const result = validateRawPosting({ ...posting, companyId: '   ', locationRaw: undefined });

    expect(result.success).toBe(false);
    expect(!result.success && result.missingFields).toEqual(['companyId', 'locationRaw']);
  });

  it('reports values longer than their storage column as invalid', () => {
    const result = validateRawPosting({ ...posting, locationRaw: 'x'.repeat(501), department: 'd'.repeat(256) });

    expect(result.success).toBe(false);
    expect(!result.success && result.missingFields).toEqual([]);
    expect(!result.success && result.invalidFields).toEqual([
      { field: 'locationRaw', message: 'longer than 500 characters' },
      { field: 'department', message: 'longer than 255 characters' },
    ]);
  });

  it('measures length after trimming', () => {
    const result = validateRawPosting({ ...posting, locationRaw: `  ${'x'.repeat(500)}  ` });

    expect(result.success).toBe(true);
  });

  it('reports NUL characters as invalid', () => {
    const result = validateRawPosting({ ...posting, title: 'Account\u0000Executive' });

    expect(!result.success && result.invalidFields).toEqual([{ field: 'title', message: 'must not contain NUL characters' }]);
  });

  it('allows null optional fields', () => {
    const result = validateRawPosting({ ...posting, description: null, postedAt: null });

    expect(result.success).toBe(true);
  });
});

describe('validateRawPostings', () => {
  it('drops invalid postings and reports them', () => {
    const onInvalid = vi.fn();

    const valid = validateRawPostings([posting, { title: 'No identity' }], { onInvalid });

    expect(valid).toEqual([posting]);
    expect(onInvalid).toHaveBeenCalledTimes(1);
    expect(onInvalid.mock.calls[0]?.[1]).toEqual({ title: 'No identity' });
  });
});

describe('companySeedSchema', () => {
  it('defaults the portfolio flag', () => {
    expect(companySeedSchema.parse({ companyName: 'Acme', atsType: 'greenhouse' })).toEqual({
      companyName: 'Acme',
      atsType: 'greenhouse',
      isPortfolio: false,
    });
  });

  it('rejects unknown ATS types', () => {
    expect(companySeedSchema.safeParse({ companyName: 'Acme', atsType: 'workday' }).success).toBe(false);
  });
});

describe('generateCompanyId', () => {
  it('hashes the lowercased name and optional domain', () => {
    expect(generateCompanyId('Acme Corp')).toBe('ea6f9c07a2f95c78');
    expect(generateCompanyId(' ACME corp ', 'Acme.com')).toBe('a379484916f90fec');
  });
});

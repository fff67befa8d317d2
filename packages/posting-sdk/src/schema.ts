import { z } from 'zod';

/**
 * Longest value each field may carry, matching the storage columns. Fields
 * without an entry are unbounded text.
 */
export const POSTING_FIELD_LIMITS = {
  source: 50,
  sourceJobId: 255,
  companyId: 64,
  companyName: 255,
  companyDomain: 255,
  locationRaw: 500,
  department: 255,
  employmentType: 100,
} as const;

const hasNoNul = (value: string) => !value.includes('\u0000');
const NUL_MESSAGE = 'must not contain NUL characters';

function requiredText(max?: number) {
  const text = z.string().trim();
  return (max === undefined ? text : text.max(max, `longer than ${max} characters`)).min(1).refine(hasNoNul, NUL_MESSAGE);
}

function optionalText(max?: number) {
  const text = z.string().trim();
  return (max === undefined ? text : text.max(max, `longer than ${max} characters`)).refine(hasNoNul, NUL_MESSAGE).nullish();
}

export const REQUIRED_POSTING_FIELDS = ['source', 'sourceJobId', 'companyId', 'title', 'locationRaw'] as const;

export type RequiredPostingField = (typeof REQUIRED_POSTING_FIELDS)[number];

export const rawJobPostingSchema = z.object({
  source: requiredText(POSTING_FIELD_LIMITS.source),
  sourceJobId: z
    .union([z.string(), z.number().int().transform(String)])
    .pipe(requiredText(POSTING_FIELD_LIMITS.sourceJobId)),
  companyId: requiredText(POSTING_FIELD_LIMITS.companyId),
  companyName: optionalText(POSTING_FIELD_LIMITS.companyName),
  companyDomain: optionalText(POSTING_FIELD_LIMITS.companyDomain),
  title: requiredText(),
  description: optionalText(),
  locationRaw: requiredText(POSTING_FIELD_LIMITS.locationRaw),
  department: optionalText(POSTING_FIELD_LIMITS.department),
  employmentType: optionalText(POSTING_FIELD_LIMITS.employmentType),
  postedAt: optionalText(),
  jobUrl: optionalText(),
  scrapedAt: optionalText(),
});

export type ValidatedRawPosting = z.infer<typeof rawJobPostingSchema>;

export const companySeedSchema = z.object({
  companyName: requiredText(),
  careersUrl: z.string().url().optional(),
  atsType: z.enum(['greenhouse', 'lever', 'unknown']).optional(),
  isPortfolio: z.boolean().default(false),
  notes: z.string().optional(),
});

export interface InvalidPostingField {
  field: string;
  message: string;
}

export type PostingValidationResult =
  | { success: true; posting: ValidatedRawPosting }
  | { success: false; missingFields: string[]; invalidFields: InvalidPostingField[]; issues: z.ZodIssue[] };

// Present but unstorable, as opposed to absent or blank.
function isInvalidValue(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.too_big || issue.code === z.ZodIssueCode.custom;
}

/**
 * Validate one posting. Failures name the top-level fields involved, split
 * into missing (absent, blank or mistyped) and invalid (too long for storage
 * or carrying NUL characters).
 */
export function validateRawPosting(input: unknown): PostingValidationResult {
  const result = rawJobPostingSchema.safeParse(input);
  if (result.success) {
    return { success: true, posting: result.data };
  }

  const missing = new Set<string>();
  const invalid = new Map<string, string>();
  for (const issue of result.error.issues) {
    const [head] = issue.path;
    const field = head === undefined ? '(root)' : String(head);
    if (isInvalidValue(issue)) {
      if (!invalid.has(field)) invalid.set(field, issue.message);
    } else {
      missing.add(field);
    }
  }

  return {
    success: false,
    missingFields: [...missing],
    invalidFields: [...invalid].map(([field, message]) => ({ field, message })),
    issues: result.error.issues,
  };
}

export interface ValidateRawPostingsOptions {
  onInvalid?: (issues: z.ZodIssue[], posting: unknown) => void;
}

export function validateRawPostings(postings: unknown[], options?: ValidateRawPostingsOptions): ValidatedRawPosting[] {
  const valid: ValidatedRawPosting[] = [];

  for (const posting of postings) {
    const result = validateRawPosting(posting);
    if (result.success) {
      valid.push(result.posting);
    } else {
      options?.onInvalid?.(result.issues, posting);
    }
  }

  return valid;
}

import { POSTING_FIELD_LIMITS, validateRawPosting, type ValidatedRawPosting } from '@jobledger/posting-sdk';
import { extractSkills } from './skills.js';
import { classifyRoleFamily } from './role-family.js';
import { tagIndustry } from './industry.js';
import { computeJobKey } from './job-key.js';
import {
  normalizeDescription,
  normalizeOptionalText,
  normalizePostedDate,
  normalizeSource,
  normalizeTimestamp,
  normalizeWhitespace,
} from './normalize.js';
import type { BuildContext, BuildOutcome, RejectReason, RejectRecord } from './types.js';

/** Drop NUL characters and cut to the column width. */
function storable(text: string, max?: number): string {
  const clean = text.replaceAll('\u0000', '');
  return max === undefined ? clean : clean.slice(0, max);
}

type LimitedField = keyof typeof POSTING_FIELD_LIMITS;

// Rejected input may be arbitrarily long; rejects are still stored.
function readField(input: unknown, key: LimitedField): string | null {
  if (typeof input !== 'object' || input === null) return null;
  const value: unknown = Reflect.get(input, key);
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return null;
  const text = normalizeOptionalText(storable(value));
  return text === null ? null : storable(text, POSTING_FIELD_LIMITS[key]);
}

function rejectFromInput(input: unknown, runDate: string, reason: RejectReason, detail: string): RejectRecord {
  const source = readField(input, 'source');
  return {
    runDate,
    source: source ? normalizeSource(source) : null,
    sourceJobId: readField(input, 'sourceJobId'),
    companyId: readField(input, 'companyId'),
    companyName: readField(input, 'companyName'),
    locationRaw: readField(input, 'locationRaw'),
    reason,
    detail,
  };
}

function rejectFromPosting(
  posting: ValidatedRawPosting,
  runDate: string,
  reason: RejectReason,
  detail: string,
): RejectRecord {
  return {
    runDate,
    source: normalizeSource(posting.source),
    sourceJobId: posting.sourceJobId.trim(),
    companyId: posting.companyId.trim(),
    companyName: normalizeOptionalText(posting.companyName),
    locationRaw: normalizeWhitespace(posting.locationRaw),
    reason,
    detail,
  };
}

/**
 * Turn one raw posting into a canonical record or a reject. Never throws for
 * bad input: validation, location and enrichment failures all come back as
 * rejects with a reason code.
 */
export function buildCanonicalRecord(input: unknown, context: BuildContext): BuildOutcome {
  const { runDate, rules } = context;

  const validation = validateRawPosting(input);
  if (!validation.success) {
    const reject =
      validation.missingFields.length > 0
        ? rejectFromInput(input, runDate, 'missing_required_field', `Missing or empty: ${validation.missingFields.join(', ')}`)
        : rejectFromInput(
            input,
            runDate,
            'invalid_field',
            `Invalid: ${validation.invalidFields.map(({ field, message }) => `${field} (${message})`).join(', ')}`,
          );
    return { action: 'reject', reject };
  }

  const posting = validation.posting;

  try {
    const locationRaw = normalizeWhitespace(posting.locationRaw);
    const location = rules.location.classify(locationRaw);

    if (!location.accepted) {
      const country = location.country ? ` (${location.country})` : '';
      return {
        action: 'reject',
        reject: rejectFromPosting(posting, runDate, location.reason, `Location "${locationRaw}" is ${location.reason}${country}`),
      };
    }

    const source = normalizeSource(posting.source);
    const sourceJobId = posting.sourceJobId.trim();
    const companyId = posting.companyId.trim();
    const title = normalizeWhitespace(posting.title);
    const description = normalizeDescription(posting.description);
    const companyName = normalizeOptionalText(posting.companyName);
    const companyDomain = normalizeOptionalText(posting.companyDomain)?.toLowerCase() ?? null;

    return {
      action: 'accept',
      record: {
        jobKey: computeJobKey({ source, sourceJobId, companyId }),
        runDate,
        scrapedAt: normalizeTimestamp(posting.scrapedAt) ?? context.scrapedAt,
        source,
        sourceJobId,
        jobUrl: normalizeOptionalText(posting.jobUrl),
        companyId,
        companyName,
        companyDomain,
        title,
        description,
        department: normalizeOptionalText(posting.department),
        employmentType: normalizeOptionalText(posting.employmentType),
        locationRaw,
        city: location.city,
        state: location.state,
        postalCode: location.postalCode,
        msa: location.msa,
        country: 'US',
        isRemote: location.isRemote,
        postedAt: normalizePostedDate(posting.postedAt),
        roleFamily: classifyRoleFamily(title, description, rules.roleTaxonomy),
        skills: extractSkills(title, description, rules.skillLexicon),
        industryTag: tagIndustry({ companyName, companyDomain, description }, rules.industryRules),
      },
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      action: 'reject',
      reject: rejectFromPosting(posting, runDate, 'enrichment_error', storable(message)),
    };
  }
}

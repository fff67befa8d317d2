export type { RawJobPosting, CompanySeed, AtsType } from './types.js';
export {
  rawJobPostingSchema,
  companySeedSchema,
  validateRawPosting,
  validateRawPostings,
  REQUIRED_POSTING_FIELDS,
  POSTING_FIELD_LIMITS,
} from './schema.js';
export type {
  ValidatedRawPosting,
  PostingValidationResult,
  InvalidPostingField,
  ValidateRawPostingsOptions,
  RequiredPostingField,
} from './schema.js';
export { generateCompanyId } from './company.js';

const RUN_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Strip HTML tags from a string. Converts block-level elements to newlines
 * to preserve document structure, then removes remaining tags.
 * Decodes common HTML entities.
 */
export function stripHtml(html: string): string {
  let text = html;

  // Preserve block-level breaks
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/(p|li|div|h[1-6])>/gi, '\n');

  text = text.replace(/<[^>]+>/g, '');
  text = decodeHtmlEntities(text);

  return text
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v\r]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Decode a small set of common HTML entities.
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

/**
 * Plain-text description. Greenhouse ships entity-escaped HTML, so escaped
 * markup is decoded once before tags are removed.
 */
export function normalizeDescription(description: string | null | undefined): string {
  if (!description) return '';
  const html = /&lt;\/?[a-z][^&]*&gt;/i.test(description) ? decodeHtmlEntities(description) : description;
  return stripHtml(html);
}

/** Collapse whitespace; blank becomes null. */
export function normalizeOptionalText(value: string | null | undefined): string | null {
  if (value == null) return null;
  const text = normalizeWhitespace(value);
  return text || null;
}

function parseDate(value: string): Date | null {
  const text = value.trim();
  if (!text) return null;

  // Lever sends epoch milliseconds.
  const parsed = /^\d+$/.test(text) ? new Date(Number(text)) : new Date(text);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Posting date as `YYYY-MM-DD`, or null when absent or unparseable.
 * A bare date is kept as written; timestamps are read in UTC.
 */
export function normalizePostedDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const text = value.trim();
  if (RUN_DATE_PATTERN.test(text)) {
    return parseDate(text) ? text : null;
  }
  return parseDate(text)?.toISOString().slice(0, 10) ?? null;
}

/** ISO-8601 UTC timestamp, or null when absent or unparseable. */
export function normalizeTimestamp(value: string | null | undefined): string | null {
  if (!value) return null;
  return parseDate(value)?.toISOString() ?? null;
}

export function isRunDate(value: string): boolean {
  return RUN_DATE_PATTERN.test(value) && parseDate(value)?.toISOString().slice(0, 10) === value;
}

export function assertRunDate(value: string): string {
  if (!isRunDate(value)) {
    throw new RangeError(`Invalid run date "${value}", expected YYYY-MM-DD`);
  }
  return value;
}

/** Source identifiers compare case-insensitively. */
export function normalizeSource(source: string): string {
  return source.trim().toLowerCase();
}

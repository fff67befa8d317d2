import { loadLocationData, type LocationData } from './location-data.js';
import { normalizeWhitespace } from './normalize.js';
import type { LocationClassification, LocationRejectReason } from './types.js';

const REMOTE_PATTERN = /(?<![a-z0-9])(remote|work from home|wfh|anywhere|distributed|virtual)(?![a-z0-9])/i;

const AMBIGUOUS_PATTERN =
  /(?<![a-z0-9])(remote|anywhere|multiple locations|various locations|several locations|global|globally|worldwide|flexible|hybrid|distributed|virtual|work from home|wfh|tbd|to be determined)(?![a-z0-9])/i;

const US_NAME_PATTERN = /(?<![a-z0-9])(united states(?: of america)?|usa|u\.s\.a\.?|u\.s\.)(?![a-z0-9])/i;

// Uppercase only: a lowercase "us" is the pronoun.
const US_CODE_PATTERN = /(?<![A-Za-z0-9])US(?![A-Za-z0-9])/;

// Uppercase two-letter token in a standalone position: start of text, after a
// delimiter, or after "US-". It may be followed by a ZIP, then a delimiter or end.
const STATE_CODE_PATTERN = /(?<=^|[,;|(/]|\bUS\s*-)\s*([A-Z]{2})(?:\s+\d{5}(?:-\d{4})?)?\s*(?=$|[,;|()/\-–])/g;

const POSTAL_CODE_PATTERN = /(?<!\d)(\d{5})(?:-\d{4})?(?!\d)/;

const SEGMENT_SEPARATOR = /[,;|]/;

const CITY_PREFIX_PATTERN = /^(?:greater|metro)\s+/i;

// "Canada or US", "Austin & Dallas": a list of places, not one city.
const PLACE_LIST_PATTERN = /(?<![a-z0-9])(?:or|and)(?![a-z0-9])|&/i;

// Width of the city column.
const MAX_CITY_LENGTH = 255;

const CITY_NOISE_PATTERN =
  /(?<![a-z0-9])(?:remote|hybrid|on-?site|work from home|wfh|in-office|office)(?![a-z0-9])\s*[-–:/]?\s*/gi;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function boundedPattern(term: string): RegExp {
  const body = term.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'i');
}

interface TermMatcher {
  pattern: RegExp;
  code: string | null;
}

function byLengthDesc(a: { term: string }, b: { term: string }): number {
  return b.term.length - a.term.length;
}

export class LocationClassifier {
  private readonly stateCodes: ReadonlySet<string>;
  private readonly stateNames: readonly TermMatcher[];
  private readonly nonUsMarkers: readonly TermMatcher[];
  private readonly markersByCountry: ReadonlyMap<string, readonly RegExp[]>;
  private readonly metroAreas: ReadonlyMap<string, string>;

  constructor(data: LocationData) {
    this.stateCodes = new Set(data.states.map((state) => state.code));

    // Longest first, so "West Virginia" wins over "Virginia".
    this.stateNames = data.states
      .flatMap((state) => [state.name, ...(state.aliases ?? [])].map((term) => ({ term, code: state.code })))
      .sort(byLengthDesc)
      .map(({ term, code }) => ({ pattern: boundedPattern(term), code }));

    this.nonUsMarkers = [...data.nonUsMarkers]
      .sort(byLengthDesc)
      .map(({ term, country }) => ({ pattern: boundedPattern(term), code: country }));

    const markersByCountry = new Map<string, RegExp[]>();
    for (const { term, country } of data.nonUsMarkers) {
      if (!country) continue;
      markersByCountry.set(country, [...(markersByCountry.get(country) ?? []), boundedPattern(term)]);
    }
    this.markersByCountry = markersByCountry;

    this.metroAreas = new Map(
      data.metroAreas.map((area) => [`${area.city.toLowerCase()}|${area.state}`, area.msa]),
    );
  }

  classify(locationRaw: string | null | undefined): LocationClassification {
    const text = normalizeWhitespace(locationRaw ?? '');
    const isRemote = REMOTE_PATTERN.test(text);

    if (!text) {
      return this.reject('ambiguous', null, isRemote);
    }

    const byCode = this.matchStateCode(text);
    if (byCode) {
      return this.accept(text, byCode.state, byCode.city, isRemote);
    }

    const byName = this.matchStateName(text);
    if (byName) {
      return this.accept(text, byName.state, byName.city, isRemote);
    }

    const usToken = US_NAME_PATTERN.exec(text) ?? US_CODE_PATTERN.exec(text);
    if (usToken) {
      return this.accept(text, null, this.cityBefore(text, usToken.index), isRemote);
    }

    const marker = this.nonUsMarkers.find((candidate) => candidate.pattern.test(text));
    if (marker) {
      return this.reject('non-US', marker.code, isRemote);
    }

    if (AMBIGUOUS_PATTERN.test(text)) {
      return this.reject('ambiguous', null, isRemote);
    }

    return this.reject('non-US', null, isRemote);
  }

  lookupMsa(city: string | null, state: string | null): string | null {
    if (!city || !state) return null;
    return this.metroAreas.get(`${city.toLowerCase()}|${state}`) ?? null;
  }

  private matchStateCode(text: string): { state: string; city: string | null } | null {
    for (const match of text.matchAll(STATE_CODE_PATTERN)) {
      const code = match[1];
      if (!code || !this.stateCodes.has(code)) continue;

      // "Berlin, DE" or "Bengaluru, Karnataka, IN": a code that is also the
      // country of a foreign place named in the same text.
      if (this.namesPlaceIn(text, code)) continue;

      const codeIndex = (match.index ?? 0) + match[0].indexOf(code);
      return { state: code, city: this.cityBefore(text, codeIndex) };
    }

    return null;
  }

  private namesPlaceIn(text: string, country: string): boolean {
    return (this.markersByCountry.get(country) ?? []).some((pattern) => pattern.test(text));
  }

  private matchStateName(text: string): { state: string; city: string | null } | null {
    for (const candidate of this.stateNames) {
      const match = candidate.pattern.exec(text);
      if (match && candidate.code) {
        return { state: candidate.code, city: this.cityBefore(text, match.index) };
      }
    }

    return null;
  }

  private cityBefore(text: string, index: number): string | null {
    const prefix = text
      .slice(0, index)
      .replace(/\bUS\s*-\s*$/, '')
      .replace(/[\s,;|(/\-–]+$/, '');
    const segments = prefix.split(SEGMENT_SEPARATOR);
    return cleanCity(segments[segments.length - 1] ?? '');
  }

  private accept(
    text: string,
    state: string | null,
    city: string | null,
    isRemote: boolean,
  ): LocationClassification {
    const postal = POSTAL_CODE_PATTERN.exec(text);
    return {
      accepted: true,
      reason: null,
      country: 'US',
      state,
      city,
      postalCode: postal?.[1] ?? null,
      msa: this.lookupMsa(city, state),
      isRemote,
    };
  }

  private reject(reason: LocationRejectReason, country: string | null, isRemote: boolean): LocationClassification {
    return {
      accepted: false,
      reason,
      country,
      state: null,
      city: null,
      postalCode: null,
      msa: null,
      isRemote,
    };
  }
}

function cleanCity(segment: string): string | null {
  const city = normalizeWhitespace(
    segment
      .replace(CITY_NOISE_PATTERN, ' ')
      .replace(/[()]/g, ' ')
      .replace(/^[\s\-–:/]+|[\s\-–:/]+$/g, ''),
  ).replace(CITY_PREFIX_PATTERN, '');

  if (!city || /\d/.test(city) || city.length > MAX_CITY_LENGTH) return null;
  if (PLACE_LIST_PATTERN.test(city)) return null;
  if (US_NAME_PATTERN.test(city) || US_CODE_PATTERN.test(city) || AMBIGUOUS_PATTERN.test(city)) return null;
  return city;
}

let defaultClassifier: LocationClassifier | undefined;

/** Classifier over the bundled location data, built on first use. */
export function getDefaultLocationClassifier(): LocationClassifier {
  defaultClassifier ??= new LocationClassifier(loadLocationData());
  return defaultClassifier;
}

export function classifyLocation(locationRaw: string | null | undefined): LocationClassification {
  return getDefaultLocationClassifier().classify(locationRaw);
}

import { ZodError } from 'zod';
import { MalformedQueryError } from '../errors/ProviderError';
import {
  Query,
  QueryLocation,
  SerializedQuery,
  Subject,
  TimeWindow,
} from '../types/EnvironmentalData';
import { queryInputSchema } from '../types/schemas';

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'query'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an inbound dashboard query and build an immutable Query.
 * Throws MalformedQueryError for anything that does not fit the contract.
 */
export function parseQuery(input: unknown, now: Date = new Date()): Query {
  const parsed = queryInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedQueryError(formatIssues(parsed.error));
  }

  const { subject, subjects, location, window, providers } = parsed.data;

  const requested: Subject[] = [];
  for (const s of [...(subject ? [subject] : []), ...(subjects ?? [])]) {
    if (!requested.includes(s)) {
      requested.push(s);
    }
  }

  let normalizedLocation: QueryLocation | null = null;
  if (location) {
    if ('regionCode' in location) {
      normalizedLocation = { kind: 'region', regionCode: location.regionCode };
    } else if ('city' in location) {
      normalizedLocation = { kind: 'city', name: location.city };
    } else {
      normalizedLocation = { kind: 'point', latitude: location.lat, longitude: location.lon };
    }
  }

  let normalizedWindow: TimeWindow | null = null;
  if (window) {
    const end = window.end ?? now;
    if (end.getTime() < window.start.getTime()) {
      throw new MalformedQueryError('window.start: must not be in the future');
    }
    normalizedWindow = Object.freeze({ start: window.start, end });
  }

  return Object.freeze({
    subjects: Object.freeze(requested),
    location: normalizedLocation ? Object.freeze(normalizedLocation) : null,
    window: normalizedWindow,
    providers: providers ? Object.freeze([...new Set(providers)]) : null,
  });
}

export function serializeQuery(query: Query): SerializedQuery {
  return {
    subjects: [...query.subjects],
    location: query.location ? { ...query.location } : null,
    window: query.window
      ? { start: query.window.start.toISOString(), end: query.window.end.toISOString() }
      : null,
    providers: query.providers ? [...query.providers] : null,
  };
}

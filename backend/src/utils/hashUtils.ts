import crypto from 'crypto';
import { Query, QueryLocation, TimeWindow } from '../types/EnvironmentalData';

export interface CacheKeyOptions {
  /** Decimal places kept from coordinates */
  locationPrecision: number;
  /** Window boundaries are aligned to multiples of this */
  windowBucketMs: number;
}

export const DEFAULT_CACHE_KEY_OPTIONS: CacheKeyOptions = {
  locationPrecision: 2,
  windowBucketMs: 60 * 60 * 1000,
};

/**
 * Round a coordinate to a fixed precision, folding -0 into 0
 */
export function roundCoordinate(value: number, precision: number): string {
  const rounded = Number(value.toFixed(precision));
  return (rounded === 0 ? 0 : rounded).toFixed(precision);
}

/**
 * Widen a window to bucket boundaries: start floored, end ceiled
 */
export function bucketWindow(window: TimeWindow, bucketMs: number): { start: number; end: number } {
  const start = window.start.getTime();
  const end = window.end.getTime();
  return {
    start: Math.floor(start / bucketMs) * bucketMs,
    end: Math.ceil(end / bucketMs) * bucketMs,
  };
}

function describeLocation(location: QueryLocation | null, precision: number): Record<string, string> | null {
  if (!location) {
    return null;
  }
  if (location.kind === 'point') {
    return {
      lat: roundCoordinate(location.latitude, precision),
      lon: roundCoordinate(location.longitude, precision),
    };
  }
  if (location.kind === 'city') {
    return { city: location.name.toLowerCase() };
  }
  return { region: location.regionCode.toUpperCase() };
}

/**
 * Generate the cache key for one provider serving a query.
 * Queries that differ only below the rounding precision or inside the
 * same window bucket share a key.
 */
export function generateCacheKey(
  provider: string,
  query: Pick<Query, 'location' | 'window'>,
  options: CacheKeyOptions = DEFAULT_CACHE_KEY_OPTIONS
): string {
  const hashContent = JSON.stringify({
    location: describeLocation(query.location, options.locationPrecision),
    window: query.window ? bucketWindow(query.window, options.windowBucketMs) : null,
  });

  const digest = crypto.createHash('sha256').update(hashContent).digest('hex');
  return `${provider.toLowerCase()}:${digest}`;
}

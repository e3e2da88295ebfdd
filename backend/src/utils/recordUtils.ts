import {
  NormalizedRecord,
  QueryLocation,
  RecordLocation,
  Subject,
} from '../types/EnvironmentalData';

type RecordSections = Partial<Omit<NormalizedRecord, 'subject' | 'provider' | 'location'>> & {
  location?: Partial<RecordLocation>;
};

/**
 * Create a NormalizedRecord with every field present.
 * Anything the provider did not supply is null.
 */
export function createNormalizedRecord(
  subject: Subject,
  provider: string,
  sections: RecordSections = {}
): NormalizedRecord {
  return {
    subject,
    provider,
    location: {
      latitude: sections.location?.latitude ?? null,
      longitude: sections.location?.longitude ?? null,
      regionCode: sections.location?.regionCode ?? null,
      name: sections.location?.name ?? null,
    },
    observedAt: sections.observedAt ?? null,
    airQuality: sections.airQuality ?? null,
    deforestation: sections.deforestation ?? null,
    birds: sections.birds ?? null,
    news: sections.news ?? null,
  };
}

/**
 * Record location taken from the query when the provider reports none
 */
export function locationFromQuery(location: QueryLocation | null): Partial<RecordLocation> {
  if (!location) {
    return {};
  }
  if (location.kind === 'point') {
    return { latitude: location.latitude, longitude: location.longitude };
  }
  if (location.kind === 'city') {
    return { name: location.name };
  }
  return { regionCode: location.regionCode };
}

/**
 * Country part of a region code: "US-NY-063" -> "US"
 */
export function countryOf(regionCode: string): string {
  return regionCode.split('-')[0].toUpperCase();
}

// US EPA AQI bands
const AQI_BANDS: Array<{ max: number; category: string; color: string }> = [
  { max: 50, category: 'Good', color: '#00e400' },
  { max: 100, category: 'Moderate', color: '#ffff00' },
  { max: 150, category: 'Unhealthy for Sensitive Groups', color: '#ff7e00' },
  { max: 200, category: 'Unhealthy', color: '#ff0000' },
  { max: 300, category: 'Very Unhealthy', color: '#99004c' },
];

const HAZARDOUS = { category: 'Hazardous', color: '#7e0023' };

export function aqiCategory(aqi: number): { category: string; color: string } {
  const band = AQI_BANDS.find((b) => aqi <= b.max);
  return band ? { category: band.category, color: band.color } : HAZARDOUS;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

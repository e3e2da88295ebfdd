import axios from 'axios';
import { FetchContext, ProviderAdapter } from '../services/ProviderAdapter';
import {
  AirQualityStation,
  NormalizedRecord,
  PollutantReading,
  ProviderConfig,
  Query,
} from '../types/EnvironmentalData';
import { countryOf, createNormalizedRecord, locationFromQuery, roundTo } from '../utils/recordUtils';

/**
 * OpenAQ data source
 * Latest pollutant measurements from stations near a point, in a city or in a country
 * https://docs.openaq.org/
 */

// =============================================================================
// Types
// =============================================================================

interface OpenAQMeasurement {
  parameter: string;
  value: number;
  lastUpdated: string;
  unit: string;
}

interface OpenAQLocation {
  location: string;
  city: string | null;
  country: string;
  coordinates: {
    latitude: number;
    longitude: number;
  } | null;
  measurements: OpenAQMeasurement[];
}

interface OpenAQResponse {
  meta: {
    name: string;
    found: number;
    limit: number;
    page: number;
  };
  results: OpenAQLocation[];
}

interface ParameterSummary {
  values: number[];
  unit: string;
  lastUpdated: string;
}

// =============================================================================
// OpenAQ Source Implementation
// =============================================================================

export class OpenAQSource extends ProviderAdapter {
  private readonly baseUrl: string;
  private readonly radiusMeters: number;

  constructor(config?: Partial<ProviderConfig> & { baseUrl?: string; radiusMeters?: number }) {
    super({
      name: 'OpenAQ',
      subject: 'airQuality',
      enabled: true,
      timeoutMs: 15000,
      maxResults: 100,
      ...config,
    });
    this.baseUrl = config?.baseUrl ?? 'https://api.openaq.org/v2';
    this.radiusMeters = config?.radiusMeters ?? 25000;
  }

  validate(query: Query): string | null {
    return query.location ? null : 'requires coordinates, a city or a country code';
  }

  protected async request(query: Query, context: FetchContext): Promise<NormalizedRecord> {
    const params: Record<string, string | number> = {
      limit: this.config.maxResults ?? 100,
      page: 1,
      sort: 'desc',
      order_by: 'lastUpdated',
    };
    if (query.location?.kind === 'point') {
      params.coordinates = `${query.location.latitude},${query.location.longitude}`;
      params.radius = this.radiusMeters;
    } else if (query.location?.kind === 'region') {
      params.country = countryOf(query.location.regionCode);
    } else if (query.location?.kind === 'city') {
      params.city = query.location.name;
    }

    this.logger.debug({ params }, 'Fetching OpenAQ latest measurements...');

    const response = await axios.get<OpenAQResponse>(`${this.baseUrl}/latest`, {
      params,
      headers: context.credential ? { 'X-API-Key': context.credential } : undefined,
      timeout: this.timeoutMs,
      signal: context.signal,
    });

    const stations = response.data?.results ?? [];
    this.logger.debug({ count: stations.length }, 'OpenAQ stations received');

    return this.transformStations(stations, query);
  }

  private transformStations(stations: OpenAQLocation[], query: Query): NormalizedRecord {
    const byParameter = new Map<string, ParameterSummary>();
    const breakdown: AirQualityStation[] = [];

    for (const station of stations) {
      const measurements: PollutantReading[] = [];
      for (const m of station.measurements ?? []) {
        if (typeof m.value !== 'number' || Number.isNaN(m.value)) {
          continue;
        }
        measurements.push({
          parameter: m.parameter,
          value: m.value,
          unit: m.unit || null,
          lastUpdated: m.lastUpdated || null,
        });

        const summary = byParameter.get(m.parameter);
        if (!summary) {
          byParameter.set(m.parameter, { values: [m.value], unit: m.unit, lastUpdated: m.lastUpdated });
          continue;
        }
        summary.values.push(m.value);
        if (m.lastUpdated > summary.lastUpdated) {
          summary.lastUpdated = m.lastUpdated;
        }
      }

      breakdown.push({
        name: station.location || 'Unknown',
        city: station.city || null,
        latitude: station.coordinates?.latitude ?? null,
        longitude: station.coordinates?.longitude ?? null,
        measurements,
      });
    }

    // Averages across stations, like the dashboard's pollution panel
    const pollutants: PollutantReading[] = Array.from(byParameter, ([parameter, s]) => ({
      parameter,
      value: roundTo(s.values.reduce((sum, v) => sum + v, 0) / s.values.length, 2),
      unit: s.unit || null,
      lastUpdated: s.lastUpdated || null,
    }));

    const observedAt = pollutants.reduce<string | null>(
      (latest, p) => (p.lastUpdated && (!latest || p.lastUpdated > latest) ? p.lastUpdated : latest),
      null
    );

    const single = stations.length === 1 ? stations[0] : null;
    const fromQuery = locationFromQuery(query.location);

    return createNormalizedRecord('airQuality', this.getName(), {
      location: {
        ...fromQuery,
        name: single ? single.location : fromQuery.name ?? null,
      },
      observedAt,
      airQuality: {
        aqi: null,
        category: null,
        color: null,
        dominantPollutant: null,
        stationName: single ? single.location : null,
        stationCount: stations.length,
        pollutants,
        forecast: null,
        stations: breakdown,
      },
    });
  }
}

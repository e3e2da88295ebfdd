import axios from 'axios';
import { ProviderError } from '../errors/ProviderError';
import { FetchContext, ProviderAdapter } from '../services/ProviderAdapter';
import {
  NormalizedRecord,
  PollutantForecast,
  PollutantReading,
  ProviderConfig,
  Query,
} from '../types/EnvironmentalData';
import { aqiCategory, createNormalizedRecord } from '../utils/recordUtils';

/**
 * World Air Quality Index data source
 * Fetches the nearest station's AQI for a coordinate pair, or a city's station by name
 * https://aqicn.org/json-api/doc/
 */

// =============================================================================
// Types
// =============================================================================

interface AQICNPollutant {
  v: number;
}

interface AQICNForecastDay {
  avg?: number;
  day: string;
  max?: number;
  min?: number;
}

interface AQICNStationData {
  aqi: number | '-';
  idx: number;
  city: {
    name: string;
    geo?: [number, number];
    url?: string;
  };
  dominentpol?: string;
  iaqi?: Record<string, AQICNPollutant | undefined>;
  time?: {
    s?: string;
    tz?: string;
    iso?: string;
  };
  forecast?: {
    daily?: Record<string, AQICNForecastDay[] | undefined>;
  };
}

// status "error" arrives with HTTP 200 and a message in data
type AQICNResponse =
  | { status: 'ok'; data: AQICNStationData }
  | { status: 'error'; data: string };

// =============================================================================
// AQICN Source Implementation
// =============================================================================

export class AQICNSource extends ProviderAdapter {
  protected readonly credentialRequired = true;
  private readonly baseUrl: string;

  constructor(config?: Partial<ProviderConfig> & { baseUrl?: string }) {
    super({
      name: 'AQICN',
      subject: 'airQuality',
      enabled: true,
      timeoutMs: 15000,
      ...config,
    });
    this.baseUrl = config?.baseUrl ?? 'https://api.waqi.info';
  }

  validate(query: Query): string | null {
    const kind = query.location?.kind;
    return kind === 'point' || kind === 'city' ? null : 'requires coordinates (lat, lon) or a city name';
  }

  private feedPath(query: Query): string {
    switch (query.location?.kind) {
      case 'point':
        return `geo:${query.location.latitude};${query.location.longitude}`;
      case 'city':
        return encodeURIComponent(query.location.name.toLowerCase());
      default:
        throw new ProviderError('MalformedQuery', 'AQICN requires coordinates or a city name');
    }
  }

  protected async request(query: Query, context: FetchContext): Promise<NormalizedRecord> {
    const feed = this.feedPath(query);

    this.logger.debug({ feed }, 'Fetching AQICN station feed...');

    const response = await axios.get<AQICNResponse>(`${this.baseUrl}/feed/${feed}/`, {
      params: { token: context.credential },
      timeout: this.timeoutMs,
      signal: context.signal,
    });

    const body = response.data;
    if (body.status === 'error') {
      throw this.inBandError(body.data);
    }

    return this.transformStation(body.data, query);
  }

  private inBandError(message: string): ProviderError {
    const normalized = message.toLowerCase();
    if (normalized.includes('over quota')) {
      return new ProviderError('ProviderRateLimited', 'AQICN quota exceeded');
    }
    return new ProviderError('ProviderRejected', `AQICN rejected the request: ${message}`);
  }

  private transformStation(station: AQICNStationData, query: Query): NormalizedRecord {
    const aqi = typeof station.aqi === 'number' ? station.aqi : null;
    const band = aqi !== null ? aqiCategory(aqi) : null;
    const lastUpdated = station.time?.iso ?? null;

    const pollutants: PollutantReading[] = [];
    for (const [parameter, reading] of Object.entries(station.iaqi ?? {})) {
      if (reading && typeof reading.v === 'number') {
        pollutants.push({ parameter, value: reading.v, unit: null, lastUpdated });
      }
    }

    const geo = station.city.geo;
    const fallback = query.location?.kind === 'point' ? query.location : null;
    const daily = station.forecast?.daily;

    return createNormalizedRecord('airQuality', this.getName(), {
      location: {
        latitude: geo ? geo[0] : fallback?.latitude ?? null,
        longitude: geo ? geo[1] : fallback?.longitude ?? null,
        name: station.city.name,
      },
      observedAt: lastUpdated,
      airQuality: {
        aqi,
        category: band?.category ?? null,
        color: band?.color ?? null,
        dominantPollutant: station.dominentpol || null,
        stationName: station.city.name,
        stationCount: 1,
        pollutants,
        forecast: daily ? this.transformForecast(daily) : null,
        stations: null,
      },
    });
  }

  private transformForecast(daily: Record<string, AQICNForecastDay[] | undefined>): PollutantForecast[] {
    const forecast: PollutantForecast[] = [];
    for (const [parameter, days] of Object.entries(daily)) {
      for (const day of days ?? []) {
        if (!day.day) continue;
        forecast.push({
          parameter,
          day: day.day,
          avg: typeof day.avg === 'number' ? day.avg : null,
          min: typeof day.min === 'number' ? day.min : null,
          max: typeof day.max === 'number' ? day.max : null,
        });
      }
    }
    return forecast;
  }
}

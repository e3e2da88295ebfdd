import axios from 'axios';
import { FetchContext, ProviderAdapter } from '../services/ProviderAdapter';
import {
  BirdHotspot,
  BirdSighting,
  NormalizedRecord,
  ProviderConfig,
  Query,
  SpeciesCount,
} from '../types/EnvironmentalData';
import { createNormalizedRecord, locationFromQuery } from '../utils/recordUtils';

/**
 * eBird data source
 * Recent bird observations in a region or around a point, plus nearby birding hotspots
 * https://documenter.getpostman.com/view/664302/S1ENwy59
 */

// =============================================================================
// Types
// =============================================================================

interface EBirdObservation {
  speciesCode: string;
  comName: string;
  sciName: string;
  locId: string;
  locName: string;
  obsDt: string; // provider-local "YYYY-MM-DD HH:mm"
  howMany?: number;
  lat: number;
  lng: number;
  obsValid: boolean;
  obsReviewed: boolean;
  locationPrivate: boolean;
  subId: string;
}

interface EBirdHotspotEntry {
  locId: string;
  locName: string;
  countryCode?: string;
  subnational1Code?: string;
  lat?: number;
  lng?: number;
  latestObsDt?: string;
  numSpeciesAllTime?: number;
}

type TokenHeaders = { 'X-eBirdApiToken': string };

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_BACK_DAYS = 30;
const TOP_SPECIES = 10;
const MAX_HOTSPOTS = 20;

function regionOf(query: Query): string {
  return query.location?.kind === 'region' ? query.location.regionCode : '';
}

// =============================================================================
// eBird Source Implementation
// =============================================================================

export class EBirdSource extends ProviderAdapter {
  protected readonly credentialRequired = true;
  private readonly baseUrl: string;
  private readonly radiusKm: number;
  private readonly defaultBackDays: number;
  private readonly includeHotspots: boolean;

  constructor(config?: Partial<ProviderConfig> & {
    baseUrl?: string;
    radiusKm?: number;
    defaultBackDays?: number;
    hotspots?: boolean;
  }) {
    super({
      name: 'eBird',
      subject: 'birds',
      enabled: true,
      timeoutMs: 15000,
      maxResults: 200,
      ...config,
    });
    this.baseUrl = config?.baseUrl ?? 'https://api.ebird.org/v2';
    this.radiusKm = Math.min(config?.radiusKm ?? 25, 50);
    this.defaultBackDays = config?.defaultBackDays ?? 14;
    this.includeHotspots = config?.hotspots ?? true;
  }

  validate(query: Query): string | null {
    const kind = query.location?.kind;
    return kind === 'point' || kind === 'region' ? null : 'requires a region code or coordinates';
  }

  /**
   * eBird only looks back from today, so the window start decides how far
   */
  private backDays(query: Query): number {
    if (!query.window) {
      return this.defaultBackDays;
    }
    const days = Math.ceil((Date.now() - query.window.start.getTime()) / DAY_MS);
    return Math.min(Math.max(days, 1), MAX_BACK_DAYS);
  }

  protected async request(query: Query, context: FetchContext): Promise<NormalizedRecord> {
    const headers: TokenHeaders = { 'X-eBirdApiToken': context.credential ?? '' };

    const [observations, hotspots] = await Promise.all([
      this.fetchObservations(query, headers, context.signal),
      this.includeHotspots ? this.fetchHotspots(query, headers, context.signal) : Promise.resolve(null),
    ]);

    return this.transformObservations(this.withinWindow(observations, query), hotspots, query);
  }

  private async fetchObservations(
    query: Query,
    headers: TokenHeaders,
    signal: AbortSignal | undefined
  ): Promise<EBirdObservation[]> {
    const common = {
      back: this.backDays(query),
      maxResults: this.config.maxResults,
    };

    let url: string;
    let params: Record<string, string | number | undefined>;
    if (query.location?.kind === 'point') {
      url = `${this.baseUrl}/data/obs/geo/recent`;
      params = { ...common, lat: query.location.latitude, lng: query.location.longitude, dist: this.radiusKm };
    } else {
      url = `${this.baseUrl}/data/obs/${encodeURIComponent(regionOf(query))}/recent`;
      params = common;
    }

    this.logger.debug({ url, back: params.back }, 'Fetching eBird observations...');

    const response = await axios.get<EBirdObservation[]>(url, {
      params,
      headers,
      timeout: this.timeoutMs,
      signal,
    });

    const observations = Array.isArray(response.data) ? response.data : [];
    this.logger.debug({ count: observations.length }, 'eBird observations received');
    return observations;
  }

  /**
   * Hotspots are supplementary: a failed lookup leaves them null
   * instead of failing the observations
   */
  private async fetchHotspots(
    query: Query,
    headers: TokenHeaders,
    signal: AbortSignal | undefined
  ): Promise<BirdHotspot[] | null> {
    let url: string;
    let params: Record<string, string | number>;
    if (query.location?.kind === 'point') {
      url = `${this.baseUrl}/ref/hotspot/geo`;
      params = { lat: query.location.latitude, lng: query.location.longitude, dist: this.radiusKm, fmt: 'json' };
    } else {
      url = `${this.baseUrl}/ref/hotspot/${encodeURIComponent(regionOf(query))}`;
      params = { fmt: 'json' };
    }

    try {
      const response = await axios.get<EBirdHotspotEntry[]>(url, {
        params,
        headers,
        timeout: this.timeoutMs,
        signal,
      });
      const entries = Array.isArray(response.data) ? response.data : [];
      return entries.slice(0, MAX_HOTSPOTS).map((entry) => ({
        id: entry.locId,
        name: entry.locName,
        latitude: typeof entry.lat === 'number' ? entry.lat : null,
        longitude: typeof entry.lng === 'number' ? entry.lng : null,
        latestObservedAt: entry.latestObsDt || null,
        speciesAllTime: typeof entry.numSpeciesAllTime === 'number' ? entry.numSpeciesAllTime : null,
      }));
    } catch (error) {
      this.logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'eBird hotspot lookup failed');
      return null;
    }
  }

  /**
   * obsDt is provider-local time without a zone, so the window is applied by calendar day
   */
  private withinWindow(observations: EBirdObservation[], query: Query): EBirdObservation[] {
    if (!query.window) {
      return observations;
    }
    const firstDay = query.window.start.toISOString().slice(0, 10);
    const lastDay = query.window.end.toISOString().slice(0, 10);

    return observations.filter((obs) => {
      const day = obs.obsDt ? obs.obsDt.slice(0, 10) : null;
      return day === null || (day >= firstDay && day <= lastDay);
    });
  }

  private transformObservations(
    observations: EBirdObservation[],
    hotspots: BirdHotspot[] | null,
    query: Query
  ): NormalizedRecord {
    const counts = new Map<string, number>();
    for (const obs of observations) {
      const species = obs.comName || 'Unknown';
      counts.set(species, (counts.get(species) ?? 0) + 1);
    }

    // Stable sort keeps first-seen order among equal counts
    const topSpecies: SpeciesCount[] = Array.from(counts, ([species, count]) => ({ species, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, TOP_SPECIES);

    const sightings: BirdSighting[] = observations.map((obs) => ({
      species: obs.comName || 'Unknown',
      scientificName: obs.sciName || null,
      locationName: obs.locName || null,
      observedAt: obs.obsDt || null,
      count: typeof obs.howMany === 'number' ? obs.howMany : null,
      latitude: typeof obs.lat === 'number' ? obs.lat : null,
      longitude: typeof obs.lng === 'number' ? obs.lng : null,
    }));

    const observedAt = sightings.reduce<string | null>(
      (latest, s) => (s.observedAt && (!latest || s.observedAt > latest) ? s.observedAt : latest),
      null
    );

    return createNormalizedRecord('birds', this.getName(), {
      location: locationFromQuery(query.location),
      observedAt,
      birds: {
        totalObservations: observations.length,
        speciesCount: counts.size,
        topSpecies,
        sightings,
        hotspots,
      },
    });
  }
}

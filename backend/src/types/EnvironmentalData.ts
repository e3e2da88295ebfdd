/**
 * Core types for the environmental dashboard
 * These are provider agnostic: every adapter maps into them
 */

export const SUBJECTS = ['airQuality', 'deforestation', 'birds', 'news'] as const;

export type Subject = (typeof SUBJECTS)[number];

// =============================================================================
// Query
// =============================================================================

export interface PointLocation {
  kind: 'point';
  latitude: number;
  longitude: number;
}

export interface RegionLocation {
  kind: 'region';
  regionCode: string; // ISO country code or eBird-style region (US-NY-063)
}

export interface CityLocation {
  kind: 'city';
  name: string;
}

export type QueryLocation = PointLocation | RegionLocation | CityLocation;

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface Query {
  readonly subjects: readonly Subject[];
  readonly location: Readonly<QueryLocation> | null;
  readonly window: Readonly<TimeWindow> | null;
  /** Provider-name filter, null for every registered provider */
  readonly providers: readonly string[] | null;
}

// =============================================================================
// Normalized records
// =============================================================================

export interface RecordLocation {
  latitude: number | null;
  longitude: number | null;
  regionCode: string | null;
  name: string | null;
}

export interface PollutantReading {
  parameter: string;
  value: number | null;
  unit: string | null;
  lastUpdated: string | null;
}

export interface PollutantForecast {
  parameter: string;
  day: string;
  avg: number | null;
  min: number | null;
  max: number | null;
}

export interface AirQualityStation {
  name: string;
  city: string | null;
  latitude: number | null;
  longitude: number | null;
  measurements: PollutantReading[];
}

export interface AirQualityData {
  aqi: number | null;
  category: string | null;
  color: string | null;
  dominantPollutant: string | null;
  stationName: string | null;
  stationCount: number | null;
  pollutants: PollutantReading[];
  /** Daily forecast per pollutant, when the provider publishes one */
  forecast: PollutantForecast[] | null;
  /** Per-station breakdown behind the averaged pollutants */
  stations: AirQualityStation[] | null;
}

export interface ForestAreaPoint {
  year: number;
  forestAreaPercent: number;
}

export interface DeforestationData {
  country: string | null;
  indicator: string;
  series: ForestAreaPoint[];
  latest: ForestAreaPoint | null;
  earliest: ForestAreaPoint | null;
  changePercentPoints: number | null;
  lossDetected: boolean | null;
}

export interface SpeciesCount {
  species: string;
  count: number;
}

export interface BirdSighting {
  species: string;
  scientificName: string | null;
  locationName: string | null;
  observedAt: string | null;
  count: number | null;
  latitude: number | null;
  longitude: number | null;
}

export interface BirdHotspot {
  id: string;
  name: string;
  latitude: number | null;
  longitude: number | null;
  latestObservedAt: string | null;
  speciesAllTime: number | null;
}

export interface BirdData {
  totalObservations: number;
  speciesCount: number;
  topSpecies: SpeciesCount[];
  sightings: BirdSighting[];
  /** Birding hotspots near the query location, null when the lookup failed or was skipped */
  hotspots: BirdHotspot[] | null;
}

export interface NewsArticle {
  title: string;
  link: string;
  summary: string | null;
  publishedAt: string | null;
  source: string;
}

export interface NewsData {
  total: number;
  articles: NewsArticle[];
}

/**
 * Unified record emitted for every subject. Domain sections that do not
 * apply are null, so consumers can rely on a stable shape.
 */
export interface NormalizedRecord {
  subject: Subject;
  provider: string;
  location: RecordLocation;
  observedAt: string | null;
  airQuality: AirQualityData | null;
  deforestation: DeforestationData | null;
  birds: BirdData | null;
  news: NewsData | null;
}

// =============================================================================
// Results
// =============================================================================

export type FailureKind =
  | 'MalformedQuery'
  | 'ProviderUnavailable'
  | 'ProviderRejected'
  | 'ProviderRateLimited'
  | 'QuotaExceeded'
  | 'CacheUnavailable';

export interface ProviderFailure {
  kind: FailureKind;
  message: string;
  retryAfterMs: number | null;
}

/** hit: served from cache, miss: fetched and written, bypass: cache store unavailable */
export type CacheStatus = 'hit' | 'miss' | 'bypass';

export interface SuccessResult {
  status: 'success';
  provider: string;
  payload: NormalizedRecord;
  fetchedAt: string;
  cache: CacheStatus;
}

export interface StaleResult {
  status: 'stale';
  provider: string;
  payload: NormalizedRecord;
  fetchedAt: string;
  ageMs: number;
}

export interface FailureResult {
  status: 'failure';
  provider: string;
  error: ProviderFailure;
}

export type ProviderResult = SuccessResult | StaleResult | FailureResult;

export interface SerializedQuery {
  subjects: Subject[];
  location: QueryLocation | null;
  window: { start: string; end: string } | null;
  providers: string[] | null;
}

export interface AggregatedResponse {
  query: SerializedQuery;
  resolvedAt: string;
  results: Partial<Record<Subject, ProviderResult>>;
}

// =============================================================================
// Cache, quota and provider bookkeeping
// =============================================================================

export interface CacheEntry<V> {
  readonly key: string;
  readonly value: V;
  readonly insertedAt: number; // epoch ms
  readonly ttlMs: number;
}

export interface CachePolicy {
  ttlMs: number;
  /** Soft freshness threshold, hits older than this are served as stale */
  freshMs: number;
}

export interface QuotaConfig {
  limit: number;
  windowMs: number;
}

export interface QuotaState {
  callsUsed: number;
  windowStart: number;
  windowMs: number;
  limit: number;
}

export interface ProviderConfig {
  name: string;
  subject: Subject;
  enabled: boolean;
  timeoutMs?: number;
  maxResults?: number;
}

export interface ProviderStats {
  totalFetched: number;
  lastFetchTime?: Date;
  errors: number;
  isHealthy: boolean;
}

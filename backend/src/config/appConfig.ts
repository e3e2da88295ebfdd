import { CachePolicy, QuotaConfig, Subject } from '../types/EnvironmentalData';
import { CacheKeyOptions } from '../utils/hashUtils';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'Config' });

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

// =============================================================================
// Types
// =============================================================================

/** Adapter name -> environment variable prefix */
export const PROVIDER_ENV_PREFIXES = {
  AQICN: 'AQICN',
  OpenAQ: 'OPENAQ',
  eBird: 'EBIRD',
  WorldBank: 'WORLD_BANK',
  Guardian: 'GUARDIAN',
} as const;

export type ProviderName = keyof typeof PROVIDER_ENV_PREFIXES;

// WorldBank and the Guardian feed are open, no key is read for them
const KEYED_PROVIDERS: ReadonlySet<ProviderName> = new Set<ProviderName>(['AQICN', 'OpenAQ', 'eBird']);

const SUBJECT_ENV_NAMES: Record<Subject, string> = {
  airQuality: 'AIR_QUALITY',
  deforestation: 'DEFORESTATION',
  birds: 'BIRDS',
  news: 'NEWS',
};

export const DEFAULT_CACHE_POLICIES: Record<Subject, CachePolicy> = {
  airQuality: { ttlMs: 10 * MINUTE, freshMs: 5 * MINUTE },
  birds: { ttlMs: HOUR, freshMs: 30 * MINUTE },
  deforestation: { ttlMs: 24 * HOUR, freshMs: 12 * HOUR },
  news: { ttlMs: 3 * HOUR, freshMs: HOUR },
};

export interface ProviderSettings {
  enabled: boolean;
  credential?: string;
  quota?: QuotaConfig;
}

export interface AppConfig {
  port: number;
  requestTimeoutMs: number;
  providerTimeoutMs: number;
  retryDelayMs: number;
  backgroundRefresh: boolean;
  cacheMaxEntries: number;
  cacheSnapshotPath?: string;
  cacheKey: CacheKeyOptions;
  cachePolicies: Record<Subject, CachePolicy>;
  providers: Record<ProviderName, ProviderSettings>;
}

type Env = Record<string, string | undefined>;

// =============================================================================
// Readers
// =============================================================================

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

function readNumber(env: Env, name: string, fallback: number, rule: NumberRule = {}): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  const valid = Number.isFinite(value)
    && (rule.min === undefined || value >= rule.min)
    && (rule.max === undefined || value <= rule.max)
    && (!rule.integer || Number.isInteger(value));
  if (!valid) {
    logger.warn({ name, value: raw, fallback }, '⚠️  Invalid number in environment, using default');
    return fallback;
  }
  return value;
}

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  logger.warn({ name, value: raw, fallback }, '⚠️  Invalid flag in environment, using default');
  return fallback;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function readCachePolicy(env: Env, subject: Subject): CachePolicy {
  const suffix = SUBJECT_ENV_NAMES[subject];
  const defaults = DEFAULT_CACHE_POLICIES[subject];
  const ttlMs = readNumber(env, `CACHE_TTL_${suffix}_MS`, defaults.ttlMs, { min: 1 });
  const freshMs = readNumber(env, `CACHE_FRESH_${suffix}_MS`, Math.min(defaults.freshMs, ttlMs), { min: 0 });

  if (freshMs > ttlMs) {
    logger.warn({ subject, ttlMs, freshMs }, '⚠️  Freshness threshold exceeds TTL, clamping');
    return { ttlMs, freshMs: ttlMs };
  }
  return { ttlMs, freshMs };
}

function readProvider(env: Env, name: ProviderName): ProviderSettings {
  const prefix = PROVIDER_ENV_PREFIXES[name];
  const settings: ProviderSettings = {
    enabled: readFlag(env, `USE_${prefix}`, true),
  };

  const credential = KEYED_PROVIDERS.has(name) ? readString(env, `${prefix}_API_KEY`) : undefined;
  if (credential) {
    settings.credential = credential;
  }

  const limit = readNumber(env, `${prefix}_QUOTA_LIMIT`, -1, { min: 0, integer: true });
  if (limit >= 0) {
    settings.quota = {
      limit,
      windowMs: readNumber(env, `${prefix}_QUOTA_WINDOW_MS`, MINUTE, { min: 1 }),
    };
  }

  return settings;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Read the process environment once into an immutable configuration
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const cachePolicies: Record<Subject, CachePolicy> = {
    airQuality: readCachePolicy(env, 'airQuality'),
    deforestation: readCachePolicy(env, 'deforestation'),
    birds: readCachePolicy(env, 'birds'),
    news: readCachePolicy(env, 'news'),
  };

  const providers: Record<ProviderName, ProviderSettings> = {
    AQICN: readProvider(env, 'AQICN'),
    OpenAQ: readProvider(env, 'OpenAQ'),
    eBird: readProvider(env, 'eBird'),
    WorldBank: readProvider(env, 'WorldBank'),
    Guardian: readProvider(env, 'Guardian'),
  };

  const config: AppConfig = {
    port: readNumber(env, 'PORT', 3000, { min: 0, integer: true }),
    requestTimeoutMs: readNumber(env, 'REQUEST_TIMEOUT_MS', 10000, { min: 1 }),
    providerTimeoutMs: readNumber(env, 'PROVIDER_TIMEOUT_MS', 8000, { min: 1 }),
    retryDelayMs: readNumber(env, 'RETRY_DELAY_MS', 250, { min: 0 }),
    backgroundRefresh: readFlag(env, 'BACKGROUND_REFRESH', false),
    cacheMaxEntries: readNumber(env, 'CACHE_MAX_ENTRIES', 5000, { min: 1, integer: true }),
    cacheSnapshotPath: readString(env, 'CACHE_SNAPSHOT_PATH'),
    cacheKey: {
      locationPrecision: readNumber(env, 'LOCATION_PRECISION', 2, { min: 0, max: 10, integer: true }),
      windowBucketMs: readNumber(env, 'WINDOW_BUCKET_MS', HOUR, { min: 1 }),
    },
    cachePolicies,
    providers,
  };

  return Object.freeze(config);
}

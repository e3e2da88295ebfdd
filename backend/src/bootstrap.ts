import { AppConfig, ProviderName } from './config/appConfig';
import { MemoryCacheStore } from './services/CacheStore';
import { DataAggregator } from './services/DataAggregator';
import { ProviderAdapter } from './services/ProviderAdapter';
import { ProviderAccess, RateKeyManager } from './services/RateKeyManager';
import { AQICNSource } from './sources/AQICNSource';
import { EBirdSource } from './sources/EBirdSource';
import { GuardianNewsSource } from './sources/GuardianNewsSource';
import { OpenAQSource } from './sources/OpenAQSource';
import { WorldBankForestSource } from './sources/WorldBankForestSource';
import { NormalizedRecord } from './types/EnvironmentalData';
import { normalizedRecordSchema } from './types/schemas';
import { logger } from './utils/logger';

export interface Application {
  aggregator: DataAggregator;
  cache: MemoryCacheStore<NormalizedRecord>;
  rateKeyManager: RateKeyManager;
}

/**
 * Adapters in failover order: AQICN is preferred for air quality and
 * OpenAQ takes over when it cannot answer
 */
export function createAdapters(config: AppConfig): ProviderAdapter[] {
  const shared = (name: ProviderName) => ({
    enabled: config.providers[name].enabled,
    timeoutMs: config.providerTimeoutMs,
  });

  return [
    new AQICNSource(shared('AQICN')),
    new OpenAQSource(shared('OpenAQ')),
    new EBirdSource(shared('eBird')),
    new WorldBankForestSource(shared('WorldBank')),
    new GuardianNewsSource(shared('Guardian')),
  ];
}

/**
 * Wire configuration, quota state, cache and adapters into an aggregator
 */
export function createApplication(config: AppConfig): Application {
  const access: Record<string, ProviderAccess> = {};
  for (const [name, settings] of Object.entries(config.providers)) {
    access[name] = { credential: settings.credential, quota: settings.quota };
  }
  const rateKeyManager = new RateKeyManager(access);

  const cache = new MemoryCacheStore<NormalizedRecord>({
    maxEntries: config.cacheMaxEntries,
    snapshotPath: config.cacheSnapshotPath,
    revive: (value) => {
      const parsed = normalizedRecordSchema.safeParse(value);
      return parsed.success ? parsed.data : undefined;
    },
  });

  const aggregator = new DataAggregator({
    cache,
    rateKeyManager,
    options: {
      cachePolicies: config.cachePolicies,
      requestTimeoutMs: config.requestTimeoutMs,
      retryDelayMs: config.retryDelayMs,
      backgroundRefresh: config.backgroundRefresh,
      cacheKey: config.cacheKey,
    },
  });

  for (const adapter of createAdapters(config)) {
    if (!adapter.isEnabled()) {
      logger.info({ provider: adapter.getName() }, '⏸️  Provider disabled by configuration');
    }
    aggregator.registerProvider(adapter);
  }

  return { aggregator, cache, rateKeyManager };
}

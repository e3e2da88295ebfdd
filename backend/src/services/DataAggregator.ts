import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import { DEFAULT_CACHE_POLICIES } from '../config/appConfig';
import { MalformedQueryError } from '../errors/ProviderError';
import {
  AggregatedResponse,
  CacheEntry,
  CachePolicy,
  CacheStatus,
  FailureResult,
  NormalizedRecord,
  ProviderResult,
  ProviderStats,
  Query,
  QuotaState,
  Subject,
} from '../types/EnvironmentalData';
import { CacheKeyOptions, DEFAULT_CACHE_KEY_OPTIONS, generateCacheKey } from '../utils/hashUtils';
import { createLogger } from '../utils/logger';
import { CacheStats, CacheStore } from './CacheStore';
import { ProviderAdapter } from './ProviderAdapter';
import { parseQuery, serializeQuery } from './QueryNormalizer';
import { RateKeyManager } from './RateKeyManager';

export interface AggregatorOptions {
  cachePolicies: Record<Subject, CachePolicy>;
  /** Upper bound for a whole resolve call */
  requestTimeoutMs: number;
  /** Retries granted to ProviderUnavailable failures */
  maxRetries: number;
  /** Base backoff, doubled per retry */
  retryDelayMs: number;
  /** Refresh stale cache hits in the background */
  backgroundRefresh: boolean;
  cacheKey: CacheKeyOptions;
}

export const DEFAULT_AGGREGATOR_OPTIONS: AggregatorOptions = {
  cachePolicies: DEFAULT_CACHE_POLICIES,
  requestTimeoutMs: 10000,
  maxRetries: 1,
  retryDelayMs: 250,
  backgroundRefresh: false,
  cacheKey: DEFAULT_CACHE_KEY_OPTIONS,
};

export interface AggregatorDependencies {
  cache: CacheStore<NormalizedRecord>;
  rateKeyManager: RateKeyManager;
  options?: Partial<AggregatorOptions>;
}

export interface CacheRefreshedEvent {
  subject: Subject;
  provider: string;
  key: string;
  timestamp: Date;
}

interface RefreshTask {
  controller: AbortController;
  done: Promise<void>;
}

type CacheLookup =
  | { kind: 'hit'; entry: CacheEntry<NormalizedRecord> }
  | { kind: 'miss' }
  | { kind: 'unavailable' };

type SubjectPlan =
  | { kind: 'candidates'; adapters: ProviderAdapter[] }
  | { kind: 'unavailable'; result: FailureResult };

/**
 * Resolves dashboard queries against the registered provider adapters.
 *
 * Per subject: cache lookup, then quota reservation and a provider call on
 * miss, with write-through on success. Subjects are resolved concurrently
 * and every failure is reported as data, so one provider going down never
 * takes the whole response with it.
 */
export class DataAggregator extends EventEmitter {
  private readonly providers: Map<string, ProviderAdapter> = new Map();
  private readonly refreshTasks: Map<string, RefreshTask> = new Map();
  private readonly cache: CacheStore<NormalizedRecord>;
  private readonly rateKeyManager: RateKeyManager;
  private readonly options: AggregatorOptions;
  private readonly logger = createLogger({ component: 'DataAggregator' });

  constructor({ cache, rateKeyManager, options }: AggregatorDependencies) {
    super();
    this.cache = cache;
    this.rateKeyManager = rateKeyManager;
    this.options = {
      ...DEFAULT_AGGREGATOR_OPTIONS,
      ...options,
      cachePolicies: { ...DEFAULT_CACHE_POLICIES, ...options?.cachePolicies },
    };
  }

  /**
   * Register a provider adapter. Adapters of the same subject are tried
   * in registration order.
   */
  registerProvider(adapter: ProviderAdapter): void {
    const key = adapter.getName().toLowerCase();
    if (this.providers.has(key)) {
      this.logger.warn({ provider: adapter.getName() }, 'Provider already registered');
      return;
    }
    this.providers.set(key, adapter);
    this.logger.info({ provider: adapter.getName(), subject: adapter.getSubject() }, 'Registered provider');
  }

  unregisterProvider(name: string): void {
    this.providers.delete(name.toLowerCase());
    this.logger.info({ provider: name }, 'Unregistered provider');
  }

  getProviders(): ProviderAdapter[] {
    return Array.from(this.providers.values());
  }

  /**
   * Resolve a raw dashboard query.
   * Throws MalformedQueryError only; provider and cache problems come back as results.
   */
  async resolve(input: unknown): Promise<AggregatedResponse> {
    return this.resolveQuery(parseQuery(input));
  }

  async resolveQuery(query: Query): Promise<AggregatedResponse> {
    const plans = this.plan(query);
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.options.requestTimeoutMs);
    });

    try {
      const settled = await Promise.all(
        query.subjects.map(async (subject): Promise<[Subject, ProviderResult]> => {
          const plan = plans.get(subject);
          if (!plan || plan.kind === 'unavailable') {
            return [subject, plan?.result ?? this.noProvider(subject)];
          }

          const outcome = await Promise.race([
            this.resolveSubject(subject, plan.adapters, query, controller.signal),
            timeout,
          ]);
          if (outcome === 'timeout') {
            controller.abort();
            this.logger.warn({ subject, timeoutMs: this.options.requestTimeoutMs }, 'Subject timed out');
            return [subject, {
              status: 'failure',
              provider: plan.adapters[0].getName(),
              error: {
                kind: 'ProviderUnavailable',
                message: `Request timed out after ${this.options.requestTimeoutMs}ms`,
                retryAfterMs: null,
              },
            }];
          }
          return [subject, outcome];
        })
      );

      const results: AggregatedResponse['results'] = {};
      for (const [subject, result] of settled) {
        results[subject] = result;
      }

      this.logger.debug({
        subjects: query.subjects,
        statuses: settled.map(([subject, result]) => `${subject}:${result.status}`),
      }, 'Resolved query');

      return {
        query: serializeQuery(query),
        resolvedAt: new Date().toISOString(),
        results,
      };
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }

  /**
   * Pick candidate adapters per subject, rejecting queries that no
   * candidate can serve before any I/O happens
   */
  private plan(query: Query): Map<Subject, SubjectPlan> {
    const filter = query.providers ? new Set(query.providers.map((p) => p.toLowerCase())) : null;
    if (filter) {
      const unknown = [...filter].filter((name) => !this.providers.has(name));
      if (unknown.length > 0) {
        throw new MalformedQueryError(`providers: unknown provider(s) ${unknown.join(', ')}`);
      }
    }

    const plans = new Map<Subject, SubjectPlan>();
    const problems: string[] = [];

    for (const subject of query.subjects) {
      const registered = this.getProviders().filter((adapter) =>
        adapter.getSubject() === subject &&
        adapter.isEnabled() &&
        (!filter || filter.has(adapter.getName().toLowerCase()))
      );

      if (registered.length === 0) {
        if (filter) {
          problems.push(`${subject}: providers filter leaves no provider for this subject`);
        } else {
          plans.set(subject, { kind: 'unavailable', result: this.noProvider(subject) });
        }
        continue;
      }

      const issues: string[] = [];
      const accepting = registered.filter((adapter) => {
        const issue = adapter.validate(query);
        if (issue) {
          issues.push(`${adapter.getName()} ${issue}`);
        }
        return issue === null;
      });

      if (accepting.length === 0) {
        problems.push(`${subject}: ${issues.join('; ')}`);
        continue;
      }
      plans.set(subject, { kind: 'candidates', adapters: accepting });
    }

    if (problems.length > 0) {
      throw new MalformedQueryError(problems.join(' | '));
    }
    return plans;
  }

  private noProvider(subject: Subject): FailureResult {
    return {
      status: 'failure',
      provider: 'none',
      error: {
        kind: 'ProviderUnavailable',
        message: `No enabled provider for ${subject}`,
        retryAfterMs: null,
      },
    };
  }

  private async resolveSubject(
    subject: Subject,
    adapters: ProviderAdapter[],
    query: Query,
    signal: AbortSignal
  ): Promise<ProviderResult> {
    const policy = this.options.cachePolicies[subject];
    let cacheStatus: CacheStatus = 'miss';

    for (const adapter of adapters) {
      const key = this.cacheKeyFor(adapter, query);
      const lookup = await this.readCache(key);
      if (lookup.kind === 'unavailable') {
        cacheStatus = 'bypass';
        break;
      }
      if (lookup.kind === 'hit') {
        return this.fromCache(subject, adapter, query, lookup.entry, policy);
      }
    }

    let firstFailure: ProviderResult | undefined;
    for (const adapter of adapters) {
      const result = await this.fetchFromProvider(adapter, query, signal);

      if (result.status === 'success') {
        const written = cacheStatus === 'miss'
          && await this.writeCache(this.cacheKeyFor(adapter, query), result.payload, policy.ttlMs);
        return { ...result, cache: written ? 'miss' : 'bypass' };
      }

      firstFailure ??= result;
      if (signal.aborted) {
        break;
      }
      this.logger.debug({ subject, provider: adapter.getName(), kind: result.status }, 'Trying next provider');
    }

    // adapters is never empty, see plan()
    return firstFailure ?? this.noProvider(subject);
  }

  /**
   * Reserve quota and call the adapter, retrying once when the provider
   * is unavailable. Every attempt reserves its own quota.
   */
  private async fetchFromProvider(
    adapter: ProviderAdapter,
    query: Query,
    signal: AbortSignal
  ): Promise<ProviderResult> {
    const name = adapter.getName();
    let lastResult: ProviderResult | undefined;

    for (let attempt = 0; ; attempt++) {
      const reservation = await this.rateKeyManager.reserve(name);
      if (!reservation.allowed) {
        if (lastResult) {
          return lastResult;
        }
        this.logger.info({ provider: name, retryAfterMs: reservation.retryAfterMs }, 'Quota exceeded');
        return {
          status: 'failure',
          provider: name,
          error: {
            kind: 'QuotaExceeded',
            message: `${name} call budget exhausted, try again later`,
            retryAfterMs: reservation.retryAfterMs,
          },
        };
      }

      lastResult = await adapter.fetch(query, {
        credential: this.rateKeyManager.getCredential(name),
        signal,
      });

      const retryable = lastResult.status === 'failure'
        && lastResult.error.kind === 'ProviderUnavailable'
        && attempt < this.options.maxRetries
        && !signal.aborted;
      if (!retryable) {
        return lastResult;
      }

      const backoff = this.options.retryDelayMs * 2 ** attempt;
      this.logger.debug({ provider: name, attempt: attempt + 1, backoff }, 'Retrying unavailable provider');
      try {
        await delay(backoff, undefined, { signal });
      } catch {
        return lastResult;
      }
    }
  }

  private fromCache(
    subject: Subject,
    adapter: ProviderAdapter,
    query: Query,
    entry: CacheEntry<NormalizedRecord>,
    policy: CachePolicy
  ): ProviderResult {
    const ageMs = Math.max(0, Date.now() - entry.insertedAt);
    const fetchedAt = new Date(entry.insertedAt).toISOString();

    if (ageMs > policy.freshMs) {
      if (this.options.backgroundRefresh) {
        this.scheduleRefresh(subject, adapter, query, entry.key, policy);
      }
      return { status: 'stale', provider: adapter.getName(), payload: entry.value, fetchedAt, ageMs };
    }
    return { status: 'success', provider: adapter.getName(), payload: entry.value, fetchedAt, cache: 'hit' };
  }

  private cacheKeyFor(adapter: ProviderAdapter, query: Query): string {
    return generateCacheKey(adapter.getName(), query, this.options.cacheKey);
  }

  private async readCache(key: string): Promise<CacheLookup> {
    try {
      const entry = await this.cache.get(key);
      return entry ? { kind: 'hit', entry } : { kind: 'miss' };
    } catch (error) {
      this.logger.warn({ error }, 'Cache unavailable on read, fetching directly');
      return { kind: 'unavailable' };
    }
  }

  private async writeCache(key: string, value: NormalizedRecord, ttlMs: number): Promise<boolean> {
    try {
      await this.cache.put(key, value, ttlMs);
      return true;
    } catch (error) {
      this.logger.warn({ error }, 'Cache unavailable on write');
      return false;
    }
  }

  /**
   * Start a background refresh for a stale entry, one per cache key
   */
  private scheduleRefresh(
    subject: Subject,
    adapter: ProviderAdapter,
    query: Query,
    key: string,
    policy: CachePolicy
  ): void {
    if (this.refreshTasks.has(key)) {
      return;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    const done = (async () => {
      try {
        const result = await this.fetchFromProvider(adapter, query, controller.signal);
        if (result.status !== 'success') {
          this.logger.info({ provider: adapter.getName(), status: result.status }, 'Background refresh failed');
          return;
        }
        if (await this.writeCache(key, result.payload, policy.ttlMs)) {
          const event: CacheRefreshedEvent = { subject, provider: adapter.getName(), key, timestamp: new Date() };
          this.emit('cache-refreshed', event);
        }
      } catch (error) {
        this.logger.error({ provider: adapter.getName(), error }, 'Error during background refresh');
      } finally {
        clearTimeout(timer);
        this.refreshTasks.delete(key);
      }
    })();

    this.refreshTasks.set(key, { controller, done });
  }

  /**
   * Wait until all background refreshes currently running have settled
   */
  async waitForRefreshes(): Promise<void> {
    await Promise.all(Array.from(this.refreshTasks.values(), (task) => task.done));
  }

  getProviderStats(): Array<{
    name: string;
    subject: Subject;
    enabled: boolean;
    hasCredential: boolean;
    stats: ProviderStats;
    quota: QuotaState | null;
  }> {
    return this.getProviders().map((adapter) => ({
      name: adapter.getName(),
      subject: adapter.getSubject(),
      enabled: adapter.isEnabled(),
      hasCredential: this.rateKeyManager.hasCredential(adapter.getName()),
      stats: adapter.getStats(),
      quota: this.rateKeyManager.getQuotaState(adapter.getName()) ?? null,
    }));
  }

  async getCacheStats(): Promise<CacheStats & { refreshesInFlight: number }> {
    const stats = await this.cache.stats();
    return { ...stats, refreshesInFlight: this.refreshTasks.size };
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
  }

  /**
   * Report configuration problems that would make providers fail
   */
  async initialize(): Promise<void> {
    for (const adapter of this.getProviders()) {
      if (adapter.isEnabled() && adapter.requiresCredential() && !this.rateKeyManager.hasCredential(adapter.getName())) {
        this.logger.warn({ provider: adapter.getName() }, '⚠️  Provider has no credential configured, calls will be rejected');
      }
    }
    this.logger.info({ providers: this.getProviders().map((a) => a.getName()) }, 'Aggregator ready');
  }

  /**
   * Cancel background refreshes and wait for them to settle
   */
  async cleanup(): Promise<void> {
    for (const task of this.refreshTasks.values()) {
      task.controller.abort();
    }
    await this.waitForRefreshes();
  }
}

import { classifyError, ProviderError } from '../errors/ProviderError';
import {
  NormalizedRecord,
  ProviderConfig,
  ProviderResult,
  ProviderStats,
  Query,
  Subject,
} from '../types/EnvironmentalData';
import { createLogger, Logger } from '../utils/logger';

/**
 * Per-call inputs supplied by the aggregator
 */
export interface FetchContext {
  /** Injected by the rate & key manager, never logged */
  credential?: string;
  signal?: AbortSignal;
}

/**
 * Abstract base that every provider adapter extends.
 * The aggregator only ever sees this interface, so providers can be
 * swapped or added without touching it.
 */
export abstract class ProviderAdapter {
  protected config: ProviderConfig;
  protected stats: ProviderStats;
  protected logger: Logger;
  /** When true, a missing credential fails the call before any network I/O */
  protected readonly credentialRequired: boolean = false;

  constructor(config: ProviderConfig) {
    this.config = config;
    this.stats = {
      totalFetched: 0,
      errors: 0,
      isHealthy: true,
    };
    this.logger = createLogger({ component: 'ProviderAdapter', provider: config.name });
  }

  /**
   * Check that the query carries what this provider needs.
   * @returns a description of the problem, or null when the query is usable
   */
  abstract validate(query: Query): string | null;

  /**
   * Perform exactly one HTTP exchange and map the response.
   * Throws on any failure; `fetch` turns that into a tagged result.
   */
  protected abstract request(query: Query, context: FetchContext): Promise<NormalizedRecord>;

  /**
   * Fetch and normalize data for a query. Never throws.
   */
  async fetch(query: Query, context: FetchContext = {}): Promise<ProviderResult> {
    const issue = this.validate(query);
    if (issue) {
      return this.failure(new ProviderError('MalformedQuery', `${this.getName()}: ${issue}`));
    }

    if (this.credentialRequired && !context.credential) {
      this.updateStats(false);
      return this.failure(new ProviderError('ProviderRejected', `${this.getName()}: no credential configured`));
    }

    try {
      const payload = await this.request(query, context);
      this.updateStats(true, 1);
      return {
        status: 'success',
        provider: this.getName(),
        payload,
        fetchedAt: new Date().toISOString(),
        cache: 'miss',
      };
    } catch (error) {
      const classified = classifyError(error, this.getName());
      this.updateStats(false);

      if (classified.kind === 'ProviderRejected') {
        this.logger.error({ kind: classified.kind, error: classified.message }, 'Provider rejected request');
      } else {
        this.logger.warn({ kind: classified.kind, error: classified.message }, 'Provider request failed');
      }
      return this.failure(classified);
    }
  }

  private failure(error: ProviderError): ProviderResult {
    return { status: 'failure', provider: this.getName(), error: error.toFailure() };
  }

  getName(): string {
    return this.config.name;
  }

  getSubject(): Subject {
    return this.config.subject;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  requiresCredential(): boolean {
    return this.credentialRequired;
  }

  getStats(): ProviderStats {
    return { ...this.stats };
  }

  protected get timeoutMs(): number {
    return this.config.timeoutMs ?? 15000;
  }

  protected updateStats(success: boolean, count: number = 0): void {
    this.stats.lastFetchTime = new Date();
    if (success) {
      this.stats.totalFetched += count;
      this.stats.isHealthy = true;
    } else {
      this.stats.errors += 1;
      this.stats.isHealthy = false;
    }
  }
}

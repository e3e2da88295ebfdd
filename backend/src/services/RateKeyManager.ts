import { QuotaConfig, QuotaState } from '../types/EnvironmentalData';
import { createLogger } from '../utils/logger';

export type Reservation =
  | { allowed: true }
  | { allowed: false; retryAfterMs: number };

export interface ProviderAccess {
  credential?: string;
  quota?: QuotaConfig;
}

/**
 * Holds per-provider credentials and enforces fixed-window call budgets.
 *
 * Check and increment happen in one synchronous step, so concurrent
 * callers on the event loop can never push a window past its limit.
 * Credentials are set once at startup and only handed to adapters.
 */
export class RateKeyManager {
  private readonly credentials: Map<string, string> = new Map();
  private readonly quotas: Map<string, QuotaState> = new Map();
  private readonly logger = createLogger({ component: 'RateKeyManager' });
  private readonly now: () => number;

  constructor(access: Record<string, ProviderAccess> = {}, now: () => number = () => Date.now()) {
    this.now = now;
    for (const [provider, { credential, quota }] of Object.entries(access)) {
      const key = provider.toLowerCase();
      if (credential) {
        this.credentials.set(key, credential);
      }
      if (quota) {
        if (!Number.isInteger(quota.limit) || quota.limit < 0 || quota.windowMs <= 0) {
          throw new RangeError(`Invalid quota for ${provider}: limit=${quota.limit} windowMs=${quota.windowMs}`);
        }
        this.quotas.set(key, { callsUsed: 0, windowStart: 0, windowMs: quota.windowMs, limit: quota.limit });
      }
    }
  }

  /**
   * Reserve one call for a provider. Providers without a quota are unlimited.
   */
  async reserve(provider: string): Promise<Reservation> {
    return this.tryReserve(provider);
  }

  private tryReserve(provider: string): Reservation {
    const state = this.quotas.get(provider.toLowerCase());
    if (!state) {
      return { allowed: true };
    }

    const now = this.now();
    const windowStart = now - (now % state.windowMs);
    if (windowStart !== state.windowStart) {
      // Window rolled over: replace the state in one step
      state.windowStart = windowStart;
      state.callsUsed = 0;
    }

    if (state.callsUsed >= state.limit) {
      const retryAfterMs = state.windowStart + state.windowMs - now;
      this.logger.debug({ provider, limit: state.limit, retryAfterMs }, 'Quota exhausted');
      return { allowed: false, retryAfterMs };
    }

    state.callsUsed += 1;
    return { allowed: true };
  }

  getCredential(provider: string): string | undefined {
    return this.credentials.get(provider.toLowerCase());
  }

  hasCredential(provider: string): boolean {
    return this.credentials.has(provider.toLowerCase());
  }

  /**
   * Current counters for a provider, reflecting any window rollover
   */
  getQuotaState(provider: string): QuotaState | undefined {
    const state = this.quotas.get(provider.toLowerCase());
    if (!state) {
      return undefined;
    }
    const now = this.now();
    const windowStart = now - (now % state.windowMs);
    const callsUsed = windowStart === state.windowStart ? state.callsUsed : 0;
    return { callsUsed, windowStart, windowMs: state.windowMs, limit: state.limit };
  }

  snapshot(): Record<string, QuotaState> {
    const result: Record<string, QuotaState> = {};
    for (const provider of this.quotas.keys()) {
      const state = this.getQuotaState(provider);
      if (state) {
        result[provider] = state;
      }
    }
    return result;
  }
}

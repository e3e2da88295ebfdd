import axios from 'axios';
import { ProviderError } from '../errors/ProviderError';
import { FetchContext, ProviderAdapter } from '../services/ProviderAdapter';
import { ForestAreaPoint, NormalizedRecord, ProviderConfig, Query } from '../types/EnvironmentalData';
import { countryOf, createNormalizedRecord, roundTo } from '../utils/recordUtils';

/**
 * World Bank forest cover data source
 * Forest area as % of land area (AG.LND.FRST.ZS); loss shows up as a
 * negative change across the series
 * https://datahelpdesk.worldbank.org/knowledgebase/articles/898581
 */

// =============================================================================
// Types
// =============================================================================

interface WorldBankMeta {
  page: number;
  pages: number;
  per_page: number;
  total: number;
  lastupdated?: string;
}

interface WorldBankRow {
  indicator: { id: string; value: string };
  country: { id: string; value: string };
  countryiso3code: string;
  date: string;
  value: number | null;
  unit: string;
  obs_status: string;
  decimal: number;
}

// Errors come back with HTTP 200 as a single-element array
interface WorldBankMessage {
  message: Array<{ id: string; key: string; value: string }>;
}

type WorldBankResponse = [WorldBankMeta, WorldBankRow[] | null] | [WorldBankMessage];

export const FOREST_AREA_INDICATOR = 'AG.LND.FRST.ZS';

// =============================================================================
// World Bank Source Implementation
// =============================================================================

export class WorldBankForestSource extends ProviderAdapter {
  private readonly baseUrl: string;
  private readonly defaultYears: number;

  constructor(config?: Partial<ProviderConfig> & { baseUrl?: string; defaultYears?: number }) {
    super({
      name: 'WorldBank',
      subject: 'deforestation',
      enabled: true,
      timeoutMs: 20000,
      maxResults: 100,
      ...config,
    });
    this.baseUrl = config?.baseUrl ?? 'https://api.worldbank.org/v2';
    this.defaultYears = config?.defaultYears ?? 30;
  }

  validate(query: Query): string | null {
    return query.location?.kind === 'region' ? null : 'requires a country or region code';
  }

  private dateRange(query: Query): string {
    if (query.window) {
      return `${query.window.start.getUTCFullYear()}:${query.window.end.getUTCFullYear()}`;
    }
    const year = new Date().getUTCFullYear();
    return `${year - this.defaultYears}:${year}`;
  }

  protected async request(query: Query, context: FetchContext): Promise<NormalizedRecord> {
    if (query.location?.kind !== 'region') {
      throw new ProviderError('MalformedQuery', 'WorldBank requires a region code');
    }
    const country = countryOf(query.location.regionCode);

    this.logger.debug({ country }, 'Fetching World Bank forest area series...');

    const response = await axios.get<WorldBankResponse>(
      `${this.baseUrl}/country/${encodeURIComponent(country)}/indicator/${FOREST_AREA_INDICATOR}`,
      {
        params: {
          format: 'json',
          date: this.dateRange(query),
          per_page: this.config.maxResults,
        },
        timeout: this.timeoutMs,
        signal: context.signal,
      }
    );

    const body = response.data;
    if (!Array.isArray(body) || body.length === 0) {
      throw new ProviderError('ProviderUnavailable', 'WorldBank returned an unexpected payload');
    }

    const [head, rows] = body;
    if ('message' in head) {
      const detail = head.message[0]?.value ?? 'unknown error';
      throw new ProviderError('ProviderRejected', `WorldBank rejected the request: ${detail}`);
    }

    return this.transformSeries(rows ?? [], query.location.regionCode);
  }

  private transformSeries(rows: WorldBankRow[], regionCode: string): NormalizedRecord {
    const series: ForestAreaPoint[] = rows
      .filter((row) => typeof row.value === 'number' && /^\d{4}$/.test(row.date))
      .map((row) => ({ year: Number(row.date), forestAreaPercent: roundTo(row.value ?? 0, 2) }))
      .sort((a, b) => a.year - b.year);

    const earliest = series.length > 0 ? series[0] : null;
    const latest = series.length > 0 ? series[series.length - 1] : null;
    const change = earliest && latest ? roundTo(latest.forestAreaPercent - earliest.forestAreaPercent, 2) : null;
    const country = rows.length > 0 ? rows[0].country.value : null;

    return createNormalizedRecord('deforestation', this.getName(), {
      location: { regionCode, name: country },
      observedAt: latest ? String(latest.year) : null,
      deforestation: {
        country,
        indicator: FOREST_AREA_INDICATOR,
        series,
        latest,
        earliest,
        changePercentPoints: change,
        lossDetected: change === null ? null : change < 0,
      },
    });
  }
}

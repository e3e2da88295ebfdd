import axios from 'axios';
import Parser from 'rss-parser';
import { ProviderError } from '../errors/ProviderError';
import { FetchContext, ProviderAdapter } from '../services/ProviderAdapter';
import { NewsArticle, NormalizedRecord, ProviderConfig, Query } from '../types/EnvironmentalData';
import { createNormalizedRecord, locationFromQuery } from '../utils/recordUtils';

/**
 * Guardian environment news source
 * Reads the section's RSS feed and extracts article summaries
 */

interface FeedItem {
  title?: string;
  link?: string;
  pubDate?: string;
  isoDate?: string;
  contentSnippet?: string;
}

const MAX_SUMMARY_LENGTH = 280;

export class GuardianNewsSource extends ProviderAdapter {
  private readonly parser: Parser;
  private readonly feedUrl: string;

  constructor(config?: Partial<ProviderConfig> & { feedUrl?: string }) {
    super({
      name: 'Guardian',
      subject: 'news',
      enabled: true,
      timeoutMs: 15000,
      maxResults: 10,
      ...config,
    });
    this.feedUrl = config?.feedUrl ?? 'https://www.theguardian.com/environment/rss';
    this.parser = new Parser();
  }

  /**
   * The feed is global, so any location is accepted and ignored
   */
  validate(_query: Query): string | null {
    return null;
  }

  protected async request(query: Query, context: FetchContext): Promise<NormalizedRecord> {
    this.logger.debug({ url: this.feedUrl }, 'Fetching Guardian environment feed...');

    const response = await axios.get<string>(this.feedUrl, {
      responseType: 'text',
      headers: { Accept: 'application/rss+xml, application/xml;q=0.9' },
      timeout: this.timeoutMs,
      signal: context.signal,
    });

    let items: FeedItem[];
    try {
      const feed = await this.parser.parseString(response.data);
      items = feed.items;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError('ProviderUnavailable', `Guardian feed could not be parsed: ${message}`);
    }

    const articles = this.extractArticles(items, query);
    this.logger.debug({ count: articles.length }, 'Guardian articles extracted');

    return createNormalizedRecord('news', this.getName(), {
      location: locationFromQuery(query.location),
      observedAt: articles[0]?.publishedAt ?? null,
      news: {
        total: articles.length,
        articles,
      },
    });
  }

  private extractArticles(items: FeedItem[], query: Query): NewsArticle[] {
    const limit = this.config.maxResults ?? 10;
    const seen = new Set<string>();
    const articles: NewsArticle[] = [];

    for (const item of items) {
      const title = item.title?.trim();
      const link = item.link?.trim();
      if (!title || !link || seen.has(link)) {
        continue;
      }

      const publishedAt = this.publishedAt(item);
      if (query.window && publishedAt) {
        const time = Date.parse(publishedAt);
        if (time < query.window.start.getTime() || time > query.window.end.getTime()) {
          continue;
        }
      }

      seen.add(link);
      articles.push({
        title,
        link,
        summary: this.summarize(item.contentSnippet),
        publishedAt,
        source: this.getName(),
      });

      if (articles.length >= limit) {
        break;
      }
    }

    return articles;
  }

  private publishedAt(item: FeedItem): string | null {
    const raw = item.isoDate ?? item.pubDate;
    if (!raw) {
      return null;
    }
    const time = Date.parse(raw);
    return Number.isNaN(time) ? null : new Date(time).toISOString();
  }

  private summarize(snippet: string | undefined): string | null {
    const text = snippet?.replace(/\s+/g, ' ').trim();
    if (!text) {
      return null;
    }
    return text.length > MAX_SUMMARY_LENGTH ? `${text.slice(0, MAX_SUMMARY_LENGTH - 1).trimEnd()}…` : text;
  }
}

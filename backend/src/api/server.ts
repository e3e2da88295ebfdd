import express, { ErrorRequestHandler, Request, Response } from 'express';
import cors from 'cors';
import { MalformedQueryError } from '../errors/ProviderError';
import { DataAggregator } from '../services/DataAggregator';
import { logger } from '../utils/logger';

type QueryParams = Request['query'];

function single(value: QueryParams[string]): string | undefined {
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  if (Array.isArray(value)) {
    const first = value[0];
    return typeof first === 'string' ? first.trim() || undefined : undefined;
  }
  return undefined;
}

function list(value: QueryParams[string]): string[] | undefined {
  const raw = single(value);
  if (!raw) {
    return undefined;
  }
  const items = raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Translate query-string parameters into the inbound query shape.
 * Values stay strings; validation and coercion happen in the aggregator.
 */
export function queryFromParams(params: QueryParams, subject?: string): Record<string, unknown> {
  const input: Record<string, unknown> = {};

  if (subject) {
    input.subject = subject;
  } else {
    input.subjects = list(params.subjects) ?? list(params.subject);
  }

  const region = single(params.region);
  const lat = single(params.lat);
  const lon = single(params.lon) ?? single(params.lng);
  const city = single(params.city);
  if (region) {
    input.location = { regionCode: region };
  } else if (lat !== undefined || lon !== undefined) {
    input.location = { lat, lon };
  } else if (city !== undefined) {
    input.location = { city };
  }

  const start = single(params.start);
  const end = single(params.end);
  if (start !== undefined || end !== undefined) {
    input.window = { start, end };
  }

  const providers = list(params.providers);
  if (providers) {
    input.providers = providers;
  }

  return input;
}

export function createServer(aggregator: DataAggregator) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  const respond = async (res: Response, input: unknown) => {
    try {
      const response = await aggregator.resolve(input);
      res.json({ success: true, ...response });
    } catch (error) {
      if (error instanceof MalformedQueryError) {
        res.status(400).json({
          success: false,
          error: { kind: error.kind, message: error.message },
        });
        return;
      }
      logger.error({ error }, 'Error resolving dashboard query');
      res.status(500).json({
        success: false,
        error: { kind: 'Internal', message: 'Failed to resolve dashboard query' },
      });
    }
  };

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Aggregated dashboard data
  app.get('/api/dashboard', async (req: Request, res: Response) => {
    await respond(res, queryFromParams(req.query));
  });

  app.post('/api/dashboard', async (req: Request, res: Response) => {
    await respond(res, req.body);
  });

  // Provider statistics and quota counters
  app.get('/api/providers', (_req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        providers: aggregator.getProviderStats(),
      });
    } catch (error) {
      logger.error({ error }, 'Error getting provider stats');
      res.status(500).json({
        success: false,
        error: { kind: 'Internal', message: 'Failed to retrieve provider statistics' },
      });
    }
  });

  // Get cache statistics
  app.get('/api/cache/stats', async (_req: Request, res: Response) => {
    try {
      const stats = await aggregator.getCacheStats();
      res.json({
        success: true,
        ...stats,
      });
    } catch (error) {
      logger.error({ error }, 'Error getting cache stats');
      res.status(500).json({
        success: false,
        error: { kind: 'CacheUnavailable', message: 'Failed to retrieve cache statistics' },
      });
    }
  });

  // Clear cache (useful for testing/debugging)
  app.post('/api/cache/clear', async (_req: Request, res: Response) => {
    try {
      await aggregator.clearCache();
      res.json({
        success: true,
        message: 'Cache cleared successfully',
      });
    } catch (error) {
      logger.error({ error }, 'Error clearing cache');
      res.status(500).json({
        success: false,
        error: { kind: 'CacheUnavailable', message: 'Failed to clear cache' },
      });
    }
  });

  // Single-subject shorthand, e.g. /api/airQuality?lat=..&lon=..
  app.get('/api/:subject', async (req: Request, res: Response) => {
    await respond(res, queryFromParams(req.query, req.params.subject));
  });

  // Malformed JSON bodies
  const handleErrors: ErrorRequestHandler = (error, _req, res, next) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({
        success: false,
        error: { kind: 'MalformedQuery', message: 'Request body is not valid JSON' },
      });
      return;
    }
    next(error);
  };
  app.use(handleErrors);

  return app;
}

import type { Context, Hono } from 'hono';
import {
  AnalysisError,
  DimensionMismatchError,
  InvalidImageError,
  ParseError,
  ProviderError,
  describeError,
} from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import type { SimilarityOptions } from '../scoring/similarity';
import { isRecord } from '../service/analysisInput';
import type { PropertyImageIngestion } from '../service/propertyIngestion';
import type { SimilarityIndex } from '../service/similarityIndex';
import { readJsonBody } from './analysis';

interface RegisterSimilarityRoutesOptions {
  similarityIndex: SimilarityIndex;
  ingestion: PropertyImageIngestion;
  defaults: SimilarityOptions;
  logger?: Logger;
}

const errorStatus = (error: AnalysisError) => {
  if (error instanceof DimensionMismatchError) return 422;
  if (error instanceof ParseError || error instanceof InvalidImageError) return 400;
  if (error instanceof ProviderError) return 502;
  return 500;
};

const readVector = (value: unknown): number[] => {
  if (!Array.isArray(value)) {
    throw new ParseError('vector must be an array of numbers');
  }
  const vector: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      throw new ParseError('vector must contain only finite numbers');
    }
    vector.push(item);
  }
  return vector;
};

const readOptions = (
  threshold: unknown,
  limit: unknown,
  defaults: SimilarityOptions
): SimilarityOptions => {
  const options = { ...defaults };
  if (threshold !== undefined && threshold !== null && threshold !== '') {
    const value = Number(threshold);
    if (!Number.isFinite(value) || value < -1 || value > 1) {
      throw new ParseError('threshold must be between -1 and 1');
    }
    options.threshold = value;
  }
  if (limit !== undefined && limit !== null && limit !== '') {
    const value = Number(limit);
    if (!Number.isInteger(value) || value <= 0) {
      throw new ParseError('limit must be a positive integer');
    }
    options.limit = value;
  }
  return options;
};

const readImageBody = async (c: Context) => {
  const bytes = Buffer.from(await c.req.arrayBuffer());
  if (!bytes.length) {
    throw new InvalidImageError('Request body must contain image bytes');
  }
  return bytes;
};

export const registerSimilarityRoutes = (
  app: Hono,
  options: RegisterSimilarityRoutesOptions
) => {
  const { similarityIndex, ingestion, defaults } = options;
  const logger = options.logger ?? defaultLogger;

  const handle = async (c: Context, action: () => Promise<Response>) => {
    try {
      return await action();
    } catch (error) {
      if (error instanceof AnalysisError) {
        const status = errorStatus(error);
        if (status >= 500) logger.error(`[similarity] ${c.req.path} failed:`, error);
        return c.json(
          { error: error.message, code: error.code, details: error.details ?? null },
          status
        );
      }
      logger.error(`[similarity] ${c.req.path} failed:`, error);
      return c.json({ error: 'Similarity request failed', details: describeError(error) }, 500);
    }
  };

  app.post('/api/v1/similarity/search', (c) =>
    handle(c, async () => {
      const body = await readJsonBody(c.req.raw);
      if (!isRecord(body)) throw new ParseError('Request body must be a JSON object');
      const vector = readVector(body.vector);
      const queryOptions = readOptions(body.threshold, body.limit, defaults);
      const matches = await similarityIndex.query(vector, queryOptions);
      return c.json({ matches });
    })
  );

  app.post('/api/v1/similarity/search-by-image', (c) =>
    handle(c, async () => {
      const queryOptions = readOptions(
        c.req.query('threshold'),
        c.req.query('limit'),
        defaults
      );
      const matches = await ingestion.searchByImage(await readImageBody(c), queryOptions);
      return c.json({ matches });
    })
  );

  app.put('/api/v1/similarity/properties/:propertyId', (c) =>
    handle(c, async () => {
      const propertyId = c.req.param('propertyId');
      const body = await readJsonBody(c.req.raw);
      if (!isRecord(body)) throw new ParseError('Request body must be a JSON object');
      const metadata = body.metadata === undefined ? {} : body.metadata;
      if (!isRecord(metadata)) throw new ParseError('metadata must be an object');

      await similarityIndex.upsert({
        propertyId,
        vector: readVector(body.vector),
        metadata,
      });
      return c.json({ propertyId, dimension: similarityIndex.dimension });
    })
  );

  app.post('/api/v1/similarity/properties/:propertyId/image', (c) =>
    handle(c, async () => {
      const propertyId = c.req.param('propertyId');
      const metadata: Record<string, unknown> = {};
      const source = c.req.query('source');
      if (source) metadata.source = source;
      const result = await ingestion.ingest(propertyId, await readImageBody(c), metadata);
      logger.log('[similarity] property image ingested', result);
      return c.json(result, 201);
    })
  );

  app.delete('/api/v1/similarity/properties/:propertyId', (c) =>
    handle(c, async () => {
      const propertyId = c.req.param('propertyId');
      const removed = await similarityIndex.remove(propertyId);
      if (!removed) {
        return c.json({ error: `Property not indexed: ${propertyId}` }, 404);
      }
      return c.json({ propertyId, removed: true });
    })
  );

  app.get('/api/v1/similarity/stats', (c) =>
    handle(c, async () =>
      c.json({ dimension: similarityIndex.dimension, size: await similarityIndex.size() })
    )
  );
};

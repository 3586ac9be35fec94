import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { describeError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import type { ScoringConfig } from './config';
import { registerAnalysisRoutes } from './routes/analysis';
import { registerInvestmentRoutes } from './routes/investment';
import { registerSimilarityRoutes } from './routes/similarity';
import { computeInvestmentMetrics } from './scoring/financial';
import type { AnalysisOrchestrator } from './service/analysisOrchestrator';
import type { PropertyImageIngestion } from './service/propertyIngestion';
import type { SimilarityIndex } from './service/similarityIndex';

export interface AppDeps {
  orchestrator: AnalysisOrchestrator;
  similarityIndex: SimilarityIndex;
  ingestion: PropertyImageIngestion;
  scoring: ScoringConfig;
  corsOrigins: string[];
  logger?: Logger;
}

export const createApp = (deps: AppDeps) => {
  const logger = deps.logger ?? defaultLogger;
  const app = new Hono();

  app.use(
    '/*',
    cors({
      origin: deps.corsOrigins,
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE'],
      allowHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use('*', async (c, next) => {
    logger.log(`[${c.req.method}] ${c.req.path}`);
    await next();
  });

  app.onError((error, c) => {
    logger.error(`Unhandled error in ${c.req.method} ${c.req.path}:`, error);
    return c.json({ error: 'Internal server error', details: describeError(error) }, 500);
  });

  app.get('/', (c) => c.text('Site Insight API Server'));

  registerAnalysisRoutes(app, {
    submit: (input) => deps.orchestrator.submit(input),
    poll: (jobId) => deps.orchestrator.poll(jobId),
    listRecent: (limit) => deps.orchestrator.listRecent(limit),
    cancel: (jobId, reason) => deps.orchestrator.cancel(jobId, reason),
    logger,
  });

  registerInvestmentRoutes(app, {
    computeMetrics: (params) =>
      computeInvestmentMetrics(params, deps.scoring.financial),
  });

  registerSimilarityRoutes(app, {
    similarityIndex: deps.similarityIndex,
    ingestion: deps.ingestion,
    defaults: deps.scoring.similarity,
    logger,
  });

  return app;
};

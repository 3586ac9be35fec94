import { serve } from '@hono/node-server';
import { createPool } from '../api/db';
import { createApp } from './app';
import { loadConfigFromDotenv } from './config';
import { logger } from './logger';
import type { AnalysisJobStore } from './model/analysis';
import { createGeminiSummarizer } from './providers/geminiSummarizer';
import { createHttpEmbeddingModel } from './providers/httpEmbeddingModel';
import { createHttpImageProvider } from './providers/httpImageProvider';
import { createNominatimGeocoder } from './providers/nominatimGeocoder';
import { createOverpassAmenityProvider } from './providers/overpassAmenityProvider';
import { createAnalysisOrchestrator } from './service/analysisOrchestrator';
import { createInMemoryAnalysisJobStore } from './service/analysisJobStore';
import { createPgAnalysisJobStore } from './service/pgAnalysisJobStore';
import { createPropertyImageIngestion } from './service/propertyIngestion';
import { createInMemorySimilarityIndex } from './service/similarityIndex';

logger.log('=== Server starting ===');
logger.log('Log file location:', logger.getLogFilePath() ?? '(file logging disabled)');

const config = loadConfigFromDotenv();

const jobStore: AnalysisJobStore =
  config.jobStore === 'postgres'
    ? createPgAnalysisJobStore(createPool(config.postgres))
    : createInMemoryAnalysisJobStore();
logger.log(`Job store: ${config.jobStore}`);

const { providers } = config;
const imageProvider = createHttpImageProvider({
  tileUrlTemplate: providers.tileUrlTemplate,
  propertyImageUrlTemplate: providers.propertyImageUrlTemplate,
  userAgent: providers.userAgent,
});
const embeddingModel = createHttpEmbeddingModel({
  url: providers.embeddingUrl,
  dimension: providers.embeddingDimension,
  apiKey: providers.embeddingApiKey,
});
const similarityIndex = createInMemorySimilarityIndex(providers.embeddingDimension);

const summarizer = providers.geminiApiKey
  ? createGeminiSummarizer({ model: providers.geminiModel, apiKey: providers.geminiApiKey })
  : undefined;
if (!summarizer) {
  logger.warn('GEMINI_API_KEY is not set; reports will be generated without a summary');
}

const orchestrator = createAnalysisOrchestrator({
  jobStore,
  geocoder: createNominatimGeocoder({
    baseUrl: providers.nominatimUrl,
    userAgent: providers.userAgent,
  }),
  amenityProvider: createOverpassAmenityProvider({
    baseUrl: providers.overpassUrl,
    userAgent: providers.userAgent,
  }),
  imageProvider,
  embeddingModel,
  similarityIndex,
  summarizer,
  scoring: config.scoring,
  orchestrator: config.orchestrator,
  logger,
});

const app = createApp({
  orchestrator,
  similarityIndex,
  ingestion: createPropertyImageIngestion({ embeddingModel, similarityIndex }),
  scoring: config.scoring,
  corsOrigins: config.corsOrigins,
  logger,
});

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.log(`Server is running on http://localhost:${info.port}`);
  }
);

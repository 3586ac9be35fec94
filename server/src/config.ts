// src/config.ts
//
// 目的:
// - 環境変数（.env を dotenv で読み込み）から AppConfig を組み立てる。
// - 数値の不正値は既定値に戻し、警告ログを残す。起動は止めない。
import dotenv from 'dotenv';
import { logger as defaultLogger, type Logger } from './logger';
import { SUBTASK_NAMES, type SubtaskName } from './model/analysis';
import {
  DEFAULT_FINANCIAL_CONFIG,
  type FinancialConfig,
} from './scoring/financial';
import {
  DEFAULT_SIMILARITY_OPTIONS,
  type SimilarityOptions,
} from './scoring/similarity';
import {
  DEFAULT_VEGETATION_CONFIG,
  type VegetationConfig,
} from './scoring/vegetation';
import {
  DEFAULT_WALK_SCORE_CONFIG,
  type WalkScoreConfig,
} from './scoring/walkScore';

export interface ScoringConfig {
  walkScore: WalkScoreConfig;
  vegetation: VegetationConfig;
  financial: FinancialConfig;
  similarity: SimilarityOptions;
}

export interface OrchestratorConfig {
  concurrency: number;
  timeoutsMs: Record<SubtaskName, number>;
  /** Search radius used when the request does not name one. */
  defaultRadiusM: number;
}

export interface PostgresConfig {
  user: string;
  password: string;
  host: string;
  port: number;
  database: string;
  ssl: boolean;
}

export interface ProviderConfig {
  userAgent: string;
  nominatimUrl: string;
  overpassUrl: string;
  tileUrlTemplate: string;
  propertyImageUrlTemplate: string;
  embeddingUrl: string;
  embeddingApiKey?: string;
  embeddingDimension: number;
  geminiApiKey?: string;
  geminiModel: string;
}

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  jobStore: 'memory' | 'postgres';
  postgres: PostgresConfig;
  orchestrator: OrchestratorConfig;
  providers: ProviderConfig;
  scoring: ScoringConfig;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  walkScore: DEFAULT_WALK_SCORE_CONFIG,
  vegetation: DEFAULT_VEGETATION_CONFIG,
  financial: DEFAULT_FINANCIAL_CONFIG,
  similarity: DEFAULT_SIMILARITY_OPTIONS,
};

export const DEFAULT_SUBTASK_TIMEOUTS_MS: Record<SubtaskName, number> = {
  location: 10_000,
  walkScore: 20_000,
  vegetation: 30_000,
  financial: 5_000,
  similarity: 20_000,
  summary: 30_000,
};

type Env = Record<string, string | undefined>;

const readNumber = (
  env: Env,
  key: string,
  fallback: number,
  logger: Logger,
  accept: (value: number) => boolean = Number.isFinite
): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!accept(value)) {
    logger.warn(`Invalid ${key}="${raw}"; using default ${fallback}`);
    return fallback;
  }
  return value;
};

const positiveInteger = (value: number) => Number.isInteger(value) && value > 0;
const positive = (value: number) => Number.isFinite(value) && value > 0;
const unitInterval = (value: number) =>
  Number.isFinite(value) && value >= 0 && value <= 1;
const oddKernel = (value: number) => positiveInteger(value) && value % 2 === 1;

export const timeoutEnvKey = (name: SubtaskName) =>
  `SUBTASK_TIMEOUT_${name.replace(/[A-Z]/g, (c) => `_${c}`).toUpperCase()}_MS`;

const readTimeouts = (env: Env, logger: Logger) => {
  const timeouts = { ...DEFAULT_SUBTASK_TIMEOUTS_MS };
  for (const name of SUBTASK_NAMES) {
    timeouts[name] = readNumber(
      env,
      timeoutEnvKey(name),
      timeouts[name],
      logger,
      positiveInteger
    );
  }
  return timeouts;
};

export const loadConfig = (
  env: Env = process.env,
  logger: Logger = defaultLogger
): AppConfig => {
  const jobStore = env.JOB_STORE === 'postgres' ? 'postgres' : 'memory';
  if (env.JOB_STORE && env.JOB_STORE !== jobStore) {
    logger.warn(`Unknown JOB_STORE="${env.JOB_STORE}"; using memory`);
  }

  const vegetation: VegetationConfig = {
    hueMin: readNumber(env, 'VEGETATION_HUE_MIN', DEFAULT_VEGETATION_CONFIG.hueMin, logger),
    hueMax: readNumber(env, 'VEGETATION_HUE_MAX', DEFAULT_VEGETATION_CONFIG.hueMax, logger),
    minSaturation: readNumber(
      env,
      'VEGETATION_MIN_SATURATION',
      DEFAULT_VEGETATION_CONFIG.minSaturation,
      logger,
      unitInterval
    ),
    minValue: readNumber(
      env,
      'VEGETATION_MIN_VALUE',
      DEFAULT_VEGETATION_CONFIG.minValue,
      logger,
      unitInterval
    ),
    openingKernelSize: readNumber(
      env,
      'VEGETATION_OPENING_KERNEL',
      DEFAULT_VEGETATION_CONFIG.openingKernelSize,
      logger,
      oddKernel
    ),
  };

  const similarity: SimilarityOptions = {
    threshold: readNumber(
      env,
      'SIMILARITY_THRESHOLD',
      DEFAULT_SIMILARITY_OPTIONS.threshold,
      logger,
      (value) => Number.isFinite(value) && value >= -1 && value <= 1
    ),
    limit: readNumber(
      env,
      'SIMILARITY_LIMIT',
      DEFAULT_SIMILARITY_OPTIONS.limit,
      logger,
      positiveInteger
    ),
  };

  return {
    port: readNumber(env, 'PORT', 3001, logger, positiveInteger),
    corsOrigins: (env.CORS_ORIGINS ?? 'http://localhost:3000,http://localhost:5173')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    jobStore,
    postgres: {
      user: env.POSTGRES_USER || 'siteinsight',
      password: env.POSTGRES_PASSWORD || 'siteinsight',
      host: env.POSTGRES_HOST || 'localhost',
      port: readNumber(env, 'POSTGRES_PORT', 5432, logger, positiveInteger),
      database: env.POSTGRES_DB || 'site_insight',
      ssl: env.POSTGRES_SSL === 'true',
    },
    orchestrator: {
      concurrency: readNumber(
        env,
        'ORCHESTRATOR_CONCURRENCY',
        4,
        logger,
        positiveInteger
      ),
      timeoutsMs: readTimeouts(env, logger),
      defaultRadiusM: readNumber(env, 'DEFAULT_RADIUS_M', 1600, logger, positive),
    },
    providers: {
      userAgent: env.PROVIDER_USER_AGENT || 'site-insight/0.1',
      nominatimUrl:
        env.NOMINATIM_URL || 'https://nominatim.openstreetmap.org/search',
      overpassUrl:
        env.OVERPASS_URL || 'https://overpass-api.de/api/interpreter',
      tileUrlTemplate:
        env.TILE_URL_TEMPLATE ||
        'http://localhost:8081/tiles?lat={lat}&lon={lon}&radius={radius}',
      propertyImageUrlTemplate:
        env.PROPERTY_IMAGE_URL_TEMPLATE ||
        'http://localhost:8081/properties/{propertyId}/image',
      embeddingUrl: env.EMBEDDING_URL || 'http://localhost:8082/embed',
      embeddingApiKey: env.EMBEDDING_API_KEY || undefined,
      embeddingDimension: readNumber(
        env,
        'EMBEDDING_DIMENSION',
        512,
        logger,
        positiveInteger
      ),
      geminiApiKey: env.GEMINI_API_KEY || undefined,
      geminiModel: env.GEMINI_MODEL || 'gemini-2.0-flash',
    },
    scoring: {
      walkScore: DEFAULT_WALK_SCORE_CONFIG,
      vegetation,
      financial: DEFAULT_FINANCIAL_CONFIG,
      similarity,
    },
  };
};

/** Reads `.env` into `process.env`, then builds the config. */
export const loadConfigFromDotenv = (logger: Logger = defaultLogger) => {
  dotenv.config();
  return loadConfig(process.env, logger);
};

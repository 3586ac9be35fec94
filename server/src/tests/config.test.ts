import { jest } from '@jest/globals';
import {
  DEFAULT_SUBTASK_TIMEOUTS_MS,
  loadConfig,
  timeoutEnvKey,
} from '../config';
import { silentLogger, type Logger } from '../logger';

const recordingLogger = () => {
  const warn = jest.fn<Logger['warn']>();
  const logger: Logger = { ...silentLogger, warn };
  return { logger, warn };
};

describe('loadConfig', () => {
  test('環境変数が空なら既定値', () => {
    const config = loadConfig({}, silentLogger);

    expect(config.port).toBe(3001);
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:5173']);
    expect(config.jobStore).toBe('memory');
    expect(config.postgres).toEqual({
      user: 'siteinsight',
      password: 'siteinsight',
      host: 'localhost',
      port: 5432,
      database: 'site_insight',
      ssl: false,
    });
    expect(config.orchestrator).toEqual({
      concurrency: 4,
      timeoutsMs: DEFAULT_SUBTASK_TIMEOUTS_MS,
      defaultRadiusM: 1600,
    });
    expect(config.providers.embeddingDimension).toBe(512);
    expect(config.providers.geminiModel).toBe('gemini-2.0-flash');
    expect(config.providers.geminiApiKey).toBeUndefined();
    expect(config.scoring.similarity).toEqual({ threshold: 0.7, limit: 5 });
  });

  test('指定した値で上書きする', () => {
    const config = loadConfig(
      {
        PORT: '8080',
        CORS_ORIGINS: ' https://a.test , ,https://b.test',
        JOB_STORE: 'postgres',
        POSTGRES_SSL: 'true',
        POSTGRES_PASSWORD: 'test-secret',
        ORCHESTRATOR_CONCURRENCY: '2',
        SUBTASK_TIMEOUT_WALK_SCORE_MS: '1500',
        DEFAULT_RADIUS_M: '800',
        VEGETATION_HUE_MIN: '70',
        VEGETATION_MIN_SATURATION: '0.2',
        VEGETATION_OPENING_KERNEL: '5',
        SIMILARITY_THRESHOLD: '0.9',
        SIMILARITY_LIMIT: '3',
        GEMINI_API_KEY: 'test-secret',
      },
      silentLogger
    );

    expect(config.port).toBe(8080);
    expect(config.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
    expect(config.jobStore).toBe('postgres');
    expect(config.postgres.ssl).toBe(true);
    expect(config.postgres.password).toBe('test-secret');
    expect(config.orchestrator.concurrency).toBe(2);
    expect(config.orchestrator.timeoutsMs.walkScore).toBe(1500);
    expect(config.orchestrator.timeoutsMs.location).toBe(10_000);
    expect(config.orchestrator.defaultRadiusM).toBe(800);
    expect(config.scoring.vegetation).toEqual({
      hueMin: 70,
      hueMax: 180,
      minSaturation: 0.2,
      minValue: 0.15,
      openingKernelSize: 5,
    });
    expect(config.scoring.similarity).toEqual({ threshold: 0.9, limit: 3 });
    expect(config.providers.geminiApiKey).toBe('test-secret');
  });

  test('不正な数値は既定値に戻して警告する', () => {
    const { logger, warn } = recordingLogger();

    const config = loadConfig(
      {
        ORCHESTRATOR_CONCURRENCY: '0',
        VEGETATION_OPENING_KERNEL: '4',
        SIMILARITY_THRESHOLD: '1.5',
        SUBTASK_TIMEOUT_SUMMARY_MS: 'soon',
      },
      logger
    );

    expect(config.orchestrator.concurrency).toBe(4);
    expect(config.scoring.vegetation.openingKernelSize).toBe(3);
    expect(config.scoring.similarity.threshold).toBe(0.7);
    expect(config.orchestrator.timeoutsMs.summary).toBe(30_000);
    expect(warn).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenCalledWith('Invalid ORCHESTRATOR_CONCURRENCY="0"; using default 4');
  });

  test('未知の JOB_STORE はメモリ実装にして警告する', () => {
    const { logger, warn } = recordingLogger();

    expect(loadConfig({ JOB_STORE: 'redis' }, logger).jobStore).toBe('memory');
    expect(warn).toHaveBeenCalledWith('Unknown JOB_STORE="redis"; using memory');
  });

  test('timeoutEnvKey はサブタスク名をスネークケースにする', () => {
    expect(timeoutEnvKey('walkScore')).toBe('SUBTASK_TIMEOUT_WALK_SCORE_MS');
    expect(timeoutEnvKey('location')).toBe('SUBTASK_TIMEOUT_LOCATION_MS');
  });
});

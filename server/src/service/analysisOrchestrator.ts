// src/service/analysisOrchestrator.ts
//
// 目的:
// - 解析ジョブのライフサイクル（PENDING → RUNNING → SUCCESS / FAILURE）を管理する。
// - location を解決したあと walkScore / vegetation / financial / similarity を並列に流し、
//   最後に summary（要約モデル）を実行してレポートを組み立てる。
// 前後関係:
// - 同時実行数は p-limit のワーカープールで制限（全ジョブ共通）。
// - 結果のマージはジョブ単位のキー付きミューテックス内で read-modify-write する。プロバイダー呼び出しはロックの外。
// - サブタスクの失敗は partialResults に記録するだけ。ジョブを落とすのはクリティカルな失敗と OrchestratorFault のみ。
import pLimit from 'p-limit';
import type { OrchestratorConfig, ScoringConfig } from '../config';
import {
  AnalysisError,
  OrchestratorFault,
  ProviderError,
  SubtaskTimeoutError,
  describeError,
  toErrorPayload,
} from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import {
  SUBTASK_DEFINITIONS,
  SUBTASK_NAMES,
  isTerminalStatus,
  type AnalysisInput,
  type AnalysisJob,
  type AnalysisJobStore,
  type JobError,
  type PartialResults,
  type SubtaskName,
  type SubtaskOutcome,
} from '../model/analysis';
import type {
  AmenityProvider,
  EmbeddingModel,
  Geocoder,
  ImageProvider,
  Summarizer,
} from '../model/providers';
import { createKeyedMutex } from './jobLock';
import { assembleReport } from './reportAssembler';
import type { SimilarityIndex } from './similarityIndex';
import {
  analyseInvestment,
  buildSummaryFacts,
  estimateVegetation,
  findSimilarProperties,
  resolveLocation,
  scoreWalkability,
  summarise,
} from './subtasks';

export interface AnalysisOrchestratorDeps {
  jobStore: AnalysisJobStore;
  geocoder: Geocoder;
  amenityProvider: AmenityProvider;
  imageProvider: ImageProvider;
  embeddingModel: EmbeddingModel;
  similarityIndex: SimilarityIndex;
  summarizer?: Summarizer;
  scoring: ScoringConfig;
  orchestrator: OrchestratorConfig;
  logger?: Logger;
  now?: () => Date;
}

export type CancelResult =
  | { status: 'cancelled'; job: AnalysisJob }
  | { status: 'terminal'; job: AnalysisJob }
  | { status: 'not_found' };

export interface AnalysisOrchestrator {
  /** Creates the job and starts it in the background. */
  submit(input: AnalysisInput): Promise<string>;
  /** Runs a PENDING job to completion; resolves once the job is terminal. */
  execute(jobId: string): Promise<void>;
  poll(jobId: string): Promise<AnalysisJob | null>;
  listRecent(limit: number): Promise<AnalysisJob[]>;
  cancel(jobId: string, reason?: string): Promise<CancelResult>;
}

/** Failed outcome of a critical subtask, in pipeline order. */
export const findCriticalFailure = (
  partialResults: PartialResults
): { name: SubtaskName; error: JobError } | null => {
  for (const name of SUBTASK_NAMES) {
    const outcome = partialResults[name];
    if (outcome?.status === 'failed' && outcome.critical) {
      return { name, error: outcome.error };
    }
  }
  return null;
};

export const createAnalysisOrchestrator = (
  deps: AnalysisOrchestratorDeps
): AnalysisOrchestrator => {
  const { jobStore, orchestrator: config } = deps;
  const logger = deps.logger ?? defaultLogger;
  const now = deps.now ?? (() => new Date());
  const limit = pLimit(config.concurrency);
  const mutex = createKeyedMutex();
  const controllers = new Map<string, AbortController>();

  const storeCall = async <T>(action: string, call: () => Promise<T>) => {
    try {
      return await call();
    } catch (error) {
      if (error instanceof OrchestratorFault) throw error;
      throw new OrchestratorFault(
        `Job store ${action} failed: ${describeError(error)}`
      );
    }
  };

  const loadJob = async (jobId: string): Promise<AnalysisJob> => {
    const job = await storeCall('read', () => jobStore.get(jobId));
    if (!job) {
      throw new OrchestratorFault(`ジョブが見つかりません: ${jobId}`, { jobId });
    }
    return job;
  };

  /**
   * Read-modify-write under the job's lock. `change` returning null (or the
   * job already being terminal) leaves the record untouched.
   */
  const updateJob = (
    jobId: string,
    change: (job: AnalysisJob) => AnalysisJob | null
  ): Promise<AnalysisJob | null> =>
    mutex.runExclusive(jobId, async () => {
      const job = await loadJob(jobId);
      if (isTerminalStatus(job.status)) return null;
      const next = change(job);
      if (!next) return null;
      await storeCall('write', () => jobStore.put(next));
      return next;
    });

  const mergeOutcome = async (
    jobId: string,
    name: SubtaskName,
    patch: PartialResults
  ) => {
    const merged = await updateJob(jobId, (job) => ({
      ...job,
      partialResults: { ...job.partialResults, ...patch },
    }));
    if (!merged) {
      logger.debug(`[analysis] discarded late "${name}" outcome`, { jobId });
    }
  };

  const finalizeFailure = (jobId: string, error: JobError) =>
    updateJob(jobId, (job) => ({
      ...job,
      status: 'FAILURE',
      error,
      completedAt: now(),
    }));

  const finalizeSuccess = (jobId: string) =>
    updateJob(jobId, (job) => ({
      ...job,
      status: 'SUCCESS',
      result: assembleReport(job, now()),
      completedAt: now(),
    }));

  const toSubtaskError = (name: SubtaskName, error: unknown) => {
    if (error instanceof AnalysisError) return error;
    return new ProviderError(name, describeError(error));
  };

  /**
   * Runs one subtask in the worker pool with its own timeout, then merges the
   * outcome. `toPatch` places the outcome under the subtask's key.
   */
  const runSubtask = async <T>(
    jobId: string,
    jobSignal: AbortSignal,
    name: SubtaskName,
    body: (signal: AbortSignal) => Promise<T>,
    toPatch: (outcome: SubtaskOutcome<T>) => PartialResults
  ): Promise<SubtaskOutcome<T>> => {
    const outcome = await limit(async () => {
      const startedAt = Date.now();
      const timeoutMs = config.timeoutsMs[name];
      const controller = new AbortController();
      const onJobAbort = () => controller.abort(jobSignal.reason);
      jobSignal.addEventListener('abort', onJobAbort, { once: true });

      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new SubtaskTimeoutError(name, timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      });

      try {
        if (jobSignal.aborted) {
          throw new ProviderError(name, 'Job was cancelled before the subtask started');
        }
        const value = await Promise.race([body(controller.signal), timeout]);
        const result: SubtaskOutcome<T> = {
          status: 'succeeded',
          value,
          completedAt: now().toISOString(),
          durationMs: Date.now() - startedAt,
        };
        return result;
      } catch (error) {
        const subtaskError = toSubtaskError(name, error);
        logger.warn(`[analysis] subtask "${name}" failed`, {
          jobId,
          code: subtaskError.code,
          message: subtaskError.message,
        });
        const result: SubtaskOutcome<T> = {
          status: 'failed',
          error: toErrorPayload(subtaskError),
          critical: SUBTASK_DEFINITIONS[name].critical,
          completedAt: now().toISOString(),
        };
        return result;
      } finally {
        clearTimeout(timer);
        jobSignal.removeEventListener('abort', onJobAbort);
      }
    });

    await mergeOutcome(jobId, name, toPatch(outcome));
    return outcome;
  };

  const skipped = (reason: string) => ({ status: 'skipped', reason }) as const;

  /** Fails the job when a critical subtask has failed; returns whether it did. */
  const failOnCriticalFailure = async (jobId: string) => {
    const job = await loadJob(jobId);
    if (isTerminalStatus(job.status)) return true;
    const failure = findCriticalFailure(job.partialResults);
    if (!failure) return false;
    await finalizeFailure(jobId, {
      code: failure.error.code,
      message: `${failure.name}: ${failure.error.message}`,
      subtask: failure.name,
    });
    logger.warn(`[analysis] job failed on critical subtask "${failure.name}"`, {
      jobId,
    });
    return true;
  };

  const runPipeline = async (job: AnalysisJob, signal: AbortSignal) => {
    const { jobId, input } = job;

    const location = await runSubtask(
      jobId,
      signal,
      'location',
      (s) => resolveLocation(deps, input, s),
      (outcome) => ({ location: outcome })
    );
    if (location.status !== 'succeeded' || signal.aborted) {
      await failOnCriticalFailure(jobId);
      return;
    }

    const point = location.value.point;
    const radiusM = input.radiusM ?? config.defaultRadiusM;
    const { investment, propertyId } = input;

    await Promise.all([
      runSubtask(
        jobId,
        signal,
        'walkScore',
        (s) => scoreWalkability(deps, point, radiusM, s),
        (outcome) => ({ walkScore: outcome })
      ),
      runSubtask(
        jobId,
        signal,
        'vegetation',
        (s) => estimateVegetation(deps, point, radiusM, s),
        (outcome) => ({ vegetation: outcome })
      ),
      investment
        ? runSubtask(
            jobId,
            signal,
            'financial',
            () => analyseInvestment(deps, investment),
            (outcome) => ({ financial: outcome })
          )
        : mergeOutcome(jobId, 'financial', {
            financial: skipped('no investment parameters supplied'),
          }),
      propertyId
        ? runSubtask(
            jobId,
            signal,
            'similarity',
            (s) => findSimilarProperties(deps, propertyId, s),
            (outcome) => ({ similarity: outcome })
          )
        : mergeOutcome(jobId, 'similarity', {
            similarity: skipped('no propertyId supplied'),
          }),
    ]);

    if (signal.aborted || (await failOnCriticalFailure(jobId))) return;

    const { summarizer } = deps;
    if (summarizer) {
      const current = await loadJob(jobId);
      const facts = buildSummaryFacts(input, point, current.partialResults);
      await runSubtask(
        jobId,
        signal,
        'summary',
        (s) => summarise(summarizer, facts, s),
        (outcome) => ({ summary: outcome })
      );
    } else {
      await mergeOutcome(jobId, 'summary', {
        summary: skipped('no summarizer configured'),
      });
    }

    const finished = await finalizeSuccess(jobId);
    if (finished) {
      logger.log(`[analysis] job ${jobId} succeeded`, {
        degraded: finished.result?.degraded ?? false,
      });
    }
  };

  const execute = async (jobId: string) => {
    const controller = new AbortController();

    try {
      const started = await updateJob(jobId, (job) =>
        job.status === 'PENDING'
          ? { ...job, status: 'RUNNING', startedAt: now() }
          : null
      );
      if (!started) {
        logger.warn(`[analysis] job ${jobId} is not pending; skipped`);
        return;
      }
      // 登録するのは PENDING から RUNNING に進めた実行だけ
      controllers.set(jobId, controller);
      await runPipeline(started, controller.signal);
    } catch (error) {
      const fault =
        error instanceof OrchestratorFault
          ? error
          : new OrchestratorFault(describeError(error));
      logger.error(`[analysis] job ${jobId} aborted by orchestrator fault`, fault);
      controller.abort(fault);
      try {
        await finalizeFailure(jobId, toErrorPayload(fault));
      } catch (finalizeError) {
        logger.error(
          `[analysis] could not record failure for job ${jobId}`,
          finalizeError
        );
      }
    } finally {
      if (controllers.get(jobId) === controller) {
        controllers.delete(jobId);
      }
    }
  };

  return {
    async submit(input: AnalysisInput): Promise<string> {
      const jobId = await storeCall('create', () => jobStore.create(input));
      logger.log(`[analysis] job ${jobId} accepted`, { address: input.address });
      Promise.resolve(execute(jobId)).catch((error) => {
        logger.error(`[analysis] job ${jobId} crashed`, error);
      });
      return jobId;
    },

    execute,

    poll: (jobId: string) => jobStore.get(jobId),

    listRecent: (limit: number) => jobStore.listRecent(limit),

    async cancel(jobId: string, reason = 'cancelled by client'): Promise<CancelResult> {
      const current = await jobStore.get(jobId);
      if (!current) return { status: 'not_found' };

      const cancelled = await updateJob(jobId, (job) => ({
        ...job,
        status: 'FAILURE',
        error: { code: 'CANCELLED', message: reason },
        completedAt: now(),
      }));
      if (!cancelled) {
        const latest = await loadJob(jobId);
        return { status: 'terminal', job: latest };
      }

      controllers.get(jobId)?.abort(new Error(reason));
      logger.log(`[analysis] job ${jobId} cancelled`, { reason });
      return { status: 'cancelled', job: cancelled };
    },
  };
};

import { randomUUID } from 'node:crypto';
import { OrchestratorFault } from '../errors';
import {
  isTerminalStatus,
  type AnalysisInput,
  type AnalysisJob,
  type AnalysisJobStore,
} from '../model/analysis';

// Dates, nested partial results and the report are all copied so callers never share state.
const cloneJob = (job: AnalysisJob): AnalysisJob => structuredClone(job);

const ensureJob = (
  jobs: Map<string, AnalysisJob>,
  jobId: string
): AnalysisJob => {
  const job = jobs.get(jobId);
  if (!job) {
    throw new OrchestratorFault(`ジョブが見つかりません: ${jobId}`, { jobId });
  }
  return job;
};

export const createInMemoryAnalysisJobStore = (
  options: { now?: () => Date } = {}
): AnalysisJobStore & { jobs: Map<string, AnalysisJob> } => {
  const jobs = new Map<string, AnalysisJob>();
  const now = options.now ?? (() => new Date());

  return {
    jobs,

    async create(input: AnalysisInput): Promise<string> {
      const jobId = randomUUID();
      jobs.set(jobId, {
        jobId,
        status: 'PENDING',
        input: structuredClone(input),
        partialResults: {},
        createdAt: now(),
      });
      return jobId;
    },

    async get(jobId: string): Promise<AnalysisJob | null> {
      const job = jobs.get(jobId);
      return job ? cloneJob(job) : null;
    },

    async listRecent(limit: number): Promise<AnalysisJob[]> {
      return [...jobs.values()]
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
        .slice(0, limit)
        .map(cloneJob);
    },

    async put(job: AnalysisJob): Promise<void> {
      const current = ensureJob(jobs, job.jobId);
      if (isTerminalStatus(current.status)) {
        throw new OrchestratorFault(
          `終了済みのジョブは更新できません: ${job.jobId}`,
          { jobId: job.jobId, status: current.status }
        );
      }
      jobs.set(job.jobId, {
        ...cloneJob(job),
        input: current.input,
        createdAt: current.createdAt,
      });
    },
  };
};

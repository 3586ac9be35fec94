// src/service/pgAnalysisJobStore.ts
//
// 目的:
// - AnalysisJobStore の PostgreSQL 実装（テーブル定義は server/sql/analysis_jobs.sql）。
// - 終了済みジョブへの書き込みは UPDATE の WHERE 句で弾き、0 行更新なら OrchestratorFault にする。
import { randomUUID } from 'node:crypto';
import type { QueryResult, QueryResultRow } from 'pg';
import { OrchestratorFault } from '../errors';
import type {
  AnalysisInput,
  AnalysisJob,
  AnalysisJobStatus,
  AnalysisJobStore,
  AnalysisReport,
  JobError,
  PartialResults,
} from '../model/analysis';

// pg の QueryResultRow 制約を満たすため interface ではなく type にする
export type AnalysisJobRow = {
  job_id: string;
  status: string;
  input: AnalysisInput;
  partial_results: PartialResults | null;
  result: AnalysisReport | null;
  error: JobError | null;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
};

/** The part of pg's Pool / Client the store uses. */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

const JOB_STATUSES: readonly AnalysisJobStatus[] = [
  'PENDING',
  'RUNNING',
  'SUCCESS',
  'FAILURE',
];

const toStatus = (value: string): AnalysisJobStatus => {
  const status = JOB_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new OrchestratorFault(`Unknown job status in storage: ${value}`);
  }
  return status;
};

export const rowToAnalysisJob = (row: AnalysisJobRow): AnalysisJob => {
  const job: AnalysisJob = {
    jobId: row.job_id,
    status: toStatus(row.status),
    input: row.input,
    partialResults: row.partial_results ?? {},
    createdAt: new Date(row.created_at),
  };
  if (row.result) job.result = row.result;
  if (row.error) job.error = row.error;
  if (row.started_at) job.startedAt = new Date(row.started_at);
  if (row.completed_at) job.completedAt = new Date(row.completed_at);
  return job;
};

export const jobToUpdateParams = (job: AnalysisJob) => [
  job.jobId,
  job.status,
  JSON.stringify(job.partialResults),
  job.result ? JSON.stringify(job.result) : null,
  job.error ? JSON.stringify(job.error) : null,
  job.startedAt ?? null,
  job.completedAt ?? null,
];

const SELECT_COLUMNS = `job_id, status, input, partial_results, result, error,
  created_at, started_at, completed_at`;

export const createPgAnalysisJobStore = (
  pool: SqlClient
): AnalysisJobStore => ({
  async create(input: AnalysisInput): Promise<string> {
    const jobId = randomUUID();
    await pool.query(
      `INSERT INTO analysis_jobs (job_id, status, input, partial_results, created_at)
       VALUES ($1, 'PENDING', $2, '{}'::jsonb, now())`,
      [jobId, JSON.stringify(input)]
    );
    return jobId;
  },

  async get(jobId: string): Promise<AnalysisJob | null> {
    const { rows } = await pool.query<AnalysisJobRow>(
      `SELECT ${SELECT_COLUMNS} FROM analysis_jobs WHERE job_id = $1`,
      [jobId]
    );
    return rows[0] ? rowToAnalysisJob(rows[0]) : null;
  },

  async listRecent(limit: number): Promise<AnalysisJob[]> {
    const { rows } = await pool.query<AnalysisJobRow>(
      `SELECT ${SELECT_COLUMNS} FROM analysis_jobs ORDER BY created_at DESC LIMIT $1`,
      [limit]
    );
    return rows.map(rowToAnalysisJob);
  },

  async put(job: AnalysisJob): Promise<void> {
    const result = await pool.query(
      `UPDATE analysis_jobs
          SET status = $2,
              partial_results = $3,
              result = $4,
              error = $5,
              started_at = $6,
              completed_at = $7
        WHERE job_id = $1
          AND status IN ('PENDING', 'RUNNING')`,
      jobToUpdateParams(job)
    );
    if (!result.rowCount) {
      throw new OrchestratorFault(
        `ジョブが存在しないか終了済みのため更新できません: ${job.jobId}`,
        { jobId: job.jobId }
      );
    }
  },
});

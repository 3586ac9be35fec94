import type { Hono } from 'hono';
import { ParseError, describeError } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import type { AnalysisInput, AnalysisJob } from '../model/analysis';
import type { CancelResult } from '../service/analysisOrchestrator';
import { isRecord, parseAnalysisInput } from '../service/analysisInput';

interface RegisterAnalysisRoutesOptions {
  submit: (input: AnalysisInput) => Promise<string>;
  poll: (jobId: string) => Promise<AnalysisJob | null>;
  listRecent: (limit: number) => Promise<AnalysisJob[]>;
  cancel: (jobId: string, reason?: string) => Promise<CancelResult>;
  logger?: Logger;
}

const NOT_FOUND_MESSAGE = '指定したジョブIDは存在しません';
const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;

export const parseListLimit = (raw: string | undefined): number => {
  if (raw === undefined || raw.trim() === '') return DEFAULT_LIST_LIMIT;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new ParseError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, {
      limit: raw,
    });
  }
  return limit;
};

export const jobToPollPayload = (job: AnalysisJob) => ({
  jobId: job.jobId,
  status: job.status,
  partialResults: job.partialResults,
  result: job.result ?? null,
  error: job.error ?? null,
  createdAt: job.createdAt.toISOString(),
  startedAt: job.startedAt?.toISOString() ?? null,
  completedAt: job.completedAt?.toISOString() ?? null,
});

export const readJsonBody = async (req: Request): Promise<unknown> => {
  try {
    return await req.json();
  } catch {
    throw new ParseError('Invalid JSON in request body');
  }
};

export const registerAnalysisRoutes = (
  app: Hono,
  options: RegisterAnalysisRoutesOptions
) => {
  const logger = options.logger ?? defaultLogger;

  app.post('/api/v1/analyses', async (c) => {
    let input: AnalysisInput;
    try {
      input = parseAnalysisInput(await readJsonBody(c.req.raw));
    } catch (error) {
      if (error instanceof ParseError) {
        return c.json({ error: error.message, code: error.code }, 400);
      }
      throw error;
    }

    try {
      const jobId = await options.submit(input);
      return c.json({ jobId }, 202);
    } catch (error) {
      logger.error('Failed to submit analysis job:', error);
      return c.json(
        { error: 'Failed to submit analysis job', details: describeError(error) },
        500
      );
    }
  });

  app.get('/api/v1/analyses', async (c) => {
    let limit: number;
    try {
      limit = parseListLimit(c.req.query('limit'));
    } catch (error) {
      if (error instanceof ParseError) {
        return c.json({ error: error.message, code: error.code }, 400);
      }
      throw error;
    }
    const jobs = await options.listRecent(limit);
    return c.json({ jobs: jobs.map(jobToPollPayload) });
  });

  app.get('/api/v1/analyses/:jobId', async (c) => {
    const job = await options.poll(c.req.param('jobId'));
    if (!job) {
      return c.json({ error: NOT_FOUND_MESSAGE }, 404);
    }
    return c.json(jobToPollPayload(job));
  });

  app.get('/api/v1/analyses/:jobId/result', async (c) => {
    const job = await options.poll(c.req.param('jobId'));
    if (!job) {
      return c.json({ error: NOT_FOUND_MESSAGE }, 404);
    }
    if (job.status === 'FAILURE') {
      return c.json({ error: '解析に失敗しました', details: job.error ?? null }, 409);
    }
    if (!job.result) {
      return c.json({ error: '解析がまだ完了していません', status: job.status }, 404);
    }
    return c.json(job.result);
  });

  app.post('/api/v1/analyses/:jobId/cancel', async (c) => {
    const jobId = c.req.param('jobId');
    let reason: string | undefined;
    const text = await c.req.text();
    if (text.trim()) {
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        return c.json({ error: 'Invalid JSON in request body', code: 'PARSE_ERROR' }, 400);
      }
      if (isRecord(body) && typeof body.reason === 'string' && body.reason.trim()) {
        reason = body.reason.trim();
      }
    }

    const outcome = await options.cancel(jobId, reason);
    switch (outcome.status) {
      case 'not_found':
        return c.json({ error: NOT_FOUND_MESSAGE }, 404);
      case 'terminal':
        return c.json(
          { error: 'ジョブは既に終了しています', job: jobToPollPayload(outcome.job) },
          409
        );
      case 'cancelled':
        return c.json(jobToPollPayload(outcome.job));
    }
  });
};

// src/errors.ts
//
// 目的:
// - 解析パイプライン全体で使うエラー分類を一か所に集める。
// - サブタスク境界で捕捉されたエラーは code/message に落として partialResults に記録される。
export type AnalysisErrorCode =
  | 'PARSE_ERROR'
  | 'INVALID_IMAGE'
  | 'NON_CONVERGENCE'
  | 'DIMENSION_MISMATCH'
  | 'PROVIDER_ERROR'
  | 'SUBTASK_TIMEOUT'
  | 'ORCHESTRATOR_FAULT';

export interface ErrorPayload {
  code: AnalysisErrorCode | 'CANCELLED' | 'UNKNOWN_ERROR';
  message: string;
}

/** Base class of every error the engine raises on purpose. */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: AnalysisErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AnalysisError';
    this.code = code;
    this.details = details;
  }
}

/** Malformed input: unparseable amount, unresolvable address, bad payload. */
export class ParseError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_ERROR', message, details);
    this.name = 'ParseError';
  }
}

export class InvalidImageError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_IMAGE', message, details);
    this.name = 'InvalidImageError';
  }
}

/** The IRR root-finder could not produce a root within its budget. */
export class NonConvergenceError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NON_CONVERGENCE', message, details);
    this.name = 'NonConvergenceError';
  }
}

export class DimensionMismatchError extends AnalysisError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(
      'DIMENSION_MISMATCH',
      `Embedding dimension mismatch: expected ${expected}, got ${received}`,
      { expected, received }
    );
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.received = received;
  }
}

/** Failure of an external collaborator (map data, imagery, models). */
export class ProviderError extends AnalysisError {
  readonly provider: string;

  constructor(
    provider: string,
    message: string,
    details?: Record<string, unknown>,
    code: 'PROVIDER_ERROR' | 'SUBTASK_TIMEOUT' = 'PROVIDER_ERROR'
  ) {
    super(code, message, { provider, ...details });
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export class SubtaskTimeoutError extends ProviderError {
  constructor(subtask: string, timeoutMs: number) {
    super(
      subtask,
      `Subtask "${subtask}" timed out after ${timeoutMs}ms`,
      { timeoutMs },
      'SUBTASK_TIMEOUT'
    );
    this.name = 'SubtaskTimeoutError';
  }
}

/** Internal aggregation or storage failure; the only class that fails a job outright. */
export class OrchestratorFault extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ORCHESTRATOR_FAULT', message, details);
    this.name = 'OrchestratorFault';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toErrorPayload = (error: unknown): ErrorPayload => {
  if (error instanceof AnalysisError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'UNKNOWN_ERROR', message: describeError(error) };
};

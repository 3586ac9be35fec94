// src/model/analysis.ts
//
// 目的:
// - 解析ジョブ（AnalysisJob）とサブタスク結果、最終レポートの型定義。
// - ジョブストアの契約（AnalysisJobStore）もここに置く。メモリ実装と PostgreSQL 実装が共通で満たす。
import type { ErrorPayload } from '../errors';
import type { InvestmentMetrics, InvestmentParameters } from './investment';
import type { GeoPoint } from './providers';
import type { WalkScoreResult } from '../scoring/walkScore';
import type { SimilarityMatch } from '../scoring/similarity';

export type AnalysisJobStatus = 'PENDING' | 'RUNNING' | 'SUCCESS' | 'FAILURE';

export const isTerminalStatus = (status: AnalysisJobStatus) =>
  status === 'SUCCESS' || status === 'FAILURE';

export interface AnalysisInput {
  address: string;
  /** When supplied, geocoding is skipped. */
  point?: GeoPoint;
  radiusM?: number;
  investment?: InvestmentParameters;
  /** Listing whose photo is compared against the similarity index. */
  propertyId?: string;
}

export const SUBTASK_NAMES = [
  'location',
  'walkScore',
  'vegetation',
  'financial',
  'similarity',
  'summary',
] as const;

export type SubtaskName = (typeof SUBTASK_NAMES)[number];

export interface SubtaskDefinition {
  /** A failed critical subtask fails the whole job. */
  critical: boolean;
}

export const SUBTASK_DEFINITIONS: Record<SubtaskName, SubtaskDefinition> = {
  location: { critical: true },
  walkScore: { critical: true },
  vegetation: { critical: false },
  financial: { critical: false },
  similarity: { critical: false },
  summary: { critical: false },
};

export interface LocationResult {
  point: GeoPoint;
  source: 'input' | 'geocoder';
}

export interface VegetationResult {
  coverage: number;
  vegetationPixels: number;
  totalPixels: number;
  width: number;
  height: number;
}

export interface SimilarityResult {
  propertyId: string;
  matches: SimilarityMatch[];
}

export interface SummaryResult {
  text: string;
}

export interface SubtaskResults {
  location: LocationResult;
  walkScore: WalkScoreResult;
  vegetation: VegetationResult;
  financial: InvestmentMetrics;
  similarity: SimilarityResult;
  summary: SummaryResult;
}

export type SubtaskOutcome<T> =
  | { status: 'succeeded'; value: T; completedAt: string; durationMs: number }
  | {
      status: 'failed';
      error: ErrorPayload;
      critical: boolean;
      completedAt: string;
    }
  | { status: 'skipped'; reason: string };

export type PartialResults = {
  [K in SubtaskName]?: SubtaskOutcome<SubtaskResults[K]>;
};

export type ReportSection<T> =
  | { available: true; data: T }
  | { available: false; reason: string; errorCode?: ErrorPayload['code'] };

export type ReportSectionName = Exclude<SubtaskName, 'location'>;

export type ReportSections = {
  [K in ReportSectionName]: ReportSection<SubtaskResults[K]>;
};

export interface AnalysisReport {
  address: string;
  location: GeoPoint;
  sections: ReportSections;
  /** True when at least one section failed (skipped sections do not count). */
  degraded: boolean;
  missingSections: ReportSectionName[];
  generatedAt: string;
}

export interface JobError extends ErrorPayload {
  subtask?: SubtaskName;
}

export interface AnalysisJob {
  jobId: string;
  status: AnalysisJobStatus;
  input: AnalysisInput;
  partialResults: PartialResults;
  result?: AnalysisReport;
  error?: JobError;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export interface AnalysisJobStore {
  create(input: AnalysisInput): Promise<string>;
  get(jobId: string): Promise<AnalysisJob | null>;
  /** Newest first by createdAt. */
  listRecent(limit: number): Promise<AnalysisJob[]>;
  /** Replaces the record; rejects when the stored job is already terminal. */
  put(job: AnalysisJob): Promise<void>;
}

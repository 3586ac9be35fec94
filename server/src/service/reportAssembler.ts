import { OrchestratorFault } from '../errors';
import type {
  AnalysisJob,
  AnalysisReport,
  ReportSection,
  ReportSectionName,
  ReportSections,
  SubtaskOutcome,
} from '../model/analysis';

const toSection = <T>(
  outcome: SubtaskOutcome<T> | undefined
): ReportSection<T> => {
  if (!outcome) {
    return { available: false, reason: 'not run' };
  }
  switch (outcome.status) {
    case 'succeeded':
      return { available: true, data: outcome.value };
    case 'failed':
      return {
        available: false,
        reason: outcome.error.message,
        errorCode: outcome.error.code,
      };
    case 'skipped':
      return { available: false, reason: outcome.reason };
  }
};

// 失敗したセクションだけを欠落として数える（入力がなくて飛ばしたものは劣化扱いにしない）
export const listMissingSections = (
  job: Pick<AnalysisJob, 'partialResults'>
): ReportSectionName[] => {
  const { partialResults } = job;
  const names: ReportSectionName[] = [
    'walkScore',
    'vegetation',
    'financial',
    'similarity',
    'summary',
  ];
  return names.filter((name) => partialResults[name]?.status === 'failed');
};

export const assembleReport = (
  job: AnalysisJob,
  generatedAt: Date
): AnalysisReport => {
  const location = job.partialResults.location;
  if (location?.status !== 'succeeded') {
    throw new OrchestratorFault(
      'Report requested for a job without a resolved location',
      { jobId: job.jobId }
    );
  }

  const sections: ReportSections = {
    walkScore: toSection(job.partialResults.walkScore),
    vegetation: toSection(job.partialResults.vegetation),
    financial: toSection(job.partialResults.financial),
    similarity: toSection(job.partialResults.similarity),
    summary: toSection(job.partialResults.summary),
  };
  const missingSections = listMissingSections(job);

  return {
    address: job.input.address,
    location: location.value.point,
    sections,
    degraded: missingSections.length > 0,
    missingSections,
    generatedAt: generatedAt.toISOString(),
  };
};

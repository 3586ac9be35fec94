// src/service/subtasks.ts
//
// 目的:
// - 解析ジョブを構成する各サブタスクの本体（外部プロバイダー呼び出し＋スコア計算）。
// - ここではエラーを握りつぶさない。捕捉・記録・タイムアウトはオーケストレーター側の責務。
import type { ScoringConfig } from '../config';
import type {
  AnalysisInput,
  LocationResult,
  PartialResults,
  SimilarityResult,
  SummaryResult,
  VegetationResult,
} from '../model/analysis';
import type {
  InvestmentMetrics,
  InvestmentParameters,
} from '../model/investment';
import type {
  AmenityProvider,
  EmbeddingModel,
  GeoPoint,
  Geocoder,
  ImageProvider,
  Summarizer,
  SummaryFacts,
} from '../model/providers';
import { computeInvestmentMetrics } from '../scoring/financial';
import { decodeRaster } from '../scoring/rasterDecoder';
import { estimateVegetationCoverage } from '../scoring/vegetation';
import { calculateWalkScore, type WalkScoreResult } from '../scoring/walkScore';
import type { SimilarityIndex } from './similarityIndex';

export interface SubtaskDeps {
  geocoder: Geocoder;
  amenityProvider: AmenityProvider;
  imageProvider: ImageProvider;
  embeddingModel: EmbeddingModel;
  similarityIndex: SimilarityIndex;
  summarizer?: Summarizer;
  scoring: ScoringConfig;
}

export const resolveLocation = async (
  deps: Pick<SubtaskDeps, 'geocoder'>,
  input: AnalysisInput,
  signal: AbortSignal
): Promise<LocationResult> => {
  if (input.point) {
    return { point: { ...input.point }, source: 'input' };
  }
  const point = await deps.geocoder.geocode(input.address, signal);
  return { point, source: 'geocoder' };
};

export const scoreWalkability = async (
  deps: Pick<SubtaskDeps, 'amenityProvider' | 'scoring'>,
  point: GeoPoint,
  radiusM: number,
  signal: AbortSignal
): Promise<WalkScoreResult> => {
  const amenities = await deps.amenityProvider.fetchAmenities(
    point,
    radiusM,
    signal
  );
  return calculateWalkScore(amenities, deps.scoring.walkScore);
};

export const estimateVegetation = async (
  deps: Pick<SubtaskDeps, 'imageProvider' | 'scoring'>,
  point: GeoPoint,
  radiusM: number,
  signal: AbortSignal
): Promise<VegetationResult> => {
  const bytes = await deps.imageProvider.fetchImage(
    { kind: 'tile', point, radiusM },
    signal
  );
  const raster = await decodeRaster(bytes);
  const { coverage, vegetationPixels, totalPixels, width, height } =
    estimateVegetationCoverage(raster, deps.scoring.vegetation);
  return { coverage, vegetationPixels, totalPixels, width, height };
};

export const analyseInvestment = async (
  deps: Pick<SubtaskDeps, 'scoring'>,
  params: InvestmentParameters
): Promise<InvestmentMetrics> =>
  computeInvestmentMetrics(params, deps.scoring.financial);

export const findSimilarProperties = async (
  deps: Pick<
    SubtaskDeps,
    'imageProvider' | 'embeddingModel' | 'similarityIndex' | 'scoring'
  >,
  propertyId: string,
  signal: AbortSignal
): Promise<SimilarityResult> => {
  const image = await deps.imageProvider.fetchImage(
    { kind: 'property', propertyId },
    signal
  );
  const vector = await deps.embeddingModel.embed(image, signal);
  const matches = await deps.similarityIndex.query(vector, {
    ...deps.scoring.similarity,
    excludePropertyId: propertyId,
  });
  return { propertyId, matches };
};

export const buildSummaryFacts = (
  input: AnalysisInput,
  location: GeoPoint,
  partialResults: PartialResults
): SummaryFacts => {
  const walk = partialResults.walkScore;
  const vegetation = partialResults.vegetation;
  const financial = partialResults.financial;
  const similarity = partialResults.similarity;

  const walkBreakdown: Record<string, number> = {};
  if (walk?.status === 'succeeded') {
    for (const entry of walk.value.breakdown) {
      walkBreakdown[entry.category] = entry.contribution;
    }
  }

  return {
    address: input.address,
    location,
    walkScore: walk?.status === 'succeeded' ? walk.value.score : null,
    walkBreakdown,
    vegetationCoverage:
      vegetation?.status === 'succeeded' ? vegetation.value.coverage : null,
    investment:
      financial?.status === 'succeeded'
        ? {
            irr: financial.value.irr,
            dscr: financial.value.dscr,
            cashOnCash: financial.value.cashOnCash,
            capRate: financial.value.capRate,
            breakEvenOccupancy: financial.value.breakEvenOccupancy,
            quality: financial.value.quality,
          }
        : null,
    similarProperties:
      similarity?.status === 'succeeded'
        ? similarity.value.matches.map(({ propertyId, similarity: score }) => ({
            propertyId,
            similarity: score,
          }))
        : [],
  };
};

export const summarise = async (
  summarizer: Summarizer,
  facts: SummaryFacts,
  signal: AbortSignal
): Promise<SummaryResult> => {
  const text = (await summarizer.summarize(facts, signal)).trim();
  if (!text) {
    throw new Error('Summarizer returned an empty response');
  }
  return { text };
};

// src/scoring/walkScore.ts
//
// 目的:
// - 周辺施設（カテゴリ＋距離）から 0〜100 の徒歩スコアを算出する純関数。
// - カテゴリごとに重みと「数える上限件数」を持ち、1カテゴリがスコアを独占しないようにする。
// 計算:
// - 距離減衰: fullCreditDistanceM 以内は 1、cutoffDistanceM で 0 まで線形に減衰。
// - カテゴリ寄与 = weight × (上位 cap 件の減衰値の和 / cap)。
// - スコア = min(100, Σ寄与) を小数1桁に丸める。
import {
  AMENITY_CATEGORIES,
  type AmenityCategory,
  type AmenityRecord,
} from '../model/providers';

export interface CategoryWeight {
  weight: number;
  cap: number;
}

export interface WalkScoreConfig {
  categories: Partial<Record<AmenityCategory, CategoryWeight>>;
  fullCreditDistanceM: number;
  cutoffDistanceM: number;
}

export interface CategoryBreakdown {
  category: AmenityCategory;
  found: number;
  counted: number;
  contribution: number;
  maxContribution: number;
}

export interface WalkScoreResult {
  score: number;
  breakdown: CategoryBreakdown[];
  totalAmenities: number;
  countedAmenities: number;
}

export const DEFAULT_WALK_SCORE_CONFIG: WalkScoreConfig = {
  categories: {
    grocery: { weight: 20, cap: 2 },
    transit: { weight: 15, cap: 3 },
    restaurant: { weight: 12, cap: 3 },
    school: { weight: 12, cap: 2 },
    park: { weight: 12, cap: 2 },
    hospital: { weight: 8, cap: 1 },
    cafe: { weight: 6, cap: 2 },
    pharmacy: { weight: 5, cap: 1 },
    shopping: { weight: 5, cap: 2 },
    bank: { weight: 3, cap: 1 },
    nightlife: { weight: 2, cap: 2 },
  },
  fullCreditDistanceM: 400,
  cutoffDistanceM: 1600,
};

const round1 = (value: number) => Math.round(value * 10) / 10;

export const distanceDecay = (
  distanceM: number,
  config: Pick<WalkScoreConfig, 'fullCreditDistanceM' | 'cutoffDistanceM'>
): number => {
  const { fullCreditDistanceM, cutoffDistanceM } = config;
  if (!Number.isFinite(distanceM) || distanceM < 0) return 0;
  if (distanceM >= cutoffDistanceM) return 0;
  if (distanceM <= fullCreditDistanceM) return 1;
  return (cutoffDistanceM - distanceM) / (cutoffDistanceM - fullCreditDistanceM);
};

export const calculateWalkScore = (
  amenities: readonly AmenityRecord[],
  config: WalkScoreConfig = DEFAULT_WALK_SCORE_CONFIG
): WalkScoreResult => {
  const decaysByCategory = new Map<AmenityCategory, number[]>();
  for (const amenity of amenities) {
    const decays = decaysByCategory.get(amenity.category) ?? [];
    decays.push(distanceDecay(amenity.distanceM, config));
    decaysByCategory.set(amenity.category, decays);
  }

  const breakdown: CategoryBreakdown[] = [];
  let total = 0;
  let countedAmenities = 0;

  for (const category of AMENITY_CATEGORIES) {
    const definition = config.categories[category];
    if (!definition) continue;
    const cap = Math.max(1, Math.floor(definition.cap));
    const decays = decaysByCategory.get(category) ?? [];
    const top = [...decays]
      .filter((value) => value > 0)
      .sort((a, b) => b - a)
      .slice(0, cap);
    const fraction = top.reduce((sum, value) => sum + value, 0) / cap;
    const contribution = definition.weight * fraction;

    total += contribution;
    countedAmenities += top.length;
    breakdown.push({
      category,
      found: decays.length,
      counted: top.length,
      contribution: round1(contribution),
      maxContribution: definition.weight,
    });
  }

  return {
    score: round1(Math.min(100, total)),
    breakdown,
    totalAmenities: amenities.length,
    countedAmenities,
  };
};

// src/model/providers.ts
//
// 目的:
// - 外部協力者（地図データ・画像・埋め込みモデル・要約モデル）との境界を型で表す。
// - オーケストレーターはこのインターフェイスだけに依存し、具象プロバイダーは index.ts で注入する。
import type { InvestmentQuality } from './investment';

export interface GeoPoint {
  lat: number;
  lon: number;
}

export const AMENITY_CATEGORIES = [
  'grocery',
  'restaurant',
  'cafe',
  'school',
  'hospital',
  'pharmacy',
  'park',
  'transit',
  'shopping',
  'bank',
  'nightlife',
] as const;

export type AmenityCategory = (typeof AMENITY_CATEGORIES)[number];

export const isAmenityCategory = (value: string): value is AmenityCategory =>
  AMENITY_CATEGORIES.some((category) => category === value);

export interface AmenityRecord {
  category: AmenityCategory;
  distanceM: number;
  name?: string;
}

export type ImageTarget =
  | { kind: 'tile'; point: GeoPoint; radiusM: number }
  | { kind: 'property'; propertyId: string };

export interface Geocoder {
  geocode(address: string, signal?: AbortSignal): Promise<GeoPoint>;
}

export interface AmenityProvider {
  fetchAmenities(
    point: GeoPoint,
    radiusM: number,
    signal?: AbortSignal
  ): Promise<AmenityRecord[]>;
}

export interface ImageProvider {
  fetchImage(target: ImageTarget, signal?: AbortSignal): Promise<Buffer>;
}

export interface EmbeddingModel {
  readonly dimension: number;
  embed(image: Buffer, signal?: AbortSignal): Promise<number[]>;
}

/** Structured facts handed to the language model; numbers only, no prose. */
export interface SummaryFacts {
  address: string;
  location: GeoPoint;
  walkScore: number | null;
  walkBreakdown: Record<string, number>;
  vegetationCoverage: number | null;
  investment: {
    irr: number | null;
    dscr: number | null;
    cashOnCash: number | null;
    capRate: number;
    breakEvenOccupancy: number;
    quality: InvestmentQuality;
  } | null;
  similarProperties: Array<{ propertyId: string; similarity: number }>;
}

export interface Summarizer {
  summarize(facts: SummaryFacts, signal?: AbortSignal): Promise<string>;
}

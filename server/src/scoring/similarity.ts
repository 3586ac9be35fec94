// src/scoring/similarity.ts
//
// 目的:
// - 埋め込みベクトル同士のコサイン類似度と、しきい値付き top-K ランキング。
// - 索引の保持・永続化は service/similarityIndex.ts が担う。ここは純粋関数のみ。
import { DimensionMismatchError } from '../errors';

export interface SimilarityOptions {
  /** Matches must score strictly above this value. */
  threshold: number;
  limit: number;
}

export interface EmbeddingEntry<TMetadata = Record<string, unknown>> {
  propertyId: string;
  vector: readonly number[];
  metadata?: TMetadata;
}

export interface SimilarityMatch<TMetadata = Record<string, unknown>> {
  propertyId: string;
  similarity: number;
  metadata?: TMetadata;
}

export const DEFAULT_SIMILARITY_OPTIONS: SimilarityOptions = {
  threshold: 0.7,
  limit: 5,
};

export const vectorNorm = (vector: readonly number[]): number =>
  Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));

export const cosineSimilarity = (
  a: readonly number[],
  b: readonly number[]
): number => {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  const normA = vectorNorm(a);
  const normB = vectorNorm(b);
  if (normA === 0 || normB === 0) return 0;

  let dot = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
  }
  // 丸め誤差で [-1, 1] をはみ出さないようにする
  return Math.max(-1, Math.min(1, dot / (normA * normB)));
};

export const rankBySimilarity = <TMetadata>(
  query: readonly number[],
  entries: Iterable<EmbeddingEntry<TMetadata>>,
  options: SimilarityOptions = DEFAULT_SIMILARITY_OPTIONS
): Array<SimilarityMatch<TMetadata>> => {
  if (options.limit <= 0) return [];

  const scored: Array<SimilarityMatch<TMetadata>> = [];
  for (const entry of entries) {
    const similarity = cosineSimilarity(query, entry.vector);
    if (similarity > options.threshold) {
      scored.push({
        propertyId: entry.propertyId,
        similarity,
        metadata: entry.metadata,
      });
    }
  }

  // Array.prototype.sort は安定ソートなので同点は挿入順のまま
  scored.sort((a, b) => b.similarity - a.similarity);
  return scored.slice(0, options.limit);
};

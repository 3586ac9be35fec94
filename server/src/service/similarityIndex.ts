// src/service/similarityIndex.ts
//
// 目的:
// - 物件ID → 埋め込みベクトルの索引（次元数固定）と top-K 検索。
// - 置き換えは削除＋追加として扱うので、更新された物件は挿入順の末尾に移る（同点時の順位に影響）。
import { DimensionMismatchError, ParseError } from '../errors';
import {
  rankBySimilarity,
  type SimilarityMatch,
  type SimilarityOptions,
} from '../scoring/similarity';

export interface EmbeddingRecord {
  propertyId: string;
  vector: number[];
  metadata: Record<string, unknown>;
}

export interface SimilarityQueryOptions extends SimilarityOptions {
  excludePropertyId?: string;
}

export interface SimilarityIndex {
  readonly dimension: number;
  upsert(record: EmbeddingRecord): Promise<void>;
  remove(propertyId: string): Promise<boolean>;
  get(propertyId: string): Promise<EmbeddingRecord | null>;
  size(): Promise<number>;
  query(
    vector: readonly number[],
    options: SimilarityQueryOptions
  ): Promise<SimilarityMatch[]>;
}

export const assertVector = (
  vector: readonly number[],
  dimension: number
): void => {
  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length);
  }
  if (!vector.every(Number.isFinite)) {
    throw new ParseError('Embedding vector contains non-finite values');
  }
};

export const createInMemorySimilarityIndex = (
  dimension = 512
): SimilarityIndex => {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new RangeError(`Invalid embedding dimension: ${dimension}`);
  }
  const records = new Map<string, EmbeddingRecord>();

  return {
    dimension,

    async upsert(record: EmbeddingRecord): Promise<void> {
      if (!record.propertyId) {
        throw new ParseError('propertyId is required');
      }
      assertVector(record.vector, dimension);
      records.delete(record.propertyId);
      records.set(record.propertyId, {
        propertyId: record.propertyId,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    },

    async remove(propertyId: string): Promise<boolean> {
      return records.delete(propertyId);
    },

    async get(propertyId: string): Promise<EmbeddingRecord | null> {
      const record = records.get(propertyId);
      return record
        ? { ...record, vector: [...record.vector], metadata: { ...record.metadata } }
        : null;
    },

    async size(): Promise<number> {
      return records.size;
    },

    async query(
      vector: readonly number[],
      options: SimilarityQueryOptions
    ): Promise<SimilarityMatch[]> {
      assertVector(vector, dimension);
      const candidates = [...records.values()].filter(
        (record) => record.propertyId !== options.excludePropertyId
      );
      // get と同じく、保持しているメタデータは共有しない
      return rankBySimilarity(vector, candidates, options).map((match) => ({
        ...match,
        metadata: { ...match.metadata },
      }));
    },
  };
};

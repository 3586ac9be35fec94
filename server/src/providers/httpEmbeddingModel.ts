import { DimensionMismatchError, ProviderError } from '../errors';
import type { EmbeddingModel } from '../model/providers';
import { requestJson, type FetchLike } from './http';

interface HttpEmbeddingModelOptions {
  url: string;
  dimension: number;
  apiKey?: string;
  fetchImpl?: FetchLike;
}

// Accepts `{ embedding: number[] }` or `{ data: [{ embedding: number[] }] }`.
export const parseEmbeddingResponse = (
  payload: unknown,
  dimension: number
): number[] => {
  let candidate: unknown;
  if (typeof payload === 'object' && payload !== null) {
    if ('embedding' in payload) {
      candidate = payload.embedding;
    } else if ('data' in payload && Array.isArray(payload.data)) {
      const first: unknown = payload.data[0];
      if (typeof first === 'object' && first !== null && 'embedding' in first) {
        candidate = first.embedding;
      }
    }
  }

  if (!Array.isArray(candidate)) {
    throw new ProviderError('embedding', 'Embedding response has no vector');
  }
  const vector: number[] = [];
  for (const value of candidate) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ProviderError('embedding', 'Embedding vector has non-numeric values');
    }
    vector.push(value);
  }
  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length);
  }
  return vector;
};

export const createHttpEmbeddingModel = ({
  url,
  dimension,
  apiKey,
  fetchImpl = fetch,
}: HttpEmbeddingModelOptions): EmbeddingModel => ({
  dimension,

  async embed(image, signal) {
    const headers: Record<string, string> = {
      'Content-Type': 'application/octet-stream',
    };
    if (apiKey) headers.Authorization = `Bearer ${apiKey}`;

    const payload = await requestJson(url, {
      provider: 'embedding',
      fetchImpl,
      init: { method: 'POST', headers, body: image, signal },
    });
    return parseEmbeddingResponse(payload, dimension);
  },
});

import { DimensionMismatchError, InvalidImageError } from '../errors';
import type { EmbeddingModel } from '../model/providers';
import type { SimilarityMatch } from '../scoring/similarity';
import type {
  SimilarityIndex,
  SimilarityQueryOptions,
} from './similarityIndex';

interface PropertyImageIngestionDeps {
  embeddingModel: EmbeddingModel;
  similarityIndex: SimilarityIndex;
}

export interface PropertyImageIngestion {
  ingest(
    propertyId: string,
    image: Buffer,
    metadata?: Record<string, unknown>
  ): Promise<{ propertyId: string; dimension: number }>;
  searchByImage(
    image: Buffer,
    options: SimilarityQueryOptions
  ): Promise<SimilarityMatch[]>;
}

export const createPropertyImageIngestion = ({
  embeddingModel,
  similarityIndex,
}: PropertyImageIngestionDeps): PropertyImageIngestion => {
  if (embeddingModel.dimension !== similarityIndex.dimension) {
    throw new DimensionMismatchError(
      similarityIndex.dimension,
      embeddingModel.dimension
    );
  }

  const embed = async (image: Buffer) => {
    if (!image.length) {
      throw new InvalidImageError('Image data is empty');
    }
    return embeddingModel.embed(image);
  };

  return {
    async ingest(propertyId, image, metadata = {}) {
      const vector = await embed(image);
      await similarityIndex.upsert({ propertyId, vector, metadata });
      return { propertyId, dimension: vector.length };
    },

    async searchByImage(image, options) {
      const vector = await embed(image);
      return similarityIndex.query(vector, options);
    },
  };
};

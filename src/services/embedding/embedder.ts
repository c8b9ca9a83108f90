/**
 * EmbeddingService - batched corpus encoding and single-query encoding
 *
 * Batching bounds peak memory and drives progress reporting. It has no
 * effect on the vectors produced.
 *
 * @module services/embedding/embedder
 */

import { EmbeddingError, type EmbeddingProvider } from './provider.js';

export const DEFAULT_BATCH_SIZE = 100;

export interface EmbedCorpusOptions {
  batchSize?: number;
  /** Called after every batch with texts done so far and the total */
  onProgress?: (done: number, total: number) => void;
}

export class EmbeddingService {
  constructor(private readonly provider: EmbeddingProvider) {}

  get modelName(): string {
    return this.provider.modelName;
  }

  /**
   * Encode every text in order.
   *
   * @returns One vector per text; all share one dimension
   * @throws EmbeddingError on a provider failure, a count mismatch or mixed dimensions
   */
  async embedCorpus(texts: string[], options: EmbedCorpusOptions = {}): Promise<Float32Array[]> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new EmbeddingError(`Batch size must be a positive integer, got ${batchSize}`, 'EMBEDDING_FAILED', {
        batchSize,
      });
    }

    const vectors: Float32Array[] = [];
    let dimension: number | null = null;

    for (let start = 0; start < texts.length; start += batchSize) {
      const batch = texts.slice(start, start + batchSize);
      const encoded = await this.provider.encode(batch);

      if (encoded.length !== batch.length) {
        throw new EmbeddingError(
          `Vector count mismatch: got ${encoded.length}, expected ${batch.length}`,
          'EMBEDDING_FAILED',
          { batchStart: start, vectorCount: encoded.length, textCount: batch.length }
        );
      }

      for (const vector of encoded) {
        dimension ??= vector.length;
        if (vector.length !== dimension) {
          throw new EmbeddingError(
            `Embedding dimension changed mid-corpus: ${vector.length}, expected ${dimension}`,
            'DIMENSION_MISMATCH',
            { position: vectors.length, actualDim: vector.length, expectedDim: dimension }
          );
        }
        vectors.push(vector);
      }

      options.onProgress?.(vectors.length, texts.length);
    }

    return vectors;
  }

  /**
   * Encode one query text.
   */
  async embedQuery(query: string): Promise<Float32Array> {
    const [vector] = await this.provider.encode([query]);
    if (!vector) {
      throw new EmbeddingError('Provider returned no vector for the query', 'EMBEDDING_FAILED', {
        query: query.substring(0, 100),
      });
    }
    return vector;
  }
}

/**
 * EmbeddingProvider - the seam between retrieval and the embedding model
 *
 * @module services/embedding/provider
 */

export type EmbeddingErrorCode =
  | 'EMBEDDING_FAILED'
  | 'PARSE_ERROR'
  | 'WORKER_ERROR'
  | 'DIMENSION_MISMATCH'
  | 'MODEL_NOT_FOUND';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

/**
 * Maps text to fixed-dimension float32 vectors.
 * Deterministic for a given model; one output vector per input text, in order.
 */
export interface EmbeddingProvider {
  readonly modelName: string;
  encode(texts: string[]): Promise<Float32Array[]>;
}

import type { Chunk } from '../claims/types';
import type { SimilarityMetric } from './similarity';

export interface IndexedChunk extends Chunk {
  readonly embedding: readonly number[];
}

export interface RetrievalHit {
  chunk: Chunk;
  score: number;
}

export interface RetrieveOptions {
  /** Restricts hits to one document. */
  documentId?: string;
}

export interface IndexOptions {
  similarity?: SimilarityMetric;
  batchSize?: number;
}

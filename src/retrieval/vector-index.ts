import type { Chunk } from '../claims/types';
import type { EmbeddingProvider } from '../providers/embedding-provider';
import { ProcessingError } from '../errors/index';
import { similarityFn, type SimilarityMetric } from './similarity';
import type { IndexOptions, IndexedChunk, RetrievalHit, RetrieveOptions } from './types';

const DEFAULT_BATCH_SIZE = 64;

/**
 * In-memory embedding index over the chunks of a corpus.
 * Built once before the query phase; chunks are never mutated afterwards,
 * so concurrent queries are safe.
 */
export class VectorIndex {
  private readonly queryCache = new Map<string, Promise<readonly number[]>>();
  private readonly score: (a: readonly number[], b: readonly number[]) => number;

  private constructor(
    private readonly entries: readonly IndexedChunk[],
    private readonly embedder: EmbeddingProvider,
    readonly similarity: SimilarityMetric
  ) {
    this.score = similarityFn(similarity);
  }

  static async build(
    chunks: readonly Chunk[],
    embedder: EmbeddingProvider,
    options: IndexOptions = {}
  ): Promise<VectorIndex> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const entries: IndexedChunk[] = [];

    for (let i = 0; i < chunks.length; i += batchSize) {
      const batch = chunks.slice(i, i + batchSize);
      const vectors = await embedder.embed(batch.map((c) => c.text));
      if (vectors.length !== batch.length) {
        throw new ProcessingError(
          `Embedder ${embedder.id} returned ${vectors.length} vectors for ${batch.length} chunks`
        );
      }
      batch.forEach((chunk, j) => {
        entries.push(Object.freeze({ ...chunk, embedding: Object.freeze([...(vectors[j] ?? [])]) }));
      });
    }

    return new VectorIndex(Object.freeze(entries), embedder, options.similarity ?? 'cosine');
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Top-k chunks by descending similarity. Ties break on ascending chunk
   * sequence, then document id, so results are reproducible.
   */
  async retrieve(query: string, k: number, options: RetrieveOptions = {}): Promise<RetrievalHit[]> {
    if (k <= 0) return [];
    const queryVector = await this.embedQuery(query);

    const candidates = options.documentId
      ? this.entries.filter((entry) => entry.documentId === options.documentId)
      : this.entries;

    return candidates
      .map((entry) => ({ entry, score: this.score(queryVector, entry.embedding) }))
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.entry.sequence - b.entry.sequence ||
          a.entry.documentId.localeCompare(b.entry.documentId)
      )
      .slice(0, k)
      .map(({ entry, score }) => ({ chunk: toChunk(entry), score }));
  }

  private embedQuery(query: string): Promise<readonly number[]> {
    let pending = this.queryCache.get(query);
    if (!pending) {
      pending = this.embedder.embed([query]).then((vectors) => {
        const vector = vectors[0];
        if (!vector) {
          throw new ProcessingError(`Embedder ${this.embedder.id} returned no vector for the query`);
        }
        return vector;
      });
      // Failed embeddings are not memoised
      void pending.catch(() => this.queryCache.delete(query));
      this.queryCache.set(query, pending);
    }
    return pending;
  }
}

function toChunk(entry: IndexedChunk): Chunk {
  return {
    id: entry.id,
    documentId: entry.documentId,
    sequence: entry.sequence,
    start: entry.start,
    end: entry.end,
    text: entry.text,
  };
}

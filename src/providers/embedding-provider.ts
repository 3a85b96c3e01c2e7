import OpenAI from 'openai';
import { OPENAI_EMBEDDING_RESPONSE_SCHEMA } from '../schemas/provider-responses';
import { handleUnknownError } from '../errors/index';
import { APIResponseError, ProviderRequestError, isTransientStatus } from '../errors/provider-errors';

export interface EmbeddingProvider {
  /** Identifies the vector space; vectors from different ids are not comparable. */
  readonly id: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface HashingEmbeddingConfig {
  dimensions?: number;
}

const TOKEN_PATTERN = /[a-z0-9]+(?:[.'-][a-z0-9]+)*/g;

/**
 * Local feature-hashing embedder: unigrams and bigrams hashed (FNV-1a) into
 * signed buckets, L2-normalised. Deterministic and offline.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  private readonly dimensions: number;

  constructor(config: HashingEmbeddingConfig = {}) {
    this.dimensions = config.dimensions ?? 512;
    this.id = `hashing:${this.dimensions}`;
  }

  embed(texts: string[]): Promise<number[][]> {
    return Promise.resolve(texts.map((text) => this.embedOne(text)));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];

    const features: string[] = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i++) {
      features.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    for (const feature of features) {
      const hash = fnv1a(feature);
      const bucket = hash % this.dimensions;
      const sign = (hash >>> 31) === 0 ? 1 : -1;
      vector[bucket] = (vector[bucket] ?? 0) + sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  batchSize?: number;
}

export const OpenAIEmbeddingDefaultConfig = {
  model: 'text-embedding-3-small',
  batchSize: 64,
};

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  private client: OpenAI;
  private model: string;
  private batchSize: number;

  constructor(config: OpenAIEmbeddingConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 2 });
    this.model = config.model ?? OpenAIEmbeddingDefaultConfig.model;
    this.batchSize = config.batchSize ?? OpenAIEmbeddingDefaultConfig.batchSize;
    this.id = `openai:${this.model}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      vectors.push(...(await this.embedBatch(texts.slice(i, i + this.batchSize))));
    }
    return vectors;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    let raw: unknown;
    try {
      raw = await this.client.embeddings.create({ model: this.model, input: batch });
    } catch (e: unknown) {
      if (e instanceof OpenAI.APIError) {
        const retryable = e.status === undefined || isTransientStatus(e.status);
        throw new ProviderRequestError(`OpenAI embeddings error (${e.status ?? 'network'}): ${e.message}`, retryable, e.status);
      }
      const err = handleUnknownError(e, 'OpenAI embeddings call');
      throw new ProviderRequestError(`OpenAI embeddings call failed: ${err.message}`, false);
    }

    const parsed = OPENAI_EMBEDDING_RESPONSE_SCHEMA.safeParse(raw);
    if (!parsed.success) {
      throw new APIResponseError(`Invalid OpenAI embeddings response: ${parsed.error.message}`, raw, parsed.error);
    }
    if (parsed.data.data.length !== batch.length) {
      throw new APIResponseError(
        `OpenAI returned ${parsed.data.data.length} embeddings for ${batch.length} inputs`,
        raw
      );
    }
    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

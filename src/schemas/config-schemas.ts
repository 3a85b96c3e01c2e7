import { z } from 'zod';
import { EmbeddingType } from '../providers/provider-factory';

// INI values arrive as strings
const BOOLEAN_VALUE = z.preprocess((value: unknown) => {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (['true', 'yes', 'on', '1'].includes(v)) return true;
  if (['false', 'no', 'off', '0'].includes(v)) return false;
  return value;
}, z.boolean());

const POSITIVE_INT = z.coerce.number().int().positive();

export const RETRIEVAL_CONFIG_SCHEMA = z.object({
  k: POSITIVE_INT.default(6),
  similarity: z.enum(['cosine', 'dot']).default('cosine'),
  embedding: z.nativeEnum(EmbeddingType).default(EmbeddingType.Hashing),
});

export const CHUNKING_CONFIG_SCHEMA = z
  .object({
    maxChars: POSITIVE_INT.default(2000),
    overlap: z.coerce.number().int().nonnegative().default(200),
    repeatedLineThreshold: POSITIVE_INT.default(3),
    boilerplatePatterns: z.array(z.string()).default([]),
  })
  .refine((c) => c.overlap < c.maxChars, { message: 'Overlap must be smaller than MaxChars', path: ['overlap'] });

export const GENERATION_CONFIG_SCHEMA = z.object({
  enabled: BOOLEAN_VALUE.default(true),
  deterministic: BOOLEAN_VALUE.default(true),
  concurrency: POSITIVE_INT.default(4),
  timeoutMs: POSITIVE_INT.default(60_000),
  maxAttempts: POSITIVE_INT.default(2),
  inputPricePerMillion: z.coerce.number().nonnegative().optional(),
  outputPricePerMillion: z.coerce.number().nonnegative().optional(),
});

export const VERIFICATION_CONFIG_SCHEMA = z.object({
  overlapThreshold: z.coerce.number().gt(0).lte(1).default(0.5),
  reviewFraction: z.coerce.number().min(0).max(1).default(0.1),
  reviewSeed: z.string().min(1).default('claimtrace'),
});

// Configuration file schema for .claimtrace.ini validation
export const CONFIG_SCHEMA = z.object({
  configDir: z.string().min(1),
  manifestPath: z.string().min(1).optional(),
  outputDir: z.string().min(1),
  taxonomyPath: z.string().min(1),
  patternsPath: z.string().min(1),
  probesPath: z.string().min(1),
  concurrency: POSITIVE_INT.default(4),
  retrieval: RETRIEVAL_CONFIG_SCHEMA.default({}),
  chunking: CHUNKING_CONFIG_SCHEMA.default({}),
  generation: GENERATION_CONFIG_SCHEMA.default({}),
  verification: VERIFICATION_CONFIG_SCHEMA.default({}),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
export type RetrievalConfig = z.infer<typeof RETRIEVAL_CONFIG_SCHEMA>;
export type ChunkingConfig = z.infer<typeof CHUNKING_CONFIG_SCHEMA>;
export type GenerationConfig = z.infer<typeof GENERATION_CONFIG_SCHEMA>;
export type VerificationConfig = z.infer<typeof VERIFICATION_CONFIG_SCHEMA>;

import type { Chunk, SourceDocument } from '../claims/types';
import type { PatternCatalog, Probe, Taxonomy } from '../claims/catalog';
import type { ChunkingOptions, CoverageReport, DiscardedSpan } from '../chunking/types';
import type { PatternExtractor } from '../extraction/pattern-extractor';
import type { SchemaExtractor } from '../extraction/schema-extractor';
import type { CanonicalClaimSet } from '../aggregation/canonical-set';
import type { PipelineIssue } from '../errors/pipeline-errors';
import type { ProbeUsage, TokenUsage } from '../types/token-usage';

export interface ChunkedDocument {
  document: SourceDocument;
  chunks: Chunk[];
  discarded: DiscardedSpan[];
  coverage: CoverageReport;
  issues: PipelineIssue[];
}

export interface DocumentPipelineDeps {
  taxonomy: Taxonomy;
  patterns: PatternCatalog;
  probes: readonly Probe[];
  patternExtractor: PatternExtractor;
  /** Absent when generation is disabled. */
  schemaExtractor?: SchemaExtractor;
  claimSet: CanonicalClaimSet;
}

export interface DocumentPipelineOptions {
  chunking: ChunkingOptions;
  overlapThreshold: number;
}

export interface DocumentReport {
  documentId: string;
  chunks: number;
  candidates: { pattern: number; llm: number };
  verified: number;
  unverified: number;
  claims: number;
  partnerships: number;
  issues: PipelineIssue[];
  generation: { requests: number; cacheHits: number; usage: TokenUsage; byProbe: ProbeUsage[] };
}

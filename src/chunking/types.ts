import type { Chunk } from '../claims/types';
import type { PartialExtractionWarning } from '../errors/pipeline-errors';

export type DiscardReason = 'boilerplate' | 'repeated-header' | 'encoding-error' | 'whitespace';

export interface Span {
  start: number;
  end: number;
}

export interface DiscardedSpan extends Span {
  reason: DiscardReason;
}

export interface ChunkingOptions {
  maxChars?: number; // Maximum characters per chunk
  overlap?: number; // Characters shared by consecutive windows; must be < maxChars
  boilerplatePatterns?: RegExp[]; // Tested against each raw line
  repeatedLineThreshold?: number; // Short lines seen this often are running headers/footers
}

export interface ChunkingResult {
  chunks: Chunk[];
  discarded: DiscardedSpan[];
  warnings: PartialExtractionWarning[];
}

export interface ChunkableDocument {
  readonly id: string;
  readonly text: string;
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(document: ChunkableDocument, options?: ChunkingOptions): ChunkingResult;
}

export interface CoverageReport {
  documentId: string;
  length: number;
  covered: number;
  gaps: Span[];
  discarded: DiscardedSpan[];
}

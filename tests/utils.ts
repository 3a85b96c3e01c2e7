import {
  ExtractionOrigin,
  type Chunk,
  type ClaimCandidate,
  type SourceDocument,
} from '../src/claims/types';
import type { PatternCatalog, Probe, Taxonomy } from '../src/claims/catalog';
import { loadPatternCatalog, loadProbes, loadTaxonomy } from '../src/boundaries/catalog-loader';
import { DEFAULT_PATTERNS_PATH, DEFAULT_PROBES_PATH, DEFAULT_TAXONOMY_PATH } from '../src/config/constants';

export interface BundledCatalogs {
  taxonomy: Taxonomy;
  patterns: PatternCatalog;
  probes: readonly Probe[];
}

/** Catalogs shipped in config/. */
export function loadBundledCatalogs(): BundledCatalogs {
  const taxonomy = loadTaxonomy(DEFAULT_TAXONOMY_PATH);
  return {
    taxonomy,
    patterns: loadPatternCatalog(DEFAULT_PATTERNS_PATH, taxonomy),
    probes: loadProbes(DEFAULT_PROBES_PATH, taxonomy),
  };
}

export function createDocument(id: string, text: string, overrides: Partial<SourceDocument> = {}): SourceDocument {
  return {
    id,
    text,
    sourcePath: `/corpus/${id}.txt`,
    state: 'Ohio',
    organization: 'Test Health Plan',
    year: 2023,
    documentType: 'proposal',
    ...overrides,
  };
}

/** A chunk covering `text`, placed at `start` in its document. */
export function createChunk(documentId: string, sequence: number, text: string, start: number = 0): Chunk {
  return {
    id: `${documentId}#${sequence}`,
    documentId,
    sequence,
    start,
    end: start + text.length,
    text,
  };
}

export function createCandidate(chunk: Chunk, quote: string, overrides: Partial<ClaimCandidate> = {}): ClaimCandidate {
  return {
    id: `cand-${chunk.id}-${quote.length}`,
    documentId: chunk.documentId,
    chunkId: chunk.id,
    origin: ExtractionOrigin.Pattern,
    quote,
    value: null,
    confidence: 'MEDIUM',
    domain: 'QM',
    claimType: 'HIST',
    evidence: 'NONE',
    quantification: 'Q-NONE',
    clinicalArea: null,
    theme: null,
    partners: [],
    provenance: { source: 'reported-change', query: null, contextChunkIds: [chunk.id] },
    ...overrides,
  };
}

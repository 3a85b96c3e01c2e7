import { isVerified, type ClaimCandidate, type SourceDocument } from '../claims/types';
import type { ChunkingOptions } from '../chunking/types';
import { chunkDocument, computeCoverage } from '../chunking/chunker';
import { SourceVerifier } from '../verification/source-verifier';
import { deduplicate } from '../aggregation/deduplicator';
import { PartialExtractionWarning, type PipelineIssue } from '../errors/pipeline-errors';
import { debug } from '../output/logger';
import type { ChunkedDocument, DocumentPipelineDeps, DocumentPipelineOptions, DocumentReport } from './types';

/**
 * Splits a document and checks that chunks and discarded spans cover it.
 */
export function chunkSourceDocument(document: SourceDocument, options: ChunkingOptions): ChunkedDocument {
  const { chunks, discarded, warnings } = chunkDocument(document, options);
  const coverage = computeCoverage(document.id, document.text.length, chunks, discarded);
  const issues: PipelineIssue[] = [...warnings];

  if (chunks.length === 0) {
    issues.push(
      new PartialExtractionWarning({ documentId: document.id }, 'no-extractable-text', {
        length: document.text.length,
        discarded: discarded.length,
      })
    );
  }
  return { document, chunks, discarded, coverage, issues };
}

/**
 * Extract, verify and deduplicate one document, then commit its canonical
 * claims. Stages run in order; nothing here throws for a document-scoped
 * problem, it is returned as an issue instead.
 */
export async function processDocument(
  chunked: ChunkedDocument,
  deps: DocumentPipelineDeps,
  options: DocumentPipelineOptions
): Promise<DocumentReport> {
  const { document, chunks } = chunked;
  const issues: PipelineIssue[] = [...chunked.issues];

  const patternCandidates = deps.patternExtractor.extractAll(chunks);

  let llmCandidates: ClaimCandidate[] = [];
  const generation: DocumentReport['generation'] = {
    requests: 0,
    cacheHits: 0,
    usage: { inputTokens: 0, outputTokens: 0 },
    byProbe: [],
  };
  if (deps.schemaExtractor && chunks.length > 0) {
    const extracted = await deps.schemaExtractor.extract(document, deps.probes);
    llmCandidates = extracted.candidates;
    issues.push(...extracted.issues);
    generation.requests = extracted.requests;
    generation.cacheHits = extracted.cacheHits;
    generation.usage = extracted.usage;
    generation.byProbe = extracted.byProbe;
  }

  // Verification runs even when generation was aborted part-way
  const verification = new SourceVerifier(chunks).verifyAll([...patternCandidates, ...llmCandidates]);
  issues.push(...verification.issues);

  const deduplicated = deduplicate(verification.checked, { overlapThreshold: options.overlapThreshold });
  issues.push(...deduplicated.issues);

  await deps.claimSet.commit(document.id, {
    claims: deduplicated.claims,
    partnerships: deduplicated.partnerships,
    records: deduplicated.records,
  });

  const verified = verification.checked.filter(isVerified).length;
  debug(
    `${document.id}: ${patternCandidates.length} pattern + ${llmCandidates.length} model candidate(s), ` +
      `${verified} verified, ${deduplicated.claims.length} claim(s)`
  );

  return {
    documentId: document.id,
    chunks: chunks.length,
    candidates: {
      pattern: patternCandidates.length,
      llm: llmCandidates.length,
    },
    verified,
    unverified: verification.checked.length - verified,
    claims: deduplicated.claims.length,
    partnerships: deduplicated.partnerships.length,
    issues,
    generation,
  };
}

import type { Claim } from '../claims/types';
import type { PatternCatalog, Probe, Taxonomy } from '../claims/catalog';
import type { ChunkingOptions, CoverageReport } from '../chunking/types';
import type { LLMProvider } from '../providers/llm-provider';
import type { EmbeddingProvider } from '../providers/embedding-provider';
import type { SimilarityMetric } from '../retrieval/similarity';
import type { CacheStore } from '../cache/cache-store';
import type { TemplateRenderer } from '../prompts/template-renderer';
import type { LoadedCorpus } from '../boundaries/manifest-loader';
import type { AuditKind } from '../errors/pipeline-errors';
import {
  UsageLedger,
  calculateCost,
  type PricingConfig,
  type TokenUsage,
  type UsageBreakdownEntry,
} from '../types/token-usage';
import { VectorIndex } from '../retrieval/vector-index';
import { PatternExtractor } from '../extraction/pattern-extractor';
import { SchemaExtractor } from '../extraction/schema-extractor';
import { CanonicalClaimSet } from '../aggregation/canonical-set';
import { computeExhibits, type Exhibits } from '../aggregation/exhibits';
import { computeDocumentAnalyses, type DocumentAnalysis } from '../aggregation/document-analysis';
import { deriveCommitments, type Commitment } from '../aggregation/commitments';
import { selectForReview } from '../verification/source-verifier';
import { ExtractionFailed, PartialExtractionWarning } from '../errors/pipeline-errors';
import { InputUnavailableError, handleUnknownError } from '../errors/index';
import { log, warn } from '../output/logger';
import { AuditLog } from './audit-log';
import { WorkerPool, type WorkerPoolStats } from './worker-pool';
import { runWithConcurrency } from './concurrency';
import { chunkSourceDocument, processDocument } from './document-pipeline';
import type { ChunkedDocument, DocumentReport } from './types';

export interface CorpusRunDeps {
  taxonomy: Taxonomy;
  patterns: PatternCatalog;
  probes: readonly Probe[];
  embedder: EmbeddingProvider;
  /** Without a provider only the pattern extractor runs. */
  provider?: LLMProvider;
  cache?: CacheStore;
  renderer?: TemplateRenderer;
}

export interface CorpusRunOptions {
  concurrency: number;
  chunking: ChunkingOptions;
  retrieval: { k: number; similarity: SimilarityMetric };
  generation: { concurrency: number; timeoutMs: number; maxAttempts: number; pricing?: PricingConfig };
  overlapThreshold: number;
  review: { fraction: number; seed: string };
  signal?: AbortSignal;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  aborted: boolean;
  documents: { listed: number; processed: number; unavailable: number; failed: number };
  chunks: number;
  candidates: { pattern: number; llm: number; total: number };
  verified: number;
  unverified: number;
  claims: number;
  partnerships: number;
  commitments: number;
  reviewQueue: number;
  issues: Partial<Record<AuditKind, number>>;
  generation: {
    provider: string | null;
    embedder: string;
    requests: number;
    cacheHits: number;
    pool: WorkerPoolStats | null;
    usage: TokenUsage;
    cost?: number;
    byProbe: Record<string, UsageBreakdownEntry>;
  };
}

export interface CorpusRunResult {
  claimSet: CanonicalClaimSet;
  claims: Claim[];
  reports: DocumentReport[];
  audit: AuditLog;
  coverage: CoverageReport[];
  reviewQueue: Claim[];
  commitments: Commitment[];
  analyses: DocumentAnalysis[];
  exhibits: Exhibits;
  summary: RunSummary;
}

function emptyReport(documentId: string, chunks: number): DocumentReport {
  return {
    documentId,
    chunks,
    candidates: { pattern: 0, llm: 0 },
    verified: 0,
    unverified: 0,
    claims: 0,
    partnerships: 0,
    issues: [],
    generation: { requests: 0, cacheHits: 0, usage: { inputTokens: 0, outputTokens: 0 }, byProbe: [] },
  };
}

/**
 * Embeds every chunk once. When the embedder fails the model path is skipped
 * for the run: each document's probes are recorded as failed and pattern
 * extraction carries on.
 */
async function buildIndex(
  chunked: readonly ChunkedDocument[],
  deps: CorpusRunDeps,
  options: CorpusRunOptions
): Promise<VectorIndex | undefined> {
  try {
    return await VectorIndex.build(
      chunked.flatMap((c) => c.chunks),
      deps.embedder,
      { similarity: options.retrieval.similarity }
    );
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Embedding with ${deps.embedder.id}`);
    warn(`Index build failed, continuing with pattern extraction only: ${err.message}`);
    for (const item of chunked) {
      if (item.chunks.length === 0) continue;
      for (const probe of deps.probes) {
        item.issues.push(
          new ExtractionFailed(
            { documentId: item.document.id, probeId: probe.id },
            `index-unavailable: ${err.message}`,
            { embedder: deps.embedder.id }
          )
        );
      }
    }
    return undefined;
  }
}

/**
 * Runs the whole corpus: chunk every document, build the shared index,
 * then process documents concurrently. Only an empty corpus is fatal.
 */
export async function runCorpus(
  corpus: LoadedCorpus,
  deps: CorpusRunDeps,
  options: CorpusRunOptions
): Promise<CorpusRunResult> {
  if (corpus.documents.length === 0) {
    const reasons = corpus.unavailable.map((u) => `${u.path}: ${u.reason}`).join('; ');
    throw new InputUnavailableError(`No readable documents in the manifest${reasons ? ` (${reasons})` : ''}`);
  }
  const startedAt = new Date().toISOString();

  const chunked: ChunkedDocument[] = corpus.documents.map((document) =>
    chunkSourceDocument(document, options.chunking)
  );

  const pool = deps.provider
    ? new WorkerPool({ ...options.generation, ...(options.signal && { signal: options.signal }) })
    : undefined;

  let schemaExtractor: SchemaExtractor | undefined;
  const index = deps.provider && pool ? await buildIndex(chunked, deps, options) : undefined;
  if (deps.provider && pool && index) {
    log(`Indexed ${index.size} chunk(s) with ${deps.embedder.id}`);
    schemaExtractor = new SchemaExtractor(
      {
        provider: deps.provider,
        index,
        pool,
        taxonomy: deps.taxonomy,
        ...(deps.renderer && { renderer: deps.renderer }),
        ...(deps.cache && { cache: deps.cache }),
      },
      { k: options.retrieval.k }
    );
  }

  const claimSet = new CanonicalClaimSet();
  const patternExtractor = new PatternExtractor(deps.taxonomy, deps.patterns);

  const reports = await runWithConcurrency(chunked, options.concurrency, async (item) => {
    try {
      return await processDocument(
        item,
        {
          taxonomy: deps.taxonomy,
          patterns: deps.patterns,
          probes: deps.probes,
          patternExtractor,
          ...(schemaExtractor && { schemaExtractor }),
          claimSet,
        },
        { chunking: options.chunking, overlapThreshold: options.overlapThreshold }
      );
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Processing ${item.document.id}`);
      const report = emptyReport(item.document.id, item.chunks.length);
      report.issues = [
        ...item.issues,
        new ExtractionFailed({ documentId: item.document.id }, `document-failed: ${err.message}`),
      ];
      return report;
    }
  });

  const audit = new AuditLog();
  audit.record(
    corpus.unavailable.map(
      (u) => new PartialExtractionWarning({ documentId: u.path }, 'input-unavailable', { reason: u.reason })
    )
  );
  // Recorded in manifest order so the audit log is stable across runs
  for (const report of reports) audit.record(report.issues);

  const claims = claimSet.claims();
  const reviewQueue = selectForReview(claims, options.review.fraction, options.review.seed);
  const exhibits = computeExhibits(claims, corpus.documents, deps.taxonomy.regions);
  const analyses = computeDocumentAnalyses(claims, corpus.documents, deps.taxonomy);
  const commitments = deriveCommitments(claims);

  const ledger = new UsageLedger();
  for (const report of reports) ledger.add(report.generation.byProbe);
  const usage = ledger.total();
  const cost = calculateCost(usage, options.generation.pricing);
  const sum = (pick: (r: DocumentReport) => number): number => reports.reduce((acc, r) => acc + pick(r), 0);

  const summary: RunSummary = {
    startedAt,
    finishedAt: new Date().toISOString(),
    aborted: options.signal?.aborted ?? false,
    documents: {
      listed: corpus.documents.length + corpus.unavailable.length,
      processed: reports.length,
      unavailable: corpus.unavailable.length,
      failed: reports.filter((r) => r.issues.some((i) => i.reason.startsWith('document-failed'))).length,
    },
    chunks: sum((r) => r.chunks),
    candidates: {
      pattern: sum((r) => r.candidates.pattern),
      llm: sum((r) => r.candidates.llm),
      total: sum((r) => r.candidates.pattern + r.candidates.llm),
    },
    verified: sum((r) => r.verified),
    unverified: sum((r) => r.unverified),
    claims: claims.length,
    partnerships: claimSet.partnerships().length,
    commitments: commitments.length,
    reviewQueue: reviewQueue.length,
    issues: audit.countByKind(),
    generation: {
      provider: deps.provider?.id ?? null,
      embedder: deps.embedder.id,
      requests: sum((r) => r.generation.requests),
      cacheHits: sum((r) => r.generation.cacheHits),
      pool: pool ? { ...pool.stats } : null,
      usage,
      ...(cost !== undefined && { cost }),
      byProbe: ledger.breakdown(options.generation.pricing),
    },
  };

  return {
    claimSet,
    claims,
    reports,
    audit,
    coverage: chunked.map((c) => c.coverage),
    reviewQueue,
    commitments,
    analyses,
    exhibits,
    summary,
  };
}

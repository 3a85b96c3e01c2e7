import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { runCorpus, type CorpusRunOptions } from '../src/pipeline/corpus-runner';
import { AuditLog } from '../src/pipeline/audit-log';
import { HashingEmbeddingProvider } from '../src/providers/embedding-provider';
import type { EmbeddingProvider } from '../src/providers/embedding-provider';
import type { LLMProvider } from '../src/providers/llm-provider';
import { OUTPUT_FILES, readClaimRecords, toJsonl, writeRunOutputs } from '../src/output/record-writer';
import { ExtractionFailed, UnverifiedClaim } from '../src/errors/pipeline-errors';
import { InputUnavailableError, ProcessingError } from '../src/errors/index';
import { ExtractionOrigin } from '../src/claims/types';
import type { Probe } from '../src/claims/catalog';
import type { LoadedCorpus } from '../src/boundaries/manifest-loader';
import { createDocument, loadBundledCatalogs, type BundledCatalogs } from './utils';

const ED_SENTENCE = 'We achieved a 15% reduction in avoidable ED visits by 2023.';
const HEDIS_SENTENCE = 'Our plan commits to a 90% HEDIS breast cancer screening target by Year 2.';

const CORPUS: LoadedCorpus = {
  documents: [
    createDocument('ohio-2023', `${ED_SENTENCE}\n`),
    createDocument('texas-2022', `${HEDIS_SENTENCE}\n`, { state: 'Texas', year: 2022 }),
  ],
  unavailable: [{ path: '/corpus/missing.txt', reason: 'ENOENT: no such file or directory' }],
};

const PROBE: Probe = {
  id: 'historical-outcomes',
  claimType: 'HIST',
  query: 'reduction ED visits',
  guidance: 'Report outcomes already achieved.',
};

const OPTIONS: CorpusRunOptions = {
  concurrency: 2,
  chunking: {},
  retrieval: { k: 4, similarity: 'cosine' },
  generation: { concurrency: 2, timeoutMs: 1000, maxAttempts: 1 },
  overlapThreshold: 0.5,
  review: { fraction: 0, seed: 'test-seed' },
};

describe('runCorpus', () => {
  let catalogs: BundledCatalogs;

  beforeAll(() => {
    catalogs = loadBundledCatalogs();
  });

  function deps(provider?: LLMProvider, embedder: EmbeddingProvider = new HashingEmbeddingProvider()) {
    return {
      taxonomy: catalogs.taxonomy,
      patterns: catalogs.patterns,
      probes: [PROBE],
      embedder,
      ...(provider && { provider }),
    };
  }

  it('fails only when no document is readable', async () => {
    await expect(runCorpus({ documents: [], unavailable: CORPUS.unavailable }, deps(), OPTIONS)).rejects.toThrow(
      InputUnavailableError
    );
    await expect(runCorpus({ documents: [], unavailable: CORPUS.unavailable }, deps(), OPTIONS)).rejects.toThrow(
      'No readable documents in the manifest (/corpus/missing.txt: ENOENT: no such file or directory)'
    );
  });

  describe('pattern extraction only', () => {
    it('produces verified canonical claims with exact spans', async () => {
      const result = await runCorpus(CORPUS, deps(), OPTIONS);

      expect(result.claims.map((c) => [c.documentId, c.claimType, c.origin])).toEqual([
        ['ohio-2023', 'HIST', ExtractionOrigin.Pattern],
        ['texas-2022', 'PROJ', ExtractionOrigin.Pattern],
      ]);
      for (const claim of result.claims) {
        const document = CORPUS.documents.find((d) => d.id === claim.documentId);
        expect(document?.text.slice(claim.start, claim.end)).toBe(claim.quote);
      }
      expect(result.claims[0]?.quote).toBe(ED_SENTENCE);
    });

    it('summarises the run', async () => {
      const result = await runCorpus(CORPUS, deps(), OPTIONS);

      expect(result.summary).toMatchObject({
        aborted: false,
        documents: { listed: 3, processed: 2, unavailable: 1, failed: 0 },
        chunks: 2,
        candidates: { pattern: 2, llm: 0, total: 2 },
        verified: 2,
        unverified: 0,
        claims: 2,
        partnerships: 0,
        commitments: 1,
        reviewQueue: 0,
        issues: { PartialExtractionWarning: 1 },
        generation: {
          provider: null,
          embedder: 'hashing:512',
          requests: 0,
          cacheHits: 0,
          pool: null,
          usage: { inputTokens: 0, outputTokens: 0 },
        },
      });
      expect(result.summary.generation.cost).toBeUndefined();
      expect(result.coverage.map((c) => c.documentId)).toEqual(['ohio-2023', 'texas-2022']);
      expect(result.coverage[0]).toEqual({
        documentId: 'ohio-2023',
        length: 60,
        covered: 60,
        gaps: [],
        discarded: [{ start: 59, end: 60, reason: 'whitespace' }],
      });
      expect(result.exhibits.totals).toEqual({ documents: 2, claims: 2 });
      const analyses = result.analyses.map((a) => [a.documentId, a.claims, a.claimTypeCounts['HIST'], a.claimTypeCounts['PROJ']]);
      expect(analyses).toEqual([
        ['ohio-2023', 1, 1, 0],
        ['texas-2022', 1, 0, 1],
      ]);
      expect(result.commitments).toEqual([
        expect.objectContaining({
          documentId: 'texas-2022',
          targetValue: 90,
          deadline: { text: 'by Year 2', start: 63, end: 72 },
          contractYear: 2,
        }),
      ]);
    });

    it('records unavailable inputs in the audit log', async () => {
      const result = await runCorpus(CORPUS, deps(), OPTIONS);

      expect(result.audit.entries()).toEqual([
        {
          kind: 'PartialExtractionWarning',
          documentId: '/corpus/missing.txt',
          reason: 'input-unavailable',
          detail: { reason: 'ENOENT: no such file or directory' },
        },
      ]);
    });

    it('samples every claim for review at fraction 1', async () => {
      const result = await runCorpus(CORPUS, deps(), { ...OPTIONS, review: { fraction: 1, seed: 'test-seed' } });
      expect(result.reviewQueue.map((c) => c.id)).toEqual(result.claims.map((c) => c.id).sort());
    });

    it('is deterministic across runs', async () => {
      const first = await runCorpus(CORPUS, deps(), OPTIONS);
      const second = await runCorpus(CORPUS, deps(), { ...OPTIONS, concurrency: 1 });

      expect(second.claims).toEqual(first.claims);
      expect(second.claimSet.records()).toEqual(first.claimSet.records());
    });
  });

  describe('with a model provider', () => {
    const runPromptStructured = vi.fn<LLMProvider['runPromptStructured']>();
    const provider: LLMProvider = { id: 'fake:model', runPromptStructured };

    beforeEach(() => {
      runPromptStructured.mockReset();
      runPromptStructured.mockImplementation((_content, prompt) =>
        Promise.resolve(
          prompt.includes('<chunk id="ohio-2023#0">')
            ? {
                data: {
                  status: 'claims_found',
                  claims: [
                    {
                      chunk_id: 'ohio-2023#0',
                      quote: ED_SENTENCE,
                      domain: 'AC',
                      theme: 'AC-ED',
                      claim_type: 'HIST',
                      evidence: 'NONE',
                      quantification: 'Q-PCT',
                      clinical_area: 'HOSP',
                      value: 15,
                      confidence: 'HIGH',
                      partners: [],
                    },
                    {
                      chunk_id: 'ohio-2023#0',
                      quote: 'We reduced readmissions by 40%.',
                      domain: 'AC',
                      theme: null,
                      claim_type: 'HIST',
                      evidence: 'NONE',
                      quantification: 'Q-PCT',
                      clinical_area: null,
                      value: 40,
                      confidence: 'LOW',
                      partners: [],
                    },
                  ],
                },
                usage: { inputTokens: 500, outputTokens: 80 },
              }
            : { data: { status: 'no_claim_found', claims: [] }, usage: { inputTokens: 400, outputTokens: 10 } }
        )
      );
    });

    it('merges a model candidate into the matching pattern claim', async () => {
      const result = await runCorpus(CORPUS, deps(provider), OPTIONS);

      expect(runPromptStructured).toHaveBeenCalledTimes(2);
      const ohio = result.claims.filter((c) => c.documentId === 'ohio-2023');
      expect(ohio).toHaveLength(1);
      expect(ohio[0]?.origin).toBe(ExtractionOrigin.LLM);
      expect(ohio[0]?.corroboratedBy).toHaveLength(2);
      expect(result.summary.candidates).toEqual({ pattern: 2, llm: 2, total: 4 });
      expect(result.summary.generation).toMatchObject({
        provider: 'fake:model',
        requests: 2,
        usage: { inputTokens: 900, outputTokens: 90 },
        byProbe: { 'historical-outcomes': { requests: 2, inputTokens: 900, outputTokens: 90 } },
      });
    });

    it('drops a quote that is not in the source and audits it', async () => {
      const result = await runCorpus(CORPUS, deps(provider), OPTIONS);

      expect(result.claims.some((c) => c.quote === 'We reduced readmissions by 40%.')).toBe(false);
      expect(result.summary.unverified).toBe(1);
      expect(result.audit.entries().filter((e) => e.kind === 'UnverifiedClaim')).toHaveLength(1);
    });

    it('prices token usage when rates are configured', async () => {
      const result = await runCorpus(CORPUS, deps(provider), {
        ...OPTIONS,
        generation: { ...OPTIONS.generation, pricing: { inputPricePerMillion: 2, outputPricePerMillion: 10 } },
      });

      expect(result.summary.generation.cost).toBeCloseTo((900 * 2 + 90 * 10) / 1_000_000);
      expect(result.summary.generation.byProbe['historical-outcomes']?.cost).toBeCloseTo(0.0027);
    });

    it('keeps pattern claims when every model request fails', async () => {
      runPromptStructured.mockReset();
      runPromptStructured.mockRejectedValue(new Error('socket closed'));

      const result = await runCorpus(CORPUS, deps(provider), OPTIONS);

      expect(result.claims).toHaveLength(2);
      expect(result.summary.issues.ExtractionFailed).toBe(2);
      expect(result.summary.documents.failed).toBe(0);
    });

    it('falls back to pattern extraction when the index cannot be built', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const embedder: EmbeddingProvider = {
        id: 'remote:embed',
        embed: vi.fn<EmbeddingProvider['embed']>().mockRejectedValue(new Error('503 upstream')),
      };

      const result = await runCorpus(CORPUS, deps(provider, embedder), OPTIONS);

      expect(runPromptStructured).not.toHaveBeenCalled();
      expect(result.claims.map((c) => c.origin)).toEqual([ExtractionOrigin.Pattern, ExtractionOrigin.Pattern]);
      expect(result.audit.entries().filter((e) => e.kind === 'ExtractionFailed')).toEqual([
        {
          kind: 'ExtractionFailed',
          documentId: 'ohio-2023',
          probeId: 'historical-outcomes',
          reason: 'index-unavailable: 503 upstream',
          detail: { embedder: 'remote:embed' },
        },
        {
          kind: 'ExtractionFailed',
          documentId: 'texas-2022',
          probeId: 'historical-outcomes',
          reason: 'index-unavailable: 503 upstream',
          detail: { embedder: 'remote:embed' },
        },
      ]);
      expect(result.summary.generation.requests).toBe(0);
      vi.restoreAllMocks();
    });
  });
});

describe('AuditLog', () => {
  it('keeps insertion order and counts by kind', () => {
    const audit = new AuditLog();
    audit.record([
      new UnverifiedClaim({ documentId: 'a', candidateId: 'llm_1' }, 'quote-not-found'),
      new ExtractionFailed({ documentId: 'a', probeId: 'p' }, 'timeout', { attempts: 2 }),
    ]);
    audit.record([new UnverifiedClaim({ documentId: 'b' }, 'empty-quote')]);

    expect(audit.size).toBe(3);
    expect(audit.entries()[1]).toEqual({
      kind: 'ExtractionFailed',
      documentId: 'a',
      probeId: 'p',
      reason: 'timeout',
      detail: { attempts: 2 },
    });
    expect(audit.countByKind()).toEqual({ UnverifiedClaim: 2, ExtractionFailed: 1 });
  });
});

describe('record writer', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'claimtrace-out-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one JSON value per line', () => {
    expect(toJsonl([{ a: 1 }, 'x'])).toBe('{"a":1}\n"x"\n');
    expect(toJsonl([])).toBe('');
  });

  it('writes every run output and reads claims back', async () => {
    const result = await runCorpus(CORPUS, {
      ...loadBundledCatalogs(),
      embedder: new HashingEmbeddingProvider(),
    }, OPTIONS);

    const written = writeRunOutputs(dir, result);

    expect(written.map((f) => path.basename(f)).sort()).toEqual(Object.values(OUTPUT_FILES).sort());
    const stored = readClaimRecords(path.join(dir, OUTPUT_FILES.claims));
    expect(stored.map((c) => c.id)).toEqual(result.claims.map((c) => c.id));
    expect(stored[0]).toMatchObject({ documentId: 'ohio-2023', status: 'VERIFIED', quote: ED_SENTENCE });

    const coverage = readFileSync(path.join(dir, OUTPUT_FILES.coverage), 'utf-8').split('\n');
    const firstCoverage: unknown = JSON.parse(coverage[0] ?? '');
    expect(firstCoverage).toMatchObject({ documentId: 'ohio-2023', discarded: [{ start: 59, end: 60, reason: 'whitespace' }] });

    const summary: unknown = JSON.parse(readFileSync(path.join(dir, OUTPUT_FILES.summary), 'utf-8'));
    expect(summary).toMatchObject({ tool: { name: 'claimtrace' }, claims: 2 });
  });

  it('names the line of an invalid claim record', () => {
    const file = path.join(dir, 'claims.jsonl');
    writeFileSync(file, '\n{"id": "clm_1"}\n');

    expect(() => readClaimRecords(file)).toThrow(ProcessingError);
    expect(() => readClaimRecords(file)).toThrow(new RegExp(`^${file}:2: invalid claim record`));
  });

  it('reports a missing claims file', () => {
    expect(() => readClaimRecords(path.join(dir, 'none.jsonl'))).toThrow(/^Failed to read /);
  });
});

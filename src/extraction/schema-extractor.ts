import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  ExtractionOrigin,
  MAX_QUOTE_LENGTH,
  type Chunk,
  type ClaimCandidate,
  type ClaimType,
  type SourceDocument,
} from '../claims/types';
import { findDomain, isClinicalArea, themeBelongsTo, type Probe, type Taxonomy } from '../claims/catalog';
import {
  CLAIM_ENVELOPE_SCHEMA,
  CLAIM_ITEM_SCHEMA,
  CLAIM_RESPONSE_SCHEMA,
  CLAIM_RESPONSE_SCHEMA_NAME,
  type ClaimItem,
} from '../schemas/claim-schemas';
import type { LLMProvider, StructuredSchema } from '../providers/llm-provider';
import type { ProbeUsage, TokenUsage } from '../types/token-usage';
import type { VectorIndex } from '../retrieval/vector-index';
import type { RetrievalHit } from '../retrieval/types';
import type { WorkerPool } from '../pipeline/worker-pool';
import type { CacheStore } from '../cache/cache-store';
import { TemplateRenderer } from '../prompts/template-renderer';
import { CLAIM_PROMPT_TEMPLATE } from '../config/constants';
import { createCacheKeyString, stableId } from '../cache/content-hasher';
import { ExtractionFailed, SchemaViolation, type PipelineIssue } from '../errors/pipeline-errors';
import { ValidationError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';

const CLAIM_TYPE_LABELS: Record<ClaimType, string> = {
  HIST: 'historical outcome',
  PROJ: 'projected target or commitment',
  COMP: 'comparison to a benchmark',
  METH: 'methodology or evaluation design',
};

const USER_MESSAGE = 'Extract the claims supported by the chunks above. Answer in the required JSON format.';

export interface SchemaExtractorDeps {
  provider: LLMProvider;
  index: VectorIndex;
  pool: WorkerPool;
  taxonomy: Taxonomy;
  renderer?: TemplateRenderer;
  cache?: CacheStore;
}

export interface SchemaExtractorOptions {
  /** Chunks retrieved per probe. */
  k: number;
  templateName?: string;
}

export interface ProbeOutcome {
  probeId: string;
  candidates: ClaimCandidate[];
  issues: PipelineIssue[];
  usage?: TokenUsage;
  cached: boolean;
}

export interface SchemaExtractionResult {
  candidates: ClaimCandidate[];
  issues: PipelineIssue[];
  usage: TokenUsage;
  /** Usage of each probe that reached the provider, in probe order. */
  byProbe: ProbeUsage[];
  requests: number;
  cacheHits: number;
}

function buildStructuredSchema(): StructuredSchema {
  const json = zodToJsonSchema(CLAIM_RESPONSE_SCHEMA, { $refStrategy: 'none' });
  const schema = Object.fromEntries(Object.entries(json).filter(([key]) => key !== '$schema'));
  return { name: CLAIM_RESPONSE_SCHEMA_NAME, schema };
}

/**
 * Retrieval-augmented extraction: for each probe the top-K chunks of a
 * document are sent to the model with a JSON schema, and every returned item
 * is validated strictly. Invalid items are rejected, never repaired.
 */
export class SchemaExtractor {
  private readonly renderer: TemplateRenderer;
  private readonly templateName: string;
  private readonly structuredSchema = buildStructuredSchema();

  constructor(
    private readonly deps: SchemaExtractorDeps,
    private readonly options: SchemaExtractorOptions
  ) {
    this.renderer = deps.renderer ?? new TemplateRenderer();
    this.templateName = options.templateName ?? CLAIM_PROMPT_TEMPLATE;
  }

  async extract(document: SourceDocument, probes: readonly Probe[]): Promise<SchemaExtractionResult> {
    const outcomes = await Promise.all(probes.map((probe) => this.runProbe(document, probe)));

    const result: SchemaExtractionResult = {
      candidates: [],
      issues: [],
      usage: { inputTokens: 0, outputTokens: 0 },
      byProbe: [],
      requests: 0,
      cacheHits: 0,
    };
    for (const outcome of outcomes) {
      result.candidates.push(...outcome.candidates);
      result.issues.push(...outcome.issues);
      if (outcome.cached) result.cacheHits++;
      if (outcome.usage) {
        result.requests++;
        result.usage.inputTokens += outcome.usage.inputTokens;
        result.usage.outputTokens += outcome.usage.outputTokens;
        result.byProbe.push({ probeId: outcome.probeId, usage: outcome.usage });
      }
    }
    return result;
  }

  async runProbe(document: SourceDocument, probe: Probe): Promise<ProbeOutcome> {
    const scope = { documentId: document.id, probeId: probe.id };
    const outcome: ProbeOutcome = { probeId: probe.id, candidates: [], issues: [], cached: false };

    let hits: RetrievalHit[];
    try {
      hits = await this.deps.index.retrieve(probe.query, this.options.k, { documentId: document.id });
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Retrieval for ${probe.id}`);
      outcome.issues.push(new ExtractionFailed(scope, `retrieval failed: ${err.message}`));
      return outcome;
    }
    if (hits.length === 0) return outcome;
    const context = hits.map((hit) => hit.chunk);

    const prompt = this.renderPrompt(document, probe, context);
    const key = createCacheKeyString({
      providerId: this.deps.provider.id,
      schemaName: this.structuredSchema.name,
      prompt,
      content: USER_MESSAGE,
    });

    let raw: unknown;
    const cached = this.deps.cache?.get(key);
    if (cached) {
      raw = cached.data;
      outcome.cached = true;
    } else {
      try {
        const response = await this.deps.pool.run(
          (signal) => this.deps.provider.runPromptStructured(USER_MESSAGE, prompt, this.structuredSchema, { signal }),
          `${document.id}/${probe.id}`
        );
        raw = response.data;
        outcome.usage = response.usage;
      } catch (e: unknown) {
        // The provider answered, but not with parseable JSON
        if (e instanceof ValidationError) {
          outcome.issues.push(
            new SchemaViolation(scope, 'unparseable-response', { provider: this.deps.provider.id, message: e.message })
          );
          return outcome;
        }
        const err = handleUnknownError(e, `Probe ${probe.id}`);
        outcome.issues.push(new ExtractionFailed(scope, err.message, { provider: this.deps.provider.id }));
        return outcome;
      }
    }

    const envelope = CLAIM_ENVELOPE_SCHEMA.safeParse(raw);
    if (!envelope.success) {
      outcome.issues.push(
        new SchemaViolation(scope, 'malformed-response', { issues: envelope.error.issues.map((i) => i.message) })
      );
      return outcome;
    }
    if (envelope.data.status === 'no_claim_found' && envelope.data.claims.length > 0) {
      outcome.issues.push(
        new SchemaViolation(scope, 'status-mismatch', { claims: envelope.data.claims.length })
      );
      return outcome;
    }

    if (!outcome.cached && this.deps.cache) {
      this.deps.cache.set(key, { data: raw, usage: outcome.usage, timestamp: Date.now() });
    }

    const retrieved = new Set(context.map((chunk) => chunk.id));
    envelope.data.claims.forEach((item, index) => {
      const parsed = CLAIM_ITEM_SCHEMA.safeParse(item);
      if (!parsed.success) {
        outcome.issues.push(
          new SchemaViolation(scope, 'invalid-item', {
            index,
            issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
          })
        );
        return;
      }

      const violation = this.checkItem(parsed.data, probe, retrieved);
      if (violation) {
        outcome.issues.push(
          new SchemaViolation({ ...scope, chunkId: parsed.data.chunk_id }, violation, { index, item: parsed.data })
        );
        return;
      }

      outcome.candidates.push(this.toCandidate(document, probe, parsed.data, index, context));
    });

    debug(`${document.id}/${probe.id}: ${outcome.candidates.length} candidate(s)${outcome.cached ? ' (cached)' : ''}`);
    return outcome;
  }

  private renderPrompt(document: SourceDocument, probe: Probe, context: readonly Chunk[]): string {
    return this.renderer.render(this.templateName, {
      document: {
        state: document.state,
        organization: document.organization,
        year: document.year,
        documentType: document.documentType,
      },
      probe,
      claimTypeLabel: CLAIM_TYPE_LABELS[probe.claimType],
      maxQuoteLength: MAX_QUOTE_LENGTH,
      domains: this.deps.taxonomy.domains,
      clinicalAreas: this.deps.taxonomy.clinicalAreas,
      chunks: context.map((chunk) => ({ id: chunk.id, text: chunk.text })),
    });
  }

  // Codes must exist in the taxonomy and match what the probe asked for
  private checkItem(item: ClaimItem, probe: Probe, retrieved: ReadonlySet<string>): string | null {
    const { taxonomy } = this.deps;
    if (!retrieved.has(item.chunk_id)) return 'chunk-not-retrieved';
    if (item.quote.length > MAX_QUOTE_LENGTH) return 'quote-too-long';
    if (!findDomain(taxonomy, item.domain)) return 'unknown-domain';
    if (item.theme !== null && !themeBelongsTo(taxonomy, item.domain, item.theme)) return 'theme-not-in-domain';
    if (item.clinical_area !== null && !isClinicalArea(taxonomy, item.clinical_area)) return 'unknown-clinical-area';
    if (item.claim_type !== probe.claimType) return 'claim-type-mismatch';
    if (probe.domain !== undefined && item.domain !== probe.domain) return 'domain-mismatch';
    if (probe.theme !== undefined && item.theme !== probe.theme) return 'theme-mismatch';
    return null;
  }

  private toCandidate(
    document: SourceDocument,
    probe: Probe,
    item: ClaimItem,
    index: number,
    context: readonly Chunk[]
  ): ClaimCandidate {
    return {
      id: stableId('llm', document.id, probe.id, index, item.quote),
      documentId: document.id,
      chunkId: item.chunk_id,
      origin: ExtractionOrigin.LLM,
      quote: item.quote,
      value: item.value,
      confidence: item.confidence,
      domain: item.domain,
      claimType: item.claim_type,
      evidence: item.evidence,
      quantification: item.quantification,
      clinicalArea: item.clinical_area,
      theme: item.theme,
      partners: item.partners.map((p) => ({ name: p.name, partnerType: p.partner_type })),
      provenance: {
        source: probe.id,
        query: probe.query,
        contextChunkIds: context.map((chunk) => chunk.id),
      },
    };
  }
}

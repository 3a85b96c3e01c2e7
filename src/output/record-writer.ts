import { createRequire } from 'node:module';
import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { Claim } from '../claims/types';
import type { CorpusRunResult } from '../pipeline/corpus-runner';
import { ProcessingError, handleUnknownError } from '../errors/index';

const REQUIRE = createRequire(import.meta.url);

const PACKAGE_JSON_SCHEMA = z.object({
  name: z.string(),
  version: z.string(),
});

// Using require to load JSON in ESM
const PKG = PACKAGE_JSON_SCHEMA.parse(REQUIRE('../../package.json'));

export const OUTPUT_FILES = {
  claims: 'claims_extracted.jsonl',
  partnerships: 'partnerships.jsonl',
  commitments: 'commitments.jsonl',
  records: 'extraction_records.jsonl',
  audit: 'audit_log.jsonl',
  review: 'review_queue.jsonl',
  coverage: 'coverage.jsonl',
  analyses: 'document_analyses.jsonl',
  exhibits: 'exhibits.json',
  summary: 'run_summary.json',
} as const;

export interface ClaimRecord {
  id: string;
  documentId: string;
  domain: string;
  claimType: string;
  evidence: string;
  quantification: string;
  clinicalArea: string | null;
  value: number | null;
  quote: string;
  start: number;
  end: number;
  chunkId: string;
  confidence: string;
  status: string;
  theme: string | null;
  origin: string;
  corroboratedBy: string[];
}

export function toClaimRecord(claim: Claim): ClaimRecord {
  return {
    id: claim.id,
    documentId: claim.documentId,
    domain: claim.domain,
    claimType: claim.claimType,
    evidence: claim.evidence,
    quantification: claim.quantification,
    clinicalArea: claim.clinicalArea,
    value: claim.value,
    quote: claim.quote,
    start: claim.start,
    end: claim.end,
    chunkId: claim.chunkId,
    confidence: claim.confidence,
    status: claim.status,
    theme: claim.theme,
    origin: claim.origin,
    corroboratedBy: claim.corroboratedBy,
  };
}

export function toJsonl(items: readonly unknown[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}

function write(filePath: string, content: string): void {
  try {
    writeFileSync(filePath, content, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Writing ${filePath}`);
    throw new ProcessingError(`Failed to write ${filePath}: ${err.message}`);
  }
}

/**
 * Writes every output of a run into `outputDir`, replacing earlier files.
 * Returns the paths written.
 */
export function writeRunOutputs(outputDir: string, result: CorpusRunResult): string[] {
  mkdirSync(outputDir, { recursive: true });
  const target = (name: string) => path.join(outputDir, name);

  const files: Array<[string, string]> = [
    [OUTPUT_FILES.claims, toJsonl(result.claims.map(toClaimRecord))],
    [OUTPUT_FILES.partnerships, toJsonl(result.claimSet.partnerships())],
    [OUTPUT_FILES.commitments, toJsonl(result.commitments)],
    [OUTPUT_FILES.records, toJsonl(result.claimSet.records())],
    [OUTPUT_FILES.audit, toJsonl(result.audit.entries())],
    [OUTPUT_FILES.review, toJsonl(result.reviewQueue.map(toClaimRecord))],
    [OUTPUT_FILES.coverage, toJsonl(result.coverage)],
    [OUTPUT_FILES.analyses, toJsonl(result.analyses)],
    [OUTPUT_FILES.exhibits, JSON.stringify(result.exhibits, null, 2) + '\n'],
    [
      OUTPUT_FILES.summary,
      JSON.stringify({ tool: { name: PKG.name, version: PKG.version }, ...result.summary }, null, 2) + '\n',
    ],
  ];

  for (const [name, content] of files) write(target(name), content);
  return files.map(([name]) => target(name));
}

const CLAIM_RECORD_SCHEMA = z.object({
  id: z.string(),
  documentId: z.string(),
  domain: z.string(),
  claimType: z.enum(['HIST', 'PROJ', 'COMP', 'METH']),
  evidence: z.string(),
  quantification: z.string(),
  clinicalArea: z.string().nullable(),
  value: z.number().nullable(),
  quote: z.string(),
  start: z.number().int(),
  end: z.number().int(),
  chunkId: z.string(),
  confidence: z.string(),
  status: z.literal('VERIFIED'),
  theme: z.string().nullable(),
  origin: z.string(),
  corroboratedBy: z.array(z.string()),
});

export type StoredClaim = z.infer<typeof CLAIM_RECORD_SCHEMA>;

/**
 * Reads claims back from `claims_extracted.jsonl`, for recomputing exhibits
 * without re-running extraction.
 */
export function readClaimRecords(filePath: string): StoredClaim[] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${filePath}`);
    throw new ProcessingError(`Failed to read ${filePath}: ${err.message}`);
  }

  return text
    .split('\n')
    .map((line, index) => ({ line: line.trim(), index }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, index }) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing claim record');
        throw new ProcessingError(`${filePath}:${index + 1}: ${err.message}`);
      }
      const parsed = CLAIM_RECORD_SCHEMA.safeParse(raw);
      if (!parsed.success) {
        throw new ProcessingError(`${filePath}:${index + 1}: invalid claim record: ${parsed.error.message}`);
      }
      return parsed.data;
    });
}

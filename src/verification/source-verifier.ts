import { createHash } from 'crypto';
import {
  MAX_QUOTE_LENGTH,
  VerificationStatus,
  type CheckedCandidate,
  type Chunk,
  type ClaimCandidate,
  type LocatedPartner,
  type UnverifiedCandidate,
  type UnverifiedReason,
} from '../claims/types';
import { UnverifiedClaim, type PipelineIssue } from '../errors/pipeline-errors';
import { locateNormalized } from './normalize';
import { findNearMiss } from './near-miss';

export interface VerificationOutcome {
  candidate: CheckedCandidate;
  issues: PipelineIssue[];
}

function unverified(
  candidate: ClaimCandidate,
  reason: UnverifiedReason,
  chunk: Chunk | undefined
): VerificationOutcome {
  const nearMiss = reason === 'quote-not-found' && chunk ? findNearMiss(candidate.quote, chunk.text) : null;
  const result: UnverifiedCandidate = {
    ...candidate,
    status: VerificationStatus.Unverified,
    reason,
    nearMiss,
  };
  const issue = new UnverifiedClaim(
    { documentId: candidate.documentId, chunkId: candidate.chunkId, candidateId: candidate.id },
    reason,
    {
      origin: candidate.origin,
      source: candidate.provenance.source,
      quote: candidate.quote,
      nearMiss,
    }
  );
  return { candidate: result, issues: [issue] };
}

/**
 * Confirms that a candidate's quote occurs in its cited chunk. On success the
 * quote is replaced by the exact chunk span and document offsets are set;
 * partner names are located inside that span and dropped when absent.
 */
export function verifyCandidate(candidate: ClaimCandidate, chunk: Chunk | undefined): VerificationOutcome {
  if (!candidate.quote.trim()) return unverified(candidate, 'empty-quote', chunk);
  if (candidate.quote.length > MAX_QUOTE_LENGTH) return unverified(candidate, 'quote-too-long', chunk);
  if (!chunk || chunk.id !== candidate.chunkId || chunk.documentId !== candidate.documentId) {
    return unverified(candidate, 'unknown-chunk', chunk);
  }

  const span = locateNormalized(chunk.text, candidate.quote);
  if (!span) return unverified(candidate, 'quote-not-found', chunk);
  // Whitespace runs and joined hyphen breaks make the source span longer than the quote
  if (span.end - span.start > MAX_QUOTE_LENGTH) return unverified(candidate, 'quote-too-long', chunk);

  const issues: PipelineIssue[] = [];
  const partners: LocatedPartner[] = [];
  for (const partner of candidate.partners) {
    // The partner has to be named inside the quoted statement
    const located = locateNormalized(chunk.text.slice(0, span.end), partner.name, span.start);
    if (!located) {
      issues.push(
        new UnverifiedClaim(
          { documentId: candidate.documentId, chunkId: chunk.id, candidateId: candidate.id },
          'partner-not-found',
          { partnerName: partner.name, partnerType: partner.partnerType }
        )
      );
      continue;
    }
    partners.push({
      name: chunk.text.slice(located.start, located.end),
      partnerType: partner.partnerType,
      start: chunk.start + located.start,
      end: chunk.start + located.end,
    });
  }

  return {
    candidate: {
      ...candidate,
      status: VerificationStatus.Verified,
      quote: chunk.text.slice(span.start, span.end),
      start: chunk.start + span.start,
      end: chunk.start + span.end,
      partners,
    },
    issues,
  };
}

/**
 * Verifies candidates against the chunks of their document.
 */
export class SourceVerifier {
  private readonly chunks: ReadonlyMap<string, Chunk>;

  constructor(chunks: readonly Chunk[]) {
    this.chunks = new Map(chunks.map((chunk) => [chunk.id, chunk]));
  }

  verify(candidate: ClaimCandidate): VerificationOutcome {
    return verifyCandidate(candidate, this.chunks.get(candidate.chunkId));
  }

  verifyAll(candidates: readonly ClaimCandidate[]): { checked: CheckedCandidate[]; issues: PipelineIssue[] } {
    const checked: CheckedCandidate[] = [];
    const issues: PipelineIssue[] = [];
    for (const candidate of candidates) {
      const outcome = this.verify(candidate);
      checked.push(outcome.candidate);
      issues.push(...outcome.issues);
    }
    return { checked, issues };
  }
}

function sampleKey(seed: string, id: string): string {
  return createHash('sha256').update(`${seed}\u0000${id}`, 'utf8').digest('hex');
}

/**
 * Deterministic review sample: ranks claims by a seeded hash of their id and
 * takes round(fraction * n) of them (at least one when fraction > 0).
 * The same claims, fraction and seed always select the same claims.
 */
export function selectForReview<T extends { id: string }>(claims: readonly T[], fraction: number, seed: string): T[] {
  if (claims.length === 0 || fraction <= 0) return [];
  const count = Math.min(claims.length, Math.max(1, Math.round(fraction * claims.length)));

  return claims
    .map((claim) => ({ claim, key: sampleKey(seed, claim.id) }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .slice(0, count)
    .map(({ claim }) => claim)
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

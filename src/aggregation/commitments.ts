import type { Claim } from '../claims/types';
import type { Span } from '../chunking/types';
import { stableId } from '../cache/content-hasher';

export interface QuotedSpan extends Span {
  text: string;
}

/**
 * A forward-looking target read off a verified PROJ claim. Every textual
 * field is a verbatim span of the claim's quote, in document offsets.
 */
export interface Commitment {
  id: string;
  claimId: string;
  documentId: string;
  targetValue: number | null;
  targetType: string;
  deadline: QuotedSpan | null;
  contractYear: number | null;
  consequence: QuotedSpan | null;
}

export type CommitmentClaim = Pick<
  Claim,
  'id' | 'documentId' | 'claimType' | 'quote' | 'start' | 'value' | 'quantification'
>;

const DEADLINE =
  /\b(?:by|before|no\s+later\s+than|within|through)\s+(?:the\s+end\s+of\s+)?(?:(?:contract\s+)?year\s+\d{1,2}|(?:19|20)\d{2}|(?:the\s+first\s+)?\d+\s+(?:months?|years?))\b/i;
const CONTRACT_YEAR = /\b(?:contract\s+)?year\s+(\d{1,2})\b/i;
const CONSEQUENCE =
  /\b(?:penalt(?:y|ies)|liquidated\s+damages|withholds?|sanctions?|incentive\s+payments?|performance\s+bonus(?:es)?|at\s+risk)\b/i;

function quoted(claim: CommitmentClaim, pattern: RegExp): QuotedSpan | null {
  const match = pattern.exec(claim.quote);
  if (!match) return null;
  const start = claim.start + match.index;
  return { text: match[0], start, end: start + match[0].length };
}

/**
 * Commitments for the PROJ claims among `claims`, in claim order. Pure: the
 * same claims always give the same commitments and ids.
 */
export function deriveCommitments(claims: readonly CommitmentClaim[]): Commitment[] {
  return claims
    .filter((claim) => claim.claimType === 'PROJ')
    .map((claim) => {
      const year = CONTRACT_YEAR.exec(claim.quote)?.[1];
      return {
        id: stableId('cmt', claim.id),
        claimId: claim.id,
        documentId: claim.documentId,
        targetValue: claim.value,
        targetType: claim.quantification,
        deadline: quoted(claim, DEADLINE),
        contractYear: year !== undefined ? Number.parseInt(year, 10) : null,
        consequence: quoted(claim, CONSEQUENCE),
      };
    });
}

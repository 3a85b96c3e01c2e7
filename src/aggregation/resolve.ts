import {
  CONFIDENCE_LEVELS,
  ExtractionOrigin,
  isVerified,
  type CheckedCandidate,
  type ClaimCoding,
} from '../claims/types';
import { DuplicateConflict } from '../errors/pipeline-errors';

const CODING_FIELDS = ['domain', 'claimType', 'evidence', 'quantification', 'clinicalArea', 'theme'] as const;

export type CodingField = typeof CODING_FIELDS[number];

export interface Resolution {
  winner: CheckedCandidate | undefined;
  superseded: CheckedCandidate | undefined;
  conflict: DuplicateConflict | null;
}

export function codingDifferences(a: ClaimCoding, b: ClaimCoding): CodingField[] {
  return CODING_FIELDS.filter((field) => a[field] !== b[field]);
}

/**
 * Merge rule for a pattern and a model candidate describing the same
 * statement: the model candidate wins only when it verified; otherwise the
 * pattern candidate stands. Disagreeing codings are reported, not reconciled.
 */
export function resolveCandidates(pattern?: CheckedCandidate, llm?: CheckedCandidate): Resolution {
  const llmWins = llm !== undefined && isVerified(llm);
  const winner = llmWins ? llm : pattern;
  const superseded = llmWins ? pattern : llm;

  let conflict: DuplicateConflict | null = null;
  if (winner && superseded) {
    const fields = codingDifferences(winner, superseded);
    if (fields.length > 0) {
      conflict = new DuplicateConflict(
        { documentId: winner.documentId, chunkId: winner.chunkId, candidateId: superseded.id },
        'coding-disagreement',
        {
          winnerId: winner.id,
          winnerOrigin: winner.origin,
          fields,
          winner: Object.fromEntries(fields.map((f) => [f, winner[f]])),
          superseded: Object.fromEntries(fields.map((f) => [f, superseded[f]])),
        }
      );
    }
  }

  return { winner, superseded, conflict };
}

/** Best candidate of one origin: highest confidence, then earliest span, then id. */
export function pickRepresentative(
  candidates: readonly CheckedCandidate[],
  origin: ExtractionOrigin
): CheckedCandidate | undefined {
  return candidates
    .filter((c) => c.origin === origin)
    .sort(
      (a, b) =>
        CONFIDENCE_LEVELS.indexOf(a.confidence) - CONFIDENCE_LEVELS.indexOf(b.confidence) ||
        startOf(a) - startOf(b) ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
    )[0];
}

function startOf(candidate: CheckedCandidate): number {
  return isVerified(candidate) ? candidate.start : Number.MAX_SAFE_INTEGER;
}

import {
  ExtractionOrigin,
  RecordStatus,
  isVerified,
  type CheckedCandidate,
  type Claim,
  type ExtractionRecord,
  type Partnership,
  type UnverifiedCandidate,
  type VerifiedCandidate,
} from '../claims/types';
import { stableId } from '../cache/content-hasher';
import { DuplicateConflict, type PipelineIssue } from '../errors/pipeline-errors';
import { quoteSimilarity } from '../verification/near-miss';
import { codingDifferences, pickRepresentative, resolveCandidates } from './resolve';

export const DEFAULT_OVERLAP_THRESHOLD = 0.5;
/** fuzzball partial_ratio at or above which an unverified model quote is taken to restate a pattern quote. */
export const CONFLICT_SIMILARITY = 90;

export interface DeduplicateOptions {
  overlapThreshold?: number;
}

export interface DeduplicationResult {
  claims: Claim[];
  partnerships: Partnership[];
  records: ExtractionRecord[];
  issues: PipelineIssue[];
}

type Member = VerifiedCandidate | Claim;

/** Intersection over the shorter span; 0 for disjoint spans. */
export function spanOverlap(a: { start: number; end: number }, b: { start: number; end: number }): number {
  const intersection = Math.min(a.end, b.end) - Math.max(a.start, b.start);
  if (intersection <= 0) return 0;
  const shorter = Math.min(a.end - a.start, b.end - b.start);
  return shorter > 0 ? intersection / shorter : 0;
}

export function claimId(candidate: VerifiedCandidate): string {
  return stableId('clm', candidate.documentId, candidate.start, candidate.end, candidate.origin, candidate.claimType);
}

function compareMembers(a: Member, b: Member): number {
  return (
    a.documentId.localeCompare(b.documentId) ||
    a.start - b.start ||
    a.end - b.end ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

function mergedIds(member: Member): readonly string[] {
  return 'corroboratedBy' in member ? member.corroboratedBy : [member.id];
}

class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root] ?? root;
    // Path compression
    let node = i;
    while (this.parent[node] !== root) {
      const next = this.parent[node] ?? root;
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra !== rb) this.parent[Math.max(ra, rb)] = Math.min(ra, rb);
  }
}

/**
 * Collapses verified candidates that describe the same statement into
 * canonical claims. Candidates of one document whose spans overlap by at
 * least the threshold fall in one group (single linkage). Running it again
 * on its own output returns the same claims.
 */
export function deduplicate(
  candidates: readonly (CheckedCandidate | Claim)[],
  options: DeduplicateOptions = {}
): DeduplicationResult {
  const threshold = options.overlapThreshold ?? DEFAULT_OVERLAP_THRESHOLD;
  if (!(threshold > 0 && threshold <= 1)) {
    throw new RangeError(`overlapThreshold must be in (0, 1], got ${threshold}`);
  }

  const verified: Member[] = [];
  const unverified: UnverifiedCandidate[] = [];
  for (const candidate of candidates) {
    if (isVerified(candidate)) verified.push(candidate);
    else unverified.push(candidate);
  }
  verified.sort(compareMembers);

  const sets = new DisjointSet(verified.length);
  for (let i = 0; i < verified.length; i++) {
    const a = verified[i];
    if (!a) continue;
    // Sorted by start: once a later span starts past a's end, no further overlap
    for (let j = i + 1; j < verified.length; j++) {
      const b = verified[j];
      if (!b || b.documentId !== a.documentId || b.start >= a.end) break;
      if (spanOverlap(a, b) >= threshold) sets.union(i, j);
    }
  }

  const groups = new Map<number, Member[]>();
  verified.forEach((member, i) => {
    const root = sets.find(i);
    const group = groups.get(root) ?? [];
    group.push(member);
    groups.set(root, group);
  });

  const result: DeduplicationResult = { claims: [], partnerships: [], records: [], issues: [] };
  for (const members of groups.values()) {
    collapseGroup(members, result);
  }

  for (const candidate of unverified) {
    result.issues.push(...unverifiedConflicts(candidate, candidates));
    result.records.push(recordOf(candidate, null, null, RecordStatus.Rejected));
  }

  result.claims.sort(compareMembers);
  return result;
}

function collapseGroup(members: Member[], result: DeduplicationResult): void {
  const resolution = resolveCandidates(
    pickRepresentative(members, ExtractionOrigin.Pattern),
    pickRepresentative(members, ExtractionOrigin.LLM)
  );
  const winner = members.find((m) => m.id === resolution.winner?.id);
  if (!winner) return;
  if (resolution.conflict) result.issues.push(resolution.conflict);

  const id = claimId(winner);
  const corroboratedBy = [...new Set(members.flatMap(mergedIds))].sort();
  const groupId = stableId('grp', winner.documentId, ...corroboratedBy);

  const claim: Claim = { ...winner, id, corroboratedBy };
  result.claims.push(claim);

  for (const partner of claim.partners) {
    result.partnerships.push({
      id: stableId('prt', id, partner.start, partner.end, partner.partnerType),
      claimId: id,
      documentId: claim.documentId,
      partnerType: partner.partnerType,
      partnerName: partner.name,
      start: partner.start,
      end: partner.end,
    });
  }

  for (const member of members) {
    // Canonical claims fed back in have no candidate record of their own
    if ('corroboratedBy' in member) continue;
    const status =
      member === winner || codingDifferences(winner, member).length === 0
        ? RecordStatus.Merged
        : RecordStatus.Superseded;
    result.records.push(recordOf(member, groupId, id, status));
  }
}

function unverifiedConflicts(
  candidate: UnverifiedCandidate,
  all: readonly (CheckedCandidate | Claim)[]
): DuplicateConflict[] {
  if (candidate.origin !== ExtractionOrigin.LLM) return [];
  return all
    .filter((other) => other.origin === ExtractionOrigin.Pattern && other.chunkId === candidate.chunkId)
    .map((pattern) => ({ pattern, score: quoteSimilarity(candidate.quote, pattern.quote) }))
    .filter(({ score }) => score >= CONFLICT_SIMILARITY)
    .map(
      ({ pattern, score }) =>
        new DuplicateConflict(
          { documentId: candidate.documentId, chunkId: candidate.chunkId, candidateId: candidate.id },
          'unverified-duplicate',
          { patternCandidateId: pattern.id, similarity: score, reason: candidate.reason }
        )
    );
}

function recordOf(
  candidate: CheckedCandidate,
  groupId: string | null,
  claim: string | null,
  status: RecordStatus
): ExtractionRecord {
  return {
    candidateId: candidate.id,
    documentId: candidate.documentId,
    origin: candidate.origin,
    source: candidate.provenance.source,
    query: candidate.provenance.query,
    contextChunkIds: candidate.provenance.contextChunkIds,
    groupId,
    claimId: claim,
    status,
  };
}

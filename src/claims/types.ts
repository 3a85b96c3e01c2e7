/**
 * Code lists of the claim coding scheme.
 * Domain, theme and clinical-area codes are validated against the loaded
 * taxonomy; the lists below are fixed by the record schema.
 */
export const CLAIM_TYPES = ['HIST', 'PROJ', 'COMP', 'METH'] as const;
export const EVIDENCE_CODES = ['PR', 'CG', 'PP', 'INT', 'EXT', 'NONE'] as const;
export const QUANTIFICATION_CODES = ['Q-ABS', 'Q-PCT', 'Q-PPT', 'Q-TGT', 'Q-NONE'] as const;
export const CONFIDENCE_LEVELS = ['HIGH', 'MEDIUM', 'LOW'] as const;
export const PARTNER_TYPES = ['P-CBO', 'P-GOV', 'P-ACAD', 'P-TECH', 'P-PROV'] as const;
export const DOCUMENT_TYPES = ['rfp', 'proposal', 'contract', 'scoring', 'other'] as const;

export type ClaimType = typeof CLAIM_TYPES[number];
export type EvidenceCode = typeof EVIDENCE_CODES[number];
export type QuantificationCode = typeof QUANTIFICATION_CODES[number];
export type Confidence = typeof CONFIDENCE_LEVELS[number];
export type PartnerType = typeof PARTNER_TYPES[number];
export type DocumentType = typeof DOCUMENT_TYPES[number];

/** Maximum length of a verbatim quote, in characters. */
export const MAX_QUOTE_LENGTH = 300;

export enum ExtractionOrigin {
  Pattern = 'pattern',
  LLM = 'llm',
}

export enum VerificationStatus {
  Verified = 'VERIFIED',
  Unverified = 'UNVERIFIED',
}

export interface DocumentMeta {
  state: string;
  organization: string | null; // MCO name; null for solicitations
  year: number | null;
  documentType: DocumentType;
}

export interface SourceDocument extends DocumentMeta {
  readonly id: string;
  readonly text: string;
  readonly sourcePath: string;
}

export interface Chunk {
  readonly id: string; // `${documentId}#${sequence}`
  readonly documentId: string;
  readonly sequence: number;
  readonly start: number; // inclusive document offset
  readonly end: number; // exclusive document offset
  readonly text: string;
}

export interface ClaimCoding {
  domain: string;
  claimType: ClaimType;
  evidence: EvidenceCode;
  quantification: QuantificationCode;
  clinicalArea: string | null;
  theme: string | null;
}

export interface PartnerMention {
  name: string;
  partnerType: PartnerType;
}

export interface LocatedPartner extends PartnerMention {
  start: number; // document offsets of the name span
  end: number;
}

export interface CandidateProvenance {
  source: string; // pattern rule id or probe id
  query: string | null; // retrieval query for the LLM path
  contextChunkIds: string[];
}

export interface ClaimCandidate extends ClaimCoding {
  id: string;
  documentId: string;
  chunkId: string;
  origin: ExtractionOrigin;
  quote: string;
  value: number | null;
  confidence: Confidence;
  partners: PartnerMention[];
  provenance: CandidateProvenance;
}

export interface VerifiedCandidate extends Omit<ClaimCandidate, 'partners'> {
  status: VerificationStatus.Verified;
  start: number;
  end: number;
  partners: LocatedPartner[];
}

export type UnverifiedReason = 'empty-quote' | 'quote-too-long' | 'unknown-chunk' | 'quote-not-found';

export interface NearMiss {
  text: string;
  score: number; // 0-100
}

export interface UnverifiedCandidate extends ClaimCandidate {
  status: VerificationStatus.Unverified;
  reason: UnverifiedReason;
  nearMiss: NearMiss | null;
}

export type CheckedCandidate = VerifiedCandidate | UnverifiedCandidate;

/**
 * Canonical claim. `corroboratedBy` lists every candidate id merged into it;
 * the quote is always the exact source-chunk span at [start, end).
 */
export interface Claim extends VerifiedCandidate {
  corroboratedBy: string[];
}

export interface Partnership {
  id: string;
  claimId: string;
  documentId: string;
  partnerType: PartnerType;
  partnerName: string;
  start: number;
  end: number;
}

export enum RecordStatus {
  Open = 'open',
  Merged = 'merged',
  Superseded = 'superseded',
  Rejected = 'rejected',
}

export interface ExtractionRecord {
  candidateId: string;
  documentId: string;
  origin: ExtractionOrigin;
  source: string;
  query: string | null;
  contextChunkIds: string[];
  groupId: string | null;
  claimId: string | null;
  status: RecordStatus;
}

export function isVerified(candidate: CheckedCandidate): candidate is VerifiedCandidate {
  return candidate.status === VerificationStatus.Verified;
}

import { describe, it, expect } from 'vitest';
import { computeDocumentAnalyses, type AnalysisClaim } from '../src/aggregation/document-analysis';
import { deriveCommitments, type CommitmentClaim } from '../src/aggregation/commitments';

const TAXONOMY = {
  domains: [
    { code: 'AC', label: 'Access', keywords: [], themes: [] },
    { code: 'QM', label: 'Quality', keywords: [], themes: [] },
  ],
  clinicalAreas: [
    { code: 'BH', label: 'Behavioral health', keywords: [] },
    { code: 'HOSP', label: 'Hospital utilization', keywords: [] },
  ],
};

const CLAIMS: AnalysisClaim[] = [
  { documentId: 'oh', domain: 'AC', clinicalArea: 'HOSP', evidence: 'NONE', claimType: 'HIST', quantification: 'Q-PCT' },
  { documentId: 'oh', domain: 'QM', clinicalArea: null, evidence: 'PP', claimType: 'PROJ', quantification: 'Q-TGT' },
  { documentId: 'oh', domain: 'XX', clinicalArea: 'ZZ', evidence: 'NONE', claimType: 'HIST', quantification: 'Q-PCT' },
  { documentId: 'tx', domain: 'QM', clinicalArea: 'BH', evidence: 'CG', claimType: 'COMP', quantification: 'Q-PPT' },
];

describe('computeDocumentAnalyses', () => {
  it('counts each code family per document', () => {
    const [oh] = computeDocumentAnalyses(CLAIMS, [{ id: 'oh' }], TAXONOMY);

    expect(oh).toEqual({
      documentId: 'oh',
      claims: 3,
      domainCounts: { AC: 1, QM: 1 },
      clinicalAreaCounts: { BH: 0, HOSP: 1 },
      evidenceCounts: { PR: 0, CG: 0, PP: 1, INT: 0, EXT: 0, NONE: 2 },
      claimTypeCounts: { HIST: 2, PROJ: 1, COMP: 0, METH: 0 },
      quantificationCounts: { 'Q-ABS': 0, 'Q-PCT': 2, 'Q-PPT': 0, 'Q-TGT': 1, 'Q-NONE': 0 },
    });
  });

  it('keeps document order and documents without claims', () => {
    const analyses = computeDocumentAnalyses(CLAIMS, [{ id: 'tx' }, { id: 'empty' }, { id: 'oh' }], TAXONOMY);

    expect(analyses.map((a) => [a.documentId, a.claims])).toEqual([
      ['tx', 1],
      ['empty', 0],
      ['oh', 3],
    ]);
    expect(analyses[1]?.domainCounts).toEqual({ AC: 0, QM: 0 });
  });
});

describe('deriveCommitments', () => {
  const HEDIS = 'Our plan commits to a 90% HEDIS breast cancer screening target by Year 2.';

  function claim(overrides: Partial<CommitmentClaim>): CommitmentClaim {
    return {
      id: 'clm_target',
      documentId: 'tx',
      claimType: 'PROJ',
      quote: HEDIS,
      start: 100,
      value: 90,
      quantification: 'Q-TGT',
      ...overrides,
    };
  }

  it('reads the target, deadline and contract year from the quote', () => {
    const [commitment] = deriveCommitments([claim({})]);

    expect(commitment).toMatchObject({
      claimId: 'clm_target',
      documentId: 'tx',
      targetValue: 90,
      targetType: 'Q-TGT',
      deadline: { text: 'by Year 2', start: 163, end: 172 },
      contractYear: 2,
      consequence: null,
    });
    expect(commitment?.id).toMatch(/^cmt_[0-9a-f]{16}$/);
  });

  it('finds calendar deadlines and stated consequences', () => {
    const quote = 'We will reduce ED visits by 10% by 2025, with a 2% withhold if missed.';
    const [commitment] = deriveCommitments([claim({ quote, start: 0, value: 10 })]);

    expect(commitment?.deadline).toEqual({ text: 'by 2025', start: 32, end: 39 });
    expect(commitment?.contractYear).toBeNull();
    expect(commitment?.consequence).toEqual({ text: 'withhold', start: 51, end: 59 });
  });

  it('ignores claims that are not projections', () => {
    expect(deriveCommitments([claim({ claimType: 'HIST' }), claim({ id: 'clm_other' })]).map((c) => c.claimId)).toEqual([
      'clm_other',
    ]);
  });

  it('derives the same ids on every call', () => {
    expect(deriveCommitments([claim({})])).toEqual(deriveCommitments([claim({})]));
  });
});

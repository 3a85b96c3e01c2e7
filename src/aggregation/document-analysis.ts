import { CLAIM_TYPES, EVIDENCE_CODES, QUANTIFICATION_CODES } from '../claims/types';
import type { Taxonomy } from '../claims/catalog';

/** The claim fields a document analysis reads; stored claim records qualify too. */
export interface AnalysisClaim {
  documentId: string;
  domain: string;
  clinicalArea: string | null;
  evidence: string;
  claimType: string;
  quantification: string;
}

export interface DocumentAnalysis {
  documentId: string;
  claims: number;
  domainCounts: Record<string, number>;
  clinicalAreaCounts: Record<string, number>;
  evidenceCounts: Record<string, number>;
  claimTypeCounts: Record<string, number>;
  quantificationCounts: Record<string, number>;
}

function zeroed(codes: readonly string[]): Record<string, number> {
  return Object.fromEntries(codes.map((code) => [code, 0]));
}

function bump(counts: Record<string, number>, code: string | null): void {
  if (code === null) return;
  const current = counts[code];
  if (current !== undefined) counts[code] = current + 1;
}

/**
 * Code frequencies per document. Every code of the taxonomy and of the fixed
 * code lists is present, zero when unused; codes outside those lists are not
 * counted. Documents keep the given order, including those without claims.
 */
export function computeDocumentAnalyses(
  claims: readonly AnalysisClaim[],
  documents: ReadonlyArray<{ id: string }>,
  taxonomy: Pick<Taxonomy, 'domains' | 'clinicalAreas'>
): DocumentAnalysis[] {
  const domains = taxonomy.domains.map((d) => d.code);
  const clinicalAreas = taxonomy.clinicalAreas.map((c) => c.code);

  return documents.map(({ id }) => {
    const analysis: DocumentAnalysis = {
      documentId: id,
      claims: 0,
      domainCounts: zeroed(domains),
      clinicalAreaCounts: zeroed(clinicalAreas),
      evidenceCounts: zeroed(EVIDENCE_CODES),
      claimTypeCounts: zeroed(CLAIM_TYPES),
      quantificationCounts: zeroed(QUANTIFICATION_CODES),
    };
    for (const claim of claims) {
      if (claim.documentId !== id) continue;
      analysis.claims++;
      bump(analysis.domainCounts, claim.domain);
      bump(analysis.clinicalAreaCounts, claim.clinicalArea);
      bump(analysis.evidenceCounts, claim.evidence);
      bump(analysis.claimTypeCounts, claim.claimType);
      bump(analysis.quantificationCounts, claim.quantification);
    }
    return analysis;
  });
}

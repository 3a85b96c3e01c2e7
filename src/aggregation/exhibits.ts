import type { Claim, DocumentMeta } from '../claims/types';
import { regionOf, type Taxonomy } from '../claims/catalog';

export interface ExhibitDocument extends DocumentMeta {
  id: string;
}

/** The claim fields exhibits read. */
export type ExhibitClaim = Pick<Claim, 'documentId' | 'domain' | 'theme'>;

export interface DomainThemeCount {
  domain: string;
  theme: string | null;
  count: number;
}

export interface YearDomainCount {
  year: number | null;
  domain: string;
  count: number;
}

export interface RegionDomainCount {
  region: string | null;
  domain: string;
  count: number;
}

export interface StateCount {
  state: string;
  count: number;
}

export interface ConcordanceRow {
  rfpDocumentId: string;
  proposalDocumentId: string;
  organization: string;
  state: string;
  year: number | null;
  rfpThemes: string[];
  matchedThemes: string[];
  /** |rfp themes ∩ proposal themes| / |rfp themes|; null when the RFP has no themed claims. */
  score: number | null;
}

export interface Exhibits {
  totals: { documents: number; claims: number };
  byDomainTheme: DomainThemeCount[];
  byYearDomain: YearDomainCount[];
  byRegionDomain: RegionDomainCount[];
  byState: StateCount[];
  concordance: ConcordanceRow[];
}

function compareKeys(a: ReadonlyArray<string | number | null>, b: ReadonlyArray<string | number | null>): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const x = a[i] ?? null;
    const y = b[i] ?? null;
    if (x === y) continue;
    // Nulls sort last
    if (x === null) return 1;
    if (y === null) return -1;
    if (typeof x === 'number' && typeof y === 'number') return x - y;
    return String(x).localeCompare(String(y));
  }
  return 0;
}

function countBy<K extends ReadonlyArray<string | number | null>>(
  items: readonly ExhibitClaim[],
  keyOf: (claim: ExhibitClaim) => K | null
): Array<{ key: K; count: number }> {
  const counts = new Map<string, { key: K; count: number }>();
  for (const item of items) {
    const key = keyOf(item);
    if (!key) continue;
    const id = JSON.stringify(key);
    const entry = counts.get(id) ?? { key, count: 0 };
    entry.count++;
    counts.set(id, entry);
  }
  return [...counts.values()].sort((a, b) => compareKeys(a.key, b.key));
}

function themesOf(claims: readonly ExhibitClaim[], documentId: string): Set<string> {
  const themes = new Set<string>();
  for (const claim of claims) {
    if (claim.documentId === documentId && claim.theme !== null) themes.add(claim.theme);
  }
  return themes;
}

function concordance(claims: readonly ExhibitClaim[], documents: readonly ExhibitDocument[]): ConcordanceRow[] {
  const rows: ConcordanceRow[] = [];
  const rfps = documents.filter((d) => d.documentType === 'rfp');
  const proposals = documents.filter((d) => d.documentType === 'proposal');

  for (const rfp of rfps) {
    const rfpThemes = [...themesOf(claims, rfp.id)].sort();
    for (const proposal of proposals) {
      if (proposal.organization === null) continue;
      if (proposal.state.toLowerCase() !== rfp.state.toLowerCase() || proposal.year !== rfp.year) continue;
      const proposalThemes = themesOf(claims, proposal.id);
      const matchedThemes = rfpThemes.filter((theme) => proposalThemes.has(theme));
      rows.push({
        rfpDocumentId: rfp.id,
        proposalDocumentId: proposal.id,
        organization: proposal.organization,
        state: rfp.state,
        year: rfp.year,
        rfpThemes,
        matchedThemes,
        score: rfpThemes.length > 0 ? matchedThemes.length / rfpThemes.length : null,
      });
    }
  }

  return rows.sort((a, b) =>
    compareKeys([a.rfpDocumentId, a.organization, a.proposalDocumentId], [b.rfpDocumentId, b.organization, b.proposalDocumentId])
  );
}

/**
 * Aggregate tables over canonical claims. Pure: the same claims and
 * documents always give equal exhibits. Claims of documents missing from
 * `documents` count only toward the domain/theme table and the totals.
 */
export function computeExhibits(
  claims: readonly ExhibitClaim[],
  documents: readonly ExhibitDocument[],
  regions: Taxonomy['regions']
): Exhibits {
  const byId = new Map(documents.map((d) => [d.id, d]));

  return {
    totals: { documents: documents.length, claims: claims.length },
    byDomainTheme: countBy(claims, (c) => [c.domain, c.theme] as const).map(({ key: [domain, theme], count }) => ({
      domain,
      theme,
      count,
    })),
    byYearDomain: countBy(claims, (c) => {
      const doc = byId.get(c.documentId);
      return doc ? ([doc.year, c.domain] as const) : null;
    }).map(({ key: [year, domain], count }) => ({ year, domain, count })),
    byRegionDomain: countBy(claims, (c) => {
      const doc = byId.get(c.documentId);
      return doc ? ([regionOf(regions, doc.state), c.domain] as const) : null;
    }).map(({ key: [region, domain], count }) => ({ region, domain, count })),
    byState: countBy(claims, (c) => {
      const doc = byId.get(c.documentId);
      return doc ? ([doc.state] as const) : null;
    }).map(({ key: [state], count }) => ({ state, count })),
    concordance: concordance(claims, documents),
  };
}

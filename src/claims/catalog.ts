import type {
  ClaimType,
  EvidenceCode,
  PartnerType,
  QuantificationCode,
} from './types';

export interface CodedEntry {
  readonly code: string;
  readonly label: string;
  readonly keywords: readonly string[];
}

export interface DomainEntry extends CodedEntry {
  readonly themes: readonly CodedEntry[];
}

export interface Taxonomy {
  readonly domains: readonly DomainEntry[];
  readonly clinicalAreas: readonly CodedEntry[];
  readonly regions: Readonly<Record<string, readonly string[]>>;
}

export interface PatternRule {
  readonly id: string;
  readonly description?: string;
  readonly regex: RegExp;
  readonly claimType: ClaimType;
  readonly quantification: QuantificationCode | null; // null: derived from the matched unit
  readonly domain: string;
}

export interface PartnershipCues {
  readonly patterns: readonly RegExp[];
  readonly outcomeVerbs: readonly string[];
  readonly types: readonly { readonly code: PartnerType; readonly keywords: readonly string[] }[];
  readonly defaultType: PartnerType;
}

export interface PatternCatalog {
  readonly rules: readonly PatternRule[];
  readonly metricKeywords: readonly string[];
  readonly evidenceCues: readonly { readonly code: EvidenceCode; readonly cues: readonly string[] }[];
  readonly partnerships: PartnershipCues;
}

export interface Probe {
  readonly id: string;
  readonly claimType: ClaimType;
  readonly domain?: string;
  readonly theme?: string;
  readonly query: string;
  readonly guidance: string;
}

export function findDomain(taxonomy: Taxonomy, code: string): DomainEntry | undefined {
  return taxonomy.domains.find((d) => d.code === code);
}

export function themeBelongsTo(taxonomy: Taxonomy, domain: string, theme: string): boolean {
  return findDomain(taxonomy, domain)?.themes.some((t) => t.code === theme) ?? false;
}

export function isClinicalArea(taxonomy: Taxonomy, code: string): boolean {
  return taxonomy.clinicalAreas.some((c) => c.code === code);
}

export function regionOf(regions: Taxonomy['regions'], state: string): string | null {
  const wanted = state.trim().toLowerCase();
  for (const [region, states] of Object.entries(regions)) {
    if (states.some((s) => s.toLowerCase() === wanted)) return region;
  }
  return null;
}

const keywordCache = new Map<string, RegExp>();

const SHORT_KEYWORD_LENGTH = 3;

function keywordRegex(keyword: string): RegExp {
  let regex = keywordCache.get(keyword);
  if (!regex) {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+');
    // Anchored at a word start so stems match their inflections; short
    // abbreviations must also end a word (plural aside)
    const end = keyword.trim().length <= SHORT_KEYWORD_LENGTH ? 's?(?![A-Za-z0-9])' : '';
    regex = new RegExp(`(?<![A-Za-z0-9])${escaped}${end}`, 'i');
    keywordCache.set(keyword, regex);
  }
  return regex;
}

export function containsKeyword(text: string, keyword: string): boolean {
  return keywordRegex(keyword).test(text);
}

export function countKeywordHits(text: string, keywords: readonly string[]): number {
  return keywords.reduce((hits, keyword) => hits + (containsKeyword(text, keyword) ? 1 : 0), 0);
}

/**
 * Entry with the most keyword hits; ties keep catalog order. Null when
 * nothing matches.
 */
export function bestKeywordMatch<T extends { readonly keywords: readonly string[] }>(
  text: string,
  entries: readonly T[]
): T | null {
  let best: T | null = null;
  let bestHits = 0;
  for (const entry of entries) {
    const hits = countKeywordHits(text, entry.keywords);
    if (hits > bestHits) {
      best = entry;
      bestHits = hits;
    }
  }
  return best;
}

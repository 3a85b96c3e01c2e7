import {
  ExtractionOrigin,
  MAX_QUOTE_LENGTH,
  type Chunk,
  type ClaimCandidate,
  type Confidence,
  type EvidenceCode,
  type PartnerMention,
  type QuantificationCode,
} from '../claims/types';
import {
  bestKeywordMatch,
  containsKeyword,
  findDomain,
  type PatternCatalog,
  type PatternRule,
  type Taxonomy,
} from '../claims/catalog';
import { stableId } from '../cache/content-hasher';
import { quoteWindow, splitSentences, type Sentence } from './sentences';

type Unit = 'percent' | 'points' | null;

interface ParsedValue {
  value: number;
  unit: Unit;
}

const NUMBER_PATTERN = /(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?\s*(%|percentage\s+points?\b|percent\b)?/gi;
const YEAR_PATTERN = /^(?:19|20)\d{2}$/;

// Leading/trailing words a captured partner name must not keep
const NAME_EDGE_WORDS = /^(?:the|of|for|and|&)\s+|\s+(?:of|for|and|&|the)$/i;

/**
 * Deterministic rule-based extraction. For every sentence of a chunk the
 * first matching rule emits one candidate; the same chunk always yields the
 * same candidates.
 */
export class PatternExtractor {
  constructor(
    private readonly taxonomy: Taxonomy,
    private readonly catalog: PatternCatalog
  ) {}

  extract(chunk: Chunk): ClaimCandidate[] {
    const candidates: ClaimCandidate[] = [];
    for (const sentence of splitSentences(chunk.text)) {
      const candidate = this.extractSentence(chunk, sentence);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  }

  extractAll(chunks: readonly Chunk[]): ClaimCandidate[] {
    return chunks.flatMap((chunk) => this.extract(chunk));
  }

  private extractSentence(chunk: Chunk, sentence: Sentence): ClaimCandidate | null {
    for (const rule of this.catalog.rules) {
      const match = rule.regex.exec(sentence.text);
      if (!match) continue;

      const matchStart = sentence.start + match.index;
      const window = quoteWindow(sentence, { start: matchStart, end: matchStart + match[0].length }, MAX_QUOTE_LENGTH);
      const parsed = parseValue(match[0]);
      const quote = chunk.text.slice(window.start, window.end);

      return {
        id: stableId('pat', chunk.id, window.start, window.end, rule.id),
        documentId: chunk.documentId,
        chunkId: chunk.id,
        origin: ExtractionOrigin.Pattern,
        quote,
        value: parsed?.value ?? null,
        confidence: this.confidence(sentence.text, parsed),
        ...this.code(rule, sentence.text, parsed),
        partners: this.partners(quote),
        provenance: { source: rule.id, query: null, contextChunkIds: [chunk.id] },
      };
    }
    return null;
  }

  private code(rule: PatternRule, text: string, parsed: ParsedValue | null) {
    const domain = bestKeywordMatch(text, this.taxonomy.domains)?.code ?? rule.domain;
    const themes = findDomain(this.taxonomy, domain)?.themes ?? [];
    return {
      domain,
      claimType: rule.claimType,
      evidence: this.evidence(text),
      quantification: rule.quantification ?? quantificationOf(parsed),
      clinicalArea: bestKeywordMatch(text, this.taxonomy.clinicalAreas)?.code ?? null,
      theme: bestKeywordMatch(text, themes)?.code ?? null,
    };
  }

  private evidence(text: string): EvidenceCode {
    const hit = this.catalog.evidenceCues.find((group) => group.cues.some((cue) => containsKeyword(text, cue)));
    return hit?.code ?? 'NONE';
  }

  private confidence(text: string, parsed: ParsedValue | null): Confidence {
    const hasMetric = this.catalog.metricKeywords.some((keyword) => containsKeyword(text, keyword));
    return parsed && hasMetric ? 'HIGH' : 'MEDIUM';
  }

  // Partners are kept only when the quote attributes an outcome
  private partners(text: string): PartnerMention[] {
    const cues = this.catalog.partnerships;
    if (!cues.outcomeVerbs.some((verb) => containsKeyword(text, verb))) return [];

    const partners: PartnerMention[] = [];
    const seen = new Set<string>();
    for (const pattern of cues.patterns) {
      const global = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
      for (const match of text.matchAll(global)) {
        const name = cleanPartnerName(match.groups?.['name'] ?? '');
        if (!name || seen.has(name)) continue;
        seen.add(name);
        const type = cues.types.find((t) => t.keywords.some((keyword) => containsKeyword(name, keyword)));
        partners.push({ name, partnerType: type?.code ?? cues.defaultType });
      }
    }
    return partners;
  }
}

/**
 * First number carrying a unit; otherwise the first number that is not a
 * calendar year.
 */
export function parseValue(text: string): ParsedValue | null {
  let fallback: ParsedValue | null = null;
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    const digits = match[1] ?? '';
    const value = Number.parseFloat(`${digits.replace(/,/g, '')}${match[2] ?? ''}`);
    if (Number.isNaN(value)) continue;
    const unitText = match[3]?.toLowerCase();
    if (unitText) {
      return { value, unit: unitText.startsWith('percentage') ? 'points' : 'percent' };
    }
    if (!fallback && !(match[2] === undefined && YEAR_PATTERN.test(digits))) {
      fallback = { value, unit: null };
    }
  }
  return fallback;
}

function quantificationOf(parsed: ParsedValue | null): QuantificationCode {
  if (!parsed) return 'Q-NONE';
  if (parsed.unit === 'percent') return 'Q-PCT';
  if (parsed.unit === 'points') return 'Q-PPT';
  return 'Q-ABS';
}

function cleanPartnerName(raw: string): string {
  let name = raw.trim().replace(/[.,;:]+$/, '');
  let previous = '';
  while (previous !== name) {
    previous = name;
    name = name.replace(NAME_EDGE_WORDS, '').trim();
  }
  return name;
}

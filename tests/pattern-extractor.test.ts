import { describe, it, expect, beforeAll } from 'vitest';
import { PatternExtractor, parseValue } from '../src/extraction/pattern-extractor';
import { quoteWindow, splitSentences } from '../src/extraction/sentences';
import { ExtractionOrigin } from '../src/claims/types';
import { createChunk, loadBundledCatalogs } from './utils';

describe('splitSentences', () => {
  it('splits on terminal punctuation and blank lines with trimmed spans', () => {
    const text = 'First claim. Second one!\nwrapped line\n\nThird part';
    const sentences = splitSentences(text);
    expect(sentences.map((s) => s.text)).toEqual(['First claim.', 'Second one!', 'wrapped line', 'Third part']);
    for (const s of sentences) {
      expect(text.slice(s.start, s.end)).toBe(s.text);
    }
  });

  it('does not split inside decimal numbers', () => {
    expect(splitSentences('Rates rose 3.5 points. Done.').map((s) => s.text)).toEqual(['Rates rose 3.5 points.', 'Done.']);
  });
});

describe('quoteWindow', () => {
  it('returns the sentence when it fits', () => {
    expect(quoteWindow({ start: 10, end: 40 }, { start: 15, end: 20 }, 300)).toEqual({ start: 10, end: 40 });
  });

  it('centers the window on the match inside long sentences', () => {
    expect(quoteWindow({ start: 0, end: 1000 }, { start: 500, end: 520 }, 100)).toEqual({ start: 460, end: 560 });
  });

  it('stays inside the sentence', () => {
    expect(quoteWindow({ start: 0, end: 1000 }, { start: 980, end: 990 }, 100)).toEqual({ start: 900, end: 1000 });
  });
});

describe('parseValue', () => {
  it('prefers a number with a unit', () => {
    expect(parseValue('in 2022 we saw 3.5 percentage points')).toEqual({ value: 3.5, unit: 'points' });
    expect(parseValue('reduced by 12%')).toEqual({ value: 12, unit: 'percent' });
  });

  it('skips calendar years and strips thousands separators', () => {
    expect(parseValue('served 2,500 members in 2022')).toEqual({ value: 2500, unit: null });
  });

  it('returns null without numbers', () => {
    expect(parseValue('no figures here')).toBeNull();
  });
});

describe('PatternExtractor', () => {
  let extractor: PatternExtractor;

  beforeAll(() => {
    const { taxonomy, patterns } = loadBundledCatalogs();
    extractor = new PatternExtractor(taxonomy, patterns);
  });

  it('codes a reported reduction in avoidable ED visits', () => {
    const chunk = createChunk('ohio-2023', 0, 'We achieved a 15% reduction in avoidable ED visits by 2023.');
    const [candidate, ...rest] = extractor.extract(chunk);

    expect(rest).toHaveLength(0);
    expect(candidate).toMatchObject({
      documentId: 'ohio-2023',
      chunkId: 'ohio-2023#0',
      origin: ExtractionOrigin.Pattern,
      quote: 'We achieved a 15% reduction in avoidable ED visits by 2023.',
      value: 15,
      claimType: 'HIST',
      quantification: 'Q-PCT',
      domain: 'AC',
      theme: 'AC-ED',
      clinicalArea: 'HOSP',
      evidence: 'NONE',
      confidence: 'HIGH',
      partners: [],
      provenance: { source: 'reported-change', query: null, contextChunkIds: ['ohio-2023#0'] },
    });
  });

  it('codes a HEDIS screening target as a projection', () => {
    const chunk = createChunk('ohio-2023', 1, 'Our plan commits to a 90% HEDIS breast cancer screening target by Year 2.');
    const [candidate] = extractor.extract(chunk);

    expect(candidate).toMatchObject({
      value: 90,
      claimType: 'PROJ',
      quantification: 'Q-TGT',
      domain: 'QM',
      theme: 'QM-HEDIS',
      clinicalArea: null,
      confidence: 'HIGH',
      provenance: { source: 'target-commitment' },
    });
  });

  it('captures partners named in an outcome sentence', () => {
    const chunk = createChunk('ohio-2023', 2, 'In partnership with Riverside Community Food Bank, we reduced ED visits by 12%.');
    const [candidate] = extractor.extract(chunk);

    expect(candidate?.partners).toEqual([{ name: 'Riverside Community Food Bank', partnerType: 'P-CBO' }]);
    expect(candidate?.value).toBe(12);
    expect(candidate?.provenance.source).toBe('reported-change');
  });

  it('ignores sentences no rule matches', () => {
    expect(extractor.extract(createChunk('ohio-2023', 3, 'The plan operates in twelve counties.'))).toEqual([]);
  });

  it('emits one candidate per matching sentence with quotes taken from the chunk', () => {
    const text =
      'The plan operates in twelve counties. We achieved a 15% reduction in avoidable ED visits by 2023. ' +
      'Our plan commits to a 90% HEDIS breast cancer screening target by Year 2.';
    const chunk = createChunk('ohio-2023', 4, text, 500);
    const candidates = extractor.extract(chunk);

    expect(candidates.map((c) => c.provenance.source)).toEqual(['reported-change', 'target-commitment']);
    for (const candidate of candidates) {
      expect(text).toContain(candidate.quote);
    }
  });

  it('is deterministic', () => {
    const chunk = createChunk('ohio-2023', 0, 'We achieved a 15% reduction in avoidable ED visits by 2023.');
    expect(extractor.extractAll([chunk])).toEqual(extractor.extractAll([chunk]));
    expect(extractor.extract(chunk)[0]?.id).toMatch(/^pat_[0-9a-f]{16}$/);
  });
});

import { describe, it, expect } from 'vitest';
import { chunkDocument, computeCoverage, RecursiveChunker } from '../src/chunking/chunker';
import { mergeSpans, splitLines } from '../src/chunking/utils';

describe('splitLines', () => {
  it('tiles the text including terminators', () => {
    const lines = splitLines('one\r\ntwo\nthree');
    expect(lines).toEqual([
      { text: 'one', start: 0, end: 5 },
      { text: 'two', start: 5, end: 9 },
      { text: 'three', start: 9, end: 14 },
    ]);
  });
});

describe('mergeSpans', () => {
  it('joins overlapping and touching spans', () => {
    expect(mergeSpans([{ start: 10, end: 12 }, { start: 0, end: 5 }, { start: 5, end: 8 }, { start: 11, end: 20 }])).toEqual([
      { start: 0, end: 8 },
      { start: 10, end: 20 },
    ]);
  });
});

describe('RecursiveChunker', () => {
  it('drops page furniture and keeps offsets into the source', () => {
    const text = 'Intro paragraph.\n\nPage 3\nBody text here.\n';
    const result = chunkDocument({ id: 'doc', text });

    expect(result.chunks.map((c) => [c.id, c.start, c.end, c.text])).toEqual([
      ['doc#0', 0, 16, 'Intro paragraph.'],
      ['doc#1', 25, 40, 'Body text here.'],
    ]);
    for (const chunk of result.chunks) {
      expect(text.slice(chunk.start, chunk.end)).toBe(chunk.text);
    }
    expect(result.discarded).toEqual([
      { start: 16, end: 18, reason: 'whitespace' },
      { start: 18, end: 25, reason: 'boilerplate' },
      { start: 40, end: 41, reason: 'whitespace' },
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('covers the whole document with chunks and discarded spans', () => {
    const text = 'Intro paragraph.\n\nPage 3\nBody text here.\n';
    const result = chunkDocument({ id: 'doc', text });
    const coverage = computeCoverage('doc', text.length, result.chunks, result.discarded);
    expect(coverage).toEqual({
      documentId: 'doc',
      length: 41,
      covered: 41,
      gaps: [],
      discarded: [
        { start: 16, end: 18, reason: 'whitespace' },
        { start: 18, end: 25, reason: 'boilerplate' },
        { start: 40, end: 41, reason: 'whitespace' },
      ],
    });
  });

  it('removes running headers seen on every page', () => {
    const text = 'Acme Health Plan\nFirst fact.\nAcme Health Plan\nSecond fact.\nAcme Health Plan\n';
    const result = chunkDocument({ id: 'doc', text });

    expect(result.discarded.filter((d) => d.reason === 'repeated-header')).toHaveLength(3);
    expect(result.chunks.map((c) => c.text)).toEqual(['First fact.', 'Second fact.']);
  });

  it('keeps repeated lines that end a sentence', () => {
    const sentence = 'We achieved a 15% reduction in avoidable ED visits by 2023.';
    const text = `${sentence}\n${sentence}\n${sentence}\n`;
    const result = chunkDocument({ id: 'doc', text });

    expect(result.discarded).toEqual([{ start: text.length - 1, end: text.length, reason: 'whitespace' }]);
    expect(result.chunks.map((c) => c.text)).toEqual([text.trim()]);
  });

  it('keeps a repeated line below the threshold', () => {
    const text = 'Care Coordination\nFirst fact.\nCare Coordination\n';
    const result = chunkDocument({ id: 'doc', text });
    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0]?.text).toBe(text.trim());
  });

  it('splits long text into overlapping windows', () => {
    const text = 'abcdefghijklmnopqrstuvwxy';
    const result = chunkDocument({ id: 'doc', text }, { maxChars: 10, overlap: 2 });

    expect(result.chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 10],
      [8, 18],
      [16, 25],
    ]);
    expect(result.chunks.map((c) => c.sequence)).toEqual([0, 1, 2]);
  });

  it('prefers separator boundaries when splitting', () => {
    const result = chunkDocument({ id: 'doc', text: 'alpha beta gamma delta' }, { maxChars: 12, overlap: 0 });
    expect(result.chunks.map((c) => c.text)).toEqual(['alpha beta ', 'gamma delta']);
  });

  it('skips undecodable lines with a warning', () => {
    const text = 'Readable line.\nBroken \uFFFD line.\nAnother readable line.';
    const result = chunkDocument({ id: 'doc', text });

    expect(result.discarded).toContainEqual({ start: 15, end: 30, reason: 'encoding-error' });
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.reason).toBe('1 line(s) contained undecodable bytes and were skipped');
    expect(result.chunks.map((c) => c.text)).toEqual(['Readable line.', 'Another readable line.']);
  });

  it('applies extra boilerplate patterns', () => {
    const text = 'Proposal for Ohio RFP\nThe plan reached members.';
    const result = chunkDocument({ id: 'doc', text }, { boilerplatePatterns: [/^proposal for/i] });
    expect(result.chunks.map((c) => c.text)).toEqual(['The plan reached members.']);
  });

  it('returns no chunks for an empty document', () => {
    const result = chunkDocument({ id: 'empty', text: '' });
    expect(result.chunks).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('rejects an overlap that is not smaller than maxChars', () => {
    expect(() => new RecursiveChunker().chunk({ id: 'doc', text: 'x' }, { maxChars: 10, overlap: 10 })).toThrow(RangeError);
  });

  it('is deterministic', () => {
    const text = 'One sentence here. Another sentence there.\n\nA second paragraph follows.';
    expect(chunkDocument({ id: 'doc', text }, { maxChars: 20, overlap: 5 })).toEqual(
      chunkDocument({ id: 'doc', text }, { maxChars: 20, overlap: 5 })
    );
  });
});

import type { Chunk } from '../claims/types';
import { PartialExtractionWarning } from '../errors/pipeline-errors';
import type {
  ChunkableDocument,
  ChunkingOptions,
  ChunkingResult,
  ChunkingStrategy,
  CoverageReport,
  DiscardReason,
  DiscardedSpan,
  Span,
} from './types';
import { mergeSpans, splitLines } from './utils';

export const DEFAULT_BOILERPLATE_PATTERNS: RegExp[] = [
  /^\s*\d{1,4}\s*$/, // bare page numbers
  /^\s*(?:-\s*)?page\s+\d+(?:\s+of\s+\d+)?(?:\s*-)?\s*$/i,
  /^\s*confidential(?:\s+(?:and|&)\s+proprietary)?\s*$/i,
  /^\s*\f[\s\f]*$/, // form feeds left by text conversion
];

const DEFAULT_OPTIONS: Required<ChunkingOptions> = {
  maxChars: 2000,
  overlap: 200,
  boilerplatePatterns: DEFAULT_BOILERPLATE_PATTERNS,
  repeatedLineThreshold: 3,
};

// Lines longer than this are body text, never running headers
const MAX_HEADER_LENGTH = 80;
// A line ending a sentence is content even when it repeats
const SENTENCE_END = /[.!?]["'\u201D\u2019)\]]*$/;

function isHeaderShaped(line: string): boolean {
  return line.length > 0 && line.length <= MAX_HEADER_LENGTH && !SENTENCE_END.test(line);
}

export class RecursiveChunker implements ChunkingStrategy {
  readonly name = 'recursive';

  // Preferred window boundaries, strongest first
  private readonly separators = ['\n\n', '\n', '. ', ' '];

  chunk(document: ChunkableDocument, options?: ChunkingOptions): ChunkingResult {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    if (opts.maxChars < 1 || opts.overlap < 0 || opts.overlap >= opts.maxChars) {
      throw new RangeError(
        `Invalid chunking options: overlap (${opts.overlap}) must be >= 0 and < maxChars (${opts.maxChars})`
      );
    }

    const text = document.text;
    const lineDiscards = this.classifyLines(text, opts);
    const discarded: DiscardedSpan[] = [...lineDiscards];
    const chunks: Chunk[] = [];

    for (const segment of keptSegments(text.length, lineDiscards)) {
      const trimmed = trimSpan(text, segment);
      if (!trimmed) {
        discarded.push({ ...segment, reason: 'whitespace' });
        continue;
      }
      if (trimmed.start > segment.start) {
        discarded.push({ start: segment.start, end: trimmed.start, reason: 'whitespace' });
      }
      if (trimmed.end < segment.end) {
        discarded.push({ start: trimmed.end, end: segment.end, reason: 'whitespace' });
      }
      for (const window of this.windows(text, trimmed, opts.maxChars, opts.overlap)) {
        const sequence = chunks.length;
        chunks.push({
          id: `${document.id}#${sequence}`,
          documentId: document.id,
          sequence,
          start: window.start,
          end: window.end,
          text: text.slice(window.start, window.end),
        });
      }
    }

    const warnings: PartialExtractionWarning[] = [];
    const undecodable = lineDiscards.filter((s) => s.reason === 'encoding-error');
    if (undecodable.length > 0) {
      warnings.push(
        new PartialExtractionWarning(
          { documentId: document.id },
          `${undecodable.length} line(s) contained undecodable bytes and were skipped`,
          { lines: undecodable.length, spans: undecodable.map(({ start, end }) => ({ start, end })) }
        )
      );
    }

    const sortedDiscards = coalesce(discarded);
    const coverage = computeCoverage(document.id, text.length, chunks, sortedDiscards);
    if (coverage.gaps.length > 0) {
      warnings.push(
        new PartialExtractionWarning(
          { documentId: document.id },
          `${coverage.length - coverage.covered} character(s) not covered by any chunk`,
          { gaps: coverage.gaps }
        )
      );
    }

    return { chunks, discarded: sortedDiscards, warnings };
  }

  private classifyLines(text: string, opts: Required<ChunkingOptions>): DiscardedSpan[] {
    const lines = splitLines(text);

    const counts = new Map<string, number>();
    for (const line of lines) {
      const key = line.text.trim();
      if (isHeaderShaped(key)) {
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }
    }

    const spans: DiscardedSpan[] = [];
    for (const line of lines) {
      const reason = this.discardReason(line.text, counts, opts);
      if (reason) spans.push({ start: line.start, end: line.end, reason });
    }
    return spans;
  }

  private discardReason(
    line: string,
    counts: Map<string, number>,
    opts: Required<ChunkingOptions>
  ): DiscardReason | null {
    if (line.includes('\uFFFD')) return 'encoding-error';
    if (opts.boilerplatePatterns.some((p) => p.test(line))) return 'boilerplate';
    const key = line.trim();
    if (key && (counts.get(key) ?? 0) >= opts.repeatedLineThreshold) return 'repeated-header';
    return null;
  }

  private windows(text: string, span: Span, maxChars: number, overlap: number): Span[] {
    const result: Span[] = [];
    let start = span.start;

    while (start < span.end) {
      if (span.end - start <= maxChars) {
        result.push({ start, end: span.end });
        break;
      }
      const end = this.findBreak(text, start, start + maxChars, overlap);
      result.push({ start, end });
      start = end - overlap;
    }

    return result;
  }

  // Latest separator boundary inside the window that still leaves room for the overlap
  private findBreak(text: string, start: number, limit: number, overlap: number): number {
    const window = text.slice(start, limit);
    for (const separator of this.separators) {
      const idx = window.lastIndexOf(separator);
      if (idx === -1) continue;
      const end = start + idx + separator.length;
      if (end - start > overlap) return end;
    }
    return limit;
  }
}

const defaultChunker = new RecursiveChunker();

export function chunkDocument(document: ChunkableDocument, options?: ChunkingOptions): ChunkingResult {
  return defaultChunker.chunk(document, options);
}

/**
 * Reports how much of [0, length) the chunk and discarded spans cover,
 * listing every uncovered gap and every discarded span.
 */
export function computeCoverage(
  documentId: string,
  length: number,
  chunks: readonly Span[],
  discarded: readonly DiscardedSpan[]
): CoverageReport {
  const merged = mergeSpans([...chunks, ...discarded]);
  const gaps: Span[] = [];
  let cursor = 0;
  let covered = 0;

  for (const span of merged) {
    const start = Math.max(span.start, 0);
    const end = Math.min(span.end, length);
    if (end <= start) continue;
    if (start > cursor) gaps.push({ start: cursor, end: start });
    covered += end - Math.max(start, cursor);
    cursor = Math.max(cursor, end);
  }
  if (cursor < length) gaps.push({ start: cursor, end: length });

  return {
    documentId,
    length,
    covered,
    gaps,
    discarded: discarded.map(({ start, end, reason }) => ({ start, end, reason })),
  };
}

function keptSegments(length: number, discarded: readonly Span[]): Span[] {
  const segments: Span[] = [];
  let cursor = 0;
  for (const span of discarded) {
    if (span.start > cursor) segments.push({ start: cursor, end: span.start });
    cursor = Math.max(cursor, span.end);
  }
  if (cursor < length) segments.push({ start: cursor, end: length });
  return segments;
}

function trimSpan(text: string, span: Span): Span | null {
  let start = span.start;
  let end = span.end;
  while (start < end && /\s/.test(text.charAt(start))) start++;
  while (end > start && /\s/.test(text.charAt(end - 1))) end--;
  return start < end ? { start, end } : null;
}

// Sorts discarded spans and joins adjacent spans that share a reason
function coalesce(spans: DiscardedSpan[]): DiscardedSpan[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const result: DiscardedSpan[] = [];
  for (const span of sorted) {
    const last = result[result.length - 1];
    if (last && last.reason === span.reason && last.end === span.start) {
      last.end = span.end;
    } else {
      result.push({ ...span });
    }
  }
  return result;
}

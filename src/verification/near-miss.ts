import { partial_ratio, ratio, token_sort_ratio } from 'fuzzball';
import type { NearMiss } from '../claims/types';

const MIN_SCORE = 60;

/**
 * Best line-by-line fuzzy match. Fast, and catches most paraphrased quotes.
 */
function bestLineMatch(quote: string, text: string): NearMiss | null {
  let best: NearMiss | null = null;
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const score = Math.max(partial_ratio(quote, trimmed), token_sort_ratio(quote, trimmed), ratio(quote, trimmed));
    if (score >= MIN_SCORE && (!best || score > best.score)) {
      best = { text: trimmed, score };
    }
  }
  return best;
}

/**
 * Sliding-window fuzzy match for quotes that span line breaks. Windows range
 * from half to one and a half times the quote length.
 */
function bestWindowMatch(quote: string, text: string): NearMiss | null {
  const minWindow = Math.max(1, Math.floor(quote.length * 0.5));
  const maxWindow = Math.floor(quote.length * 1.5);
  let best: NearMiss | null = null;

  for (let size = minWindow; size <= maxWindow; size += 10) {
    for (let i = 0; i + size <= text.length; i += 5) {
      const window = text.substring(i, i + size);
      const score = Math.max(partial_ratio(quote, window), token_sort_ratio(quote, window));
      if (score >= MIN_SCORE && (!best || score > best.score)) {
        best = { text: window.trim(), score };
      }
    }
  }
  return best;
}

/**
 * Closest passage of `text` to a quote that failed verification. Diagnostic
 * only: a near miss never makes a candidate VERIFIED.
 */
export function findNearMiss(quote: string, text: string): NearMiss | null {
  const trimmed = quote.trim();
  if (!trimmed || !text) return null;
  const line = bestLineMatch(trimmed, text);
  if (line && line.score >= 90) return line;
  const window = bestWindowMatch(trimmed, text);
  if (!window) return line;
  return !line || window.score > line.score ? window : line;
}

/** Fuzzy similarity (0-100) of two quotes, used to pair unverified LLM quotes with pattern quotes. */
export function quoteSimilarity(a: string, b: string): number {
  return partial_ratio(a, b);
}

import type { Span } from '../chunking/types';

export interface Sentence extends Span {
  text: string;
}

/**
 * Splits text into sentence windows with offsets into `text`. A sentence ends
 * at ., ! or ? followed by whitespace, or at a blank line; single newlines are
 * treated as line wrapping. Spans are trimmed of surrounding whitespace.
 */
export function splitSentences(text: string): Sentence[] {
  const sentences: Sentence[] = [];
  let start = 0;

  const push = (end: number): void => {
    let s = start;
    let e = end;
    while (s < e && /\s/.test(text.charAt(s))) s++;
    while (e > s && /\s/.test(text.charAt(e - 1))) e--;
    if (e > s) sentences.push({ start: s, end: e, text: text.slice(s, e) });
    start = end;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if ((ch === '.' || ch === '!' || ch === '?') && (i + 1 === text.length || /\s/.test(text.charAt(i + 1)))) {
      push(i + 1);
    } else if (ch === '\n' && /^\n[ \t\r]*\n/.test(text.slice(i, i + 64))) {
      push(i);
    }
  }
  if (start < text.length) push(text.length);

  return sentences;
}

/**
 * Clamps a match to at most `maxLength` characters inside its sentence,
 * centering the window on the match.
 */
export function quoteWindow(sentence: Span, match: Span, maxLength: number): Span {
  if (sentence.end - sentence.start <= maxLength) return { start: sentence.start, end: sentence.end };
  const matchLength = match.end - match.start;
  if (matchLength >= maxLength) return { start: match.start, end: match.start + maxLength };

  const slack = maxLength - matchLength;
  let start = Math.max(sentence.start, match.start - Math.floor(slack / 2));
  const end = Math.min(sentence.end, start + maxLength);
  start = Math.max(sentence.start, end - maxLength);
  return { start, end };
}

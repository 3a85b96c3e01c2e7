export interface NormalizedText {
  text: string;
  /** map[i] is the offset in the source of normalized character i. */
  map: number[];
}

const QUOTE_FOLDS: Record<string, string> = {
  '\u2018': "'",
  '\u2019': "'",
  '\u201C': '"',
  '\u201D': '"',
};

function isLetter(ch: string): boolean {
  return /\p{L}/u.test(ch);
}

/**
 * Whitespace and line-wrap normalisation that remembers where every output
 * character came from:
 * - a hyphen at a line end between two letters is removed with the break
 *   ("coordi-\nnation" -> "coordination");
 * - every run of whitespace becomes one space;
 * - typographic quotes fold to ASCII.
 */
export function normalizeWithMap(source: string): NormalizedText {
  let text = '';
  const map: number[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (ch === '-' && i > 0 && isLetter(source.charAt(i - 1))) {
      const rest = /^-[ \t]*\r?\n\s*/.exec(source.slice(i, i + 64));
      const next = rest ? source.charAt(i + rest[0].length) : '';
      if (rest && next && isLetter(next)) {
        i += rest[0].length;
        continue;
      }
    }

    const folded = QUOTE_FOLDS[ch] ?? ch;
    if (/\s/.test(folded)) {
      if (text.length > 0 && !text.endsWith(' ')) {
        text += ' ';
        map.push(i);
      }
      i++;
      continue;
    }

    text += folded;
    map.push(i);
    i++;
  }

  // Trailing space from a final whitespace run
  if (text.endsWith(' ')) {
    text = text.slice(0, -1);
    map.pop();
  }

  return { text, map };
}

export interface LocatedSpan {
  start: number; // source offsets, end exclusive
  end: number;
}

/**
 * Finds `needle` in `haystack` after normalising both, returning the exact
 * source span in `haystack`. The earliest occurrence at or after `from`
 * (a source offset) wins.
 */
export function locateNormalized(haystack: string, needle: string, from: number = 0): LocatedSpan | null {
  const normalizedNeedle = normalizeWithMap(needle).text;
  if (!normalizedNeedle) return null;

  const normalizedHaystack = normalizeWithMap(haystack);
  let startIndex = normalizedHaystack.map.findIndex((offset) => offset >= from);
  if (startIndex === -1) return null;

  while (startIndex <= normalizedHaystack.text.length - normalizedNeedle.length) {
    const idx = normalizedHaystack.text.indexOf(normalizedNeedle, startIndex);
    if (idx === -1) return null;
    const first = normalizedHaystack.map[idx];
    const last = normalizedHaystack.map[idx + normalizedNeedle.length - 1];
    if (first !== undefined && last !== undefined) {
      return { start: first, end: last + 1 };
    }
    startIndex = idx + 1;
  }
  return null;
}

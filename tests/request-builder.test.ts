import { describe, it, expect } from 'vitest';
import { DefaultRequestBuilder, VERBATIM_DIRECTIVE } from '../src/providers/request-builder';

describe('RequestBuilder', () => {
  it('appends directive to structured prompts without extra builder text', () => {
    const b = new DefaultRequestBuilder('DIR');
    const out = b.buildPromptBodyForStructured('P');
    expect(out).toBe('P\n\nDIR');
  });

  it('uses the verbatim quoting directive by default', () => {
    const out = new DefaultRequestBuilder().buildPromptBodyForStructured('P');
    expect(out).toBe(`P\n\n${VERBATIM_DIRECTIVE}`);
    expect(out).toContain('Quote the source text verbatim');
  });

  it('leaves the prompt unchanged with an empty directive', () => {
    expect(new DefaultRequestBuilder('  ').buildPromptBodyForStructured('P')).toBe('P');
  });
});

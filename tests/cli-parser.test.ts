import { describe, it, expect } from 'vitest';
import { parseExhibitsOptions, parseExtractOptions, parseValidateOptions } from '../src/boundaries/cli-parser';
import { ValidationError } from '../src/errors/index';

describe('CLI option parsing', () => {
  it('fills extract defaults', () => {
    expect(parseExtractOptions({})).toEqual({
      verbose: false,
      quiet: false,
      patternOnly: false,
      cache: true,
      showPrompt: false,
      showPromptTrunc: false,
      debugJson: false,
    });
  });

  it('coerces concurrency given as a string', () => {
    const options = parseExtractOptions({ manifest: 'corpus.yaml', concurrency: '8', cache: false });
    expect(options).toMatchObject({ manifest: 'corpus.yaml', concurrency: 8, cache: false });
  });

  it('names the offending flag', () => {
    expect(() => parseExtractOptions({ concurrency: '0' })).toThrow(ValidationError);
    expect(() => parseExtractOptions({ concurrency: 'many' })).toThrow(/^Invalid extract options: --concurrency: /);
  });

  it('parses exhibits and validate options', () => {
    expect(parseExhibitsOptions({ claims: 'out/claims_extracted.jsonl' })).toEqual({
      claims: 'out/claims_extracted.jsonl',
      verbose: false,
      quiet: false,
    });
    expect(parseValidateOptions({ config: 'claimtrace.ini', verbose: true })).toEqual({
      config: 'claimtrace.ini',
      verbose: true,
      quiet: false,
    });
    expect(() => parseValidateOptions({ quiet: 'yes' })).toThrow(/^Invalid validate options: --quiet: /);
  });
});

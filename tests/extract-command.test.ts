import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { runPersistingCache } from '../src/cli/extract-command';
import { CacheStore } from '../src/cache/cache-store';
import { InputUnavailableError } from '../src/errors/index';

describe('runPersistingCache', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'claimtrace-extract-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const entry = { data: { status: 'no_claim_found', claims: [] }, timestamp: 1700000000000 };

  it('saves responses cached before the run fails', async () => {
    const cache = new CacheStore(dir);

    await expect(
      runPersistingCache(cache, () => {
        cache.set('openai:gpt-4o|claimtrace_claims|a|b', entry);
        return Promise.reject(new InputUnavailableError('No readable documents in the manifest'));
      })
    ).rejects.toThrow(InputUnavailableError);

    expect(new CacheStore(dir).get('openai:gpt-4o|claimtrace_claims|a|b')).toEqual(entry);
  });

  it('saves the cache and returns the result of a completed run', async () => {
    const cache = new CacheStore(dir);

    const result = await runPersistingCache(cache, () => {
      cache.set('key', entry);
      return Promise.resolve('done');
    });

    expect(result).toBe('done');
    expect(new CacheStore(dir).size()).toBe(1);
  });

  it('runs without a cache', async () => {
    await expect(runPersistingCache(undefined, () => Promise.resolve(3))).resolves.toBe(3);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { hashContent, stableId, createCacheKeyString } from '../src/cache/content-hasher';
import { CacheStore } from '../src/cache/cache-store';
import type { CachedResult } from '../src/cache/types';

describe('Content Hasher', () => {
    describe('hashContent', () => {
        it('produces consistent hashes for same content', () => {
            const content = 'Hello, World!';
            expect(hashContent(content)).toBe(hashContent(content));
            expect(hashContent(content)).toHaveLength(64);
        });

        it('normalizes line endings', () => {
            expect(hashContent('Line 1\r\nLine 2')).toBe(hashContent('Line 1\nLine 2'));
        });

        it('keeps surrounding whitespace significant', () => {
            expect(hashContent('  Hello  ')).not.toBe(hashContent('Hello'));
        });
    });

    describe('stableId', () => {
        it('is prefixed, short and deterministic', () => {
            const id = stableId('clm', 'ohio-2023', 107, 134);
            expect(id).toMatch(/^clm_[0-9a-f]{16}$/);
            expect(stableId('clm', 'ohio-2023', 107, 134)).toBe(id);
        });

        it('does not collide when parts shift between positions', () => {
            expect(stableId('clm', 'ab', 'c')).not.toBe(stableId('clm', 'a', 'bc'));
            expect(stableId('clm', 1, null)).not.toBe(stableId('clm', null, 1));
        });
    });

    describe('createCacheKeyString', () => {
        const parts = {
            providerId: 'openai:gpt-4o',
            schemaName: 'claimtrace_claims',
            prompt: 'Find claims',
            content: 'chunk text',
        };

        it('creates the expected key format', () => {
            const key = createCacheKeyString(parts);
            expect(key).toBe(
                `openai:gpt-4o|claimtrace_claims|${hashContent('Find claims').slice(0, 16)}|${hashContent('chunk text').slice(0, 16)}`
            );
        });

        it('changes with the provider, prompt or content', () => {
            const key = createCacheKeyString(parts);
            expect(createCacheKeyString({ ...parts, providerId: 'anthropic:claude-3-5-sonnet-20241022' })).not.toBe(key);
            expect(createCacheKeyString({ ...parts, prompt: 'Find other claims' })).not.toBe(key);
            expect(createCacheKeyString({ ...parts, content: 'other chunk' })).not.toBe(key);
        });
    });
});

describe('CacheStore', () => {
    let testDir: string;
    const cacheDir = '.test-cache';

    function result(data: unknown): CachedResult {
        return { data, usage: { inputTokens: 10, outputTokens: 2 }, timestamp: 1700000000000 };
    }

    beforeEach(() => {
        testDir = mkdtempSync(path.join(tmpdir(), 'claimtrace-cache-'));
    });

    afterEach(() => {
        rmSync(testDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('returns undefined for missing keys', () => {
        const store = new CacheStore(testDir, cacheDir);
        expect(store.get('nonexistent-key')).toBeUndefined();
        expect(store.has('nonexistent-key')).toBe(false);
    });

    it('stores and retrieves results', () => {
        const store = new CacheStore(testDir, cacheDir);
        store.set('test-key', result({ status: 'no_claim_found', claims: [] }));

        expect(store.get('test-key')).toEqual(result({ status: 'no_claim_found', claims: [] }));
        expect(store.has('test-key')).toBe(true);
        expect(store.size()).toBe(1);
    });

    it('persists cache to disk, creating the directory', () => {
        const store1 = new CacheStore(testDir, cacheDir);
        store1.set('persistent-key', result({ status: 'claims_found', claims: [{ quote: 'x' }] }));
        store1.save();

        const cacheFile = path.join(testDir, cacheDir, 'cache.json');
        expect(existsSync(cacheFile)).toBe(true);

        const store2 = new CacheStore(testDir, cacheDir);
        expect(store2.get('persistent-key')?.data).toEqual({ status: 'claims_found', claims: [{ quote: 'x' }] });
    });

    it('does not write when nothing changed', () => {
        new CacheStore(testDir, cacheDir).save();
        expect(existsSync(path.join(testDir, cacheDir))).toBe(false);
    });

    it('clears all entries', () => {
        const store = new CacheStore(testDir, cacheDir);
        store.set('key1', result(1));
        store.set('key2', result(2));

        expect(store.size()).toBe(2);
        store.clear();
        expect(store.size()).toBe(0);
    });

    it('starts fresh from a corrupt cache file', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        mkdirSync(path.join(testDir, cacheDir));
        writeFileSync(path.join(testDir, cacheDir, 'cache.json'), '{ not json');

        expect(new CacheStore(testDir, cacheDir).size()).toBe(0);
    });

    it('discards a cache written by another version', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        mkdirSync(path.join(testDir, cacheDir));
        const cacheFile = path.join(testDir, cacheDir, 'cache.json');
        writeFileSync(cacheFile, JSON.stringify({ version: 99, entries: { old: result(1) } }));

        const store = new CacheStore(testDir, cacheDir);
        expect(store.size()).toBe(0);

        store.set('new', result(2));
        store.save();
        const saved: unknown = JSON.parse(readFileSync(cacheFile, 'utf-8'));
        expect(saved).toEqual({ version: 1, entries: { new: result(2) } });
    });
});

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import * as path from 'path';
import type { CacheData, CachedResult } from './types';
import { CACHE_SCHEMA } from '../schemas/cache-schema';
import { CACHE_DIR, CACHE_FILENAME } from '../config/constants';
import { LOG_PREFIX, warn } from '../output/logger';
import { handleUnknownError } from '../errors/index';

/**
 * Cache schema version. Bump this to invalidate existing caches
 * when CachedResult or the key format changes.
 */
const CACHE_VERSION = 1;

/**
 * Persistent cache of structured generation responses.
 * Stores cache in .claimtrace/cache.json by default.
 */
export class CacheStore {
    private readonly cacheDir: string;
    private readonly cacheFile: string;
    private data: CacheData;
    private dirty: boolean = false;

    constructor(cwd: string = process.cwd(), cacheDir: string = CACHE_DIR) {
        this.cacheDir = path.resolve(cwd, cacheDir);
        this.cacheFile = path.join(this.cacheDir, CACHE_FILENAME);
        this.data = this.load();
    }

    private load(): CacheData {
        try {
            if (existsSync(this.cacheFile)) {
                const json: unknown = JSON.parse(readFileSync(this.cacheFile, 'utf-8'));
                const result = CACHE_SCHEMA.safeParse(json);

                if (!result.success) {
                    warn(`${LOG_PREFIX} Cache validation failed, starting fresh: ${result.error.message}`);
                    return { version: CACHE_VERSION, entries: {} };
                }

                // On version mismatch the whole cache is rebuilt
                if (result.data.version !== CACHE_VERSION) {
                    warn(`${LOG_PREFIX} Cache version mismatch, clearing cache`);
                    return { version: CACHE_VERSION, entries: {} };
                }

                return result.data;
            }
        } catch (e: unknown) {
            const err = handleUnknownError(e, 'Reading cache');
            warn(`${LOG_PREFIX} Could not read cache, starting fresh: ${err.message}`);
        }

        return { version: CACHE_VERSION, entries: {} };
    }

    get(key: string): CachedResult | undefined {
        return this.data.entries[key];
    }

    set(key: string, result: CachedResult): void {
        this.data.entries[key] = result;
        this.dirty = true;
    }

    has(key: string): boolean {
        return key in this.data.entries;
    }

    clear(): void {
        this.data.entries = {};
        this.dirty = true;
    }

    size(): number {
        return Object.keys(this.data.entries).length;
    }

    save(): void {
        if (!this.dirty) return;

        try {
            if (!existsSync(this.cacheDir)) {
                mkdirSync(this.cacheDir, { recursive: true });
            }
            writeFileSync(this.cacheFile, JSON.stringify(this.data, null, 2), 'utf-8');
            this.dirty = false;
        } catch (e: unknown) {
            // A cache that cannot be written never fails the run
            const err = handleUnknownError(e, 'Saving cache');
            warn(`${LOG_PREFIX} Warning: Could not save cache: ${err.message}`);
        }
    }
}

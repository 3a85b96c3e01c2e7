import { createHash } from 'crypto';

const HASH_TRUNCATE_LENGTH = 16;

/**
 * Computes a SHA256 hash of normalized content.
 *
 * Line endings are normalized (\r\n -> \n) so the same document hashes
 * identically across platforms.
 *
 * IMPORTANT: Changing normalization invalidates ALL cache entries.
 */
export function hashContent(content: string): string {
    const normalized = content.replace(/\r\n/g, '\n');
    return createHash('sha256').update(normalized, 'utf8').digest('hex');
}

/**
 * Short stable identifier derived from its parts, e.g. `clm_3f9a…`.
 */
export function stableId(prefix: string, ...parts: Array<string | number | null>): string {
    const serialized = JSON.stringify(parts);
    return `${prefix}_${createHash('sha256').update(serialized, 'utf8').digest('hex').substring(0, HASH_TRUNCATE_LENGTH)}`;
}

export interface GenerationKeyParts {
    providerId: string;
    schemaName: string;
    prompt: string;
    content: string;
}

/**
 * Creates a cache key string for one structured generation request.
 * Format: "providerId|schemaName|promptHash(16)|contentHash(16)"
 */
export function createCacheKeyString(parts: GenerationKeyParts): string {
    return [
        parts.providerId,
        parts.schemaName,
        hashContent(parts.prompt).substring(0, HASH_TRUNCATE_LENGTH),
        hashContent(parts.content).substring(0, HASH_TRUNCATE_LENGTH),
    ].join('|');
}

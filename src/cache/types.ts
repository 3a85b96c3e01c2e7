/**
 * A cached entry holds the raw structured payload of one generation request.
 * Validation runs again on replay, so a changed taxonomy still applies.
 */
export type { CachedResult, CacheData } from '../schemas/cache-schema';

import { z } from 'zod';

const CACHED_RESULT_SCHEMA = z.object({
    // Any valid JSON payload; validated by the extractor on replay
    data: z.unknown(),
    usage: z
        .object({
            inputTokens: z.number(),
            outputTokens: z.number(),
        })
        .optional(),
    timestamp: z.number(),
});

export const CACHE_SCHEMA = z.object({
    version: z.number(),
    entries: z.record(z.string(), CACHED_RESULT_SCHEMA),
});

export type CachedResult = z.infer<typeof CACHED_RESULT_SCHEMA>;
export type CacheData = z.infer<typeof CACHE_SCHEMA>;

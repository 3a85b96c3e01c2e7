import { z } from 'zod';
import { CLAIM_TYPES, EVIDENCE_CODES, PARTNER_TYPES, QUANTIFICATION_CODES } from '../claims/types';

const CODE = z.string().regex(/^[A-Z][A-Z0-9-]*$/, 'codes are upper-case letters, digits and dashes');
const KEYWORDS = z.array(z.string().min(1)).default([]);

export const TAXONOMY_SCHEMA = z.object({
  version: z.literal(1),
  domains: z
    .array(
      z.object({
        code: CODE,
        label: z.string().min(1),
        keywords: KEYWORDS,
        themes: z
          .array(z.object({ code: CODE, label: z.string().min(1), keywords: KEYWORDS }))
          .default([]),
      })
    )
    .min(1),
  clinicalAreas: z.array(z.object({ code: CODE, label: z.string().min(1), keywords: KEYWORDS })).default([]),
  regions: z.record(z.string(), z.array(z.string().min(1))).default({}),
});

export const PATTERN_CATALOG_SCHEMA = z.object({
  version: z.literal(1),
  rules: z
    .array(
      z.object({
        id: z.string().min(1),
        description: z.string().optional(),
        pattern: z.string().min(1),
        flags: z.string().regex(/^[imsu]*$/, 'only the i, m, s and u flags are allowed').optional(),
        claimType: z.enum(CLAIM_TYPES),
        quantification: z.enum(QUANTIFICATION_CODES).optional(),
        domain: CODE,
      })
    )
    .min(1),
  metricKeywords: KEYWORDS,
  evidenceCues: z.array(z.object({ code: z.enum(EVIDENCE_CODES), cues: KEYWORDS })).default([]),
  partnerships: z
    .object({
      patterns: z.array(z.string().min(1)).default([]),
      outcomeVerbs: KEYWORDS,
      types: z.array(z.object({ code: z.enum(PARTNER_TYPES), keywords: KEYWORDS })).default([]),
      defaultType: z.enum(PARTNER_TYPES).default('P-CBO'),
    })
    .default({}),
});

export const PROBE_CATALOG_SCHEMA = z.object({
  version: z.literal(1),
  probes: z
    .array(
      z.object({
        id: z.string().min(1),
        claimType: z.enum(CLAIM_TYPES),
        domain: CODE.optional(),
        theme: CODE.optional(),
        query: z.string().min(1),
        guidance: z.string().default(''),
      })
    )
    .min(1),
});

export type TaxonomyFile = z.infer<typeof TAXONOMY_SCHEMA>;
export type PatternCatalogFile = z.infer<typeof PATTERN_CATALOG_SCHEMA>;
export type ProbeCatalogFile = z.infer<typeof PROBE_CATALOG_SCHEMA>;

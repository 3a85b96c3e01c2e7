import { z } from 'zod';
import {
  CLAIM_TYPES,
  CONFIDENCE_LEVELS,
  EVIDENCE_CODES,
  PARTNER_TYPES,
  QUANTIFICATION_CODES,
} from '../claims/types';

export const CLAIM_PARTNER_SCHEMA = z
  .object({
    name: z.string(),
    partner_type: z.enum(PARTNER_TYPES),
  })
  .strict();

// Taxonomy codes are plain strings here; they are checked against the loaded taxonomy
export const CLAIM_ITEM_SCHEMA = z
  .object({
    chunk_id: z.string(),
    quote: z.string(),
    domain: z.string(),
    theme: z.string().nullable(),
    claim_type: z.enum(CLAIM_TYPES),
    evidence: z.enum(EVIDENCE_CODES),
    quantification: z.enum(QUANTIFICATION_CODES),
    clinical_area: z.string().nullable(),
    value: z.number().nullable(),
    confidence: z.enum(CONFIDENCE_LEVELS),
    partners: z.array(CLAIM_PARTNER_SCHEMA),
  })
  .strict();

export const EXTRACTION_STATUSES = ['claims_found', 'no_claim_found'] as const;

/** Advertised to the provider as the structured-output schema. */
export const CLAIM_RESPONSE_SCHEMA = z
  .object({
    status: z.enum(EXTRACTION_STATUSES),
    claims: z.array(CLAIM_ITEM_SCHEMA),
  })
  .strict();

/** Envelope check; items are validated one by one so a bad item never sinks the rest. */
export const CLAIM_ENVELOPE_SCHEMA = z.object({
  status: z.enum(EXTRACTION_STATUSES),
  claims: z.array(z.unknown()),
});

export const CLAIM_RESPONSE_SCHEMA_NAME = 'claimtrace_claims';

export type ClaimItem = z.infer<typeof CLAIM_ITEM_SCHEMA>;
export type ClaimEnvelope = z.infer<typeof CLAIM_ENVELOPE_SCHEMA>;

import { z } from 'zod';
import { DOCUMENT_TYPES } from '../claims/types';

const DOCUMENT_ID = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9._-]+$/, 'Document ids may only contain letters, digits, ".", "_" and "-"');

export const MANIFEST_ENTRY_SCHEMA = z
  .object({
    // A file path or a glob; relative to the manifest
    path: z.string().min(1),
    id: DOCUMENT_ID.optional(),
    state: z.string().min(1),
    organization: z.string().min(1).nullable().default(null),
    year: z.number().int().min(1900).max(2100).nullable().default(null),
    documentType: z.enum(DOCUMENT_TYPES).default('other'),
  })
  .strict();

export const MANIFEST_SCHEMA = z
  .object({
    documents: z.array(MANIFEST_ENTRY_SCHEMA).min(1),
    exclude: z.array(z.string()).default([]),
  })
  .strict();

export type ManifestEntry = z.infer<typeof MANIFEST_ENTRY_SCHEMA>;
export type Manifest = z.infer<typeof MANIFEST_SCHEMA>;

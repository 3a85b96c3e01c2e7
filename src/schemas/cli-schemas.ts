import { z } from 'zod';

const OPTIONAL_POSITIVE_INT = z.coerce.number().int().positive().optional();

// Options shared by every command that reads the configuration
const COMMON_OPTIONS_SCHEMA = z.object({
  config: z.string().optional(),
  manifest: z.string().optional(),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

// CLI options schema for the extract command
export const EXTRACT_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  output: z.string().optional(),
  patternOnly: z.boolean().default(false),
  // commander turns --no-cache into cache: false
  cache: z.boolean().default(true),
  concurrency: OPTIONAL_POSITIVE_INT,
  showPrompt: z.boolean().default(false),
  showPromptTrunc: z.boolean().default(false),
  debugJson: z.boolean().default(false),
});

// Exhibits command options schema
export const EXHIBITS_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  claims: z.string().optional(),
  output: z.string().optional(),
});

// Validate command options schema
export const VALIDATE_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA;

// Inferred types
export type ExtractOptions = z.infer<typeof EXTRACT_OPTIONS_SCHEMA>;
export type ExhibitsOptions = z.infer<typeof EXHIBITS_OPTIONS_SCHEMA>;
export type ValidateOptions = z.infer<typeof VALIDATE_OPTIONS_SCHEMA>;

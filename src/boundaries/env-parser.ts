import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ProviderType } from '../providers/provider-factory';
import { ValidationError, handleUnknownError } from '../errors/index';

const KEY_PREFIX: Record<ProviderType, string> = {
  [ProviderType.Anthropic]: 'ANTHROPIC_',
  [ProviderType.OpenAI]: 'OPENAI_',
  [ProviderType.Gemini]: 'GEMINI_',
};

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid environment variables: ${formatProviderValidationError(e, env)}`, e);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`, e);
  }
}

function providerOf(env: unknown): ProviderType | undefined {
  if (typeof env !== 'object' || env === null || !('LLM_PROVIDER' in env)) return ProviderType.OpenAI;
  const value = env.LLM_PROVIDER;
  return Object.values(ProviderType).find((type) => type === value);
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;

  if (issues.some((issue) => issue.code === 'invalid_union_discriminator')) {
    const received = typeof env === 'object' && env !== null && 'LLM_PROVIDER' in env ? String(env.LLM_PROVIDER) : 'undefined';
    return `LLM_PROVIDER must be one of ${Object.values(ProviderType).map((t) => `'${t}'`).join(', ')}. Received: ${received}`;
  }

  const provider = providerOf(env);
  const missingFields = issues
    .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));

  if (provider && missingFields.length > 0) {
    const prefix = KEY_PREFIX[provider];
    const fields = missingFields.filter((field) => field.startsWith(prefix));
    if (fields.length > 0) {
      return `Missing required environment variables: ${fields.join(', ')}. When using LLM_PROVIDER=${provider}, ensure ${prefix}API_KEY is set.`;
    }
  }

  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

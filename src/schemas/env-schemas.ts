import { z } from 'zod';
import { ProviderType } from '../providers/provider-factory';
import { GeminiDefaultConfig } from '../providers/gemini-provider';
import { OpenAIDefaultConfig } from '../providers/openai-provider';
import { AnthropicDefaultConfig } from '../providers/anthropic-provider';

// Embedding credentials (OPENAI_API_KEY, OPENAI_EMBEDDING_MODEL) are read by createEmbeddingProvider
const ANTHROPIC_CONFIG_SCHEMA = z.object({
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().default(AnthropicDefaultConfig.model),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(AnthropicDefaultConfig.maxTokens),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().default(OpenAIDefaultConfig.model),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

const GEMINI_CONFIG_SCHEMA = z.object({
  GEMINI_API_KEY: z.string().min(1),
  GEMINI_MODEL: z.string().default(GeminiDefaultConfig.model),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

export const ENV_SCHEMA = z.discriminatedUnion('LLM_PROVIDER', [
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Anthropic) }).merge(ANTHROPIC_CONFIG_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.OpenAI) }).merge(OPENAI_CONFIG_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Gemini) }).merge(GEMINI_CONFIG_SCHEMA),
]);

// LLM_PROVIDER defaults to openai when unset
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess((data: unknown) => {
  if (typeof data === 'object' && data !== null && !('LLM_PROVIDER' in data)) {
    return { ...data, LLM_PROVIDER: ProviderType.OpenAI };
  }
  return data;
}, ENV_SCHEMA);

export type EnvConfig = z.infer<typeof ENV_SCHEMA>;

import type { LLMProvider } from './llm-provider';
import { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import { GeminiProvider, type GeminiConfig } from './gemini-provider';
import { HashingEmbeddingProvider, OpenAIEmbeddingProvider, type EmbeddingProvider } from './embedding-provider';
import type { RequestBuilder } from './request-builder';
import type { DebugOptions } from './debug-output';
import type { EnvConfig } from '../schemas/env-schemas';
import { ConfigError } from '../errors/index';

export interface ProviderOptions extends DebugOptions {
  /** Forces temperature 0 regardless of the environment. */
  deterministic?: boolean;
}

export enum ProviderType {
  Anthropic = 'anthropic',
  OpenAI = 'openai',
  Gemini = 'gemini',
}

export enum EmbeddingType {
  Hashing = 'hashing',
  OpenAI = 'openai',
}

function debugFlags(options: ProviderOptions): DebugOptions {
  return {
    ...(options.debug !== undefined && { debug: options.debug }),
    ...(options.showPrompt !== undefined && { showPrompt: options.showPrompt }),
    ...(options.showPromptTrunc !== undefined && { showPromptTrunc: options.showPromptTrunc }),
    ...(options.debugJson !== undefined && { debugJson: options.debugJson }),
  };
}

function resolveTemperature(configured: number | undefined, options: ProviderOptions): number | undefined {
  return options.deterministic ? 0 : configured;
}

/**
 * Creates the LLM provider selected by LLM_PROVIDER.
 * @param builder - Optional request builder (for dependency injection)
 */
export function createProvider(
  envConfig: EnvConfig,
  options: ProviderOptions = {},
  builder?: RequestBuilder
): LLMProvider {
  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.Anthropic: {
      const temperature = resolveTemperature(envConfig.ANTHROPIC_TEMPERATURE, options);
      const anthropicConfig: AnthropicConfig = {
        apiKey: envConfig.ANTHROPIC_API_KEY,
        model: envConfig.ANTHROPIC_MODEL,
        maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
        ...(temperature !== undefined && { temperature }),
        ...debugFlags(options),
      };
      return new AnthropicProvider(anthropicConfig, builder);
    }

    case ProviderType.OpenAI: {
      const temperature = resolveTemperature(envConfig.OPENAI_TEMPERATURE, options);
      const openaiConfig: OpenAIConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        model: envConfig.OPENAI_MODEL,
        ...(temperature !== undefined && { temperature }),
        ...debugFlags(options),
      };
      return new OpenAIProvider(openaiConfig, builder);
    }

    case ProviderType.Gemini: {
      const temperature = resolveTemperature(envConfig.GEMINI_TEMPERATURE, options);
      const geminiConfig: GeminiConfig = {
        apiKey: envConfig.GEMINI_API_KEY,
        model: envConfig.GEMINI_MODEL,
        ...(temperature !== undefined && { temperature }),
        ...debugFlags(options),
      };
      return new GeminiProvider(geminiConfig, builder);
    }
  }
}

/**
 * Creates the embedder for the vector index. The hashing embedder needs no
 * credentials; the OpenAI embedder needs OPENAI_API_KEY whatever LLM_PROVIDER is.
 */
export function createEmbeddingProvider(
  type: EmbeddingType,
  env: Record<string, string | undefined> = process.env
): EmbeddingProvider {
  switch (type) {
    case EmbeddingType.Hashing:
      return new HashingEmbeddingProvider();
    case EmbeddingType.OpenAI: {
      const apiKey = env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigError('Embedding=openai requires OPENAI_API_KEY to be set');
      }
      return new OpenAIEmbeddingProvider({
        apiKey,
        ...(env.OPENAI_EMBEDDING_MODEL && { model: env.OPENAI_EMBEDDING_MODEL }),
      });
    }
  }
}

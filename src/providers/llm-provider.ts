import type { TokenUsage } from '../types/token-usage';

export interface LLMResult<T> {
  data: T;
  usage?: TokenUsage;
}

export interface StructuredSchema {
  name: string;
  schema: Record<string, unknown>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface LLMProvider {
  /** Provider and model, e.g. `openai:gpt-4o`; part of every cache key. */
  readonly id: string;
  /** Returns the parsed JSON payload; callers validate it against their own schema. */
  runPromptStructured(
    content: string,
    promptText: string,
    schema: StructuredSchema,
    options?: RequestOptions
  ): Promise<LLMResult<unknown>>;
}

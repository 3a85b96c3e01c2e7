import OpenAI from 'openai';
import type { LLMProvider, LLMResult, RequestOptions, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { printRequest, printResponse, type DebugOptions } from './debug-output';
import { OPENAI_RESPONSE_SCHEMA, type OpenAIResponse } from '../schemas/provider-responses';
import { ValidationError, handleUnknownError } from '../errors/index';
import { APIResponseError, ProviderRequestError, isTransientStatus } from '../errors/provider-errors';

export interface OpenAIConfig extends DebugOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

export const OpenAIDefaultConfig = {
  model: 'gpt-4o',
  temperature: 0.2,
};

export class OpenAIProvider implements LLMProvider {
  readonly id: string;
  private client: OpenAI;
  private config: OpenAIConfig & { model: string };
  private builder: RequestBuilder;

  constructor(config: OpenAIConfig, builder?: RequestBuilder) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.config = {
      ...config,
      model: config.model ?? OpenAIDefaultConfig.model,
      temperature: config.temperature ?? OpenAIDefaultConfig.temperature,
    };
    this.id = `openai:${this.config.model}`;
    this.builder = builder ?? new DefaultRequestBuilder();
  }

  private validateResponse(response: unknown): OpenAIResponse {
    const result = OPENAI_RESPONSE_SCHEMA.safeParse(response);
    if (!result.success) {
      throw new APIResponseError(
        `Invalid OpenAI API response structure: ${result.error.message}`,
        response,
        result.error
      );
    }
    return result.data;
  }

  async runPromptStructured(
    content: string,
    promptText: string,
    schema: StructuredSchema,
    options: RequestOptions = {}
  ): Promise<LLMResult<unknown>> {
    const systemPrompt = this.builder.buildPromptBodyForStructured(promptText);

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.config.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: `Input:\n\n${content}` },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: schema.name,
          schema: schema.schema,
        },
      },
    };

    if (this.config.temperature !== undefined) {
      params.temperature = this.config.temperature;
    }

    printRequest(
      'OpenAI',
      { model: this.config.model, temperature: this.config.temperature },
      systemPrompt,
      content,
      this.config
    );

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(
        params,
        options.signal ? { signal: options.signal } : undefined
      );
    } catch (e: unknown) {
      // Check more specific errors first
      if (e instanceof OpenAI.AuthenticationError) {
        throw new ProviderRequestError(`OpenAI authentication failed: ${e.message}`, false, e.status);
      }
      if (e instanceof OpenAI.RateLimitError) {
        throw new ProviderRequestError(`OpenAI rate limit exceeded: ${e.message}`, true, e.status);
      }
      if (e instanceof OpenAI.APIError) {
        // No status means the request never got an HTTP answer (connection or timeout)
        const retryable = e.status === undefined || isTransientStatus(e.status);
        throw new ProviderRequestError(`OpenAI API error (${e.status ?? 'network'}): ${e.message}`, retryable, e.status);
      }

      const err = handleUnknownError(e, 'OpenAI API call');
      throw new ProviderRequestError(`OpenAI API call failed: ${err.message}`, false);
    }

    const validatedResponse = this.validateResponse(rawResponse);
    const firstChoice = validatedResponse.choices[0];
    const usage = validatedResponse.usage;

    printResponse(
      {
        usage,
        finish_reason: firstChoice?.finish_reason,
      },
      rawResponse,
      this.config
    );

    if (!firstChoice) {
      throw new APIResponseError('Empty response from OpenAI API (no choices).', rawResponse);
    }

    const responseText = firstChoice.message.content?.trim();
    if (!responseText) {
      const refusal = firstChoice.message.refusal;
      throw new APIResponseError(
        refusal ? `OpenAI refused the request: ${refusal}` : 'Empty response from OpenAI API (no content).',
        rawResponse
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(responseText);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'JSON parsing');
      const preview = responseText.slice(0, 200);
      throw new ValidationError(
        `Failed to parse structured JSON response: ${err.message}. Preview: ${preview}${responseText.length > 200 ? ' ...' : ''}`,
        e
      );
    }

    return {
      data,
      ...(usage && { usage: { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens } }),
    };
  }
}

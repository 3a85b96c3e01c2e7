import Anthropic from '@anthropic-ai/sdk';
import type { LLMProvider, LLMResult, RequestOptions, StructuredSchema } from './llm-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { printRequest, printResponse, type DebugOptions } from './debug-output';
import {
  ANTHROPIC_RESPONSE_SCHEMA,
  type AnthropicResponse,
  type AnthropicToolUseBlock,
  isTextBlock,
  isToolUseBlock,
} from '../schemas/provider-responses';
import { handleUnknownError } from '../errors/index';
import { APIResponseError, ProviderRequestError, isTransientStatus } from '../errors/provider-errors';

export interface AnthropicConfig extends DebugOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export const AnthropicDefaultConfig = {
  model: 'claude-3-5-sonnet-20241022',
  maxTokens: 4096,
  temperature: 0.2,
};

export class AnthropicProvider implements LLMProvider {
  readonly id: string;
  private client: Anthropic;
  private config: AnthropicConfig & { model: string; maxTokens: number };
  private builder: RequestBuilder;

  constructor(config: AnthropicConfig, builder?: RequestBuilder) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 2,
    });
    this.config = {
      ...config,
      model: config.model ?? AnthropicDefaultConfig.model,
      maxTokens: config.maxTokens ?? AnthropicDefaultConfig.maxTokens,
      temperature: config.temperature ?? AnthropicDefaultConfig.temperature,
    };
    this.id = `anthropic:${this.config.model}`;
    this.builder = builder ?? new DefaultRequestBuilder();
  }

  private validateResponse(response: unknown): AnthropicResponse {
    const result = ANTHROPIC_RESPONSE_SCHEMA.safeParse(response);
    if (!result.success) {
      throw new APIResponseError(
        `Invalid Anthropic API response structure: ${result.error.message}`,
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

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.config.model,
      system: systemPrompt,
      messages: [
        {
          role: 'user',
          content: `Input:\n\n${content}`,
        },
      ],
      max_tokens: this.config.maxTokens,
      tools: [this.toToolSchema(schema)],
      tool_choice: { type: 'tool', name: schema.name },
      ...(this.config.temperature !== undefined && { temperature: this.config.temperature }),
    };

    printRequest(
      'Anthropic',
      { model: this.config.model, maxTokens: this.config.maxTokens, temperature: this.config.temperature },
      systemPrompt,
      content,
      this.config
    );

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(
        params,
        options.signal ? { signal: options.signal } : undefined
      );
    } catch (e: unknown) {
      if (e instanceof Anthropic.AuthenticationError) {
        throw new ProviderRequestError(`Anthropic authentication failed: ${e.message}`, false, e.status);
      }
      if (e instanceof Anthropic.RateLimitError) {
        throw new ProviderRequestError(`Anthropic rate limit exceeded: ${e.message}`, true, e.status);
      }
      if (e instanceof Anthropic.APIError) {
        const retryable = e.status === undefined || isTransientStatus(e.status);
        throw new ProviderRequestError(`Anthropic API error (${e.status ?? 'network'}): ${e.message}`, retryable, e.status);
      }

      const err = handleUnknownError(e, 'Anthropic API call');
      throw new ProviderRequestError(`Anthropic API call failed: ${err.message}`, false);
    }

    const validatedResponse = this.validateResponse(rawResponse);
    printResponse(
      { usage: validatedResponse.usage, stop_reason: validatedResponse.stop_reason },
      rawResponse,
      this.config
    );

    return {
      data: this.extractToolInput(validatedResponse, schema.name),
      usage: {
        inputTokens: validatedResponse.usage.input_tokens,
        outputTokens: validatedResponse.usage.output_tokens,
      },
    };
  }

  private toToolSchema(schema: StructuredSchema): Anthropic.Messages.Tool {
    return {
      name: schema.name,
      description: `Submit ${schema.name} results`,
      input_schema: {
        ...schema.schema,
        type: 'object',
      },
    };
  }

  private extractToolInput(response: AnthropicResponse, expectedToolName: string): Record<string, unknown> {
    const blocks = response.content;
    if (blocks.length === 0) {
      throw new APIResponseError('Empty response from Anthropic API (no content blocks).', response);
    }

    const toolBlock = blocks.find(
      (block): block is AnthropicToolUseBlock => isToolUseBlock(block) && block.name === expectedToolName
    );

    if (!toolBlock) {
      const toolNames = blocks.filter(isToolUseBlock).map((block) => block.name);
      if (toolNames.length > 0) {
        throw new APIResponseError(
          `Expected tool call '${expectedToolName}' but received: ${toolNames.join(', ')}`,
          response
        );
      }
      const text = blocks.filter(isTextBlock)[0]?.text;
      if (text !== undefined) {
        const preview = text.slice(0, 200);
        throw new APIResponseError(
          `No tool call received for ${expectedToolName}. Response contains text instead: ${preview}${text.length > 200 ? '...' : ''}`,
          response
        );
      }
      throw new APIResponseError(`No tool call received for ${expectedToolName}.`, response);
    }

    const input = toolBlock.input;
    if (!isPlainObject(input)) {
      throw new APIResponseError(
        `Tool call for ${expectedToolName} returned invalid input type: ${input === null ? 'null' : typeof input}`,
        response
      );
    }
    return input;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

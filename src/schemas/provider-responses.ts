import { z } from 'zod';

// OpenAI chat completion (structured output)
export const OPENAI_CHOICE_SCHEMA = z.object({
  message: z.object({
    content: z.string().nullable(),
    refusal: z.string().nullable().optional(),
  }),
  finish_reason: z.string(),
});

export const OPENAI_RESPONSE_SCHEMA = z.object({
  model: z.string().optional(),
  choices: z.array(OPENAI_CHOICE_SCHEMA).min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

// OpenAI embeddings
export const OPENAI_EMBEDDING_RESPONSE_SCHEMA = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
});

// Anthropic messages (structured output through a forced tool call)
export const ANTHROPIC_TEXT_BLOCK_SCHEMA = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ANTHROPIC_TOOL_USE_BLOCK_SCHEMA = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.unknown(),
});

export const ANTHROPIC_RESPONSE_SCHEMA = z.object({
  id: z.string(),
  type: z.literal('message'),
  role: z.literal('assistant'),
  content: z.array(z.discriminatedUnion('type', [ANTHROPIC_TEXT_BLOCK_SCHEMA, ANTHROPIC_TOOL_USE_BLOCK_SCHEMA])),
  model: z.string(),
  stop_reason: z.enum(['max_tokens', 'end_turn', 'stop_sequence', 'tool_use']).nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

export type OpenAIResponse = z.infer<typeof OPENAI_RESPONSE_SCHEMA>;
export type OpenAIEmbeddingResponse = z.infer<typeof OPENAI_EMBEDDING_RESPONSE_SCHEMA>;
export type AnthropicResponse = z.infer<typeof ANTHROPIC_RESPONSE_SCHEMA>;
export type AnthropicContentBlock = AnthropicResponse['content'][number];
export type AnthropicToolUseBlock = z.infer<typeof ANTHROPIC_TOOL_USE_BLOCK_SCHEMA>;

export function isToolUseBlock(block: AnthropicContentBlock): block is AnthropicToolUseBlock {
  return block.type === 'tool_use';
}

export function isTextBlock(block: AnthropicContentBlock): block is z.infer<typeof ANTHROPIC_TEXT_BLOCK_SCHEMA> {
  return block.type === 'text';
}


import { z } from 'zod';

export const ANTHROPIC_TEXT_BLOCK_SCHEMA = z.object({
  type: z.literal('text'),
  text: z.string(),
});

// Only text blocks are read; other block kinds pass through untouched.
export const ANTHROPIC_CONTENT_BLOCK_SCHEMA = z.union([
  ANTHROPIC_TEXT_BLOCK_SCHEMA,
  z.object({ type: z.string() }).passthrough(),
]);

export const ANTHROPIC_USAGE_SCHEMA = z.object({
  input_tokens: z.number(),
  output_tokens: z.number(),
});

export const ANTHROPIC_MESSAGE_SCHEMA = z.object({
  content: z.array(ANTHROPIC_CONTENT_BLOCK_SCHEMA),
  stop_reason: z.string().nullable().optional(),
  usage: ANTHROPIC_USAGE_SCHEMA.optional(),
});

export const CHAT_COMPLETION_SCHEMA = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  // Perplexity lists the URLs its answer cites, in marker order
  citations: z.array(z.string()).optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

export type AnthropicTextBlock = z.infer<typeof ANTHROPIC_TEXT_BLOCK_SCHEMA>;
export type AnthropicContentBlock = z.infer<typeof ANTHROPIC_CONTENT_BLOCK_SCHEMA>;
export type AnthropicMessage = z.infer<typeof ANTHROPIC_MESSAGE_SCHEMA>;
export type ChatCompletion = z.infer<typeof CHAT_COMPLETION_SCHEMA>;

export function isTextBlock(block: AnthropicContentBlock): block is AnthropicTextBlock {
  return block.type === 'text' && 'text' in block && typeof block.text === 'string';
}

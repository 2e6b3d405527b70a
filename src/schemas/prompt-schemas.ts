import { z } from 'zod';

export const PROMPT_NAMES = [
  'deck-analysis',
  'company-research',
  'section-research',
  'section-draft',
  'enrich-socials',
  'enrich-links',
  'cite-section',
  'quality-review',
] as const;

export const PROMPT_NAME_SCHEMA = z.enum(PROMPT_NAMES);

// Prompt metadata schema for YAML frontmatter
export const PROMPT_META_SCHEMA = z.object({
  id: PROMPT_NAME_SCHEMA,
  system: z.string().min(1),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(1).optional(),
});

// Complete prompt file schema
export const PROMPT_FILE_SCHEMA = z.object({
  fullPath: z.string(),
  meta: PROMPT_META_SCHEMA,
  body: z.string().min(1),
});

// Inferred types
export type PromptName = z.infer<typeof PROMPT_NAME_SCHEMA>;
export type PromptMeta = z.infer<typeof PROMPT_META_SCHEMA>;
export type PromptFile = z.infer<typeof PROMPT_FILE_SCHEMA>;

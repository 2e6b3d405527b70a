import { z } from 'zod';
import { STRICTNESS_SCHEMA } from './fact-check-schemas';

export const ANTHROPIC_DEFAULTS = {
  model: 'claude-3-7-sonnet-latest',
  maxTokens: 8192,
};

export const PERPLEXITY_DEFAULTS = {
  model: 'sonar-pro',
  baseURL: 'https://api.perplexity.ai',
};

// Generalist model, required for every generating command
const ANTHROPIC_CONFIG_SCHEMA = z.object({
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().min(1).default(ANTHROPIC_DEFAULTS.model),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(ANTHROPIC_DEFAULTS.maxTokens),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

// Web-search model; stages fall back to the generalist without it
const PERPLEXITY_CONFIG_SCHEMA = z.object({
  PERPLEXITY_API_KEY: z.string().min(1).optional(),
  PERPLEXITY_MODEL: z.string().min(1).default(PERPLEXITY_DEFAULTS.model),
});

export const ENV_SCHEMA = ANTHROPIC_CONFIG_SCHEMA.merge(PERPLEXITY_CONFIG_SCHEMA).extend({
  FACT_CHECK_STRICTNESS: STRICTNESS_SCHEMA.optional(),
});

// Empty strings in .env files mean "unset"
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess((data: unknown) => {
  if (typeof data !== 'object' || data === null) return data;
  return Object.fromEntries(Object.entries(data).filter(([, value]) => value !== ''));
}, ENV_SCHEMA);

export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
export type AnthropicEnvConfig = z.infer<typeof ANTHROPIC_CONFIG_SCHEMA>;
export type PerplexityEnvConfig = z.infer<typeof PERPLEXITY_CONFIG_SCHEMA>;

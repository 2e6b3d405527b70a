import type { EnvConfig } from '../schemas/env-schemas';
import { warn } from '../output/logger';
import { AnthropicGenerator, type AnthropicConfig } from './anthropic-provider';
import { PerplexityGenerator } from './perplexity-provider';
import { RetryingGenerator } from './retrying-generator';
import type { TextGenerator } from './text-generator';
import type { RetryPolicy } from '../retry/with-retry';

export interface Generators {
  /** Generalist reasoning model. */
  writer: TextGenerator;
  /** Web-search model; the writer when no search key is configured. */
  search: TextGenerator;
  /** False when `search` is the writer standing in. */
  hasWebSearch: boolean;
}

/**
 * Creates both generators from validated environment configuration, each
 * wrapped in the retry policy.
 */
export function createGenerators(envConfig: EnvConfig, policy: Partial<RetryPolicy> = {}): Generators {
  const anthropicConfig: AnthropicConfig = {
    apiKey: envConfig.ANTHROPIC_API_KEY,
    model: envConfig.ANTHROPIC_MODEL,
    maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
    ...(envConfig.ANTHROPIC_TEMPERATURE !== undefined && { temperature: envConfig.ANTHROPIC_TEMPERATURE }),
  };
  const writer = new RetryingGenerator(new AnthropicGenerator(anthropicConfig), policy);

  if (!envConfig.PERPLEXITY_API_KEY) {
    warn('[memoforge] PERPLEXITY_API_KEY not set; research runs without web search');
    return { writer, search: writer, hasWebSearch: false };
  }

  const search = new RetryingGenerator(
    new PerplexityGenerator({ apiKey: envConfig.PERPLEXITY_API_KEY, model: envConfig.PERPLEXITY_MODEL }),
    policy
  );
  return { writer, search, hasWebSearch: true };
}

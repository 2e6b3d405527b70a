import OpenAI from 'openai';
import { z } from 'zod';
import { CITATIONS_HEADING } from '../footnotes';
import { PERPLEXITY_DEFAULTS } from '../schemas/env-schemas';
import { CHAT_COMPLETION_SCHEMA, type ChatCompletion } from '../schemas/provider-responses';
import { ProviderError, classifyProviderError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';
import type { GenerationRequest, TextGenerator } from './text-generator';

export interface PerplexityConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
}

const PROVIDER = 'perplexity';
const BARE_REFERENCE_RE = /(?<!\^)\[(\d+)\](?![(:])/g;

/**
 * Turns bare `[n]` references into footnote markers and lists the answer's
 * source URLs as definitions. Answers that already carry a citations block
 * are returned unchanged.
 */
export function attachSearchCitations(text: string, urls: readonly string[]): string {
  if (urls.length === 0 || text.includes(CITATIONS_HEADING)) return text;

  const body = text.replace(BARE_REFERENCE_RE, (match: string, n: string) => {
    const index = Number(n);
    return index >= 1 && index <= urls.length ? `[^${n}]` : match;
  });
  const definitions = urls.map((url, i) => `[^${i + 1}]: ${url}`).join('\n\n');
  return `${body.trimEnd()}\n\n${CITATIONS_HEADING}\n\n${definitions}\n`;
}

/**
 * Web-search-augmented generation through Perplexity's OpenAI-compatible
 * chat completions endpoint.
 */
export class PerplexityGenerator implements TextGenerator {
  readonly name = PROVIDER;
  private client: OpenAI;
  private model: string;

  constructor(config: PerplexityConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL ?? PERPLEXITY_DEFAULTS.baseURL,
      maxRetries: 0,
    });
    this.model = config.model ?? PERPLEXITY_DEFAULTS.model;
  }

  private validateResponse(response: unknown): ChatCompletion {
    try {
      return CHAT_COMPLETION_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new ProviderError(`Invalid Perplexity API response structure: ${e.message}`, PROVIDER);
      }
      const err = handleUnknownError(e, 'Perplexity response validation');
      throw new ProviderError(`Perplexity response validation failed: ${err.message}`, PROVIDER);
    }
  }

  async generate(request: GenerationRequest): Promise<string> {
    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
    };
    if (request.maxTokens !== undefined) params.max_tokens = request.maxTokens;
    if (request.temperature !== undefined) params.temperature = request.temperature;

    debug('[memoforge] Sending request to Perplexity:', { model: this.model });

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(params, request.signal ? { signal: request.signal } : undefined);
    } catch (e: unknown) {
      throw classifyProviderError(e, PROVIDER);
    }

    const response = this.validateResponse(rawResponse);
    const content = response.choices[0]?.message.content ?? '';
    if (content.trim().length === 0) {
      throw new ProviderError('Empty response from Perplexity API.', PROVIDER);
    }
    return attachSearchCitations(content, response.citations ?? []);
  }
}

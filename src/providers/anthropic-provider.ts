import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ANTHROPIC_DEFAULTS } from '../schemas/env-schemas';
import { ANTHROPIC_MESSAGE_SCHEMA, isTextBlock, type AnthropicMessage } from '../schemas/provider-responses';
import { ProviderError, classifyProviderError, handleUnknownError } from '../errors/index';
import { debug } from '../output/logger';
import type { GenerationRequest, TextGenerator } from './text-generator';

export interface AnthropicConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

const PROVIDER = 'anthropic';

export class AnthropicGenerator implements TextGenerator {
  readonly name = PROVIDER;
  private client: Anthropic;
  private model: string;
  private maxTokens: number;
  private temperature: number | undefined;

  constructor(config: AnthropicConfig) {
    // retries are owned by withRetry
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
    });
    this.model = config.model ?? ANTHROPIC_DEFAULTS.model;
    this.maxTokens = config.maxTokens ?? ANTHROPIC_DEFAULTS.maxTokens;
    this.temperature = config.temperature;
  }

  private validateResponse(response: unknown): AnthropicMessage {
    try {
      return ANTHROPIC_MESSAGE_SCHEMA.parse(response);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new ProviderError(`Invalid Anthropic API response structure: ${e.message}`, PROVIDER);
      }
      const err = handleUnknownError(e, 'Anthropic response validation');
      throw new ProviderError(`Anthropic response validation failed: ${err.message}`, PROVIDER);
    }
  }

  async generate(request: GenerationRequest): Promise<string> {
    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      system: request.systemPrompt,
      messages: [{ role: 'user', content: request.userPrompt }],
      max_tokens: request.maxTokens ?? this.maxTokens,
    };
    const temperature = request.temperature ?? this.temperature;
    if (temperature !== undefined) {
      params.temperature = temperature;
    }

    debug('[memoforge] Sending request to Anthropic:', {
      model: this.model,
      maxTokens: params.max_tokens,
      temperature,
    });

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.messages.create(params, request.signal ? { signal: request.signal } : undefined);
    } catch (e: unknown) {
      throw classifyProviderError(e, PROVIDER);
    }

    const response = this.validateResponse(rawResponse);
    if (response.usage) {
      debug('[memoforge] Anthropic usage:', response.usage, 'stop_reason:', response.stop_reason);
    }

    const text = response.content
      .filter(isTextBlock)
      .map((block) => block.text)
      .join('');
    if (text.trim().length === 0) {
      throw new ProviderError('Empty response from Anthropic API (no text content).', PROVIDER);
    }
    return text;
  }
}

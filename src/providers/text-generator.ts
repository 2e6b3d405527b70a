export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * A text-generation capability. Implementations fail with
 * `RateLimitedError`, `ServerOverloadedError`, `AuthError` or
 * `ProviderError`.
 */
export interface TextGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<string>;
}

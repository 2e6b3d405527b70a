import { withRetry, type RetryOptions, type RetryPolicy } from '../retry/with-retry';
import type { GenerationRequest, TextGenerator } from './text-generator';

/** Applies one retry policy to every call of the wrapped generator. */
export class RetryingGenerator implements TextGenerator {
  constructor(
    private readonly inner: TextGenerator,
    private readonly policy: Partial<RetryPolicy> = {},
    private readonly sleep?: RetryOptions['sleep']
  ) {}

  get name(): string {
    return this.inner.name;
  }

  generate(request: GenerationRequest): Promise<string> {
    const options: RetryOptions = { label: `${this.inner.name} generate` };
    if (request.signal) options.signal = request.signal;
    if (this.sleep) options.sleep = this.sleep;
    return withRetry(() => this.inner.generate(request), this.policy, options);
  }
}

import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid environment variables: ${formatEnvValidationError(e)}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}

function formatEnvValidationError(zodError: z.ZodError): string {
  const issues = zodError.issues;

  const missingFields = issues
    .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));

  if (missingFields.length > 0) {
    return `Missing required environment variables: ${missingFields.join(', ')}. Set ANTHROPIC_API_KEY in the environment or a .env file.`;
  }

  const fieldErrors = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  if (fieldErrors.length > 0) {
    return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
  }

  return zodError.message;
}

import { z } from 'zod';
import {
  CHECKPOINT_OPTIONS_SCHEMA,
  CONSOLIDATE_OPTIONS_SCHEMA,
  DOCUMENT_OPTIONS_SCHEMA,
  FACT_CHECK_OPTIONS_SCHEMA,
  GENERATE_OPTIONS_SCHEMA,
  type CheckpointOptions,
  type ConsolidateOptions,
  type DocumentOptions,
  type FactCheckOptions,
  type GenerateOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
  try {
    return schema.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid ${label} options: ${e.message}`);
    }
    const err = handleUnknownError(e, `${label} option parsing`);
    throw new ValidationError(`${label} option parsing failed: ${err.message}`);
  }
}

export function parseDocumentOptions(raw: unknown): DocumentOptions {
  return parseWith(DOCUMENT_OPTIONS_SCHEMA, raw, 'document');
}

export function parseGenerateOptions(raw: unknown): GenerateOptions {
  return parseWith(GENERATE_OPTIONS_SCHEMA, raw, 'generate');
}

export function parseCheckpointOptions(raw: unknown): CheckpointOptions {
  return parseWith(CHECKPOINT_OPTIONS_SCHEMA, raw, 'checkpoint');
}

export function parseFactCheckOptions(raw: unknown): FactCheckOptions {
  return parseWith(FACT_CHECK_OPTIONS_SCHEMA, raw, 'fact-check');
}

export function parseConsolidateOptions(raw: unknown): ConsolidateOptions {
  return parseWith(CONSOLIDATE_OPTIONS_SCHEMA, raw, 'consolidate');
}

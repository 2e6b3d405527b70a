import { z } from 'zod';
import { STRICTNESS_SCHEMA } from './fact-check-schemas';

// Options shared by every command that addresses one document
export const DOCUMENT_OPTIONS_SCHEMA = z.object({
  firm: z.string().min(1).optional(),
  deal: z.string().min(1).optional(),
  version: z.string().optional(),
  // expected company website, checked against research
  url: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
  config: z.string().optional(),
});

export const GENERATE_OPTIONS_SCHEMA = DOCUMENT_OPTIONS_SCHEMA.omit({ version: true }).extend({
  deck: z.string().optional(),
  description: z.string().optional(),
});

export const CHECKPOINT_OPTIONS_SCHEMA = DOCUMENT_OPTIONS_SCHEMA.extend({
  json: z.boolean().default(false),
});

export const FACT_CHECK_OPTIONS_SCHEMA = DOCUMENT_OPTIONS_SCHEMA.extend({
  strictness: STRICTNESS_SCHEMA.optional(),
  json: z.boolean().default(false),
  save: z.boolean().default(false),
});

export const CONSOLIDATE_OPTIONS_SCHEMA = z.object({
  output: z.string().optional(),
  dryRun: z.boolean().default(false),
  dedupe: z.boolean().default(false),
  backrefs: z.boolean().default(false),
});

// Inferred types
export type DocumentOptions = z.infer<typeof DOCUMENT_OPTIONS_SCHEMA>;
export type GenerateOptions = z.infer<typeof GENERATE_OPTIONS_SCHEMA>;
export type CheckpointOptions = z.infer<typeof CHECKPOINT_OPTIONS_SCHEMA>;
export type FactCheckOptions = z.infer<typeof FACT_CHECK_OPTIONS_SCHEMA>;
export type ConsolidateOptions = z.infer<typeof CONSOLIDATE_OPTIONS_SCHEMA>;

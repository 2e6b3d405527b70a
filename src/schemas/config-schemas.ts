import { z } from 'zod';
import { DEFAULT_CONCURRENCY, DEFAULT_QUALITY_THRESHOLD } from '../config/constants';
import { STRICTNESS_SCHEMA } from './fact-check-schemas';

const EVIDENCE_RATIO = z.coerce.number().min(0).max(1);

// Configuration file schema for .memoforge.ini validation
export const CONFIG_SCHEMA = z.object({
  configDir: z.string().min(1),
  outputRoot: z.string().min(1),
  ioRoot: z.string().min(1),
  dataRoot: z.string().min(1),
  concurrency: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
  outline: z.string().min(1).optional(),
  qualityThreshold: z.coerce.number().min(0).max(10).default(DEFAULT_QUALITY_THRESHOLD),
  factCheck: z
    .object({
      strictness: STRICTNESS_SCHEMA.optional(),
      highRisk: EVIDENCE_RATIO.default(0.5),
      mediumRisk: EVIDENCE_RATIO.default(0.4),
      namedEntity: EVIDENCE_RATIO.default(0.6),
    })
    .default({}),
  citations: z
    .object({
      backReferences: z
        .enum(['true', 'false'])
        .transform((v) => v === 'true')
        .or(z.boolean())
        .default(true),
    })
    .default({}),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
export type ConfigInput = z.input<typeof CONFIG_SCHEMA>;

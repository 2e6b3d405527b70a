import { z } from 'zod';
import { FACT_CHECK_REPORT_SCHEMA } from './fact-check-schemas';

// 0-deck-analysis.json
export const DECK_ANALYSIS_SCHEMA = z.object({
  companyName: z.string().optional(),
  summary: z.string(),
  highlights: z.array(z.string()).default([]),
  // section keyword -> screenshot paths
  screenshots: z.record(z.string(), z.array(z.string())).default({}),
});

// 1-research.json
export const RESEARCH_SCHEMA = z.object({
  company: z.object({
    name: z.string(),
    website: z.string().optional(),
    description: z.string().optional(),
  }),
  topics: z.record(z.string(), z.string()).default({}),
  sources: z.array(z.string()).default([]),
  raw: z.string().optional(),
});

export const CITATION_VALIDATION_SCHEMA = z.object({
  totalCitations: z.number().int().nonnegative(),
  validCitations: z.number().int().nonnegative(),
  issues: z.array(z.string()),
  warnings: z.array(z.string()),
});

export const QUALITY_VALIDATION_SCHEMA = z.object({
  score: z.number().min(0).max(10),
  feedback: z.string().default(''),
  strengths: z.array(z.string()).default([]),
  improvements: z.array(z.string()).default([]),
});

// 3-validation.json
export const VALIDATION_ARTIFACT_SCHEMA = z.object({
  citationValidation: CITATION_VALIDATION_SCHEMA.optional(),
  factCheck: FACT_CHECK_REPORT_SCHEMA.optional(),
  overallScore: z.number().min(0).max(10).optional(),
  quality: QUALITY_VALIDATION_SCHEMA.optional(),
});

export const RUN_STATUS_SCHEMA = z.enum(['complete', 'human_review']);

// state.json
export const STATE_SNAPSHOT_SCHEMA = z.object({
  companyName: z.string(),
  version: z.string(),
  status: RUN_STATUS_SCHEMA,
  overallScore: z.number().optional(),
  finalMemo: z.string().optional(),
  messages: z.array(z.string()).default([]),
  updatedAt: z.string(),
});

export type DeckAnalysis = z.infer<typeof DECK_ANALYSIS_SCHEMA>;
export type Research = z.infer<typeof RESEARCH_SCHEMA>;
export type CitationValidation = z.infer<typeof CITATION_VALIDATION_SCHEMA>;
export type QualityValidation = z.infer<typeof QUALITY_VALIDATION_SCHEMA>;
export type ValidationArtifact = z.infer<typeof VALIDATION_ARTIFACT_SCHEMA>;
export type RunStatus = z.infer<typeof RUN_STATUS_SCHEMA>;
export type StateSnapshot = z.infer<typeof STATE_SNAPSHOT_SCHEMA>;

import { z } from 'zod';

export const CLAIM_TYPE_SCHEMA = z.enum([
  'metric',
  'financial',
  'percentage',
  'growth',
  'date',
  'customer_name',
  'pricing',
  'valuation',
  'runway',
  'team_size',
  'funding_round',
]);

export const CONFIDENCE_SCHEMA = z.enum(['verified', 'unsourced', 'contradicts_source', 'suspicious']);
export const SEVERITY_SCHEMA = z.enum(['critical', 'high', 'medium', 'low']);
export const RECOMMENDED_ACTION_SCHEMA = z.enum(['accept', 'request_source', 'flag_for_review', 'remove']);
export const STRICTNESS_SCHEMA = z.enum(['low', 'medium', 'high']);

export const FACT_CHECK_RECORD_SCHEMA = z.object({
  claim: z.string(),
  claimType: CLAIM_TYPE_SCHEMA,
  hasCitation: z.boolean(),
  confidence: CONFIDENCE_SCHEMA,
  severity: SEVERITY_SCHEMA,
  recommendedAction: RECOMMENDED_ACTION_SCHEMA,
  reasoning: z.string(),
});

export const SECTION_FACT_CHECK_SCHEMA = z.object({
  section: z.string(),
  totalClaims: z.number().int().nonnegative(),
  verifiedClaims: z.number().int().nonnegative(),
  score: z.number().min(0).max(1),
  requiresRewrite: z.boolean(),
  flaggedClaims: z.array(FACT_CHECK_RECORD_SCHEMA),
  claims: z.array(FACT_CHECK_RECORD_SCHEMA),
});

export const ENTITY_MISMATCH_SCHEMA = z.object({
  expected: z.string(),
  found: z.string(),
});

export const FACT_CHECK_REPORT_SCHEMA = z.object({
  strictness: STRICTNESS_SCHEMA,
  overallScore: z.number().min(0).max(1),
  requiresRewrite: z.boolean(),
  totalClaims: z.number().int().nonnegative(),
  verifiedClaims: z.number().int().nonnegative(),
  criticalClaims: z.number().int().nonnegative(),
  entityMismatch: ENTITY_MISMATCH_SCHEMA.optional(),
  sections: z.array(SECTION_FACT_CHECK_SCHEMA),
});

export type ClaimType = z.infer<typeof CLAIM_TYPE_SCHEMA>;
export type Confidence = z.infer<typeof CONFIDENCE_SCHEMA>;
export type Severity = z.infer<typeof SEVERITY_SCHEMA>;
export type RecommendedAction = z.infer<typeof RECOMMENDED_ACTION_SCHEMA>;
export type Strictness = z.infer<typeof STRICTNESS_SCHEMA>;
export type FactCheckRecord = z.infer<typeof FACT_CHECK_RECORD_SCHEMA>;
export type SectionFactCheck = z.infer<typeof SECTION_FACT_CHECK_SCHEMA>;
export type EntityMismatch = z.infer<typeof ENTITY_MISMATCH_SCHEMA>;
export type FactCheckReport = z.infer<typeof FACT_CHECK_REPORT_SCHEMA>;

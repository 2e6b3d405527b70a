import type {
  EntityMismatch,
  FactCheckReport,
  SectionFactCheck,
  Strictness,
} from '../schemas/fact-check-schemas';
import { extractClaims } from './claims';
import { serializeCorpus, verifyClaim, type EvidenceThresholds } from './verifier';

export const STRICTNESS_THRESHOLDS: Record<Strictness, number> = {
  low: 0.4,
  medium: 0.6,
  high: 0.8,
};

export interface FactCheckOptions {
  strictness?: Strictness;
  thresholds?: EvidenceThresholds;
}

export interface SectionInput {
  name: string;
  content: string;
}

export function factCheckSection(
  name: string,
  content: string,
  corpus: string,
  options: FactCheckOptions = {}
): SectionFactCheck {
  const strictness = options.strictness ?? 'high';
  const claims = extractClaims(content).map((c) => verifyClaim(c, corpus, options.thresholds));

  const verifiedClaims = claims.filter((c) => c.hasCitation).length;
  const score = claims.length > 0 ? verifiedClaims / claims.length : 1.0;
  const flaggedClaims = claims.filter((c) => c.severity === 'critical');

  return {
    section: name,
    totalClaims: claims.length,
    verifiedClaims,
    score,
    // one critical claim outweighs any score
    requiresRewrite: flaggedClaims.length > 0 || score < STRICTNESS_THRESHOLDS[strictness],
    flaggedClaims,
    claims,
  };
}

/**
 * Compares the expected company URL with the one research found. A
 * substring match either way is accepted so that protocol and subdomain
 * differences do not count.
 */
export function detectEntityMismatch(expected: string | undefined, found: string | undefined): EntityMismatch | undefined {
  if (!expected || !found) return undefined;
  const a = expected.trim().toLowerCase();
  const b = found.trim().toLowerCase();
  if (a.length === 0 || b.length === 0 || a.includes(b) || b.includes(a)) return undefined;
  return { expected, found };
}

function researchWebsite(research: unknown): string | undefined {
  if (typeof research !== 'object' || research === null || !('company' in research)) return undefined;
  const company = research.company;
  if (typeof company !== 'object' || company === null || !('website' in company)) return undefined;
  return typeof company.website === 'string' ? company.website : undefined;
}

/**
 * Fact-checks every section against the research corpus. An entity mismatch
 * flags every section for rewrite and forces the overall score to zero.
 */
export function factCheckDocument(
  sections: SectionInput[],
  research: unknown,
  expectedUrl: string | undefined,
  options: FactCheckOptions = {}
): FactCheckReport {
  const strictness = options.strictness ?? 'high';
  const corpus = serializeCorpus(research);
  const entityMismatch = detectEntityMismatch(expectedUrl, researchWebsite(research));

  let results = sections.map((s) => factCheckSection(s.name, s.content, corpus, { ...options, strictness }));

  const totalClaims = results.reduce((sum, r) => sum + r.totalClaims, 0);
  const verifiedClaims = results.reduce((sum, r) => sum + r.verifiedClaims, 0);
  const criticalClaims = results.reduce((sum, r) => sum + r.flaggedClaims.length, 0);
  let overallScore = totalClaims > 0 ? verifiedClaims / totalClaims : 1.0;

  if (entityMismatch) {
    results = results.map((r) => ({ ...r, requiresRewrite: true }));
    overallScore = 0;
  }

  const report: FactCheckReport = {
    strictness,
    overallScore,
    requiresRewrite: results.some((r) => r.requiresRewrite),
    totalClaims,
    verifiedClaims,
    criticalClaims,
    sections: results,
  };
  if (entityMismatch) report.entityMismatch = entityMismatch;
  return report;
}


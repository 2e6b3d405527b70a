import type { ClaimType, FactCheckRecord } from '../schemas/fact-check-schemas';
import type { ExtractedClaim } from './claims';

/**
 * Minimum share of a claim's key terms that must appear in the research
 * corpus before an uncited claim counts as unsourced rather than suspicious.
 */
export interface EvidenceThresholds {
  highRisk: number;
  mediumRisk: number;
  namedEntity: number;
}

export const DEFAULT_EVIDENCE_THRESHOLDS: EvidenceThresholds = {
  highRisk: 0.5,
  mediumRisk: 0.4,
  namedEntity: 0.6,
};

const HIGH_RISK: ReadonlySet<ClaimType> = new Set<ClaimType>([
  'metric',
  'financial',
  'pricing',
  'valuation',
  'growth',
  'funding_round',
]);

const MEDIUM_RISK: ReadonlySet<ClaimType> = new Set<ClaimType>(['date', 'team_size', 'runway']);

const CITATION_MARKER_RE = /\[\^\w+\](?!:)/;
const NUMBER_RE = /\d[\d,]*/g;
const KEY_TERM_RE = /\b(?:\d+[\d,]*[KMB]?|\$[\d,]+[KMB]?|[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)\b/g;

export interface Evidence {
  /** Every number in the claim appears in the corpus (false when the claim has none). */
  numbersInResearch: boolean;
  /** Share of key terms found in the corpus, 0 when there are none. */
  ratio: number;
}

/** Lower-cased JSON of the research record, searched for claim terms. */
export function serializeCorpus(research: unknown): string {
  return research === undefined || research === null ? '' : JSON.stringify(research).toLowerCase();
}

export function measureEvidence(claim: string, corpus: string): Evidence {
  const withoutCommas = corpus.replace(/,/g, '');
  const numbers = claim.match(NUMBER_RE) ?? [];
  const numbersInResearch =
    numbers.length > 0 && numbers.every((n) => withoutCommas.includes(n.replace(/,/g, '')));

  const terms = claim.match(KEY_TERM_RE) ?? [];
  const found = terms.filter((t) => corpus.includes(t.toLowerCase())).length;
  return { numbersInResearch, ratio: terms.length > 0 ? found / terms.length : 0 };
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Classifies one claim: cited claims are verified; uncited claims are
 * unsourced when the corpus supports them and suspicious otherwise, with
 * severity by risk tier.
 */
export function verifyClaim(
  claim: ExtractedClaim,
  corpus: string,
  thresholds: EvidenceThresholds = DEFAULT_EVIDENCE_THRESHOLDS
): FactCheckRecord {
  const base = { claim: claim.text, claimType: claim.claimType };

  if (CITATION_MARKER_RE.test(claim.text)) {
    return {
      ...base,
      hasCitation: true,
      confidence: 'verified',
      severity: 'low',
      recommendedAction: 'accept',
      reasoning: 'Claim has inline citation to research source',
    };
  }

  const evidence = measureEvidence(claim.text, corpus);
  const uncited = { ...base, hasCitation: false };

  if (HIGH_RISK.has(claim.claimType)) {
    if (evidence.numbersInResearch && evidence.ratio > thresholds.highRisk) {
      return {
        ...uncited,
        confidence: 'unsourced',
        severity: 'high',
        recommendedAction: 'request_source',
        reasoning: `Specific ${claim.claimType} claim appears in research but lacks citation`,
      };
    }
    return {
      ...uncited,
      confidence: 'suspicious',
      severity: 'critical',
      recommendedAction: 'remove',
      reasoning: `Specific ${claim.claimType} claim with no citation and no evidence in research - likely hallucinated`,
    };
  }

  if (MEDIUM_RISK.has(claim.claimType)) {
    if (evidence.numbersInResearch && evidence.ratio > thresholds.mediumRisk) {
      return {
        ...uncited,
        confidence: 'unsourced',
        severity: 'medium',
        recommendedAction: 'request_source',
        reasoning: `${titleCase(claim.claimType)} claim appears in research but lacks citation`,
      };
    }
    return {
      ...uncited,
      confidence: 'suspicious',
      severity: 'high',
      recommendedAction: 'flag_for_review',
      reasoning: `${titleCase(claim.claimType)} claim not found in research data`,
    };
  }

  if (evidence.ratio > thresholds.namedEntity) {
    return {
      ...uncited,
      confidence: 'unsourced',
      severity: 'medium',
      recommendedAction: 'request_source',
      reasoning: 'Claim appears in research but lacks citation',
    };
  }
  return {
    ...uncited,
    confidence: 'suspicious',
    severity: 'high',
    recommendedAction: 'flag_for_review',
    reasoning: 'Claim not found in research data',
  };
}

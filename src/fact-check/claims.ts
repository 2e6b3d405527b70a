import { tokenizeDocument } from '../footnotes';
import type { ClaimType } from '../schemas/fact-check-schemas';

export type Specificity = 'high' | 'medium' | 'low';

export interface ExtractedClaim {
  text: string;
  claimType: ClaimType;
  specificity: Specificity;
}

/**
 * Claim shapes, tried in order; the first that matches a sentence decides
 * its type.
 */
export const CLAIM_PATTERNS: ReadonlyArray<readonly [ClaimType, RegExp]> = [
  ['metric', /\b(\d+[KMB]?|[\d,]+)\s+(ARR|MRR|customers?|users?|revenue|MAU|DAU|employees?)/i],
  ['financial', /\$[\d,]+[KMB]?/i],
  // growth phrasing after the figure is left to the growth pattern
  ['percentage', /\b\d+(\.\d+)?%(?!\s+(MoM|YoY|month[- ]over[- ]month|year[- ]over[- ]year|CAGR|growth))/i],
  ['growth', /\b\d+%\s+(MoM|YoY|month[- ]over[- ]month|year[- ]over[- ]year|CAGR|growth)/i],
  ['date', /\b(20\d{2}|Q[1-4]\s+20\d{2}|Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+20\d{2}\b/i],
  ['customer_name', /\b(customers? include|clients? include|partnerships? with|backed by|investors? include)\s+[A-Z][a-z]+/i],
  ['pricing', /\$[\d,]+\s*(per|\/)\s*(month|user|seat|year|license|annually)/i],
  ['valuation', /\$([\d.]+[KMB])\s+(valuation|pre-money|post-money)/i],
  ['runway', /\b\d+\s+months?\s+(runway|of runway|burn)/i],
  ['team_size', /\b\d+\s+(person|people|employees?|team members?)/i],
  ['funding_round', /\$([\d.]+[KMB])\s+(seed|Series [A-Z]|round)/i],
];

export const UNAVAILABLE_PHRASES = [
  'data not available',
  'not publicly available',
  'not disclosed',
  'not publicly disclosed',
  'information not available',
  'data unavailable',
];

function specificityOf(sentence: string): Specificity {
  if (sentence.includes('$') || sentence.includes('%')) return 'high';
  return /\d/.test(sentence) ? 'medium' : 'low';
}

/** Section prose without citations blocks and heading lines. */
export function claimText(content: string): string {
  return tokenizeDocument(content)
    .map((s) => (s.kind === 'prose' ? s.text : ''))
    .join('')
    .split('\n')
    .filter((line) => !/^\s*#/.test(line))
    .join('\n');
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Extracts sentence-level factual claims from a section. Sentences that say
 * the data is unavailable are skipped; each remaining sentence yields at
 * most one claim.
 */
export function extractClaims(content: string): ExtractedClaim[] {
  const claims: ExtractedClaim[] = [];

  for (const sentence of splitSentences(claimText(content))) {
    const lower = sentence.toLowerCase();
    if (UNAVAILABLE_PHRASES.some((phrase) => lower.includes(phrase))) continue;

    const match = CLAIM_PATTERNS.find(([, pattern]) => pattern.test(sentence));
    if (match) {
      claims.push({ text: sentence, claimType: match[0], specificity: specificityOf(sentence) });
    }
  }

  return claims;
}

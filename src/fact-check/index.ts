export * from './claims';
export * from './verifier';
export { STRICTNESS_THRESHOLDS, detectEntityMismatch, factCheckDocument, factCheckSection } from './scorer';
export type { FactCheckOptions, SectionInput } from './scorer';

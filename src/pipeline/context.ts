import type { LoadedDeal } from '../boundaries/deal-loader';
import type { EvidenceThresholds } from '../fact-check/verifier';
import type { Generators } from '../providers/provider-factory';
import type { DocumentRepository } from '../repository/types';
import type { Outline } from '../schemas/outline-schemas';
import type { Strictness } from '../schemas/fact-check-schemas';

export interface PipelineSettings {
  concurrency: number;
  strictness: Strictness;
  evidence: EvidenceThresholds;
  /** Overall scores below this halt the run for human review. */
  qualityThreshold: number;
  backReferences: boolean;
}

/**
 * Everything a stage handler may touch besides the state it updates.
 */
export interface StageContext {
  repo: DocumentRepository;
  generators: Generators;
  outline: Outline;
  settings: PipelineSettings;
  deal?: LoadedDeal;
  /** Pre-extracted pitch deck text, when one was supplied. */
  deckText?: string;
  signal?: AbortSignal;
  now: () => Date;
}

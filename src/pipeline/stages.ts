/** Pipeline stages in execution order. */
export const PIPELINE_STAGES = [
  'research',
  'draft',
  'enrich_trademark',
  'enrich_socials',
  'enrich_links',
  'enrich_visualizations',
  'cite',
  'toc',
  'validate_citations',
  'fact_check',
  'validate',
  'finalize',
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/**
 * Where a document stands: the next stage to run, `start` when nothing has
 * been produced, or `complete` once the memo is finalized.
 */
export type Checkpoint = PipelineStage | 'start' | 'complete';

export const CHECKPOINTS: readonly Checkpoint[] = ['start', ...PIPELINE_STAGES, 'complete'];

/** Stages to run when resuming at a checkpoint, in order. */
export function stagesFrom(checkpoint: Checkpoint): PipelineStage[] {
  if (checkpoint === 'complete') return [];
  if (checkpoint === 'start') return [...PIPELINE_STAGES];
  return PIPELINE_STAGES.slice(PIPELINE_STAGES.indexOf(checkpoint));
}

import {
  OperationAbortedError,
  PipelineInterruptedError,
  StageExecutionError,
  handleUnknownError,
} from '../errors/index';
import { printStageBanner, printStageDone } from '../output/reporter';
import type { RunStatus } from '../schemas/artifact-schemas';
import type { StageContext } from './context';
import { draftSections } from './handlers/draft';
import { addLinks, addSocials, addTrademark, addVisualizations } from './handlers/enrich';
import { citeAndAssemble } from './handlers/cite';
import { analyzeDeck, runResearch } from './handlers/research';
import { writeSnapshot } from './handlers/sections';
import {
  addTableOfContents,
  finalizeMemo,
  runFactCheck,
  validateCitations,
  validateQuality,
} from './handlers/validation';
import { stagesFrom, type Checkpoint, type PipelineStage } from './stages';
import type { MemoState } from './state';

export type StageOutcome = 'continue' | 'human_review';

export type StageHandler = (ctx: StageContext, state: MemoState) => Promise<StageOutcome | void>;

export const DECK_STAGE = 'deck_analysis';

/** One handler per stage, in pipeline order. */
export const STAGE_HANDLERS: Record<PipelineStage, StageHandler> = {
  research: runResearch,
  draft: draftSections,
  enrich_trademark: addTrademark,
  enrich_socials: addSocials,
  enrich_links: addLinks,
  enrich_visualizations: addVisualizations,
  cite: citeAndAssemble,
  toc: addTableOfContents,
  validate_citations: validateCitations,
  fact_check: runFactCheck,
  validate: validateQuality,
  finalize: finalizeMemo,
};

export interface RunOptions {
  /** Checkpoint to start from; `start` includes the deck pre-stage. */
  from: Checkpoint;
  handlers?: Record<PipelineStage, StageHandler>;
}

export interface RunResult {
  status: RunStatus;
  stagesRun: string[];
}

async function execute(
  label: string,
  ctx: StageContext,
  state: MemoState,
  handler: StageHandler
): Promise<StageOutcome> {
  if (ctx.signal?.aborted) {
    throw new PipelineInterruptedError(label);
  }
  try {
    return (await handler(ctx, state)) ?? 'continue';
  } catch (e: unknown) {
    if (ctx.signal?.aborted || e instanceof OperationAbortedError) {
      throw new PipelineInterruptedError(label);
    }
    throw new StageExecutionError(label, handleUnknownError(e, `Stage ${label}`));
  }
}

/**
 * Runs the stages from a checkpoint to the end, one at a time. The first
 * failing stage aborts the run with its name; a score below the quality
 * threshold stops it after `validate` with a `human_review` snapshot.
 */
export async function runPipeline(ctx: StageContext, state: MemoState, options: RunOptions): Promise<RunResult> {
  const handlers = options.handlers ?? STAGE_HANDLERS;
  const stages = stagesFrom(options.from);
  const stagesRun: string[] = [];

  if (options.from === 'start') {
    await execute(DECK_STAGE, ctx, state, analyzeDeck);
    stagesRun.push(DECK_STAGE);
  }

  for (const [i, stage] of stages.entries()) {
    printStageBanner(stage, i + 1, stages.length);
    const outcome = await execute(stage, ctx, state, handlers[stage]);
    stagesRun.push(stage);
    printStageDone(stage);

    if (outcome === 'human_review') {
      writeSnapshot(ctx, state, 'human_review');
      return { status: 'human_review', stagesRun };
    }
  }

  return { status: 'complete', stagesRun };
}

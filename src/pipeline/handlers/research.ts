import { resolveDealPath } from '../../boundaries/deal-loader';
import { debug, warn } from '../../output/logger';
import { buildRequest } from '../../prompts/prompt-loader';
import {
  DECK_ANALYSIS_SCHEMA,
  RESEARCH_SCHEMA,
  type DeckAnalysis,
  type Research,
} from '../../schemas/artifact-schemas';
import type { StageContext } from '../context';
import { parseJsonAnswer } from '../json-output';
import type { MemoState } from '../state';

const DECK_ANSWER_SCHEMA = DECK_ANALYSIS_SCHEMA.omit({ screenshots: true });
const RESEARCH_ANSWER_SCHEMA = RESEARCH_SCHEMA.omit({ raw: true });

function deckScreenshots(ctx: StageContext): Record<string, string[]> {
  const deal = ctx.deal;
  if (!deal?.config.screenshots) return {};
  const resolved: Record<string, string[]> = {};
  for (const [keyword, paths] of Object.entries(deal.config.screenshots)) {
    resolved[keyword] = paths.map((p) => resolveDealPath(deal, p));
  }
  return resolved;
}

/**
 * Deck pre-stage: summarizes pre-extracted deck text. A run without a deck
 * skips it.
 */
export async function analyzeDeck(ctx: StageContext, state: MemoState): Promise<void> {
  if (!ctx.deckText) {
    debug('[memoforge] No deck supplied, skipping deck analysis');
    return;
  }

  const answer = await ctx.generators.writer.generate(
    buildRequest('deck-analysis', { company: state.company.name, deckText: ctx.deckText }, ctx.signal)
  );
  const screenshots = deckScreenshots(ctx);
  const parsed = parseJsonAnswer(answer, DECK_ANSWER_SCHEMA);
  if (!parsed) {
    warn('[memoforge] Deck analysis was not valid JSON; keeping the answer as the summary');
  }
  const analysis: DeckAnalysis = parsed
    ? { ...parsed, screenshots }
    : { summary: answer.trim(), highlights: [], screenshots };

  ctx.repo.writeArtifact('deck-analysis', analysis);
  state.deckAnalysis = analysis;
}

export async function runResearch(ctx: StageContext, state: MemoState): Promise<void> {
  const answer = await ctx.generators.search.generate(
    buildRequest(
      'company-research',
      {
        company: state.company.name,
        url: state.company.url ?? 'unknown',
        description: state.company.description ?? 'none',
        deckSummary: state.deckAnalysis?.summary ?? 'none',
      },
      ctx.signal
    )
  );

  let research: Research;
  const parsed = parseJsonAnswer(answer, RESEARCH_ANSWER_SCHEMA);
  if (parsed) {
    research = parsed;
  } else {
    warn('[memoforge] Research answer was not valid JSON; keeping the raw text');
    research = { company: { name: state.company.name }, topics: {}, sources: [], raw: answer };
  }

  ctx.repo.writeArtifact('research', research);
  state.research = research;
  state.messages.push(`Research gathered ${research.sources.length} sources`);
}

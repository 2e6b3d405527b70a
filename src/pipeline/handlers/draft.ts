import { removeHallucinatedSources } from '../../citations/hallucinations';
import { guardCitationIntegrity } from '../../citations/integrity';
import { handleUnknownError, isTransientProviderError } from '../../errors/index';
import { debug, warn } from '../../output/logger';
import { buildRequest } from '../../prompts/prompt-loader';
import type { SectionId } from '../../repository/types';
import type { OutlineSection } from '../../schemas/outline-schemas';
import { runWithConcurrency } from '../concurrency';
import type { StageContext } from '../context';
import type { MemoState } from '../state';
import { researchSummary, withHeading } from './sections';

interface DraftedSection {
  id: SectionId;
  research: string;
  content: string;
}

async function sectionResearch(ctx: StageContext, state: MemoState, section: OutlineSection): Promise<string> {
  const id = { number: section.number, slug: section.slug };
  const existing = ctx.repo.readSectionResearch(id);
  if (existing && existing.trim().length > 0) {
    debug(`[memoforge] Reusing research for ${section.name}`);
    return existing;
  }

  return ctx.generators.search.generate(
    buildRequest(
      'section-research',
      {
        company: state.company.name,
        url: state.company.url ?? 'unknown',
        sectionName: section.name,
        sectionDescription: section.description || section.name,
        guidingQuestions: section.guidingQuestions.map((q) => `- ${q}`),
        researchSummary: researchSummary(state),
      },
      ctx.signal
    )
  );
}

function dropPlaceholderSources(research: string, name: string): string {
  const cleanup = removeHallucinatedSources(research);
  if (cleanup.removed.length > 0) {
    const urls = cleanup.removed.map((r) => r.url).join(', ');
    warn(`[memoforge] Removed ${cleanup.removed.length} placeholder sources from ${name} research: ${urls}`);
  }
  return cleanup.text;
}

async function draftSection(ctx: StageContext, state: MemoState, section: OutlineSection): Promise<DraftedSection> {
  const id = { number: section.number, slug: section.slug };
  const research = dropPlaceholderSources(await sectionResearch(ctx, state, section), section.name);

  let prose: string;
  try {
    prose = await ctx.generators.writer.generate(
      buildRequest(
        'section-draft',
        {
          company: state.company.name,
          sectionNumber: section.number,
          sectionName: section.name,
          sectionDescription: section.description || section.name,
          targetWords: section.targetWords,
          deckSummary: state.deckAnalysis?.summary ?? 'none',
          research,
        },
        ctx.signal
      )
    );
  } catch (e: unknown) {
    if (!isTransientProviderError(e) || ctx.signal?.aborted) throw e;
    const err = handleUnknownError(e, `Drafting ${section.name}`);
    warn(`[memoforge] Drafting ${section.name} failed (${err.message}); using the research text`);
    prose = research;
  }

  const guarded = guardCitationIntegrity(research, prose);
  if (!guarded.accepted) {
    warn(`[memoforge] Draft of ${section.name} rejected (${guarded.reason}); using the research text`);
  }
  return { id, research, content: withHeading(guarded.text, section.name) };
}

/**
 * Researches and drafts every outline section not yet on disk. All
 * sections are drafted before any is written.
 */
export async function draftSections(ctx: StageContext, state: MemoState): Promise<void> {
  const drafted = new Set(
    ctx.repo
      .listSections()
      .filter((id) => (ctx.repo.readSection(id) ?? '').trim().length > 0)
      .map((id) => id.number)
  );
  const pending = ctx.outline.sections.filter((s) => !drafted.has(s.number));
  if (pending.length < ctx.outline.sections.length) {
    debug(`[memoforge] ${ctx.outline.sections.length - pending.length} sections already drafted`);
  }

  const results = await runWithConcurrency(
    pending,
    ctx.settings.concurrency,
    (section) => draftSection(ctx, state, section),
    ctx.signal
  );

  for (const result of results) {
    ctx.repo.writeSectionResearch(result.id, result.research);
    ctx.repo.writeSection(result.id, result.content);
  }
  state.messages.push(`Drafted ${results.length} sections`);
}

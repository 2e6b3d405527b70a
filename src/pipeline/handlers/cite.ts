import { assembleFinalDraft, type AssemblyResult } from '../../citations/assembly';
import { guardCitationIntegrity } from '../../citations/integrity';
import { ProcessingError } from '../../errors/index';
import { describeDiagnostic, isErrorDiagnostic } from '../../footnotes';
import { debug, warn } from '../../output/logger';
import { buildRequest } from '../../prompts/prompt-loader';
import { runWithConcurrency } from '../concurrency';
import type { StageContext } from '../context';
import type { MemoState } from '../state';
import { loadSections, type LoadedSection } from './sections';

async function citeSection(ctx: StageContext, state: MemoState, section: LoadedSection): Promise<LoadedSection> {
  const answer = await ctx.generators.search.generate(
    buildRequest('cite-section', { company: state.company.name, section: section.content }, ctx.signal)
  );
  const guarded = guardCitationIntegrity(section.content, answer);
  if (!guarded.accepted) {
    warn(`[memoforge] Citation pass on ${section.name} rejected: ${guarded.reason}`);
    return section;
  }
  return { ...section, content: `${guarded.text.trim()}\n` };
}

/**
 * Writes the header and sections as the final draft with one consolidated
 * citations block.
 */
export function assembleSections(
  ctx: Pick<StageContext, 'repo' | 'settings'>,
  sections: LoadedSection[]
): AssemblyResult {
  const result = assembleFinalDraft(
    ctx.repo.readText('header'),
    sections.map((s) => ({ number: s.id.number, slug: s.id.slug, title: s.name, content: s.content })),
    { backReferences: ctx.settings.backReferences }
  );

  for (const diagnostic of result.diagnostics) {
    const message = `[memoforge] ${describeDiagnostic(diagnostic)}`;
    if (isErrorDiagnostic(diagnostic)) warn(message);
    else debug(message);
  }

  ctx.repo.writeText('final-draft', result.text);
  return result;
}

/**
 * Adds sources to each section through web search, then assembles the
 * header and sections into the final draft with one consolidated
 * citations block.
 */
export async function citeAndAssemble(ctx: StageContext, state: MemoState): Promise<void> {
  const sections = loadSections(ctx);
  if (sections.length === 0) {
    throw new ProcessingError('No drafted sections to assemble');
  }

  let cited = sections;
  if (ctx.generators.hasWebSearch) {
    cited = await runWithConcurrency(
      sections,
      ctx.settings.concurrency,
      (section) => citeSection(ctx, state, section),
      ctx.signal
    );
    cited.forEach((section, i) => {
      if (section.content !== sections[i]?.content) {
        ctx.repo.writeSection(section.id, section.content);
      }
    });
  } else {
    debug('[memoforge] No web search configured, assembling sections as drafted');
  }

  const result = assembleSections(ctx, cited);
  state.messages.push(`Assembled ${result.sections} sections with ${result.citations} citations`);
}

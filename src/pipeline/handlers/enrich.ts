import { resolveDealPath } from '../../boundaries/deal-loader';
import { teamSectionNumber } from '../../boundaries/outline-loader';
import { guardCitationIntegrity } from '../../citations/integrity';
import { debug, warn } from '../../output/logger';
import { buildRequest } from '../../prompts/prompt-loader';
import type { PromptName } from '../../schemas/prompt-schemas';
import { runWithConcurrency } from '../concurrency';
import type { StageContext } from '../context';
import type { MemoState } from '../state';
import { loadSections, type LoadedSection } from './sections';

const REMOTE_RE = /^https?:\/\//i;

export async function addTrademark(ctx: StageContext, state: MemoState): Promise<void> {
  const name = state.company.name;
  const deal = ctx.deal;
  const logo = deal?.config.trademarkLight ?? deal?.config.trademarkDark;

  const lines: string[] = [];
  if (deal && logo) {
    const src = REMOTE_RE.test(logo) ? logo : resolveDealPath(deal, logo);
    lines.push(`![${name} logo](${src})`, '');
  }
  lines.push(`# ${name} Investment Memo`, '');
  if (state.company.description) {
    lines.push(`*${state.company.description}*`, '');
  }
  lines.push('---', '');

  ctx.repo.writeText('header', lines.join('\n'));
}

/**
 * Asks the writer to rewrite one section and keeps the rewrite only when
 * every footnote survived it.
 */
async function guardedRewrite(
  ctx: StageContext,
  state: MemoState,
  prompt: PromptName,
  section: LoadedSection
): Promise<LoadedSection> {
  const answer = await ctx.generators.writer.generate(
    buildRequest(
      prompt,
      { company: state.company.name, url: state.company.url ?? 'unknown', section: section.content },
      ctx.signal
    )
  );
  const guarded = guardCitationIntegrity(section.content, answer);
  if (!guarded.accepted) {
    warn(`[memoforge] ${prompt} rewrite of ${section.name} rejected: ${guarded.reason}`);
    return section;
  }
  return { ...section, content: `${guarded.text.trim()}\n` };
}

export async function addSocials(ctx: StageContext, state: MemoState): Promise<void> {
  const teamNumber = teamSectionNumber(ctx.outline);
  const team = loadSections(ctx).find((s) => s.id.number === teamNumber);
  if (!team) {
    warn(`[memoforge] Team section ${teamNumber} not found, skipping profile links`);
    return;
  }

  const result = await guardedRewrite(ctx, state, 'enrich-socials', team);
  if (result.content !== team.content) {
    ctx.repo.writeSection(result.id, result.content);
  }
}

export async function addLinks(ctx: StageContext, state: MemoState): Promise<void> {
  const sections = loadSections(ctx);
  const results = await runWithConcurrency(
    sections,
    ctx.settings.concurrency,
    (section) => guardedRewrite(ctx, state, 'enrich-links', section),
    ctx.signal
  );

  results.forEach((result, i) => {
    if (result.content !== sections[i]?.content) {
      ctx.repo.writeSection(result.id, result.content);
    }
  });
}

/**
 * Inserts the deck screenshots whose keyword occurs in the section's name
 * or slug, right below its heading. Images already present are skipped.
 */
export function injectScreenshots(
  section: Pick<LoadedSection, 'name' | 'content'> & { slug: string },
  screenshots: Record<string, string[]>
): string {
  const haystack = `${section.slug} ${section.name}`.toLowerCase();
  const paths = new Set<string>();
  for (const [keyword, files] of Object.entries(screenshots)) {
    if (!haystack.includes(keyword.toLowerCase())) continue;
    for (const file of files) {
      if (!section.content.includes(`](${file})`)) paths.add(file);
    }
  }
  if (paths.size === 0) return section.content;

  const images = [...paths].map((file) => `![${section.name}](${file})`).join('\n\n');
  const lines = section.content.split('\n');
  const heading = lines.findIndex((line) => /^##\s/.test(line));
  if (heading === -1) return `${images}\n\n${section.content}`;
  lines.splice(heading + 1, 0, '', images);
  return lines.join('\n');
}

export async function addVisualizations(ctx: StageContext, state: MemoState): Promise<void> {
  const screenshots = state.deckAnalysis?.screenshots ?? {};
  if (Object.keys(screenshots).length === 0) {
    debug('[memoforge] No deck screenshots to place');
    return;
  }

  let placed = 0;
  for (const section of loadSections(ctx)) {
    const content = injectScreenshots({ ...section, slug: section.id.slug }, screenshots);
    if (content !== section.content) {
      ctx.repo.writeSection(section.id, content);
      placed++;
    }
  }
  state.messages.push(`Placed deck screenshots in ${placed} sections`);
}

import type { SectionId } from '../../repository/types';
import type { RunStatus } from '../../schemas/artifact-schemas';
import type { StageContext } from '../context';
import type { MemoState } from '../state';

export interface LoadedSection {
  id: SectionId;
  name: string;
  content: string;
}

/** Drafted sections in order, named from the outline where it lists them. */
export function loadSections(ctx: Pick<StageContext, 'repo' | 'outline'>): LoadedSection[] {
  const loaded: LoadedSection[] = [];
  for (const id of ctx.repo.listSections()) {
    const content = ctx.repo.readSection(id);
    if (content === undefined) continue;
    const name = ctx.outline.sections.find((s) => s.number === id.number)?.name ?? id.slug;
    loaded.push({ id, name, content });
  }
  return loaded;
}

/** Ensures a section body opens with its `##` heading. */
export function withHeading(text: string, name: string): string {
  const body = text.trim();
  const firstLine = body.split('\n', 1)[0] ?? '';
  if (/^##\s+\S/.test(firstLine)) return `${body}\n`;
  return `## ${name}\n\n${body}\n`;
}

/** Compact research context for prompts. */
export function researchSummary(state: MemoState): string {
  const research = state.research;
  if (!research) return 'none';
  const topics = Object.entries(research.topics).map(([topic, text]) => `- ${topic}: ${text}`);
  if (topics.length > 0) return topics.join('\n');
  return research.raw?.trim() || research.company.description || 'none';
}

export function writeValidation(ctx: StageContext, state: MemoState): void {
  ctx.repo.writeArtifact('validation', {
    ...(state.citationValidation && { citationValidation: state.citationValidation }),
    ...(state.factCheck && { factCheck: state.factCheck }),
    ...(state.overallScore !== undefined && { overallScore: state.overallScore }),
    ...(state.quality && { quality: state.quality }),
  });
}

const VERSION_SUFFIX_RE = /v\d+\.\d+\.\d+$/;

export function writeSnapshot(ctx: StageContext, state: MemoState, status: RunStatus): void {
  ctx.repo.writeArtifact('state', {
    companyName: state.company.name,
    version: VERSION_SUFFIX_RE.exec(ctx.repo.name)?.[0] ?? ctx.repo.name,
    status,
    ...(state.overallScore !== undefined && { overallScore: state.overallScore }),
    ...(state.finalMemo !== undefined && { finalMemo: state.finalMemo }),
    messages: state.messages,
    updatedAt: ctx.now().toISOString(),
  });
}

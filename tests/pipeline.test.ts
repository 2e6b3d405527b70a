import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  OperationAbortedError,
  PipelineInterruptedError,
  RateLimitedError,
  StageExecutionError,
} from '../src/errors/index';
import { DEFAULT_EVIDENCE_THRESHOLDS } from '../src/fact-check/verifier';
import { runWithConcurrency } from '../src/pipeline/concurrency';
import type { StageContext } from '../src/pipeline/context';
import { citeAndAssemble } from '../src/pipeline/handlers/cite';
import { draftSections } from '../src/pipeline/handlers/draft';
import { injectScreenshots } from '../src/pipeline/handlers/enrich';
import { runPipeline, type StageHandler, type StageOutcome } from '../src/pipeline/runner';
import { PIPELINE_STAGES, type PipelineStage } from '../src/pipeline/stages';
import { createState, type MemoState } from '../src/pipeline/state';
import type { TextGenerator } from '../src/providers/text-generator';
import { MemoryDocumentRepository } from '../src/repository/memory-repository';
import type { Outline } from '../src/schemas/outline-schemas';
import { DEFINITION, SECTION_RESEARCH, ScriptedGenerator, memoAnswer } from './scripted-generator';

const OUTLINE: Outline = {
  name: 'test',
  description: '',
  sections: [
    { number: 1, name: 'Executive Summary', slug: 'executive-summary', description: '', guidingQuestions: [], targetWords: 100 },
    { number: 2, name: 'Team', slug: 'team', description: '', guidingQuestions: [], targetWords: 100 },
  ],
};

function makeContext(
  repo: MemoryDocumentRepository,
  writer: TextGenerator,
  overrides: Partial<StageContext> = {}
): StageContext {
  return {
    repo,
    generators: { writer, search: writer, hasWebSearch: false },
    outline: OUTLINE,
    settings: {
      concurrency: 2,
      strictness: 'high',
      evidence: DEFAULT_EVIDENCE_THRESHOLDS,
      qualityThreshold: 7,
      backReferences: false,
    },
    now: () => new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

function recordingHandlers(
  calls: string[],
  outcomes: Partial<Record<PipelineStage, StageOutcome>> = {},
  failing?: PipelineStage
): Record<PipelineStage, StageHandler> {
  const handler =
    (stage: PipelineStage): StageHandler =>
    async () => {
      calls.push(stage);
      if (stage === failing) throw new Error('model down');
      return outcomes[stage];
    };
  return {
    research: handler('research'),
    draft: handler('draft'),
    enrich_trademark: handler('enrich_trademark'),
    enrich_socials: handler('enrich_socials'),
    enrich_links: handler('enrich_links'),
    enrich_visualizations: handler('enrich_visualizations'),
    cite: handler('cite'),
    toc: handler('toc'),
    validate_citations: handler('validate_citations'),
    fact_check: handler('fact_check'),
    validate: handler('validate'),
    finalize: handler('finalize'),
  };
}

describe('runPipeline', () => {
  let repo: MemoryDocumentRepository;
  let state: MemoState;

  beforeEach(() => {
    repo = new MemoryDocumentRepository('Acme-v0.0.1');
    state = createState({ name: 'Acme', description: 'Workflow software for logistics' });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs every stage from the deck to a finalized memo', async () => {
    const writer = new ScriptedGenerator(memoAnswer(8.5));
    const ctx = makeContext(repo, writer, { deckText: 'Acme deck text' });

    const result = await runPipeline(ctx, state, { from: 'start' });

    expect(result).toEqual({ status: 'complete', stagesRun: ['deck_analysis', ...PIPELINE_STAGES] });
    expect(repo.readArtifact('deck-analysis')).toEqual({
      summary: 'Acme sells workflow software',
      highlights: ['40 customers'],
      screenshots: {},
    });
    expect(repo.readSection({ number: 2, slug: 'team' })).toBe(`## Team\n\n${SECTION_RESEARCH}`);
    expect(repo.readText('header')).toBe(
      '# Acme Investment Memo\n\n*Workflow software for logistics*\n\n---\n'
    );

    const draft = repo.readText('final-draft') ?? '';
    expect(draft.startsWith('# Acme Investment Memo')).toBe(true);
    expect(draft).toContain('## Table of Contents');
    expect(draft).toContain('- [Executive Summary](#executive-summary)');
    expect(draft.split(DEFINITION).length).toBe(2);

    const snapshot = repo.readArtifact('state');
    expect(snapshot?.status).toBe('complete');
    expect(snapshot?.version).toBe('v0.0.1');
    expect(snapshot?.overallScore).toBe(8.5);
    expect(snapshot?.updatedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(snapshot?.finalMemo).toBe(draft);
    expect(snapshot?.messages).toContain('Drafted 2 sections');
    expect(snapshot?.messages).toContain('Assembled 2 sections with 1 citations');
    expect(repo.readArtifact('validation')?.overallScore).toBe(8.5);
  });

  it('stops for human review when the score is under the threshold', async () => {
    const writer = new ScriptedGenerator(memoAnswer(5));
    const ctx = makeContext(repo, writer);

    const result = await runPipeline(ctx, state, { from: 'research' });

    expect(result.status).toBe('human_review');
    expect(result.stagesRun.at(-1)).toBe('validate');
    expect(repo.readArtifact('state')?.status).toBe('human_review');
    expect(repo.readArtifact('state')?.finalMemo).toBeUndefined();
  });

  it('skips the deck stage when resuming', async () => {
    const calls: string[] = [];
    const result = await runPipeline(makeContext(repo, new ScriptedGenerator(memoAnswer(9))), state, {
      from: 'fact_check',
      handlers: recordingHandlers(calls),
    });

    expect(calls).toEqual(['fact_check', 'validate', 'finalize']);
    expect(result).toEqual({ status: 'complete', stagesRun: ['fact_check', 'validate', 'finalize'] });
  });

  it('writes a human_review snapshot when a handler asks for review', async () => {
    const calls: string[] = [];
    const result = await runPipeline(makeContext(repo, new ScriptedGenerator(memoAnswer(9))), state, {
      from: 'validate',
      handlers: recordingHandlers(calls, { validate: 'human_review' }),
    });

    expect(calls).toEqual(['validate']);
    expect(result).toEqual({ status: 'human_review', stagesRun: ['validate'] });
    expect(repo.readArtifact('state')?.status).toBe('human_review');
  });

  it('names the failing stage and runs nothing after it', async () => {
    const calls: string[] = [];
    const run = runPipeline(makeContext(repo, new ScriptedGenerator(memoAnswer(9))), state, {
      from: 'research',
      handlers: recordingHandlers(calls, {}, 'draft'),
    });

    await expect(run).rejects.toBeInstanceOf(StageExecutionError);
    await expect(run).rejects.toThrow("Stage 'draft' failed: model down");
    expect(calls).toEqual(['research', 'draft']);
  });

  it('fails the validate stage when there is no final draft', async () => {
    const run = runPipeline(makeContext(repo, new ScriptedGenerator(memoAnswer(9))), state, { from: 'validate' });
    await expect(run).rejects.toThrow("Stage 'validate' failed: Final draft not found in Acme-v0.0.1");
  });

  it('reports an interruption instead of a failure once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const ctx = makeContext(repo, new ScriptedGenerator(memoAnswer(9)), { signal: controller.signal });

    const run = runPipeline(ctx, state, { from: 'start' });

    await expect(run).rejects.toBeInstanceOf(PipelineInterruptedError);
    await expect(run).rejects.toThrow("Pipeline interrupted during stage 'deck_analysis'");
  });
});

describe('draftSections', () => {
  let repo: MemoryDocumentRepository;
  let state: MemoState;

  beforeEach(() => {
    repo = new MemoryDocumentRepository('Acme-v0.0.1');
    state = createState({ name: 'Acme' });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drafts only the sections not yet on disk', async () => {
    repo.writeSection({ number: 1, slug: 'executive-summary' }, '## Executive Summary\n\nKept.\n');
    const writer = new ScriptedGenerator(memoAnswer(9));

    await draftSections(makeContext(repo, writer), state);

    expect(writer.prompts.filter((p) => p.startsWith('Write section'))).toHaveLength(1);
    expect(repo.readSection({ number: 1, slug: 'executive-summary' })).toBe('## Executive Summary\n\nKept.\n');
    expect(repo.readSectionResearch({ number: 2, slug: 'team' })).toBe(SECTION_RESEARCH);
  });

  it('falls back to the research text when the writer is rate limited', async () => {
    const answer = memoAnswer(9);
    const writer = new ScriptedGenerator((request) => {
      if (request.userPrompt.startsWith('Write section')) throw new RateLimitedError('slow down', 'scripted');
      return answer(request);
    });

    await draftSections(makeContext(repo, writer), state);

    expect(repo.readSection({ number: 1, slug: 'executive-summary' })).toBe(
      `## Executive Summary\n\n${SECTION_RESEARCH.trim()}\n`
    );
  });

  it('drops placeholder sources from section research', async () => {
    const answer = memoAnswer(9);
    const research =
      'Acme sells workflow software.[^1] It has 40 customers.[^2]\n\n### Citations\n\n' +
      `${DEFINITION}\n` +
      '[^2]: 2024, Feb 01. Customers. Published: 2024-02-01 | Updated: N/A | URL: https://example.com/customers\n';
    const writer = new ScriptedGenerator((request) =>
      request.userPrompt.startsWith('Research the "') ? research : answer(request)
    );

    await draftSections(makeContext(repo, writer), state);

    expect(repo.readSectionResearch({ number: 2, slug: 'team' })).toBe(
      `Acme sells workflow software.[^1] It has 40 customers.\n\n### Citations\n\n${DEFINITION}\n`
    );
    expect(console.warn).toHaveBeenCalledWith(
      '[memoforge] Removed 1 placeholder sources from Team research: https://example.com/customers'
    );
  });

  it('keeps the research text when a draft drops its citations', async () => {
    const answer = memoAnswer(9);
    const writer = new ScriptedGenerator((request) => {
      if (request.userPrompt.startsWith('Write section')) return '## Team\n\nAcme sells workflow software.';
      return answer(request);
    });

    await draftSections(makeContext(repo, writer), state);

    expect(repo.readSection({ number: 2, slug: 'team' })).toBe(`## Team\n\n${SECTION_RESEARCH.trim()}\n`);
  });
});

describe('citeAndAssemble', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps a section whose citation pass lost its sources', async () => {
    const repo = new MemoryDocumentRepository('Acme-v0.0.1');
    const content = `## Team\n\n${SECTION_RESEARCH}`;
    repo.writeSection({ number: 2, slug: 'team' }, content);
    const search = new ScriptedGenerator(() => '## Team\n\nNo sources found.');
    const writer = new ScriptedGenerator(memoAnswer(9));
    const ctx = makeContext(repo, writer, { generators: { writer, search, hasWebSearch: true } });
    const state = createState({ name: 'Acme' });

    await citeAndAssemble(ctx, state);

    expect(search.prompts).toHaveLength(1);
    expect(repo.readSection({ number: 2, slug: 'team' })).toBe(content);
    expect(repo.readText('final-draft')).toContain(DEFINITION);
    expect(state.messages).toEqual(['Assembled 1 sections with 1 citations']);
  });

  it('refuses to assemble without sections', async () => {
    const repo = new MemoryDocumentRepository('Acme-v0.0.1');
    const ctx = makeContext(repo, new ScriptedGenerator(memoAnswer(9)));
    await expect(citeAndAssemble(ctx, createState({ name: 'Acme' }))).rejects.toThrow(
      'No drafted sections to assemble'
    );
  });
});

describe('injectScreenshots', () => {
  const screenshots = { market: ['deck/market.png'], team: ['deck/team.png'] };

  it('places matching screenshots under the heading', () => {
    const result = injectScreenshots(
      { name: 'Market Context', slug: 'market-context', content: '## Market Context\n\nLarge market.\n' },
      screenshots
    );
    expect(result).toBe('## Market Context\n\n![Market Context](deck/market.png)\n\nLarge market.\n');
  });

  it('does not repeat a screenshot already in the section', () => {
    const content = '## Market Context\n\n![Market Context](deck/market.png)\n\nLarge market.\n';
    expect(injectScreenshots({ name: 'Market Context', slug: 'market-context', content }, screenshots)).toBe(content);
  });

  it('prepends screenshots to a section without a heading', () => {
    const result = injectScreenshots(
      { name: 'Market Context', slug: 'market-context', content: 'Large market.\n' },
      screenshots
    );
    expect(result).toBe('![Market Context](deck/market.png)\n\nLarge market.\n');
  });
});

describe('runWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await runWithConcurrency([30, 10, 20, 5], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight--;
      return i * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });

  it('stops picking up items after the first failure', async () => {
    const seen: number[] = [];
    const run = runWithConcurrency([1, 2, 3, 4], 1, async (n) => {
      seen.push(n);
      if (n === 2) throw new Error('boom');
      return n;
    });

    await expect(run).rejects.toThrow('boom');
    expect(seen).toEqual([1, 2]);
  });

  it('rejects once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runWithConcurrency([1], 1, async (n) => n, controller.signal)).rejects.toBeInstanceOf(
      OperationAbortedError
    );
  });
});

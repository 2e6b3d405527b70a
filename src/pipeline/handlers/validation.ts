import { insertTableOfContents } from '../../citations/toc';
import { validateCitationDefinitions } from '../../citations/validator';
import { ProcessingError } from '../../errors/index';
import { factCheckDocument } from '../../fact-check/scorer';
import { debug, warn } from '../../output/logger';
import { printCitationValidation } from '../../output/reporter';
import { buildRequest } from '../../prompts/prompt-loader';
import { QUALITY_VALIDATION_SCHEMA } from '../../schemas/artifact-schemas';
import type { StageContext } from '../context';
import { parseJsonAnswer } from '../json-output';
import type { StageOutcome } from '../runner';
import type { MemoState } from '../state';
import { loadSections, writeSnapshot, writeValidation } from './sections';

function requireFinalDraft(ctx: StageContext): string {
  const draft = ctx.repo.readText('final-draft');
  if (draft === undefined || draft.trim().length === 0) {
    throw new ProcessingError(`Final draft not found in ${ctx.repo.name}`);
  }
  return draft;
}

export async function addTableOfContents(ctx: StageContext): Promise<void> {
  const result = insertTableOfContents(requireFinalDraft(ctx));
  if (result.inserted) {
    ctx.repo.writeText('final-draft', result.text);
    debug(`[memoforge] Table of contents with ${result.entries} entries`);
  } else {
    debug('[memoforge] Final draft already has a table of contents or no headings');
  }
}

export async function validateCitations(ctx: StageContext, state: MemoState): Promise<void> {
  const report = validateCitationDefinitions(requireFinalDraft(ctx), { now: ctx.now() });
  state.citationValidation = report;
  // later results describe an older draft
  delete state.factCheck;
  delete state.quality;
  delete state.overallScore;
  writeValidation(ctx, state);
  printCitationValidation(report);
}

export async function runFactCheck(ctx: StageContext, state: MemoState): Promise<void> {
  const sections = loadSections(ctx).map((s) => ({ name: s.name, content: s.content }));
  const report = factCheckDocument(sections, state.research, state.company.url, {
    strictness: ctx.settings.strictness,
    thresholds: ctx.settings.evidence,
  });

  state.factCheck = report;
  delete state.quality;
  delete state.overallScore;
  ctx.repo.writeArtifact('fact-check', report);
  writeValidation(ctx, state);

  if (report.entityMismatch) {
    warn(
      `[memoforge] Research describes ${report.entityMismatch.found}, expected ${report.entityMismatch.expected}`
    );
  }
  state.messages.push(
    `Fact-check verified ${report.verifiedClaims} of ${report.totalClaims} claims (${report.criticalClaims} critical)`
  );
}

/**
 * Scores the memo 0-10 with the writer. A document whose research
 * describes another company scores 0. Scores under the quality threshold
 * halt the run for human review.
 */
export async function validateQuality(ctx: StageContext, state: MemoState): Promise<StageOutcome> {
  const memo = requireFinalDraft(ctx);
  const factCheck = state.factCheck;
  const citations = state.citationValidation;

  const answer = await ctx.generators.writer.generate(
    buildRequest(
      'quality-review',
      {
        company: state.company.name,
        memo,
        factCheckSummary: factCheck
          ? `${factCheck.verifiedClaims}/${factCheck.totalClaims} claims cited, ${factCheck.criticalClaims} critical`
          : 'not run',
        citationSummary: citations
          ? `${citations.validCitations}/${citations.totalCitations} citations valid, ${citations.issues.length} issues`
          : 'not run',
      },
      ctx.signal
    )
  );

  const quality = parseJsonAnswer(answer, QUALITY_VALIDATION_SCHEMA);
  if (!quality) {
    throw new ProcessingError('Quality review did not return a valid score');
  }

  state.quality = quality;
  state.overallScore = factCheck?.entityMismatch ? 0 : quality.score;
  writeValidation(ctx, state);
  state.messages.push(`Quality score ${state.overallScore.toFixed(1)}/10`);

  return state.overallScore < ctx.settings.qualityThreshold ? 'human_review' : 'continue';
}

export async function finalizeMemo(ctx: StageContext, state: MemoState): Promise<void> {
  state.finalMemo = requireFinalDraft(ctx);
  writeSnapshot(ctx, state, 'complete');
}

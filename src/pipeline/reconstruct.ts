import { warn } from '../output/logger';
import type { DocumentRepository } from '../repository/types';
import { createState, type CompanyContext, type MemoState } from './state';

/**
 * Rebuilds pipeline state from a version directory's artifacts. Anything
 * missing or malformed is a warning, and the stage that owns it runs again
 * when it comes up.
 */
export function reconstructState(repo: DocumentRepository, company: CompanyContext): MemoState {
  const state = createState(company);
  const snapshot = repo.readAll();
  const { json } = snapshot;

  if (json['deck-analysis']) {
    state.deckAnalysis = json['deck-analysis'];
  }

  if (json.research) {
    state.research = json.research;
  } else {
    warn(`[memoforge] ${repo.name}: research artifact not loaded`);
  }

  const validation = json.validation;
  if (validation) {
    if (validation.citationValidation) state.citationValidation = validation.citationValidation;
    if (validation.factCheck) state.factCheck = validation.factCheck;
    if (validation.quality) state.quality = validation.quality;
    if (validation.overallScore !== undefined) state.overallScore = validation.overallScore;
  }

  if (!state.factCheck && json['fact-check']) {
    state.factCheck = json['fact-check'];
  }

  if (snapshot.finalDraft === undefined) {
    warn(`[memoforge] ${repo.name}: final draft not loaded`);
  }

  if (json.state) {
    state.messages = [...json.state.messages];
    if (json.state.finalMemo) state.finalMemo = json.state.finalMemo;
  }

  return state;
}

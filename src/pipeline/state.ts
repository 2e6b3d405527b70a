import type {
  CitationValidation,
  DeckAnalysis,
  QualityValidation,
  Research,
} from '../schemas/artifact-schemas';
import type { FactCheckReport } from '../schemas/fact-check-schemas';

export interface CompanyContext {
  name: string;
  url?: string;
  description?: string;
  stage?: string;
  notes?: string;
}

/**
 * Accumulated pipeline state. Every field past `company` is filled by a
 * stage, or reloaded from that stage's artifact on resume.
 */
export interface MemoState {
  company: CompanyContext;
  deckAnalysis?: DeckAnalysis;
  research?: Research;
  citationValidation?: CitationValidation;
  factCheck?: FactCheckReport;
  quality?: QualityValidation;
  overallScore?: number;
  finalMemo?: string;
  /** Progress notes surfaced in the state snapshot. */
  messages: string[];
}

export function createState(company: CompanyContext): MemoState {
  return { company: { ...company }, messages: [] };
}

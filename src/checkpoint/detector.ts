import { TOC_HEADING } from '../citations/toc';
import { citationBlocks, findMarkers, tokenizeDocument } from '../footnotes';
import type { Checkpoint } from '../pipeline/stages';
import type { ArtifactSnapshot, SectionContent } from '../repository/types';

/** Final drafts at or below this size are treated as failed writes. */
export const MIN_FINAL_DRAFT_BYTES = 100;

export interface DetectionOptions {
  /** Section count of the outline in use. */
  expectedSectionCount: number;
  /** Sections inspected for organization hyperlinks. */
  linkSampleSections?: number[];
  /** Section that carries team profiles. */
  teamSectionNumber?: number;
}

export interface CheckpointDetection {
  checkpoint: Checkpoint;
  reason: string;
}

const DEFAULT_LINK_SAMPLE = [2, 3, 4, 5, 6];
const DEFAULT_TEAM_SECTION = 4;
const PROFILE_URL_RE = /linkedin\.com\/in\//i;
// organization links only: profile links belong to enrich_socials
const ORG_LINK_RE = /\[(?!\^)[^\]\n]+\]\(https?:\/\/(?![^)\s]*linkedin\.com\/in\/)/;

function proseOf(content: string): string {
  return tokenizeDocument(content)
    .map((s) => (s.kind === 'prose' ? s.text : ''))
    .join('');
}

function hasCitations(text: string): boolean {
  const segments = tokenizeDocument(text);
  if (citationBlocks(segments).length > 0) return true;
  return segments.some((s) => s.kind === 'prose' && findMarkers(s.text).length > 0);
}

function hasHyperlinks(sections: SectionContent[], sample: number[]): boolean {
  return sections.some((s) => sample.includes(s.id.number) && ORG_LINK_RE.test(proseOf(s.content)));
}

/**
 * Classifies a document version by the furthest stage whose artifacts are
 * present and well-formed, returning the stage to run next. Checks run
 * latest-first and stop at the first match.
 */
export function detectCheckpoint(snapshot: ArtifactSnapshot, options: DetectionOptions): CheckpointDetection {
  const { json } = snapshot;

  if (json.state?.finalMemo) {
    return { checkpoint: 'complete', reason: 'state snapshot carries the final memo' };
  }

  const validation = json.validation;
  if (validation) {
    if (validation.overallScore !== undefined) {
      return { checkpoint: 'finalize', reason: 'validation artifact has an overall score' };
    }
    if (validation.factCheck) {
      return { checkpoint: 'validate', reason: 'validation artifact has fact-check results' };
    }
    if (validation.citationValidation) {
      return { checkpoint: 'fact_check', reason: 'validation artifact has citation validation only' };
    }
  }

  const draft = snapshot.finalDraft;
  if (draft !== undefined && Buffer.byteLength(draft, 'utf-8') > MIN_FINAL_DRAFT_BYTES && hasCitations(draft)) {
    return draft.includes(TOC_HEADING)
      ? { checkpoint: 'validate_citations', reason: 'final draft has a table of contents' }
      : { checkpoint: 'toc', reason: 'final draft has citations but no table of contents' };
  }

  const sections = snapshot.sections;
  if (sections.length > 0 && sections.length >= options.expectedSectionCount) {
    const sample = options.linkSampleSections ?? DEFAULT_LINK_SAMPLE;
    if (hasHyperlinks(sections, sample)) {
      return { checkpoint: 'cite', reason: 'sections carry organization links' };
    }

    const teamNumber = options.teamSectionNumber ?? DEFAULT_TEAM_SECTION;
    const team = sections.find((s) => s.id.number === teamNumber);
    if (team && PROFILE_URL_RE.test(team.content)) {
      return { checkpoint: 'enrich_links', reason: 'team section carries profile links' };
    }

    if (snapshot.header !== undefined) {
      return { checkpoint: 'enrich_socials', reason: 'header artifact exists' };
    }
    return { checkpoint: 'enrich_trademark', reason: 'all sections drafted' };
  }

  if (sections.length > 0) {
    return {
      checkpoint: 'draft',
      reason: `${sections.length} of ${options.expectedSectionCount} sections drafted`,
    };
  }

  if (json.research || snapshot.sectionResearch.length > 0) {
    return { checkpoint: 'draft', reason: 'research artifact exists' };
  }

  if (json['deck-analysis']) {
    return { checkpoint: 'research', reason: 'deck analysis exists' };
  }

  return { checkpoint: 'start', reason: 'no artifacts found' };
}

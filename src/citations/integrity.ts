import { citationBlocks, markerLabels, tokenizeDocument } from '../footnotes';

export interface IntegrityCheck {
  accepted: boolean;
  /** The rewritten text when accepted, otherwise the original. */
  text: string;
  reason?: string;
}

function footnoteShape(text: string): { markers: Set<string>; definitions: Set<string>; blocks: number } {
  const segments = tokenizeDocument(text);
  const blocks = citationBlocks(segments);
  const prose = segments.map((s) => (s.kind === 'prose' ? s.text : '')).join('');
  return {
    markers: new Set(markerLabels(prose)),
    definitions: new Set(blocks.flatMap((b) => b.definitions.map((d) => d.label))),
    blocks: blocks.length,
  };
}

function missing(before: Set<string>, after: Set<string>): string[] {
  return [...before].filter((label) => !after.has(label));
}

/**
 * Accepts a rewritten section only when it kept every marker label, every
 * definition label and its citations block. Otherwise the original text is
 * kept.
 */
export function guardCitationIntegrity(before: string, after: string): IntegrityCheck {
  if (after.trim().length === 0) {
    return { accepted: false, text: before, reason: 'rewrite returned empty text' };
  }

  const original = footnoteShape(before);
  const rewritten = footnoteShape(after);

  if (original.blocks > 0 && rewritten.blocks === 0) {
    return { accepted: false, text: before, reason: 'citations section was removed' };
  }

  const lostMarkers = missing(original.markers, rewritten.markers);
  if (lostMarkers.length > 0) {
    return {
      accepted: false,
      text: before,
      reason: `citation markers lost: ${lostMarkers.map((l) => `[^${l}]`).join(', ')}`,
    };
  }

  const lostDefinitions = missing(original.definitions, rewritten.definitions);
  if (lostDefinitions.length > 0) {
    return {
      accepted: false,
      text: before,
      reason: `citation definitions lost: ${lostDefinitions.map((l) => `[^${l}]`).join(', ')}`,
    };
  }

  return { accepted: true, text: after };
}

import { citationBlocks, findMarkers, normalizeDefinitionText, tokenizeDocument } from './parser';
import type { DiagnosticKind, DocumentSegment, FootnoteDiagnostic } from './types';

/** Defects that leave the document degraded rather than merely untidy. */
const ERROR_KINDS: ReadonlySet<DiagnosticKind> = new Set<DiagnosticKind>([
  'dangling-reference',
  'conflicting-definition',
]);

export function isErrorDiagnostic(d: FootnoteDiagnostic): boolean {
  return ERROR_KINDS.has(d.kind);
}

export function describeDiagnostic(d: FootnoteDiagnostic): string {
  switch (d.kind) {
    case 'dangling-reference':
      return `Marker [^${d.label}] has no matching definition`;
    case 'orphan-definition':
      return `Definition [^${d.label}] is never referenced`;
    case 'multiple-citation-blocks':
      return `Found ${d.count} citation blocks where one was expected`;
    case 'duplicate-label':
      return `Label [^${d.label}] is defined more than once with the same text`;
    case 'conflicting-definition':
      return `Label [^${d.label}] is defined more than once with different text`;
    case 'unparsed-block-text':
      return `Citations block contains text outside any definition: "${d.text}"`;
  }
}

/**
 * Checks one footnote scope (a section before consolidation, or the whole
 * document after it) for dangling markers, orphan definitions, repeated
 * labels and stray block content.
 */
export function analyzeSegments(segments: DocumentSegment[], unit: number = 0): FootnoteDiagnostic[] {
  const diagnostics: FootnoteDiagnostic[] = [];
  const blocks = citationBlocks(segments);

  if (blocks.length > 1) {
    diagnostics.push({ kind: 'multiple-citation-blocks', count: blocks.length, unit });
  }

  const defined = new Map<string, string>();
  for (const block of blocks) {
    for (const text of block.unparsed) {
      diagnostics.push({ kind: 'unparsed-block-text', text, unit });
    }
    for (const def of block.definitions) {
      const normalized = normalizeDefinitionText(def.text);
      const existing = defined.get(def.label);
      if (existing === undefined) {
        defined.set(def.label, normalized);
      } else if (existing === normalized) {
        diagnostics.push({ kind: 'duplicate-label', label: def.label, unit });
      } else {
        diagnostics.push({ kind: 'conflicting-definition', label: def.label, unit });
      }
    }
  }

  const referenced = new Set<string>();
  for (const segment of segments) {
    if (segment.kind !== 'prose') continue;
    for (const marker of findMarkers(segment.text)) referenced.add(marker.label);
  }

  for (const label of referenced) {
    if (!defined.has(label)) diagnostics.push({ kind: 'dangling-reference', label, unit });
  }
  for (const label of defined.keys()) {
    if (!referenced.has(label)) diagnostics.push({ kind: 'orphan-definition', label, unit });
  }

  return diagnostics;
}

export function analyzeFootnotes(text: string, unit: number = 0): FootnoteDiagnostic[] {
  return analyzeSegments(tokenizeDocument(text), unit);
}

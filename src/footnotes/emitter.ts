import { CITATIONS_HEADING } from './parser';
import type { BackReference, RenderedDefinition } from './types';

const NUMERIC_LABEL_RE = /^\d+$/;

/** Orders labels with non-numeric labels first (alphabetical), then numeric ascending. */
export function compareLabels(a: string, b: string): number {
  const aNum = NUMERIC_LABEL_RE.test(a);
  const bNum = NUMERIC_LABEL_RE.test(b);
  if (aNum && bNum) return Number(a) - Number(b);
  if (aNum) return 1;
  if (bNum) return -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

function renderBackReferences(refs: BackReference[]): string {
  return refs.map((r) => `[${r.title}](#${r.anchor})`).join(' · ');
}

export function renderDefinition(def: RenderedDefinition): string {
  const line = `[^${def.label}]: ${def.text}`;
  if (!def.backReferences || def.backReferences.length < 2) return line;
  return `${line}\n    Cited in: ${renderBackReferences(def.backReferences)}`;
}

/**
 * Renders one citations block: the heading, a blank line, then each
 * definition in ascending label order separated by one blank line.
 */
export function renderCitationsBlock(entries: RenderedDefinition[]): string {
  const sorted = [...entries].sort((a, b) => compareLabels(a.label, b.label));
  const body = sorted.map(renderDefinition).join('\n\n');
  return body.length > 0 ? `${CITATIONS_HEADING}\n\n${body}\n` : `${CITATIONS_HEADING}\n`;
}

/** Collapses runs of three or more newlines to a single blank line. */
export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, '\n\n');
}

/** Appends a citations block to prose, separated by one blank line. */
export function appendCitationsBlock(prose: string, entries: RenderedDefinition[]): string {
  const body = collapseBlankLines(prose).trimEnd();
  if (entries.length === 0) return `${body}\n`;
  const block = renderCitationsBlock(entries);
  return body.length > 0 ? `${body}\n\n${block}` : block;
}

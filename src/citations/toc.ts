import { isCitationsHeading, splitLines } from '../footnotes';

export const TOC_HEADING = '## Table of Contents';

const TOC_HEADING_RE = /^##\s+Table of Contents\s*$/m;
const FENCE_RE = /^\s*(```|~~~)/;
const RULE_RE = /^---\s*$/;

export interface TocEntry {
  level: 2 | 3;
  text: string;
  anchor: string;
}

/**
 * Pandoc-style anchor slug. A leading section number such as `01. ` is
 * dropped so anchors stay stable when sections are renumbered.
 */
export function slugify(text: string): string {
  return text
    .replace(/^\d+\.\s*/, '')
    .toLowerCase()
    .replace(/[\s_]+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function hasTableOfContents(text: string): boolean {
  return TOC_HEADING_RE.test(text);
}

/** Collects h2 and h3 headings that precede the citations section. */
export function extractTocEntries(text: string): TocEntry[] {
  const entries: TocEntry[] = [];
  let inFence = false;

  for (const raw of splitLines(text)) {
    const line = raw.replace(/\r?\n$/, '');
    if (FENCE_RE.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;
    if (isCitationsHeading(line)) break;

    const h2 = /^##\s+(.+)$/.exec(line);
    const h3 = h2 ? null : /^###\s+(.+)$/.exec(line);
    const match = h2 ?? h3;
    if (!match || match[1] === undefined) continue;

    const heading = match[1].trim();
    if (heading === 'Table of Contents') continue;
    entries.push({ level: h2 ? 2 : 3, text: heading, anchor: slugify(heading) });
  }

  return entries;
}

export function generateTableOfContents(text: string): string {
  const lines = [`${TOC_HEADING}\n`];
  for (const entry of extractTocEntries(text)) {
    const indent = entry.level === 3 ? '  ' : '';
    lines.push(`${indent}- [${entry.text}](#${entry.anchor})`);
  }
  lines.push('');
  return lines.join('\n');
}

/**
 * Inserts a table of contents after the first `---` rule (the end of the
 * memo header), or at the top when the document has no rule. Documents
 * that already carry one are returned unchanged.
 */
export function insertTableOfContents(text: string): { text: string; inserted: boolean; entries: number } {
  if (hasTableOfContents(text)) return { text, inserted: false, entries: 0 };

  const entries = extractTocEntries(text).length;
  if (entries === 0) return { text, inserted: false, entries: 0 };

  const toc = generateTableOfContents(text);
  const lines = text.split('\n');
  const ruleIndex = lines.findIndex((line) => RULE_RE.test(line));

  if (ruleIndex === -1) {
    return { text: `${toc}\n${text}`, inserted: true, entries };
  }
  lines.splice(ruleIndex + 1, 0, `\n${toc.trimEnd()}`);
  return { text: lines.join('\n'), inserted: true, entries };
}

import {
  collapseBlankLines,
  findMarkers,
  removeMarkers,
  renderCitationsBlock,
  rewriteMarkers,
  tokenizeDocument,
  type CitationDefinition,
} from '../footnotes';
import { splitIntoUnits } from './consolidator';

/** URL shapes a model produces when it invents a source. */
export const HALLUCINATION_PATTERNS: readonly RegExp[] = [
  /example\.com/i,
  /XXXXX/i,
  /placeholder/i,
  /\/path\/to\//i,
  /\{[^}]+\}/,
];

const LINK_URL_RE = /\]\((https?:\/\/[^)\s]+)\)/;
const FIELD_URL_RE = /URL:\s*(https?:\/\/\S+)/i;
const NUMERIC_LABEL_RE = /^\d+$/;

export interface RemovedSource {
  label: string;
  url: string;
  pattern: string;
}

export interface SourceCleanup {
  text: string;
  removed: RemovedSource[];
}

/** The URL of a definition: a markdown link target, else the `URL:` field. */
export function citationUrl(text: string): string | undefined {
  return LINK_URL_RE.exec(text)?.[1] ?? FIELD_URL_RE.exec(text)?.[1];
}

function renumbering(labels: Iterable<string>): Map<string, string> {
  const numeric = [...new Set(labels)].filter((l) => NUMERIC_LABEL_RE.test(l)).sort((a, b) => Number(a) - Number(b));
  return new Map(numeric.map((label, i) => [label, String(i + 1)]));
}

/**
 * Drops citations whose URL matches a placeholder pattern, together with
 * their markers, then renumbers the remaining numeric labels from 1 with no
 * gaps. Each section's markers only lose the definitions of its own block.
 * Text without such citations is returned unchanged.
 */
export function removeHallucinatedSources(text: string): SourceCleanup {
  const units = splitIntoUnits(tokenizeDocument(text));
  const removed: RemovedSource[] = [];

  const cleaned = units.map((unit) => {
    const dropped = new Set<string>();
    const definitions = unit.definitions.filter((def) => {
      const url = citationUrl(def.text);
      const pattern = url === undefined ? undefined : HALLUCINATION_PATTERNS.find((p) => p.test(url));
      if (url === undefined || pattern === undefined) return true;
      removed.push({ label: def.label, url, pattern: pattern.source });
      dropped.add(def.label);
      return false;
    });
    return { prose: removeMarkers(unit.prose, dropped), definitions, hadBlock: unit.definitions.length > 0 };
  });

  if (removed.length === 0) return { text, removed };

  const mapping = renumbering(
    cleaned.flatMap((u) => [...u.definitions.map((d) => d.label), ...findMarkers(u.prose).map((m) => m.label)])
  );
  const relabel = (label: string): string => mapping.get(label) ?? label;

  const parts = cleaned.map((unit, i) => {
    const prose = rewriteMarkers(unit.prose, (label) => mapping.get(label));
    if (!unit.hadBlock) return prose;
    const definitions = unit.definitions.map((d): CitationDefinition => ({ label: relabel(d.label), text: d.text }));
    const body = prose.trimEnd();
    const last = i === cleaned.length - 1;
    if (definitions.length === 0) return last ? `${body}\n` : `${body}\n\n`;
    const block = renderCitationsBlock(definitions);
    const joined = body.length > 0 ? `${body}\n\n${block}` : block;
    return last ? joined : `${joined}\n`;
  });

  return { text: collapseBlankLines(parts.join('')), removed };
}

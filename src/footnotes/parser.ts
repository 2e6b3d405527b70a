import type {
  CitationDefinition,
  CitationMarker,
  CitationsSegment,
  DocumentSegment,
} from './types';

export const CITATIONS_HEADING = '### Citations';

const CITATIONS_HEADING_RE = /^###\s+Citations\s*$/;
const HEADING_RE = /^#{1,6}\s+\S/;
const RULE_RE = /^-{3,}\s*$/;
const FENCE_RE = /^\s*(```|~~~)/;
const DEFINITION_START_RE = /^\[\^(\w+)\]:[ \t]*/;
const MARKER_RE = /\[\^(\w+)\](?!:)/g;

/**
 * Splits text into lines, keeping each line's terminator so that joining
 * the result reproduces the input exactly.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  return text.split(/(?<=\n)/);
}

function stripEol(line: string): string {
  return line.replace(/\r?\n$/, '');
}

export function isCitationsHeading(line: string): boolean {
  return CITATIONS_HEADING_RE.test(stripEol(line));
}

/**
 * Parses the body of a citations block into definitions. A definition
 * runs from its `[^label]:` line to the next definition line or the end
 * of the body, so wrapped and multi-line definitions are kept whole.
 */
export function parseDefinitions(body: string): { definitions: CitationDefinition[]; unparsed: string[] } {
  const definitions: CitationDefinition[] = [];
  const unparsed: string[] = [];
  let current: { label: string; lines: string[] } | undefined;

  const flush = (): void => {
    if (!current) return;
    definitions.push({ label: current.label, text: current.lines.join('\n').trim() });
    current = undefined;
  };

  for (const raw of splitLines(body)) {
    const line = stripEol(raw);
    const start = DEFINITION_START_RE.exec(line);
    if (start && start[1]) {
      flush();
      current = { label: start[1], lines: [line.slice(start[0].length)] };
      continue;
    }
    if (current) {
      current.lines.push(line);
    } else if (line.trim().length > 0) {
      unparsed.push(line.trim());
    }
  }
  flush();

  return { definitions, unparsed };
}

function citationsSegment(heading: string, body: string): CitationsSegment {
  const { definitions, unparsed } = parseDefinitions(body);
  return { kind: 'citations', heading, body, definitions, unparsed };
}

/**
 * Tokenizes a markdown document into prose and citations-block segments.
 *
 * A block opens at a `### Citations` heading outside fenced code and closes
 * before the next heading, the next `---` rule, or the end of input.
 * Concatenating every segment's text reproduces the input.
 */
export function tokenizeDocument(text: string): DocumentSegment[] {
  const segments: DocumentSegment[] = [];
  let prose = '';
  let block: { heading: string; body: string } | undefined;
  let inFence = false;

  const flushProse = (): void => {
    if (prose.length > 0) segments.push({ kind: 'prose', text: prose });
    prose = '';
  };
  const flushBlock = (): void => {
    if (block) segments.push(citationsSegment(block.heading, block.body));
    block = undefined;
  };

  for (const raw of splitLines(text)) {
    const line = stripEol(raw);

    if (block) {
      if (CITATIONS_HEADING_RE.test(line)) {
        flushBlock();
        block = { heading: raw, body: '' };
        continue;
      }
      if (HEADING_RE.test(line) || RULE_RE.test(line)) {
        flushBlock();
        prose += raw;
        continue;
      }
      block.body += raw;
      continue;
    }

    if (inFence) {
      prose += raw;
      if (FENCE_RE.test(line)) inFence = false;
      continue;
    }

    if (FENCE_RE.test(line)) {
      inFence = true;
      prose += raw;
      continue;
    }

    if (CITATIONS_HEADING_RE.test(line)) {
      flushProse();
      block = { heading: raw, body: '' };
      continue;
    }

    prose += raw;
  }

  flushBlock();
  flushProse();
  return segments;
}

export function citationBlocks(segments: DocumentSegment[]): CitationsSegment[] {
  return segments.filter((s): s is CitationsSegment => s.kind === 'citations');
}

/**
 * Applies `fn` to every line of prose that sits outside fenced code, leaving
 * fenced lines untouched.
 */
function mapUnfencedLines(text: string, fn: (line: string) => string): string {
  let inFence = false;
  let out = '';
  for (const raw of splitLines(text)) {
    const line = stripEol(raw);
    if (FENCE_RE.test(line)) {
      inFence = !inFence;
      out += raw;
      continue;
    }
    out += inFence ? raw : fn(raw);
  }
  return out;
}

/** Finds citation markers in prose, ignoring fenced code and definition openers. */
export function findMarkers(text: string): CitationMarker[] {
  let offset = 0;
  let inFence = false;
  const result: CitationMarker[] = [];
  for (const raw of splitLines(text)) {
    const line = stripEol(raw);
    if (FENCE_RE.test(line)) {
      inFence = !inFence;
    } else if (!inFence) {
      for (const m of raw.matchAll(MARKER_RE)) {
        if (m[1] !== undefined && m.index !== undefined) {
          result.push({ label: m[1], offset: offset + m.index });
        }
      }
    }
    offset += raw.length;
  }
  return result;
}

/** Distinct marker labels in order of first appearance. */
export function markerLabels(text: string): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const marker of findMarkers(text)) {
    if (!seen.has(marker.label)) {
      seen.add(marker.label);
      ordered.push(marker.label);
    }
  }
  return ordered;
}

/**
 * Rewrites marker labels in a single pass. Labels for which `resolve`
 * returns undefined are left as they are.
 */
export function rewriteMarkers(text: string, resolve: (label: string) => string | undefined): string {
  return mapUnfencedLines(text, (raw) =>
    raw.replace(MARKER_RE, (whole: string, label: string) => {
      const next = resolve(label);
      return next === undefined ? whole : `[^${next}]`;
    })
  );
}

const MARKER_WITH_SPACE_RE = /[ \t]*\[\^(\w+)\](?!:)/g;

/** Deletes the markers whose label is in `labels`, with the spaces before them. */
export function removeMarkers(text: string, labels: ReadonlySet<string>): string {
  if (labels.size === 0) return text;
  return mapUnfencedLines(text, (raw) =>
    raw.replace(MARKER_WITH_SPACE_RE, (whole: string, label: string) => (labels.has(label) ? '' : whole))
  );
}

/** Collapses runs of whitespace so equivalent definitions compare equal. */
export function normalizeDefinitionText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

import {
  appendCitationsBlock,
  citationBlocks,
  collapseBlankLines,
  compareLabels,
  findMarkers,
  normalizeDefinitionText,
  rewriteMarkers,
  tokenizeDocument,
  type BackReference,
  type CitationDefinition,
  type DocumentSegment,
  type FootnoteDiagnostic,
  type RenderedDefinition,
} from '../footnotes';
import { slugify } from './toc';

/**
 * One unit of consolidation: a run of prose and the definitions it cites
 * into. In a document with per-section blocks, unit i is the prose before
 * citations block i together with that block.
 */
export interface CitationUnit {
  /** Section heading, used to anchor back-references. */
  title?: string;
  prose: string;
  definitions: CitationDefinition[];
}

export interface ConsolidateOptions {
  /** Merge definitions with identical normalized text under one label. */
  dedupe?: boolean;
  /** Render a "Cited in" list for definitions cited from two or more sections. */
  backReferences?: boolean;
}

export interface UnitConsolidation {
  /** Each unit's prose with markers rewritten to global labels. */
  prose: string[];
  definitions: RenderedDefinition[];
  /** Per-unit map from original label to global label. */
  mappings: Map<string, string>[];
  diagnostics: FootnoteDiagnostic[];
}

export type ConsolidationStatus = 'consolidated' | 'nothing-to-consolidate' | 'already-consolidated';

export interface ConsolidationResult {
  text: string;
  status: ConsolidationStatus;
  changed: boolean;
  /** Number of citation blocks found in the input. */
  blocks: number;
  /** Number of definitions in the output block. */
  citations: number;
  diagnostics: FootnoteDiagnostic[];
}

interface DefinitionGroup {
  label: string;
  canonical: CitationDefinition;
  citedFrom: Set<number>;
}

function recordLocalDuplicates(unit: CitationUnit, index: number, diagnostics: FootnoteDiagnostic[]): void {
  const seen = new Map<string, string>();
  for (const def of unit.definitions) {
    const normalized = normalizeDefinitionText(def.text);
    const prior = seen.get(def.label);
    if (prior === undefined) {
      seen.set(def.label, normalized);
    } else {
      diagnostics.push({
        kind: prior === normalized ? 'duplicate-label' : 'conflicting-definition',
        label: def.label,
        unit: index,
      });
    }
  }
}

/**
 * Positional consolidation: every definition gets the next global label in
 * document order and each unit's markers are rewritten through that unit's
 * own mapping.
 */
function consolidatePositional(units: CitationUnit[]): UnitConsolidation {
  const diagnostics: FootnoteDiagnostic[] = [];
  const definitions: RenderedDefinition[] = [];
  const mappings: Map<string, string>[] = [];
  let next = 1;

  units.forEach((unit, index) => {
    recordLocalDuplicates(unit, index, diagnostics);
    const mapping = new Map<string, string>();
    for (const def of unit.definitions) {
      const label = String(next++);
      if (!mapping.has(def.label)) mapping.set(def.label, label);
      definitions.push({ label, text: def.text });
    }
    mappings.push(mapping);
  });

  const global = new Set(definitions.map((d) => d.label));
  const referenced = new Set<string>();
  const prose = units.map((unit, index) => {
    const mapping = mappings[index] ?? new Map<string, string>();
    for (const marker of findMarkers(unit.prose)) {
      const resolved = mapping.get(marker.label);
      if (resolved === undefined) {
        diagnostics.push({ kind: 'dangling-reference', label: marker.label, unit: index });
      } else {
        referenced.add(resolved);
      }
    }
    return rewriteMarkers(unit.prose, (label) => mapping.get(label) ?? unresolvedLabel(label, global));
  });

  for (const def of definitions) {
    if (!referenced.has(def.label)) {
      diagnostics.push({ kind: 'orphan-definition', label: def.label, unit: -1 });
    }
  }

  return { prose, definitions, mappings, diagnostics: dedupeDiagnostics(diagnostics) };
}

/**
 * Dedup consolidation: definitions are grouped by normalized text, groups
 * are numbered by first appearance, and the member with the lowest original
 * label supplies the canonical text.
 */
function consolidateDeduplicated(units: CitationUnit[], backReferences: boolean): UnitConsolidation {
  const diagnostics: FootnoteDiagnostic[] = [];
  const groups: DefinitionGroup[] = [];
  const byText = new Map<string, DefinitionGroup>();
  const byOriginalLabel = new Map<string, Set<DefinitionGroup>>();
  const mappings: Map<string, string>[] = [];

  units.forEach((unit, index) => {
    recordLocalDuplicates(unit, index, diagnostics);
    const mapping = new Map<string, string>();
    for (const def of unit.definitions) {
      const key = normalizeDefinitionText(def.text);
      let group = byText.get(key);
      if (!group) {
        group = { label: String(groups.length + 1), canonical: def, citedFrom: new Set() };
        groups.push(group);
        byText.set(key, group);
      } else if (compareLabels(def.label, group.canonical.label) < 0) {
        group.canonical = def;
      }
      if (!mapping.has(def.label)) mapping.set(def.label, group.label);

      const sameLabel = byOriginalLabel.get(def.label) ?? new Set<DefinitionGroup>();
      sameLabel.add(group);
      byOriginalLabel.set(def.label, sameLabel);
    }
    mappings.push(mapping);
  });

  const groupByLabel = new Map(groups.map((g) => [g.label, g]));
  const global = new Set(groupByLabel.keys());

  const resolveAcrossDocument = (label: string): string | undefined => {
    const candidates = byOriginalLabel.get(label);
    if (!candidates || candidates.size !== 1) return undefined;
    const [only] = candidates;
    return only?.label;
  };

  const prose = units.map((unit, index) => {
    const mapping = mappings[index] ?? new Map<string, string>();
    const resolve = (label: string): string | undefined => mapping.get(label) ?? resolveAcrossDocument(label);

    for (const marker of findMarkers(unit.prose)) {
      const resolved = resolve(marker.label);
      const group = resolved === undefined ? undefined : groupByLabel.get(resolved);
      if (group) {
        group.citedFrom.add(index);
      } else {
        diagnostics.push({ kind: 'dangling-reference', label: marker.label, unit: index });
      }
    }
    return rewriteMarkers(unit.prose, (label) => resolve(label) ?? unresolvedLabel(label, global));
  });

  const definitions = groups.map((group): RenderedDefinition => {
    if (group.citedFrom.size === 0) {
      diagnostics.push({ kind: 'orphan-definition', label: group.label, unit: -1 });
    }
    const rendered: RenderedDefinition = { label: group.label, text: group.canonical.text };
    if (backReferences) {
      const refs = collectBackReferences(units, group.citedFrom);
      if (refs.length >= 2) rendered.backReferences = refs;
    }
    return rendered;
  });

  return { prose, definitions, mappings, diagnostics: dedupeDiagnostics(diagnostics) };
}

/**
 * A marker that resolves to nothing keeps its label unless that label is now
 * a global one, in which case it is renamed so it cannot cite the wrong source.
 */
function unresolvedLabel(label: string, global: Set<string>): string | undefined {
  return global.has(label) ? `unresolved_${label}` : undefined;
}

/** One back-reference per distinct section anchor, in document order. */
function collectBackReferences(units: CitationUnit[], citedFrom: Set<number>): BackReference[] {
  const refs: BackReference[] = [];
  const anchors = new Set<string>();
  for (const index of [...citedFrom].sort((a, b) => a - b)) {
    const title = units[index]?.title;
    if (!title) continue;
    const anchor = slugify(title);
    if (anchor.length === 0 || anchors.has(anchor)) continue;
    anchors.add(anchor);
    refs.push({ title, anchor });
  }
  return refs;
}

function dedupeDiagnostics(diagnostics: FootnoteDiagnostic[]): FootnoteDiagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter((d) => {
    const key = JSON.stringify(d);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function consolidateUnits(units: CitationUnit[], options: ConsolidateOptions = {}): UnitConsolidation {
  return options.dedupe
    ? consolidateDeduplicated(units, options.backReferences ?? false)
    : consolidatePositional(units);
}

const SECTION_HEADING_RE = /^#{1,2}\s+(.+?)\s*$/m;

export function sectionTitle(prose: string): string | undefined {
  const match = SECTION_HEADING_RE.exec(prose);
  return match?.[1];
}

/**
 * Pairs prose with citations blocks by position: the prose that precedes
 * block i is unit i. Blocks with no prose between them belong to the same
 * unit. Prose after the last block forms a final unit with no definitions
 * of its own.
 */
export function splitIntoUnits(segments: DocumentSegment[]): CitationUnit[] {
  const units: CitationUnit[] = [];
  let prose = '';
  let title: string | undefined;

  for (const segment of segments) {
    if (segment.kind === 'prose') {
      prose += segment.text;
      continue;
    }
    const previous = units[units.length - 1];
    if (previous && prose.trim().length === 0) {
      previous.prose += prose;
      previous.definitions = [...previous.definitions, ...segment.definitions];
      prose = '';
      continue;
    }
    title = sectionTitle(prose) ?? title;
    units.push({ title, prose, definitions: segment.definitions });
    prose = '';
  }

  if (prose.length > 0) {
    units.push({ title: sectionTitle(prose) ?? title, prose, definitions: [] });
  }
  return units;
}

/**
 * Merges the per-section citations blocks of a document into one trailing
 * block with global sequential labels, rewriting every marker to match.
 *
 * Documents with zero or one citations block are returned unchanged.
 */
export function consolidateCitations(text: string, options: ConsolidateOptions = {}): ConsolidationResult {
  const segments = tokenizeDocument(text);
  const blocks = citationBlocks(segments);

  if (blocks.length === 0) {
    return { text, status: 'nothing-to-consolidate', changed: false, blocks: 0, citations: 0, diagnostics: [] };
  }
  if (blocks.length === 1) {
    const citations = blocks[0]?.definitions.length ?? 0;
    return { text, status: 'already-consolidated', changed: false, blocks: 1, citations, diagnostics: [] };
  }

  const units = splitIntoUnits(segments);
  const result = consolidateUnits(units, options);
  const output = appendCitationsBlock(collapseBlankLines(result.prose.join('')), result.definitions);

  return {
    text: output,
    status: 'consolidated',
    changed: output !== text,
    blocks: blocks.length,
    citations: result.definitions.length,
    diagnostics: result.diagnostics,
  };
}

import {
  appendCitationsBlock,
  citationBlocks,
  normalizeDefinitionText,
  tokenizeDocument,
  type CitationDefinition,
  type FootnoteDiagnostic,
} from '../footnotes';

export interface MergeResult {
  text: string;
  /** The section's text outside every citations block. */
  prose: string;
  changed: boolean;
  blocks: number;
  definitions: CitationDefinition[];
  diagnostics: FootnoteDiagnostic[];
}

/**
 * Collapses the citations blocks of a single section into one trailing
 * block. Labels are kept as they are; when a label is defined twice the
 * first definition wins and the conflict is reported.
 */
export function mergeCitationBlocks(text: string, unit: number = 0): MergeResult {
  const segments = tokenizeDocument(text);
  const blocks = citationBlocks(segments);

  const diagnostics: FootnoteDiagnostic[] = [];
  const merged = new Map<string, CitationDefinition>();
  for (const block of blocks) {
    for (const def of block.definitions) {
      const existing = merged.get(def.label);
      if (!existing) {
        merged.set(def.label, def);
        continue;
      }
      const same = normalizeDefinitionText(existing.text) === normalizeDefinitionText(def.text);
      diagnostics.push({ kind: same ? 'duplicate-label' : 'conflicting-definition', label: def.label, unit });
    }
  }
  const definitions = [...merged.values()];
  const prose = segments.map((s) => (s.kind === 'prose' ? s.text : '')).join('');

  if (blocks.length < 2) {
    return { text, prose, changed: false, blocks: blocks.length, definitions, diagnostics };
  }

  const output = appendCitationsBlock(prose, definitions);
  return { text: output, prose, changed: output !== text, blocks: blocks.length, definitions, diagnostics };
}

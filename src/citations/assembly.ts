import { appendCitationsBlock, collapseBlankLines, type FootnoteDiagnostic } from '../footnotes';
import { consolidateUnits, sectionTitle, type CitationUnit } from './consolidator';
import { mergeCitationBlocks } from './merge';

export interface SectionDocument {
  number: number;
  slug: string;
  /** Fallback title when the section body carries no heading of its own. */
  title: string;
  content: string;
}

export interface AssemblyResult {
  text: string;
  citations: number;
  sections: number;
  diagnostics: FootnoteDiagnostic[];
}

function toUnit(content: string, fallbackTitle: string | undefined, unit: number): {
  unit: CitationUnit;
  diagnostics: FootnoteDiagnostic[];
} {
  const merged = mergeCitationBlocks(content, unit);
  const prose = merged.prose;
  const title = sectionTitle(prose) ?? fallbackTitle;
  return {
    unit: { title, prose, definitions: merged.definitions },
    diagnostics: merged.diagnostics,
  };
}

/**
 * Builds the final draft: header first, then every section in order, with
 * all section-local citations deduplicated into one trailing block.
 */
export function assembleFinalDraft(
  header: string | undefined,
  sections: SectionDocument[],
  options: { backReferences?: boolean } = {}
): AssemblyResult {
  const units: CitationUnit[] = [];
  const diagnostics: FootnoteDiagnostic[] = [];

  if (header && header.trim().length > 0) {
    const { unit, diagnostics: found } = toUnit(header, undefined, 0);
    units.push(unit);
    diagnostics.push(...found);
  }

  const ordered = [...sections].sort((a, b) => a.number - b.number);
  for (const section of ordered) {
    const { unit, diagnostics: found } = toUnit(section.content, section.title, section.number);
    units.push(unit);
    diagnostics.push(...found);
  }

  const result = consolidateUnits(units, { dedupe: true, backReferences: options.backReferences ?? false });
  const body = result.prose
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .join('\n\n');

  return {
    text: appendCitationsBlock(collapseBlankLines(body), result.definitions),
    citations: result.definitions.length,
    sections: ordered.length,
    diagnostics: [...diagnostics, ...result.diagnostics],
  };
}

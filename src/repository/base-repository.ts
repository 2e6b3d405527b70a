import type { ZodType, ZodTypeDef } from 'zod';
import { warn } from '../output/logger';
import { STATE_SNAPSHOT_SCHEMA, DECK_ANALYSIS_SCHEMA, RESEARCH_SCHEMA, VALIDATION_ARTIFACT_SCHEMA } from '../schemas/artifact-schemas';
import { FACT_CHECK_REPORT_SCHEMA } from '../schemas/fact-check-schemas';
import type {
  ArtifactSnapshot,
  DocumentRepository,
  JsonArtifactKind,
  JsonArtifacts,
  SectionContent,
  SectionId,
  TextArtifactKind,
} from './types';

/** JSON artifacts shorter than this are treated as truncated writes. */
export const MIN_JSON_ARTIFACT_BYTES = 10;

export const SECTIONS_DIR = '2-sections';
export const SECTION_RESEARCH_DIR = '1-research';
export const LEGACY_FINAL_DRAFT = '4-final-draft.md';
const HEADER_FILE = 'header.md';

type ArtifactSchemas = { [K in JsonArtifactKind]: ZodType<JsonArtifacts[K], ZodTypeDef, unknown> };

const JSON_ARTIFACTS: { [K in JsonArtifactKind]: string } = {
  'deck-analysis': '0-deck-analysis.json',
  research: '1-research.json',
  validation: '3-validation.json',
  'fact-check': '4-fact-check.json',
  state: 'state.json',
};

const SCHEMAS: ArtifactSchemas = {
  'deck-analysis': DECK_ANALYSIS_SCHEMA,
  research: RESEARCH_SCHEMA,
  validation: VALIDATION_ARTIFACT_SCHEMA,
  'fact-check': FACT_CHECK_REPORT_SCHEMA,
  state: STATE_SNAPSHOT_SCHEMA,
};

const SECTION_FILE_RE = /^(\d{2})-(.+)\.md$/;
const FINAL_DRAFT_RE = /^6-.+\.md$/;

export function sectionFileName(id: SectionId): string {
  return `${String(id.number).padStart(2, '0')}-${id.slug}.md`;
}

export function sectionResearchFileName(id: SectionId): string {
  return `${String(id.number).padStart(2, '0')}-${id.slug}-research.md`;
}

export function parseSectionFileName(fileName: string): SectionId | undefined {
  const match = SECTION_FILE_RE.exec(fileName);
  if (!match || match[1] === undefined || match[2] === undefined) return undefined;
  return { number: Number(match[1]), slug: match[2] };
}

/**
 * Artifact layout and validation shared by every storage backend.
 * Subclasses provide raw reads and writes of paths relative to the
 * version directory.
 */
export abstract class BaseDocumentRepository implements DocumentRepository {
  constructor(public readonly name: string) {}

  protected abstract readRaw(relativePath: string): string | undefined;
  protected abstract writeRaw(relativePath: string, content: string): void;
  /** File names (not paths) directly inside a directory, '' being the root. */
  protected abstract listRaw(relativeDir: string): string[];

  get finalDraftFileName(): string {
    return `6-${this.name}.md`;
  }

  readArtifact<K extends JsonArtifactKind>(kind: K): JsonArtifacts[K] | undefined {
    const fileName = JSON_ARTIFACTS[kind];
    const raw = this.readRaw(fileName);
    if (raw === undefined) return undefined;

    if (Buffer.byteLength(raw, 'utf-8') < MIN_JSON_ARTIFACT_BYTES) {
      warn(`[memoforge] ${fileName} is truncated, treating as missing`);
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e: unknown) {
      const err = e instanceof Error ? e : new Error(String(e));
      warn(`[memoforge] ${fileName} is not valid JSON, treating as missing: ${err.message}`);
      return undefined;
    }

    const schema: ZodType<JsonArtifacts[K], ZodTypeDef, unknown> = SCHEMAS[kind];
    const result = schema.safeParse(json);
    if (!result.success) {
      warn(`[memoforge] ${fileName} failed validation, treating as missing: ${result.error.message}`);
      return undefined;
    }
    return result.data;
  }

  writeArtifact<K extends JsonArtifactKind>(kind: K, value: JsonArtifacts[K]): void {
    this.writeRaw(JSON_ARTIFACTS[kind], `${JSON.stringify(value, null, 2)}\n`);
  }

  readText(kind: TextArtifactKind): string | undefined {
    if (kind === 'header') return this.readRaw(HEADER_FILE);

    const current = this.readRaw(this.finalDraftFileName);
    if (current !== undefined) return current;

    const other = this.listRaw('').filter((f) => FINAL_DRAFT_RE.test(f)).sort()[0];
    if (other !== undefined) return this.readRaw(other);

    return this.readRaw(LEGACY_FINAL_DRAFT);
  }

  writeText(kind: TextArtifactKind, text: string): void {
    this.writeRaw(kind === 'header' ? HEADER_FILE : this.finalDraftFileName, text);
  }

  listSections(): SectionId[] {
    return this.listRaw(SECTIONS_DIR)
      .map(parseSectionFileName)
      .filter((id): id is SectionId => id !== undefined)
      .sort((a, b) => a.number - b.number);
  }

  readSection(id: SectionId): string | undefined {
    return this.readRaw(`${SECTIONS_DIR}/${sectionFileName(id)}`);
  }

  writeSection(id: SectionId, content: string): void {
    this.writeRaw(`${SECTIONS_DIR}/${sectionFileName(id)}`, content);
  }

  readSectionResearch(id: SectionId): string | undefined {
    return this.readRaw(`${SECTION_RESEARCH_DIR}/${sectionResearchFileName(id)}`);
  }

  writeSectionResearch(id: SectionId, content: string): void {
    this.writeRaw(`${SECTION_RESEARCH_DIR}/${sectionResearchFileName(id)}`, content);
  }

  readAll(): ArtifactSnapshot {
    const json: Partial<JsonArtifacts> = {};
    const deck = this.readArtifact('deck-analysis');
    if (deck) json['deck-analysis'] = deck;
    const research = this.readArtifact('research');
    if (research) json.research = research;
    const validation = this.readArtifact('validation');
    if (validation) json.validation = validation;
    const factCheck = this.readArtifact('fact-check');
    if (factCheck) json['fact-check'] = factCheck;
    const state = this.readArtifact('state');
    if (state) json.state = state;

    const sections: SectionContent[] = [];
    for (const id of this.listSections()) {
      const content = this.readSection(id);
      if (content !== undefined) sections.push({ id, content });
    }

    const sectionResearch: SectionContent[] = [];
    for (const fileName of this.listRaw(SECTION_RESEARCH_DIR).sort()) {
      const id = parseSectionFileName(fileName.replace(/-research\.md$/, '.md'));
      const content = id ? this.readSectionResearch(id) : undefined;
      if (id && content !== undefined) sectionResearch.push({ id, content });
    }

    const snapshot: ArtifactSnapshot = { json, sections, sectionResearch };
    const header = this.readText('header');
    if (header !== undefined) snapshot.header = header;
    const finalDraft = this.readText('final-draft');
    if (finalDraft !== undefined) snapshot.finalDraft = finalDraft;
    return snapshot;
  }
}

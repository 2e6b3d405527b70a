import type {
  DeckAnalysis,
  Research,
  StateSnapshot,
  ValidationArtifact,
} from '../schemas/artifact-schemas';
import type { FactCheckReport } from '../schemas/fact-check-schemas';

export interface JsonArtifacts {
  'deck-analysis': DeckAnalysis;
  research: Research;
  validation: ValidationArtifact;
  'fact-check': FactCheckReport;
  state: StateSnapshot;
}

export type JsonArtifactKind = keyof JsonArtifacts;
export type TextArtifactKind = 'header' | 'final-draft';

export interface SectionId {
  number: number;
  slug: string;
}

export interface SectionContent {
  id: SectionId;
  content: string;
}

/**
 * Everything a document version holds, read in one pass. JSON artifacts
 * that are missing or malformed are absent.
 */
export interface ArtifactSnapshot {
  json: Partial<JsonArtifacts>;
  header?: string;
  finalDraft?: string;
  sections: SectionContent[];
  sectionResearch: SectionContent[];
}

/**
 * Storage for one document version's artifacts.
 */
export interface DocumentRepository {
  /** Version directory name, e.g. `Acme-v0.0.3`. */
  readonly name: string;

  readArtifact<K extends JsonArtifactKind>(kind: K): JsonArtifacts[K] | undefined;
  writeArtifact<K extends JsonArtifactKind>(kind: K, value: JsonArtifacts[K]): void;

  readText(kind: TextArtifactKind): string | undefined;
  writeText(kind: TextArtifactKind, text: string): void;

  listSections(): SectionId[];
  readSection(id: SectionId): string | undefined;
  writeSection(id: SectionId, content: string): void;

  readSectionResearch(id: SectionId): string | undefined;
  writeSectionResearch(id: SectionId, content: string): void;

  readAll(): ArtifactSnapshot;
}

/**
 * Footnote micro-syntax types.
 *
 * A definition is `[^label]: text` at line start inside a `### Citations`
 * block; a marker is any other `[^label]` occurrence in prose.
 */

export interface CitationDefinition {
  label: string;
  /** Full definition text, trimmed. May span several lines. */
  text: string;
}

export interface CitationMarker {
  label: string;
  /** Character offset of the opening bracket within the scanned text. */
  offset: number;
}

export interface ProseSegment {
  kind: 'prose';
  text: string;
}

export interface CitationsSegment {
  kind: 'citations';
  /** The heading line exactly as it appeared, including its line ending. */
  heading: string;
  /** Everything after the heading up to the block's end. */
  body: string;
  definitions: CitationDefinition[];
  /** Non-blank text in the block that is not part of any definition. */
  unparsed: string[];
}

export type DocumentSegment = ProseSegment | CitationsSegment;

export interface BackReference {
  title: string;
  anchor: string;
}

export interface RenderedDefinition extends CitationDefinition {
  backReferences?: BackReference[];
}

export type FootnoteDiagnostic =
  | { kind: 'dangling-reference'; label: string; unit: number }
  | { kind: 'orphan-definition'; label: string; unit: number }
  | { kind: 'multiple-citation-blocks'; count: number; unit: number }
  | { kind: 'duplicate-label'; label: string; unit: number }
  | { kind: 'conflicting-definition'; label: string; unit: number }
  | { kind: 'unparsed-block-text'; text: string; unit: number };

export type DiagnosticKind = FootnoteDiagnostic['kind'];

/**
 * Knowledge base document types
 */

/** Scalar values allowed in document metadata */
export type MetadataValue = string | number | boolean | null;

export type DocumentMetadata = Record<string, MetadataValue>;

/** Value of the `doc_type` metadata key */
export type DocType = 'general' | 'flashcard_set';

export const DOC_TYPE_KEY = 'doc_type';

export interface KnowledgeDocument {
  id: string;
  content: string;
  metadata: DocumentMetadata;
}

/** A document returned from a ranked search */
export interface ScoredDocument extends KnowledgeDocument {
  /** Cosine similarity to the query, absent for unranked (broad) queries */
  similarity?: number;
}

export function docTypeOf(doc: KnowledgeDocument): DocType {
  return doc.metadata[DOC_TYPE_KEY] === 'flashcard_set' ? 'flashcard_set' : 'general';
}

export function isFlashcardSet(doc: KnowledgeDocument): boolean {
  return docTypeOf(doc) === 'flashcard_set';
}

/** Returns a metadata value when it is a non-empty string */
export function metadataString(doc: KnowledgeDocument, key: string): string | undefined {
  const value = doc.metadata[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

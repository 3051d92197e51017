/**
 * Knowledge Base Module
 *
 * Provides functionality for:
 * - Per-user document storage with semantic search
 * - Flashcard sets stored as tagged documents
 * - Web page, email and attachment ingestion
 */

// Types
export type {
  Embedder,
  IndexRecord,
  KnowledgeBase,
  KnowledgeBaseState,
  SearchRequest,
  VectorIndex,
} from './types';

// Gateway
export {
  addDocumentToKb,
  closeKnowledgeBase,
  getUserKnowledgeBase,
  namespaceFor,
  queryKnowledgeBase,
  sanitizeTableName,
} from './knowledge-base';
export type { KnowledgeBaseOptions } from './knowledge-base';

// Embeddings and search
export { OpenAIEmbedder, cosineSimilarity } from './process/embedder';
export { SqliteVectorIndex, openSqliteIndex } from './search/semantic';

// Flashcards
export {
  FLASHCARD_SET_DOC_TYPE,
  DEFAULT_FLASHCARD_SOURCE,
  addFlashcardSetToKb,
  flashcardSetId,
  getAvailableFlashcardTopics,
  getFlashcardSetsForUser,
  parseFlashcardSet,
  serializeFlashcards,
  toStoredFlashcardSet,
  validateFlashcardPayload,
} from './flashcards/sets';
export type { AddFlashcardSetOptions, FlashcardPayload, FlashcardSetQuery } from './flashcards/sets';

// Ingestion
export { extractTextFromHtml, fetchUrlContent, withScheme } from './ingest/web';
export {
  extractUrlsFromText,
  ingestParsedEmail,
  resolveEmailUserId,
} from './ingest/email';
export type { EmailAttachment, IngestEmailOptions, IngestResult, ParsedEmail } from './ingest/email';
export {
  attachmentDocId,
  attachmentKind,
  extractAttachmentText,
  readEmailAttachments,
} from './ingest/attachments';
export type { AttachmentKind, RawAttachment } from './ingest/attachments';

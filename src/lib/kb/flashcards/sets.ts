/**
 * Flashcard sets stored as knowledge base documents.
 *
 * A set is one document whose content is the JSON list of
 * {question, answer} pairs, tagged doc_type=flashcard_set and topic=<topic>.
 * Enumeration goes through semantic search, so `limit` is a hard cap and
 * completeness beyond it is not guaranteed.
 */

import { v4 as uuidv4 } from 'uuid';
import { parseJson } from '@/lib/json';
import {
  FlashcardListSchema,
  isFlashcardSet,
  metadataString,
  type DocumentMetadata,
  type Flashcard,
  type KnowledgeDocument,
  type StoredFlashcardSet,
} from '@/types';
import { addDocumentToKb, queryKnowledgeBase, sanitizeTableName } from '../knowledge-base';
import type { KnowledgeBase } from '../types';

const LOG = '[KB]';

export const FLASHCARD_SET_DOC_TYPE = 'flashcard_set';
export const DEFAULT_FLASHCARD_SOURCE = 'on_demand_generation';

/** Over-fetch factor so that filtering still leaves `limit` sets */
const SEARCH_MULTIPLIER = 10;
const TOPIC_SCAN_LIMIT = 1000;

export type FlashcardPayload = readonly Flashcard[] | string;

/**
 * Validate a flashcard list (or its JSON text). Returns null when the payload
 * is not a non-empty list of {question, answer} string pairs.
 */
export function validateFlashcardPayload(payload: FlashcardPayload): Flashcard[] | null {
  const raw: unknown = typeof payload === 'string' ? parseJson(payload) : payload;
  const parsed = FlashcardListSchema.safeParse(raw);
  if (!parsed.success || parsed.data.length === 0) return null;
  return parsed.data;
}

export function serializeFlashcards(flashcards: readonly Flashcard[]): string {
  return JSON.stringify(flashcards.map(({ question, answer }) => ({ question, answer })));
}

/**
 * Decode the content of a flashcard-set document. Unreadable content means
 * "no flashcards", never an error.
 */
export function parseFlashcardSet(content: string): Flashcard[] {
  const parsed = FlashcardListSchema.safeParse(parseJson(content));
  return parsed.success ? parsed.data : [];
}

export function flashcardSetId(userId: string, topic: string, now: Date = new Date()): string {
  const topicPart = topic.toLowerCase().replace(/[^a-zA-Z0-9_]/g, '_').slice(0, 50);
  const suffix = uuidv4().slice(0, 8);
  return `flashcards_${sanitizeTableName(userId)}_${topicPart}_${now.getTime()}_${suffix}`;
}

export interface AddFlashcardSetOptions {
  source?: string;
  /** Id of the document the set was generated from */
  sourceDocId?: string;
  now?: Date;
}

/**
 * Persist a flashcard set. Invalid payloads are rejected before anything is
 * written; otherwise the result is that of addDocumentToKb.
 */
export async function addFlashcardSetToKb(
  kb: KnowledgeBase,
  topic: string,
  flashcards: FlashcardPayload,
  options: AddFlashcardSetOptions = {}
): Promise<boolean> {
  const cards = validateFlashcardPayload(flashcards);
  if (!cards) {
    console.error(`${LOG} Error adding flashcard set: payload is not a list of question/answer pairs.`);
    return false;
  }

  const now = options.now ?? new Date();
  const metadata: DocumentMetadata = {
    doc_type: FLASHCARD_SET_DOC_TYPE,
    topic,
    creation_date: now.toISOString(),
    source: options.source ?? DEFAULT_FLASHCARD_SOURCE,
    user_id: kb.userId,
  };
  if (options.sourceDocId) {
    metadata.source_doc_id = options.sourceDocId;
  }

  const docId = flashcardSetId(kb.userId, topic, now);
  const added = await addDocumentToKb(kb, serializeFlashcards(cards), metadata, docId);
  if (added) {
    console.log(`${LOG} Flashcard set '${docId}' (${cards.length} cards) added to ${kb.namespace}.`);
  }
  return added;
}

export interface FlashcardSetQuery {
  /** Exact, case-sensitive topic match */
  topic?: string;
  limit?: number;
}

/**
 * Flashcard-set documents for the user, newest first.
 */
export async function getFlashcardSetsForUser(
  kb: KnowledgeBase,
  { topic, limit = 20 }: FlashcardSetQuery = {}
): Promise<KnowledgeDocument[]> {
  if (kb.state.status === 'search-disabled') {
    console.warn(`${LOG} Cannot search for flashcard sets in ${kb.namespace}: ${kb.state.reason}.`);
    return [];
  }

  const queryText = topic ? `flashcards about ${topic}` : 'flashcard sets';
  const candidates = await queryKnowledgeBase(kb, queryText, limit * SEARCH_MULTIPLIER);

  const sets = candidates.filter(
    (doc) => isFlashcardSet(doc) && (topic === undefined || doc.metadata.topic === topic)
  );

  sets.sort((a, b) =>
    (metadataString(b, 'creation_date') ?? '').localeCompare(metadataString(a, 'creation_date') ?? '')
  );

  return sets.slice(0, limit);
}

/**
 * Distinct topics across the user's flashcard sets, sorted.
 */
export async function getAvailableFlashcardTopics(kb: KnowledgeBase): Promise<string[]> {
  if (kb.state.status === 'search-disabled') {
    console.warn(`${LOG} Cannot list flashcard topics for ${kb.namespace}: ${kb.state.reason}.`);
    return [];
  }

  const sets = await getFlashcardSetsForUser(kb, { limit: TOPIC_SCAN_LIMIT });
  const topics = new Set<string>();
  for (const doc of sets) {
    const topic = metadataString(doc, 'topic');
    if (topic) topics.add(topic);
  }

  return [...topics].sort();
}

/**
 * Decoded view of a flashcard-set document, or null if it holds no readable cards.
 */
export function toStoredFlashcardSet(doc: KnowledgeDocument): StoredFlashcardSet | null {
  if (!isFlashcardSet(doc)) return null;

  const flashcards = parseFlashcardSet(doc.content);
  if (flashcards.length === 0) return null;

  return {
    documentId: doc.id,
    topic: metadataString(doc, 'topic') ?? 'Unknown Topic',
    creationDate: metadataString(doc, 'creation_date') ?? 'N/A',
    source: metadataString(doc, 'source') ?? 'N/A',
    flashcards,
  };
}

/**
 * Knowledge Base type definitions.
 */

import type { DocumentMetadata, KnowledgeDocument, ScoredDocument } from '@/types';

// ============================================
// Capabilities
// ============================================

/** Converts text into a vector for similarity search */
export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface IndexRecord extends KnowledgeDocument {
  embedding: number[];
}

export interface SearchRequest {
  /** Query vector; omit for a broad query that returns the newest records */
  vector?: number[];
  limit: number;
}

/** Vector-indexed document collection for one namespace */
export interface VectorIndex {
  readonly namespace: string;
  /** Inserts the record, replacing any record with the same id */
  upsert(record: IndexRecord): Promise<void>;
  /** Most relevant first */
  search(request: SearchRequest): Promise<ScoredDocument[]>;
  count(): Promise<number>;
  close(): Promise<void>;
}

// ============================================
// Handle
// ============================================

export type KnowledgeBaseState =
  | { status: 'ready'; embedder: Embedder }
  | { status: 'search-disabled'; reason: string };

export interface KnowledgeBase {
  userId: string;
  /** Deterministic per-user namespace, e.g. user_alice_example_com */
  namespace: string;
  index: VectorIndex;
  state: KnowledgeBaseState;
}

export type { DocumentMetadata, KnowledgeDocument, ScoredDocument };

/**
 * Per-user knowledge base gateway.
 *
 * Every operation that needs embeddings checks the handle state first and
 * returns its documented degraded result when search is disabled.
 */

import { v4 as uuidv4 } from 'uuid';
import { loadConfig, readCredential, type AppConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import type { DocumentMetadata, ScoredDocument } from '@/types';
import { OpenAIEmbedder } from './process/embedder';
import { openSqliteIndex } from './search/semantic';
import type { Embedder, KnowledgeBase, KnowledgeBaseState, VectorIndex } from './types';

const LOG = '[KB]';

/**
 * Reduce an identifier to [A-Za-z0-9_] for use as a table or file name.
 */
export function sanitizeTableName(name: string): string {
  const sanitized = name
    .replace(/[.@:\-/]/g, '_')
    .replace(/[^a-zA-Z0-9_]/g, '')
    .replace(/^_+|_+$/g, '');
  return sanitized || 'default_table';
}

export function namespaceFor(userId: string): string {
  return `user_${sanitizeTableName(userId)}`;
}

export interface KnowledgeBaseOptions {
  config?: AppConfig;
  /** Use this embedder instead of building one from the configured credential */
  embedder?: Embedder;
  openIndex?: (namespace: string, dataDir: string) => VectorIndex;
}

function resolveState(config: AppConfig, override?: Embedder): KnowledgeBaseState {
  if (override) return { status: 'ready', embedder: override };

  const apiKey = readCredential(config.credentials, 'OPENAI_API_KEY');
  if (!apiKey) {
    return { status: 'search-disabled', reason: 'OPENAI_API_KEY not found or is a placeholder' };
  }

  return {
    status: 'ready',
    embedder: new OpenAIEmbedder({
      ...config.embedding,
      apiKey,
      timeoutMs: config.fetchTimeoutMs,
    }),
  };
}

/**
 * Open the knowledge base for a user. A missing embedding credential still
 * yields a handle, but one whose search is disabled. Returns null only when
 * the index itself cannot be opened.
 */
export function getUserKnowledgeBase(
  userId: string,
  options: KnowledgeBaseOptions = {}
): KnowledgeBase | null {
  const config = options.config ?? loadConfig();
  const namespace = namespaceFor(userId);
  const state = resolveState(config, options.embedder);

  let index: VectorIndex;
  try {
    index = (options.openIndex ?? openSqliteIndex)(namespace, config.dataDir);
  } catch (error) {
    console.error(`${LOG} Error creating knowledge base for user ${userId} (${namespace}): ${errorMessage(error)}`);
    return null;
  }

  return { userId, namespace, index, state };
}

/**
 * Release the index. A file-backed namespace is written to disk here.
 */
export function closeKnowledgeBase(kb: KnowledgeBase): Promise<void> {
  return kb.index.close();
}

/**
 * Embed and store one document. Returns false, without writing anything,
 * when search is disabled, the content is blank, or embedding/insert fails.
 */
export async function addDocumentToKb(
  kb: KnowledgeBase,
  content: string,
  metadata: DocumentMetadata = {},
  id?: string
): Promise<boolean> {
  const { state } = kb;
  if (state.status === 'search-disabled') {
    console.warn(`${LOG} Embedder not available for ${kb.namespace}: ${state.reason}. Cannot add document.`);
    return false;
  }

  if (!content.trim()) {
    console.warn(`${LOG} Refusing to add empty document to ${kb.namespace}`);
    return false;
  }

  const docId = id ?? `doc_${uuidv4()}`;

  try {
    // Embed before touching the index so a failed embedding leaves nothing behind
    const embedding = await state.embedder.embed(content);
    await kb.index.upsert({ id: docId, content, metadata, embedding });
    return true;
  } catch (error) {
    console.error(`${LOG} Error adding document ${docId} to ${kb.namespace}: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Nearest-neighbour search, most relevant first. A blank query is a broad
 * query that returns the newest documents. Returns [] when search is disabled.
 */
export async function queryKnowledgeBase(
  kb: KnowledgeBase,
  queryText: string,
  limit: number = 3
): Promise<ScoredDocument[]> {
  const { state } = kb;
  if (state.status === 'search-disabled') {
    console.warn(`${LOG} Embedder not available for ${kb.namespace}: ${state.reason}. Cannot query.`);
    return [];
  }

  try {
    const query = queryText.trim();
    const vector = query ? await state.embedder.embed(query) : undefined;
    return await kb.index.search({ vector, limit });
  } catch (error) {
    console.error(`${LOG} Error querying ${kb.namespace}: ${errorMessage(error)}`);
    return [];
  }
}

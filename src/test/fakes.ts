/**
 * In-process stand-ins for the network-backed collaborators.
 */

import { loadConfig, type AppConfig } from '@/lib/config';
import type { InvokeOptions, LanguageModel } from '@/lib/agents/model';
import { getUserKnowledgeBase } from '@/lib/kb/knowledge-base';
import type { Embedder, IndexRecord, KnowledgeBase, SearchRequest, VectorIndex } from '@/lib/kb/types';
import type { DocumentMetadata, ScoredDocument } from '@/types';

export const TEST_USER = 'alice@example.com';

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    KB_DATA_DIR: ':memory:',
    ANTHROPIC_API_KEY: 'test-anthropic-key',
    OPENAI_API_KEY: 'test-openai-key',
    ...env,
  });
}

/**
 * Deterministic embedder: hashed word counts. Texts sharing words score higher.
 */
export class BagOfWordsEmbedder implements Embedder {
  readonly model = 'bag-of-words';
  readonly dimensions: number;

  constructor(dimensions: number = 256) {
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      let hash = 5381;
      for (let i = 0; i < word.length; i++) {
        hash = (hash * 33 + word.charCodeAt(i)) % 1_000_003;
      }
      const slot = hash % this.dimensions;
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }
}

export class FailingEmbedder implements Embedder {
  readonly model = 'failing';

  async embed(): Promise<number[]> {
    throw new Error('embedding service unavailable');
  }
}

export interface ModelCall {
  prompt: string;
  options?: InvokeOptions;
}

/**
 * Returns queued responses in order; an Error entry is thrown instead.
 */
export class ScriptedModel implements LanguageModel {
  readonly modelId = 'scripted-model';
  readonly calls: ModelCall[] = [];
  private responses: Array<string | Error>;

  constructor(...responses: Array<string | Error>) {
    this.responses = responses;
  }

  async invoke(prompt: string, options?: InvokeOptions): Promise<string> {
    this.calls.push({ prompt, options });
    const next = this.responses.shift();
    if (next === undefined) throw new Error('no scripted response left');
    if (next instanceof Error) throw next;
    return next;
  }
}

/**
 * Index that answers every search with a fixed result list and records what it was asked.
 */
export class StubIndex implements VectorIndex {
  readonly namespace = 'user_stub';
  readonly upserts: IndexRecord[] = [];
  readonly requests: SearchRequest[] = [];
  closed = false;
  private results: ScoredDocument[];

  constructor(results: ScoredDocument[] = []) {
    this.results = results;
  }

  async upsert(record: IndexRecord): Promise<void> {
    this.upserts.push(record);
  }

  async search(request: SearchRequest): Promise<ScoredDocument[]> {
    this.requests.push(request);
    return this.results.slice(0, request.limit);
  }

  async count(): Promise<number> {
    return this.upserts.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function stubKnowledgeBase(index: VectorIndex, embedder: Embedder = new BagOfWordsEmbedder()): KnowledgeBase {
  return {
    userId: TEST_USER,
    namespace: index.namespace,
    index,
    state: { status: 'ready', embedder },
  };
}

/** Knowledge base over an in-memory SQLite index */
export function memoryKnowledgeBase(userId: string = TEST_USER): KnowledgeBase {
  const kb = getUserKnowledgeBase(userId, { config: testConfig(), embedder: new BagOfWordsEmbedder() });
  if (!kb) throw new Error('in-memory knowledge base failed to open');
  return kb;
}

export function doc(id: string, content: string, metadata: DocumentMetadata = {}): ScoredDocument {
  return { id, content, metadata };
}

export function flashcardDoc(id: string, topic: string | null, creationDate: string, content?: string): ScoredDocument {
  const metadata: DocumentMetadata = { doc_type: 'flashcard_set', creation_date: creationDate, source: 'test' };
  if (topic !== null) metadata.topic = topic;
  return doc(id, content ?? JSON.stringify([{ question: `About ${topic ?? 'nothing'}?`, answer: 'Yes' }]), metadata);
}

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  BagOfWordsEmbedder,
  FailingEmbedder,
  TEST_USER,
  memoryKnowledgeBase,
  testConfig,
} from '@/test/fakes';
import {
  addDocumentToKb,
  closeKnowledgeBase,
  getUserKnowledgeBase,
  namespaceFor,
  queryKnowledgeBase,
  sanitizeTableName,
} from './knowledge-base';
import type { KnowledgeBase } from './types';

const opened: KnowledgeBase[] = [];

function track(kb: KnowledgeBase | null): KnowledgeBase {
  if (!kb) throw new Error('expected a knowledge base');
  opened.push(kb);
  return kb;
}

afterEach(async () => {
  for (const kb of opened.splice(0)) await closeKnowledgeBase(kb);
  vi.restoreAllMocks();
});

describe('sanitizeTableName', () => {
  it('maps separators to underscores and drops other symbols', () => {
    expect(sanitizeTableName('alice@example.com')).toBe('alice_example_com');
    expect(sanitizeTableName('Bob Smith!')).toBe('BobSmith');
    expect(sanitizeTableName('-x-')).toBe('x');
  });

  it('falls back when nothing usable is left', () => {
    expect(sanitizeTableName('..')).toBe('default_table');
    expect(sanitizeTableName('')).toBe('default_table');
  });

  it('derives a per-user namespace', () => {
    expect(namespaceFor('alice@example.com')).toBe('user_alice_example_com');
  });
});

describe('getUserKnowledgeBase', () => {
  it('is ready when an embedding credential is configured', () => {
    const kb = track(getUserKnowledgeBase(TEST_USER, { config: testConfig() }));

    expect(kb.namespace).toBe('user_alice_example_com');
    expect(kb.state.status).toBe('ready');
  });

  it('keeps the index but disables search without the credential', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = testConfig({ OPENAI_API_KEY: 'your_openai_api_key_here' });
    const kb = track(getUserKnowledgeBase(TEST_USER, { config }));

    expect(kb.state).toEqual({
      status: 'search-disabled',
      reason: 'OPENAI_API_KEY not found or is a placeholder',
    });
    expect(await addDocumentToKb(kb, 'Some notes')).toBe(false);
    expect(await kb.index.count()).toBe(0);
    expect(await queryKnowledgeBase(kb, 'notes')).toEqual([]);
  });

  it('returns null when the index cannot be opened', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const kb = getUserKnowledgeBase(TEST_USER, {
      config: testConfig(),
      openIndex: () => {
        throw new Error('disk full');
      },
    });

    expect(kb).toBeNull();
  });
});

describe('addDocumentToKb', () => {
  it('refuses blank content', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const kb = track(memoryKnowledgeBase());

    expect(await addDocumentToKb(kb, '   \n ')).toBe(false);
    expect(await kb.index.count()).toBe(0);
  });

  it('writes nothing when embedding fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const kb = track(getUserKnowledgeBase(TEST_USER, { config: testConfig(), embedder: new FailingEmbedder() }));

    expect(await addDocumentToKb(kb, 'Some notes')).toBe(false);
    expect(await kb.index.count()).toBe(0);
  });

  it('generates a document id when none is given', async () => {
    const kb = track(memoryKnowledgeBase());

    expect(await addDocumentToKb(kb, 'Notes about sourdough starters')).toBe(true);

    const [stored] = await kb.index.search({ limit: 1 });
    expect(stored?.id).toMatch(/^doc_[0-9a-f-]{36}$/);
  });

  it('replaces a document stored under the same id', async () => {
    const kb = track(memoryKnowledgeBase());

    await addDocumentToKb(kb, 'first version', {}, 'same');
    await addDocumentToKb(kb, 'second version', { revision: 2 }, 'same');

    expect(await kb.index.count()).toBe(1);
    expect(await kb.index.search({ limit: 5 })).toEqual([
      { id: 'same', content: 'second version', metadata: { revision: 2 } },
    ]);
  });
});

describe('queryKnowledgeBase', () => {
  it('ranks the closest document first', async () => {
    const kb = track(memoryKnowledgeBase());
    await addDocumentToKb(kb, 'The mitochondria is the powerhouse of the cell', { source: 'test' }, 'doc-1');
    await addDocumentToKb(kb, 'Rust ownership and borrowing rules', { source: 'test' }, 'doc-2');

    const results = await queryKnowledgeBase(kb, 'powerhouse of the cell', 1);

    expect(results).toHaveLength(1);
    expect(results[0]?.id).toBe('doc-1');
    expect(results[0]?.metadata).toEqual({ source: 'test' });
    expect(results[0]?.similarity).toBeGreaterThan(0.5);
  });

  it('treats a blank query as a broad query, newest first', async () => {
    const kb = track(memoryKnowledgeBase());
    await addDocumentToKb(kb, 'alpha notes', {}, 'a');
    await addDocumentToKb(kb, 'beta notes', {}, 'b');
    await addDocumentToKb(kb, 'gamma notes', {}, 'c');

    const results = await queryKnowledgeBase(kb, '  ', 2);

    expect(results.map((d) => d.id)).toEqual(['c', 'b']);
  });

  it('defaults to three results', async () => {
    const kb = track(memoryKnowledgeBase());
    for (const id of ['a', 'b', 'c', 'd']) {
      await addDocumentToKb(kb, `notes ${id}`, {}, id);
    }

    expect(await queryKnowledgeBase(kb, 'notes')).toHaveLength(3);
  });

  it('uses the supplied embedder for queries', async () => {
    const embedder = new BagOfWordsEmbedder();
    const embed = vi.spyOn(embedder, 'embed');
    const kb = track(getUserKnowledgeBase(TEST_USER, { config: testConfig(), embedder }));

    await queryKnowledgeBase(kb, 'cells');

    expect(embed).toHaveBeenCalledWith('cells');
  });
});

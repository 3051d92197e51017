import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OpenAIEmbedder, cosineSimilarity } from './embedder';

const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function embedder(): OpenAIEmbedder {
  return new OpenAIEmbedder({
    baseUrl: 'https://embeddings.test/v1',
    model: 'text-embedding-3-small',
    apiKey: 'test-secret',
    timeoutMs: 1000,
  });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIEmbedder', () => {
  it('posts normalised text and returns the vector', async () => {
    fetchMock.mockResolvedValue(Response.json({ data: [{ embedding: [0.1, 0.2, 0.3] }] }));

    expect(await embedder().embed('  two\n\nlines  ')).toEqual([0.1, 0.2, 0.3]);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://embeddings.test/v1/embeddings');
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-secret');
    expect(init?.body).toBe('{"model":"text-embedding-3-small","input":["two lines"]}');
  });

  it('refuses blank text without a request', async () => {
    await expect(embedder().embed('   ')).rejects.toThrow('Cannot embed empty text');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('includes the status and body of a failed request', async () => {
    fetchMock.mockResolvedValue(new Response('bad key', { status: 401 }));

    await expect(embedder().embed('text')).rejects.toThrow('OpenAI embeddings failed: 401 bad key');
  });

  it('times out while the response body is still arriving', async () => {
    fetchMock.mockImplementation(async (_input, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"data":'));
          init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
        },
      });
      return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
    });

    const slow = new OpenAIEmbedder({
      baseUrl: 'https://embeddings.test/v1',
      model: 'text-embedding-3-small',
      apiKey: 'test-secret',
      timeoutMs: 5,
    });

    await expect(slow.embed('text')).rejects.toThrow('OpenAI embeddings timed out after 5ms');
  });

  it('rejects a response without a vector', async () => {
    fetchMock.mockResolvedValue(Response.json({ data: [] }));

    await expect(embedder().embed('text')).rejects.toThrow('OpenAI embeddings response contained no vector');
  });
});

describe('cosineSimilarity', () => {
  it('scores identical directions 1 and orthogonal ones 0', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it('returns 0 for a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects vectors of different sizes', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have the same length');
  });
});

/**
 * Embedding generation using the OpenAI embeddings endpoint.
 * Produces the vectors the knowledge base ranks documents by.
 */

import { z } from 'zod';
import type { EmbeddingSettings } from '@/lib/config';
import type { Embedder } from '../types';

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()).min(1) })).min(1),
});

export interface OpenAIEmbedderOptions extends EmbeddingSettings {
  apiKey: string;
  timeoutMs: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Generate embedding for a single text.
   */
  async embed(text: string): Promise<number[]> {
    const input = text.replace(/\s+/g, ' ').trim();
    if (!input) {
      throw new Error('Cannot embed empty text');
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model: this.model, input: [input] }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`OpenAI embeddings failed: ${response.status} ${body}`);
      }

      const payload = EmbeddingResponseSchema.safeParse(await response.json());
      const embedding = payload.success ? payload.data.data[0]?.embedding : undefined;
      if (!embedding) {
        throw new Error('OpenAI embeddings response contained no vector');
      }

      return embedding;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`OpenAI embeddings timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      // Covers reading the body too, not just the headers
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Compute cosine similarity between two vectors.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    normA += aVal * aVal;
    normB += bVal * bVal;
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;

  return dotProduct / magnitude;
}

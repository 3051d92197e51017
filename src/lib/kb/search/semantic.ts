/**
 * Semantic search over a per-user SQLite collection.
 * Embeddings are stored as JSON and ranked in memory by cosine similarity.
 */

import { desc, sql } from 'drizzle-orm';
import { z } from 'zod';
import { parseJson } from '@/lib/json';
import { databasePath, openDatabase, type DatabaseHandle, type KnowledgeDb } from '@/lib/data/db';
import { documents, type DocumentRow } from '@/lib/data/schema';
import type { DocumentMetadata, ScoredDocument } from '@/types';
import { cosineSimilarity } from '../process/embedder';
import type { IndexRecord, SearchRequest, VectorIndex } from '../types';

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));
const EmbeddingSchema = z.array(z.number());

function parseMetadata(text: string): DocumentMetadata {
  const parsed = MetadataSchema.safeParse(parseJson(text));
  return parsed.success ? parsed.data : {};
}

function parseEmbedding(text: string | null): number[] | null {
  if (!text) return null;
  const parsed = EmbeddingSchema.safeParse(parseJson(text));
  return parsed.success ? parsed.data : null;
}

function toDocument(row: DocumentRow): ScoredDocument {
  return {
    id: row.id,
    content: row.content,
    metadata: parseMetadata(row.metadata),
  };
}

export class SqliteVectorIndex implements VectorIndex {
  readonly namespace: string;
  private handle: DatabaseHandle;

  constructor(namespace: string, handle: DatabaseHandle) {
    this.namespace = namespace;
    this.handle = handle;
  }

  private db(): Promise<KnowledgeDb> {
    return this.handle.connect();
  }

  async upsert(record: IndexRecord): Promise<void> {
    const values = {
      id: record.id,
      content: record.content,
      metadata: JSON.stringify(record.metadata),
      embedding: JSON.stringify(record.embedding),
      createdAt: Date.now(),
    };

    const db = await this.db();
    await db
      .insert(documents)
      .values(values)
      .onConflictDoUpdate({
        target: documents.id,
        set: {
          content: values.content,
          metadata: values.metadata,
          embedding: values.embedding,
          createdAt: values.createdAt,
        },
      });
  }

  async search({ vector, limit }: SearchRequest): Promise<ScoredDocument[]> {
    if (limit <= 0) return [];
    const db = await this.db();

    if (!vector) {
      const rows = await db
        .select()
        .from(documents)
        .orderBy(desc(documents.createdAt), sql`rowid DESC`)
        .limit(limit);
      return rows.map(toDocument);
    }

    const rows = await db.select().from(documents).orderBy(sql`rowid ASC`);
    const results: ScoredDocument[] = [];

    for (const row of rows) {
      const embedding = parseEmbedding(row.embedding);
      // Rows written by a different embedding model are not comparable
      if (!embedding || embedding.length !== vector.length) continue;

      results.push({
        ...toDocument(row),
        similarity: cosineSimilarity(vector, embedding),
      });
    }

    results.sort((a, b) => (b.similarity ?? 0) - (a.similarity ?? 0));
    return results.slice(0, limit);
  }

  async count(): Promise<number> {
    const db = await this.db();
    const rows = await db.select({ total: sql<number>`count(*)` }).from(documents);
    return rows[0]?.total ?? 0;
  }

  close(): Promise<void> {
    return this.handle.close();
  }
}

/**
 * Open (creating if needed) the index for a namespace under dataDir.
 */
export function openSqliteIndex(namespace: string, dataDir: string): SqliteVectorIndex {
  return new SqliteVectorIndex(namespace, openDatabase(databasePath(dataDir, namespace)));
}

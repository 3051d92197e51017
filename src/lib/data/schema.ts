/**
 * SQLite table definitions for the per-user knowledge base.
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const documents = sqliteTable('documents', {
  id: text('id').primaryKey(),
  content: text('content').notNull(),
  metadata: text('metadata').notNull(), // JSON object of scalar values
  embedding: text('embedding'), // JSON number[]
  createdAt: integer('created_at').notNull(), // ms since epoch
});

export type DocumentRow = typeof documents.$inferSelect;

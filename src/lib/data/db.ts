import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js';
import * as schema from './schema';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';

export const IN_MEMORY = ':memory:';

export type KnowledgeDb = SQLJsDatabase<typeof schema>;

/**
 * A namespace database. SQLite runs in memory (sql.js); a file-backed
 * database is loaded when opened and written back on close.
 */
export interface DatabaseHandle {
  file: string;
  connect(): Promise<KnowledgeDb>;
  close(): Promise<void>;
}

// Mirrors schema.ts; per-user files are created on demand, so there is no migration step
const CREATE_DOCUMENTS_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    id TEXT PRIMARY KEY,
    content TEXT NOT NULL,
    metadata TEXT NOT NULL,
    embedding TEXT,
    created_at INTEGER NOT NULL
  )
`;

let engine: Promise<SqlJsStatic> | undefined;

// The wasm module is compiled once per process
function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs().catch((error: unknown) => {
    engine = undefined;
    throw error;
  });
  return engine;
}

/**
 * Database file for a namespace. Every namespace gets its own file so that
 * writers for different users never touch the same database.
 */
export function databasePath(dataDir: string, namespace: string): string {
  if (dataDir === IN_MEMORY) return IN_MEMORY;
  return path.join(dataDir, `${namespace}.db`);
}

function totalChanges(sqlite: Database): number {
  const value = sqlite.exec('SELECT total_changes()')[0]?.values[0]?.[0];
  return typeof value === 'number' ? value : 0;
}

/**
 * Open a namespace database. The file is read here, so an unreadable store
 * fails at open time; the engine itself starts on first use.
 */
export function openDatabase(file: string): DatabaseHandle {
  let image: Buffer | undefined;
  if (file !== IN_MEMORY) {
    mkdirSync(path.dirname(file), { recursive: true });
    if (existsSync(file)) image = readFileSync(file);
  }

  let connection: Promise<{ sqlite: Database; db: KnowledgeDb }> | undefined;
  let closed = false;

  const start = async () => {
    const SQL = await loadEngine();
    const sqlite = new SQL.Database(image);
    sqlite.run(CREATE_DOCUMENTS_SQL);
    return { sqlite, db: drizzle(sqlite, { schema }) };
  };

  return {
    file,

    async connect() {
      if (closed) throw new Error(`Database ${file} is closed`);
      connection ??= start();
      return (await connection).db;
    },

    async close() {
      if (closed) return;
      closed = true;
      if (!connection) return;

      const { sqlite } = await connection;
      try {
        // Read-only handles leave the file as it is
        if (file !== IN_MEMORY && totalChanges(sqlite) > 0) {
          writeFileSync(file, sqlite.export());
        }
      } finally {
        sqlite.close();
      }
    },
  };
}

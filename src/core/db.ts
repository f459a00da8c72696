import Database from "better-sqlite3";
import { z } from "zod";
import type { MemoryRecord } from "../types.js";

export function openDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS memories (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      text TEXT NOT NULL,
      temporal_context TEXT,
      language TEXT NOT NULL,
      source_excerpt TEXT,
      context TEXT,
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_memories_user ON memories (user_id, created_at);
  `);
}

const MemoryRow = z.object({
  id: z.string(),
  user_id: z.string(),
  text: z.string(),
  temporal_context: z.string().nullable(),
  language: z.string(),
  source_excerpt: z.string().nullable(),
  context: z.string().nullable(),
  metadata: z.string(),
  created_at: z.string(),
});

const Metadata = z.record(z.string());

export function insertMemory(db: Database.Database, record: MemoryRecord): void {
  db.prepare(
    `INSERT INTO memories (id, user_id, text, temporal_context, language, source_excerpt, context, metadata, created_at)
     VALUES (@id, @user_id, @text, @temporal_context, @language, @source_excerpt, @context, @metadata, @created_at)`
  ).run({
    id: record.id,
    user_id: record.userId,
    text: record.text,
    temporal_context: record.temporalContext ?? null,
    language: record.language,
    source_excerpt: record.sourceExcerpt ?? null,
    context: record.context ?? null,
    metadata: JSON.stringify(record.metadata),
    created_at: record.createdAt,
  });
}

export function getMemory(db: Database.Database, id: string): MemoryRecord | null {
  const row: unknown = db.prepare("SELECT * FROM memories WHERE id = ?").get(id);
  return row ? rowToRecord(row) : null;
}

export function getMemoriesByUser(db: Database.Database, userId: string): MemoryRecord[] {
  const rows: unknown[] = db
    .prepare("SELECT * FROM memories WHERE user_id = ? ORDER BY created_at, rowid")
    .all(userId);
  return rows.map(rowToRecord);
}

export function deleteMemory(db: Database.Database, id: string): boolean {
  return db.prepare("DELETE FROM memories WHERE id = ?").run(id).changes > 0;
}

export function countMemories(db: Database.Database, userId: string): number {
  const row = z
    .object({ total: z.number() })
    .parse(db.prepare("SELECT COUNT(*) AS total FROM memories WHERE user_id = ?").get(userId));
  return row.total;
}

function rowToRecord(raw: unknown): MemoryRecord {
  const row = MemoryRow.parse(raw);
  const record: MemoryRecord = {
    id: row.id,
    userId: row.user_id,
    text: row.text,
    language: row.language,
    metadata: Metadata.parse(JSON.parse(row.metadata)),
    createdAt: row.created_at,
  };
  if (row.temporal_context !== null) record.temporalContext = row.temporal_context;
  if (row.source_excerpt !== null) record.sourceExcerpt = row.source_excerpt;
  if (row.context !== null) record.context = row.context;
  return record;
}

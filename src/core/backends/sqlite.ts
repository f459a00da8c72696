import type Database from "better-sqlite3";
import type { MemoryRecord, MemorySearchResult } from "../../types.js";
import { deleteMemory, getMemoriesByUser, insertMemory, openDatabase } from "../db.js";
import { rankByRelevance } from "../relevance.js";
import type { MemoryStore } from "../storage.js";

/**
 * Local single-file store. Search ranks a user's memories by term overlap,
 * so no embedder is needed.
 */
export class SqliteMemoryStore implements MemoryStore {
  readonly name = "sqlite";
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
  }

  async add(record: MemoryRecord): Promise<void> {
    insertMemory(this.db, record);
  }

  async search(query: string, userId: string, limit: number): Promise<MemorySearchResult[]> {
    const exclude = new Set([userId.toLowerCase()]);
    return rankByRelevance(query, getMemoriesByUser(this.db, userId), (r) => r.text, exclude)
      .slice(0, limit)
      .map(({ item, score }) => ({ record: item, score }));
  }

  async getAll(userId: string): Promise<MemoryRecord[]> {
    return getMemoriesByUser(this.db, userId);
  }

  async delete(id: string): Promise<boolean> {
    return deleteMemory(this.db, id);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

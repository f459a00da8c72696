import type { MemoryRecord, MemorySearchResult } from "../types.js";

/**
 * Pluggable memory store. Records are append-only: they are added and
 * deleted, never updated.
 */
export interface MemoryStore {
  /** Human-readable backend name for logs. */
  readonly name: string;
  add(record: MemoryRecord): Promise<void>;
  /** Best matches for the query among one user's memories, best first. */
  search(query: string, userId: string, limit: number): Promise<MemorySearchResult[]>;
  /** All of a user's memories, oldest first. */
  getAll(userId: string): Promise<MemoryRecord[]>;
  /** Returns false when no record had that id. */
  delete(id: string): Promise<boolean>;
  close(): Promise<void>;
}

/** Turns text into a vector for similarity search. */
export interface Embedder {
  embed(text: string): Promise<number[]>;
}

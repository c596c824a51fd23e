// src/db/sqliteVectorStore.ts
// What: On-disk Collection store backed by better-sqlite3.
// How: One database file (index.sqlite) under the configured directory holds every collection. Vectors are kept
//      as float32 blobs; similarity search scans the collection and ranks by cosine similarity in process.
//      A REGEXP function is registered so file-name pattern filters run in SQL.

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { EntryInput, SearchMatch, StoredEntry } from '../models/types.js';
import { EmbeddingDimensionError, StoreUnavailableError } from '../errors.js';
import { cosineSimilarity, decodeVector, encodeVector } from '../util/sql.js';
import {
  assertBatchDimension,
  Collection,
  compareMatches,
  EntryFilter,
  FoundEntries,
  parseMetadata,
  RankedMatch,
  VectorStore,
} from './vectorStore.js';

export const SQLITE_FILE_NAME = 'index.sqlite';

interface EntryRow {
  seq: number;
  id: string;
  document_id: string;
  chunk_index: number;
  text: string;
  metadata_json: string;
}

interface EmbeddedRow extends EntryRow {
  embedding: Buffer;
}

const ENTRY_COLUMNS = 'seq, id, document_id, chunk_index, text, metadata_json';

function toStoredEntry(row: EntryRow): StoredEntry {
  return {
    id: row.id,
    document_id: row.document_id,
    chunk_index: row.chunk_index,
    text: row.text,
    metadata: parseMetadata(row.metadata_json),
  };
}

function filterClause(filter: EntryFilter): { sql: string; value: string } {
  return 'fileName' in filter
    ? { sql: 'file_name = ?', value: filter.fileName }
    : { sql: 'file_name REGEXP ?', value: filter.fileNamePattern };
}

class SqliteCollection implements Collection {
  constructor(private readonly db: Database.Database, readonly name: string) {}

  async dimension(): Promise<number | null> {
    const row = this.db
      .prepare<[string], { dims: number | null }>('SELECT dims FROM collections WHERE name = ?')
      .get(this.name);
    if (!row) {
      throw new StoreUnavailableError(`Collection "${this.name}" does not exist`);
    }
    return row.dims;
  }

  async add(entries: EntryInput[]): Promise<void> {
    if (entries.length === 0) return;
    const dims = assertBatchDimension(entries, await this.dimension(), this.name);

    const setDims = this.db.prepare<[number, string]>('UPDATE collections SET dims = ? WHERE name = ? AND dims IS NULL');
    const insert = this.db.prepare<[string, string, string, string, number, string, string, Buffer]>(
      `INSERT INTO entries (id, collection, document_id, file_name, chunk_index, text, metadata_json, embedding)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const tx = this.db.transaction((batch: EntryInput[]) => {
      setDims.run(dims, this.name);
      for (const e of batch) {
        insert.run(
          e.id,
          this.name,
          e.document_id,
          e.metadata.file_name,
          e.chunk_index,
          e.text,
          JSON.stringify(e.metadata),
          encodeVector(e.embedding),
        );
      }
    });
    tx(entries);
  }

  async deleteWhere(filter: EntryFilter): Promise<number> {
    const clause = filterClause(filter);
    const info = this.db
      .prepare<[string, string]>(`DELETE FROM entries WHERE collection = ? AND ${clause.sql}`)
      .run(this.name, clause.value);
    return info.changes;
  }

  async deleteAll(): Promise<number> {
    const tx = this.db.transaction(() => {
      const info = this.db.prepare<[string]>('DELETE FROM entries WHERE collection = ?').run(this.name);
      this.db.prepare<[string]>('UPDATE collections SET dims = NULL WHERE name = ?').run(this.name);
      return info.changes;
    });
    return tx();
  }

  async count(): Promise<number> {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM entries WHERE collection = ?')
      .get(this.name);
    return row?.count ?? 0;
  }

  async query(embedding: number[], topK: number): Promise<SearchMatch[]> {
    const dims = await this.dimension();
    if (dims === null) return [];
    if (embedding.length !== dims) {
      throw new EmbeddingDimensionError(dims, embedding.length, `query against "${this.name}"`);
    }

    const rows = this.db
      .prepare<[string], EmbeddedRow>(`SELECT ${ENTRY_COLUMNS}, embedding FROM entries WHERE collection = ?`)
      .all(this.name);
    const ranked: RankedMatch[] = rows.map((row) => ({
      entry: toStoredEntry(row),
      score: cosineSimilarity(embedding, decodeVector(row.embedding)),
      seq: row.seq,
    }));
    ranked.sort(compareMatches);
    return ranked.slice(0, topK).map(({ entry, score }) => ({ entry, score }));
  }

  async find(filter: EntryFilter, limit: number): Promise<FoundEntries> {
    const clause = filterClause(filter);
    const where = `collection = ? AND ${clause.sql}`;
    const rows = this.db
      .prepare<[string, string, number], EntryRow>(`SELECT ${ENTRY_COLUMNS} FROM entries WHERE ${where} ORDER BY seq LIMIT ?`)
      .all(this.name, clause.value, limit);
    const total = this.db
      .prepare<[string, string], { count: number }>(`SELECT COUNT(*) AS count FROM entries WHERE ${where}`)
      .get(this.name, clause.value);
    return { entries: rows.map(toStoredEntry), total: total?.count ?? 0 };
  }
}

export class SqliteVectorStore implements VectorStore {
  readonly kind = 'sqlite' as const;
  private readonly db: Database.Database;

  constructor(readonly location: string) {
    fs.mkdirSync(location, { recursive: true });
    this.db = new Database(path.join(location, SQLITE_FILE_NAME));
    this.configure();
  }

  private configure(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    // One pattern per statement: compile it once, not per row.
    let compiled: { source: string; re: RegExp } | undefined;
    this.db.function('regexp', { deterministic: true }, (pattern: unknown, value: unknown) => {
      if (typeof pattern !== 'string' || typeof value !== 'string') return 0;
      if (compiled?.source !== pattern) compiled = { source: pattern, re: new RegExp(pattern) };
      return compiled.re.test(value) ? 1 : 0;
    });
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name TEXT PRIMARY KEY,
        dims INTEGER,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS entries (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        document_id TEXT NOT NULL,
        file_name TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        text TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        embedding BLOB NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_entries_collection_file ON entries(collection, file_name);
    `);
  }

  async getOrCreateCollection(name: string): Promise<Collection> {
    this.db
      .prepare<[string, string]>('INSERT OR IGNORE INTO collections (name, dims, created_at) VALUES (?, NULL, ?)')
      .run(name, new Date().toISOString());
    return new SqliteCollection(this.db, name);
  }

  async dropCollection(name: string): Promise<void> {
    this.db.prepare<[string]>('DELETE FROM collections WHERE name = ?').run(name);
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

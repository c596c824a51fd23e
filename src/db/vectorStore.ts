// src/db/vectorStore.ts
// What: Vector Store Adapter contract shared by the SQLite and pgvector backends.
// How: A VectorStore opens named Collections; a Collection stores (vector, text, metadata) entries, records its
//      embedding dimension on first insert and rejects vectors of any other length. Similarity search ranks by
//      cosine similarity, equal scores ordered by file_name and then insertion order.

import { z } from 'zod';
import type { VectorStoreKind } from '../config/env.js';
import type { DocumentMetadata, EntryInput, SearchMatch, StoredEntry } from '../models/types.js';
import { EmbeddingDimensionError, KnowledgeError, StoreUnavailableError, errorMessage } from '../errors.js';

export type EntryFilter = { fileName: string } | { fileNamePattern: string };

export interface FoundEntries {
  entries: StoredEntry[];
  total: number;
}

export interface Collection {
  readonly name: string;
  /** Recorded embedding dimension, or null while the collection is empty of vectors. */
  dimension(): Promise<number | null>;
  add(entries: EntryInput[]): Promise<void>;
  /** Returns the number of entries removed. */
  deleteWhere(filter: EntryFilter): Promise<number>;
  /** Removes every entry and forgets the recorded dimension. */
  deleteAll(): Promise<number>;
  count(): Promise<number>;
  query(embedding: number[], topK: number): Promise<SearchMatch[]>;
  find(filter: EntryFilter, limit: number): Promise<FoundEntries>;
}

export interface VectorStore {
  readonly kind: VectorStoreKind;
  /** Where the store lives (directory for SQLite, redacted URL for pgvector). */
  readonly location: string;
  getOrCreateCollection(name: string): Promise<Collection>;
  dropCollection(name: string): Promise<void>;
  close(): Promise<void>;
}

export const documentMetadataSchema = z.object({
  file_name: z.string(),
  source_path: z.string(),
  created_at: z.string(),
});

export function parseMetadata(raw: unknown): DocumentMetadata {
  return documentMetadataSchema.parse(typeof raw === 'string' ? JSON.parse(raw) : raw);
}

/** Checks a batch against the collection's dimension and returns the batch's own dimension. */
export function assertBatchDimension(entries: EntryInput[], expected: number | null, collection: string): number {
  const dims = expected ?? entries[0].embedding.length;
  for (const e of entries) {
    if (e.embedding.length !== dims) {
      throw new EmbeddingDimensionError(dims, e.embedding.length, `insert into "${collection}"`);
    }
  }
  return dims;
}

export interface RankedMatch extends SearchMatch {
  score: number;
  seq: number;
}

export function compareMatches(a: RankedMatch, b: RankedMatch): number {
  if (a.score !== b.score) return b.score - a.score;
  const an = a.entry.metadata.file_name;
  const bn = b.entry.metadata.file_name;
  if (an !== bn) return an < bn ? -1 : 1;
  return a.seq - b.seq;
}

/** Opens (creating if needed) a collection; store failures surface as StoreUnavailableError. */
export async function openCollection(store: VectorStore, name: string): Promise<Collection> {
  try {
    return await store.getOrCreateCollection(name);
  } catch (err) {
    if (err instanceof KnowledgeError) throw err;
    throw new StoreUnavailableError(`Cannot open collection "${name}" at ${store.location}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

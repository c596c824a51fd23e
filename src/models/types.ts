// src/models/types.ts
// What: Shared TypeScript types for documents, stored entries and the core's result DTOs.
// How: Field names of DTOs are snake_case because they go out over the HTTP API unchanged.

export interface DocumentMetadata {
  file_name: string;
  source_path: string;
  created_at: string; // ISO timestamp
}

export interface Document {
  id: string; // sha1 of the absolute source path
  text: string;
  metadata: DocumentMetadata;
}

export interface Chunk {
  document_id: string;
  chunk_index: number;
  text: string;
  metadata: DocumentMetadata;
}

/** One row of a Collection: a chunk together with its vector. */
export interface EntryInput extends Chunk {
  id: string;
  embedding: number[];
}

export interface StoredEntry extends Chunk {
  id: string;
}

export interface SearchMatch {
  entry: StoredEntry;
  score: number | null; // cosine similarity
}

export interface RetrievalResult {
  source_file: string;
  similarity_score: number | null;
  content_preview: string;
}

export interface Answer {
  answer: string;
  sources: RetrievalResult[];
  query: string;
}

export interface IndexFailure {
  file_name: string;
  error: string;
}

export interface IndexSummary {
  correlation_id: string;
  collection_name: string;
  force: boolean;
  cleared: boolean;
  documents_loaded: number;
  chunks_indexed: number;
  total_documents: number; // entries in the collection afterwards
  failed: IndexFailure[];
  duration_ms: number;
  warning?: string;
}

export interface IncrementalSummary {
  file_path: string;
  documents_loaded: number;
  chunks_indexed: number;
}

export interface IndexStats {
  total_documents: number;
  collection_name: string;
  db_path: string;
}

export interface FilePatternMatches {
  documents: string[];
  metadatas: DocumentMetadata[];
  count: number;
}

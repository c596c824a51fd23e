// src/services/indexer.ts
// What: Index Manager. Owns the write path load → chunk → embed → store for the vault's single Collection.
// How: rebuildIndex() loads the whole vault and embeds every document (bounded concurrency via p-limit) before it
//      touches the Collection. Only then does a forced rebuild clear it (delete-all, or drop and recreate when
//      delete-all fails) and write the entries, one document per add() call. A document whose own data fails is
//      logged and reported while the others carry on; an unavailable backend, or every document failing, aborts
//      the rebuild with the Collection unchanged.
//      Every write runs through the writeQueue so rebuilds, incremental indexing and removals never interleave.

import { randomBytes } from 'crypto';
import path from 'path';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../config/env.js';
import { Collection, openCollection, VectorStore } from '../db/vectorStore.js';
import { errorKind, errorMessage, IndexRebuildError, InvalidInputError } from '../errors.js';
import type { Logger } from '../logging.js';
import type {
  Document,
  EntryInput,
  FilePatternMatches,
  IncrementalSummary,
  IndexFailure,
  IndexStats,
  IndexSummary,
} from '../models/types.js';
import { ChunkOptions, chunkDocument, DEFAULT_CHUNK_OPTIONS } from './chunking.js';
import type { EmbeddingProvider } from './embeddings.js';
import { isHidden, loadDocuments, loadFile, resolveVaultFile } from './loader.js';

/** Runs write operations one at a time, in submission order. */
export type WriteQueue = <T>(fn: () => Promise<T>) => Promise<T>;

export function createWriteQueue(): WriteQueue {
  const limit = pLimit(1);
  return (fn) => limit(fn);
}

export type IndexerConfig = Pick<
  AppConfig,
  'VAULT_PATH' | 'COLLECTION_NAME' | 'INDEX_EXTENSIONS' | 'INDEX_CONCURRENCY'
>;

export interface IndexManagerDeps {
  store: VectorStore;
  embeddings: EmbeddingProvider;
  config: IndexerConfig;
  log: Logger;
  writeQueue?: WriteQueue;
  chunkOptions?: ChunkOptions;
}

export const NO_DOCUMENTS_WARNING = 'No documents found in the vault; the index is empty';
export const MAX_PATTERN_CHARS = 200;

type Prepared = { doc: Document; entries: EntryInput[] } | { doc: Document; error: unknown };

/** Failures no other document could get past: the embedding backend or the store is down or misconfigured. */
export function isFatalIndexError(err: unknown): boolean {
  const kind = errorKind(err);
  return kind === 'backend_unavailable' || kind === 'configuration';
}

export class IndexManager {
  private readonly store: VectorStore;
  private readonly embeddings: EmbeddingProvider;
  private readonly config: IndexerConfig;
  private readonly log: Logger;
  private readonly writeQueue: WriteQueue;
  private readonly chunkOptions: ChunkOptions;

  constructor(deps: IndexManagerDeps) {
    this.store = deps.store;
    this.embeddings = deps.embeddings;
    this.config = deps.config;
    this.log = deps.log;
    this.writeQueue = deps.writeQueue ?? createWriteQueue();
    this.chunkOptions = deps.chunkOptions ?? DEFAULT_CHUNK_OPTIONS;
  }

  get collectionName(): string {
    return this.config.COLLECTION_NAME;
  }

  rebuildIndex(force = false): Promise<IndexSummary> {
    return this.writeQueue(() => this.rebuild(force));
  }

  incrementalIndex(filePath: string): Promise<IncrementalSummary> {
    return this.writeQueue(() => this.indexOne(filePath));
  }

  removeFromIndex(filePath: string): Promise<number> {
    return this.writeQueue(() => this.remove(filePath));
  }

  /** Entry count and location of the Collection, or {} when the store cannot answer. */
  async getIndexStats(): Promise<IndexStats | Record<string, never>> {
    try {
      const collection = await openCollection(this.store, this.collectionName);
      return {
        total_documents: await collection.count(),
        collection_name: this.collectionName,
        db_path: this.store.location,
      };
    } catch (err) {
      this.log.error({ err }, 'Failed to read index stats');
      return {};
    }
  }

  async findByFilePattern(pattern: string, limit = 10): Promise<FilePatternMatches | Record<string, never>> {
    if (pattern.length > MAX_PATTERN_CHARS) {
      throw new InvalidInputError(`File name pattern is longer than ${MAX_PATTERN_CHARS} characters`);
    }
    try {
      new RegExp(pattern);
    } catch (err) {
      throw new InvalidInputError(`Invalid file name pattern: ${errorMessage(err)}`, { cause: err });
    }
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidInputError(`limit must be a positive integer, got ${limit}`);
    }
    try {
      const collection = await openCollection(this.store, this.collectionName);
      const found = await collection.find({ fileNamePattern: pattern }, limit);
      return {
        documents: found.entries.map((e) => e.text),
        metadatas: found.entries.map((e) => e.metadata),
        count: found.total,
      };
    } catch (err) {
      this.log.error({ err, pattern }, 'File pattern search failed');
      return {};
    }
  }

  private async rebuild(force: boolean): Promise<IndexSummary> {
    const start = Date.now();
    const correlationId = newCorrelationId();
    const log = this.log.child({ correlation_id: correlationId });
    log.info({ force, vault: this.config.VAULT_PATH }, 'Rebuilding index');

    const docs = await loadDocuments(this.config.VAULT_PATH, {
      recursive: true,
      extensions: this.config.INDEX_EXTENSIONS,
    });
    let collection = await openCollection(this.store, this.collectionName);
    const prepared = await this.prepareAll(docs, log);

    const failed: IndexFailure[] = [];
    const ready: Array<{ doc: Document; entries: EntryInput[] }> = [];
    for (const p of prepared) {
      if ('error' in p) {
        failed.push({ file_name: p.doc.metadata.file_name, error: errorMessage(p.error) });
      } else {
        ready.push(p);
      }
    }
    if (docs.length > 0 && ready.length === 0) {
      log.error({ failed: failed.length }, 'Every document failed; leaving the collection unchanged');
      throw new IndexRebuildError(failed);
    }

    if (force) {
      collection = await this.clear(collection, log);
    }

    const summary: IndexSummary = {
      correlation_id: correlationId,
      collection_name: this.collectionName,
      force,
      cleared: force,
      documents_loaded: docs.length,
      chunks_indexed: 0,
      total_documents: 0,
      failed,
      duration_ms: 0,
    };

    if (docs.length === 0) {
      log.warn({ vault: this.config.VAULT_PATH }, NO_DOCUMENTS_WARNING);
      summary.warning = NO_DOCUMENTS_WARNING;
    }
    for (const { doc, entries } of ready) {
      if (entries.length === 0) continue;
      try {
        await collection.add(entries);
        summary.chunks_indexed += entries.length;
      } catch (err) {
        if (isFatalIndexError(err)) throw err;
        log.error({ err, file: doc.metadata.source_path }, 'Writing document failed');
        failed.push({ file_name: doc.metadata.file_name, error: errorMessage(err) });
      }
    }

    summary.total_documents = await collection.count();
    summary.duration_ms = Date.now() - start;
    log.info(
      {
        documents: summary.documents_loaded,
        chunks: summary.chunks_indexed,
        failed: summary.failed.length,
        duration_ms: summary.duration_ms,
      },
      'Index rebuild complete',
    );
    return summary;
  }

  /** Chunks and embeds every document. The first fatal failure stops new work and is rethrown. */
  private async prepareAll(docs: Document[], log: Logger): Promise<Prepared[]> {
    const limit = pLimit(this.config.INDEX_CONCURRENCY);
    const abort: { fatal?: { err: unknown } } = {};
    const prepared = await Promise.all(
      docs.map((doc) =>
        limit(async (): Promise<Prepared | undefined> => {
          if (abort.fatal) return undefined;
          try {
            return { doc, entries: await this.toEntries(doc) };
          } catch (err) {
            if (isFatalIndexError(err)) {
              abort.fatal ??= { err };
              return undefined;
            }
            log.error({ err, file: doc.metadata.source_path }, 'Embedding document failed');
            return { doc, error: err };
          }
        }),
      ),
    );
    if (abort.fatal) {
      log.error({ err: abort.fatal.err }, 'Rebuild aborted before writing; the collection is unchanged');
      throw abort.fatal.err;
    }
    return prepared.filter((p): p is Prepared => p !== undefined);
  }

  // Deletion must finish before the first insert of the rebuild.
  private async clear(collection: Collection, log: Logger): Promise<Collection> {
    try {
      const removed = await collection.deleteAll();
      log.info({ removed }, 'Cleared collection');
      return collection;
    } catch (err) {
      log.warn({ err }, 'Delete-all failed; dropping and recreating the collection');
      await this.store.dropCollection(this.collectionName);
      return openCollection(this.store, this.collectionName);
    }
  }

  private async indexOne(filePath: string): Promise<IncrementalSummary> {
    const abs = await resolveVaultFile(this.config.VAULT_PATH, filePath);
    const rel = path.relative(this.config.VAULT_PATH, abs);
    if (rel.split(path.sep).some(isHidden)) {
      throw new InvalidInputError(`Hidden paths are not indexed: ${filePath}`);
    }
    if (!this.config.INDEX_EXTENSIONS.includes(path.extname(abs).toLowerCase())) {
      throw new InvalidInputError(
        `Only ${this.config.INDEX_EXTENSIONS.join(', ')} files are indexed, got ${path.basename(abs)}`,
      );
    }
    const docs = await loadFile(abs);
    if (docs.length === 0) {
      this.log.info({ file: abs }, 'File has no content; nothing to index');
      return { file_path: abs, documents_loaded: 0, chunks_indexed: 0 };
    }

    const collection = await openCollection(this.store, this.collectionName);
    let chunks = 0;
    for (const doc of docs) {
      const entries = await this.toEntries(doc);
      await collection.add(entries);
      chunks += entries.length;
    }
    this.log.info({ file: abs, chunks }, 'Indexed file');
    return { file_path: abs, documents_loaded: docs.length, chunks_indexed: chunks };
  }

  private async remove(filePath: string): Promise<number> {
    const fileName = path.basename(filePath);
    if (fileName.length === 0) {
      throw new InvalidInputError(`No file name in path: "${filePath}"`);
    }
    const collection = await openCollection(this.store, this.collectionName);
    const removed = await collection.deleteWhere({ fileName });
    if (removed === 0) {
      this.log.warn({ file_name: fileName }, 'No indexed entries for file');
    } else {
      this.log.info({ file_name: fileName, removed }, 'Removed file from index');
    }
    return removed;
  }

  private async toEntries(doc: Document): Promise<EntryInput[]> {
    const chunks = chunkDocument(doc, this.chunkOptions);
    if (chunks.length === 0) return [];
    const vectors = await this.embeddings.embedMany(chunks.map((c) => c.text));
    return chunks.map((c, i) => ({ ...c, id: uuidv4(), embedding: vectors[i] }));
  }
}

export function newCorrelationId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, '');
  const rand = randomBytes(4).toString('hex');
  return `${ts}-${rand}`;
}

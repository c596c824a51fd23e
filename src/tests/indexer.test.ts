import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { SqliteVectorStore } from '../db/sqliteVectorStore.js';
import type { Collection, VectorStore } from '../db/vectorStore.js';
import { BackendConnectionError, IndexRebuildError, InvalidInputError } from '../errors.js';
import { HashEmbeddingProvider } from '../services/embeddings.js';
import { IndexManager, MAX_PATTERN_CHARS, NO_DOCUMENTS_WARNING } from '../services/indexer.js';
import { QueryEngine } from '../services/queryEngine.js';
import { FakeGenerator, makeTempDir, silentLogger, testConfig, writeFile } from './helpers.js';

/** Delegating store whose collections cannot delete everything at once. */
class NoDeleteAllStore implements VectorStore {
  readonly kind = 'sqlite' as const;
  readonly dropped: string[] = [];

  constructor(private readonly inner: VectorStore) {}

  get location(): string {
    return this.inner.location;
  }

  async getOrCreateCollection(name: string): Promise<Collection> {
    const c = await this.inner.getOrCreateCollection(name);
    return {
      name: c.name,
      dimension: () => c.dimension(),
      add: (entries) => c.add(entries),
      deleteWhere: (filter) => c.deleteWhere(filter),
      deleteAll: async () => {
        throw new Error('delete-all not supported');
      },
      count: () => c.count(),
      query: (embedding, topK) => c.query(embedding, topK),
      find: (filter, limit) => c.find(filter, limit),
    };
  }

  async dropCollection(name: string): Promise<void> {
    this.dropped.push(name);
    await this.inner.dropCollection(name);
  }

  async close(): Promise<void> {
    await this.inner.close();
  }
}

class BrokenStore implements VectorStore {
  readonly kind = 'sqlite' as const;
  readonly location = '/nowhere';
  async getOrCreateCollection(): Promise<Collection> {
    throw new Error('disk gone');
  }
  async dropCollection(): Promise<void> {}
  async close(): Promise<void> {}
}

class PickyEmbeddings extends HashEmbeddingProvider {
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.some((t) => t.includes('poison'))) throw new Error('cannot embed');
    return super.embedMany(texts);
  }
}

class DownEmbeddings extends HashEmbeddingProvider {
  calls = 0;
  async embedMany(): Promise<number[][]> {
    this.calls++;
    throw new BackendConnectionError('http://embed.test/v1/embeddings', new Error('ECONNREFUSED'));
  }
}

class BrokenEmbeddings extends HashEmbeddingProvider {
  async embedMany(): Promise<number[][]> {
    throw new Error('model returned garbage');
  }
}

describe('IndexManager', () => {
  let root: string;
  let vault: string;
  let store: SqliteVectorStore;

  const manager = (opts: { store?: VectorStore; embeddings?: HashEmbeddingProvider; concurrency?: number } = {}) =>
    new IndexManager({
      store: opts.store ?? store,
      embeddings: opts.embeddings ?? new HashEmbeddingProvider(384),
      config: testConfig(vault, path.join(root, 'db'), { INDEX_CONCURRENCY: String(opts.concurrency ?? 2) }),
      log: silentLogger,
    });

  const total = async (im: IndexManager) => {
    const stats = await im.getIndexStats();
    return 'total_documents' in stats ? stats.total_documents : -1;
  };

  beforeEach(() => {
    root = makeTempDir('knowledge-indexer-');
    vault = path.join(root, 'vault');
    writeFile(vault, 'a.md', 'The sky is blue.');
    writeFile(vault, 'b.md', 'Grass is green.');
    store = new SqliteVectorStore(path.join(root, 'db'));
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('rebuildIndex', () => {
    it('indexes every document in the vault', async () => {
      const summary = await manager().rebuildIndex(false);
      expect(summary).toMatchObject({
        collection_name: 'obsidian_knowledge',
        force: false,
        cleared: false,
        documents_loaded: 2,
        chunks_indexed: 2,
        total_documents: 2,
        failed: [],
      });
      expect(summary.warning).toBeUndefined();
      expect(summary.correlation_id).toMatch(/-[0-9a-f]{8}$/);
    });

    it('is idempotent with force and accumulates without it', async () => {
      const im = manager();
      expect((await im.rebuildIndex(true)).total_documents).toBe(2);
      expect((await im.rebuildIndex(true)).total_documents).toBe(2);
      expect((await im.rebuildIndex(false)).total_documents).toBe(4);
    });

    it('succeeds with a warning on an empty vault', async () => {
      fs.rmSync(path.join(vault, 'a.md'));
      fs.rmSync(path.join(vault, 'b.md'));
      const summary = await manager().rebuildIndex(true);
      expect(summary.warning).toBe(NO_DOCUMENTS_WARNING);
      expect(summary.documents_loaded).toBe(0);
      expect(summary.total_documents).toBe(0);
    });

    it('drops and recreates the collection when delete-all fails', async () => {
      const wrapped = new NoDeleteAllStore(store);
      const im = manager({ store: wrapped });
      await im.rebuildIndex(false);
      await im.rebuildIndex(false);

      const summary = await im.rebuildIndex(true);
      expect(wrapped.dropped).toEqual(['obsidian_knowledge']);
      expect(summary.cleared).toBe(true);
      expect(summary.total_documents).toBe(2);
    });

    it('reports documents that fail and indexes the rest', async () => {
      writeFile(vault, 'bad.md', 'poison pill');
      const summary = await manager({ embeddings: new PickyEmbeddings(384) }).rebuildIndex(true);
      expect(summary.documents_loaded).toBe(3);
      expect(summary.chunks_indexed).toBe(2);
      expect(summary.failed).toEqual([{ file_name: 'bad.md', error: 'cannot embed' }]);
      expect(summary.total_documents).toBe(2);
    });

    it('fails without clearing when the embedding backend is down', async () => {
      await manager().rebuildIndex(false);
      const down = new DownEmbeddings(384);
      const im = manager({ embeddings: down, concurrency: 1 });

      await expect(im.rebuildIndex(true)).rejects.toThrow(BackendConnectionError);
      expect(down.calls).toBe(1);
      expect(await total(im)).toBe(2);
    });

    it('fails without clearing when every document fails', async () => {
      await manager().rebuildIndex(false);
      const im = manager({ embeddings: new BrokenEmbeddings(384) });

      const err = await im.rebuildIndex(true).then(
        () => undefined,
        (e: unknown) => e,
      );
      expect(err).toBeInstanceOf(IndexRebuildError);
      expect(err instanceof IndexRebuildError ? err.failures : []).toEqual([
        { file_name: 'a.md', error: 'model returned garbage' },
        { file_name: 'b.md', error: 'model returned garbage' },
      ]);
      expect(await total(im)).toBe(2);
    });

    it('keeps the index when the vault is missing', async () => {
      const im = manager();
      await im.rebuildIndex(false);
      fs.rmSync(vault, { recursive: true, force: true });

      await expect(im.rebuildIndex(true)).rejects.toThrow(InvalidInputError);
      expect(await total(im)).toBe(2);
    });
  });

  describe('incrementalIndex', () => {
    it('adds one file and keeps duplicates on repeat', async () => {
      const im = manager();
      const abs = path.join(vault, 'a.md');
      await expect(im.incrementalIndex(abs)).resolves.toEqual({ file_path: abs, documents_loaded: 1, chunks_indexed: 1 });
      await im.incrementalIndex('a.md');
      expect(await im.getIndexStats()).toMatchObject({ total_documents: 2 });
    });

    it('is a no-op for an empty file', async () => {
      const file = writeFile(vault, 'blank.md', '   \n');
      const im = manager();
      await expect(im.incrementalIndex(file)).resolves.toEqual({ file_path: file, documents_loaded: 0, chunks_indexed: 0 });
      expect(await im.getIndexStats()).toMatchObject({ total_documents: 0 });
    });

    it('rejects a missing file', async () => {
      await expect(manager().incrementalIndex(path.join(vault, 'missing.md'))).rejects.toThrow(InvalidInputError);
    });

    it('refuses files outside the vault', async () => {
      const secret = writeFile(root, 'secret.md', 'db password placeholder');
      fs.symlinkSync(secret, path.join(vault, 'link.md'));
      const im = manager();

      await expect(im.incrementalIndex('../secret.md')).rejects.toThrow('Path is outside the vault: ../secret.md');
      await expect(im.incrementalIndex(secret)).rejects.toThrow(InvalidInputError);
      await expect(im.incrementalIndex('link.md')).rejects.toThrow('Path is outside the vault: link.md');
      expect(await im.findByFilePattern('secret|link')).toEqual({ documents: [], metadatas: [], count: 0 });
    });

    it('refuses hidden files and extensions outside the allow-list', async () => {
      writeFile(vault, 'notes.txt', 'plain text');
      writeFile(vault, '.obsidian/workspace.md', 'editor state');
      const im = manager();

      await expect(im.incrementalIndex('notes.txt')).rejects.toThrow('Only .md files are indexed, got notes.txt');
      await expect(im.incrementalIndex('.obsidian/workspace.md')).rejects.toThrow(
        'Hidden paths are not indexed: .obsidian/workspace.md',
      );
      expect(await total(im)).toBe(0);
    });

    it('runs after a queued rebuild, never in the middle of it', async () => {
      const im = manager();
      const rebuild = im.rebuildIndex(true);
      const single = im.incrementalIndex('a.md');
      await Promise.all([rebuild, single]);
      expect(await im.getIndexStats()).toMatchObject({ total_documents: 3 });
    });
  });

  describe('removeFromIndex', () => {
    it('removes every entry of the file by name', async () => {
      const im = manager();
      await im.rebuildIndex(false);
      await im.incrementalIndex('a.md');
      await expect(im.removeFromIndex('/anywhere/a.md')).resolves.toBe(2);
      await expect(im.removeFromIndex('a.md')).resolves.toBe(0);
      expect(await im.getIndexStats()).toMatchObject({ total_documents: 1 });
    });

    it('leaves no entry of the file for queries to return', async () => {
      const im = manager();
      await im.rebuildIndex(false);
      await im.removeFromIndex('a.md');

      const engine = new QueryEngine({
        store,
        embeddings: new HashEmbeddingProvider(384),
        generator: new FakeGenerator(),
        collectionName: im.collectionName,
        log: silentLogger,
      });
      const answer = await engine.query('what color is the sky', 5);
      expect(answer.sources.map((s) => s.source_file)).toEqual(['b.md']);
    });
  });

  describe('getIndexStats', () => {
    it('reports count, name and location', async () => {
      const im = manager();
      await im.rebuildIndex(false);
      await expect(im.getIndexStats()).resolves.toEqual({
        total_documents: 2,
        collection_name: 'obsidian_knowledge',
        db_path: path.join(root, 'db'),
      });
    });

    it('returns {} when the store fails', async () => {
      await expect(manager({ store: new BrokenStore() }).getIndexStats()).resolves.toEqual({});
    });
  });

  describe('findByFilePattern', () => {
    it('lists entries whose file name matches', async () => {
      const im = manager();
      await im.rebuildIndex(false);
      const found = await im.findByFilePattern('^a\\.md$');
      expect(found).toEqual({
        documents: ['The sky is blue.'],
        metadatas: [expect.objectContaining({ file_name: 'a.md', source_path: path.join(vault, 'a.md') })],
        count: 1,
      });
    });

    it('counts every match while returning at most limit entries', async () => {
      writeFile(vault, 'ab.md', 'Apples are red.');
      writeFile(vault, 'ac.md', 'Lemons are yellow.');
      const im = manager();
      await im.rebuildIndex(false);

      const found = await im.findByFilePattern('^a', 1);
      expect('count' in found ? [found.count, found.documents] : []).toEqual([3, ['The sky is blue.']]);
    });

    it('rejects invalid patterns and limits', async () => {
      const im = manager();
      await expect(im.findByFilePattern('(')).rejects.toThrow(InvalidInputError);
      await expect(im.findByFilePattern('a', 0)).rejects.toThrow(InvalidInputError);
      await expect(im.findByFilePattern('a'.repeat(MAX_PATTERN_CHARS + 1))).rejects.toThrow(InvalidInputError);
    });

    it('returns {} when the store fails', async () => {
      await expect(manager({ store: new BrokenStore() }).findByFilePattern('a')).resolves.toEqual({});
    });
  });
});

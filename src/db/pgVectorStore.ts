// src/db/pgVectorStore.ts
// What: Collection store on Postgres + pgvector, selected with VECTOR_STORE=pgvector.
// How: Schema comes from src/db/migrations (scripts/run-migrations.ts). Inserts run in short transactions
//      guarded by an inTx flag; similarity search orders by the <=> cosine distance, then file_name, then seq.
//      Rows are validated with zod since pg hands back untyped records (int8 columns arrive as strings).

import { z } from 'zod';
import type { EntryInput, SearchMatch, StoredEntry } from '../models/types.js';
import { EmbeddingDimensionError, StoreUnavailableError } from '../errors.js';
import { moduleLogger } from '../logging.js';
import { distanceToSimilarity, vectorToParam } from '../util/sql.js';
import { redactConnectionString, SqlPool } from './pool.js';
import {
  assertBatchDimension,
  Collection,
  documentMetadataSchema,
  EntryFilter,
  FoundEntries,
  VectorStore,
} from './vectorStore.js';

const log = moduleLogger('pgvector');

const dimsRowSchema = z.object({ dims: z.number().int().nullable() });
const countRowSchema = z.object({ count: z.coerce.number() });
const entryRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  chunk_index: z.coerce.number(),
  content: z.string(),
  metadata: documentMetadataSchema,
});
const matchRowSchema = entryRowSchema.extend({ distance: z.coerce.number().nullable() });

function toStoredEntry(row: z.infer<typeof entryRowSchema>): StoredEntry {
  return {
    id: row.id,
    document_id: row.document_id,
    chunk_index: row.chunk_index,
    text: row.content,
    metadata: row.metadata,
  };
}

function filterClause(filter: EntryFilter, param: number): { sql: string; value: string } {
  return 'fileName' in filter
    ? { sql: `file_name = $${param}`, value: filter.fileName }
    : { sql: `file_name ~ $${param}`, value: filter.fileNamePattern };
}

class PgCollection implements Collection {
  constructor(private readonly pool: SqlPool, readonly name: string) {}

  async dimension(): Promise<number | null> {
    const r = await this.pool.query('SELECT dims FROM collections WHERE name = $1', [this.name]);
    if (r.rows.length === 0) {
      throw new StoreUnavailableError(`Collection "${this.name}" does not exist`);
    }
    return dimsRowSchema.parse(r.rows[0]).dims;
  }

  async add(entries: EntryInput[]): Promise<void> {
    if (entries.length === 0) return;
    const dims = assertBatchDimension(entries, await this.dimension(), this.name);

    const client = await this.pool.connect();
    let inTx = false;
    try {
      await client.query('BEGIN');
      inTx = true;
      await client.query('UPDATE collections SET dims = $1 WHERE name = $2 AND dims IS NULL', [dims, this.name]);
      for (const e of entries) {
        await client.query(
          `INSERT INTO entries (id, collection, document_id, file_name, chunk_index, content, metadata, embedding)
           VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8::vector)`,
          [
            e.id,
            this.name,
            e.document_id,
            e.metadata.file_name,
            e.chunk_index,
            e.text,
            JSON.stringify(e.metadata),
            vectorToParam(e.embedding),
          ],
        );
      }
      await client.query('COMMIT');
      inTx = false;
    } catch (err) {
      if (inTx) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => log.warn({ err: rollbackErr }, 'Rollback failed'));
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async deleteWhere(filter: EntryFilter): Promise<number> {
    const clause = filterClause(filter, 2);
    const r = await this.pool.query(`DELETE FROM entries WHERE collection = $1 AND ${clause.sql}`, [
      this.name,
      clause.value,
    ]);
    return r.rowCount ?? 0;
  }

  async deleteAll(): Promise<number> {
    const client = await this.pool.connect();
    let inTx = false;
    try {
      await client.query('BEGIN');
      inTx = true;
      const r = await client.query('DELETE FROM entries WHERE collection = $1', [this.name]);
      await client.query('UPDATE collections SET dims = NULL WHERE name = $1', [this.name]);
      await client.query('COMMIT');
      inTx = false;
      return r.rowCount ?? 0;
    } catch (err) {
      if (inTx) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => log.warn({ err: rollbackErr }, 'Rollback failed'));
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async count(): Promise<number> {
    const r = await this.pool.query('SELECT COUNT(*)::int AS count FROM entries WHERE collection = $1', [this.name]);
    return r.rows.length > 0 ? countRowSchema.parse(r.rows[0]).count : 0;
  }

  async query(embedding: number[], topK: number): Promise<SearchMatch[]> {
    const dims = await this.dimension();
    if (dims === null) return [];
    if (embedding.length !== dims) {
      throw new EmbeddingDimensionError(dims, embedding.length, `query against "${this.name}"`);
    }
    const sql = `
      WITH q AS (SELECT $2::vector AS qv)
      SELECT e.id, e.document_id, e.chunk_index, e.content, e.metadata, (e.embedding <=> q.qv) AS distance
      FROM entries e, q
      WHERE e.collection = $1
      ORDER BY e.embedding <=> q.qv, e.file_name, e.seq
      LIMIT $3
    `;
    const r = await this.pool.query(sql, [this.name, vectorToParam(embedding), topK]);
    return r.rows.map((raw) => {
      const row = matchRowSchema.parse(raw);
      return {
        entry: toStoredEntry(row),
        score: row.distance === null ? null : distanceToSimilarity(row.distance),
      };
    });
  }

  async find(filter: EntryFilter, limit: number): Promise<FoundEntries> {
    const clause = filterClause(filter, 2);
    const where = `collection = $1 AND ${clause.sql}`;
    const r = await this.pool.query(
      `SELECT id, document_id, chunk_index, content, metadata FROM entries WHERE ${where} ORDER BY seq LIMIT $3`,
      [this.name, clause.value, limit],
    );
    const total = await this.pool.query(`SELECT COUNT(*)::int AS count FROM entries WHERE ${where}`, [
      this.name,
      clause.value,
    ]);
    return {
      entries: r.rows.map((raw) => toStoredEntry(entryRowSchema.parse(raw))),
      total: total.rows.length > 0 ? countRowSchema.parse(total.rows[0]).count : 0,
    };
  }
}

export class PgVectorStore implements VectorStore {
  readonly kind = 'pgvector' as const;
  readonly location: string;

  constructor(private readonly pool: SqlPool, connectionString: string) {
    this.location = redactConnectionString(connectionString);
  }

  async getOrCreateCollection(name: string): Promise<Collection> {
    await this.pool.query('INSERT INTO collections (name) VALUES ($1) ON CONFLICT (name) DO NOTHING', [name]);
    return new PgCollection(this.pool, name);
  }

  async dropCollection(name: string): Promise<void> {
    // entries cascade
    await this.pool.query('DELETE FROM collections WHERE name = $1', [name]);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

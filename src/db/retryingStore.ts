// src/db/retryingStore.ts
// What: Retry and error mapping at the Vector Store Adapter boundary.
// How: withStoreRetry() wraps a VectorStore so that opening a collection and every Collection operation runs
//      through a RetryPolicy. Only connection-level failures are retried (socket errors, Postgres class 08 and
//      shutdown codes, SQLite busy/locked); once attempts run out they surface as StoreUnavailableError.
//      Every other failure (bad SQL, dimension mismatch, zod row errors) is rethrown at once, unchanged.

import type { VectorStoreKind } from '../config/env.js';
import { errorMessage, StoreUnavailableError } from '../errors.js';
import type { Logger } from '../logging.js';
import type { EntryInput, SearchMatch } from '../models/types.js';
import { RetryPolicy } from '../util/retry.js';
import type { Collection, EntryFilter, FoundEntries, VectorStore } from './vectorStore.js';

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
]);

// pg reports a dropped socket without a code
const TRANSIENT_MESSAGES = /Connection terminated|timeout exceeded when trying to connect/i;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function isTransientStoreError(err: unknown): boolean {
  const code = errorCode(err);
  if (code !== undefined && (TRANSIENT_CODES.has(code) || /^08[0-9A-Z]{3}$/.test(code))) return true;
  return err instanceof Error && TRANSIENT_MESSAGES.test(err.message);
}

class StoreGuard {
  private readonly policy: RetryPolicy;

  constructor(
    retry: RetryPolicy,
    private readonly location: string,
    private readonly log: Logger,
  ) {
    this.policy = retry.with({ shouldRetry: isTransientStoreError });
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.policy.run(operation, fn, this.log);
    } catch (err) {
      if (!isTransientStoreError(err)) throw err;
      throw new StoreUnavailableError(`Vector store at ${this.location} failed during ${operation}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

class RetryingCollection implements Collection {
  constructor(
    private readonly inner: Collection,
    private readonly guard: StoreGuard,
  ) {}

  get name(): string {
    return this.inner.name;
  }

  dimension(): Promise<number | null> {
    return this.guard.run('dimension', () => this.inner.dimension());
  }

  add(entries: EntryInput[]): Promise<void> {
    return this.guard.run('add', () => this.inner.add(entries));
  }

  deleteWhere(filter: EntryFilter): Promise<number> {
    return this.guard.run('deleteWhere', () => this.inner.deleteWhere(filter));
  }

  deleteAll(): Promise<number> {
    return this.guard.run('deleteAll', () => this.inner.deleteAll());
  }

  count(): Promise<number> {
    return this.guard.run('count', () => this.inner.count());
  }

  query(embedding: number[], topK: number): Promise<SearchMatch[]> {
    return this.guard.run('query', () => this.inner.query(embedding, topK));
  }

  find(filter: EntryFilter, limit: number): Promise<FoundEntries> {
    return this.guard.run('find', () => this.inner.find(filter, limit));
  }
}

class RetryingStore implements VectorStore {
  private readonly guard: StoreGuard;

  constructor(
    private readonly inner: VectorStore,
    retry: RetryPolicy,
    log: Logger,
  ) {
    this.guard = new StoreGuard(retry, inner.location, log);
  }

  get kind(): VectorStoreKind {
    return this.inner.kind;
  }

  get location(): string {
    return this.inner.location;
  }

  async getOrCreateCollection(name: string): Promise<Collection> {
    const collection = await this.guard.run(`open collection ${name}`, () => this.inner.getOrCreateCollection(name));
    return new RetryingCollection(collection, this.guard);
  }

  dropCollection(name: string): Promise<void> {
    return this.guard.run(`drop collection ${name}`, () => this.inner.dropCollection(name));
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

export function withStoreRetry(store: VectorStore, retry: RetryPolicy, log: Logger): VectorStore {
  return new RetryingStore(store, retry, log);
}

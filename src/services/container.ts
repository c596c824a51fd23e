// src/services/container.ts
// What: Builds every service once at startup and tears them down on shutdown.
// How: createServices() wires config → store, embeddings, generation backend and the services on top of them.
//      Nothing is a module-level singleton; tests pass their own store, embedding provider or fetch.
//      All writes to the Collection share one write queue (p-limit, concurrency 1). Every store operation goes
//      through withStoreRetry(), so connection failures are retried and then reported as StoreUnavailableError.

import type { AppConfig } from '../config/env.js';
import { createPool } from '../db/pool.js';
import { PgVectorStore } from '../db/pgVectorStore.js';
import { withStoreRetry } from '../db/retryingStore.js';
import { SqliteVectorStore } from '../db/sqliteVectorStore.js';
import { openCollection, VectorStore } from '../db/vectorStore.js';
import { ConfigurationError, errorMessage, KnowledgeError, StoreUnavailableError } from '../errors.js';
import logger, { Logger } from '../logging.js';
import { RetryPolicy } from '../util/retry.js';
import { CaptureService } from './capture.js';
import { createEmbeddingProvider, EmbeddingProvider } from './embeddings.js';
import { ChatClientFactory, FetchLike, GenerationBackend, openAIChatClientFactory } from './generation.js';
import { InboxProcessor } from './inbox.js';
import { createWriteQueue, IndexManager } from './indexer.js';
import { NoteWriter } from './noteWriter.js';
import { QueryEngine } from './queryEngine.js';
import { Summarizer } from './summarizer.js';

export interface ServiceOverrides {
  store?: VectorStore;
  embeddings?: EmbeddingProvider;
  fetch?: FetchLike;
  chatClient?: ChatClientFactory;
  log?: Logger;
  now?: () => Date;
}

export interface Services {
  config: AppConfig;
  log: Logger;
  store: VectorStore;
  embeddings: EmbeddingProvider;
  generation: GenerationBackend;
  indexer: IndexManager;
  queryEngine: QueryEngine;
  summarizer: Summarizer;
  notes: NoteWriter;
  capture: CaptureService;
  inbox: InboxProcessor;
  /** Checks the embedding provider and the Collection. Failure here is fatal at startup. */
  init(): Promise<void>;
  close(): Promise<void>;
}

export function retryPolicyFromConfig(config: AppConfig): RetryPolicy {
  return new RetryPolicy({ maxAttempts: config.LLM_MAX_ATTEMPTS, baseDelayMs: config.LLM_RETRY_BASE_MS });
}

export function storeRetryPolicyFromConfig(config: AppConfig): RetryPolicy {
  return new RetryPolicy({ maxAttempts: config.STORE_MAX_ATTEMPTS, baseDelayMs: config.STORE_RETRY_BASE_MS });
}

/** Opens the configured store, retrying connection failures with the shared policy. */
export async function openVectorStore(config: AppConfig, retry: RetryPolicy, log: Logger): Promise<VectorStore> {
  const open = async (): Promise<VectorStore> => {
    if (config.VECTOR_STORE === 'pgvector') {
      if (!config.DATABASE_URL) {
        throw new ConfigurationError('DATABASE_URL is required when VECTOR_STORE=pgvector');
      }
      const store = new PgVectorStore(createPool(config.DATABASE_URL), config.DATABASE_URL);
      try {
        await store.getOrCreateCollection(config.COLLECTION_NAME);
      } catch (err) {
        await store.close();
        throw err;
      }
      return store;
    }
    return new SqliteVectorStore(config.VECTOR_DB_PATH);
  };

  const policy = retry.with({ shouldRetry: (err) => !(err instanceof KnowledgeError) });
  try {
    const store = await policy.run('open vector store', open, log);
    log.info({ kind: store.kind, location: store.location }, 'Vector store ready');
    return store;
  } catch (err) {
    if (err instanceof KnowledgeError) throw err;
    throw new StoreUnavailableError(`Cannot open ${config.VECTOR_STORE} vector store: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export async function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Promise<Services> {
  const log = overrides.log ?? logger;
  const retry = retryPolicyFromConfig(config);
  const storeRetry = storeRetryPolicyFromConfig(config);
  const storeLog = log.child({ module: 'store' });

  const opened = overrides.store ?? (await openVectorStore(config, storeRetry, storeLog));
  const store = withStoreRetry(opened, storeRetry, storeLog);
  const embeddings = overrides.embeddings ?? createEmbeddingProvider(config, log.child({ module: 'embeddings' }));
  const generation = new GenerationBackend(
    {
      baseUrl: config.LLM_BASE_URL,
      model: config.LLM_MODEL,
      temperature: config.LLM_TEMPERATURE,
      timeoutMs: config.LLM_TIMEOUT_MS,
    },
    retry,
    log.child({ module: 'generation' }),
    { fetch: overrides.fetch, chatClient: overrides.chatClient ?? openAIChatClientFactory(config.LLM_API_KEY) },
  );

  const indexer = new IndexManager({
    store,
    embeddings,
    config,
    log: log.child({ module: 'indexer' }),
    writeQueue: createWriteQueue(),
  });
  const queryEngine = new QueryEngine({
    store,
    embeddings,
    generator: generation,
    collectionName: config.COLLECTION_NAME,
    log: log.child({ module: 'query' }),
  });
  const summarizer = new Summarizer(generation, config.SUMMARY_MAX_INPUT_CHARS, log.child({ module: 'summarizer' }));
  const notes = new NoteWriter(
    config.VAULT_PATH,
    config.NOTES_SUBDIR,
    log.child({ module: 'notes' }),
    overrides.now,
    config.PROCESSED_SUBDIR,
  );
  const capture = new CaptureService(summarizer, notes, indexer, log.child({ module: 'capture' }));
  const inbox = new InboxProcessor(summarizer, notes, indexer, log.child({ module: 'inbox' }), overrides.now);

  return {
    config,
    log,
    store,
    embeddings,
    generation,
    indexer,
    queryEngine,
    summarizer,
    notes,
    capture,
    inbox,
    async init() {
      await embeddings.init();
      const collection = await openCollection(store, config.COLLECTION_NAME);
      const dims = await collection.dimension();
      if (dims !== null && dims !== embeddings.dimensions) {
        log.warn(
          { collection: config.COLLECTION_NAME, stored: dims, provider: embeddings.dimensions },
          'Collection was built with a different embedding dimension; rebuild with force to re-embed',
        );
      }
    },
    async close() {
      await store.close();
    },
  };
}

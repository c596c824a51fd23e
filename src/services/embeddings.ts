// src/services/embeddings.ts
// What: Embedding providers. One instance is built at startup and shared by indexing and querying.
// How: OpenAIEmbeddingProvider calls an OpenAI-compatible /embeddings endpoint (OpenAI, or a local server such as
//      Ollama or llama.cpp via EMBEDDING_BASE_URL) and validates the dimension of every vector. SDK connection
//      and HTTP failures surface as backend_unavailable errors.
//      HashEmbeddingProvider is the deterministic fallback: feature-hashed tokens into a fixed-length vector.
//      It is only ever chosen explicitly and always reports itself as degraded.

import { createHash } from 'crypto';
import OpenAI from 'openai';
import type { AppConfig } from '../config/env.js';
import { ConfigurationError, EmbeddingDimensionError, errorMessage } from '../errors.js';
import type { Logger } from '../logging.js';
import { fromOpenAIError } from './openaiErrors.js';

export interface EmbeddingProvider {
  /** Stable identifier of provider + model, e.g. "openai:all-minilm". */
  readonly id: string;
  readonly dimensions: number;
  readonly degraded: boolean;
  /** Verifies the provider works; called once at startup. */
  init(): Promise<void>;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

/** The part of the OpenAI client this module uses. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[] }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  readonly degraded = false;
  private readonly endpoint: string;

  constructor(
    private readonly client: EmbeddingsClient,
    private readonly model: string,
    readonly dimensions: number,
    baseUrl: string,
  ) {
    this.id = `openai:${model}`;
    this.endpoint = `${baseUrl.replace(/\/+$/, '')}/embeddings`;
  }

  async init(): Promise<void> {
    try {
      await this.embed('dimension check');
    } catch (err) {
      throw new ConfigurationError(`Embedding model "${this.model}" is unavailable: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async embed(text: string): Promise<number[]> {
    const [vec] = await this.embedMany([text]);
    return vec;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    let res: { data: Array<{ embedding: number[] }> };
    try {
      res = await this.client.embeddings.create({
        model: this.model,
        input: texts,
      });
    } catch (err) {
      throw fromOpenAIError(this.endpoint, err);
    }
    const vectors = res.data.map((d) => d.embedding);
    if (vectors.length !== texts.length) {
      throw new Error(`Embedding endpoint returned ${vectors.length} vectors for ${texts.length} inputs`);
    }
    for (const v of vectors) {
      if (v.length !== this.dimensions) {
        throw new EmbeddingDimensionError(this.dimensions, v.length, `embedding model "${this.model}"`);
      }
    }
    return vectors;
  }
}

const TOKEN_RE = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

/**
 * Feature hashing: each token lands in bucket md5(token) mod dimensions with a sign taken from the digest,
 * and the result is L2-normalised. Texts that share words get positive cosine similarity.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'hash';
  readonly degraded = true;

  constructor(readonly dimensions: number = 384) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new ConfigurationError(`Hash embedding dimension must be a positive integer, got ${dimensions}`);
    }
  }

  async init(): Promise<void> {
    // nothing to load
  }

  async embed(text: string): Promise<number[]> {
    return this.hashText(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.hashText(t));
  }

  private hashText(text: string): number[] {
    const vec = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const digest = createHash('md5').update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.dimensions;
      vec[bucket] += (digest[4] & 1) === 0 ? 1 : -1;
    }
    const norm = Math.sqrt(vec.reduce((acc, x) => acc + x * x, 0));
    return norm === 0 ? vec : vec.map((x) => x / norm);
  }
}

export function createEmbeddingProvider(config: AppConfig, log: Logger): EmbeddingProvider {
  if (config.EMBEDDING_PROVIDER === 'hash') {
    log.warn(
      { dimensions: config.EMBEDDING_DIMENSIONS },
      'DEGRADED MODE: using hash-derived fallback embeddings; retrieval quality is lexical only',
    );
    return new HashEmbeddingProvider(config.EMBEDDING_DIMENSIONS);
  }
  const client = new OpenAI({ apiKey: config.EMBEDDING_API_KEY, baseURL: config.EMBEDDING_BASE_URL });
  log.info(
    { baseURL: config.EMBEDDING_BASE_URL, model: config.EMBEDDING_MODEL, dimensions: config.EMBEDDING_DIMENSIONS },
    'Using OpenAI-compatible embedding endpoint',
  );
  return new OpenAIEmbeddingProvider(client, config.EMBEDDING_MODEL, config.EMBEDDING_DIMENSIONS, config.EMBEDDING_BASE_URL);
}

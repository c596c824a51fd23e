// src/errors.ts
// What: Typed failures raised by the indexing and query core.
// How: Each error carries a stable `code` and a `kind` so the HTTP layer can tell "backend unavailable"
//      (user may retry) from "invalid input" (not retryable) from data/internal failures (escalate).

import type { IndexFailure } from './models/types.js';

export type ErrorKind = 'configuration' | 'invalid_input' | 'backend_unavailable' | 'data' | 'internal';

export abstract class KnowledgeError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends KnowledgeError {
  readonly code = 'CONFIGURATION';
  readonly kind = 'configuration';
}

export class InvalidInputError extends KnowledgeError {
  readonly code = 'INVALID_INPUT';
  readonly kind = 'invalid_input';
}

export class StoreUnavailableError extends KnowledgeError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly kind = 'backend_unavailable';
}

/** Connection refused, DNS failure, timeout: the request never got an HTTP answer. */
export class BackendConnectionError extends KnowledgeError {
  readonly code = 'BACKEND_CONNECTION';
  readonly kind = 'backend_unavailable';
  readonly url: string;
  readonly timedOut: boolean;

  constructor(url: string, cause: unknown, timedOut: boolean = isTimeoutError(cause)) {
    super(`${timedOut ? 'Timed out calling' : 'Could not reach'} ${url}: ${errorMessage(cause)}`, { cause });
    this.url = url;
    this.timedOut = timedOut;
  }
}

/** Non-2xx answer from an upstream HTTP endpoint. */
export class HttpStatusError extends KnowledgeError {
  readonly code = 'HTTP_STATUS';
  readonly kind = 'backend_unavailable';
  readonly status: number;
  readonly url: string;
  readonly body?: string;

  constructor(url: string, status: number, body?: string) {
    super(`${url} returned HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

export class ResponseShapeError extends KnowledgeError {
  readonly code = 'RESPONSE_SHAPE';
  readonly kind = 'data';
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message);
    this.keys = keys;
  }
}

export class EmbeddingDimensionError extends KnowledgeError {
  readonly code = 'EMBEDDING_DIMENSION';
  readonly kind = 'data';
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context: string) {
    super(`Embedding dimension mismatch in ${context}: collection expects ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

/** Every document of a rebuild failed; nothing was written and the Collection was left as it was. */
export class IndexRebuildError extends KnowledgeError {
  readonly code = 'INDEX_REBUILD_FAILED';
  readonly kind = 'data';
  readonly failures: IndexFailure[];

  constructor(failures: IndexFailure[]) {
    super(
      `All ${failures.length} documents failed to index` +
        (failures.length > 0 ? `; first error (${failures[0].file_name}): ${failures[0].error}` : ''),
    );
    this.failures = failures;
  }
}

export interface GenerationCauses {
  openai: Error;
  native: Error;
}

/** Both generation endpoints failed; keeps both underlying errors. */
export class GenerationBackendError extends KnowledgeError {
  readonly code = 'GENERATION_UNAVAILABLE';
  readonly kind = 'backend_unavailable';
  readonly causes: GenerationCauses;

  constructor(baseUrl: string, causes: GenerationCauses) {
    super(
      `All generation endpoints failed for ${baseUrl}: ` +
        `openai-compatible: ${causes.openai.message}; native: ${causes.native.message}`,
      { cause: causes.native },
    );
    this.causes = causes;
  }
}

export function errorKind(err: unknown): ErrorKind {
  return err instanceof KnowledgeError ? err.kind : 'internal';
}

/** AbortSignal.timeout() rejects with a TimeoutError; an explicit abort() with an AbortError. */
export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// src/services/generation.ts
// What: Generation Backend Adapter for local LLM servers (Ollama, llama.cpp, anything OpenAI-compatible).
// How: generate() asks the OpenAI-compatible /v1/chat/completions endpoint first, through the openai SDK with its
//      own retries off, and falls back to the native /api/chat endpoint over plain fetch. Each leg has its own
//      RetryPolicy that retries transient failures only (network errors, timeouts, HTTP 408/429/5xx). A body with
//      no extractable text moves on to the next leg without retrying.
//      When both legs fail the caller gets one GenerationBackendError carrying both causes.

import OpenAI from 'openai';
import {
  BackendConnectionError,
  GenerationBackendError,
  HttpStatusError,
  ResponseShapeError,
  errorMessage,
  isTimeoutError,
} from '../errors.js';
import type { Logger } from '../logging.js';
import { RetryPolicy } from '../util/retry.js';
import { fromOpenAIError } from './openaiErrors.js';
import { decodeResponse } from './responseShapes.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ChatMessage {
  role: 'user';
  content: string;
}

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

/** The part of the OpenAI client the OpenAI-compatible leg uses. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionBody, options?: { timeout?: number }): Promise<unknown>;
    };
  };
}

/** Builds a client for a server root such as http://localhost:11434. */
export type ChatClientFactory = (baseUrl: string) => ChatCompletionsClient;

export function openAIChatClientFactory(apiKey: string): ChatClientFactory {
  return (baseUrl) => new OpenAI({ apiKey, baseURL: `${baseUrl}/v1`, maxRetries: 0 });
}

export interface GenerateRequest {
  prompt: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  timeoutMs?: number;
}

export interface GenerationDefaults {
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface HealthCheckResult {
  reachable: boolean;
  url: string;
  status?: number;
  error?: string;
}

export interface TextGenerator {
  readonly model: string;
  generate(req: GenerateRequest): Promise<string>;
}

export const HEALTH_CHECK_TIMEOUT_MS = 5_000;

const RETRYABLE_STATUS = new Set([408, 429]);

export function isTransient(err: unknown): boolean {
  if (err instanceof BackendConnectionError) return true;
  if (err instanceof HttpStatusError) return RETRYABLE_STATUS.has(err.status) || err.status >= 500;
  return false;
}

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export interface GenerationTransport {
  fetch?: FetchLike;
  chatClient?: ChatClientFactory;
}

export class GenerationBackend implements TextGenerator {
  private readonly defaults: GenerationDefaults;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly chatClientFor: ChatClientFactory;
  private readonly chatClients = new Map<string, ChatCompletionsClient>();

  constructor(
    defaults: GenerationDefaults,
    retry: RetryPolicy,
    private readonly log: Logger,
    transport: GenerationTransport = {},
  ) {
    this.fetchImpl = transport.fetch ?? fetch;
    this.chatClientFor = transport.chatClient ?? openAIChatClientFactory('local');
    this.defaults = { ...defaults, baseUrl: stripTrailingSlash(defaults.baseUrl) };
    this.retry = retry.with({ shouldRetry: isTransient });
  }

  get model(): string {
    return this.defaults.model;
  }

  get baseUrl(): string {
    return this.defaults.baseUrl;
  }

  async generate(req: GenerateRequest): Promise<string> {
    const baseUrl = stripTrailingSlash(req.baseUrl ?? this.defaults.baseUrl);
    const model = req.model ?? this.defaults.model;
    const temperature = req.temperature ?? this.defaults.temperature;
    const timeoutMs = req.timeoutMs ?? this.defaults.timeoutMs;
    const messages: ChatMessage[] = [{ role: 'user', content: req.prompt }];

    let openaiError: Error;
    try {
      return await this.callLeg('openai', () => this.chatCompletion(baseUrl, { model, messages, temperature }, timeoutMs));
    } catch (err) {
      openaiError = toError(err);
      this.log.warn({ err: openaiError, baseUrl }, 'OpenAI-compatible endpoint failed; trying native endpoint');
    }

    try {
      const body = { model, messages, stream: false, options: { temperature } };
      return await this.callLeg('native', () => this.postJson(`${baseUrl}/api/chat`, body, timeoutMs));
    } catch (err) {
      const failure = new GenerationBackendError(baseUrl, { openai: openaiError, native: toError(err) });
      this.log.error({ err: failure, baseUrl, model }, 'Generation failed on every endpoint');
      throw failure;
    }
  }

  /** Checks whether a server answers at all. Never throws. */
  async checkHealth(baseUrl: string = this.defaults.baseUrl): Promise<HealthCheckResult> {
    const base = stripTrailingSlash(baseUrl);
    const url = base.endsWith(':8080') ? `${base}/health` : `${base}/api/tags`;
    try {
      const res = await this.fetchImpl(url, { method: 'GET', signal: AbortSignal.timeout(HEALTH_CHECK_TIMEOUT_MS) });
      return { reachable: res.ok, url, status: res.status };
    } catch (err) {
      this.log.debug({ err, url }, 'Generation backend health check failed');
      return { reachable: false, url, error: errorMessage(err) };
    }
  }

  private async callLeg(leg: string, request: () => Promise<unknown>): Promise<string> {
    const data = await this.retry.run(`generation:${leg}`, request, this.log);
    const decoded = decodeResponse(data);
    this.log.debug({ leg, shape: decoded.shape, chars: decoded.text.length }, 'Generation succeeded');
    return decoded.text;
  }

  private async chatCompletion(baseUrl: string, body: ChatCompletionBody, timeoutMs: number): Promise<unknown> {
    let client = this.chatClients.get(baseUrl);
    if (!client) {
      client = this.chatClientFor(baseUrl);
      this.chatClients.set(baseUrl, client);
    }
    try {
      return await client.chat.completions.create(body, { timeout: timeoutMs });
    } catch (err) {
      throw fromOpenAIError(`${baseUrl}/v1/chat/completions`, err);
    }
  }

  private async postJson(url: string, body: unknown, timeoutMs: number): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new BackendConnectionError(url, err);
    }
    if (!res.ok) {
      const text = await res.text().catch((err: unknown) => `<unreadable body: ${errorMessage(err)}>`);
      throw new HttpStatusError(url, res.status, text);
    }
    try {
      return await res.json();
    } catch (err) {
      // the timeout signal also covers reading the body
      if (isTimeoutError(err)) throw new BackendConnectionError(url, err);
      throw new ResponseShapeError(`${url} returned a body that is not JSON: ${errorMessage(err)}`);
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

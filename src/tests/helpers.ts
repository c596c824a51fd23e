// src/tests/helpers.ts
// Shared fixtures for the test suite: temp dirs, a silent logger, configs and fake LLM plumbing.

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import OpenAI from 'openai';
import pino from 'pino';
import { AppConfig, loadConfig } from '../config/env.js';
import type { EntryInput } from '../models/types.js';
import type {
  ChatClientFactory,
  ChatCompletionBody,
  FetchLike,
  GenerateRequest,
  TextGenerator,
} from '../services/generation.js';
import { RetryPolicy } from '../util/retry.js';

export const silentLogger = pino({ level: 'silent' });

export const makeTempDir = (prefix = 'knowledge-test-') => fs.mkdtempSync(path.join(os.tmpdir(), prefix));

export function writeFile(root: string, rel: string, content: string): string {
  const full = path.join(root, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content, 'utf8');
  return full;
}

export function testConfig(vault: string, dbDir: string, env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    VAULT_PATH: vault,
    VECTOR_DB_PATH: dbDir,
    EMBEDDING_PROVIDER: 'hash',
    LLM_BASE_URL: 'http://llm.test',
    LLM_MODEL: 'test-model',
    LLM_RETRY_BASE_MS: '1',
    NODE_ENV: 'test',
    ...env,
  });
}

export const noDelayRetry = (maxAttempts = 3) =>
  new RetryPolicy({ maxAttempts, baseDelayMs: 0, sleep: async () => undefined });

export function entry(id: string, fileName: string, embedding: number[], text = `text of ${id}`): EntryInput {
  return {
    id,
    document_id: `doc-${fileName}`,
    chunk_index: 0,
    text,
    embedding,
    metadata: { file_name: fileName, source_path: `/vault/${fileName}`, created_at: '2024-01-01T00:00:00.000Z' },
  };
}

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

export interface RecordedCall {
  url: string;
  method: string;
  body: unknown;
}

/** fetch stand-in: each URL answers from its own queue of responses or errors, in order. */
export function scriptedFetch(routes: Record<string, Array<Response | Error>>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({
      url,
      method: init.method ?? 'GET',
      body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const next = routes[url]?.shift();
    if (next === undefined) throw new Error(`unexpected request to ${url}`);
    if (next instanceof Error) throw next;
    return next;
  };
  return { calls, fetchImpl };
}

export const chatCompletion = (content: string) => ({ choices: [{ message: { role: 'assistant', content } }] });

/** The error the openai SDK throws for an HTTP answer with this status. */
export const apiError = (status: number) => OpenAI.APIError.generate(status, undefined, 'status error', {});

export interface RecordedChat {
  baseUrl: string;
  body: ChatCompletionBody;
  timeout?: number;
}

/** Chat client stand-in for the OpenAI-compatible leg: answers from a queue of bodies or errors, in order. */
export function scriptedChatClient(replies: unknown[]) {
  const calls: RecordedChat[] = [];
  const factory: ChatClientFactory = (baseUrl) => ({
    chat: {
      completions: {
        create: async (body, options) => {
          calls.push({ baseUrl, body, timeout: options?.timeout });
          if (replies.length === 0) throw new Error(`unexpected chat completion for ${baseUrl}`);
          const next = replies.shift();
          if (next instanceof Error) throw next;
          return next;
        },
      },
    },
  });
  return { calls, factory };
}

/** TextGenerator that records prompts and answers from a list (repeating the last answer). */
export class FakeGenerator implements TextGenerator {
  readonly model = 'fake-model';
  readonly prompts: string[] = [];
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly answers: string[] = ['fake answer']) {}

  async generate(req: GenerateRequest): Promise<string> {
    this.prompts.push(req.prompt);
    this.requests.push(req);
    return this.answers[Math.min(this.prompts.length - 1, this.answers.length - 1)];
  }
}

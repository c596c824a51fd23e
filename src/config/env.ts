/**
 * src/config/env.ts
 * What: Environment configuration loader/validator.
 * How: Loads .env via dotenv, validates with zod and resolves paths against process.cwd().
 *      loadConfig() is pure over the env record it receives so tests can build configs without touching
 *      process.env; getConfig() validates process.env once, on first use.
 *      Invalid configuration is fatal: a ConfigurationError lists every offending variable.
 */

import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? parseInt(v, 10) : v),
    z.number().int().positive().default(def),
  );

const floatWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? parseFloat(v) : v),
    z.number().min(0).max(2).default(def),
  );

const optionalString = z.preprocess(
  (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().optional(),
);

const schema = z
  .object({
    VAULT_PATH: z.string().min(1, 'VAULT_PATH is required'),
    VECTOR_DB_PATH: z.string().min(1).default('./vector_db'),
    COLLECTION_NAME: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, 'COLLECTION_NAME may only contain letters, digits, "_" and "-"')
      .default('obsidian_knowledge'),
    VECTOR_STORE: z.enum(['sqlite', 'pgvector']).default('sqlite'),
    DATABASE_URL: optionalString,
    INDEX_EXTENSIONS: z.string().default('.md'),
    INDEX_CONCURRENCY: intWithDefault(2),
    EMBEDDING_PROVIDER: z.enum(['openai', 'hash']).default('openai'),
    EMBEDDING_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    EMBEDDING_API_KEY: z.string().min(1).default('local'),
    EMBEDDING_MODEL: z.string().min(1).default('all-minilm'),
    EMBEDDING_DIMENSIONS: intWithDefault(384),
    LLM_BASE_URL: z.string().url().default('http://localhost:11434'),
    LLM_API_KEY: z.string().min(1).default('local'),
    LLM_MODEL: z.string().min(1).default('qwen3-coder:30b'),
    LLM_TEMPERATURE: floatWithDefault(0.3),
    LLM_TIMEOUT_MS: intWithDefault(120_000),
    LLM_MAX_ATTEMPTS: intWithDefault(3),
    LLM_RETRY_BASE_MS: intWithDefault(1_000),
    STORE_MAX_ATTEMPTS: intWithDefault(3),
    STORE_RETRY_BASE_MS: intWithDefault(200),
    NOTES_SUBDIR: z.string().min(1).default('00_Inbox/Clippings'),
    PROCESSED_SUBDIR: z.string().min(1).default('01_Processed'),
    SUMMARY_MAX_INPUT_CHARS: intWithDefault(4_000),
    PORT: intWithDefault(8000),
    NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.VECTOR_STORE === 'pgvector' && !cfg.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when VECTOR_STORE=pgvector',
      });
    }
  });

export type VectorStoreKind = 'sqlite' | 'pgvector';
export type EmbeddingProviderKind = 'openai' | 'hash';

export interface AppConfig {
  VAULT_PATH: string; // absolute
  VECTOR_DB_PATH: string; // absolute
  COLLECTION_NAME: string;
  VECTOR_STORE: VectorStoreKind;
  DATABASE_URL?: string;
  INDEX_EXTENSIONS: string[]; // lower-case, each starting with "."
  INDEX_CONCURRENCY: number;
  EMBEDDING_PROVIDER: EmbeddingProviderKind;
  EMBEDDING_BASE_URL: string;
  EMBEDDING_API_KEY: string;
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSIONS: number;
  LLM_BASE_URL: string; // no trailing slash
  LLM_API_KEY: string;
  LLM_MODEL: string;
  LLM_TEMPERATURE: number;
  LLM_TIMEOUT_MS: number;
  LLM_MAX_ATTEMPTS: number;
  LLM_RETRY_BASE_MS: number;
  STORE_MAX_ATTEMPTS: number;
  STORE_RETRY_BASE_MS: number;
  NOTES_SUBDIR: string;
  PROCESSED_SUBDIR: string;
  SUMMARY_MAX_INPUT_CHARS: number;
  PORT: number;
  NODE_ENV: 'production' | 'development' | 'test';
}

export function parseExtensions(raw: string): string[] {
  return raw
    .split(',')
    .map((e) => e.trim().toLowerCase())
    .filter((e) => e.length > 0)
    .map((e) => (e.startsWith('.') ? e : `.${e}`));
}

export function loadConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }
  const base = parsed.data;

  const extensions = parseExtensions(base.INDEX_EXTENSIONS);
  if (extensions.length === 0) {
    throw new ConfigurationError('Invalid environment configuration: INDEX_EXTENSIONS: at least one extension is required');
  }

  return {
    ...base,
    VAULT_PATH: path.resolve(cwd, base.VAULT_PATH),
    VECTOR_DB_PATH: path.resolve(cwd, base.VECTOR_DB_PATH),
    INDEX_EXTENSIONS: extensions,
    LLM_BASE_URL: base.LLM_BASE_URL.replace(/\/+$/, ''),
  };
}

let cached: AppConfig | undefined;

/** Process configuration, validated on first use. */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}

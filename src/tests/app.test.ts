import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import type { Server } from 'http';
import * as path from 'path';
import { createApp, statusForError } from '../app.js';
import {
  EmbeddingDimensionError,
  InvalidInputError,
  ResponseShapeError,
  StoreUnavailableError,
} from '../errors.js';
import { createServices, Services } from '../services/container.js';
import {
  apiError,
  chatCompletion,
  jsonResponse,
  makeTempDir,
  scriptedChatClient,
  scriptedFetch,
  silentLogger,
  testConfig,
  writeFile,
} from './helpers.js';

const NATIVE_URL = 'http://llm.test/api/chat';
const TAGS_URL = 'http://llm.test/api/tags';

describe('HTTP API', () => {
  let root: string;
  let vault: string;
  let services: Services;
  let server: Server;
  let baseUrl: string;
  let llm: Record<string, Array<Response | Error>>;
  let chat: unknown[];

  beforeEach(async () => {
    root = makeTempDir('knowledge-api-');
    vault = path.join(root, 'vault');
    writeFile(vault, 'a.md', 'The sky is blue.');
    writeFile(vault, 'b.md', 'Grass is green.');

    llm = { [NATIVE_URL]: [], [TAGS_URL]: [] };
    chat = [];
    const { fetchImpl } = scriptedFetch(llm);
    const { factory } = scriptedChatClient(chat);
    services = await createServices(testConfig(vault, path.join(root, 'db'), { LLM_MAX_ATTEMPTS: '1' }), {
      fetch: fetchImpl,
      chatClient: factory,
      log: silentLogger,
      now: () => new Date(2024, 4, 2),
    });
    await services.init();

    server = createApp(services).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const addr = server.address();
    baseUrl = `http://127.0.0.1:${typeof addr === 'object' && addr !== null ? addr.port : 0}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await services.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  const send = async (method: string, route: string, body?: unknown) => {
    const res = await fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const json: unknown = await res.json();
    return { status: res.status, body: json };
  };

  it('GET /health reports store, embeddings and LLM reachability', async () => {
    llm[TAGS_URL].push(jsonResponse({ models: [] }));
    const res = await send('GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'degraded',
      vault_path: vault,
      vector_db: { kind: 'sqlite', location: path.join(root, 'db') },
      llm: { base_url: 'http://llm.test', model: 'test-model', reachable: true, url: TAGS_URL, status: 200 },
      embedding: { id: 'hash', dimensions: 384, degraded: true },
    });
  });

  it('POST /reindex then POST /query answers with sources', async () => {
    const reindex = await send('POST', '/reindex', { force: true });
    expect(reindex.status).toBe(200);
    expect(reindex.body).toMatchObject({ documents_loaded: 2, chunks_indexed: 2, total_documents: 2, cleared: true });

    chat.push(chatCompletion('It is blue.'));
    const res = await send('POST', '/query', { query: 'what color is the sky', top_k: 1 });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      answer: 'It is blue.',
      sources: [{ source_file: 'a.md', similarity_score: expect.any(Number), content_preview: 'The sky is blue.' }],
      query: 'what color is the sky',
    });
  });

  it('POST /query validates its body', async () => {
    const res = await send('POST', '/query', { query: 'sky', top_k: 0 });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'INVALID_INPUT' } });
  });

  it('POST /query answers 503 when the LLM is unreachable', async () => {
    await send('POST', '/reindex', {});
    chat.push(apiError(404));
    llm[NATIVE_URL].push(jsonResponse({}, 404));
    const res = await send('POST', '/query', { query: 'sky' });
    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ error: { code: 'GENERATION_UNAVAILABLE' } });
  });

  it('indexes, searches and removes single files', async () => {
    const added = await send('POST', '/index/file', { path: 'a.md' });
    expect(added).toEqual({
      status: 200,
      body: { file_path: path.join(vault, 'a.md'), documents_loaded: 1, chunks_indexed: 1 },
    });

    const found = await send('GET', '/index/search?pattern=%5Ea&limit=5');
    expect(found.body).toMatchObject({ documents: ['The sky is blue.'], count: 1 });

    const removed = await send('DELETE', '/index/file', { path: 'a.md' });
    expect(removed).toEqual({ status: 200, body: { removed: 1 } });
  });

  it('maps a missing file to 400 and a bad pattern to 400', async () => {
    const missing = await send('POST', '/index/file', { path: 'missing.md' });
    expect(missing.status).toBe(400);
    expect(missing.body).toMatchObject({ error: { code: 'INVALID_INPUT' } });

    const badPattern = await send('GET', '/index/search?pattern=(');
    expect(badPattern.status).toBe(400);

    const longPattern = await send('GET', `/index/search?pattern=${'a'.repeat(201)}`);
    expect(longPattern.status).toBe(400);
  });

  it('refuses paths outside the vault with 400', async () => {
    writeFile(root, 'secret.md', 'not part of the vault');

    const indexed = await send('POST', '/index/file', { path: '../secret.md' });
    expect(indexed).toEqual({
      status: 400,
      body: { error: { message: 'Path is outside the vault: ../secret.md', code: 'INVALID_INPUT' } },
    });

    const stats = await send('GET', '/notes/stats?path=..%2Fsecret.md');
    expect(stats.status).toBe(400);
  });

  it('POST /notes/process files an inbox note by category and re-indexes it', async () => {
    writeFile(vault, '00_Inbox/todo.md', '---\nstatus: inbox\n---\n\nClouds form when vapour condenses.\n');
    chat.push(chatCompletion('Science'), chatCompletion('clouds, weather'));

    const res = await send('POST', '/notes/process', { path: '00_Inbox/todo.md' });
    const moved = path.join(vault, '01_Processed', 'Science', 'todo.md');
    expect(res).toEqual({
      status: 200,
      body: {
        file_path: moved,
        previous_path: path.join(vault, '00_Inbox', 'todo.md'),
        category: 'Science',
        keywords: ['clouds', 'weather'],
        indexed: true,
      },
    });
    expect(fs.readFileSync(moved, 'utf8')).toBe(
      '---\nstatus: inbox\ncategory: Science\nkeywords: clouds, weather\nprocessed_at: 2024-05-02\n---\n\n' +
        'Clouds form when vapour condenses.\n',
    );
    const found = await send('GET', '/index/search?pattern=%5Etodo');
    expect(found.body).toMatchObject({ count: 1 });
  });

  it('GET /notes/stats reports counts for a note', async () => {
    const res = await send('GET', '/notes/stats?path=b.md');
    expect(res).toEqual({
      status: 200,
      body: {
        file_size: 15,
        word_count: 3,
        line_count: 1,
        has_frontmatter: false,
        last_modified: expect.any(String),
      },
    });

    const missing = await send('GET', '/notes/stats');
    expect(missing.status).toBe(400);
  });

  it('GET /stats reports the index', async () => {
    await send('POST', '/reindex', { force: false });
    const res = await send('GET', '/stats');
    expect(res.body).toEqual({
      index_stats: { total_documents: 2, collection_name: 'obsidian_knowledge', db_path: path.join(root, 'db') },
      vault_path: vault,
      vector_db_path: path.join(root, 'db'),
      llm_base_url: 'http://llm.test',
      embedding: { id: 'hash', dimensions: 384, degraded: true },
    });
  });

  it('POST /capture saves and indexes the note', async () => {
    chat.push(chatCompletion('## Summary\n- clouds'));
    const res = await send('POST', '/capture', {
      url: 'https://example.com/clouds',
      title: 'Clouds',
      content: 'Clouds are white.',
    });
    const filePath = path.join(vault, '00_Inbox', 'Clippings', '2024-05-02 - Clouds.md');
    expect(res).toEqual({
      status: 200,
      body: { success: true, file_path: filePath, title: 'Clouds', indexed: true },
    });
    expect(fs.existsSync(filePath)).toBe(true);
  });

  it('rejects malformed JSON with 400', async () => {
    const res = await fetch(`${baseUrl}/query`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });
    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toMatchObject({ error: { code: 'BAD_REQUEST' } });
  });
});

describe('statusForError', () => {
  it('maps error kinds to HTTP statuses', () => {
    expect(statusForError(new InvalidInputError('x'))).toBe(400);
    expect(statusForError(new StoreUnavailableError('x'))).toBe(503);
    expect(statusForError(new ResponseShapeError('x'))).toBe(502);
    expect(statusForError(new EmbeddingDimensionError(3, 2, 'x'))).toBe(500);
    expect(statusForError(new Error('x'))).toBe(500);
    expect(statusForError(Object.assign(new Error('too large'), { status: 413 }))).toBe(413);
  });
});

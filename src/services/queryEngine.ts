// src/services/queryEngine.ts
// What: Query Engine. Answers a question from the vault: embed → nearest chunks → LLM synthesis.
// How: Retrieval asks the Collection for the topK entries by cosine similarity. Synthesis is "compact": chunk texts
//      are packed into context windows of at most maxContextChars; the first window is answered with the QA prompt
//      and every further window refines the running answer. Nothing retrieved means no LLM call at all.

import { openCollection, VectorStore } from '../db/vectorStore.js';
import { EmbeddingDimensionError, InvalidInputError } from '../errors.js';
import type { Logger } from '../logging.js';
import type { Answer, RetrievalResult, SearchMatch } from '../models/types.js';
import type { EmbeddingProvider } from './embeddings.js';
import { splitFixed, truncate } from '../util/text.js';
import type { TextGenerator } from './generation.js';

export const NO_RESULTS_ANSWER = 'No relevant information found in the knowledge base.';
export const DEFAULT_TOP_K = 5;

export interface QueryEngineOptions {
  maxContextChars: number;
  previewChars: number;
}

export const DEFAULT_QUERY_OPTIONS: QueryEngineOptions = {
  maxContextChars: 6000,
  previewChars: 200,
};

export interface QueryEngineDeps {
  store: VectorStore;
  embeddings: EmbeddingProvider;
  generator: TextGenerator;
  collectionName: string;
  log: Logger;
  options?: Partial<QueryEngineOptions>;
}

export function qaPrompt(context: string, question: string): string {
  return [
    'Context information from the knowledge base is below.',
    '---------------------',
    context,
    '---------------------',
    'Using only the context above and no prior knowledge, answer the question.',
    `Question: ${question}`,
    'Answer: ',
  ].join('\n');
}

export function refinePrompt(question: string, existingAnswer: string, context: string): string {
  return [
    `The original question is: ${question}`,
    `An existing answer is: ${existingAnswer}`,
    'Refine the existing answer only if the additional context below helps.',
    '---------------------',
    context,
    '---------------------',
    'If the context is not useful, repeat the existing answer unchanged.',
    'Refined answer: ',
  ].join('\n');
}

/** Packs texts, separated by blank lines, into windows of at most maxChars. Oversized texts are split. */
export function packContext(texts: string[], maxChars: number): string[] {
  const windows: string[] = [];
  let buf = '';
  for (const text of texts) {
    for (const piece of text.length === 0 ? [''] : splitFixed(text, maxChars)) {
      if (buf.length === 0) {
        buf = piece;
      } else if (buf.length + 2 + piece.length <= maxChars) {
        buf = `${buf}\n\n${piece}`;
      } else {
        windows.push(buf);
        buf = piece;
      }
    }
  }
  if (buf.length > 0) windows.push(buf);
  return windows;
}

export function toRetrievalResult(
  match: SearchMatch,
  previewChars: number = DEFAULT_QUERY_OPTIONS.previewChars,
): RetrievalResult {
  const text = match.entry.text;
  return {
    source_file: match.entry.metadata.file_name || 'Unknown',
    similarity_score: match.score,
    content_preview: text.length > previewChars ? `${truncate(text, previewChars)}...` : text,
  };
}

export class QueryEngine {
  private readonly store: VectorStore;
  private readonly embeddings: EmbeddingProvider;
  private readonly generator: TextGenerator;
  private readonly collectionName: string;
  private readonly log: Logger;
  private readonly options: QueryEngineOptions;

  constructor(deps: QueryEngineDeps) {
    this.store = deps.store;
    this.embeddings = deps.embeddings;
    this.generator = deps.generator;
    this.collectionName = deps.collectionName;
    this.log = deps.log;
    this.options = { ...DEFAULT_QUERY_OPTIONS, ...deps.options };
  }

  async query(text: string, topK: number = DEFAULT_TOP_K): Promise<Answer> {
    const matches = await this.retrieve(text, topK);
    if (matches.length === 0) {
      this.log.info({ top_k: topK }, 'No matches; answering without the LLM');
      return { answer: NO_RESULTS_ANSWER, sources: [], query: text };
    }

    const answer = await this.synthesize(text, matches.map((m) => m.entry.text));
    return {
      answer,
      sources: matches.map((m) => toRetrievalResult(m, this.options.previewChars)),
      query: text,
    };
  }

  /** Nearest entries, best first. */
  async retrieve(text: string, topK: number = DEFAULT_TOP_K): Promise<SearchMatch[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidInputError(`top_k must be a positive integer, got ${topK}`);
    }
    if (text.trim().length === 0) {
      throw new InvalidInputError('Query text must not be empty');
    }

    const collection = await openCollection(this.store, this.collectionName);
    const dims = await collection.dimension();
    if (dims === null) {
      return [];
    }

    const embedding = await this.embeddings.embed(text);
    if (embedding.length !== dims) {
      throw new EmbeddingDimensionError(dims, embedding.length, `query against "${this.collectionName}"`);
    }
    const matches = await collection.query(embedding, topK);
    this.log.debug({ top_k: topK, hits: matches.length }, 'Retrieved matches');
    return matches;
  }

  private async synthesize(question: string, texts: string[]): Promise<string> {
    const [first = '', ...rest] = packContext(texts, this.options.maxContextChars);
    let answer = await this.generator.generate({ prompt: qaPrompt(first, question) });
    for (const window of rest) {
      answer = await this.generator.generate({ prompt: refinePrompt(question, answer, window) });
    }
    return answer.trim();
  }
}

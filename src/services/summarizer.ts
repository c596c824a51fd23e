// src/services/summarizer.ts
// What: Summarizes, tags and categorizes captured content with the local LLM.
// How: summarize() truncates the content to maxInputChars and asks for bullet points, keywords and a category in a
//      fixed markdown layout; the reply is returned as-is. extractKeywords() and categorize() send a shorter excerpt
//      at a lower temperature and normalise the reply (comma list, one category from CATEGORIES).
//      Generation failures propagate.

import type { Logger } from '../logging.js';
import { truncate } from '../util/text.js';
import type { TextGenerator } from './generation.js';

export interface SummaryResult {
  summary: string;
  model: string;
}

export const CATEGORIES = [
  'Technology',
  'Business',
  'Science',
  'Health',
  'Education',
  'Entertainment',
  'Politics',
  'Sports',
  'Other',
] as const;

export type Category = (typeof CATEGORIES)[number];

const EXCERPT_CHARS = 2_000;

export function summaryPrompt(content: string): string {
  return `Analyze the following web content and:
1. Summarize the key points in 3-5 bullet points
2. Extract 3-5 main keywords
3. Suggest a category for the content (e.g. Technology, Business, Health)

Content:
${content}

Response format:
## Summary
- [bullet point]

## Keywords
[keyword1, keyword2, ...]

## Category
[category]
`;
}

export function keywordsPrompt(content: string, maxKeywords: number): string {
  return `Extract the ${maxKeywords} most important keywords from the content below.
Reply with the keywords only, separated by commas.

Content:
${content}

Keywords:
`;
}

export function categoryPrompt(content: string): string {
  return `Choose exactly one category for the content below:
${CATEGORIES.join(', ')}

Content:
${content}

Category:
`;
}

/** Comma or newline separated reply → distinct keywords, list markers and brackets stripped. */
export function parseKeywords(reply: string, maxKeywords: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of reply.split(/[,\n]/)) {
    const kw = raw
      .replace(/^\s*(?:[-*#]+|\d+[.)])\s*/, '')
      .replace(/[[\]"]/g, '')
      .trim();
    if (kw.length === 0 || seen.has(kw.toLowerCase())) continue;
    seen.add(kw.toLowerCase());
    out.push(kw);
  }
  return out.slice(0, maxKeywords);
}

/** First known category named in the reply, else Other. */
export function parseCategory(reply: string): Category {
  const lower = reply.toLowerCase();
  let best: { category: Category; at: number } | undefined;
  for (const category of CATEGORIES) {
    const at = lower.indexOf(category.toLowerCase());
    if (at >= 0 && (best === undefined || at < best.at)) best = { category, at };
  }
  return best?.category ?? 'Other';
}

export class Summarizer {
  constructor(
    private readonly generator: TextGenerator,
    private readonly maxInputChars: number,
    private readonly log: Logger,
  ) {}

  async summarize(content: string): Promise<SummaryResult> {
    const truncated = truncate(content, this.maxInputChars);
    this.log.debug({ chars: content.length, sent: truncated.length }, 'Summarizing content');
    const summary = await this.generator.generate({ prompt: summaryPrompt(truncated) });
    return { summary: summary.trim(), model: this.generator.model };
  }

  async extractKeywords(content: string, maxKeywords = 5): Promise<string[]> {
    const reply = await this.generator.generate({
      prompt: keywordsPrompt(truncate(content, EXCERPT_CHARS), maxKeywords),
      temperature: 0.2,
    });
    const keywords = parseKeywords(reply, maxKeywords);
    this.log.debug({ keywords }, 'Extracted keywords');
    return keywords;
  }

  async categorize(content: string): Promise<Category> {
    const reply = await this.generator.generate({
      prompt: categoryPrompt(truncate(content, EXCERPT_CHARS)),
      temperature: 0.1,
    });
    const category = parseCategory(reply);
    if (category === 'Other' && !/other/i.test(reply)) {
      this.log.warn({ reply: truncate(reply, 100) }, 'Unrecognised category; using Other');
    }
    return category;
  }
}

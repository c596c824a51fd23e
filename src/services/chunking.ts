// src/services/chunking.ts
// What: Heading-aware Markdown chunking.
// How: Strips YAML front matter, splits by headings (#, ##, ###), then paragraphs (blank-line delimited). Long
//      paragraphs are split by simple sentence heuristics. Adjacent pieces are packed into chunks of at most
//      maxChars, retaining headings. Sizes are sized for small sentence-embedding models (~256-512 tokens).

import type { Chunk, Document } from '../models/types.js';
import { splitFixed } from '../util/text.js';

export interface ChunkOptions {
  maxParagraph: number;
  maxChars: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  maxParagraph: 800,
  maxChars: 1500,
};

const FRONT_MATTER_RE = /^---\r?\n[\s\S]*?\r?\n---\r?\n?/;

export function stripFrontMatter(md: string): string {
  return md.replace(FRONT_MATTER_RE, '');
}

export function chunkMarkdown(md: string, opts: ChunkOptions = DEFAULT_CHUNK_OPTIONS): string[] {
  const sections = toSections(stripFrontMatter(md));
  const pieces: string[] = [];

  for (const sec of sections) {
    for (const p of toParagraphs(sec)) {
      if (p.length <= opts.maxParagraph) {
        pieces.push(p);
      } else {
        for (const s of splitBySentences(p, opts.maxParagraph)) {
          pieces.push(...hardWrap(s, opts.maxChars));
        }
      }
    }
  }

  // Pack pieces into chunks of at most maxChars
  const chunks: string[] = [];
  let buf = '';
  for (const piece of pieces) {
    if (buf.length === 0) {
      buf = piece;
      continue;
    }
    const join = buf + '\n\n' + piece;
    if (join.length <= opts.maxChars) {
      buf = join;
    } else {
      chunks.push(buf);
      buf = piece;
    }
  }
  if (buf.trim().length > 0) chunks.push(buf);
  return chunks;
}

export function chunkDocument(doc: Document, opts: ChunkOptions = DEFAULT_CHUNK_OPTIONS): Chunk[] {
  return chunkMarkdown(doc.text, opts).map((text, i) => ({
    document_id: doc.id,
    chunk_index: i,
    text,
    metadata: doc.metadata,
  }));
}

function toSections(md: string): string[] {
  const lines = md.split(/\r?\n/);
  const sections: string[] = [];
  let cur: string[] = [];
  for (const line of lines) {
    if (/^(#{1,3})\s+/.test(line) && cur.length > 0) {
      sections.push(cur.join('\n').trim());
      cur = [];
    }
    cur.push(line); // headings stay with their section
  }
  if (cur.length > 0) sections.push(cur.join('\n').trim());
  return sections.filter((s) => s.length > 0);
}

function toParagraphs(section: string): string[] {
  return section
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function splitBySentences(paragraph: string, max: number): string[] {
  const sentences = paragraph.split(/(?<=[.!?])\s+/);
  const out: string[] = [];
  let buf = '';
  for (const s of sentences) {
    if ((buf + ' ' + s).trim().length <= max) {
      buf = (buf ? buf + ' ' : '') + s.trim();
    } else {
      if (buf) out.push(buf);
      buf = s.trim();
    }
  }
  if (buf) out.push(buf);
  return out.filter((s) => s.length > 0);
}

// A single sentence longer than a whole chunk is cut at fixed width.
function hardWrap(text: string, max: number): string[] {
  return text.length <= max ? [text] : splitFixed(text, max);
}

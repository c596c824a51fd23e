// src/services/noteWriter.ts
// What: Writes captured content into the vault inbox as a markdown note with YAML front matter.
// How: File name is "{YYYY-MM-DD} - {safe title}.md" under {vault}/{notesSubdir}. Titles are reduced to safe
//      file-name characters; the resolved path is checked to stay inside the inbox directory.
//      Notes already in the vault can get extra front-matter keys, be moved to {vault}/{processedSubdir}/{category}
//      and report basic statistics; those paths are confined to the vault as well.

import fs from 'fs/promises';
import path from 'path';
import { InvalidInputError } from '../errors.js';
import type { Logger } from '../logging.js';
import { resolveVaultFile } from './loader.js';

export interface NoteInput {
  url: string;
  title: string;
  content: string;
  summary: string;
}

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const MAX_TITLE_CHARS = 50;

export function sanitizeTitle(title: string): string {
  const safe = title
    .replace(INVALID_FILENAME_CHARS, '')
    .replace(/[\s-]+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '')
    .slice(0, MAX_TITLE_CHARS);
  return safe.length > 0 ? safe : 'Untitled';
}

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

export function renderNote(note: NoteInput, date: string): string {
  return `---
source: ${note.url}
date_saved: ${date}
captured_by: automated_pipeline
status: inbox
---

# ${note.title}

${note.summary}

---

## Original Content

${note.content}
`;
}

export interface NoteStats {
  file_size: number;
  word_count: number;
  line_count: number;
  has_frontmatter: boolean;
  last_modified: string;
}

const FRONT_MATTER_OPEN = '---\n';

/**
 * Appends `key: value` lines for keys the front matter does not have yet. Existing keys keep their values.
 * Text without front matter is returned unchanged.
 */
export function addFrontMatter(text: string, metadata: Record<string, string>): string {
  if (!text.startsWith(FRONT_MATTER_OPEN)) return text;
  const close = text.indexOf('\n---', FRONT_MATTER_OPEN.length - 1);
  if (close === -1) return text;

  const lines = text.slice(FRONT_MATTER_OPEN.length, close).split('\n').filter((l) => l.length > 0);
  const present = new Set(lines.map((l) => l.split(':', 1)[0].trim()));
  for (const [key, value] of Object.entries(metadata)) {
    if (!present.has(key)) lines.push(`${key}: ${value}`);
  }
  return `${FRONT_MATTER_OPEN}${lines.join('\n')}${text.slice(close)}`;
}

export function noteStats(text: string, sizeBytes: number, modified: Date): NoteStats {
  return {
    file_size: sizeBytes,
    word_count: text.split(/\s+/).filter((w) => w.length > 0).length,
    line_count: text.split('\n').length,
    has_frontmatter: text.startsWith(FRONT_MATTER_OPEN),
    last_modified: modified.toISOString(),
  };
}

export class NoteWriter {
  readonly vaultPath: string;
  readonly inboxDir: string;
  readonly processedDir: string;

  constructor(
    vaultPath: string,
    notesSubdir: string,
    private readonly log: Logger,
    private readonly now: () => Date = () => new Date(),
    processedSubdir = '01_Processed',
  ) {
    this.vaultPath = path.resolve(vaultPath);
    this.inboxDir = path.resolve(this.vaultPath, notesSubdir);
    this.processedDir = path.resolve(this.vaultPath, processedSubdir);
  }

  /** Returns the absolute path of the written note. An existing note with the same name is overwritten. */
  async save(note: NoteInput): Promise<string> {
    const date = formatDate(this.now());
    const fileName = `${date} - ${sanitizeTitle(note.title)}.md`;
    const filePath = path.resolve(this.inboxDir, fileName);
    if (path.dirname(filePath) !== this.inboxDir) {
      throw new InvalidInputError(`Invalid note file name: ${fileName}`);
    }

    await fs.mkdir(this.inboxDir, { recursive: true });
    await fs.writeFile(filePath, renderNote(note, date), 'utf8');
    this.log.info({ file: filePath }, 'Saved note');
    return filePath;
  }

  async readNote(filePath: string): Promise<{ file_path: string; text: string }> {
    const abs = await resolveVaultFile(this.vaultPath, filePath);
    return { file_path: abs, text: await fs.readFile(abs, 'utf8') };
  }

  /** Adds missing front-matter keys to a note in the vault. Returns its absolute path. */
  async updateFrontMatter(filePath: string, metadata: Record<string, string>): Promise<string> {
    const abs = await resolveVaultFile(this.vaultPath, filePath);
    const text = await fs.readFile(abs, 'utf8');
    const updated = addFrontMatter(text, metadata);
    if (updated === text) {
      this.log.debug({ file: abs }, 'Front matter unchanged');
    } else {
      await fs.writeFile(abs, updated, 'utf8');
      this.log.info({ file: abs, keys: Object.keys(metadata) }, 'Updated front matter');
    }
    return abs;
  }

  /** Moves a note to {processedDir}/{category}/, keeping its file name. Returns the new path. */
  async moveToProcessed(filePath: string, category = 'Processed'): Promise<string> {
    const abs = await resolveVaultFile(this.vaultPath, filePath);
    const targetDir = path.join(this.processedDir, sanitizeTitle(category));
    const target = path.join(targetDir, path.basename(abs));
    if (target === abs) return abs;

    await fs.mkdir(targetDir, { recursive: true });
    await fs.rename(abs, target);
    this.log.info({ from: abs, to: target }, 'Moved note to processed');
    return target;
  }

  async getFileStats(filePath: string): Promise<NoteStats> {
    const abs = await resolveVaultFile(this.vaultPath, filePath);
    const [text, stat] = await Promise.all([fs.readFile(abs, 'utf8'), fs.stat(abs)]);
    return noteStats(text, stat.size, stat.mtime);
  }
}

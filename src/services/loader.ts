// src/services/loader.ts
// What: Document loader for the vault.
// How: loadDocuments() walks a directory (optionally recursively), keeps files whose extension is in the allow-list,
//      skips every hidden file or directory, and reads each file into a Document. loadFile() loads exactly one file.
//      Files whose text is empty or whitespace produce no Document. Results are sorted by source path.
//      resolveVaultFile() confines caller-supplied paths to the vault, symlinks included.

import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { Document } from '../models/types.js';
import { InvalidInputError } from '../errors.js';

export interface LoadOptions {
  recursive: boolean;
  extensions: string[]; // lower-case, with leading "."
}

export function documentId(absPath: string): string {
  return createHash('sha1').update(absPath).digest('hex');
}

export function isHidden(name: string): boolean {
  return name.startsWith('.');
}

/** True when target lies strictly below root. Both must be absolute. */
export function isInside(root: string, target: string): boolean {
  const rel = path.relative(root, target);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/** Absolute path of an existing file inside the vault; relative paths resolve against the vault root. */
export async function resolveVaultFile(root: string, filePath: string): Promise<string> {
  const rootAbs = path.resolve(root);
  const abs = path.resolve(rootAbs, filePath);
  if (!isInside(rootAbs, abs)) {
    throw new InvalidInputError(`Path is outside the vault: ${filePath}`);
  }
  const [realRoot, real] = await Promise.all([fs.realpath(rootAbs), fs.realpath(abs)]).catch((err: unknown) => {
    throw new InvalidInputError(`File not found: ${filePath}`, { cause: err });
  });
  if (!isInside(realRoot, real)) {
    throw new InvalidInputError(`Path is outside the vault: ${filePath}`);
  }
  return abs;
}

export async function loadFile(filePath: string): Promise<Document[]> {
  const abs = path.resolve(filePath);
  const stat = await fs.stat(abs).catch((err: unknown) => {
    throw new InvalidInputError(`File not found: ${filePath}`, { cause: err });
  });
  if (!stat.isFile()) {
    throw new InvalidInputError(`Not a regular file: ${filePath}`);
  }
  const text = await fs.readFile(abs, 'utf8');
  if (text.trim().length === 0) {
    return [];
  }
  const created = stat.birthtimeMs > 0 ? stat.birthtime : stat.mtime;
  return [
    {
      id: documentId(abs),
      text,
      metadata: {
        file_name: path.basename(abs),
        source_path: abs,
        created_at: created.toISOString(),
      },
    },
  ];
}

export async function loadDocuments(root: string, opts: LoadOptions): Promise<Document[]> {
  const abs = path.resolve(root);
  const stat = await fs.stat(abs).catch((err: unknown) => {
    throw new InvalidInputError(`Directory not found: ${root}`, { cause: err });
  });
  if (!stat.isDirectory()) {
    throw new InvalidInputError(`Not a directory: ${root}`);
  }
  const files: string[] = [];
  await walk(abs, opts, files);
  files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  const docs: Document[] = [];
  for (const f of files) {
    docs.push(...(await loadFile(f)));
  }
  return docs;
}

async function walk(dir: string, opts: LoadOptions, acc: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    if (isHidden(e.name)) continue;
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (opts.recursive) await walk(full, opts, acc);
    } else if (e.isFile()) {
      if (opts.extensions.includes(path.extname(e.name).toLowerCase())) {
        acc.push(full);
      }
    }
  }
}

// src/services/inbox.ts
// What: Files an inbox note: categorize and tag it, then move it out of the inbox.
// How: The note body (front matter stripped) goes to the summarizer for a category and keywords. Those, plus the
//      processing date, are added to the front matter and the note moves to {processed}/{category}/. The index
//      follows the move on a best-effort basis, as in capture: a failure is reported, the move stands.

import { errorMessage, InvalidInputError } from '../errors.js';
import type { Logger } from '../logging.js';
import { stripFrontMatter } from './chunking.js';
import type { IndexManager } from './indexer.js';
import { formatDate, NoteWriter } from './noteWriter.js';
import type { Category, Summarizer } from './summarizer.js';

export interface ProcessResult {
  file_path: string;
  previous_path: string;
  category: Category;
  keywords: string[];
  indexed: boolean;
  index_error?: string;
}

export class InboxProcessor {
  constructor(
    private readonly summarizer: Pick<Summarizer, 'extractKeywords' | 'categorize'>,
    private readonly writer: Pick<NoteWriter, 'readNote' | 'updateFrontMatter' | 'moveToProcessed'>,
    private readonly indexer: Pick<IndexManager, 'removeFromIndex' | 'incrementalIndex'>,
    private readonly log: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async process(filePath: string): Promise<ProcessResult> {
    const note = await this.writer.readNote(filePath);
    const body = stripFrontMatter(note.text).trim();
    if (body.length === 0) {
      throw new InvalidInputError(`Note has no content to categorize: ${filePath}`);
    }

    const category = await this.summarizer.categorize(body);
    const keywords = await this.summarizer.extractKeywords(body);
    await this.writer.updateFrontMatter(note.file_path, {
      category,
      keywords: keywords.join(', '),
      processed_at: formatDate(this.now()),
    });
    const moved = await this.writer.moveToProcessed(note.file_path, category);
    this.log.info({ from: note.file_path, to: moved, category }, 'Processed inbox note');

    const result: ProcessResult = {
      file_path: moved,
      previous_path: note.file_path,
      category,
      keywords,
      indexed: true,
    };
    try {
      await this.indexer.removeFromIndex(moved);
      await this.indexer.incrementalIndex(moved);
    } catch (err) {
      this.log.error({ err, file: moved }, 'Re-indexing processed note failed; note was moved');
      result.indexed = false;
      result.index_error = errorMessage(err);
    }
    return result;
  }
}

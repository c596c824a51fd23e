// src/services/capture.ts
// What: Capture pipeline for clipped web content: summarize → save note → index the note.
// How: Summarization and saving must succeed. Indexing the new note is best effort: a failure is logged and
//      reported as indexed=false with index_error, and the capture still counts as saved.

import { errorMessage, InvalidInputError } from '../errors.js';
import type { Logger } from '../logging.js';
import type { IndexManager } from './indexer.js';
import type { NoteWriter } from './noteWriter.js';
import type { Summarizer } from './summarizer.js';

export interface CaptureInput {
  url: string;
  title: string;
  content: string;
}

export interface CaptureResult {
  success: true;
  file_path: string;
  title: string;
  indexed: boolean;
  index_error?: string;
}

export class CaptureService {
  constructor(
    private readonly summarizer: Pick<Summarizer, 'summarize'>,
    private readonly writer: Pick<NoteWriter, 'save'>,
    private readonly indexer: Pick<IndexManager, 'incrementalIndex'>,
    private readonly log: Logger,
  ) {}

  async capture(input: CaptureInput): Promise<CaptureResult> {
    if (input.content.trim().length === 0) {
      throw new InvalidInputError('Captured content must not be empty');
    }

    const { summary, model } = await this.summarizer.summarize(input.content);
    this.log.info({ url: input.url, model }, 'Summarized capture');

    const filePath = await this.writer.save({ ...input, summary });

    try {
      const result = await this.indexer.incrementalIndex(filePath);
      this.log.info({ file: filePath, chunks: result.chunks_indexed }, 'Indexed captured note');
      return { success: true, file_path: filePath, title: input.title, indexed: true };
    } catch (err) {
      this.log.error({ err, file: filePath }, 'Indexing captured note failed; note was saved');
      return {
        success: true,
        file_path: filePath,
        title: input.title,
        indexed: false,
        index_error: errorMessage(err),
      };
    }
  }
}

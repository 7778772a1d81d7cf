import type { LoggerMethods } from '@chapterwise/logger';
import type { ChapterOccurrence, ChapterRange } from '@chapterwise/model';

import type { BookDocument } from '../utils/book-document';

import { CHAPTER_KEY } from '../config/constants';
import { ChapterNotFoundError } from '../reconcilers/chapter-not-found-error';

/**
 * Build the stable key of a chapter starting at lineNo
 *
 * @example buildChapterKey(42, 'The First Step') // '0042_The First Step'
 */
export function buildChapterKey(lineNo: number, title: string): string {
  return `${String(lineNo).padStart(CHAPTER_KEY.LINE_PAD_LENGTH, '0')}_${title}`;
}

/**
 * Map chapter keys to chapter content, in document order
 */
export function toChapterRecord(
  chapters: readonly ChapterRange[],
): Record<string, string> {
  const record: Record<string, string> = {};
  for (const chapter of chapters) {
    record[chapter.key] = chapter.content;
  }
  return record;
}

/**
 * ChapterMaterializer
 *
 * Cuts the document into chapter ranges at reconciled chapter starts.
 *
 * ## Range Layout
 *
 * - Chapter i owns lines [start_i, start_{i+1}); the last chapter runs to the
 *   end of the document.
 * - Lines before the first start go to a synthetic '0000_Preface' range,
 *   emitted only when the first start is after line 1.
 *
 * Ranges partition the document: every line belongs to exactly one range.
 * Content is trimmed per range.
 */
export class ChapterMaterializer {
  private readonly logger: LoggerMethods;

  constructor(logger: LoggerMethods) {
    this.logger = logger;
  }

  /**
   * @throws {ChapterNotFoundError} When starts is empty
   * @throws {RangeError} When starts are not strictly ascending lines of the document
   */
  materialize(
    document: BookDocument,
    starts: readonly ChapterOccurrence[],
  ): ChapterRange[] {
    if (starts.length === 0) {
      throw new ChapterNotFoundError('materialize');
    }
    this.assertValidStarts(document, starts);

    const chapters: ChapterRange[] = [];

    const firstStart = starts[0].lineNo;
    if (firstStart > 1) {
      chapters.push(
        this.createRange(
          document,
          CHAPTER_KEY.PREFACE_KEY,
          CHAPTER_KEY.PREFACE_TITLE,
          1,
          firstStart,
          true,
        ),
      );
    }

    starts.forEach((start, index) => {
      const endLineNo =
        index + 1 < starts.length
          ? starts[index + 1].lineNo
          : document.lineCount + 1;

      chapters.push(
        this.createRange(
          document,
          buildChapterKey(start.lineNo, start.title),
          start.title,
          start.lineNo,
          endLineNo,
          false,
        ),
      );
    });

    this.logger.info(
      `[ChapterMaterializer] Built ${chapters.length} ranges from ${starts.length} chapter starts`,
    );

    return chapters;
  }

  private createRange(
    document: BookDocument,
    key: string,
    title: string,
    startLineNo: number,
    endLineNo: number,
    isPreface: boolean,
  ): ChapterRange {
    return {
      key,
      title,
      startLineNo,
      endLineNo,
      content: document.sliceLines(startLineNo, endLineNo).trim(),
      isPreface,
    };
  }

  private assertValidStarts(
    document: BookDocument,
    starts: readonly ChapterOccurrence[],
  ): void {
    let previousLineNo = 0;

    for (const { title, lineNo } of starts) {
      if (
        !Number.isInteger(lineNo) ||
        lineNo < 1 ||
        lineNo > document.lineCount
      ) {
        throw new RangeError(
          `Chapter "${title}" starts at line ${lineNo}, outside 1..${document.lineCount}`,
        );
      }
      if (lineNo <= previousLineNo) {
        throw new RangeError(
          `Chapter "${title}" at line ${lineNo} does not come after line ${previousLineNo}`,
        );
      }
      previousLineNo = lineNo;
    }
  }
}

import type { ChapterOccurrence, ChapterRange } from './book-chapter';
import type { TokenUsageReport } from './token-usage-report';

/**
 * Output of a full book splitting run
 *
 * Keeps every intermediate stage so callers can inspect why a chapter
 * boundary was (or was not) chosen.
 */
export interface BookSplitResult {
  /**
   * Candidate titles returned by the TOC extraction, in claimed order
   */
  titles: string[];

  /**
   * Raw scanner hits in document order
   */
  occurrences: ChapterOccurrence[];

  /**
   * Reconciled chapter starts, one per chapter, ascending by line
   */
  chapterStarts: ChapterOccurrence[];

  /**
   * Materialized ranges in document order (preface first when present)
   */
  chapters: ChapterRange[];

  /**
   * Number of lines in the source document
   */
  lineCount: number;

  /**
   * Token usage of the LLM calls made during the run
   */
  usage: TokenUsageReport;
}

import type { ChapterRange } from './book-chapter';
import type { TokenUsageReport } from './token-usage-report';

/**
 * Outcome of a chapter analysis
 *
 * - completed: the model produced an analysis
 * - rate-limited: every attempt hit a rate limit, text is a placeholder
 * - failed: the service failed for another reason, text is a placeholder
 */
export type ChapterAnalysisStatus = 'completed' | 'rate-limited' | 'failed';

export interface ChapterAnalysis {
  chapterKey: string;
  text: string;
  status: ChapterAnalysisStatus;
}

/**
 * A follow-up question asked about one chapter
 */
export interface ChapterQuestion {
  question: string;
  answer: string;
}

export interface ChapterReviewEntry {
  chapter: ChapterRange;
  analysis: ChapterAnalysis;
  questions: ChapterQuestion[];
}

/**
 * Chapter-by-chapter review of a whole book
 */
export interface BookReview {
  bookTitle: string;
  chapters: ChapterReviewEntry[];
  usage: TokenUsageReport;
}

export type { ChapterOccurrence, ChapterRange } from './book-chapter';
export type { BookSplitResult } from './book-split-result';
export type {
  BookReview,
  ChapterAnalysis,
  ChapterAnalysisStatus,
  ChapterQuestion,
  ChapterReviewEntry,
} from './chapter-review';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';

export { BookReviewer } from './book-reviewer';
export type { BookReviewerOptions } from './book-reviewer';

export {
  ChapterAnalyzer,
  ChapterQuestionAnswerer,
  nextScratchpad,
} from './analyzers';
export type {
  ChapterAnalysisInput,
  ChapterAnalyzerOptions,
  ChapterQuestionInput,
} from './analyzers';

export { CHAPTER_ANALYZER, REVIEW_FILE } from './config/constants';

export { getSafeFilename, renderReviewMarkdown, writeReview } from './writers';

export { BookSplitter } from './book-splitter';
export type { BookSplitterOptions } from './book-splitter';

export {
  BOOK_SPLITTER,
  BookSplitterSettingsSchema,
  CHAPTER_KEY,
  NO_TOC_SENTINEL,
  resolveBookSplitterSettings,
} from './config';
export type {
  BookSplitterSettings,
  BookSplitterSettingsInput,
} from './config';

export {
  BaseLLMComponent,
  TextLLMComponent,
  type BaseLLMComponentOptions,
} from './core';

export {
  TocExtractError,
  TocExtractor,
  TocNotFoundError,
  parseTocResponse,
} from './extractors';
export type {
  TocExtractionResult,
  TocExtractorOptions,
  TocResponseParseOptions,
} from './extractors';

export {
  OccurrenceScanner,
  createAnchoredTitleMatcher,
  createWhitespaceTolerantTitleMatcher,
} from './scanners';
export type {
  OccurrenceScannerOptions,
  TitleMatcher,
  TitleMatcherFactory,
} from './scanners';

export {
  ChapterNotFoundError,
  OccurrenceReconciler,
  filterCloseOccurrences,
  mergeNearbyOccurrences,
} from './reconcilers';
export type {
  ChapterNotFoundStage,
  OccurrenceReconcilerOptions,
} from './reconcilers';

export {
  ChapterMaterializer,
  buildChapterKey,
  toChapterRecord,
} from './converters';

export { BookDocument } from './utils/book-document';

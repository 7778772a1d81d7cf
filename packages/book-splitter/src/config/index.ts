export {
  BookSplitterSettingsSchema,
  resolveBookSplitterSettings,
} from './book-splitter-settings';
export type {
  BookSplitterSettings,
  BookSplitterSettingsInput,
} from './book-splitter-settings';
export { BOOK_SPLITTER, CHAPTER_KEY, NO_TOC_SENTINEL } from './constants';

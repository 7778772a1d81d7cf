export {
  createAnchoredTitleMatcher,
  createWhitespaceTolerantTitleMatcher,
} from './title-matcher';
export type { TitleMatcher, TitleMatcherFactory } from './title-matcher';

export { OccurrenceScanner } from './occurrence-scanner';
export type { OccurrenceScannerOptions } from './occurrence-scanner';

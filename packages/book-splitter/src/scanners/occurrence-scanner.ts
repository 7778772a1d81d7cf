import type { LoggerMethods } from '@chapterwise/logger';
import type { ChapterOccurrence } from '@chapterwise/model';

import type { BookDocument } from '../utils/book-document';
import type { TitleMatcher, TitleMatcherFactory } from './title-matcher';

import { createAnchoredTitleMatcher } from './title-matcher';

export interface OccurrenceScannerOptions {
  /**
   * Line predicate per title (default: createAnchoredTitleMatcher)
   */
  titleMatcherFactory?: TitleMatcherFactory;
}

/**
 * OccurrenceScanner
 *
 * Finds every line that looks like the heading of a candidate title.
 * Output is in document order; a line matching several titles yields one
 * occurrence per title, in title order.
 */
export class OccurrenceScanner {
  private readonly logger: LoggerMethods;
  private readonly titleMatcherFactory: TitleMatcherFactory;

  constructor(logger: LoggerMethods, options?: OccurrenceScannerOptions) {
    this.logger = logger;
    this.titleMatcherFactory =
      options?.titleMatcherFactory ?? createAnchoredTitleMatcher;
  }

  /**
   * Scan all lines against all titles
   */
  scan(document: BookDocument, titles: string[]): ChapterOccurrence[] {
    const matchers: Array<{ title: string; matches: TitleMatcher }> = [];

    for (const title of titles) {
      if (!title.trim()) {
        this.logger.warn('[OccurrenceScanner] Ignoring blank title');
        continue;
      }
      matchers.push({ title, matches: this.titleMatcherFactory(title) });
    }

    const occurrences: ChapterOccurrence[] = [];

    if (matchers.length === 0) {
      return occurrences;
    }

    for (const [lineNo, line] of document.entries()) {
      for (const { title, matches } of matchers) {
        if (matches(line)) {
          occurrences.push({ title, lineNo });
        }
      }
    }

    this.logger.info(
      `[OccurrenceScanner] Found ${occurrences.length} occurrences of ${matchers.length} titles in ${document.lineCount} lines`,
    );

    return occurrences;
  }
}

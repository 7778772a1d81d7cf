import type { LoggerMethods } from '@chapterwise/logger';
import type { ChapterOccurrence } from '@chapterwise/model';

import { last } from 'es-toolkit';

import { BOOK_SPLITTER } from '../config/constants';

/**
 * Collapse repeated sightings of one title into the first
 *
 * An occurrence is dropped when it has the same title as the last kept
 * occurrence and lies at most `window` lines after it. Idempotent.
 */
export function mergeNearbyOccurrences(
  occurrences: readonly ChapterOccurrence[],
  window: number,
): ChapterOccurrence[] {
  const merged: ChapterOccurrence[] = [];

  for (const occurrence of occurrences) {
    const previous = last(merged);
    if (
      previous &&
      previous.title === occurrence.title &&
      occurrence.lineNo - previous.lineNo <= window
    ) {
      continue;
    }
    merged.push(occurrence);
  }

  return merged;
}

/**
 * Enforce a minimum distance between consecutive chapter starts
 *
 * An occurrence is dropped when it lies fewer than `minGap` lines after the
 * last kept occurrence, whatever its title. One on the same line as the last
 * kept occurrence is always dropped, so kept starts strictly ascend even for
 * a gap of 0.
 */
export function filterCloseOccurrences(
  occurrences: readonly ChapterOccurrence[],
  minGap: number,
): ChapterOccurrence[] {
  const filtered: ChapterOccurrence[] = [];

  for (const occurrence of occurrences) {
    const previous = last(filtered);
    if (
      previous &&
      (occurrence.lineNo === previous.lineNo ||
        occurrence.lineNo - previous.lineNo < minGap)
    ) {
      continue;
    }
    filtered.push(occurrence);
  }

  return filtered;
}

export interface OccurrenceReconcilerOptions {
  /**
   * Merge window in lines (default: 10)
   */
  mergeWindow?: number;

  /**
   * Minimum gap between chapter starts in lines (default: 20)
   */
  minChapterGap?: number;
}

/**
 * OccurrenceReconciler
 *
 * Turns raw scanner hits into one start per chapter: first merges nearby
 * repeats of a title, then filters starts that are too close together.
 * Every result element is one of the input occurrences.
 */
export class OccurrenceReconciler {
  private readonly logger: LoggerMethods;
  private readonly mergeWindow: number;
  private readonly minChapterGap: number;

  constructor(logger: LoggerMethods, options?: OccurrenceReconcilerOptions) {
    this.logger = logger;
    this.mergeWindow = options?.mergeWindow ?? BOOK_SPLITTER.MERGE_WINDOW;
    this.minChapterGap =
      options?.minChapterGap ?? BOOK_SPLITTER.MIN_CHAPTER_GAP;
  }

  reconcile(occurrences: readonly ChapterOccurrence[]): ChapterOccurrence[] {
    const merged = mergeNearbyOccurrences(occurrences, this.mergeWindow);
    const filtered = filterCloseOccurrences(merged, this.minChapterGap);

    this.logger.info(
      `[OccurrenceReconciler] ${occurrences.length} occurrences -> ${merged.length} after merge (window ${this.mergeWindow}) -> ${filtered.length} after filter (gap ${this.minChapterGap})`,
    );

    return filtered;
  }
}

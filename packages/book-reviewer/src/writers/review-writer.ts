import type { BookReview } from '@chapterwise/model';

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { REVIEW_FILE } from '../config/constants';
import { renderReviewMarkdown } from './review-markdown';

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Turn a book title into a file name usable on common file systems
 *
 * Drops `<>:"/\|?*`, replaces spaces with underscores and caps the length.
 */
export function getSafeFilename(name: string): string {
  return name
    .replace(INVALID_FILENAME_CHARS, '')
    .replaceAll(' ', '_')
    .slice(0, REVIEW_FILE.MAX_FILENAME_LENGTH);
}

/**
 * Write the review markdown to `<outputDir>/<safe title>-ai-review.md`
 *
 * @returns Path of the written file
 */
export function writeReview(review: BookReview, outputDir: string): string {
  const filePath = join(
    outputDir,
    `${getSafeFilename(review.bookTitle)}${REVIEW_FILE.SUFFIX}`,
  );

  mkdirSync(outputDir, { recursive: true });
  writeFileSync(filePath, renderReviewMarkdown(review), 'utf-8');

  return filePath;
}

import { z } from 'zod';

import { BOOK_SPLITTER } from './constants';

/**
 * Tunable heuristics of the splitting pipeline
 *
 * The reconciliation defaults are untuned; books with unusual formatting may
 * need other values.
 */
export const BookSplitterSettingsSchema = z.object({
  tocPrefixLength: z
    .number()
    .int()
    .positive()
    .default(BOOK_SPLITTER.TOC_PREFIX_LENGTH),
  maxTitleLength: z
    .number()
    .int()
    .positive()
    .default(BOOK_SPLITTER.MAX_TITLE_LENGTH),
  mergeWindow: z.number().int().min(0).default(BOOK_SPLITTER.MERGE_WINDOW),
  minChapterGap: z
    .number()
    .int()
    .min(0)
    .default(BOOK_SPLITTER.MIN_CHAPTER_GAP),
});

export type BookSplitterSettings = z.infer<typeof BookSplitterSettingsSchema>;

export type BookSplitterSettingsInput = z.input<
  typeof BookSplitterSettingsSchema
>;

/**
 * Validate settings and fill in defaults
 *
 * @throws {ZodError} When a setting is out of range
 */
export function resolveBookSplitterSettings(
  input: BookSplitterSettingsInput = {},
): BookSplitterSettings {
  return BookSplitterSettingsSchema.parse(input);
}

/**
 * Default settings for ChapterAnalyzer
 */
export const CHAPTER_ANALYZER = {
  /**
   * Attempts per chapter while the service keeps rate limiting
   */
  MAX_ATTEMPTS: 5,

  /**
   * Wait before the second attempt; doubles after every further attempt
   */
  INITIAL_DELAY_MS: 1000,

  /**
   * Trailing characters of an analysis carried into the next chapter's prompt
   */
  SCRATCHPAD_LENGTH: 1000,
} as const;

/**
 * Review file naming
 */
export const REVIEW_FILE = {
  MAX_FILENAME_LENGTH: 200,

  SUFFIX: '-ai-review.md',
} as const;

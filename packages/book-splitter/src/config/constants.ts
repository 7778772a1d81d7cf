/**
 * Default settings for BookSplitter
 */
export const BOOK_SPLITTER = {
  /**
   * Characters from the start of the book sent for TOC extraction.
   * Tables of contents sit near the start; full-book prompts are costly.
   */
  TOC_PREFIX_LENGTH: 2000,

  /**
   * Longest response line still accepted as a chapter title
   */
  MAX_TITLE_LENGTH: 200,

  /**
   * Lines within which a repeated title collapses into its first sighting
   */
  MERGE_WINDOW: 10,

  /**
   * Minimum number of lines between two chapter starts
   */
  MIN_CHAPTER_GAP: 20,
} as const;

/**
 * Chapter key layout
 */
export const CHAPTER_KEY = {
  /**
   * Width of the zero-padded start line in a chapter key
   */
  LINE_PAD_LENGTH: 4,

  PREFACE_TITLE: 'Preface',

  PREFACE_KEY: '0000_Preface',
} as const;

/**
 * Response line the TOC extraction prompt asks for when no TOC exists
 */
export const NO_TOC_SENTINEL = 'NO_TABLE_OF_CONTENTS';

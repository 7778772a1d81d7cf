/**
 * Chapter types produced by the book splitting pipeline
 */

/**
 * A claim that a chapter heading appears on a given line
 *
 * Raw occurrences may repeat a title and may be false positives (a title
 * appearing in running prose instead of as a heading).
 */
export interface ChapterOccurrence {
  /**
   * Candidate title as extracted from the table of contents
   */
  title: string;

  /**
   * 1-indexed line number in the book document
   */
  lineNo: number;
}

/**
 * Contiguous slice of book lines owned by one chapter or by the preface
 */
export interface ChapterRange {
  /**
   * Stable identifier: zero-padded start line, underscore, title
   *
   * Examples: '0000_Preface', '0042_The First Step'
   */
  key: string;

  /**
   * Chapter title ('Preface' for the synthetic preface range)
   */
  title: string;

  /**
   * First line of the range (1-indexed, inclusive)
   */
  startLineNo: number;

  /**
   * Line after the last line of the range (1-indexed, exclusive)
   */
  endLineNo: number;

  /**
   * Lines of the range joined with newlines, trimmed
   */
  content: string;

  /**
   * Whether this is the synthetic range holding text before the first chapter
   */
  isPreface: boolean;
}

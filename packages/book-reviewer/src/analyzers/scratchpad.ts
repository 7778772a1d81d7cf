import { CHAPTER_ANALYZER } from '../config/constants';

/**
 * Scratchpad for the next chapter: the tail of the latest analysis
 */
export function nextScratchpad(
  analysisText: string,
  maxLength: number = CHAPTER_ANALYZER.SCRATCHPAD_LENGTH,
): string {
  if (maxLength <= 0) {
    return '';
  }
  return analysisText.slice(-maxLength);
}

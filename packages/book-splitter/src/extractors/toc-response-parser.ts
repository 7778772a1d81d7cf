import { BOOK_SPLITTER, NO_TOC_SENTINEL } from '../config/constants';

export interface TocResponseParseOptions {
  /**
   * Longest line accepted as a title (default: 200)
   */
  maxTitleLength?: number;
}

const CODE_FENCE_PATTERN = /^```/;
const EMPTY_LIST_ANSWER = '[]';

/**
 * Parse a one-title-per-line TOC response into ordered titles
 *
 * Lines are trimmed and blank lines dropped. Markdown code fences, an empty
 * list answer and lines too long to be a heading are dropped too. A response
 * containing the no-TOC sentinel on its own line yields no titles.
 */
export function parseTocResponse(
  response: string,
  options: TocResponseParseOptions = {},
): string[] {
  const maxTitleLength =
    options.maxTitleLength ?? BOOK_SPLITTER.MAX_TITLE_LENGTH;

  const lines = response
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.includes(NO_TOC_SENTINEL)) {
    return [];
  }

  return lines.filter(
    (line) =>
      !CODE_FENCE_PATTERN.test(line) &&
      line !== EMPTY_LIST_ANSWER &&
      line.length <= maxTitleLength,
  );
}

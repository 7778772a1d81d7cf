import { escapeRegExp } from 'es-toolkit';

/**
 * Decides whether a line is the heading of one title
 */
export type TitleMatcher = (line: string) => boolean;

/**
 * Builds the matcher for a title once, before the scan starts
 */
export type TitleMatcherFactory = (title: string) => TitleMatcher;

/**
 * Optional "12." numbering followed by optional whitespace
 */
const NUMBERING_PREFIX = String.raw`^(\d+\.)?\s*`;

/**
 * Match lines that start with the title, optionally numbered
 *
 * Case-insensitive prefix match: "1. Intro", "Intro: How it began" and
 * "INTRO" all match "Intro"; "the Intro was memorable" does not.
 */
export const createAnchoredTitleMatcher: TitleMatcherFactory = (title) => {
  const pattern = new RegExp(NUMBERING_PREFIX + escapeRegExp(title), 'i');
  return (line) => pattern.test(line);
};

/**
 * Like createAnchoredTitleMatcher, but any whitespace run in the title
 * matches any whitespace run in the line ("The  First\tStep")
 */
export const createWhitespaceTolerantTitleMatcher: TitleMatcherFactory = (
  title,
) => {
  const body = title
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join(String.raw`\s+`);
  const pattern = new RegExp(NUMBERING_PREFIX + body, 'i');
  return (line) => pattern.test(line);
};

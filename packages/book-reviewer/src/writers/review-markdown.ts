import type { BookReview, ChapterReviewEntry } from '@chapterwise/model';

function renderEntry(entry: ChapterReviewEntry): string {
  let markdown = `\n\n${entry.analysis.text}\n\n---\n`;
  for (const { question, answer } of entry.questions) {
    markdown += `\n\n## User Question\n\n${question}\n\n## Answer\n\n${answer}\n\n---\n`;
  }
  return markdown;
}

/**
 * Render a review as one markdown document
 *
 * Each chapter's analysis is followed by its questions and answers, and
 * every block ends with a horizontal rule.
 */
export function renderReviewMarkdown(review: BookReview): string {
  return (
    `# AI Review: ${review.bookTitle}\n\n` +
    review.chapters.map(renderEntry).join('')
  );
}

export { renderReviewMarkdown } from './review-markdown';
export { getSafeFilename, writeReview } from './review-writer';

/**
 * Pipeline stage at which no chapter was left
 */
export type ChapterNotFoundStage = 'scan' | 'reconcile' | 'materialize';

/**
 * ChapterNotFoundError
 *
 * Error thrown when a book yields no chapter starts, so no ranges can be
 * produced.
 */
export class ChapterNotFoundError extends Error {
  readonly stage: ChapterNotFoundStage;

  constructor(stage: ChapterNotFoundStage, message?: string) {
    super(message ?? ChapterNotFoundError.defaultMessage(stage));
    this.name = 'ChapterNotFoundError';
    this.stage = stage;
  }

  private static defaultMessage(stage: ChapterNotFoundStage): string {
    switch (stage) {
      case 'scan':
        return 'No chapter title occurs in the document';
      case 'reconcile':
        return 'No chapter start survived reconciliation';
      case 'materialize':
        return 'Cannot build chapter ranges without chapter starts';
    }
  }
}

/**
 * TocExtractError
 *
 * Base error class for TOC extraction failures.
 */
export class TocExtractError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TocExtractError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create TocExtractError from unknown error with context
   */
  static fromError(context: string, error: unknown): TocExtractError {
    return new TocExtractError(
      `${context}: ${TocExtractError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * TocNotFoundError
 *
 * Error thrown when no chapter titles could be extracted from the start of
 * the book. A run cannot segment the book without them.
 */
export class TocNotFoundError extends TocExtractError {
  constructor(message = 'Table of contents not found in the document') {
    super(message);
    this.name = 'TocNotFoundError';
  }
}
